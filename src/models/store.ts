// Very simple in-memory receipt storage. Scores live as long as the process does.
//
// Node runs every request handler to completion on a single thread and nothing here
// awaits, so each insert and lookup is atomic with respect to other requests. A lookup
// that starts after a submission has answered always sees that submission's entry.

import { ScoredReceipt } from "./receipt";
import { DuplicateReceiptIdError } from "./errors";

export class ReceiptStore {
    private readonly points: Map<string, number> = new Map();

    // Insert-only: entries are never replaced or removed.
    public insert(id: string, points: number): ScoredReceipt {
        if (this.points.has(id)) {
            throw new DuplicateReceiptIdError(id);
        }
        this.points.set(id, points);
        return { id, points };
    }

    public lookup(id: string): ScoredReceipt | undefined {
        const points = this.points.get(id);
        if (points === undefined) {
            return undefined;
        }
        return { id, points };
    }

    public has(id: string): boolean {
        return this.points.has(id);
    }

    public get size(): number {
        return this.points.size;
    }
}
