import { ScoredReceipt } from "../models/receipt";
import { ReceiptError, ReceiptNotFound, Result } from "../models/errors";
import { ReceiptStore } from "../models/store";
import { IdGenerator } from "./idGenerator";
import { validateReceipt } from "./receiptValidator";
import { calculatePoints } from "./pointsService";

export interface ReceiptServiceDeps {
    store: ReceiptStore;
    ids: IdGenerator;
}

/**
 * Validates and scores a raw receipt document, then records the score under a fresh id.
 * A rejected document never reaches the store.
 */
export function processReceipt(document: unknown, deps: ReceiptServiceDeps): Result<ScoredReceipt, ReceiptError> {
    const validated = validateReceipt(document);
    if (!validated.ok) {
        return validated;
    }
    const points = calculatePoints(validated.value);
    const scored = deps.store.insert(deps.ids.next(), points);
    return { ok: true, value: scored };
}

export function getReceiptPoints(id: string, store: ReceiptStore): Result<ScoredReceipt, ReceiptNotFound> {
    const scored = store.lookup(id);
    if (!scored) {
        return { ok: false, error: { kind: "NotFound", id } };
    }
    return { ok: true, value: scored };
}
