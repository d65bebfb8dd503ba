import { v4 as uuidv4 } from "uuid";

export interface IdGenerator {
    next(): string;
}

// Random v4 UUIDs (122 random bits each).
export class UuidGenerator implements IdGenerator {
    next(): string {
        return uuidv4();
    }
}

// Predictable ids for tests: receipt-1, receipt-2, ...
export class SequentialIdGenerator implements IdGenerator {
    private counter = 0;

    constructor(private readonly prefix: string = "receipt") {}

    next(): string {
        this.counter += 1;
        return `${this.prefix}-${this.counter}`;
    }
}
