import { ReceiptField } from "./receipt";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

// Reasons a submitted receipt is rejected. Only the first violated rule is ever reported.
export type ReceiptError =
    | { kind: "InvalidReceiptFormat" }
    | { kind: "MissingField"; field: ReceiptField }
    | { kind: "InvalidFieldFormat"; field: ReceiptField }
    | { kind: "InvalidItemsListFormat" }
    | { kind: "EmptyItemsList" }
    | { kind: "InvalidItemFormat" }
    | { kind: "InvalidRetailerName"; value: string }
    | { kind: "InvalidTotal"; value: string }
    | { kind: "InvalidItemDescription"; value: string }
    | { kind: "InvalidItemPrice"; value: string }
    | { kind: "InvalidPurchaseDate"; value: string }
    | { kind: "InvalidPurchaseTime"; value: string };

export interface ReceiptNotFound {
    kind: "NotFound";
    id: string;
}

export function describeReceiptError(error: ReceiptError): string {
    switch (error.kind) {
        case "InvalidReceiptFormat":
            return "Error: invalid receipt format";
        case "MissingField":
            return `Error: missing ${error.field} in receipt`;
        case "InvalidFieldFormat":
            return `Error: invalid ${error.field} format`;
        case "InvalidItemsListFormat":
            return "Error: invalid receipt items list format";
        case "EmptyItemsList":
            return "Error: receipt items list is empty";
        case "InvalidItemFormat":
            return "Error: invalid receipt item format";
        case "InvalidRetailerName":
            return `Error: invalid receipt retailer name (${error.value})`;
        case "InvalidTotal":
            return `Error: invalid receipt total (${error.value})`;
        case "InvalidItemDescription":
            return `Error: invalid item description (${error.value})`;
        case "InvalidItemPrice":
            return `Error: invalid item price (${error.value})`;
        case "InvalidPurchaseDate":
            return `Error: invalid receipt purchase date (${error.value})`;
        case "InvalidPurchaseTime":
            return `Error: invalid receipt purchase time (${error.value})`;
    }
}

export function describeNotFound(error: ReceiptNotFound): string {
    return `ERROR: receipt id not found (${error.id})`;
}

export class DuplicateReceiptIdError extends Error {
    constructor(public readonly id: string) {
        super(`Receipt id already stored: ${id}`);
        this.name = "DuplicateReceiptIdError";
    }
}

// A valid receipt whose total no longer fits a JSON-safe integer.
export class PointsOverflowError extends Error {
    constructor(public readonly points: bigint) {
        super(`Receipt points exceed ${Number.MAX_SAFE_INTEGER}: ${points}`);
        this.name = "PointsOverflowError";
    }
}
