import { Item, Receipt, ReceiptField, DESCRIPTION_PATTERN, RETAILER_PATTERN, AMOUNT_PATTERN } from "../models/receipt";
import { ReceiptError, Result, ok } from "../models/errors";
import { parseCalendarDate, parseClockTime } from "../utils/parsing";

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function reject(error: ReceiptError): Result<never, ReceiptError> {
    return { ok: false, error };
}

function stringField(document: JsonObject, field: Exclude<ReceiptField, "items">): Result<string, ReceiptError> {
    if (!(field in document)) {
        return reject({ kind: "MissingField", field });
    }
    const value = document[field];
    if (typeof value !== "string") {
        return reject({ kind: "InvalidFieldFormat", field });
    }
    return ok(value);
}

// Shape checks over the raw document. Nothing here looks at the content of the strings.
function checkStructure(document: unknown): Result<Receipt, ReceiptError> {
    if (!isJsonObject(document)) {
        return reject({ kind: "InvalidReceiptFormat" });
    }
    // Presence then type, one field at a time in field order.
    const retailer = stringField(document, "retailer");
    if (!retailer.ok) {
        return retailer;
    }
    const total = stringField(document, "total");
    if (!total.ok) {
        return total;
    }
    if (!("items" in document)) {
        return reject({ kind: "MissingField", field: "items" });
    }
    const purchaseDate = stringField(document, "purchaseDate");
    if (!purchaseDate.ok) {
        return purchaseDate;
    }
    const purchaseTime = stringField(document, "purchaseTime");
    if (!purchaseTime.ok) {
        return purchaseTime;
    }

    const rawItems = document.items;
    if (!Array.isArray(rawItems)) {
        return reject({ kind: "InvalidItemsListFormat" });
    }
    if (rawItems.length === 0) {
        return reject({ kind: "EmptyItemsList" });
    }
    const items: Item[] = [];
    for (const rawItem of rawItems) {
        if (!isJsonObject(rawItem)) {
            return reject({ kind: "InvalidItemFormat" });
        }
        const { shortDescription, price } = rawItem;
        if (typeof shortDescription !== "string" || typeof price !== "string") {
            return reject({ kind: "InvalidItemFormat" });
        }
        items.push({ shortDescription, price });
    }

    return ok({
        retailer: retailer.value,
        total: total.value,
        purchaseDate: purchaseDate.value,
        purchaseTime: purchaseTime.value,
        items
    });
}

function checkItem(item: Item): ReceiptError | undefined {
    if (!DESCRIPTION_PATTERN.test(item.shortDescription)) {
        return { kind: "InvalidItemDescription", value: item.shortDescription };
    }
    if (!AMOUNT_PATTERN.test(item.price)) {
        return { kind: "InvalidItemPrice", value: item.price };
    }
    return undefined;
}

/**
 * Validates an untyped JSON document as a receipt.
 *
 * Rules run in a fixed order and the first violation is returned: structure, then
 * retailer, total, each item's description and price in list order, purchase date and
 * finally purchase time.
 */
export function validateReceipt(document: unknown): Result<Receipt, ReceiptError> {
    const structure = checkStructure(document);
    if (!structure.ok) {
        return structure;
    }
    const receipt = structure.value;

    if (!RETAILER_PATTERN.test(receipt.retailer)) {
        return reject({ kind: "InvalidRetailerName", value: receipt.retailer });
    }
    if (!AMOUNT_PATTERN.test(receipt.total)) {
        return reject({ kind: "InvalidTotal", value: receipt.total });
    }
    for (const item of receipt.items) {
        const itemError = checkItem(item);
        if (itemError) {
            return reject(itemError);
        }
    }
    if (!parseCalendarDate(receipt.purchaseDate)) {
        return reject({ kind: "InvalidPurchaseDate", value: receipt.purchaseDate });
    }
    if (!parseClockTime(receipt.purchaseTime)) {
        return reject({ kind: "InvalidPurchaseTime", value: receipt.purchaseTime });
    }
    return ok(receipt);
}
