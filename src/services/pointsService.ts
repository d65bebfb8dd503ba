import {
    Receipt,
    Item,
    POINTS_PER_RETAILER_ALPHANUMERIC,
    POINTS_TOTAL_NO_CENTS,
    POINTS_TOTAL_QUARTER_MULTIPLE,
    POINTS_PER_ITEM_PAIR,
    ITEM_DESCRIPTION_LENGTH_FACTOR,
    ITEM_PRICE_MULTIPLIER_PERCENT,
    POINTS_ODD_PURCHASE_DAY,
    POINTS_AFTERNOON_PURCHASE,
    AFTERNOON_START_HOUR,
    AFTERNOON_END_HOUR
} from "../models/receipt";
import { PointsOverflowError } from "../models/errors";
import { parseAmountCents, parseCalendarDate, parseClockTime } from "../utils/parsing";

// Everything in here expects a receipt that already went through validateReceipt.
// Malformed amounts, dates or times are a programming error and throw.
// Sums are kept as bigint and only leave as a number when they fit exactly.

const ALPHANUMERIC = /[\p{L}\p{N}]/u;

function amountCents(value: string): bigint {
    const cents = parseAmountCents(value);
    if (cents === undefined) {
        throw Error(`Unvalidated amount reached scoring: ${value}`);
    }
    return cents;
}

function toPoints(points: bigint): number {
    if (points > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw new PointsOverflowError(points);
    }
    return Number(points);
}

// Counts code points, not UTF-16 units.
function characterCount(value: string): number {
    return [...value].length;
}

export function scoreRetailer(retailer: string): number {
    let points = 0;
    for (const character of retailer) {
        if (ALPHANUMERIC.test(character)) {
            points += POINTS_PER_RETAILER_ALPHANUMERIC;
        }
    }
    return points;
}

export function scoreTotal(total: string): number {
    const cents = amountCents(total);
    let points = 0;
    if (cents % 100n === 0n) {
        points += POINTS_TOTAL_NO_CENTS;
    }
    if (cents % 25n === 0n) {
        points += POINTS_TOTAL_QUARTER_MULTIPLE;
    }
    return points;
}

// ceil(price * 0.2) on integer cents: ceil(cents * 20 / 10000)
function itemDescriptionBonus(item: Item): bigint {
    if (characterCount(item.shortDescription.trim()) % ITEM_DESCRIPTION_LENGTH_FACTOR !== 0) {
        return 0n;
    }
    const scaled = amountCents(item.price) * BigInt(ITEM_PRICE_MULTIPLIER_PERCENT);
    const divisor = 10000n;
    return (scaled + divisor - 1n) / divisor;
}

function itemsPoints(items: Item[]): bigint {
    const pairs = BigInt(Math.floor(items.length / 2));
    return items.reduce((total, item) => total + itemDescriptionBonus(item), pairs * BigInt(POINTS_PER_ITEM_PAIR));
}

export function scoreItemDescription(item: Item): number {
    return toPoints(itemDescriptionBonus(item));
}

export function scoreItems(items: Item[]): number {
    return toPoints(itemsPoints(items));
}

export function scorePurchaseDateTime(purchaseDate: string, purchaseTime: string): number {
    const date = parseCalendarDate(purchaseDate);
    const time = parseClockTime(purchaseTime);
    if (!date || !time) {
        throw Error(`Unvalidated purchase date/time reached scoring: ${purchaseDate} ${purchaseTime}`);
    }
    let points = 0;
    if (date.day % 2 !== 0) {
        points += POINTS_ODD_PURCHASE_DAY;
    }
    if (time.hour >= AFTERNOON_START_HOUR && time.hour < AFTERNOON_END_HOUR) {
        points += POINTS_AFTERNOON_PURCHASE;
    }
    return points;
}

export function calculatePoints(receipt: Receipt): number {
    return toPoints(
        BigInt(scoreRetailer(receipt.retailer))
        + BigInt(scoreTotal(receipt.total))
        + itemsPoints(receipt.items)
        + BigInt(scorePurchaseDateTime(receipt.purchaseDate, receipt.purchaseTime))
    );
}
