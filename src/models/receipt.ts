// Receipt documents as they arrive over the wire. Amounts, dates and times stay strings
// until scoring needs their values.

export interface Item {
    shortDescription: string;
    price: string;
}

export interface Receipt {
    retailer: string;
    total: string;
    purchaseDate: string; // YYYY-MM-DD
    purchaseTime: string; // HH:MM, 24-hour
    items: Item[];
}

export interface ScoredReceipt {
    id: string;
    points: number;
}

export const REQUIRED_RECEIPT_FIELDS = ["retailer", "total", "items", "purchaseDate", "purchaseTime"] as const;
export type ReceiptField = (typeof REQUIRED_RECEIPT_FIELDS)[number];

export const AMOUNT_PATTERN = /^[0-9]+\.[0-9]{2}$/;
export const DESCRIPTION_PATTERN = /^[\p{L}\p{N}_\s-]+$/u;
export const RETAILER_PATTERN = /\S/;
export const DATE_PATTERN = /^([0-9]{4})-([0-9]{1,2})-([0-9]{1,2})$/;
export const TIME_PATTERN = /^([0-9]{1,2}):([0-9]{1,2})$/;

export const POINTS_PER_RETAILER_ALPHANUMERIC = 1;
export const POINTS_TOTAL_NO_CENTS = 50;
export const POINTS_TOTAL_QUARTER_MULTIPLE = 25;
export const POINTS_PER_ITEM_PAIR = 5;
export const ITEM_DESCRIPTION_LENGTH_FACTOR = 3;
export const ITEM_PRICE_MULTIPLIER_PERCENT = 20; // 0.2 of the price, rounded up
export const POINTS_ODD_PURCHASE_DAY = 6;
export const POINTS_AFTERNOON_PURCHASE = 10;
export const AFTERNOON_START_HOUR = 14; // inclusive
export const AFTERNOON_END_HOUR = 16; // exclusive
