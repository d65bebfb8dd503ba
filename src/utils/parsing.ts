import { AMOUNT_PATTERN, DATE_PATTERN, TIME_PATTERN } from "../models/receipt";

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function parseCalendarDate(value: string): CalendarDate | undefined {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  return { year, month, day };
}

export function parseClockTime(value: string): ClockTime | undefined {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    return undefined;
  }
  return { hour, minute };
}

// Amounts carry exactly two decimals, so they are held as integer cents. BigInt keeps
// arbitrarily long amounts exact.
export function parseAmountCents(value: string): bigint | undefined {
  if (!AMOUNT_PATTERN.test(value)) {
    return undefined;
  }
  return BigInt(value.replace(".", ""));
}
