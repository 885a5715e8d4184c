import { DateTime } from "luxon";

/** Format the exchange API expects for strFromDate / strToDate. */
export const SITE_DATE_FORMAT = "dd/MM/yyyy";

// Single-digit day/month accepted, like a browser form would send them
const INPUT_FORMATS = ["yyyy-M-d", "d/M/yyyy", "d-M-yyyy", "yyyy/M/d"];

export const DEFAULT_TIMEZONE = "Asia/Kolkata";

export class InvalidDateError extends Error {
    constructor(public readonly input: string) {
        super(`Invalid date: ${input}`);
        this.name = "InvalidDateError";
    }
}

export function todayInZone(zone: string = DEFAULT_TIMEZONE): DateTime {
    return DateTime.now().setZone(zone).startOf("day");
}

export function todaySiteDate(zone: string = DEFAULT_TIMEZONE): string {
    return todayInZone(zone).toFormat(SITE_DATE_FORMAT);
}

export function todayIso(zone: string = DEFAULT_TIMEZONE): string {
    return todayInZone(zone).toFormat("yyyy-MM-dd");
}

/**
 * Normalizes a date string to DD/MM/YYYY. Empty input means today
 * in `zone`.
 */
export function toSiteDate(input?: string | null, zone: string = DEFAULT_TIMEZONE): string {
    const value = input?.trim();
    if (!value) {
        return todaySiteDate(zone);
    }

    for (const format of INPUT_FORMATS) {
        const parsed = DateTime.fromFormat(value, format, { zone });
        if (parsed.isValid) {
            return parsed.toFormat(SITE_DATE_FORMAT);
        }
    }

    throw new InvalidDateError(value);
}

/** Moves a DD/MM/YYYY date by whole days. */
export function shiftSiteDate(siteDate: string, days: number): string {
    const parsed = DateTime.fromFormat(siteDate, SITE_DATE_FORMAT);
    if (!parsed.isValid) {
        throw new InvalidDateError(siteDate);
    }
    return parsed.plus({ days }).toFormat(SITE_DATE_FORMAT);
}
