// src/core/common/utils.ts

import { v4 as uuidv4 } from 'uuid';

/**
 * Generates a unique Version 4 UUID.
 * Used for log correlation only; never written into report output.
 */
export function generateUniqueId(): string {
    return uuidv4();
}

/**
 * Orders two strings by UTF-16 code unit.
 * Report ordering must not depend on the host locale, so no localeCompare here.
 */
export function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/** Strict ISO calendar date (yyyy-MM-dd) shape check; calendar validity is checked by the caller. */
export function looksLikeIsoDate(value: string): boolean {
    return /^\d{4}-\d{2}-\d{2}$/.test(value);
}
