// src/core/parsing/visit-date.ts
import { UTCDate } from '@date-fns/utc';
import { format, isValid, parse } from 'date-fns';

interface VisitDateFormat {
    readonly pattern: string;
    readonly hasTime: boolean;
}

/**
 * Formats seen in the CRM exports, tried in order. Numeric dates are day-first only;
 * slash-separated values like 03/05/2024 could be either order and are rejected.
 */
export const VISIT_DATE_FORMATS: readonly VisitDateFormat[] = [
    { pattern: 'dd-MM-yyyy HH:mm', hasTime: true },
    { pattern: 'dd-MM-yyyy HH:mm:ss', hasTime: true },
    { pattern: 'dd-MMM-yyyy HH:mm:ss', hasTime: true },
    { pattern: 'dd-MMM-yyyy HH:mm', hasTime: true },
    { pattern: 'yyyy-MM-dd HH:mm:ss', hasTime: true },
    { pattern: "yyyy-MM-dd'T'HH:mm:ss", hasTime: true },
    { pattern: 'yyyy-MM-dd', hasTime: false },
    { pattern: 'dd-MM-yyyy', hasTime: false },
    { pattern: 'dd-MMM-yyyy', hasTime: false },
];

// Two-digit years ('05-03-24') parse as year 24; treat anything this old as malformed.
const MIN_YEAR = 1900;

// Wall-clock values carry no zone. Parsing and formatting in UTC keeps them clear of
// the host's daylight-saving gaps.
const REFERENCE_DATE = new UTCDate(2000, 0, 1);

export interface VisitTimestamp {
    readonly date: string;         // yyyy-MM-dd
    readonly time: string | null;  // HH:mm:ss
}

/** Parses a visit date cell; null when no accepted format matches exactly. */
export function parseVisitTimestamp(value: string): VisitTimestamp | null {
    if (!value) return null;

    for (const candidate of VISIT_DATE_FORMATS) {
        const parsed = parse(value, candidate.pattern, REFERENCE_DATE);
        if (!isValid(parsed) || parsed.getFullYear() < MIN_YEAR) continue;
        return {
            date: format(parsed, 'yyyy-MM-dd'),
            time: candidate.hasTime ? format(parsed, 'HH:mm:ss') : null,
        };
    }
    return null;
}
