// src/core/common/interfaces/models.ts

/** The four CSV extracts a report run consumes. */
export type ExtractKind = 'PlannedVisit' | 'UnplannedVisit' | 'Counter' | 'User';

export type VisitType = 'Planned' | 'Unplanned';

export type MatchMode = 'Exact' | 'PrefixWildcard';

/** Marker written into a row wherever a join or a geography name is missing. */
export const UNRESOLVED_MARKER = 'Unresolved';

/** One entry of the district alias table. */
export interface AliasRule {
    readonly state: string;
    readonly rawPattern: string;       // as authored, including a trailing '*' for prefix rules
    readonly canonicalName: string;
    readonly matchMode: MatchMode;
}

export interface GeographyResolution {
    readonly canonicalDistrict: string;
    readonly resolved: boolean;
}

/** A visit event from the planned or unplanned extract. */
export interface VisitRecord {
    readonly visitId: string;
    readonly visitType: VisitType;
    readonly counterId: string;
    readonly leadId: string;
    readonly rawState: string;
    readonly rawDistrict: string;
    readonly visitDate: string;        // yyyy-MM-dd
    readonly visitTime: string | null; // HH:mm:ss, null when the source value had no time of day
    readonly assignedUserId: string;
    readonly status: string;
    readonly sourceLine: number;       // 1-based line in the extract, header is line 1
}

export interface CounterRecord {
    readonly counterId: string;
    readonly counterName: string;
    readonly rawState: string;
    readonly rawDistrict: string;
    readonly sourceLine: number;
}

export interface UserRecord {
    readonly userId: string;
    readonly userName: string;
    readonly territory: string;
    readonly sourceLine: number;
}

/** Record type produced for each extract kind. */
export interface ExtractRecordMap {
    PlannedVisit: VisitRecord;
    UnplannedVisit: VisitRecord;
    Counter: CounterRecord;
    User: UserRecord;
}

export interface RejectedRow {
    readonly line: number;
    readonly reason: string;
}

export interface ParsedExtract<T> {
    readonly kind: ExtractKind;
    readonly records: T[];
    readonly totalRows: number;
    readonly rejectedRows: RejectedRow[];
}

/** One report line: a single visit event enriched with counter, user and geography. */
export interface ReconciledRow {
    readonly canonicalState: string;
    readonly canonicalDistrict: string;
    readonly counterId: string;
    readonly counterName: string;
    readonly userName: string;
    readonly territory: string;
    readonly visitType: VisitType;
    readonly visitDate: string;
    readonly status: string;
    readonly geographyResolved: boolean;
    readonly visitId: string;
    readonly visitTime: string;        // empty when the visit had no time of day
    readonly assignedUserId: string;
    readonly lateStart: boolean | null;
    readonly workedLate: boolean | null;
    // Join outcome against the masters; not written to the report.
    readonly counterMatched: boolean;
    readonly userMatched: boolean;
}

/** Per-counter visit counts, derived from the report rows. */
export interface CounterVisitSummary {
    readonly canonicalState: string;
    readonly canonicalDistrict: string;
    readonly counterId: string;
    readonly counterName: string;
    readonly plannedVisits: number;
    readonly unplannedVisits: number;
    readonly totalVisits: number;
}

export interface ReportStats {
    readonly totalRows: number;
    readonly plannedRows: number;
    readonly unplannedRows: number;
    readonly unresolvedGeography: number;
    readonly unresolvedCounters: number;
    readonly unresolvedUsers: number;
}

/** Inclusive calendar date window, both ends as yyyy-MM-dd. */
export interface DateRange {
    readonly startDate: string;
    readonly endDate: string;
}
