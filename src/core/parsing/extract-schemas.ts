// src/core/parsing/extract-schemas.ts
import { ExtractKind } from '../common/interfaces/models';

/** One logical field of an extract and the header names accepted for it. */
export interface ColumnSpec<F extends string> {
    readonly field: F;
    /** Accepted headers, first is the primary name used in error messages. Matched case-insensitively. */
    readonly headers: readonly string[];
    readonly required: boolean;
}

type VisitField = 'visitId' | 'counterId' | 'leadId' | 'rawState' | 'rawDistrict' | 'visitDate' | 'assignedUserId' | 'status';
type CounterField = 'counterId' | 'counterName' | 'rawState' | 'rawDistrict';
type UserField = 'userId' | 'userName' | 'territory';

export interface ExtractFieldMap {
    PlannedVisit: VisitField;
    UnplannedVisit: VisitField;
    Counter: CounterField;
    User: UserField;
}

export type ExtractSchemas = { readonly [K in ExtractKind]: readonly ColumnSpec<ExtractFieldMap[K]>[] };

// Visit columns shared by both visit extracts
const VISIT_GEOGRAPHY_COLUMNS: readonly ColumnSpec<VisitField>[] = [
    { field: 'counterId', headers: ['Counter Code'], required: true },
    { field: 'leadId', headers: ['Lead Id', 'Counter Number'], required: false },
    { field: 'rawState', headers: ['Operational States', 'State'], required: false },
    { field: 'rawDistrict', headers: ['Taluka or District', 'District'], required: false },
];

export const EXTRACT_SCHEMAS: ExtractSchemas = {
    PlannedVisit: [
        { field: 'visitId', headers: ['Task Id', 'Visit Id', 'Id'], required: true },
        ...VISIT_GEOGRAPHY_COLUMNS,
        { field: 'visitDate', headers: ['Task Completed', 'Visit Date', 'Completed On'], required: true },
        { field: 'assignedUserId', headers: ['Task Owner Email', 'Assigned User Id', 'Owner Email'], required: true },
        { field: 'status', headers: ['Task Status', 'Status'], required: false },
    ],
    UnplannedVisit: [
        { field: 'visitId', headers: ['Activity Id', 'Visit Id', 'Id'], required: true },
        ...VISIT_GEOGRAPHY_COLUMNS,
        { field: 'visitDate', headers: ['Activity Date', 'Visit Date', 'Completed On'], required: true },
        { field: 'assignedUserId', headers: ['Activity Created By Email', 'Assigned User Id', 'Owner Email'], required: true },
        { field: 'status', headers: ['Activity Status', 'Status'], required: false },
    ],
    Counter: [
        { field: 'counterId', headers: ['Counter Code'], required: true },
        { field: 'counterName', headers: ['Counter Name'], required: true },
        { field: 'rawState', headers: ['State', 'Operational States'], required: true },
        { field: 'rawDistrict', headers: ['District', 'Taluka or District'], required: true },
    ],
    User: [
        { field: 'userId', headers: ['Email Address', 'User Id'], required: true },
        { field: 'userName', headers: ['Name', 'User Name', 'Full Name'], required: true },
        { field: 'territory', headers: ['Territory', 'Region'], required: false },
    ],
};

/** Case-insensitive header key: trimmed, lower-cased, interior whitespace runs collapsed. */
export function normalizeHeader(header: string): string {
    return header.replace(/\s+/g, ' ').trim().toLowerCase();
}
