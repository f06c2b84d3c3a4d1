// src/core/reporting/report-columns.ts
import { CounterVisitSummary, ReconciledRow } from '../common/interfaces/models';

export interface ReportColumn<T> {
    readonly key: keyof T;
    readonly header: string;
    readonly width: number; // workbook column width
}

/** ReconciledRow fields written to the report. */
export type VisitReportField = Exclude<keyof ReconciledRow, 'counterMatched' | 'userMatched'>;

/**
 * Fixed column layout of the visit report. Every report field maps to exactly one column;
 * the `satisfies` check below fails compilation if a field is added without a header.
 */
const VISIT_REPORT_HEADERS = {
    canonicalState: 'State',
    canonicalDistrict: 'District',
    counterId: 'Counter Code',
    counterName: 'Counter Name',
    userName: 'User Name',
    territory: 'Territory',
    visitType: 'Visit Type',
    visitDate: 'Visit Date',
    status: 'Status',
    geographyResolved: 'Geography Resolved',
    visitId: 'Visit Id',
    visitTime: 'Visit Time',
    assignedUserId: 'Assigned User',
    lateStart: 'Late Start',
    workedLate: 'Worked Late',
} as const satisfies Record<VisitReportField, string>;

const WIDE = 30;
const NARROW = 14;

export const VISIT_REPORT_COLUMNS: readonly ReportColumn<ReconciledRow>[] = [
    { key: 'canonicalState', header: VISIT_REPORT_HEADERS.canonicalState, width: 20 },
    { key: 'canonicalDistrict', header: VISIT_REPORT_HEADERS.canonicalDistrict, width: 22 },
    { key: 'counterId', header: VISIT_REPORT_HEADERS.counterId, width: NARROW },
    { key: 'counterName', header: VISIT_REPORT_HEADERS.counterName, width: WIDE },
    { key: 'userName', header: VISIT_REPORT_HEADERS.userName, width: 22 },
    { key: 'territory', header: VISIT_REPORT_HEADERS.territory, width: 18 },
    { key: 'visitType', header: VISIT_REPORT_HEADERS.visitType, width: NARROW },
    { key: 'visitDate', header: VISIT_REPORT_HEADERS.visitDate, width: NARROW },
    { key: 'status', header: VISIT_REPORT_HEADERS.status, width: 16 },
    { key: 'geographyResolved', header: VISIT_REPORT_HEADERS.geographyResolved, width: 20 },
    { key: 'visitId', header: VISIT_REPORT_HEADERS.visitId, width: 18 },
    { key: 'visitTime', header: VISIT_REPORT_HEADERS.visitTime, width: 12 },
    { key: 'assignedUserId', header: VISIT_REPORT_HEADERS.assignedUserId, width: WIDE },
    { key: 'lateStart', header: VISIT_REPORT_HEADERS.lateStart, width: 12 },
    { key: 'workedLate', header: VISIT_REPORT_HEADERS.workedLate, width: 12 },
];

export const COUNTER_SUMMARY_COLUMNS: readonly ReportColumn<CounterVisitSummary>[] = [
    { key: 'canonicalState', header: 'State', width: 20 },
    { key: 'canonicalDistrict', header: 'District', width: 22 },
    { key: 'counterId', header: 'Counter Code', width: NARROW },
    { key: 'counterName', header: 'Counter Name', width: WIDE },
    { key: 'plannedVisits', header: 'Planned Visits', width: NARROW },
    { key: 'unplannedVisits', header: 'Unplanned Visits', width: 16 },
    { key: 'totalVisits', header: 'Total Visits', width: NARROW },
];

/**
 * Text form of a report value. Booleans are written as true/false, the daily flags as 1/0,
 * and numbers through String() so nothing depends on the host locale.
 */
export function formatCell(key: string, value: string | number | boolean | null): string {
    if (value === null) return '';
    if (typeof value === 'boolean') {
        if (key === 'lateStart' || key === 'workedLate') return value ? '1' : '0';
        return value ? 'true' : 'false';
    }
    return String(value);
}
