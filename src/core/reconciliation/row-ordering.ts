// src/core/reconciliation/row-ordering.ts
import { ReconciledRow } from '../common/interfaces/models';
import { compareText } from '../common/utils';

type OrderingKey = (row: ReconciledRow) => string;

// Report order: state, district, counter name, visit date. The remaining keys only
// break ties so that the order is total over everything except the derived daily flags.
const ORDERING_KEYS: readonly OrderingKey[] = [
    row => row.canonicalState,
    row => row.canonicalDistrict,
    row => row.counterName,
    row => row.visitDate,
    row => row.visitTime,
    row => row.counterId,
    row => row.visitType,
    row => row.visitId,
    row => row.assignedUserId,
    row => row.userName,
    row => row.territory,
    row => row.status,
    row => (row.geographyResolved ? '1' : '0'),
    row => (row.counterMatched ? '1' : '0'),
    row => (row.userMatched ? '1' : '0'),
];

export function compareReportRows(a: ReconciledRow, b: ReconciledRow): number {
    for (const key of ORDERING_KEYS) {
        const order = compareText(key(a), key(b));
        if (order !== 0) return order;
    }
    return 0;
}
