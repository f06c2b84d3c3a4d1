// src/core/reconciliation/interfaces/services.ts
import {
    CounterRecord, CounterVisitSummary, ReconciledRow, ReportStats, UserRecord, VisitRecord
} from '../../common/interfaces/models';
import { IGeographyNormalizer } from '../../geography';

/** Options for configuring a reconciliation run */
export interface ReconciliationOptions {
    /** A first visit of the day after this time (HH:mm:ss) is a late start. */
    lateStartAfter?: string;
    /** A last visit of the day after this time (HH:mm:ss) counts as working late. */
    workedLateAfter?: string;
    /** Resolve against this table instead of the provider's current one. */
    normalizer?: IGeographyNormalizer;
}

/** Defines the contract for the Reconciliation Service */
export interface IReconciliationService {
    /**
     * Joins visits to counters and users, normalizes geography and keeps visits dated
     * inside [startDate, endDate]. One row per surviving visit, in report order.
     */
    reconcile(
        planned: readonly VisitRecord[],
        unplanned: readonly VisitRecord[],
        counters: readonly CounterRecord[],
        users: readonly UserRecord[],
        startDate: string,
        endDate: string,
        options?: ReconciliationOptions
    ): ReconciledRow[];

    /** Planned/unplanned visit counts per counter, derived from report rows. */
    summarizeByCounter(rows: readonly ReconciledRow[]): CounterVisitSummary[];

    summarizeRun(rows: readonly ReconciledRow[]): ReportStats;
}
