// src/core/pipeline/interfaces/services.ts
import { ReportFailureKind } from '../../common/errors';
import { DateRange, ExtractKind, ReconciledRow, ReportStats } from '../../common/interfaces/models';
import { ExtractParsingOptions } from '../../parsing';
import { ReconciliationOptions } from '../../reconciliation';

/** The four extracts and the reporting window of one report run. */
export interface ReportRunRequest {
    readonly plannedVisits: Buffer;
    readonly unplannedVisits: Buffer;
    readonly counters: Buffer;
    readonly users: Buffer;
    /** yyyy-MM-dd; validated before any extract is parsed */
    readonly startDate: unknown;
    readonly endDate: unknown;
}

export interface ReportRunOptions {
    parsing?: ExtractParsingOptions;
    reconciliation?: ReconciliationOptions;
}

export interface GeneratedReport {
    readonly runId: string;
    readonly range: DateRange;
    readonly filename: string;
    readonly content: Buffer;
    readonly rows: ReconciledRow[];
    readonly stats: ReportStats;
    readonly rejectedRows: Readonly<Record<ExtractKind, number>>;
}

export interface ReportFailure {
    readonly kind: ReportFailureKind;
    readonly message: string;
}

/** A run either yields the complete report or a single structured failure, never a partial report. */
export type ReportRunOutcome =
    | { readonly status: 'ok'; readonly report: GeneratedReport }
    | { readonly status: 'failed'; readonly failure: ReportFailure };

export interface IReportPipelineService {
    run(request: ReportRunRequest, options?: ReportRunOptions): ReportRunOutcome;
}
