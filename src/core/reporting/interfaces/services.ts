// src/core/reporting/interfaces/services.ts
import { CounterVisitSummary, DateRange, ReconciledRow } from '../../common/interfaces/models';

/** Defines the contract for the Report Serializer Service */
export interface IReportSerializerService {
    /**
     * Renders report rows as UTF-8 CSV with the fixed report header.
     * Identical rows in identical order always give identical bytes.
     */
    serialize(rows: readonly ReconciledRow[]): Buffer;

    /** Renders the per-counter summary projection as CSV. */
    serializeCounterSummary(summaries: readonly CounterVisitSummary[]): Buffer;

    /** `final_report_<startDate>_to_<endDate>.csv` */
    suggestedFilename(startDate: string, endDate: string): string;

    /** `counter_summary_<startDate>_to_<endDate>.csv` */
    counterSummaryFilename(startDate: string, endDate: string): string;
}

/** Defines the contract for the Excel rendering of a report */
export interface IReportWorkbookService {
    /**
     * Generates an xlsx workbook with the visit rows and the counter summary.
     * @returns A promise resolving to the workbook bytes.
     */
    generateWorkbook(
        rows: readonly ReconciledRow[],
        summaries: readonly CounterVisitSummary[],
        range: DateRange
    ): Promise<Buffer>;

    workbookFilename(startDate: string, endDate: string): string;
}
