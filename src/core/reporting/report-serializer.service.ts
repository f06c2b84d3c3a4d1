// src/core/reporting/report-serializer.service.ts
import Papa from 'papaparse';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { CounterVisitSummary, ReconciledRow } from '../common/interfaces/models';
import { IReportSerializerService } from './interfaces/services';
import { COUNTER_SUMMARY_COLUMNS, formatCell, ReportColumn, VISIT_REPORT_COLUMNS } from './report-columns';

const CSV_NEWLINE = '\r\n';

type CellValue = string | number | boolean | null;

/**
 * Renders report rows as CSV. Output depends only on the rows given: no timestamps,
 * generated ids or locale formatting, so identical rows always give identical bytes.
 */
@singleton()
@injectable()
export class ReportSerializerService implements IReportSerializerService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ReportSerializerService initialized.');
    }

    serialize(rows: readonly ReconciledRow[]): Buffer {
        this.logger.debug(`Serializing ${rows.length} report rows to CSV.`);
        return this.toCsv(rows, VISIT_REPORT_COLUMNS);
    }

    serializeCounterSummary(summaries: readonly CounterVisitSummary[]): Buffer {
        this.logger.debug(`Serializing ${summaries.length} counter summaries to CSV.`);
        return this.toCsv(summaries, COUNTER_SUMMARY_COLUMNS);
    }

    suggestedFilename(startDate: string, endDate: string): string {
        return `final_report_${startDate}_to_${endDate}.csv`;
    }

    counterSummaryFilename(startDate: string, endDate: string): string {
        return `counter_summary_${startDate}_to_${endDate}.csv`;
    }

    private toCsv<T extends Record<keyof T, CellValue>>(rows: readonly T[], columns: readonly ReportColumn<T>[]): Buffer {
        // Papa quotes a field only when it holds the delimiter, a quote or a line break
        // (or starts/ends with a space), doubling embedded quotes.
        // An empty report still carries its header line and nothing else.
        const csv = Papa.unparse(
            [
                columns.map(column => column.header),
                ...rows.map(row => columns.map(column => formatCell(String(column.key), row[column.key]))),
            ],
            {
                newline: CSV_NEWLINE,
                delimiter: ',',
                quoteChar: '"',
                quotes: false,
                escapeFormulae: false,
            }
        );
        return Buffer.from(`${csv}${CSV_NEWLINE}`, 'utf8');
    }
}
