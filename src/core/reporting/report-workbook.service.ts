// src/core/reporting/report-workbook.service.ts
import ExcelJS, { Workbook, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError } from '../common/errors';
import { CounterVisitSummary, DateRange, ReconciledRow } from '../common/interfaces/models';
import { IReportWorkbookService } from './interfaces/services';
import { COUNTER_SUMMARY_COLUMNS, formatCell, ReportColumn, VISIT_REPORT_COLUMNS } from './report-columns';

export const VISITS_SHEET = 'Visits';
export const COUNTER_SUMMARY_SHEET = 'Counter Summary';

@singleton()
@injectable()
export class ReportWorkbookService implements IReportWorkbookService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ReportWorkbookService initialized.');
    }

    async generateWorkbook(rows: readonly ReconciledRow[], summaries: readonly CounterVisitSummary[], range: DateRange): Promise<Buffer> {
        this.logger.info('Generating visit report workbook...');
        try {
            const workbook = this.buildWorkbook(rows, summaries, range);
            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info(`Workbook generated (${buffer.length} bytes).`);
            return buffer;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.error('Failed to generate workbook:', { message, stack: error instanceof Error ? error.stack : undefined });
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate Excel report', 500, false);
        }
    }

    buildWorkbook(rows: readonly ReconciledRow[], summaries: readonly CounterVisitSummary[], range: DateRange): Workbook {
        const workbook = new ExcelJS.Workbook();
        workbook.creator = 'Field Visit Reconciler';
        workbook.title = `Field visits ${range.startDate} to ${range.endDate}`;

        const visits = this.addSheet(workbook, VISITS_SHEET, VISIT_REPORT_COLUMNS);
        for (const row of rows) {
            visits.addRow(VISIT_REPORT_COLUMNS.map(column => formatCell(column.key, row[column.key])));
        }

        const summarySheet = this.addSheet(workbook, COUNTER_SUMMARY_SHEET, COUNTER_SUMMARY_COLUMNS);
        for (const summary of summaries) {
            summarySheet.addRow(COUNTER_SUMMARY_COLUMNS.map(column => summary[column.key]));
        }

        return workbook;
    }

    workbookFilename(startDate: string, endDate: string): string {
        return `final_report_${startDate}_to_${endDate}.xlsx`;
    }

    private addSheet<T>(workbook: Workbook, name: string, columns: readonly ReportColumn<T>[]): Worksheet {
        const sheet = workbook.addWorksheet(name, { views: [{ state: 'frozen', ySplit: 1 }] });
        sheet.columns = columns.map(column => ({ header: column.header, width: column.width }));
        sheet.getRow(1).font = { bold: true };
        return sheet;
    }
}
