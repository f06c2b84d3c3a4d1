// src/infrastructure/webserver/controllers/report.controller.ts
import { NextFunction, Request } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../../config';
import { ReportFailureKind, ValidationError } from '../../../core/common/errors';
import {
    GeneratedReport, IReportPipelineService, ReportFailure, ReportPipelineService, ReportRunRequest
} from '../../../core/pipeline';
import { IReconciliationService, ReconciliationService } from '../../../core/reconciliation';
import {
    IReportSerializerService, IReportWorkbookService, ReportSerializerService, ReportWorkbookService
} from '../../../core/reporting';
import { LOGGER_TOKEN } from '../../logger';
import { REPORT_UPLOAD_FIELDS, ReportUploadField } from '../middleware/upload.middleware';
import { ClosableResponse, RunGuard } from '../run-guard';

const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';
const XLSX_CONTENT_TYPE = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

/** HTTP status of each structured run failure. */
export const FAILURE_STATUS: Readonly<Record<ReportFailureKind, number>> = {
    MissingColumn: 400,
    EmptyDataset: 422,
    DateRangeInvalid: 400,
    Aborted: 503,
};

/** The parts of an upload request the handlers read. */
export type ReportRequest = Pick<Request, 'files' | 'body'>;

/** The parts of a response the handlers write. Express's Response satisfies it. */
export interface ReportResponse extends ClosableResponse {
    status(code: number): this;
    json(body: unknown): this;
    attachment(filename: string): this;
    setHeader(name: string, value: string): this;
    end(chunk: Buffer): this;
}

@singleton()
@injectable()
export class ReportController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(ReportPipelineService) private pipeline: IReportPipelineService,
        @inject(ReconciliationService) private reconciler: IReconciliationService,
        @inject(ReportSerializerService) private serializer: IReportSerializerService,
        @inject(ReportWorkbookService) private workbooks: IReportWorkbookService
    ) {
        this.logger.info('ReportController initialized.');
    }

    /** POST /api/reports: the reconciled visit report as CSV. */
    public handleVisitReport = async (req: ReportRequest, res: ReportResponse, next: NextFunction): Promise<void> => {
        this.logger.info('Received request for a visit report.');
        try {
            const guard = new RunGuard(res, config.report.timeoutMs);
            const report = this.runReport(req, res, guard);
            if (!report) return;

            res.setHeader('X-Report-Rows', String(report.stats.totalRows));
            res.setHeader('X-Report-Unresolved-Geography', String(report.stats.unresolvedGeography));
            this.sendAttachment(res, report.filename, CSV_CONTENT_TYPE, report.content);
            this.logger.info(`Visit report ${report.filename} sent (${report.stats.totalRows} rows, ${guard.elapsedMs} ms).`);
        } catch (error) {
            this.logFailure('handleVisitReport', error);
            next(error);
        }
    };

    /** POST /api/reports/counter-summary: planned/unplanned counts per counter as CSV. */
    public handleCounterSummary = async (req: ReportRequest, res: ReportResponse, next: NextFunction): Promise<void> => {
        this.logger.info('Received request for a counter summary.');
        try {
            const guard = new RunGuard(res, config.report.timeoutMs);
            const report = this.runReport(req, res, guard);
            if (!report) return;

            const summaries = this.reconciler.summarizeByCounter(report.rows);
            const content = this.serializer.serializeCounterSummary(summaries);
            guard.check();

            res.setHeader('X-Report-Rows', String(summaries.length));
            const filename = this.serializer.counterSummaryFilename(report.range.startDate, report.range.endDate);
            this.sendAttachment(res, filename, CSV_CONTENT_TYPE, content);
            this.logger.info(`Counter summary ${filename} sent (${summaries.length} counters).`);
        } catch (error) {
            this.logFailure('handleCounterSummary', error);
            next(error);
        }
    };

    /** POST /api/reports/workbook: visits and counter summary as an xlsx workbook. */
    public handleWorkbook = async (req: ReportRequest, res: ReportResponse, next: NextFunction): Promise<void> => {
        this.logger.info('Received request for a report workbook.');
        try {
            const guard = new RunGuard(res, config.report.timeoutMs);
            const report = this.runReport(req, res, guard);
            if (!report) return;

            const summaries = this.reconciler.summarizeByCounter(report.rows);
            const buffer = await this.workbooks.generateWorkbook(report.rows, summaries, report.range);
            guard.check();

            res.setHeader('X-Report-Rows', String(report.stats.totalRows));
            res.setHeader('X-Report-Unresolved-Geography', String(report.stats.unresolvedGeography));
            const filename = this.workbooks.workbookFilename(report.range.startDate, report.range.endDate);
            this.sendAttachment(res, filename, XLSX_CONTENT_TYPE, buffer);
            this.logger.info(`Workbook ${filename} sent (${buffer.length} bytes).`);
        } catch (error) {
            this.logFailure('handleWorkbook', error);
            next(error);
        }
    };

    /**
     * Runs the pipeline for the uploaded extracts. A structured failure is answered
     * here and yields null; the caller only writes a response for a complete report.
     */
    private runReport(req: ReportRequest, res: ReportResponse, guard: RunGuard): GeneratedReport | null {
        const request = this.readRunRequest(req);
        guard.check();

        const outcome = this.pipeline.run(request);
        guard.check();

        if (outcome.status === 'failed') {
            this.sendFailure(res, outcome.failure);
            return null;
        }
        return outcome.report;
    }

    private readRunRequest(req: ReportRequest): ReportRunRequest {
        const files = req.files;
        if (!files || Array.isArray(files)) {
            throw new ValidationError(`Extract files are required: ${REPORT_UPLOAD_FIELDS.join(', ')}.`);
        }

        const extractOf = (field: ReportUploadField): Buffer => {
            const file = files[field]?.[0];
            if (!file) {
                throw new ValidationError(`Extract file "${field}" is required.`);
            }
            this.logger.debug(`${field}: ${file.originalname} (${(file.size / 1024).toFixed(2)} KB)`);
            return file.buffer;
        };

        const { startDate, endDate }: { startDate?: unknown; endDate?: unknown } = req.body ?? {};

        return {
            plannedVisits: extractOf('plannedVisits'),
            unplannedVisits: extractOf('unplannedVisits'),
            counters: extractOf('counters'),
            users: extractOf('users'),
            startDate,
            endDate,
        };
    }

    private sendFailure(res: ReportResponse, failure: ReportFailure): void {
        this.logger.warn(`Report run ended with ${failure.kind}: ${failure.message}`);
        res.status(FAILURE_STATUS[failure.kind]).json({ kind: failure.kind, message: failure.message });
    }

    private sendAttachment(res: ReportResponse, filename: string, contentType: string, content: Buffer): void {
        res.status(200);
        res.attachment(filename);
        res.setHeader('Content-Type', contentType);
        res.setHeader('Content-Length', String(content.length));
        res.end(content);
    }

    private logFailure(handler: string, error: unknown): void {
        this.logger.error(`Error during ${handler}:`, {
            message: error instanceof Error ? error.message : String(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
    }
}
