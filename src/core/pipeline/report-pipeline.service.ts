// src/core/pipeline/report-pipeline.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ReportRunError } from '../common/errors';
import { generateUniqueId } from '../common/utils';
import { ExtractParserService, IExtractParserService } from '../parsing';
import { IReconciliationService, ReconciliationService } from '../reconciliation';
import { IReportSerializerService, ReportSerializerService } from '../reporting';
import { IValidationService, ValidationService } from '../validation';
import { IReportPipelineService, ReportRunOptions, ReportRunOutcome, ReportRunRequest } from './interfaces/services';

/**
 * Runs one report end to end: date range check, the four extracts, reconciliation, CSV.
 * Synchronous and free of I/O; cancellation and deadlines belong to the caller.
 */
@singleton()
@injectable()
export class ReportPipelineService implements IReportPipelineService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(ValidationService) private validationService: IValidationService,
        @inject(ExtractParserService) private parser: IExtractParserService,
        @inject(ReconciliationService) private reconciler: IReconciliationService,
        @inject(ReportSerializerService) private serializer: IReportSerializerService
    ) {
        this.logger.info('ReportPipelineService initialized.');
    }

    run(request: ReportRunRequest, options?: ReportRunOptions): ReportRunOutcome {
        const runId = generateUniqueId();
        this.logger.info(`[run ${runId}] Report run started.`);

        try {
            // --- 1. Date range, before touching any file ---
            const range = this.validationService.validateDateRange(request.startDate, request.endDate);

            // --- 2. Parse the four extracts ---
            const planned = this.parser.parse('PlannedVisit', request.plannedVisits, options?.parsing);
            const unplanned = this.parser.parse('UnplannedVisit', request.unplannedVisits, options?.parsing);
            const counters = this.parser.parse('Counter', request.counters, options?.parsing);
            const users = this.parser.parse('User', request.users, options?.parsing);

            // --- 3. Reconcile ---
            const rows = this.reconciler.reconcile(
                planned.records, unplanned.records, counters.records, users.records,
                range.startDate, range.endDate, options?.reconciliation
            );

            // --- 4. Serialize ---
            const content = this.serializer.serialize(rows);
            const filename = this.serializer.suggestedFilename(range.startDate, range.endDate);
            const stats = this.reconciler.summarizeRun(rows);

            this.logger.info(`[run ${runId}] Report run finished: ${filename}, ${stats.totalRows} rows, ${content.length} bytes.`);
            return {
                status: 'ok',
                report: {
                    runId,
                    range,
                    filename,
                    content,
                    rows,
                    stats,
                    rejectedRows: {
                        PlannedVisit: planned.rejectedRows.length,
                        UnplannedVisit: unplanned.rejectedRows.length,
                        Counter: counters.rejectedRows.length,
                        User: users.rejectedRows.length,
                    },
                },
            };
        } catch (error) {
            if (error instanceof ReportRunError) {
                this.logger.warn(`[run ${runId}] Report run failed (${error.kind}): ${error.message}`);
                return { status: 'failed', failure: { kind: error.kind, message: error.message } };
            }
            // Programmer errors are not a report outcome; let the caller's error handling deal with them
            this.logger.error(`[run ${runId}] Report run crashed.`, {
                message: error instanceof Error ? error.message : String(error),
                stack: error instanceof Error ? error.stack : undefined,
            });
            throw error;
        }
    }
}
