// src/register.ts
import { container } from 'tsyringe';
import { ALIAS_TABLE_SOURCE_TOKEN } from './core/geography';
import { ExtractParserService } from './core/parsing';
import { ReportPipelineService } from './core/pipeline';
import { ReconciliationService } from './core/reconciliation';
import { ReportSerializerService, ReportWorkbookService } from './core/reporting';
import { ValidationService } from './core/validation';
import { AliasTableProvider } from './infrastructure/alias-table/alias-table.provider';
import loggerInstance, { LOGGER_TOKEN } from './infrastructure/logger';
import { ReportController } from './infrastructure/webserver/controllers/report.controller';
import { Server } from './infrastructure/webserver/server';

export function registerDependencies(): void {
    loggerInstance.debug('--- Starting Dependency Registration ---');

    // IMPORTANT: Register Logger FIRST
    container.register(LOGGER_TOKEN, {
        useValue: loggerInstance
    });

    // Infrastructure providers
    container.registerSingleton(AliasTableProvider);
    container.register(ALIAS_TABLE_SOURCE_TOKEN, {
        useToken: AliasTableProvider
    });

    // Core services
    container.registerSingleton(ExtractParserService);
    container.registerSingleton(ValidationService);
    container.registerSingleton(ReconciliationService);
    container.registerSingleton(ReportSerializerService);
    container.registerSingleton(ReportWorkbookService);
    container.registerSingleton(ReportPipelineService);

    // Web layer
    container.registerSingleton(ReportController);
    container.registerSingleton(Server);

    loggerInstance.debug('--- Dependency Registration Complete ---');
}
