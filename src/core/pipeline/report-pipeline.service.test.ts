// src/core/pipeline/report-pipeline.service.test.ts
import logger from '../../infrastructure/logger';
import { GeographyNormalizer } from '../geography';
import { ExtractParserService } from '../parsing';
import { IReconciliationService, ReconciliationService } from '../reconciliation';
import { ReportSerializerService } from '../reporting';
import { ValidationService } from '../validation';
import { ReportRunRequest } from './interfaces/services';
import { ReportPipelineService } from './report-pipeline.service';

const csv = (...lines: string[]): Buffer => Buffer.from(lines.join('\r\n') + '\r\n', 'utf8');

const PLANNED = csv(
    'Task Id,Counter Code,Lead Id,Operational States,Taluka or District,Task Completed,Task Owner Email,Task Status',
    'P-1,C-100,L-1,KARNATAKA,Bangalore,05-03-2024 09:30,field.one@example.com,Completed',
    'P-2,C-100,L-1,KARNATAKA,Bangalore,12-03-2024 11:00,field.one@example.com,Completed'
);
const UNPLANNED = csv(
    'Activity Id,Counter Code,Operational States,Taluka or District,Activity Date,Activity Created By Email,Activity Status',
    'U-1,C-200,MAHARASHTRA,Mumbai,06-03-2024 16:45:00,field.two@example.com,Visited'
);
const COUNTERS = csv(
    'Counter Code,Counter Name,State,District',
    'C-100,Sharma Stores,KARNATAKA,Bangalore',
    'C-200,"Patel Traders, Dadar",MAHARASHTRA,Mumbai Suburban'
);
const USERS = csv(
    'Email Address,Name,Territory',
    'field.one@example.com,Asha Rao,South',
    'field.two@example.com,Vikram Shah,West'
);

const request = (overrides: Partial<ReportRunRequest> = {}): ReportRunRequest => ({
    plannedVisits: PLANNED,
    unplannedVisits: UNPLANNED,
    counters: COUNTERS,
    users: USERS,
    startDate: '2024-03-05',
    endDate: '2024-03-06',
    ...overrides,
});

const OPTIONS = { reconciliation: { lateStartAfter: '09:15:00', workedLateAfter: '16:00:00' } };

const REPORT_HEADER = 'State,District,Counter Code,Counter Name,User Name,Territory,Visit Type,Visit Date,Status,'
    + 'Geography Resolved,Visit Id,Visit Time,Assigned User,Late Start,Worked Late';

describe('ReportPipelineService', () => {
    const normalizer = GeographyNormalizer.fromDocument({
        KARNATAKA: { Bangalore: 'Bengaluru Urban' },
        MAHARASHTRA: { 'Mumbai Suburban': 'Mumbai' },
    });
    const createPipeline = (reconciler: IReconciliationService = new ReconciliationService(logger, { current: () => normalizer })) =>
        new ReportPipelineService(
            logger,
            new ValidationService(logger),
            new ExtractParserService(logger),
            reconciler,
            new ReportSerializerService(logger)
        );
    const pipeline = createPipeline();

    it('produces the complete report', () => {
        const outcome = pipeline.run(request(), OPTIONS);

        if (outcome.status !== 'ok') throw new Error(`unexpected failure: ${outcome.failure.message}`);
        const { report } = outcome;
        expect(report.filename).toBe('final_report_2024-03-05_to_2024-03-06.csv');
        expect(report.range).toEqual({ startDate: '2024-03-05', endDate: '2024-03-06' });
        expect(report.content.toString('utf8')).toBe([
            REPORT_HEADER,
            'KARNATAKA,Bengaluru Urban,C-100,Sharma Stores,Asha Rao,South,Planned,2024-03-05,Completed,true,P-1,09:30:00,field.one@example.com,1,0',
            'MAHARASHTRA,Mumbai,C-200,"Patel Traders, Dadar",Vikram Shah,West,Unplanned,2024-03-06,Visited,true,U-1,16:45:00,field.two@example.com,1,1',
            '',
        ].join('\r\n'));
        expect(report.stats).toEqual({
            totalRows: 2,
            plannedRows: 1,
            unplannedRows: 1,
            unresolvedGeography: 0,
            unresolvedCounters: 0,
            unresolvedUsers: 0,
        });
        expect(report.rejectedRows).toEqual({ PlannedVisit: 0, UnplannedVisit: 0, Counter: 0, User: 0 });
    });

    it('returns the same bytes on every run', () => {
        const first = pipeline.run(request(), OPTIONS);
        const second = pipeline.run(request(), OPTIONS);

        if (first.status !== 'ok' || second.status !== 'ok') throw new Error('unexpected failure');
        expect(second.report.content.equals(first.report.content)).toBe(true);
        expect(second.report.runId).not.toBe(first.report.runId);
    });

    it('returns a header-only report when no visit falls in range', () => {
        const outcome = pipeline.run(request({ startDate: '2024-04-01', endDate: '2024-04-30' }), OPTIONS);

        if (outcome.status !== 'ok') throw new Error(`unexpected failure: ${outcome.failure.message}`);
        expect(outcome.report.content.toString('utf8')).toBe(`${REPORT_HEADER}\r\n`);
        expect(outcome.report.stats.totalRows).toBe(0);
    });

    it('checks the date range before reading any extract', () => {
        const outcome = pipeline.run(request({ plannedVisits: Buffer.alloc(0), startDate: '2024-03-05', endDate: '2024-03-01' }));

        expect(outcome).toEqual({
            status: 'failed',
            failure: { kind: 'DateRangeInvalid', message: 'endDate 2024-03-01 precedes startDate 2024-03-05' },
        });
    });

    it('fails on a missing column', () => {
        const outcome = pipeline.run(request({
            counters: csv('Counter Code,State,District', 'C-100,KARNATAKA,Bangalore'),
        }));

        expect(outcome).toEqual({
            status: 'failed',
            failure: { kind: 'MissingColumn', message: 'Counter extract is missing required column "Counter Name"' },
        });
    });

    it('fails on an extract without data rows', () => {
        const outcome = pipeline.run(request({ users: csv('Email Address,Name,Territory') }));

        expect(outcome).toEqual({
            status: 'failed',
            failure: { kind: 'EmptyDataset', message: 'User extract contains no data rows' },
        });
    });

    it('lets unexpected errors propagate', () => {
        const broken: IReconciliationService = {
            reconcile: () => {
                throw new TypeError('index out of range');
            },
            summarizeByCounter: () => [],
            summarizeRun: () => ({
                totalRows: 0, plannedRows: 0, unplannedRows: 0,
                unresolvedGeography: 0, unresolvedCounters: 0, unresolvedUsers: 0,
            }),
        };

        expect(() => createPipeline(broken).run(request())).toThrow(TypeError);
    });
});
