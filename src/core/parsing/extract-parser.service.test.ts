// src/core/parsing/extract-parser.service.test.ts
import { EmptyDatasetError, MissingColumnError } from '../common/errors';
import logger from '../../infrastructure/logger';
import { ExtractParserService } from './extract-parser.service';

const csv = (...lines: string[]): Buffer => Buffer.from(lines.join('\r\n') + '\r\n', 'utf8');

const PLANNED_HEADER = 'Task Id,Counter Code,Lead Id,Operational States,Taluka or District,Task Completed,Task Owner Email,Task Status';

describe('ExtractParserService', () => {
    const parser = new ExtractParserService(logger);

    describe('visit extracts', () => {
        it('parses planned visits into typed records', () => {
            const parsed = parser.parse('PlannedVisit', csv(
                PLANNED_HEADER,
                'T-1,C-100,L-1,KARNATAKA,Bangalore,05-03-2024 09:30,field.one@example.com,Completed'
            ));

            expect(parsed.kind).toBe('PlannedVisit');
            expect(parsed.totalRows).toBe(1);
            expect(parsed.rejectedRows).toEqual([]);
            expect(parsed.records).toEqual([{
                visitId: 'T-1',
                visitType: 'Planned',
                counterId: 'C-100',
                leadId: 'L-1',
                rawState: 'KARNATAKA',
                rawDistrict: 'Bangalore',
                visitDate: '2024-03-05',
                visitTime: '09:30:00',
                assignedUserId: 'field.one@example.com',
                status: 'Completed',
                sourceLine: 2,
            }]);
        });

        it('strips a byte order mark and accepts headers in any order and case', () => {
            const parsed = parser.parse('UnplannedVisit', Buffer.from(
                '\uFEFFactivity created by email,ACTIVITY DATE,Counter  Code,Activity Id\n' +
                ' field.two@example.com , 2024-03-06 ,C-200,U-1\n',
                'utf8'
            ));

            expect(parsed.records).toEqual([{
                visitId: 'U-1',
                visitType: 'Unplanned',
                counterId: 'C-200',
                leadId: '',
                rawState: '',
                rawDistrict: '',
                visitDate: '2024-03-06',
                visitTime: null,
                assignedUserId: 'field.two@example.com',
                status: '',
                sourceLine: 2,
            }]);
        });

        it('accepts the generic header names', () => {
            const parsed = parser.parse('PlannedVisit', csv(
                'Visit Id,Counter Code,State,District,Visit Date,Assigned User Id,Status',
                'V-9,C-100,KARNATAKA,Mysuru,2024-03-05T14:20:00,field.one@example.com,Open'
            ));

            expect(parsed.records[0]).toMatchObject({
                visitId: 'V-9',
                rawState: 'KARNATAKA',
                rawDistrict: 'Mysuru',
                visitDate: '2024-03-05',
                visitTime: '14:20:00',
                status: 'Open',
            });
        });

        it('records rejected rows with their line and reason', () => {
            const parsed = parser.parse('PlannedVisit', csv(
                PLANNED_HEADER,
                'T-1,C-100,L-1,KARNATAKA,Bangalore,05-03-2024 09:30,field.one@example.com,Completed',
                ',C-100,L-1,KARNATAKA,Bangalore,05-03-2024 10:30,field.one@example.com,Completed',
                'T-3,C-100,L-1,KARNATAKA,Bangalore,03/05/2024,field.one@example.com,Completed',
                'T-4,,L-1,KARNATAKA,Bangalore,05-03-2024 11:30,field.one@example.com,Completed'
            ));

            expect(parsed.totalRows).toBe(4);
            expect(parsed.records.map(record => record.visitId)).toEqual(['T-1']);
            expect(parsed.rejectedRows).toEqual([
                { line: 3, reason: 'empty visit id' },
                { line: 4, reason: 'unrecognised visit date "03/05/2024"' },
                { line: 5, reason: 'empty counter code' },
            ]);
        });

        it('keeps quoted fields containing commas intact', () => {
            const parsed = parser.parse('PlannedVisit', csv(
                PLANNED_HEADER,
                'T-1,C-100,L-1,KARNATAKA,"Bangalore, Rural",05-03-2024 09:30,field.one@example.com,"Done, verified"'
            ));

            expect(parsed.records[0]).toMatchObject({ rawDistrict: 'Bangalore, Rural', status: 'Done, verified' });
        });
    });

    describe('counters and users', () => {
        it('parses counters', () => {
            const parsed = parser.parse('Counter', csv(
                'Counter Code,Counter Name,State,District',
                'C-100,Sharma Stores,KARNATAKA,Bangalore'
            ));

            expect(parsed.records).toEqual([{
                counterId: 'C-100',
                counterName: 'Sharma Stores',
                rawState: 'KARNATAKA',
                rawDistrict: 'Bangalore',
                sourceLine: 2,
            }]);
        });

        it('parses users, leaving an absent territory column empty', () => {
            const parsed = parser.parse('User', csv(
                'Email Address,Name',
                'field.one@example.com,Asha Rao'
            ));

            expect(parsed.records).toEqual([{
                userId: 'field.one@example.com',
                userName: 'Asha Rao',
                territory: '',
                sourceLine: 2,
            }]);
        });
    });

    describe('fatal conditions', () => {
        it('fails on a missing required column', () => {
            const parse = () => parser.parse('Counter', csv(
                'Counter Code,State,District',
                'C-100,KARNATAKA,Bangalore'
            ));

            expect(parse).toThrow(MissingColumnError);
            expect(parse).toThrow('Counter extract is missing required column "Counter Name"');
        });

        it('reads extracts as comma-separated only', () => {
            const parse = () => parser.parse('Counter', csv(
                'Counter Code;Counter Name;State;District',
                'C-100;Sharma Stores;KARNATAKA;Bangalore'
            ));

            expect(parse).toThrow('Counter extract is missing required column "Counter Code"');
        });

        it('fails on an empty file', () => {
            expect(() => parser.parse('User', Buffer.alloc(0))).toThrow('User extract is empty (no header row)');
        });

        it('fails on a header without data rows', () => {
            expect(() => parser.parse('User', csv('Email Address,Name,Territory')))
                .toThrow('User extract contains no data rows');
        });

        it('fails when every row is rejected', () => {
            const parse = () => parser.parse('User', csv(
                'Email Address,Name,Territory',
                ',Asha Rao,South',
                ',Vikram Shah,West'
            ));

            expect(parse).toThrow(EmptyDatasetError);
            expect(parse).toThrow('User extract has no usable rows (all 2 rows rejected)');
        });

        it('fails when the rejected share exceeds the configured limit', () => {
            const lines = [
                'Email Address,Name,Territory',
                'field.one@example.com,Asha Rao,South',
                ',Vikram Shah,West',
                ',Meena Iyer,North',
            ];

            expect(() => parser.parse('User', csv(...lines), { maxRejectedRatio: 0.5 }))
                .toThrow('User extract is unusable: 2 of 3 rows rejected (limit 50%)');
            expect(parser.parse('User', csv(...lines), { maxRejectedRatio: 0.9 }).records).toHaveLength(1);
        });
    });
});
