// src/infrastructure/alias-table/alias-table.provider.test.ts
import path from 'path';
import { ConfigurationError } from '../../core/common/errors';
import logger from '../logger';
import { AliasTableProvider } from './alias-table.provider';

const TABLE_PATH = path.resolve(__dirname, '../../../data/district_mapping.yml');
const FIXTURES = path.join(__dirname, '__fixtures__');

describe('AliasTableProvider', () => {
    let provider: AliasTableProvider;

    beforeEach(() => {
        provider = new AliasTableProvider(logger);
    });

    it('hands out an empty table before anything is loaded', () => {
        expect(provider.current().resolve('KARNATAKA', 'Bangalore'))
            .toEqual({ canonicalDistrict: 'Bangalore', resolved: false });
    });

    describe('with the bundled alias table', () => {
        beforeEach(async () => {
            await provider.load(TABLE_PATH);
        });

        it('loads every state, including those with no entries', () => {
            const table = provider.current();
            expect(table.states).toHaveLength(21);
            expect(table.states).toContain('HARYANA');
            expect(table.ruleCount).toBe(79);
        });

        it('resolves exact and wildcard aliases', () => {
            const table = provider.current();
            expect(table.resolve('KARNATAKA', 'Bangalore')).toEqual({ canonicalDistrict: 'Bengaluru Urban', resolved: true });
            expect(table.resolve('ANDHRA PRADESH', 'Sri Potti Sriramulu Nellore'))
                .toEqual({ canonicalDistrict: 'Nellore', resolved: true });
            expect(table.resolve('WEST BENGAL', 'South Twenty Four Parganas'))
                .toEqual({ canonicalDistrict: 'South 24 Pgs.', resolved: true });
        });

        it('strips stray newlines from keys but keeps interior spacing', () => {
            const table = provider.current();
            expect(table.resolve('UTTARAKHAND', 'Almora')).toEqual({ canonicalDistrict: 'Almora', resolved: true });
            expect(table.resolve('SIKKIM', 'North  District')).toEqual({ canonicalDistrict: 'North Sikkim', resolved: true });
            expect(table.resolve('SIKKIM', 'North District')).toEqual({ canonicalDistrict: 'North District', resolved: false });
        });

        it('keeps the previous table when a reload fails', async () => {
            const before = provider.current();
            await expect(provider.reload(path.join(FIXTURES, 'not-a-mapping.yml'))).resolves.toBe(false);
            expect(provider.current()).toBe(before);
        });

        it('swaps in a new table on a successful reload', async () => {
            const before = provider.current();
            await expect(provider.reload(TABLE_PATH)).resolves.toBe(true);
            expect(provider.current()).not.toBe(before);
            expect(provider.current().ruleCount).toBe(79);
        });
    });

    it('falls back to an empty table when the file is missing', async () => {
        const table = await provider.load(path.join(FIXTURES, 'no-such-table.yml'));
        expect(table.ruleCount).toBe(0);
        expect(provider.current()).toBe(table);
    });

    it('passes through read errors other than a missing file', async () => {
        await expect(provider.load(FIXTURES)).rejects.toMatchObject({ code: 'EISDIR' });
    });

    it('fails loading a malformed table', async () => {
        await expect(provider.load(path.join(FIXTURES, 'not-a-mapping.yml'))).rejects.toThrow(ConfigurationError);
        await expect(provider.load(path.join(FIXTURES, 'invalid-yaml.yml'))).rejects.toThrow(ConfigurationError);
    });
});
