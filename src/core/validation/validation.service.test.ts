// src/core/validation/validation.service.test.ts
import { DateRangeInvalidError } from '../common/errors';
import logger from '../../infrastructure/logger';
import { ValidationService } from './validation.service';

describe('ValidationService.validateDateRange', () => {
    const service = new ValidationService(logger);

    it('returns the trimmed range', () => {
        expect(service.validateDateRange(' 2024-03-01', '2024-03-31 ')).toEqual({ startDate: '2024-03-01', endDate: '2024-03-31' });
    });

    it('accepts a single-day range and leap days', () => {
        expect(service.validateDateRange('2024-02-29', '2024-02-29')).toEqual({ startDate: '2024-02-29', endDate: '2024-02-29' });
    });

    it('rejects an end date before the start date', () => {
        const validate = () => service.validateDateRange('2024-03-05', '2024-03-01');
        expect(validate).toThrow(DateRangeInvalidError);
        expect(validate).toThrow('endDate 2024-03-01 precedes startDate 2024-03-05');
    });

    it('rejects dates that do not exist', () => {
        expect(() => service.validateDateRange('2023-02-29', '2023-03-01'))
            .toThrow('startDate "2023-02-29" is not a valid calendar date (yyyy-MM-dd)');
    });

    it('rejects other date layouts', () => {
        expect(() => service.validateDateRange('2024-03-01', '31-03-2024'))
            .toThrow('endDate "31-03-2024" is not a valid calendar date (yyyy-MM-dd)');
    });

    it('rejects missing or non-text values', () => {
        expect(() => service.validateDateRange(undefined, '2024-03-01')).toThrow('startDate is required (yyyy-MM-dd)');
        expect(() => service.validateDateRange('2024-03-01', 20240301)).toThrow('endDate is required (yyyy-MM-dd)');
        expect(() => service.validateDateRange('2024-03-01', '   ')).toThrow('endDate is required (yyyy-MM-dd)');
    });

    it('reports the DateRangeInvalid kind', () => {
        try {
            service.validateDateRange('', '');
            throw new Error('expected validateDateRange to throw');
        } catch (error) {
            expect(error).toBeInstanceOf(DateRangeInvalidError);
            expect(error).toMatchObject({ kind: 'DateRangeInvalid', statusCode: 400 });
        }
    });
});
