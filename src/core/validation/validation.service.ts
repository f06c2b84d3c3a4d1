// src/core/validation/validation.service.ts
import { UTCDate } from '@date-fns/utc';
import { isValid, parse } from 'date-fns';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { DateRangeInvalidError } from '../common/errors';
import { DateRange } from '../common/interfaces/models';
import { looksLikeIsoDate } from '../common/utils';
import { IValidationService } from './interfaces/services';


@singleton()
@injectable()
export class ValidationService implements IValidationService {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {
        this.logger.info('ValidationService Initialized');
    }

    validateDateRange(startDate: unknown, endDate: unknown): DateRange {
        const start = this.requireCalendarDate('startDate', startDate);
        const end = this.requireCalendarDate('endDate', endDate);

        // yyyy-MM-dd strings order the same way the dates do
        if (end < start) {
            throw new DateRangeInvalidError(`endDate ${end} precedes startDate ${start}`);
        }

        this.logger.debug(`Date range validated: ${start} to ${end}`);
        return { startDate: start, endDate: end };
    }

    private requireCalendarDate(name: string, value: unknown): string {
        if (typeof value !== 'string' || value.trim() === '') {
            throw new DateRangeInvalidError(`${name} is required (yyyy-MM-dd)`);
        }
        const trimmed = value.trim();
        if (!looksLikeIsoDate(trimmed) || !isValid(parse(trimmed, 'yyyy-MM-dd', new UTCDate(2000, 0, 1)))) {
            throw new DateRangeInvalidError(`${name} "${trimmed}" is not a valid calendar date (yyyy-MM-dd)`);
        }
        return trimmed;
    }
}
