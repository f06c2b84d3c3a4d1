// src/core/validation/interfaces/services.ts
import { DateRange } from '../../common/interfaces/models';

export interface IValidationService {
    /**
     * Validates the operator-supplied reporting window.
     * Runs before any extract is parsed.
     * @param startDate - First day of the window, yyyy-MM-dd.
     * @param endDate - Last day of the window (inclusive), yyyy-MM-dd.
     * @returns The validated range.
     * @throws {DateRangeInvalidError} If either date is malformed or the end precedes the start.
     */
    validateDateRange(startDate: unknown, endDate: unknown): DateRange;
}
