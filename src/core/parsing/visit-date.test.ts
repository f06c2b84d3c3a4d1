// src/core/parsing/visit-date.test.ts
import { parseVisitTimestamp } from './visit-date';

describe('parseVisitTimestamp', () => {
    it.each([
        ['05-03-2024 09:30', { date: '2024-03-05', time: '09:30:00' }],
        ['05-03-2024 17:45:10', { date: '2024-03-05', time: '17:45:10' }],
        ['05-Mar-2024 10:00:00', { date: '2024-03-05', time: '10:00:00' }],
        ['2024-03-05 08:15:00', { date: '2024-03-05', time: '08:15:00' }],
        ['2024-03-05T08:05:00', { date: '2024-03-05', time: '08:05:00' }],
        ['2024-03-05', { date: '2024-03-05', time: null }],
        ['05-03-2024', { date: '2024-03-05', time: null }],
        ['29-Feb-2024', { date: '2024-02-29', time: null }],
    ])('parses %s', (value, expected) => {
        expect(parseVisitTimestamp(value)).toEqual(expected);
    });

    it.each([
        '',
        'yesterday',
        '03/05/2024',
        '31-02-2024',
        '05-03-24',
        '2024-03-05 25:00:00',
    ])('rejects %p', value => {
        expect(parseVisitTimestamp(value)).toBeNull();
    });

    // The suite runs with TZ=America/New_York (see jest.global-setup.ts), where
    // 02:00 to 03:00 on 10 March 2024 does not exist as local time.
    it('keeps wall-clock times that fall in a daylight-saving gap', () => {
        expect(process.env.TZ).toBe('America/New_York');
        expect(parseVisitTimestamp('10-03-2024 02:30')).toEqual({ date: '2024-03-10', time: '02:30:00' });
        expect(parseVisitTimestamp('2024-03-10T02:59:59')).toEqual({ date: '2024-03-10', time: '02:59:59' });
    });

    it('keeps the calendar day of a midnight visit', () => {
        expect(parseVisitTimestamp('03-11-2024 00:00')).toEqual({ date: '2024-11-03', time: '00:00:00' });
    });
});
