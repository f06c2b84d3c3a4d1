// src/core/reconciliation/reconciliation.service.ts
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import {
    CounterRecord, CounterVisitSummary, ReconciledRow, ReportStats,
    UNRESOLVED_MARKER, UserRecord, VisitRecord, VisitType
} from '../common/interfaces/models';
import { compareText } from '../common/utils';
import { ALIAS_TABLE_SOURCE_TOKEN, IAliasTableSource, IGeographyNormalizer } from '../geography';
import { IReconciliationService, ReconciliationOptions } from './interfaces/services';
import { compareReportRows } from './row-ordering';

interface CounterTally {
    readonly canonicalState: string;
    readonly canonicalDistrict: string;
    readonly counterId: string;
    readonly counterName: string;
    plannedVisits: number;
    unplannedVisits: number;
}

const tagVisitType = (visitType: VisitType) =>
    (visit: VisitRecord): VisitRecord => ({ ...visit, visitType });

@singleton()
@injectable()
export class ReconciliationService implements IReconciliationService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(ALIAS_TABLE_SOURCE_TOKEN) private aliasTables: IAliasTableSource
    ) {
        this.logger.info('ReconciliationService initialized.');
    }

    reconcile(
        planned: readonly VisitRecord[],
        unplanned: readonly VisitRecord[],
        counters: readonly CounterRecord[],
        users: readonly UserRecord[],
        startDate: string,
        endDate: string,
        options?: ReconciliationOptions
    ): ReconciledRow[] {
        // One snapshot per run: a reload mid-run must not mix two tables
        const normalizer = options?.normalizer ?? this.aliasTables.current();
        const lateStartAfter = options?.lateStartAfter ?? config.report.lateStartAfter;
        const workedLateAfter = options?.workedLateAfter ?? config.report.workedLateAfter;

        this.logger.info(`Starting reconciliation. Planned: ${planned.length}, Unplanned: ${unplanned.length}, Counters: ${counters.length}, Users: ${users.length}, Range: ${startDate} to ${endDate}`);

        const counterIndex = this.indexByKey(counters, counter => counter.counterId, 'counter');
        const userIndex = this.indexByKey(users, user => user.userId, 'user');

        const visits = [
            ...planned.map(tagVisitType('Planned')),
            ...unplanned.map(tagVisitType('Unplanned')),
        ];
        const inRange = visits.filter(visit => visit.visitDate >= startDate && visit.visitDate <= endDate);
        this.logger.info(`${inRange.length} of ${visits.length} visits fall inside ${startDate} to ${endDate}.`);

        const rows = inRange
            .map(visit => this.buildRow(visit, counterIndex.get(visit.counterId), userIndex.get(visit.assignedUserId), normalizer))
            .sort(compareReportRows);

        const flagged = this.applyDailyFlags(rows, lateStartAfter, workedLateAfter);

        const stats = this.summarizeRun(flagged);
        this.logger.info(`Reconciliation completed. Rows: ${stats.totalRows}, unresolved geography: ${stats.unresolvedGeography}, unresolved counters: ${stats.unresolvedCounters}, unresolved users: ${stats.unresolvedUsers}`);
        return flagged;
    }

    summarizeByCounter(rows: readonly ReconciledRow[]): CounterVisitSummary[] {
        const tallies = new Map<string, CounterTally>();
        for (const row of rows) {
            let tally = tallies.get(row.counterId);
            if (!tally) {
                tally = {
                    canonicalState: row.canonicalState,
                    canonicalDistrict: row.canonicalDistrict,
                    counterId: row.counterId,
                    counterName: row.counterName,
                    plannedVisits: 0,
                    unplannedVisits: 0,
                };
                tallies.set(row.counterId, tally);
            }
            if (row.visitType === 'Planned') {
                tally.plannedVisits++;
            } else {
                tally.unplannedVisits++;
            }
        }

        return [...tallies.values()]
            .map(tally => ({ ...tally, totalVisits: tally.plannedVisits + tally.unplannedVisits }))
            .sort((a, b) =>
                compareText(a.canonicalState, b.canonicalState)
                || compareText(a.canonicalDistrict, b.canonicalDistrict)
                || compareText(a.counterName, b.counterName)
                || compareText(a.counterId, b.counterId)
            );
    }

    summarizeRun(rows: readonly ReconciledRow[]): ReportStats {
        return {
            totalRows: rows.length,
            plannedRows: rows.filter(row => row.visitType === 'Planned').length,
            unplannedRows: rows.filter(row => row.visitType === 'Unplanned').length,
            unresolvedGeography: rows.filter(row => !row.geographyResolved).length,
            unresolvedCounters: rows.filter(row => !row.counterMatched).length,
            unresolvedUsers: rows.filter(row => !row.userMatched).length,
        };
    }

    private buildRow(
        visit: VisitRecord,
        counter: CounterRecord | undefined,
        user: UserRecord | undefined,
        normalizer: IGeographyNormalizer
    ): ReconciledRow {
        let canonicalState: string;
        let canonicalDistrict: string;
        let geographyResolved: boolean;

        if (counter) {
            // Counter geography is authoritative over whatever the visit row carries
            const resolution = normalizer.resolve(counter.rawState, counter.rawDistrict);
            canonicalState = counter.rawState || UNRESOLVED_MARKER;
            canonicalDistrict = resolution.canonicalDistrict || UNRESOLVED_MARKER;
            geographyResolved = resolution.resolved;
        } else {
            canonicalState = visit.rawState || UNRESOLVED_MARKER;
            canonicalDistrict = visit.rawDistrict || UNRESOLVED_MARKER;
            geographyResolved = false;
        }

        return {
            canonicalState,
            canonicalDistrict,
            counterId: visit.counterId,
            counterName: counter ? counter.counterName : UNRESOLVED_MARKER,
            userName: user ? user.userName : UNRESOLVED_MARKER,
            territory: user ? user.territory : UNRESOLVED_MARKER,
            visitType: visit.visitType,
            visitDate: visit.visitDate,
            status: visit.status,
            geographyResolved,
            visitId: visit.visitId,
            visitTime: visit.visitTime ?? '',
            assignedUserId: visit.assignedUserId,
            lateStart: null,
            workedLate: null,
            counterMatched: counter !== undefined,
            userMatched: user !== undefined,
        };
    }

    /**
     * Marks each user's first and last timed visit of every day. Expects rows already in
     * report order, which makes the pick among equal times deterministic.
     */
    private applyDailyFlags(sortedRows: readonly ReconciledRow[], lateStartAfter: string, workedLateAfter: string): ReconciledRow[] {
        const firstByDay = new Map<string, number>();
        const lastByDay = new Map<string, number>();

        sortedRows.forEach((row, index) => {
            if (!row.visitTime) return;
            const key = `${row.assignedUserId}\u0000${row.visitDate}`;

            const first = firstByDay.get(key);
            if (first === undefined || row.visitTime < sortedRows[first].visitTime) {
                firstByDay.set(key, index);
            }
            const last = lastByDay.get(key);
            if (last === undefined || row.visitTime > sortedRows[last].visitTime) {
                lastByDay.set(key, index);
            }
        });

        const firstVisits = new Set(firstByDay.values());
        const lastVisits = new Set(lastByDay.values());

        return sortedRows.map((row, index) => ({
            ...row,
            lateStart: firstVisits.has(index) ? row.visitTime > lateStartAfter : null,
            workedLate: lastVisits.has(index) ? row.visitTime > workedLateAfter : null,
        }));
    }

    /** Last write wins on duplicate keys; duplicates are logged as a data-quality signal. */
    private indexByKey<T>(records: readonly T[], keyOf: (record: T) => string, label: string): Map<string, T> {
        const index = new Map<string, T>();
        let duplicates = 0;
        for (const record of records) {
            const key = keyOf(record);
            if (index.has(key)) duplicates++;
            index.set(key, record);
        }
        if (duplicates > 0) {
            this.logger.warn(`Found ${duplicates} duplicate ${label} key(s); the last occurrence of each was used.`);
        }
        return index;
    }
}
