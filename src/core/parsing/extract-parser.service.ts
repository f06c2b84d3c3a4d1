// src/core/parsing/extract-parser.service.ts
import Papa from 'papaparse';
import 'reflect-metadata'; // DI requirement
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';

import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { EmptyDatasetError, MissingColumnError } from '../common/errors';
import {
    CounterRecord, ExtractKind, ExtractRecordMap, ParsedExtract,
    RejectedRow, UserRecord, VisitRecord, VisitType
} from '../common/interfaces/models';
import { ColumnSpec, EXTRACT_SCHEMAS, ExtractFieldMap, normalizeHeader } from './extract-schemas';
import { ExtractParsingOptions, IExtractParserService } from './interfaces/services';
import { parseVisitTimestamp } from './visit-date';

const BYTE_ORDER_MARK = '\uFEFF';

type RowOutcome<T> = { ok: true; record: T } | { ok: false; reason: string };

/** Reads a trimmed cell by logical field; absent optional columns read as ''. */
type CellReader<F extends string> = (field: F) => string;

type RowBuilder<T, F extends string> = (cell: CellReader<F>, line: number) => RowOutcome<T>;

function buildVisit(visitType: VisitType): RowBuilder<VisitRecord, ExtractFieldMap['PlannedVisit']> {
    return (cell, line) => {
        const visitId = cell('visitId');
        const counterId = cell('counterId');
        const assignedUserId = cell('assignedUserId');
        if (!visitId) return { ok: false, reason: 'empty visit id' };
        if (!counterId) return { ok: false, reason: 'empty counter code' };
        if (!assignedUserId) return { ok: false, reason: 'empty assigned user' };

        const rawDate = cell('visitDate');
        const timestamp = parseVisitTimestamp(rawDate);
        if (!timestamp) {
            return { ok: false, reason: rawDate ? `unrecognised visit date "${rawDate}"` : 'empty visit date' };
        }

        return {
            ok: true,
            record: {
                visitId,
                visitType,
                counterId,
                leadId: cell('leadId'),
                rawState: cell('rawState'),
                rawDistrict: cell('rawDistrict'),
                visitDate: timestamp.date,
                visitTime: timestamp.time,
                assignedUserId,
                status: cell('status'),
                sourceLine: line,
            },
        };
    };
}

const buildCounter: RowBuilder<CounterRecord, ExtractFieldMap['Counter']> = (cell, line) => {
    const counterId = cell('counterId');
    if (!counterId) return { ok: false, reason: 'empty counter code' };
    return {
        ok: true,
        record: {
            counterId,
            counterName: cell('counterName'),
            rawState: cell('rawState'),
            rawDistrict: cell('rawDistrict'),
            sourceLine: line,
        },
    };
};

const buildUser: RowBuilder<UserRecord, ExtractFieldMap['User']> = (cell, line) => {
    const userId = cell('userId');
    if (!userId) return { ok: false, reason: 'empty user id' };
    return {
        ok: true,
        record: {
            userId,
            userName: cell('userName'),
            territory: cell('territory'),
            sourceLine: line,
        },
    };
};

const ROW_BUILDERS: { readonly [K in ExtractKind]: RowBuilder<ExtractRecordMap[K], ExtractFieldMap[K]> } = {
    PlannedVisit: buildVisit('Planned'),
    UnplannedVisit: buildVisit('Unplanned'),
    Counter: buildCounter,
    User: buildUser,
};

/**
 * Turns raw extract bytes into typed records. This is the only place that deals
 * with loosely-typed CSV rows; everything downstream sees typed records.
 */
@singleton()
@injectable()
export class ExtractParserService implements IExtractParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ExtractParserService initialized.');
    }

    parse<K extends ExtractKind>(
        kind: K,
        fileBuffer: Buffer,
        options?: ExtractParsingOptions
    ): ParsedExtract<ExtractRecordMap[K]> {
        const maxRejectedRatio = options?.maxRejectedRatio ?? config.parsing.maxRejectedRatio;
        return this.parseRows(kind, fileBuffer, EXTRACT_SCHEMAS[kind], ROW_BUILDERS[kind], maxRejectedRatio);
    }

    private parseRows<T, F extends string>(
        kind: ExtractKind,
        fileBuffer: Buffer,
        schema: readonly ColumnSpec<F>[],
        buildRow: RowBuilder<T, F>,
        maxRejectedRatio: number
    ): ParsedExtract<T> {
        let text = fileBuffer.toString('utf8');
        if (text.startsWith(BYTE_ORDER_MARK)) {
            text = text.slice(BYTE_ORDER_MARK.length);
        }

        const result = Papa.parse<string[]>(text, { header: false, delimiter: ',', skipEmptyLines: 'greedy' });
        for (const error of result.errors) {
            this.logger.warn(`${kind} extract: CSV ${error.type} issue near data row ${error.row ?? '?'}: ${error.message}`);
        }

        const [headerRow, ...dataRows] = result.data;
        if (!headerRow) {
            throw new EmptyDatasetError(kind, `${kind} extract is empty (no header row)`);
        }
        const columns = this.resolveColumns(kind, headerRow, schema);

        const records: T[] = [];
        const rejectedRows: RejectedRow[] = [];
        dataRows.forEach((row, index) => {
            const line = index + 2; // header is row 1
            const cell: CellReader<F> = field => {
                const columnIndex = columns.get(field);
                return columnIndex === undefined ? '' : (row[columnIndex] ?? '').trim();
            };
            const outcome = buildRow(cell, line);
            if (outcome.ok) {
                records.push(outcome.record);
            } else {
                rejectedRows.push({ line, reason: outcome.reason });
            }
        });

        const totalRows = dataRows.length;
        this.logger.info(`${kind} extract: ${records.length} of ${totalRows} rows usable, ${rejectedRows.length} rejected.`);
        rejectedRows.slice(0, 20).forEach(rejected =>
            this.logger.debug(`${kind} extract: row ${rejected.line} rejected (${rejected.reason})`)
        );

        if (records.length === 0) {
            throw new EmptyDatasetError(
                kind,
                totalRows === 0
                    ? `${kind} extract contains no data rows`
                    : `${kind} extract has no usable rows (all ${totalRows} rows rejected)`
            );
        }
        if (rejectedRows.length / totalRows > maxRejectedRatio) {
            throw new EmptyDatasetError(
                kind,
                `${kind} extract is unusable: ${rejectedRows.length} of ${totalRows} rows rejected (limit ${Math.round(maxRejectedRatio * 100)}%)`
            );
        }

        return { kind, records, totalRows, rejectedRows };
    }

    /**
     * Maps each schema field to a column index. Header order is irrelevant; when a field
     * accepts several headers, the first one listed in the schema that is present wins.
     */
    private resolveColumns<F extends string>(
        kind: ExtractKind,
        headerRow: readonly string[],
        schema: readonly ColumnSpec<F>[]
    ): Map<F, number> {
        const indexByHeader = new Map<string, number>();
        headerRow.forEach((header, index) => {
            const key = normalizeHeader(header);
            if (key && !indexByHeader.has(key)) {
                indexByHeader.set(key, index);
            }
        });

        const columns = new Map<F, number>();
        for (const spec of schema) {
            const match = spec.headers
                .map(header => indexByHeader.get(normalizeHeader(header)))
                .find((index): index is number => index !== undefined);
            if (match !== undefined) {
                columns.set(spec.field, match);
            } else if (spec.required) {
                throw new MissingColumnError(kind, spec.headers[0] ?? spec.field);
            }
        }
        return columns;
    }
}
