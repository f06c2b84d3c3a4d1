// src/core/parsing/interfaces/services.ts
import { ExtractKind, ExtractRecordMap, ParsedExtract } from '../../common/interfaces/models';

/** Potential options for extract parsing */
export interface ExtractParsingOptions {
    /** Overrides the configured rejected-row ratio above which the extract is unusable. */
    maxRejectedRatio?: number;
}

/** Defines the contract for the Extract Parser Service */
export interface IExtractParserService {
    /**
     * Parses one CSV extract into typed records.
     * @throws {MissingColumnError} if a required column is absent from the header
     * @throws {EmptyDatasetError} if no row, or too small a share of rows, survives type coercion
     */
    parse<K extends ExtractKind>(
        kind: K,
        fileBuffer: Buffer,
        options?: ExtractParsingOptions
    ): ParsedExtract<ExtractRecordMap[K]>;
}
