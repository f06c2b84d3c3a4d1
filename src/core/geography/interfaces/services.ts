// src/core/geography/interfaces/services.ts
import { GeographyResolution } from '../../common/interfaces/models';

/** Defines the contract for district name resolution */
export interface IGeographyNormalizer {
    /**
     * Resolves a raw district name to its canonical form.
     * Unknown states and unmapped districts come back unchanged with `resolved: false`.
     */
    resolve(state: string, rawDistrict: string): GeographyResolution;
}

/**
 * Source of the normalizer currently in force. Callers take one snapshot per run
 * so a table reload never splits a run across two tables.
 */
export interface IAliasTableSource {
    current(): IGeographyNormalizer;
}

// DI token under which the alias table provider is registered
export const ALIAS_TABLE_SOURCE_TOKEN = Symbol.for('AliasTableSource');
