// src/core/geography/alias-rules.ts
import { ConfigurationError } from '../common/errors';
import { AliasRule } from '../common/interfaces/models';

/** A district key ending in this marker is a prefix rule. */
export const WILDCARD_MARKER = '*';

/**
 * Strips surrounding whitespace and control characters from an alias table key.
 * Interior whitespace is kept: 'North  District' stays double-spaced.
 */
export function stripTableKey(key: string): string {
    return key.replace(/^[\s\p{Cc}]+|[\s\p{Cc}]+$/gu, '');
}

function isPlainMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCanonicalName(value: unknown, state: string, district: string): string {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
        const name = String(value).trim();
        if (name.length > 0) {
            return name;
        }
    }
    throw new ConfigurationError(`Alias table entry "${state}" -> "${district}" has no usable canonical name`);
}

/**
 * Turns the parsed alias table document (state -> source district -> canonical district)
 * into a flat rule list. A null or empty document yields no rules; a state with a null
 * body (only comments under it) is kept as a known state without rules.
 *
 * @returns rules plus the list of known states, both in document order
 * @throws {ConfigurationError} on malformed structure or conflicting keys
 */
export function buildAliasRules(document: unknown): { rules: AliasRule[]; states: string[] } {
    if (document === null || document === undefined) {
        return { rules: [], states: [] };
    }
    if (!isPlainMapping(document)) {
        throw new ConfigurationError('Alias table must be a mapping of state names to district mappings');
    }

    const rules: AliasRule[] = [];
    const states: string[] = [];
    const seenStates = new Set<string>();

    for (const [rawState, body] of Object.entries(document)) {
        const state = stripTableKey(rawState);
        if (!state) {
            throw new ConfigurationError('Alias table contains an empty state name');
        }
        if (seenStates.has(state)) {
            throw new ConfigurationError(`State "${state}" appears more than once in the alias table`);
        }
        seenStates.add(state);
        states.push(state);

        if (body === null || body === undefined) continue;
        if (!isPlainMapping(body)) {
            throw new ConfigurationError(`Alias table entry for state "${state}" must be a mapping of district names`);
        }

        const byPattern = new Map<string, string>();
        for (const [rawDistrict, value] of Object.entries(body)) {
            const rawPattern = stripTableKey(rawDistrict);
            const canonicalName = toCanonicalName(value, state, rawPattern);
            const isWildcard = rawPattern.endsWith(WILDCARD_MARKER);

            if (!rawPattern || (isWildcard && rawPattern.length === WILDCARD_MARKER.length)) {
                throw new ConfigurationError(`Alias table entry under "${state}" has an empty district pattern`);
            }

            const previous = byPattern.get(rawPattern);
            if (previous !== undefined) {
                if (previous !== canonicalName) {
                    throw new ConfigurationError(
                        `District "${rawPattern}" under "${state}" maps to both "${previous}" and "${canonicalName}"`
                    );
                }
                continue; // same mapping authored twice, e.g. with and without a stray newline
            }
            byPattern.set(rawPattern, canonicalName);

            rules.push({
                state,
                rawPattern,
                canonicalName,
                matchMode: isWildcard ? 'PrefixWildcard' : 'Exact',
            });
        }
    }

    return { rules, states };
}
