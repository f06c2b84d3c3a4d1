// src/core/geography/geography-normalizer.ts
import { AliasRule, GeographyResolution } from '../common/interfaces/models';
import { compareText } from '../common/utils';
import { buildAliasRules, WILDCARD_MARKER } from './alias-rules';
import { IGeographyNormalizer } from './interfaces/services';

interface PrefixRule {
    readonly prefix: string;
    readonly canonicalName: string;
}

interface StateRules {
    readonly exact: ReadonlyMap<string, string>;
    readonly prefixes: readonly PrefixRule[]; // longest prefix first
}

/**
 * Immutable district resolver built from the alias table.
 * Shared by every report run; a table reload builds a new instance instead of mutating this one.
 */
export class GeographyNormalizer implements IGeographyNormalizer {
    private readonly byState: ReadonlyMap<string, StateRules>;
    public readonly ruleCount: number;

    private constructor(rules: readonly AliasRule[], states: readonly string[]) {
        const exact = new Map<string, Map<string, string>>();
        const prefixes = new Map<string, PrefixRule[]>();
        for (const state of states) {
            exact.set(state, new Map());
            prefixes.set(state, []);
        }

        for (const rule of rules) {
            if (!exact.has(rule.state)) {
                exact.set(rule.state, new Map());
                prefixes.set(rule.state, []);
            }
            if (rule.matchMode === 'Exact') {
                exact.get(rule.state)?.set(rule.rawPattern, rule.canonicalName);
            } else {
                prefixes.get(rule.state)?.push({
                    prefix: rule.rawPattern.slice(0, -WILDCARD_MARKER.length),
                    canonicalName: rule.canonicalName,
                });
            }
        }

        const byState = new Map<string, StateRules>();
        for (const [state, exactRules] of exact) {
            const statePrefixes = [...(prefixes.get(state) ?? [])].sort(
                (a, b) => b.prefix.length - a.prefix.length || compareText(a.prefix, b.prefix)
            );
            byState.set(state, { exact: exactRules, prefixes: statePrefixes });
        }

        this.byState = byState;
        this.ruleCount = rules.length;
    }

    /** Builds a normalizer from a parsed alias table document (state -> district -> canonical). */
    static fromDocument(document: unknown): GeographyNormalizer {
        const { rules, states } = buildAliasRules(document);
        return new GeographyNormalizer(rules, states);
    }

    static empty(): GeographyNormalizer {
        return new GeographyNormalizer([], []);
    }

    get states(): string[] {
        return [...this.byState.keys()];
    }

    resolve(state: string, rawDistrict: string): GeographyResolution {
        const stateRules = this.byState.get(state);
        if (!stateRules) {
            return { canonicalDistrict: rawDistrict, resolved: false };
        }

        const exactMatch = stateRules.exact.get(rawDistrict);
        if (exactMatch !== undefined) {
            // Identity entries land here too: checked and consistent, value unchanged.
            return { canonicalDistrict: exactMatch, resolved: true };
        }

        for (const rule of stateRules.prefixes) {
            if (rawDistrict.startsWith(rule.prefix)) {
                return { canonicalDistrict: rule.canonicalName, resolved: true };
            }
        }

        return { canonicalDistrict: rawDistrict, resolved: false };
    }
}
