import * as _ from 'lodash-es';
import { NORMALIZE_REPLACEMENTS, NORMALIZE_STRIP, PATTERNS, SIMILARITY_WEIGHTS } from './constants';
import { UnresolvedMappingError } from './errors';
import { createLogger } from './logger';
import type { FallbackSettings, MappingKind, MappingTable, MatchMethod, MatchOutcome, Resolution } from './types';

const log = createLogger('Mapping');

// ============================================
// 1. TEXT NORMALISATION & SCORING
// ============================================

/**
 * Lower-case, unify "Nº"/"N°", drop punctuation and collapse whitespace.
 * "P.O. Nº" becomes "po no".
 */
function normalizeLabel(text: string): string {
    let normalized: string = _.toLower(_.trim(text));
    for (const [from, to] of NORMALIZE_REPLACEMENTS) {
        normalized = normalized.split(from).join(to);
    }
    normalized = normalized.replace(NORMALIZE_STRIP, '');
    return _.trim(normalized.replace(PATTERNS.WHITESPACE, ' '));
}

function charOverlap(a: string, b: string): number {
    const maxLen = Math.max(a.length, b.length);
    if (maxLen === 0) return 0;
    const common = _.sumBy(Array.from(a), (c) => (b.includes(c) ? 1 : 0));
    return common / maxLen;
}

/**
 * Weighted word-Jaccard + character overlap on normalised labels, in [0, 1]
 */
function similarity(a: string, b: string): number {
    if (!a || !b) return 0;

    const wordsA = new Set(_.compact(a.split(' ')));
    const wordsB = new Set(_.compact(b.split(' ')));
    if (wordsA.size === 0 || wordsB.size === 0) {
        return charOverlap(a, b);
    }

    const union = new Set([...wordsA, ...wordsB]);
    const common = _.filter([...wordsA], (w) => wordsB.has(w)).length;
    const wordScore = common / union.size;

    return wordScore * SIMILARITY_WEIGHTS.WORD + charOverlap(a, b) * SIMILARITY_WEIGHTS.CHAR;
}

/**
 * Every pattern word must meet some header word, either one containing the other
 */
function matchesWordGroup(normalized: string, group: readonly string[]): boolean {
    const words = _.compact(normalized.split(' '));
    return _.every(group, (patternWord) =>
        _.some(words, (word) => word.includes(patternWord) || patternWord.includes(word))
    );
}

// ============================================
// 2. MATCHER STRATEGIES
// ============================================

/**
 * One step of the fallback chain
 */
export interface Matcher {
    readonly method: MatchMethod;
    attemptMatch(raw: string, table: ReadonlyMap<string, string>, kind: MappingKind): MatchOutcome | null;
}

export const exactMatcher: Matcher = {
    method: 'exact',
    attemptMatch(raw, table) {
        const canonical = table.get(raw);
        return canonical === undefined
            ? null
            : { canonical, method: 'exact', matchedKey: raw, suggestion: false };
    },
};

export const caseInsensitiveMatcher: Matcher = {
    method: 'case_insensitive',
    attemptMatch(raw, table) {
        const wanted = _.toLower(_.trim(raw));
        for (const [key, canonical] of table) {
            if (_.toLower(_.trim(key)) === wanted) {
                return { canonical, method: 'case_insensitive', matchedKey: key, suggestion: false };
            }
        }
        return null;
    },
};

export function createSimilarityMatcher(threshold: number): Matcher {
    return {
        method: 'similarity',
        attemptMatch(raw, table) {
            const normalizedRaw = normalizeLabel(raw);
            let best: { key: string; canonical: string; score: number } | null = null;

            for (const [key, canonical] of table) {
                const score = similarity(normalizedRaw, normalizeLabel(key));
                if (!best || score > best.score) {
                    best = { key, canonical, score };
                }
            }

            if (!best || best.score <= threshold) return null;
            return {
                canonical: best.canonical,
                method: 'similarity',
                matchedKey: best.key,
                score: _.round(best.score, 4),
                suggestion: true,
            };
        },
    };
}

export function createPatternMatcher(rules: FallbackSettings['patternRules']): Matcher {
    return {
        method: 'pattern',
        attemptMatch(raw, table, kind) {
            const normalizedRaw = normalizeLabel(raw);
            if (!normalizedRaw) return null;

            for (const [key, canonical] of table) {
                if (normalizeLabel(key) === normalizedRaw) {
                    return { canonical, method: 'pattern', matchedKey: key, suggestion: false };
                }
            }

            if (kind !== 'header') return null;

            for (const [canonical, groups] of Object.entries(rules)) {
                const group = _.find(groups, (words) => matchesWordGroup(normalizedRaw, words));
                if (group) {
                    return { canonical, method: 'pattern', matchedKey: group.join(' '), suggestion: false };
                }
            }
            return null;
        },
    };
}

/**
 * Matchers enabled by the mapping file, in evaluation order
 */
export function buildMatcherChain(settings: FallbackSettings): Matcher[] {
    const chain: Matcher[] = [exactMatcher];
    if (settings.caseInsensitive) chain.push(caseInsensitiveMatcher);
    chain.push(createSimilarityMatcher(settings.partialMatchThreshold));
    if (settings.patternMatching) chain.push(createPatternMatcher(settings.patternRules));
    return chain;
}

// ============================================
// 3. RESOLVER
// ============================================

export function unresolvedLabel(resolution: Pick<Resolution, 'kind' | 'raw'>): string {
    return `${resolution.kind === 'sheet' ? 'Sheet' : 'Header'}:${resolution.raw}`;
}

export interface MappingResolverOptions {
    strict?: boolean;
    matchers?: Matcher[];
}

/**
 * Resolves raw sheet names and header texts against one mapping snapshot.
 * Every attempt lands in the resolution report, resolved or not.
 */
export class MappingResolver {
    private readonly table: MappingTable;
    private readonly matchers: Matcher[];
    private readonly strict: boolean;
    private readonly entries: Resolution[] = [];

    constructor(table: MappingTable, options: MappingResolverOptions = {}) {
        this.table = table;
        this.matchers = options.matchers ?? buildMatcherChain(table.fallback);
        this.strict = options.strict ?? false;
    }

    resolveSheet(rawName: string): Resolution {
        return this.resolve('sheet', rawName, this.table.sheetMappings);
    }

    resolveHeader(rawText: string, sheet?: string): Resolution {
        return this.resolve('header', rawText, this.table.headerMappings, sheet);
    }

    /** Resolution attempts so far, in order */
    report(): Resolution[] {
        return [...this.entries];
    }

    unresolved(): string[] {
        return _.uniq(_.map(_.reject(this.entries, 'resolved'), unresolvedLabel));
    }

    suggestions(): Resolution[] {
        return _.filter(this.entries, (entry) => entry.resolved && entry.suggestion);
    }

    private resolve(
        kind: MappingKind,
        raw: string,
        mappings: ReadonlyMap<string, string>,
        sheet?: string
    ): Resolution {
        let resolution: Resolution = { resolved: false, kind, raw, sheet };

        for (const matcher of this.matchers) {
            const outcome = matcher.attemptMatch(raw, mappings, kind);
            if (outcome) {
                resolution = { resolved: true, kind, raw, sheet, ...outcome };
                break;
            }
        }

        this.entries.push(resolution);

        if (resolution.resolved) {
            const note = resolution.suggestion ? ` (suggestion, score ${resolution.score})` : '';
            log.debug(`${kind} '${raw}' → ${resolution.canonical} via ${resolution.method}${note}`);
        } else {
            log.warn(`Unresolved ${kind} '${raw}'${sheet ? ` in sheet '${sheet}'` : ''}`);
            if (this.strict) {
                throw new UnresolvedMappingError(unresolvedLabel(resolution));
            }
        }

        return resolution;
    }
}

export { normalizeLabel, similarity };
