import * as _ from 'lodash-es';
import { resolveColumn } from './columns';
import { ERROR_MESSAGES } from './constants';
import { DocumentGenerationError, MergeSpanOutOfBoundsError, OverlappingMergeRuleError } from './errors';
import type {
    CanonicalRow,
    ColumnTable,
    FooterConfig,
    FooterLayout,
    FooterTotal,
    MergeRule,
    MergeSpan,
} from './types';
import { isBlank, keyValue, toNumber } from './values';

// ============================================
// 1. TYPES
// ============================================

/**
 * Where a footer lands and what it resolves its references against
 */
export interface FooterContext {
    sheet: string;
    row: number;
    width: number;
    columns: ColumnTable;
    config: FooterConfig;
    /** Replaces `config.totalText`, e.g. for a grand total */
    totalText?: string;
    /** Rows the pallet count is taken from when they differ from the summed rows */
    palletRows?: readonly CanonicalRow[];
    /** Pallet count taken as given instead of counted */
    palletCount?: number;
}

// ============================================
// 2. MERGE SPANS
// ============================================

const spanLabel = (span: MergeSpan) => `${span.startColumn}-${span.endColumn}`;

/**
 * Resolve merge rules onto a footer row and reject spans that leave the sheet or intersect.
 * Accepted spans come back sorted by start column.
 */
function validateMergeSpans(
    rules: readonly MergeRule[],
    context: Pick<FooterContext, 'sheet' | 'row' | 'width' | 'columns'>
): MergeSpan[] {
    const { sheet, row, width, columns } = context;

    const spans = _.map(rules, (rule): MergeSpan => {
        if (!Number.isInteger(rule.colspan) || rule.colspan < 1) {
            throw new DocumentGenerationError('footer', sheet, ERROR_MESSAGES.INVALID_COLSPAN(rule.colspan));
        }
        const startColumn = resolveColumn(rule.startColumn, columns, width, sheet);
        const endColumn = startColumn + rule.colspan - 1;
        if (endColumn > width) {
            throw new MergeSpanOutOfBoundsError(sheet, startColumn, endColumn, width);
        }
        return { row, startColumn, endColumn };
    });

    const sorted = _.sortBy(spans, 'startColumn');
    for (let i = 1; i < sorted.length; i++) {
        const previous = sorted[i - 1];
        const current = sorted[i];
        if (current.startColumn <= previous.endColumn) {
            throw new OverlappingMergeRuleError(sheet, spanLabel(previous), spanLabel(current));
        }
    }

    return sorted;
}

// ============================================
// 3. FOOTER VALUES
// ============================================

function palletText(count: number): string {
    return `${count} PALLET${count !== 1 ? 'S' : ''}`;
}

/**
 * Pallet count under the template's declared policy; null when no policy is declared
 */
function countPallets(rows: readonly CanonicalRow[], policy: FooterConfig['palletCount']): number | null {
    if (!policy) return null;

    if (policy.mode === 'precomputed') {
        return _.round(_.sumBy(rows, (row) => toNumber(row[policy.columnId]) ?? 0), 0);
    }

    const pallets = new Set<string>();
    _.forEach(rows, (row) => {
        const value = row[policy.columnId];
        if (!isBlank(value)) pallets.add(String(keyValue(value)));
    });
    return pallets.size;
}

function sumColumn(rows: readonly CanonicalRow[], columnId: string, decimalPlaces: number): number {
    return _.round(_.sumBy(rows, (row) => toNumber(row[columnId]) ?? 0), decimalPlaces);
}

/**
 * Footer row for one table (or block): total label, pallet count, column totals and merges
 */
function computeFooter(rows: readonly CanonicalRow[], context: FooterContext): FooterLayout {
    const { sheet, row, width, columns, config } = context;

    const totalText = config.totalTextColumn
        ? { column: resolveColumn(config.totalTextColumn, columns, width, sheet), text: context.totalText ?? config.totalText }
        : null;

    let palletCount: FooterLayout['palletCount'] = null;
    if (config.palletCountColumn) {
        const column = resolveColumn(config.palletCountColumn, columns, width, sheet);
        const count = context.palletCount ?? countPallets(context.palletRows ?? rows, config.palletCount);
        if (count) {
            palletCount = { column, count, text: palletText(count) };
        }
    }

    const totals = _.map(config.sumColumnIds, (columnId): FooterTotal => {
        const total: FooterTotal = {
            columnId,
            column: resolveColumn({ kind: 'id', id: columnId }, columns, width, sheet),
            value: sumColumn(rows, columnId, config.decimalPlaces),
        };
        if (config.numberFormat !== undefined) total.numberFormat = config.numberFormat;
        return total;
    });

    const merges = validateMergeSpans(config.mergeRules, { sheet, row, width, columns });

    return { row, totalText, palletCount, totals, merges };
}

/**
 * Resolve every column reference and merge rule of a footer without laying it out
 */
function validateFooterConfig(config: FooterConfig, context: Pick<FooterContext, 'sheet' | 'width' | 'columns'>): void {
    const { sheet, width, columns } = context;

    if (config.totalTextColumn) resolveColumn(config.totalTextColumn, columns, width, sheet);
    if (config.palletCountColumn) resolveColumn(config.palletCountColumn, columns, width, sheet);
    _.forEach(config.sumColumnIds, (columnId) => resolveColumn({ kind: 'id', id: columnId }, columns, width, sheet));
    validateMergeSpans(config.mergeRules, { sheet, row: 0, width, columns });
}

export { validateMergeSpans, validateFooterConfig, countPallets, palletText, computeFooter };
