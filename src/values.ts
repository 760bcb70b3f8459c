import * as _ from 'lodash-es';
import type { CellValue } from './types';

/**
 * Missing, null or whitespace-only
 */
export function isBlank(value: CellValue | undefined): boolean {
    return value === undefined || value === null || (_.isString(value) && _.trim(value) === '');
}

/**
 * Numeric value of a cell: finite numbers, or strings such as "1,234.50".
 * Anything else is null.
 */
export function toNumber(value: CellValue | undefined): number | null {
    if (_.isNumber(value)) {
        return Number.isFinite(value) ? value : null;
    }
    if (!_.isString(value)) return null;

    const cleaned = value.replace(/[,\s]/g, '');
    if (cleaned === '') return null;

    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Comparable form of a key cell; strings are trimmed so "PO-1 " and "PO-1" agree
 */
export function keyValue(value: CellValue | undefined): CellValue {
    if (value === undefined) return null;
    return _.isString(value) ? _.trim(value) : value;
}
