import * as _ from 'lodash-es';
import { ERROR_MESSAGES, PATTERNS } from './constants';
import { InvalidColumnReferenceError, InvalidHeaderSpanError } from './errors';
import type { ColumnReference, ColumnTable, HeaderEntry } from './types';

// ============================================
// 1. PARSING
// ============================================

/**
 * Discriminate a raw reference once, at load time.
 * Integers and integer-looking strings are 0-based raw indices; anything else is a column id.
 */
function parseColumnReference(value: string | number): ColumnReference {
    if (_.isNumber(value)) {
        if (!Number.isInteger(value)) {
            throw new InvalidColumnReferenceError(String(value), ERROR_MESSAGES.INVALID_REFERENCE(String(value)));
        }
        return { kind: 'index', index: value };
    }

    const trimmed = _.trim(value);
    if (trimmed === '') {
        throw new InvalidColumnReferenceError(value, ERROR_MESSAGES.INVALID_REFERENCE(value));
    }

    if (PATTERNS.INTEGER.test(trimmed)) {
        return { kind: 'index', index: parseInt(trimmed, 10) };
    }

    return { kind: 'id', id: trimmed };
}

/**
 * Inverse of parseColumnReference, used when serializing configs
 */
function formatColumnReference(ref: ColumnReference): string | number {
    return ref.kind === 'index' ? ref.index : ref.id;
}

function describeReference(ref: ColumnReference): string {
    return ref.kind === 'index' ? `index ${ref.index}` : `'${ref.id}'`;
}

// ============================================
// 2. SHEET GEOMETRY
// ============================================

/**
 * Column id → 1-based position. The first entry carrying an id wins.
 */
function buildColumnTable(headers: readonly HeaderEntry[]): ColumnTable {
    const table = new Map<string, number>();
    _.forEach(headers, (entry) => {
        if (entry.id && !table.has(entry.id)) {
            table.set(entry.id, entry.col + 1);
        }
    });
    return table;
}

function sheetWidth(headers: readonly HeaderEntry[], columnCount?: number): number {
    if (columnCount !== undefined) return columnCount;
    return _.max(_.map(headers, (entry) => entry.col + (entry.colspan ?? 1))) ?? 0;
}

/**
 * Number of rows spanned by a header block
 */
function headerHeight(headers: readonly HeaderEntry[]): number {
    return _.max(_.map(headers, (entry) => entry.row + (entry.rowspan ?? 1))) ?? 0;
}

interface HeaderBox {
    text: string;
    top: number;
    bottom: number;
    left: number;
    right: number;
}

function headerBox(entry: HeaderEntry): HeaderBox {
    return {
        text: entry.text,
        top: entry.row,
        bottom: entry.row + (entry.rowspan ?? 1) - 1,
        left: entry.col + 1,
        right: entry.col + (entry.colspan ?? 1),
    };
}

/**
 * Header cells must stay inside the sheet width and must not share a cell,
 * otherwise the workbook cannot merge them
 */
function validateHeaderSpans(headers: readonly HeaderEntry[], width: number, sheet: string): void {
    const boxes = _.map(headers, headerBox);

    _.forEach(boxes, (box) => {
        if (box.right > width) {
            throw new InvalidHeaderSpanError(sheet, ERROR_MESSAGES.HEADER_OUT_OF_BOUNDS(box.text, box.right, width));
        }
    });

    for (let i = 0; i < boxes.length; i++) {
        for (let j = i + 1; j < boxes.length; j++) {
            const a = boxes[i];
            const b = boxes[j];
            const rowsMeet = a.top <= b.bottom && b.top <= a.bottom;
            const columnsMeet = a.left <= b.right && b.left <= a.right;
            if (rowsMeet && columnsMeet) {
                throw new InvalidHeaderSpanError(sheet, ERROR_MESSAGES.HEADER_OVERLAP(a.text, b.text));
            }
        }
    }
}

// ============================================
// 3. RESOLUTION
// ============================================

/**
 * The one resolution rule for every field that takes a column reference
 */
function resolveColumn(
    ref: ColumnReference,
    columns: ColumnTable,
    width: number,
    sheet = ''
): number {
    let position: number;

    if (ref.kind === 'index') {
        position = ref.index + 1;
    } else {
        const found = columns.get(ref.id);
        if (found === undefined) {
            throw new InvalidColumnReferenceError(ref.id, ERROR_MESSAGES.UNKNOWN_COLUMN_ID(ref.id, sheet));
        }
        position = found;
    }

    if (position < 1 || position > width) {
        throw new InvalidColumnReferenceError(
            describeReference(ref),
            ERROR_MESSAGES.COLUMN_OUT_OF_RANGE(position, width, sheet)
        );
    }

    return position;
}

// ============================================
// 4. A1 ADDRESSING
// ============================================

function columnLetterToNumber(letter: string): number {
    const upperLetter = letter.toUpperCase();
    let num = 0;
    for (let i = 0; i < upperLetter.length; i++) {
        num = num * 26 + (upperLetter.charCodeAt(i) - 64);
    }
    return num;
}

function columnNumberToLetter(num: number): string {
    let letter = '';
    while (num > 0) {
        const mod = (num - 1) % 26;
        letter = String.fromCharCode(65 + mod) + letter;
        num = Math.floor((num - mod) / 26);
    }
    return letter;
}

function toCellAddress(row: number, column: number): string {
    return `${columnNumberToLetter(column)}${row}`;
}

function toRangeAddress(row: number, startColumn: number, endColumn: number, endRow = row): string {
    return `${toCellAddress(row, startColumn)}:${toCellAddress(endRow, endColumn)}`;
}

export {
    parseColumnReference,
    formatColumnReference,
    describeReference,
    buildColumnTable,
    sheetWidth,
    headerHeight,
    validateHeaderSpans,
    resolveColumn,
    columnLetterToNumber,
    columnNumberToLetter,
    toCellAddress,
    toRangeAddress,
};
