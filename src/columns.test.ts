import { describe, it, expect } from 'vitest';
import {
    buildColumnTable,
    columnLetterToNumber,
    columnNumberToLetter,
    headerHeight,
    parseColumnReference,
    resolveColumn,
    sheetWidth,
    toRangeAddress,
    validateHeaderSpans,
} from './columns';
import { InvalidColumnReferenceError, InvalidHeaderSpanError } from './errors';
import type { HeaderEntry } from './types';

const headers: HeaderEntry[] = [
    { row: 0, col: 0, text: 'Mark & Nº', id: 'col_static', rowspan: 2 },
    { row: 0, col: 1, text: 'P.O Nº', id: 'col_po', rowspan: 2 },
    { row: 0, col: 2, text: 'Quantity', id: 'col_qty_header', colspan: 2 },
    { row: 1, col: 2, text: 'PCS', id: 'col_qty_pcs' },
    { row: 1, col: 3, text: 'SF', id: 'col_qty_sf' },
    { row: 0, col: 4, text: 'Amount', id: 'col_amount', rowspan: 2 },
];

// ============================================
// 1. parseColumnReference
// ============================================

describe('parseColumnReference', () => {
    it('should treat integers as raw indices', () => {
        expect(parseColumnReference(0)).toEqual({ kind: 'index', index: 0 });
        expect(parseColumnReference(7)).toEqual({ kind: 'index', index: 7 });
    });

    it('should treat integer strings as raw indices', () => {
        expect(parseColumnReference('2')).toEqual({ kind: 'index', index: 2 });
        expect(parseColumnReference(' 3 ')).toEqual({ kind: 'index', index: 3 });
    });

    it('should treat other strings as column ids', () => {
        expect(parseColumnReference('col_po')).toEqual({ kind: 'id', id: 'col_po' });
        expect(parseColumnReference('2b')).toEqual({ kind: 'id', id: '2b' });
    });

    it('should reject fractions and empty strings', () => {
        expect(() => parseColumnReference(1.5)).toThrow(InvalidColumnReferenceError);
        expect(() => parseColumnReference('  ')).toThrow(InvalidColumnReferenceError);
    });
});

// ============================================
// 2. Sheet geometry
// ============================================

describe('sheet geometry', () => {
    it('should derive width from the widest entry', () => {
        expect(sheetWidth(headers)).toBe(5);
    });

    it('should prefer a declared column count', () => {
        expect(sheetWidth(headers, 8)).toBe(8);
    });

    it('should measure header height from row spans', () => {
        expect(headerHeight(headers)).toBe(2);
        expect(headerHeight([{ row: 0, col: 0, text: 'A' }])).toBe(1);
    });

    it('should map ids to 1-based positions', () => {
        const table = buildColumnTable(headers);
        expect(table.get('col_static')).toBe(1);
        expect(table.get('col_qty_sf')).toBe(4);
        expect(table.get('col_amount')).toBe(5);
    });

    it('should keep the first entry when an id repeats', () => {
        const table = buildColumnTable([
            { row: 0, col: 2, text: 'A', id: 'col_x' },
            { row: 1, col: 5, text: 'B', id: 'col_x' },
        ]);
        expect(table.get('col_x')).toBe(3);
    });

    it('should accept stacked header cells that share no cell', () => {
        expect(() => validateHeaderSpans(headers, 5, 'Packing list')).not.toThrow();
    });

    it('should reject header cells that share a cell', () => {
        const overlapping: HeaderEntry[] = [
            { row: 0, col: 1, text: 'Quantity', colspan: 2 },
            { row: 0, col: 2, text: 'Weight', colspan: 2 },
        ];
        expect(() => validateHeaderSpans(overlapping, 4, 'Contract')).toThrow(InvalidHeaderSpanError);
        expect(() => validateHeaderSpans(overlapping, 4, 'Contract')).toThrow(
            "Header cells 'Quantity' and 'Weight' overlap"
        );
    });

    it('should reject a row span running into a cell below', () => {
        const overlapping: HeaderEntry[] = [
            { row: 0, col: 0, text: 'P.O', rowspan: 2 },
            { row: 1, col: 0, text: 'Sub' },
        ];
        expect(() => validateHeaderSpans(overlapping, 1, 'Contract')).toThrow("Header cells 'P.O' and 'Sub' overlap");
    });

    it('should reject header cells past the sheet width', () => {
        expect(() => validateHeaderSpans(headers, 4, 'Packing list')).toThrow(
            "Header 'Amount' spans to column 5, beyond sheet width 4"
        );
    });
});

// ============================================
// 3. resolveColumn
// ============================================

describe('resolveColumn', () => {
    const columns = buildColumnTable(headers);

    it('should resolve index 0 to position 1', () => {
        expect(resolveColumn(parseColumnReference(0), columns, 5)).toBe(1);
    });

    it('should resolve a raw index k to k + 1 whether written as a number or a string', () => {
        for (let k = 0; k < 5; k++) {
            const fromNumber = resolveColumn(parseColumnReference(k), columns, 5);
            const fromString = resolveColumn(parseColumnReference(String(k)), columns, 5);
            expect(fromNumber).toBe(k + 1);
            expect(fromString).toBe(fromNumber);
        }
    });

    it('should resolve ids through the column table', () => {
        expect(resolveColumn({ kind: 'id', id: 'col_po' }, columns, 5)).toBe(2);
    });

    it('should reject unknown ids', () => {
        expect(() => resolveColumn({ kind: 'id', id: 'col_missing' }, columns, 5, 'Invoice')).toThrow(
            "Unknown column id 'col_missing' on sheet 'Invoice'"
        );
    });

    it('should reject positions outside the sheet', () => {
        expect(() => resolveColumn({ kind: 'index', index: 5 }, columns, 5, 'Invoice')).toThrow(
            "Column position 6 is outside 1..5 on sheet 'Invoice'"
        );
        expect(() => resolveColumn({ kind: 'index', index: -1 }, columns, 5)).toThrow(InvalidColumnReferenceError);
    });
});

// ============================================
// 4. A1 addressing
// ============================================

describe('A1 addressing', () => {
    it('should convert between numbers and letters', () => {
        expect(columnNumberToLetter(1)).toBe('A');
        expect(columnNumberToLetter(26)).toBe('Z');
        expect(columnNumberToLetter(27)).toBe('AA');
        expect(columnLetterToNumber('AB')).toBe(28);
    });

    it('should build range addresses', () => {
        expect(toRangeAddress(30, 3, 5)).toBe('C30:E30');
        expect(toRangeAddress(21, 1, 1, 22)).toBe('A21:A22');
    });
});
