import { describe, it, expect } from 'vitest';
import { buildMappingReport, formatMappingListing } from './report';
import type { MappingTable, Resolution } from './types';

const table: MappingTable = {
    sheetMappings: new Map([
        ['CONTRACT', 'Contract'],
        ['PL', 'Packing list'],
    ]),
    headerMappings: new Map([
        ['PCS', 'col_qty_pcs'],
        ['ITEM Nº', 'col_item'],
    ]),
    fallback: { caseInsensitive: true, partialMatchThreshold: 0.8, patternMatching: true, patternRules: {} },
};

const suggestion: Resolution = {
    resolved: true,
    kind: 'header',
    raw: 'ITEM No.',
    sheet: 'Contract',
    canonical: 'col_item',
    method: 'similarity',
    matchedKey: 'ITEM Nº',
    score: 0.85,
    suggestion: true,
};

describe('buildMappingReport', () => {
    it('should list unresolved items, suggestions and the mappings in effect', () => {
        const report = buildMappingReport({
            unresolved: ['Sheet:XYZ_SHEET', 'Header:Remarks'],
            suggestions: [suggestion],
            table,
        });

        expect(report.split('\n')).toEqual([
            'Mapping Report',
            '='.repeat(50),
            '',
            'Unrecognized Items:',
            '-'.repeat(40),
            '• Sheet:XYZ_SHEET',
            '• Header:Remarks',
            '',
            'Partial-Match Suggestions:',
            '-'.repeat(40),
            "• Header:ITEM No. [Contract] -> 'col_item' (similar to 'ITEM Nº', score 0.85)",
            '',
            'Current Sheet Mappings:',
            '-'.repeat(25),
            "'CONTRACT' -> 'Contract'",
            "'PL' -> 'Packing list'",
            '',
            'Current Header Mappings (2 total):',
            '-'.repeat(25),
            "'ITEM Nº' -> 'col_item'",
            "'PCS' -> 'col_qty_pcs'",
            '',
        ]);
    });

    it('should say so when nothing is unresolved', () => {
        const report = buildMappingReport({ unresolved: [], suggestions: [], table });
        expect(report).toContain('No unrecognized items found.\n');
        expect(report).not.toContain('Partial-Match Suggestions:');
    });
});

describe('formatMappingListing', () => {
    it('should group header variants under their column id', () => {
        const text = formatMappingListing({
            sheets: [{ raw: 'PL', canonical: 'Packing list' }],
            headersByColumn: [{ canonical: 'col_qty_pcs', raws: ['PCS', 'Q.TY'] }],
        });

        expect(text).toBe(
            [
                'Sheet mappings (1):',
                "  'PL' -> 'Packing list'",
                '',
                'Header mappings (1 column(s)):',
                '  col_qty_pcs:',
                "    'PCS'",
                "    'Q.TY'",
            ].join('\n')
        );
    });
});
