import { describe, it, expect } from 'vitest';
import { placeholderOrder, replaceText } from './textReplace';

describe('placeholderOrder', () => {
    it('should put longer tokens first and composite ones last', () => {
        expect(placeholderOrder(['[[DESCRIPTION]]', '{PO}', '{PO_DATE}', '{INV}'])).toEqual([
            '{PO_DATE}',
            '{INV}',
            '{PO}',
            '[[DESCRIPTION]]',
        ]);
    });

    it('should honour an explicit order and ignore unknown entries', () => {
        expect(placeholderOrder(['{A}', '{LONGER}', '[[DESCRIPTION]]'], ['[[DESCRIPTION]]', '{MISSING}', '{A}'])).toEqual([
            '[[DESCRIPTION]]',
            '{A}',
            '{LONGER}',
        ]);
    });
});

describe('replaceText', () => {
    it('should replace every occurrence of a token', () => {
        expect(replaceText('{PO} / {PO}', { '{PO}': 'PO-1' })).toBe('PO-1 / PO-1');
    });

    it('should not let a shorter token eat a longer one', () => {
        expect(replaceText('PO / PO_DATE', { PO: 'X', PO_DATE: '2024-05-02' })).toBe('X / 2024-05-02');
    });

    it('should insert values literally even when they contain other tokens', () => {
        const values = { '[[DESCRIPTION]]': 'Box of {PO}', '{PO}': 'PO-1' };
        expect(replaceText('[[DESCRIPTION]] for {PO}', values)).toBe('Box of {PO} for PO-1');
    });

    it('should not loop on a value that contains its own token', () => {
        expect(replaceText('[[A]]', { '[[A]]': '[[A]][[A]]' })).toBe('[[A]][[A]]');
    });

    it('should follow the explicit order when tokens overlap', () => {
        const values = { PO: 'X', PO_DATE: 'D' };
        expect(replaceText('PO_DATE', values, { order: ['PO'] })).toBe('X_DATE');
        expect(replaceText('PO_DATE', values)).toBe('D');
    });

    it('should leave text without tokens untouched', () => {
        expect(replaceText('TOTAL:', { '{PO}': 'X' })).toBe('TOTAL:');
        expect(replaceText('', { '{PO}': 'X' })).toBe('');
        expect(replaceText('{PO}', {})).toBe('{PO}');
    });
});
