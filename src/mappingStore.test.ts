import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mappingInput } from './__fixtures__/shipment';
import { InvalidMappingSpecError, MalformedConfigError } from './errors';
import { setLogLevel } from './logger';
import { MappingStore, parseMappingSpec } from './mappingStore';

describe('parseMappingSpec', () => {
    it('should split on the first colon and trim both sides', () => {
        expect(parseMappingSpec(' N.W (kgs) : col_net ')).toEqual({ raw: 'N.W (kgs)', canonical: 'col_net' });
        expect(parseMappingSpec('Time:stamp:col_time')).toEqual({ raw: 'Time', canonical: 'stamp:col_time' });
    });

    it('should reject specs without both parts', () => {
        expect(() => parseMappingSpec('col_net')).toThrow(InvalidMappingSpecError);
        expect(() => parseMappingSpec(':col_net')).toThrow(InvalidMappingSpecError);
        expect(() => parseMappingSpec('PCS:  ')).toThrow("Mapping must be written as 'raw:canonical', got 'PCS:  '");
    });
});

describe('MappingStore', () => {
    let dir: string;
    let file: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'docgen-store-'));
        file = path.join(dir, 'mapping_config.json');
        await writeFile(file, JSON.stringify(mappingInput()), 'utf8');
    });

    afterEach(async () => {
        setLogLevel('warn');
        vi.restoreAllMocks();
        await rm(dir, { recursive: true, force: true });
    });

    it('should persist added mappings and keep the rest of the file', async () => {
        const store = await MappingStore.open(file);
        store.addSheetMapping('PACKING', 'Packing list');
        store.addHeaderMapping('G.W (kgs)', 'col_gross');
        await store.save();

        const saved = JSON.parse(await readFile(file, 'utf8'));
        expect(saved.sheet_name_mappings.mappings.PACKING).toBe('Packing list');
        expect(saved.header_text_mappings.mappings['G.W (kgs)']).toBe('col_gross');
        expect(saved.header_text_mappings.mappings.PCS).toBe('col_qty_pcs');
        expect(saved.fallback_strategies.pattern_rules).toEqual({ col_gross: [['gw', 'kg']] });
    });

    it('should leave no temporary file behind', async () => {
        const store = await MappingStore.open(file);
        store.addSheetMapping('PACKING', 'Packing list');
        await store.save();

        expect(await readdir(dir)).toEqual(['mapping_config.json']);
    });

    it('should not write when nothing changed', async () => {
        const before = await readFile(file, 'utf8');
        const store = await MappingStore.open(file);
        await store.save();
        expect(await readFile(file, 'utf8')).toBe(before);
    });

    it('should start empty when the file does not exist', async () => {
        const missing = path.join(dir, 'nested', 'new_mapping.json');
        const store = await MappingStore.open(missing);
        expect(store.list()).toEqual({ sheets: [], headersByColumn: [] });

        store.addHeaderMapping('PCS', 'col_qty_pcs');
        await store.save();
        const saved = JSON.parse(await readFile(missing, 'utf8'));
        expect(saved.header_text_mappings.mappings).toEqual({ PCS: 'col_qty_pcs' });
    });

    it('should refuse to open an invalid file', async () => {
        await writeFile(file, '{ not json', 'utf8');
        await expect(MappingStore.open(file)).rejects.toThrow(MalformedConfigError);
    });

    it('should list sheets by name and headers grouped by column', async () => {
        const store = await MappingStore.open(file);
        store.addHeaderMapping('Q.TY', 'col_qty_pcs');
        const listing = store.list();

        expect(listing.sheets).toEqual([
            { raw: 'CONTRACT', canonical: 'Contract' },
            { raw: 'INV', canonical: 'Invoice' },
            { raw: 'PL', canonical: 'Packing list' },
        ]);
        expect(listing.headersByColumn.find((entry) => entry.canonical === 'col_qty_pcs')).toEqual({
            canonical: 'col_qty_pcs',
            raws: ['PCS', 'Q.TY'],
        });
    });

    it('should warn about column ids outside the col_ convention', async () => {
        setLogLevel('warn');
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const store = await MappingStore.open(file);
        store.addHeaderMapping('Remarks', 'remarks');

        expect(warn).toHaveBeenCalledWith("[MappingStore] Column id 'remarks' does not follow the 'col_*' convention");
        expect(store.snapshot().headerMappings.get('Remarks')).toBe('remarks');
    });
});
