import { describe, it, expect } from 'vitest';
import { mappingInput, quantityInput, templateInput } from './__fixtures__/shipment';
import { InvalidHeaderSpanError } from './errors';
import { parseMappingConfig, parseQuantityDocument, parseTemplateConfig } from './loaders';
import { MappingResolver } from './mapping';
import { mergeSheet, mergeTemplateConfig } from './merger';
import { toMappingTable } from './schemas';

function setup() {
    return {
        template: parseTemplateConfig(templateInput()),
        quantity: parseQuantityDocument(quantityInput()),
        resolver: new MappingResolver(toMappingTable(parseMappingConfig(mappingInput()))),
    };
}

describe('mergeSheet', () => {
    it('should overlay start row and fonts', () => {
        const { template, quantity, resolver } = setup();
        const { config } = mergeSheet('Contract', template.sheets.Contract, quantity.sheets[0], resolver);

        expect(config.startRow).toBe(12);
        expect(config.fonts).toEqual({
            header: { name: 'Arial', size: 11 },
            data: { name: 'Arial', size: 10 },
        });
        expect(config.sourceSheetName).toBe('CONTRACT');
    });

    it('should replace header texts of resolved columns only', () => {
        const { template, quantity, resolver } = setup();
        const { config } = mergeSheet('Packing list', template.sheets['Packing list'], quantity.sheets[2], resolver);

        expect(config.headers.map((entry) => entry.text)).toEqual([
            'P.O NUMBER',
            'ITEM Nº',
            'Quantity',
            'PCS',
            'N.W (kgs)',
            'Pallet Nº',
        ]);
    });

    it('should never reorder or drop template columns', () => {
        const { template, quantity, resolver } = setup();
        const { config } = mergeSheet('Contract', template.sheets.Contract, quantity.sheets[0], resolver);

        expect(config.headers.map((entry) => entry.id)).toEqual(
            template.sheets.Contract.headers.map((entry) => entry.id)
        );
        expect(config.payload).toEqual(template.sheets.Contract.payload);
        expect([...config.columns]).toEqual([
            ['col_po', 1],
            ['col_item', 2],
            ['col_desc', 3],
            ['col_qty_pcs', 4],
            ['col_unit_price', 5],
            ['col_amount', 6],
        ]);
        expect(config.width).toBe(6);
    });

    it('should reject template headers that share a cell', () => {
        const { quantity, resolver } = setup();
        const raw = templateInput();
        const contract = {
            ...raw.data_mapping.Contract,
            header_to_write: [...raw.data_mapping.Contract.header_to_write, { row: 0, col: 1, text: 'Extra', colspan: 2 }],
        };
        const template = parseTemplateConfig({ ...raw, data_mapping: { ...raw.data_mapping, Contract: contract } });

        expect(() => mergeSheet('Contract', template.sheets.Contract, quantity.sheets[0], resolver)).toThrow(
            InvalidHeaderSpanError
        );
        expect(() => mergeSheet('Contract', template.sheets.Contract, quantity.sheets[0], resolver)).toThrow(
            "Header cells 'ITEM Nº' and 'Extra' overlap"
        );
    });

    it('should leave the template untouched', () => {
        const { template, quantity, resolver } = setup();
        mergeSheet('Contract', template.sheets.Contract, quantity.sheets[0], resolver);

        expect(template.sheets.Contract.startRow).toBe(10);
        expect(template.sheets.Contract.headers[0].text).toBe('P.O Nº');
    });

    it('should keep the template text for unresolved headers and record them', () => {
        const { template, quantity, resolver } = setup();
        const { config } = mergeSheet('Packing list', template.sheets['Packing list'], quantity.sheets[2], resolver);

        expect(config.headerMap.has('Remarks')).toBe(false);
        expect(resolver.unresolved()).toEqual(['Header:Remarks']);
    });

    it('should report resolved headers without a template column', () => {
        const { template, quantity, resolver } = setup();
        const { config, unplacedHeaders } = mergeSheet('Contract', template.sheets.Contract, quantity.sheets[0], resolver);

        expect(unplacedHeaders).toEqual(['Pallet Nº']);
        expect(config.headerMap.get('Pallet Nº')).toBe('col_pallet');
    });
});

describe('mergeTemplateConfig', () => {
    it('should merge every resolvable sheet and skip the rest', () => {
        const { template, quantity, resolver } = setup();
        const merged = mergeTemplateConfig(template, quantity, resolver);

        expect(merged.sheets.map((sheet) => sheet.sheetId)).toEqual(['Contract', 'Packing list']);
        expect(resolver.unresolved()).toEqual(['Sheet:XYZ_SHEET', 'Header:Remarks']);
        expect(merged.warnings).toEqual(["Header 'Pallet Nº' on sheet 'Contract' has no matching template column"]);
    });

    it('should keep template defaults for sheets without data', () => {
        const { template, quantity, resolver } = setup();
        const merged = mergeTemplateConfig(template, quantity, resolver);

        expect(merged.config.sheets.Invoice).toEqual(template.sheets.Invoice);
        expect(merged.config.sheets.Contract.startRow).toBe(12);
        expect(merged.config.payload).toEqual({ customer: 'Test Customer' });
    });

    it('should warn when a second sheet maps to an already filled sheet', () => {
        const { template, resolver } = setup();
        const input = quantityInput();
        const quantity = parseQuantityDocument({
            ...input,
            sheets: [input.sheets[0], { ...input.sheets[0], sheet_name: 'Contract' }],
        });

        const merged = mergeTemplateConfig(template, quantity, resolver);
        expect(merged.sheets).toHaveLength(1);
        expect(merged.warnings).toContain("Sheet 'Contract' maps to 'Contract', already filled by an earlier sheet");
    });
});
