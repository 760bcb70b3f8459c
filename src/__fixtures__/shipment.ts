/**
 * Raw inputs in their on-disk JSON shape, shared by the pipeline tests
 */

export function quantityInput() {
    return {
        file_path: 'data/shipment_01.xlsx',
        timestamp: '2024-05-02T08:30:00',
        sheets: [
            {
                sheet_name: 'CONTRACT',
                start_row: 12,
                header_font: { name: 'Arial', size: 11 },
                data_font: { name: 'Arial', size: 10 },
                headers: ['P.O NUMBER', 'ITEM Nº', 'DESCRIPTION', 'PCS', 'Unit price', 'AMOUNT', 'Pallet Nº'],
                rows: [
                    { 'P.O NUMBER': 'PO-1', 'ITEM Nº': 'A1', DESCRIPTION: 'Leather', PCS: 10, 'Unit price': 2, AMOUNT: 20, 'Pallet Nº': 'P1' },
                    { 'P.O NUMBER': 'PO-1', 'ITEM Nº': 'A1', DESCRIPTION: 'Leather', PCS: '5', 'Unit price': 2, AMOUNT: 10.5, 'Pallet Nº': 'P2' },
                    { 'P.O NUMBER': 'PO-2', 'ITEM Nº': 'B1', DESCRIPTION: 'Suede', PCS: 3, 'Unit price': 4, AMOUNT: 12, 'Pallet Nº': 'P2' },
                    { 'P.O NUMBER': '', 'ITEM Nº': 'A1', DESCRIPTION: 'Leather', PCS: 1, 'Unit price': 2, AMOUNT: 2, 'Pallet Nº': 'P3' },
                ],
            },
            {
                sheet_name: 'XYZ_SHEET',
                start_row: 1,
                header_font: { name: 'Arial', size: 11 },
                data_font: { name: 'Arial', size: 10 },
                headers: ['foo'],
                rows: [],
            },
            {
                sheet_name: 'PL',
                start_row: 8,
                header_font: { name: 'Times New Roman', size: 12 },
                data_font: { name: 'Times New Roman', size: 10 },
                headers: ['P.O NUMBER', 'ITEM Nº', 'PCS', 'N.W (kgs)', 'Pallet Nº', 'Remarks'],
                rows: [
                    { 'P.O NUMBER': 'PO-1', 'ITEM Nº': 'A1', PCS: 10, 'N.W (kgs)': 5.25, 'Pallet Nº': 'P1' },
                    { 'P.O NUMBER': 'PO-1', 'ITEM Nº': 'A2', PCS: 4, 'N.W (kgs)': 2.5, 'Pallet Nº': 'P1' },
                    { 'P.O NUMBER': 'PO-2', 'ITEM Nº': 'B1', PCS: 3, 'N.W (kgs)': 1.15, 'Pallet Nº': 'P2' },
                    { 'P.O NUMBER': 'PO-1', 'ITEM Nº': 'A3', PCS: 1, 'N.W (kgs)': 0.5, 'Pallet Nº': 'P3' },
                ],
            },
        ],
    };
}

export function templateInput() {
    return {
        sheets_to_process: ['Contract', 'Invoice', 'Packing list'],
        data_mapping: {
            Contract: {
                start_row: 10,
                layout: 'aggregate',
                header_to_write: [
                    { row: 0, col: 0, text: 'P.O Nº', id: 'col_po' },
                    { row: 0, col: 1, text: 'ITEM Nº', id: 'col_item' },
                    { row: 0, col: 2, text: 'Description', id: 'col_desc' },
                    { row: 0, col: 3, text: 'Quantity', id: 'col_qty_pcs' },
                    { row: 0, col: 4, text: 'Unit price (USD)', id: 'col_unit_price' },
                    { row: 0, col: 5, text: 'Amount (USD)', id: 'col_amount' },
                ],
                aggregation: {
                    group_by: ['col_po', 'col_item'],
                    sum_columns: ['col_qty_pcs', 'col_amount'],
                },
                footer_configurations: {
                    total_text: 'TOTAL:',
                    total_text_column_id: 0,
                    pallet_count_column_id: 'col_desc',
                    pallet_count: { mode: 'distinct', column_id: 'col_pallet' },
                    sum_column_ids: ['col_qty_pcs', 'col_amount'],
                    number_format: '#,##0.00',
                    merge_rules: [{ start_column_id: 'col_po', colspan: 2 }],
                    style: { bold: true },
                },
                styling: { row_height: 30 },
                business_logic: { amount_formula: '{col_qty_pcs}*{col_unit_price}' },
            },
            Invoice: {
                start_row: 3,
                header_to_write: [
                    { row: 0, col: 0, text: 'ITEM Nº', id: 'col_item' },
                    { row: 0, col: 1, text: 'Amount', id: 'col_amount' },
                ],
            },
            'Packing list': {
                start_row: 5,
                layout: 'multi_table',
                header_to_write: [
                    { row: 0, col: 0, text: 'P.O Nº', id: 'col_po', rowspan: 2 },
                    { row: 0, col: 1, text: 'ITEM Nº', id: 'col_item', rowspan: 2 },
                    { row: 0, col: 2, text: 'Quantity', colspan: 2 },
                    { row: 1, col: 2, text: 'PCS', id: 'col_qty_pcs' },
                    { row: 1, col: 3, text: 'N.W', id: 'col_net' },
                    { row: 0, col: 4, text: 'Pallet', id: 'col_pallet', rowspan: 2 },
                ],
                multi_table: { block_key: 'col_po', block_spacing: 2 },
                footer_configurations: {
                    total_text_column_id: 'col_item',
                    pallet_count_column_id: '4',
                    pallet_count: { mode: 'distinct', column_id: 'col_pallet' },
                    sum_column_ids: ['col_qty_pcs', 'col_net'],
                },
            },
        },
        customer: 'Test Customer',
    };
}

export function mappingInput() {
    return {
        sheet_name_mappings: {
            mappings: { CONTRACT: 'Contract', INV: 'Invoice', PL: 'Packing list' },
        },
        header_text_mappings: {
            mappings: {
                'P.O NUMBER': 'col_po',
                'ITEM Nº': 'col_item',
                DESCRIPTION: 'col_desc',
                PCS: 'col_qty_pcs',
                'Unit price': 'col_unit_price',
                AMOUNT: 'col_amount',
                'Pallet Nº': 'col_pallet',
                'N.W (kgs)': 'col_net',
            },
        },
        fallback_strategies: {
            pattern_rules: { col_gross: [['gw', 'kg']] },
        },
    };
}
