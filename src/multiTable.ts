import * as _ from 'lodash-es';
import { computeFooter, type FooterContext } from './footer';
import { createLogger } from './logger';
import type { CanonicalRow, CellValue, FooterLayout, MultiTableConfig, TableBlock, TableLayout } from './types';
import { keyValue } from './values';

const log = createLogger('MultiTable');

// ============================================
// 1. TABLE LAYOUT
// ============================================

/**
 * Geometry shared by every table on a sheet
 */
export interface TableGeometry {
    startRow: number;
    headerRows: number;
    blankAfterHeader?: boolean;
    blankBeforeFooter?: boolean;
    /** Footer builder for a table whose footer lands on `row`; omitted when the sheet has no footer */
    footer?: (rows: readonly CanonicalRow[], row: number) => FooterLayout;
}

/**
 * Row cursor for one table: header block, optional blank row, data, optional blank row, footer.
 * Also used for single and aggregate sheets, which are one table.
 */
function layoutTable(rows: CanonicalRow[], geometry: TableGeometry): TableLayout {
    const { startRow, headerRows } = geometry;
    const dataStartRow = startRow + headerRows + (geometry.blankAfterHeader ? 1 : 0);
    const dataEndRow = dataStartRow + rows.length - 1;

    if (!geometry.footer) {
        return { startRow, headerRows, dataStartRow, dataEndRow, rows, footer: null, endRow: dataEndRow };
    }

    const footerRow = dataEndRow + 1 + (geometry.blankBeforeFooter ? 1 : 0);
    const footer = geometry.footer(rows, footerRow);
    return { startRow, headerRows, dataStartRow, dataEndRow, rows, footer, endRow: footerRow };
}

// ============================================
// 2. BLOCKS
// ============================================

/**
 * Maximal runs of equal block-key values, in source order
 */
function partitionRows(
    rows: readonly CanonicalRow[],
    blockKey: string
): Array<{ blockKey: CellValue; rows: CanonicalRow[] }> {
    const runs: Array<{ blockKey: CellValue; rows: CanonicalRow[] }> = [];

    _.forEach(rows, (row) => {
        const value = keyValue(row[blockKey]);
        const current = _.last(runs);
        if (current && current.blockKey === value) {
            current.rows.push(row);
        } else {
            runs.push({ blockKey: value, rows: [row] });
        }
    });

    return runs;
}

/**
 * Split rows into consecutive tables, each with its own header, data range and footer.
 * The next block starts `blockSpacing` rows after the previous block's last row.
 */
function splitIntoTables(
    rows: readonly CanonicalRow[],
    config: MultiTableConfig,
    geometry: TableGeometry
): TableBlock[] {
    const blocks: TableBlock[] = [];
    let cursor = geometry.startRow;

    for (const run of partitionRows(rows, config.blockKey)) {
        const table = layoutTable(run.rows, {
            ...geometry,
            startRow: cursor,
            blankAfterHeader: config.blankAfterHeader,
            blankBeforeFooter: config.blankBeforeFooter,
        });
        blocks.push({ ...table, blockKey: run.blockKey });
        cursor = table.endRow + config.blockSpacing;
    }

    log.debug(`Split ${rows.length} row(s) into ${blocks.length} block(s) on '${config.blockKey}'`);
    return blocks;
}

// ============================================
// 3. GRAND TOTAL
// ============================================

/**
 * Footer on the row after the last block, totalling every block.
 * Pallet counts are the sum of the block counts. Null for fewer than two blocks.
 */
function computeGrandTotal(
    blocks: readonly TableBlock[],
    context: Omit<FooterContext, 'row' | 'totalText' | 'palletRows' | 'palletCount'>
): FooterLayout | null {
    const last = _.last(blocks);
    if (!last || blocks.length < 2) return null;

    return computeFooter(_.flatMap(blocks, (block) => block.rows), {
        ...context,
        row: last.endRow + 1,
        totalText: context.config.grandTotalText,
        palletCount: _.sumBy(blocks, (block) => block.footer?.palletCount?.count ?? 0),
    });
}

export { layoutTable, partitionRows, splitIntoTables, computeGrandTotal };
