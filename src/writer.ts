import ExcelJS from 'exceljs';
import * as _ from 'lodash-es';
import { toRangeAddress } from './columns';
import { DocumentGenerationError } from './errors';
import { createLogger } from './logger';
import { replaceText, type ReplaceOptions } from './textReplace';
import type {
    FontDescriptor,
    FooterLayout,
    GeneratedSheet,
    GenerationResult,
    ResolvedSheetConfig,
    TableLayout,
} from './types';

const log = createLogger('Writer');

export interface WriteOptions {
    /** Placeholder token → text, substituted in every pre-existing template cell */
    placeholders?: Record<string, string>;
}

// ============================================
// 1. CELL HELPERS
// ============================================

function toFont(font: FontDescriptor | undefined, bold = false): Partial<ExcelJS.Font> | undefined {
    if (!font) return bold ? { bold } : undefined;
    return { name: font.name, size: font.size, bold };
}

/**
 * Substitute placeholders in a template cell, including rich-text fragments
 */
function renderTemplateCell(
    value: ExcelJS.CellValue,
    placeholders: Record<string, string>,
    options: ReplaceOptions = {}
): ExcelJS.CellValue {
    if (_.isString(value)) {
        return replaceText(value, placeholders, options);
    }

    if (typeof value === 'object' && value !== null && 'richText' in value) {
        return {
            richText: _.map(value.richText, (fragment) => ({
                ...fragment,
                text: replaceText(fragment.text, placeholders, options),
            })),
        };
    }

    return value;
}

function mergeSafely(worksheet: ExcelJS.Worksheet, range: string, sheet: string): void {
    try {
        worksheet.mergeCells(range);
    } catch (error) {
        throw new DocumentGenerationError('write', sheet, `Cannot merge ${range}`, { cause: error });
    }
}

// ============================================
// 2. TABLE WRITING
// ============================================

function writeHeader(worksheet: ExcelJS.Worksheet, config: ResolvedSheetConfig, startRow: number): void {
    const font = toFont(config.fonts?.header, true);

    _.forEach(config.headers, (entry) => {
        const row = startRow + entry.row;
        const column = entry.col + 1;
        const cell = worksheet.getCell(row, column);
        cell.value = entry.text;
        if (font) cell.font = font;
        cell.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true };

        const rowspan = entry.rowspan ?? 1;
        const colspan = entry.colspan ?? 1;
        if (rowspan > 1 || colspan > 1) {
            mergeSafely(
                worksheet,
                toRangeAddress(row, column, column + colspan - 1, row + rowspan - 1),
                config.sheetId
            );
        }
    });
}

function writeFooter(worksheet: ExcelJS.Worksheet, config: ResolvedSheetConfig, footer: FooterLayout): void {
    const font = toFont(config.fonts?.data, true);
    const put = (column: number, value: ExcelJS.CellValue, numFmt?: string) => {
        const cell = worksheet.getCell(footer.row, column);
        cell.value = value;
        if (font) cell.font = font;
        if (numFmt) cell.numFmt = numFmt;
    };

    if (footer.totalText) put(footer.totalText.column, footer.totalText.text);
    if (footer.palletCount) put(footer.palletCount.column, footer.palletCount.text);
    _.forEach(footer.totals, (total) => put(total.column, total.value, total.numberFormat));

    _.forEach(footer.merges, (span) =>
        mergeSafely(worksheet, toRangeAddress(span.row, span.startColumn, span.endColumn), config.sheetId)
    );
}

function writeTable(worksheet: ExcelJS.Worksheet, config: ResolvedSheetConfig, table: TableLayout): void {
    writeHeader(worksheet, config, table.startRow);

    const font = toFont(config.fonts?.data);
    _.forEach(table.rows, (row, i) => {
        const rowNumber = table.dataStartRow + i;
        for (const [columnId, column] of config.columns) {
            const value = row[columnId];
            if (value === undefined || value === null) continue;
            const cell = worksheet.getCell(rowNumber, column);
            cell.value = value;
            if (font) cell.font = font;
        }
    });

    if (table.footer) writeFooter(worksheet, config, table.footer);
}

function writeSheet(worksheet: ExcelJS.Worksheet, sheet: GeneratedSheet): void {
    const { config, layout } = sheet;

    switch (layout.kind) {
        case 'single':
        case 'aggregate':
            writeTable(worksheet, config, layout.table);
            break;
        case 'multi_table':
            _.forEach(layout.blocks, (block) => writeTable(worksheet, config, block));
            if (layout.grandTotal) writeFooter(worksheet, config, layout.grandTotal);
            break;
    }
}

// ============================================
// 3. MAIN ENGINE
// ============================================

/**
 * Fill a workbook with a generation result. Sheets missing from the workbook are added;
 * cells already in the template get their placeholders substituted first.
 */
function processWorkbook(workbook: ExcelJS.Workbook, result: GenerationResult, options: WriteOptions = {}): void {
    const placeholders = options.placeholders ?? {};
    const order = result.config.placeholderOrder;

    _.forEach(result.sheets, (sheet) => {
        const worksheet = workbook.getWorksheet(sheet.config.sheetId) ?? workbook.addWorksheet(sheet.config.sheetId);

        if (!_.isEmpty(placeholders)) {
            worksheet.eachRow((row) => {
                row.eachCell((cell) => {
                    cell.value = renderTemplateCell(cell.value, placeholders, { order });
                });
            });
        }

        writeSheet(worksheet, sheet);
        log.debug(`Wrote sheet '${sheet.config.sheetId}'`);
    });
}

/**
 * Render a fresh workbook to .xlsx bytes without touching the disk
 */
async function renderDocumentToBuffer(result: GenerationResult, options: WriteOptions = {}): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();
    processWorkbook(workbook, result, options);

    const outputBuffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(outputBuffer);
}

/**
 * Render onto a template workbook held in memory
 */
async function renderDocumentFromBuffer(
    templateBuffer: ArrayBuffer | Uint8Array,
    result: GenerationResult,
    options: WriteOptions = {}
): Promise<Buffer> {
    const workbook = new ExcelJS.Workbook();

    let bufferToLoad: ArrayBuffer;
    if (templateBuffer instanceof ArrayBuffer) {
        bufferToLoad = templateBuffer;
    } else {
        bufferToLoad = new ArrayBuffer(templateBuffer.byteLength);
        new Uint8Array(bufferToLoad).set(templateBuffer);
    }

    await workbook.xlsx.load(bufferToLoad);
    processWorkbook(workbook, result, options);

    const outputBuffer = await workbook.xlsx.writeBuffer();
    return Buffer.from(outputBuffer);
}

export { renderTemplateCell, processWorkbook, renderDocumentToBuffer, renderDocumentFromBuffer };
