import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import * as _ from 'lodash-es';
import { aggregate, hasGroupKey } from './aggregation';
import { buildColumnTable, headerHeight, sheetWidth, validateHeaderSpans } from './columns';
import { DEFAULTS } from './constants';
import { DocumentGenerationError } from './errors';
import { computeFooter, validateFooterConfig } from './footer';
import { loadMappingTable, loadQuantityDocument, loadTemplateConfig } from './loaders';
import { createLogger } from './logger';
import { MappingResolver } from './mapping';
import { mergeTemplateConfig } from './merger';
import { computeGrandTotal, layoutTable, splitIntoTables, type TableGeometry } from './multiTable';
import { buildMappingReport } from './report';
import { serializeDocumentConfig } from './schemas';
import { replaceText, type ReplaceOptions } from './textReplace';
import type {
    AggregationWarning,
    CanonicalRow,
    GeneratedSheet,
    GenerateOptions,
    GenerationResult,
    MappingTable,
    QuantityDocument,
    RawRow,
    ResolvedSheetConfig,
    SheetLayout,
    SheetTemplate,
    TemplateConfig,
} from './types';
import { renderDocumentToBuffer } from './writer';

const log = createLogger('Generator');

// ============================================
// 1. ROW & TEXT PREPARATION
// ============================================

/**
 * Re-key raw rows by canonical column id. Columns without a resolved header are dropped;
 * when two raw headers share an id, the first one wins.
 */
function canonicalizeRows(rows: readonly RawRow[], headerMap: ReadonlyMap<string, string>): CanonicalRow[] {
    return _.map(rows, (row) => {
        const canonical: CanonicalRow = {};
        _.forEach(_.toPairs(row), ([rawHeader, value]) => {
            const columnId = headerMap.get(rawHeader);
            if (columnId !== undefined && !_.has(canonical, columnId)) {
                canonical[columnId] = value;
            }
        });
        return canonical;
    });
}

/**
 * Substitute placeholders in header texts and footer labels of a resolved sheet
 */
function applyPlaceholders(
    config: ResolvedSheetConfig,
    placeholders: Readonly<Record<string, string>>,
    options: ReplaceOptions = {}
): void {
    if (_.isEmpty(placeholders)) return;

    _.forEach(config.headers, (entry) => {
        entry.text = replaceText(entry.text, placeholders, options);
    });
    if (config.footer) {
        config.footer.totalText = replaceText(config.footer.totalText, placeholders, options);
        config.footer.grandTotalText = replaceText(config.footer.grandTotalText, placeholders, options);
    }
}

// ============================================
// 2. TEMPLATE CHECKS
// ============================================

/**
 * Check header spans and footer references of every template sheet, laid out or not
 */
function validateTemplateSheets(sheets: Readonly<Record<string, SheetTemplate>>): void {
    _.forEach(sheets, (sheet, sheetId) => {
        const width = sheetWidth(sheet.headers, sheet.columnCount);
        validateHeaderSpans(sheet.headers, width, sheetId);
        if (sheet.footer) {
            validateFooterConfig(sheet.footer, { sheet: sheetId, width, columns: buildColumnTable(sheet.headers) });
        }
    });
}

// ============================================
// 3. SHEET LAYOUT
// ============================================

function footerBuilder(
    config: ResolvedSheetConfig,
    palletRows?: readonly CanonicalRow[]
): TableGeometry['footer'] {
    const footer = config.footer;
    if (!footer) return undefined;

    return (rows, row) =>
        computeFooter(rows, {
            sheet: config.sheetId,
            row,
            width: config.width,
            columns: config.columns,
            config: footer,
            palletRows,
        });
}

function layoutSheet(config: ResolvedSheetConfig, rows: CanonicalRow[]): SheetLayout {
    const geometry: TableGeometry = {
        startRow: config.startRow,
        headerRows: headerHeight(config.headers),
        footer: footerBuilder(config),
    };

    switch (config.layout) {
        case 'single':
            return { kind: 'single', table: layoutTable(rows, geometry) };

        case 'aggregate': {
            const settings = config.aggregation;
            if (!settings) {
                throw new DocumentGenerationError('aggregation', config.sheetId, 'No aggregation settings');
            }
            const aggregation = aggregate(rows, settings);
            const palletRows = _.filter(rows, (row) => hasGroupKey(row, settings.groupBy));
            const table = layoutTable(aggregation.rows, { ...geometry, footer: footerBuilder(config, palletRows) });
            return { kind: 'aggregate', table, aggregation };
        }

        case 'multi_table': {
            const settings = config.multiTable;
            if (!settings) {
                throw new DocumentGenerationError('multi_table', config.sheetId, 'No multi_table settings');
            }
            const blocks = splitIntoTables(rows, settings, geometry);
            const grandTotal = config.footer
                ? computeGrandTotal(blocks, {
                      sheet: config.sheetId,
                      width: config.width,
                      columns: config.columns,
                      config: config.footer,
                  })
                : null;
            return { kind: 'multi_table', blocks, grandTotal };
        }
    }
}

// ============================================
// 4. PIPELINE
// ============================================

export interface GenerationInputs {
    quantity: QuantityDocument;
    template: TemplateConfig;
    mapping: MappingTable;
}

/**
 * Run every stage on loaded inputs. Throws on the first fatal error; recoverable
 * issues are collected in the report.
 */
function generateDocument(inputs: GenerationInputs, options: GenerateOptions = {}): GenerationResult {
    const { quantity, template, mapping } = inputs;
    const resolver = new MappingResolver(mapping, { strict: options.strict });
    const merged = mergeTemplateConfig(template, quantity, resolver);
    validateTemplateSheets(merged.config.sheets);

    const warnings = [...merged.warnings];
    const aggregationWarnings: Record<string, AggregationWarning[]> = {};
    const sheets: GeneratedSheet[] = [];

    for (const config of merged.sheets) {
        if (!template.sheetsToProcess.includes(config.sheetId)) {
            warnings.push(`Sheet '${config.sheetId}' is not listed in sheets_to_process; skipped`);
            continue;
        }

        const source = _.find(quantity.sheets, (sheet) => sheet.sheetName === config.sourceSheetName);
        const rows = canonicalizeRows(source?.rows ?? [], config.headerMap);

        applyPlaceholders(config, options.placeholders ?? {}, { order: template.placeholderOrder });
        const layout = layoutSheet(config, rows);

        if (layout.kind === 'aggregate' && layout.aggregation.warnings.length > 0) {
            aggregationWarnings[config.sheetId] = layout.aggregation.warnings;
        }

        log.child(config.sheetId).info(`Laid out ${config.layout} sheet from ${rows.length} row(s)`);
        sheets.push({ config, layout });
    }

    const now = options.now ?? (() => new Date());

    return {
        config: {
            ...merged.config,
            metadata: {
                sourceFile: quantity.filePath,
                sourceTimestamp: quantity.timestamp,
                generatedAt: now().toISOString(),
            },
        },
        sheets,
        report: {
            resolutions: resolver.report(),
            unresolved: resolver.unresolved(),
            suggestions: resolver.suggestions(),
            aggregationWarnings,
            warnings,
        },
    };
}

// ============================================
// 5. FILE-BASED RUN
// ============================================

export interface RunOptions extends GenerateOptions {
    quantityPath: string;
    templatePath: string;
    mappingPath: string;
    /** Defaults to `<quantity file stem>_config.json` next to the quantity file */
    outputPath?: string;
    /** Validate and resolve only; write nothing */
    validateOnly?: boolean;
    /** Also write the rendered workbook here */
    xlsxPath?: string;
}

export interface RunResult {
    result: GenerationResult;
    quantity: QuantityDocument;
    configPath: string | null;
    reportPath: string | null;
    workbookPath: string | null;
}

function defaultOutputPath(quantityPath: string): string {
    const { dir, name } = path.parse(quantityPath);
    return path.join(dir, `${name}${DEFAULTS.CONFIG_SUFFIX}`);
}

function reportPathFor(outputPath: string): string {
    const { dir, name } = path.parse(outputPath);
    return path.join(dir, `${name}${DEFAULTS.REPORT_SUFFIX}`);
}

/**
 * Load inputs, generate, render the workbook when asked, then write the resolved config,
 * the mapping report when anything went unresolved, and the workbook.
 * Every stage runs before the first file is written, so a failure leaves nothing behind.
 */
async function runGeneration(options: RunOptions): Promise<RunResult> {
    const [quantity, template, mapping] = await Promise.all([
        loadQuantityDocument(options.quantityPath),
        loadTemplateConfig(options.templatePath),
        loadMappingTable(options.mappingPath),
    ]);

    const result = generateDocument({ quantity, template, mapping }, options);

    if (options.validateOnly) {
        log.info('Validation finished; no files written');
        return { result, quantity, configPath: null, reportPath: null, workbookPath: null };
    }

    const workbook = options.xlsxPath
        ? await renderDocumentToBuffer(result, { placeholders: options.placeholders })
        : null;

    const configPath = options.outputPath ?? defaultOutputPath(options.quantityPath);
    const reportPath = result.report.unresolved.length > 0 ? reportPathFor(configPath) : null;
    const report = reportPath
        ? buildMappingReport({
              unresolved: result.report.unresolved,
              suggestions: result.report.suggestions,
              table: mapping,
          })
        : null;

    await mkdir(path.dirname(configPath), { recursive: true });
    await writeFile(configPath, `${JSON.stringify(serializeDocumentConfig(result.config), null, 2)}\n`, 'utf8');
    log.info(`Wrote ${configPath}`);

    if (reportPath && report) {
        await writeFile(reportPath, report, 'utf8');
        log.warn(`${result.report.unresolved.length} unresolved item(s); see ${reportPath}`);
    }

    let workbookPath: string | null = null;
    if (options.xlsxPath && workbook) {
        workbookPath = options.xlsxPath;
        await mkdir(path.dirname(workbookPath), { recursive: true });
        await writeFile(workbookPath, workbook);
        log.info(`Wrote ${workbookPath}`);
    }

    return { result, quantity, configPath, reportPath, workbookPath };
}

export {
    canonicalizeRows,
    applyPlaceholders,
    validateTemplateSheets,
    layoutSheet,
    generateDocument,
    runGeneration,
    reportPathFor,
};
