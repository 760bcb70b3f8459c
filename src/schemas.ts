import * as _ from 'lodash-es';
import { z } from 'zod';
import { formatColumnReference, parseColumnReference } from './columns';
import { DEFAULTS } from './constants';
import { DocumentGenerationError } from './errors';
import type {
    FooterConfig,
    MappingTable,
    QuantityDocument,
    ResolvedDocumentConfig,
    SheetTemplate,
    TemplateConfig,
} from './types';

// ============================================
// 1. SHARED
// ============================================

const fontSchema = z.object({
    name: z.string().trim().min(1, 'Font name is required'),
    size: z.number().positive('Font size must be positive'),
});

const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Raw column reference, discriminated into the tagged union while parsing
 */
export const columnReferenceSchema = z
    .union([z.number().int(), z.string().min(1)])
    .transform((value, ctx) => {
        try {
            return parseColumnReference(value);
        } catch (error) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: error instanceof Error ? error.message : String(error),
            });
            return z.NEVER;
        }
    });

// ============================================
// 2. QUANTITY DATA
// ============================================

const quantitySheetSchema = z
    .object({
        sheet_name: z.string().trim().min(1, 'Sheet name is required'),
        start_row: z.number().int().min(1),
        header_font: fontSchema,
        data_font: fontSchema,
        headers: z.array(z.string()),
        rows: z.array(z.record(cellValueSchema)).default([]),
    })
    .transform((sheet) => ({
        sheetName: sheet.sheet_name,
        startRow: sheet.start_row,
        headers: sheet.headers,
        rows: sheet.rows,
        headerFont: sheet.header_font,
        dataFont: sheet.data_font,
    }));

export const quantityDocumentSchema = z
    .object({
        file_path: z.string().trim().min(1),
        timestamp: z.string().trim().min(1),
        sheets: z.array(quantitySheetSchema).min(1, 'At least one sheet is required'),
    })
    .transform((doc): QuantityDocument => ({
        filePath: doc.file_path,
        timestamp: doc.timestamp,
        sheets: doc.sheets,
    }));

// ============================================
// 3. TEMPLATE CONFIG
// ============================================

const headerEntrySchema = z.object({
    row: z.number().int().min(0),
    col: z.number().int().min(0),
    text: z.string(),
    id: z.string().min(1).optional(),
    rowspan: z.number().int().min(1).optional(),
    colspan: z.number().int().min(1).optional(),
});

const mergeRuleSchema = z
    .object({
        start_column_id: columnReferenceSchema,
        colspan: z.number().int().min(1),
    })
    .transform((rule) => ({ startColumn: rule.start_column_id, colspan: rule.colspan }));

const footerSchema = z
    .object({
        total_text: z.string().default(DEFAULTS.TOTAL_TEXT),
        total_text_column_id: columnReferenceSchema.optional(),
        pallet_count_column_id: columnReferenceSchema.optional(),
        sum_column_ids: z.array(z.string().min(1)).default([]),
        pallet_count: z
            .object({
                mode: z.enum(['distinct', 'precomputed']),
                column_id: z.string().min(1),
            })
            .optional(),
        decimal_places: z.number().int().min(0).default(DEFAULTS.DECIMAL_PLACES),
        number_format: z.string().optional(),
        grand_total_text: z.string().default(DEFAULTS.GRAND_TOTAL_TEXT),
        merge_rules: z.array(mergeRuleSchema).default([]),
    })
    .passthrough()
    .transform((footer): FooterConfig => {
        const {
            total_text,
            total_text_column_id,
            pallet_count_column_id,
            sum_column_ids,
            pallet_count,
            decimal_places,
            number_format,
            grand_total_text,
            merge_rules,
            ...payload
        } = footer;
        return {
            totalText: total_text,
            totalTextColumn: total_text_column_id,
            palletCountColumn: pallet_count_column_id,
            sumColumnIds: sum_column_ids,
            palletCount: pallet_count && { mode: pallet_count.mode, columnId: pallet_count.column_id },
            decimalPlaces: decimal_places,
            numberFormat: number_format,
            grandTotalText: grand_total_text,
            mergeRules: merge_rules,
            payload,
        };
    });

const sheetTemplateSchema = z
    .object({
        start_row: z.number().int().min(1),
        layout: z.enum(['single', 'aggregate', 'multi_table']).default('single'),
        header_to_write: z.array(headerEntrySchema).min(1, 'header_to_write needs at least one entry'),
        column_count: z.number().int().min(1).optional(),
        fonts: z
            .object({
                header_font: fontSchema.optional(),
                data_font: fontSchema.optional(),
            })
            .optional(),
        aggregation: z
            .object({
                group_by: z.array(z.string().min(1)).min(1),
                sum_columns: z.array(z.string().min(1)).default([]),
                decimal_places: z.number().int().min(0).default(DEFAULTS.DECIMAL_PLACES),
            })
            .optional(),
        multi_table: z
            .object({
                block_key: z.string().min(1),
                block_spacing: z.number().int().min(1).default(DEFAULTS.BLOCK_SPACING),
                add_blank_after_header: z.boolean().default(false),
                add_blank_before_footer: z.boolean().default(false),
            })
            .optional(),
        footer_configurations: footerSchema.optional(),
    })
    .passthrough()
    .superRefine((sheet, ctx) => {
        if (sheet.layout === 'aggregate' && !sheet.aggregation) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "layout 'aggregate' requires an aggregation section" });
        }
        if (sheet.layout === 'multi_table' && !sheet.multi_table) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "layout 'multi_table' requires a multi_table section" });
        }
    })
    .transform((sheet): SheetTemplate => {
        const {
            start_row,
            layout,
            header_to_write,
            column_count,
            fonts,
            aggregation,
            multi_table,
            footer_configurations,
            ...payload
        } = sheet;
        return {
            startRow: start_row,
            layout,
            headers: header_to_write,
            columnCount: column_count,
            fonts: fonts && { header: fonts.header_font, data: fonts.data_font },
            aggregation: aggregation && {
                groupBy: aggregation.group_by,
                sumColumns: aggregation.sum_columns,
                decimalPlaces: aggregation.decimal_places,
            },
            multiTable: multi_table && {
                blockKey: multi_table.block_key,
                blockSpacing: multi_table.block_spacing,
                blankAfterHeader: multi_table.add_blank_after_header,
                blankBeforeFooter: multi_table.add_blank_before_footer,
            },
            footer: footer_configurations,
            payload,
        };
    });

export const templateConfigSchema = z
    .object({
        sheets_to_process: z.array(z.string()).optional(),
        data_mapping: z.record(sheetTemplateSchema),
        placeholder_order: z.array(z.string().min(1)).optional(),
    })
    .passthrough()
    .superRefine((config, ctx) => {
        _.forEach(config.sheets_to_process, (name) => {
            if (!_.has(config.data_mapping, name)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['sheets_to_process'],
                    message: `Sheet '${name}' in sheets_to_process missing from data_mapping`,
                });
            }
        });
    })
    .transform((config): TemplateConfig => {
        const { sheets_to_process, data_mapping, placeholder_order, ...payload } = config;
        return {
            sheetsToProcess: sheets_to_process ?? _.keys(data_mapping),
            sheets: data_mapping,
            placeholderOrder: placeholder_order,
            payload,
        };
    });

// ============================================
// 4. MAPPING CONFIG
// ============================================

const mappingSectionSchema = z
    .object({ mappings: z.record(z.string().min(1)).default({}) })
    .passthrough();

/**
 * Mapping file as stored on disk; unknown keys survive a load/save cycle
 */
export const mappingConfigSchema = z
    .object({
        sheet_name_mappings: mappingSectionSchema.default({}),
        header_text_mappings: mappingSectionSchema.default({}),
        fallback_strategies: z
            .object({
                case_insensitive_matching: z.boolean().default(true),
                partial_match_threshold: z.number().min(0).max(1).default(DEFAULTS.PARTIAL_MATCH_THRESHOLD),
                enable_pattern_matching: z.boolean().default(true),
                pattern_rules: z.record(z.array(z.array(z.string().min(1)).min(1))).default({}),
            })
            .passthrough()
            .default({}),
    })
    .passthrough();

export type MappingConfigFile = z.infer<typeof mappingConfigSchema>;

export function toMappingTable(config: MappingConfigFile): MappingTable {
    const fallback = config.fallback_strategies;
    return {
        sheetMappings: new Map(Object.entries(config.sheet_name_mappings.mappings)),
        headerMappings: new Map(Object.entries(config.header_text_mappings.mappings)),
        fallback: {
            caseInsensitive: fallback.case_insensitive_matching,
            partialMatchThreshold: fallback.partial_match_threshold,
            patternMatching: fallback.enable_pattern_matching,
            patternRules: fallback.pattern_rules,
        },
    };
}

// ============================================
// 5. ISSUE FORMATTING
// ============================================

export function formatIssues(error: z.ZodError): string {
    return _.map(error.issues, (issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
    }).join('; ');
}

/**
 * Parse with a schema, turning zod issues into the caller's typed error
 */
export function parseWith<T extends z.ZodTypeAny>(
    schema: T,
    input: unknown,
    toError: (issues: z.ZodIssue[], detail: string, cause: z.ZodError) => DocumentGenerationError
): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw toError(result.error.issues, formatIssues(result.error), result.error);
    }
    return result.data;
}

// ============================================
// 6. SERIALIZATION
// ============================================

function serializeFooter(footer: FooterConfig): Record<string, unknown> {
    return _.omitBy(
        {
            ...footer.payload,
            total_text: footer.totalText,
            total_text_column_id: footer.totalTextColumn && formatColumnReference(footer.totalTextColumn),
            pallet_count_column_id: footer.palletCountColumn && formatColumnReference(footer.palletCountColumn),
            sum_column_ids: footer.sumColumnIds,
            pallet_count: footer.palletCount && {
                mode: footer.palletCount.mode,
                column_id: footer.palletCount.columnId,
            },
            decimal_places: footer.decimalPlaces,
            number_format: footer.numberFormat,
            grand_total_text: footer.grandTotalText,
            merge_rules: _.map(footer.mergeRules, (rule) => ({
                start_column_id: formatColumnReference(rule.startColumn),
                colspan: rule.colspan,
            })),
        },
        _.isUndefined
    );
}

export function serializeSheetTemplate(sheet: SheetTemplate): Record<string, unknown> {
    return _.omitBy(
        {
            ...sheet.payload,
            start_row: sheet.startRow,
            layout: sheet.layout,
            header_to_write: _.map(sheet.headers, (entry) => _.omitBy({ ...entry }, _.isUndefined)),
            column_count: sheet.columnCount,
            fonts: sheet.fonts && _.omitBy({ header_font: sheet.fonts.header, data_font: sheet.fonts.data }, _.isUndefined),
            aggregation: sheet.aggregation && {
                group_by: sheet.aggregation.groupBy,
                sum_columns: sheet.aggregation.sumColumns,
                decimal_places: sheet.aggregation.decimalPlaces,
            },
            multi_table: sheet.multiTable && {
                block_key: sheet.multiTable.blockKey,
                block_spacing: sheet.multiTable.blockSpacing,
                add_blank_after_header: sheet.multiTable.blankAfterHeader,
                add_blank_before_footer: sheet.multiTable.blankBeforeFooter,
            },
            footer_configurations: sheet.footer && serializeFooter(sheet.footer),
        },
        _.isUndefined
    );
}

/**
 * ResolvedDocumentConfig back in the template file's shape
 */
export function serializeDocumentConfig(config: ResolvedDocumentConfig): Record<string, unknown> {
    return _.omitBy(
        {
            ...config.payload,
            sheets_to_process: config.sheetsToProcess,
            placeholder_order: config.placeholderOrder,
            data_mapping: _.mapValues(config.sheets, serializeSheetTemplate),
            metadata: {
                source_file: config.metadata.sourceFile,
                source_timestamp: config.metadata.sourceTimestamp,
                generated_at: config.metadata.generatedAt,
            },
        },
        _.isUndefined
    );
}
