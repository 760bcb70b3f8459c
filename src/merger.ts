import * as _ from 'lodash-es';
import { buildColumnTable, sheetWidth, validateHeaderSpans } from './columns';
import { createLogger } from './logger';
import type { MappingResolver } from './mapping';
import type {
    QuantityDocument,
    QuantitySheet,
    ResolvedDocumentConfig,
    ResolvedSheetConfig,
    SheetTemplate,
    TemplateConfig,
} from './types';

const log = createLogger('Merger');

export interface SheetMergeResult {
    config: ResolvedSheetConfig;
    /** Headers that resolved to a column id the template never declares */
    unplacedHeaders: string[];
}

/**
 * Overlay one extracted sheet onto its template entry.
 * Only display attributes change: column order, entries and payload stay as the template has them.
 */
export function mergeSheet(
    sheetId: string,
    template: SheetTemplate,
    sheet: QuantitySheet,
    resolver: MappingResolver
): SheetMergeResult {
    const merged = _.cloneDeep(template);
    const headerMap = new Map<string, string>();
    const relabelled = new Set<string>();
    const unplacedHeaders: string[] = [];
    const declaredIds = new Set(_.compact(_.map(merged.headers, 'id')));

    for (const rawHeader of sheet.headers) {
        if (!_.trim(rawHeader)) continue;

        const resolution = resolver.resolveHeader(rawHeader, sheetId);
        if (!resolution.resolved) continue;

        const columnId = resolution.canonical;
        if (!headerMap.has(rawHeader)) headerMap.set(rawHeader, columnId);

        if (!declaredIds.has(columnId)) {
            unplacedHeaders.push(rawHeader);
            log.debug(`'${rawHeader}' → ${columnId} has no column on sheet '${sheetId}'`);
            continue;
        }

        if (relabelled.has(columnId)) continue;
        relabelled.add(columnId);

        _.forEach(merged.headers, (entry) => {
            if (entry.id === columnId) entry.text = rawHeader;
        });
    }

    merged.startRow = sheet.startRow;
    merged.fonts = { header: { ...sheet.headerFont }, data: { ...sheet.dataFont } };

    const width = sheetWidth(merged.headers, merged.columnCount);
    validateHeaderSpans(merged.headers, width, sheetId);

    return {
        config: {
            ...merged,
            sheetId,
            sourceSheetName: sheet.sheetName,
            width,
            columns: buildColumnTable(merged.headers),
            headerMap,
        },
        unplacedHeaders,
    };
}

export interface TemplateMergeResult {
    sheets: ResolvedSheetConfig[];
    config: Omit<ResolvedDocumentConfig, 'metadata'>;
    warnings: string[];
}

/**
 * Merge every resolvable sheet of a quantity document into the template.
 * Sheets the data does not mention keep their template defaults.
 */
export function mergeTemplateConfig(
    template: TemplateConfig,
    quantity: QuantityDocument,
    resolver: MappingResolver
): TemplateMergeResult {
    const resolved: ResolvedSheetConfig[] = [];
    const warnings: string[] = [];
    const sheets: Record<string, SheetTemplate> = _.mapValues(template.sheets, (sheet) => _.cloneDeep(sheet));

    for (const sheet of quantity.sheets) {
        const resolution = resolver.resolveSheet(sheet.sheetName);
        if (!resolution.resolved) continue;

        const sheetId = resolution.canonical;
        const sheetTemplate = template.sheets[sheetId];
        if (!sheetTemplate) {
            warnings.push(`Sheet '${sheet.sheetName}' maps to '${sheetId}', which the template does not define`);
            continue;
        }
        if (_.some(resolved, (r) => r.sheetId === sheetId)) {
            warnings.push(`Sheet '${sheet.sheetName}' maps to '${sheetId}', already filled by an earlier sheet`);
            continue;
        }

        const { config, unplacedHeaders } = mergeSheet(sheetId, sheetTemplate, sheet, resolver);
        _.forEach(unplacedHeaders, (header) =>
            warnings.push(`Header '${header}' on sheet '${sheetId}' has no matching template column`)
        );

        resolved.push(config);
        sheets[sheetId] = config;
    }

    _.forEach(warnings, (warning) => log.warn(warning));
    log.info(`Merged ${resolved.length} of ${quantity.sheets.length} sheet(s) into the template`);

    return {
        sheets: resolved,
        config: {
            sheetsToProcess: [...template.sheetsToProcess],
            sheets,
            placeholderOrder: template.placeholderOrder && [...template.placeholderOrder],
            payload: _.cloneDeep(template.payload),
        },
        warnings,
    };
}
