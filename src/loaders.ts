import { readFile } from 'node:fs/promises';
import * as _ from 'lodash-es';
import type { z } from 'zod';
import { MalformedConfigError, MalformedQuantityDataError } from './errors';
import { createLogger } from './logger';
import {
    mappingConfigSchema,
    parseWith,
    quantityDocumentSchema,
    templateConfigSchema,
    toMappingTable,
    type MappingConfigFile,
} from './schemas';
import type { MappingTable, QuantityDocument, TemplateConfig } from './types';

const log = createLogger('Loader');

// ============================================
// 1. FILE HELPERS
// ============================================

async function readJsonFile(filePath: string, onError: (detail: string, cause: unknown) => Error): Promise<unknown> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf8');
    } catch (error) {
        throw onError(`cannot read file (${error instanceof Error ? error.message : String(error)})`, error);
    }

    try {
        return JSON.parse(text);
    } catch (error) {
        throw onError(`invalid JSON (${error instanceof Error ? error.message : String(error)})`, error);
    }
}

/**
 * Freeze a parsed structure so no stage can mutate shared input
 */
function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        _.forEach(Object.values(value), (child) => {
            deepFreeze(child);
        });
    }
    return value;
}

// ============================================
// 2. QUANTITY DATA
// ============================================

/**
 * Name of the sheet an issue points into, for error reporting
 */
function offendingSheet(input: unknown, issues: z.ZodIssue[]): string {
    const issue = _.find(issues, (i) => i.path[0] === 'sheets' && _.isNumber(i.path[1]));
    if (!issue) return '(document)';

    const index = issue.path[1];
    const name: unknown = _.get(input, ['sheets', index, 'sheet_name']);
    return _.isString(name) && name.trim() ? name : `sheets[${String(index)}]`;
}

function parseQuantityDocument(input: unknown): QuantityDocument {
    const doc = parseWith(quantityDocumentSchema, input, (issues, detail, cause) =>
        new MalformedQuantityDataError(offendingSheet(input, issues), detail, { cause })
    );
    return deepFreeze(doc);
}

async function loadQuantityDocument(filePath: string): Promise<QuantityDocument> {
    const raw = await readJsonFile(filePath, (detail, cause) =>
        new MalformedQuantityDataError('(document)', `${filePath}: ${detail}`, { cause })
    );
    const doc = parseQuantityDocument(raw);
    log.info(`Loaded ${doc.sheets.length} sheet(s) from ${filePath}`);
    return doc;
}

// ============================================
// 3. TEMPLATE CONFIG
// ============================================

function parseTemplateConfig(input: unknown, source = 'template'): TemplateConfig {
    const template = parseWith(templateConfigSchema, input, (_issues, detail, cause) =>
        new MalformedConfigError(source, detail, { cause })
    );
    return deepFreeze(template);
}

async function loadTemplateConfig(filePath: string): Promise<TemplateConfig> {
    const raw = await readJsonFile(filePath, (detail, cause) => new MalformedConfigError(filePath, detail, { cause }));
    const template = parseTemplateConfig(raw, filePath);
    log.info(`Loaded template with sheets: ${template.sheetsToProcess.join(', ')}`);
    return template;
}

// ============================================
// 4. MAPPING CONFIG
// ============================================

function parseMappingConfig(input: unknown, source = 'mapping config'): MappingConfigFile {
    return parseWith(mappingConfigSchema, input, (_issues, detail, cause) =>
        new MalformedConfigError(source, detail, { cause })
    );
}

async function readMappingConfig(filePath: string): Promise<MappingConfigFile> {
    const raw = await readJsonFile(filePath, (detail, cause) => new MalformedConfigError(filePath, detail, { cause }));
    return parseMappingConfig(raw, filePath);
}

/**
 * One immutable snapshot of the mapping file per run; never re-read mid-run
 */
async function loadMappingTable(filePath: string): Promise<MappingTable> {
    const config = await readMappingConfig(filePath);
    const table = deepFreeze(toMappingTable(config));
    log.info(
        `Loaded ${table.sheetMappings.size} sheet and ${table.headerMappings.size} header mapping(s) from ${filePath}`
    );
    return table;
}

export {
    readJsonFile,
    deepFreeze,
    parseQuantityDocument,
    loadQuantityDocument,
    parseTemplateConfig,
    loadTemplateConfig,
    parseMappingConfig,
    readMappingConfig,
    loadMappingTable,
};
