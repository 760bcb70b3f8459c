import { writeFile } from 'node:fs/promises';
import * as _ from 'lodash-es';
import { defaultMappingConfigPath, defaultTemplatePath, envLogLevel } from './config';
import { DocumentGenerationError } from './errors';
import { runGeneration } from './generator';
import { loadQuantityDocument } from './loaders';
import { setLogLevel } from './logger';
import { MappingResolver } from './mapping';
import { MappingStore, parseMappingSpec } from './mappingStore';
import { buildMappingReport, formatMappingListing } from './report';
import type { GenerationResult, QuantityDocument } from './types';

export interface CliOutput {
    out: (line: string) => void;
    err: (line: string) => void;
}

const consoleOutput: CliOutput = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

const USAGE = `Usage:
  docgen generate <quantity.json> [-t template.json] [-o output.json] [-m mapping.json]
                  [-p TOKEN=value]... [--xlsx output.xlsx] [--strict]
                  [--validate-only] [--show-info] [-v|--verbose] [-q|--quiet]
  docgen mapping [-c mapping.json] --list
  docgen mapping [-c mapping.json] --add-sheet raw:canonical
  docgen mapping [-c mapping.json] --add-header raw:canonical
  docgen mapping [-c mapping.json] --report report.txt [--data quantity.json]`;

/** Options that take a value, so their value is not taken for a positional argument */
const VALUE_OPTIONS = [
    '-t', '--template', '-o', '--output', '-m', '--mapping', '-p', '--placeholder',
    '--xlsx', '-c', '--config', '--add-sheet', '--add-header', '--report', '--data',
];

class UsageError extends Error {}

// ============================================
// 1. ARGUMENT PARSING
// ============================================

function parseArg(args: readonly string[], ...names: string[]): string | null {
    const index = _.findIndex(args, (arg) => names.includes(arg));
    if (index < 0) return null;

    const value = args[index + 1];
    if (value === undefined || !value.trim()) {
        throw new UsageError(`${args[index]} needs a value`);
    }
    return value.trim();
}

function parseArgList(args: readonly string[], ...names: string[]): string[] {
    const values: string[] = [];
    _.forEach(args, (arg, i) => {
        const value = args[i + 1];
        if (names.includes(arg) && value !== undefined) values.push(value);
    });
    return values;
}

function hasFlag(args: readonly string[], ...names: string[]): boolean {
    return _.some(args, (arg) => names.includes(arg));
}

function positionals(args: readonly string[]): string[] {
    return _.filter(args, (arg, i) => !arg.startsWith('-') && (i === 0 || !VALUE_OPTIONS.includes(args[i - 1])));
}

function parsePlaceholders(specs: readonly string[]): Record<string, string> {
    return _.fromPairs(
        _.map(specs, (spec): [string, string] => {
            const separator = spec.indexOf('=');
            if (separator <= 0) throw new UsageError(`Placeholder must be written as TOKEN=value, got '${spec}'`);
            return [spec.slice(0, separator), spec.slice(separator + 1)];
        })
    );
}

// ============================================
// 2. GENERATE
// ============================================

function describeQuantity(quantity: QuantityDocument, io: CliOutput): void {
    io.out(`Source: ${quantity.filePath} (extracted ${quantity.timestamp})`);
    _.forEach(quantity.sheets, (sheet) => {
        io.out(
            `  ${sheet.sheetName}: ${sheet.headers.length} header(s), ${sheet.rows.length} row(s), ` +
                `start row ${sheet.startRow}, header font ${sheet.headerFont.name} ${sheet.headerFont.size}`
        );
    });
}

function describeResult(result: GenerationResult, io: CliOutput): void {
    _.forEach(result.sheets, ({ config, layout }) => {
        switch (layout.kind) {
            case 'single':
                io.out(`  ${config.sheetId}: ${layout.table.rows.length} row(s)`);
                break;
            case 'aggregate':
                io.out(
                    `  ${config.sheetId}: ${layout.aggregation.contributingRows} row(s) → ` +
                        `${layout.table.rows.length} group(s), ${layout.aggregation.skippedRows} skipped`
                );
                break;
            case 'multi_table':
                io.out(`  ${config.sheetId}: ${layout.blocks.length} table(s)${layout.grandTotal ? ' + grand total' : ''}`);
                break;
        }
    });
}

async function generateCommand(args: readonly string[], io: CliOutput): Promise<number> {
    const [quantityPath] = positionals(args);
    if (!quantityPath) throw new UsageError('generate needs a quantity data file');

    const validateOnly = hasFlag(args, '--validate-only');
    const xlsxPath = parseArg(args, '--xlsx');
    if (validateOnly && xlsxPath) {
        throw new UsageError('--xlsx writes a workbook and cannot be combined with --validate-only');
    }

    const run = await runGeneration({
        quantityPath,
        templatePath: parseArg(args, '-t', '--template') ?? defaultTemplatePath(),
        mappingPath: parseArg(args, '-m', '--mapping') ?? defaultMappingConfigPath(),
        outputPath: parseArg(args, '-o', '--output') ?? undefined,
        xlsxPath: xlsxPath ?? undefined,
        validateOnly,
        strict: hasFlag(args, '--strict'),
        placeholders: parsePlaceholders(parseArgList(args, '-p', '--placeholder')),
    });

    const { result } = run;
    if (hasFlag(args, '--show-info')) {
        describeQuantity(run.quantity, io);
        describeResult(result, io);
    }

    _.forEach(result.report.warnings, (warning) => io.err(`Warning: ${warning}`));
    if (result.report.unresolved.length > 0) {
        io.err(`Unresolved: ${result.report.unresolved.join(', ')}`);
    }

    if (validateOnly) {
        io.out(`Validated ${result.sheets.length} sheet(s)`);
        return 0;
    }

    io.out(`Generated ${run.configPath}`);
    if (run.reportPath) io.out(`Mapping report: ${run.reportPath}`);
    if (run.workbookPath) io.out(`Workbook: ${run.workbookPath}`);

    return 0;
}

// ============================================
// 3. MAPPING ADMINISTRATION
// ============================================

async function mappingCommand(args: readonly string[], io: CliOutput): Promise<number> {
    const sheetSpec = parseArg(args, '--add-sheet');
    const headerSpec = parseArg(args, '--add-header');
    const reportPath = parseArg(args, '--report');
    const list = hasFlag(args, '--list');
    if (!sheetSpec && !headerSpec && !reportPath && !list) {
        throw new UsageError('mapping needs --list, --add-sheet, --add-header or --report');
    }

    const store = await MappingStore.open(parseArg(args, '-c', '--config') ?? defaultMappingConfigPath());

    if (sheetSpec) {
        const { raw, canonical } = parseMappingSpec(sheetSpec);
        store.addSheetMapping(raw, canonical);
        io.out(`Added sheet mapping '${raw}' -> '${canonical}'`);
    }
    if (headerSpec) {
        const { raw, canonical } = parseMappingSpec(headerSpec);
        store.addHeaderMapping(raw, canonical);
        io.out(`Added header mapping '${raw}' -> '${canonical}'`);
    }
    await store.save();

    if (reportPath) {
        const resolver = new MappingResolver(store.snapshot());
        const dataPath = parseArg(args, '--data');
        if (dataPath) {
            const quantity = await loadQuantityDocument(dataPath);
            _.forEach(quantity.sheets, (sheet) => {
                const resolution = resolver.resolveSheet(sheet.sheetName);
                const sheetId = resolution.resolved ? resolution.canonical : sheet.sheetName;
                _.forEach(sheet.headers, (header) => {
                    if (header.trim()) resolver.resolveHeader(header, sheetId);
                });
            });
        }

        const report = buildMappingReport({
            unresolved: resolver.unresolved(),
            suggestions: resolver.suggestions(),
            table: store.snapshot(),
        });
        await writeFile(reportPath, report, 'utf8');
        io.out(`Mapping report: ${reportPath}`);
    }

    if (list) {
        io.out(formatMappingListing(store.list()));
    }
    return 0;
}

// ============================================
// 4. ENTRY POINT
// ============================================

/**
 * Run the CLI and return the process exit code
 */
async function main(argv: readonly string[], io: CliOutput = consoleOutput): Promise<number> {
    const [command, ...args] = argv;

    if (hasFlag(args, '-v', '--verbose')) setLogLevel('debug');
    else if (hasFlag(args, '-q', '--quiet')) setLogLevel('error');
    else setLogLevel(envLogLevel());

    try {
        switch (command) {
            case 'generate':
                return await generateCommand(args, io);
            case 'mapping':
                return await mappingCommand(args, io);
            case undefined:
            case '-h':
            case '--help':
                io.out(USAGE);
                return command === undefined ? 1 : 0;
            default:
                throw new UsageError(`Unknown command '${command}'`);
        }
    } catch (error) {
        if (error instanceof UsageError) {
            io.err(`Error: ${error.message}`);
            io.err(USAGE);
        } else if (error instanceof DocumentGenerationError) {
            io.err(`Error [${error.stage}] ${error.message}`);
        } else {
            io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
        }
        return 1;
    }
}

export { main, parseArg, parseArgList, hasFlag, positionals, parsePlaceholders };
