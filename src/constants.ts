// ============================================
// REGEX PATTERNS
// ============================================

export const PATTERNS = {
    /** Column reference written as an integer, optionally signed */
    INTEGER: /^[+-]?\d+$/,

    /** Runs of whitespace collapsed during normalisation */
    WHITESPACE: /\s+/g,

    /** Mapping argument of the form raw:canonical */
    MAPPING_SPEC: /^([^:]+):(.+)$/,
} as const;

// ============================================
// MATCHING
// ============================================

/**
 * Character replacements applied before similarity and pattern matching
 */
export const NORMALIZE_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
    ['nº', 'no'],
    ['n°', 'no'],
    ['º', 'o'],
    ['°', 'o'],
    ['&', 'and'],
    ['\n', ' '],
    ['\r', ' '],
    ['\t', ' '],
    ['/', ' '],
    ['\\', ' '],
    ['-', ' '],
    ['_', ' '],
];

/** Punctuation dropped entirely during normalisation */
export const NORMALIZE_STRIP = /[.()[\]{}:;,!?"'`]/g;

export const SIMILARITY_WEIGHTS = {
    WORD: 0.7,
    CHAR: 0.3,
} as const;

// ============================================
// DEFAULTS
// ============================================

export const DEFAULTS = {
    PARTIAL_MATCH_THRESHOLD: 0.8,
    DECIMAL_PLACES: 2,
    TOTAL_TEXT: 'TOTAL:',
    GRAND_TOTAL_TEXT: 'TOTAL OF:',
    BLOCK_SPACING: 2,
    MAPPING_CONFIG_FILE: 'config/mapping_config.json',
    TEMPLATE_FILE: 'config/sample_template.json',
    REPORT_SUFFIX: '_mapping_report.txt',
    CONFIG_SUFFIX: '_config.json',
} as const;

/**
 * Placeholders holding composite text; always substituted last
 */
export const COMPOSITE_PLACEHOLDERS: readonly string[] = ['[[DESCRIPTION]]'] as const;

// ============================================
// ERROR MESSAGES
// ============================================

export const ERROR_MESSAGES = {
    UNRESOLVED_MAPPING: (label: string) => `No canonical mapping for ${label}`,
    UNKNOWN_COLUMN_ID: (id: string, sheet: string) => `Unknown column id '${id}' on sheet '${sheet}'`,
    COLUMN_OUT_OF_RANGE: (position: number, width: number, sheet: string) =>
        `Column position ${position} is outside 1..${width} on sheet '${sheet}'`,
    INVALID_REFERENCE: (value: string) => `'${value}' is not a column reference`,
    MERGE_OUT_OF_BOUNDS: (start: number, end: number, width: number) =>
        `Merge span ${start}-${end} exceeds sheet width ${width}`,
    MERGE_OVERLAP: (a: string, b: string) => `Merge spans ${a} and ${b} overlap`,
    INVALID_COLSPAN: (colspan: number) => `Merge colspan must be a positive integer, got ${colspan}`,
    HEADER_OUT_OF_BOUNDS: (text: string, end: number, width: number) =>
        `Header '${text}' spans to column ${end}, beyond sheet width ${width}`,
    HEADER_OVERLAP: (a: string, b: string) => `Header cells '${a}' and '${b}' overlap`,
    MALFORMED_QUANTITY_DATA: (detail: string) => `Malformed quantity data: ${detail}`,
    MALFORMED_CONFIG: (file: string, detail: string) => `Invalid configuration in ${file}: ${detail}`,
    INVALID_MAPPING_SPEC: (spec: string) => `Mapping must be written as 'raw:canonical', got '${spec}'`,
} as const;
