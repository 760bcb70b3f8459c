// ============================================
// CELL & FONT TYPES
// ============================================

/**
 * Scalar value carried by an extracted cell
 */
export type CellValue = string | number | boolean | null;

/**
 * Row record keyed by raw header text (source order preserved)
 */
export type RawRow = Readonly<Record<string, CellValue>>;

/**
 * Row record keyed by canonical column id
 */
export type CanonicalRow = Record<string, CellValue>;

export interface FontDescriptor {
    name: string;
    size: number;
}

// ============================================
// QUANTITY DATA
// ============================================

/**
 * One extracted source sheet
 */
export interface QuantitySheet {
    sheetName: string;
    startRow: number;
    headers: readonly string[];
    rows: readonly RawRow[];
    headerFont: FontDescriptor;
    dataFont: FontDescriptor;
}

/**
 * Everything extracted from a single source file
 */
export interface QuantityDocument {
    filePath: string;
    timestamp: string;
    sheets: readonly QuantitySheet[];
}

// ============================================
// COLUMN REFERENCES
// ============================================

/**
 * Column addressed either by 0-based raw index or by canonical id
 */
export type ColumnReference =
    | { kind: 'index'; index: number }
    | { kind: 'id'; id: string };

/**
 * Canonical column id → 1-based position for one sheet
 */
export type ColumnTable = ReadonlyMap<string, number>;

// ============================================
// TEMPLATE CONFIG
// ============================================

export type SheetLayoutKind = 'single' | 'aggregate' | 'multi_table';

export interface HeaderEntry {
    row: number;
    col: number;
    text: string;
    id?: string;
    rowspan?: number;
    colspan?: number;
}

export interface MergeRule {
    startColumn: ColumnReference;
    colspan: number;
}

export type PalletCountMode = 'distinct' | 'precomputed';

export interface FooterConfig {
    totalText: string;
    totalTextColumn?: ColumnReference;
    palletCountColumn?: ColumnReference;
    sumColumnIds: string[];
    palletCount?: { mode: PalletCountMode; columnId: string };
    decimalPlaces: number;
    numberFormat?: string;
    grandTotalText: string;
    mergeRules: MergeRule[];
    /** Footer styling and other keys the engine does not read */
    payload: OpaquePayload;
}

export interface AggregationConfig {
    groupBy: string[];
    sumColumns: string[];
    decimalPlaces: number;
}

export interface MultiTableConfig {
    blockKey: string;
    blockSpacing: number;
    blankAfterHeader: boolean;
    blankBeforeFooter: boolean;
}

/**
 * Opaque payload (formulas, styling, unknown keys) carried through untouched
 */
export type OpaquePayload = Record<string, unknown>;

export interface SheetTemplate {
    startRow: number;
    layout: SheetLayoutKind;
    headers: HeaderEntry[];
    columnCount?: number;
    fonts?: { header?: FontDescriptor; data?: FontDescriptor };
    aggregation?: AggregationConfig;
    multiTable?: MultiTableConfig;
    footer?: FooterConfig;
    payload: OpaquePayload;
}

export interface TemplateConfig {
    sheetsToProcess: string[];
    sheets: Record<string, SheetTemplate>;
    /** Placeholder tokens substituted before all others, in this order */
    placeholderOrder?: string[];
    payload: OpaquePayload;
}

// ============================================
// MAPPING TABLE
// ============================================

export interface FallbackSettings {
    caseInsensitive: boolean;
    partialMatchThreshold: number;
    patternMatching: boolean;
    /** canonical column id → word groups; every word of one group must appear */
    patternRules: Readonly<Record<string, readonly (readonly string[])[]>>;
}

/**
 * Read-only snapshot of the mapping file for one run
 */
export interface MappingTable {
    sheetMappings: ReadonlyMap<string, string>;
    headerMappings: ReadonlyMap<string, string>;
    fallback: Readonly<FallbackSettings>;
}

// ============================================
// RESOLUTION
// ============================================

export type MappingKind = 'sheet' | 'header';

export type MatchMethod = 'exact' | 'case_insensitive' | 'similarity' | 'pattern';

export interface MatchOutcome {
    canonical: string;
    method: MatchMethod;
    matchedKey: string;
    score?: number;
    suggestion: boolean;
}

export type Resolution =
    | ({ resolved: true; kind: MappingKind; raw: string; sheet?: string } & MatchOutcome)
    | { resolved: false; kind: MappingKind; raw: string; sheet?: string };

// ============================================
// LAYOUT
// ============================================

export interface MergeSpan {
    row: number;
    startColumn: number;
    endColumn: number;
}

export interface FooterTotal {
    columnId: string;
    column: number;
    value: number;
    numberFormat?: string;
}

export interface FooterLayout {
    row: number;
    totalText: { column: number; text: string } | null;
    palletCount: { column: number; count: number; text: string } | null;
    totals: FooterTotal[];
    merges: MergeSpan[];
}

export interface TableLayout {
    startRow: number;
    headerRows: number;
    dataStartRow: number;
    dataEndRow: number;
    rows: CanonicalRow[];
    /** Absent when the sheet declares no footer_configurations */
    footer: FooterLayout | null;
    /** Footer row, or the last data row when there is no footer */
    endRow: number;
}

export interface TableBlock extends TableLayout {
    blockKey: CellValue;
}

export interface AggregationWarning {
    code: 'AggregationKeyMissing';
    rowIndex: number;
    missingColumns: string[];
}

export interface AggregationResult {
    rows: CanonicalRow[];
    contributingRows: number;
    skippedRows: number;
    warnings: AggregationWarning[];
}

export type SheetLayout =
    | { kind: 'single'; table: TableLayout }
    | { kind: 'aggregate'; table: TableLayout; aggregation: AggregationResult }
    | { kind: 'multi_table'; blocks: TableBlock[]; grandTotal: FooterLayout | null };

// ============================================
// RESOLVED OUTPUT
// ============================================

export interface ResolvedSheetConfig extends SheetTemplate {
    sheetId: string;
    sourceSheetName: string;
    width: number;
    columns: ColumnTable;
    /** raw header text → canonical column id, for re-keying rows */
    headerMap: ReadonlyMap<string, string>;
}

export interface ResolvedDocumentConfig {
    sheetsToProcess: string[];
    sheets: Record<string, SheetTemplate>;
    placeholderOrder?: string[];
    payload: OpaquePayload;
    metadata: {
        sourceFile: string;
        sourceTimestamp: string;
        generatedAt: string;
    };
}

export interface GeneratedSheet {
    config: ResolvedSheetConfig;
    layout: SheetLayout;
}

export interface GenerationReport {
    resolutions: Resolution[];
    unresolved: string[];
    suggestions: Resolution[];
    aggregationWarnings: Record<string, AggregationWarning[]>;
    warnings: string[];
}

export interface GenerationResult {
    config: ResolvedDocumentConfig;
    sheets: GeneratedSheet[];
    report: GenerationReport;
}

/**
 * Options for a generation run
 */
export interface GenerateOptions {
    /**
     * Promote unresolved sheet/header mappings to fatal errors
     * @default false
     */
    strict?: boolean;
    /** Placeholder token → replacement text, applied to header and footer texts */
    placeholders?: Record<string, string>;
    /** Fixed clock for `metadata.generatedAt` */
    now?: () => Date;
}
