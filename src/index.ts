// ============================================
// PUBLIC API
// ============================================

export type * from './types';

// Pipeline
export { generateDocument, runGeneration, canonicalizeRows, layoutSheet, validateTemplateSheets } from './generator';
export type { GenerationInputs, RunOptions, RunResult } from './generator';

// Core stages
export { MappingResolver, buildMatcherChain, exactMatcher, caseInsensitiveMatcher, createSimilarityMatcher, createPatternMatcher, normalizeLabel, similarity } from './mapping';
export type { Matcher, MappingResolverOptions } from './mapping';
export { parseColumnReference, formatColumnReference, resolveColumn, buildColumnTable, sheetWidth, headerHeight, validateHeaderSpans, columnNumberToLetter, columnLetterToNumber, toCellAddress } from './columns';
export { mergeSheet, mergeTemplateConfig } from './merger';
export { aggregate } from './aggregation';
export { splitIntoTables, partitionRows, layoutTable, computeGrandTotal } from './multiTable';
export type { TableGeometry } from './multiTable';
export { computeFooter, validateMergeSpans, validateFooterConfig } from './footer';
export type { FooterContext } from './footer';
export { replaceText, placeholderOrder } from './textReplace';
export type { ReplaceOptions } from './textReplace';

// Inputs, mappings & reports
export { loadQuantityDocument, loadTemplateConfig, loadMappingTable, parseQuantityDocument, parseTemplateConfig } from './loaders';
export { serializeDocumentConfig } from './schemas';
export { MappingStore, parseMappingSpec } from './mappingStore';
export { buildMappingReport } from './report';

// Output
export { processWorkbook, renderDocumentToBuffer, renderDocumentFromBuffer } from './writer';
export type { WriteOptions } from './writer';

// Errors & logging
export * from './errors';
export { createLogger, setLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
