import { ERROR_MESSAGES } from './constants';

export type PipelineStage =
    | 'load'
    | 'mapping'
    | 'column'
    | 'merge'
    | 'aggregation'
    | 'multi_table'
    | 'footer'
    | 'write';

/**
 * Base class for every fatal pipeline error.
 * `entity` names what was being processed: a sheet, a column reference, a row index.
 */
export class DocumentGenerationError extends Error {
    readonly stage: PipelineStage;
    readonly entity: string;

    constructor(stage: PipelineStage, entity: string, message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.stage = stage;
        this.entity = entity;
    }
}

export class UnresolvedMappingError extends DocumentGenerationError {
    constructor(label: string) {
        super('mapping', label, ERROR_MESSAGES.UNRESOLVED_MAPPING(label));
    }
}

export class InvalidColumnReferenceError extends DocumentGenerationError {
    constructor(reference: string, message: string) {
        super('column', reference, message);
    }
}

export class MergeSpanOutOfBoundsError extends DocumentGenerationError {
    constructor(sheet: string, start: number, end: number, width: number) {
        super('footer', sheet, ERROR_MESSAGES.MERGE_OUT_OF_BOUNDS(start, end, width));
    }
}

export class OverlappingMergeRuleError extends DocumentGenerationError {
    constructor(sheet: string, first: string, second: string) {
        super('footer', sheet, ERROR_MESSAGES.MERGE_OVERLAP(first, second));
    }
}

export class InvalidHeaderSpanError extends DocumentGenerationError {
    constructor(sheet: string, message: string) {
        super('merge', sheet, message);
    }
}

export class MalformedQuantityDataError extends DocumentGenerationError {
    constructor(sheet: string, detail: string, options?: ErrorOptions) {
        super('load', sheet, ERROR_MESSAGES.MALFORMED_QUANTITY_DATA(detail), options);
    }
}

export class MalformedConfigError extends DocumentGenerationError {
    constructor(file: string, detail: string, options?: ErrorOptions) {
        super('load', file, ERROR_MESSAGES.MALFORMED_CONFIG(file, detail), options);
    }
}

export class InvalidMappingSpecError extends DocumentGenerationError {
    constructor(spec: string) {
        super('mapping', spec, ERROR_MESSAGES.INVALID_MAPPING_SPEC(spec));
    }
}
