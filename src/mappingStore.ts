import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import * as _ from 'lodash-es';
import { PATTERNS } from './constants';
import { InvalidMappingSpecError } from './errors';
import { readMappingConfig } from './loaders';
import { createLogger } from './logger';
import { mappingConfigSchema, toMappingTable, type MappingConfigFile } from './schemas';
import type { MappingTable } from './types';

const log = createLogger('MappingStore');

/**
 * Split "raw:canonical" on the first colon
 */
export function parseMappingSpec(spec: string): { raw: string; canonical: string } {
    const match = spec.match(PATTERNS.MAPPING_SPEC);
    const raw = _.trim(match?.[1]);
    const canonical = _.trim(match?.[2]);
    if (!raw || !canonical) {
        throw new InvalidMappingSpecError(spec);
    }
    return { raw, canonical };
}

export interface MappingListing {
    sheets: Array<{ raw: string; canonical: string }>;
    headersByColumn: Array<{ canonical: string; raws: string[] }>;
}

function isMissingFile(error: unknown): boolean {
    return _.get(error, 'code') === 'ENOENT' || _.get(error, 'cause.code') === 'ENOENT';
}

/**
 * Administrative access to the mapping file. The generation pipeline never uses this;
 * it reads its own snapshot through loadMappingTable.
 */
export class MappingStore {
    private config: MappingConfigFile;
    private dirty = false;

    private constructor(readonly filePath: string, config: MappingConfigFile) {
        this.config = config;
    }

    static async open(filePath: string): Promise<MappingStore> {
        try {
            return new MappingStore(filePath, await readMappingConfig(filePath));
        } catch (error) {
            if (!isMissingFile(error)) throw error;
            log.info(`${filePath} does not exist yet; starting from an empty mapping config`);
            return new MappingStore(filePath, mappingConfigSchema.parse({}));
        }
    }

    addSheetMapping(raw: string, canonical: string): void {
        this.config.sheet_name_mappings.mappings[raw] = canonical;
        this.dirty = true;
    }

    addHeaderMapping(raw: string, canonical: string): void {
        if (!canonical.startsWith('col_')) {
            log.warn(`Column id '${canonical}' does not follow the 'col_*' convention`);
        }
        this.config.header_text_mappings.mappings[raw] = canonical;
        this.dirty = true;
    }

    list(): MappingListing {
        const sheets = _.sortBy(
            _.map(_.toPairs(this.config.sheet_name_mappings.mappings), ([raw, canonical]) => ({ raw, canonical })),
            'raw'
        );
        const grouped = _.groupBy(_.toPairs(this.config.header_text_mappings.mappings), ([, canonical]) => canonical);
        const headersByColumn = _.map(_.sortBy(_.keys(grouped)), (canonical) => ({
            canonical,
            raws: _.sortBy(_.map(grouped[canonical], ([raw]) => raw)),
        }));
        return { sheets, headersByColumn };
    }

    snapshot(): MappingTable {
        return toMappingTable(_.cloneDeep(this.config));
    }

    /**
     * Write through a temporary file and rename, so a concurrent reader sees either
     * the old file or the new one
     */
    async save(): Promise<void> {
        if (!this.dirty) return;

        await mkdir(path.dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.${process.pid}.tmp`;
        await writeFile(tempPath, `${JSON.stringify(this.config, null, 2)}\n`, 'utf8');
        await rename(tempPath, this.filePath);
        this.dirty = false;
        log.info(`Saved mappings to ${this.filePath}`);
    }
}
