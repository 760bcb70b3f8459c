import * as _ from 'lodash-es';
import { unresolvedLabel } from './mapping';
import type { MappingListing } from './mappingStore';
import type { MappingTable, Resolution } from './types';

export interface MappingReportInput {
    unresolved: readonly string[];
    suggestions: readonly Resolution[];
    table: MappingTable;
}

function describeSuggestion(resolution: Resolution): string {
    if (!resolution.resolved) return `• ${unresolvedLabel(resolution)}`;
    const where = resolution.sheet ? ` [${resolution.sheet}]` : '';
    return `• ${unresolvedLabel(resolution)}${where} -> '${resolution.canonical}' (similar to '${resolution.matchedKey}', score ${resolution.score ?? 0})`;
}

/**
 * Plain-text report of unresolved items and similarity suggestions, followed by the
 * mappings that were in effect for the run
 */
export function buildMappingReport({ unresolved, suggestions, table }: MappingReportInput): string {
    const lines: string[] = ['Mapping Report', _.repeat('=', 50), ''];

    if (unresolved.length > 0) {
        lines.push('Unrecognized Items:', _.repeat('-', 40));
        lines.push(..._.map(unresolved, (label) => `• ${label}`), '');
    } else {
        lines.push('No unrecognized items found.', '');
    }

    if (suggestions.length > 0) {
        lines.push('Partial-Match Suggestions:', _.repeat('-', 40));
        lines.push(..._.map(suggestions, describeSuggestion), '');
    }

    lines.push('Current Sheet Mappings:', _.repeat('-', 25));
    for (const [raw, canonical] of table.sheetMappings) {
        lines.push(`'${raw}' -> '${canonical}'`);
    }

    lines.push('', `Current Header Mappings (${table.headerMappings.size} total):`, _.repeat('-', 25));
    for (const [raw, canonical] of _.sortBy([...table.headerMappings], ([raw]) => raw)) {
        lines.push(`'${raw}' -> '${canonical}'`);
    }

    return `${lines.join('\n')}\n`;
}

/**
 * Listing printed by `docgen mapping --list`
 */
export function formatMappingListing(listing: MappingListing): string {
    const lines: string[] = [`Sheet mappings (${listing.sheets.length}):`];
    _.forEach(listing.sheets, ({ raw, canonical }) => lines.push(`  '${raw}' -> '${canonical}'`));

    lines.push('', `Header mappings (${listing.headersByColumn.length} column(s)):`);
    _.forEach(listing.headersByColumn, ({ canonical, raws }) => {
        lines.push(`  ${canonical}:`);
        _.forEach(raws, (raw) => lines.push(`    '${raw}'`));
    });

    return lines.join('\n');
}
