import * as _ from 'lodash-es';
import { createLogger } from './logger';
import type { AggregationConfig, AggregationResult, AggregationWarning, CanonicalRow } from './types';
import { isBlank, keyValue, toNumber } from './values';

const log = createLogger('Aggregation');

interface Group {
    row: CanonicalRow;
    sums: Record<string, number>;
}

/**
 * Group key columns a row is missing. NaN and infinite numbers count as missing.
 */
function missingKeyColumns(row: CanonicalRow, groupBy: readonly string[]): string[] {
    return _.filter(groupBy, (column) => {
        const value = row[column];
        return isBlank(value) || (_.isNumber(value) && !Number.isFinite(value));
    });
}

function hasGroupKey(row: CanonicalRow, groupBy: readonly string[]): boolean {
    return missingKeyColumns(row, groupBy).length === 0;
}

/**
 * Group rows by the tuple of `groupBy` values, in order of first occurrence.
 * Sum columns are added up and rounded once, after the last addend; every other column keeps
 * the value of the group's first row.
 */
function aggregate(rows: readonly CanonicalRow[], config: AggregationConfig): AggregationResult {
    const groups = new Map<string, Group>();
    const warnings: AggregationWarning[] = [];
    let contributingRows = 0;

    _.forEach(rows, (row, rowIndex) => {
        const missingColumns = missingKeyColumns(row, config.groupBy);
        if (missingColumns.length > 0) {
            warnings.push({ code: 'AggregationKeyMissing', rowIndex, missingColumns });
            log.debug(`Row ${rowIndex} skipped: no value for ${missingColumns.join(', ')}`);
            return;
        }

        contributingRows++;
        const key = JSON.stringify(_.map(config.groupBy, (column) => keyValue(row[column])));

        let group = groups.get(key);
        if (!group) {
            group = { row: { ...row }, sums: {} };
            groups.set(key, group);
        }

        for (const column of config.sumColumns) {
            group.sums[column] = (group.sums[column] ?? 0) + (toNumber(row[column]) ?? 0);
        }
    });

    const aggregated = _.map([...groups.values()], ({ row, sums }) => {
        const result: CanonicalRow = { ...row };
        for (const column of config.sumColumns) {
            result[column] = _.round(sums[column] ?? 0, config.decimalPlaces);
        }
        return result;
    });

    if (warnings.length > 0) {
        log.warn(`${warnings.length} row(s) skipped for a missing group key`);
    }
    log.info(`Aggregated ${contributingRows} row(s) into ${aggregated.length} group(s)`);

    return {
        rows: aggregated,
        contributingRows,
        skippedRows: warnings.length,
        warnings,
    };
}

export { aggregate, hasGroupKey };
