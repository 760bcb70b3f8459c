import path from 'node:path';
import { DEFAULTS } from './constants';
import { isLogLevel, type LogLevel } from './logger';

export function getProjectRoot(): string {
    const configuredRoot = process.env.DOCGEN_ROOT;
    if (configuredRoot && configuredRoot.trim()) {
        return path.resolve(configuredRoot.trim());
    }

    return process.cwd();
}

export function resolveProjectPath(...parts: string[]): string {
    return path.join(getProjectRoot(), ...parts);
}

export function defaultMappingConfigPath(): string {
    return process.env.DOCGEN_MAPPING_CONFIG?.trim() || resolveProjectPath(DEFAULTS.MAPPING_CONFIG_FILE);
}

export function defaultTemplatePath(): string {
    return process.env.DOCGEN_TEMPLATE?.trim() || resolveProjectPath(DEFAULTS.TEMPLATE_FILE);
}

/**
 * Log level from DOCGEN_LOG_LEVEL, falling back to warn
 */
export function envLogLevel(): LogLevel {
    const value = process.env.DOCGEN_LOG_LEVEL?.trim().toLowerCase();
    return value && isLogLevel(value) ? value : 'warn';
}
