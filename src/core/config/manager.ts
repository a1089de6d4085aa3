/**
 * Configuration manager — load, save, validate, and merge configs.
 *
 * Dependency direction: manager.ts → schema.ts, defaults.ts, utils/fs.ts, errors.ts
 * Used by: CLI commands, provider registry
 */

import { join, resolve } from 'node:path';
import type { ZodIssue } from 'zod';
import { appConfigSchema } from './schema.js';
import { CONFIG_DIR_NAME, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { AppConfig } from './types.js';
import { fileExists, readJsonFile, writeJsonFile, ensureDir } from '../../utils/fs.js';
import { ConfigError } from '../errors.js';
import { logger } from '../../utils/logger.js';

/** Recursively optional view of a config object, for overrides. */
export type DeepPartial<T> = {
    [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/**
 * Resolve the config directory path for a given project root.
 */
export function getConfigDir(projectRoot: string): string {
    return join(resolve(projectRoot), CONFIG_DIR_NAME);
}

/**
 * Resolve the full config file path for a given project root.
 */
export function getConfigPath(projectRoot: string): string {
    return join(getConfigDir(projectRoot), CONFIG_FILE_NAME);
}

/**
 * Check whether a config file exists in the given project root.
 */
export function configExists(projectRoot: string): boolean {
    return fileExists(getConfigPath(projectRoot));
}

function formatIssues(issues: ZodIssue[]): string {
    return issues.map((i) => `  - ${i.path.join('.')}: ${i.message}`).join('\n');
}

/**
 * Load and validate the configuration from disk.
 *
 * @param projectRoot - The root directory of the project (where .stepwise/ lives)
 * @throws {ConfigError} if the file doesn't exist, is invalid JSON, or fails validation
 */
export function loadConfig(projectRoot: string): AppConfig {
    const configPath = getConfigPath(projectRoot);

    if (!fileExists(configPath)) {
        throw new ConfigError(
            `No configuration found. Run "stepwise init" first.`,
            { configPath, projectRoot },
        );
    }

    logger.debug(`Loading config from ${configPath}`);

    const result = appConfigSchema.safeParse(readJsonFile(configPath));

    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration file:\n${formatIssues(result.error.issues)}`,
            { configPath, issues: result.error.issues },
        );
    }

    logger.debug('Config loaded and validated successfully');
    return result.data;
}

/**
 * Save configuration to disk, validating before write.
 *
 * @throws {ConfigError} if validation fails
 */
export function saveConfig(projectRoot: string, config: AppConfig): void {
    const result = appConfigSchema.safeParse(config);

    if (!result.success) {
        throw new ConfigError(
            `Cannot save invalid configuration:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }

    const configPath = getConfigPath(projectRoot);

    ensureDir(getConfigDir(projectRoot));
    writeJsonFile(configPath, result.data);
    logger.debug(`Config saved to ${configPath}`);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two config objects. Source values override target values.
 * Arrays are replaced, not concatenated; undefined source values are ignored.
 */
export function mergeConfig(target: object, source: object): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };
    const entries: Array<[string, unknown]> = Object.entries(source);

    for (const [key, sourceVal] of entries) {
        const targetVal = result[key];

        if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
            result[key] = mergeConfig(targetVal, sourceVal);
        } else if (sourceVal !== undefined) {
            result[key] = sourceVal;
        }
    }

    return result;
}

/**
 * Get the default configuration with optional partial overrides merged in.
 *
 * @throws {ConfigError} if the overrides produce an invalid configuration
 */
export function getDefaultConfig(overrides?: DeepPartial<AppConfig>): AppConfig {
    if (!overrides) return structuredClone(DEFAULT_CONFIG);

    const result = appConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, overrides));
    if (!result.success) {
        throw new ConfigError(
            `Invalid configuration overrides:\n${formatIssues(result.error.issues)}`,
            { issues: result.error.issues },
        );
    }
    return result.data;
}
