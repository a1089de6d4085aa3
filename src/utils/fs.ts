/**
 * File system helpers with consistent error handling.
 *
 * Dependency direction: fs.ts → node:fs, node:path, errors.ts
 * Used by: config manager, prompt library, intent lexicon loader
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { ConfigError } from '../core/errors.js';

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Read a JSON file and parse it. The result is untrusted; validate it.
 * @throws {ConfigError} if the file doesn't exist or contains invalid JSON.
 */
export function readJsonFile(filePath: string): unknown {
    const content = readTextFile(filePath);

    try {
        return JSON.parse(content);
    } catch (err) {
        throw new ConfigError(`Failed to parse JSON file: ${resolve(filePath)}`, {
            filePath: resolve(filePath),
            originalError: describe(err),
        });
    }
}

/**
 * Write data to a JSON file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    writeTextFile(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Write a text file, creating parent directories if needed.
 * @throws {ConfigError} if the write fails.
 */
export function writeTextFile(filePath: string, content: string): void {
    const absolutePath = resolve(filePath);

    try {
        mkdirSync(dirname(absolutePath), { recursive: true });
        writeFileSync(absolutePath, content, 'utf-8');
    } catch (err) {
        throw new ConfigError(`Failed to write file: ${absolutePath}`, {
            filePath: absolutePath,
            originalError: describe(err),
        });
    }
}

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
    mkdirSync(resolve(dirPath), { recursive: true });
}

/**
 * Check if a file exists at the given path.
 */
export function fileExists(filePath: string): boolean {
    return existsSync(resolve(filePath));
}

/**
 * Read a text file and return its contents.
 * @throws {ConfigError} if the file doesn't exist.
 */
export function readTextFile(filePath: string): string {
    const absolutePath = resolve(filePath);

    if (!existsSync(absolutePath)) {
        throw new ConfigError(`File not found: ${absolutePath}`, { filePath: absolutePath });
    }

    return readFileSync(absolutePath, 'utf-8');
}
