import * as path from 'node:path';
import type { UnstarConfig } from './types';
import type { FileHost } from './utils/file-host';
import { log } from './utils/logger';
import { DEFAULT_EXCLUDED_DIRECTORIES } from './utils/module-resolver';
import { readPyprojectSettings } from './utils/pyproject-reader';

/** Line length used when neither the command line nor `pyproject.toml` sets one. */
export const DEFAULT_LINE_LENGTH = 88;

export const DEFAULT_CONFIG: UnstarConfig = {
    dryRun: false,
    inferExports: true,
    inferImportedNames: false,
    format: true,
    createAll: false,
    lineLength: DEFAULT_LINE_LENGTH,
    conflictPolicy: 'first-declared',
    searchPaths: [],
    exclude: DEFAULT_EXCLUDED_DIRECTORIES,
};

/**
 * Settings given on the command line; they take precedence over
 * `pyproject.toml`.
 */
export type ConfigOverrides = Partial<Omit<UnstarConfig, 'searchPaths' | 'exclude'>>;

/**
 * Resolves the configuration for a run over `target` (a file or
 * directory): defaults, then `[tool.unstar]` from the nearest
 * `pyproject.toml`, then `overrides`.
 *
 * Absolute imports are searched in the target directory's parent, the
 * target directory, then the configured `search-paths` (relative to the
 * `pyproject.toml` that names them).
 */
export function resolveConfig(host: FileHost, target: string, overrides: ConfigOverrides = {}): UnstarConfig {
    const absoluteTarget = path.resolve(target);
    const targetDir = host.directoryExists(absoluteTarget) ? absoluteTarget : path.dirname(absoluteTarget);

    const found = readPyprojectSettings(host, targetDir);
    const settings = found?.settings ?? {};
    const configuredPaths = (settings.searchPaths ?? []).map(entry => path.resolve(found?.dir ?? targetDir, entry));
    const searchPaths = [...new Set([path.dirname(targetDir), targetDir, ...configuredPaths])];

    const config: UnstarConfig = {
        ...DEFAULT_CONFIG,
        ...definedEntries({
            inferExports: settings.inferExports,
            inferImportedNames: settings.inferImportedNames,
            format: settings.format,
            createAll: settings.createAll,
            lineLength: settings.lineLength,
            conflictPolicy: settings.conflictPolicy,
        }),
        ...definedEntries(overrides),
        searchPaths,
        exclude: [...new Set([...DEFAULT_EXCLUDED_DIRECTORIES, ...(settings.exclude ?? [])])],
    };

    log(`Search paths: ${config.searchPaths.join(', ')}`);
    log(`Line length: ${config.lineLength}`);
    return config;
}

/** Drops `undefined` members so that spreading does not clear defaults. */
function definedEntries<T extends object>(values: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key of Object.keys(values)) {
        if (isKeyOf(values, key) && values[key] !== undefined) {
            result[key] = values[key];
        }
    }
    return result;
}

function isKeyOf<T extends object>(value: T, key: PropertyKey): key is keyof T {
    return key in value;
}
