import * as path from 'node:path';
import type { ConflictPolicy } from '../types';
import type { FileHost } from './file-host';
import { log, logWarn } from './logger';

/**
 * Settings read from `[tool.unstar]`.  Keys absent from the file are
 * `undefined`.
 */
export interface PyprojectSettings {
    readonly inferExports?: boolean;
    readonly createAll?: boolean;
    readonly format?: boolean;
    readonly lineLength?: number;
    readonly searchPaths?: readonly string[];
    readonly conflictPolicy?: ConflictPolicy;
    readonly inferImportedNames?: boolean;
    readonly exclude?: readonly string[];
}

/**
 * Finds the nearest `pyproject.toml` in `startDir` or one of its parents.
 */
export function findPyproject(host: FileHost, startDir: string): string | undefined {
    let dir = path.resolve(startDir);
    for (;;) {
        const candidate = path.join(dir, 'pyproject.toml');
        if (host.fileExists(candidate)) {
            return candidate;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}

/**
 * Returns the body of a `[header]` section (everything until the next
 * `[header]` or EOF), or `undefined` when the section is absent.
 *
 * A line-based reader, not a full TOML parser.
 */
export function readSection(content: string, header: string): string | undefined {
    const escaped = header.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const sectionMatch = new RegExp(`^\\[${escaped}\\][ \\t]*(?:#.*)?$`, 'm').exec(content);
    if (!sectionMatch) {
        return undefined;
    }

    const sectionStart = sectionMatch.index + sectionMatch[0].length;
    const nextSectionMatch = /^\[/m.exec(content.slice(sectionStart));
    return nextSectionMatch
        ? content.slice(sectionStart, sectionStart + nextSectionMatch.index)
        : content.slice(sectionStart);
}

/** Returns the raw value text of `key = value` in a section body. */
function readRawValue(body: string, key: string): string | undefined {
    // Arrays may span several lines.
    const match = new RegExp(`^[ \\t]*${key}[ \\t]*=[ \\t]*(\\[[^\\]]*\\]|[^\\r\\n#]*)`, 'm').exec(body);
    return match ? match[1].trim() : undefined;
}

function readBoolean(body: string, key: string, file: string): boolean | undefined {
    const raw = readRawValue(body, key);
    if (raw === undefined) {
        return undefined;
    }
    if (raw === 'true' || raw === 'false') {
        return raw === 'true';
    }
    logWarn(`${file}: ${key} must be true or false, got '${raw}'; ignored`);
    return undefined;
}

function readPositiveInteger(body: string, key: string, file: string): number | undefined {
    const raw = readRawValue(body, key);
    if (raw === undefined) {
        return undefined;
    }
    const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
    if (Number.isFinite(value) && value > 0) {
        return value;
    }
    logWarn(`${file}: ${key} must be a positive integer, got '${raw}'; ignored`);
    return undefined;
}

function readStringArray(body: string, key: string, file: string): string[] | undefined {
    const raw = readRawValue(body, key);
    if (raw === undefined) {
        return undefined;
    }
    if (!raw.startsWith('[')) {
        logWarn(`${file}: ${key} must be an array of strings; ignored`);
        return undefined;
    }

    // Extract quoted strings (single or double)
    const stringPattern = /"([^"]*)"|'([^']*)'/g;
    const values: string[] = [];
    let m: RegExpExecArray | null;
    while ((m = stringPattern.exec(raw)) !== null) {
        const value = (m[1] ?? m[2]).trim();
        if (value.length > 0) {
            values.push(value);
        }
    }
    return values;
}

function readString(body: string, key: string): string | undefined {
    const raw = readRawValue(body, key);
    const match = raw === undefined ? null : /^"([^"]*)"$|^'([^']*)'$/.exec(raw);
    return match ? match[1] ?? match[2] : undefined;
}

function isConflictPolicy(value: string): value is ConflictPolicy {
    return value === 'first-declared' || value === 'last-declared';
}

/**
 * Parses `[tool.unstar]` from the content of a `pyproject.toml`.
 *
 * `line-length` falls back to `[tool.black]`, then `[tool.ruff]`.
 * Relative `search-paths` are returned as written.
 */
export function parseUnstarSettings(content: string, file = 'pyproject.toml'): PyprojectSettings {
    const body = readSection(content, 'tool.unstar') ?? '';

    let conflictPolicy: ConflictPolicy | undefined;
    const policy = readString(body, 'conflict-policy');
    if (policy !== undefined) {
        if (isConflictPolicy(policy)) {
            conflictPolicy = policy;
        } else {
            logWarn(`${file}: unknown conflict-policy '${policy}'; ignored`);
        }
    }

    return {
        inferExports: readBoolean(body, 'infer-exports', file),
        createAll: readBoolean(body, 'create-all', file),
        format: readBoolean(body, 'format', file),
        lineLength: readPositiveInteger(body, 'line-length', file) ?? readLineLength(content, file),
        searchPaths: readStringArray(body, 'search-paths', file),
        conflictPolicy,
        inferImportedNames: readBoolean(body, 'infer-imported-names', file),
        exclude: readStringArray(body, 'exclude', file),
    };
}

/**
 * Reads `line-length` from `[tool.black]`, then `[tool.ruff]`.
 */
function readLineLength(content: string, file: string): number | undefined {
    for (const header of ['tool.black', 'tool.ruff']) {
        const body = readSection(content, header);
        const value = body === undefined ? undefined : readPositiveInteger(body, 'line-length', file);
        if (value !== undefined) {
            log(`${file}: line-length = ${value} (from [${header}])`);
            return value;
        }
    }
    return undefined;
}

/**
 * Reads the settings of the nearest `pyproject.toml` above `startDir`.
 *
 * @returns the settings and the directory holding the file, or
 *          `undefined` when there is none
 */
export function readPyprojectSettings(
    host: FileHost,
    startDir: string,
): { settings: PyprojectSettings; dir: string } | undefined {
    const file = findPyproject(host, startDir);
    const content = file === undefined ? undefined : host.readFile(file);
    if (file === undefined || content === undefined) {
        log('No pyproject.toml found.');
        return undefined;
    }

    log(`Reading settings from ${file}`);
    return { settings: parseUnstarSettings(content, file), dir: path.dirname(file) };
}
