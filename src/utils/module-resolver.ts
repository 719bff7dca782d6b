import * as path from 'node:path';
import type { FileHost } from './file-host';

/**
 * Resolves Python module names against the file system.
 *
 * Relative imports are resolved from the importing file's directory;
 * absolute imports are looked up in an ordered list of search roots.
 * A module file (`a/b.py`) wins over a package (`a/b/__init__.py`).
 */

/**
 * Directories that hold third-party or environment packages, or tool
 * state.  These are never traversed.
 */
export const DEFAULT_EXCLUDED_DIRECTORIES: readonly string[] = [
    '.venv',
    'venv',
    '.tox',
    '.nox',
    '__pycache__',
    'site-packages',
    'node_modules',
    '.git',
];

/** Splits a module as written (`..pkg.mod`) into its level and dotted name. */
export function splitModuleText(moduleText: string): { level: number; name: string } {
    const match = /^\.*/.exec(moduleText);
    const level = match ? match[0].length : 0;
    return { level, name: moduleText.slice(level) };
}

/**
 * Finds the file of a module imported by `importerPath`.
 *
 * @param moduleText the module as written in the import, relative dots included
 * @returns the absolute path of the `.py` file, or `undefined`
 */
export function locateModule(
    host: FileHost,
    importerPath: string,
    moduleText: string,
    searchPaths: readonly string[],
): string | undefined {
    const { level, name } = splitModuleText(moduleText);
    const parts = name === '' ? [] : name.split('.');

    if (level > 0) {
        let base = path.dirname(importerPath);
        for (let i = 1; i < level; i++) {
            base = path.dirname(base);
        }
        return findModuleFile(host, path.join(base, ...parts), parts.length === 0);
    }

    for (const root of searchPaths) {
        const found = findModuleFile(host, path.join(root, ...parts), false);
        if (found) {
            return found;
        }
    }
    return undefined;
}

function findModuleFile(host: FileHost, base: string, packageOnly: boolean): string | undefined {
    if (!packageOnly && host.fileExists(`${base}.py`)) {
        return `${base}.py`;
    }
    const init = path.join(base, '__init__.py');
    return host.fileExists(init) ? init : undefined;
}

/**
 * Returns the dotted module name of a file, relative to the first search
 * root that contains it (`/src/pkg/sub/__init__.py` → `pkg.sub`).
 */
export function moduleNameForPath(filePath: string, searchPaths: readonly string[]): string | undefined {
    for (const root of searchPaths) {
        const relative = path.relative(root, filePath);
        if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
            continue;
        }

        const segments = relative.replace(/\.py$/, '').split(path.sep);
        if (segments[segments.length - 1] === '__init__') {
            segments.pop();
        }
        if (segments.length > 0 && segments.every(segment => /^[\p{L}_][\p{L}\p{N}_]*$/u.test(segment))) {
            return segments.join('.');
        }
    }
    return undefined;
}

/**
 * Converts a module as written in a file into its absolute dotted name.
 *
 * Given `from ..models import *` in `/src/app/views/home.py` with
 * `/src` as a search root, returns `app.models`.  Absolute module names
 * are returned unchanged; `undefined` when the importing file lies
 * outside every search root or the dots climb above it.
 */
export function resolveRelativeImport(
    importerPath: string,
    moduleText: string,
    searchPaths: readonly string[],
): string | undefined {
    const { level, name } = splitModuleText(moduleText);
    if (level === 0) {
        return name;
    }

    const importerName = moduleNameForPath(importerPath, searchPaths);
    if (importerName === undefined) {
        return undefined;
    }

    const packageParts = importerName.split('.');
    if (path.basename(importerPath) !== '__init__.py') {
        packageParts.pop();
    }
    if (level - 1 > packageParts.length) {
        return undefined;
    }

    const base = packageParts.slice(0, packageParts.length - (level - 1));
    const parts = name === '' ? base : [...base, name];
    return parts.length > 0 ? parts.join('.') : undefined;
}
