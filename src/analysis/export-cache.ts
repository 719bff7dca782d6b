import { createSourceFile } from '../parsing/source-file';
import type { SourceFile } from '../types';
import type { FileHost } from '../utils/file-host';
import type { DeclaredExports } from './export-list';
import { readDeclaredExports } from './export-list';
import { parseWildcardImports } from './import-parser';
import type { BindingKind } from './scopes';
import { analyzeScopes } from './scopes';

/**
 * What the exporter needs to know about a module file, computed once
 * per file version.
 */
export interface ModuleFacts {
    readonly file: SourceFile;
    readonly declared: DeclaredExports | undefined;
    /** Module-scope bindings and how each name was bound. */
    readonly bindings: ReadonlyMap<string, ReadonlySet<BindingKind>>;
    /** Module texts of the module's own top-level wildcard imports. */
    readonly wildcards: readonly string[];
}

interface CacheEntry {
    readonly version: number;
    readonly facts: ModuleFacts;
}

/** Cached module facts keyed by file path. */
const cache = new Map<string, CacheEntry>();

/**
 * Returns the facts for the module file at `path`, or `undefined` when
 * it cannot be read.
 *
 * If the file version matches the cached entry the result is returned
 * immediately (no re-parse).  Otherwise the file is parsed, cached and
 * returned.  Throws `ParseFailureError` when the module does not parse.
 */
export function getModuleFacts(host: FileHost, path: string): ModuleFacts | undefined {
    const version = host.getVersion(path);
    const existing = cache.get(path);
    if (existing && existing.version === version) {
        return existing.facts;
    }

    const text = host.readFile(path);
    if (text === undefined) {
        return undefined;
    }

    const file = createSourceFile(path, text, version);
    const facts: ModuleFacts = {
        file,
        declared: readDeclaredExports(file.tree),
        bindings: analyzeScopes(file.tree).module.bindings,
        wildcards: parseWildcardImports(file).map(imp => imp.module),
    };
    cache.set(path, { version, facts });
    return facts;
}

/**
 * Removes a specific file from the cache (e.g. after it was rewritten).
 */
export function invalidateModuleFacts(path: string): void {
    cache.delete(path);
}

/**
 * Clears the entire cache.
 */
export function disposeExportCache(): void {
    cache.clear();
}
