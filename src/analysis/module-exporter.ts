import { ParseFailureError } from '../parsing/source-file';
import type { ExportListWrite, ExportSet } from '../types';
import type { FileHost } from '../utils/file-host';
import { log } from '../utils/logger';
import { locateModule, resolveRelativeImport, splitModuleText } from '../utils/module-resolver';
import { getModuleSymbols, hasModuleSymbols } from '../utils/module-symbols';
import { compareNames } from '../utils/text-utils';
import type { ModuleFacts } from './export-cache';
import { getModuleFacts } from './export-cache';
import { createExportListWrite } from './export-list';

/** Why a module's export set cannot be determined. */
export type IndeterminateReason = 'module-not-found' | 'inference-disabled' | 'dynamic-all' | 'parse-failure';

/**
 * Raised when the names a module exports cannot be determined
 * statically.  The wildcard import of such a module is left as written.
 */
export class IndeterminateExportsError extends Error {
    constructor(
        readonly module: string,
        readonly reason: IndeterminateReason,
        message: string,
    ) {
        super(message);
        this.name = 'IndeterminateExportsError';
    }
}

export interface ExporterOptions {
    /** Infer exports of modules without `__all__`. */
    readonly inferExports: boolean;
    /** Count import-bound names when inferring. */
    readonly inferImportedNames: boolean;
    /** Absolute directories searched, in order, for absolute imports. */
    readonly searchPaths: readonly string[];
}

/**
 * Computes the names a wildcard-imported module makes available.
 */
export class ModuleExporter {
    constructor(
        private readonly host: FileHost,
        private readonly options: ExporterOptions,
    ) {}

    /**
     * Returns the export set of `moduleText` (as written, relative dots
     * included) imported from the file at `importerPath`.
     *
     * @throws {IndeterminateExportsError} when the set cannot be determined
     */
    getExports(importerPath: string, moduleText: string): ExportSet {
        const { searchPaths } = this.options;
        const moduleName = resolveRelativeImport(importerPath, moduleText, searchPaths) ?? moduleText;
        const path = locateModule(this.host, importerPath, moduleText, searchPaths);

        if (path === undefined) {
            if (splitModuleText(moduleText).level === 0 && hasModuleSymbols(moduleText)) {
                return {
                    module: moduleName,
                    names: new Set(getModuleSymbols(moduleText)),
                    provenance: 'inferred',
                    source: 'known-symbols',
                    complete: true,
                    nestedWildcards: [],
                };
            }
            throw new IndeterminateExportsError(moduleText, 'module-not-found', `Module '${moduleText}' could not be found`);
        }

        let facts: ModuleFacts | undefined;
        try {
            facts = getModuleFacts(this.host, path);
        } catch (err) {
            if (err instanceof ParseFailureError) {
                throw new IndeterminateExportsError(
                    moduleText,
                    'parse-failure',
                    `Module '${moduleText}' could not be parsed (${err.message})`,
                );
            }
            throw err;
        }
        if (!facts) {
            throw new IndeterminateExportsError(moduleText, 'module-not-found', `Module '${moduleText}' could not be read`);
        }

        const { declared } = facts;
        if (declared?.kind === 'literal') {
            return {
                module: moduleName,
                names: new Set(declared.entries.map(entry => entry.name)),
                provenance: 'declared',
                source: 'module-file',
                path,
                complete: true,
                nestedWildcards: [],
            };
        }
        if (declared?.kind === 'dynamic') {
            throw new IndeterminateExportsError(
                moduleText,
                'dynamic-all',
                `Module '${moduleText}' builds __all__ dynamically`,
            );
        }
        if (!this.options.inferExports) {
            throw new IndeterminateExportsError(
                moduleText,
                'inference-disabled',
                `Module '${moduleText}' has no __all__ and export inference is disabled`,
            );
        }

        const names: string[] = [];
        for (const [name, kinds] of facts.bindings) {
            if (name.startsWith('_')) {
                continue;
            }
            const boundHere = kinds.has('assignment') || kinds.has('definition');
            if (boundHere || (this.options.inferImportedNames && kinds.has('import'))) {
                names.push(name);
            }
        }
        names.sort(compareNames);

        const count = names.length;
        log(`No __all__ found in ${moduleName}; ${count} ${count === 1 ? 'export has' : 'exports have'} been inferred`);

        return {
            module: moduleName,
            names: new Set(names),
            provenance: 'inferred',
            source: 'module-file',
            path,
            complete: facts.wildcards.length === 0,
            nestedWildcards: facts.wildcards,
        };
    }

    /**
     * Returns the request that writes an inferred export set into its
     * module as `__all__`, or `undefined` when the set cannot be written.
     */
    createExportListWrite(set: ExportSet, lineLength: number): ExportListWrite | undefined {
        if (set.path === undefined) {
            return undefined;
        }
        const facts = getModuleFacts(this.host, set.path);
        return facts && createExportListWrite(set, facts.file.tree, facts.file.text, lineLength);
    }
}
