import type { Span } from '../parsing/python-ast';
import type { SourceFile, UsageSet } from '../types';
import { isBuiltinName } from '../utils/python-builtins';
import { readDeclaredExports } from './export-list';
import type { Reference, ScopeAnalysis } from './scopes';
import { analyzeScopes, BOUND_BY_FUNCTION } from './scopes';

export interface UsageSite {
    /** First use of the name. */
    readonly span: Span;
    /**
     * `true` when the module binds the name only from functions under
     * `global`: a wildcard import may provide it, but need not.
     */
    readonly optional: boolean;
}

/**
 * Returns the free names of a file, each mapped to its first use.
 *
 * A name is free when a read of it resolves to the module scope and may
 * run before the module binds it: it can then only come from a wildcard
 * import (or be undefined).  Module and class bodies run top to bottom,
 * so `X += 1` or `X = X * 2` read a wildcard's `X`.  Function bodies run
 * later, so their reads of a name the module body binds are not free.
 * Builtins and implicit module globals are never free.  String entries
 * of the file's own `__all__` count as uses, since the file re-exports
 * those names.
 */
export function collectUsageSites(file: SourceFile): Map<string, UsageSite> {
    const analysis = analyzeScopes(file.tree);
    const sites = new Map<string, UsageSite>();

    const record = (name: string, span: Span, optional: boolean): void => {
        const existing = sites.get(name);
        if (!existing || (existing.optional && !optional)) {
            sites.set(name, { span: existing?.span ?? span, optional });
        }
    };

    for (const reference of analysis.references) {
        const optional = freedom(analysis, reference);
        if (optional !== null) {
            record(reference.name, reference.span, optional);
        }
    }

    const declared = readDeclaredExports(file.tree);
    if (declared?.kind === 'literal') {
        for (const entry of declared.entries) {
            const boundAt = analysis.module.boundAt.get(entry.name);
            if (!isBuiltinName(entry.name) && (boundAt === undefined || boundAt === BOUND_BY_FUNCTION)) {
                record(entry.name, entry.span, boundAt !== undefined);
            }
        }
    }

    return sites;
}

/**
 * Returns `null` when a reference is not free, otherwise whether the
 * name it reads is optional.
 */
function freedom(analysis: ScopeAnalysis, reference: Reference): boolean | null {
    const { module } = analysis;
    if (isBuiltinName(reference.name) || analysis.resolve(reference) !== module) {
        return null;
    }
    const boundAt = module.boundAt.get(reference.name);
    if (boundAt === undefined) {
        return false;
    }
    if (boundAt === BOUND_BY_FUNCTION) {
        return true;
    }
    return !reference.deferred && boundAt > reference.position ? false : null;
}

/**
 * Returns the set of free names of a file.
 */
export function collectUsage(file: SourceFile): UsageSet {
    return new Set(collectUsageSites(file).keys());
}
