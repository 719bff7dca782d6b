import { DiagnosticSeverity } from 'vscode-languageserver-types';
import type { Range } from 'vscode-languageserver-types';
import type {
    ConflictPolicy,
    ExportSet,
    RewriteIssue,
    WildcardImport,
    WildcardResolution,
} from '../types';
import { compareNames } from '../utils/text-utils';
import { IndeterminateExportsError } from './module-exporter';

export interface ResolveOptions {
    readonly conflictPolicy: ConflictPolicy;
    /**
     * Whether a wildcard import may be rewritten.  Imports that may not
     * are still resolved so that they keep claiming their names.
     */
    readonly isTargeted: (imp: WildcardImport) => boolean;
    /** Names an import may provide but that are never reported unresolved. */
    readonly optionalNames?: ReadonlySet<string>;
}

/**
 * Returns the export set of a wildcard-imported module.  Throws
 * {@link IndeterminateExportsError} when it cannot be determined.
 */
export type ExportLookup = (imp: WildcardImport) => ExportSet;

export interface ResolveOutcome {
    /** One resolution per wildcard import, in source order. */
    readonly resolutions: Map<WildcardImport, WildcardResolution>;
    readonly issues: RewriteIssue[];
    /** Export sets of the imports whose module could be analysed. */
    readonly exportSets: Map<WildcardImport, ExportSet>;
}

/**
 * Attributes each free name of a file to exactly one wildcard import
 * and decides what becomes of every wildcard import.
 *
 * @param wildcards the file's module-scope wildcard imports, in source order
 * @param usage free names of the file, mapped to where each is first used
 */
export function resolveImports(
    wildcards: readonly WildcardImport[],
    usage: ReadonlyMap<string, Range>,
    exportsOf: ExportLookup,
    options: ResolveOptions,
): ResolveOutcome {
    const issues: RewriteIssue[] = [];
    const exportSets = new Map<WildcardImport, ExportSet>();
    const claims = new Map<WildcardImport, string[]>();
    const claimedBy = new Map<string, WildcardImport>();
    const indeterminate = new Set<WildcardImport>();

    // Under `last-declared` the later import wins, as it would at run time.
    const ordered = options.conflictPolicy === 'last-declared' ? [...wildcards].reverse() : wildcards;

    for (const imp of ordered) {
        let set: ExportSet;
        try {
            set = exportsOf(imp);
        } catch (err) {
            if (!(err instanceof IndeterminateExportsError)) {
                throw err;
            }
            indeterminate.add(imp);
            issues.push({
                code: 'indeterminate-exports',
                message: `${err.message}; 'from ${imp.module} import *' left unchanged`,
                severity: DiagnosticSeverity.Warning,
                range: imp.range,
                module: imp.module,
            });
            continue;
        }
        exportSets.set(imp, set);

        for (const nested of set.nestedWildcards) {
            issues.push({
                code: 'nested-wildcard-export',
                message: `Module '${imp.module}' star-imports '${nested}'; names it re-exports are not counted`,
                severity: DiagnosticSeverity.Warning,
                range: imp.range,
                module: imp.module,
            });
        }

        const names: string[] = [];
        for (const name of usage.keys()) {
            if (!set.names.has(name)) {
                continue;
            }
            const owner = claimedBy.get(name);
            if (owner) {
                issues.push({
                    code: 'ambiguous-attribution',
                    message: `'${name}' is exported by both '${owner.module}' and '${imp.module}'; importing it from '${owner.module}'`,
                    severity: DiagnosticSeverity.Warning,
                    range: imp.range,
                    module: imp.module,
                    name,
                });
                continue;
            }
            claimedBy.set(name, imp);
            names.push(name);
        }
        claims.set(imp, names);
    }

    // Unclaimed names are presumed to come from an indeterminate import,
    // or through an incomplete one; without either, nothing is rewritten
    // rather than guessing.
    const unclaimed = [...usage].filter(([name]) => !claimedBy.has(name) && !options.optionalNames?.has(name));
    const incomplete = [...exportSets.values()].some(set => !set.complete);
    const unresolved = unclaimed.length > 0 && indeterminate.size === 0 && !incomplete;
    if (unresolved) {
        for (const [name, range] of unclaimed) {
            issues.push({
                code: 'unresolved-name',
                message: `'${name}' is not defined in this file nor exported by any wildcard-imported module`,
                severity: DiagnosticSeverity.Warning,
                range,
                name,
            });
        }
    }

    const resolutions = new Map<WildcardImport, WildcardResolution>();
    for (const imp of wildcards) {
        resolutions.set(imp, decide(imp));
    }
    return { resolutions, issues, exportSets };

    function decide(imp: WildcardImport): WildcardResolution {
        const set = exportSets.get(imp);
        const names = claims.get(imp);
        if (!set || !names) {
            return { outcome: 'unchanged', reason: 'indeterminate' };
        }
        if (unclaimed.length > 0 && !set.complete) {
            return { outcome: 'unchanged', reason: 'incomplete-exports' };
        }
        if (unresolved) {
            return { outcome: 'unchanged', reason: 'unresolved-names' };
        }
        if (!options.isTargeted(imp)) {
            return { outcome: 'unchanged', reason: 'not-targeted' };
        }
        if (names.length > 0) {
            return { outcome: 'narrowed', names: [...names].sort(compareNames) };
        }
        if (set.provenance === 'declared') {
            issues.push({
                code: 'wildcard-unused',
                message: `No name exported by '${imp.module}' is used; import kept because '${imp.module}' declares __all__`,
                severity: DiagnosticSeverity.Information,
                range: imp.range,
                module: imp.module,
            });
            return { outcome: 'unchanged', reason: 'unused-declared' };
        }
        issues.push({
            code: 'wildcard-removed',
            message: `No name exported by '${imp.module}' is used; import removed`,
            severity: DiagnosticSeverity.Information,
            range: imp.range,
            module: imp.module,
        });
        return { outcome: 'removed' };
    }
}
