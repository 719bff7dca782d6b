import { strict as assert } from 'node:assert';
import { describe, it } from 'mocha';
import type { Range } from 'vscode-languageserver-types';
import { parseWildcardImports } from '../../src/analysis/import-parser';
import type { ExportLookup, ResolveOptions } from '../../src/analysis/import-resolver';
import { resolveImports } from '../../src/analysis/import-resolver';
import { IndeterminateExportsError } from '../../src/analysis/module-exporter';
import { createSourceFile } from '../../src/parsing/source-file';
import type { ExportSet, WildcardImport, WildcardResolution } from '../../src/types';

const AT: Range = { start: { line: 9, character: 0 }, end: { line: 9, character: 1 } };

function wildcardsOf(source: string): WildcardImport[] {
    return parseWildcardImports(createSourceFile('/project/main.py', source));
}

function usageOf(...names: string[]): Map<string, Range> {
    return new Map(names.map(name => [name, AT]));
}

function exportSet(module: string, names: string[], overrides: Partial<ExportSet> = {}): ExportSet {
    return {
        module,
        names: new Set(names),
        provenance: 'inferred',
        source: 'module-file',
        path: `/project/${module}.py`,
        complete: true,
        nestedWildcards: [],
        ...overrides,
    };
}

function lookup(sets: Record<string, ExportSet | undefined>): ExportLookup {
    return imp => {
        const set = sets[imp.module];
        if (!set) {
            throw new IndeterminateExportsError(imp.module, 'module-not-found', `Cannot find module '${imp.module}'`);
        }
        return set;
    };
}

const FIRST: ResolveOptions = { conflictPolicy: 'first-declared', isTargeted: () => true };

function outcomes(resolutions: ReadonlyMap<WildcardImport, WildcardResolution>): Record<string, WildcardResolution> {
    const result: Record<string, WildcardResolution> = {};
    for (const [imp, resolution] of resolutions) {
        result[imp.module] = resolution;
    }
    return result;
}

describe('import-resolver', () => {
    // ------------------------------------------------------------------
    // Attribution
    // ------------------------------------------------------------------
    describe('attribution', () => {
        it('narrows each import to the names it provides, sorted', () => {
            const wildcards = wildcardsOf('from a import *\nfrom b import *\n');
            const { resolutions, issues } = resolveImports(
                wildcards,
                usageOf('zeta', 'Alpha', 'beta'),
                lookup({ a: exportSet('a', ['zeta', 'Alpha', 'unused']), b: exportSet('b', ['beta']) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), {
                a: { outcome: 'narrowed', names: ['Alpha', 'zeta'] },
                b: { outcome: 'narrowed', names: ['beta'] },
            });
            assert.deepEqual(issues, []);
        });

        it('gives a shared name to the first import by default', () => {
            const wildcards = wildcardsOf('from a import *\nfrom b import *\n');
            const { resolutions, issues } = resolveImports(
                wildcards,
                usageOf('shared', 'only_b'),
                lookup({ a: exportSet('a', ['shared']), b: exportSet('b', ['shared', 'only_b']) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), {
                a: { outcome: 'narrowed', names: ['shared'] },
                b: { outcome: 'narrowed', names: ['only_b'] },
            });
            assert.equal(issues.length, 1);
            assert.equal(issues[0].code, 'ambiguous-attribution');
            assert.equal(issues[0].message, "'shared' is exported by both 'a' and 'b'; importing it from 'a'");
        });

        it('gives a shared name to the last import under last-declared', () => {
            const wildcards = wildcardsOf('from a import *\nfrom b import *\n');
            const { resolutions } = resolveImports(
                wildcards,
                usageOf('shared'),
                lookup({ a: exportSet('a', ['shared']), b: exportSet('b', ['shared']) }),
                { ...FIRST, conflictPolicy: 'last-declared' },
            );
            assert.deepEqual(outcomes(resolutions), {
                a: { outcome: 'removed' },
                b: { outcome: 'narrowed', names: ['shared'] },
            });
        });
    });

    // ------------------------------------------------------------------
    // Names nobody provides
    // ------------------------------------------------------------------
    describe('unresolved names', () => {
        it('leaves every import unchanged when a name has no source', () => {
            const wildcards = wildcardsOf('from a import *\n');
            const { resolutions, issues } = resolveImports(
                wildcards,
                usageOf('known', 'mystery'),
                lookup({ a: exportSet('a', ['known']) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), { a: { outcome: 'unchanged', reason: 'unresolved-names' } });
            assert.deepEqual(issues, [
                {
                    code: 'unresolved-name',
                    message: "'mystery' is not defined in this file nor exported by any wildcard-imported module",
                    severity: 2,
                    range: AT,
                    name: 'mystery',
                },
            ]);
        });

        it('presumes unclaimed names come from an indeterminate import', () => {
            const wildcards = wildcardsOf('from a import *\nfrom vendor import *\n');
            const { resolutions, issues } = resolveImports(
                wildcards,
                usageOf('known', 'mystery'),
                lookup({ a: exportSet('a', ['known']) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), {
                a: { outcome: 'narrowed', names: ['known'] },
                vendor: { outcome: 'unchanged', reason: 'indeterminate' },
            });
            assert.deepEqual(
                issues.map(issue => [issue.code, issue.message]),
                [['indeterminate-exports', "Cannot find module 'vendor'; 'from vendor import *' left unchanged"]],
            );
        });
    });

    // ------------------------------------------------------------------
    // Unused imports
    // ------------------------------------------------------------------
    describe('unused imports', () => {
        it('removes an unused import with inferred exports', () => {
            const { resolutions, issues } = resolveImports(
                wildcardsOf('from a import *\n'),
                usageOf(),
                lookup({ a: exportSet('a', ['x']) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), { a: { outcome: 'removed' } });
            assert.deepEqual(issues.map(issue => issue.code), ['wildcard-removed']);
        });

        it('keeps an unused import whose module declares __all__', () => {
            const { resolutions, issues } = resolveImports(
                wildcardsOf('from a import *\n'),
                usageOf(),
                lookup({ a: exportSet('a', ['x'], { provenance: 'declared' }) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), { a: { outcome: 'unchanged', reason: 'unused-declared' } });
            assert.deepEqual(issues.map(issue => issue.severity), [3]);
        });
    });

    // ------------------------------------------------------------------
    // Targeting
    // ------------------------------------------------------------------
    describe('targeting', () => {
        it('lets untargeted imports claim names without rewriting them', () => {
            const wildcards = wildcardsOf('from a import *\nfrom b import *\n');
            const { resolutions } = resolveImports(
                wildcards,
                usageOf('shared'),
                lookup({ a: exportSet('a', ['shared']), b: exportSet('b', ['shared']) }),
                { ...FIRST, isTargeted: imp => imp.module === 'b' },
            );
            assert.deepEqual(outcomes(resolutions), {
                a: { outcome: 'unchanged', reason: 'not-targeted' },
                b: { outcome: 'removed' },
            });
        });
    });

    describe('nested wildcards', () => {
        it('warns about names re-exported through star imports', () => {
            const { issues } = resolveImports(
                wildcardsOf('from a import *\n'),
                usageOf('x'),
                lookup({ a: exportSet('a', ['x'], { complete: false, nestedWildcards: ['.base'] }) }),
                FIRST,
            );
            assert.deepEqual(
                issues.map(issue => issue.message),
                ["Module 'a' star-imports '.base'; names it re-exports are not counted"],
            );
        });

        it('keeps an incomplete import when a name is unclaimed', () => {
            const { resolutions, issues } = resolveImports(
                wildcardsOf('from facade import *\nfrom vendor import *\n'),
                usageOf('own', 'helper'),
                lookup({ facade: exportSet('facade', ['own'], { complete: false, nestedWildcards: ['.base'] }) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), {
                facade: { outcome: 'unchanged', reason: 'incomplete-exports' },
                vendor: { outcome: 'unchanged', reason: 'indeterminate' },
            });
            assert.deepEqual(issues.map(issue => issue.code), ['nested-wildcard-export', 'indeterminate-exports']);
        });

        it('does not report names an incomplete import may re-export', () => {
            const { resolutions, issues } = resolveImports(
                wildcardsOf('from facade import *\n'),
                usageOf('own', 'helper'),
                lookup({ facade: exportSet('facade', ['own'], { complete: false, nestedWildcards: ['.base'] }) }),
                FIRST,
            );
            assert.deepEqual(outcomes(resolutions), { facade: { outcome: 'unchanged', reason: 'incomplete-exports' } });
            assert.deepEqual(issues.map(issue => issue.code), ['nested-wildcard-export']);
        });
    });

    // ------------------------------------------------------------------
    // Optional names
    // ------------------------------------------------------------------
    describe('optional names', () => {
        it('claims optional names that an import provides', () => {
            const { resolutions, issues } = resolveImports(
                wildcardsOf('from a import *\n'),
                usageOf('known', 'counter'),
                lookup({ a: exportSet('a', ['known', 'counter']) }),
                { ...FIRST, optionalNames: new Set(['counter']) },
            );
            assert.deepEqual(outcomes(resolutions), { a: { outcome: 'narrowed', names: ['counter', 'known'] } });
            assert.deepEqual(issues, []);
        });

        it('never reports optional names as unresolved', () => {
            const { resolutions, issues } = resolveImports(
                wildcardsOf('from a import *\n'),
                usageOf('known', 'cache'),
                lookup({ a: exportSet('a', ['known']) }),
                { ...FIRST, optionalNames: new Set(['cache']) },
            );
            assert.deepEqual(outcomes(resolutions), { a: { outcome: 'narrowed', names: ['known'] } });
            assert.deepEqual(issues, []);
        });
    });
});
