import { strict as assert } from 'node:assert';
import { afterEach, describe, it } from 'mocha';
import { disposeExportCache } from '../../src/analysis/export-cache';
import type { ExporterOptions } from '../../src/analysis/module-exporter';
import { IndeterminateExportsError, ModuleExporter } from '../../src/analysis/module-exporter';
import { createOutputChannel, disposeOutputChannel } from '../../src/utils/logger';
import { MemoryFileHost } from './mocks/file-host';
import { compareNames } from '../../src/utils/text-utils';

const IMPORTER = '/project/pkg/main.py';

const DEFAULT_OPTIONS: ExporterOptions = {
    inferExports: true,
    inferImportedNames: false,
    searchPaths: ['/project'],
};

function exporterFor(files: Record<string, string>, options: Partial<ExporterOptions> = {}) {
    const host = new MemoryFileHost({ [IMPORTER]: 'from .shapes import *\n', ...files });
    return { host, exporter: new ModuleExporter(host, { ...DEFAULT_OPTIONS, ...options }) };
}

function sortedNames(names: ReadonlySet<string>): string[] {
    return [...names].sort(compareNames);
}

function indeterminateReason(run: () => unknown): string | undefined {
    try {
        run();
    } catch (err) {
        if (err instanceof IndeterminateExportsError) {
            return err.reason;
        }
        throw err;
    }
    return undefined;
}

describe('module-exporter', () => {
    afterEach(() => {
        disposeExportCache();
        disposeOutputChannel();
    });

    // ------------------------------------------------------------------
    // Declared exports
    // ------------------------------------------------------------------
    describe('declared __all__', () => {
        it('returns the declared names verbatim', () => {
            const { exporter } = exporterFor({
                '/project/pkg/shapes.py': '__all__ = ["area"]\n\ndef area(): ...\ndef perimeter(): ...\n',
            });
            const set = exporter.getExports(IMPORTER, '.shapes');
            assert.deepEqual(sortedNames(set.names), ['area']);
            assert.equal(set.provenance, 'declared');
            assert.equal(set.source, 'module-file');
            assert.equal(set.module, 'pkg.shapes');
            assert.equal(set.path, '/project/pkg/shapes.py');
            assert.equal(set.complete, true);
        });

        it('treats a computed __all__ as indeterminate', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': '__all__ = list(NAMES)\n' });
            assert.equal(indeterminateReason(() => exporter.getExports(IMPORTER, '.shapes')), 'dynamic-all');
        });
    });

    // ------------------------------------------------------------------
    // Inferred exports
    // ------------------------------------------------------------------
    describe('inference', () => {
        const MODULE = [
            'import os',
            'from math import pi',
            '_private = 1',
            'PUBLIC = 2',
            'def helper(): pass',
            'class Thing: pass',
            'for index in range(3): pass',
            '',
        ].join('\n');

        it('infers public top-level bindings and skips imports', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': MODULE });
            const set = exporter.getExports(IMPORTER, '.shapes');
            assert.deepEqual(sortedNames(set.names), ['helper', 'index', 'PUBLIC', 'Thing']);
            assert.equal(set.provenance, 'inferred');
            assert.equal(set.complete, true);
        });

        it('adds imported names when asked to', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': MODULE }, { inferImportedNames: true });
            const set = exporter.getExports(IMPORTER, '.shapes');
            assert.deepEqual(sortedNames(set.names), ['helper', 'index', 'os', 'pi', 'PUBLIC', 'Thing']);
        });

        it('refuses to infer when inference is disabled', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': MODULE }, { inferExports: false });
            assert.equal(indeterminateReason(() => exporter.getExports(IMPORTER, '.shapes')), 'inference-disabled');
        });

        it('marks the set incomplete when the module star-imports', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': 'from .base import *\nvalue = 1\n' });
            const set = exporter.getExports(IMPORTER, '.shapes');
            assert.deepEqual(sortedNames(set.names), ['value']);
            assert.equal(set.complete, false);
            assert.deepEqual(set.nestedWildcards, ['.base']);
        });

        it('logs how many names were inferred', () => {
            const lines: string[] = [];
            createOutputChannel(text => lines.push(text));
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': 'a = 1\nb = 2\n' });
            exporter.getExports(IMPORTER, '.shapes');
            assert.equal(lines.length, 1);
            assert.ok(lines[0].endsWith('] No __all__ found in pkg.shapes; 2 exports have been inferred\n'));
        });
    });

    // ------------------------------------------------------------------
    // Locating modules
    // ------------------------------------------------------------------
    describe('locating modules', () => {
        it('finds absolute modules in the search paths', () => {
            const { exporter } = exporterFor({ '/project/lib/tools.py': 'def run(): pass\n' });
            const set = exporter.getExports(IMPORTER, 'lib.tools');
            assert.deepEqual(sortedNames(set.names), ['run']);
            assert.equal(set.module, 'lib.tools');
        });

        it('prefers a module file over a package of the same name', () => {
            const { exporter } = exporterFor({
                '/project/pkg/util.py': 'from_file = 1\n',
                '/project/pkg/util/__init__.py': 'from_package = 1\n',
            });
            assert.deepEqual(sortedNames(exporter.getExports(IMPORTER, '.util').names), ['from_file']);
        });

        it('falls back to known standard-library exports', () => {
            const { exporter } = exporterFor({});
            const set = exporter.getExports(IMPORTER, 'os.path');
            assert.equal(set.source, 'known-symbols');
            assert.equal(set.provenance, 'inferred');
            assert.ok(set.names.has('join'));
        });

        it('reports unknown modules as indeterminate', () => {
            const { exporter } = exporterFor({});
            assert.equal(indeterminateReason(() => exporter.getExports(IMPORTER, 'vendor.sdk')), 'module-not-found');
        });

        it('reports modules that do not parse as indeterminate', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': 'def broken(:\n' });
            assert.equal(indeterminateReason(() => exporter.getExports(IMPORTER, '.shapes')), 'parse-failure');
        });
    });

    // ------------------------------------------------------------------
    // Caching
    // ------------------------------------------------------------------
    describe('caching', () => {
        it('re-reads a module whose version changed', () => {
            const { host, exporter } = exporterFor({ '/project/pkg/shapes.py': 'old = 1\n' });
            assert.deepEqual(sortedNames(exporter.getExports(IMPORTER, '.shapes').names), ['old']);

            host.setFile('/project/pkg/shapes.py', 'new = 1\n');
            assert.deepEqual(sortedNames(exporter.getExports(IMPORTER, '.shapes').names), ['new']);
        });
    });

    // ------------------------------------------------------------------
    // createExportListWrite
    // ------------------------------------------------------------------
    describe('createExportListWrite', () => {
        it('builds the write request for an inferred module', () => {
            const { exporter } = exporterFor({ '/project/pkg/shapes.py': 'def area(): pass\n' });
            const set = exporter.getExports(IMPORTER, '.shapes');
            const write = exporter.createExportListWrite(set, 88);
            assert.equal(write?.text, '__all__ = ["area"]\n\ndef area(): pass\n');
        });
    });
});
