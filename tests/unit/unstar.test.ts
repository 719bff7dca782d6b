import { strict as assert } from 'node:assert';
import { afterEach, describe, it } from 'mocha';
import { disposeExportCache } from '../../src/analysis/export-cache';
import type { RewriteResult, UnstarConfig } from '../../src/types';
import { applyResult, DEFAULT_CONFIG, processFile, UnreadableFileError } from '../../src/unstar';
import { disposeOutputChannel } from '../../src/utils/logger';
import { createRecordingFormatter, MemoryFileHost } from './mocks/file-host';

const MAIN = '/proj/pkg/main.py';
const SHAPES = '/proj/pkg/shapes.py';

const CONFIG: UnstarConfig = { ...DEFAULT_CONFIG, format: false, searchPaths: ['/proj'] };

function projectWith(main: string): MemoryFileHost {
    return new MemoryFileHost({
        '/proj/pkg/__init__.py': '',
        [SHAPES]: 'def area(r): ...\nclass Circle: ...\ndef unused(): ...\n',
        '/proj/pkg/declared.py': '__all__ = ["a"]\na = 1\nb = 2\n',
        [MAIN]: main,
    });
}

function run(main: string, config: Partial<UnstarConfig> = {}): { host: MemoryFileHost; result: RewriteResult } {
    const host = projectWith(main);
    return { host, result: processFile(MAIN, { ...CONFIG, ...config }, { host }) };
}

describe('unstar', () => {
    afterEach(() => {
        disposeExportCache();
        disposeOutputChannel();
    });

    // ------------------------------------------------------------------
    // processFile
    // ------------------------------------------------------------------
    describe('processFile', () => {
        const SOURCE = 'from .shapes import *\nfrom .declared import *\n\nprint(area(Circle()), a)\n';

        it('narrows every wildcard import to the names used', () => {
            const { result } = run(SOURCE);
            assert.equal(result.text, 'from .shapes import area, Circle\nfrom .declared import a\n\nprint(area(Circle()), a)\n');
            assert.equal(result.changed, true);
            assert.deepEqual(result.issues, []);
            assert.deepEqual(result.exportWrites, []);
        });

        it('leaves its own output unchanged on a second run', () => {
            const { host, result } = run(SOURCE);
            host.setFile(MAIN, result.text);
            const second = processFile(MAIN, CONFIG, { host });
            assert.equal(second.changed, false);
            assert.equal(second.text, result.text);
            assert.deepEqual(second.issues, []);
        });

        it('returns files without wildcard imports byte for byte', () => {
            const source = 'x  =  1   # spaced\r\nprint( x )';
            const { result } = run(source);
            assert.equal(result.text, source);
            assert.equal(result.changed, false);
            assert.deepEqual(result.issues, []);
        });

        it('leaves the file unchanged when a name has no source', () => {
            const source = 'from .shapes import *\nprint(area, z)\n';
            const { result } = run(source);
            assert.equal(result.text, source);
            assert.deepEqual(
                result.issues.map(issue => [issue.code, issue.range.start]),
                [['unresolved-name', { line: 1, character: 12 }]],
            );
            assert.deepEqual([...result.resolutions.values()], [{ outcome: 'unchanged', reason: 'unresolved-names' }]);
        });

        it('removes a wildcard import that provides nothing used', () => {
            const { result } = run('from .shapes import *\nimport os\nos.getcwd()\n');
            assert.equal(result.text, 'import os\nos.getcwd()\n');
            assert.deepEqual(result.issues.map(issue => issue.code), ['wildcard-removed']);
        });

        it('only rewrites the module named by config.module', () => {
            const { result } = run(SOURCE, { module: 'pkg.declared' });
            assert.equal(result.text, 'from .shapes import *\nfrom .declared import a\n\nprint(area(Circle()), a)\n');
        });

        it('reports files that do not parse', () => {
            const { result } = run('def broken(:\n');
            assert.equal(result.changed, false);
            assert.deepEqual(result.issues.map(issue => [issue.code, issue.severity]), [['parse-failure', 1]]);
        });

        it('keeps the names that module-level code reads before rebinding them', () => {
            const source = 'from .base import *\n\nDEBUG = True\nINSTALLED_APPS += ["debug_toolbar"]\n';
            const host = new MemoryFileHost({
                '/proj/pkg/__init__.py': '',
                '/proj/pkg/base.py': 'INSTALLED_APPS = ["app"]\nDEBUG = False\n',
                [MAIN]: source,
            });
            const result = processFile(MAIN, CONFIG, { host });
            assert.equal(result.text, source.replace('import *', 'import INSTALLED_APPS'));
            assert.deepEqual(result.issues, []);
        });

        it('keeps a name that a function rebinds under global', () => {
            const host = new MemoryFileHost({
                '/proj/pkg/__init__.py': '',
                '/proj/pkg/state.py': 'counter = 0\n',
                [MAIN]: 'from .state import *\n\ndef bump():\n    global counter\n    counter += 1\n',
            });
            const result = processFile(MAIN, CONFIG, { host });
            assert.equal(result.text, 'from .state import counter\n\ndef bump():\n    global counter\n    counter += 1\n');
        });

        it('leaves a module that star-imports others unchanged while names are unclaimed', () => {
            const source = 'from .facade import *\nfrom not_installed import *\nown()\nhelper()\n';
            const host = new MemoryFileHost({
                '/proj/pkg/__init__.py': '',
                '/proj/pkg/facade.py': 'from .base import *\ndef own(): ...\n',
                '/proj/pkg/base.py': 'def helper(): ...\n',
                [MAIN]: source,
            });
            const result = processFile(MAIN, CONFIG, { host });
            assert.equal(result.text, source);
            assert.equal(result.changed, false);
            assert.deepEqual(
                [...result.resolutions.values()],
                [
                    { outcome: 'unchanged', reason: 'incomplete-exports' },
                    { outcome: 'unchanged', reason: 'indeterminate' },
                ],
            );
        });

        it('throws for unreadable files', () => {
            assert.throws(() => processFile('/proj/missing.py', CONFIG, { host: projectWith('') }), UnreadableFileError);
        });
    });

    // ------------------------------------------------------------------
    // Formatting
    // ------------------------------------------------------------------
    describe('formatting', () => {
        it('formats changed files', () => {
            const formatter = createRecordingFormatter();
            processFile(MAIN, { ...CONFIG, format: true }, { host: projectWith('from .shapes import *\narea(1)\n'), formatter });
            assert.deepEqual(formatter.calls, [MAIN]);
        });

        it('skips the formatter for unchanged files and dry runs', () => {
            const formatter = createRecordingFormatter();
            processFile(MAIN, { ...CONFIG, format: true }, { host: projectWith('x = 1\n'), formatter });
            processFile(MAIN, { ...CONFIG, format: true, dryRun: true }, { host: projectWith('from .shapes import *\narea(1)\n'), formatter });
            assert.deepEqual(formatter.calls, []);
        });

        it('keeps the rewrite when the formatter fails', () => {
            const formatter = createRecordingFormatter(true);
            const result = processFile(MAIN, { ...CONFIG, format: true }, { host: projectWith('from .shapes import *\narea(1)\n'), formatter });
            assert.equal(result.text, 'from .shapes import area\narea(1)\n');
            assert.deepEqual(
                result.issues.map(issue => issue.message),
                ['black not available: spawnSync black ENOENT; output left unformatted'],
            );
        });
    });

    // ------------------------------------------------------------------
    // __all__ creation and applyResult
    // ------------------------------------------------------------------
    describe('applyResult', () => {
        it('writes the file and the inferred __all__', () => {
            const { host, result } = run('from .shapes import *\nprint(area)\n', { createAll: true });
            assert.deepEqual(
                result.exportWrites.map(write => [write.path, write.names]),
                [[SHAPES, ['area', 'Circle', 'unused']]],
            );

            assert.deepEqual(applyResult(result, host), [MAIN, SHAPES]);
            assert.equal(host.readFile(MAIN), 'from .shapes import area\nprint(area)\n');
            assert.equal(
                host.readFile(SHAPES),
                '__all__ = ["area", "Circle", "unused"]\n\ndef area(r): ...\nclass Circle: ...\ndef unused(): ...\n',
            );
        });

        it('does not create __all__ for declared modules', () => {
            const { result } = run('from .declared import *\nprint(a)\n', { createAll: true });
            assert.deepEqual(result.exportWrites, []);
        });

        it('skips an __all__ write when the module changed meanwhile', () => {
            const { host, result } = run('from .shapes import *\nprint(area)\n', { createAll: true });
            host.setFile(SHAPES, 'def area(r): return r\n');
            assert.deepEqual(applyResult(result, host), [MAIN]);
            assert.equal(host.readFile(SHAPES), 'def area(r): return r\n');
        });

        it('writes each module at most once per run', () => {
            const { host, result } = run('from .shapes import *\nprint(area)\n', { createAll: true });
            const written = new Set<string>([SHAPES]);
            assert.deepEqual(applyResult(result, host, written), [MAIN]);
        });

        it('writes nothing for an unchanged result', () => {
            const { host, result } = run('x = 1\n');
            assert.deepEqual(applyResult(result, host), []);
            assert.deepEqual(host.writes, []);
        });
    });
});
