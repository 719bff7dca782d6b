import { strict as assert } from 'node:assert';
import { afterEach, describe, it } from 'mocha';
import { createOutputChannel, disposeOutputChannel } from '../../src/utils/logger';
import {
    findPyproject,
    parseUnstarSettings,
    readPyprojectSettings,
    readSection,
} from '../../src/utils/pyproject-reader';
import { MemoryFileHost } from './mocks/file-host';

const PYPROJECT = `[project]
name = "shapes"

[tool.unstar]
infer-exports = false
create-all = true  # write __all__
line-length = 100
search-paths = [
    "src",
    'lib',
]
conflict-policy = "last-declared"
exclude = ["build"]

[tool.black]
line-length = 79
`;

describe('pyproject-reader', () => {
    afterEach(() => {
        disposeOutputChannel();
    });

    // ------------------------------------------------------------------
    // readSection
    // ------------------------------------------------------------------
    describe('readSection', () => {
        it('returns the body up to the next header', () => {
            assert.equal(readSection(PYPROJECT, 'project'), '\nname = "shapes"\n\n');
        });

        it('returns undefined for a missing section', () => {
            assert.equal(readSection(PYPROJECT, 'tool.ruff'), undefined);
        });
    });

    // ------------------------------------------------------------------
    // parseUnstarSettings
    // ------------------------------------------------------------------
    describe('parseUnstarSettings', () => {
        it('reads every key of [tool.unstar]', () => {
            assert.deepEqual(parseUnstarSettings(PYPROJECT), {
                inferExports: false,
                createAll: true,
                format: undefined,
                lineLength: 100,
                searchPaths: ['src', 'lib'],
                conflictPolicy: 'last-declared',
                inferImportedNames: undefined,
                exclude: ['build'],
            });
        });

        it('takes line-length from [tool.black] when unset', () => {
            assert.equal(parseUnstarSettings('[tool.black]\nline-length = 79\n').lineLength, 79);
        });

        it('falls back to [tool.ruff] after [tool.black]', () => {
            assert.equal(parseUnstarSettings('[tool.black]\ntarget = "py311"\n\n[tool.ruff]\nline-length = 120\n').lineLength, 120);
        });

        it('ignores invalid values with a warning', () => {
            const lines: string[] = [];
            createOutputChannel(text => lines.push(text));
            const settings = parseUnstarSettings(
                '[tool.unstar]\nline-length = 0\nformat = yes\nconflict-policy = "random"\n',
            );
            assert.equal(settings.lineLength, undefined);
            assert.equal(settings.format, undefined);
            assert.equal(settings.conflictPolicy, undefined);
            assert.equal(lines.length, 3);
            assert.ok(lines[0].endsWith("⚠ pyproject.toml: unknown conflict-policy 'random'; ignored\n"));
            assert.ok(lines[1].endsWith("⚠ pyproject.toml: format must be true or false, got 'yes'; ignored\n"));
            assert.ok(lines[2].endsWith("⚠ pyproject.toml: line-length must be a positive integer, got '0'; ignored\n"));
        });

        it('returns no settings for a file without the section', () => {
            assert.deepEqual(Object.values(parseUnstarSettings('[project]\nname = "x"\n')).filter(v => v !== undefined), []);
        });
    });

    // ------------------------------------------------------------------
    // Locating the file
    // ------------------------------------------------------------------
    describe('findPyproject', () => {
        const host = new MemoryFileHost({
            '/repo/pyproject.toml': PYPROJECT,
            '/repo/pkg/sub/a.py': '',
        });

        it('walks up to the nearest pyproject.toml', () => {
            assert.equal(findPyproject(host, '/repo/pkg/sub'), '/repo/pyproject.toml');
        });

        it('returns undefined when no parent has one', () => {
            assert.equal(findPyproject(new MemoryFileHost({ '/x/a.py': '' }), '/x'), undefined);
        });

        it('returns the settings with their directory', () => {
            const found = readPyprojectSettings(host, '/repo/pkg');
            assert.equal(found?.dir, '/repo');
            assert.equal(found?.settings.lineLength, 100);
        });
    });
});
