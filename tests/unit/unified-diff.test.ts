import { strict as assert } from 'node:assert';
import { describe, it } from 'mocha';
import { splitLines, unifiedDiff } from '../../src/fixes/unified-diff';

describe('unified-diff', () => {
    describe('splitLines', () => {
        it('keeps line breaks and a last unterminated line', () => {
            assert.deepEqual(splitLines('a\nb\r\nc'), ['a\n', 'b\r\n', 'c']);
            assert.deepEqual(splitLines(''), []);
        });
    });

    // ------------------------------------------------------------------
    // unifiedDiff
    // ------------------------------------------------------------------
    describe('unifiedDiff', () => {
        it('is empty for equal texts', () => {
            assert.equal(unifiedDiff('same\n', 'same\n', 'f.py'), '');
        });

        it('shows a replaced line with its context', () => {
            assert.equal(
                unifiedDiff('a\nb\nc\n', 'a\nB\nc\n', 'f.py'),
                '--- f.py\n+++ f.py\n@@ -1,3 +1,3 @@\n a\n-b\n+B\n c\n',
            );
        });

        it('names both labels', () => {
            assert.ok(unifiedDiff('a\n', 'b\n', 'old.py', 'new.py').startsWith('--- old.py\n+++ new.py\n'));
        });

        it('uses a single line number for one-line ranges', () => {
            assert.equal(unifiedDiff('a\nb\n', 'a\n', 'f.py'), '--- f.py\n+++ f.py\n@@ -1,2 +1 @@\n a\n-b\n');
        });

        it('names the line before an empty range', () => {
            assert.equal(unifiedDiff('', 'x\n', 'f.py'), '--- f.py\n+++ f.py\n@@ -0,0 +1 @@\n+x\n');
        });

        it('marks lines without a final line break', () => {
            assert.equal(
                unifiedDiff('x', 'x\ny', 'f.py'),
                '--- f.py\n+++ f.py\n@@ -1 +1,2 @@\n' +
                    '-x\n\\ No newline at end of file\n+x\n+y\n\\ No newline at end of file\n',
            );
        });

        it('splits distant changes into separate hunks', () => {
            const before = Array.from({ length: 10 }, (_, i) => `l${i + 1}\n`).join('');
            const after = before.replace('l1\n', 'L1\n').replace('l10\n', 'L10\n');
            assert.equal(
                unifiedDiff(before, after, 'f.py'),
                '--- f.py\n+++ f.py\n' +
                    '@@ -1,4 +1,4 @@\n-l1\n+L1\n l2\n l3\n l4\n' +
                    '@@ -7,4 +7,4 @@\n l7\n l8\n l9\n-l10\n+L10\n',
            );
        });
    });
});
