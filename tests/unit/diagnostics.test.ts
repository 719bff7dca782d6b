import { strict as assert } from 'node:assert';
import { describe, it } from 'mocha';
import { DiagnosticSeverity } from 'vscode-languageserver-types';
import { formatIssue, isProblem, issuesToDiagnostics } from '../../src/analysis/diagnostics';
import type { RewriteIssue } from '../../src/types';

function issue(severity: DiagnosticSeverity): RewriteIssue {
    return {
        code: 'unresolved-name',
        message: "'z' is not defined in this file nor exported by any wildcard-imported module",
        severity,
        range: { start: { line: 4, character: 6 }, end: { line: 4, character: 7 } },
        name: 'z',
    };
}

describe('diagnostics', () => {
    describe('issuesToDiagnostics', () => {
        it('keeps range, severity and code, with unstar as source', () => {
            const [diagnostic] = issuesToDiagnostics([issue(DiagnosticSeverity.Warning)]);
            assert.deepEqual(diagnostic.range, { start: { line: 4, character: 6 }, end: { line: 4, character: 7 } });
            assert.equal(diagnostic.severity, DiagnosticSeverity.Warning);
            assert.equal(diagnostic.code, 'unresolved-name');
            assert.equal(diagnostic.source, 'unstar');
            assert.equal(diagnostic.message, issue(DiagnosticSeverity.Warning).message);
        });
    });

    describe('formatIssue', () => {
        it('prints 1-based positions and the severity label', () => {
            assert.equal(
                formatIssue('app/main.py', issue(DiagnosticSeverity.Warning)),
                "app/main.py:5:7 warning unresolved-name 'z' is not defined in this file nor exported by any wildcard-imported module",
            );
            assert.ok(formatIssue('m.py', issue(DiagnosticSeverity.Information)).startsWith('m.py:5:7 info '));
        });
    });

    describe('isProblem', () => {
        it('counts errors and warnings only', () => {
            assert.equal(isProblem(issue(DiagnosticSeverity.Error)), true);
            assert.equal(isProblem(issue(DiagnosticSeverity.Warning)), true);
            assert.equal(isProblem(issue(DiagnosticSeverity.Information)), false);
            assert.equal(isProblem(issue(DiagnosticSeverity.Hint)), false);
        });
    });
});
