import { Diagnostic, DiagnosticSeverity } from 'vscode-languageserver-types';
import type { RewriteIssue } from '../types';

/**
 * Converts RewriteIssues to LSP Diagnostics.
 */
export function issuesToDiagnostics(issues: readonly RewriteIssue[]): Diagnostic[] {
    return issues.map(issue => Diagnostic.create(issue.range, issue.message, issue.severity, issue.code, 'unstar'));
}

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
    [DiagnosticSeverity.Error]: 'error',
    [DiagnosticSeverity.Warning]: 'warning',
    [DiagnosticSeverity.Information]: 'info',
    [DiagnosticSeverity.Hint]: 'hint',
};

/**
 * Formats an issue as `path:line:col severity code message`, with
 * 1-based line and column.
 */
export function formatIssue(path: string, issue: RewriteIssue): string {
    const { line, character } = issue.range.start;
    return `${path}:${line + 1}:${character + 1} ${SEVERITY_LABELS[issue.severity]} ${issue.code} ${issue.message}`;
}

/**
 * `true` for issues that make the run exit unsuccessfully.
 */
export function isProblem(issue: RewriteIssue): boolean {
    return issue.severity === DiagnosticSeverity.Error || issue.severity === DiagnosticSeverity.Warning;
}
