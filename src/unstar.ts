import { DiagnosticSeverity } from 'vscode-languageserver-types';
import type { Range } from 'vscode-languageserver-types';
import { invalidateModuleFacts } from './analysis/export-cache';
import { parseWildcardImports } from './analysis/import-parser';
import { resolveImports } from './analysis/import-resolver';
import { ModuleExporter } from './analysis/module-exporter';
import { collectUsageSites } from './analysis/usage-collector';
import { rewriteImports } from './fixes/rewrite-imports';
import { createSourceFile, ParseFailureError } from './parsing/source-file';
import type { ExportListWrite, RewriteIssue, RewriteResult, SourceFile, UnstarConfig, WildcardImport } from './types';
import type { FileHost } from './utils/file-host';
import { nodeFileHost } from './utils/file-host';
import type { Formatter } from './utils/formatter';
import { createBlackFormatter, FormatterError } from './utils/formatter';
import { log, logWarn } from './utils/logger';
import { resolveRelativeImport } from './utils/module-resolver';

export { DEFAULT_CONFIG, resolveConfig } from './config';
export type { ConfigOverrides } from './config';
export { issuesToDiagnostics, formatIssue } from './analysis/diagnostics';
export { collectUsage } from './analysis/usage-collector';
export { IndeterminateExportsError, ModuleExporter } from './analysis/module-exporter';
export { ParseFailureError } from './parsing/source-file';
export { unifiedDiff } from './fixes/unified-diff';
export type { FileHost } from './utils/file-host';
export type { Formatter } from './utils/formatter';
export * from './types';

export interface ProcessOptions {
    readonly host?: FileHost;
    /** Formatter run over changed files unless `config.format` is off or the run is dry. */
    readonly formatter?: Formatter;
}

/** Raised when a file to process cannot be read. */
export class UnreadableFileError extends Error {
    constructor(readonly path: string) {
        super(`Cannot read ${path}`);
        this.name = 'UnreadableFileError';
    }
}

const START_OF_FILE: Range = { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } };

/**
 * Rewrites the wildcard imports of one Python file.
 *
 * Nothing is written; the returned result carries the new text and the
 * `__all__` write requests, which {@link applyResult} applies.  A file
 * that does not parse yields an unchanged result with a `parse-failure`
 * issue.
 */
export function processFile(filePath: string, config: UnstarConfig, options: ProcessOptions = {}): RewriteResult {
    const host = options.host ?? nodeFileHost;
    const originalText = host.readFile(filePath);
    if (originalText === undefined) {
        throw new UnreadableFileError(filePath);
    }

    const unchanged = (issues: RewriteIssue[], resolutions: RewriteResult['resolutions'] = new Map()): RewriteResult => ({
        path: filePath,
        originalText,
        text: originalText,
        changed: false,
        issues,
        resolutions,
        exportWrites: [],
    });

    let file: SourceFile;
    try {
        file = createSourceFile(filePath, originalText, host.getVersion(filePath));
    } catch (err) {
        if (!(err instanceof ParseFailureError)) {
            throw err;
        }
        const position = { line: err.line - 1, character: err.column - 1 };
        return unchanged([
            {
                code: 'parse-failure',
                message: `Could not parse file: ${err.detail}`,
                severity: DiagnosticSeverity.Error,
                range: { start: position, end: position },
            },
        ]);
    }

    const wildcards = parseWildcardImports(file);
    if (wildcards.length === 0) {
        return unchanged([]);
    }
    log(`${filePath}: ${wildcards.length} wildcard import(s)`);

    const usage = new Map<string, Range>();
    const optionalNames = new Set<string>();
    for (const [name, site] of collectUsageSites(file)) {
        usage.set(name, { start: file.document.positionAt(site.span.start), end: file.document.positionAt(site.span.end) });
        if (site.optional) {
            optionalNames.add(name);
        }
    }

    const exporter = new ModuleExporter(host, {
        inferExports: config.inferExports,
        inferImportedNames: config.inferImportedNames,
        searchPaths: config.searchPaths,
    });
    const isTargeted = (imp: WildcardImport): boolean =>
        config.module === undefined ||
        imp.module === config.module ||
        resolveRelativeImport(filePath, imp.module, config.searchPaths) === config.module;

    const { resolutions, issues, exportSets } = resolveImports(
        wildcards,
        usage,
        imp => exporter.getExports(filePath, imp.module),
        { conflictPolicy: config.conflictPolicy, isTargeted, optionalNames },
    );

    const exportWrites: ExportListWrite[] = [];
    if (config.createAll) {
        const seen = new Set<string>();
        for (const [imp, set] of exportSets) {
            if (set.path === undefined || seen.has(set.path) || !isTargeted(imp)) {
                continue;
            }
            seen.add(set.path);
            const write = exporter.createExportListWrite(set, config.lineLength);
            if (write) {
                exportWrites.push(write);
            }
        }
    }

    let { text } = rewriteImports(file, resolutions, { lineLength: config.lineLength });
    if (text === originalText) {
        return { ...unchanged(issues, resolutions), exportWrites };
    }

    if (config.format && !config.dryRun) {
        const formatter = options.formatter ?? createBlackFormatter();
        try {
            text = formatter.format(text, filePath, config.lineLength);
        } catch (err) {
            if (!(err instanceof FormatterError)) {
                throw err;
            }
            issues.push({
                code: 'formatter-failed',
                message: `${err.message}; output left unformatted`,
                severity: DiagnosticSeverity.Warning,
                range: START_OF_FILE,
            });
        }
    }

    return {
        path: filePath,
        originalText,
        text,
        changed: text !== originalText,
        issues,
        resolutions,
        exportWrites,
    };
}

/**
 * Writes a result's new text and its `__all__` write requests.
 *
 * Module paths in `written` are skipped and then added, so that a module
 * receives at most one `__all__` per run.  Cached facts of every written
 * file are dropped.
 *
 * @returns the paths written
 */
export function applyResult(result: RewriteResult, host: FileHost = nodeFileHost, written = new Set<string>()): string[] {
    const paths: string[] = [];
    if (result.changed) {
        host.writeFile(result.path, result.text);
        invalidateModuleFacts(result.path);
        paths.push(result.path);
    }

    for (const write of result.exportWrites) {
        if (written.has(write.path)) {
            continue;
        }
        written.add(write.path);
        if (host.readFile(write.path) !== write.originalText) {
            logWarn(`${write.path} changed since its exports were inferred; __all__ not written`);
            continue;
        }
        host.writeFile(write.path, write.text);
        invalidateModuleFacts(write.path);
        log(`Wrote __all__ with ${write.names.length} name(s) to ${write.path}`);
        paths.push(write.path);
    }
    return paths;
}
