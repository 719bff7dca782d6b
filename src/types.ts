import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { DiagnosticSeverity, Range } from 'vscode-languageserver-types';
import type { Module, Span } from './parsing/python-ast';

/**
 * An immutable snapshot of a Python source file: its path, raw text,
 * a `TextDocument` for offset ↔ position conversion and the parsed tree.
 */
export interface SourceFile {
    readonly path: string;
    readonly text: string;
    readonly document: TextDocument;
    readonly tree: Module;
}

/**
 * Represents a parsed Python import statement.
 */
export interface ImportStatement {
    /** The type of import: 'import' or 'from' */
    readonly type: 'import' | 'from';
    /** The module being imported as written, relative dots included (e.g. 'os.path', '.foo', '..') */
    readonly module: string;
    /** The names being imported (`['*']` for wildcard imports) */
    readonly names: readonly string[];
    /** Maps an imported name to its alias. Only entries with an `as` clause are present. */
    readonly aliases: ReadonlyMap<string, string>;
    /** The relative import level (0 = absolute, 1 = '.', 2 = '..', etc.) */
    readonly level: number;
    /** The line number in the document (0-based) */
    readonly line: number;
    /** The last line number of the import (0-based) */
    readonly endLine: number;
    /** Offsets of the statement, from its first token to its last. */
    readonly span: Span;
    /** The range covering {@link span}. */
    readonly range: Range;
    /** The original text of the statement */
    readonly text: string;
    /** `true` for `from x import *`. */
    readonly wildcard: boolean;
    /** `'module'` when the statement executes in module scope, `'local'` inside a function or class body. */
    readonly scope: 'module' | 'local';
    /**
     * Spans of every statement of the enclosing nested block (an `if`,
     * `try`, … body), this one included; empty at the top of the module.
     */
    readonly blockStatements: readonly Span[];
}

/**
 * A `from x import *` statement executing in module scope.
 */
export interface WildcardImport extends ImportStatement {
    readonly type: 'from';
    readonly wildcard: true;
    readonly scope: 'module';
}

/** Whether an export set was read from `__all__` or computed from bindings. */
export type ExportProvenance = 'declared' | 'inferred';

/**
 * The names a module makes available to `from module import *`.
 */
export interface ExportSet {
    /** The dotted module name the set was computed for. */
    readonly module: string;
    readonly names: ReadonlySet<string>;
    readonly provenance: ExportProvenance;
    /** `'module-file'` when read from a Python file, `'known-symbols'` for the built-in stdlib table. */
    readonly source: 'module-file' | 'known-symbols';
    /** Path of the module file, when there is one. */
    readonly path?: string;
    /**
     * `false` when the module star-imports other modules itself; names
     * arriving through those imports are not part of {@link names}.
     */
    readonly complete: boolean;
    /** Module texts of the module's own wildcard imports (e.g. `'.base'`). */
    readonly nestedWildcards: readonly string[];
}

/** Free names referenced by a file, as a set. */
export type UsageSet = ReadonlySet<string>;

/** Why a wildcard import is left as written. */
export type UnchangedReason = 'indeterminate' | 'incomplete-exports' | 'unresolved-names' | 'unused-declared' | 'not-targeted';

/**
 * The outcome computed for one wildcard import.
 */
export type WildcardResolution =
    | { readonly outcome: 'narrowed'; readonly names: readonly string[] }
    | { readonly outcome: 'removed' }
    | { readonly outcome: 'unchanged'; readonly reason: UnchangedReason };

/** Resolution of every wildcard import of a file, in source order. */
export type ResolutionMap = ReadonlyMap<WildcardImport, WildcardResolution>;

/**
 * Issue codes reported while rewriting a file.
 */
export type IssueCode =
    | 'parse-failure'
    | 'indeterminate-exports'
    | 'nested-wildcard-export'
    | 'unresolved-name'
    | 'ambiguous-attribution'
    | 'wildcard-removed'
    | 'wildcard-unused'
    | 'formatter-failed';

/**
 * A diagnostic produced while processing a file.
 */
export interface RewriteIssue {
    readonly code: IssueCode;
    readonly message: string;
    readonly severity: DiagnosticSeverity;
    /** The range in the processed file the issue refers to */
    readonly range: Range;
    /** The module text of the wildcard import involved, if any */
    readonly module?: string;
    /** The name involved, if any */
    readonly name?: string;
}

/**
 * A request to insert an explicit `__all__` into an exporting module.
 * The core never writes it; callers apply it.
 */
export interface ExportListWrite {
    readonly path: string;
    readonly originalText: string;
    readonly text: string;
    readonly names: readonly string[];
}

/**
 * Everything computed for one processed file.
 */
export interface RewriteResult {
    readonly path: string;
    readonly originalText: string;
    /** The rewritten text; identical to {@link originalText} when nothing changed. */
    readonly text: string;
    readonly changed: boolean;
    readonly issues: readonly RewriteIssue[];
    readonly resolutions: ResolutionMap;
    readonly exportWrites: readonly ExportListWrite[];
}

/**
 * Which wildcard import keeps a name exported by several of them.
 *
 * `first-declared` keeps the earliest import; `last-declared` mirrors
 * Python's runtime behaviour, where the later star import rebinds the name.
 */
export type ConflictPolicy = 'first-declared' | 'last-declared';

/**
 * Resolved configuration for a run.
 */
export interface UnstarConfig {
    /** Compute results but never write files. */
    readonly dryRun: boolean;
    /** Infer export sets of modules without `__all__`. Cleared by `--infer-imports`. */
    readonly inferExports: boolean;
    /** Count import-bound names when inferring an export set. */
    readonly inferImportedNames: boolean;
    /** Pass rewritten text through the formatter. Cleared by `--no-format`. */
    readonly format: boolean;
    /** Materialize inferred export sets into their modules as `__all__`. */
    readonly createAll: boolean;
    /** Only rewrite wildcard imports of this dotted module name. */
    readonly module?: string;
    /** Maximum line length used when wrapping generated statements. */
    readonly lineLength: number;
    readonly conflictPolicy: ConflictPolicy;
    /** Absolute directories searched, in order, for absolutely imported modules. */
    readonly searchPaths: readonly string[];
    /** Directory names skipped during directory traversal. */
    readonly exclude: readonly string[];
}
