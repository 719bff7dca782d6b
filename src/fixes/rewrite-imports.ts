import { TextDocument } from 'vscode-languageserver-textdocument';
import { TextEdit } from 'vscode-languageserver-types';
import type { ResolutionMap, SourceFile, WildcardImport } from '../types';
import { detectLineBreak, isBlank, lineEndAfter, lineStartAt } from '../utils/text-utils';

export interface RewriteOptions {
    /** Line length above which narrowed imports are wrapped; `0` disables wrapping. */
    readonly lineLength: number;
}

export interface RewriteOutput {
    readonly text: string;
    readonly edits: readonly TextEdit[];
}

/**
 * Applies the resolutions of a file's wildcard imports to its text.
 *
 * Narrowed imports become `from module import a, b`; removed imports are
 * deleted with their lines, or become `pass` where deleting would leave
 * a block empty or cut a line shared with another statement.  Every
 * other character of the file is kept.
 */
export function rewriteImports(file: SourceFile, resolutions: ResolutionMap, options: RewriteOptions): RewriteOutput {
    const { text, document } = file;
    const lineBreak = detectLineBreak(text);
    const removed = new Set<number>();
    for (const [imp, resolution] of resolutions) {
        if (resolution.outcome === 'removed') {
            removed.add(imp.span.start);
        }
    }

    const edits: TextEdit[] = [];
    for (const [imp, resolution] of resolutions) {
        const range = {
            start: document.positionAt(imp.span.start),
            end: document.positionAt(imp.span.end),
        };

        switch (resolution.outcome) {
            case 'unchanged':
                break;
            case 'narrowed': {
                const lineStart = lineStartAt(text, imp.span.start);
                const indent = /^[ \t]*/.exec(text.slice(lineStart, imp.span.start))?.[0] ?? '';
                const statement = formatFromImport(imp.module, resolution.names, {
                    lineLength: options.lineLength,
                    column: imp.span.start - lineStart,
                    indent,
                    lineBreak,
                });
                edits.push(TextEdit.replace(range, statement));
                break;
            }
            case 'removed':
                if (mustKeepPlaceholder(imp, removed) || !isAloneOnLines(text, imp)) {
                    edits.push(TextEdit.replace(range, 'pass'));
                } else {
                    const start = lineStartAt(text, imp.span.start);
                    const end = lineEndAfter(text, imp.span.end);
                    edits.push(TextEdit.del({ start: document.positionAt(start), end: document.positionAt(end) }));
                }
                break;
        }
    }

    if (edits.length === 0) {
        return { text, edits };
    }
    return { text: TextDocument.applyEdits(document, edits), edits };
}

/**
 * A removed import must leave `pass` behind when every statement of its
 * nested block is removed and it is the first of them.
 */
function mustKeepPlaceholder(imp: WildcardImport, removed: ReadonlySet<number>): boolean {
    const block = imp.blockStatements;
    if (block.length === 0 || !block.every(span => removed.has(span.start))) {
        return false;
    }
    return block[0].start === imp.span.start;
}

/** `true` when nothing but whitespace and a trailing comment shares the statement's lines. */
function isAloneOnLines(text: string, imp: WildcardImport): boolean {
    const before = isBlank(text, lineStartAt(text, imp.span.start), imp.span.start);
    const lineEnd = lineEndAfter(text, imp.span.end);
    const after = text.slice(imp.span.end, lineEnd);
    return before && /^[ \t\f]*(?:#.*)?(?:\r\n|\n|\r)?$/.test(after);
}

export interface FromImportLayout {
    readonly lineLength: number;
    /** Column the statement starts at. */
    readonly column: number;
    /** Indentation of the statement's line, repeated on wrapped lines. */
    readonly indent: string;
    readonly lineBreak: string;
}

/**
 * Formats `from module import a, b`, switching to one name per line in
 * parentheses with a trailing comma when the single line would exceed
 * the line length.
 */
export function formatFromImport(module: string, names: readonly string[], layout: FromImportLayout): string {
    const singleLine = `from ${module} import ${names.join(', ')}`;
    if (layout.lineLength <= 0 || layout.column + singleLine.length <= layout.lineLength) {
        return singleLine;
    }

    const { indent, lineBreak } = layout;
    const wrapped = names.map(name => `${indent}    ${name},`).join(lineBreak);
    return `from ${module} import (${lineBreak}${wrapped}${lineBreak}${indent})`;
}
