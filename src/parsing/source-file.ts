import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { SourceFile } from '../types';
import { parseModule } from './python-parser';
import { PythonSyntaxError } from './python-tokenizer';

/**
 * Raised when a file cannot be parsed.  {@link line} and {@link column}
 * are 1-based, as printed to users.
 */
export class ParseFailureError extends Error {
    constructor(
        readonly path: string,
        readonly line: number,
        readonly column: number,
        readonly detail: string,
    ) {
        super(`${path}:${line}:${column}: ${detail}`);
        this.name = 'ParseFailureError';
    }
}

/**
 * Parses `text` into an immutable {@link SourceFile}.
 *
 * @param version document version; callers pass the file's mtime so
 *                caches keyed on it stay valid across runs.
 */
export function createSourceFile(path: string, text: string, version = 0): SourceFile {
    const document = TextDocument.create(URI.file(path).toString(), 'python', version, text);
    try {
        const tree = parseModule(text);
        return { path, text, document, tree };
    } catch (err) {
        if (err instanceof PythonSyntaxError) {
            const position = document.positionAt(err.offset);
            throw new ParseFailureError(path, position.line + 1, position.character + 1, err.message);
        }
        throw err;
    }
}
