import type { Span } from './python-ast';

export type TokenKind = 'name' | 'number' | 'string' | 'op' | 'newline' | 'indent' | 'dedent' | 'eof';

export interface Token {
    readonly kind: TokenKind;
    /** Source text of the token (empty for indent, dedent and eof). */
    readonly value: string;
    readonly start: number;
    readonly end: number;
    /** Expression spans of the top-level replacement fields of an f-string, format-spec fields included. */
    readonly fields?: readonly Span[];
}

/**
 * Raised when Python source cannot be tokenized or parsed.
 * {@link offset} is the source offset of the offending character.
 */
export class PythonSyntaxError extends Error {
    constructor(message: string, readonly offset: number) {
        super(message);
        this.name = 'PythonSyntaxError';
    }
}

export interface TokenizeOptions {
    /** Added to every offset, for text cut out of a larger source. */
    readonly offset?: number;
    /**
     * Tokenize a bare expression (an f-string field): newlines are
     * implicit line joins and no indentation tokens are produced.
     */
    readonly expression?: boolean;
}

/** Operators, longest first so the first match wins. */
const OPERATORS = [
    '**=', '//=', '>>=', '<<=', '...',
    '!=', '%=', '&=', '*=', '**', '+=', '-=', '->', '//', '/=', ':=', '<<', '<=', '==', '>=', '>>', '@=', '^=', '|=',
    '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>', '(', ')', '[', ']', '{', '}', ',', ':', ';', '.', '=',
] as const;

const NAME_PATTERN = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;

const NUMBER_PATTERN =
    /0[xX](?:_?[0-9a-fA-F])+|0[oO](?:_?[0-7])+|0[bB](?:_?[01])+|(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?[jJ]?/y;

const STRING_PREFIX = /^(?:r|u|b|br|rb|f|fr|rf|t|tr|rt)$/i;

/**
 * Splits Python source into tokens, producing `newline`, `indent` and
 * `dedent` tokens the way CPython's tokenizer does.  Comments, blank
 * lines and line continuations produce no tokens.
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
    return new Tokenizer(source, options).run();
}

/**
 * Returns `true` when `prefix` (e.g. `rb`, `F`) is a valid string prefix.
 */
export function isStringPrefix(prefix: string): boolean {
    return STRING_PREFIX.test(prefix);
}

class Tokenizer {
    private readonly tokens: Token[] = [];
    private readonly indents: number[] = [0];
    private readonly base: number;
    /** Bracket depth below which closing brackets are unmatched. */
    private readonly floor: number;
    private pos = 0;
    private depth: number;
    private atLineStart: boolean;

    constructor(private readonly source: string, options: TokenizeOptions) {
        this.base = options.offset ?? 0;
        this.floor = options.expression ? 1 : 0;
        this.depth = this.floor;
        this.atLineStart = !options.expression;
    }

    run(): Token[] {
        const src = this.source;

        while (this.pos < src.length) {
            if (this.atLineStart && this.depth === 0) {
                if (this.readIndentation()) {
                    continue;
                }
            }

            const ch = src[this.pos];

            if (ch === ' ' || ch === '\t' || ch === '\f') {
                this.pos++;
                continue;
            }
            if (ch === '#') {
                this.skipComment();
                continue;
            }
            if (ch === '\\' && this.isNewlineAt(this.pos + 1)) {
                this.pos = this.skipNewline(this.pos + 1);
                continue;
            }
            if (ch === '\n' || ch === '\r') {
                const next = this.skipNewline(this.pos);
                if (this.depth === 0) {
                    this.push('newline', this.pos, next);
                    this.atLineStart = true;
                }
                this.pos = next;
                continue;
            }

            if (this.readName() || this.readNumber()) {
                continue;
            }
            if (ch === '"' || ch === "'") {
                this.readString(this.pos, 0);
                continue;
            }
            if (this.readOperator()) {
                continue;
            }

            throw new PythonSyntaxError(`invalid character '${ch}'`, this.pos + this.base);
        }

        return this.finish();
    }

    /**
     * Measures the indentation of a new logical line and emits `indent` /
     * `dedent` tokens.  Returns `true` when the line was blank or held
     * only a comment (and has been consumed).
     */
    private readIndentation(): boolean {
        const src = this.source;
        let column = 0;
        let i = this.pos;

        while (i < src.length) {
            const c = src[i];
            if (c === ' ') {
                column++;
            } else if (c === '\t') {
                column = (Math.floor(column / 8) + 1) * 8;
            } else if (c === '\f') {
                column = 0;
            } else {
                break;
            }
            i++;
        }

        if (i >= src.length) {
            this.pos = i;
            return true;
        }

        const c = src[i];
        if (c === '#' || c === '\n' || c === '\r') {
            this.pos = i;
            if (c === '#') {
                this.skipComment();
            }
            if (this.pos < src.length) {
                this.pos = this.skipNewline(this.pos);
            }
            return true;
        }

        this.pos = i;
        this.atLineStart = false;

        if (column > this.indents[this.indents.length - 1]) {
            this.indents.push(column);
            this.push('indent', i, i);
            return false;
        }
        while (column < this.indents[this.indents.length - 1]) {
            this.indents.pop();
            this.push('dedent', i, i);
        }
        if (column !== this.indents[this.indents.length - 1]) {
            throw new PythonSyntaxError('unindent does not match any outer indentation level', i + this.base);
        }
        return false;
    }

    private readName(): boolean {
        NAME_PATTERN.lastIndex = this.pos;
        const match = NAME_PATTERN.exec(this.source);
        if (!match) {
            return false;
        }

        const word = match[0];
        const after = this.source[this.pos + word.length];
        if ((after === '"' || after === "'") && isStringPrefix(word)) {
            this.readString(this.pos, word.length);
            return true;
        }

        this.push('name', this.pos, this.pos + word.length);
        this.pos += word.length;
        return true;
    }

    private readNumber(): boolean {
        const src = this.source;
        const ch = src[this.pos];
        const startsNumber = (ch >= '0' && ch <= '9') || (ch === '.' && src[this.pos + 1] >= '0' && src[this.pos + 1] <= '9');
        if (!startsNumber) {
            return false;
        }

        NUMBER_PATTERN.lastIndex = this.pos;
        const match = NUMBER_PATTERN.exec(src);
        if (!match) {
            return false;
        }
        this.push('number', this.pos, this.pos + match[0].length);
        this.pos += match[0].length;
        return true;
    }

    private readOperator(): boolean {
        for (const op of OPERATORS) {
            if (!this.source.startsWith(op, this.pos)) {
                continue;
            }

            if (op === '(' || op === '[' || op === '{') {
                this.depth++;
            } else if (op === ')' || op === ']' || op === '}') {
                if (this.depth <= this.floor) {
                    throw new PythonSyntaxError(`unmatched '${op}'`, this.pos + this.base);
                }
                this.depth--;
            }

            this.push('op', this.pos, this.pos + op.length);
            this.pos += op.length;
            return true;
        }
        return false;
    }

    /**
     * Reads a string literal starting at `start` whose prefix (`rb`, `f`,
     * …) is `prefixLength` characters long.
     */
    private readString(start: number, prefixLength: number): void {
        const prefix = this.source.slice(start, start + prefixLength).toLowerCase();
        const formatted = prefix.includes('f') || prefix.includes('t');
        const fields: Span[] = [];
        const end = this.scanString(start + prefixLength, formatted, fields);

        this.tokens.push({
            kind: 'string',
            value: this.source.slice(start, end),
            start: start + this.base,
            end: end + this.base,
            fields: formatted ? fields : undefined,
        });
        this.pos = end;
    }

    /**
     * Scans a string whose opening quote is at `quoteIndex` and returns
     * the offset just past its closing quote.  Replacement fields of
     * f-strings are appended to `fields`.
     */
    private scanString(quoteIndex: number, formatted: boolean, fields: Span[]): number {
        const src = this.source;
        const quote = src[quoteIndex];
        const closer = src.startsWith(quote.repeat(3), quoteIndex) ? quote.repeat(3) : quote;
        const triple = closer.length === 3;
        let i = quoteIndex + closer.length;

        while (i < src.length) {
            const c = src[i];
            if (c === '\\') {
                // In f-strings a backslash never hides the brace that follows it.
                const next = src[i + 1];
                i += formatted && (next === '{' || next === '}') ? 1 : 2;
                continue;
            }
            if (!triple && (c === '\n' || c === '\r')) {
                break;
            }
            if (src.startsWith(closer, i)) {
                return i + closer.length;
            }
            if (formatted && c === '{') {
                if (src[i + 1] === '{') {
                    i += 2;
                    continue;
                }
                i = this.scanField(i + 1, fields);
                continue;
            }
            i++;
        }

        throw new PythonSyntaxError('unterminated string literal', quoteIndex + this.base);
    }

    /**
     * Scans an f-string replacement field whose expression starts at
     * `start` and returns the offset just past its closing `}`.
     */
    private scanField(start: number, fields: Span[]): number {
        const src = this.source;
        let depth = 0;
        let exprEnd = -1;
        let i = start;

        const close = (end: number): void => {
            fields.push({ start: start + this.base, end: end + this.base });
        };

        while (i < src.length) {
            const c = src[i];

            if (exprEnd !== -1) {
                // After the expression: `=`, `!r` or a format spec
                if (c === '}') {
                    close(exprEnd);
                    return i + 1;
                }
                if (c === ':') {
                    close(exprEnd);
                    return this.scanFormatSpec(i + 1, fields);
                }
                i++;
                continue;
            }

            if (c === '(' || c === '[' || c === '{') {
                depth++;
                i++;
                continue;
            }
            if ((c === ')' || c === ']' || c === '}') && depth > 0) {
                depth--;
                i++;
                continue;
            }
            if (c === '"' || c === "'") {
                // Fields of a nested f-string belong to that string; they are
                // found again when this field's expression is parsed.
                const prefix = this.prefixBefore(i, start);
                i = this.scanString(i, /[ft]/i.test(prefix), []);
                continue;
            }

            if (depth === 0) {
                if (c === '}') {
                    close(i);
                    return i + 1;
                }
                if (c === ':') {
                    close(i);
                    return this.scanFormatSpec(i + 1, fields);
                }
                if (c === '!' && src[i + 1] !== '=') {
                    exprEnd = i;
                } else if (c === '=' && src[i + 1] !== '=' && !'=!<>'.includes(src[i - 1])) {
                    // Self-documenting `{expr=}`
                    exprEnd = i;
                }
            }
            i++;
        }

        throw new PythonSyntaxError('unterminated f-string replacement field', start + this.base);
    }

    /** Scans a format spec (which may hold nested fields) up to and past the closing `}`. */
    private scanFormatSpec(start: number, fields: Span[]): number {
        const src = this.source;
        let i = start;

        while (i < src.length) {
            const c = src[i];
            if (c === '{') {
                i = this.scanField(i + 1, fields);
                continue;
            }
            if (c === '}') {
                return i + 1;
            }
            i++;
        }

        throw new PythonSyntaxError('unterminated f-string format spec', start + this.base);
    }

    /** Returns the string prefix written directly before a quote inside an f-string field. */
    private prefixBefore(quoteIndex: number, fieldStart: number): string {
        let j = quoteIndex;
        while (j > fieldStart && j > quoteIndex - 2 && /[a-zA-Z]/.test(this.source[j - 1])) {
            j--;
        }
        const prefix = this.source.slice(j, quoteIndex);
        if (j > fieldStart && /[\w]/.test(this.source[j - 1])) {
            return '';
        }
        return isStringPrefix(prefix) ? prefix : '';
    }

    private finish(): Token[] {
        if (this.depth > this.floor) {
            throw new PythonSyntaxError('unexpected EOF: unclosed bracket', this.source.length + this.base);
        }

        const end = this.source.length;
        const last = this.tokens[this.tokens.length - 1];
        if (last && last.kind !== 'newline') {
            this.push('newline', end, end);
        }
        while (this.indents.length > 1) {
            this.indents.pop();
            this.push('dedent', end, end);
        }
        this.push('eof', end, end);
        return this.tokens;
    }

    private skipComment(): void {
        while (this.pos < this.source.length && !this.isNewlineAt(this.pos)) {
            this.pos++;
        }
    }

    private isNewlineAt(i: number): boolean {
        const c = this.source[i];
        return c === '\n' || c === '\r';
    }

    /** Returns the offset just past the line break at `i` (`\r\n`, `\n` or `\r`). */
    private skipNewline(i: number): number {
        return this.source[i] === '\r' && this.source[i + 1] === '\n' ? i + 2 : i + 1;
    }

    private push(kind: TokenKind, start: number, end: number): void {
        const value = kind === 'indent' || kind === 'dedent' || kind === 'eof' ? '' : this.source.slice(start, end);
        this.tokens.push({ kind, value, start: start + this.base, end: end + this.base });
    }
}
