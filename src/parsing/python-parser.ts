import type {
    Comprehension,
    ExceptHandler,
    Expression,
    FunctionDef,
    ClassDef,
    ImportAlias,
    Keyword,
    MatchCase,
    Module,
    NameExpr,
    Parameter,
    Pattern,
    Span,
    Statement,
    TypeParam,
    WithItem,
} from './python-ast';
import type { Token, TokenKind } from './python-tokenizer';
import { PythonSyntaxError, tokenize } from './python-tokenizer';

/** Hard keywords; soft keywords (`match`, `case`, `type`, `_`) are ordinary names. */
const KEYWORDS: ReadonlySet<string> = new Set([
    'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
    'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in',
    'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

/** Keywords that may begin an expression. */
const EXPRESSION_KEYWORDS: ReadonlySet<string> = new Set(['None', 'True', 'False', 'not', 'lambda', 'await']);

const EXPRESSION_START_OPERATORS: ReadonlySet<string> = new Set(['(', '[', '{', '-', '+', '~', '*', '...']);

const AUGMENTED_ASSIGNMENTS: ReadonlySet<string> = new Set([
    '+=', '-=', '*=', '/=', '//=', '%=', '**=', '>>=', '<<=', '&=', '^=', '|=', '@=',
]);

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['<', '>', '==', '>=', '<=', '!=']);

const STRING_ESCAPES: Readonly<Record<string, string>> = {
    '\\': '\\',
    "'": "'",
    '"': '"',
    a: '\x07',
    b: '\b',
    f: '\f',
    n: '\n',
    r: '\r',
    t: '\t',
    v: '\v',
    '\n': '',
    '\r\n': '',
    '\r': '',
};

/**
 * Parses a Python module.  Throws {@link PythonSyntaxError} on invalid
 * syntax.
 */
export function parseModule(source: string): Module {
    return new Parser(source, tokenize(source), 0).parseModule();
}

/**
 * Parses a standalone expression, such as the contents of a string
 * annotation.  `offset` is where `text` starts in its file.
 */
export function parseExpression(text: string, offset = 0): Expression {
    const tokens = tokenize(text, { offset, expression: true });
    return new Parser(text, tokens, offset).parseStandaloneExpression();
}

interface DecodedString {
    readonly bytes: boolean;
    readonly value: string;
}

/**
 * Decodes the value of a single (non-formatted) string literal token,
 * prefix and quotes included.
 */
export function decodeStringLiteral(raw: string): DecodedString {
    const prefixMatch = /^[a-zA-Z]*/.exec(raw);
    const prefix = (prefixMatch ? prefixMatch[0] : '').toLowerCase();
    const rest = raw.slice(prefix.length);
    const quote = rest.startsWith('"""') || rest.startsWith("'''") ? rest.slice(0, 3) : rest.slice(0, 1);
    const body = rest.slice(quote.length, rest.length - quote.length);
    const bytes = prefix.includes('b');

    if (prefix.includes('r')) {
        return { bytes, value: body };
    }

    const value = body.replace(
        /\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|[0-7]{1,3}|\r\n|[\s\S])/g,
        (match: string, escape: string) => {
            const simple = STRING_ESCAPES[escape];
            if (simple !== undefined) {
                return simple;
            }
            const head = escape[0];
            if ((head === 'x' || head === 'u' || head === 'U') && escape.length > 1 && !bytes) {
                return String.fromCodePoint(parseInt(escape.slice(1), 16));
            }
            if (head === 'x' && escape.length > 1) {
                return String.fromCharCode(parseInt(escape.slice(1), 16));
            }
            if (/^[0-7]+$/.test(escape)) {
                return String.fromCodePoint(parseInt(escape, 8));
            }
            return match;
        },
    );
    return { bytes, value };
}

class Parser {
    private index = 0;

    constructor(
        private readonly source: string,
        private readonly tokens: readonly Token[],
        /** Offset of `source` within its file. */
        private readonly base: number,
    ) {}

    // ------------------------------------------------------------------
    // Entry points
    // ------------------------------------------------------------------

    parseModule(): Module {
        const body: Statement[] = [];
        while (this.current.kind !== 'eof') {
            if (this.current.kind === 'newline') {
                this.advance();
                continue;
            }
            body.push(...this.parseStatement());
        }
        return { kind: 'Module', span: { start: this.base, end: this.base + this.source.length }, body };
    }

    parseStandaloneExpression(): Expression {
        const expression = this.isKeyword('yield') ? this.parseYield() : this.parseStarExpressions(true);
        if (this.current.kind === 'newline') {
            this.advance();
        }
        if (this.current.kind !== 'eof') {
            throw this.error('unexpected token after expression');
        }
        return expression;
    }

    // ------------------------------------------------------------------
    // Token helpers
    // ------------------------------------------------------------------

    private get current(): Token {
        return this.tokens[this.index];
    }

    private peek(distance = 1): Token {
        return this.tokens[Math.min(this.index + distance, this.tokens.length - 1)];
    }

    private advance(): Token {
        const token = this.tokens[this.index];
        if (token.kind !== 'eof') {
            this.index++;
        }
        return token;
    }

    private isOp(value: string, token: Token = this.current): boolean {
        return token.kind === 'op' && token.value === value;
    }

    private isKeyword(value: string, token: Token = this.current): boolean {
        return token.kind === 'name' && token.value === value;
    }

    private isIdentifier(token: Token = this.current): boolean {
        return token.kind === 'name' && !KEYWORDS.has(token.value);
    }

    private eatOp(value: string): boolean {
        if (this.isOp(value)) {
            this.advance();
            return true;
        }
        return false;
    }

    private eatKeyword(value: string): boolean {
        if (this.isKeyword(value)) {
            this.advance();
            return true;
        }
        return false;
    }

    private expectOp(value: string): Token {
        if (!this.isOp(value)) {
            throw this.error(`expected '${value}'`);
        }
        return this.advance();
    }

    private expectKeyword(value: string): Token {
        if (!this.isKeyword(value)) {
            throw this.error(`expected '${value}'`);
        }
        return this.advance();
    }

    private expectKind(kind: TokenKind, description: string): Token {
        if (this.current.kind !== kind) {
            throw this.error(`expected ${description}`);
        }
        return this.advance();
    }

    private expectName(): Token {
        if (!this.isIdentifier()) {
            throw this.error('expected a name');
        }
        return this.advance();
    }

    private nameExpr(token: Token): NameExpr {
        return { kind: 'Name', id: token.value, span: { start: token.start, end: token.end } };
    }

    /** End offset of the last consumed token. */
    private previousEnd(): number {
        return this.index > 0 ? this.tokens[this.index - 1].end : this.base;
    }

    private spanFrom(start: number): Span {
        return { start, end: this.previousEnd() };
    }

    private blockEnd(blocks: readonly (readonly Statement[])[]): number {
        for (let i = blocks.length - 1; i >= 0; i--) {
            const block = blocks[i];
            if (block.length > 0) {
                return block[block.length - 1].span.end;
            }
        }
        return this.previousEnd();
    }

    private startsExpression(token: Token = this.current): boolean {
        switch (token.kind) {
            case 'number':
            case 'string':
                return true;
            case 'name':
                return !KEYWORDS.has(token.value) || EXPRESSION_KEYWORDS.has(token.value);
            case 'op':
                return EXPRESSION_START_OPERATORS.has(token.value);
            default:
                return false;
        }
    }

    private atStatementEnd(): boolean {
        const kind = this.current.kind;
        return kind === 'newline' || kind === 'eof' || this.isOp(';');
    }

    private error(message: string, token: Token = this.current): PythonSyntaxError {
        let found: string;
        switch (token.kind) {
            case 'eof':
                found = 'end of file';
                break;
            case 'newline':
                found = 'end of line';
                break;
            case 'indent':
                found = 'an indent';
                break;
            case 'dedent':
                found = 'a dedent';
                break;
            default:
                found = `'${token.value}'`;
        }
        return new PythonSyntaxError(`${message}, found ${found}`, token.start);
    }

    // ------------------------------------------------------------------
    // Statements
    // ------------------------------------------------------------------

    private parseStatement(): Statement[] {
        const token = this.current;
        if (token.kind === 'indent') {
            throw this.error('unexpected indent');
        }
        if (token.kind === 'name') {
            switch (token.value) {
                case 'if':
                    return [this.parseIf()];
                case 'while':
                    return [this.parseWhile()];
                case 'for':
                    return [this.parseFor(token.start, false)];
                case 'try':
                    return [this.parseTry()];
                case 'with':
                    return [this.parseWith(token.start, false)];
                case 'def':
                    return [this.parseFunction(token.start, [], false)];
                case 'class':
                    return [this.parseClass(token.start, [])];
                case 'async':
                    return [this.parseAsync(token.start, [])];
                case 'match':
                    if (this.looksLikeMatch()) {
                        return [this.parseMatch()];
                    }
                    break;
            }
        }
        if (this.isOp('@')) {
            return [this.parseDecorated()];
        }
        return this.parseSimpleStatements();
    }

    private parseSimpleStatements(): Statement[] {
        const statements = [this.parseSmallStatement()];
        while (this.eatOp(';')) {
            if (this.current.kind === 'newline' || this.current.kind === 'eof') {
                break;
            }
            statements.push(this.parseSmallStatement());
        }
        if (this.current.kind === 'newline') {
            this.advance();
        } else if (this.current.kind !== 'eof') {
            throw this.error('expected end of statement');
        }
        return statements;
    }

    private parseSmallStatement(): Statement {
        const token = this.current;
        const start = token.start;

        if (token.kind === 'name') {
            switch (token.value) {
                case 'pass':
                case 'break':
                case 'continue': {
                    this.advance();
                    const kind = token.value === 'pass' ? 'Pass' : token.value === 'break' ? 'Break' : 'Continue';
                    return { kind, span: this.spanFrom(start) };
                }
                case 'return': {
                    this.advance();
                    const value = this.atStatementEnd() ? undefined : this.parseStarExpressions(false);
                    return { kind: 'Return', span: this.spanFrom(start), value };
                }
                case 'raise': {
                    this.advance();
                    const exc = this.atStatementEnd() ? undefined : this.parseTest();
                    const cause = exc && this.eatKeyword('from') ? this.parseTest() : undefined;
                    return { kind: 'Raise', span: this.spanFrom(start), exc, cause };
                }
                case 'global':
                case 'nonlocal': {
                    this.advance();
                    const names = [this.expectName().value];
                    while (this.eatOp(',')) {
                        names.push(this.expectName().value);
                    }
                    const kind = token.value === 'global' ? 'Global' : 'Nonlocal';
                    return { kind, span: this.spanFrom(start), names };
                }
                case 'del': {
                    this.advance();
                    const target = this.parseTargetList();
                    const targets = target.kind === 'Tuple' && target.span.start === target.elements[0]?.span.start
                        ? target.elements
                        : [target];
                    return { kind: 'Delete', span: this.spanFrom(start), targets };
                }
                case 'assert': {
                    this.advance();
                    const test = this.parseTest();
                    const msg = this.eatOp(',') ? this.parseTest() : undefined;
                    return { kind: 'Assert', span: this.spanFrom(start), test, msg };
                }
                case 'import':
                    return this.parseImport();
                case 'from':
                    return this.parseImportFrom();
                case 'type': {
                    const next = this.peek();
                    const after = this.peek(2);
                    if (this.isIdentifier(next) && (this.isOp('=', after) || this.isOp('[', after))) {
                        return this.parseTypeAlias();
                    }
                    break;
                }
            }
        }

        return this.parseExpressionStatement();
    }

    private parseExpressionStatement(): Statement {
        const start = this.current.start;
        const first = this.parseYieldOrStarExpressions();

        if (this.eatOp(':')) {
            const annotation = this.parseTest();
            const value = this.eatOp('=') ? this.parseYieldOrStarExpressions() : undefined;
            return { kind: 'AnnAssign', span: this.spanFrom(start), target: first, annotation, value };
        }

        if (this.current.kind === 'op' && AUGMENTED_ASSIGNMENTS.has(this.current.value)) {
            const op = this.advance().value;
            const value = this.parseYieldOrStarExpressions();
            return { kind: 'AugAssign', span: this.spanFrom(start), target: first, op, value };
        }

        if (this.isOp('=')) {
            const targets: Expression[] = [];
            let value = first;
            while (this.eatOp('=')) {
                targets.push(value);
                value = this.parseYieldOrStarExpressions();
            }
            return { kind: 'Assign', span: this.spanFrom(start), targets, value };
        }

        return { kind: 'Expr', span: this.spanFrom(start), value: first };
    }

    private parseImport(): Statement {
        const start = this.advance().start;
        const names: ImportAlias[] = [];
        do {
            const aliasStart = this.current.start;
            const name = this.parseDottedName();
            const asname = this.eatKeyword('as') ? this.expectName().value : undefined;
            names.push({ name, asname, span: this.spanFrom(aliasStart) });
        } while (this.eatOp(','));
        return { kind: 'Import', span: this.spanFrom(start), names };
    }

    private parseImportFrom(): Statement {
        const start = this.advance().start;
        let level = 0;
        while (this.isOp('.') || this.isOp('...')) {
            level += this.advance().value.length;
        }

        const module = this.isIdentifier() ? this.parseDottedName() : '';
        if (level === 0 && module === '') {
            throw this.error('expected a module name');
        }
        this.expectKeyword('import');

        if (this.isOp('*')) {
            const star = this.advance();
            const names = [{ name: '*', span: { start: star.start, end: star.end } }];
            return { kind: 'ImportFrom', span: this.spanFrom(start), module, level, names };
        }

        const parenthesized = this.eatOp('(');
        const names: ImportAlias[] = [];
        for (;;) {
            const aliasStart = this.current.start;
            const name = this.expectName().value;
            const asname = this.eatKeyword('as') ? this.expectName().value : undefined;
            names.push({ name, asname, span: this.spanFrom(aliasStart) });
            if (!this.eatOp(',')) {
                break;
            }
            if (parenthesized && this.isOp(')')) {
                break;
            }
        }
        if (parenthesized) {
            this.expectOp(')');
        }
        return { kind: 'ImportFrom', span: this.spanFrom(start), module, level, names };
    }

    private parseDottedName(): string {
        const parts = [this.expectName().value];
        while (this.eatOp('.')) {
            parts.push(this.expectName().value);
        }
        return parts.join('.');
    }

    private parseTypeAlias(): Statement {
        const start = this.advance().start;
        const name = this.nameExpr(this.expectName());
        const typeParams = this.isOp('[') ? this.parseTypeParams() : [];
        this.expectOp('=');
        const value = this.parseTest();
        return { kind: 'TypeAlias', span: this.spanFrom(start), name, typeParams, value };
    }

    private parseBlock(): Statement[] {
        const head = this.current;
        if (head.kind !== 'newline') {
            return this.parseSimpleStatements();
        }
        this.advance();
        this.expectKind('indent', 'an indented block');

        const body: Statement[] = [];
        while (this.current.kind !== 'dedent' && this.current.kind !== 'eof') {
            body.push(...this.parseStatement());
        }
        if (this.current.kind === 'dedent') {
            this.advance();
        }
        return body;
    }

    private parseElse(): Statement[] {
        if (!this.eatKeyword('else')) {
            return [];
        }
        this.expectOp(':');
        return this.parseBlock();
    }

    private parseIf(): Statement {
        // Also used for `elif`, which reads the same after its keyword.
        const start = this.advance().start;
        const test = this.parseNamedExpr();
        this.expectOp(':');
        const body = this.parseBlock();
        const orelse = this.isKeyword('elif') ? [this.parseIf()] : this.parseElse();
        return { kind: 'If', span: { start, end: this.blockEnd([body, orelse]) }, test, body, orelse };
    }

    private parseWhile(): Statement {
        const start = this.advance().start;
        const test = this.parseNamedExpr();
        this.expectOp(':');
        const body = this.parseBlock();
        const orelse = this.parseElse();
        return { kind: 'While', span: { start, end: this.blockEnd([body, orelse]) }, test, body, orelse };
    }

    private parseFor(start: number, isAsync: boolean): Statement {
        this.expectKeyword('for');
        const target = this.parseTargetList();
        this.expectKeyword('in');
        const iter = this.parseStarExpressions(false);
        this.expectOp(':');
        const body = this.parseBlock();
        const orelse = this.parseElse();
        return { kind: 'For', span: { start, end: this.blockEnd([body, orelse]) }, target, iter, body, orelse, isAsync };
    }

    private parseTry(): Statement {
        const start = this.advance().start;
        this.expectOp(':');
        const body = this.parseBlock();

        const handlers: ExceptHandler[] = [];
        while (this.isKeyword('except')) {
            const handlerStart = this.advance().start;
            this.eatOp('*');
            let type: Expression | undefined;
            if (!this.isOp(':')) {
                type = this.parseTest();
                if (this.isOp(',')) {
                    const elements = [type];
                    while (this.eatOp(',')) {
                        elements.push(this.parseTest());
                    }
                    type = { kind: 'Tuple', span: this.spanFrom(elements[0].span.start), elements };
                }
            }
            const name = this.eatKeyword('as') ? this.expectName().value : undefined;
            this.expectOp(':');
            const handlerBody = this.parseBlock();
            handlers.push({ span: { start: handlerStart, end: this.blockEnd([handlerBody]) }, type, name, body: handlerBody });
        }

        const orelse = this.parseElse();
        let finalbody: Statement[] = [];
        if (this.eatKeyword('finally')) {
            this.expectOp(':');
            finalbody = this.parseBlock();
        }
        if (handlers.length === 0 && finalbody.length === 0) {
            throw this.error("expected 'except' or 'finally'");
        }

        const end = this.blockEnd([body, ...handlers.map(h => h.body), orelse, finalbody]);
        return { kind: 'Try', span: { start, end }, body, handlers, orelse, finalbody };
    }

    private parseWith(start: number, isAsync: boolean): Statement {
        this.expectKeyword('with');
        const items = this.tryParenthesizedWithItems() ?? this.parseWithItems();
        this.expectOp(':');
        const body = this.parseBlock();
        return { kind: 'With', span: { start, end: this.blockEnd([body]) }, items, body, isAsync };
    }

    /**
     * `with (a as b, c as d):` is ambiguous with a parenthesized context
     * expression; try the item list first and rewind when it does not fit.
     */
    private tryParenthesizedWithItems(): WithItem[] | undefined {
        if (!this.isOp('(')) {
            return undefined;
        }
        const saved = this.index;
        try {
            this.advance();
            const items: WithItem[] = [];
            while (!this.isOp(')')) {
                items.push(this.parseWithItem());
                if (!this.eatOp(',')) {
                    break;
                }
            }
            this.expectOp(')');
            if (this.isOp(':') && items.length > 0) {
                return items;
            }
        } catch (err) {
            if (!(err instanceof PythonSyntaxError)) {
                throw err;
            }
        }
        this.index = saved;
        return undefined;
    }

    private parseWithItems(): WithItem[] {
        const items = [this.parseWithItem()];
        while (this.eatOp(',')) {
            items.push(this.parseWithItem());
        }
        return items;
    }

    private parseWithItem(): WithItem {
        const context = this.parseTest();
        const target = this.eatKeyword('as') ? this.parseStarTarget() : undefined;
        return { context, target };
    }

    private parseAsync(start: number, decorators: Expression[]): Statement {
        this.expectKeyword('async');
        if (this.isKeyword('def')) {
            return this.parseFunction(start, decorators, true);
        }
        if (decorators.length > 0) {
            throw this.error("expected 'def'");
        }
        if (this.isKeyword('for')) {
            return this.parseFor(start, true);
        }
        if (this.isKeyword('with')) {
            return this.parseWith(start, true);
        }
        throw this.error("expected 'def', 'for' or 'with'");
    }

    private parseDecorated(): Statement {
        const start = this.current.start;
        const decorators: Expression[] = [];
        while (this.eatOp('@')) {
            decorators.push(this.parseNamedExpr());
            this.expectKind('newline', 'end of line');
        }
        if (this.isKeyword('def')) {
            return this.parseFunction(start, decorators, false);
        }
        if (this.isKeyword('class')) {
            return this.parseClass(start, decorators);
        }
        if (this.isKeyword('async')) {
            return this.parseAsync(start, decorators);
        }
        throw this.error("expected 'def' or 'class'");
    }

    private parseFunction(start: number, decorators: Expression[], isAsync: boolean): FunctionDef {
        this.expectKeyword('def');
        const name = this.expectName().value;
        const typeParams = this.isOp('[') ? this.parseTypeParams() : [];
        this.expectOp('(');
        const params = this.parseParameters(')', true);
        this.expectOp(')');
        const returns = this.eatOp('->') ? this.parseTest() : undefined;
        this.expectOp(':');
        const body = this.parseBlock();
        return {
            kind: 'FunctionDef',
            span: { start, end: this.blockEnd([body]) },
            name,
            decorators,
            typeParams,
            params,
            returns,
            body,
            isAsync,
        };
    }

    private parseClass(start: number, decorators: Expression[]): ClassDef {
        this.expectKeyword('class');
        const name = this.expectName().value;
        const typeParams = this.isOp('[') ? this.parseTypeParams() : [];
        let bases: Expression[] = [];
        let keywords: Keyword[] = [];
        if (this.eatOp('(')) {
            ({ args: bases, keywords } = this.parseArguments());
        }
        this.expectOp(':');
        const body = this.parseBlock();
        return {
            kind: 'ClassDef',
            span: { start, end: this.blockEnd([body]) },
            name,
            decorators,
            typeParams,
            bases,
            keywords,
            body,
        };
    }

    private parseTypeParams(): TypeParam[] {
        this.expectOp('[');
        const params: TypeParam[] = [];
        while (!this.isOp(']')) {
            const start = this.current.start;
            const starred = this.eatOp('*') || this.eatOp('**');
            const name = this.expectName().value;
            const bound = !starred && this.eatOp(':') ? this.parseTest() : undefined;
            const defaultValue = this.eatOp('=') ? this.parseAnnotation() : undefined;
            params.push({ span: this.spanFrom(start), name, bound, defaultValue });
            if (!this.eatOp(',')) {
                break;
            }
        }
        this.expectOp(']');
        return params;
    }

    /** Parses a parameter list up to (not including) `terminator`. */
    private parseParameters(terminator: string, annotated: boolean): Parameter[] {
        const params: Parameter[] = [];
        while (!this.isOp(terminator)) {
            const start = this.current.start;
            if (this.eatOp('/')) {
                // positional-only marker
            } else if (this.eatOp('*')) {
                if (this.isIdentifier()) {
                    const name = this.advance().value;
                    const annotation = annotated && this.eatOp(':') ? this.parseAnnotation() : undefined;
                    params.push({ span: this.spanFrom(start), name, kind: 'vararg', annotation });
                }
            } else if (this.eatOp('**')) {
                const name = this.expectName().value;
                const annotation = annotated && this.eatOp(':') ? this.parseTest() : undefined;
                params.push({ span: this.spanFrom(start), name, kind: 'kwarg', annotation });
            } else {
                const name = this.expectName().value;
                const annotation = annotated && this.eatOp(':') ? this.parseTest() : undefined;
                const defaultValue = this.eatOp('=') ? this.parseTest() : undefined;
                params.push({ span: this.spanFrom(start), name, kind: 'positional', annotation, defaultValue });
            }
            if (!this.eatOp(',')) {
                break;
            }
        }
        return params;
    }

    /** An annotation, which may be starred (`*args: *Ts`). */
    private parseAnnotation(): Expression {
        if (this.isOp('*')) {
            const start = this.advance().start;
            const value = this.parseOrExpr();
            return { kind: 'Starred', span: this.spanFrom(start), value };
        }
        return this.parseTest();
    }

    // ------------------------------------------------------------------
    // match statements
    // ------------------------------------------------------------------

    /**
     * `match` is a soft keyword: it starts a statement only when the
     * line reads `match <subject>:` and an indented `case` follows.
     */
    private looksLikeMatch(): boolean {
        let depth = 0;
        for (let i = this.index + 1; i < this.tokens.length; i++) {
            const token = this.tokens[i];
            if (token.kind === 'newline' || token.kind === 'eof') {
                return false;
            }
            if (token.kind !== 'op') {
                continue;
            }
            if (token.value === '(' || token.value === '[' || token.value === '{') {
                depth++;
            } else if (token.value === ')' || token.value === ']' || token.value === '}') {
                depth--;
            } else if (token.value === ':' && depth === 0) {
                if (i === this.index + 1) {
                    return false;
                }
                const next = this.tokens[i + 1];
                const indent = this.tokens[i + 2];
                const first = this.tokens[i + 3];
                return next?.kind === 'newline' && indent?.kind === 'indent' && first !== undefined
                    && this.isKeyword('case', first);
            }
        }
        return false;
    }

    private parseMatch(): Statement {
        const start = this.advance().start;
        const subject = this.parseStarExpressions(true);
        this.expectOp(':');
        this.expectKind('newline', 'end of line');
        this.expectKind('indent', 'an indented block');

        const cases: MatchCase[] = [];
        while (this.isKeyword('case')) {
            const caseStart = this.advance().start;
            const pattern = this.parsePatterns();
            const guard = this.eatKeyword('if') ? this.parseNamedExpr() : undefined;
            this.expectOp(':');
            const body = this.parseBlock();
            cases.push({ span: { start: caseStart, end: this.blockEnd([body]) }, pattern, guard, body });
        }
        if (this.current.kind === 'dedent') {
            this.advance();
        } else if (this.current.kind !== 'eof') {
            throw this.error("expected 'case'");
        }

        return { kind: 'Match', span: { start, end: this.blockEnd(cases.map(c => c.body)) }, subject, cases };
    }

    private parsePatterns(): Pattern {
        const start = this.current.start;
        const first = this.parseAsPattern();
        if (!this.isOp(',')) {
            return first;
        }
        const patterns = [first];
        while (this.eatOp(',')) {
            if (this.isOp(':') || this.isKeyword('if')) {
                break;
            }
            patterns.push(this.parseAsPattern());
        }
        return { kind: 'MatchSequence', span: this.spanFrom(start), patterns };
    }

    private parseAsPattern(): Pattern {
        const start = this.current.start;
        if (this.eatOp('*')) {
            const name = this.expectName().value;
            return { kind: 'MatchStar', span: this.spanFrom(start), name: name === '_' ? undefined : name };
        }
        const pattern = this.parseOrPattern();
        if (this.eatKeyword('as')) {
            const name = this.expectName().value;
            return { kind: 'MatchAs', span: this.spanFrom(start), pattern, name };
        }
        return pattern;
    }

    private parseOrPattern(): Pattern {
        const start = this.current.start;
        const first = this.parseClosedPattern();
        if (!this.isOp('|')) {
            return first;
        }
        const patterns = [first];
        while (this.eatOp('|')) {
            patterns.push(this.parseClosedPattern());
        }
        return { kind: 'MatchOr', span: this.spanFrom(start), patterns };
    }

    private parseClosedPattern(): Pattern {
        const token = this.current;
        const start = token.start;

        if (token.kind === 'number' || this.isOp('-')) {
            const value = this.parseArithExpr();
            return { kind: 'MatchValue', span: value.span, value };
        }
        if (token.kind === 'string') {
            const value = this.parseStrings();
            return { kind: 'MatchValue', span: value.span, value };
        }
        if (token.kind === 'name') {
            if (token.value === 'None' || token.value === 'True' || token.value === 'False') {
                this.advance();
                const span = this.spanFrom(start);
                return { kind: 'MatchValue', span, value: { kind: 'Constant', span, literal: 'keyword', value: token.value } };
            }
            const name = this.nameExpr(this.expectName());
            let expr: Expression = name;
            while (this.eatOp('.')) {
                const attr = this.expectName().value;
                expr = { kind: 'Attribute', span: this.spanFrom(start), value: expr, attr };
            }
            if (this.isOp('(')) {
                return this.parseClassPattern(expr, start);
            }
            if (expr !== name) {
                return { kind: 'MatchValue', span: expr.span, value: expr };
            }
            return { kind: 'MatchCapture', span: name.span, name: name.id === '_' ? undefined : name.id };
        }
        if (this.eatOp('(')) {
            if (this.eatOp(')')) {
                return { kind: 'MatchSequence', span: this.spanFrom(start), patterns: [] };
            }
            const first = this.parseAsPattern();
            if (this.eatOp(')')) {
                return first;
            }
            const patterns = [first];
            while (this.eatOp(',')) {
                if (this.isOp(')')) {
                    break;
                }
                patterns.push(this.parseAsPattern());
            }
            this.expectOp(')');
            return { kind: 'MatchSequence', span: this.spanFrom(start), patterns };
        }
        if (this.eatOp('[')) {
            const patterns: Pattern[] = [];
            while (!this.isOp(']')) {
                patterns.push(this.parseAsPattern());
                if (!this.eatOp(',')) {
                    break;
                }
            }
            this.expectOp(']');
            return { kind: 'MatchSequence', span: this.spanFrom(start), patterns };
        }
        if (this.eatOp('{')) {
            return this.parseMappingPattern(start);
        }
        throw this.error('expected a pattern');
    }

    private parseMappingPattern(start: number): Pattern {
        const keys: Expression[] = [];
        const patterns: Pattern[] = [];
        let rest: string | undefined;
        while (!this.isOp('}')) {
            if (this.eatOp('**')) {
                rest = this.expectName().value;
            } else {
                keys.push(this.parsePatternKey());
                this.expectOp(':');
                patterns.push(this.parseAsPattern());
            }
            if (!this.eatOp(',')) {
                break;
            }
        }
        this.expectOp('}');
        return { kind: 'MatchMapping', span: this.spanFrom(start), keys, patterns, rest };
    }

    private parsePatternKey(): Expression {
        const token = this.current;
        if (token.kind === 'number' || this.isOp('-')) {
            return this.parseArithExpr();
        }
        if (token.kind === 'string') {
            return this.parseStrings();
        }
        if (token.kind === 'name' && (token.value === 'None' || token.value === 'True' || token.value === 'False')) {
            this.advance();
            return { kind: 'Constant', span: this.spanFrom(token.start), literal: 'keyword', value: token.value };
        }
        let expr: Expression = this.nameExpr(this.expectName());
        while (this.eatOp('.')) {
            const attr = this.expectName().value;
            expr = { kind: 'Attribute', span: this.spanFrom(token.start), value: expr, attr };
        }
        return expr;
    }

    private parseClassPattern(cls: Expression, start: number): Pattern {
        this.expectOp('(');
        const patterns: Pattern[] = [];
        const keywordPatterns: Pattern[] = [];
        while (!this.isOp(')')) {
            if (this.isIdentifier() && this.isOp('=', this.peek())) {
                this.advance();
                this.advance();
                keywordPatterns.push(this.parseAsPattern());
            } else {
                patterns.push(this.parseAsPattern());
            }
            if (!this.eatOp(',')) {
                break;
            }
        }
        this.expectOp(')');
        return { kind: 'MatchClass', span: this.spanFrom(start), cls, patterns, keywordPatterns };
    }

    // ------------------------------------------------------------------
    // Expressions
    // ------------------------------------------------------------------

    private parseYieldOrStarExpressions(): Expression {
        return this.isKeyword('yield') ? this.parseYield() : this.parseStarExpressions(false);
    }

    private parseYield(): Expression {
        const start = this.expectKeyword('yield').start;
        if (this.eatKeyword('from')) {
            const value = this.parseTest();
            return { kind: 'Yield', span: this.spanFrom(start), value, isFrom: true };
        }
        const value = this.startsExpression() ? this.parseStarExpressions(false) : undefined;
        return { kind: 'Yield', span: this.spanFrom(start), value, isFrom: false };
    }

    /** A comma-separated list of (possibly starred) expressions; a tuple when a comma is present. */
    private parseStarExpressions(allowNamed: boolean): Expression {
        const start = this.current.start;
        const first = this.parseStarredItem(allowNamed);
        if (!this.isOp(',')) {
            return first;
        }
        const elements = [first];
        while (this.eatOp(',')) {
            if (!this.startsExpression()) {
                break;
            }
            elements.push(this.parseStarredItem(allowNamed));
        }
        return { kind: 'Tuple', span: this.spanFrom(start), elements };
    }

    private parseStarredItem(allowNamed: boolean): Expression {
        if (this.isOp('*')) {
            const start = this.advance().start;
            const value = this.parseOrExpr();
            return { kind: 'Starred', span: this.spanFrom(start), value };
        }
        return allowNamed ? this.parseNamedExpr() : this.parseTest();
    }

    /** Assignment targets of `for`, `del` and comprehensions. */
    private parseTargetList(): Expression {
        const start = this.current.start;
        const first = this.parseStarTarget();
        if (!this.isOp(',')) {
            return first;
        }
        const elements = [first];
        while (this.eatOp(',')) {
            if (!this.startsExpression()) {
                break;
            }
            elements.push(this.parseStarTarget());
        }
        return { kind: 'Tuple', span: this.spanFrom(start), elements };
    }

    private parseStarTarget(): Expression {
        if (this.isOp('*')) {
            const start = this.advance().start;
            const value = this.parseOrExpr();
            return { kind: 'Starred', span: this.spanFrom(start), value };
        }
        return this.parseOrExpr();
    }

    private parseNamedExpr(): Expression {
        if (this.isIdentifier() && this.isOp(':=', this.peek())) {
            const target = this.nameExpr(this.advance());
            this.advance();
            const value = this.parseTest();
            return { kind: 'NamedExpr', span: this.spanFrom(target.span.start), target, value };
        }
        return this.parseTest();
    }

    private parseTest(): Expression {
        if (this.isKeyword('lambda')) {
            return this.parseLambda();
        }
        const start = this.current.start;
        const body = this.parseOrTest();
        if (!this.eatKeyword('if')) {
            return body;
        }
        const test = this.parseOrTest();
        this.expectKeyword('else');
        const orelse = this.parseTest();
        return { kind: 'IfExp', span: this.spanFrom(start), test, body, orelse };
    }

    /** An expression without a conditional, as in comprehension conditions. */
    private parseDisjunction(): Expression {
        return this.isKeyword('lambda') ? this.parseLambda() : this.parseOrTest();
    }

    private parseLambda(): Expression {
        const start = this.expectKeyword('lambda').start;
        const params = this.parseParameters(':', false);
        this.expectOp(':');
        const body = this.parseTest();
        return { kind: 'Lambda', span: this.spanFrom(start), params, body };
    }

    private parseOrTest(): Expression {
        let left = this.parseAndTest();
        while (this.eatKeyword('or')) {
            const right = this.parseAndTest();
            left = { kind: 'BinOp', span: { start: left.span.start, end: right.span.end }, op: 'or', left, right };
        }
        return left;
    }

    private parseAndTest(): Expression {
        let left = this.parseNotTest();
        while (this.eatKeyword('and')) {
            const right = this.parseNotTest();
            left = { kind: 'BinOp', span: { start: left.span.start, end: right.span.end }, op: 'and', left, right };
        }
        return left;
    }

    private parseNotTest(): Expression {
        if (this.isKeyword('not')) {
            const start = this.advance().start;
            const operand = this.parseNotTest();
            return { kind: 'UnaryOp', span: this.spanFrom(start), op: 'not', operand };
        }
        return this.parseComparison();
    }

    private parseComparison(): Expression {
        let left = this.parseOrExpr();
        for (;;) {
            const op = this.comparisonOperator();
            if (op === undefined) {
                return left;
            }
            const right = this.parseOrExpr();
            left = { kind: 'BinOp', span: { start: left.span.start, end: right.span.end }, op, left, right };
        }
    }

    private comparisonOperator(): string | undefined {
        const token = this.current;
        if (token.kind === 'op' && COMPARISON_OPERATORS.has(token.value)) {
            this.advance();
            return token.value;
        }
        if (this.eatKeyword('in')) {
            return 'in';
        }
        if (this.isKeyword('not') && this.isKeyword('in', this.peek())) {
            this.advance();
            this.advance();
            return 'not in';
        }
        if (this.eatKeyword('is')) {
            return this.eatKeyword('not') ? 'is not' : 'is';
        }
        return undefined;
    }

    private parseBinary(operators: readonly string[], operand: () => Expression): Expression {
        let left = operand();
        while (this.current.kind === 'op' && operators.includes(this.current.value)) {
            const op = this.advance().value;
            const right = operand();
            left = { kind: 'BinOp', span: { start: left.span.start, end: right.span.end }, op, left, right };
        }
        return left;
    }

    private parseOrExpr(): Expression {
        return this.parseBinary(['|'], () => this.parseXorExpr());
    }

    private parseXorExpr(): Expression {
        return this.parseBinary(['^'], () => this.parseAndExpr());
    }

    private parseAndExpr(): Expression {
        return this.parseBinary(['&'], () => this.parseShiftExpr());
    }

    private parseShiftExpr(): Expression {
        return this.parseBinary(['<<', '>>'], () => this.parseArithExpr());
    }

    private parseArithExpr(): Expression {
        return this.parseBinary(['+', '-'], () => this.parseTerm());
    }

    private parseTerm(): Expression {
        return this.parseBinary(['*', '/', '//', '%', '@'], () => this.parseFactor());
    }

    private parseFactor(): Expression {
        if (this.isOp('+') || this.isOp('-') || this.isOp('~')) {
            const token = this.advance();
            const operand = this.parseFactor();
            return { kind: 'UnaryOp', span: this.spanFrom(token.start), op: token.value, operand };
        }
        return this.parsePower();
    }

    private parsePower(): Expression {
        const start = this.current.start;
        let base: Expression;
        if (this.eatKeyword('await')) {
            const value = this.parsePrimary();
            base = { kind: 'Await', span: this.spanFrom(start), value };
        } else {
            base = this.parsePrimary();
        }
        if (this.eatOp('**')) {
            const exponent = this.parseFactor();
            return { kind: 'BinOp', span: this.spanFrom(start), op: '**', left: base, right: exponent };
        }
        return base;
    }

    private parsePrimary(): Expression {
        let expr = this.parseAtom();
        const start = expr.span.start;
        for (;;) {
            if (this.eatOp('.')) {
                const attr = this.expectName().value;
                expr = { kind: 'Attribute', span: this.spanFrom(start), value: expr, attr };
            } else if (this.eatOp('(')) {
                const { args, keywords } = this.parseArguments();
                expr = { kind: 'Call', span: this.spanFrom(start), func: expr, args, keywords };
            } else if (this.eatOp('[')) {
                const slice = this.parseSubscriptSlice();
                expr = { kind: 'Subscript', span: this.spanFrom(start), value: expr, slice };
            } else {
                return expr;
            }
        }
    }

    /** Parses call arguments after the opening `(`, through the closing `)`. */
    private parseArguments(): { args: Expression[]; keywords: Keyword[] } {
        const args: Expression[] = [];
        const keywords: Keyword[] = [];
        while (!this.isOp(')')) {
            const start = this.current.start;
            if (this.eatOp('*')) {
                const value = this.parseTest();
                args.push({ kind: 'Starred', span: this.spanFrom(start), value });
            } else if (this.eatOp('**')) {
                const value = this.parseTest();
                keywords.push({ span: this.spanFrom(start), value });
            } else if (this.isIdentifier() && this.isOp('=', this.peek())) {
                const name = this.advance().value;
                this.advance();
                const value = this.parseTest();
                keywords.push({ span: this.spanFrom(start), name, value });
            } else {
                const value = this.parseNamedExpr();
                if (this.startsComprehension()) {
                    const generators = this.parseComprehensionClauses();
                    args.push({ kind: 'GeneratorExp', span: this.spanFrom(start), element: value, generators });
                } else {
                    args.push(value);
                }
            }
            if (!this.eatOp(',')) {
                break;
            }
        }
        this.expectOp(')');
        return { args, keywords };
    }

    /** Parses a subscript after the opening `[`, through the closing `]`. */
    private parseSubscriptSlice(): Expression {
        const start = this.current.start;
        const first = this.parseSliceItem();
        if (!this.isOp(',')) {
            this.expectOp(']');
            return first;
        }
        const elements = [first];
        while (this.eatOp(',')) {
            if (this.isOp(']')) {
                break;
            }
            elements.push(this.parseSliceItem());
        }
        const span = this.spanFrom(start);
        this.expectOp(']');
        return { kind: 'Tuple', span, elements };
    }

    private parseSliceItem(): Expression {
        const start = this.current.start;
        if (this.eatOp('*')) {
            const value = this.parseOrExpr();
            return { kind: 'Starred', span: this.spanFrom(start), value };
        }
        let lower: Expression | undefined;
        if (!this.isOp(':')) {
            lower = this.parseNamedExpr();
            if (!this.isOp(':')) {
                return lower;
            }
        }
        this.expectOp(':');
        const endsPart = (): boolean => this.isOp(':') || this.isOp(']') || this.isOp(',');
        const upper = endsPart() ? undefined : this.parseTest();
        let step: Expression | undefined;
        if (this.eatOp(':') && !this.isOp(']') && !this.isOp(',')) {
            step = this.parseTest();
        }
        return { kind: 'Slice', span: this.spanFrom(start), lower, upper, step };
    }

    private parseAtom(): Expression {
        const token = this.current;
        const start = token.start;
        switch (token.kind) {
            case 'number':
                this.advance();
                return { kind: 'Constant', span: this.spanFrom(start), literal: 'number', value: token.value };
            case 'string':
                return this.parseStrings();
            case 'name':
                if (token.value === 'None' || token.value === 'True' || token.value === 'False') {
                    this.advance();
                    return { kind: 'Constant', span: this.spanFrom(start), literal: 'keyword', value: token.value };
                }
                return this.nameExpr(this.expectName());
            case 'op':
                if (this.eatOp('(')) {
                    return this.parseParenthesized(start);
                }
                if (this.eatOp('[')) {
                    return this.parseListDisplay(start);
                }
                if (this.eatOp('{')) {
                    return this.parseBraceDisplay(start);
                }
                if (this.eatOp('...')) {
                    return { kind: 'Constant', span: this.spanFrom(start), literal: 'ellipsis', value: '...' };
                }
                break;
        }
        throw this.error('expected an expression');
    }

    private startsComprehension(): boolean {
        return this.isKeyword('for') || (this.isKeyword('async') && this.isKeyword('for', this.peek()));
    }

    private parseComprehensionClauses(): Comprehension[] {
        const generators: Comprehension[] = [];
        while (this.startsComprehension()) {
            const start = this.current.start;
            const isAsync = this.eatKeyword('async');
            this.expectKeyword('for');
            const target = this.parseTargetList();
            this.expectKeyword('in');
            const iter = this.parseOrTest();
            const ifs: Expression[] = [];
            while (this.eatKeyword('if')) {
                ifs.push(this.parseDisjunction());
            }
            generators.push({ span: this.spanFrom(start), target, iter, ifs, isAsync });
        }
        return generators;
    }

    private parseParenthesized(start: number): Expression {
        if (this.eatOp(')')) {
            return { kind: 'Tuple', span: this.spanFrom(start), elements: [] };
        }
        if (this.isKeyword('yield')) {
            const value = this.parseYield();
            this.expectOp(')');
            return value;
        }
        const first = this.parseStarredItem(true);
        if (this.startsComprehension()) {
            const generators = this.parseComprehensionClauses();
            this.expectOp(')');
            return { kind: 'GeneratorExp', span: this.spanFrom(start), element: first, generators };
        }
        if (this.eatOp(')')) {
            return first;
        }
        const elements = [first];
        while (this.eatOp(',')) {
            if (this.isOp(')')) {
                break;
            }
            elements.push(this.parseStarredItem(true));
        }
        this.expectOp(')');
        return { kind: 'Tuple', span: this.spanFrom(start), elements };
    }

    private parseListDisplay(start: number): Expression {
        if (this.eatOp(']')) {
            return { kind: 'List', span: this.spanFrom(start), elements: [] };
        }
        const first = this.parseStarredItem(true);
        if (this.startsComprehension()) {
            const generators = this.parseComprehensionClauses();
            this.expectOp(']');
            return { kind: 'ListComp', span: this.spanFrom(start), element: first, generators };
        }
        const elements = [first];
        while (this.eatOp(',')) {
            if (this.isOp(']')) {
                break;
            }
            elements.push(this.parseStarredItem(true));
        }
        this.expectOp(']');
        return { kind: 'List', span: this.spanFrom(start), elements };
    }

    private parseBraceDisplay(start: number): Expression {
        if (this.eatOp('}')) {
            return { kind: 'Dict', span: this.spanFrom(start), entries: [] };
        }

        if (this.eatOp('**')) {
            const value = this.parseOrExpr();
            return this.parseDictRest(start, [{ value }]);
        }

        const first = this.parseStarredItem(true);
        if (first.kind !== 'Starred' && this.eatOp(':')) {
            const value = this.parseTest();
            if (this.startsComprehension()) {
                const generators = this.parseComprehensionClauses();
                this.expectOp('}');
                return { kind: 'DictComp', span: this.spanFrom(start), element: first, value, generators };
            }
            return this.parseDictRest(start, [{ key: first, value }]);
        }

        if (this.startsComprehension()) {
            const generators = this.parseComprehensionClauses();
            this.expectOp('}');
            return { kind: 'SetComp', span: this.spanFrom(start), element: first, generators };
        }
        const elements = [first];
        while (this.eatOp(',')) {
            if (this.isOp('}')) {
                break;
            }
            elements.push(this.parseStarredItem(true));
        }
        this.expectOp('}');
        return { kind: 'Set', span: this.spanFrom(start), elements };
    }

    private parseDictRest(start: number, entries: { key?: Expression; value: Expression }[]): Expression {
        while (this.eatOp(',')) {
            if (this.isOp('}')) {
                break;
            }
            if (this.eatOp('**')) {
                entries.push({ value: this.parseOrExpr() });
                continue;
            }
            const key = this.parseTest();
            this.expectOp(':');
            entries.push({ key, value: this.parseTest() });
        }
        this.expectOp('}');
        return { kind: 'Dict', span: this.spanFrom(start), entries };
    }

    /** Adjacent string literals, concatenated. */
    private parseStrings(): Expression {
        const start = this.current.start;
        const parts: Token[] = [];
        while (this.current.kind === 'string') {
            parts.push(this.advance());
        }
        const span = this.spanFrom(start);

        if (parts.some(part => part.fields !== undefined)) {
            const values = parts.flatMap(part => (part.fields ?? []).map(field => this.parseField(field)));
            return { kind: 'FString', span, values };
        }

        const decoded = parts.map(part => decodeStringLiteral(part.value));
        const literal = decoded.some(d => d.bytes) ? 'bytes' : 'string';
        return { kind: 'Constant', span, literal, value: decoded.map(d => d.value).join('') };
    }

    private parseField(field: Span): Expression {
        const text = this.source.slice(field.start - this.base, field.end - this.base);
        const tokens = tokenize(text, { offset: field.start, expression: true });
        return new Parser(this.source, tokens, this.base).parseStandaloneExpression();
    }
}
