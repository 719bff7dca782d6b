/**
 * Syntax tree produced by the Python parser.
 *
 * The tree keeps exactly what name resolution and import rewriting need:
 * every node carries the source offsets it was parsed from, names keep
 * their identifiers, and operators that do not affect scoping are folded
 * into a handful of generic node kinds.
 */

/** Half-open range of source offsets `[start, end)`. */
export interface Span {
    readonly start: number;
    readonly end: number;
}

interface NodeBase {
    readonly span: Span;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export interface NameExpr extends NodeBase {
    readonly kind: 'Name';
    readonly id: string;
}

export interface AttributeExpr extends NodeBase {
    readonly kind: 'Attribute';
    readonly value: Expression;
    readonly attr: string;
}

export interface ConstantExpr extends NodeBase {
    readonly kind: 'Constant';
    readonly literal: 'string' | 'bytes' | 'number' | 'keyword' | 'ellipsis';
    /** Decoded value for `string` literals; source text otherwise. */
    readonly value: string;
}

/** An f-string; {@link values} are the expressions of its replacement fields. */
export interface FStringExpr extends NodeBase {
    readonly kind: 'FString';
    readonly values: readonly Expression[];
}

export interface Keyword extends NodeBase {
    /** `undefined` for `**mapping` unpacking. */
    readonly name?: string;
    readonly value: Expression;
}

export interface CallExpr extends NodeBase {
    readonly kind: 'Call';
    readonly func: Expression;
    readonly args: readonly Expression[];
    readonly keywords: readonly Keyword[];
}

export interface SubscriptExpr extends NodeBase {
    readonly kind: 'Subscript';
    readonly value: Expression;
    readonly slice: Expression;
}

export interface SliceExpr extends NodeBase {
    readonly kind: 'Slice';
    readonly lower?: Expression;
    readonly upper?: Expression;
    readonly step?: Expression;
}

export interface SequenceExpr extends NodeBase {
    readonly kind: 'Tuple' | 'List' | 'Set';
    readonly elements: readonly Expression[];
}

export interface DictEntry {
    /** `undefined` for `**mapping` unpacking. */
    readonly key?: Expression;
    readonly value: Expression;
}

export interface DictExpr extends NodeBase {
    readonly kind: 'Dict';
    readonly entries: readonly DictEntry[];
}

export interface StarredExpr extends NodeBase {
    readonly kind: 'Starred';
    readonly value: Expression;
}

export interface UnaryExpr extends NodeBase {
    readonly kind: 'UnaryOp';
    readonly op: string;
    readonly operand: Expression;
}

/** Arithmetic, bitwise, boolean and comparison operators. */
export interface BinaryExpr extends NodeBase {
    readonly kind: 'BinOp';
    readonly op: string;
    readonly left: Expression;
    readonly right: Expression;
}

export interface IfExpr extends NodeBase {
    readonly kind: 'IfExp';
    readonly test: Expression;
    readonly body: Expression;
    readonly orelse: Expression;
}

export interface LambdaExpr extends NodeBase {
    readonly kind: 'Lambda';
    readonly params: readonly Parameter[];
    readonly body: Expression;
}

export interface Comprehension extends NodeBase {
    readonly target: Expression;
    readonly iter: Expression;
    readonly ifs: readonly Expression[];
    readonly isAsync: boolean;
}

export interface ComprehensionExpr extends NodeBase {
    readonly kind: 'ListComp' | 'SetComp' | 'GeneratorExp' | 'DictComp';
    /** The element, or the key of a dict comprehension. */
    readonly element: Expression;
    /** The value of a dict comprehension. */
    readonly value?: Expression;
    readonly generators: readonly Comprehension[];
}

export interface NamedExpr extends NodeBase {
    readonly kind: 'NamedExpr';
    readonly target: NameExpr;
    readonly value: Expression;
}

export interface AwaitExpr extends NodeBase {
    readonly kind: 'Await';
    readonly value: Expression;
}

export interface YieldExpr extends NodeBase {
    readonly kind: 'Yield';
    readonly value?: Expression;
    readonly isFrom: boolean;
}

export type Expression =
    | NameExpr
    | AttributeExpr
    | ConstantExpr
    | FStringExpr
    | CallExpr
    | SubscriptExpr
    | SliceExpr
    | SequenceExpr
    | DictExpr
    | StarredExpr
    | UnaryExpr
    | BinaryExpr
    | IfExpr
    | LambdaExpr
    | ComprehensionExpr
    | NamedExpr
    | AwaitExpr
    | YieldExpr;

// ---------------------------------------------------------------------------
// Parameters and type parameters
// ---------------------------------------------------------------------------

export interface Parameter extends NodeBase {
    readonly name: string;
    readonly kind: 'positional' | 'vararg' | 'kwarg';
    readonly annotation?: Expression;
    readonly defaultValue?: Expression;
}

/** A PEP 695 type parameter (`T`, `T: int`, `*Ts`, `**P`). */
export interface TypeParam extends NodeBase {
    readonly name: string;
    readonly bound?: Expression;
    readonly defaultValue?: Expression;
}

// ---------------------------------------------------------------------------
// Match patterns
// ---------------------------------------------------------------------------

export type Pattern =
    | { readonly kind: 'MatchValue'; readonly span: Span; readonly value: Expression }
    /** `name` is `undefined` for the `_` wildcard. */
    | { readonly kind: 'MatchCapture'; readonly span: Span; readonly name?: string }
    | { readonly kind: 'MatchSequence'; readonly span: Span; readonly patterns: readonly Pattern[] }
    | { readonly kind: 'MatchStar'; readonly span: Span; readonly name?: string }
    | {
        readonly kind: 'MatchMapping';
        readonly span: Span;
        readonly keys: readonly Expression[];
        readonly patterns: readonly Pattern[];
        readonly rest?: string;
    }
    | {
        readonly kind: 'MatchClass';
        readonly span: Span;
        readonly cls: Expression;
        readonly patterns: readonly Pattern[];
        readonly keywordPatterns: readonly Pattern[];
    }
    | { readonly kind: 'MatchAs'; readonly span: Span; readonly pattern: Pattern; readonly name: string }
    | { readonly kind: 'MatchOr'; readonly span: Span; readonly patterns: readonly Pattern[] };

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

export interface ImportAlias extends NodeBase {
    /** Dotted name for `import`, plain name for `from … import`, `*` for wildcards. */
    readonly name: string;
    readonly asname?: string;
}

export interface ExceptHandler extends NodeBase {
    readonly type?: Expression;
    readonly name?: string;
    readonly body: readonly Statement[];
}

export interface WithItem {
    readonly context: Expression;
    readonly target?: Expression;
}

export interface MatchCase extends NodeBase {
    readonly pattern: Pattern;
    readonly guard?: Expression;
    readonly body: readonly Statement[];
}

export type Statement =
    | { readonly kind: 'Expr'; readonly span: Span; readonly value: Expression }
    | { readonly kind: 'Assign'; readonly span: Span; readonly targets: readonly Expression[]; readonly value: Expression }
    | {
        readonly kind: 'AugAssign';
        readonly span: Span;
        readonly target: Expression;
        readonly op: string;
        readonly value: Expression;
    }
    | {
        readonly kind: 'AnnAssign';
        readonly span: Span;
        readonly target: Expression;
        readonly annotation: Expression;
        readonly value?: Expression;
    }
    | FunctionDef
    | ClassDef
    | { readonly kind: 'Return'; readonly span: Span; readonly value?: Expression }
    | { readonly kind: 'Delete'; readonly span: Span; readonly targets: readonly Expression[] }
    | { readonly kind: 'Pass' | 'Break' | 'Continue'; readonly span: Span }
    | { readonly kind: 'Raise'; readonly span: Span; readonly exc?: Expression; readonly cause?: Expression }
    | { readonly kind: 'Global' | 'Nonlocal'; readonly span: Span; readonly names: readonly string[] }
    | { readonly kind: 'Import'; readonly span: Span; readonly names: readonly ImportAlias[] }
    | ImportFrom
    | {
        readonly kind: 'If' | 'While';
        readonly span: Span;
        readonly test: Expression;
        readonly body: readonly Statement[];
        readonly orelse: readonly Statement[];
    }
    | {
        readonly kind: 'For';
        readonly span: Span;
        readonly target: Expression;
        readonly iter: Expression;
        readonly body: readonly Statement[];
        readonly orelse: readonly Statement[];
        readonly isAsync: boolean;
    }
    | {
        readonly kind: 'With';
        readonly span: Span;
        readonly items: readonly WithItem[];
        readonly body: readonly Statement[];
        readonly isAsync: boolean;
    }
    | {
        readonly kind: 'Try';
        readonly span: Span;
        readonly body: readonly Statement[];
        readonly handlers: readonly ExceptHandler[];
        readonly orelse: readonly Statement[];
        readonly finalbody: readonly Statement[];
    }
    | { readonly kind: 'Assert'; readonly span: Span; readonly test: Expression; readonly msg?: Expression }
    | { readonly kind: 'Match'; readonly span: Span; readonly subject: Expression; readonly cases: readonly MatchCase[] }
    | {
        readonly kind: 'TypeAlias';
        readonly span: Span;
        readonly name: NameExpr;
        readonly typeParams: readonly TypeParam[];
        readonly value: Expression;
    };

export interface FunctionDef extends NodeBase {
    readonly kind: 'FunctionDef';
    readonly name: string;
    readonly decorators: readonly Expression[];
    readonly typeParams: readonly TypeParam[];
    readonly params: readonly Parameter[];
    readonly returns?: Expression;
    readonly body: readonly Statement[];
    readonly isAsync: boolean;
}

export interface ClassDef extends NodeBase {
    readonly kind: 'ClassDef';
    readonly name: string;
    readonly decorators: readonly Expression[];
    readonly typeParams: readonly TypeParam[];
    readonly bases: readonly Expression[];
    readonly keywords: readonly Keyword[];
    readonly body: readonly Statement[];
}

export interface ImportFrom extends NodeBase {
    readonly kind: 'ImportFrom';
    /** Dotted module name without the leading dots; empty for `from . import x`. */
    readonly module: string;
    readonly level: number;
    readonly names: readonly ImportAlias[];
}

export interface Module extends NodeBase {
    readonly kind: 'Module';
    readonly body: readonly Statement[];
}

/**
 * Returns the nested statement blocks of a compound statement, in
 * source order.  Simple statements have none.
 */
export function childBlocks(stmt: Statement): readonly (readonly Statement[])[] {
    switch (stmt.kind) {
        case 'FunctionDef':
        case 'ClassDef':
        case 'With':
            return [stmt.body];
        case 'If':
        case 'While':
        case 'For':
            return [stmt.body, stmt.orelse];
        case 'Try':
            return [stmt.body, ...stmt.handlers.map(h => h.body), stmt.orelse, stmt.finalbody];
        case 'Match':
            return stmt.cases.map(c => c.body);
        default:
            return [];
    }
}
