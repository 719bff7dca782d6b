import type {
    ClassDef,
    ComprehensionExpr,
    Expression,
    FunctionDef,
    Module,
    Parameter,
    Pattern,
    Span,
    Statement,
    TypeParam,
} from '../parsing/python-ast';
import { parseExpression } from '../parsing/python-parser';
import { PythonSyntaxError } from '../parsing/python-tokenizer';

export type ScopeKind = 'module' | 'function' | 'class' | 'comprehension' | 'annotation';

/** How a name came to be bound in a scope. */
export type BindingKind = 'assignment' | 'definition' | 'import' | 'parameter';

/** Walk position recorded for module bindings made by functions under `global`. */
export const BOUND_BY_FUNCTION = Number.POSITIVE_INFINITY;

/**
 * A namespace: the module, a function or lambda body, a class body, a
 * comprehension, or the annotation scope of a PEP 695 generic.
 */
export class Scope {
    readonly bindings = new Map<string, Set<BindingKind>>();
    /** Walk position of the first binding of each name. */
    readonly boundAt = new Map<string, number>();
    readonly globals = new Set<string>();
    readonly nonlocals = new Set<string>();
    readonly children: Scope[] = [];

    constructor(
        readonly kind: ScopeKind,
        readonly parent: Scope | undefined,
    ) {
        parent?.children.push(this);
    }

    bind(name: string, kind: BindingKind, position: number): void {
        let kinds = this.bindings.get(name);
        if (!kinds) {
            kinds = new Set();
            this.bindings.set(name, kinds);
        }
        kinds.add(kind);
        this.boundAt.set(name, Math.min(position, this.boundAt.get(name) ?? position));
    }
}

/** A read of a name. */
export interface Reference {
    readonly name: string;
    readonly span: Span;
    readonly scope: Scope;
    /** Walk position; module and class bodies run in this order. */
    readonly position: number;
    /** `true` inside a function or lambda body, which runs only when called. */
    readonly deferred: boolean;
}

export interface ScopeAnalysis {
    readonly module: Scope;
    /** Every name read in the file, in walk order. */
    readonly references: readonly Reference[];
    /**
     * Returns the scope whose binding a reference reads.  Names bound
     * nowhere resolve to the module scope, and so do class-body reads
     * that come before the class binds the name.
     */
    resolve(reference: Reference): Scope;
}

/**
 * Builds the scope tree of a module and records every binding and
 * reference.  A name assigned anywhere in a function is local to the
 * whole function, as in CPython's symbol table.  Module and class
 * bodies keep the walk position of each binding, since they look names
 * up as they run.
 */
export function analyzeScopes(tree: Module): ScopeAnalysis {
    const walker = new ScopeWalker();
    walker.walkBlock(tree.body);
    hoistDeclaredNames(walker.module);

    const module = walker.module;
    return {
        module,
        references: walker.references,
        resolve: reference => resolveName(module, reference),
    };
}

/**
 * Moves bindings of `global` names to the module scope, at
 * {@link BOUND_BY_FUNCTION}, and drops bindings of `nonlocal` names,
 * which belong to an enclosing function.
 */
function hoistDeclaredNames(module: Scope): void {
    const visit = (scope: Scope): void => {
        if (scope !== module) {
            for (const name of scope.globals) {
                for (const kind of scope.bindings.get(name) ?? []) {
                    module.bind(name, kind, BOUND_BY_FUNCTION);
                }
                scope.bindings.delete(name);
            }
            for (const name of scope.nonlocals) {
                scope.bindings.delete(name);
            }
        }
        scope.children.forEach(visit);
    };
    visit(module);
}

function resolveName(module: Scope, reference: Reference): Scope {
    const { name, position } = reference;
    let scope = reference.scope;
    // Class bodies are visible only to code written directly in them
    // (and to the annotation scopes of their generic members).
    let direct = true;
    for (;;) {
        if (scope.kind !== 'class' || direct) {
            if (scope.globals.has(name)) {
                return module;
            }
            // A class body looks names up as it runs, so its own later
            // bindings do not hide the module's.
            const boundAt = scope.boundAt.get(name);
            if (boundAt !== undefined && (scope.kind !== 'class' || boundAt < position)) {
                return scope;
            }
        }
        if (!scope.parent) {
            return scope;
        }
        direct = scope.kind === 'annotation';
        scope = scope.parent;
    }
}

/** Subscripted names whose string arguments are values, not forward references. */
const LITERAL_TYPES: ReadonlySet<string> = new Set(['Literal', 'Annotated']);

class ScopeWalker {
    readonly module = new Scope('module', undefined);
    readonly references: Reference[] = [];
    private scope = this.module;
    private inAnnotation = false;
    private position = 0;

    walkBlock(body: readonly Statement[]): void {
        for (const stmt of body) {
            this.walkStatement(stmt);
        }
    }

    private walkStatement(stmt: Statement): void {
        switch (stmt.kind) {
            case 'Expr':
                this.visit(stmt.value);
                break;
            case 'Assign':
                this.visit(stmt.value);
                stmt.targets.forEach(target => this.bindTarget(target));
                break;
            case 'AugAssign':
                this.visit(stmt.value);
                if (stmt.target.kind === 'Name') {
                    this.reference(stmt.target.id, stmt.target.span);
                }
                this.bindTarget(stmt.target);
                break;
            case 'AnnAssign':
                this.visitAnnotation(stmt.annotation);
                if (stmt.value) {
                    this.visit(stmt.value);
                }
                // A bare annotation creates no binding at run time, except
                // that the compiler treats the name as local to a function.
                if (stmt.target.kind !== 'Name' || stmt.value || this.scope.kind === 'function') {
                    this.bindTarget(stmt.target);
                }
                break;
            case 'FunctionDef':
                this.walkFunction(stmt);
                break;
            case 'ClassDef':
                this.walkClass(stmt);
                break;
            case 'Return':
                this.visitOptional(stmt.value);
                break;
            case 'Delete':
                stmt.targets.forEach(target => this.visit(target));
                break;
            case 'Raise':
                this.visitOptional(stmt.exc);
                this.visitOptional(stmt.cause);
                break;
            case 'Assert':
                this.visit(stmt.test);
                this.visitOptional(stmt.msg);
                break;
            case 'Global':
                stmt.names.forEach(name => this.scope.globals.add(name));
                break;
            case 'Nonlocal':
                stmt.names.forEach(name => this.scope.nonlocals.add(name));
                break;
            case 'Import':
                for (const alias of stmt.names) {
                    this.bind(alias.asname ?? alias.name.split('.')[0], 'import');
                }
                break;
            case 'ImportFrom':
                for (const alias of stmt.names) {
                    if (alias.name !== '*') {
                        this.bind(alias.asname ?? alias.name, 'import');
                    }
                }
                break;
            case 'If':
            case 'While':
                this.visit(stmt.test);
                this.walkBlock(stmt.body);
                this.walkBlock(stmt.orelse);
                break;
            case 'For':
                this.visit(stmt.iter);
                this.bindTarget(stmt.target);
                this.walkBlock(stmt.body);
                this.walkBlock(stmt.orelse);
                break;
            case 'With':
                for (const item of stmt.items) {
                    this.visit(item.context);
                    if (item.target) {
                        this.bindTarget(item.target);
                    }
                }
                this.walkBlock(stmt.body);
                break;
            case 'Try':
                this.walkBlock(stmt.body);
                for (const handler of stmt.handlers) {
                    this.visitOptional(handler.type);
                    if (handler.name !== undefined) {
                        this.bind(handler.name, 'assignment');
                    }
                    this.walkBlock(handler.body);
                }
                this.walkBlock(stmt.orelse);
                this.walkBlock(stmt.finalbody);
                break;
            case 'Match':
                this.visit(stmt.subject);
                for (const matchCase of stmt.cases) {
                    this.walkPattern(matchCase.pattern);
                    this.visitOptional(matchCase.guard);
                    this.walkBlock(matchCase.body);
                }
                break;
            case 'TypeAlias':
                this.bind(stmt.name.id, 'definition');
                this.withScope(new Scope('annotation', this.scope), () => {
                    this.walkTypeParams(stmt.typeParams);
                    this.visit(stmt.value);
                });
                break;
            case 'Pass':
            case 'Break':
            case 'Continue':
                break;
        }
    }

    private walkFunction(def: FunctionDef): void {
        def.decorators.forEach(decorator => this.visit(decorator));
        for (const param of def.params) {
            this.visitOptional(param.defaultValue);
        }

        const signature = (): void => {
            for (const param of def.params) {
                if (param.annotation) {
                    this.visitAnnotation(param.annotation);
                }
            }
            if (def.returns) {
                this.visitAnnotation(def.returns);
            }
            this.withScope(new Scope('function', this.scope), () => {
                this.bindParameters(def.params);
                this.walkBlock(def.body);
            });
        };

        this.withGenericScope(def.typeParams, signature);
        this.bind(def.name, 'definition');
    }

    private walkClass(def: ClassDef): void {
        def.decorators.forEach(decorator => this.visit(decorator));
        this.withGenericScope(def.typeParams, () => {
            def.bases.forEach(base => this.visit(base));
            def.keywords.forEach(keyword => this.visit(keyword.value));
            this.withScope(new Scope('class', this.scope), () => this.walkBlock(def.body));
        });
        this.bind(def.name, 'definition');
    }

    /** Runs `walk` inside an annotation scope holding `typeParams`, when there are any. */
    private withGenericScope(typeParams: readonly TypeParam[], walk: () => void): void {
        if (typeParams.length === 0) {
            walk();
            return;
        }
        this.withScope(new Scope('annotation', this.scope), () => {
            this.walkTypeParams(typeParams);
            walk();
        });
    }

    private walkTypeParams(typeParams: readonly TypeParam[]): void {
        for (const param of typeParams) {
            this.bind(param.name, 'definition');
        }
        for (const param of typeParams) {
            if (param.bound) {
                this.visitAnnotation(param.bound);
            }
            if (param.defaultValue) {
                this.visitAnnotation(param.defaultValue);
            }
        }
    }

    private bindParameters(params: readonly Parameter[]): void {
        for (const param of params) {
            this.bind(param.name, 'parameter');
        }
    }

    private walkPattern(pattern: Pattern): void {
        switch (pattern.kind) {
            case 'MatchValue':
                this.visit(pattern.value);
                break;
            case 'MatchCapture':
            case 'MatchStar':
                if (pattern.name !== undefined) {
                    this.bind(pattern.name, 'assignment');
                }
                break;
            case 'MatchSequence':
            case 'MatchOr':
                pattern.patterns.forEach(p => this.walkPattern(p));
                break;
            case 'MatchMapping':
                pattern.keys.forEach(key => this.visit(key));
                pattern.patterns.forEach(p => this.walkPattern(p));
                if (pattern.rest !== undefined) {
                    this.bind(pattern.rest, 'assignment');
                }
                break;
            case 'MatchClass':
                this.visit(pattern.cls);
                pattern.patterns.forEach(p => this.walkPattern(p));
                pattern.keywordPatterns.forEach(p => this.walkPattern(p));
                break;
            case 'MatchAs':
                this.walkPattern(pattern.pattern);
                this.bind(pattern.name, 'assignment');
                break;
        }
    }

    private bindTarget(target: Expression, scope: Scope = this.scope): void {
        switch (target.kind) {
            case 'Name':
                this.bind(target.id, 'assignment', scope);
                break;
            case 'Tuple':
            case 'List':
                target.elements.forEach(element => this.bindTarget(element, scope));
                break;
            case 'Starred':
                this.bindTarget(target.value, scope);
                break;
            default:
                // Attribute and subscript targets read their base.
                this.visit(target);
        }
    }

    private visitOptional(expr: Expression | undefined): void {
        if (expr) {
            this.visit(expr);
        }
    }

    private visitAnnotation(expr: Expression): void {
        const outer = this.inAnnotation;
        this.inAnnotation = true;
        this.visit(expr);
        this.inAnnotation = outer;
    }

    private visit(expr: Expression): void {
        switch (expr.kind) {
            case 'Name':
                this.reference(expr.id, expr.span);
                break;
            case 'Attribute':
                this.visit(expr.value);
                break;
            case 'Constant':
                if (this.inAnnotation && expr.literal === 'string') {
                    this.visitStringAnnotation(expr.value, expr.span);
                }
                break;
            case 'FString':
                expr.values.forEach(value => this.visit(value));
                break;
            case 'Call':
                this.visit(expr.func);
                expr.args.forEach(arg => this.visit(arg));
                expr.keywords.forEach(keyword => this.visit(keyword.value));
                break;
            case 'Subscript':
                this.visit(expr.value);
                if (this.inAnnotation && isLiteralType(expr.value)) {
                    this.inAnnotation = false;
                    this.visit(expr.slice);
                    this.inAnnotation = true;
                } else {
                    this.visit(expr.slice);
                }
                break;
            case 'Slice':
                this.visitOptional(expr.lower);
                this.visitOptional(expr.upper);
                this.visitOptional(expr.step);
                break;
            case 'Tuple':
            case 'List':
            case 'Set':
                expr.elements.forEach(element => this.visit(element));
                break;
            case 'Dict':
                for (const entry of expr.entries) {
                    this.visitOptional(entry.key);
                    this.visit(entry.value);
                }
                break;
            case 'Starred':
            case 'Await':
                this.visit(expr.value);
                break;
            case 'Yield':
                this.visitOptional(expr.value);
                break;
            case 'UnaryOp':
                this.visit(expr.operand);
                break;
            case 'BinOp':
                this.visit(expr.left);
                this.visit(expr.right);
                break;
            case 'IfExp':
                this.visit(expr.test);
                this.visit(expr.body);
                this.visit(expr.orelse);
                break;
            case 'Lambda':
                for (const param of expr.params) {
                    this.visitOptional(param.defaultValue);
                }
                this.withScope(new Scope('function', this.scope), () => {
                    this.bindParameters(expr.params);
                    this.visit(expr.body);
                });
                break;
            case 'ListComp':
            case 'SetComp':
            case 'GeneratorExp':
            case 'DictComp':
                this.visitComprehension(expr);
                break;
            case 'NamedExpr':
                this.visit(expr.value);
                this.bindTarget(expr.target, this.walrusScope());
                break;
        }
    }

    private visitComprehension(expr: ComprehensionExpr): void {
        // The outermost iterable is evaluated in the enclosing scope.
        if (expr.generators.length > 0) {
            this.visit(expr.generators[0].iter);
        }
        this.withScope(new Scope('comprehension', this.scope), () => {
            expr.generators.forEach((generator, i) => {
                if (i > 0) {
                    this.visit(generator.iter);
                }
                this.bindTarget(generator.target);
                generator.ifs.forEach(condition => this.visit(condition));
            });
            this.visit(expr.element);
            this.visitOptional(expr.value);
        });
    }

    /** Walrus targets bind in the nearest scope that is not a comprehension. */
    private walrusScope(): Scope {
        let scope = this.scope;
        while (scope.kind === 'comprehension' && scope.parent) {
            scope = scope.parent;
        }
        return scope;
    }

    /**
     * Reads the names of a forward reference such as `"Node"` or
     * `"list[Item]"`.  Strings that are not expressions are ignored.
     */
    private visitStringAnnotation(text: string, span: Span): void {
        let parsed: Expression;
        try {
            parsed = parseExpression(text, span.start + 1);
        } catch (err) {
            if (err instanceof PythonSyntaxError) {
                return;
            }
            throw err;
        }
        this.visit(parsed);
    }

    private reference(name: string, span: Span): void {
        let deferred = false;
        for (let scope: Scope | undefined = this.scope; scope; scope = scope.parent) {
            deferred ||= scope.kind === 'function';
        }
        this.references.push({ name, span, scope: this.scope, position: this.position++, deferred });
    }

    private bind(name: string, kind: BindingKind, scope: Scope = this.scope): void {
        scope.bind(name, kind, this.position++);
    }

    private withScope(scope: Scope, walk: () => void): void {
        const outer = this.scope;
        this.scope = scope;
        walk();
        this.scope = outer;
    }
}

function isLiteralType(expr: Expression): boolean {
    if (expr.kind === 'Name') {
        return LITERAL_TYPES.has(expr.id);
    }
    return expr.kind === 'Attribute' && LITERAL_TYPES.has(expr.attr);
}
