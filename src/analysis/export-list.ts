import type { Expression, Module, Span, Statement } from '../parsing/python-ast';
import type { ExportListWrite, ExportSet } from '../types';
import { compareNames, detectLineBreak, lineEndAfter } from '../utils/text-utils';

export interface ExportEntry {
    readonly name: string;
    /** Where the string literal naming the export appears. */
    readonly span: Span;
}

/**
 * A module's `__all__` as read from its top-level statements: either a
 * list of string literals, or `dynamic` when any statement building it
 * is not a literal.
 */
export type DeclaredExports =
    | { readonly kind: 'literal'; readonly entries: readonly ExportEntry[] }
    | { readonly kind: 'dynamic'; readonly span: Span };

/**
 * Reads `__all__` from the top-level statements of a module.
 *
 * Understands `__all__ = [...]` (lists, tuples and their `+`
 * concatenation), `__all__ += [...]`, `__all__.extend([...])`,
 * `__all__.append("x")` and `__all__.remove("x")`.  Returns `undefined`
 * when the module never mentions `__all__` at top level.
 */
export function readDeclaredExports(tree: Module): DeclaredExports | undefined {
    let entries: ExportEntry[] | undefined;

    for (const stmt of tree.body) {
        const update = exportListUpdate(stmt);
        if (!update) {
            continue;
        }
        if (update.entries === undefined) {
            return { kind: 'dynamic', span: stmt.span };
        }
        switch (update.op) {
            case 'set':
                entries = [...update.entries];
                break;
            case 'add':
                entries = [...(entries ?? []), ...update.entries];
                break;
            case 'remove': {
                const removed = new Set(update.entries.map(entry => entry.name));
                entries = (entries ?? []).filter(entry => !removed.has(entry.name));
                break;
            }
        }
    }

    if (entries === undefined) {
        return undefined;
    }

    const seen = new Set<string>();
    const unique = entries.filter(entry => {
        if (seen.has(entry.name)) {
            return false;
        }
        seen.add(entry.name);
        return true;
    });
    return { kind: 'literal', entries: unique };
}

interface ExportListUpdate {
    readonly op: 'set' | 'add' | 'remove';
    /** `undefined` when the statement's value is not a literal. */
    readonly entries: readonly ExportEntry[] | undefined;
}

function exportListUpdate(stmt: Statement): ExportListUpdate | undefined {
    switch (stmt.kind) {
        case 'Assign':
            return stmt.targets.some(isAllName) ? { op: 'set', entries: stringSequence(stmt.value) } : undefined;
        case 'AnnAssign':
            return isAllName(stmt.target) && stmt.value ? { op: 'set', entries: stringSequence(stmt.value) } : undefined;
        case 'AugAssign':
            if (!isAllName(stmt.target)) {
                return undefined;
            }
            return { op: 'add', entries: stmt.op === '+=' ? stringSequence(stmt.value) : undefined };
        case 'Expr': {
            const call = stmt.value;
            if (call.kind !== 'Call' || call.func.kind !== 'Attribute' || !isAllName(call.func.value)) {
                return undefined;
            }
            const single = call.args.length === 1 && call.keywords.length === 0 ? call.args[0] : undefined;
            switch (call.func.attr) {
                case 'extend':
                    return { op: 'add', entries: single && stringSequence(single) };
                case 'append':
                    return { op: 'add', entries: single && stringEntry(single) };
                case 'remove':
                    return { op: 'remove', entries: single && stringEntry(single) };
                default:
                    return { op: 'add', entries: undefined };
            }
        }
        default:
            return undefined;
    }
}

function isAllName(expr: Expression): boolean {
    return expr.kind === 'Name' && expr.id === '__all__';
}

function stringEntry(expr: Expression): ExportEntry[] | undefined {
    return expr.kind === 'Constant' && expr.literal === 'string' ? [{ name: expr.value, span: expr.span }] : undefined;
}

function stringSequence(expr: Expression): ExportEntry[] | undefined {
    if (expr.kind === 'List' || expr.kind === 'Tuple') {
        const entries: ExportEntry[] = [];
        for (const element of expr.elements) {
            const entry = stringEntry(element);
            if (!entry) {
                return undefined;
            }
            entries.push(...entry);
        }
        return entries;
    }
    if (expr.kind === 'BinOp' && expr.op === '+') {
        const left = stringSequence(expr.left);
        const right = stringSequence(expr.right);
        return left && right ? [...left, ...right] : undefined;
    }
    return undefined;
}

/**
 * Formats an `__all__` assignment, one name per line when the single-line
 * form exceeds `lineLength`.
 */
export function formatExportList(names: readonly string[], lineLength: number, lineBreak = '\n'): string {
    const quoted = [...names].sort(compareNames).map(name => `"${name}"`);
    const singleLine = `__all__ = [${quoted.join(', ')}]`;
    if (lineLength <= 0 || singleLine.length <= lineLength) {
        return singleLine;
    }
    const wrapped = quoted.map(name => `    ${name},`).join(lineBreak);
    return `__all__ = [${lineBreak}${wrapped}${lineBreak}]`;
}

/**
 * Builds the request that materializes an inferred export set as
 * `__all__` in its module, placed after the module docstring and the
 * leading imports.  Returns `undefined` for sets that cannot be written:
 * declared or built-in ones, incomplete ones, and empty ones.
 */
export function createExportListWrite(
    set: ExportSet,
    tree: Module,
    originalText: string,
    lineLength: number,
): ExportListWrite | undefined {
    if (set.provenance !== 'inferred' || set.source !== 'module-file' || set.path === undefined) {
        return undefined;
    }
    if (!set.complete || set.names.size === 0) {
        return undefined;
    }

    const names = [...set.names].sort(compareNames);
    const lineBreak = detectLineBreak(originalText);
    const statement = formatExportList(names, lineLength, lineBreak);

    let anchor: Statement | undefined;
    for (const [i, stmt] of tree.body.entries()) {
        const isDocstring = i === 0 && stmt.kind === 'Expr' && stmt.value.kind === 'Constant' && stmt.value.literal === 'string';
        if (!isDocstring && stmt.kind !== 'Import' && stmt.kind !== 'ImportFrom') {
            break;
        }
        anchor = stmt;
    }

    let text: string;
    if (!anchor) {
        text = `${statement}${lineBreak}${lineBreak}${originalText}`;
    } else {
        const insertAt = lineEndAfter(originalText, anchor.span.end);
        const head = originalText.slice(0, insertAt);
        const separator = /[\r\n]$/.test(head) ? '' : lineBreak;
        text = `${head}${separator}${lineBreak}${statement}${lineBreak}${originalText.slice(insertAt)}`;
    }

    return { path: set.path, originalText, text, names };
}
