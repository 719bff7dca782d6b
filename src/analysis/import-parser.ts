import type { Span, Statement } from '../parsing/python-ast';
import { childBlocks } from '../parsing/python-ast';
import type { ImportStatement, SourceFile, WildcardImport } from '../types';

/**
 * Extracts every import statement of a file, in source order, including
 * imports nested in `if` / `try` blocks and in function or class bodies.
 */
export function parseImports(file: SourceFile): ImportStatement[] {
    const imports: ImportStatement[] = [];
    collect(file, file.tree.body, 'module', false, imports);
    return imports;
}

/**
 * Returns the wildcard imports executing in module scope, the ones that
 * bind names where the rest of the module can see them.
 */
export function parseWildcardImports(file: SourceFile): WildcardImport[] {
    return parseImports(file).filter(isWildcardImport);
}

export function isWildcardImport(imp: ImportStatement): imp is WildcardImport {
    return imp.type === 'from' && imp.wildcard && imp.scope === 'module';
}

function collect(
    file: SourceFile,
    block: readonly Statement[],
    scope: 'module' | 'local',
    nested: boolean,
    out: ImportStatement[],
): void {
    const blockStatements: readonly Span[] = nested ? block.map(stmt => stmt.span) : [];

    for (const stmt of block) {
        if (stmt.kind === 'Import' || stmt.kind === 'ImportFrom') {
            out.push(toImportStatement(file, stmt, scope, blockStatements));
            continue;
        }

        const innerScope = stmt.kind === 'FunctionDef' || stmt.kind === 'ClassDef' ? 'local' : scope;
        for (const child of childBlocks(stmt)) {
            collect(file, child, innerScope, true, out);
        }
    }
}

function toImportStatement(
    file: SourceFile,
    stmt: Extract<Statement, { kind: 'Import' | 'ImportFrom' }>,
    scope: 'module' | 'local',
    blockStatements: readonly Span[],
): ImportStatement {
    const { document } = file;
    const start = document.positionAt(stmt.span.start);
    const end = document.positionAt(stmt.span.end);

    const names: string[] = [];
    const aliases = new Map<string, string>();
    for (const alias of stmt.names) {
        names.push(alias.name);
        if (alias.asname !== undefined) {
            aliases.set(alias.name, alias.asname);
        }
    }

    const common = {
        names,
        aliases,
        line: start.line,
        endLine: end.line,
        span: stmt.span,
        range: { start, end },
        text: file.text.slice(stmt.span.start, stmt.span.end),
        scope,
        blockStatements,
    };

    if (stmt.kind === 'Import') {
        return { ...common, type: 'import', module: names[0], level: 0, wildcard: false };
    }

    return {
        ...common,
        type: 'from',
        module: '.'.repeat(stmt.level) + stmt.module,
        level: stmt.level,
        wildcard: names.length === 1 && names[0] === '*',
    };
}
