/**
 * Unified diffs of rewritten files, as printed by `--dry-run`.
 */

type OpcodeTag = 'equal' | 'replace' | 'delete' | 'insert';

interface Opcode {
    readonly tag: OpcodeTag;
    readonly i1: number;
    readonly i2: number;
    readonly j1: number;
    readonly j2: number;
}

/** Lines of unchanged context around each hunk. */
const CONTEXT_LINES = 3;

/**
 * Splits text into lines, each keeping its line break.
 */
export function splitLines(text: string): string[] {
    return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Returns a unified diff from `before` to `after`, labelled with
 * `fromLabel` and `toLabel`, or an empty string when the texts are equal.
 */
export function unifiedDiff(before: string, after: string, fromLabel: string, toLabel: string = fromLabel): string {
    if (before === after) {
        return '';
    }

    const a = splitLines(before);
    const b = splitLines(after);
    const out: string[] = [`--- ${fromLabel}\n`, `+++ ${toLabel}\n`];

    for (const group of groupOpcodes(computeOpcodes(a, b))) {
        const first = group[0];
        const last = group[group.length - 1];
        out.push(`@@ -${formatRange(first.i1, last.i2)} +${formatRange(first.j1, last.j2)} @@\n`);
        for (const { tag, i1, i2, j1, j2 } of group) {
            if (tag === 'equal') {
                a.slice(i1, i2).forEach(line => out.push(diffLine(' ', line)));
                continue;
            }
            if (tag === 'replace' || tag === 'delete') {
                a.slice(i1, i2).forEach(line => out.push(diffLine('-', line)));
            }
            if (tag === 'replace' || tag === 'insert') {
                b.slice(j1, j2).forEach(line => out.push(diffLine('+', line)));
            }
        }
    }

    return out.join('');
}

function diffLine(marker: string, line: string): string {
    return /[\r\n]$/.test(line) ? `${marker}${line}` : `${marker}${line}\n\\ No newline at end of file\n`;
}

function formatRange(start: number, stop: number): string {
    const length = stop - start;
    if (length === 1) {
        return String(start + 1);
    }
    // An empty range names the line before it.
    return `${length === 0 ? start : start + 1},${length}`;
}

/**
 * Computes the edit opcodes turning `a` into `b`.  The common prefix and
 * suffix are matched directly; the lines between them are aligned by
 * longest common subsequence.
 */
function computeOpcodes(a: readonly string[], b: readonly string[]): Opcode[] {
    let prefix = 0;
    while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) {
        prefix++;
    }
    let suffix = 0;
    while (
        suffix < a.length - prefix &&
        suffix < b.length - prefix &&
        a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
    ) {
        suffix++;
    }

    const aEnd = a.length - suffix;
    const bEnd = b.length - suffix;
    const matches = longestCommonSubsequence(a.slice(prefix, aEnd), b.slice(prefix, bEnd)).map(
        ([i, j]): [number, number] => [i + prefix, j + prefix],
    );

    const opcodes: Opcode[] = [];
    const push = (tag: OpcodeTag, i1: number, i2: number, j1: number, j2: number): void => {
        if (i1 === i2 && j1 === j2) {
            return;
        }
        const previous = opcodes[opcodes.length - 1];
        if (tag === 'equal' && previous?.tag === 'equal') {
            opcodes[opcodes.length - 1] = { ...previous, i2, j2 };
            return;
        }
        opcodes.push({ tag, i1, i2, j1, j2 });
    };

    push('equal', 0, prefix, 0, prefix);
    let i = prefix;
    let j = prefix;
    for (const [mi, mj] of [...matches, [aEnd, bEnd]]) {
        if (i < mi && j < mj) {
            push('replace', i, mi, j, mj);
        } else if (i < mi) {
            push('delete', i, mi, j, j);
        } else if (j < mj) {
            push('insert', i, i, j, mj);
        }
        if (mi < aEnd) {
            push('equal', mi, mi + 1, mj, mj + 1);
        }
        i = mi + 1;
        j = mj + 1;
    }
    push('equal', aEnd, a.length, bEnd, b.length);
    return opcodes;
}

/** Index pairs of a longest common subsequence of `a` and `b`, in order. */
function longestCommonSubsequence(a: readonly string[], b: readonly string[]): Array<[number, number]> {
    const lengths: number[][] = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));
    for (let i = a.length - 1; i >= 0; i--) {
        for (let j = b.length - 1; j >= 0; j--) {
            lengths[i][j] = a[i] === b[j] ? lengths[i + 1][j + 1] + 1 : Math.max(lengths[i + 1][j], lengths[i][j + 1]);
        }
    }

    const pairs: Array<[number, number]> = [];
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
        if (a[i] === b[j]) {
            pairs.push([i, j]);
            i++;
            j++;
        } else if (lengths[i + 1][j] >= lengths[i][j + 1]) {
            i++;
        } else {
            j++;
        }
    }
    return pairs;
}

/**
 * Splits opcodes into hunks with at most {@link CONTEXT_LINES} lines of
 * context on either side.
 */
function groupOpcodes(opcodes: readonly Opcode[]): Opcode[][] {
    const codes = [...opcodes];
    const n = CONTEXT_LINES;
    const first = codes[0];
    if (first?.tag === 'equal') {
        codes[0] = { ...first, i1: Math.max(first.i1, first.i2 - n), j1: Math.max(first.j1, first.j2 - n) };
    }
    const last = codes[codes.length - 1];
    if (last?.tag === 'equal') {
        codes[codes.length - 1] = { ...last, i2: Math.min(last.i2, last.i1 + n), j2: Math.min(last.j2, last.j1 + n) };
    }

    const groups: Opcode[][] = [];
    let group: Opcode[] = [];
    for (const code of codes) {
        let { i1, j1 } = code;
        if (code.tag === 'equal' && code.i2 - code.i1 > 2 * n) {
            group.push({ ...code, i2: Math.min(code.i2, i1 + n), j2: Math.min(code.j2, j1 + n) });
            groups.push(group);
            group = [];
            i1 = Math.max(i1, code.i2 - n);
            j1 = Math.max(j1, code.j2 - n);
        }
        group.push({ ...code, i1, j1 });
    }
    if (group.length > 0 && !(group.length === 1 && group[0].tag === 'equal')) {
        groups.push(group);
    }
    return groups.filter(g => g.some(code => code.tag !== 'equal'));
}
