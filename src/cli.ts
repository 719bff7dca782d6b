#!/usr/bin/env node
import * as path from 'node:path';
import { formatIssue, isProblem } from './analysis/diagnostics';
import { disposeExportCache } from './analysis/export-cache';
import type { ConfigOverrides } from './config';
import { resolveConfig } from './config';
import { unifiedDiff } from './fixes/unified-diff';
import type { ConflictPolicy, RewriteResult } from './types';
import type { FileHost } from './utils/file-host';
import { nodeFileHost } from './utils/file-host';
import type { Formatter } from './utils/formatter';
import { createOutputChannel, disposeOutputChannel, log, logError } from './utils/logger';
import { applyResult, processFile, UnreadableFileError } from './unstar';

/** Exit status of a run. */
export const EXIT_CODE = {
    OK: 0,
    ISSUES: 1,
    FAILURE: 2,
} as const;

export type CliOptions = {
    help: boolean;
    target: string | null;
    overrides: ConfigOverrides;
};

/** Raised for malformed command lines. */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export function parseArgs(args: readonly string[]): CliOptions {
    let help = false;
    let target: string | null = null;
    const overrides: { -readonly [K in keyof ConfigOverrides]: ConfigOverrides[K] } = {};

    const valueOf = (flag: string, i: number): string => {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('-')) {
            throw new UsageError(`${flag} needs a value`);
        }
        return value;
    };

    for (let i = 0; i < args.length; i += 1) {
        const arg = args[i];
        switch (arg) {
            case '--help':
            case '-h':
                help = true;
                break;
            case '--module':
            case '-m':
                overrides.module = valueOf(arg, i);
                i += 1;
                break;
            case '--dry-run':
            case '-d':
                overrides.dryRun = true;
                break;
            case '--infer-imports':
            case '-i':
                overrides.inferExports = false;
                break;
            case '--no-format':
            case '-nf':
                overrides.format = false;
                break;
            case '--create-all':
            case '-ca':
                overrides.createAll = true;
                break;
            case '--line-length':
            case '-l': {
                const raw = valueOf(arg, i);
                const value = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
                if (!(value > 0)) {
                    throw new UsageError(`${arg} must be a positive integer, got '${raw}'`);
                }
                overrides.lineLength = value;
                i += 1;
                break;
            }
            case '--conflict-policy': {
                const raw = valueOf(arg, i);
                if (!isConflictPolicy(raw)) {
                    throw new UsageError(`${arg} must be 'first-declared' or 'last-declared', got '${raw}'`);
                }
                overrides.conflictPolicy = raw;
                i += 1;
                break;
            }
            default:
                if (arg.startsWith('-')) {
                    throw new UsageError(`Unknown option ${arg}`);
                }
                if (target !== null) {
                    throw new UsageError(`Unexpected argument ${arg}`);
                }
                target = arg;
                break;
        }
    }

    return { help, target, overrides };
}

function isConflictPolicy(value: string): value is ConflictPolicy {
    return value === 'first-declared' || value === 'last-declared';
}

export function usage(): string {
    return [
        'unstar',
        '',
        'Rewrites `from module import *` into explicit imports of the names a file uses.',
        '',
        'Usage:',
        '  unstar [options] <file-or-directory>',
        '',
        'Options:',
        '  -m, --module <name>       Only rewrite wildcard imports of this dotted module.',
        '  -d, --dry-run             Print a unified diff instead of writing files.',
        '  -i, --infer-imports       Do not infer exports; require modules to declare __all__.',
        '  -nf, --no-format          Do not run black on rewritten files.',
        '  -ca, --create-all         Write inferred export lists into their modules as __all__.',
        '  -l, --line-length <n>     Line length for wrapped imports (default: pyproject.toml, else 88).',
        '  --conflict-policy <p>     first-declared (default) or last-declared.',
        '  -h, --help                Show this message.',
        '',
    ].join('\n');
}

/**
 * Lists the `.py` files under `dir`, deepest directories first, skipping
 * directories named in `exclude`.
 */
export function collectPythonFiles(host: FileHost, dir: string, exclude: readonly string[]): string[] {
    const depth = (file: string): number => path.relative(dir, file).split(path.sep).length;
    return host
        .findFiles(dir, '**/*.py', exclude)
        .map(file => path.resolve(file))
        .sort((a, b) => depth(b) - depth(a) || (a < b ? -1 : a > b ? 1 : 0));
}

export interface CliEnvironment {
    readonly host: FileHost;
    /** Receives diffs, issues and the summary. */
    readonly write: (text: string) => void;
    readonly formatter?: Formatter;
}

/**
 * Runs unstar with command-line `args`.
 *
 * @returns the exit code
 */
export function run(args: readonly string[], env: CliEnvironment): number {
    let options: CliOptions;
    try {
        options = parseArgs(args);
    } catch (err) {
        if (err instanceof UsageError) {
            env.write(`${err.message}\n\n${usage()}`);
            return EXIT_CODE.FAILURE;
        }
        throw err;
    }
    if (options.help) {
        env.write(usage());
        return EXIT_CODE.OK;
    }
    if (options.target === null) {
        env.write(usage());
        return EXIT_CODE.FAILURE;
    }

    const { host } = env;
    const target = path.resolve(options.target);
    const isDirectory = host.directoryExists(target);
    if (!isDirectory && !host.fileExists(target)) {
        logError(`${options.target} does not exist`);
        env.write(`Error: ${options.target} does not exist\n`);
        return EXIT_CODE.FAILURE;
    }

    const config = resolveConfig(host, target, options.overrides);
    const files = isDirectory ? collectPythonFiles(host, target, config.exclude) : [target];
    log(`Processing ${files.length} file(s) under ${target}`);

    const display = (file: string): string => {
        const relative = path.relative(process.cwd(), file);
        return relative && !relative.startsWith('..') && !path.isAbsolute(relative) ? relative : file;
    };
    const written = new Set<string>();
    let exitCode: number = EXIT_CODE.OK;
    let rewritten = 0;
    let issueCount = 0;

    for (const file of files) {
        let result: RewriteResult;
        try {
            result = processFile(file, config, { host, formatter: env.formatter });
        } catch (err) {
            if (!(err instanceof UnreadableFileError)) {
                throw err;
            }
            logError(err.message);
            exitCode = EXIT_CODE.FAILURE;
            continue;
        }

        for (const issue of result.issues) {
            env.write(`${formatIssue(display(file), issue)}\n`);
        }
        issueCount += result.issues.length;
        if (result.issues.some(issue => issue.code === 'parse-failure')) {
            exitCode = EXIT_CODE.FAILURE;
        } else if (result.issues.some(isProblem) && exitCode === EXIT_CODE.OK) {
            exitCode = EXIT_CODE.ISSUES;
        }
        if (result.changed) {
            rewritten += 1;
        }

        if (config.dryRun) {
            env.write(unifiedDiff(result.originalText, result.text, display(file)));
            for (const write of result.exportWrites) {
                if (!written.has(write.path)) {
                    written.add(write.path);
                    env.write(unifiedDiff(write.originalText, write.text, display(write.path)));
                }
            }
        } else {
            applyResult(result, host, written);
        }
    }

    const verb = config.dryRun ? 'would be rewritten' : 'rewritten';
    env.write(`${rewritten} of ${files.length} file(s) ${verb}; ${issueCount} issue(s)\n`);
    return exitCode;
}

function main(): void {
    createOutputChannel();
    try {
        process.exitCode = run(process.argv.slice(2), {
            host: nodeFileHost,
            write: text => process.stdout.write(text),
        });
    } finally {
        disposeExportCache();
        disposeOutputChannel();
    }
}

if (require.main === module) {
    main();
}
