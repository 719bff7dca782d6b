import { spawnSync } from 'node:child_process';

/**
 * Raised when the formatter cannot be run or rejects its input.
 */
export class FormatterError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FormatterError';
    }
}

/**
 * Reformats rewritten Python source.
 */
export interface Formatter {
    readonly name: string;
    /**
     * Returns the formatted text.
     *
     * @throws {FormatterError} when formatting fails
     */
    format(text: string, path: string, lineLength: number): string;
}

/**
 * Runs `black -q -` on the text, reading from stdin.
 */
export function createBlackFormatter(command = 'black'): Formatter {
    return {
        name: command,
        format(text, path, lineLength) {
            const result = spawnSync(
                command,
                ['-q', '--line-length', String(lineLength), '--stdin-filename', path, '-'],
                { input: text, encoding: 'utf-8' },
            );
            if (result.error) {
                throw new FormatterError(`${command} not available: ${result.error.message}`);
            }
            if ((result.status ?? 1) !== 0) {
                const detail = result.stderr.trim();
                throw new FormatterError(`${command} exited with status ${result.status ?? 'unknown'}${detail ? `: ${detail}` : ''}`);
            }
            return result.stdout;
        },
    };
}
