/** Destination of log lines. */
export interface OutputChannel {
    readonly name: string;
    appendLine(line: string): void;
}

/** Shared output channel for unstar; `undefined` keeps library use silent. */
let outputChannel: OutputChannel | undefined;

/**
 * Creates the output channel.  The CLI calls this once at start-up;
 * lines go to `write` (stderr by default).
 */
export function createOutputChannel(write: (text: string) => void = text => process.stderr.write(text)): OutputChannel {
    outputChannel = {
        name: 'Unstar',
        appendLine: line => write(`${line}\n`),
    };
    return outputChannel;
}

/**
 * Removes the output channel; later log calls are dropped.
 */
export function disposeOutputChannel(): void {
    outputChannel = undefined;
}

/**
 * Writes a progress line, such as the wildcard count of a file or the
 * size of an inferred export set.  Only the CLI opens a channel, so
 * library callers of `processFile` see nothing.
 */
export function log(message: string): void {
    outputChannel?.appendLine(`[${timestamp()}] ${message}`);
}

/** Like {@link log}, marked `⚠`: an ignored `pyproject.toml` setting or a skipped `__all__` write. */
export function logWarn(message: string): void {
    outputChannel?.appendLine(`[${timestamp()}] ⚠ ${message}`);
}

/** Like {@link log}, marked `✖`: a missing target or a file the CLI could not read. */
export function logError(message: string): void {
    outputChannel?.appendLine(`[${timestamp()}] ✖ ${message}`);
}

/** Local wall-clock time as `HH:MM:SS.mmm`. */
function timestamp(): string {
    const now = new Date();
    const h = String(now.getHours()).padStart(2, '0');
    const m = String(now.getMinutes()).padStart(2, '0');
    const s = String(now.getSeconds()).padStart(2, '0');
    const ms = String(now.getMilliseconds()).padStart(3, '0');
    return `${h}:${m}:${s}.${ms}`;
}
