import fg from 'fast-glob';
import * as fs from 'node:fs';

/**
 * Synchronous file-system access used by the rewriting core.  The CLI
 * passes {@link nodeFileHost}; tests pass an in-memory host.
 */
export interface FileHost {
    /** Returns the file's text, or `undefined` when it does not exist. */
    readFile(path: string): string | undefined;
    writeFile(path: string, text: string): void;
    fileExists(path: string): boolean;
    directoryExists(path: string): boolean;
    /**
     * Returns the absolute paths of the files below `dir` matching the
     * glob `pattern`, skipping directories named in `exclude`.
     */
    findFiles(dir: string, pattern: string, exclude: readonly string[]): string[];
    /** A number that changes whenever the file does (its mtime). */
    getVersion(path: string): number;
}

function isMissing(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function statOrUndefined(path: string): fs.Stats | undefined {
    return fs.statSync(path, { throwIfNoEntry: false });
}

export const nodeFileHost: FileHost = {
    readFile(path) {
        try {
            return fs.readFileSync(path, 'utf-8');
        } catch (err) {
            if (isMissing(err)) {
                return undefined;
            }
            throw err;
        }
    },

    writeFile(path, text) {
        fs.writeFileSync(path, text, 'utf-8');
    },

    fileExists(path) {
        return statOrUndefined(path)?.isFile() ?? false;
    },

    directoryExists(path) {
        return statOrUndefined(path)?.isDirectory() ?? false;
    },

    findFiles(dir, pattern, exclude) {
        return fg.sync(pattern, {
            cwd: dir,
            dot: true,
            ignore: exclude.map(name => `**/${name}/**`),
            onlyFiles: true,
            absolute: true,
        });
    },

    getVersion(path) {
        return statOrUndefined(path)?.mtimeMs ?? 0;
    },
};
