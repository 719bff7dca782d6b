import pythonBuiltins from '../data/python-builtins.json';

const BUILTIN_NAMES: ReadonlySet<string> = new Set([...pythonBuiltins.builtins, ...pythonBuiltins.moduleGlobals]);

/**
 * Returns `true` for names every module can read without binding them:
 * the `builtins` module and the implicit module globals (`__name__`,
 * `__file__`, …).
 */
export function isBuiltinName(name: string): boolean {
    return BUILTIN_NAMES.has(name);
}
