import moduleSymbols from '../data/module-symbols.json';

/**
 * Known exported symbols for common Python stdlib modules.
 *
 * Used when a wildcard-imported module has no source file in the
 * search roots.  Only includes commonly wildcarded modules; add more to
 * `src/data/module-symbols.json` as needed.
 */
const MODULE_SYMBOLS: Readonly<Record<string, readonly string[]>> = moduleSymbols;

/**
 * Gets the known exported symbols for a module.
 *
 * @param moduleName The full module name (e.g., 'os.path')
 * @returns Array of known symbols, or empty array if module not known
 */
export function getModuleSymbols(moduleName: string): readonly string[] {
    return hasModuleSymbols(moduleName) ? MODULE_SYMBOLS[moduleName] : [];
}

/**
 * Checks if a module has known symbol mappings.
 */
export function hasModuleSymbols(moduleName: string): boolean {
    return Object.hasOwn(MODULE_SYMBOLS, moduleName);
}
