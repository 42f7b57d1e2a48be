import type { Term } from '../types/term.js';
import { DEFAULTS } from '../types/options.js';

/**
 * Strip the literal " activity" suffix most molecular-function names carry:
 * "protein kinase activity" becomes "protein kinase".
 */
export function simplifyName(name: string, suffix: string = DEFAULTS.nameSuffix): string {
    return name.endsWith(suffix) && name.length > suffix.length
        ? name.slice(0, -suffix.length)
        : name;
}

/**
 * Name shown for a term in output rows. Overrides win over simplification.
 */
export function displayName(
    term: Term,
    options: { alternativeNames?: Record<string, string>; simplifyName?: boolean } = {}
): string {
    const alternative = options.alternativeNames?.[term.id];
    if (alternative !== undefined) {
        return alternative;
    }
    return options.simplifyName ?? true ? simplifyName(term.name) : term.name;
}
