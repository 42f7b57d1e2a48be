import type { TermId } from './term.js';

/** Minimal logging surface; `console` satisfies it */
export type Logger = Pick<Console, 'warn'>;

export interface ResolveOptions {
    /**
     * Only keep implied terms from this set ("selected function" queries).
     */
    restrictTo?: ReadonlySet<TermId>;
}

export interface OutputOptions {
    /** Display-name overrides; never affect identifiers or matching */
    alternativeNames?: Record<TermId, string>;
    /** Strip the trailing " activity" from display names (default: true) */
    simplifyName?: boolean;
    /** Keep the "molecular_function" root term in full annotations (default: false) */
    includeRoot?: boolean;
    /** Label used for proteins without any resulting function */
    unmatchedLabel?: string;
}

export interface BatchOptions {
    /** Number of proteins fetched at once (default: 4) */
    concurrency?: number;
    /**
     * Callback for progress updates.
     * @param done Number of proteins processed so far.
     * @param total Number of proteins in the batch.
     */
    onProgress?: (done: number, total: number) => void;
}

export interface ServiceOptions extends OutputOptions, BatchOptions {
    logger?: Logger;
}

export const DEFAULTS = {
    baseUrl: 'https://www.ebi.ac.uk/QuickGO/services',
    rootTermId: 'GO:0003674',
    aspect: 'molecular_function',
    qualifier: 'enables',
    pageSize: 100,
    timeoutMs: 30_000,
    concurrency: 4,
    outFile: 'go_function_annotation.tsv',
    delimiter: '\t',
    unmatchedLabel: 'no_function',
    errorLabel: 'error',
    nameSuffix: ' activity',
    cacheFile: 'terms.json',
} as const;
