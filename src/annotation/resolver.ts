import type { Term, TermId, ProteinAnnotationSet } from '../types/term.js';
import { isTermId } from '../types/term.js';
import type { AnnotationSource } from '../types/source.js';
import type { BatchOptions, Logger, ResolveOptions } from '../types/options.js';
import type { ProteinOutcome } from '../types/responses.js';
import type { AnnotationErrorCode } from '../types/errors.js';
import {
    createInvalidInputError,
    createInvalidTermIdError,
    createResolutionError,
    isAnnotationError,
} from '../types/errors.js';
import { TermGraph } from '../ontology/termGraph.js';
import { HierarchyLoader } from '../ontology/loader.js';
import { mapInChunks } from '../utils/batch.js';

/** Errors that concern a single protein; anything else stops a batch */
export const PER_PROTEIN_ERRORS: readonly AnnotationErrorCode[] = [
    'NOT_FOUND',
    'RESOLUTION_ERROR',
    'OBSOLETE_TERM',
    'WRONG_ASPECT',
    'INVALID_INPUT',
];

export interface ResolverOptions {
    graph?: TermGraph;
    logger?: Logger;
}

/**
 * Turns a UniProt accession into its complete molecular-function
 * annotation: the explicit terms and every ancestor they imply.
 */
export class AnnotationResolver {
    readonly graph: TermGraph;
    private readonly loader: HierarchyLoader;

    constructor(private readonly source: AnnotationSource, options: ResolverOptions = {}) {
        this.graph = options.graph ?? new TermGraph();
        this.loader = new HierarchyLoader(this.graph, source, options.logger);
    }

    /**
     * Terms directly asserted for the protein, keyed by current identifier.
     *
     * @throws AnnotationException NOT_FOUND for an unknown protein; an
     *   annotated protein without molecular functions yields an empty map.
     */
    async resolveExplicit(proteinId: string): Promise<Map<TermId, Term>> {
        const id = proteinId.trim();
        if (!id) {
            throw createInvalidInputError('Protein accession must not be empty');
        }

        const explicit = await this.source.fetchExplicitTerms(id);
        const current = await this.loader.load(explicit.map((t) => t.id), { proteinId: id });

        const result = new Map<TermId, Term>();
        for (const { id: termId } of explicit) {
            const currentId = current.get(termId) ?? termId;
            const term = this.graph.getTerm(currentId);
            if (!term) {
                throw createResolutionError(currentId, id);
            }
            result.set(term.id, term);
        }
        return result;
    }

    /**
     * Explicit terms plus all implied ancestors. With `restrictTo`, only
     * implied terms from that set are kept; absent ones are not an error.
     */
    async resolveAll(proteinId: string, options: ResolveOptions = {}): Promise<Map<TermId, Term>> {
        const explicit = await this.resolveExplicit(proteinId);
        return this.expand(proteinId.trim(), explicit.keys(), options.restrictTo);
    }

    async resolveAnnotationSet(proteinId: string): Promise<ProteinAnnotationSet> {
        return {
            proteinId: proteinId.trim(),
            terms: await this.resolveAll(proteinId),
        };
    }

    /**
     * resolveAll() for each protein independently, in input order.
     * Per-protein failures become error outcomes; an unreachable source
     * rejects the whole batch.
     */
    async resolveMany(
        proteinIds: readonly string[],
        options: ResolveOptions & BatchOptions = {}
    ): Promise<ProteinOutcome<Map<TermId, Term>>[]> {
        return mapInChunks(
            proteinIds,
            async (proteinId): Promise<ProteinOutcome<Map<TermId, Term>>> => {
                try {
                    const value = await this.resolveAll(proteinId, options);
                    return { proteinId, ok: true, value };
                } catch (e) {
                    if (isAnnotationError(e, ...PER_PROTEIN_ERRORS)) {
                        return { proteinId, ok: false, error: e.code, message: e.message };
                    }
                    throw e;
                }
            },
            options
        );
    }

    /**
     * A single term, with its ancestors loaded into the graph.
     */
    async resolveTerm(termId: TermId): Promise<Term> {
        if (!isTermId(termId)) {
            throw createInvalidTermIdError(termId);
        }
        const current = await this.loader.load([termId]);
        const term = this.graph.getTerm(current.get(termId) ?? termId);
        if (!term) {
            throw createResolutionError(termId);
        }
        return term;
    }

    /**
     * Load terms (and their ancestors) without resolving any protein,
     * e.g. the terms a rule set refers to.
     */
    async loadTerms(termIds: Iterable<TermId>): Promise<void> {
        await this.loader.load(termIds);
    }

    /**
     * Closure over terms already in the graph. Synchronous: nothing is fetched.
     */
    expand(
        proteinId: string,
        explicitIds: Iterable<TermId>,
        restrictTo?: ReadonlySet<TermId>
    ): Map<TermId, Term> {
        const closed = this.graph.closure(explicitIds, { proteinId });
        const result = new Map<TermId, Term>();
        for (const id of closed) {
            if (restrictTo && !restrictTo.has(id)) continue;
            const term = this.graph.getTerm(id);
            if (!term) {
                throw createResolutionError(id, proteinId);
            }
            result.set(id, term);
        }
        return result;
    }
}
