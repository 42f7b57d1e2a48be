import type { Term, TermId } from '../types/term.js';
import type { AnnotationSource } from '../types/source.js';
import type { Logger } from '../types/options.js';
import { createResolutionError, isAnnotationError } from '../types/errors.js';
import { TermGraph } from './termGraph.js';

export interface LoadContext {
    proteinId?: string;
}

/**
 * Fills a TermGraph from an annotation source, walking parent edges
 * upward until every ancestor of the requested terms is present.
 *
 * Fetches are memoized per identifier, so overlapping loads issued
 * concurrently share one request per term.
 */
export class HierarchyLoader {
    private pending = new Map<TermId, Promise<Term>>();
    private readonly logger: Logger;

    constructor(
        readonly graph: TermGraph,
        private readonly source: AnnotationSource,
        logger?: Logger
    ) {
        this.logger = logger ?? console;
    }

    /**
     * Load the given terms and all their ancestors.
     * Returns the current identifier of every requested term (identical
     * unless the ontology has replaced it).
     */
    async load(ids: Iterable<TermId>, context: LoadContext = {}): Promise<Map<TermId, TermId>> {
        const requested = [...new Set(ids)];
        const resolved = new Map<TermId, TermId>();
        const fetched: Term[] = [];
        const visited = new Set<TermId>();

        let frontier = requested;
        let depth = 0;
        while (frontier.length > 0) {
            const terms = await Promise.all(
                frontier.map((id) => this.fetch(id, context.proteinId))
            );

            const next: TermId[] = [];
            frontier.forEach((id, i) => {
                const term = terms[i];
                if (term.id !== id && !this.graph.hasTerm(id)) {
                    this.logger.warn(`${id} is updated to ${term.id}`);
                }
                this.graph.addAlias(id, term.id);
                if (depth === 0) resolved.set(id, term.id);
                if (visited.has(term.id)) return;
                visited.add(term.id);
                fetched.push(term);
                for (const parent of term.parents) {
                    if (!visited.has(parent) && !this.graph.hasTerm(parent)) {
                        next.push(parent);
                    }
                }
            });
            frontier = [...new Set(next)];
            depth++;
        }

        // Added only once the whole upward subgraph is known, so a closure
        // never sees a term whose parents are still in flight.
        for (const term of fetched) {
            this.graph.addTerm(term);
        }
        return resolved;
    }

    private fetch(id: TermId, proteinId?: string): Promise<Term> {
        const known = this.graph.getTerm(id);
        if (known && this.isComplete(known)) {
            return Promise.resolve(known);
        }

        let request = this.pending.get(id);
        if (!request) {
            request = this.source.fetchTerm(id).then(
                (term) => {
                    this.pending.delete(id);
                    return term;
                },
                (e: unknown) => {
                    this.pending.delete(id);
                    throw e;
                }
            );
            this.pending.set(id, request);
        }
        return request.catch((e: unknown) => {
            if (isAnnotationError(e, 'NOT_FOUND')) {
                throw createResolutionError(id, proteinId, e.message);
            }
            throw e;
        });
    }

    private isComplete(term: Term): boolean {
        for (const parent of term.parents) {
            if (!this.graph.hasTerm(parent)) return false;
        }
        return true;
    }
}
