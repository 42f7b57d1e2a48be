import type { Term, TermId } from '../types/term.js';
import { createResolutionError } from '../types/errors.js';

export interface ClosureContext {
    /** Protein being resolved, named in resolution errors */
    proteinId?: string;
}

/**
 * In-memory view of the molecular-function hierarchy.
 *
 * Each instance is one resolution session: terms added here are reused by
 * every closure computed against it, and nothing is shared between
 * instances. Nodes keep an explicit parent-identifier set since a term may
 * have several parents.
 */
export class TermGraph {
    private terms = new Map<TermId, Term>();
    private children = new Map<TermId, Set<TermId>>();
    private aliases = new Map<TermId, TermId>();

    constructor(terms: Iterable<Term> = []) {
        for (const term of terms) {
            this.addTerm(term);
        }
    }

    get size(): number {
        return this.terms.size;
    }

    /**
     * Add a term node. Re-adding an identical term is a no-op, so concurrent
     * loaders may race on the same identifier.
     */
    addTerm(term: Term): void {
        const existing = this.terms.get(term.id);
        if (existing) {
            if (!sameTerm(existing, term)) {
                throw createResolutionError(term.id, undefined, 'conflicting definitions in one session');
            }
            return;
        }
        this.terms.set(term.id, term);
        for (const parent of term.parents) {
            this.addChild(this.canonicalId(parent), term.id);
        }
    }

    /**
     * Record that `from` is an outdated identifier now served as `to`.
     */
    addAlias(from: TermId, to: TermId): void {
        if (from === to) return;
        this.aliases.set(from, to);

        // Edges recorded under the outdated identifier move to the current one.
        const moved = this.children.get(from);
        if (moved) {
            this.children.delete(from);
            for (const child of moved) {
                this.addChild(to, child);
            }
        }
    }

    canonicalId(id: TermId): TermId {
        return this.aliases.get(id) ?? id;
    }

    hasTerm(id: TermId): boolean {
        return this.terms.has(this.canonicalId(id));
    }

    getTerm(id: TermId): Term | undefined {
        return this.terms.get(this.canonicalId(id));
    }

    parentsOf(id: TermId): ReadonlySet<TermId> {
        return this.getTerm(id)?.parents ?? new Set();
    }

    childrenOf(id: TermId): ReadonlySet<TermId> {
        return this.children.get(this.canonicalId(id)) ?? new Set();
    }

    /**
     * Explicit terms plus every ancestor reachable through parent edges.
     * Each term is expanded at most once, however many paths lead to it.
     *
     * @throws AnnotationException RESOLUTION_ERROR when a term or one of its
     *   parents is not in the graph.
     */
    closure(explicit: Iterable<TermId>, context: ClosureContext = {}): Set<TermId> {
        return this.walk(explicit, (term) => term.parents, context);
    }

    /**
     * The given terms plus every term below them.
     */
    descendants(ids: Iterable<TermId>): Set<TermId> {
        return this.walk(ids, (term) => this.childrenOf(term.id), {});
    }

    /**
     * All terms of the session, in insertion order.
     */
    snapshot(): Term[] {
        return [...this.terms.values()];
    }

    private walk(
        start: Iterable<TermId>,
        next: (term: Term) => Iterable<TermId>,
        context: ClosureContext
    ): Set<TermId> {
        const visited = new Set<TermId>();
        const stack: TermId[] = [];
        for (const id of start) {
            stack.push(this.canonicalId(id));
        }

        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined || visited.has(id)) continue;

            const term = this.terms.get(id);
            if (!term) {
                throw createResolutionError(id, context.proteinId);
            }
            visited.add(id);

            for (const neighbour of next(term)) {
                const current = this.canonicalId(neighbour);
                if (!visited.has(current)) {
                    stack.push(current);
                }
            }
        }
        return visited;
    }

    private addChild(parent: TermId, child: TermId): void {
        let set = this.children.get(parent);
        if (!set) {
            set = new Set();
            this.children.set(parent, set);
        }
        set.add(child);
    }
}

function sameTerm(a: Term, b: Term): boolean {
    if (a.name !== b.name || a.parents.size !== b.parents.size) return false;
    for (const parent of a.parents) {
        if (!b.parents.has(parent)) return false;
    }
    return true;
}
