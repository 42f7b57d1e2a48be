/**
 * GO term types
 */

/** Stable GO identifier, e.g. "GO:0016301" */
export type TermId = string;

const TERM_ID_PATTERN = /^GO:\d{7}$/;

export function isTermId(value: string): value is TermId {
    return TERM_ID_PATTERN.test(value);
}

/**
 * A node of the molecular-function hierarchy.
 * Parents are identifiers only; the hierarchy is a DAG, not a tree.
 */
export interface Term {
    readonly id: TermId;
    readonly name: string;
    readonly parents: ReadonlySet<TermId>;
    readonly aspect?: string;
    readonly definition?: string;
}

/** A term as directly asserted for a protein by the annotation source */
export interface ExplicitTerm {
    id: TermId;
    name: string;
}

/**
 * The complete implied annotation of one protein:
 * explicit terms plus all transitive ancestors.
 */
export interface ProteinAnnotationSet {
    proteinId: string;
    terms: ReadonlyMap<TermId, Term>;
}

/** JSON-friendly form of a Term, used by the term store and responses */
export interface SerializedTerm {
    id: TermId;
    name: string;
    parents: TermId[];
    aspect?: string;
    definition?: string;
}

export function serializeTerm(term: Term): SerializedTerm {
    return {
        id: term.id,
        name: term.name,
        parents: [...term.parents].sort(),
        ...(term.aspect && { aspect: term.aspect }),
        ...(term.definition && { definition: term.definition }),
    };
}

export function deserializeTerm(term: SerializedTerm): Term {
    return {
        id: term.id,
        name: term.name,
        parents: new Set(term.parents),
        ...(term.aspect && { aspect: term.aspect }),
        ...(term.definition && { definition: term.definition }),
    };
}
