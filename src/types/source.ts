import type { ExplicitTerm, Term, TermId } from './term.js';

/**
 * Where annotations and ontology structure come from.
 *
 * Implementations throw AnnotationException NOT_FOUND for unknown proteins
 * and terms, and SOURCE_UNAVAILABLE when the source cannot be reached.
 */
export interface AnnotationSource {
    /** Molecular-function terms directly asserted for the protein */
    fetchExplicitTerms(proteinId: string): Promise<ExplicitTerm[]>;

    /**
     * The term with its direct parent identifiers. The returned `id` may
     * differ from the requested one when the identifier has been replaced.
     */
    fetchTerm(termId: TermId): Promise<Term>;
}
