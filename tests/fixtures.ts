/**
 * Shared test fixtures: a small molecular-function hierarchy and an
 * in-process annotation source serving it.
 */
import type { AnnotationSource, ExplicitTerm, Term, TermId } from '../src/types/index.js';
import {
    createObsoleteTermError,
    createProteinNotFoundError,
    createSourceUnavailableError,
    createTermNotFoundError,
    createWrongAspectError,
} from '../src/types/index.js';

function term(id: TermId, name: string, parents: TermId[] = []): Term {
    return { id, name, parents: new Set(parents), aspect: 'molecular_function' };
}

// GO:0004672 reaches GO:0016772 through two parents (kinase and
// phosphotransferase), and GO:0003824 through a third.
export const TERMS: Term[] = [
    term('GO:0003674', 'molecular_function'),
    term('GO:0003824', 'catalytic activity', ['GO:0003674']),
    term('GO:0016740', 'transferase activity', ['GO:0003824']),
    term('GO:0016772', 'transferase activity, transferring phosphorus-containing groups', ['GO:0016740']),
    term('GO:0016301', 'kinase activity', ['GO:0016772']),
    term('GO:0016773', 'phosphotransferase activity, alcohol group as acceptor', ['GO:0016772']),
    term('GO:0140096', 'catalytic activity, acting on a protein', ['GO:0003824']),
    term('GO:0004672', 'protein kinase activity', ['GO:0016301', 'GO:0016773', 'GO:0140096']),
    term('GO:0005488', 'binding', ['GO:0003674']),
    term('GO:0003676', 'nucleic acid binding', ['GO:0005488']),
    term('GO:0003677', 'DNA binding', ['GO:0003676']),
    term('GO:0140110', 'transcription regulator activity', ['GO:0003674']),
    term('GO:0005215', 'transporter activity', ['GO:0003674']),
];

export const PROTEINS: Record<string, TermId[]> = {
    P00001: ['GO:0004672'],
    P00002: ['GO:0003677', 'GO:0140110'],
    P00003: [],
    P00004: ['GO:0001234'],
    P00005: ['GO:0000001'],
    P00006: ['GO:0009999'],
    P00007: ['GO:0005215'],
    Q16512: ['GO:0004672', 'GO:0140110'],
};

/** Outdated identifiers and the term now served for them */
export const ALIASES: Record<TermId, TermId> = {
    'GO:0001234': 'GO:0016301',
};

export const OBSOLETE: TermId[] = ['GO:0000001'];

/** Accession for which the source behaves as if unreachable */
export const UNREACHABLE = 'P99999';

export interface FakeSourceOptions {
    /** Milliseconds before answering for the given protein */
    delays?: Record<string, number>;
}

export class InMemoryAnnotationSource implements AnnotationSource {
    readonly termRequests = new Map<TermId, number>();
    readonly proteinRequests: string[] = [];
    private readonly terms: Map<TermId, Term>;

    constructor(
        terms: Term[] = TERMS,
        private readonly proteins: Record<string, TermId[]> = PROTEINS,
        private readonly options: FakeSourceOptions = {}
    ) {
        this.terms = new Map(terms.map((t) => [t.id, t]));
    }

    async fetchExplicitTerms(proteinId: string): Promise<ExplicitTerm[]> {
        this.proteinRequests.push(proteinId);
        const delay = this.options.delays?.[proteinId];
        if (delay) {
            await new Promise((resolve) => setTimeout(resolve, delay));
        }
        if (proteinId === UNREACHABLE) {
            throw createSourceUnavailableError('memory://annotation', 'HTTP 503', 503);
        }
        const ids = this.proteins[proteinId];
        if (!ids) {
            throw createProteinNotFoundError(proteinId);
        }
        return ids.map((id) => ({ id, name: this.terms.get(id)?.name ?? '' }));
    }

    async fetchTerm(termId: TermId): Promise<Term> {
        this.termRequests.set(termId, (this.termRequests.get(termId) ?? 0) + 1);
        await Promise.resolve();

        if (OBSOLETE.includes(termId)) {
            throw createObsoleteTermError(termId);
        }
        if (termId === 'GO:0008150') {
            throw createWrongAspectError(termId, 'biological_process');
        }
        const found = this.terms.get(ALIASES[termId] ?? termId);
        if (!found) {
            throw createTermNotFoundError(termId);
        }
        return found;
    }

    requestsFor(termId: TermId): number {
        return this.termRequests.get(termId) ?? 0;
    }
}

/** Logger collecting warnings instead of printing them */
export function createRecordingLogger(): { warn: (message: string) => void; messages: string[] } {
    const messages: string[] = [];
    return {
        messages,
        warn: (message: string) => {
            messages.push(message);
        },
    };
}
