import { TermGraph } from '../src/ontology/termGraph.js';
import { AnnotationException } from '../src/types/errors.js';
import { TERMS } from './fixtures.js';

describe('TermGraph', () => {
    let graph: TermGraph;

    beforeEach(() => {
        graph = new TermGraph(TERMS);
    });

    test('closure of a leaf contains every ancestor once', () => {
        const closed = graph.closure(['GO:0004672']);
        expect([...closed].sort()).toEqual([
            'GO:0003674',
            'GO:0003824',
            'GO:0004672',
            'GO:0016301',
            'GO:0016740',
            'GO:0016772',
            'GO:0016773',
            'GO:0140096',
        ]);
    });

    test('closure contains the explicit terms', () => {
        const closed = graph.closure(['GO:0003677', 'GO:0140110']);
        expect(closed.has('GO:0003677')).toBe(true);
        expect(closed.has('GO:0140110')).toBe(true);
        expect(closed.size).toBe(5);
    });

    test('closure is idempotent', () => {
        const once = graph.closure(['GO:0004672']);
        const twice = graph.closure(once);
        expect([...twice].sort()).toEqual([...once].sort());
    });

    test('closure is monotone in its input', () => {
        const small = graph.closure(['GO:0016301']);
        const large = graph.closure(['GO:0016301', 'GO:0003677']);
        for (const id of small) {
            expect(large.has(id)).toBe(true);
        }
    });

    test('closure of the root is the root alone', () => {
        expect([...graph.closure(['GO:0003674'])]).toEqual(['GO:0003674']);
    });

    test('closure of nothing is empty', () => {
        expect(graph.closure([]).size).toBe(0);
    });

    test('missing term raises a resolution error naming the protein', () => {
        expect.assertions(3);
        try {
            graph.closure(['GO:0009999'], { proteinId: 'P00006' });
        } catch (e) {
            expect(e).toBeInstanceOf(AnnotationException);
            if (e instanceof AnnotationException) {
                expect(e.code).toBe('RESOLUTION_ERROR');
                expect(e.message).toBe("Cannot resolve GO term 'GO:0009999' while resolving 'P00006'");
            }
        }
    });

    test('missing ancestor raises a resolution error', () => {
        const partial = new TermGraph([
            { id: 'GO:0016301', name: 'kinase activity', parents: new Set(['GO:0016772']) },
        ]);
        expect(() => partial.closure(['GO:0016301'])).toThrow("Cannot resolve GO term 'GO:0016772'");
    });

    test('re-adding an identical term is a no-op', () => {
        const copy = { ...TERMS[4], parents: new Set(TERMS[4].parents) };
        graph.addTerm(copy);
        expect(graph.size).toBe(TERMS.length);
    });

    test('conflicting definition of a known term is rejected', () => {
        expect(() => graph.addTerm({ id: 'GO:0016301', name: 'kinase activity', parents: new Set() }))
            .toThrow('conflicting definitions in one session');
    });

    test('aliases resolve to the current term', () => {
        graph.addAlias('GO:0001234', 'GO:0016301');
        expect(graph.canonicalId('GO:0001234')).toBe('GO:0016301');
        expect(graph.getTerm('GO:0001234')?.name).toBe('kinase activity');
        expect(graph.closure(['GO:0001234']).has('GO:0016301')).toBe(true);
    });

    test('a parent named by an outdated identifier leads to the current term', () => {
        graph.addAlias('GO:0001234', 'GO:0016301');
        graph.addTerm({
            id: 'GO:0004674',
            name: 'protein serine/threonine kinase activity',
            parents: new Set(['GO:0001234']),
        });

        expect([...graph.closure(['GO:0004674'])].sort()).toEqual([
            'GO:0003674',
            'GO:0003824',
            'GO:0004674',
            'GO:0016301',
            'GO:0016740',
            'GO:0016772',
        ]);
        expect(graph.descendants(['GO:0016301']).has('GO:0004674')).toBe(true);
    });

    test('an alias recorded after its children moves them to the current term', () => {
        graph.addTerm({
            id: 'GO:0004674',
            name: 'protein serine/threonine kinase activity',
            parents: new Set(['GO:0001234']),
        });
        graph.addAlias('GO:0001234', 'GO:0016301');

        expect([...graph.childrenOf('GO:0016301')].sort()).toEqual(['GO:0004672', 'GO:0004674']);
        expect(graph.childrenOf('GO:0001234')).toEqual(new Set(['GO:0004672', 'GO:0004674']));
    });

    test('children are indexed from parent edges', () => {
        expect([...graph.childrenOf('GO:0016772')].sort()).toEqual(['GO:0016301', 'GO:0016773']);
        expect([...graph.parentsOf('GO:0004672')].sort()).toEqual(['GO:0016301', 'GO:0016773', 'GO:0140096']);
    });

    test('descendants walk downward', () => {
        expect([...graph.descendants(['GO:0016740'])].sort()).toEqual([
            'GO:0004672',
            'GO:0016301',
            'GO:0016740',
            'GO:0016772',
            'GO:0016773',
        ]);
    });

    test('snapshot round-trips into a new graph', () => {
        const copy = new TermGraph(graph.snapshot());
        expect(copy.size).toBe(graph.size);
        expect(copy.closure(['GO:0004672']).size).toBe(8);
    });
});
