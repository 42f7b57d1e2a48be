/**
 * Tool handlers, run against a container wired to the in-memory source
 */

import {
    annotateProteinsHandler,
    checkRulesHandler,
    classifyProteinsHandler,
    getTermHandler,
} from '../src/handlers/index.js';
import { createContainer, AnnotationContainer } from '../src/container.js';
import { TOOLS } from '../src/tools/definitions.js';
import { isAnnotationError } from '../src/types/errors.js';
import { InMemoryAnnotationSource, createRecordingLogger } from './fixtures.js';

describe('tool handlers', () => {
    let container: AnnotationContainer;

    beforeEach(() => {
        container = createContainer({
            source: new InMemoryAnnotationSource(),
            logger: createRecordingLogger(),
        });
    });

    test('every listed tool has a schema', () => {
        expect(TOOLS.map((t) => t.name)).toEqual([
            'annotate-proteins',
            'classify-proteins',
            'get-term',
            'check-rules',
        ]);
        for (const tool of TOOLS) {
            expect(tool.inputSchema.type).toBe('object');
        }
    });

    describe('annotate-proteins', () => {
        test('returns rows with a summary', async () => {
            const result = await annotateProteinsHandler(
                { protein_ids: ['P00007', 'Q00000'], include_root: true, simplify_name: false },
                container
            );
            expect(result).toEqual({
                rows: [
                    { uniprotId: 'P00007', goId: 'GO:0003674', proteinFunction: 'molecular_function' },
                    { uniprotId: 'P00007', goId: 'GO:0005215', proteinFunction: 'transporter activity' },
                    { uniprotId: 'Q00000', proteinFunction: 'error', error: 'NOT_FOUND' },
                ],
                proteins: 2,
                errors: 1,
            });
        });

        test('restricts output to the requested functions', async () => {
            const result = await annotateProteinsHandler(
                { protein_ids: ['P00001'], functions: ['GO:0016301', 'GO:0140096'] },
                container
            );
            expect(result.rows.map((r) => r.goId)).toEqual(['GO:0016301', 'GO:0140096']);
        });

        test('rejects calls without proteins', async () => {
            const error = await annotateProteinsHandler({ protein_ids: [] }, container).catch((e: unknown) => e);
            expect(isAnnotationError(error, 'INVALID_INPUT')).toBe(true);
        });
    });

    describe('classify-proteins', () => {
        test('uses the default rules', async () => {
            const result = await classifyProteinsHandler({ protein_ids: ['P00001', 'P00003'] }, container);
            expect(result.rows).toEqual([
                { uniprotId: 'P00001', proteinFunction: 'Kinase' },
                { uniprotId: 'P00003', proteinFunction: 'no_function' },
            ]);
            expect(result.errors).toBe(0);
        });

        test('accepts inline rules', async () => {
            const result = await classifyProteinsHandler({
                protein_ids: ['P00002'],
                rules: [
                    { label: 'Binder', required: ['GO:0005488'] },
                    { label: 'Regulator', required: ['GO:0140110'] },
                ],
                all_matches: true,
            }, container);
            expect(result.rows.map((r) => r.proteinFunction)).toEqual(['Binder', 'Regulator']);
        });

        test('invalid inline rules are INVALID_RULE', async () => {
            const error = await classifyProteinsHandler({
                protein_ids: ['P00002'],
                rules: [{ label: 'Binder', required: ['binding'] }],
            }, container).catch((e: unknown) => e);
            expect(isAnnotationError(error, 'INVALID_RULE')).toBe(true);
        });
    });

    describe('get-term', () => {
        test('returns the term alone by default', async () => {
            expect(await getTermHandler({ go_id: 'GO:0005215' }, container)).toEqual({
                term: {
                    id: 'GO:0005215',
                    name: 'transporter activity',
                    parents: ['GO:0003674'],
                    aspect: 'molecular_function',
                },
            });
        });

        test('lists ancestors on request', async () => {
            const result = await getTermHandler({ go_id: 'GO:0016301', include_ancestors: true }, container);
            expect(result.ancestors?.map((t) => t.id)).toEqual([
                'GO:0003674',
                'GO:0003824',
                'GO:0016740',
                'GO:0016772',
            ]);
        });
    });

    describe('check-rules', () => {
        test('default rules are valid', async () => {
            const result = await checkRulesHandler({}, container);
            expect(result.valid).toBe(true);
            expect(result.rules).toHaveLength(30);
            expect(result.overlaps).toBeUndefined();
        });

        test('reports dead rules and overlaps', async () => {
            const result = await checkRulesHandler({
                rules: [
                    { label: 'Kinase', required: ['GO:0016301'] },
                    { label: 'Transferase', required: ['GO:0016740'] },
                    { label: 'Never', required: ['GO:0005215'], forbidden: ['GO:0005215'] },
                ],
                coverage: true,
            }, container);

            expect(result.valid).toBe(false);
            expect(result.issues.map((i) => i.kind)).toEqual(['dead_rule']);
            expect(result.overlaps).toEqual([
                { first: 'Kinase', second: 'Transferase', terms: ['GO:0016301'] },
            ]);
        });
    });
});
