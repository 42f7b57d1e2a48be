import { z } from 'zod';
import type {
    AnnotationRow,
    ClassificationRow,
    SerializedTerm,
} from '../types/index.js';
import { serializeTerm } from '../types/index.js';
import type { AnnotationContainer } from '../container.js';
import { AnnotationService } from '../annotation/service.js';
import { parseArgs, ruleArgSchema, rulesOrDefault } from './utils.js';

const annotateArgsSchema = z.object({
    protein_ids: z.array(z.string()).min(1),
    functions: z.array(z.string()).optional(),
    simplify_name: z.boolean().optional(),
    alternative_names: z.record(z.string()).optional(),
    include_root: z.boolean().optional(),
});

const classifyArgsSchema = z.object({
    protein_ids: z.array(z.string()).min(1),
    rules: ruleArgSchema.optional(),
    all_matches: z.boolean().optional(),
});

const termArgsSchema = z.object({
    go_id: z.string(),
    include_ancestors: z.boolean().optional(),
});

export interface AnnotateResponse {
    rows: AnnotationRow[];
    proteins: number;
    errors: number;
}

export interface ClassifyResponse {
    rows: ClassificationRow[];
    proteins: number;
    errors: number;
}

export interface TermResponse {
    term: SerializedTerm;
    ancestors?: SerializedTerm[];
}

export async function annotateProteinsHandler(
    args: unknown,
    container: AnnotationContainer
): Promise<AnnotateResponse> {
    const { protein_ids, functions, simplify_name, alternative_names, include_root } =
        parseArgs(annotateArgsSchema, args);

    const service = new AnnotationService(container.resolver, {
        simplifyName: simplify_name,
        alternativeNames: alternative_names,
        includeRoot: include_root,
        concurrency: container.config.concurrency,
    });
    const rows = functions
        ? await service.annotateSelected(protein_ids, functions)
        : await service.annotateProteins(protein_ids);

    return summarize(rows);
}

export async function classifyProteinsHandler(
    args: unknown,
    container: AnnotationContainer
): Promise<ClassifyResponse> {
    const { protein_ids, rules, all_matches } = parseArgs(classifyArgsSchema, args);
    const ruleSet = rulesOrDefault(rules, container.defaultRules);

    const rows = await container.service.classifyProteins(protein_ids, ruleSet, {
        allMatches: all_matches,
    });
    return summarize(rows);
}

export async function getTermHandler(
    args: unknown,
    container: AnnotationContainer
): Promise<TermResponse> {
    const { go_id, include_ancestors } = parseArgs(termArgsSchema, args);
    const term = await container.resolver.resolveTerm(go_id);

    if (!include_ancestors) {
        return { term: serializeTerm(term) };
    }
    const ancestors = [...container.graph.closure([term.id])]
        .filter((id) => id !== term.id)
        .sort()
        .flatMap((id) => {
            const ancestor = container.graph.getTerm(id);
            return ancestor ? [serializeTerm(ancestor)] : [];
        });
    return { term: serializeTerm(term), ancestors };
}

function summarize<T extends { uniprotId: string; error?: string }>(rows: T[]) {
    const proteins = new Set(rows.map((r) => r.uniprotId));
    const failed = new Set(rows.filter((r) => r.error).map((r) => r.uniprotId));
    return { rows, proteins: proteins.size, errors: failed.size };
}
