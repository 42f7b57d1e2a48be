/**
 * QuickGO REST client
 *
 * Annotation source backed by the EBI QuickGO web services. Responses are
 * validated before use; anything the client cannot interpret is reported
 * as SOURCE_UNAVAILABLE rather than guessed at.
 */

import { z } from 'zod';
import type { AnnotationSource } from '../types/source.js';
import type { ExplicitTerm, Term, TermId } from '../types/term.js';
import type { Logger } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { isTermId } from '../types/term.js';
import {
    createInvalidTermIdError,
    createObsoleteTermError,
    createProteinNotFoundError,
    createResolutionError,
    createSourceUnavailableError,
    createTermNotFoundError,
    createWrongAspectError,
} from '../types/errors.js';
import {
    annotationPageSchema,
    geneProductSchema,
    pathResponseSchema,
    termResponseSchema,
} from './schemas.js';

export interface QuickGoClientOptions {
    baseUrl?: string;
    timeoutMs?: number;
    pageSize?: number;
    /** Relations followed upward from a term (default: is_a and part_of) */
    relations?: string[];
    fetch?: typeof fetch;
    logger?: Logger;
}

type NotFoundHandler = (status: number) => Error;

export class QuickGoClient implements AnnotationSource {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly pageSize: number;
    private readonly relations: string[];
    private readonly fetchFn: typeof fetch;
    private readonly logger: Logger;

    /** Direct parents of every term seen on a path response */
    private parentIndex = new Map<TermId, Set<TermId>>();

    constructor(options: QuickGoClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULTS.baseUrl).replace(/\/$/, '');
        this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
        this.pageSize = options.pageSize ?? DEFAULTS.pageSize;
        this.relations = options.relations ?? ['is_a', 'part_of'];
        this.fetchFn = options.fetch ?? fetch;
        this.logger = options.logger ?? console;
    }

    async fetchExplicitTerms(proteinId: string): Promise<ExplicitTerm[]> {
        const terms = new Map<TermId, ExplicitTerm>();
        let page = 1;
        let total = 1;

        while (page <= total) {
            const params = new URLSearchParams({
                geneProductId: proteinId,
                aspect: DEFAULTS.aspect,
                qualifier: DEFAULTS.qualifier,
                includeFields: 'goName',
                limit: String(this.pageSize),
                page: String(page),
            });
            const data = await this.request(
                `/annotation/search?${params}`,
                annotationPageSchema,
                (status) => createProteinNotFoundError(proteinId, status),
            );
            if (data.numberOfHits === 0 || !data.pageInfo) {
                // No hits is ambiguous: tell an unknown accession from a
                // protein without molecular-function annotation.
                if (page === 1) {
                    await this.confirmProtein(proteinId);
                }
                break;
            }

            for (const row of data.results) {
                if (!row.geneProductId.includes(proteinId)
                    || row.goAspect !== DEFAULTS.aspect
                    || row.qualifier !== DEFAULTS.qualifier) {
                    this.logger.warn(`Ignoring unexpected annotation ${row.goId} for ${row.geneProductId}`);
                    continue;
                }
                if (!terms.has(row.goId)) {
                    terms.set(row.goId, { id: row.goId, name: row.goName ?? '' });
                }
            }
            total = data.pageInfo.total;
            page++;
        }

        return [...terms.values()];
    }

    /**
     * @throws AnnotationException NOT_FOUND unless the gene-product index
     *   knows the accession.
     */
    private async confirmProtein(proteinId: string): Promise<void> {
        const notFound = (status?: number) => createProteinNotFoundError(proteinId, status);
        const data = await this.request(
            `/geneproduct/${encodeURIComponent(proteinId)}`,
            geneProductSchema,
            notFound,
        );
        if (data.results.length === 0) {
            throw notFound();
        }
    }

    async fetchTerm(termId: TermId): Promise<Term> {
        if (!isTermId(termId)) {
            throw createInvalidTermIdError(termId);
        }

        const data = await this.request(
            `/ontology/go/terms/${encodeURIComponent(termId)}`,
            termResponseSchema,
            () => createTermNotFoundError(termId),
        );
        if (data.results.length === 0) {
            throw createTermNotFoundError(termId);
        }
        if (data.results.length > 1) {
            throw createResolutionError(termId, undefined, 'the identifier matches several terms');
        }

        const result = data.results[0];
        if (result.isObsolete) {
            throw createObsoleteTermError(termId);
        }
        if (result.aspect !== DEFAULTS.aspect) {
            throw createWrongAspectError(termId, result.aspect);
        }

        return {
            id: result.id,
            name: result.name,
            parents: await this.fetchParents(result.id),
            aspect: result.aspect,
            ...(result.definition?.text && { definition: result.definition.text }),
        };
    }

    /**
     * Direct parents, read from the term's paths up to the root. Every path
     * through an ancestor is part of that answer, so the ancestors' parents
     * are indexed along the way.
     */
    private async fetchParents(termId: TermId): Promise<Set<TermId>> {
        if (termId === DEFAULTS.rootTermId) {
            return new Set();
        }
        const known = this.parentIndex.get(termId);
        if (known) {
            return new Set(known);
        }

        const params = new URLSearchParams({ relations: this.relations.join(',') });
        const url = `/ontology/go/terms/${encodeURIComponent(termId)}/paths/${encodeURIComponent(DEFAULTS.rootTermId)}?${params}`;
        const data = await this.request(url, pathResponseSchema, () => createTermNotFoundError(termId));

        if (data.results.length === 0) {
            this.logger.warn(`No path from ${termId} to ${DEFAULTS.rootTermId}; term stays unconnected`);
        }

        const index = new Map<TermId, Set<TermId>>();
        for (const path of data.results) {
            for (const edge of path) {
                if (!this.relations.includes(edge.relationship)) continue;
                let parents = index.get(edge.child);
                if (!parents) {
                    parents = new Set();
                    index.set(edge.child, parents);
                }
                parents.add(edge.parent);
            }
        }
        for (const [child, parents] of index) {
            if (child !== DEFAULTS.rootTermId) {
                this.parentIndex.set(child, parents);
            }
        }
        return new Set(index.get(termId) ?? []);
    }

    private async request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, notFound: NotFoundHandler): Promise<T> {
        const url = `${this.baseUrl}${path}`;
        let response: Response;
        try {
            response = await this.fetchFn(url, {
                headers: { Accept: 'application/json' },
                signal: AbortSignal.timeout(this.timeoutMs),
            });
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw createSourceUnavailableError(url, reason);
        }

        if (response.status === 400 || response.status === 404) {
            throw notFound(response.status);
        }
        if (!response.ok) {
            throw createSourceUnavailableError(url, `HTTP ${response.status}`, response.status);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (e) {
            throw createSourceUnavailableError(url, 'response is not JSON', response.status);
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            throw createSourceUnavailableError(url, `unexpected response: ${parsed.error.issues[0].message}`);
        }
        return parsed.data;
    }
}
