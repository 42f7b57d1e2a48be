import { z } from 'zod';

const pageInfoSchema = z.object({
    resultsPerPage: z.number().optional(),
    current: z.number(),
    total: z.number(),
});

export const annotationPageSchema = z.object({
    numberOfHits: z.number(),
    results: z.array(z.object({
        geneProductId: z.string(),
        goId: z.string(),
        goName: z.string().nullish(),
        goAspect: z.string(),
        qualifier: z.string(),
    })),
    pageInfo: pageInfoSchema.nullish(),
});

export const termResponseSchema = z.object({
    numberOfHits: z.number().optional(),
    results: z.array(z.object({
        id: z.string(),
        name: z.string(),
        isObsolete: z.boolean().default(false),
        aspect: z.string(),
        definition: z.object({ text: z.string().optional() }).nullish(),
    })),
});

export const pathResponseSchema = z.object({
    numberOfHits: z.number().optional(),
    results: z.array(z.array(z.object({
        child: z.string(),
        parent: z.string(),
        relationship: z.string(),
    }))),
});


export const geneProductSchema = z.object({
    numberOfHits: z.number().optional(),
    results: z.array(z.object({ id: z.string() })),
});
