import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Term } from '../types/term.js';
import { deserializeTerm, serializeTerm } from '../types/term.js';
import { DEFAULTS } from '../types/options.js';

/**
 * Term persistence interface. Ontology data is static between releases,
 * so a store lets separate runs share fetched terms.
 */
export interface TermStore {
    load(): Promise<Term[]>;
    save(terms: Iterable<Term>): Promise<void>;
    clear(): Promise<void>;
}

const storedTermsSchema = z.object({
    version: z.literal(1),
    terms: z.array(z.object({
        id: z.string(),
        name: z.string(),
        parents: z.array(z.string()),
        aspect: z.string().optional(),
        definition: z.string().optional(),
    })),
});

export class FileTermStore implements TermStore {
    private storageDir: string;

    constructor(storageDir: string = '.go-annotate-cache') {
        this.storageDir = storageDir;
    }

    get filePath(): string {
        return path.join(this.storageDir, DEFAULTS.cacheFile);
    }

    async load(): Promise<Term[]> {
        let data: string;
        try {
            data = await fs.readFile(this.filePath, 'utf-8');
        } catch (e) {
            if (isMissingFile(e)) return [];
            throw e;
        }
        const parsed = storedTermsSchema.safeParse(parseJson(data));
        if (!parsed.success) {
            console.warn(`Ignoring unreadable term cache ${this.filePath}`);
            return [];
        }
        return parsed.data.terms.map(deserializeTerm);
    }

    async save(terms: Iterable<Term>): Promise<void> {
        await fs.mkdir(this.storageDir, { recursive: true });
        const payload = {
            version: 1,
            terms: [...terms].map(serializeTerm),
        };
        await fs.writeFile(this.filePath, JSON.stringify(payload, null, 2));
    }

    async clear(): Promise<void> {
        try {
            await fs.unlink(this.filePath);
        } catch (e) {
            if (!isMissingFile(e)) throw e;
        }
    }
}

function parseJson(data: string): unknown {
    try {
        return JSON.parse(data);
    } catch (e) {
        return undefined;
    }
}

function isMissingFile(e: unknown): boolean {
    return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
}
