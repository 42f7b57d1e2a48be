import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FileTermStore } from '../src/ontology/termStore.js';
import { TermGraph } from '../src/ontology/termGraph.js';
import { TERMS } from './fixtures.js';

describe('FileTermStore', () => {
    let dir: string;
    let store: FileTermStore;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'go-annotate-store-'));
        store = new FileTermStore(path.join(dir, 'cache'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('a missing cache loads as empty', async () => {
        expect(await store.load()).toEqual([]);
    });

    test('saved terms seed a new graph', async () => {
        await store.save(TERMS);
        const graph = new TermGraph(await store.load());

        expect(graph.size).toBe(TERMS.length);
        expect(graph.getTerm('GO:0004672')?.parents).toEqual(new Set(['GO:0016301', 'GO:0016773', 'GO:0140096']));
        expect(graph.closure(['GO:0004672']).size).toBe(8);
    });

    test('other read failures are rethrown', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, '');
        await expect(new FileTermStore(blocker).load()).rejects.toMatchObject({ code: 'ENOTDIR' });
    });

    test('unreadable caches are ignored', async () => {
        await fs.mkdir(path.dirname(store.filePath), { recursive: true });
        await fs.writeFile(store.filePath, '{ not json');
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

        expect(await store.load()).toEqual([]);
        expect(warn).toHaveBeenCalledWith(`Ignoring unreadable term cache ${store.filePath}`);
        warn.mockRestore();
    });

    test('clear removes the cache', async () => {
        await store.save(TERMS);
        await store.clear();
        expect(await store.load()).toEqual([]);
        await expect(store.clear()).resolves.toBeUndefined();
    });
});
