import { describe, it, expect } from 'vitest';
import { ExistingIndex, loadExistingIndex } from '../storage/existing-index.js';
import type { PaperStore } from '../types/index.js';
import { PersistenceError } from '../utils/errors.js';
import { InMemoryStore } from './fakes.js';
import { makePaper } from './helpers.js';

describe('ExistingIndex', () => {
    it('should match stored URLs regardless of version and format', () => {
        const index = ExistingIndex.fromEntries([
            { title: null, url: 'https://arxiv.org/pdf/2403.05001v3' },
        ]);

        expect(index.has(makePaper({ id: 'arxiv:2403.05001', title: 'Anything' }))).toBe(true);
        expect(index.has(makePaper({ id: 'arxiv:2403.05002', title: 'Anything' }))).toBe(false);
    });

    it('should match stored titles when the URL is missing', () => {
        const index = ExistingIndex.fromEntries([
            { title: 'Speech style transfer with audio LMs!', url: null },
        ]);

        expect(index.has(makePaper({ id: 'arxiv:2403.09999' }))).toBe(true);
    });

    it('should ignore rows with neither title nor URL', () => {
        const index = ExistingIndex.fromEntries([{ title: null, url: null }, { title: '', url: '' }]);

        expect(index.size).toBe(0);
        expect(index.has(makePaper({ title: '' }))).toBe(false);
    });

    it('should include papers added during the run', () => {
        const index = ExistingIndex.fromEntries([]);
        const paper = makePaper();

        index.add(paper);

        expect(index.has(paper)).toBe(true);
        expect(index.size).toBe(1);
    });
});

describe('loadExistingIndex', () => {
    it('should build the index from every stored entry', async () => {
        const store = new InMemoryStore([
            { title: 'One', url: 'http://arxiv.org/abs/2401.00001v1' },
            { title: 'Two', url: 'http://arxiv.org/abs/2401.00002v2' },
            { title: 'Two again', url: 'http://arxiv.org/abs/2401.00002v1' },
        ]);

        const index = await loadExistingIndex(store);

        expect(index.size).toBe(2);
        expect(store.listCalls).toBe(1);
    });

    it('should wrap unexpected failures in PersistenceError', async () => {
        const store: PaperStore = {
            listEntries: async () => {
                throw new Error('socket hang up');
            },
            createEntry: async () => 'unused',
        };

        const load = loadExistingIndex(store);

        await expect(load).rejects.toThrow(PersistenceError);
        await expect(load).rejects.toThrow('Failed to read existing entries: socket hang up');
    });

    it('should pass PersistenceError through unchanged', async () => {
        const failure = new PersistenceError('Notion database query failed: HTTP 401: Unauthorized');
        const store: PaperStore = {
            listEntries: async () => {
                throw failure;
            },
            createEntry: async () => 'unused',
        };

        await expect(loadExistingIndex(store)).rejects.toBe(failure);
    });
});
