// tests/archive.test.ts

import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ComposedPost } from '@/types';
import { ContentArchive } from '@/services/memory/archive';
import { ArchiveError } from '@/utils/errors';
import { makeTempDir, readJson } from './support/fixtures';

const post: ComposedPost = {
    id: 'abc123',
    cycleId: 'cycle-1',
    platform: 'medium',
    topic: 'Edge Budgets',
    title: 'Edge Budgets Explained',
    body: '## Intro\n\nSome text.',
    characterCount: 20,
    createdAt: '2026-05-10T12:00:00.000Z',
    status: 'failed',
    publish: { error: 'medium authentication failed', errorKind: 'terminal', statusCode: 401 }
};

describe('ContentArchive', () => {
    let dir: string;
    let contentDir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        contentDir = path.join(dir, 'content');
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('writes a JSON record and a text copy named by platform, time and id', async () => {
        const archive = new ContentArchive(contentDir);

        const recordPath = await archive.save(post);

        expect(path.dirname(recordPath)).toBe(contentDir);
        expect(path.basename(recordPath)).toMatch(/^medium_\d{8}_\d{6}_abc123\.json$/);
        expect(await readJson(recordPath)).toEqual(post);

        const files = (await fs.readdir(contentDir)).sort();
        expect(files).toEqual([path.basename(recordPath), path.basename(recordPath).replace(/\.json$/, '.txt')]);
    });

    it('renders the text copy with a header and the body', async () => {
        const archive = new ContentArchive(contentDir);

        const recordPath = await archive.save(post);
        const text = await fs.readFile(recordPath.replace(/\.json$/, '.txt'), 'utf-8');
        const lines = text.split('\n');

        expect(lines[0]).toBe('TITLE: Edge Budgets Explained');
        expect(lines[1]).toBe('PLATFORM: MEDIUM');
        expect(lines[2]).toMatch(/^GENERATED: \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
        expect(lines[3]).toBe('STATUS: failed');
        expect(lines[4]).toBe('LENGTH: 20 characters');
        expect(lines[5]).toBe('='.repeat(80));
        expect(lines.slice(7).join('\n')).toBe('## Intro\n\nSome text.\n');
    });

    it('never overwrites an existing record', async () => {
        const archive = new ContentArchive(contentDir);
        await archive.save(post);

        await expect(archive.save(post)).rejects.toBeInstanceOf(ArchiveError);
    });

    it('raises an archive error when the directory cannot be created', async () => {
        const blocker = path.join(dir, 'blocker');
        await fs.writeFile(blocker, 'not a directory');
        const archive = new ContentArchive(path.join(blocker, 'content'));

        await expect(archive.save(post)).rejects.toThrow(/^Failed to archive medium post abc123/);
    });
});
