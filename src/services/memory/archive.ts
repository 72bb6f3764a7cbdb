// src/services/memory/archive.ts

import fs from 'fs/promises';
import path from 'path';
import type { ComposedPost } from '@/types';
import { ARCHIVE_FORMAT } from '@/config/storage';
import { ArchiveError, getErrorMessage } from '@/utils/errors';
import { dateUtils } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';

const logger = createServiceLogger('ContentArchive');

export class ContentArchive {
    constructor(private readonly contentDir: string) {}

    /**
     * Write the post record and its readable text copy. Returns the record path.
     */
    public async save(post: ComposedPost): Promise<string> {
        const baseName = `${post.platform}_${dateUtils.archiveStamp(post.createdAt)}_${post.id}`;
        const recordPath = path.join(this.contentDir, `${baseName}.json`);
        const textPath = path.join(this.contentDir, `${baseName}.txt`);

        try {
            await fs.mkdir(this.contentDir, { recursive: true });
            await fs.writeFile(recordPath, JSON.stringify(post, null, ARCHIVE_FORMAT.jsonIndent), { flag: 'wx' });
            await fs.writeFile(textPath, this.renderText(post), { flag: 'wx' });
        } catch (error: unknown) {
            logger.error('Failed to archive post', error, { postId: post.id, platform: post.platform });
            throw new ArchiveError(`Failed to archive ${post.platform} post ${post.id}: ${getErrorMessage(error)}`, recordPath, { cause: error });
        }

        logger.info('Post archived', { postId: post.id, platform: post.platform, path: recordPath });
        return recordPath;
    }

    public renderText(post: ComposedPost): string {
        return [
            `TITLE: ${post.title}`,
            `PLATFORM: ${post.platform.toUpperCase()}`,
            `GENERATED: ${dateUtils.readable(post.createdAt)}`,
            `STATUS: ${post.status}`,
            `LENGTH: ${post.characterCount} characters`,
            ARCHIVE_FORMAT.sidecarRule,
            '',
            post.body,
            ''
        ].join('\n');
    }
}
