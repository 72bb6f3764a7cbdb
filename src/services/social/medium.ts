// src/services/social/medium.ts

import type { ApiResponse, AppSettings, ComposedPost, PublishResult } from '@/types';
import { API_ENDPOINTS, DEFAULT_HEADERS } from '@/config/apis';
import { PublishError } from '@/utils/errors';
import { createApiResponse, isRecord } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { BasePublisher, type PublisherOptions } from './base-publisher';

const logger = createServiceLogger('MediumPublisher');

export interface MediumPostPayload {
    title: string;
    contentFormat: 'markdown';
    content: string;
    publishStatus: AppSettings['publishing']['medium']['publishStatus'];
    tags: string[];
}

/**
 * Medium wraps every payload in a `data` object
 */
const unwrapData = (body: unknown): Record<string, unknown> | undefined =>
    isRecord(body) && isRecord(body.data) ? body.data : undefined;

export class MediumPublisher extends BasePublisher {
    private userId: string | null = null;

    constructor(
        integrationToken: string,
        private readonly mediumSettings: AppSettings['publishing']['medium'],
        timeoutMs: number,
        options: PublisherOptions
    ) {
        super(
            'medium',
            { accessToken: integrationToken, timeoutMs },
            API_ENDPOINTS.medium.baseUrl,
            options
        );

        Object.assign(this.axiosInstance.defaults.headers.common, DEFAULT_HEADERS.medium);
    }

    /**
     * Publish article to Medium
     */
    public async publishPost(post: ComposedPost): Promise<PublishResult> {
        try {
            const invalid = this.validatePostContent(post);
            if (invalid) {
                return this.handleApiError(invalid, 'publish post');
            }

            const userId = await this.getUserId();

            logger.info('Publishing article to Medium', {
                postId: post.id,
                contentLength: post.body.length,
                publishStatus: this.mediumSettings.publishStatus
            });

            const response = await this.retryApiCall(
                () => this.axiosInstance.post<unknown>(API_ENDPOINTS.medium.posts(userId), this.prepareMediumPost(post)),
                'publish post'
            );

            const data = unwrapData(response.data);
            const postId = data && typeof data.id === 'string' ? data.id : undefined;
            if (!postId) {
                throw new PublishError('Medium API returned no post ID', 'medium', 'terminal', response.status);
            }

            const url = data && typeof data.url === 'string' ? data.url : undefined;
            return this.createSuccessResult(postId, url);
        } catch (error: unknown) {
            return this.handleApiError(error, 'publish post');
        }
    }

    /**
     * Validate Medium integration token
     */
    public async validateToken(): Promise<ApiResponse<boolean>> {
        try {
            logger.info('Validating Medium integration token');
            const userId = await this.getUserId();

            logger.info('Medium token validated successfully', { userId });
            return createApiResponse(true, 'Medium token is valid', true);
        } catch (error: unknown) {
            return this.tokenInvalid(error);
        }
    }

    /**
     * Prepare Medium post data structure
     */
    public prepareMediumPost(post: ComposedPost): MediumPostPayload {
        return {
            title: post.title,
            contentFormat: 'markdown',
            content: post.body,
            publishStatus: this.mediumSettings.publishStatus,
            tags: [...this.mediumSettings.tags]
        };
    }

    /**
     * Get the authenticated user's id, cached after the first lookup
     */
    private async getUserId(): Promise<string> {
        if (this.userId) {
            return this.userId;
        }

        const response = await this.retryApiCall(
            () => this.axiosInstance.get<unknown>(API_ENDPOINTS.medium.me),
            'get user id'
        );

        const data = unwrapData(response.data);
        if (!data || typeof data.id !== 'string') {
            throw new PublishError('Medium API returned no user id', 'medium', 'terminal', response.status);
        }

        this.userId = data.id;
        return data.id;
    }
}
