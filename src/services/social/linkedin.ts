// src/services/social/linkedin.ts

import type { ApiResponse, ComposedPost, PublishResult } from '@/types';
import { API_ENDPOINTS, DEFAULT_HEADERS } from '@/config/apis';
import { PublishError } from '@/utils/errors';
import { createApiResponse, isRecord } from '@/utils/helpers';
import { createServiceLogger } from '@/utils/logger';
import { BasePublisher, type PublisherOptions } from './base-publisher';

const logger = createServiceLogger('LinkedInPublisher');

const PERSON_URN_PREFIX = 'urn:li:person:';

export interface LinkedInCredentials {
    accessToken: string;
    personUrn: string;
}

interface UgcPostPayload {
    author: string;
    lifecycleState: 'PUBLISHED';
    specificContent: {
        'com.linkedin.ugc.ShareContent': {
            shareCommentary: { text: string };
            shareMediaCategory: 'NONE';
        };
    };
    visibility: {
        'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC';
    };
}

export class LinkedInPublisher extends BasePublisher {
    private readonly authorUrn: string;

    constructor(credentials: LinkedInCredentials, timeoutMs: number, options: PublisherOptions) {
        super(
            'linkedin',
            { accessToken: credentials.accessToken, timeoutMs },
            API_ENDPOINTS.linkedin.baseUrl,
            options
        );

        Object.assign(this.axiosInstance.defaults.headers.common, DEFAULT_HEADERS.linkedin);
        this.authorUrn = credentials.personUrn.startsWith('urn:')
            ? credentials.personUrn
            : `${PERSON_URN_PREFIX}${credentials.personUrn}`;
    }

    /**
     * Publish post to LinkedIn
     */
    public async publishPost(post: ComposedPost): Promise<PublishResult> {
        try {
            const invalid = this.validatePostContent(post);
            if (invalid) {
                return this.handleApiError(invalid, 'publish post');
            }

            logger.info('Publishing post to LinkedIn', {
                postId: post.id,
                contentLength: post.body.length
            });

            const response = await this.retryApiCall(
                () => this.axiosInstance.post<unknown>(API_ENDPOINTS.linkedin.posts, this.prepareLinkedInPost(post)),
                'publish post'
            );

            const headerId: unknown = response.headers['x-restli-id'];
            const body: unknown = response.data;
            const postId = typeof headerId === 'string' && headerId
                ? headerId
                : isRecord(body) && typeof body.id === 'string' ? body.id : undefined;

            if (!postId) {
                throw new PublishError('LinkedIn API returned no post ID', 'linkedin', 'terminal', response.status);
            }

            return this.createSuccessResult(postId, API_ENDPOINTS.linkedin.feedUrl(postId));
        } catch (error: unknown) {
            return this.handleApiError(error, 'publish post');
        }
    }

    /**
     * Validate LinkedIn access token
     */
    public async validateToken(): Promise<ApiResponse<boolean>> {
        try {
            logger.info('Validating LinkedIn access token');
            await this.axiosInstance.get(API_ENDPOINTS.linkedin.userInfo);

            logger.info('LinkedIn token validated successfully');
            return createApiResponse(true, 'LinkedIn token is valid', true);
        } catch (error: unknown) {
            return this.tokenInvalid(error);
        }
    }

    /**
     * Prepare LinkedIn post data structure
     */
    public prepareLinkedInPost(post: ComposedPost): UgcPostPayload {
        return {
            author: this.authorUrn,
            lifecycleState: 'PUBLISHED',
            specificContent: {
                'com.linkedin.ugc.ShareContent': {
                    shareCommentary: {
                        text: post.body
                    },
                    shareMediaCategory: 'NONE'
                }
            },
            visibility: {
                'com.linkedin.ugc.MemberNetworkVisibility': 'PUBLIC'
            }
        };
    }
}
