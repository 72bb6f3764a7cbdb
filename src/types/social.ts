// src/types/social.ts

import type { PublishError } from '@/utils/errors';

export type SocialPlatform = 'linkedin' | 'medium';

export const SOCIAL_PLATFORMS: readonly SocialPlatform[] = ['linkedin', 'medium'];

export type MediumPublishStatus = 'public' | 'draft' | 'unlisted';

export type PublishErrorKind = 'retryable' | 'terminal';

export type PublishResult =
    | {
        success: true;
        platform: SocialPlatform;
        postId: string;
        url?: string;
        publishedAt: string;
    }
    | {
        success: false;
        platform: SocialPlatform;
        error: PublishError;
    };

export interface PlatformConfig {
    accessToken: string;
    timeoutMs: number;
}
