// src/types/content.ts

import type { SocialPlatform, PublishErrorKind } from './social';

export interface ResearchResult {
    query: string;
    insights: string;
}

export interface TopicHistoryEntry {
    topic: string;
    usedAt: string;
}

export type PostStatus = 'pending' | 'published' | 'failed';

export interface PublishOutcome {
    postId?: string;
    url?: string;
    publishedAt?: string;
    error?: string;
    errorKind?: PublishErrorKind;
    statusCode?: number;
}

export interface ComposedPost {
    id: string;
    cycleId: string;
    platform: SocialPlatform;
    topic: string;
    title: string;
    body: string;
    characterCount: number;
    createdAt: string;
    status: PostStatus;
    publish?: PublishOutcome;
}

export interface CyclePostSummary {
    platform: SocialPlatform;
    status: PostStatus | 'not-composed';
    archivePath?: string;
    postId?: string;
    error?: string;
}

export type CycleOutcome = 'completed' | 'failed' | 'aborted';

export interface CycleReport {
    cycleId: string;
    startedAt: string;
    finishedAt: string;
    outcome: CycleOutcome;
    topic?: string;
    posts: CyclePostSummary[];
    errors: string[];
}
