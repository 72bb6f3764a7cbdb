// src/utils/errors.ts

import type { SocialPlatform, PublishErrorKind } from '@/types/social';

export class AppError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Missing credentials or an invalid settings file. Fatal at start-up.
 */
export class ConfigError extends AppError {
    constructor(message: string, public readonly details: string[] = []) {
        super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    }
}

/**
 * Failure talking to the completion provider.
 */
export class ProviderError extends AppError {
    constructor(
        message: string,
        public readonly statusCode?: number,
        public readonly retryable: boolean = false,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class CompositionError extends AppError {
    constructor(
        message: string,
        public readonly platform: SocialPlatform,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class PublishError extends AppError {
    constructor(
        message: string,
        public readonly platform: SocialPlatform,
        public readonly kind: PublishErrorKind,
        public readonly statusCode?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }

    get retryable(): boolean {
        return this.kind === 'retryable';
    }
}

export class ArchiveError extends AppError {
    constructor(message: string, public readonly path?: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class AbortedError extends AppError {
    constructor(message: string = 'Operation aborted') {
        super(message);
    }
}

export const getErrorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
