// src/config/apis.ts

export const API_ENDPOINTS = {
    completions: {
        chat: '/chat/completions'
    },

    linkedin: {
        baseUrl: 'https://api.linkedin.com',
        posts: '/v2/ugcPosts',
        userInfo: '/v2/userinfo',
        feedUrl: (postId: string) => `https://www.linkedin.com/feed/update/${postId}`
    },

    medium: {
        baseUrl: 'https://api.medium.com',
        me: '/v1/me',
        posts: (userId: string) => `/v1/users/${userId}/posts`
    }
};

export const DEFAULT_HEADERS = {
    completions: {
        'Content-Type': 'application/json',
        'Accept': 'application/json'
    },

    linkedin: {
        'Content-Type': 'application/json',
        'X-Restli-Protocol-Version': '2.0.0'
    },

    medium: {
        'Content-Type': 'application/json',
        'Accept': 'application/json',
        'Accept-Charset': 'utf-8'
    }
};

export const USER_AGENT = 'content-cycle-poster/1.0';

/**
 * HTTP statuses worth another attempt on both the provider and the platforms
 */
export const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;
