// src/data/templates/prompts.ts

import type { SocialPlatform } from '@/types';

export const SYSTEM_PROMPTS = {
    research: 'You are a careful research assistant. Report recent, specific and verifiable developments.',
    writer: 'You are an experienced practitioner who writes the way people talk. Never mention that you are an AI.'
};

export const PLATFORM_SPECIFIC_ADJUSTMENTS: Record<SocialPlatform, {
    style: string;
    structure: string;
    lengthMargin: number;
    includeHashtags: boolean;
}> = {
    linkedin: {
        style: 'personal story told to a smart friend over coffee',
        structure: 'LinkedIn post with a short title line on top',
        lengthMargin: 250,
        includeHashtags: true
    },
    medium: {
        style: 'reflective personal essay with real depth',
        structure: 'full markdown article with ## section headings',
        lengthMargin: 500,
        includeHashtags: false
    }
};

export const RESEARCH_PROMPTS = {
    /**
     * Insight gathering for one seed query
     */
    insights: (query: string) => `
Give 3-5 key insights about: ${query}

Cover:
- What changed recently and why it matters
- Where it is used in practice today
- Effects on businesses and on people
- What is likely to happen next
- Concrete examples, names and numbers where you have them

Stay factual and current. Write plainly, as if briefing a colleague.
`.trim()
};

export const TOPIC_PROMPTS = {
    /**
     * Ask for one article topic given research and recently used topics
     */
    selectTopic: (params: {
        insights: string;
        recentTopics: string[];
    }) => `
Using the research below, propose ONE specific article topic that would work for both a LinkedIn post and a Medium article.

RESEARCH:
${params.insights}

TOPICS ALREADY USED (do not repeat or rephrase these):
${params.recentTopics.length > 0 ? params.recentTopics.map(topic => `- ${topic}`).join('\n') : '- none yet'}

REQUIREMENTS:
- Specific and practical, never generic
- Interesting to professionals, engineering leads and curious readers
- Clearly different from every topic already used
- Offers a fresh angle on something happening now
- 8-12 words

Reply with the topic title only. No quotes, no explanation.
`.trim()
};

export const CONTENT_PROMPTS = {
    linkedin: (params: {
        topic: string;
        tone: string;
        avoidPhrases: string[];
        targetLength: number;
    }) => `
Write a LinkedIn post about: "${params.topic}"

It has to read like a real person wrote it.

FORMAT:
- Line 1: a title with one emoji, under 60 characters
- A blank line
- A hook: the first 210 characters show before "see more", so make them count
- Short paragraphs of 2-3 sentences for mobile readers
- End with a question to the reader
- A blank line, then 3-5 hashtags on their own lines

VOICE:
- Open with something that happened, a surprise or a mistake
- Use contractions and vary sentence length
- Give one or two honest opinions and one concrete example with numbers
- At most two emojis after the title

NEVER USE: ${params.avoidPhrases.length > 0 ? params.avoidPhrases.join(', ') : 'corporate buzzwords'}

TONE: ${params.tone}

LENGTH: stay under ${params.targetLength} characters in total.
`.trim(),

    medium: (params: {
        topic: string;
        tone: string;
        avoidPhrases: string[];
        targetLength: number;
    }) => `
Write a Medium article about: "${params.topic}"

It has to read like a real person wrote it.

FORMAT:
- Line 1: the article title, plain text
- A blank line
- An opening paragraph built on a personal moment
- 3-4 sections, each starting with a "## " markdown heading
- A closing section with one practical takeaway
- No hashtags

VOICE:
- First person, conversational, specific
- Mix short and long sentences
- Concrete examples over abstractions
- Admit what you are unsure about

NEVER USE: ${params.avoidPhrases.length > 0 ? params.avoidPhrases.join(', ') : 'corporate buzzwords'}

TONE: ${params.tone}

LENGTH: stay under ${params.targetLength} characters in total.
`.trim()
};
