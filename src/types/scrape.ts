/**
 * Scraper data model
 * zod schemas are the single source of truth; the TypeScript types are inferred from them.
 */

import { z } from 'zod';

const numericId = z.string().regex(/^\d+$/, 'must be all digits');
const count = z.number().int().nonnegative();

export const ProfileRecordSchema = z.object({
    /** Lowercased handle, used for every lookup. */
    username: z.string().min(1).toLowerCase(),
    /** Handle as rendered on the page. */
    displayHandle: z.string().min(1),
    displayName: z.string(),
    bio: z.string().nullable(),
    websiteUrl: z.string().url().nullable(),
    /** First day of the joined month (UTC). */
    joinedDate: z.coerce.date().nullable(),
    followersCount: count,
    followingCount: count,
    totalPostsCount: count,
    isVerified: z.boolean(),
    scrapedAt: z.coerce.date(),
});

export const PostRecordSchema = z
    .object({
        postId: numericId,
        text: z.string(),
        createdAt: z.coerce.date().nullable(),
        isPinned: z.boolean(),

        isReply: z.boolean(),
        replyToUsername: z.string().min(1).nullable(),
        isQuote: z.boolean(),
        quotedPostId: numericId.nullable(),
        isRepost: z.boolean(),
        repostedFrom: z.string().min(1).nullable(),

        replyCount: count,
        repostCount: count,
        likeCount: count,
        viewCount: count.nullable(),
        mediaUrls: z.array(z.string().url()).nullable(),
        postUrl: z.string().url(),
    })
    .superRefine((post, ctx) => {
        const pairs = [
            ['isReply', 'replyToUsername'],
            ['isQuote', 'quotedPostId'],
            ['isRepost', 'repostedFrom'],
        ] as const;
        for (const [flag, reference] of pairs) {
            if (post[flag] && post[reference] === null) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: [reference],
                    message: `${flag} requires ${reference}`,
                });
            }
        }
    });

export const FetchFailureReasonSchema = z.enum(['not_found', 'blocked', 'http', 'transport', 'unknown']);

export const ScrapeResultSchema = z.object({
    success: z.boolean(),
    username: z.string(),
    profile: ProfileRecordSchema.nullable(),
    /** Page order, never re-sorted. */
    posts: z.array(PostRecordSchema),
    cached: z.boolean(),
    cacheAgeSeconds: z.number().nonnegative().nullable(),
    errorMessage: z.string().nullable(),
    failureReason: FetchFailureReasonSchema.nullable(),
    scrapedAt: z.coerce.date(),
    durationMs: z.number().nonnegative(),
});

export type ProfileRecord = z.infer<typeof ProfileRecordSchema>;
export type PostRecord = z.infer<typeof PostRecordSchema>;
export type ScrapeResult = z.infer<typeof ScrapeResultSchema>;
export type FetchFailureReason = z.infer<typeof FetchFailureReasonSchema>;

/**
 * Untyped profile fields as read from the page, before normalization.
 */
export interface RawProfileFields {
    username?: string;
    displayName?: string;
    bio?: string;
    joinedDateRaw?: string;
    websiteUrl?: string;
    followersCountRaw?: string;
    followingCountRaw?: string;
    postsCountRaw?: string;
    isVerified?: boolean;
}

/**
 * Untyped post fields. A relationship is present iff its reference is set.
 */
export interface RawPostFields {
    postId?: string;
    postUrl?: string;
    text?: string;
    isPinned?: boolean;
    createdAtRaw?: string;
    replyCountRaw?: string;
    repostCountRaw?: string;
    likeCountRaw?: string;
    viewCountRaw?: string;
    mediaUrls?: string[];
    replyToUsername?: string;
    quotedPostId?: string;
    repostedFrom?: string;
}

export interface ExtractionOutcome {
    profile: RawProfileFields;
    posts: RawPostFields[];
    errors: string[];
}

export interface FetchOptions {
    headless: boolean;
    timeoutMs: number;
    userAgent?: string;
    proxy?: string;
}

export interface FetchResult {
    html: string;
    success: boolean;
    error?: string;
    status?: number;
    reason?: FetchFailureReason;
}

/**
 * Turns an identity into rendered page HTML. Retries and timeouts are the fetcher's concern.
 */
export interface PageFetcher {
    fetch(identity: string, options: FetchOptions): Promise<FetchResult>;
    close?(): Promise<void>;
}
