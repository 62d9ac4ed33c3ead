/**
 * Record Builder
 * The one place raw field maps become typed, validated records. Failures are
 * returned per record instead of thrown, so one bad post never costs its siblings.
 */

import type { ZodError } from 'zod';
import { errorMessage } from '../lib/errors.js';
import {
    PostRecordSchema,
    ProfileRecordSchema,
    type ExtractionOutcome,
    type PostRecord,
    type ProfileRecord,
    type RawPostFields,
    type RawProfileFields,
} from '../types/index.js';
import { normalizeCount, parseJoinedDate, parsePostTimestamp } from './normalizer.js';
import { SITE_ORIGIN } from './selectors.js';

export type BuildResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface BuiltRecords {
    profile: ProfileRecord | null;
    posts: PostRecord[];
    /** True when a profile was built without error. Post failures do not affect it. */
    success: boolean;
    errors: string[];
}

function describeIssues(error: ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join(', ');
}

function optionalText(value: string | undefined): string | null {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
}

/** Absolute http(s) URL or null. */
function optionalUrl(value: string | undefined): string | null {
    const text = optionalText(value);
    if (!text) return null;
    try {
        const url = new URL(text);
        return url.protocol === 'http:' || url.protocol === 'https:' ? text : null;
    } catch {
        return null;
    }
}

export function buildProfile(raw: RawProfileFields, identity: string, scrapedAt: Date): BuildResult<ProfileRecord> {
    try {
        const handle = raw.username ?? identity;
        const parsed = ProfileRecordSchema.safeParse({
            username: handle,
            displayHandle: handle,
            displayName: raw.displayName ?? handle,
            bio: optionalText(raw.bio),
            websiteUrl: optionalUrl(raw.websiteUrl),
            joinedDate: parseJoinedDate(raw.joinedDateRaw),
            followersCount: normalizeCount(raw.followersCountRaw),
            followingCount: normalizeCount(raw.followingCountRaw),
            totalPostsCount: normalizeCount(raw.postsCountRaw),
            isVerified: raw.isVerified ?? false,
            scrapedAt,
        });
        if (!parsed.success) {
            return { ok: false, error: `Profile build error: ${describeIssues(parsed.error)}` };
        }
        return { ok: true, value: parsed.data };
    } catch (error) {
        return { ok: false, error: `Profile build error: ${errorMessage(error)}` };
    }
}

/**
 * @param fetchedAt anchors relative timestamps such as "2h"
 */
export function buildPost(raw: RawPostFields, identity: string, fetchedAt: Date): BuildResult<PostRecord> {
    const postId = raw.postId;
    if (!postId) return { ok: false, error: 'Post build error: missing post id' };

    try {
        const viewCount = normalizeCount(raw.viewCountRaw);
        const mediaUrls = (raw.mediaUrls ?? [])
            .map((src) => optionalUrl(src))
            .filter((src): src is string => src !== null);
        const parsed = PostRecordSchema.safeParse({
            postId,
            text: raw.text ?? '',
            createdAt: parsePostTimestamp(raw.createdAtRaw, fetchedAt),
            isPinned: raw.isPinned ?? false,
            isReply: raw.replyToUsername !== undefined,
            replyToUsername: raw.replyToUsername ?? null,
            isQuote: raw.quotedPostId !== undefined,
            quotedPostId: raw.quotedPostId ?? null,
            isRepost: raw.repostedFrom !== undefined,
            repostedFrom: raw.repostedFrom ?? null,
            replyCount: normalizeCount(raw.replyCountRaw),
            repostCount: normalizeCount(raw.repostCountRaw),
            likeCount: normalizeCount(raw.likeCountRaw),
            viewCount: viewCount > 0 ? viewCount : null,
            mediaUrls: mediaUrls.length > 0 ? mediaUrls : null,
            postUrl: raw.postUrl ?? `${SITE_ORIGIN}/${identity}/status/${postId}`,
        });
        if (!parsed.success) {
            return { ok: false, error: `Post ${postId} build error: ${describeIssues(parsed.error)}` };
        }
        return { ok: true, value: parsed.data };
    } catch (error) {
        return { ok: false, error: `Post ${postId} build error: ${errorMessage(error)}` };
    }
}

/**
 * Build every record of one extraction.
 *
 * Errors are collected in order: extraction errors, then the profile error, then post errors.
 */
export function buildRecords(outcome: ExtractionOutcome, identity: string, fetchedAt: Date): BuiltRecords {
    const errors = [...outcome.errors];

    let profile: ProfileRecord | null = null;
    let profileFailed = false;
    if (Object.keys(outcome.profile).length > 0) {
        const built = buildProfile(outcome.profile, identity, fetchedAt);
        if (built.ok) {
            profile = built.value;
        } else {
            profileFailed = true;
            errors.push(built.error);
        }
    } else {
        errors.push('Profile not found in page');
    }

    const posts: PostRecord[] = [];
    for (const raw of outcome.posts) {
        if (!raw.postId) continue;
        const built = buildPost(raw, identity, fetchedAt);
        if (built.ok) {
            posts.push(built.value);
        } else {
            errors.push(built.error);
        }
    }

    return {
        profile,
        posts,
        success: !profileFailed && profile !== null,
        errors,
    };
}
