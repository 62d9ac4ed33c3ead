import { describe, expect, it } from 'vitest';
import type { RawPostFields, RawProfileFields } from '../../types/index.js';
import { buildPost, buildProfile, buildRecords } from '../record-builder.js';

const fetchedAt = new Date('2024-06-10T12:00:00.000Z');

const rawProfile: RawProfileFields = {
    username: 'Alice',
    displayName: 'Alice Example',
    bio: 'Building things',
    joinedDateRaw: 'Joined March 2009',
    websiteUrl: 'https://example.com',
    followersCountRaw: '1.2K',
    followingCountRaw: '180',
    postsCountRaw: '1,234',
    isVerified: true,
};

const rawPost: RawPostFields = {
    postId: '1001',
    postUrl: 'https://x.com/alice/status/1001',
    text: 'Hello world',
    isPinned: true,
    createdAtRaw: '2h',
    replyCountRaw: '12',
    repostCountRaw: '3',
    likeCountRaw: '1.5K',
    viewCountRaw: '5,678',
};

describe('buildProfile', () => {
    it('normalizes every field', () => {
        const result = buildProfile(rawProfile, 'alice', fetchedAt);

        expect(result).toEqual({
            ok: true,
            value: {
                username: 'alice',
                displayHandle: 'Alice',
                displayName: 'Alice Example',
                bio: 'Building things',
                websiteUrl: 'https://example.com',
                joinedDate: new Date('2009-03-01T00:00:00.000Z'),
                followersCount: 1200,
                followingCount: 180,
                totalPostsCount: 1234,
                isVerified: true,
                scrapedAt: fetchedAt,
            },
        });
    });

    it('nulls out empty bios and non-http websites', () => {
        const result = buildProfile({ ...rawProfile, bio: '   ', websiteUrl: 'javascript:alert(1)' }, 'alice', fetchedAt);

        expect(result.ok && result.value.bio).toBeNull();
        expect(result.ok && result.value.websiteUrl).toBeNull();
    });

    it('uses the identity when no handle was extracted', () => {
        const result = buildProfile({ displayName: 'Someone' }, 'someone', fetchedAt);

        expect(result.ok && result.value.username).toBe('someone');
        expect(result.ok && result.value.followersCount).toBe(0);
        expect(result.ok && result.value.isVerified).toBe(false);
    });

    it('reports an empty username as an error', () => {
        const result = buildProfile({ username: '' }, 'alice', fetchedAt);

        expect(result.ok).toBe(false);
        expect(!result.ok && result.error).toMatch(/^Profile build error: username: /);
    });
});

describe('buildPost', () => {
    it('normalizes counts and anchors relative times to the fetch time', () => {
        const result = buildPost(rawPost, 'alice', fetchedAt);

        expect(result).toEqual({
            ok: true,
            value: {
                postId: '1001',
                text: 'Hello world',
                createdAt: new Date('2024-06-10T10:00:00.000Z'),
                isPinned: true,
                isReply: false,
                replyToUsername: null,
                isQuote: false,
                quotedPostId: null,
                isRepost: false,
                repostedFrom: null,
                replyCount: 12,
                repostCount: 3,
                likeCount: 1500,
                viewCount: 5678,
                mediaUrls: null,
                postUrl: 'https://x.com/alice/status/1001',
            },
        });
    });

    it('derives each relationship flag from its reference', () => {
        const result = buildPost({ postId: '5', replyToUsername: 'bob', quotedPostId: '77', repostedFrom: 'carol' }, 'alice', fetchedAt);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value).toMatchObject({
            isReply: true,
            replyToUsername: 'bob',
            isQuote: true,
            quotedPostId: '77',
            isRepost: true,
            repostedFrom: 'carol',
        });
    });

    it('treats a zero view count as unknown and drops invalid media URLs', () => {
        const result = buildPost(
            { postId: '6', viewCountRaw: '0', mediaUrls: ['not a url', 'https://pbs.twimg.com/media/a.jpg'] },
            'alice',
            fetchedAt
        );

        expect(result.ok && result.value.viewCount).toBeNull();
        expect(result.ok && result.value.mediaUrls).toEqual(['https://pbs.twimg.com/media/a.jpg']);
    });

    it('falls back to a canonical URL built from the identity', () => {
        const result = buildPost({ postId: '7' }, 'alice', fetchedAt);

        expect(result.ok && result.value.postUrl).toBe('https://x.com/alice/status/7');
        expect(result.ok && result.value.text).toBe('');
        expect(result.ok && result.value.createdAt).toBeNull();
    });

    it('rejects a non-numeric quoted id', () => {
        expect(buildPost({ postId: '8', quotedPostId: 'abc' }, 'alice', fetchedAt)).toEqual({
            ok: false,
            error: 'Post 8 build error: quotedPostId: must be all digits',
        });
    });

    it('rejects a post without an id', () => {
        expect(buildPost({ text: 'orphan' }, 'alice', fetchedAt)).toEqual({
            ok: false,
            error: 'Post build error: missing post id',
        });
    });
});

describe('buildRecords', () => {
    it('succeeds with a profile even when some posts fail', () => {
        const built = buildRecords(
            {
                profile: rawProfile,
                posts: [rawPost, { postId: '2', quotedPostId: 'x' }, { text: 'no id' }],
                errors: [],
            },
            'alice',
            fetchedAt
        );

        expect(built.success).toBe(true);
        expect(built.profile?.username).toBe('alice');
        expect(built.posts.map((post) => post.postId)).toEqual(['1001']);
        expect(built.errors).toEqual(['Post 2 build error: quotedPostId: must be all digits']);
    });

    it('fails when the page had no profile', () => {
        const built = buildRecords({ profile: {}, posts: [rawPost], errors: [] }, 'alice', fetchedAt);

        expect(built.success).toBe(false);
        expect(built.profile).toBeNull();
        expect(built.posts).toHaveLength(1);
        expect(built.errors).toEqual(['Profile not found in page']);
    });

    it('fails when the profile does not validate, keeping its posts', () => {
        const built = buildRecords({ profile: { username: '' }, posts: [rawPost], errors: [] }, 'alice', fetchedAt);

        expect(built.success).toBe(false);
        expect(built.profile).toBeNull();
        expect(built.posts).toHaveLength(1);
        expect(built.errors).toHaveLength(1);
        expect(built.errors[0]).toMatch(/^Profile build error: username: /);
    });

    it('lists extraction errors first', () => {
        const built = buildRecords(
            { profile: rawProfile, posts: [{ postId: '3', quotedPostId: 'y' }], errors: ['Posts extraction error: boom'] },
            'alice',
            fetchedAt
        );

        expect(built.success).toBe(true);
        expect(built.errors).toEqual(['Posts extraction error: boom', 'Post 3 build error: quotedPostId: must be all digits']);
    });
});
