/**
 * Extractor
 * Walks a rendered X profile page with cheerio and produces untyped field maps.
 * Every value stays a raw string here; the record builder owns typing.
 */

import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element, type Text } from 'domhandler';
import { errorMessage, ExtractionError } from '../lib/errors.js';
import { scopedLogger } from '../lib/logger.js';
import type { ExtractionOutcome, RawPostFields, RawProfileFields } from '../types/index.js';
import {
    PINNED_ANCESTOR_DEPTH,
    PINNED_MARKER,
    POSTS_COUNT_PATTERN,
    REPLY_PHRASE,
    REPOST_PHRASE,
    SELECTORS,
    SITE_ORIGIN,
} from './selectors.js';

const log = scopedLogger('extractor');

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript']);
const METRIC_TOKEN = /^([\d.,]+[KMB]?)(?=\s|$)/i;

interface StatusLink {
    postId: string;
    postUrl: string;
}

/**
 * Text nodes under `root`, in document order, skipping script/style content.
 */
function collectTextNodes(root: AnyNode, out: Text[] = []): Text[] {
    if (isText(root)) {
        out.push(root);
        return out;
    }
    if (isTag(root) && SKIPPED_TAGS.has(root.name)) return out;
    if (hasChildren(root)) {
        for (const child of root.children) {
            collectTextNodes(child, out);
        }
    }
    return out;
}

function textNodesOf(nodes: AnyNode[]): Text[] {
    const out: Text[] = [];
    for (const node of nodes) {
        collectTextNodes(node, out);
    }
    return out;
}

function cleanText<T extends AnyNode>(selection: cheerio.Cheerio<T>): string {
    return selection.text().replace(/\s+/g, ' ').trim();
}

/**
 * Parse "/user/status/123?s=20" into an id and canonical URL. Null unless the id is all digits.
 */
export function parseStatusHref(href: string): StatusLink | null {
    const parts = href.split('/status/');
    if (parts.length < 2) return null;

    const postId = parts[1].split('/')[0].split('?')[0].split('#')[0];
    if (!/^\d+$/.test(postId)) return null;

    const prefix = parts[0];
    const base = /^https?:\/\//i.test(prefix) ? prefix : `${SITE_ORIGIN}${prefix.startsWith('/') ? '' : '/'}${prefix}`;
    return { postId, postUrl: `${base}/status/${postId}` };
}

export class ProfilePageExtractor {
    /**
     * Parse the page and run both extraction stages. A stage that throws contributes
     * an error string and an empty result; it never aborts the other stage.
     * Throws ExtractionError only when there is no page at all.
     */
    extract(html: string, identity: string): ExtractionOutcome {
        if (!html.trim()) {
            throw new ExtractionError(`Empty page for @${identity}`);
        }
        const $ = cheerio.load(html);
        const errors: string[] = [];

        let profile: RawProfileFields = {};
        try {
            profile = this.extractProfile($, identity);
        } catch (error) {
            log.warn(`Profile extraction failed for @${identity}`, { error: errorMessage(error) });
            errors.push(`Profile extraction error: ${errorMessage(error)}`);
        }

        let posts: RawPostFields[] = [];
        try {
            posts = this.extractPosts($);
        } catch (error) {
            log.warn(`Post extraction failed for @${identity}`, { error: errorMessage(error) });
            errors.push(`Posts extraction error: ${errorMessage(error)}`);
        }

        return { profile, posts, errors };
    }

    /**
     * Profile header fields. Returns an empty map when the page has no identity block.
     */
    extractProfile($: cheerio.CheerioAPI, identity: string): RawProfileFields {
        const identityBlock = $(SELECTORS.userName).first();
        if (identityBlock.length === 0) return {};

        const profile: RawProfileFields = {};

        for (const node of textNodesOf(identityBlock.toArray())) {
            const text = node.data.trim();
            if (!text) continue;
            if (text.startsWith('@')) {
                if (profile.username === undefined && text.length > 1) profile.username = text.slice(1);
            } else if (profile.displayName === undefined) {
                profile.displayName = text;
            }
        }

        if (profile.username === undefined) profile.username = identity;
        if (profile.displayName === undefined) profile.displayName = profile.username;

        const bioEl = $(SELECTORS.userDescription).first();
        if (bioEl.length > 0) profile.bio = cleanText(bioEl);

        const joinedEl = $(SELECTORS.userJoinDate).first();
        if (joinedEl.length > 0) profile.joinedDateRaw = cleanText(joinedEl);

        const website = $(SELECTORS.userUrl).first().find('a').first().attr('href');
        if (website) profile.websiteUrl = website.trim();

        const followers = $(SELECTORS.followersLink).first().find('span').first();
        if (followers.length > 0) profile.followersCountRaw = cleanText(followers);

        const following = $(SELECTORS.followingLink).first().find('span').first();
        if (following.length > 0) profile.followingCountRaw = cleanText(following);

        const postsCount = this.findPostsCount($);
        if (postsCount) profile.postsCountRaw = postsCount;

        profile.isVerified = identityBlock.find(SELECTORS.verifiedIcon).length > 0;

        return profile;
    }

    /** "1,234 posts" from the header above the timeline. */
    private findPostsCount($: cheerio.CheerioAPI): string | undefined {
        const column = $(SELECTORS.primaryColumn).first();
        const scope: AnyNode[] = column.length > 0 ? column.toArray() : $.root().toArray();
        for (const node of textNodesOf(scope)) {
            const match = node.data.trim().match(POSTS_COUNT_PATTERN);
            if (match) return match[1];
        }
        return undefined;
    }

    /**
     * Id of the post carrying a "Pinned" marker.
     *
     * Each marker walks up to PINNED_ANCESTOR_DEPTH ancestors until one contains a post.
     * With several markers the last one that resolves wins.
     */
    findPinnedPostId($: cheerio.CheerioAPI): string | null {
        let pinnedId: string | null = null;

        const markers = textNodesOf($.root().toArray()).filter((node) => node.data.trim() === PINNED_MARKER);
        for (const marker of markers) {
            let ancestor = marker.parent;
            for (let depth = 0; depth < PINNED_ANCESTOR_DEPTH && ancestor !== null; depth++) {
                const container = $(ancestor).find(SELECTORS.post).first();
                if (container.length > 0) {
                    const link = this.firstStatusLink($, container);
                    if (link) pinnedId = link.postId;
                    break;
                }
                ancestor = ancestor.parent;
            }
        }

        return pinnedId;
    }

    extractPosts($: cheerio.CheerioAPI): RawPostFields[] {
        const pinnedId = this.findPinnedPostId($);
        const posts: RawPostFields[] = [];
        const seen = new Set<string>();

        for (const element of $(SELECTORS.post).toArray()) {
            const post = this.extractPost($, $(element), pinnedId);
            // Posts without an id never reach the builder; a repeated id keeps its first rendering
            if (!post.postId || seen.has(post.postId)) continue;
            seen.add(post.postId);
            posts.push(post);
        }

        return posts;
    }

    private extractPost($: cheerio.CheerioAPI, postEl: cheerio.Cheerio<Element>, pinnedId: string | null): RawPostFields {
        const post: RawPostFields = {};

        const textEl = postEl.find(SELECTORS.postText).first();
        post.text = textEl.length > 0 ? cleanText(textEl) : '';

        const link = this.firstStatusLink($, postEl);
        if (link) {
            post.postId = link.postId;
            post.postUrl = link.postUrl;
            post.isPinned = link.postId === pinnedId;
        }

        const replyEl = postEl.find(SELECTORS.replyButton).first();
        if (replyEl.length > 0) post.replyCountRaw = this.readMetric(replyEl);

        const repostEl = postEl.find(SELECTORS.repostButton).first();
        if (repostEl.length > 0) post.repostCountRaw = this.readMetric(repostEl);

        const likeEl = postEl.find(SELECTORS.likeButton).first();
        if (likeEl.length > 0) post.likeCountRaw = this.readMetric(likeEl);

        const viewsEl = postEl.find(SELECTORS.views).first();
        if (viewsEl.length > 0) post.viewCountRaw = cleanText(viewsEl);

        const datetime = postEl.find(SELECTORS.time).first().attr('datetime');
        if (datetime) post.createdAtRaw = datetime;

        const mediaUrls = postEl
            .find(SELECTORS.media)
            .toArray()
            .map((img) => $(img).attr('src'))
            .filter((src): src is string => typeof src === 'string' && src.length > 0);
        if (mediaUrls.length > 0) post.mediaUrls = mediaUrls;

        const replyTo = this.detectReply($, postEl);
        if (replyTo) post.replyToUsername = replyTo;

        const repostedFrom = this.detectRepost($, postEl);
        if (repostedFrom) post.repostedFrom = repostedFrom;

        const quotedId = this.detectQuote($, postEl);
        if (quotedId) post.quotedPostId = quotedId;

        return post;
    }

    private firstStatusLink<T extends AnyNode>($: cheerio.CheerioAPI, scope: cheerio.Cheerio<T>): StatusLink | null {
        for (const anchor of scope.find(SELECTORS.statusLink).toArray()) {
            const href = $(anchor).attr('href');
            const link = href ? parseStatusHref(href) : null;
            if (link) return link;
        }
        return null;
    }

    /**
     * Count from an action button: aria-label leading number ("12 Replies. Reply"),
     * then the nested span text, then "0".
     */
    private readMetric<T extends AnyNode>(control: cheerio.Cheerio<T>): string {
        const label = control.attr('aria-label')?.trim();
        if (label) {
            const token = label.match(METRIC_TOKEN);
            if (token) return token[1];
        }

        const visible = cleanText(control.find('span').first());
        return visible || '0';
    }

    private detectReply<T extends AnyNode>($: cheerio.CheerioAPI, postEl: cheerio.Cheerio<T>): string | null {
        for (const node of textNodesOf(postEl.toArray())) {
            if (!node.data.includes(REPLY_PHRASE)) continue;

            // The @handle links sit beside the phrase, at most two levels up
            let scope = node.parent;
            for (let level = 0; level < 2 && scope !== null; level++) {
                for (const anchor of $(scope).find('a[href^="/"]').toArray()) {
                    const text = cleanText($(anchor));
                    if (text.startsWith('@') && text.length > 1) return text.slice(1);
                }
                scope = scope.parent;
            }
        }

        const context = postEl.find(SELECTORS.socialContext).first();
        if (context.length > 0) {
            const text = cleanText(context);
            if (text.includes(REPLY_PHRASE)) {
                const match = text.match(/@(\w+)/);
                if (match) return match[1];
            }
        }

        return null;
    }

    private detectRepost<T extends AnyNode>($: cheerio.CheerioAPI, postEl: cheerio.Cheerio<T>): string | null {
        const context = postEl.find(SELECTORS.socialContext).first();
        if (context.length === 0 || !REPOST_PHRASE.test(cleanText(context))) return null;

        // First single-segment profile link outside the "reposted" line is the original author
        for (const anchor of postEl.find(SELECTORS.userLink).toArray()) {
            if ($(anchor).closest(SELECTORS.socialContext).length > 0) continue;
            const href = $(anchor).attr('href') ?? '';
            if (href.includes('/status/') || (href.match(/\//g) ?? []).length > 1) continue;
            const author = href.slice(1);
            if (author) return author;
        }

        return null;
    }

    private detectQuote<T extends AnyNode>($: cheerio.CheerioAPI, postEl: cheerio.Cheerio<T>): string | null {
        const quoted = postEl.find(SELECTORS.quotedPost).first();
        if (quoted.length > 0) {
            const link = this.firstStatusLink($, quoted);
            if (link) return link.postId;
        }

        for (const card of postEl.find(SELECTORS.card).toArray()) {
            const link = this.firstStatusLink($, $(card));
            if (link) return link.postId;
        }

        return null;
    }
}

const defaultExtractor = new ProfilePageExtractor();

export function extractPage(html: string, identity: string): ExtractionOutcome {
    return defaultExtractor.extract(html, identity);
}
