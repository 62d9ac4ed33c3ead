import type { FetchOptions, FetchResult, PageFetcher, ScrapeResult } from '../types/index.js';

export interface HeaderFixture {
    displayName?: string;
    handle?: string;
    verified?: boolean;
    bio?: string | null;
    joined?: string | null;
    website?: string | null;
    followers?: string | null;
    following?: string | null;
    postsCount?: string | null;
}

export interface PostFixture {
    id?: string | null;
    author?: string;
    text?: string;
    datetime?: string | null;
    pinned?: boolean;
    replies?: string;
    reposts?: string;
    likes?: string;
    views?: string | null;
    media?: string[];
    replyTo?: string;
    quotedId?: string;
    repostedBy?: string;
}

export function profileHeader(fixture: HeaderFixture = {}): string {
    const displayName = fixture.displayName ?? 'Alice Example';
    const handle = fixture.handle ?? 'Alice';
    const bio = fixture.bio === undefined ? 'Building things' : fixture.bio;
    const joined = fixture.joined === undefined ? 'Joined March 2009' : fixture.joined;
    const website = fixture.website === undefined ? 'https://example.com' : fixture.website;
    const followers = fixture.followers === undefined ? '1.2K' : fixture.followers;
    const following = fixture.following === undefined ? '180' : fixture.following;
    const postsCount = fixture.postsCount === undefined ? '1,234 posts' : fixture.postsCount;

    return `
<div class="header">
  ${postsCount === null ? '' : `<div><h2>${displayName}</h2><div>${postsCount}</div></div>`}
  <div data-testid="UserName">
    <div><span>${displayName}</span>${fixture.verified ? '<svg data-testid="icon-verified"></svg>' : ''}</div>
    <div><span>@${handle}</span></div>
  </div>
  ${bio === null ? '' : `<div data-testid="UserDescription"><span>${bio}</span></div>`}
  <div>
    ${website === null ? '' : `<span data-testid="UserUrl"><a href="${website}">${website.replace(/^https?:\/\//, '')}</a></span>`}
    ${joined === null ? '' : `<span data-testid="UserJoinDate"><span>${joined}</span></span>`}
  </div>
  ${followers === null ? '' : `<a href="/${handle}/verified_followers"><span>${followers}</span> <span>Followers</span></a>`}
  ${following === null ? '' : `<a href="/${handle}/following"><span>${following}</span> <span>Following</span></a>`}
</div>`;
}

export function postCell(fixture: PostFixture = {}): string {
    const author = fixture.author ?? 'alice';
    const id = fixture.id === undefined ? '1001' : fixture.id;
    const datetime = fixture.datetime === undefined ? '2024-03-15T10:30:00.000Z' : fixture.datetime;

    const socialContext = fixture.pinned
        ? '<div data-testid="socialContext"><span>Pinned</span></div>'
        : fixture.repostedBy
          ? `<div data-testid="socialContext"><a href="/${fixture.repostedBy.toLowerCase()}" role="link"><span>${fixture.repostedBy} reposted</span></a></div>`
          : '';
    const statusLink = id === null ? '' : `<a href="/${author}/status/${id}">${datetime === null ? '' : `<time datetime="${datetime}">Mar 15</time>`}</a>`;
    const reply = fixture.replyTo
        ? `<div><span>Replying to </span><a href="/${fixture.replyTo}"><span>@${fixture.replyTo}</span></a></div>`
        : '';
    const quote = fixture.quotedId
        ? `<div data-testid="quoteTweet"><a href="/quoted/status/${fixture.quotedId}"><span>Quoted post</span></a></div>`
        : '';
    const media = (fixture.media ?? []).map((src) => `<img src="${src}" alt="Image">`).join('');
    const views =
        fixture.views === undefined || fixture.views === null
            ? ''
            : id === null
              ? `<a href="/${author}/analytics"><span>${fixture.views}</span></a>`
              : `<a href="/${author}/status/${id}/analytics"><span>${fixture.views}</span></a>`;

    return `
<div data-testid="cellInnerDiv">
  <article data-testid="tweet">
    ${socialContext}
    <div>
      <a href="/${author}" role="link"><span>${author}</span></a>
      ${statusLink}
    </div>
    ${reply}
    <div data-testid="tweetText"><span>${fixture.text ?? 'Hello world'}</span></div>
    ${quote}
    ${media}
    <div role="group">
      <button data-testid="reply" aria-label="${fixture.replies ?? '0'} Replies. Reply"><span>${fixture.replies ?? ''}</span></button>
      <button data-testid="retweet"><span>${fixture.reposts ?? ''}</span></button>
      <button data-testid="like" aria-label="${fixture.likes ?? '0'} Likes. Like"><span>${fixture.likes ?? ''}</span></button>
      ${views}
    </div>
  </article>
</div>`;
}

export function profilePage(header: string, posts: string[] = []): string {
    return `<!DOCTYPE html>
<html>
<head><title>X</title><script type="text/template">Pinned</script></head>
<body>
  <main>
    <div data-testid="primaryColumn">
      ${header}
      <section><div>${posts.join('\n')}</div></section>
    </div>
  </main>
</body>
</html>`;
}

export function makeResult(username: string, overrides: Partial<ScrapeResult> = {}): ScrapeResult {
    const scrapedAt = new Date('2024-06-10T12:00:00.000Z');
    return {
        success: true,
        username,
        profile: {
            username,
            displayHandle: username,
            displayName: `${username} display`,
            bio: null,
            websiteUrl: null,
            joinedDate: new Date('2009-03-01T00:00:00.000Z'),
            followersCount: 10,
            followingCount: 5,
            totalPostsCount: 3,
            isVerified: false,
            scrapedAt,
        },
        posts: [
            {
                postId: '42',
                text: 'first post',
                createdAt: new Date('2024-06-09T08:00:00.000Z'),
                isPinned: false,
                isReply: false,
                replyToUsername: null,
                isQuote: false,
                quotedPostId: null,
                isRepost: false,
                repostedFrom: null,
                replyCount: 1,
                repostCount: 2,
                likeCount: 3,
                viewCount: null,
                mediaUrls: null,
                postUrl: `https://x.com/${username}/status/42`,
            },
        ],
        cached: false,
        cacheAgeSeconds: null,
        errorMessage: null,
        failureReason: null,
        scrapedAt,
        durationMs: 120,
        ...overrides,
    };
}

export interface FetchCall {
    identity: string;
    options: FetchOptions;
}

/**
 * In-memory fetcher. Known identities get their page; anything else is reported as not found.
 */
export class StubFetcher implements PageFetcher {
    readonly calls: FetchCall[] = [];
    closeCount = 0;
    private readonly pages: Map<string, string | FetchResult | Error>;

    constructor(pages: Record<string, string | FetchResult | Error> = {}) {
        this.pages = new Map(Object.entries(pages));
    }

    set(identity: string, page: string | FetchResult | Error): void {
        this.pages.set(identity, page);
    }

    async fetch(identity: string, options: FetchOptions): Promise<FetchResult> {
        this.calls.push({ identity, options });
        const page = this.pages.get(identity);
        if (page === undefined) {
            return { html: '', success: false, error: `Profile @${identity} not found`, status: 404, reason: 'not_found' };
        }
        if (page instanceof Error) throw page;
        if (typeof page === 'string') return { html: page, success: true, status: 200 };
        return page;
    }

    async close(): Promise<void> {
        this.closeCount++;
    }
}
