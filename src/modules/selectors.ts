/**
 * X profile page selectors
 * Centralized so a markup change is a one-file fix.
 */

export const SELECTORS = {
    primaryColumn: '[data-testid="primaryColumn"]',
    userName: '[data-testid="UserName"]',
    userDescription: '[data-testid="UserDescription"]',
    userJoinDate: '[data-testid="UserJoinDate"]',
    userUrl: '[data-testid="UserUrl"]',
    verifiedIcon: '[data-testid="icon-verified"]',
    followersLink: 'a[href$="/verified_followers"], a[href$="/followers"]',
    followingLink: 'a[href$="/following"]',

    post: '[data-testid="tweet"]',
    postText: '[data-testid="tweetText"]',
    statusLink: 'a[href*="/status/"]',
    replyButton: '[data-testid="reply"]',
    repostButton: '[data-testid="retweet"], [data-testid="unretweet"]',
    likeButton: '[data-testid="like"], [data-testid="unlike"]',
    views: 'a[href*="/analytics"]',
    time: 'time[datetime]',
    media: 'img[src*="pbs.twimg.com/media"]',
    socialContext: '[data-testid="socialContext"]',
    quotedPost: '[data-testid="quoteTweet"]',
    card: '[data-testid="card.wrapper"]',
    userLink: 'a[href^="/"][role="link"]',
} as const;

export const PINNED_MARKER = 'Pinned';
export const REPLY_PHRASE = 'Replying to';
export const REPOST_PHRASE = /\b(reposted|retweeted)\b/i;
export const POSTS_COUNT_PATTERN = /^([\d.,]+\s*[KMB]?)\s+(?:posts?|tweets?)$/i;

/** Ancestor levels walked from a pinned marker looking for its post. */
export const PINNED_ANCESTOR_DEPTH = 20;

export const SITE_ORIGIN = 'https://x.com';
