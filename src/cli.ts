#!/usr/bin/env node

// Command-line front end for the scraper
// Usage: xscrape scrape alice bob -o ./output --delay 2000

import { program, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { config } from './config.js';
import { errorMessage } from './lib/errors.js';
import { saveManyJson, scraperOptionsFromConfig, withScraper } from './modules/index.js';
import type { ScrapeResult } from './types/index.js';

interface ScrapeCommandOptions {
    output: string;
    force?: boolean;
    headless: boolean;
    delay?: number;
    quiet?: boolean;
}

interface InfoCommandOptions {
    force?: boolean;
    posts: number;
}

interface CacheClearOptions {
    user?: string;
}

const POSTS_PREVIEW = 5;

function parseNonNegativeInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function formatNumber(value: number): string {
    return value.toLocaleString('en-US');
}

function truncate(text: string, length: number): string {
    return text.length > length ? `${text.slice(0, length - 1)}…` : text;
}

function printSummary(results: ScrapeResult[]): void {
    const table = new Table({
        head: ['Username', 'Status', 'Followers', 'Posts', 'Cached', 'Time'],
    });

    for (const result of results) {
        table.push([
            `@${result.username}`,
            result.success ? chalk.green('ok') : chalk.red('failed'),
            result.profile ? formatNumber(result.profile.followersCount) : '-',
            result.posts.length,
            result.cached ? 'yes' : 'no',
            `${(result.durationMs / 1000).toFixed(1)}s`,
        ]);
    }

    console.log(table.toString());

    for (const result of results) {
        if (result.errorMessage) {
            console.log(chalk.yellow(`@${result.username}: ${result.errorMessage}`));
        }
    }
}

function printProfile(result: ScrapeResult, postsToShow: number): void {
    const profile = result.profile;
    if (!profile) {
        console.log(chalk.red(`No profile for @${result.username}: ${result.errorMessage ?? 'unknown error'}`));
        return;
    }

    console.log(chalk.green(`\n${profile.displayName} (@${profile.displayHandle})${profile.isVerified ? chalk.blue(' ✓') : ''}`));
    const summaryTable = new Table();
    summaryTable.push(
        ['Bio', profile.bio ?? '-'],
        ['Website', profile.websiteUrl ?? '-'],
        ['Joined', profile.joinedDate ? profile.joinedDate.toISOString().slice(0, 7) : '-'],
        ['Followers', formatNumber(profile.followersCount)],
        ['Following', formatNumber(profile.followingCount)],
        ['Posts', formatNumber(profile.totalPostsCount)],
        ['Cached', result.cached ? `yes (${Math.round(result.cacheAgeSeconds ?? 0)}s old)` : 'no']
    );
    console.log(summaryTable.toString());

    if (result.posts.length === 0) return;

    console.log(chalk.yellow('\nRECENT POSTS'));
    const postTable = new Table({
        head: ['Id', 'Kind', 'Text', 'Replies', 'Reposts', 'Likes', 'Views'],
    });
    for (const post of result.posts.slice(0, postsToShow)) {
        const flags: Array<[boolean, string]> = [
            [post.isPinned, 'pinned'],
            [post.isReply, 'reply'],
            [post.isQuote, 'quote'],
            [post.isRepost, 'repost'],
        ];
        const kind = flags
            .filter(([set]) => set)
            .map(([, label]) => label)
            .join(',');
        postTable.push([
            post.postId,
            kind || 'post',
            truncate(post.text.replace(/\s+/g, ' '), 50),
            formatNumber(post.replyCount),
            formatNumber(post.repostCount),
            formatNumber(post.likeCount),
            post.viewCount === null ? '-' : formatNumber(post.viewCount),
        ]);
    }
    console.log(postTable.toString());
}

async function scrapeCommand(usernames: string[], options: ScrapeCommandOptions): Promise<void> {
    const scraperOptions = scraperOptionsFromConfig(config);
    if (!options.headless) {
        scraperOptions.headless = false;
    }

    if (!options.quiet) {
        console.log(chalk.blue(`Scraping ${usernames.length} profile(s)...`));
    }

    const results = await withScraper(
        (scraper) => scraper.scrapeMany(usernames, { forceRefresh: options.force, pacingMs: options.delay }),
        scraperOptions
    );
    const saved = await saveManyJson(results, options.output);

    if (options.quiet) {
        saved.forEach((filePath) => console.log(filePath));
    } else {
        printSummary(results);
        console.log(chalk.green(`Saved ${saved.length} file(s) to ${options.output}`));
    }

    if (results.some((result) => !result.success)) {
        process.exitCode = 1;
    }
}

async function infoCommand(username: string, options: InfoCommandOptions): Promise<void> {
    const result = await withScraper((scraper) => scraper.scrape(username, { forceRefresh: options.force }));
    printProfile(result, options.posts);
    if (!result.success) {
        process.exitCode = 1;
    }
}

async function cacheClearCommand(options: CacheClearOptions): Promise<void> {
    const user = options.user;
    await withScraper(async (scraper) => {
        if (user) {
            await scraper.invalidateCache(user);
            console.log(chalk.green(`Cache invalidated for @${user}`));
        } else {
            await scraper.clearCache();
            console.log(chalk.green('Cache cleared'));
        }
    });
}

function cacheInfoCommand(): void {
    const table = new Table();
    table.push(
        ['Backend', config.XSCRAPE_CACHE_BACKEND],
        ['TTL', `${config.XSCRAPE_CACHE_TTL_SECONDS}s`],
        ['File', config.XSCRAPE_CACHE_BACKEND === 'sqlite' ? config.XSCRAPE_CACHE_PATH : '-'],
        ['Redis', config.XSCRAPE_CACHE_BACKEND === 'redis' ? config.REDIS_URL : '-']
    );
    console.log(table.toString());
}

program.name('xscrape').description('Scrape X profiles and their recent posts').version('1.0.0');

program
    .command('scrape')
    .description('Scrape one or more profiles and save each result as JSON')
    .argument('<usernames...>', 'usernames, @handles or profile URLs')
    .option('-o, --output <dir>', 'Output directory', './output')
    .option('-f, --force', 'Bypass the cache')
    .option('--no-headless', 'Show the browser window')
    .option('-d, --delay <ms>', 'Pause between profiles', parseNonNegativeInt)
    .option('-q, --quiet', 'Only print the saved file paths')
    .action(scrapeCommand);

program
    .command('info')
    .description('Show a profile and its recent posts')
    .argument('<username>', 'username, @handle or profile URL')
    .option('-f, --force', 'Bypass the cache')
    .option('-p, --posts <count>', 'Number of posts to show', parseNonNegativeInt, POSTS_PREVIEW)
    .action(infoCommand);

const cacheCommand = program.command('cache').description('Inspect or clear the result cache');

cacheCommand
    .command('clear')
    .description('Clear cached results')
    .option('-u, --user <username>', 'Only clear this profile')
    .action(cacheClearCommand);

cacheCommand.command('info').description('Show the cache configuration').action(cacheInfoCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exit(1);
});
