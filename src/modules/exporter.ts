/**
 * Exporter
 * JSON (de)serialization of scrape results and file export helpers.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ScrapeResultSchema, type PostRecord, type ProfileRecord, type ScrapeResult } from '../types/index.js';

export interface MergedExport {
    exportedAt: string;
    profilesCount: number;
    postsCount: number;
    profiles: ProfileRecord[];
    posts: Array<PostRecord & { _username: string | null }>;
}

export function serializeResult(result: ScrapeResult, indent?: number): string {
    return JSON.stringify(result, null, indent);
}

/**
 * Parse and validate a serialized result. Dates come back as Date objects.
 */
export function deserializeResult(json: string): ScrapeResult {
    return ScrapeResultSchema.parse(JSON.parse(json));
}

export function toJson(result: ScrapeResult, indent = 2): string {
    return serializeResult(result, indent);
}

export async function saveJson(result: ScrapeResult, filePath: string, indent = 2): Promise<string> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, toJson(result, indent), 'utf8');
    return filePath;
}

/**
 * Write one file per result that has a profile. `{username}` in the template is replaced.
 */
export async function saveManyJson(
    results: ScrapeResult[],
    outputDir: string,
    filenameTemplate = '{username}.json'
): Promise<string[]> {
    await mkdir(outputDir, { recursive: true });

    const saved: string[] = [];
    for (const result of results) {
        if (!result.profile) continue;
        const filePath = join(outputDir, filenameTemplate.replaceAll('{username}', result.profile.username));
        saved.push(await saveJson(result, filePath));
    }
    return saved;
}

export async function loadJson(filePath: string): Promise<ScrapeResult> {
    return deserializeResult(await readFile(filePath, 'utf8'));
}

export function mergeResults(results: ScrapeResult[]): MergedExport {
    const profiles: ProfileRecord[] = [];
    const posts: MergedExport['posts'] = [];

    for (const result of results) {
        if (result.profile) profiles.push(result.profile);
        for (const post of result.posts) {
            posts.push({ ...post, _username: result.profile?.username ?? null });
        }
    }

    return {
        exportedAt: new Date().toISOString(),
        profilesCount: profiles.length,
        postsCount: posts.length,
        profiles,
        posts,
    };
}
