/**
 * Normalizer
 * Pure conversions from page strings to typed values. Nothing here throws:
 * unparseable counts become 0 and unparseable dates become null.
 */

const COUNT_MULTIPLIERS: Record<string, number> = {
    K: 1_000,
    M: 1_000_000,
    B: 1_000_000_000,
};

const FULL_MONTHS = [
    'january', 'february', 'march', 'april', 'may', 'june',
    'july', 'august', 'september', 'october', 'november', 'december',
];

const SHORT_MONTHS = FULL_MONTHS.map((month) => month.slice(0, 3));

const ISO_WITH_ZONE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})$/i;
const RELATIVE_OFFSET = /^(\d+)([smhd])$/i;
const MONTH_DAY_YEAR = /^([a-z]{3})\s+(\d{1,2}),\s*(\d{4})$/i;
const MONTH_DAY = /^([a-z]{3})\s+(\d{1,2})$/i;

const UNIT_MS: Record<string, number> = {
    m: 60_000,
    h: 3_600_000,
    d: 86_400_000,
};

/**
 * Parse count strings like "1.2K", "1M", "500", "1,234".
 */
export function normalizeCount(raw: string | null | undefined): number {
    if (!raw) return 0;

    const clean = raw.replace(/[,\s]/g, '').toUpperCase();
    const match = clean.match(/^(\d*\.?\d+)([KMB])?$/);
    if (!match) return 0;

    const value = Number(match[1]);
    if (!Number.isFinite(value)) return 0;

    const multiplier = match[2] ? COUNT_MULTIPLIERS[match[2]] ?? 1 : 1;
    // toPrecision drops float noise before truncating (2.3 * 1000 === 2299.9999999999995)
    return Math.trunc(Number((value * multiplier).toPrecision(15)));
}

function monthIndex(name: string): number {
    const lower = name.toLowerCase();
    const full = FULL_MONTHS.indexOf(lower);
    if (full !== -1) return full;
    return SHORT_MONTHS.indexOf(lower);
}

function utcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month, day));
    // Reject rollovers such as "Feb 31"
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Parse "Joined March 2009" / "Joined Mar 2009" to the first of that month (UTC).
 */
export function parseJoinedDate(raw: string | null | undefined): Date | null {
    if (!raw) return null;

    const text = raw.replace(/^\s*joined\s+/i, '').trim();
    const match = text.match(/^([a-z]+)\s+(\d{4})$/i);
    if (!match) return null;

    const month = monthIndex(match[1]);
    if (month === -1) return null;

    return utcDate(Number(match[2]), month, 1);
}

/**
 * Parse a post timestamp.
 *
 * Accepted forms, in order: ISO-8601 with a zone suffix, relative offsets
 * ("45s", "5m", "2h", "3d"), "Mar 15, 2024", and "Mar 15" (year of `reference`).
 *
 * Relative offsets are resolved against `reference`, so the same raw string maps to
 * different instants for different references. Callers pass the fetch time to keep a
 * single extraction stable.
 */
export function parsePostTimestamp(raw: string | null | undefined, reference: Date = new Date()): Date | null {
    if (!raw) return null;

    const text = raw.trim();

    if (ISO_WITH_ZONE.test(text)) {
        const parsed = new Date(text);
        if (!Number.isNaN(parsed.getTime())) return parsed;
    }

    const relative = text.match(RELATIVE_OFFSET);
    if (relative) {
        const unit = relative[2].toLowerCase();
        if (unit === 's') {
            const now = new Date(reference.getTime());
            now.setUTCMilliseconds(0);
            return now;
        }
        return new Date(reference.getTime() - Number(relative[1]) * (UNIT_MS[unit] ?? 0));
    }

    const withYear = text.match(MONTH_DAY_YEAR);
    if (withYear) {
        const month = SHORT_MONTHS.indexOf(withYear[1].toLowerCase());
        if (month !== -1) return utcDate(Number(withYear[3]), month, Number(withYear[2]));
        return null;
    }

    const withoutYear = text.match(MONTH_DAY);
    if (withoutYear) {
        const month = SHORT_MONTHS.indexOf(withoutYear[1].toLowerCase());
        if (month !== -1) return utcDate(reference.getUTCFullYear(), month, Number(withoutYear[2]));
    }

    return null;
}
