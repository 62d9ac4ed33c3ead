import { describe, expect, it } from 'vitest';
import { errors as playwrightErrors } from 'playwright';
import { FetchError, PageBlockedError, ProfileNotFoundError } from '../../lib/errors.js';
import { fetchFailureFromError } from '../fetcher.js';

describe('fetchFailureFromError', () => {
    it('keeps not-found and blocked apart', () => {
        expect(fetchFailureFromError(new ProfileNotFoundError('Profile @ghost not found'))).toEqual({
            html: '',
            success: false,
            error: 'Profile @ghost not found',
            status: 404,
            reason: 'not_found',
        });
        expect(fetchFailureFromError(new PageBlockedError('Blocked or rate limited (HTTP 429)', 429))).toEqual({
            html: '',
            success: false,
            error: 'Blocked or rate limited (HTTP 429)',
            status: 429,
            reason: 'blocked',
        });
    });

    it('classifies other HTTP failures', () => {
        expect(fetchFailureFromError(new FetchError('HTTP 500', 500))).toMatchObject({ status: 500, reason: 'http' });
    });

    it('classifies browser failures as transport errors', () => {
        expect(fetchFailureFromError(new playwrightErrors.TimeoutError('navigation took too long'))).toMatchObject({
            error: 'Timeout: navigation took too long',
            reason: 'transport',
        });
        expect(fetchFailureFromError(new Error('Target closed'))).toMatchObject({
            error: 'Browser error: Target closed',
            reason: 'transport',
        });
    });

    it('handles non-Error throws', () => {
        expect(fetchFailureFromError('boom')).toEqual({
            html: '',
            success: false,
            error: 'Unexpected error: boom',
            reason: 'unknown',
        });
    });
});
