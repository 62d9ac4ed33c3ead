import { describe, expect, it } from 'vitest';
import { ProxyRotator } from '../proxy-rotator.js';

const POOL = ['http://proxy-a:8080', 'http://proxy-b:8080', 'http://proxy-c:8080'];

describe('ProxyRotator', () => {
    it('cycles through the pool in round-robin mode', () => {
        const rotator = new ProxyRotator(POOL, 'round_robin');

        const picks = Array.from({ length: 4 }, () => rotator.next());

        expect(picks).toEqual([POOL[0], POOL[1], POOL[2], POOL[0]]);
    });

    it('picks by the random source in random mode', () => {
        const values = [0.99, 0, 0.5];
        const rotator = new ProxyRotator(POOL, 'random', () => values.shift() ?? 0);

        expect([rotator.next(), rotator.next(), rotator.next()]).toEqual([POOL[2], POOL[0], POOL[1]]);
    });

    it('returns nothing when disabled or empty', () => {
        expect(new ProxyRotator(POOL, 'none').next()).toBeUndefined();
        expect(new ProxyRotator([], 'round_robin').next()).toBeUndefined();
        expect(new ProxyRotator([], 'random').next()).toBeUndefined();
    });

    it('is not affected by later changes to the source list', () => {
        const source = [...POOL];
        const rotator = new ProxyRotator(source, 'round_robin');
        source.length = 0;

        expect(rotator.size).toBe(3);
        expect(rotator.next()).toBe(POOL[0]);
    });
});
