import type { ProxyMode } from '../config.js';

/**
 * Picks a proxy per fetch from a fixed pool.
 *
 * `next()` is synchronous: the read and increment of the round-robin counter happen
 * in one turn of the event loop, so concurrent scrapes never observe the same value.
 */
export class ProxyRotator {
    private readonly proxies: readonly string[];
    private readonly mode: ProxyMode;
    private readonly random: () => number;
    private index = 0;

    constructor(proxies: readonly string[], mode: ProxyMode = 'random', random: () => number = Math.random) {
        this.proxies = [...proxies];
        this.mode = mode;
        this.random = random;
    }

    get size(): number {
        return this.proxies.length;
    }

    next(): string | undefined {
        if (this.proxies.length === 0 || this.mode === 'none') return undefined;

        if (this.mode === 'round_robin') {
            const proxy = this.proxies[this.index];
            this.index = (this.index + 1) % this.proxies.length;
            return proxy;
        }

        return this.proxies[Math.floor(this.random() * this.proxies.length)];
    }
}
