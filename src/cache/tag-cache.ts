/**
 * Process-lifetime tag cache keyed by headline link.
 *
 * Entries are never evicted; a key that once received tags (even an empty list)
 * is not generated again until `clear()`, which runs once at startup.
 */
import { tagCacheSize } from '../observability/metrics.js';

export class TagCache {
    private readonly entries = new Map<string, readonly string[]>();

    get(key: string): string[] | undefined {
        const tags = this.entries.get(key);
        return tags ? [...tags] : undefined;
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    set(key: string, tags: readonly string[]): void {
        this.entries.set(key, Object.freeze([...tags]));
        tagCacheSize.set(this.entries.size);
    }

    clear(): void {
        this.entries.clear();
        tagCacheSize.set(0);
    }

    get size(): number {
        return this.entries.size;
    }
}
