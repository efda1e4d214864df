/**
 * Session-lifetime set of emitted record identifiers.
 */
export class Deduplicator {
    private readonly seen: Set<string>;

    constructor(initial: Iterable<string> = []) {
        this.seen = new Set(initial);
    }

    has(id: string): boolean {
        return this.seen.has(id);
    }

    /**
     * Returns false when the id was already seen.
     */
    markSeen(id: string): boolean {
        if (this.seen.has(id)) {
            return false;
        }
        this.seen.add(id);
        return true;
    }

    get size(): number {
        return this.seen.size;
    }

    /**
     * Insertion-ordered copy for checkpoints.
     */
    snapshot(): string[] {
        return Array.from(this.seen);
    }
}
