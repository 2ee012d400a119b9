import { invalidIndex } from "../errors/event_view_error.js";

/** The accept/match masks are 64 bits wide. */
export const MAX_TRIGGER_PATHS = 64;

/**
 * Ordered trigger-path patterns for one channel. Position n in the table is
 * bit n of the per-event accept and match masks.
 */
export class TriggerDescriptorTable {
    readonly #patterns: string[] = [];
    readonly #regexes: RegExp[] = [];

    constructor(patterns: readonly string[] = []) {
        for (const pattern of patterns) {
            this.add(pattern);
        }
    }

    add(pattern: string): number {
        if (this.#patterns.length >= MAX_TRIGGER_PATHS) {
            throw invalidIndex(`Descriptor table is full (${MAX_TRIGGER_PATHS} paths).`, { pattern });
        }
        this.#patterns.push(pattern);
        this.#regexes.push(new RegExp(pattern));
        return this.#patterns.length - 1;
    }

    get size(): number {
        return this.#patterns.length;
    }

    patternAt(index: number): string {
        if (!Number.isInteger(index) || index < 0 || index >= this.#patterns.length) {
            throw invalidIndex(`Trigger index ${index} is out of range.`, { index, size: this.size });
        }
        return this.#patterns[index];
    }

    patterns(): readonly string[] {
        return [...this.#patterns];
    }

    /** Positions of every pattern that matches the given path name. */
    findPathIndexes(path_name: string): number[] {
        const indexes: number[] = [];
        this.#regexes.forEach((regex, n) => {
            if (regex.test(path_name)) indexes.push(n);
        });
        return indexes;
    }
}
