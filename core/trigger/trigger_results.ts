import { invalidIndex, missingMetadata } from "../errors/event_view_error.js";
import { MAX_TRIGGER_PATHS, TriggerDescriptorTable } from "./trigger_descriptors.js";

/**
 * TriggerResults
 * Per-event accept/match masks, combined with the channel's descriptor table
 * when path names are queried.
 */
export class TriggerResults {
    readonly accept_bits: bigint;
    readonly match_bits: bigint;
    readonly #descriptors?: TriggerDescriptorTable;

    constructor(accept_bits: bigint, match_bits: bigint, descriptors?: TriggerDescriptorTable) {
        this.accept_bits = accept_bits;
        this.match_bits = match_bits;
        this.#descriptors = descriptors;
    }

    hasDescriptors(): boolean {
        return this.#descriptors !== undefined;
    }

    getDescriptors(): TriggerDescriptorTable {
        if (!this.#descriptors) {
            throw missingMetadata("Trigger descriptors are not set for this event.");
        }
        return this.#descriptors;
    }

    accept(index: number): boolean {
        return testBit(this.accept_bits, this.checkIndex(index));
    }

    match(index: number): boolean {
        return testBit(this.match_bits, this.checkIndex(index));
    }

    acceptAndMatch(index: number): boolean {
        return this.accept(index) && this.match(index);
    }

    anyAccept(path_names: readonly string[]): boolean {
        return this.resolve(path_names).some((n) => this.accept(n));
    }

    anyAcceptAndMatch(path_names: readonly string[]): boolean {
        return this.resolve(path_names).some((n) => this.acceptAndMatch(n));
    }

    /** Patterns of every accepted path, in table order. */
    acceptedPatterns(): string[] {
        const descriptors = this.getDescriptors();
        const accepted: string[] = [];
        for (let n = 0; n < descriptors.size; n++) {
            if (this.accept(n)) accepted.push(descriptors.patternAt(n));
        }
        return accepted;
    }

    private resolve(path_names: readonly string[]): number[] {
        const descriptors = this.getDescriptors();
        const indexes = new Set<number>();
        for (const name of path_names) {
            for (const n of descriptors.findPathIndexes(name)) indexes.add(n);
        }
        return [...indexes].sort((a, b) => a - b);
    }

    private checkIndex(index: number): number {
        const limit = this.#descriptors ? this.#descriptors.size : MAX_TRIGGER_PATHS;
        if (!Number.isInteger(index) || index < 0 || index >= limit) {
            throw invalidIndex(`Trigger index ${index} is out of range.`, { index, limit });
        }
        return index;
    }
}

function testBit(bits: bigint, index: number): boolean {
    return ((bits >> BigInt(index)) & 1n) === 1n;
}
