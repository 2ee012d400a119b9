import { invalidIndex } from "../errors/event_view_error.js";

/**
 * Unordered pair of jet indices. The undefined sentinel holds the same value
 * in both slots, so it never passes the distinctness check.
 */
export interface JetPair {
    readonly first: number;
    readonly second: number;
}

/** Value of an unfilled pair slot. */
export const UNDEFINED_JET_INDEX = Number.MAX_SAFE_INTEGER;

export const UNDEFINED_JET_PAIR: JetPair = Object.freeze({ first: UNDEFINED_JET_INDEX, second: UNDEFINED_JET_INDEX });

export function makeJetPair(first: number, second: number): JetPair {
    return Object.freeze({ first, second });
}

export function isValidPair(pair: JetPair, n_jets: number): boolean {
    return pair.first !== pair.second && pair.first < n_jets && pair.second < n_jets;
}

export function pairContains(pair: JetPair, index: number): boolean {
    return pair.first === index || pair.second === index;
}

export function pairGet(pair: JetPair, position: number): number {
    if (position === 1) return pair.first;
    if (position === 2) return pair.second;
    throw invalidIndex(`Invalid pair position = ${position}.`, { position });
}

/**
 * Combination index of an unordered pair among n jets:
 * (0,1)=0, (0,2)=1, ..., (0,n-1)=n-2, (1,2)=n-1, ...
 * Used as the key of the upstream kinematic-fit cache.
 */
export function jetPairToIndex(pair: JetPair, n_jets: number): number {
    if (!isValidPair(pair, n_jets)) {
        throw invalidIndex(`Pair (${pair.first}, ${pair.second}) is not a valid pair of ${n_jets} jets.`, {
            first: pair.first,
            second: pair.second,
            n_jets,
        });
    }
    const lo = Math.min(pair.first, pair.second);
    const hi = Math.max(pair.first, pair.second);
    return (lo * (2 * n_jets - lo - 1)) / 2 + (hi - lo - 1);
}

export function jetPairFromIndex(index: number, n_jets: number): JetPair {
    const n_pairs = (n_jets * (n_jets - 1)) / 2;
    if (!Number.isInteger(index) || index < 0 || index >= n_pairs) {
        throw invalidIndex(`Pair index ${index} is out of range for ${n_jets} jets.`, { index, n_jets });
    }
    let remaining = index;
    let lo = 0;
    while (remaining >= n_jets - lo - 1) {
        remaining -= n_jets - lo - 1;
        lo++;
    }
    return makeJetPair(lo, lo + 1 + remaining);
}
