import { isValidPair, JetPair, pairContains, UNDEFINED_JET_PAIR } from "../event/jet_pair.js";

/**
 * Outcome of signal-jet selection.
 * A pair slot left at the sentinel means "not selected"; always test with
 * hasBjetPair / hasVbfPair rather than comparing to the sentinel.
 */
export interface SelectedSignalJets {
    readonly b_jet_pair: JetPair;
    readonly vbf_jet_pair: JetPair;
    readonly n_b_tagged: number;
}

export const NO_SIGNAL_JETS: SelectedSignalJets = Object.freeze({
    b_jet_pair: UNDEFINED_JET_PAIR,
    vbf_jet_pair: UNDEFINED_JET_PAIR,
    n_b_tagged: 0,
});

export function hasBjetPair(selected: SelectedSignalJets, n_jets: number): boolean {
    return isValidPair(selected.b_jet_pair, n_jets);
}

export function hasVbfPair(selected: SelectedSignalJets, n_jets: number): boolean {
    return isValidPair(selected.vbf_jet_pair, n_jets);
}

export function isSelectedBjet(selected: SelectedSignalJets, index: number): boolean {
    return pairContains(selected.b_jet_pair, index);
}

export function isSelectedVbfJet(selected: SelectedSignalJets, index: number): boolean {
    return pairContains(selected.vbf_jet_pair, index);
}
