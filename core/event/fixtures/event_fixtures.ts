/**
 * Builders for flat event records used across the test suites.
 */

import {
    EMPTY_KINFIT_CACHE,
    EMPTY_SVFIT_CACHE,
    FatJetRecord,
    JetRecord,
    LeptonRecord,
    PtEtaPhiE,
    RawEventRecord,
} from "../raw_event_record.js";

/** Loose, Medium and Tight pileup-id bits all set */
export const PU_ID_ALL = (1 << 1) | (1 << 2) | (1 << 3);

export interface JetParams {
    pt: number;
    eta?: number;
    phi?: number;
    /** DeepFlavour b score (bb and lepb stay 0) */
    tag?: number;
    deep_csv?: number;
    csv?: number;
    pu_id?: number;
    resolution?: number;
}

export function masslessP4(pt: number, eta = 0, phi = 0): PtEtaPhiE {
    return { pt, eta, phi, e: pt * Math.cosh(eta) };
}

export function makeJet(params: JetParams): JetRecord {
    return {
        p4: masslessP4(params.pt, params.eta ?? 0, params.phi ?? 0),
        csv: params.csv ?? 0,
        deep_csv_b_vs_all: params.deep_csv ?? 0,
        deep_flavour_b: params.tag ?? 0,
        deep_flavour_bb: 0,
        deep_flavour_lepb: 0,
        pu_id: params.pu_id ?? PU_ID_ALL,
        resolution: params.resolution ?? 0.1,
        hadron_flavour: 0,
    };
}

export function makeLepton(pt: number, eta: number, phi: number, m = 1.777): LeptonRecord {
    return {
        p4: { pt, eta, phi, m },
        charge: 1,
        iso: 0.1,
        type: 2,
        gen_match: 5,
        decay_mode: 1,
        id_bits: 0,
    };
}

export function makeFatJet(m_softdrop: number, sub_jets: PtEtaPhiE[]): FatJetRecord {
    const sum_pt = sub_jets.reduce((s, p) => s + p.pt, 0);
    return { p4: masslessP4(sum_pt, sub_jets[0]?.eta ?? 0, sub_jets[0]?.phi ?? 0), m_softdrop, sub_jets };
}

export function makeEvent(overrides: Partial<RawEventRecord> = {}): RawEventRecord {
    return {
        run: 1,
        lumi: 2,
        evt: 3,
        channel_id: 2,
        event_energy_scale: 0,
        rho: 20,
        jets: [],
        other_jets_p4: [],
        fat_jets: [],
        leptons: [makeLepton(45, 0.3, 0.5), makeLepton(38, -0.8, -2.4)],
        first_daughter_indexes: [0],
        second_daughter_indexes: [1],
        met: { p4: { pt: 30, eta: 0, phi: 1.2, m: 0 }, cov: [[100, 0], [0, 100]] },
        trigger_accepts: 0n,
        trigger_matches: [0n],
        kinfit_cache: EMPTY_KINFIT_CACHE,
        svfit_cache: EMPTY_SVFIT_CACHE,
        ...overrides,
    };
}

/**
 * Four jets: 0 and 1 are central b candidates, 2 and 3 forward VBF-like jets.
 * The second candidate's score is configurable to move it across the
 * Run2018 DeepFlavour medium working point (0.2770).
 */
export function fourJetEvent(second_tag = 0.8, overrides: Partial<RawEventRecord> = {}): RawEventRecord {
    return makeEvent({
        jets: [
            makeJet({ pt: 60, eta: 0.5, phi: 0, tag: 0.9 }),
            makeJet({ pt: 50, eta: -0.5, phi: 2, tag: second_tag }),
            makeJet({ pt: 40, eta: 3.0, phi: 1, tag: 0.1 }),
            makeJet({ pt: 35, eta: -3.0, phi: -2, tag: 0.05 }),
        ],
        ...overrides,
    });
}
