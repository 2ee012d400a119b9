/**
 * RawEventRecord: flat, already-reconstructed event as written by the
 * upstream tuple producer. Field names follow the stored branch names.
 * Records are read-only for the whole lifetime of any view built on them.
 */

import { EventEnergyScale } from "../analysis_types.js";

export interface PtEtaPhiE {
    readonly pt: number;
    readonly eta: number;
    readonly phi: number;
    readonly e: number;
}

export interface PtEtaPhiM {
    readonly pt: number;
    readonly eta: number;
    readonly phi: number;
    readonly m: number;
}

export interface JetRecord {
    readonly p4: PtEtaPhiE;
    readonly csv: number;
    readonly deep_csv_b_vs_all: number;
    readonly deep_flavour_b: number;
    readonly deep_flavour_bb: number;
    readonly deep_flavour_lepb: number;
    /** Pileup-id bits: Loose = 1 << 1, Medium = 1 << 2, Tight = 1 << 3 */
    readonly pu_id: number;
    /** Relative energy resolution */
    readonly resolution: number;
    readonly hadron_flavour: number;
}

export interface FatJetRecord {
    readonly p4: PtEtaPhiE;
    readonly m_softdrop: number;
    readonly sub_jets: readonly PtEtaPhiE[];
}

export interface LeptonRecord {
    readonly p4: PtEtaPhiM;
    readonly charge: number;
    readonly iso: number;
    readonly type: number;
    readonly gen_match: number;
    readonly decay_mode: number;
    readonly id_bits: number;
}

export interface MetRecord {
    readonly p4: PtEtaPhiM;
    /** Row-major 2x2 covariance [[xx, xy], [yx, yy]] */
    readonly cov: readonly [readonly [number, number], readonly [number, number]];
}

/** Parallel arrays of kinematic-fit results already computed upstream. */
export interface KinFitCache {
    readonly jet_pair_id: readonly number[];
    readonly convergence: readonly number[];
    readonly chi2: readonly number[];
    readonly mass: readonly number[];
}

/** Parallel arrays of SVfit results, one entry per signal hypothesis fitted upstream. */
export interface SvfitCache {
    readonly htt_index: readonly number[];
    readonly is_valid: readonly boolean[];
    readonly p4: readonly PtEtaPhiM[];
    readonly mt: readonly number[];
}

export interface RawEventRecord {
    readonly run: number;
    readonly lumi: number;
    readonly evt: number;
    readonly channel_id: number;
    readonly event_energy_scale: EventEnergyScale;
    readonly rho: number;

    readonly jets: readonly JetRecord[];
    readonly other_jets_p4: readonly PtEtaPhiE[];
    readonly fat_jets: readonly FatJetRecord[];
    readonly leptons: readonly LeptonRecord[];
    readonly first_daughter_indexes: readonly number[];
    readonly second_daughter_indexes: readonly number[];
    readonly met: MetRecord;

    readonly trigger_accepts: bigint;
    readonly trigger_matches: readonly bigint[];

    readonly kinfit_cache: KinFitCache;
    readonly svfit_cache: SvfitCache;
}

export const EMPTY_KINFIT_CACHE: KinFitCache = Object.freeze({
    jet_pair_id: [],
    convergence: [],
    chi2: [],
    mass: [],
});

export const EMPTY_SVFIT_CACHE: SvfitCache = Object.freeze({
    htt_index: [],
    is_valid: [],
    p4: [],
    mt: [],
});
