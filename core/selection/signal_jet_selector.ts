import { JetOrdering, Period } from "../analysis_types.js";
import { BTagger } from "../btag/b_tagger.js";
import { JetInfo, orderJets } from "../btag/jet_ranker.js";
import { passEcalNoiseVeto, passMinimalPileupId } from "../btag/jet_quality.js";
import { JetPair, makeJetPair, pairContains, UNDEFINED_JET_INDEX, UNDEFINED_JET_PAIR } from "../event/jet_pair.js";
import { RawEventRecord } from "../event/raw_event_record.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";
import { SelectedSignalJets } from "./selected_signal_jets.js";

export const VBF_PT_CUT = 30;
export const VBF_ETA_CUT = 4.7;

/**
 * SignalJetSelector
 * Picks the b-jet pair and the VBF jet pair of one event.
 * Pure: depends only on the record, the period and the ordering.
 */
export function selectSignalJets(
    event: RawEventRecord,
    period: Period,
    jet_ordering: JetOrdering
): SelectedSignalJets {
    const tagger = new BTagger(period, jet_ordering);
    const bjet_pt_cut = tagger.ptCut();
    const bjet_eta_cut = tagger.etaCut();

    let bjet_first: number | undefined;
    let bjet_second: number | undefined;
    let vbf_pair: JetPair = UNDEFINED_JET_PAIR;

    const isClaimed = (n: number): boolean =>
        n === bjet_first || n === bjet_second || pairContains(vbf_pair, n);

    const createJetInfo = (use_btag: boolean): JetInfo[] => {
        const infos: JetInfo[] = [];
        event.jets.forEach((jet, n) => {
            if (isClaimed(n)) return;
            if (!passEcalNoiseVeto(jet.p4, period, jet.pu_id)) return;
            if (!passMinimalPileupId(jet.pu_id)) return;
            const tag = use_btag ? tagger.btag(jet) : jet.p4.pt;
            infos.push({ p4: jet.p4, index: n, tag });
        });
        return infos;
    };

    // 1-2. Rank b-jet candidates; the leader takes the first slot
    const bjets_ordered = orderJets(createJetInfo(true), bjet_pt_cut, bjet_eta_cut);
    const n_b_tagged = bjets_ordered.length;
    if (bjets_ordered.length >= 1) {
        bjet_first = bjets_ordered[0].index;
    }

    // 3. Runner-up only if it passes the medium working point on its own
    if (bjets_ordered.length >= 2 && tagger.pass(event.jets[bjets_ordered[1].index])) {
        bjet_second = bjets_ordered[1].index;
    }

    // 4. VBF pair: highest dijet mass among pt-ranked non-b candidates
    vbf_pair = selectVbfPair(event, orderJets(createJetInfo(false), VBF_PT_CUT, VBF_ETA_CUT));

    // A lone first b-jet keeps its slot; the pair stays invalid but still claims the jet
    const build = (): SelectedSignalJets => Object.freeze({
        b_jet_pair: bjet_first === undefined
            ? UNDEFINED_JET_PAIR
            : makeJetPair(bjet_first, bjet_second ?? UNDEFINED_JET_INDEX),
        vbf_jet_pair: vbf_pair,
        n_b_tagged,
    });

    // 5. Both b-jets found
    if (bjet_first !== undefined && bjet_second !== undefined) return build();

    // 6. Second b-jet from what the first b-jet and the VBF pair left over
    const new_bjets_ordered = orderJets(createJetInfo(true), bjet_pt_cut, bjet_eta_cut);
    if (new_bjets_ordered.length >= 1) {
        bjet_second = new_bjets_ordered[0].index;
    } else {
        vbf_pair = UNDEFINED_JET_PAIR;
        if (bjets_ordered.length >= 2) {
            bjet_second = bjets_ordered[1].index;
        }
    }
    return build();
}

/**
 * Pair of ranked candidates with the strictly greatest invariant mass.
 * Ties keep the first pair in rank order.
 */
export function selectVbfPair(event: RawEventRecord, vbf_jets_ordered: readonly JetInfo[]): JetPair {
    let max_mjj = -Infinity;
    let best: JetPair = UNDEFINED_JET_PAIR;
    const p4s = vbf_jets_ordered.map((info) => {
        const p4 = event.jets[info.index].p4;
        return LorentzVector.fromPtEtaPhiE(p4.pt, p4.eta, p4.phi, p4.e);
    });

    for (let n = 0; n < vbf_jets_ordered.length; n++) {
        for (let h = n + 1; h < vbf_jets_ordered.length; h++) {
            const mjj = p4s[n].add(p4s[h]).mass();
            if (mjj > max_mjj) {
                max_mjj = mjj;
                best = makeJetPair(vbf_jets_ordered[n].index, vbf_jets_ordered[h].index);
            }
        }
    }
    return best;
}
