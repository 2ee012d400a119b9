import { PtEtaPhiE } from "../event/raw_event_record.js";

export interface JetInfo {
    readonly p4: PtEtaPhiE;
    /** Position of the jet in the record's jet collection */
    readonly index: number;
    readonly tag: number;
}

/**
 * Filter by pt >= pt_cut and |eta| < eta_cut, then order by tag descending.
 * Equal tags fall back to pt descending; anything still tied keeps input order.
 */
export function orderJets(jets: readonly JetInfo[], pt_cut: number, eta_cut: number): JetInfo[] {
    return jets
        .filter((jet) => jet.p4.pt >= pt_cut && Math.abs(jet.p4.eta) < eta_cut)
        .sort((a, b) => {
            if (a.tag !== b.tag) return b.tag - a.tag;
            return b.p4.pt - a.p4.pt;
        });
}
