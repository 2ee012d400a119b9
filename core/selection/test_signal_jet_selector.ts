import { describe, expect, it } from "vitest";
import { JetOrdering, Period } from "../analysis_types.js";
import { JetInfo } from "../btag/jet_ranker.js";
import { isValidPair, makeJetPair, UNDEFINED_JET_INDEX, UNDEFINED_JET_PAIR } from "../event/jet_pair.js";
import { fourJetEvent, makeEvent, makeJet } from "../event/fixtures/event_fixtures.js";
import { RawEventRecord } from "../event/raw_event_record.js";
import { hasBjetPair, hasVbfPair, isSelectedBjet } from "./selected_signal_jets.js";
import { selectSignalJets, selectVbfPair } from "./signal_jet_selector.js";

function select(event: RawEventRecord, period = Period.Run2018) {
    return selectSignalJets(event, period, JetOrdering.DeepFlavour);
}

describe("selectSignalJets", () => {
    it("takes the two leading b candidates when the runner-up passes the medium working point", () => {
        const result = select(fourJetEvent(0.8));

        expect(result.b_jet_pair).toEqual(makeJetPair(0, 1));
        expect(result.vbf_jet_pair).toEqual(makeJetPair(2, 3));
        expect(result.n_b_tagged).toBe(2);
    });

    it("keeps the VBF pair and refills the second b slot when the runner-up fails the working point", () => {
        // jet 1 joins the VBF candidates, but (2,3) has the largest dijet mass
        const result = select(fourJetEvent(0.2));

        expect(result.vbf_jet_pair).toEqual(makeJetPair(2, 3));
        expect(result.b_jet_pair).toEqual(makeJetPair(0, 1));
        expect(result.n_b_tagged).toBe(2);
    });

    it("drops the VBF pair and falls back to the runner-up when nothing is left for the second b slot", () => {
        const event = makeEvent({
            jets: [
                makeJet({ pt: 60, eta: 0.5, phi: 0, tag: 0.9 }),
                makeJet({ pt: 50, eta: -0.5, phi: 2, tag: 0.2 }),
                makeJet({ pt: 40, eta: 3.0, phi: 1, tag: 0.1 }),
            ],
        });

        const result = select(event);

        expect(result.b_jet_pair).toEqual(makeJetPair(0, 1));
        expect(result.vbf_jet_pair).toBe(UNDEFINED_JET_PAIR);
        expect(hasVbfPair(result, 3)).toBe(false);
    });

    it("keeps a lone b candidate in the first slot without forming a pair", () => {
        const event = makeEvent({ jets: [makeJet({ pt: 60, eta: 0.5, tag: 0.9 })] });

        const result = select(event);

        expect(result.n_b_tagged).toBe(1);
        expect(result.b_jet_pair).toEqual(makeJetPair(0, UNDEFINED_JET_INDEX));
        expect(hasBjetPair(result, 1)).toBe(false);
        expect(result.vbf_jet_pair).toBe(UNDEFINED_JET_PAIR);
    });

    it("still claims the lone b candidate when a forward jet cannot fill the second slot", () => {
        const event = makeEvent({
            jets: [
                makeJet({ pt: 60, eta: 0.5, phi: 0, tag: 0.9 }),
                makeJet({ pt: 40, eta: 3.2, phi: 1, tag: 0.1 }),
            ],
        });

        const result = select(event);

        expect(result.b_jet_pair).toEqual(makeJetPair(0, UNDEFINED_JET_INDEX));
        expect(hasBjetPair(result, 2)).toBe(false);
        expect(isSelectedBjet(result, 0)).toBe(true);
        expect(isSelectedBjet(result, 1)).toBe(false);
    });

    it("reports zero b-tagged jets when nothing passes the ranking cuts", () => {
        const event = makeEvent({
            jets: [
                makeJet({ pt: 15, eta: 0.1, tag: 0.9 }),
                makeJet({ pt: 80, eta: 2.6, tag: 0.9 }),
            ],
        });

        const result = select(event);

        expect(result.n_b_tagged).toBe(0);
        expect(result.b_jet_pair).toBe(UNDEFINED_JET_PAIR);
    });

    it("ignores jets without the minimal pileup-id bit", () => {
        const event = fourJetEvent(0.8, {});
        const jets = [...event.jets];
        jets[0] = { ...jets[0], pu_id: 0 };

        const result = select({ ...event, jets });

        // jet 1 leads, jet 2/3 are outside the b eta acceptance
        expect(result.n_b_tagged).toBe(1);
        expect(result.b_jet_pair.first).not.toBe(0);
        expect(result.b_jet_pair.second).not.toBe(0);
        expect(result.vbf_jet_pair.first).not.toBe(0);
        expect(result.vbf_jet_pair.second).not.toBe(0);
    });

    it("applies the Run2017 noise veto to soft forward jets without tight pileup id", () => {
        const loose_only = 1 << 1;
        const event = makeEvent({
            jets: [
                makeJet({ pt: 60, eta: 0.5, tag: 0.9 }),
                makeJet({ pt: 55, eta: -0.4, phi: 2, tag: 0.85 }),
                makeJet({ pt: 45, eta: 2.8, phi: 1, pu_id: loose_only }),
                makeJet({ pt: 40, eta: -3.5, phi: -2 }),
            ],
        });

        expect(select(event, Period.Run2018).vbf_jet_pair).toEqual(makeJetPair(2, 3));
        expect(select(event, Period.Run2017).vbf_jet_pair).toBe(UNDEFINED_JET_PAIR);
    });

    it("always yields distinct in-range indices for defined pairs", () => {
        for (const second_tag of [0.05, 0.2, 0.5, 0.95]) {
            const event = fourJetEvent(second_tag);
            const result = select(event);
            for (const pair of [result.b_jet_pair, result.vbf_jet_pair]) {
                if (pair === UNDEFINED_JET_PAIR) continue;
                expect(isValidPair(pair, event.jets.length)).toBe(true);
            }
        }
    });
});

describe("selectVbfPair", () => {
    const event = makeEvent({
        jets: [
            makeJet({ pt: 50, eta: 2, phi: 0 }),
            makeJet({ pt: 50, eta: 0, phi: 1 }),
            makeJet({ pt: 50, eta: 0, phi: -1 }),
        ],
    });
    const info = (index: number): JetInfo => ({ p4: event.jets[index].p4, index, tag: 50 });

    it("keeps the first pair in rank order when masses tie", () => {
        expect(selectVbfPair(event, [info(0), info(1), info(2)])).toEqual(makeJetPair(0, 1));
        expect(selectVbfPair(event, [info(0), info(2), info(1)])).toEqual(makeJetPair(0, 2));
    });

    it("is deterministic for identical inputs", () => {
        const ranked = [info(0), info(1), info(2)];
        expect(selectVbfPair(event, ranked)).toEqual(selectVbfPair(event, ranked));
    });

    it("returns the sentinel with fewer than two candidates", () => {
        expect(selectVbfPair(event, [info(0)])).toBe(UNDEFINED_JET_PAIR);
        expect(selectVbfPair(event, [])).toBe(UNDEFINED_JET_PAIR);
    });
});
