import { describe, expect, it } from "vitest";
import { DiscriminatorWP, JetOrdering, Period } from "../analysis_types.js";
import { EventViewErrorCode } from "../errors/event_view_error.js";
import { catchViewError } from "../errors/fixtures/catch_view_error.js";
import { makeJet } from "../event/fixtures/event_fixtures.js";
import { BTagger, discriminator } from "./b_tagger.js";
import { passEcalNoiseVeto, passMinimalPileupId, passPileupId } from "./jet_quality.js";

describe("BTagger", () => {
    it("sums the DeepFlavour b, bb and lepb outputs", () => {
        const jet = { ...makeJet({ pt: 40 }), deep_flavour_b: 0.5, deep_flavour_bb: 0.25, deep_flavour_lepb: 0.125 };
        expect(discriminator(jet, JetOrdering.DeepFlavour)).toBe(0.875);
        expect(new BTagger(Period.Run2017, JetOrdering.DeepFlavour).btag(jet)).toBe(0.875);
    });

    it("ranks by pt under Pt ordering but tests working points with DeepFlavour", () => {
        const tagger = new BTagger(Period.Run2018, JetOrdering.Pt);
        const jet = makeJet({ pt: 42, tag: 0.28 });

        expect(tagger.btag(jet)).toBe(42);
        expect(tagger.pass(jet)).toBe(true);
        expect(tagger.pass(makeJet({ pt: 42, tag: 0.27 }))).toBe(false);
    });

    it("uses the period's medium threshold by default", () => {
        const tagger = new BTagger(Period.Run2016, JetOrdering.DeepCSV);
        expect(tagger.threshold(DiscriminatorWP.Medium)).toBe(0.6321);
        expect(tagger.pass(makeJet({ pt: 30, deep_csv: 0.6321 }))).toBe(true);
        expect(tagger.pass(makeJet({ pt: 30, deep_csv: 0.6320 }))).toBe(false);
        expect(tagger.pass(makeJet({ pt: 30, deep_csv: 0.3 }), DiscriminatorWP.Loose)).toBe(true);
    });

    it("has period-dependent eta acceptance and a fixed pt cut", () => {
        expect(new BTagger(Period.Run2016, JetOrdering.DeepCSV).etaCut()).toBe(2.4);
        expect(new BTagger(Period.Run2018, JetOrdering.DeepCSV).etaCut()).toBe(2.5);
        expect(new BTagger(Period.Run2018, JetOrdering.DeepCSV).ptCut()).toBe(20);
    });

    it("rejects CSV for Run2018", () => {
        const error = catchViewError(() => new BTagger(Period.Run2018, JetOrdering.CSV));
        expect(error.code).toBe(EventViewErrorCode.INVALID_CONFIGURATION);
    });
});

describe("jet quality", () => {
    it("checks pileup-id bits per working point", () => {
        expect(passPileupId(1 << 1, DiscriminatorWP.Loose)).toBe(true);
        expect(passPileupId(1 << 1, DiscriminatorWP.Tight)).toBe(false);
        expect(passMinimalPileupId(2)).toBe(true);
        expect(passMinimalPileupId(1 << 3)).toBe(false);
    });

    it("vetoes soft Run2017 jets in the noisy endcap unless they pass tight pileup id", () => {
        const p4 = { pt: 30, eta: -2.9, phi: 0, e: 100 };
        expect(passEcalNoiseVeto(p4, Period.Run2017, 1 << 1)).toBe(false);
        expect(passEcalNoiseVeto(p4, Period.Run2017, 1 << 3)).toBe(true);
        expect(passEcalNoiseVeto(p4, Period.Run2018, 0)).toBe(true);
        expect(passEcalNoiseVeto({ ...p4, pt: 55 }, Period.Run2017, 0)).toBe(true);
        expect(passEcalNoiseVeto({ ...p4, eta: 3.2 }, Period.Run2017, 0)).toBe(true);
    });
});
