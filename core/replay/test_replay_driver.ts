import { describe, expect, it } from "vitest";
import { Channel, JetOrdering, Period, UncertaintyScale } from "../analysis_types.js";
import { EventViewErrorCode } from "../errors/event_view_error.js";
import { catchViewError } from "../errors/fixtures/catch_view_error.js";
import { fourJetEvent, makeEvent, makeJet } from "../event/fixtures/event_fixtures.js";
import { SummaryInfo } from "../summary/summary_info.js";
import { JecUncertaintyTable } from "../summary/jec_uncertainty_table.js";
import { TriggerDescriptorTable } from "../trigger/trigger_descriptors.js";
import { parseShiftArgument, ReplayContext, runEventReplay } from "./replay_driver.js";

const CONTEXT: ReplayContext = {
    period: Period.Run2018,
    jet_ordering: JetOrdering.DeepFlavour,
    hypothesis_index: 0,
};

const FLAT_JEC = new JecUncertaintyTable({
    sources: { Total: { abs_eta_edges: [0, 5], pt_edges: [0, 1000], values: [[0.1]] } },
});

describe("runEventReplay", () => {
    it("summarizes each event and counts outcomes", () => {
        const records = [
            fourJetEvent(0.8),
            makeEvent({ evt: 4, jets: [makeJet({ pt: 60, tag: 0.9 })] }),
            makeEvent({ evt: 5, channel_id: 9 }),
        ];

        const { summaries, metrics } = runEventReplay(records, CONTEXT);

        expect(summaries[0]).toMatchObject({
            event_id: "1:2:3",
            n_jets: 4,
            n_b_tagged: 2,
            b_jet_pair: [0, 1],
            vbf_jet_pair: [2, 3],
            error_code: null,
        });
        expect(summaries[0].ht).toBeCloseTo(75, 9);
        expect(summaries[1]).toMatchObject({ b_jet_pair: null, vbf_jet_pair: null, m_bb: null, n_b_tagged: 1 });
        expect(summaries[2]).toEqual({
            event_id: "1:2:5",
            n_jets: 0,
            n_b_tagged: 0,
            b_jet_pair: null,
            vbf_jet_pair: null,
            ht: null,
            m_bb: null,
            error_code: EventViewErrorCode.INVALID_RECORD,
        });
        expect(metrics).toEqual({
            events: 3,
            with_b_jet_pair: 1,
            with_vbf_jet_pair: 1,
            errors_by_code: { [EventViewErrorCode.INVALID_RECORD]: 1 },
        });
    });

    it("builds shifted views when a shift is requested", () => {
        const summary = new SummaryInfo(
            new Map([[Channel.TauTau, new TriggerDescriptorTable()]]),
            FLAT_JEC.asProvider()
        );
        const record = fourJetEvent(0.8);

        const [nominal] = runEventReplay([record], { ...CONTEXT, summary }).summaries;
        const [shifted] = runEventReplay([record], {
            ...CONTEXT,
            summary,
            shift: { source: "Total", scale: UncertaintyScale.Up },
        }).summaries;

        expect(shifted.b_jet_pair).toEqual(nominal.b_jet_pair);
        expect(shifted.m_bb).toBeCloseTo(1.1 * (nominal.m_bb ?? 0), 9);
        expect(shifted.ht).toBeCloseTo(1.1 * (nominal.ht ?? 0), 9);
    });

    it("records a missing summary as a per-event failure", () => {
        const { summaries, metrics } = runEventReplay([fourJetEvent()], {
            ...CONTEXT,
            shift: { source: "Total", scale: UncertaintyScale.Down },
        });

        expect(summaries[0].error_code).toBe(EventViewErrorCode.MISSING_METADATA);
        expect(metrics.errors_by_code).toEqual({ [EventViewErrorCode.MISSING_METADATA]: 1 });
    });
});

describe("parseShiftArgument", () => {
    it("returns undefined without the flag", () => {
        expect(parseShiftArgument(["--verbose"])).toBeUndefined();
    });

    it("parses source and direction", () => {
        expect(parseShiftArgument(["--shift", "FlavorQCD:down"])).toEqual({
            source: "FlavorQCD",
            scale: UncertaintyScale.Down,
        });
    });

    it("rejects malformed values", () => {
        expect(catchViewError(() => parseShiftArgument(["--shift", "Total"])).code).toBe(
            EventViewErrorCode.INVALID_CONFIGURATION
        );
        expect(catchViewError(() => parseShiftArgument(["--shift"])).code).toBe(
            EventViewErrorCode.INVALID_CONFIGURATION
        );
    });
});
