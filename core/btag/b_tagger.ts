import { DiscriminatorWP, JetOrdering, Period } from "../analysis_types.js";
import { invalidConfiguration } from "../errors/event_view_error.js";
import { JetRecord } from "../event/raw_event_record.js";

type Tagger = Exclude<JetOrdering, JetOrdering.Pt>;
type WorkingPoints = Readonly<Record<DiscriminatorWP, number>>;

/**
 * Discriminator thresholds per period and tagger.
 * CSV was not calibrated for Run2018.
 */
const WORKING_POINTS: Readonly<Record<Period, Partial<Record<Tagger, WorkingPoints>>>> = Object.freeze({
    [Period.Run2016]: {
        [JetOrdering.CSV]: { Loose: 0.5426, Medium: 0.8484, Tight: 0.9535 },
        [JetOrdering.DeepCSV]: { Loose: 0.2217, Medium: 0.6321, Tight: 0.8953 },
        [JetOrdering.DeepFlavour]: { Loose: 0.0614, Medium: 0.3093, Tight: 0.7221 },
    },
    [Period.Run2017]: {
        [JetOrdering.CSV]: { Loose: 0.5803, Medium: 0.8838, Tight: 0.9693 },
        [JetOrdering.DeepCSV]: { Loose: 0.1522, Medium: 0.4941, Tight: 0.8001 },
        [JetOrdering.DeepFlavour]: { Loose: 0.0521, Medium: 0.3033, Tight: 0.7489 },
    },
    [Period.Run2018]: {
        [JetOrdering.DeepCSV]: { Loose: 0.1241, Medium: 0.4184, Tight: 0.7527 },
        [JetOrdering.DeepFlavour]: { Loose: 0.0494, Medium: 0.2770, Tight: 0.7264 },
    },
});

const BJET_PT_CUT = 20;
const BJET_ETA_CUT: Readonly<Record<Period, number>> = Object.freeze({
    [Period.Run2016]: 2.4,
    [Period.Run2017]: 2.5,
    [Period.Run2018]: 2.5,
});

export function discriminator(jet: JetRecord, tagger: Tagger): number {
    switch (tagger) {
        case JetOrdering.CSV:
            return jet.csv;
        case JetOrdering.DeepCSV:
            return jet.deep_csv_b_vs_all;
        case JetOrdering.DeepFlavour:
            return jet.deep_flavour_b + jet.deep_flavour_bb + jet.deep_flavour_lepb;
    }
}

/**
 * BTagger
 * Stateless tagging policy for one (period, ordering) combination.
 * Pt ordering ranks jets by transverse momentum but still evaluates
 * working points with DeepFlavour.
 */
export class BTagger {
    readonly period: Period;
    readonly ordering: JetOrdering;
    readonly #tagger: Tagger;
    readonly #working_points: WorkingPoints;

    constructor(period: Period, ordering: JetOrdering) {
        this.period = period;
        this.ordering = ordering;
        this.#tagger = ordering === JetOrdering.Pt ? JetOrdering.DeepFlavour : ordering;

        const working_points = WORKING_POINTS[period][this.#tagger];
        if (!working_points) {
            throw invalidConfiguration(`${ordering} b tagging is not supported for ${period}.`, {
                period,
                ordering,
            });
        }
        this.#working_points = working_points;
    }

    /** Score used to rank jets under this ordering. */
    btag(jet: JetRecord): number {
        if (this.ordering === JetOrdering.Pt) return jet.p4.pt;
        return discriminator(jet, this.#tagger);
    }

    ptCut(): number {
        return BJET_PT_CUT;
    }

    etaCut(): number {
        return BJET_ETA_CUT[this.period];
    }

    threshold(wp: DiscriminatorWP): number {
        return this.#working_points[wp];
    }

    pass(jet: JetRecord, wp: DiscriminatorWP = DiscriminatorWP.Medium): boolean {
        return discriminator(jet, this.#tagger) >= this.#working_points[wp];
    }
}
