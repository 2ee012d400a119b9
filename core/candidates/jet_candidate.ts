import { JetRecord } from "../event/raw_event_record.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";

/**
 * Jet as seen by the view. The momentum can be replaced (energy-scale shifts)
 * while the record index and tagging inputs stay attached.
 */
export class JetCandidate {
    readonly index: number;
    readonly record: JetRecord;
    readonly #momentum: LorentzVector;

    constructor(record: JetRecord, index: number, momentum?: LorentzVector) {
        this.index = index;
        this.record = record;
        this.#momentum = momentum
            ?? LorentzVector.fromPtEtaPhiE(record.p4.pt, record.p4.eta, record.p4.phi, record.p4.e);
    }

    getMomentum(): LorentzVector {
        return this.#momentum;
    }

    /** Relative energy resolution stored upstream. */
    resolution(): number {
        return this.record.resolution;
    }

    withMomentum(momentum: LorentzVector): JetCandidate {
        return new JetCandidate(this.record, this.index, momentum);
    }
}

export type JetCollection = readonly JetCandidate[];
