import { LeptonRecord } from "../event/raw_event_record.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";

/** Signal leg (e, mu or hadronic tau) read from the record's lepton arrays. */
export class LeptonCandidate {
    readonly index: number;
    readonly charge: number;
    readonly iso: number;
    readonly type: number;
    readonly gen_match: number;
    readonly decay_mode: number;
    readonly id_bits: number;
    readonly #momentum: LorentzVector;

    constructor(record: LeptonRecord, index: number) {
        this.index = index;
        this.charge = record.charge;
        this.iso = record.iso;
        this.type = record.type;
        this.gen_match = record.gen_match;
        this.decay_mode = record.decay_mode;
        this.id_bits = record.id_bits;
        this.#momentum = LorentzVector.fromPtEtaPhiM(record.p4.pt, record.p4.eta, record.p4.phi, record.p4.m);
    }

    getMomentum(): LorentzVector {
        return this.#momentum;
    }
}
