import { FatJetRecord } from "../event/raw_event_record.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";

export class FatJetCandidate {
    readonly index: number;
    readonly m_softdrop: number;
    readonly #momentum: LorentzVector;
    readonly #sub_jets: readonly LorentzVector[];

    constructor(record: FatJetRecord, index: number) {
        this.index = index;
        this.m_softdrop = record.m_softdrop;
        this.#momentum = LorentzVector.fromPtEtaPhiE(record.p4.pt, record.p4.eta, record.p4.phi, record.p4.e);
        this.#sub_jets = Object.freeze(
            record.sub_jets.map((p4) => LorentzVector.fromPtEtaPhiE(p4.pt, p4.eta, p4.phi, p4.e))
        );
    }

    getMomentum(): LorentzVector {
        return this.#momentum;
    }

    subJets(): readonly LorentzVector[] {
        return this.#sub_jets;
    }
}
