import { MetRecord } from "../event/raw_event_record.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";

export type MetCovariance = MetRecord["cov"];

export class MissingEnergy {
    readonly cov: MetCovariance;
    readonly #momentum: LorentzVector;

    constructor(momentum: LorentzVector, cov: MetCovariance) {
        this.#momentum = momentum;
        this.cov = cov;
    }

    static fromRecord(record: MetRecord): MissingEnergy {
        const p4 = record.p4;
        return new MissingEnergy(LorentzVector.fromPtEtaPhiM(p4.pt, 0, p4.phi, 0), record.cov);
    }

    getMomentum(): LorentzVector {
        return this.#momentum;
    }

    withMomentum(momentum: LorentzVector): MissingEnergy {
        return new MissingEnergy(momentum, this.cov);
    }
}
