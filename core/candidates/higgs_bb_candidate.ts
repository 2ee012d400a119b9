import { LorentzVector } from "../kinematics/lorentz_vector.js";
import { JetCandidate } from "./jet_candidate.js";

/** H -> bb composite built from the selected b-jet pair. */
export class HiggsBBCandidate {
    readonly #first: JetCandidate;
    readonly #second: JetCandidate;
    readonly #momentum: LorentzVector;

    constructor(first: JetCandidate, second: JetCandidate) {
        this.#first = first;
        this.#second = second;
        this.#momentum = first.getMomentum().add(second.getMomentum());
    }

    getFirstDaughter(): JetCandidate {
        return this.#first;
    }

    getSecondDaughter(): JetCandidate {
        return this.#second;
    }

    getDaughterMomenta(): readonly [LorentzVector, LorentzVector] {
        return [this.#first.getMomentum(), this.#second.getMomentum()];
    }

    getMomentum(): LorentzVector {
        return this.#momentum;
    }
}
