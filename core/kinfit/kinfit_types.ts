import { invalidConfiguration } from "../errors/event_view_error.js";
import { MissingEnergy } from "../candidates/missing_energy.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";

export interface KinFitOutput {
    readonly convergence: number;
    readonly chi2: number;
    readonly mass: number;
}

export interface KinFitResult extends KinFitOutput {
    readonly probability: number;
}

/**
 * External HH kinematic-fit solver. Energy resolutions are absolute (GeV).
 */
export type KinFitProducer = (
    leg1: LorentzVector,
    leg2: LorentzVector,
    jet1: LorentzVector,
    jet2: LorentzVector,
    met: MissingEnergy,
    resolution1: number,
    resolution2: number
) => KinFitOutput;

/** Relative jet energy resolution lookup. */
export type JetResolutionProvider = (pt: number, eta: number, rho: number) => number;

/**
 * Upper-tail chi-square probability. Closed form for even degrees of freedom,
 * which covers the two-constraint fit.
 */
export function chi2Probability(chi2: number, ndf: number): number {
    if (chi2 <= 0) return 1;
    if (ndf <= 0 || ndf % 2 !== 0) {
        throw invalidConfiguration(`chi2Probability supports even ndf only, got ${ndf}.`, { ndf });
    }
    const half = chi2 / 2;
    let term = 1;
    let sum = 1;
    for (let k = 1; k < ndf / 2; k++) {
        term *= half / k;
        sum += term;
    }
    return Math.exp(-half) * sum;
}

export function toKinFitResult(output: KinFitOutput): KinFitResult {
    return Object.freeze({
        convergence: output.convergence,
        chi2: output.chi2,
        mass: output.mass,
        probability: chi2Probability(output.chi2, 2),
    });
}
