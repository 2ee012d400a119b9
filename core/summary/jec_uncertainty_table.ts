import { UncertaintyScale, UncertaintySource } from "../analysis_types.js";
import { JetCollection } from "../candidates/jet_candidate.js";
import { EventViewError, EventViewErrorCode, missingMetadata } from "../errors/event_view_error.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";
import { ShiftedKinematics, UncertaintyProvider } from "./summary_info.js";

/**
 * Binned relative uncertainty of one source.
 * values[i][j] covers abs_eta_edges[i] <= |eta| < abs_eta_edges[i+1]
 * and pt_edges[j] <= pt < pt_edges[j+1]; values outside the edges use the
 * nearest bin.
 */
export interface JecSourceTable {
    readonly abs_eta_edges: readonly number[];
    readonly pt_edges: readonly number[];
    readonly values: readonly (readonly number[])[];
}

export interface JecUncertaintyTableData {
    readonly sources: Readonly<Record<string, JecSourceTable>>;
}

function findBin(edges: readonly number[], x: number): number {
    const n_bins = edges.length - 1;
    for (let i = 0; i < n_bins; i++) {
        if (x < edges[i + 1]) return i;
    }
    return n_bins - 1;
}

function validateSource(name: string, table: JecSourceTable): void {
    const n_eta = table.abs_eta_edges.length - 1;
    const n_pt = table.pt_edges.length - 1;
    const shape_ok = n_eta >= 1 && n_pt >= 1
        && table.values.length === n_eta
        && table.values.every((row) => row.length === n_pt);
    if (!shape_ok) {
        throw new EventViewError({
            code: EventViewErrorCode.INVALID_RECORD,
            message: `JEC uncertainty table for source ${name} has inconsistent binning.`,
            metadata: { source: name, n_eta, n_pt },
        });
    }
}

/**
 * JecUncertaintyTable
 * Table-driven jet-energy-scale shifts with MET propagation.
 */
export class JecUncertaintyTable {
    readonly #sources: ReadonlyMap<string, JecSourceTable>;

    constructor(data: JecUncertaintyTableData) {
        const sources = new Map<string, JecSourceTable>();
        for (const [name, table] of Object.entries(data.sources)) {
            validateSource(name, table);
            sources.set(name, table);
        }
        this.#sources = sources;
    }

    sourceNames(): string[] {
        return [...this.#sources.keys()];
    }

    uncertainty(source: UncertaintySource, pt: number, eta: number): number {
        const table = this.#sources.get(source);
        if (!table) {
            throw missingMetadata(`JEC uncertainty source ${source} not found.`, { source });
        }
        const eta_bin = findBin(table.abs_eta_edges, Math.abs(eta));
        const pt_bin = findBin(table.pt_edges, pt);
        return table.values[eta_bin][pt_bin];
    }

    shiftMomentum(p4: LorentzVector, source: UncertaintySource, scale: UncertaintyScale): LorentzVector {
        if (scale === UncertaintyScale.Central) return p4;
        const unc = this.uncertainty(source, p4.pt(), p4.eta());
        return p4.scale(1 + scale * unc);
    }

    applyShift(
        jets: JetCollection,
        source: UncertaintySource,
        scale: UncertaintyScale,
        other_jets: readonly LorentzVector[],
        met: LorentzVector
    ): ShiftedKinematics {
        let delta = LorentzVector.zero();

        const shifted_jets = jets.map((jet) => {
            const original = jet.getMomentum();
            const shifted = this.shiftMomentum(original, source, scale);
            delta = delta.add(shifted.subtract(original));
            return jet.withMomentum(shifted);
        });

        for (const original of other_jets) {
            const shifted = this.shiftMomentum(original, source, scale);
            delta = delta.add(shifted.subtract(original));
        }

        return {
            jets: Object.freeze(shifted_jets),
            met: met.subtract(delta).transverse(),
        };
    }

    asProvider(): UncertaintyProvider {
        return (jets, source, scale, other_jets, met) => this.applyShift(jets, source, scale, other_jets, met);
    }
}
