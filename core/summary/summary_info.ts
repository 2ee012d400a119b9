import { Channel, channelName, isChannel, UncertaintyScale, UncertaintySource } from "../analysis_types.js";
import { JetCollection } from "../candidates/jet_candidate.js";
import { EventViewError, EventViewErrorCode, missingMetadata } from "../errors/event_view_error.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";
import { TriggerDescriptorTable } from "../trigger/trigger_descriptors.js";

export interface ShiftedKinematics {
    readonly jets: JetCollection;
    readonly met: LorentzVector;
}

/**
 * Jet-energy uncertainty provider: shifts the signal jets, propagates the
 * change of the signal and other jets into the missing-energy momentum.
 */
export type UncertaintyProvider = (
    jets: JetCollection,
    source: UncertaintySource,
    scale: UncertaintyScale,
    other_jets: readonly LorentzVector[],
    met: LorentzVector
) => ShiftedKinematics;

/** Production summary as stored next to each sample. */
export interface ProdSummary {
    readonly triggers_channel: readonly number[];
    readonly triggers_pattern: readonly string[];
}

/**
 * SummaryInfo
 * Per-sample metadata shared read-only by every event view of the sample.
 */
export class SummaryInfo {
    readonly #trigger_descriptors: ReadonlyMap<Channel, TriggerDescriptorTable>;
    readonly #jec_uncertainty?: UncertaintyProvider;

    constructor(
        trigger_descriptors: ReadonlyMap<Channel, TriggerDescriptorTable>,
        jec_uncertainty?: UncertaintyProvider
    ) {
        this.#trigger_descriptors = new Map(trigger_descriptors);
        this.#jec_uncertainty = jec_uncertainty;
        Object.freeze(this);
    }

    /** Tables are filled in order of appearance in the summary's parallel arrays. */
    static fromProdSummary(summary: ProdSummary, jec_uncertainty?: UncertaintyProvider): SummaryInfo {
        if (summary.triggers_channel.length !== summary.triggers_pattern.length) {
            throw new EventViewError({
                code: EventViewErrorCode.INVALID_RECORD,
                message: "Summary trigger arrays have different lengths.",
                metadata: {
                    channels: summary.triggers_channel.length,
                    patterns: summary.triggers_pattern.length,
                },
            });
        }
        const tables = new Map<Channel, TriggerDescriptorTable>();
        summary.triggers_channel.forEach((channel_id, n) => {
            if (!isChannel(channel_id)) {
                throw new EventViewError({
                    code: EventViewErrorCode.INVALID_RECORD,
                    message: `Unknown channel id ${channel_id} in summary.`,
                    metadata: { channel_id },
                });
            }
            let table = tables.get(channel_id);
            if (!table) {
                table = new TriggerDescriptorTable();
                tables.set(channel_id, table);
            }
            table.add(summary.triggers_pattern[n]);
        });
        return new SummaryInfo(tables, jec_uncertainty);
    }

    channels(): Channel[] {
        return [...this.#trigger_descriptors.keys()];
    }

    getTriggerDescriptors(channel: Channel): TriggerDescriptorTable {
        const table = this.#trigger_descriptors.get(channel);
        if (!table) {
            throw missingMetadata(`Information for channel ${channelName(channel)} not found.`, { channel });
        }
        return table;
    }

    hasJecUncertainties(): boolean {
        return this.#jec_uncertainty !== undefined;
    }

    getJecUncertainties(): UncertaintyProvider {
        if (!this.#jec_uncertainty) {
            throw missingMetadata("Jec uncertainties not stored.");
        }
        return this.#jec_uncertainty;
    }
}
