import {
    Channel,
    EventEnergyScale,
    isChannel,
    JetOrdering,
    Period,
    UncertaintyScale,
    UncertaintySource,
} from "../analysis_types.js";
import { BTagger } from "../btag/b_tagger.js";
import { JetInfo, orderJets } from "../btag/jet_ranker.js";
import { passEcalNoiseVeto, passMinimalPileupId } from "../btag/jet_quality.js";
import { FatJetCandidate } from "../candidates/fat_jet_candidate.js";
import { HiggsBBCandidate } from "../candidates/higgs_bb_candidate.js";
import { JetCandidate, JetCollection } from "../candidates/jet_candidate.js";
import { LeptonCandidate } from "../candidates/lepton_candidate.js";
import { MissingEnergy } from "../candidates/missing_energy.js";
import {
    EventViewError,
    EventViewErrorCode,
    invalidConfiguration,
    invalidIndex,
    missingMetadata,
    missingSignalObject,
} from "../errors/event_view_error.js";
import { jetPairToIndex, pairGet } from "../event/jet_pair.js";
import { PtEtaPhiE, RawEventRecord } from "../event/raw_event_record.js";
import { JetResolutionProvider, KinFitProducer, KinFitResult, toKinFitResult } from "../kinfit/kinfit_types.js";
import { LorentzVector } from "../kinematics/lorentz_vector.js";
import { calculateMt2 } from "../kinematics/mt2.js";
import {
    hasBjetPair,
    hasVbfPair,
    SelectedSignalJets,
} from "../selection/selected_signal_jets.js";
import { selectSignalJets } from "../selection/signal_jet_selector.js";
import { SummaryInfo } from "../summary/summary_info.js";
import { TriggerResults } from "../trigger/trigger_results.js";
import { LazyCache } from "./lazy_cache.js";

export interface EventIdentifier {
    readonly run: number;
    readonly lumi: number;
    readonly evt: number;
}

export function formatEventId(id: EventIdentifier): string {
    return `${id.run}:${id.lumi}:${id.evt}`;
}

export interface EventViewOptions {
    readonly event: RawEventRecord;
    /** Which (first, second) daughter-index pair of the record is the signal hypothesis */
    readonly hypothesis_index: number;
    readonly period: Period;
    readonly jet_ordering: JetOrdering;
    readonly summary?: SummaryInfo;
    readonly kinfit_producer?: KinFitProducer;
    /** Overrides the per-jet resolution stored in the record */
    readonly resolution_provider?: JetResolutionProvider;
    /** Reuse a selection already made for this event, period and ordering */
    readonly selected_signal_jets?: SelectedSignalJets;
}

export interface JetSelectionOptions {
    readonly pt_cut: number;
    readonly eta_cut: number;
    readonly apply_pu?: boolean;
    readonly pass_btag?: boolean;
    readonly jet_ordering?: JetOrdering;
    readonly exclude?: ReadonlySet<number>;
    readonly low_eta_cut?: number;
}

export interface AppliedShift {
    readonly source: UncertaintySource;
    readonly scale: UncertaintyScale;
}

interface ViewCells {
    leg1: LeptonCandidate;
    leg2: LeptonCandidate;
    jets: JetCollection;
    fat_jets: readonly FatJetCandidate[];
    met: MissingEnergy;
    higgs_bb: HiggsBBCandidate;
    kinfit: KinFitResult;
    mt2: number;
    score: number;
}

const HT_JET_MIN_PT = 20;
const HT_JET_MAX_ETA = 4.7;
const HT_JET_MAX_ETA_NO_CUT = 5;

function toPtEtaPhiE(p4: LorentzVector): PtEtaPhiE {
    return { pt: p4.pt(), eta: p4.eta(), phi: p4.phi(), e: p4.energy() };
}

/**
 * EventView
 * Higher-level physics objects of one event for one signal hypothesis.
 * Signal jets are selected once at construction; everything else is built
 * on first access and cached for the lifetime of the view.
 */
export class EventView {
    readonly #options: EventViewOptions;
    readonly #event: RawEventRecord;
    readonly #event_id: EventIdentifier;
    readonly #channel: Channel;
    readonly #selected: SelectedSignalJets;
    readonly #trigger_results: TriggerResults;
    #cache = new LazyCache<ViewCells>();
    #shift?: AppliedShift;

    constructor(options: EventViewOptions) {
        const { event, hypothesis_index } = options;
        const n_hypotheses = Math.min(
            event.first_daughter_indexes.length,
            event.second_daughter_indexes.length,
            event.trigger_matches.length
        );
        if (!Number.isInteger(hypothesis_index) || hypothesis_index < 0 || hypothesis_index >= n_hypotheses) {
            throw invalidIndex(`Signal hypothesis index ${hypothesis_index} is out of range.`, {
                hypothesis_index,
                n_hypotheses,
            });
        }
        if (!isChannel(event.channel_id)) {
            throw new EventViewError({
                code: EventViewErrorCode.INVALID_RECORD,
                message: `Unknown channel id ${event.channel_id}.`,
                metadata: { channel_id: event.channel_id },
            });
        }

        this.#options = options;
        this.#event = event;
        this.#event_id = Object.freeze({ run: event.run, lumi: event.lumi, evt: event.evt });
        this.#channel = event.channel_id;
        this.#selected = options.selected_signal_jets
            ?? selectSignalJets(event, options.period, options.jet_ordering);

        const descriptors = options.summary?.getTriggerDescriptors(this.#channel);
        this.#trigger_results = new TriggerResults(
            event.trigger_accepts,
            event.trigger_matches[hypothesis_index],
            descriptors
        );
    }

    // ========================================================================
    // IDENTITY
    // ========================================================================

    get event(): RawEventRecord {
        return this.#event;
    }

    getEventId(): EventIdentifier {
        return this.#event_id;
    }

    getChannel(): Channel {
        return this.#channel;
    }

    getEnergyScale(): EventEnergyScale {
        return this.#event.event_energy_scale;
    }

    getPeriod(): Period {
        return this.#options.period;
    }

    getJetOrdering(): JetOrdering {
        return this.#options.jet_ordering;
    }

    getHypothesisIndex(): number {
        return this.#options.hypothesis_index;
    }

    getTriggerResults(): TriggerResults {
        return this.#trigger_results;
    }

    getSummaryInfo(): SummaryInfo {
        if (!this.#options.summary) {
            throw missingMetadata("SummaryInfo was not provided for this event.", {
                event_id: formatEventId(this.#event_id),
            });
        }
        return this.#options.summary;
    }

    /** Shift this view was derived with, undefined for the nominal view. */
    getShift(): AppliedShift | undefined {
        return this.#shift;
    }

    getNJets(): number {
        return this.#event.jets.length;
    }

    getNFatJets(): number {
        return this.#event.fat_jets.length;
    }

    getSelectedSignalJets(): SelectedSignalJets {
        return this.#selected;
    }

    hasBjetPair(): boolean {
        return hasBjetPair(this.#selected, this.getNJets());
    }

    hasVbfJetPair(): boolean {
        return hasVbfPair(this.#selected, this.getNJets());
    }

    getSelectedBjetIndices(): readonly [number, number] {
        return [this.#selected.b_jet_pair.first, this.#selected.b_jet_pair.second];
    }

    getSelectedBjetIndicesSet(): ReadonlySet<number> {
        return new Set(this.getSelectedBjetIndices());
    }

    // ========================================================================
    // LEPTONS
    // ========================================================================

    getLegIndex(leg_id: number): number {
        const h = this.#options.hypothesis_index;
        if (leg_id === 1) return this.#event.first_daughter_indexes[h];
        if (leg_id === 2) return this.#event.second_daughter_indexes[h];
        throw invalidIndex(`Invalid leg id = ${leg_id}.`, { leg_id });
    }

    getLeg(leg_id: number): LeptonCandidate {
        if (leg_id === 1) return this.getFirstLeg();
        if (leg_id === 2) return this.getSecondLeg();
        throw invalidIndex(`Invalid leg id = ${leg_id}.`, { leg_id });
    }

    getFirstLeg(): LeptonCandidate {
        return this.#cache.get("leg1", () => this.buildLeg(1));
    }

    getSecondLeg(): LeptonCandidate {
        return this.#cache.get("leg2", () => this.buildLeg(2));
    }

    private buildLeg(leg_id: number): LeptonCandidate {
        const index = this.getLegIndex(leg_id);
        const record = this.#event.leptons[index];
        if (!record) {
            throw invalidIndex(`Leg ${leg_id} points to missing lepton ${index}.`, {
                leg_id,
                index,
                n_leptons: this.#event.leptons.length,
            });
        }
        return new LeptonCandidate(record, index);
    }

    // ========================================================================
    // JETS
    // ========================================================================

    getJets(): JetCollection {
        return this.#cache.get("jets", () =>
            Object.freeze(this.#event.jets.map((record, n) => new JetCandidate(record, n)))
        );
    }

    /** Replace the jet collection. Cells already built from the old jets keep their values. */
    setJets(jets: JetCollection): void {
        this.#cache.overwrite("jets", Object.freeze([...jets]));
    }

    getFatJets(): readonly FatJetCandidate[] {
        return this.#cache.get("fat_jets", () =>
            Object.freeze(this.#event.fat_jets.map((record, n) => new FatJetCandidate(record, n)))
        );
    }

    getBJet(index: number): JetCandidate {
        if (!this.hasBjetPair()) {
            throw missingSignalObject("B jet not found.", formatEventId(this.#event_id));
        }
        return this.getJets()[pairGet(this.#selected.b_jet_pair, index)];
    }

    getVbfJet(index: number): JetCandidate {
        if (!this.hasVbfJetPair()) {
            throw missingSignalObject("VBF jet not found.", formatEventId(this.#event_id));
        }
        return this.getJets()[pairGet(this.#selected.vbf_jet_pair, index)];
    }

    /**
     * Filtered, tag-ordered view of the current jet collection.
     * Independent of the signal-jet selection.
     */
    selectJets(options: JetSelectionOptions): JetCandidate[] {
        const {
            pt_cut,
            eta_cut,
            apply_pu = false,
            pass_btag = false,
            jet_ordering = JetOrdering.DeepFlavour,
            exclude = new Set<number>(),
            low_eta_cut = 0,
        } = options;
        const tagger = new BTagger(this.#options.period, jet_ordering);
        const jets = this.getJets();

        const infos: JetInfo[] = [];
        jets.forEach((jet, n) => {
            const p4 = toPtEtaPhiE(jet.getMomentum());
            const record = jet.record;
            if (!passEcalNoiseVeto(p4, this.#options.period, record.pu_id)) return;
            if (exclude.has(n)) return;
            if (apply_pu && !passMinimalPileupId(record.pu_id)) return;
            if (Math.abs(p4.eta) < low_eta_cut) return;
            if (pass_btag && !tagger.pass(record)) return;
            const tag = jet_ordering === JetOrdering.Pt ? p4.pt : tagger.btag(record);
            infos.push({ p4, index: n, tag });
        });

        return orderJets(infos, pt_cut, eta_cut).map((info) => jets[info.index]);
    }

    /** Scalar pt sum of the jets outside the b-jet pair (or of all jets when included). */
    getHT(include_hbb_jets = false, apply_eta_cut = true): number {
        const exclude = include_hbb_jets ? new Set<number>() : this.getSelectedBjetIndicesSet();
        const jets = this.selectJets({
            pt_cut: HT_JET_MIN_PT,
            eta_cut: apply_eta_cut ? HT_JET_MAX_ETA : HT_JET_MAX_ETA_NO_CUT,
            jet_ordering: JetOrdering.DeepCSV,
            exclude,
        });
        return jets.reduce((ht, jet) => ht + jet.getMomentum().pt(), 0);
    }

    // ========================================================================
    // MISSING ENERGY & COMPOSITES
    // ========================================================================

    getMet(): MissingEnergy {
        return this.#cache.get("met", () => MissingEnergy.fromRecord(this.#event.met));
    }

    setMetMomentum(momentum: LorentzVector): void {
        this.#cache.overwrite("met", this.getMet().withMomentum(momentum));
    }

    getHiggsBB(): HiggsBBCandidate {
        if (!this.hasBjetPair()) {
            throw missingSignalObject("Can't create H->bb candidate.", formatEventId(this.#event_id));
        }
        return this.#cache.get("higgs_bb", () => new HiggsBBCandidate(this.getBJet(1), this.getBJet(2)));
    }

    getHiggsTTMomentum(use_svfit: boolean): LorentzVector {
        if (!use_svfit) {
            return this.getFirstLeg().getMomentum().add(this.getSecondLeg().getMomentum());
        }
        const cache = this.#event.svfit_cache;
        const n = cache.htt_index.findIndex(
            (htt_index, i) => htt_index === this.#options.hypothesis_index && cache.is_valid[i]
        );
        if (n < 0) {
            throw missingSignalObject("No valid SVfit result for this signal hypothesis.", formatEventId(this.#event_id));
        }
        const p4 = cache.p4[n];
        return LorentzVector.fromPtEtaPhiM(p4.pt, p4.eta, p4.phi, p4.m);
    }

    getResonanceMomentum(use_svfit: boolean, add_met: boolean): LorentzVector {
        if (use_svfit && add_met) {
            throw invalidConfiguration("Can't add MET and with SVfit applied.", { use_svfit, add_met });
        }
        const p4 = this.getHiggsTTMomentum(use_svfit).add(this.getHiggsBB().getMomentum());
        return add_met ? p4.add(this.getMet().getMomentum()) : p4;
    }

    /**
     * Kinematic-fit result of the b-jet pair. Reads the record's fit cache
     * and otherwise calls the producer once.
     */
    getKinFitResults(): KinFitResult {
        if (!this.hasBjetPair()) {
            throw missingSignalObject("Can't retrieve KinFit results.", formatEventId(this.#event_id));
        }
        return this.#cache.get("kinfit", () => {
            const cache = this.#event.kinfit_cache;
            const pair_id = jetPairToIndex(this.#selected.b_jet_pair, this.getNJets());
            const n = cache.jet_pair_id.indexOf(pair_id);
            if (n >= 0) {
                return toKinFitResult({
                    convergence: cache.convergence[n],
                    chi2: cache.chi2[n],
                    mass: cache.mass[n],
                });
            }

            const producer = this.#options.kinfit_producer;
            if (!producer) {
                throw missingMetadata("No kinematic-fit producer configured.", {
                    event_id: formatEventId(this.#event_id),
                    pair_id,
                });
            }
            const b1 = this.getBJet(1);
            const b2 = this.getBJet(2);
            return toKinFitResult(producer(
                this.getFirstLeg().getMomentum(),
                this.getSecondLeg().getMomentum(),
                b1.getMomentum(),
                b2.getMomentum(),
                this.getMet(),
                this.energyResolution(b1),
                this.energyResolution(b2)
            ));
        });
    }

    getMt2(): number {
        return this.#cache.get("mt2", () => {
            const [b1, b2] = this.getHiggsBB().getDaughterMomenta();
            return calculateMt2(
                this.getFirstLeg().getMomentum(),
                this.getSecondLeg().getMomentum(),
                b1,
                b2,
                this.getMet().getMomentum()
            );
        });
    }

    /**
     * First large-radius jet whose two leading sub-jets match the b-jet pair
     * within delta_r_cut, in either assignment.
     */
    selectFatJet(mass_cut: number, delta_r_cut: number): FatJetCandidate | undefined {
        if (!this.hasBjetPair()) return undefined;
        const [d1, d2] = this.getHiggsBB().getDaughterMomenta();

        for (const fat_jet of this.getFatJets()) {
            if (fat_jet.m_softdrop < mass_cut) continue;
            if (fat_jet.subJets().length < 2) continue;
            const [s1, s2] = [...fat_jet.subJets()].sort((a, b) => b.pt() - a.pt());

            const direct = s1.deltaR(d1) < delta_r_cut && s2.deltaR(d2) < delta_r_cut;
            const crossed = s1.deltaR(d2) < delta_r_cut && s2.deltaR(d1) < delta_r_cut;
            if (direct || crossed) return fat_jet;
        }
        return undefined;
    }

    // ========================================================================
    // SCORE
    // ========================================================================

    setScore(score: number): void {
        this.#cache.overwrite("score", score);
    }

    getScore(): number | undefined {
        return this.#cache.peek("score");
    }

    // ========================================================================
    // SYSTEMATIC SHIFTS
    // ========================================================================

    /**
     * New view of the same event with jets and MET moved by one jet-energy
     * uncertainty. This view is left untouched; signal-jet indices and every
     * cell already resolved here carry over, only jets and MET are replaced.
     */
    applyShift(source: UncertaintySource, scale: UncertaintyScale): EventView {
        const provider = this.getSummaryInfo().getJecUncertainties();

        const shifted = new EventView({ ...this.#options, selected_signal_jets: this.#selected });
        shifted.#cache = this.#cache.clone();
        shifted.#shift = Object.freeze({ source, scale });

        const other_jets = this.#event.other_jets_p4.map((p4) =>
            LorentzVector.fromPtEtaPhiE(p4.pt, p4.eta, p4.phi, p4.e)
        );
        const corrected = provider(shifted.getJets(), source, scale, other_jets, shifted.getMet().getMomentum());

        shifted.setJets(corrected.jets);
        shifted.setMetMomentum(corrected.met);
        return shifted;
    }

    private energyResolution(jet: JetCandidate): number {
        const p4 = jet.getMomentum();
        const relative = this.#options.resolution_provider
            ? this.#options.resolution_provider(p4.pt(), p4.eta(), this.#event.rho)
            : jet.resolution();
        return relative * p4.energy();
    }
}
