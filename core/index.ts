/**
 * Event View - Public Exports
 *
 * Central export point for event-view construction and signal-object selection.
 */

// Analysis enumerations
export {
    Period,
    JetOrdering,
    Channel,
    DiscriminatorWP,
    EventEnergyScale,
    UncertaintyScale,
    isPeriod,
    isJetOrdering,
    isChannel,
    isEventEnergyScale,
    channelName,
} from "./analysis_types.js";
export type { UncertaintySource } from "./analysis_types.js";

// Errors
export {
    EventViewError,
    EventViewErrorCode,
    missingMetadata,
    missingSignalObject,
    invalidIndex,
    invalidConfiguration,
    attempt,
} from "./errors/event_view_error.js";
export type { EventViewErrorDetail, ViewResult } from "./errors/event_view_error.js";

// Flat records
export { EMPTY_KINFIT_CACHE, EMPTY_SVFIT_CACHE } from "./event/raw_event_record.js";
export type {
    RawEventRecord,
    JetRecord,
    FatJetRecord,
    LeptonRecord,
    MetRecord,
    KinFitCache,
    SvfitCache,
    PtEtaPhiE,
    PtEtaPhiM,
} from "./event/raw_event_record.js";
export {
    UNDEFINED_JET_INDEX,
    UNDEFINED_JET_PAIR,
    makeJetPair,
    isValidPair,
    pairContains,
    pairGet,
    jetPairToIndex,
    jetPairFromIndex,
} from "./event/jet_pair.js";
export type { JetPair } from "./event/jet_pair.js";
export { parseEventRecord, readEventRecords } from "./event/event_reader.js";
export type { EventReaderOptions } from "./event/event_reader.js";

// B tagging and ranking
export { BTagger, discriminator } from "./btag/b_tagger.js";
export { orderJets } from "./btag/jet_ranker.js";
export type { JetInfo } from "./btag/jet_ranker.js";
export { passPileupId, passMinimalPileupId, passEcalNoiseVeto } from "./btag/jet_quality.js";

// Signal-jet selection
export { selectSignalJets, selectVbfPair } from "./selection/signal_jet_selector.js";
export {
    NO_SIGNAL_JETS,
    hasBjetPair,
    hasVbfPair,
    isSelectedBjet,
    isSelectedVbfJet,
} from "./selection/selected_signal_jets.js";
export type { SelectedSignalJets } from "./selection/selected_signal_jets.js";

// Trigger
export { TriggerDescriptorTable, MAX_TRIGGER_PATHS } from "./trigger/trigger_descriptors.js";
export { TriggerResults } from "./trigger/trigger_results.js";

// Candidates and kinematics
export { LorentzVector } from "./kinematics/lorentz_vector.js";
export { calculateMt2 } from "./kinematics/mt2.js";
export { LeptonCandidate } from "./candidates/lepton_candidate.js";
export { JetCandidate } from "./candidates/jet_candidate.js";
export type { JetCollection } from "./candidates/jet_candidate.js";
export { FatJetCandidate } from "./candidates/fat_jet_candidate.js";
export { MissingEnergy } from "./candidates/missing_energy.js";
export { HiggsBBCandidate } from "./candidates/higgs_bb_candidate.js";
export { chi2Probability, toKinFitResult } from "./kinfit/kinfit_types.js";
export type { KinFitOutput, KinFitResult, KinFitProducer, JetResolutionProvider } from "./kinfit/kinfit_types.js";

// Summary
export { SummaryInfo } from "./summary/summary_info.js";
export type { ProdSummary, ShiftedKinematics, UncertaintyProvider } from "./summary/summary_info.js";
export { JecUncertaintyTable } from "./summary/jec_uncertainty_table.js";
export type { JecSourceTable, JecUncertaintyTableData } from "./summary/jec_uncertainty_table.js";
export { SummaryStore, loadSummaryInfo, parseProdSummary, parseJecTable } from "./summary/summary_store.js";
export type { SummarySource } from "./summary/summary_store.js";

// Views
export { EventView, formatEventId } from "./view/event_view.js";
export type { EventViewOptions, EventIdentifier, JetSelectionOptions, AppliedShift } from "./view/event_view.js";
export { LazyCache } from "./view/lazy_cache.js";
export type { Cell } from "./view/lazy_cache.js";

// Replay
export { runEventReplay, parseShiftArgument } from "./replay/replay_driver.js";
export type { ReplayContext, EventSummary, ReplayMetrics } from "./replay/replay_driver.js";
