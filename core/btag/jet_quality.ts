import { DiscriminatorWP, Period } from "../analysis_types.js";
import { PtEtaPhiE } from "../event/raw_event_record.js";

export const PU_ID_BITS: Readonly<Record<DiscriminatorWP, number>> = Object.freeze({
    [DiscriminatorWP.Loose]: 1 << 1,
    [DiscriminatorWP.Medium]: 1 << 2,
    [DiscriminatorWP.Tight]: 1 << 3,
});

// Noisy endcap region in Run2017 data
const ECAL_NOISE_MAX_PT = 50;
const ECAL_NOISE_MIN_ABS_ETA = 2.65;
const ECAL_NOISE_MAX_ABS_ETA = 3.139;

export function passPileupId(pu_id: number, wp: DiscriminatorWP): boolean {
    return (pu_id & PU_ID_BITS[wp]) !== 0;
}

/** Minimal pileup requirement applied to every signal-jet candidate. */
export function passMinimalPileupId(pu_id: number): boolean {
    return passPileupId(pu_id, DiscriminatorWP.Loose);
}

export function passEcalNoiseVeto(p4: PtEtaPhiE, period: Period, pu_id: number): boolean {
    if (period !== Period.Run2017) return true;
    const abs_eta = Math.abs(p4.eta);
    const in_noisy_region = p4.pt < ECAL_NOISE_MAX_PT
        && abs_eta > ECAL_NOISE_MIN_ABS_ETA
        && abs_eta < ECAL_NOISE_MAX_ABS_ETA;
    return !in_noisy_region || passPileupId(pu_id, DiscriminatorWP.Tight);
}
