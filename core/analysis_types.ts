/**
 * Shared analysis enumerations.
 * String enums are used wherever the value travels through config or logs;
 * numeric ones mirror the integer codes stored in the flat record.
 */

export enum Period {
    Run2016 = "Run2016",
    Run2017 = "Run2017",
    Run2018 = "Run2018",
}

export enum JetOrdering {
    Pt = "Pt",
    CSV = "CSV",
    DeepCSV = "DeepCSV",
    DeepFlavour = "DeepFlavour",
}

export enum Channel {
    ETau = 0,
    MuTau = 1,
    TauTau = 2,
    MuMu = 3,
    EMu = 4,
}

export enum DiscriminatorWP {
    Loose = "Loose",
    Medium = "Medium",
    Tight = "Tight",
}

export enum EventEnergyScale {
    Central = 0,
    TauUp = 1,
    TauDown = 2,
    JetUp = 3,
    JetDown = 4,
}

export enum UncertaintyScale {
    Down = -1,
    Central = 0,
    Up = 1,
}

/** Name of a jet-energy uncertainty source, e.g. "Total" or "FlavorQCD". */
export type UncertaintySource = string;

export function isPeriod(value: string): value is Period {
    return Object.values(Period).some((period) => period === value);
}

export function isJetOrdering(value: string): value is JetOrdering {
    return Object.values(JetOrdering).some((ordering) => ordering === value);
}

export function isChannel(value: number): value is Channel {
    return Number.isInteger(value) && value >= Channel.ETau && value <= Channel.EMu;
}

export function isEventEnergyScale(value: number): value is EventEnergyScale {
    return Number.isInteger(value) && value >= EventEnergyScale.Central && value <= EventEnergyScale.JetDown;
}

export function channelName(channel: Channel): string {
    return Channel[channel];
}
