import fs from "fs";
import readline from "readline";
import { EventEnergyScale, isEventEnergyScale } from "../analysis_types.js";
import { EventViewError, EventViewErrorCode } from "../errors/event_view_error.js";
import {
    EMPTY_KINFIT_CACHE,
    EMPTY_SVFIT_CACHE,
    FatJetRecord,
    JetRecord,
    KinFitCache,
    LeptonRecord,
    MetRecord,
    PtEtaPhiE,
    PtEtaPhiM,
    RawEventRecord,
    SvfitCache,
} from "./raw_event_record.js";

export interface EventReaderOptions {
    filter?: (record: RawEventRecord) => boolean;
    limit?: number;
}

type Json = Record<string, unknown>;

class RecordParseError extends Error {}

function isObject(value: unknown): value is Json {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(path: string, expected: string): never {
    throw new RecordParseError(`${path}: expected ${expected}`);
}

function num(obj: Json, key: string, path: string): number {
    const value = obj[key];
    if (typeof value !== "number" || !Number.isFinite(value)) fail(`${path}.${key}`, "a finite number");
    return value;
}

function bool(value: unknown, path: string): boolean {
    if (typeof value !== "boolean") fail(path, "a boolean");
    return value;
}

function obj(value: unknown, path: string): Json {
    if (!isObject(value)) fail(path, "an object");
    return value;
}

function list(value: unknown, path: string, optional = false): unknown[] {
    if (value === undefined && optional) return [];
    if (!Array.isArray(value)) fail(path, "an array");
    return value;
}

/** 64-bit masks travel as decimal strings; small ones may be plain numbers. */
function mask(value: unknown, path: string): bigint {
    if (typeof value === "string" && /^\d+$/.test(value)) return BigInt(value);
    if (typeof value === "number" && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
    return fail(path, "an unsigned integer or decimal string");
}

function numbers(value: unknown, path: string): number[] {
    return list(value, path, true).map((v, i) => {
        if (typeof v !== "number" || !Number.isFinite(v)) fail(`${path}[${i}]`, "a finite number");
        return v;
    });
}

function ptEtaPhiE(value: unknown, path: string): PtEtaPhiE {
    const o = obj(value, path);
    return { pt: num(o, "pt", path), eta: num(o, "eta", path), phi: num(o, "phi", path), e: num(o, "e", path) };
}

function ptEtaPhiM(value: unknown, path: string): PtEtaPhiM {
    const o = obj(value, path);
    return { pt: num(o, "pt", path), eta: num(o, "eta", path), phi: num(o, "phi", path), m: num(o, "m", path) };
}

function jet(value: unknown, path: string): JetRecord {
    const o = obj(value, path);
    return {
        p4: ptEtaPhiE(o.p4, `${path}.p4`),
        csv: num(o, "csv", path),
        deep_csv_b_vs_all: num(o, "deep_csv_b_vs_all", path),
        deep_flavour_b: num(o, "deep_flavour_b", path),
        deep_flavour_bb: num(o, "deep_flavour_bb", path),
        deep_flavour_lepb: num(o, "deep_flavour_lepb", path),
        pu_id: num(o, "pu_id", path),
        resolution: num(o, "resolution", path),
        hadron_flavour: num(o, "hadron_flavour", path),
    };
}

function fatJet(value: unknown, path: string): FatJetRecord {
    const o = obj(value, path);
    return {
        p4: ptEtaPhiE(o.p4, `${path}.p4`),
        m_softdrop: num(o, "m_softdrop", path),
        sub_jets: list(o.sub_jets, `${path}.sub_jets`, true).map((s, i) => ptEtaPhiE(s, `${path}.sub_jets[${i}]`)),
    };
}

function lepton(value: unknown, path: string): LeptonRecord {
    const o = obj(value, path);
    return {
        p4: ptEtaPhiM(o.p4, `${path}.p4`),
        charge: num(o, "charge", path),
        iso: num(o, "iso", path),
        type: num(o, "type", path),
        gen_match: num(o, "gen_match", path),
        decay_mode: num(o, "decay_mode", path),
        id_bits: num(o, "id_bits", path),
    };
}

function met(value: unknown, path: string): MetRecord {
    const o = obj(value, path);
    const rows = list(o.cov, `${path}.cov`);
    if (rows.length !== 2) fail(`${path}.cov`, "a 2x2 matrix");
    const [r0, r1] = rows.map((row, i) => {
        const values = numbers(row, `${path}.cov[${i}]`);
        if (values.length !== 2) fail(`${path}.cov[${i}]`, "two numbers");
        return [values[0], values[1]] as const;
    });
    return { p4: ptEtaPhiM(o.p4, `${path}.p4`), cov: [r0, r1] };
}

function kinfitCache(value: unknown, path: string): KinFitCache {
    if (value === undefined) return EMPTY_KINFIT_CACHE;
    const o = obj(value, path);
    const cache = {
        jet_pair_id: numbers(o.jet_pair_id, `${path}.jet_pair_id`),
        convergence: numbers(o.convergence, `${path}.convergence`),
        chi2: numbers(o.chi2, `${path}.chi2`),
        mass: numbers(o.mass, `${path}.mass`),
    };
    const n = cache.jet_pair_id.length;
    if (cache.convergence.length !== n || cache.chi2.length !== n || cache.mass.length !== n) {
        fail(path, "parallel arrays of equal length");
    }
    return cache;
}

function svfitCache(value: unknown, path: string): SvfitCache {
    if (value === undefined) return EMPTY_SVFIT_CACHE;
    const o = obj(value, path);
    const cache = {
        htt_index: numbers(o.htt_index, `${path}.htt_index`),
        is_valid: list(o.is_valid, `${path}.is_valid`, true).map((v, i) => bool(v, `${path}.is_valid[${i}]`)),
        p4: list(o.p4, `${path}.p4`, true).map((v, i) => ptEtaPhiM(v, `${path}.p4[${i}]`)),
        mt: numbers(o.mt, `${path}.mt`),
    };
    const n = cache.htt_index.length;
    if (cache.is_valid.length !== n || cache.p4.length !== n || cache.mt.length !== n) {
        fail(path, "parallel arrays of equal length");
    }
    return cache;
}

function energyScale(o: Json, path: string): EventEnergyScale {
    if (o.event_energy_scale === undefined) return EventEnergyScale.Central;
    const value = num(o, "event_energy_scale", path);
    if (!isEventEnergyScale(value)) fail(`${path}.event_energy_scale`, "an energy-scale code between 0 and 4");
    return value;
}

function decodeEventRecord(raw: unknown): RawEventRecord {
    const o = obj(raw, "event");
    return Object.freeze({
        run: num(o, "run", "event"),
        lumi: num(o, "lumi", "event"),
        evt: num(o, "evt", "event"),
        channel_id: num(o, "channel_id", "event"),
        event_energy_scale: energyScale(o, "event"),
        rho: o.rho === undefined ? 0 : num(o, "rho", "event"),
        jets: list(o.jets, "event.jets").map((j, i) => jet(j, `event.jets[${i}]`)),
        other_jets_p4: list(o.other_jets_p4, "event.other_jets_p4", true)
            .map((p, i) => ptEtaPhiE(p, `event.other_jets_p4[${i}]`)),
        fat_jets: list(o.fat_jets, "event.fat_jets", true).map((f, i) => fatJet(f, `event.fat_jets[${i}]`)),
        leptons: list(o.leptons, "event.leptons").map((l, i) => lepton(l, `event.leptons[${i}]`)),
        first_daughter_indexes: numbers(o.first_daughter_indexes, "event.first_daughter_indexes"),
        second_daughter_indexes: numbers(o.second_daughter_indexes, "event.second_daughter_indexes"),
        met: met(o.met, "event.met"),
        trigger_accepts: mask(o.trigger_accepts, "event.trigger_accepts"),
        trigger_matches: list(o.trigger_matches, "event.trigger_matches")
            .map((m, i) => mask(m, `event.trigger_matches[${i}]`)),
        kinfit_cache: kinfitCache(o.kinfit_cache, "event.kinfit_cache"),
        svfit_cache: svfitCache(o.svfit_cache, "event.svfit_cache"),
    });
}

/**
 * Validate one decoded JSON object and freeze it as a RawEventRecord.
 */
export function parseEventRecord(raw: unknown): RawEventRecord {
    try {
        return decodeEventRecord(raw);
    } catch (e) {
        if (!(e instanceof RecordParseError)) throw e;
        throw new EventViewError({ code: EventViewErrorCode.INVALID_RECORD, message: e.message });
    }
}

/**
 * Read flat event records from a JSONL file, one record per line.
 * A missing file yields no events; a malformed line fails with its line number.
 */
export async function readEventRecords(filePath: string, options: EventReaderOptions = {}): Promise<RawEventRecord[]> {
    if (!fs.existsSync(filePath)) {
        console.warn(`[EVENT_READER] No event file at ${filePath}`);
        return [];
    }

    const results: RawEventRecord[] = [];
    const fileStream = fs.createReadStream(filePath);
    const rl = readline.createInterface({
        input: fileStream,
        crlfDelay: Infinity,
    });

    let line_number = 0;
    try {
        for await (const line of rl) {
            line_number++;
            if (!line.trim()) continue;

            let record: RawEventRecord;
            try {
                record = decodeEventRecord(JSON.parse(line));
            } catch (e) {
                if (!(e instanceof RecordParseError) && !(e instanceof SyntaxError)) throw e;
                throw new EventViewError({
                    code: EventViewErrorCode.INVALID_RECORD,
                    message: `${filePath}:${line_number}: ${e.message}`,
                    metadata: { file: filePath, line: line_number },
                });
            }

            if (!options.filter || options.filter(record)) {
                results.push(record);
            }
            if (options.limit && results.length >= options.limit) {
                break;
            }
        }
    } finally {
        rl.close();
        fileStream.destroy();
    }

    return results;
}
