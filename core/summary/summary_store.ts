/**
 * Summary Store
 *
 * Reference-counted registry of per-sample SummaryInfo handles.
 * A sample's summary (and its JEC table, if any) is read from disk on the
 * first acquire and dropped when the last holder releases it.
 */

import fs from "node:fs/promises";
import { EventViewError, EventViewErrorCode, missingMetadata } from "../errors/event_view_error.js";
import { JecSourceTable, JecUncertaintyTable, JecUncertaintyTableData } from "./jec_uncertainty_table.js";
import { ProdSummary, SummaryInfo } from "./summary_info.js";

export interface SummarySource {
    readonly summary_path: string;
    readonly jec_uncertainty_path?: string;
}

interface StoreEntry {
    readonly info: Promise<SummaryInfo>;
    ref_count: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function invalidFile(path: string, message: string): EventViewError {
    return new EventViewError({
        code: EventViewErrorCode.INVALID_RECORD,
        message: `${path}: ${message}`,
        metadata: { path },
    });
}

export function parseProdSummary(raw: unknown, path: string): ProdSummary {
    if (!isRecord(raw)) throw invalidFile(path, "summary must be an object.");
    const { triggers_channel, triggers_pattern } = raw;
    if (!isNumberArray(triggers_channel)) throw invalidFile(path, "triggers_channel must be a number array.");
    if (!isStringArray(triggers_pattern)) throw invalidFile(path, "triggers_pattern must be a string array.");
    return { triggers_channel, triggers_pattern };
}

export function parseJecTable(raw: unknown, path: string): JecUncertaintyTableData {
    if (!isRecord(raw) || !isRecord(raw.sources)) throw invalidFile(path, "JEC table must have a sources object.");
    const sources: Record<string, JecSourceTable> = {};
    for (const [name, table] of Object.entries(raw.sources)) {
        if (!isRecord(table)) throw invalidFile(path, `source ${name} must be an object.`);
        const { abs_eta_edges, pt_edges, values } = table;
        if (!isNumberArray(abs_eta_edges) || !isNumberArray(pt_edges)) {
            throw invalidFile(path, `source ${name} needs numeric abs_eta_edges and pt_edges.`);
        }
        if (!Array.isArray(values) || !values.every(isNumberArray)) {
            throw invalidFile(path, `source ${name} values must be a matrix of numbers.`);
        }
        sources[name] = { abs_eta_edges, pt_edges, values };
    }
    return { sources };
}

async function readJson(path: string): Promise<unknown> {
    const content = await fs.readFile(path, "utf-8");
    try {
        return JSON.parse(content);
    } catch (e) {
        throw invalidFile(path, `invalid JSON (${e instanceof Error ? e.message : String(e)}).`);
    }
}

export async function loadSummaryInfo(source: SummarySource): Promise<SummaryInfo> {
    const summary = parseProdSummary(await readJson(source.summary_path), source.summary_path);
    if (!source.jec_uncertainty_path) {
        return SummaryInfo.fromProdSummary(summary);
    }
    const jec_path = source.jec_uncertainty_path;
    const table = new JecUncertaintyTable(parseJecTable(await readJson(jec_path), jec_path));
    return SummaryInfo.fromProdSummary(summary, table.asProvider());
}

export class SummaryStore {
    readonly #entries = new Map<string, StoreEntry>();
    readonly #loader: (source: SummarySource) => Promise<SummaryInfo>;

    constructor(loader: (source: SummarySource) => Promise<SummaryInfo> = loadSummaryInfo) {
        this.#loader = loader;
    }

    static keyOf(source: SummarySource): string {
        return `${source.summary_path}|${source.jec_uncertainty_path ?? ""}`;
    }

    /**
     * Get the shared SummaryInfo for a sample, opening it on first use.
     * Concurrent first acquires share a single load.
     */
    async acquire(source: SummarySource): Promise<SummaryInfo> {
        const key = SummaryStore.keyOf(source);
        const existing = this.#entries.get(key);
        if (existing) {
            existing.ref_count++;
            return existing.info;
        }

        console.log(`[SUMMARY_STORE] Opening ${source.summary_path}`);
        const entry: StoreEntry = { info: this.#loader(source), ref_count: 1 };
        this.#entries.set(key, entry);
        try {
            return await entry.info;
        } catch (e) {
            this.#entries.delete(key);
            throw e;
        }
    }

    /** Drop one reference; the last release closes the handle. */
    release(source: SummarySource): void {
        const key = SummaryStore.keyOf(source);
        const entry = this.#entries.get(key);
        if (!entry) {
            throw missingMetadata(`Summary ${source.summary_path} is not open.`, { key });
        }
        entry.ref_count--;
        if (entry.ref_count === 0) {
            this.#entries.delete(key);
            console.log(`[SUMMARY_STORE] Closed ${source.summary_path}`);
        }
    }

    refCount(source: SummarySource): number {
        return this.#entries.get(SummaryStore.keyOf(source))?.ref_count ?? 0;
    }

    openCount(): number {
        return this.#entries.size;
    }
}
