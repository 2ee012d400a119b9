import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";
import fs from "fs";
import { isJetOrdering, isPeriod, JetOrdering, Period } from "./analysis_types.js";
import { invalidConfiguration } from "./errors/event_view_error.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Repo root is the nearest directory with a package.json (sources and dist/ alike)
function findRepoRoot(start: string): string {
    let dir = start;
    while (!fs.existsSync(path.join(dir, "package.json"))) {
        const parent = path.dirname(dir);
        if (parent === dir) return start;
        dir = parent;
    }
    return dir;
}

export const REPO_ROOT = findRepoRoot(__dirname);

const envPath = path.join(REPO_ROOT, ".env");
if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    console.log(`[CONFIG] Loaded .env from: ${envPath}`);
} else {
    console.log(`[CONFIG] No .env found at: ${envPath}`);
}

function resolvePath(value: string | undefined, fallback: string): string {
    return path.resolve(REPO_ROOT, value || fallback);
}

export function parsePeriod(value: string | undefined, fallback: Period): Period {
    if (!value) return fallback;
    if (!isPeriod(value)) {
        throw invalidConfiguration(`Unknown period "${value}".`, { value });
    }
    return value;
}

export function parseJetOrdering(value: string | undefined, fallback: JetOrdering): JetOrdering {
    if (!value) return fallback;
    if (!isJetOrdering(value)) {
        throw invalidConfiguration(`Unknown jet ordering "${value}".`, { value });
    }
    return value;
}

export function parseIndex(value: string | undefined, fallback: number): number {
    if (!value) return fallback;
    const index = Number(value);
    if (!Number.isInteger(index) || index < 0) {
        throw invalidConfiguration(`Invalid signal hypothesis index "${value}".`, { value });
    }
    return index;
}

export const DATA_PATHS = {
    events: resolvePath(process.env.EVENT_VIEW_EVENTS_PATH, "data/events.jsonl"),
    summary: resolvePath(process.env.EVENT_VIEW_SUMMARY_PATH, "data/summary.json"),
    jec_uncertainty: process.env.EVENT_VIEW_JEC_PATH
        ? resolvePath(process.env.EVENT_VIEW_JEC_PATH, "")
        : undefined,
};

export const EVENT_VIEW_DEFAULTS = {
    period: parsePeriod(process.env.EVENT_VIEW_PERIOD, Period.Run2017),
    jet_ordering: parseJetOrdering(process.env.EVENT_VIEW_JET_ORDERING, JetOrdering.DeepFlavour),
    hypothesis_index: parseIndex(process.env.EVENT_VIEW_HYPOTHESIS_INDEX, 0),
};

export const CONFIG_METADATA = {
    env_path: envPath,
    events_path: DATA_PATHS.events,
    summary_path: DATA_PATHS.summary,
    period: EVENT_VIEW_DEFAULTS.period,
    jet_ordering: EVENT_VIEW_DEFAULTS.jet_ordering,
};
