/**
 * Replay CLI: builds event views for every record of a JSONL file and prints
 * one JSON summary per event.
 *
 *   npm run replay -- [--shift <source>:<up|down>]
 */

import { CONFIG_METADATA, DATA_PATHS, EVENT_VIEW_DEFAULTS } from "../config.js";
import { readEventRecords } from "../event/event_reader.js";
import { parseShiftArgument, runEventReplay } from "../replay/replay_driver.js";
import { SummaryStore } from "../summary/summary_store.js";

async function main(): Promise<void> {
    console.log(`[EVENT_REPLAY] Config: ${JSON.stringify(CONFIG_METADATA)}`);
    const shift = parseShiftArgument(process.argv.slice(2));

    const store = new SummaryStore();
    const source = { summary_path: DATA_PATHS.summary, jec_uncertainty_path: DATA_PATHS.jec_uncertainty };
    const summary = await store.acquire(source);
    try {
        const records = await readEventRecords(DATA_PATHS.events);
        const { summaries, metrics } = runEventReplay(records, { ...EVENT_VIEW_DEFAULTS, summary, shift });
        for (const line of summaries) {
            console.log(JSON.stringify(line));
        }
        console.log(`[EVENT_REPLAY] Metrics: ${JSON.stringify(metrics)}`);
    } finally {
        store.release(source);
    }
}

main().catch((err: unknown) => {
    console.error("[EVENT_REPLAY] Fatal:", err);
    process.exitCode = 1;
});
