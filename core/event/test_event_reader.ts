import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { EventEnergyScale } from "../analysis_types.js";
import { EventViewErrorCode } from "../errors/event_view_error.js";
import { catchViewError, catchViewErrorAsync } from "../errors/fixtures/catch_view_error.js";
import { parseEventRecord, readEventRecords } from "./event_reader.js";
import { makeEvent, makeJet } from "./fixtures/event_fixtures.js";
import { EMPTY_KINFIT_CACHE, EMPTY_SVFIT_CACHE } from "./raw_event_record.js";

const EVENTS_PATH = fileURLToPath(new URL("./fixtures/events.jsonl", import.meta.url));

describe("readEventRecords", () => {
    let tmp_dir = "";

    beforeAll(() => {
        tmp_dir = fs.mkdtempSync(path.join(os.tmpdir(), "event-reader-"));
    });

    afterAll(() => {
        fs.rmSync(tmp_dir, { recursive: true, force: true });
    });

    it("reads every non-empty line", async () => {
        const records = await readEventRecords(EVENTS_PATH);

        expect(records.map((r) => r.evt)).toEqual([1001, 1002, 1003]);
        expect(records[0].jets).toHaveLength(4);
        expect(records[0].trigger_accepts).toBe(3n);
        expect(records[0].trigger_matches[0]).toBe(2n ** 64n - 1n);
        expect(records[0].kinfit_cache.mass).toEqual([420]);
        expect(records[0].svfit_cache.is_valid).toEqual([true]);
        expect(Object.isFrozen(records[0])).toBe(true);
    });

    it("fills defaults for optional fields", async () => {
        const [, second] = await readEventRecords(EVENTS_PATH);

        expect(second.event_energy_scale).toBe(0);
        expect(second.rho).toBe(0);
        expect(second.fat_jets).toEqual([]);
        expect(second.other_jets_p4).toEqual([]);
        expect(second.kinfit_cache).toBe(EMPTY_KINFIT_CACHE);
        expect(second.svfit_cache).toBe(EMPTY_SVFIT_CACHE);
    });

    it("applies the filter before the limit", async () => {
        const tau_tau = await readEventRecords(EVENTS_PATH, { filter: (r) => r.channel_id === 2 });
        const first = await readEventRecords(EVENTS_PATH, { filter: (r) => r.channel_id === 2, limit: 1 });

        expect(tau_tau.map((r) => r.evt)).toEqual([1001, 1003]);
        expect(first.map((r) => r.evt)).toEqual([1001]);
    });

    it("yields nothing for a missing file", async () => {
        expect(await readEventRecords(path.join(tmp_dir, "missing.jsonl"))).toEqual([]);
    });

    it("reports the file and line of a malformed record", async () => {
        const { met: _met, ...without_met } = makeEvent();
        const valid = JSON.stringify({ ...makeEvent(), trigger_accepts: "0", trigger_matches: ["0"] });
        const broken = JSON.stringify({ ...without_met, trigger_accepts: "0", trigger_matches: ["0"] });
        const file = path.join(tmp_dir, "broken.jsonl");
        fs.writeFileSync(file, `${valid}\n${broken}\n`);

        const error = await catchViewErrorAsync(() => readEventRecords(file));

        expect(error.code).toBe(EventViewErrorCode.INVALID_RECORD);
        expect(error.message).toBe(`${file}:2: event.met: expected an object`);
        expect(error.metadata).toEqual({ file, line: 2 });
    });

    it("reports lines that are not JSON", async () => {
        const file = path.join(tmp_dir, "garbage.jsonl");
        fs.writeFileSync(file, "\n{not json\n");

        const error = await catchViewErrorAsync(() => readEventRecords(file));

        expect(error.code).toBe(EventViewErrorCode.INVALID_RECORD);
        expect(error.metadata).toEqual({ file, line: 2 });
    });
});

describe("parseEventRecord", () => {
    const base = { ...makeEvent(), trigger_accepts: "5", trigger_matches: [1] };

    it("decodes masks from decimal strings and safe integers", () => {
        const record = parseEventRecord(base);
        expect(record.trigger_accepts).toBe(5n);
        expect(record.trigger_matches).toEqual([1n]);
    });

    it("rejects negative masks", () => {
        const error = catchViewError(() => parseEventRecord({ ...base, trigger_accepts: "-1" }));
        expect(error.code).toBe(EventViewErrorCode.INVALID_RECORD);
        expect(error.message).toBe("event.trigger_accepts: expected an unsigned integer or decimal string");
    });

    it("rejects unknown energy-scale codes", () => {
        const error = catchViewError(() => parseEventRecord({ ...base, event_energy_scale: 7 }));
        expect(error.code).toBe(EventViewErrorCode.INVALID_RECORD);
        expect(error.message).toBe("event.event_energy_scale: expected an energy-scale code between 0 and 4");
    });

    it("keeps known energy-scale codes", () => {
        expect(parseEventRecord({ ...base, event_energy_scale: 3 }).event_energy_scale).toBe(EventEnergyScale.JetUp);
    });

    it("rejects fit caches with arrays of different lengths", () => {
        const kinfit_cache = { jet_pair_id: [0, 1], convergence: [1], chi2: [1], mass: [1] };
        const error = catchViewError(() => parseEventRecord({ ...base, kinfit_cache }));
        expect(error.message).toBe("event.kinfit_cache: expected parallel arrays of equal length");
    });

    it("rejects jets with non-numeric fields", () => {
        const jets = [makeJet({ pt: 40 }), { ...makeJet({ pt: 30 }), csv: "0.5" }];
        const error = catchViewError(() => parseEventRecord({ ...base, jets }));
        expect(error.message).toBe("event.jets[1].csv: expected a finite number");
    });
});
