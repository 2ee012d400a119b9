import { describe, expect, it } from "vitest";
import { JetOrdering, Period } from "./analysis_types.js";
import { parseIndex, parseJetOrdering, parsePeriod, REPO_ROOT } from "./config.js";
import { EventViewErrorCode } from "./errors/event_view_error.js";
import { catchViewError } from "./errors/fixtures/catch_view_error.js";
import fs from "fs";
import path from "path";

describe("config parsing", () => {
    it("finds the repository root", () => {
        expect(fs.existsSync(path.join(REPO_ROOT, "package.json"))).toBe(true);
    });

    it("falls back for unset values", () => {
        expect(parsePeriod(undefined, Period.Run2017)).toBe(Period.Run2017);
        expect(parseJetOrdering("", JetOrdering.DeepFlavour)).toBe(JetOrdering.DeepFlavour);
        expect(parseIndex(undefined, 0)).toBe(0);
    });

    it("accepts known names", () => {
        expect(parsePeriod("Run2018", Period.Run2017)).toBe(Period.Run2018);
        expect(parseJetOrdering("DeepCSV", JetOrdering.DeepFlavour)).toBe(JetOrdering.DeepCSV);
        expect(parseIndex("2", 0)).toBe(2);
    });

    it("rejects unknown values", () => {
        expect(catchViewError(() => parsePeriod("Run2015", Period.Run2017)).code).toBe(
            EventViewErrorCode.INVALID_CONFIGURATION
        );
        expect(catchViewError(() => parseJetOrdering("MVA", JetOrdering.Pt)).code).toBe(
            EventViewErrorCode.INVALID_CONFIGURATION
        );
        expect(catchViewError(() => parseIndex("-1", 0)).code).toBe(EventViewErrorCode.INVALID_CONFIGURATION);
    });
});
