import { describe, expect, it } from "vitest";
import { EventViewErrorCode } from "../errors/event_view_error.js";
import { catchViewError } from "../errors/fixtures/catch_view_error.js";
import { chi2Probability, toKinFitResult } from "./kinfit_types.js";

describe("chi2Probability", () => {
    it("is exp(-chi2/2) for two degrees of freedom", () => {
        expect(chi2Probability(3, 2)).toBeCloseTo(Math.exp(-1.5), 12);
    });

    it("adds the Poisson terms for four degrees of freedom", () => {
        expect(chi2Probability(4, 4)).toBeCloseTo(3 * Math.exp(-2), 12);
    });

    it("is one for a perfect fit", () => {
        expect(chi2Probability(0, 2)).toBe(1);
    });

    it("rejects odd degrees of freedom", () => {
        expect(catchViewError(() => chi2Probability(1, 3)).code).toBe(EventViewErrorCode.INVALID_CONFIGURATION);
    });
});

describe("toKinFitResult", () => {
    it("attaches the two-constraint probability and freezes the result", () => {
        const result = toKinFitResult({ convergence: 1, chi2: 2, mass: 400 });
        expect(result).toEqual({ convergence: 1, chi2: 2, mass: 400, probability: Math.exp(-1) });
        expect(Object.isFrozen(result)).toBe(true);
    });
});
