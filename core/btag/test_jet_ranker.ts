import { describe, expect, it } from "vitest";
import { masslessP4 } from "../event/fixtures/event_fixtures.js";
import { JetInfo, orderJets } from "./jet_ranker.js";

function info(index: number, pt: number, eta: number, tag: number): JetInfo {
    return { p4: masslessP4(pt, eta), index, tag };
}

describe("orderJets", () => {
    it("filters by pt and eta, then sorts by tag descending", () => {
        const ranked = orderJets(
            [info(0, 30, 0.1, 0.2), info(1, 19.9, 0.1, 0.99), info(2, 50, 2.5, 0.9), info(3, 25, -1.0, 0.7)],
            20,
            2.5
        );
        expect(ranked.map((j) => j.index)).toEqual([3, 0]);
    });

    it("breaks tag ties by descending pt", () => {
        const ranked = orderJets([info(0, 30, 0, 0.5), info(1, 45, 0, 0.5), info(2, 35, 0, 0.6)], 20, 2.5);
        expect(ranked.map((j) => j.index)).toEqual([2, 1, 0]);
    });

    it("does not reorder its input", () => {
        const input = [info(0, 30, 0, 0.1), info(1, 40, 0, 0.9)];
        orderJets(input, 20, 2.5);
        expect(input.map((j) => j.index)).toEqual([0, 1]);
    });
});
