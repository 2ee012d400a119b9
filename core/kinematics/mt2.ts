import { LorentzVector } from "./lorentz_vector.js";

/**
 * MT2 for the bb + (tau tau + MET) topology.
 *
 * The two b-jets are the visible systems. The legs and MET together form the
 * invisible transverse momentum, split between two invisible particles whose
 * test masses are the leg masses. MT of each side is convex in the split, so
 * max(MT_a, MT_b) is minimised with a nested golden-section search.
 */

const GOLDEN = (Math.sqrt(5) - 1) / 2;
const SEARCH_ITERATIONS = 60;

interface Transverse {
    readonly m: number;
    readonly px: number;
    readonly py: number;
}

function transverseMassSquared(visible: Transverse, chi_mass: number, qx: number, qy: number): number {
    const et_vis = Math.sqrt(visible.m * visible.m + visible.px * visible.px + visible.py * visible.py);
    const et_chi = Math.sqrt(chi_mass * chi_mass + qx * qx + qy * qy);
    return visible.m * visible.m + chi_mass * chi_mass
        + 2 * (et_vis * et_chi - visible.px * qx - visible.py * qy);
}

function goldenMinimum(lo: number, hi: number, fn: (x: number) => number): { x: number; value: number } {
    let a = lo;
    let b = hi;
    let c = b - GOLDEN * (b - a);
    let d = a + GOLDEN * (b - a);
    let fc = fn(c);
    let fd = fn(d);
    for (let i = 0; i < SEARCH_ITERATIONS; i++) {
        if (fc < fd) {
            b = d;
            d = c;
            fd = fc;
            c = b - GOLDEN * (b - a);
            fc = fn(c);
        } else {
            a = c;
            c = d;
            fc = fd;
            d = a + GOLDEN * (b - a);
            fd = fn(d);
        }
    }
    const x = (a + b) / 2;
    return { x, value: fn(x) };
}

export function calculateMt2(
    leg1: LorentzVector,
    leg2: LorentzVector,
    bjet1: LorentzVector,
    bjet2: LorentzVector,
    met: LorentzVector
): number {
    const vis_a: Transverse = { m: Math.max(bjet1.mass(), 0), px: bjet1.px, py: bjet1.py };
    const vis_b: Transverse = { m: Math.max(bjet2.mass(), 0), px: bjet2.px, py: bjet2.py };
    const chi_a = Math.max(leg1.mass(), 0);
    const chi_b = Math.max(leg2.mass(), 0);

    const miss_x = leg1.px + leg2.px + met.px;
    const miss_y = leg1.py + leg2.py + met.py;

    const objective = (qx: number, qy: number): number => Math.max(
        transverseMassSquared(vis_a, chi_a, qx, qy),
        transverseMassSquared(vis_b, chi_b, miss_x - qx, miss_y - qy)
    );

    const range = 2 * (Math.hypot(miss_x, miss_y) + Math.hypot(vis_a.px, vis_a.py) + Math.hypot(vis_b.px, vis_b.py)) + 1;
    const best = goldenMinimum(-range, range, (qx) => goldenMinimum(-range, range, (qy) => objective(qx, qy)).value);

    return Math.sqrt(Math.max(best.value, 0));
}
