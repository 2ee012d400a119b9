/**
 * Minimal four-vector in Cartesian storage (px, py, pz, E).
 * Instances are immutable; every operation returns a new vector.
 */
export class LorentzVector {
    readonly px: number;
    readonly py: number;
    readonly pz: number;
    readonly e: number;

    constructor(px: number, py: number, pz: number, e: number) {
        this.px = px;
        this.py = py;
        this.pz = pz;
        this.e = e;
    }

    static zero(): LorentzVector {
        return new LorentzVector(0, 0, 0, 0);
    }

    static fromPtEtaPhiM(pt: number, eta: number, phi: number, m: number): LorentzVector {
        const px = pt * Math.cos(phi);
        const py = pt * Math.sin(phi);
        const pz = pt * Math.sinh(eta);
        const e = Math.sqrt(px * px + py * py + pz * pz + m * m);
        return new LorentzVector(px, py, pz, e);
    }

    static fromPtEtaPhiE(pt: number, eta: number, phi: number, e: number): LorentzVector {
        return new LorentzVector(pt * Math.cos(phi), pt * Math.sin(phi), pt * Math.sinh(eta), e);
    }

    add(other: LorentzVector): LorentzVector {
        return new LorentzVector(this.px + other.px, this.py + other.py, this.pz + other.pz, this.e + other.e);
    }

    subtract(other: LorentzVector): LorentzVector {
        return new LorentzVector(this.px - other.px, this.py - other.py, this.pz - other.pz, this.e - other.e);
    }

    scale(factor: number): LorentzVector {
        return new LorentzVector(this.px * factor, this.py * factor, this.pz * factor, this.e * factor);
    }

    pt(): number {
        return Math.hypot(this.px, this.py);
    }

    p(): number {
        return Math.hypot(this.px, this.py, this.pz);
    }

    energy(): number {
        return this.e;
    }

    phi(): number {
        return this.px === 0 && this.py === 0 ? 0 : Math.atan2(this.py, this.px);
    }

    eta(): number {
        const pt = this.pt();
        if (pt === 0) {
            if (this.pz === 0) return 0;
            return this.pz > 0 ? Infinity : -Infinity;
        }
        return Math.asinh(this.pz / pt);
    }

    /** Invariant mass; space-like vectors return -sqrt(-m2). */
    mass(): number {
        const m2 = this.e * this.e - this.p() ** 2;
        return m2 >= 0 ? Math.sqrt(m2) : -Math.sqrt(-m2);
    }

    deltaPhi(other: LorentzVector): number {
        let dphi = this.phi() - other.phi();
        while (dphi > Math.PI) dphi -= 2 * Math.PI;
        while (dphi <= -Math.PI) dphi += 2 * Math.PI;
        return dphi;
    }

    deltaR(other: LorentzVector): number {
        return Math.hypot(this.eta() - other.eta(), this.deltaPhi(other));
    }

    /** Transverse-only copy: pz = 0, E = pt. Used for missing-energy momenta. */
    transverse(): LorentzVector {
        return new LorentzVector(this.px, this.py, 0, this.pt());
    }
}
