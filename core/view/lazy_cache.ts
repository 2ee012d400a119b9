import { invalidConfiguration } from "../errors/event_view_error.js";

export type Cell<T> =
    | { readonly state: "empty" }
    | { readonly state: "computed"; readonly value: T };

const EMPTY: Cell<never> = Object.freeze({ state: "empty" });

/**
 * LazyCache
 * One guard for every derived object of a view. A cell moves from empty to
 * computed once; only overwrite/reset (used while assembling a shifted copy)
 * move it otherwise.
 *
 * Computation is synchronous, so callers interleaving on the event loop can
 * never observe a half-filled cell. A cell that asks for itself while being
 * computed is a dependency cycle and fails instead of recursing.
 */
export class LazyCache<C> {
    #cells: { [K in keyof C]?: Cell<C[K]> } = {};
    readonly #in_progress = new Set<keyof C>();

    get<K extends keyof C>(key: K, compute: () => C[K]): C[K] {
        const cell = this.#cells[key];
        if (cell !== undefined && cell.state === "computed") {
            return cell.value;
        }
        if (this.#in_progress.has(key)) {
            throw invalidConfiguration(`Cyclic computation of cached value "${String(key)}".`, { key: String(key) });
        }

        this.#in_progress.add(key);
        try {
            const value = compute();
            this.#cells[key] = { state: "computed", value };
            return value;
        } finally {
            this.#in_progress.delete(key);
        }
    }

    peek<K extends keyof C>(key: K): C[K] | undefined {
        const cell = this.#cells[key];
        return cell !== undefined && cell.state === "computed" ? cell.value : undefined;
    }

    state<K extends keyof C>(key: K): Cell<C[K]>["state"] {
        return (this.#cells[key] ?? EMPTY).state;
    }

    /** Store a final value directly, bypassing computation. */
    overwrite<K extends keyof C>(key: K, value: C[K]): void {
        this.#cells[key] = { state: "computed", value };
    }

    reset<K extends keyof C>(key: K): void {
        delete this.#cells[key];
    }

    /** Independent cache sharing the already computed (immutable) values. */
    clone(): LazyCache<C> {
        const copy = new LazyCache<C>();
        copy.#cells = { ...this.#cells };
        return copy;
    }
}
