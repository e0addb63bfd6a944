/** Read-only view over validated shares; the backing Map is not reachable. */
export class FrozenComposition implements ReadonlyMap<string, number> {
    readonly #shares: Map<string, number>;

    constructor(entries: Iterable<readonly [string, number]>) {
        this.#shares = new Map(entries);
        Object.freeze(this);
    }

    get size() {
        return this.#shares.size;
    }

    get(key: string) {
        return this.#shares.get(key);
    }

    has(key: string) {
        return this.#shares.has(key);
    }

    forEach(callbackfn: (value: number, key: string, map: ReadonlyMap<string, number>) => void, thisArg?: unknown) {
        for (const [key, value] of this.#shares) {
            callbackfn.call(thisArg, value, key, this);
        }
    }

    entries() {
        return this.#shares.entries();
    }

    keys() {
        return this.#shares.keys();
    }

    values() {
        return this.#shares.values();
    }

    [Symbol.iterator]() {
        return this.#shares[Symbol.iterator]();
    }
}
