import { assertSnapshotArray, assertSnapshotFormat } from "./Codec";
import type { KeyType } from "./Key";
import type { SnapshotCodec, SparseListSnapshot, SparseSlotSnapshot } from "./Types";

const SPARSE_LIST_FORMAT: SparseListSnapshot<unknown>["format"] = "slot-arena/sparse-list@1";

type Entry<T> = { value: T } | undefined;

/**
 * Ordered list whose positions are never reused or shifted. remove() leaves a
 * tombstone, so survivors keep their keys and their relative order. Only pop()
 * shrinks the list, since dropping the last position moves nothing else.
 *
 * Use KeyedVec when nothing is ever removed.
 */
export class SparseList<K extends number, T>
{
    // Values are boxed so that a stored `undefined` is not mistaken for a tombstone.
    private slots: Entry<T>[] = [];
    private _usedCount = 0;

    constructor(readonly family: KeyType<K>) { }

    /** Number of positions holding a value. */
    public get usedCount(): number
    {
        return this._usedCount;
    }

    /** Number of positions, tombstones included. */
    public get slotCount(): number
    {
        return this.slots.length;
    }

    public push(value: T): K
    {
        this.slots.push({ value });
        this._usedCount++;
        return this.family.fromId(this.slots.length - 1);
    }

    public extend(values: Iterable<T>): void
    {
        for (const value of values) {
            this.slots.push({ value });
            this._usedCount++;
        }
    }

    /** Value at `key`, or undefined for a tombstone. Throws a RangeError out of range. */
    public at(key: K): T | undefined
    {
        return this.slots[this.indexOf(key, "at")]?.value;
    }

    /** Replaces a live value. Returns false for a tombstone; throws a RangeError out of range. */
    public set(key: K, value: T): boolean
    {
        const entry = this.slots[this.indexOf(key, "set")];
        if (!entry) return false;
        entry.value = value;
        return true;
    }

    /** Leaves a tombstone at `key`. Throws a RangeError out of range. */
    public remove(key: K): T | undefined
    {
        const index = this.indexOf(key, "remove");
        const entry = this.slots[index];
        if (!entry) return undefined;

        this.slots[index] = undefined;
        this._usedCount--;
        return entry.value;
    }

    /** Drops the last position, tombstone or not. */
    public pop(): T | undefined
    {
        if (this.slots.length === 0) return undefined;

        const entry = this.slots.pop();
        if (!entry) return undefined;
        this._usedCount--;
        return entry.value;
    }

    public *values(): IterableIterator<T>
    {
        for (const entry of this.slots) {
            if (entry) yield entry.value;
        }
    }

    public *keys(): IterableIterator<K>
    {
        for (let i = 0; i < this.slots.length; i++) {
            if (this.slots[i]) yield this.family.fromId(i);
        }
    }

    public *entries(): IterableIterator<[K, T]>
    {
        for (let i = 0; i < this.slots.length; i++) {
            const entry = this.slots[i];
            if (entry) yield [this.family.fromId(i), entry.value];
        }
    }

    public [Symbol.iterator](): IterableIterator<T>
    {
        return this.values();
    }

    public snapshot<D>(codec: SnapshotCodec<T, D>): SparseListSnapshot<D>
    {
        return {
            format: SPARSE_LIST_FORMAT,
            slots: this.slots.map((entry): SparseSlotSnapshot<D> => entry
                ? { state: "occupied", data: codec.serialize(entry.value) }
                : { state: "empty" })
        };
    }

    /** Replaces the contents; the used count is recomputed from the slots. */
    public restore<D>(snapshot: SparseListSnapshot<D>, codec: SnapshotCodec<T, D>): void
    {
        assertSnapshotFormat("sparse list", snapshot.format, SPARSE_LIST_FORMAT);
        assertSnapshotArray("sparse list slots", snapshot.slots);

        const slots: Entry<T>[] = new Array(snapshot.slots.length);
        let used = 0;
        for (let i = 0; i < snapshot.slots.length; i++) {
            const s = snapshot.slots[i];
            if (typeof s !== "object" || s === null) {
                throw new Error(`Invalid snapshot sparse list slot ${i}: ${JSON.stringify(s)}`);
            }
            switch (s.state) {
                case "empty":
                    slots[i] = undefined;
                    break;
                case "occupied":
                    slots[i] = { value: codec.deserialize(s.data) };
                    used++;
                    break;
                default: {
                    const unknownSlot: never = s;
                    throw new Error(`Invalid snapshot sparse list slot ${i}: ${JSON.stringify(unknownSlot)}`);
                }
            }
        }

        this.slots = slots;
        this._usedCount = used;
    }

    private indexOf(key: K, op: string): number
    {
        const id = this.family.id(key);
        if (!Number.isInteger(id) || id < 0 || id >= this.slots.length) {
            throw new RangeError(`SparseList.${op}(${id}) out of range (length ${this.slots.length})`);
        }
        return id;
    }
}
