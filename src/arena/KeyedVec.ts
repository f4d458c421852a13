import { assertSnapshotArray, assertSnapshotFormat } from "./Codec";
import type { KeyType } from "./Key";
import type { KeyedVecSnapshot, SnapshotCodec } from "./Types";

const KEYED_VEC_FORMAT: KeyedVecSnapshot<unknown>["format"] = "slot-arena/keyed-vec@1";

/**
 * Append-only list addressed by keys of a single family.
 * Nothing is ever removed, so a key stays valid for the lifetime of the list.
 */
export class KeyedVec<K extends number, T>
{
    private items: T[] = [];

    constructor(readonly family: KeyType<K>) { }

    public get length(): number
    {
        return this.items.length;
    }

    /** Appends `value`; the returned key equals the length before the call. */
    public insert(value: T): K
    {
        const key = this.family.fromId(this.items.length);
        this.items.push(value);
        return key;
    }

    public has(key: K): boolean
    {
        return this.inRange(this.family.id(key));
    }

    /** Throws a RangeError for a key this list never issued. */
    public get(key: K): T
    {
        return this.items[this.indexOf(key, "get")];
    }

    public set(key: K, value: T): void
    {
        this.items[this.indexOf(key, "set")] = value;
    }

    public *keys(): IterableIterator<K>
    {
        for (let i = 0; i < this.items.length; i++) yield this.family.fromId(i);
    }

    public *values(): IterableIterator<T>
    {
        for (let i = 0; i < this.items.length; i++) yield this.items[i];
    }

    public *entries(): IterableIterator<[K, T]>
    {
        for (let i = 0; i < this.items.length; i++) yield [this.family.fromId(i), this.items[i]];
    }

    public [Symbol.iterator](): IterableIterator<T>
    {
        return this.values();
    }

    public snapshot<D>(codec: SnapshotCodec<T, D>): KeyedVecSnapshot<D>
    {
        return {
            format: KEYED_VEC_FORMAT,
            items: this.items.map((value) => codec.serialize(value))
        };
    }

    /** Replaces the contents. Throws, leaving the list untouched, if the snapshot is malformed. */
    public restore<D>(snapshot: KeyedVecSnapshot<D>, codec: SnapshotCodec<T, D>): void
    {
        assertSnapshotFormat("keyed vec", snapshot.format, KEYED_VEC_FORMAT);
        assertSnapshotArray("keyed vec items", snapshot.items);
        this.items = snapshot.items.map((data) => codec.deserialize(data));
    }

    private indexOf(key: K, op: string): number
    {
        const id = this.family.id(key);
        if (!this.inRange(id)) {
            throw new RangeError(`KeyedVec.${op}(${id}) out of range (length ${this.items.length})`);
        }
        return id;
    }

    private inRange(id: number): boolean
    {
        return Number.isInteger(id) && id >= 0 && id < this.items.length;
    }
}
