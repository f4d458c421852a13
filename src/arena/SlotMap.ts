import { assertSnapshotArray, assertSnapshotFormat } from "./Codec";
import type { KeyType } from "./Key";
import type { InsertReservedResult, SlotMapSnapshot, SlotSnapshot, SnapshotCodec } from "./Types";

const SLOT_MAP_FORMAT: SlotMapSnapshot<unknown>["format"] = "slot-arena/slot-map@1";

type EmptySlot = { readonly state: "empty" };
type ReservedSlot = { readonly state: "reserved" };
type OccupiedSlot<T> = { readonly state: "occupied"; value: T };

type Slot<T> = EmptySlot | ReservedSlot | OccupiedSlot<T>;

// Shared: empty and reserved slots carry no data.
const EMPTY: EmptySlot = Object.freeze({ state: "empty" });
const RESERVED: ReservedSlot = Object.freeze({ state: "reserved" });

/**
 * Map from keys to values that recycles the slots of removed values.
 *
 * Slots move through `empty -> reserved | occupied -> empty`. A key is valid while its
 * slot is reserved or occupied. Freed keys are reused last-freed-first.
 *
 * There are no generations: a key kept after its value was removed will point at
 * whatever is stored in that slot next. Callers own that discipline.
 */
export class SlotMap<K extends number, T>
{
    private slots: Slot<T>[] = [];
    private free: K[] = [];
    private _size = 0;

    constructor(readonly family: KeyType<K>) { }

    /** Number of occupied slots. */
    public get size(): number
    {
        return this._size;
    }

    /** Number of allocated slots, whatever their state. */
    public get slotCount(): number
    {
        return this.slots.length;
    }

    public get freeCount(): number
    {
        return this.free.length;
    }

    public insert(value: T): K
    {
        const key = this.acquire();
        this.slots[this.family.id(key)] = { state: "occupied", value };
        this._size++;
        return key;
    }

    /** Hands out a key now; the value follows through insertReserved(). */
    public reserveSlot(): K
    {
        const key = this.acquire();
        this.slots[this.family.id(key)] = RESERVED;
        return key;
    }

    /**
     * Fills a reserved slot. When `key` does not point at a reserved slot nothing
     * changes and `value` is handed back in the result.
     */
    public insertReserved(key: K, value: T): InsertReservedResult<T>
    {
        const id = this.family.id(key);
        if (this.slotAt(id)?.state !== "reserved") return { ok: false, value };

        this.slots[id] = { state: "occupied", value };
        this._size++;
        return { ok: true };
    }

    /** Reserved slots read as absent. */
    public get(key: K): T | undefined
    {
        const slot = this.slotAt(this.family.id(key));
        return slot?.state === "occupied" ? slot.value : undefined;
    }

    /** Indexing form of get(): throws a RangeError unless the slot holds a value. */
    public at(key: K): T
    {
        const id = this.family.id(key);
        const slot = this.slotAt(id);
        if (slot?.state !== "occupied") {
            throw new RangeError(`SlotMap.at(${id}) failed: slot is ${slot ? slot.state : "out of range"}`);
        }
        return slot.value;
    }

    /** Replaces the value of an occupied slot. Returns false for any other slot. */
    public set(key: K, value: T): boolean
    {
        const slot = this.slotAt(this.family.id(key));
        if (slot?.state !== "occupied") return false;
        slot.value = value;
        return true;
    }

    public has(key: K): boolean
    {
        return this.slotAt(this.family.id(key))?.state === "occupied";
    }

    public isReserved(key: K): boolean
    {
        return this.slotAt(this.family.id(key))?.state === "reserved";
    }

    /** True while the slot is reserved or occupied. */
    public isValid(key: K): boolean
    {
        const state = this.slotAt(this.family.id(key))?.state;
        return state === "reserved" || state === "occupied";
    }

    /**
     * Empties the slot and puts the key on the free list. Returns the value when the
     * slot was occupied; a reserved slot is released and yields undefined. Empty and
     * out-of-range keys are a no-op.
     */
    public remove(key: K): T | undefined
    {
        const id = this.family.id(key);
        const slot = this.slotAt(id);
        if (!slot || slot.state === "empty") return undefined;

        this.slots[id] = EMPTY;
        this.free.push(key);
        if (slot.state === "reserved") return undefined;

        this._size--;
        return slot.value;
    }

    /** Key of the highest allocated slot, whatever its state. */
    public keyOfLastItem(): K | undefined
    {
        if (this.slots.length === 0) return undefined;
        return this.family.fromId(this.slots.length - 1);
    }

    public clear(): void
    {
        this.slots = [];
        this.free = [];
        this._size = 0;
    }

    /** Occupied (key, value) pairs in slot order. */
    public *entries(): IterableIterator<[K, T]>
    {
        for (let i = 0; i < this.slots.length; i++) {
            const slot = this.slots[i];
            if (slot.state === "occupied") yield [this.family.fromId(i), slot.value];
        }
    }

    public *keys(): IterableIterator<K>
    {
        for (const [key] of this.entries()) yield key;
    }

    public *values(): IterableIterator<T>
    {
        for (const slot of this.slots) {
            if (slot.state === "occupied") yield slot.value;
        }
    }

    public [Symbol.iterator](): IterableIterator<[K, T]>
    {
        return this.entries();
    }

    public snapshot<D>(codec: SnapshotCodec<T, D>): SlotMapSnapshot<D>
    {
        const slots = this.slots.map((slot): SlotSnapshot<D> => {
            switch (slot.state) {
                case "empty": return { state: "empty" };
                case "reserved": return { state: "reserved" };
                case "occupied": return { state: "occupied", data: codec.serialize(slot.value) };
            }
        });

        return {
            format: SLOT_MAP_FORMAT,
            slots,
            free: this.free.map((key) => this.family.id(key))
        };
    }

    /**
     * Replaces the contents, keeping every slot's state and the free-list order.
     * The snapshot is validated first; on error the map is left untouched.
     */
    public restore<D>(snapshot: SlotMapSnapshot<D>, codec: SnapshotCodec<T, D>): void
    {
        assertSnapshotFormat("slot map", snapshot.format, SLOT_MAP_FORMAT);
        assertSnapshotArray("slot map slots", snapshot.slots);
        assertSnapshotArray("slot map free list", snapshot.free);

        const slots: Slot<T>[] = new Array(snapshot.slots.length);
        const emptyIds = new Set<number>();
        let size = 0;
        for (let i = 0; i < snapshot.slots.length; i++) {
            const s = snapshot.slots[i];
            if (typeof s !== "object" || s === null) {
                throw new Error(`Invalid snapshot slot map slot ${i}: ${JSON.stringify(s)}`);
            }
            switch (s.state) {
                case "empty":
                    slots[i] = EMPTY;
                    emptyIds.add(i);
                    break;
                case "reserved":
                    slots[i] = RESERVED;
                    break;
                case "occupied":
                    slots[i] = { state: "occupied", value: codec.deserialize(s.data) };
                    size++;
                    break;
                default: {
                    const unknownSlot: never = s;
                    throw new Error(`Invalid snapshot slot map slot ${i}: ${JSON.stringify(unknownSlot)}`);
                }
            }
        }

        const seenFree = new Set<number>();
        for (const id of snapshot.free) {
            if (!Number.isInteger(id) || id < 0) {
                throw new Error(`Invalid snapshot slot map free id: ${id}`);
            }
            if (id >= slots.length) {
                throw new Error(`Invalid snapshot slot map free id ${id}: must be < slot count ${slots.length}`);
            }
            if (seenFree.has(id)) {
                throw new Error(`Duplicate snapshot slot map free id ${id}`);
            }
            if (!emptyIds.has(id)) {
                throw new Error(`Invalid snapshot slot map free id ${id}: slot is not empty`);
            }
            seenFree.add(id);
        }
        for (const id of emptyIds) {
            if (!seenFree.has(id)) {
                throw new Error(`Invalid snapshot slot map: empty slot ${id} is missing from the free list`);
            }
        }

        this.slots = slots;
        this.free = snapshot.free.map((id) => this.family.fromId(id));
        this._size = size;
    }

    private acquire(): K
    {
        const reused = this.free.pop();
        if (reused !== undefined) return reused;

        const key = this.family.fromId(this.slots.length);
        this.slots.push(EMPTY);
        return key;
    }

    private slotAt(id: number): Slot<T> | undefined
    {
        return Number.isInteger(id) && id >= 0 && id < this.slots.length ? this.slots[id] : undefined;
    }
}
