export type SnapshotCodec<T, D = unknown> = Readonly<{
    serialize: (value: T) => D;
    deserialize: (data: D) => T;
}>;

export type EmptySlotSnapshot = Readonly<{ state: "empty" }>;
export type ReservedSlotSnapshot = Readonly<{ state: "reserved" }>;
export type OccupiedSlotSnapshot<D> = Readonly<{ state: "occupied"; data: D }>;

export type SlotSnapshot<D> = EmptySlotSnapshot | ReservedSlotSnapshot | OccupiedSlotSnapshot<D>;

/** SparseList positions are never reserved: a value or a tombstone. */
export type SparseSlotSnapshot<D> = EmptySlotSnapshot | OccupiedSlotSnapshot<D>;

export type KeyedVecSnapshot<D> = Readonly<{
    format: "slot-arena/keyed-vec@1";
    items: ReadonlyArray<D>;
}>;

export type SlotMapSnapshot<D> = Readonly<{
    format: "slot-arena/slot-map@1";
    slots: ReadonlyArray<SlotSnapshot<D>>;
    /** Free keys, bottom of the stack first. */
    free: ReadonlyArray<number>;
}>;

export type SparseListSnapshot<D> = Readonly<{
    format: "slot-arena/sparse-list@1";
    slots: ReadonlyArray<SparseSlotSnapshot<D>>;
}>;

export type InsertReservedResult<T> =
    | { readonly ok: true }
    | { readonly ok: false; readonly value: T };
