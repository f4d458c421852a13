export { identityCodec } from "./arena/Codec";
export { defineKey, IndexKey, INVALID_KEY_ID } from "./arena/Key";
export type { Key, KeyOf, KeyType } from "./arena/Key";
export { KeyedVec } from "./arena/KeyedVec";
export { SlotMap } from "./arena/SlotMap";
export { SparseList } from "./arena/SparseList";
export { Stack } from "./arena/Stack";
export {
    compareLocations,
    mergeLocations,
    span,
    SpanConverter,
    spanContains,
    spanFromInclusive
} from "./arena/Location";
export type { Location, Span } from "./arena/Location";
export type {
    EmptySlotSnapshot,
    InsertReservedResult,
    KeyedVecSnapshot,
    OccupiedSlotSnapshot,
    ReservedSlotSnapshot,
    SlotMapSnapshot,
    SlotSnapshot,
    SnapshotCodec,
    SparseListSnapshot,
    SparseSlotSnapshot
} from "./arena/Types";
