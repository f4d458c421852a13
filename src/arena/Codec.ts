import type { SnapshotCodec } from "./Types";

/** Codec for values that are already JSON-safe. Stores them as-is. */
export function identityCodec<T>(): SnapshotCodec<T, T>
{
    return {
        serialize: (value: T) => value,
        deserialize: (data: T) => data
    };
}

export function assertSnapshotFormat(kind: string, actual: unknown, expected: string): void
{
    if (actual !== expected) {
        throw new Error(
            `Unsupported ${kind} snapshot format "${String(actual)}". ` +
            `Expected "${expected}".`
        );
    }
}

export function assertSnapshotArray(what: string, value: unknown): void
{
    if (!Array.isArray(value)) {
        throw new Error(`Invalid snapshot ${what}: expected an array`);
    }
}
