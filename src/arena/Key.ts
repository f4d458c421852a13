declare const keyBrand: unique symbol;

/**
 * Nominal integer handle. Two keys with different `Name`s are different types,
 * so a key issued by one container family does not type-check against another.
 */
export type Key<Name extends string = string> = number & { readonly [keyBrand]: Name };

/** Id used for the `invalid` key of every family. Containers never issue it. */
export const INVALID_KEY_ID = Number.MAX_SAFE_INTEGER;

export interface KeyType<K extends number>
{
    readonly name: string;
    /** Conventional "no key" value. */
    readonly invalid: K;
    fromId(id: number): K;
    id(key: K): number;
}

export type KeyOf<T> = T extends KeyType<infer K> ? K : never;

function checkId(name: string, id: number): void
{
    if (!Number.isSafeInteger(id) || id < 0) {
        throw new RangeError(`${name}.fromId(${id}) failed: id must be a non-negative safe integer`);
    }
}

/**
 * Mints a new key family.
 *
 * ```ts
 * export const NodeKey = defineKey("NodeKey");
 * export type NodeKey = KeyOf<typeof NodeKey>;
 * ```
 */
export function defineKey<Name extends string>(name: Name): KeyType<Key<Name>>
{
    const fromId = (id: number): Key<Name> => {
        checkId(name, id);
        return id as Key<Name>;
    };

    return Object.freeze({
        name,
        invalid: fromId(INVALID_KEY_ID),
        fromId,
        id: (key: Key<Name>): number => key
    });
}

/** Untyped family: any number is a key. */
export const IndexKey: KeyType<number> = Object.freeze({
    name: "IndexKey",
    invalid: INVALID_KEY_ID,
    fromId: (id: number): number => {
        checkId("IndexKey", id);
        return id;
    },
    id: (key: number): number => key
});
