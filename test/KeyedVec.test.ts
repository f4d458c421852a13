import { defineKey, identityCodec, IndexKey, KeyedVec, type KeyOf } from "../src";

const TokenKey = defineKey("TokenKey");
type TokenKey = KeyOf<typeof TokenKey>;

describe("KeyedVec", () => {
    test("insert returns the pre-insert length as key", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);

        const a = vec.insert("a");
        const b = vec.insert("b");

        expect(TokenKey.id(a)).toBe(0);
        expect(TokenKey.id(b)).toBe(1);
        expect(vec.length).toBe(2);
    });

    test("get returns every value ever inserted and length only grows", () => {
        const vec = new KeyedVec<TokenKey, number>(TokenKey);
        const keys: TokenKey[] = [];

        for (let i = 0; i < 50; i++) {
            keys.push(vec.insert(i * 10));
            expect(vec.length).toBe(i + 1);
        }

        keys.forEach((key, i) => expect(vec.get(key)).toBe(i * 10));
    });

    test("get and set throw for keys past the end", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);
        vec.insert("only");

        expect(() => vec.get(TokenKey.fromId(1))).toThrow("KeyedVec.get(1) out of range (length 1)");
        expect(() => vec.set(TokenKey.fromId(5), "x")).toThrow(RangeError);
        expect(() => vec.get(TokenKey.invalid)).toThrow(RangeError);
    });

    test("negative and fractional ids are out of range", () => {
        const vec = new KeyedVec<number, string>(IndexKey);
        vec.insert("a");
        vec.insert("b");

        expect(() => vec.get(-1)).toThrow("KeyedVec.get(-1) out of range (length 2)");
        expect(() => vec.get(0.5)).toThrow("KeyedVec.get(0.5) out of range (length 2)");
        expect(() => vec.set(-1, "x")).toThrow(RangeError);
        expect(() => vec.set(0.5, "y")).toThrow(RangeError);
        expect(vec.has(-1)).toBe(false);
        expect(vec.has(0.5)).toBe(false);
        expect([...vec.entries()]).toEqual([[0, "a"], [1, "b"]]);
    });

    test("set replaces a value in place", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);
        const key = vec.insert("before");

        vec.set(key, "after");

        expect(vec.get(key)).toBe("after");
        expect(vec.length).toBe(1);
    });

    test("objects are returned by reference", () => {
        const vec = new KeyedVec<TokenKey, { n: number }>(TokenKey);
        const key = vec.insert({ n: 1 });

        vec.get(key).n = 2;

        expect(vec.get(key)).toEqual({ n: 2 });
    });

    test("has reports keys inside the list", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);
        const key = vec.insert("a");

        expect(vec.has(key)).toBe(true);
        expect(vec.has(TokenKey.fromId(1))).toBe(false);
    });

    test("iterates in insertion order", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);
        vec.insert("x");
        vec.insert("y");

        expect([...vec]).toEqual(["x", "y"]);
        expect([...vec.keys()]).toEqual([0, 1]);
        expect([...vec.entries()]).toEqual([[0, "x"], [1, "y"]]);
    });

    test("snapshot and restore keep order and keys", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);
        vec.insert("a");
        const b = vec.insert("b");

        const snapshot = vec.snapshot(identityCodec<string>());
        expect(snapshot).toEqual({ format: "slot-arena/keyed-vec@1", items: ["a", "b"] });

        const copy = new KeyedVec<TokenKey, string>(TokenKey);
        copy.restore(snapshot, identityCodec<string>());

        expect(copy.get(b)).toBe("b");
        expect(TokenKey.id(copy.insert("c"))).toBe(2);
    });

    test("restore rejects an unknown format and leaves the list untouched", () => {
        const vec = new KeyedVec<TokenKey, string>(TokenKey);
        vec.insert("kept");

        expect(() => vec.restore(
            { format: "other@1" as unknown as "slot-arena/keyed-vec@1", items: [] },
            identityCodec<string>()
        )).toThrow('Unsupported keyed vec snapshot format "other@1". Expected "slot-arena/keyed-vec@1".');

        expect([...vec]).toEqual(["kept"]);
    });
});
