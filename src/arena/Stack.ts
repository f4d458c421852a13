/**
 * LIFO stack. at() and set() count from the top: depth 0 is the last pushed item.
 */
export class Stack<T>
{
    private items: T[] = [];

    public get length(): number
    {
        return this.items.length;
    }

    public push(item: T): void
    {
        this.items.push(item);
    }

    public pop(): T | undefined
    {
        return this.items.pop();
    }

    public peek(): T | undefined
    {
        return this.items.length > 0 ? this.items[this.items.length - 1] : undefined;
    }

    public at(depth: number): T
    {
        return this.items[this.indexOf(depth, "at")];
    }

    public set(depth: number, item: T): void
    {
        this.items[this.indexOf(depth, "set")] = item;
    }

    public clear(): void
    {
        this.items.length = 0;
    }

    /** Top to bottom. */
    public *[Symbol.iterator](): IterableIterator<T>
    {
        for (let i = this.items.length - 1; i >= 0; i--) yield this.items[i];
    }

    private indexOf(depth: number, op: string): number
    {
        if (!Number.isInteger(depth) || depth < 0 || depth >= this.items.length) {
            throw new RangeError(`Stack.${op}(${depth}) out of range (length ${this.items.length})`);
        }
        return this.items.length - 1 - depth;
    }
}
