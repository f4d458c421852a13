/** Half-open offset range into a source string: `start` inclusive, `end` exclusive. */
export type Span = Readonly<{
    start: number;
    end: number;
}>;

/** Zero-based line/column bounds of a span. */
export type Location = Readonly<{
    span: Span;
    line: number;
    endLine: number;
    column: number;
    endColumn: number;
}>;

export function span(start: number, end: number): Span
{
    return { start, end };
}

/** Span covering `first..=last`. */
export function spanFromInclusive(first: number, last: number): Span
{
    return { start: first, end: last + 1 };
}

export function spanContains(s: Span, offset: number): boolean
{
    return offset >= s.start && offset < s.end;
}

/** Smallest location covering both. */
export function mergeLocations(a: Location, b: Location): Location
{
    const first = compareLocations(a, b) <= 0 ? a : b;
    const last = a.endLine > b.endLine || (a.endLine === b.endLine && a.endColumn >= b.endColumn) ? a : b;

    return {
        span: span(Math.min(a.span.start, b.span.start), Math.max(a.span.end, b.span.end)),
        line: first.line,
        column: first.column,
        endLine: last.endLine,
        endColumn: last.endColumn
    };
}

/** Orders by start line, then start column. */
export function compareLocations(a: Location, b: Location): number
{
    if (a.line !== b.line) return a.line - b.line;
    return a.column - b.column;
}

/**
 * Converts offset spans into line/column locations for one source string.
 * Offsets are UTF-16 code unit indices, as used by String.prototype.slice.
 */
export class SpanConverter
{
    // Offset at which each line starts; a line includes its trailing "\n".
    private readonly lineStarts: number[] = [0];
    private readonly length: number;

    constructor(source: string)
    {
        this.length = source.length;
        for (let i = 0; i < source.length; i++) {
            if (source.charCodeAt(i) === 10) this.lineStarts.push(i + 1);
        }
    }

    public get lineCount(): number
    {
        return this.lineStarts.length;
    }

    public convert(s: Span): Location
    {
        if (s.end < s.start) {
            throw new RangeError(`SpanConverter.convert(${s.start}..${s.end}) failed: end is before start`);
        }
        const [line, column] = this.position(s.start);
        const [endLine, endColumn] = this.position(s.end);
        return { span: s, line, endLine, column, endColumn };
    }

    /** [line, column] of an offset; the source length maps to the end of the last line. */
    private position(offset: number): [number, number]
    {
        if (!Number.isInteger(offset) || offset < 0 || offset > this.length) {
            throw new RangeError(`SpanConverter offset ${offset} out of range (length ${this.length})`);
        }

        // Last line starting at or before offset.
        let lo = 0;
        let hi = this.lineStarts.length - 1;
        while (lo < hi) {
            const mid = (lo + hi + 1) >> 1;
            if (this.lineStarts[mid] <= offset) lo = mid;
            else hi = mid - 1;
        }
        return [lo, offset - this.lineStarts[lo]];
    }
}
