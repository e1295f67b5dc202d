/**
 * Histogram line grammar.
 *
 *   <BinType> [<Timestamp>] <Centroid>... <MetricName> [<Annotation>...]
 *
 * Each field is read by a pure extractor that takes a cursor over the line's
 * tokens and returns the extracted value together with an advanced cursor.
 * The grammar is the fixed composition of those extractors.
 */
import { tokenize, type Token } from './tokenizer.js';
import { MalformedLineError } from './errors.js';
import { resolveBinType } from './bin-type.js';
import { BIN_TYPE_PREFIX, CENTROID_COUNT_PREFIX, CENTROID_PAIR_SEPARATOR } from './format.js';

export interface TokenCursor {
    readonly line: string;
    readonly tokens: readonly Token[];
    readonly index: number;
}

export interface Extracted<T> {
    value: T;
    cursor: TokenCursor;
}

export type Extractor<T> = (cursor: TokenCursor) => Extracted<T>;

export interface RawHistogramFields {
    binTypeLiteral: string;
    binDurationMillis: number;
    /** Epoch millis, or null when the line carries none. */
    timestamp: number | null;
    means: number[];
    counts: number[];
    metricName: string;
    annotations: Map<string, string>;
}

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const TIMESTAMP_PATTERN = /^-?\d+$/;
const LEADING_WORD = /^[ \t\r\n]*([^ \t\r\n]*)/;

function peek(cursor: TokenCursor): Token | undefined {
    return cursor.tokens[cursor.index];
}

function advance(cursor: TokenCursor, by = 1): TokenCursor {
    return { ...cursor, index: cursor.index + by };
}

/** Position used in error messages: the current token, or end of line. */
function positionOf(cursor: TokenCursor): number {
    return peek(cursor)?.start ?? cursor.line.length;
}

function fail(cursor: TokenCursor, message: string): never {
    throw new MalformedLineError(message, cursor.line, positionOf(cursor));
}

function parseMean(text: string): number | null {
    if (!DECIMAL_PATTERN.test(text)) return null;
    const value = Number(text);
    return Number.isFinite(value) ? value : null;
}

function parseCount(text: string): number | null {
    if (!INTEGER_PATTERN.test(text)) return null;
    const value = Number(text);
    return Number.isSafeInteger(value) ? value : null;
}

/** First whitespace-delimited word of `text`, quotes left in place. */
function leadingWord(text: string): string {
    return LEADING_WORD.exec(text)?.[1] ?? '';
}

/**
 * Reads the bin-type literal and resolves it, so an unknown literal fails
 * before the rest of the line. A literal with quotes in it is resolved as
 * written and so never matches.
 */
export const binType: Extractor<{ literal: string; durationMillis: number }> = (cursor) => {
    const token = peek(cursor);
    if (!token) fail(cursor, 'Missing bin type');
    const literal = token.quoted ? leadingWord(cursor.line.slice(token.start)) : token.text;
    return {
        value: { literal, durationMillis: resolveBinType(literal) },
        cursor: advance(cursor),
    };
};

export const optionalTimestamp: Extractor<number | null> = (cursor) => {
    const token = peek(cursor);
    if (!token || token.quoted || !TIMESTAMP_PATTERN.test(token.text)) {
        return { value: null, cursor };
    }
    if (token.text.startsWith('-')) fail(cursor, 'Timestamp must not be negative');
    const value = Number(token.text);
    if (!Number.isSafeInteger(value)) fail(cursor, `Timestamp out of range: ${token.text}`);
    return { value, cursor: advance(cursor) };
};

/**
 * Reads one centroid in `mean|count` or `#count mean` form, or returns null
 * without consuming anything when the next token is not a centroid.
 */
const optionalCentroid: Extractor<{ mean: number; count: number } | null> = (cursor) => {
    const token = peek(cursor);
    if (!token || token.quoted) return { value: null, cursor };

    if (token.text.startsWith(CENTROID_COUNT_PREFIX)) {
        const count = parseCount(token.text.slice(CENTROID_COUNT_PREFIX.length));
        if (count === null) fail(cursor, `Malformed centroid count: ${token.text}`);
        const next = advance(cursor);
        const meanToken = peek(next);
        if (!meanToken || meanToken.quoted) fail(next, 'Centroid count without a mean');
        const mean = parseMean(meanToken.text);
        if (mean === null) fail(next, `Malformed centroid mean: ${meanToken.text}`);
        return { value: { mean, count }, cursor: advance(next) };
    }

    const sep = token.text.indexOf(CENTROID_PAIR_SEPARATOR);
    if (sep < 0) return { value: null, cursor };
    const mean = parseMean(token.text.slice(0, sep));
    const count = parseCount(token.text.slice(sep + 1));
    if (mean === null || count === null) return { value: null, cursor };
    return { value: { mean, count }, cursor: advance(cursor) };
};

export const centroids: Extractor<{ means: number[]; counts: number[] }> = (cursor) => {
    const means: number[] = [];
    const counts: number[] = [];
    let current = cursor;

    for (;;) {
        const { value, cursor: next } = optionalCentroid(current);
        if (!value) break;
        means.push(value.mean);
        counts.push(value.count);
        current = next;
    }

    if (means.length === 0) fail(cursor, 'Expected at least one centroid');
    return { value: { means, counts }, cursor: current };
};

export const metricName: Extractor<string> = (cursor) => {
    const token = peek(cursor);
    if (!token) fail(cursor, 'Missing metric name');
    if (token.eqIndex >= 0) fail(cursor, `Expected metric name, found annotation: ${token.text}`);
    if (token.text.length === 0) fail(cursor, 'Metric name must not be empty');
    return { value: token.text, cursor: advance(cursor) };
};

export const annotationList: Extractor<Map<string, string>> = (cursor) => {
    const annotations = new Map<string, string>();
    let current = cursor;

    for (let token = peek(current); token; token = peek(current)) {
        if (token.eqIndex <= 0) fail(current, `Malformed annotation: ${token.text}`);
        annotations.set(token.text.slice(0, token.eqIndex), token.text.slice(token.eqIndex + 1));
        current = advance(current);
    }

    return { value: annotations, cursor: current };
};

/**
 * True when the line's first word starts with `!`. Blank lines, comments and
 * lines belonging to other entity types are not histogram lines. Decided on
 * the raw text, so a stray quote elsewhere in a foreign line is never read.
 */
export function isHistogramLine(line: string): boolean {
    return leadingWord(line).startsWith(BIN_TYPE_PREFIX);
}

/**
 * Parses one line into raw fields, or returns null for lines that are not
 * histogram lines. Throws UnrecognizedBinTypeError for an unknown `!` literal
 * and MalformedLineError on any other grammar failure.
 */
export function parseHistogramLine(line: string): RawHistogramFields | null {
    if (!isHistogramLine(line)) return null;

    const start: TokenCursor = { line, tokens: tokenize(line), index: 0 };
    const bin = binType(start);
    const timestamp = optionalTimestamp(bin.cursor);
    const points = centroids(timestamp.cursor);
    const metric = metricName(points.cursor);
    const annotations = annotationList(metric.cursor);

    return {
        binTypeLiteral: bin.value.literal,
        binDurationMillis: bin.value.durationMillis,
        timestamp: timestamp.value,
        means: points.value.means,
        counts: points.value.counts,
        metricName: metric.value,
        annotations: annotations.value,
    };
}
