import { parseHistogramLine, isHistogramLine } from '../src/histogram/grammar.js';
import { MalformedLineError, UnrecognizedBinTypeError } from '../src/histogram/errors.js';

function malformedAt(line: string): MalformedLineError {
    try {
        parseHistogramLine(line);
    } catch (err) {
        if (err instanceof MalformedLineError) return err;
        throw err;
    }
    throw new Error(`expected "${line}" to be rejected`);
}

describe('parseHistogramLine', () => {
    it('parses bin type, timestamp, pipe centroids, metric and annotations', () => {
        const fields = parseHistogramLine('!H 3661000 1.0|2 5.0|3 my.metric host=a');
        expect(fields).toEqual({
            binTypeLiteral: '!H',
            binDurationMillis: 3_600_000,
            timestamp: 3_661_000,
            means: [1, 5],
            counts: [2, 3],
            metricName: 'my.metric',
            annotations: new Map([['host', 'a']]),
        });
    });

    it('parses #count mean centroids', () => {
        const fields = parseHistogramLine('!M 1493773500 #20 30.0 #10 5.1 request.latency source=app-1 region=us-west');
        expect(fields?.means).toEqual([30, 5.1]);
        expect(fields?.counts).toEqual([20, 10]);
        expect(fields?.metricName).toBe('request.latency');
        expect(fields?.annotations).toEqual(new Map([['source', 'app-1'], ['region', 'us-west']]));
    });

    it('accepts a mix of both centroid forms', () => {
        const fields = parseHistogramLine('!D #4 1.5 2.5|6 m');
        expect(fields?.means).toEqual([1.5, 2.5]);
        expect(fields?.counts).toEqual([4, 6]);
    });

    it('leaves the timestamp null when the line carries none', () => {
        const fields = parseHistogramLine('!D 1.5|1 m');
        expect(fields?.timestamp).toBeNull();
        expect(fields?.annotations.size).toBe(0);
    });

    it('keeps zero and negative counts for the normalizer to judge', () => {
        const fields = parseHistogramLine('!M 1.0|0 2.0|-3 m');
        expect(fields?.counts).toEqual([0, -3]);
    });

    it('accepts signed and exponent means', () => {
        const fields = parseHistogramLine('!M -1.5|1 2e3|1 .5|1 m');
        expect(fields?.means).toEqual([-1.5, 2000, 0.5]);
    });

    it('lets the last duplicate annotation win', () => {
        const fields = parseHistogramLine('!M 1.0|1 m k=1 k=2');
        expect(fields?.annotations).toEqual(new Map([['k', '2']]));
    });

    it('reads quoted metric names and annotation values', () => {
        const fields = parseHistogramLine('!M 1.0|1 "my metric" k="a b" empty=');
        expect(fields?.metricName).toBe('my metric');
        expect(fields?.annotations).toEqual(new Map([['k', 'a b'], ['empty', '']]));
    });

    it('treats a token that only looks like a centroid as the metric name', () => {
        const fields = parseHistogramLine('!M 1.0|1 jobs|queued');
        expect(fields?.metricName).toBe('jobs|queued');
    });

    it.each([
        '',
        '   ',
        '# a comment',
        '#!M 1.0|1 m',
        'cpu.load 1.0 1493773500 host=a',
        '"!M" 1.0|1 m',
        '# don"t parse me',
        'cpu.load 1 source="h',
        '"unterminated first word',
    ])(
        'returns null for non-histogram line %j',
        (line) => {
            expect(parseHistogramLine(line)).toBeNull();
        }
    );

    it('rejects unknown bin types before looking at the rest of the line', () => {
        expect(() => parseHistogramLine('!X 1.0|1 m')).toThrow(UnrecognizedBinTypeError);
        expect(() => parseHistogramLine('!m')).toThrow(UnrecognizedBinTypeError);
    });

    it('does not accept a bin type spelled with quotes', () => {
        expect(() => parseHistogramLine('!"M" 1.0|1 m')).toThrow('Unknown BinType !"M"');
    });

    it('rejects an unterminated quote on a histogram line', () => {
        expect(() => parseHistogramLine('!M 1.0|1 "open')).toThrow(MalformedLineError);
    });

    it('rejects a line without centroids', () => {
        const err = malformedAt('!M 1000 m');
        expect(err.message).toBe('Expected at least one centroid (at 8 in "!M 1000 m")');
        expect(err.position).toBe(8);
    });

    it('rejects a missing metric name at end of line', () => {
        const err = malformedAt('!M 1.0|1');
        expect(err.position).toBe(8);
        expect(err.message.startsWith('Missing metric name')).toBe(true);
    });

    it('rejects an annotation in place of the metric name', () => {
        expect(malformedAt('!M 1.0|1 region=x').message.startsWith('Expected metric name, found annotation: region=x')).toBe(true);
    });

    it('rejects an empty quoted metric name', () => {
        expect(malformedAt('!M 1.0|1 ""').message.startsWith('Metric name must not be empty')).toBe(true);
    });

    it('rejects malformed centroid counts and means', () => {
        expect(malformedAt('!M #x 1.0 m').message.startsWith('Malformed centroid count: #x')).toBe(true);
        expect(malformedAt('!M #2').message.startsWith('Centroid count without a mean')).toBe(true);
        expect(malformedAt('!M #2 abc m').message.startsWith('Malformed centroid mean: abc')).toBe(true);
    });

    it('rejects negative timestamps', () => {
        const err = malformedAt('!M -5 1.0|1 m');
        expect(err.message.startsWith('Timestamp must not be negative')).toBe(true);
        expect(err.position).toBe(3);
    });

    it('rejects tokens after the metric that are not annotations', () => {
        expect(malformedAt('!M 1.0|1 m k').message.startsWith('Malformed annotation: k')).toBe(true);
        expect(malformedAt('!M 1.0|1 m =v').message.startsWith('Malformed annotation: =v')).toBe(true);
    });
});

describe('isHistogramLine', () => {
    it('accepts lines opening with an unquoted ! token', () => {
        expect(isHistogramLine('!Q anything')).toBe(true);
        expect(isHistogramLine('  \t!M 1.0|1 m')).toBe(true);
        expect(isHistogramLine('metric 1 2')).toBe(false);
        expect(isHistogramLine('"!M" 1.0|1 m')).toBe(false);
        expect(isHistogramLine('# say "hi')).toBe(false);
        expect(isHistogramLine('')).toBe(false);
    });
});
