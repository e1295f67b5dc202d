import { parseHistogramLine, type RawHistogramFields } from './grammar.js';
import { rewriteCentroids, rewriteReason } from './normalizer.js';
import { createMergingDigest } from './digest.js';
import { SOURCE_ANNOTATION, VALUE_KIND_DIGEST } from './format.js';
import {
    HistogramError,
    InvalidLimitsError,
    TooManyCentroidsError,
    UnsupportedOperationError,
} from './errors.js';
import {
    DEFAULT_DECODE_LIMITS,
    type Centroid,
    type DecodeBatchResult,
    type DecodeLimits,
    type HistogramDecoderOptions,
    type HistogramRecord,
    type HostNameSupplier,
} from './types.js';

export const DEFAULT_HOST_NAME = 'unknown';
export const DEFAULT_CUSTOMER_ID = 'default';

const LINE_SPLIT = /\r?\n/;

/**
 * Decodes histogram lines of the form
 *
 *   [BinType] [Timestamp] [Centroids] [Metric] [Annotations]
 *
 * e.g. `!M 1493773500000 #20 30.0 #10 5.1 request.latency source=app-1 region=us-west`
 * into frozen HistogramRecords.
 */
export class HistogramDecoder {
    private readonly defaultHostName: HostNameSupplier;
    private readonly options: Required<HistogramDecoderOptions>;

    constructor(defaultHostName: string | HostNameSupplier = DEFAULT_HOST_NAME, options: HistogramDecoderOptions = {}) {
        this.defaultHostName = typeof defaultHostName === 'string' ? () => defaultHostName : defaultHostName;
        const defaults: Required<HistogramDecoderOptions> = {
            logger: null,
            clock: Date.now,
            digestFactory: createMergingDigest,
        };
        this.options = { ...defaults, ...options };
    }

    /**
     * Appends the decoded record (if the line is a histogram line) to `out`.
     * Without a customer id the call is rejected: records must be attributed.
     */
    decode(line: string, out: HistogramRecord[]): never;
    decode(line: string, out: HistogramRecord[], customerId: string, limits?: DecodeLimits | null): void;
    decode(line: string, out: HistogramRecord[], customerId?: string, limits?: DecodeLimits | null): void {
        if (customerId === undefined) {
            throw new UnsupportedOperationError('Customer ID extraction is not supported');
        }
        const record = this.decodeLine(line, customerId, limits);
        if (record) out.push(record);
    }

    /**
     * Decodes one line. Returns null for lines that are not histogram lines
     * (blank, comments, other entity types). Errors are fatal for the line and
     * nothing is emitted.
     */
    decodeLine(line: string, customerId: string, limits?: DecodeLimits | null): HistogramRecord | null {
        const effective = limits == null ? null : resolveLimits(limits);
        return this.decodeWithLimits(line, customerId, effective);
    }

    /**
     * Decodes every line of `text`, appending records to `out`. A rejected line
     * is recorded and logged; it does not stop the batch.
     */
    decodeLines(text: string, out: HistogramRecord[], customerId: string, limits?: DecodeLimits | null): DecodeBatchResult {
        const effective = limits == null ? null : resolveLimits(limits);
        const result: DecodeBatchResult = { decoded: 0, skipped: 0, rejected: [] };

        for (const line of text.split(LINE_SPLIT)) {
            let record: HistogramRecord | null;
            try {
                record = this.decodeWithLimits(line, customerId, effective);
            } catch (err) {
                if (!(err instanceof HistogramError)) throw err;
                result.rejected.push({ line, error: err });
                this.options.logger?.warn?.(`[histogram] rejected line: ${err.message}`);
                continue;
            }
            if (record) {
                out.push(record);
                result.decoded++;
            } else {
                result.skipped++;
            }
        }

        return result;
    }

    private decodeWithLimits(line: string, customerId: string, limits: Required<DecodeLimits> | null): HistogramRecord | null {
        const fields = parseHistogramLine(line);
        if (!fields) return null;

        let { means, counts } = fields;
        if (limits) {
            if (counts.length > limits.maxCentroids) {
                throw new TooManyCentroidsError(limits.maxCentroids);
            }
            if (limits.optimizeForStorage) {
                const reason = rewriteReason(means, counts, limits.targetAccuracy);
                if (reason) {
                    ({ means, counts } = rewriteCentroids(means, counts, limits.targetAccuracy, this.options.digestFactory));
                    this.options.logger?.info?.(
                        `[histogram] rewrote centroids of ${fields.metricName} (${reason}): ${fields.counts.length} -> ${counts.length}`
                    );
                }
            }
        }

        // Align the timestamp to the start of its bin.
        const duration = fields.binDurationMillis;
        const rawTimestamp = fields.timestamp ?? this.options.clock();
        const timestampMillis = Math.floor(rawTimestamp / duration) * duration;

        return this.freeze(fields, means, counts, timestampMillis, customerId);
    }

    private freeze(
        fields: RawHistogramFields,
        means: number[],
        counts: number[],
        timestampMillis: number,
        customerId: string
    ): HistogramRecord {
        const annotations = new Map(fields.annotations);
        const source = annotations.get(SOURCE_ANNOTATION);
        annotations.delete(SOURCE_ANNOTATION);

        const centroids: Readonly<Centroid>[] = [];
        const size = Math.min(means.length, counts.length);
        for (let i = 0; i < size; i++) {
            centroids.push(Object.freeze({ mean: means[i], count: counts[i] }));
        }

        const record: HistogramRecord = {
            timestampMillis,
            binDurationMillis: fields.binDurationMillis,
            valueKind: VALUE_KIND_DIGEST,
            centroids: Object.freeze(centroids),
            metricName: fields.metricName,
            annotations: Object.freeze(Object.fromEntries(annotations)),
            hostIdentity: source ?? this.defaultHostName(),
            customerId,
        };
        return Object.freeze(record);
    }
}

/** Merges limits over DEFAULT_DECODE_LIMITS and validates them. */
export function resolveLimits(limits: DecodeLimits): Required<DecodeLimits> {
    const resolved: Required<DecodeLimits> = { ...DEFAULT_DECODE_LIMITS };
    if (limits.maxCentroids !== undefined) resolved.maxCentroids = limits.maxCentroids;
    if (limits.optimizeForStorage !== undefined) resolved.optimizeForStorage = limits.optimizeForStorage;
    if (limits.targetAccuracy !== undefined) resolved.targetAccuracy = limits.targetAccuracy;

    const { maxCentroids, targetAccuracy } = resolved;
    if (maxCentroids !== Number.POSITIVE_INFINITY && (!Number.isSafeInteger(maxCentroids) || maxCentroids < 1)) {
        throw new InvalidLimitsError(`maxCentroids must be a positive integer, got ${maxCentroids}`);
    }
    if (!Number.isSafeInteger(targetAccuracy) || targetAccuracy < 1) {
        throw new InvalidLimitsError(`targetAccuracy must be a positive integer, got ${targetAccuracy}`);
    }
    return resolved;
}

/**
 * Functional form of HistogramDecoder.decodeLine for callers without a
 * long-lived decoder.
 */
export function decodeHistogram(
    line: string,
    defaultHostName: HostNameSupplier,
    limits?: DecodeLimits | null,
    customerId: string = DEFAULT_CUSTOMER_ID
): HistogramRecord | null {
    return new HistogramDecoder(defaultHostName).decodeLine(line, customerId, limits);
}
