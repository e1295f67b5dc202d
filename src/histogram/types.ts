import type { DigestFactory } from './digest.js';
import { DEFAULT_TARGET_ACCURACY, VALUE_KIND_DIGEST } from './format.js';

export type HistogramLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};

export interface Centroid {
    mean: number;
    count: number;
}

export type HistogramValueKind = typeof VALUE_KIND_DIGEST;

export interface HistogramRecord {
    readonly timestampMillis: number;
    readonly binDurationMillis: number;
    readonly valueKind: HistogramValueKind;
    readonly centroids: readonly Readonly<Centroid>[];
    readonly metricName: string;
    readonly annotations: Readonly<Record<string, string>>;
    readonly hostIdentity: string;
    readonly customerId: string;
}

/** Per-call decode configuration. When omitted entirely, nothing is enforced. */
export type DecodeLimits = {
    /** Hard cap on centroids per line. Default: unlimited. */
    maxCentroids?: number;
    /** Rewrite unordered, bogus or oversized centroid lists. Default: false. */
    optimizeForStorage?: boolean;
    /** Accuracy handed to the digest when rewriting. Default: 32. */
    targetAccuracy?: number;
};

export const DEFAULT_DECODE_LIMITS: Required<DecodeLimits> = {
    maxCentroids: Number.POSITIVE_INFINITY,
    optimizeForStorage: false,
    targetAccuracy: DEFAULT_TARGET_ACCURACY,
};

export type HostNameSupplier = () => string;

export type HistogramDecoderOptions = {
    /** Optional logger hook; src/ never writes to the console. */
    logger?: HistogramLogger | null;
    /** Source of "now" for lines without a timestamp. Default: Date.now. */
    clock?: () => number;
    /** Digest used by storage optimization. Default: MergingDigest. */
    digestFactory?: DigestFactory;
};

export interface RejectedLine {
    line: string;
    error: Error;
}

export interface DecodeBatchResult {
    decoded: number;
    skipped: number;
    rejected: RejectedLine[];
}
