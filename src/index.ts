/**
 * Histogram line decoder public API
 *
 * @module histogram-line-decoder
 */

import { HistogramDecoder, decodeHistogram } from './histogram/decode.js';
import { normalizeIfNeeded } from './histogram/normalizer.js';
import { encodeRecord, decodeRecord } from './histogram/record-codec.js';
import { resolveBinType } from './histogram/bin-type.js';
import type { DecodeLimits, HistogramRecord, HostNameSupplier } from './histogram/types.js';
import type { RecordCodecOptions, RecordDecodeOptions } from './histogram/record-codec.js';

export type {
    Centroid,
    DecodeBatchResult,
    DecodeLimits,
    HistogramDecoderOptions,
    HistogramLogger as Logger,
    HistogramRecord,
    HostNameSupplier,
    RejectedLine,
} from './histogram/types.js';
export type { RecordCodecOptions, RecordDecodeOptions } from './histogram/record-codec.js';
export type { OuterCodecName } from './histogram/outer-codecs.js';
export type { Digest, DigestFactory } from './histogram/digest.js';
export type { CentroidArrays, RewriteReason } from './histogram/normalizer.js';
export type { RawHistogramFields } from './histogram/grammar.js';
export { DEFAULT_DECODE_LIMITS } from './histogram/types.js';
export {
    HistogramError,
    UnrecognizedBinTypeError,
    TooManyCentroidsError,
    MalformedLineError,
    UnsupportedOperationError,
    InvalidLimitsError,
    RecordFormatError,
} from './histogram/errors.js';
export { MergingDigest, createMergingDigest } from './histogram/digest.js';
export { needsRewrite, rewriteCentroids, rewriteReason, normalizeIfNeeded } from './histogram/normalizer.js';
export { parseHistogramLine } from './histogram/grammar.js';
export { resolveBinType } from './histogram/bin-type.js';
export { HistogramDecoder, decodeHistogram, resolveLimits, DEFAULT_CUSTOMER_ID, DEFAULT_HOST_NAME } from './histogram/decode.js';
export { encodeRecord, decodeRecord } from './histogram/record-codec.js';
export { BIN_DURATIONS, OVERSIZE_RATIO, VALUE_KIND_DIGEST } from './histogram/format.js';

export const Histograms = {
    /**
     * Decodes one line into a record, or null when the line is not a histogram line.
     */
    decode: (line: string, defaultHostName: HostNameSupplier, limits?: DecodeLimits | null): HistogramRecord | null =>
        decodeHistogram(line, defaultHostName, limits),

    /**
     * Packs a record for storage.
     */
    pack: (record: HistogramRecord, options?: RecordCodecOptions): Promise<Uint8Array> =>
        encodeRecord(record, options),

    /**
     * Unpacks a stored record.
     */
    unpack: (data: Uint8Array, options?: RecordDecodeOptions): Promise<HistogramRecord> => decodeRecord(data, options),

    normalize: normalizeIfNeeded,
    binDuration: resolveBinType,

    Decoder: HistogramDecoder,
};

export default Histograms;
