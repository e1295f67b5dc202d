/**
 * Storage encoding of decoded histogram records.
 *
 * Layout:
 *   [magic "HREC": 4][outerCodecId: 1][body]
 * where body is the MessagePack map of the record, passed through the outer
 * codec (identity or zstd).
 */
import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import { compressBody, decompressBody, outerCodecId, type OuterCodecName } from './outer-codecs.js';
import { MAX_RECORD_BODY_SIZE, RECORD_HEADER_SIZE, RECORD_MAGIC, VALUE_KIND_DIGEST } from './format.js';
import { RecordFormatError } from './errors.js';
import type { Centroid, HistogramRecord } from './types.js';

export type RecordCodecOptions = {
    /** Outer compression of the MessagePack body. Default: 'none'. */
    outerCodec?: OuterCodecName;
    /** Zstd level (1-22). Ignored for 'none'. Default: 3. */
    compressionLevel?: number;
};

export type RecordDecodeOptions = {
    /** Upper bound on the restored body, in bytes. Default: MAX_RECORD_BODY_SIZE. */
    maxBodySize?: number;
};

interface StoredRecord {
    ts: number;
    bin: number;
    kind: string;
    means: number[];
    counts: number[];
    metric: string;
    tags: Record<string, string>;
    host: string;
    customer: string;
}

export async function encodeRecord(record: HistogramRecord, options: RecordCodecOptions = {}): Promise<Uint8Array> {
    const codecId = outerCodecId(options.outerCodec ?? 'none');
    const stored: StoredRecord = {
        ts: record.timestampMillis,
        bin: record.binDurationMillis,
        kind: record.valueKind,
        means: record.centroids.map(c => c.mean),
        counts: record.centroids.map(c => c.count),
        metric: record.metricName,
        tags: { ...record.annotations },
        host: record.hostIdentity,
        customer: record.customerId,
    };

    const body = await compressBody(msgpackEncode(stored), codecId, options.compressionLevel ?? 3);
    const out = new Uint8Array(RECORD_HEADER_SIZE + body.length);
    out.set(RECORD_MAGIC, 0);
    out[RECORD_MAGIC.length] = codecId;
    out.set(body, RECORD_HEADER_SIZE);
    return out;
}

export async function decodeRecord(data: Uint8Array, options: RecordDecodeOptions = {}): Promise<HistogramRecord> {
    if (data.length < RECORD_HEADER_SIZE) {
        throw new RecordFormatError(`Record too short: ${data.length} bytes`);
    }
    for (let i = 0; i < RECORD_MAGIC.length; i++) {
        if (data[i] !== RECORD_MAGIC[i]) throw new RecordFormatError('Invalid record magic');
    }

    const body = await decompressBody(
        data.subarray(RECORD_HEADER_SIZE),
        data[RECORD_MAGIC.length],
        options.maxBodySize ?? MAX_RECORD_BODY_SIZE
    );

    let decoded: unknown;
    try {
        decoded = msgpackDecode(body);
    } catch (err) {
        throw new RecordFormatError('Malformed record body', err);
    }
    return toRecord(decoded);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every(v => typeof v === 'number');
}

function isStringMap(value: unknown): value is Record<string, string> {
    return isPlainObject(value) && Object.values(value).every(v => typeof v === 'string');
}

function requireField<T>(obj: Record<string, unknown>, key: string, guard: (v: unknown) => v is T): T {
    const value = obj[key];
    if (!guard(value)) throw new RecordFormatError(`Invalid record field: ${key}`);
    return value;
}

const isNumber = (v: unknown): v is number => typeof v === 'number';
const isString = (v: unknown): v is string => typeof v === 'string';

function toRecord(value: unknown): HistogramRecord {
    if (!isPlainObject(value)) throw new RecordFormatError('Record body is not a map');

    const kind = requireField(value, 'kind', isString);
    if (kind !== VALUE_KIND_DIGEST) throw new RecordFormatError(`Unsupported value kind: ${kind}`);

    const means = requireField(value, 'means', isNumberArray);
    const counts = requireField(value, 'counts', isNumberArray);
    if (means.length !== counts.length) {
        throw new RecordFormatError(`Centroid arrays differ in length (${means.length} != ${counts.length})`);
    }
    const centroids: Readonly<Centroid>[] = means.map((mean, i) => Object.freeze({ mean, count: counts[i] }));

    const record: HistogramRecord = {
        timestampMillis: requireField(value, 'ts', isNumber),
        binDurationMillis: requireField(value, 'bin', isNumber),
        valueKind: VALUE_KIND_DIGEST,
        centroids: Object.freeze(centroids),
        metricName: requireField(value, 'metric', isString),
        annotations: Object.freeze({ ...requireField(value, 'tags', isStringMap) }),
        hostIdentity: requireField(value, 'host', isString),
        customerId: requireField(value, 'customer', isString),
    };
    return Object.freeze(record);
}
