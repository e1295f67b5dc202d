import { encode as msgpackEncode } from '@msgpack/msgpack';
import { encodeRecord, decodeRecord } from '../src/histogram/record-codec.js';
import { HistogramDecoder } from '../src/histogram/decode.js';
import { RecordFormatError } from '../src/histogram/errors.js';
import { RECORD_MAGIC } from '../src/histogram/format.js';
import type { HistogramRecord } from '../src/histogram/types.js';
import { Histograms } from '../src/index.js';

function sampleRecord(): HistogramRecord {
    const record = new HistogramDecoder('host-a').decodeLine(
        '!H 3661000 0.1|2 2.5|3 1e-9|1 latency.p zone="eu west" source=app-3',
        'customer-9'
    );
    if (!record) throw new Error('sample line did not decode');
    return record;
}

function withHeader(codecId: number, body: Uint8Array): Uint8Array {
    const out = new Uint8Array(5 + body.length);
    out.set(RECORD_MAGIC, 0);
    out[4] = codecId;
    out.set(body, 5);
    return out;
}

describe('record codec', () => {
    it('writes the magic and the outer codec id', async () => {
        const plain = await encodeRecord(sampleRecord());
        expect(Array.from(plain.subarray(0, 5))).toEqual([0x48, 0x52, 0x45, 0x43, 0]);

        const zstd = await encodeRecord(sampleRecord(), { outerCodec: 'zstd' });
        expect(zstd[4]).toBe(1);
    });

    it('round-trips a record without compression', async () => {
        const record = sampleRecord();
        const decoded = await decodeRecord(await encodeRecord(record));
        expect(decoded).toEqual(record);
        expect(decoded.annotations).toEqual({ zone: 'eu west' });
        expect(decoded.hostIdentity).toBe('app-3');
        expect(Object.isFrozen(decoded)).toBe(true);
        expect(Object.isFrozen(decoded.centroids)).toBe(true);
    });

    it('round-trips a record through zstd', async () => {
        const record = sampleRecord();
        const packed = await Histograms.pack(record, { outerCodec: 'zstd', compressionLevel: 9 });
        expect(await Histograms.unpack(packed)).toEqual(record);
    });

    it('rejects short input and bad magic', async () => {
        await expect(decodeRecord(new Uint8Array([0x48, 0x52]))).rejects.toThrow(RecordFormatError);
        await expect(decodeRecord(withHeader(0, msgpackEncode({})).fill(0, 0, 1))).rejects.toThrow('Invalid record magic');
    });

    it('rejects an unknown outer codec', async () => {
        await expect(decodeRecord(withHeader(9, new Uint8Array(0)))).rejects.toThrow('Unknown outer codec id: 9');
    });

    it('bounds the restored body size', async () => {
        const plain = await encodeRecord(sampleRecord());
        const bodySize = plain.length - 5;
        await expect(decodeRecord(plain, { maxBodySize: bodySize })).resolves.toEqual(sampleRecord());
        await expect(decodeRecord(plain, { maxBodySize: bodySize - 1 }))
            .rejects.toThrow(`Record body too large (${bodySize} > ${bodySize - 1} bytes)`);

        const zstd = await encodeRecord(sampleRecord(), { outerCodec: 'zstd' });
        await expect(Histograms.unpack(zstd, { maxBodySize: 8 })).rejects.toThrow(RecordFormatError);
    });

    it('rejects bodies that are not records', async () => {
        await expect(decodeRecord(withHeader(0, msgpackEncode([1, 2])))).rejects.toThrow('Record body is not a map');
        await expect(decodeRecord(withHeader(0, new Uint8Array([0xc1])))).rejects.toThrow('Malformed record body');
    });

    it('validates record fields', async () => {
        const base = {
            ts: 0, bin: 60_000, kind: 'approximate-quantile-digest',
            means: [1], counts: [1], metric: 'm', tags: {}, host: 'h', customer: 'c',
        };
        await expect(decodeRecord(withHeader(0, msgpackEncode({ ...base, kind: 'gauge' }))))
            .rejects.toThrow('Unsupported value kind: gauge');
        await expect(decodeRecord(withHeader(0, msgpackEncode({ ...base, counts: [1, 2] }))))
            .rejects.toThrow('Centroid arrays differ in length (1 != 2)');
        await expect(decodeRecord(withHeader(0, msgpackEncode({ ...base, metric: 7 }))))
            .rejects.toThrow('Invalid record field: metric');
        await expect(decodeRecord(withHeader(0, msgpackEncode({ ...base, tags: { a: 1 } }))))
            .rejects.toThrow('Invalid record field: tags');
    });
});
