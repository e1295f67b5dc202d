/**
 * Compression applied to a stored record's MessagePack body. The codec id is
 * written into the record header, so ids are stable once released.
 */
import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { OuterCodecId } from './format.js';
import { RecordFormatError } from './errors.js';

export type OuterCodecName = 'none' | 'zstd';

type Transform = (body: Uint8Array, level: number) => Promise<Uint8Array>;

interface BodyCodec {
    pack: Transform;
    unpack: (body: Uint8Array) => Promise<Uint8Array>;
}

let zstdModule: Promise<ZstdModule> | null = null;

// The wasm module initialises once per process.
function getZstd(): Promise<ZstdModule> {
    if (!zstdModule) {
        zstdModule = new Promise<ZstdModule>((resolve) => {
            ZstdCodec.run((zstd) => resolve(zstd));
        });
    }
    return zstdModule;
}

const BODY_CODECS: Record<OuterCodecId, BodyCodec> = {
    [OuterCodecId.NONE]: {
        pack: async (body) => body,
        unpack: async (body) => body,
    },
    [OuterCodecId.ZSTD]: {
        pack: async (body, level) => {
            const packed = new (await getZstd()).Simple().compress(body, level);
            if (!packed) throw new RecordFormatError('Zstd compression failed');
            return packed;
        },
        unpack: async (body) => {
            const unpacked = new (await getZstd()).Simple().decompress(body);
            if (!unpacked) throw new RecordFormatError('Zstd decompression failed');
            return unpacked;
        },
    },
};

export function outerCodecId(name: OuterCodecName): OuterCodecId {
    return name === 'zstd' ? OuterCodecId.ZSTD : OuterCodecId.NONE;
}

function isOuterCodecId(id: number): id is OuterCodecId {
    return id === OuterCodecId.NONE || id === OuterCodecId.ZSTD;
}

export function compressBody(body: Uint8Array, id: OuterCodecId, level: number): Promise<Uint8Array> {
    return BODY_CODECS[id].pack(body, level);
}

/**
 * Reverses the outer codec named by the header byte `id`. Throws
 * RecordFormatError for an unknown id, and when the restored body is larger
 * than `maxSize` bytes.
 */
export async function decompressBody(body: Uint8Array, id: number, maxSize: number): Promise<Uint8Array> {
    if (!isOuterCodecId(id)) {
        throw new RecordFormatError(`Unknown outer codec id: ${id}`);
    }
    const restored = await BODY_CODECS[id].unpack(body);
    if (restored.length > maxSize) {
        throw new RecordFormatError(`Record body too large (${restored.length} > ${maxSize} bytes)`);
    }
    return restored;
}
