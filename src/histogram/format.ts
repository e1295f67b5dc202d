export const BIN_MINUTE = '!M';
export const BIN_HOUR = '!H';
export const BIN_DAY = '!D';

export type BinTypeLiteral = typeof BIN_MINUTE | typeof BIN_HOUR | typeof BIN_DAY;

export const MILLIS_PER_MINUTE = 60_000;
export const MILLIS_PER_HOUR = 3_600_000;
export const MILLIS_PER_DAY = 86_400_000;

export const BIN_DURATIONS: Readonly<Record<BinTypeLiteral, number>> = {
    [BIN_MINUTE]: MILLIS_PER_MINUTE,
    [BIN_HOUR]: MILLIS_PER_HOUR,
    [BIN_DAY]: MILLIS_PER_DAY,
};

/** Every record decoded here carries a t-digest style centroid list. */
export const VALUE_KIND_DIGEST = 'approximate-quantile-digest';

/**
 * Multiplier over the target accuracy past which a centroid list is
 * compacted regardless of its order.
 */
export const OVERSIZE_RATIO = 2;

export const DEFAULT_TARGET_ACCURACY = 32;

export const BIN_TYPE_PREFIX = '!';
export const CENTROID_COUNT_PREFIX = '#';
export const CENTROID_PAIR_SEPARATOR = '|';
export const SOURCE_ANNOTATION = 'source';

// Storage encoding
export const RECORD_MAGIC = new Uint8Array([0x48, 0x52, 0x45, 0x43]); // "HREC"
export const RECORD_HEADER_SIZE = 5; // magic(4) + outerCodec(1)
export const MAX_RECORD_BODY_SIZE = 1024 * 1024;

export enum OuterCodecId {
    NONE = 0,
    ZSTD = 1,
}
