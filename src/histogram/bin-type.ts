import { BIN_DURATIONS, type BinTypeLiteral } from './format.js';
import { UnrecognizedBinTypeError } from './errors.js';

export function isBinTypeLiteral(literal: string): literal is BinTypeLiteral {
    return Object.prototype.hasOwnProperty.call(BIN_DURATIONS, literal);
}

/**
 * Maps a bin-type literal to its duration in milliseconds.
 * Literals are case-sensitive: `!m` is rejected.
 */
export function resolveBinType(literal: string): number {
    if (!isBinTypeLiteral(literal)) {
        throw new UnrecognizedBinTypeError(literal);
    }
    return BIN_DURATIONS[literal];
}
