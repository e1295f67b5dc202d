export class HistogramError extends Error {
    constructor(message: string, public originalError?: unknown) {
        super(message);
        this.name = 'HistogramError';
    }
}

export class UnrecognizedBinTypeError extends HistogramError {
    constructor(public readonly literal: string) {
        super(`Unknown BinType ${literal}`);
        this.name = 'UnrecognizedBinTypeError';
    }
}

export class TooManyCentroidsError extends HistogramError {
    constructor(public readonly maxCentroids: number) {
        super(`Too many centroids (max: ${maxCentroids})`);
        this.name = 'TooManyCentroidsError';
    }
}

/**
 * Grammar-level failure: bad timestamp, missing metric name, malformed
 * centroid or annotation token, unterminated quote.
 */
export class MalformedLineError extends HistogramError {
    constructor(message: string, public readonly line: string, public readonly position: number) {
        super(`${message} (at ${position} in "${line}")`);
        this.name = 'MalformedLineError';
    }
}

export class UnsupportedOperationError extends HistogramError {
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedOperationError';
    }
}

export class InvalidLimitsError extends HistogramError {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidLimitsError';
    }
}

export class RecordFormatError extends HistogramError {
    constructor(message: string, originalError?: unknown) {
        super(message, originalError);
        this.name = 'RecordFormatError';
    }
}
