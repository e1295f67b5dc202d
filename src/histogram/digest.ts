/**
 * Accuracy-bounded centroid digest.
 *
 * The normalizer only relies on the `Digest` capability: weighted points go in,
 * `compress()` bounds the centroid count by the accuracy, and `centroids()`
 * yields strictly ascending means with positive integer counts whose sum equals
 * the sum of the added counts.
 *
 * `MergingDigest` buffers incoming points and merges them into the sorted
 * centroid list with the arcsine scale function
 *   k(q) = accuracy / (2 * pi) * asin(2q - 1)
 * allowing a centroid to grow while it spans at most one unit of k. That keeps
 * roughly `accuracy` centroids, with finer resolution at the tails.
 */
import type { Centroid } from './types.js';
import { HistogramError } from './errors.js';

export interface Digest {
    add(mean: number, count: number): void;
    compress(): void;
    /** Centroids in strictly ascending mean order. Call after compress(). */
    centroids(): readonly Readonly<Centroid>[];
    size(): number;
    totalCount(): number;
}

export type DigestFactory = (accuracy: number) => Digest;

/** Pending points are merged once the buffer holds this many times the accuracy. */
const BUFFER_FACTOR = 5;

export class MergingDigest implements Digest {
    private merged: Centroid[] = [];
    private pending: Centroid[] = [];
    private total = 0;
    private min = Number.POSITIVE_INFINITY;
    private max = Number.NEGATIVE_INFINITY;
    private readonly bufferLimit: number;

    constructor(public readonly accuracy: number) {
        if (!Number.isFinite(accuracy) || accuracy < 1) {
            throw new HistogramError(`Digest accuracy must be >= 1, got ${accuracy}`);
        }
        this.bufferLimit = Math.ceil(BUFFER_FACTOR * accuracy);
    }

    add(mean: number, count: number): void {
        if (!Number.isFinite(mean)) {
            throw new HistogramError(`Digest mean must be finite, got ${mean}`);
        }
        if (!Number.isSafeInteger(count) || count < 1) {
            throw new HistogramError(`Digest count must be a positive integer, got ${count}`);
        }

        this.pending.push({ mean, count });
        this.total += count;
        if (mean < this.min) this.min = mean;
        if (mean > this.max) this.max = mean;

        if (this.pending.length >= this.bufferLimit) {
            this.compress();
        }
    }

    compress(): void {
        if (this.pending.length === 0) return;

        // Stable sort keeps input order among equal means.
        const all = this.merged.concat(this.pending).sort((a, b) => a.mean - b.mean);
        this.pending = [];

        const out: Centroid[] = [];
        let current: Centroid = { ...all[0] };
        let weightBefore = 0;

        for (let i = 1; i < all.length; i++) {
            const next = all[i];
            const proposed = current.count + next.count;
            const kLeft = this.scale(weightBefore / this.total);
            const kRight = this.scale((weightBefore + proposed) / this.total);

            if (kRight - kLeft <= 1) {
                // Finite for any pair of finite means.
                current.mean = current.mean * (current.count / proposed) + next.mean * (next.count / proposed);
                current.count = proposed;
            } else {
                out.push(current);
                weightBefore += current.count;
                current = { ...next };
            }
        }
        out.push(current);

        this.merged = collapseEqualMeans(out);
    }

    centroids(): readonly Readonly<Centroid>[] {
        return this.merged;
    }

    size(): number {
        return this.merged.length + this.pending.length;
    }

    totalCount(): number {
        return this.total;
    }

    /**
     * Estimates the value at quantile q by interpolating between centroid
     * midpoints, with the observed min and max as the outer anchors.
     * NaN when the digest is empty.
     */
    quantile(q: number): number {
        this.compress();
        const cs = this.merged;
        if (cs.length === 0) return NaN;
        if (q <= 0) return this.min;
        if (q >= 1) return this.max;

        const target = q * this.total;
        let prevMid = 0;
        let prevMean = this.min;
        let cumulative = 0;

        for (const c of cs) {
            const mid = cumulative + c.count / 2;
            if (target <= mid) {
                const span = mid - prevMid;
                const t = span > 0 ? (target - prevMid) / span : 1;
                return prevMean + (c.mean - prevMean) * t;
            }
            prevMid = mid;
            prevMean = c.mean;
            cumulative += c.count;
        }

        const span = this.total - prevMid;
        const t = span > 0 ? (target - prevMid) / span : 1;
        return prevMean + (this.max - prevMean) * t;
    }

    private scale(q: number): number {
        const clamped = Math.min(1, Math.max(0, q));
        return (this.accuracy / (2 * Math.PI)) * Math.asin(2 * clamped - 1);
    }
}

/**
 * Folds any centroid whose mean does not exceed its predecessor's into that
 * predecessor, so the output is strictly ascending. Counts are summed; the
 * predecessor's mean is kept.
 */
function collapseEqualMeans(sorted: Centroid[]): Centroid[] {
    const out: Centroid[] = [];
    for (const c of sorted) {
        const last = out[out.length - 1];
        if (last && c.mean <= last.mean) {
            last.count += c.count;
        } else {
            out.push(c);
        }
    }
    return out;
}

export const createMergingDigest: DigestFactory = (accuracy) => new MergingDigest(accuracy);
