import { OVERSIZE_RATIO } from './format.js';
import { createMergingDigest, type DigestFactory } from './digest.js';

export interface CentroidArrays {
    means: number[];
    counts: number[];
}

export type RewriteReason = 'oversized' | 'bogus-counts' | 'unordered';

/**
 * Returns why a centroid list needs rewriting for storage, or null when it is
 * already canonical: no more than OVERSIZE_RATIO * targetAccuracy entries,
 * every count positive, means strictly ascending.
 */
export function rewriteReason(
    means: readonly number[],
    counts: readonly number[],
    targetAccuracy: number
): RewriteReason | null {
    if (means.length === 0 || counts.length === 0) return null;

    if (means.length > OVERSIZE_RATIO * targetAccuracy) return 'oversized';
    if (counts.some(c => c <= 0)) return 'bogus-counts';
    for (let i = 1; i < means.length; i++) {
        if (means[i - 1] >= means[i]) return 'unordered';
    }
    return null;
}

export function needsRewrite(means: readonly number[], counts: readonly number[], targetAccuracy: number): boolean {
    return rewriteReason(means, counts, targetAccuracy) !== null;
}

/**
 * Replays every pair with a positive count through a fresh digest of the
 * given accuracy and returns its compressed centroids. Pairs past the shorter
 * of the two arrays are ignored.
 */
export function rewriteCentroids(
    means: readonly number[],
    counts: readonly number[],
    targetAccuracy: number,
    digestFactory: DigestFactory = createMergingDigest
): CentroidArrays {
    const digest = digestFactory(targetAccuracy);
    const size = Math.min(means.length, counts.length);
    for (let i = 0; i < size; i++) {
        if (counts[i] > 0) {
            digest.add(means[i], counts[i]);
        }
    }
    digest.compress();

    const out: CentroidArrays = { means: [], counts: [] };
    for (const c of digest.centroids()) {
        out.means.push(c.mean);
        out.counts.push(c.count);
    }
    return out;
}

/**
 * Returns a canonical copy of the centroid list. Canonical input comes back
 * unchanged (as fresh arrays); anything else is rewritten through the digest.
 */
export function normalizeIfNeeded(
    means: readonly number[],
    counts: readonly number[],
    targetAccuracy: number,
    digestFactory: DigestFactory = createMergingDigest
): CentroidArrays {
    if (!needsRewrite(means, counts, targetAccuracy)) {
        return { means: means.slice(), counts: counts.slice() };
    }
    return rewriteCentroids(means, counts, targetAccuracy, digestFactory);
}
