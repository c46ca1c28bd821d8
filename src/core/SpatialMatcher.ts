/**
 * ============================================================================
 * SpatialMatcher.ts - Horizontal adjacency test
 * ============================================================================
 *
 * Decides which same-CWA, same-type candidates qualify as predecessors of a
 * target activity.
 *
 * SCORE (default scoring function):
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │  overlap = intersection area of the two plan footprints                │
 * │  score   = max(overlap / areaTarget, overlap / areaCandidate)          │
 * │                                                                        │
 * │  1.0 = one footprint lies entirely inside the other                    │
 * │  0.0 = disjoint, or either footprint missing / zero area               │
 * └─────────────────────────────────────────────────────────────────────────┘
 * The score is symmetric, bounded to [0, 1] and never increases as the
 * footprints move apart.
 *
 * ACCEPTANCE: score + tolerance >= threshold (the threshold itself qualifies).
 * Every qualifying candidate is accepted, not only the best one.
 */

import type { Activity, CheckOutcome, Footprint, PredecessorMatch, PredecessorRule, VerticalWindow } from '../types';
import { DEFAULT_SCORE_TOLERANCE } from './Constants';
import type { IndexedActivity } from './ZoneIndex';

/**
 * Pluggable horizontal scoring function.
 * Must be symmetric, bounded to [0, 1] and non-increasing with separation.
 */
export type ScoreFunction = (a: Activity, b: Activity) => number;

/**
 * Options for a matcher instance
 */
export interface SpatialMatcherOptions {
    score?: ScoreFunction;
    tolerance?: number;
}

/**
 * Per-check options
 */
export interface MatchOptions {
    /** Apply the rule's vertical window, if it has one */
    applyVertical?: boolean;
}

export class SpatialMatcher {
    private readonly score: ScoreFunction;
    private readonly tolerance: number;

    constructor(options: SpatialMatcherOptions = {}) {
        this.score = options.score ?? SpatialMatcher.footprintOverlap;
        this.tolerance = options.tolerance ?? DEFAULT_SCORE_TOLERANCE;
    }

    /**
     * Area overlap ratio between two activity footprints
     */
    static footprintOverlap(a: Activity, b: Activity): number {
        if (!a.footprint || !b.footprint) return 0;
        return SpatialMatcher.overlapRatio(a.footprint, b.footprint);
    }

    /**
     * Intersection area divided by the smaller footprint area
     */
    static overlapRatio(a: Footprint, b: Footprint): number {
        const overlapX = Math.max(0, Math.min(a.maxX, b.maxX) - Math.max(a.minX, b.minX));
        const overlapY = Math.max(0, Math.min(a.maxY, b.maxY) - Math.max(a.minY, b.minY));
        const overlap = overlapX * overlapY;

        const areaA = Math.max(0, (a.maxX - a.minX) * (a.maxY - a.minY));
        const areaB = Math.max(0, (b.maxX - b.minX) * (b.maxY - b.minY));
        if (areaA <= 0 || areaB <= 0) return 0;

        return Math.min(1, Math.max(overlap / areaA, overlap / areaB));
    }

    /**
     * Whether the target sits within the vertical window above the predecessor
     * (pred.maxZ - below < target.minZ < pred.maxZ + above)
     */
    static withinVerticalWindow(predecessor: Activity, target: Activity, window: VerticalWindow): boolean {
        if (!predecessor.elevation || !target.elevation) return false;
        const top = predecessor.elevation.maxZ;
        const base = target.elevation.minZ;
        return base > top - window.below && base < top + window.above;
    }

    /**
     * Score a pair, clamping whatever the scoring function returns into [0, 1]
     */
    scorePair(target: Activity, candidate: Activity): number {
        const value = this.score(target, candidate);
        if (!Number.isFinite(value)) return 0;
        return Math.min(1, Math.max(0, value));
    }

    /**
     * Whether a score meets a threshold, within tolerance
     */
    passes(score: number, threshold: number): boolean {
        return score + this.tolerance >= threshold;
    }

    /**
     * Check one predecessor type for a target activity
     *
     * @param target - Activity being resolved
     * @param candidates - Same-CWA activities of the rule's predecessor type, target excluded
     * @param rule - Predecessor type and threshold
     * @returns no_candidates, rejected (with count and threshold) or accepted (every qualifying id)
     */
    match(
        target: Activity,
        candidates: readonly IndexedActivity[],
        rule: PredecessorRule,
        options: MatchOptions = {}
    ): CheckOutcome {
        const { predecessorType, horizontalThreshold: threshold } = rule;

        if (candidates.length === 0) {
            return { kind: 'no_candidates', predecessorType };
        }

        let bestScore = 0;
        const horizontal: Array<{ candidate: Activity; match: PredecessorMatch }> = [];

        for (const { activity: candidate } of candidates) {
            const score = this.scorePair(target, candidate);
            bestScore = Math.max(bestScore, score);
            if (this.passes(score, threshold)) {
                horizontal.push({ candidate, match: { id: candidate.id, score } });
            }
        }

        if (horizontal.length === 0) {
            return {
                kind: 'rejected',
                predecessorType,
                candidateCount: candidates.length,
                threshold,
                reason: 'horizontal',
                bestScore,
            };
        }

        const window = options.applyVertical ? rule.vertical : undefined;
        const accepted = window
            ? horizontal.filter(({ candidate }) => SpatialMatcher.withinVerticalWindow(candidate, target, window))
            : horizontal;

        if (accepted.length === 0) {
            return {
                kind: 'rejected',
                predecessorType,
                candidateCount: candidates.length,
                threshold,
                reason: 'vertical',
                bestScore,
                vertical: window ? { ...window } : undefined,
            };
        }

        return {
            kind: 'accepted',
            predecessorType,
            threshold,
            matches: accepted.map(({ match }) => match),
        };
    }
}
