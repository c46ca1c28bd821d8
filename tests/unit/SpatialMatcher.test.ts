/**
 * @fileoverview Unit tests for SpatialMatcher
 * @module tests/unit/SpatialMatcher.test
 *
 * Tests cover:
 * - Overlap score: bounds, symmetry, containment, separation
 * - no_candidates / rejected / accepted outcomes
 * - Inclusive threshold boundary
 * - Pluggable score functions
 * - Optional vertical window
 */

import { describe, it, expect } from 'vitest';
import { SpatialMatcher } from '../../src/core/SpatialMatcher';
import type { IndexedActivity } from '../../src/core/ZoneIndex';
import type { Activity, PredecessorRule } from '../../src/types';
import { box, elevation, makeActivity, onSlab } from '../helpers/activityFactory';

function indexed(...activities: Activity[]): IndexedActivity[] {
    return activities.map((activity, i) => ({ index: i + 1, activity }));
}

describe('SpatialMatcher', () => {
    describe('overlapRatio', () => {
        it('should be 1 for identical footprints', () => {
            expect(SpatialMatcher.overlapRatio(box(0, 10, 0, 10), box(0, 10, 0, 10))).toBe(1);
        });

        it('should be 1 when one footprint lies inside the other', () => {
            expect(SpatialMatcher.overlapRatio(box(0, 10, 0, 10), box(2, 4, 2, 4))).toBe(1);
        });

        it('should be the shared fraction for a half overlap', () => {
            expect(SpatialMatcher.overlapRatio(box(0, 10, 0, 10), box(5, 15, 0, 10))).toBe(0.5);
        });

        it('should be symmetric', () => {
            const a = box(0, 10, 0, 10);
            const b = box(3, 20, -4, 6);
            expect(SpatialMatcher.overlapRatio(a, b)).toBe(SpatialMatcher.overlapRatio(b, a));
        });

        it('should be 0 for disjoint footprints', () => {
            expect(SpatialMatcher.overlapRatio(box(0, 1, 0, 1), box(2, 3, 2, 3))).toBe(0);
        });

        it('should be 0 for touching edges', () => {
            expect(SpatialMatcher.overlapRatio(box(0, 1, 0, 1), box(1, 2, 0, 1))).toBe(0);
        });

        it('should be 0 when a footprint has no area', () => {
            expect(SpatialMatcher.overlapRatio(box(0, 0, 0, 10), box(0, 10, 0, 10))).toBe(0);
        });

        it('should decrease as footprints move apart', () => {
            const base = box(0, 10, 0, 10);
            const scores = [2, 4, 6, 8].map(shift => SpatialMatcher.overlapRatio(base, box(shift, 10 + shift, 0, 10)));
            expect(scores[0]).toBeCloseTo(0.8);
            expect(scores[1]).toBeCloseTo(0.6);
            expect(scores[2]).toBeCloseTo(0.4);
            expect(scores[3]).toBeCloseTo(0.2);
        });
    });

    describe('footprintOverlap', () => {
        it('should score 0 when either footprint is missing', () => {
            const withBox = onSlab('A', 'Piping');
            const withoutBox = makeActivity({ id: 'B', type: 'Concrete' });
            expect(SpatialMatcher.footprintOverlap(withBox, withoutBox)).toBe(0);
            expect(SpatialMatcher.footprintOverlap(withoutBox, withBox)).toBe(0);
        });
    });

    describe('match', () => {
        const matcher = new SpatialMatcher();
        const target = onSlab('EQ-1', 'Equipment');
        const pilingRule: PredecessorRule = { predecessorType: 'Piling', horizontalThreshold: 0.8 };

        it('should report no_candidates for an empty candidate list', () => {
            expect(matcher.match(target, [], pilingRule)).toEqual({ kind: 'no_candidates', predecessorType: 'Piling' });
        });

        it('should reject with count and threshold when no candidate qualifies', () => {
            const pile = makeActivity({ id: 'PL-1', type: 'Piling', footprint: box(5, 15, 0, 10) });
            expect(matcher.match(target, indexed(pile), pilingRule)).toEqual({
                kind: 'rejected',
                predecessorType: 'Piling',
                candidateCount: 1,
                threshold: 0.8,
                reason: 'horizontal',
                bestScore: 0.5,
            });
        });

        it('should count candidates without footprints as rejected', () => {
            const piles = indexed(
                makeActivity({ id: 'PL-1', type: 'Piling' }),
                makeActivity({ id: 'PL-2', type: 'Piling' })
            );
            const outcome = matcher.match(target, piles, pilingRule);
            expect(outcome.kind).toBe('rejected');
            if (outcome.kind === 'rejected') {
                expect(outcome.candidateCount).toBe(2);
                expect(outcome.bestScore).toBe(0);
            }
        });

        it('should accept a score exactly at the threshold', () => {
            const pile = makeActivity({ id: 'PL-1', type: 'Piling', footprint: box(2, 12, 0, 10) });
            const strict = new SpatialMatcher({ tolerance: 0 });
            expect(strict.match(target, indexed(pile), pilingRule)).toEqual({
                kind: 'accepted',
                predecessorType: 'Piling',
                threshold: 0.8,
                matches: [{ id: 'PL-1', score: 0.8 }],
            });
        });

        it('should accept every qualifying candidate, not only the best', () => {
            const candidates = indexed(
                makeActivity({ id: 'PL-1', type: 'Piling', footprint: box(0, 10, 0, 10) }),
                makeActivity({ id: 'PL-2', type: 'Piling', footprint: box(2, 12, 0, 10) }),
                makeActivity({ id: 'PL-3', type: 'Piling', footprint: box(5, 15, 0, 10) })
            );
            expect(matcher.match(target, candidates, pilingRule)).toEqual({
                kind: 'accepted',
                predecessorType: 'Piling',
                threshold: 0.8,
                matches: [
                    { id: 'PL-1', score: 1 },
                    { id: 'PL-2', score: 0.8 },
                ],
            });
        });

        it('should accept scores within tolerance below the threshold', () => {
            const loose = new SpatialMatcher({ score: () => 0.79995, tolerance: 0.0001 });
            const pile = makeActivity({ id: 'PL-1', type: 'Piling' });
            expect(loose.match(target, indexed(pile), pilingRule).kind).toBe('accepted');
        });
    });

    describe('pluggable scoring', () => {
        const rule: PredecessorRule = { predecessorType: 'Piping', horizontalThreshold: 0.6 };
        const target = makeActivity({ id: 'IN-1', type: 'Instrumentation' });
        const pipe = indexed(makeActivity({ id: 'PP-1', type: 'Piping' }));

        it('should use the supplied score function', () => {
            const matcher = new SpatialMatcher({ score: () => 0.7 });
            expect(matcher.match(target, pipe, rule)).toEqual({
                kind: 'accepted',
                predecessorType: 'Piping',
                threshold: 0.6,
                matches: [{ id: 'PP-1', score: 0.7 }],
            });
        });

        it('should clamp scores above 1', () => {
            expect(new SpatialMatcher({ score: () => 5 }).scorePair(target, target)).toBe(1);
        });

        it('should clamp negative and non-finite scores to 0', () => {
            expect(new SpatialMatcher({ score: () => -1 }).scorePair(target, target)).toBe(0);
            expect(new SpatialMatcher({ score: () => Number.NaN }).scorePair(target, target)).toBe(0);
        });
    });

    describe('vertical window', () => {
        const matcher = new SpatialMatcher();
        const rule: PredecessorRule = {
            predecessorType: 'Concrete',
            horizontalThreshold: 0.8,
            vertical: { below: 0.5, above: 0.2 },
        };
        const target = onSlab('PP-1', 'Piping', { elevation: elevation(1.0, 3.0) });
        const slabAtLevel = onSlab('CN-1', 'Concrete', { elevation: elevation(0.0, 1.1) });
        const slabBelow = onSlab('CN-2', 'Concrete', { elevation: elevation(0.0, 0.4) });

        it('should pass a candidate whose top is just around the target base', () => {
            expect(SpatialMatcher.withinVerticalWindow(slabAtLevel, target, { below: 0.5, above: 0.2 })).toBe(true);
        });

        it('should fail a candidate whose top is too far below', () => {
            expect(SpatialMatcher.withinVerticalWindow(slabBelow, target, { below: 0.5, above: 0.2 })).toBe(false);
        });

        it('should fail when an elevation is missing', () => {
            const flat = onSlab('CN-3', 'Concrete');
            expect(SpatialMatcher.withinVerticalWindow(flat, target, { below: 0.5, above: 0.2 })).toBe(false);
        });

        it('should keep only vertically matching candidates when applied', () => {
            const outcome = matcher.match(target, indexed(slabAtLevel, slabBelow), rule, { applyVertical: true });
            expect(outcome).toEqual({
                kind: 'accepted',
                predecessorType: 'Concrete',
                threshold: 0.8,
                matches: [{ id: 'CN-1', score: 1 }],
            });
        });

        it('should reject with reason vertical when horizontal passes but vertical fails', () => {
            expect(matcher.match(target, indexed(slabBelow), rule, { applyVertical: true })).toEqual({
                kind: 'rejected',
                predecessorType: 'Concrete',
                candidateCount: 1,
                threshold: 0.8,
                reason: 'vertical',
                bestScore: 1,
                vertical: { below: 0.5, above: 0.2 },
            });
        });

        it('should ignore the window unless applied', () => {
            expect(matcher.match(target, indexed(slabBelow), rule).kind).toBe('accepted');
        });
    });
});
