/**
 * ============================================================================
 * PredecessorResolver.ts - Predecessor Resolution Engine
 * ============================================================================
 *
 * Pure calculation module. Stateless; operates on activity arrays.
 *
 * ALGORITHM OVERVIEW:
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │  1. ZONE INDEX                                                         │
 * │     - Group activities by CWA, then by type                            │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │  2. PER ACTIVITY (input order)                                         │
 * │     - rules = RuleTable.lookup(type); none → "not configured"          │
 * │     - for each (predecessorType, threshold) in rule order:             │
 * │         candidates = zone[cwa][predecessorType] - self                 │
 * │         outcome    = SpatialMatcher.match(...)                         │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │  3. AGGREGATE                                                          │
 * │     - predecessors = union of accepted ids, rule order, no duplicates  │
 * │     - AuditLogBuilder collects one section per activity                │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Nothing here throws for bad data: a missing CWA yields no candidates, an
 * unknown type yields "not configured", and an unexpected failure inside one
 * activity is recorded on that activity's result with its outcomes cleared.
 */

import type { Activity, CheckOutcome, ResolutionResult, ResolutionRun, SequenceEdge } from '../types';
import { AuditLogBuilder } from './AuditLogBuilder';
import { EDGE_REL, EDGE_TASK_TYPE, foldCwa } from './Constants';
import { ResolverConfig } from './ResolverConfig';
import { RuleTable } from './RuleTable';
import { SpatialMatcher, type ScoreFunction } from './SpatialMatcher';
import { ZoneIndex, type IndexedActivity } from './ZoneIndex';

/**
 * Resolution options
 */
export interface ResolveOptions {
    config?: ResolverConfig;
    /** Replaces the footprint overlap score */
    score?: ScoreFunction;
}

/**
 * Everything needed to resolve a single activity
 */
export interface ResolutionContext {
    zones: ZoneIndex;
    rules: RuleTable;
    matcher: SpatialMatcher;
    config: ResolverConfig;
}

/**
 * PredecessorResolver
 * Static class providing pure resolution functions
 */
export class PredecessorResolver {

    /**
     * Resolve predecessors for every activity
     *
     * @param activities - Activities in input order
     * @param rules - Rule table for this run
     * @param options - Configuration and scoring overrides
     * @returns Per-activity results, audit log and statistics
     */
    static resolve(
        activities: readonly Activity[],
        rules: RuleTable = RuleTable.defaults(),
        options: ResolveOptions = {}
    ): ResolutionRun {
        const startTime = performance.now();
        const context = PredecessorResolver.createContext(activities, rules, options);
        const audit = new AuditLogBuilder();

        const results = activities.map((activity, index) => {
            const result = PredecessorResolver.resolveActivity({ index, activity }, context);
            audit.append(result);
            return result;
        });

        const log = audit.build();
        const calcTime = performance.now() - startTime;
        const edgeCount = results.reduce((sum, result) => sum + result.predecessors.length, 0);

        if (context.config.get('verbose')) {
            console.log(
                `[PredecessorResolver] ${log.totalActivities} activities, ` +
                `${log.activitiesWithoutPredecessors} without predecessors, ` +
                `${edgeCount} edges, ${calcTime.toFixed(2)}ms`
            );
        }

        return {
            results,
            audit: log,
            stats: {
                totalActivities: log.totalActivities,
                activitiesWithoutPredecessors: log.activitiesWithoutPredecessors,
                edgeCount,
                calcTime,
            },
        };
    }

    /**
     * Build the shared, read-only context of a run
     */
    static createContext(
        activities: readonly Activity[],
        rules: RuleTable,
        options: ResolveOptions = {}
    ): ResolutionContext {
        const config = options.config ?? new ResolverConfig();
        return {
            zones: ZoneIndex.build(activities),
            rules,
            matcher: new SpatialMatcher({ score: options.score, tolerance: config.get('scoreTolerance') }),
            config,
        };
    }

    /**
     * Resolve one activity against a prepared context.
     * Independent of every other activity's result.
     */
    static resolveActivity(target: IndexedActivity, context: ResolutionContext): ResolutionResult {
        const { activity, index } = target;
        const result: ResolutionResult = {
            index,
            activityId: activity.id,
            name: activity.name,
            type: activity.type ?? '',
            cwa: foldCwa(activity.cwa),
            configured: false,
            outcomes: [],
            predecessors: [],
        };

        try {
            const rules = context.rules.lookup(activity.type);
            if (!rules || rules.length === 0) {
                return result;
            }

            result.configured = true;
            const applyVertical = context.config.appliesVertical(activity.type);

            for (const rule of rules) {
                const candidates = context.zones.candidates(target, rule.predecessorType);
                result.outcomes.push(context.matcher.match(activity, candidates, rule, { applyVertical }));
            }

            result.predecessors = PredecessorResolver.collectPredecessors(result.outcomes);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[PredecessorResolver] Failed to resolve ${activity.id}:`, err);
            result.error = message;
            result.outcomes = [];
            result.predecessors = [];
        }

        return result;
    }

    /**
     * Accepted ids across outcomes, in rule order, without duplicates
     */
    static collectPredecessors(outcomes: readonly CheckOutcome[]): string[] {
        const ids = new Set<string>();
        for (const outcome of outcomes) {
            if (outcome.kind !== 'accepted') continue;
            for (const match of outcome.matches) {
                ids.add(match.id);
            }
        }
        return [...ids];
    }

    /**
     * Predecessor edges in the sequencing export format
     */
    static toSequenceEdges(results: readonly ResolutionResult[]): SequenceEdge[] {
        return results.flatMap(result =>
            result.predecessors.map(predecessor => ({
                ScheduleActivityID: result.activityId,
                Predecessor: predecessor,
                Rel: EDGE_REL,
                TaskType: EDGE_TASK_TYPE,
            }))
        );
    }
}
