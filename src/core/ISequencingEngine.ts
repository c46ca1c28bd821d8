/**
 * ISequencingEngine.ts - Engine Interface
 *
 * Contract for predecessor resolution engines.
 * Implementations are STATEFUL: they own a copy of the activities and rule
 * table given to initialize() and resolve against that copy.
 */

import type { Activity, ResolutionRun } from '../types';
import type { ResolverConfig } from './ResolverConfig';
import type { RuleTable } from './RuleTable';

/**
 * Fields of an activity that may change after load.
 * id and type are fixed for the lifetime of an activity.
 */
export type ActivityUpdate = Partial<Pick<Activity, 'cwa' | 'position' | 'footprint' | 'elevation'>>;

export interface ISequencingEngine {
    /**
     * Initialize the engine with a run's input
     *
     * @param activities - Activities in input order
     * @param rules - Rule table for every subsequent run
     * @param config - Numeric policy and switches
     */
    initialize(activities: Activity[], rules: RuleTable, config: ResolverConfig): Promise<void>;

    /**
     * Update one activity in the engine's internal state
     */
    updateActivity(id: string, updates: ActivityUpdate): Promise<void>;

    /**
     * Replace all activities
     */
    syncActivities(activities: Activity[]): Promise<void>;

    /**
     * Replace the rule table
     */
    updateRules(rules: RuleTable): Promise<void>;

    /**
     * Resolve predecessors over the internal state
     */
    resolveAll(): Promise<ResolutionRun>;

    /**
     * Clean up resources
     */
    dispose(): Promise<void>;
}
