/**
 * JavaScriptEngine.ts - In-process resolution engine
 *
 * Wraps the pure PredecessorResolver.
 * Maintains a STATEFUL copy of activities for interface compliance.
 */

import type { ActivityUpdate, ISequencingEngine } from '../ISequencingEngine';
import type { Activity, ResolutionRun } from '../../types';
import { PredecessorResolver } from '../PredecessorResolver';
import { foldCwa } from '../Constants';
import type { ResolverConfig } from '../ResolverConfig';
import type { RuleTable } from '../RuleTable';

export class JavaScriptEngine implements ISequencingEngine {
    /** Internal activity storage - MUST stay in sync */
    private activities: Activity[] = [];

    private rules: RuleTable | null = null;

    private config: ResolverConfig | null = null;

    private initialized = false;

    /**
     * Initialize engine with run input
     * Copies activities so caller mutations don't leak in
     */
    async initialize(activities: Activity[], rules: RuleTable, config: ResolverConfig): Promise<void> {
        this.activities = structuredClone(activities);
        this.rules = rules;
        this.config = config;
        this.initialized = true;

        if (config.get('verbose')) {
            console.log(`[JavaScriptEngine] Initialized with ${this.activities.length} activities`);
        }
    }

    /**
     * Update a single activity in internal state
     *
     * @throws Error when not initialized or the id is unknown
     */
    async updateActivity(id: string, updates: ActivityUpdate): Promise<void> {
        this.assertInitialized('updateActivity');

        const index = this.activities.findIndex(activity => activity.id === id);
        if (index === -1) {
            throw new Error(`[JavaScriptEngine] Activity ${id} not found`);
        }

        const updated: Activity = {
            ...this.activities[index],
            ...structuredClone(updates),
        };
        updated.cwa = foldCwa(updated.cwa);
        this.activities[index] = updated;
    }

    /**
     * Bulk sync all activities
     */
    async syncActivities(activities: Activity[]): Promise<void> {
        this.assertInitialized('syncActivities');
        this.activities = structuredClone(activities);
    }

    async updateRules(rules: RuleTable): Promise<void> {
        this.assertInitialized('updateRules');
        this.rules = rules;
    }

    /**
     * Run resolution on internal state
     */
    async resolveAll(): Promise<ResolutionRun> {
        if (!this.initialized || !this.rules || !this.config) {
            throw new Error('[JavaScriptEngine] Cannot resolve: not initialized');
        }
        return PredecessorResolver.resolve(this.activities, this.rules, { config: this.config });
    }

    async dispose(): Promise<void> {
        this.activities = [];
        this.rules = null;
        this.config = null;
        this.initialized = false;
    }

    /**
     * Get current activity count (for debugging)
     */
    getActivityCount(): number {
        return this.activities.length;
    }

    private assertInitialized(operation: string): void {
        if (!this.initialized) {
            throw new Error(`[JavaScriptEngine] ${operation} called before initialization`);
        }
    }
}
