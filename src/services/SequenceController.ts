/**
 * SequenceController
 *
 * The primary interface between callers and the resolution engine.
 *
 * Responsibilities:
 * 1. Engine lifecycle management
 * 2. Serializing updates and runs through an OperationQueue
 * 3. Exposing run state via RxJS Observables
 *
 * One controller per project. Each resolve() builds a fresh audit log;
 * nothing is shared between runs.
 */

import { BehaviorSubject, Subject } from 'rxjs';
import type { ActivityUpdate, ISequencingEngine } from '../core/ISequencingEngine';
import { JavaScriptEngine } from '../core/engines/JavaScriptEngine';
import { AuditLogBuilder, type AuditRenderOptions } from '../core/AuditLogBuilder';
import { OperationQueue } from '../core/OperationQueue';
import { PredecessorResolver } from '../core/PredecessorResolver';
import { ResolverConfig } from '../core/ResolverConfig';
import { RuleTable } from '../core/RuleTable';
import { RecordLoader, type LoadResult } from '../data/RecordLoader';
import type { Activity, ResolutionRun, ResolutionStats, SequenceEdge } from '../types';

/**
 * Dependencies of SequenceController
 */
export interface SequenceControllerDeps {
    /** Engine to run on; defaults to the in-process JavaScriptEngine */
    engine?: ISequencingEngine;
}

export class SequenceController {
    private readonly engine: ISequencingEngine;
    private readonly queue = new OperationQueue();
    private rules: RuleTable = RuleTable.defaults();
    private config: ResolverConfig = new ResolverConfig();

    // ========================================================================
    // Observable State
    // ========================================================================

    /** Output of the last completed run */
    public readonly result$ = new BehaviorSubject<ResolutionRun | null>(null);

    /** Statistics of the last completed run */
    public readonly stats$ = new BehaviorSubject<ResolutionStats | null>(null);

    /** Whether initialize() has completed */
    public readonly isInitialized$ = new BehaviorSubject<boolean>(false);

    /** Whether a run is in progress */
    public readonly isResolving$ = new BehaviorSubject<boolean>(false);

    /** Error stream */
    public readonly errors$ = new Subject<string>();

    constructor(deps: SequenceControllerDeps = {}) {
        this.engine = deps.engine ?? new JavaScriptEngine();
    }

    // ========================================================================
    // Public API - Initialization
    // ========================================================================

    /**
     * Initialize the engine with activities, rules and configuration
     */
    public initialize(
        activities: Activity[],
        rules: RuleTable = RuleTable.defaults(),
        config: ResolverConfig = new ResolverConfig()
    ): Promise<void> {
        return this.run('initialize', async () => {
            await this.engine.initialize(activities, rules, config);
            this.rules = rules;
            this.config = config;
            this.result$.next(null);
            this.stats$.next(null);
            this.isInitialized$.next(true);
        });
    }

    /**
     * Load cleaned records and initialize with the resulting activities
     *
     * @returns Loaded activities and the records that were skipped
     */
    public async loadRecords(
        records: unknown,
        rules: RuleTable = RuleTable.defaults(),
        config: ResolverConfig = new ResolverConfig()
    ): Promise<LoadResult> {
        let loaded: LoadResult;
        try {
            loaded = RecordLoader.load(records);
        } catch (err) {
            this.reportError('loadRecords', err);
            throw err;
        }
        await this.initialize(loaded.activities, rules, config);
        return loaded;
    }

    // ========================================================================
    // Public API - Updates
    // ========================================================================

    public updateActivity(id: string, updates: ActivityUpdate): Promise<void> {
        return this.run('updateActivity', () => this.engine.updateActivity(id, updates));
    }

    public syncActivities(activities: Activity[]): Promise<void> {
        return this.run('syncActivities', () => this.engine.syncActivities(activities));
    }

    public updateRules(rules: RuleTable): Promise<void> {
        return this.run('updateRules', async () => {
            await this.engine.updateRules(rules);
            this.rules = rules;
        });
    }

    /**
     * Overlay a rule document on the current rules.
     * Pairs without a threshold anywhere take the configured default threshold.
     *
     * @throws ConfigurationError when the document is invalid
     */
    public overrideRules(document: unknown): Promise<void> {
        return this.run('overrideRules', async () => {
            const rules = this.rules.withOverrides(document, this.config.get('defaultHorizontalThreshold'));
            await this.engine.updateRules(rules);
            this.rules = rules;
        });
    }

    // ========================================================================
    // Public API - Resolution
    // ========================================================================

    /**
     * Resolve predecessors for the current activities
     */
    public resolve(): Promise<ResolutionRun> {
        return this.run('resolve', async () => {
            this.isResolving$.next(true);
            try {
                const run = await this.engine.resolveAll();
                this.result$.next(run);
                this.stats$.next(run.stats);
                return run;
            } finally {
                this.isResolving$.next(false);
            }
        });
    }

    // ========================================================================
    // Public API - Getters (snapshots of the last run)
    // ========================================================================

    public getResult(): ResolutionRun | null {
        return this.result$.value;
    }

    public getStats(): ResolutionStats | null {
        return this.stats$.value;
    }

    public isInitialized(): boolean {
        return this.isInitialized$.value;
    }

    /**
     * Edges of the last run, empty before the first run
     */
    public getEdges(): SequenceEdge[] {
        const result = this.result$.value;
        return result ? PredecessorResolver.toSequenceEdges(result.results) : [];
    }

    /**
     * Audit log of the last run as markdown, null before the first run
     */
    public renderAudit(options: AuditRenderOptions = {}): string | null {
        const result = this.result$.value;
        return result ? AuditLogBuilder.render(result.audit, options) : null;
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    /**
     * Dispose the engine and complete all streams
     */
    public async dispose(): Promise<void> {
        await this.queue.enqueue(() => this.engine.dispose());

        this.result$.complete();
        this.stats$.complete();
        this.isInitialized$.complete();
        this.isResolving$.complete();
        this.errors$.complete();
    }

    /**
     * Queue an operation; failures go to errors$ and are rethrown
     */
    private run<T>(operation: string, task: () => Promise<T>): Promise<T> {
        return this.queue.enqueue(async () => {
            try {
                return await task();
            } catch (err) {
                this.reportError(operation, err);
                throw err;
            }
        });
    }

    private reportError(operation: string, err: unknown): void {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[SequenceController] ${operation} failed:`, message);
        this.errors$.next(message);
    }
}
