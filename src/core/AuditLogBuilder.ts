/**
 * @fileoverview Audit log construction and rendering
 * @module core/AuditLogBuilder
 *
 * One builder per run. Sections are tagged with the activity's input index
 * and sorted on build(), so they may be appended in any order.
 */

import type { AuditLog, CheckOutcome, ResolutionResult } from '../types';
import { AUDIT_SCORE_DIGITS, AUDIT_TITLE, foldCwa } from './Constants';

/**
 * Render options
 */
export interface AuditRenderOptions {
    /** Extra "Key: value" lines written under the counters */
    meta?: Record<string, string>;
    /** Render only activities without predecessors */
    onlyWithoutPredecessors?: boolean;
}

export class AuditLogBuilder {
    private readonly sections = new Map<number, ResolutionResult>();
    private built: AuditLog | null = null;

    /**
     * Append the section of one activity
     * @throws Error when the log was already built or the index is taken
     */
    append(result: ResolutionResult): void {
        if (this.built) {
            throw new Error('[AuditLogBuilder] Cannot append after build()');
        }
        if (this.sections.has(result.index)) {
            throw new Error(`[AuditLogBuilder] Section ${result.index} already appended`);
        }
        this.sections.set(result.index, result);
    }

    get size(): number {
        return this.sections.size;
    }

    /**
     * Freeze the log: sections in input order plus counters
     */
    build(): AuditLog {
        if (this.built) return this.built;

        const sections = [...this.sections.values()].sort((a, b) => a.index - b.index);
        this.built = {
            sections,
            totalActivities: sections.length,
            activitiesWithoutPredecessors: sections.filter(section => section.predecessors.length === 0).length,
        };
        return this.built;
    }

    /**
     * Render a log as markdown
     */
    static render(log: AuditLog, options: AuditRenderOptions = {}): string {
        const lines: string[] = [
            AUDIT_TITLE,
            '',
            `Total activities: ${log.totalActivities}`,
            `Activities without predecessors: ${log.activitiesWithoutPredecessors}`,
        ];
        for (const [key, value] of Object.entries(options.meta ?? {})) {
            lines.push(`${key}: ${value}`);
        }

        const sections = options.onlyWithoutPredecessors
            ? log.sections.filter(section => section.predecessors.length === 0)
            : log.sections;

        for (const section of sections) {
            lines.push('', ...AuditLogBuilder.renderSection(section));
        }

        return lines.join('\n') + '\n';
    }

    /**
     * Lines for one activity section
     */
    static renderSection(section: ResolutionResult): string[] {
        const lines = [
            `## ${section.activityId}`,
            `- Type: ${section.type}`,
            `- CWA: ${foldCwa(section.cwa)}`,
        ];

        if (section.error) {
            lines.push(`- Error: ${section.error}`);
        }

        if (!section.configured) {
            lines.push('- No allowed predecessor types configured (skipping checks).');
            return lines;
        }

        for (const outcome of section.outcomes) {
            lines.push(`- ${AuditLogBuilder.describeOutcome(outcome)}`);
        }
        return lines;
    }

    /**
     * One human-readable line per check
     */
    static describeOutcome(outcome: CheckOutcome): string {
        switch (outcome.kind) {
            case 'no_candidates':
                return `${outcome.predecessorType}: no candidates of this type in same CWA`;
            case 'rejected':
                if (outcome.reason === 'vertical' && outcome.vertical) {
                    return `${outcome.predecessorType}: ${outcome.candidateCount} candidates found, horizontal >= ${outcome.threshold} passed ` +
                        `but none within vertical window (${outcome.vertical.below}, ${outcome.vertical.above})`;
                }
                return `${outcome.predecessorType}: ${outcome.candidateCount} candidates found, none pass horizontal >= ${outcome.threshold}`;
            case 'accepted':
                return `${outcome.predecessorType}: accepted ` +
                    outcome.matches.map(match => `${match.id} (${match.score.toFixed(AUDIT_SCORE_DIGITS)})`).join(', ');
        }
    }
}
