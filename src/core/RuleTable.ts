/**
 * @fileoverview Predecessor rule table
 * @module core/RuleTable
 *
 * Immutable mapping from an activity type to its ordered list of allowed
 * predecessor types, each with its own horizontal threshold. Order matters:
 * it mirrors engineering precedence (concrete before piling before civil).
 *
 * Lookup is case-insensitive. A type with no entry, or with an empty entry,
 * has no configured predecessor checks.
 */

import { z } from 'zod';
import type { PredecessorRule } from '../types';
import defaultRuleDocument from '../../config/dependency_rules.json';
import { DEFAULT_HORIZONTAL_THRESHOLD, foldType } from './Constants';
import { ConfigurationError } from './ConfigurationError';

const verticalSchema = z.object({
    below: z.number().finite().nonnegative(),
    above: z.number().finite().nonnegative(),
});

const ruleObjectSchema = z.object({
    predecessorType: z.string().trim().min(1),
    horizontalThreshold: z.number().min(0).max(1).optional(),
    vertical: verticalSchema.optional(),
});

/**
 * A rule entry is either a bare predecessor type name or a full rule object
 */
const ruleEntrySchema = z.union([z.string().trim().min(1), ruleObjectSchema]);

export const ruleDocumentSchema = z.record(z.string(), z.array(ruleEntrySchema));

export type RuleEntry = z.infer<typeof ruleEntrySchema>;
export type RuleDocument = z.infer<typeof ruleDocumentSchema>;

/**
 * Options for building a rule table from a document
 */
export interface RuleTableOptions {
    /** Table supplying thresholds for bare type names; defaults to the shipped table */
    defaults?: RuleTable;
    /** Threshold when neither the entry nor the defaults give one */
    defaultThreshold?: number;
}

interface RuleSet {
    type: string;
    rules: readonly PredecessorRule[];
}

export class RuleTable {
    private static shipped: RuleTable | null = null;

    private readonly entries: ReadonlyMap<string, RuleSet>;

    private constructor(entries: Map<string, RuleSet>) {
        this.entries = entries;
    }

    /**
     * The rule table shipped in config/dependency_rules.json
     */
    static defaults(): RuleTable {
        if (!RuleTable.shipped) {
            RuleTable.shipped = RuleTable.fromDocument(defaultRuleDocument, { defaults: RuleTable.empty() });
        }
        return RuleTable.shipped;
    }

    static empty(): RuleTable {
        return new RuleTable(new Map());
    }

    /**
     * Build a table from a rule document
     *
     * Bare type names take their threshold (and vertical window) from the
     * matching pair in the defaults, else the default threshold.
     * Repeated predecessor types are dropped, first occurrence wins.
     *
     * @param document - Parsed JSON, validated here
     * @throws ConfigurationError when the document does not match the schema
     */
    static fromDocument(document: unknown, options: RuleTableOptions = {}): RuleTable {
        const parsed = ruleDocumentSchema.safeParse(document);
        if (!parsed.success) {
            throw ConfigurationError.fromZod('RuleTable', parsed.error.issues);
        }

        const defaults = options.defaults ?? RuleTable.defaults();
        const fallback = options.defaultThreshold ?? DEFAULT_HORIZONTAL_THRESHOLD;
        const entries = new Map<string, RuleSet>();

        for (const [type, list] of Object.entries(parsed.data)) {
            const key = foldType(type);
            if (entries.has(key)) {
                console.warn(`[RuleTable] Duplicate entry for "${type}" ignored`);
                continue;
            }
            entries.set(key, {
                type: type.trim(),
                rules: Object.freeze(RuleTable.normalizeEntries(type, list, defaults, fallback)),
            });
        }

        return new RuleTable(entries);
    }

    /**
     * Overlay a document on this table: each type it names replaces this
     * table's entry, every other type keeps its current rules
     *
     * @throws ConfigurationError when the document does not match the schema
     */
    withOverrides(document: unknown, defaultThreshold?: number): RuleTable {
        const overrides = RuleTable.fromDocument(document, { defaults: this, defaultThreshold });
        const merged = new Map(this.entries);
        for (const [key, set] of overrides.entries) {
            merged.set(key, set);
        }
        return new RuleTable(merged);
    }

    /**
     * Rules for an activity type, undefined when the type has no entry
     */
    lookup(activityType: string): readonly PredecessorRule[] | undefined {
        return this.entries.get(foldType(activityType))?.rules;
    }

    /**
     * Whether the type has at least one predecessor check
     */
    isConfigured(activityType: string): boolean {
        return (this.lookup(activityType)?.length ?? 0) > 0;
    }

    /**
     * Rule for a specific (type, predecessor type) pair
     */
    findPair(activityType: string, predecessorType: string): PredecessorRule | undefined {
        const key = foldType(predecessorType);
        return this.lookup(activityType)?.find(rule => foldType(rule.predecessorType) === key);
    }

    getTypes(): string[] {
        return [...this.entries.values()].map(set => set.type);
    }

    /**
     * Plain document form, suitable for JSON.stringify
     */
    toDocument(): Record<string, PredecessorRule[]> {
        const document: Record<string, PredecessorRule[]> = {};
        for (const set of this.entries.values()) {
            document[set.type] = set.rules.map(rule => ({ ...rule }));
        }
        return document;
    }

    private static normalizeEntries(
        type: string,
        list: readonly RuleEntry[],
        defaults: RuleTable,
        fallback: number
    ): PredecessorRule[] {
        const seen = new Set<string>();
        const rules: PredecessorRule[] = [];

        for (const entry of list) {
            const predecessorType = typeof entry === 'string' ? entry : entry.predecessorType;
            const key = foldType(predecessorType);
            if (seen.has(key)) continue;
            seen.add(key);

            const base = defaults.findPair(type, predecessorType);
            const explicit = typeof entry === 'string' ? undefined : entry;
            const vertical = explicit?.vertical ?? (explicit?.horizontalThreshold === undefined ? base?.vertical : undefined);

            const rule: PredecessorRule = {
                predecessorType,
                horizontalThreshold: explicit?.horizontalThreshold ?? base?.horizontalThreshold ?? fallback,
            };
            if (vertical) {
                rule.vertical = { ...vertical };
            }
            rules.push(rule);
        }

        return rules;
    }
}
