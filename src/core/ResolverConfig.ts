/**
 * @fileoverview Resolver configuration
 * @module core/ResolverConfig
 *
 * Typed access to the numeric policy and switches of a resolution run.
 * Instances are immutable; derive a variant with with().
 *
 * Environment variables read by fromEnv():
 *   SEQUENCE_DEFAULT_THRESHOLD  horizontal threshold for pairs without a default (0..1)
 *   SEQUENCE_SCORE_TOLERANCE    tolerance of the score >= threshold comparison
 *   SEQUENCE_ENFORCE_VERTICAL   "true"/"1" to apply vertical windows
 *   SEQUENCE_VERBOSE            "true"/"1" to log per-run summaries
 */

import { z } from 'zod';
import {
    DEFAULT_HORIZONTAL_THRESHOLD,
    DEFAULT_SCORE_TOLERANCE,
    DEFAULT_VERTICAL_EXEMPT_TYPES,
    foldType,
} from './Constants';
import { ConfigurationError } from './ConfigurationError';

/**
 * Resolver setting definitions
 */
export interface ResolverSettings {
    /** Threshold for override pairs that have no default rule */
    defaultHorizontalThreshold: number;
    /** Scores within this distance below a threshold still qualify */
    scoreTolerance: number;
    /** Apply vertical windows carried by rules */
    enforceVertical: boolean;
    /** Activity types that never get a vertical window */
    verticalExemptTypes: string[];
    /** Log a summary line per run */
    verbose: boolean;
}

const settingsSchema = z.object({
    defaultHorizontalThreshold: z.number().min(0).max(1),
    scoreTolerance: z.number().min(0).max(0.01),
    enforceVertical: z.boolean(),
    verticalExemptTypes: z.array(z.string()),
    verbose: z.boolean(),
});

const DEFAULT_SETTINGS: ResolverSettings = {
    defaultHorizontalThreshold: DEFAULT_HORIZONTAL_THRESHOLD,
    scoreTolerance: DEFAULT_SCORE_TOLERANCE,
    enforceVertical: false,
    verticalExemptTypes: [...DEFAULT_VERTICAL_EXEMPT_TYPES],
    verbose: false,
};

const ENV_KEYS = {
    defaultHorizontalThreshold: 'SEQUENCE_DEFAULT_THRESHOLD',
    scoreTolerance: 'SEQUENCE_SCORE_TOLERANCE',
    enforceVertical: 'SEQUENCE_ENFORCE_VERTICAL',
    verbose: 'SEQUENCE_VERBOSE',
} as const;

const envNumber = z.coerce.number().finite();
const envBoolean = z.enum(['true', 'false', '1', '0']).transform(value => value === 'true' || value === '1');

export class ResolverConfig {
    private readonly settings: Readonly<ResolverSettings>;

    /**
     * @throws ConfigurationError when an override is out of range
     */
    public constructor(overrides: Partial<ResolverSettings> = {}) {
        const parsed = settingsSchema.safeParse({ ...DEFAULT_SETTINGS, ...overrides });
        if (!parsed.success) {
            throw ConfigurationError.fromZod('ResolverConfig', parsed.error.issues);
        }
        this.settings = Object.freeze({
            ...parsed.data,
            verticalExemptTypes: [...parsed.data.verticalExemptTypes],
        });
    }

    /**
     * Read overrides from environment variables.
     * Unparseable values are ignored with a warning and the default is kept.
     */
    static fromEnv(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
        const overrides: Partial<ResolverSettings> = {};

        const threshold = ResolverConfig.readEnv(env, ENV_KEYS.defaultHorizontalThreshold, envNumber);
        if (threshold !== undefined) overrides.defaultHorizontalThreshold = threshold;

        const tolerance = ResolverConfig.readEnv(env, ENV_KEYS.scoreTolerance, envNumber);
        if (tolerance !== undefined) overrides.scoreTolerance = tolerance;

        const vertical = ResolverConfig.readEnv(env, ENV_KEYS.enforceVertical, envBoolean);
        if (vertical !== undefined) overrides.enforceVertical = vertical;

        const verbose = ResolverConfig.readEnv(env, ENV_KEYS.verbose, envBoolean);
        if (verbose !== undefined) overrides.verbose = verbose;

        return new ResolverConfig(overrides);
    }

    /**
     * Get a setting value
     */
    get<K extends keyof ResolverSettings>(key: K): ResolverSettings[K] {
        return this.settings[key];
    }

    /**
     * Get all settings (copy)
     */
    getAll(): ResolverSettings {
        return { ...this.settings, verticalExemptTypes: [...this.settings.verticalExemptTypes] };
    }

    /**
     * New config with the given overrides applied on top of this one
     */
    with(overrides: Partial<ResolverSettings>): ResolverConfig {
        return new ResolverConfig({ ...this.getAll(), ...overrides });
    }

    /**
     * Whether vertical windows apply to activities of this type
     */
    appliesVertical(activityType: string): boolean {
        if (!this.settings.enforceVertical) return false;
        const key = foldType(activityType);
        return !this.settings.verticalExemptTypes.some(type => foldType(type) === key);
    }

    private static readEnv<T>(env: NodeJS.ProcessEnv, key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
        const raw = env[key];
        if (raw === undefined || raw.trim() === '') return undefined;
        const parsed = schema.safeParse(raw.trim().toLowerCase());
        if (!parsed.success) {
            console.warn(`[ResolverConfig] Ignoring ${key}="${raw}": not a valid value`);
            return undefined;
        }
        return parsed.data;
    }
}
