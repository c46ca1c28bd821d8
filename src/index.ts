/**
 * Public API
 */
export type * from './types';
export { TypeClassifier } from './core/TypeClassifier';
export { ZoneIndex } from './core/ZoneIndex';
export type { IndexedActivity, ZoneGroup } from './core/ZoneIndex';
export { RuleTable, ruleDocumentSchema } from './core/RuleTable';
export type { RuleDocument, RuleEntry, RuleTableOptions } from './core/RuleTable';
export { SpatialMatcher } from './core/SpatialMatcher';
export type { ScoreFunction, SpatialMatcherOptions, MatchOptions } from './core/SpatialMatcher';
export { PredecessorResolver } from './core/PredecessorResolver';
export type { ResolveOptions, ResolutionContext } from './core/PredecessorResolver';
export { AuditLogBuilder } from './core/AuditLogBuilder';
export type { AuditRenderOptions } from './core/AuditLogBuilder';
export { ResolverConfig } from './core/ResolverConfig';
export type { ResolverSettings } from './core/ResolverConfig';
export { ConfigurationError } from './core/ConfigurationError';
export { OperationQueue } from './core/OperationQueue';
export { JavaScriptEngine } from './core/engines';
export type { ISequencingEngine, ActivityUpdate } from './core/engines';
export { RecordLoader, cleanedRecordSchema } from './data/RecordLoader';
export type { CleanedRecord, LoadResult, SkippedRecord } from './data/RecordLoader';
export { SequenceController } from './services/SequenceController';
export type { SequenceControllerDeps } from './services/SequenceController';
