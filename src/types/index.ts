// =============================================================================
// CORE TYPES - Predecessor Resolution
// =============================================================================

/**
 * Point in model space
 */
export interface Point3 {
  x: number;
  y: number;
  z: number;
}

/**
 * Horizontal extent of an activity (plan view bounding box)
 */
export interface Footprint {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Vertical extent of an activity
 */
export interface Elevation {
  minZ: number;
  maxZ: number;
}

/**
 * One physical unit of construction work
 */
export interface Activity {
  /** Unique identifier (element name of the source record) */
  id: string;
  /** Free-text label, e.g. CWA_ASU-1A00_-_Install_Piping */
  name: string;
  /** Derived classification, '' when unknown */
  readonly type: string;
  /** Construction work area code, '' when missing */
  cwa: string;
  position?: Point3;
  footprint?: Footprint;
  elevation?: Elevation;
  /** CAD GUID carried over from the cleaned record */
  guid?: string;
}

/**
 * Vertical window applied after the horizontal test.
 * A candidate passes when pred.maxZ - below < target.minZ < pred.maxZ + above.
 */
export interface VerticalWindow {
  below: number;
  above: number;
}

/**
 * One allowed predecessor type for an activity type
 */
export interface PredecessorRule {
  predecessorType: string;
  /** Minimum horizontal score, 0..1 inclusive */
  horizontalThreshold: number;
  vertical?: VerticalWindow;
}

/**
 * A candidate that passed its check
 */
export interface PredecessorMatch {
  id: string;
  score: number;
}

/**
 * Outcome of checking a single predecessor type for one activity
 * - no_candidates: no activity of that type in the same CWA
 * - rejected: candidates exist, none qualified
 * - accepted: one or more candidates qualified
 */
export type CheckOutcome =
  | { kind: 'no_candidates'; predecessorType: string }
  | {
      kind: 'rejected';
      predecessorType: string;
      candidateCount: number;
      threshold: number;
      /** Which test eliminated the last candidates */
      reason: 'horizontal' | 'vertical';
      /** Best horizontal score among the candidates */
      bestScore: number;
      /** Set when reason is 'vertical' */
      vertical?: VerticalWindow;
    }
  | { kind: 'accepted'; predecessorType: string; threshold: number; matches: PredecessorMatch[] };

export type CheckOutcomeKind = CheckOutcome['kind'];

/**
 * Per-activity resolution result
 */
export interface ResolutionResult {
  /** Position of the activity in the input */
  index: number;
  activityId: string;
  name: string;
  type: string;
  cwa: string;
  /** False when the activity type has no rule entry */
  configured: boolean;
  /** One entry per configured rule, in rule order */
  outcomes: CheckOutcome[];
  /** Accepted predecessor ids across all checks, de-duplicated */
  predecessors: string[];
  /** Set when resolution of this activity failed unexpectedly */
  error?: string;
}

/**
 * Run-level counters
 */
export interface ResolutionStats {
  totalActivities: number;
  activitiesWithoutPredecessors: number;
  edgeCount: number;
  calcTime: number;
}

/**
 * Ordered audit sections plus counters
 */
export interface AuditLog {
  sections: ResolutionResult[];
  totalActivities: number;
  activitiesWithoutPredecessors: number;
}

/**
 * Complete output of one resolution run
 */
export interface ResolutionRun {
  results: ResolutionResult[];
  audit: AuditLog;
  stats: ResolutionStats;
}

/**
 * Predecessor edge in the sequencing export format
 */
export interface SequenceEdge {
  ScheduleActivityID: string;
  Predecessor: string;
  Rel: 'FS';
  TaskType: 'Construct';
}
