/**
 * @fileoverview Application-wide constants
 * @module core/Constants
 *
 * Centralized constants for predecessor resolution and audit rendering.
 */

import type { SequenceEdge } from '../types';

/**
 * Horizontal threshold used when an override names a predecessor type
 * that has no default pair
 */
export const DEFAULT_HORIZONTAL_THRESHOLD = 0.8;

/**
 * Tolerance for score >= threshold comparisons
 */
export const DEFAULT_SCORE_TOLERANCE = 1e-9;

/**
 * Activity types that skip the vertical window even when it is enforced
 */
export const DEFAULT_VERTICAL_EXEMPT_TYPES: readonly string[] = Object.freeze(['Equipment']);

/**
 * Type assigned to _Set_ activities
 */
export const EQUIPMENT_TYPE = 'Equipment';

/**
 * Type assigned to names carrying a Civil_Works token
 */
export const CIVIL_WORKS_TYPE = 'Civil Works';

/**
 * Relationship and task type written on every sequence edge
 */
export const EDGE_REL: SequenceEdge['Rel'] = 'FS';
export const EDGE_TASK_TYPE: SequenceEdge['TaskType'] = 'Construct';

/**
 * Audit log title
 */
export const AUDIT_TITLE = '# Sequence Audit Log';

/**
 * Decimal places for scores in the audit log
 */
export const AUDIT_SCORE_DIGITS = 3;

/**
 * Fold a type name for case-insensitive comparison
 */
export function foldType(type: string | null | undefined): string {
  return (type ?? '').trim().toLowerCase();
}

/**
 * Normalise a CWA code; missing codes become ''
 */
export function foldCwa(cwa: string | null | undefined): string {
  return (cwa ?? '').trim();
}

