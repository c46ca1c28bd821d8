/**
 * @fileoverview Record Loader - turns cleaned records into activities
 * @module data/RecordLoader
 *
 * Accepts the flat records produced by the cleaning step
 * ("Element Name", "CWA", "MinOfMinX", "Position X", "Length", ...).
 * Numeric fields may arrive as strings such as "9.99999974737875E-06".
 *
 * Derivations:
 * - footprint: MinOfMin/MaxOfMax X,Y box, else Position X/Y ± Length/2, Width/2
 * - elevation: MinOfMinZ..MaxOfMaxZ, else Position Z..Position Z + Height
 * - cwa: CWA field, else parsed from the name
 * - type: non-empty Type field, else classified from the name
 */

import { z } from 'zod';
import type { Activity, Elevation, Footprint, Point3 } from '../types';
import { TypeClassifier } from '../core/TypeClassifier';

const numeric = z.preprocess((value) => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}, z.number().optional());

const text = z.preprocess((value) => {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return undefined;
}, z.string().optional());

export const cleanedRecordSchema = z.object({
  'Element Name': text,
  CWA: text,
  GUID: text,
  Type: text,
  MinOfMinX: numeric,
  MaxOfMaxX: numeric,
  MinOfMinY: numeric,
  MaxOfMaxY: numeric,
  MinOfMinZ: numeric,
  MaxOfMaxZ: numeric,
  'Position X': numeric,
  'Position Y': numeric,
  'Position Z': numeric,
  Length: numeric,
  Width: numeric,
  Height: numeric,
  'X Coordinate': numeric,
  'Y Coordinate': numeric,
  'Z Coordinate': numeric,
}).passthrough();

export type CleanedRecord = z.infer<typeof cleanedRecordSchema>;

/**
 * A record that did not become an activity
 */
export interface SkippedRecord {
  index: number;
  reason: 'invalid' | 'missing-name' | 'duplicate';
  detail: string;
}

export interface LoadResult {
  activities: Activity[];
  skipped: SkippedRecord[];
}

export class RecordLoader {

  /**
   * Load a list of cleaned records
   *
   * @param records - Parsed JSON; must be an array
   * @throws Error when records is not an array
   */
  static load(records: unknown): LoadResult {
    if (!Array.isArray(records)) {
      throw new Error('[RecordLoader] Expected an array of records');
    }

    const activities: Activity[] = [];
    const skipped: SkippedRecord[] = [];
    const seen = new Set<string>();

    records.forEach((raw: unknown, index) => {
      const parsed = cleanedRecordSchema.safeParse(raw);
      if (!parsed.success) {
        skipped.push({ index, reason: 'invalid', detail: 'record is not an object' });
        return;
      }

      const activity = RecordLoader.toActivity(parsed.data);
      if (!activity) {
        skipped.push({ index, reason: 'missing-name', detail: 'no Element Name' });
        return;
      }

      if (seen.has(activity.id)) {
        skipped.push({ index, reason: 'duplicate', detail: activity.id });
        return;
      }

      seen.add(activity.id);
      activities.push(activity);
    });

    if (skipped.length > 0) {
      console.warn(`[RecordLoader] Skipped ${skipped.length} of ${records.length} records`);
    }

    return { activities, skipped };
  }

  /**
   * Convert one validated record, null when it has no name
   */
  static toActivity(record: CleanedRecord): Activity | null {
    const name = record['Element Name'];
    if (!name) return null;

    const activity: Activity = {
      id: name,
      name,
      type: record.Type || TypeClassifier.classify(name),
      cwa: record.CWA || TypeClassifier.extractCwa(name) || '',
    };

    const position = RecordLoader.position(record);
    if (position) activity.position = position;

    const footprint = RecordLoader.footprint(record);
    if (footprint) activity.footprint = footprint;

    const elevation = RecordLoader.elevation(record);
    if (elevation) activity.elevation = elevation;

    if (record.GUID) activity.guid = record.GUID;

    return activity;
  }

  static footprint(record: CleanedRecord): Footprint | undefined {
    const { MinOfMinX: minX, MaxOfMaxX: maxX, MinOfMinY: minY, MaxOfMaxY: maxY } = record;
    if (minX !== undefined && maxX !== undefined && minY !== undefined && maxY !== undefined) {
      return { minX, maxX, minY, maxY };
    }

    const { 'Position X': px, 'Position Y': py, Length: length, Width: width } = record;
    if (px !== undefined && py !== undefined && length !== undefined && width !== undefined) {
      return {
        minX: px - length / 2,
        maxX: px + length / 2,
        minY: py - width / 2,
        maxY: py + width / 2,
      };
    }

    return undefined;
  }

  static elevation(record: CleanedRecord): Elevation | undefined {
    if (record.MinOfMinZ !== undefined && record.MaxOfMaxZ !== undefined) {
      return { minZ: record.MinOfMinZ, maxZ: record.MaxOfMaxZ };
    }
    const pz = record['Position Z'];
    if (pz !== undefined && record.Height !== undefined) {
      return { minZ: pz, maxZ: pz + record.Height };
    }
    return undefined;
  }

  static position(record: CleanedRecord): Point3 | undefined {
    const { 'Position X': px, 'Position Y': py, 'Position Z': pz } = record;
    if (px !== undefined && py !== undefined && pz !== undefined) {
      return { x: px, y: py, z: pz };
    }
    const { 'X Coordinate': x, 'Y Coordinate': y, 'Z Coordinate': z } = record;
    if (x !== undefined && y !== undefined && z !== undefined) {
      return { x, y, z };
    }
    return undefined;
  }
}
