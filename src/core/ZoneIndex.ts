/**
 * @fileoverview Zone grouping of activities by construction work area
 * @module core/ZoneIndex
 *
 * Built once per run, read-only afterwards. Candidate lookup for activity A
 * and predecessor type T is group[A.cwa].byType[T] minus A itself.
 */

import type { Activity } from '../types';
import { foldCwa, foldType } from './Constants';

/**
 * Activity together with its position in the input
 */
export interface IndexedActivity {
  index: number;
  activity: Activity;
}

/**
 * Activities of one CWA
 */
export interface ZoneGroup {
  cwa: string;
  members: IndexedActivity[];
  /** Keyed by case-folded type */
  byType: Map<string, IndexedActivity[]>;
}

export class ZoneIndex {
    private readonly groups: ReadonlyMap<string, ZoneGroup>;

    private constructor(groups: Map<string, ZoneGroup>) {
        this.groups = groups;
    }

    /**
     * Group activities by CWA. Activities without a CWA are left out,
     * so every lookup for them comes back empty.
     */
    static build(activities: readonly Activity[]): ZoneIndex {
        const groups = new Map<string, ZoneGroup>();

        activities.forEach((activity, index) => {
            const cwa = foldCwa(activity.cwa);
            if (!cwa) return;

            let group = groups.get(cwa);
            if (!group) {
                group = { cwa, members: [], byType: new Map() };
                groups.set(cwa, group);
            }

            const entry: IndexedActivity = { index, activity };
            group.members.push(entry);

            const typeKey = foldType(activity.type);
            const bucket = group.byType.get(typeKey);
            if (bucket) {
                bucket.push(entry);
            } else {
                group.byType.set(typeKey, [entry]);
            }
        });

        return new ZoneIndex(groups);
    }

    /**
     * Same-CWA activities of the given type, excluding the target
     *
     * @param target - Activity being resolved, with its input index
     * @param predecessorType - Type to look up (case-insensitive)
     */
    candidates(target: IndexedActivity, predecessorType: string): IndexedActivity[] {
        const group = this.groups.get(foldCwa(target.activity.cwa));
        if (!group) return [];
        const bucket = group.byType.get(foldType(predecessorType)) ?? [];
        return bucket.filter(entry => entry.index !== target.index);
    }

    getGroup(cwa: string): ZoneGroup | undefined {
        return this.groups.get(foldCwa(cwa));
    }

    getCwas(): string[] {
        return [...this.groups.keys()];
    }

    get size(): number {
        return this.groups.size;
    }
}
