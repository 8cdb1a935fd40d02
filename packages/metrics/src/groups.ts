// ---------------------------------------------------------------------------
// Group partitioning by sensitive attribute
// ---------------------------------------------------------------------------

import type { SensitiveValue } from '@fairness-check/types';

export interface Group {
  value: SensitiveValue;
  /** Row indices belonging to the group, ascending. */
  indices: number[];
}

/**
 * Partition row indices by sensitive value.
 *
 * Groups are formed by exact equality (SameValueZero), so `1` and `"1"` are
 * different groups and no numeric tolerance is applied. Groups are returned
 * in order of first appearance.
 */
export function groupBy(sensitive: readonly SensitiveValue[]): Group[] {
  const groups = new Map<SensitiveValue, Group>();
  sensitive.forEach((value, i) => {
    let group = groups.get(value);
    if (!group) {
      group = { value, indices: [] };
      groups.set(value, group);
    }
    group.indices.push(i);
  });
  return [...groups.values()];
}

export function assertSameLength(name: string, ...arrays: ReadonlyArray<readonly unknown[]>): void {
  const n = arrays[0]?.length ?? 0;
  for (const arr of arrays) {
    if (arr.length !== n) {
      throw new RangeError(
        `${name}: inputs must have equal length (got ${arrays.map((a) => a.length).join(', ')})`,
      );
    }
  }
}
