// runner/partition.ts - Execution plan partitioning
//
// Tests with equal requirements are grouped, then groups whose conjunction is
// still satisfiable by some declared template are merged, so compatible tests
// share as few environments as possible. No partition exceeds the environment
// capacity.

import {
  mergeRequirements,
  requirementKey,
  satisfies,
  type Capability,
  type Requirement,
} from "../capability/model";

// =============================================================================
// Types
// =============================================================================

export interface PlannableTest {
  requirement: Requirement;
  priority: number;
  /** Submission sequence; the final tie-break */
  seq: number;
}

export interface Partition<T extends PlannableTest> {
  requirement: Requirement;
  tests: T[];
}

export interface PartitionOptions {
  /** Max tests one environment is assigned over its lifetime */
  capacity: number;
  /** Capabilities that could be provisioned; merges must stay satisfiable */
  templates: readonly Capability[];
}

// =============================================================================
// Ordering
// =============================================================================

export function compareTests(a: PlannableTest, b: PlannableTest): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.seq - b.seq;
}

// =============================================================================
// Partitioning
// =============================================================================

export function partitionTests<T extends PlannableTest>(
  tests: readonly T[],
  options: PartitionOptions
): Partition<T>[] {
  const sorted = [...tests].sort(compareTests);

  const groups = new Map<string, Partition<T>>();
  for (const test of sorted) {
    const key = requirementKey(test.requirement);
    const group = groups.get(key);
    if (group) {
      group.tests.push(test);
    } else {
      groups.set(key, { requirement: test.requirement, tests: [test] });
    }
  }

  const merged: Partition<T>[] = [];
  for (const group of groups.values()) {
    const target = merged.find((p) => canMerge(p, group, options));
    if (target) {
      const requirement = mergeRequirements(target.requirement, group.requirement);
      if (requirement) {
        target.requirement = requirement;
        target.tests = [...target.tests, ...group.tests].sort(compareTests);
        continue;
      }
    }
    merged.push({ requirement: group.requirement, tests: [...group.tests] });
  }

  return merged.flatMap((p) => chunk(p, options.capacity));
}

function canMerge<T extends PlannableTest>(
  into: Partition<T>,
  group: Partition<T>,
  options: PartitionOptions
): boolean {
  if (into.tests.length + group.tests.length > options.capacity) return false;
  const requirement = mergeRequirements(into.requirement, group.requirement);
  if (!requirement) return false;
  return options.templates.some((capability) => satisfies(capability, requirement));
}

function chunk<T extends PlannableTest>(partition: Partition<T>, capacity: number): Partition<T>[] {
  if (partition.tests.length <= capacity) return [partition];
  const chunks: Partition<T>[] = [];
  for (let i = 0; i < partition.tests.length; i += capacity) {
    chunks.push({ requirement: partition.requirement, tests: partition.tests.slice(i, i + capacity) });
  }
  return chunks;
}
