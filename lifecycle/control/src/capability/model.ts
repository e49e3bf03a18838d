// capability/model.ts - Capability/Requirement model and the satisfies partial order
//
// A Capability describes one real or provisionable environment; a Requirement
// constrains it. Both are keyed by dimension name. Dimensions missing on either
// side are unconstrained, so new dimensions can be introduced without breaking
// existing templates or tests.

import { ValidationError } from "@testyard/contracts";
import {
  CapabilityDeclarationSchema,
  RequirementDeclarationSchema,
  assertDeclaration,
  type CapabilityDeclaration,
  type RequirementDeclaration,
} from "./schema";

// =============================================================================
// Dimension Types
// =============================================================================

export type DimensionKind = "range" | "set" | "flag" | "enum";

/** Ordered numeric interval. A concrete measurement is a point (min === max). */
export interface RangeValue {
  kind: "range";
  min: number;
  max: number;
}

export interface SetValue {
  kind: "set";
  members: readonly string[];
}

export interface FlagValue {
  kind: "flag";
  value: boolean;
}

export interface EnumValue {
  kind: "enum";
  value: string;
}

export type DimensionValue = RangeValue | SetValue | FlagValue | EnumValue;

export interface RangeConstraint {
  kind: "range";
  min?: number;
  max?: number;
}

export interface SetConstraint {
  kind: "set";
  required: readonly string[];
}

export interface FlagConstraint {
  kind: "flag";
  required: boolean;
}

export interface EnumConstraint {
  kind: "enum";
  allowed: readonly string[];
}

export type Constraint = RangeConstraint | SetConstraint | FlagConstraint | EnumConstraint;

export interface Capability {
  readonly [dimension: string]: DimensionValue | undefined;
}

export interface Requirement {
  readonly [dimension: string]: Constraint | undefined;
}

/** Well-known dimension names. Platforms may declare others. */
export const DIMENSIONS = {
  CORES: "cores",
  MEMORY_MB: "memoryMb",
  DISK_GB: "diskGb",
  NICS: "nics",
  FEATURES: "features",
  DISK_TYPES: "diskTypes",
  OS: "os",
  ARCH: "arch",
  PLATFORM: "platform",
  GPU: "gpu",
  NESTED_VIRTUALIZATION: "nestedVirtualization",
} as const;

// =============================================================================
// Construction
// =============================================================================

/** Build a Capability from a platform-declared template. */
export function capabilityFromTemplate(declaration: CapabilityDeclaration): Capability {
  assertDeclaration(CapabilityDeclarationSchema, declaration, "capability declaration");

  const capability: Record<string, DimensionValue> = {};
  for (const [name, value] of Object.entries(declaration)) {
    if (typeof value === "number") {
      capability[name] = { kind: "range", min: value, max: value };
    } else if (typeof value === "boolean") {
      capability[name] = { kind: "flag", value };
    } else if (typeof value === "string") {
      capability[name] = { kind: "enum", value };
    } else if (Array.isArray(value)) {
      capability[name] = { kind: "set", members: uniqueSorted(value) };
    } else {
      if (value.min > value.max) {
        throw new ValidationError(`Invalid capability range for '${name}': ${value.min} > ${value.max}`);
      }
      capability[name] = { kind: "range", min: value.min, max: value.max };
    }
  }
  return capability;
}

/** Facts reported by a live target (e.g. from lscpu / docker inspect). */
export interface HostFacts {
  platform: string;
  cores?: number;
  memoryMb?: number;
  diskGb?: number;
  nics?: number;
  os?: string;
  arch?: string;
  features?: string[];
  flags?: Record<string, boolean>;
}

/** Build a concrete Capability from introspection of a live target. */
export function capabilityFromIntrospection(facts: HostFacts): Capability {
  const capability: Record<string, DimensionValue> = {
    [DIMENSIONS.PLATFORM]: { kind: "enum", value: facts.platform },
  };
  const point = (name: string, v: number | undefined) => {
    if (v !== undefined && Number.isFinite(v)) {
      capability[name] = { kind: "range", min: v, max: v };
    }
  };
  point(DIMENSIONS.CORES, facts.cores);
  point(DIMENSIONS.MEMORY_MB, facts.memoryMb);
  point(DIMENSIONS.DISK_GB, facts.diskGb);
  point(DIMENSIONS.NICS, facts.nics);
  if (facts.os) capability[DIMENSIONS.OS] = { kind: "enum", value: facts.os };
  if (facts.arch) capability[DIMENSIONS.ARCH] = { kind: "enum", value: facts.arch };
  if (facts.features) {
    capability[DIMENSIONS.FEATURES] = { kind: "set", members: uniqueSorted(facts.features) };
  }
  for (const [name, value] of Object.entries(facts.flags ?? {})) {
    capability[name] = { kind: "flag", value };
  }
  return capability;
}

/** Build a Requirement from a test's declared needs. */
export function requirementFrom(declaration: RequirementDeclaration): Requirement {
  assertDeclaration(RequirementDeclarationSchema, declaration, "requirement declaration");

  const requirement: Record<string, Constraint> = {};
  for (const [name, value] of Object.entries(declaration)) {
    if (typeof value === "number") {
      requirement[name] = { kind: "range", min: value };
    } else if (typeof value === "boolean") {
      requirement[name] = { kind: "flag", required: value };
    } else if (typeof value === "string") {
      requirement[name] = { kind: "enum", allowed: [value] };
    } else if (Array.isArray(value)) {
      requirement[name] = { kind: "set", required: uniqueSorted(value) };
    } else if ("oneOf" in value) {
      requirement[name] = { kind: "enum", allowed: uniqueSorted(value.oneOf) };
    } else {
      if (value.min !== undefined && value.max !== undefined && value.min > value.max) {
        throw new ValidationError(`Invalid requirement range for '${name}': ${value.min} > ${value.max}`);
      }
      const constraint: RangeConstraint = { kind: "range" };
      if (value.min !== undefined) constraint.min = value.min;
      if (value.max !== undefined) constraint.max = value.max;
      requirement[name] = constraint;
    }
  }
  return requirement;
}

/** The requirement every capability satisfies. */
export const UNCONSTRAINED: Requirement = Object.freeze({});

// =============================================================================
// Satisfies
// =============================================================================

/**
 * Partial-order test: every constrained dimension of the requirement is
 * subsumed by the capability.
 *
 * - range: the capability interval reaches into the requirement bounds, i.e.
 *   the environment can supply a value the requirement accepts
 * - set:   capability members are a superset of the required members
 * - flag:  required true demands true; false is always satisfied
 * - enum:  capability value is one of the allowed values
 *
 * A dimension declared with different kinds on the two sides cannot be
 * compared and counts as unsatisfied.
 */
export function satisfies(capability: Capability, requirement: Requirement): boolean {
  return unsatisfiedDimensions(capability, requirement).length === 0;
}

/** Names of requirement dimensions the capability fails, in requirement order. */
export function unsatisfiedDimensions(capability: Capability, requirement: Requirement): string[] {
  const failed: string[] = [];
  for (const [name, constraint] of Object.entries(requirement)) {
    if (!constraint) continue;
    const value = capability[name];
    if (!value) continue; // unknown to the capability: unconstrained
    if (!dimensionSatisfies(value, constraint)) failed.push(name);
  }
  return failed;
}

function dimensionSatisfies(value: DimensionValue, constraint: Constraint): boolean {
  switch (constraint.kind) {
    case "range": {
      if (value.kind !== "range") return false;
      const min = constraint.min ?? -Infinity;
      const max = constraint.max ?? Infinity;
      return Math.max(value.min, min) <= Math.min(value.max, max);
    }
    case "set": {
      if (value.kind !== "set") return false;
      return constraint.required.every((m) => value.members.includes(m));
    }
    case "flag": {
      if (value.kind !== "flag") return false;
      return !constraint.required || value.value;
    }
    case "enum": {
      if (value.kind !== "enum") return false;
      return constraint.allowed.includes(value.value);
    }
  }
}

// =============================================================================
// Dominance (component-wise "at least as capable")
// =============================================================================

/**
 * True when `a` is at least as capable as `b` in every dimension `a` declares.
 * A dimension `a` leaves undeclared is already unconstrained there.
 * Ranges compare by containment: a wider interval can supply every value the
 * narrower one can.
 */
export function dominates(a: Capability, b: Capability): boolean {
  for (const [name, av] of Object.entries(a)) {
    if (!av) continue;
    const bv = b[name];
    if (!bv || bv.kind !== av.kind) return false;
    if (!dimensionDominates(av, bv)) return false;
  }
  return true;
}

function dimensionDominates(a: DimensionValue, b: DimensionValue): boolean {
  switch (a.kind) {
    case "range":
      return b.kind === "range" && a.min <= b.min && a.max >= b.max;
    case "set":
      return b.kind === "set" && b.members.every((m) => a.members.includes(m));
    case "flag":
      return b.kind === "flag" && (a.value || !b.value);
    case "enum":
      return b.kind === "enum" && a.value === b.value;
  }
}

// =============================================================================
// Slack
// =============================================================================

export interface SlackMeasure {
  /** Sum over constrained range dimensions of (value supplied - required min) / max(required min, 1) */
  range: number;
  /** Capability set members beyond the required subset, over constrained set dimensions */
  extraMembers: number;
  /** Capability flags that are true without being required */
  extraFlags: number;
}

/**
 * Measure how much a satisfying capability over-provisions a requirement.
 * Only dimensions the requirement constrains are measured.
 */
export function slack(capability: Capability, requirement: Requirement): SlackMeasure {
  const measure: SlackMeasure = { range: 0, extraMembers: 0, extraFlags: 0 };
  for (const [name, constraint] of Object.entries(requirement)) {
    const value = capability[name];
    if (!constraint || !value) continue;
    if (constraint.kind === "range" && value.kind === "range") {
      const floor = constraint.min ?? value.min;
      // Smallest value the capability can supply within the bounds
      const supplied = Math.max(value.min, floor);
      measure.range += Math.max(0, supplied - floor) / Math.max(Math.abs(floor), 1);
    } else if (constraint.kind === "set" && value.kind === "set") {
      measure.extraMembers += value.members.filter((m) => !constraint.required.includes(m)).length;
    } else if (constraint.kind === "flag" && value.kind === "flag") {
      if (value.value && !constraint.required) measure.extraFlags += 1;
    }
  }
  return measure;
}

// =============================================================================
// Requirement Algebra
// =============================================================================

/**
 * Conjunction of two requirements: a capability satisfies the result iff it
 * satisfies both. Returns null when the conjunction is unsatisfiable.
 */
export function mergeRequirements(a: Requirement, b: Requirement): Requirement | null {
  const merged: Record<string, Constraint> = {};
  const names = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const name of names) {
    const ca = a[name];
    const cb = b[name];
    if (!ca || !cb) {
      const only = ca ?? cb;
      if (only) merged[name] = only;
      continue;
    }
    const combined = mergeConstraint(ca, cb);
    if (!combined) return null;
    merged[name] = combined;
  }
  return merged;
}

function mergeConstraint(a: Constraint, b: Constraint): Constraint | null {
  switch (a.kind) {
    case "range": {
      if (b.kind !== "range") return null;
      const result: RangeConstraint = { kind: "range" };
      const min = maxDefined(a.min, b.min);
      const max = minDefined(a.max, b.max);
      if (min !== undefined) result.min = min;
      if (max !== undefined) result.max = max;
      if (min !== undefined && max !== undefined && min > max) return null;
      return result;
    }
    case "set":
      if (b.kind !== "set") return null;
      return { kind: "set", required: uniqueSorted([...a.required, ...b.required]) };
    case "flag":
      if (b.kind !== "flag") return null;
      return { kind: "flag", required: a.required || b.required };
    case "enum": {
      if (b.kind !== "enum") return null;
      const allowed = a.allowed.filter((v) => b.allowed.includes(v));
      return allowed.length > 0 ? { kind: "enum", allowed } : null;
    }
  }
}

/** Stable canonical key: equal keys mean equivalent requirements. */
export function requirementKey(requirement: Requirement): string {
  const parts: string[] = [];
  for (const name of Object.keys(requirement).sort()) {
    const c = requirement[name];
    if (!c) continue;
    switch (c.kind) {
      case "range":
        parts.push(`${name}:range:${c.min ?? "-inf"}..${c.max ?? "inf"}`);
        break;
      case "set":
        parts.push(`${name}:set:${uniqueSorted(c.required).join(",")}`);
        break;
      case "flag":
        // A false flag is unconstrained; key it the same as an absent one
        if (c.required) parts.push(`${name}:flag`);
        break;
      case "enum":
        parts.push(`${name}:enum:${uniqueSorted(c.allowed).join("|")}`);
        break;
    }
  }
  return parts.join(";");
}

/**
 * Overlay a measured capability on the declared one. Measured dimensions
 * replace declared ones; dimensions the platform did not measure are kept.
 */
export function refineCapability(declared: Capability, measured: Capability): Capability {
  const refined: Record<string, DimensionValue> = {};
  for (const [name, value] of Object.entries(declared)) {
    if (value) refined[name] = value;
  }
  for (const [name, value] of Object.entries(measured)) {
    if (value) refined[name] = value;
  }
  return refined;
}

/** One-line rendering for logs and skip messages. */
export function describeCapability(capability: Capability): string {
  const parts: string[] = [];
  for (const [name, v] of Object.entries(capability)) {
    if (!v) continue;
    switch (v.kind) {
      case "range":
        parts.push(v.min === v.max ? `${name}=${v.min}` : `${name}=${v.min}..${v.max}`);
        break;
      case "set":
        parts.push(`${name}=[${v.members.join(",")}]`);
        break;
      case "flag":
        parts.push(`${name}=${v.value}`);
        break;
      case "enum":
        parts.push(`${name}=${v.value}`);
        break;
    }
  }
  return parts.join(" ");
}

// =============================================================================
// Helpers
// =============================================================================

function uniqueSorted(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

function maxDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.max(a, b);
}

function minDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}
