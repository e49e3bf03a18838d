// runner/test-registry.ts - Test cases, suites and selection criteria

import { Type } from "@sinclair/typebox";
import { ValidationError, type EnvironmentId, type PlatformName, type TestCaseId } from "@testyard/contracts";
import {
  mergeRequirements,
  requirementFrom,
  UNCONSTRAINED,
  type Capability,
  type Requirement,
} from "../capability/model";
import { assertDeclaration, type RequirementDeclaration } from "../capability/schema";
import type { ControlChannel } from "../platform/types";

// =============================================================================
// Types
// =============================================================================

export interface TestMetadata {
  suite: string;
  area?: string;
  category?: string;
  description?: string;
  /** 0 (most important) .. 3 */
  priority: number;
}

/** Everything a test body gets from the environment it was placed on. */
export interface TestContext {
  testId: TestCaseId;
  environmentId: EnvironmentId;
  platform: PlatformName;
  capability: Capability;
  channel: ControlChannel;
  /** Aborted on run cancellation, deadline or test timeout */
  signal: AbortSignal;
}

export type TestBody = (ctx: TestContext) => Promise<void>;

export interface TestCase {
  id: TestCaseId;
  name: string;
  requirement: Requirement;
  metadata: TestMetadata;
  /** Overrides the run's testTimeoutMs */
  timeoutMs?: number;
  run: TestBody;
}

export interface TestCaseDefinition {
  name: string;
  description?: string;
  priority?: number;
  requirement?: RequirementDeclaration;
  timeoutMs?: number;
  run: TestBody;
}

export interface TestSuiteDefinition {
  name: string;
  area?: string;
  category?: string;
  description?: string;
  /** Applied to every case, merged with the case's own requirement */
  requirement?: RequirementDeclaration;
  cases: TestCaseDefinition[];
}

export interface SelectionCriteria {
  /** Substring (case-insensitive) of the test id */
  name?: string;
  area?: string;
  category?: string;
  /** Keep tests with priority <= maxPriority */
  maxPriority?: number;
}

/** Anything that yields test cases in submission order. */
export type TestSource = Iterable<TestCase>;

export const DEFAULT_PRIORITY = 2;

const NamePattern = "^[A-Za-z0-9_][A-Za-z0-9_.-]*$";

const SuiteMetadataSchema = Type.Object({
  name: Type.String({ pattern: NamePattern }),
  area: Type.Optional(Type.String()),
  category: Type.Optional(Type.String()),
  description: Type.Optional(Type.String()),
});

const CaseMetadataSchema = Type.Object({
  name: Type.String({ pattern: NamePattern }),
  description: Type.Optional(Type.String()),
  priority: Type.Optional(Type.Integer({ minimum: 0, maximum: 3 })),
  timeoutMs: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
});

// =============================================================================
// Selection
// =============================================================================

export function matchesCriteria(testCase: TestCase, criteria: SelectionCriteria): boolean {
  const { metadata } = testCase;
  if (criteria.name && !testCase.id.toLowerCase().includes(criteria.name.toLowerCase())) return false;
  if (criteria.area && metadata.area !== criteria.area) return false;
  if (criteria.category && metadata.category !== criteria.category) return false;
  if (criteria.maxPriority !== undefined && metadata.priority > criteria.maxPriority) return false;
  return true;
}

// =============================================================================
// Registry
// =============================================================================

export class TestRegistry implements Iterable<TestCase> {
  private readonly cases = new Map<TestCaseId, TestCase>();

  /** Register every case of a suite. Ids are `<suite>.<case>`. */
  registerSuite(suite: TestSuiteDefinition): TestCase[] {
    assertDeclaration(
      SuiteMetadataSchema,
      { name: suite.name, area: suite.area, category: suite.category, description: suite.description },
      `suite '${suite.name}'`
    );
    const suiteRequirement = suite.requirement ? requirementFrom(suite.requirement) : UNCONSTRAINED;

    const registered: TestCase[] = [];
    for (const definition of suite.cases) {
      assertDeclaration(
        CaseMetadataSchema,
        {
          name: definition.name,
          description: definition.description,
          priority: definition.priority,
          timeoutMs: definition.timeoutMs,
        },
        `test case '${suite.name}.${definition.name}'`
      );

      const caseRequirement = definition.requirement ? requirementFrom(definition.requirement) : UNCONSTRAINED;
      const requirement = mergeRequirements(suiteRequirement, caseRequirement);
      if (!requirement) {
        throw new ValidationError(
          `Test case '${suite.name}.${definition.name}' requirement contradicts its suite requirement`
        );
      }

      registered.push(
        this.register({
          id: `${suite.name}.${definition.name}`,
          name: definition.name,
          requirement,
          metadata: {
            suite: suite.name,
            area: suite.area,
            category: suite.category,
            description: definition.description ?? suite.description,
            priority: definition.priority ?? DEFAULT_PRIORITY,
          },
          timeoutMs: definition.timeoutMs,
          run: definition.run,
        })
      );
    }
    return registered;
  }

  register(testCase: TestCase): TestCase {
    if (this.cases.has(testCase.id)) {
      throw new ValidationError(`Test case '${testCase.id}' is already registered`, {
        code: "DUPLICATE_TEST_CASE",
      });
    }
    this.cases.set(testCase.id, testCase);
    return testCase;
  }

  get(id: TestCaseId): TestCase | undefined {
    return this.cases.get(id);
  }

  get size(): number {
    return this.cases.size;
  }

  /** Registered cases matching the criteria, in registration order. */
  select(criteria: SelectionCriteria = {}): TestCase[] {
    return [...this.cases.values()].filter((tc) => matchesCriteria(tc, criteria));
  }

  [Symbol.iterator](): Iterator<TestCase> {
    return this.cases.values();
  }
}
