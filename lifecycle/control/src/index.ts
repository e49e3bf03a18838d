// index.ts - Public surface of the lifecycle package

// Capability model & matching
export type {
  Capability,
  Requirement,
  DimensionValue,
  Constraint,
  HostFacts,
  SlackMeasure,
} from "./capability/model";
export {
  DIMENSIONS,
  UNCONSTRAINED,
  capabilityFromTemplate,
  capabilityFromIntrospection,
  requirementFrom,
  satisfies,
  unsatisfiedDimensions,
  dominates,
  slack,
  mergeRequirements,
  requirementKey,
  refineCapability,
  describeCapability,
} from "./capability/model";
export type { CapabilityDeclaration, RequirementDeclaration } from "./capability/schema";
export type { MatchCandidate, MatchResult, RankedCandidate, SlackMetric, SlackWeights } from "./capability/matcher";
export { DEFAULT_SLACK_WEIGHTS, matchRequirement, rankCandidates, weightedSlack } from "./capability/matcher";

// Platforms
export type {
  PlatformAdapter,
  PlatformCallContext,
  PlatformHandle,
  PlatformLifecycleHooks,
  Template,
  ControlChannel,
  CommandResult,
  ExecuteOptions,
} from "./platform/types";
export {
  PlatformOperationError,
  CapacityError,
  AuthError,
  RateLimitError,
  InvalidSpecError,
  mapPlatformOperationError,
  withPlatformErrorMapping,
} from "./platform/errors";
export type { PlatformOperationErrorCode, PlatformOperationErrorOptions } from "./platform/errors";
export { PlatformRegistry } from "./platform/registry";
export type { PlatformRegistration } from "./platform/registry";
export { ReadyPlatform, READY_PLATFORM } from "./platform/ready";
export type { ReadyTarget } from "./platform/ready";
export { ContainerPlatform, CONTAINER_PLATFORM } from "./platform/container";
export type { ContainerTemplateConfig, ExecFunction, ExecFunctionOptions, RegistryConfig } from "./platform/container";
export { connectSsh } from "./platform/ssh";
export type { SshConnector, SshTarget } from "./platform/ssh";
export { loadPlatformsConfig, parsePlatformsConfig, platformsFromConfig } from "./platform/config";
export type { PlatformsConfig } from "./platform/config";

// Environments
export { EnvironmentLifecycle } from "./environment/lifecycle";
export type { Environment, ProvisionResult } from "./environment/lifecycle";
export { ENVIRONMENT_TRANSITIONS, canTransition } from "./environment/state-transitions";

// Runner
export { Scheduler } from "./runner/scheduler";
export type { SchedulerOptions, RunOptions } from "./runner/scheduler";
export { SchedulerEvents } from "./runner/events";
export type { SchedulerEventMap } from "./runner/events";
export { TestRegistry, matchesCriteria, DEFAULT_PRIORITY } from "./runner/test-registry";
export type {
  TestCase,
  TestContext,
  TestSuiteDefinition,
  TestCaseDefinition,
  SelectionCriteria,
  TestSource,
} from "./runner/test-registry";
export { attachConsoleNotifier, formatOutcomeLine, formatRunSummary } from "./runner/report";
export type { RunReport, TestOutcome, EnvironmentReport, RunSummary } from "./runner/report";

// Configuration
export { resolveRunConfig, defaultRunConfig, RunConfigSchema } from "./config";
export type { RunConfig, RunConfigInput } from "./config";
