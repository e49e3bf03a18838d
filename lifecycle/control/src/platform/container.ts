// platform/container.ts - Container platform over the docker CLI
// Local provider for development and self-tests of the scheduler.

import { spawn } from "child_process";
import { TimeoutError } from "@testyard/contracts";
import type { CapabilityDeclaration } from "../capability/schema";
import { capabilityFromIntrospection, capabilityFromTemplate, type Capability } from "../capability/model";
import {
  AuthError,
  InvalidSpecError,
  PlatformOperationError,
  RateLimitError,
  mapPlatformOperationError,
  withPlatformErrorMapping,
} from "./errors";
import type {
  CommandResult,
  ControlChannel,
  ExecuteOptions,
  PlatformAdapter,
  PlatformCallContext,
  PlatformHandle,
  Template,
} from "./types";

// =============================================================================
// Exec Injection Types
// =============================================================================

/**
 * Signature for the low-level command executor. Overridden in tests to avoid
 * spawning real processes.
 */
export type ExecFunction = (command: string[], options?: ExecFunctionOptions) => Promise<CommandResult>;

export interface ExecFunctionOptions {
  timeout?: number;
  signal?: AbortSignal;
  /** Written to the command's stdin */
  input?: string;
}

export interface RegistryConfig {
  url: string;
  username?: string;
  password?: string;
}

export interface ContainerTemplateConfig {
  name: string;
  image: string;
  cpus?: number;
  memoryMb?: number;
  privileged?: boolean;
  /** Mount the host filesystem read-only at /host */
  mountHostRoot?: boolean;
  /** host path -> container path */
  volumes?: Record<string, string>;
  environment?: Record<string, string>;
  workingDir?: string;
  network?: string;
  securityOpts?: string[];
  capAdd?: string[];
  capDrop?: string[];
  /** Pull even when the image is already present */
  pullAlways?: boolean;
  /** Images are pulled from `<url>/<image>`; credentials trigger a login first */
  registry?: RegistryConfig;
  capability: CapabilityDeclaration;
}

export interface ContainerPlatformConfig {
  templates: ContainerTemplateConfig[];
  /** docker binary; default "docker" */
  binary?: string;
  /** For tests only: inject a custom exec function. */
  _execFactory?: ExecFunction;
}

export const CONTAINER_PLATFORM = "container";

const CONTAINER_PREFIX = "testyard-";

// Upper bound for one CLI call; the lifecycle call timeout usually fires first
const DOCKER_CLI_TIMEOUT_MS = 600_000;

// =============================================================================
// Helpers
// =============================================================================

/** Real executor: child_process.spawn. Without a timeout the command may run indefinitely. */
export async function realExec(command: string[], options?: ExecFunctionOptions): Promise<CommandResult> {
  const timeout = options?.timeout;
  const [file, ...args] = command;
  if (!file) throw new Error("Empty command");

  return new Promise((resolve, reject) => {
    const proc = spawn(file, args, { stdio: ["pipe", "pipe", "pipe"], signal: options?.signal });
    proc.stdin.on("error", (err) => {
      console.warn(`[container] stdin of ${file} closed early: ${err.message}`);
    });
    if (options?.input !== undefined) {
      proc.stdin.end(options.input);
    } else {
      proc.stdin.end();
    }
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer =
      timeout !== undefined
        ? setTimeout(() => {
            timedOut = true;
            proc.kill();
          }, timeout)
        : undefined;

    proc.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      if (timedOut) {
        reject(new TimeoutError(`Command timed out after ${timeout}ms: ${command.join(" ")}`, { code: "TIMEOUT_ERROR" }));
        return;
      }
      resolve({ stdout, stderr, exitCode: code ?? -1 });
    });
  });
}

export function containerName(environmentId: string): string {
  return `${CONTAINER_PREFIX}${environmentId}`;
}

export function fullImageName(config: Pick<ContainerTemplateConfig, "image" | "registry">): string {
  return config.registry ? `${config.registry.url}/${config.image}` : config.image;
}

/** `docker run` arguments for a long-lived container built from the template. */
export function buildRunArgs(config: ContainerTemplateConfig, id: string, environmentId: string): string[] {
  const args = ["run", "-d", "--name", id, "--label", `testyard.environment=${environmentId}`];
  if (config.cpus !== undefined) args.push("--cpus", String(config.cpus));
  if (config.memoryMb !== undefined) args.push("--memory", `${config.memoryMb}m`);
  if (config.privileged) args.push("--privileged");
  if (config.mountHostRoot) args.push("-v", "/:/host:ro");
  for (const [hostPath, containerPath] of Object.entries(config.volumes ?? {})) {
    args.push("-v", `${hostPath}:${containerPath}`);
  }
  for (const [key, value] of Object.entries(config.environment ?? {})) {
    args.push("-e", `${key}=${value}`);
  }
  if (config.workingDir) args.push("-w", config.workingDir);
  if (config.network) args.push("--network", config.network);
  for (const opt of config.securityOpts ?? []) args.push("--security-opt", opt);
  for (const cap of config.capAdd ?? []) args.push("--cap-add", cap);
  for (const cap of config.capDrop ?? []) args.push("--cap-drop", cap);
  args.push(fullImageName(config), "sleep", "infinity");
  return args;
}

/** Classify docker CLI stderr into a platform error. */
export function mapDockerError(stderr: string, context: { template?: string; action: string }): PlatformOperationError {
  const text = stderr.trim();
  if (/unauthorized|authentication required|incorrect username or password/i.test(text)) {
    return new AuthError(CONTAINER_PLATFORM, `docker ${context.action} failed: ${text}`);
  }
  if (/toomanyrequests|rate limit/i.test(text)) {
    return new RateLimitError(CONTAINER_PLATFORM, 30_000);
  }
  if (/pull access denied|manifest unknown|invalid reference format|repository does not exist/i.test(text)) {
    return new InvalidSpecError(CONTAINER_PLATFORM, context.template ?? "unknown", text);
  }
  if (/no such container/i.test(text)) {
    return new PlatformOperationError(CONTAINER_PLATFORM, "NOT_FOUND", text);
  }
  if (/cannot connect to the docker daemon|connection refused/i.test(text)) {
    return new PlatformOperationError(CONTAINER_PLATFORM, "NETWORK_ERROR", text, { retryable: true });
  }
  return new PlatformOperationError(CONTAINER_PLATFORM, "PLATFORM_INTERNAL", `docker ${context.action} failed: ${text}`, {
    retryable: true,
  });
}

/** Failures of the CLI process itself, as opposed to a non-zero exit. */
export function mapExecFailure(error: unknown): PlatformOperationError {
  if (error instanceof TimeoutError) {
    return new PlatformOperationError(CONTAINER_PLATFORM, "TIMEOUT_ERROR", error.message, { retryable: true });
  }
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return new PlatformOperationError(CONTAINER_PLATFORM, "UNSUPPORTED_OPERATION", `container CLI unavailable: ${error.message}`);
  }
  return mapPlatformOperationError(CONTAINER_PLATFORM, error);
}

/** `docker inspect` HostConfig numbers: NanoCpus and Memory (bytes); 0 means unlimited. */
export function parseResourceLimits(stdout: string): { cores?: number; memoryMb?: number } {
  const [nanoCpus = "0", memory = "0"] = stdout.trim().split(/\s+/);
  const limits: { cores?: number; memoryMb?: number } = {};
  const cpus = Number(nanoCpus) / 1e9;
  const memoryMb = Number(memory) / (1024 * 1024);
  if (cpus > 0) limits.cores = cpus;
  if (memoryMb > 0) limits.memoryMb = Math.floor(memoryMb);
  return limits;
}

// =============================================================================
// Control Channel
// =============================================================================

class DockerExecChannel implements ControlChannel {
  constructor(
    private readonly exec: ExecFunction,
    private readonly binary: string,
    readonly target: string
  ) {}

  async execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const args = [this.binary, "exec"];
    for (const [key, value] of Object.entries(options.env ?? {})) {
      args.push("-e", `${key}=${value}`);
    }
    if (options.cwd) args.push("-w", options.cwd);
    args.push(this.target, "sh", "-c", command);
    return this.exec(args, { timeout: options.timeoutMs, signal: options.signal });
  }

  async close(): Promise<void> {
    // docker exec holds no session between commands
  }
}

// =============================================================================
// Platform
// =============================================================================

export class ContainerPlatform implements PlatformAdapter {
  readonly name = CONTAINER_PLATFORM;
  private readonly exec: ExecFunction;
  private readonly binary: string;
  private readonly configs: Map<string, ContainerTemplateConfig>;
  private readonly templates: Template[];

  constructor(config: ContainerPlatformConfig) {
    this.exec = config._execFactory ?? realExec;
    this.binary = config.binary ?? "docker";
    this.configs = new Map(config.templates.map((t) => [t.name, t]));
    this.templates = config.templates.map((t) => {
      const declared: CapabilityDeclaration = { platform: CONTAINER_PLATFORM, os: "linux" };
      if (t.cpus !== undefined) declared.cores = t.cpus;
      if (t.memoryMb !== undefined) declared.memoryMb = t.memoryMb;
      return {
        name: t.name,
        capability: capabilityFromTemplate({ ...declared, ...t.capability }),
        spec: { image: fullImageName(t) },
      };
    });
  }

  declareTemplates(): Template[] {
    return this.templates;
  }

  /** Make sure the image is present locally, logging in to its registry first when configured. */
  async prepare(template: Template, ctx: PlatformCallContext): Promise<PlatformHandle> {
    const config = this.configs.get(template.name);
    if (!config || !config.image) {
      throw new InvalidSpecError(this.name, template.name, "image is required");
    }
    const image = fullImageName(config);

    await this.login(config, ctx);
    const present = !config.pullAlways && (await this.docker(["image", "inspect", image], ctx)).exitCode === 0;
    if (!present) {
      console.log(`[container] Pulling ${image} for ${ctx.environmentId}`);
      const pull = await this.docker(["pull", image], ctx);
      if (pull.exitCode !== 0) {
        throw mapDockerError(pull.stderr, { template: template.name, action: "pull" });
      }
    }

    return {
      platform: this.name,
      id: containerName(ctx.environmentId),
      template: template.name,
      createdAt: Date.now(),
      metadata: { image },
    };
  }

  /** Start the container (or adopt the one a previous attempt started). */
  async deploy(handle: PlatformHandle, ctx: PlatformCallContext): Promise<Capability> {
    const config = this.configs.get(handle.template);
    if (!config) {
      throw new InvalidSpecError(this.name, handle.template, "unknown template");
    }

    const existing = await this.docker(["container", "inspect", handle.id], ctx);
    if (existing.exitCode !== 0) {
      const run = await this.docker(buildRunArgs(config, handle.id, ctx.environmentId), ctx);
      if (run.exitCode !== 0) {
        throw mapDockerError(run.stderr, { template: handle.template, action: "run" });
      }
    }

    const limits = await this.docker(
      ["container", "inspect", "--format", "{{.HostConfig.NanoCpus}} {{.HostConfig.Memory}}", handle.id],
      ctx
    );
    if (limits.exitCode !== 0) {
      throw mapDockerError(limits.stderr, { template: handle.template, action: "inspect" });
    }
    return capabilityFromIntrospection({
      platform: this.name,
      os: "linux",
      ...parseResourceLimits(limits.stdout),
    });
  }

  async connect(handle: PlatformHandle, ctx: PlatformCallContext): Promise<ControlChannel> {
    const probe = await this.docker(["exec", handle.id, "true"], ctx);
    if (probe.exitCode !== 0) {
      throw mapDockerError(probe.stderr, { template: handle.template, action: "exec" });
    }
    return new DockerExecChannel(this.exec, this.binary, handle.id);
  }

  /** Remove the container; an already-removed container counts as deleted. */
  async delete(handle: PlatformHandle, ctx: PlatformCallContext): Promise<void> {
    const result = await this.docker(["rm", "-f", handle.id], ctx);
    if (result.exitCode === 0) return;
    const error = mapDockerError(result.stderr, { template: handle.template, action: "rm" });
    if (error.code === "NOT_FOUND") return;
    throw error;
  }

  private async login(config: ContainerTemplateConfig, ctx: PlatformCallContext): Promise<void> {
    const registry = config.registry;
    if (!registry?.username || registry.password === undefined) return;

    console.log(`[container] Logging in to ${registry.url} as ${registry.username}`);
    const result = await this.docker(
      ["login", registry.url, "-u", registry.username, "--password-stdin"],
      ctx,
      registry.password
    );
    if (result.exitCode !== 0) {
      throw mapDockerError(result.stderr, { template: config.name, action: "login" });
    }
  }

  private docker(args: string[], ctx: PlatformCallContext, input?: string): Promise<CommandResult> {
    return withPlatformErrorMapping(
      this.name,
      () => this.exec([this.binary, ...args], { timeout: DOCKER_CLI_TIMEOUT_MS, signal: ctx.signal, input }),
      mapExecFailure
    );
  }
}
