// platform/config.ts - Read ~/.testyard/platforms.toml platform configuration
//
// Each [ready.<name>] section is one existing machine; each [container.<name>]
// section is one container template. A nested [<kind>.<name>.capability]
// section adds declared capability dimensions.

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { Type, type Static } from "@sinclair/typebox";
import { ValidationError } from "@testyard/contracts";
import { assertDeclaration, CapabilityDeclarationSchema, type CapabilityDeclaration } from "../capability/schema";
import { ContainerPlatform, type ContainerTemplateConfig, type ExecFunction, type RegistryConfig } from "./container";
import { ReadyPlatform, type ReadyTarget } from "./ready";
import type { PlatformRegistration } from "./registry";
import type { SshConnector } from "./ssh";

// =============================================================================
// Section Schemas
// =============================================================================

const ReadySectionSchema = Type.Object(
  {
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 1, maximum: 65535, default: 22 }),
    username: Type.String({ minLength: 1 }),
    password: Type.Optional(Type.String()),
    private_key_path: Type.Optional(Type.String()),
    connect_timeout_ms: Type.Optional(Type.Integer({ minimum: 1 })),
    introspect: Type.Boolean({ default: false }),
  },
  { additionalProperties: false }
);

const NonEmptyList = Type.Array(Type.String({ minLength: 1 }));

const ContainerSectionSchema = Type.Object(
  {
    image: Type.String({ minLength: 1 }),
    cpus: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    memory_mb: Type.Optional(Type.Integer({ minimum: 1 })),
    privileged: Type.Optional(Type.Boolean()),
    mount_host_root: Type.Optional(Type.Boolean()),
    /** "host_path:container_path[:mode]" */
    volumes: Type.Optional(Type.Array(Type.String({ pattern: "^[^:]+:.+$" }))),
    /** "KEY=value" */
    environment: Type.Optional(Type.Array(Type.String({ pattern: "^[A-Za-z_][A-Za-z0-9_]*=" }))),
    working_dir: Type.Optional(Type.String({ minLength: 1 })),
    network: Type.Optional(Type.String({ minLength: 1 })),
    security_opts: Type.Optional(NonEmptyList),
    cap_add: Type.Optional(NonEmptyList),
    cap_drop: Type.Optional(NonEmptyList),
    pull_always: Type.Optional(Type.Boolean()),
    registry_url: Type.Optional(Type.String({ minLength: 1 })),
    registry_username: Type.Optional(Type.String({ minLength: 1 })),
    registry_password: Type.Optional(Type.String()),
  },
  { additionalProperties: false }
);

const ContainerSettingsSchema = Type.Object(
  { binary: Type.Optional(Type.String({ minLength: 1 })) },
  { additionalProperties: false }
);

type ReadySection = Static<typeof ReadySectionSchema>;
type ContainerSection = Static<typeof ContainerSectionSchema>;

export interface PlatformsConfig {
  ready: ReadyTarget[];
  container: ContainerTemplateConfig[];
  containerBinary?: string;
}

// =============================================================================
// Config File Path
// =============================================================================

export function getPlatformsConfigPath(): string {
  return process.env.TESTYARD_PLATFORMS_CONFIG ?? join(homedir(), ".testyard", "platforms.toml");
}

// =============================================================================
// Simple TOML Parser (subset: sections + key=value pairs)
// =============================================================================

/**
 * Parse a minimal TOML-like config. Supports:
 * - [section] and [dotted.section] headers
 * - key = value (strings, numbers, booleans)
 * - key = [array, of, values]
 * - # comments, including trailing ones
 */
export function parseSimpleToml(content: string): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  let section: Record<string, unknown> = {};
  result.__global__ = section;

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const sectionMatch = line.match(/^\[([a-zA-Z0-9_.-]+)\]$/);
    if (sectionMatch) {
      const name = sectionMatch[1] ?? "";
      section = result[name] ?? {};
      result[name] = section;
      continue;
    }

    const eqIdx = line.indexOf("=");
    if (eqIdx === -1) continue;
    section[line.slice(0, eqIdx).trim()] = parseTomlValue(line.slice(eqIdx + 1));
  }

  return result;
}

/** `#` inside a double-quoted string is not a comment delimiter. */
function stripInlineComment(value: string): string {
  let inQuote = false;
  for (let i = 0; i < value.length; i++) {
    if (value[i] === '"' && (i === 0 || value[i - 1] !== "\\")) inQuote = !inQuote;
    if (value[i] === "#" && !inQuote) return value.slice(0, i).trim();
  }
  return value.trim();
}

function parseTomlValue(raw: string): unknown {
  const value = stripInlineComment(raw);

  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }

  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    if (!inner) return [];
    return inner.split(",").map((item) => parseTomlValue(item));
  }

  if (value === "true") return true;
  if (value === "false") return false;

  const num = Number(value);
  if (!isNaN(num) && value !== "") return num;

  return value;
}

// =============================================================================
// Mapping
// =============================================================================

/** Parse and validate platforms.toml content. Throws ValidationError. */
export function parsePlatformsConfig(content: string): PlatformsConfig {
  const raw = parseSimpleToml(content);
  const config: PlatformsConfig = { ready: [], container: [] };

  for (const [sectionName, values] of Object.entries(raw)) {
    if (sectionName === "__global__") continue;
    const parts = sectionName.split(".");
    const [kind, name, sub] = parts;

    if (kind === "container" && parts.length === 1) {
      const settings = assertDeclaration(ContainerSettingsSchema, values, "[container]");
      config.containerBinary = settings.binary;
      continue;
    }
    if (!name || parts.length > 3 || (sub !== undefined && sub !== "capability")) {
      throw new ValidationError(`Unknown section [${sectionName}]`, { code: "INVALID_CONFIG" });
    }
    if (sub === "capability") continue;

    const capability = capabilitySection(raw, sectionName);
    switch (kind) {
      case "ready":
        config.ready.push(toReadyTarget(name, assertDeclaration(ReadySectionSchema, withDefaults(values, { port: 22, introspect: false }), `[${sectionName}]`), capability));
        break;
      case "container":
        config.container.push(toContainerTemplate(name, assertDeclaration(ContainerSectionSchema, values, `[${sectionName}]`), capability));
        break;
      default:
        throw new ValidationError(`Unknown platform kind '${kind}' in [${sectionName}]`, { code: "INVALID_CONFIG" });
    }
  }

  return config;
}

function capabilitySection(
  raw: Record<string, Record<string, unknown>>,
  sectionName: string
): CapabilityDeclaration {
  const values = raw[`${sectionName}.capability`];
  if (!values) return {};
  return assertDeclaration(CapabilityDeclarationSchema, values, `[${sectionName}.capability]`);
}

function withDefaults(values: Record<string, unknown>, defaults: Record<string, unknown>): Record<string, unknown> {
  return { ...defaults, ...values };
}

function toReadyTarget(name: string, section: ReadySection, capability: CapabilityDeclaration): ReadyTarget {
  return {
    name,
    host: section.host,
    port: section.port,
    username: section.username,
    password: section.password,
    privateKeyPath: section.private_key_path,
    connectTimeoutMs: section.connect_timeout_ms,
    introspect: section.introspect,
    capability,
  };
}

function toContainerTemplate(
  name: string,
  section: ContainerSection,
  capability: CapabilityDeclaration
): ContainerTemplateConfig {
  return {
    name,
    image: section.image,
    cpus: section.cpus,
    memoryMb: section.memory_mb,
    privileged: section.privileged,
    mountHostRoot: section.mount_host_root,
    volumes: section.volumes && splitPairs(section.volumes, ":"),
    environment: section.environment && splitPairs(section.environment, "="),
    workingDir: section.working_dir,
    network: section.network,
    securityOpts: section.security_opts,
    capAdd: section.cap_add,
    capDrop: section.cap_drop,
    pullAlways: section.pull_always,
    registry: toRegistry(name, section),
    capability,
  };
}

function toRegistry(name: string, section: ContainerSection): RegistryConfig | undefined {
  const { registry_url: url, registry_username: username, registry_password: password } = section;
  if ((username === undefined) !== (password === undefined)) {
    throw new ValidationError(`[container.${name}] registry_username and registry_password go together`, {
      code: "INVALID_CONFIG",
    });
  }
  if (url === undefined) {
    if (username !== undefined) {
      throw new ValidationError(`[container.${name}] registry credentials need registry_url`, { code: "INVALID_CONFIG" });
    }
    return undefined;
  }
  return { url, username, password };
}

/** "a:b:c" with separator ":" is a -> "b:c" */
function splitPairs(items: string[], separator: string): Record<string, string> {
  return Object.fromEntries(
    items.map((item) => {
      const at = item.indexOf(separator);
      return [item.slice(0, at), item.slice(at + 1)];
    })
  );
}

// =============================================================================
// Load Config
// =============================================================================

/**
 * Load platforms.toml. A missing file is an empty configuration; an invalid
 * one is an error.
 */
export function loadPlatformsConfig(path: string = getPlatformsConfigPath()): PlatformsConfig {
  if (!existsSync(path)) {
    console.log(`[config] No platforms config at ${path}`);
    return { ready: [], container: [] };
  }
  return parsePlatformsConfig(readFileSync(path, "utf-8"));
}

export interface PlatformFactoryOptions {
  _connectFactory?: SshConnector;
  _execFactory?: ExecFunction;
}

/** One registration per platform kind that has at least one section. */
export function platformsFromConfig(
  config: PlatformsConfig,
  options: PlatformFactoryOptions = {}
): PlatformRegistration[] {
  const registrations: PlatformRegistration[] = [];
  if (config.ready.length > 0) {
    registrations.push({
      adapter: new ReadyPlatform({ targets: config.ready, _connectFactory: options._connectFactory }),
    });
  }
  if (config.container.length > 0) {
    registrations.push({
      adapter: new ContainerPlatform({
        templates: config.container,
        binary: config.containerBinary,
        _execFactory: options._execFactory,
      }),
    });
  }
  return registrations;
}
