// platform/ssh.ts - SSH control channel (ssh2)

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { Client, type ConnectConfig } from "ssh2";
import { CancelledError, TimeoutError, ValidationError } from "@testyard/contracts";
import type { CommandResult, ControlChannel, ExecuteOptions } from "./types";

// =============================================================================
// Types
// =============================================================================

export interface SshTarget {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKeyPath?: string;
  /** ssh2 readyTimeout */
  connectTimeoutMs?: number;
}

export interface ConnectOptions {
  /** Aborting ends a connection that is not ready yet */
  signal?: AbortSignal;
}

/** Opens a control channel to a target. Swappable in tests. */
export type SshConnector = (target: SshTarget, options?: ConnectOptions) => Promise<ControlChannel>;

const DEFAULT_PRIVATE_KEYS = ["id_ed25519", "id_rsa", "id_ecdsa"];

// =============================================================================
// Key Discovery
// =============================================================================

function expandHome(path: string): string {
  return path.startsWith("~/") ? join(homedir(), path.slice(2)) : path;
}

function autoDetectPrivateKey(): string | undefined {
  const sshDir = join(homedir(), ".ssh");
  for (const keyName of DEFAULT_PRIVATE_KEYS) {
    const keyPath = join(sshDir, keyName);
    if (existsSync(keyPath)) return keyPath;
  }
  return undefined;
}

export function buildConnectConfig(target: SshTarget): ConnectConfig {
  const config: ConnectConfig = {
    host: target.host,
    port: target.port,
    username: target.username,
    readyTimeout: target.connectTimeoutMs ?? 20_000,
  };
  if (target.password !== undefined) {
    config.password = target.password;
    return config;
  }
  const keyPath = target.privateKeyPath ? expandHome(target.privateKeyPath) : autoDetectPrivateKey();
  if (!keyPath) {
    throw new ValidationError(
      `No credentials for ${target.username}@${target.host}: set password or private_key_path`,
      { code: "INVALID_CONFIG" }
    );
  }
  config.privateKey = readFileSync(keyPath);
  return config;
}

// =============================================================================
// Channel
// =============================================================================

class SshControlChannel implements ControlChannel {
  readonly target: string;

  constructor(private readonly client: Client, target: SshTarget) {
    this.target = `${target.username}@${target.host}:${target.port}`;
  }

  execute(command: string, options: ExecuteOptions = {}): Promise<CommandResult> {
    const remote = options.cwd ? `cd ${shellQuote(options.cwd)} && ${command}` : command;
    return new Promise((resolve, reject) => {
      if (options.signal?.aborted) {
        reject(new CancelledError(`Command cancelled on ${this.target}`));
        return;
      }
      this.client.exec(remote, { env: options.env }, (err, stream) => {
        if (err) {
          reject(err);
          return;
        }

        let stdout = "";
        let stderr = "";
        let exitCode = -1;
        let settled = false;
        const finish = (fn: () => void) => {
          if (settled) return;
          settled = true;
          clearTimeout(timer);
          options.signal?.removeEventListener("abort", onAbort);
          fn();
        };
        const onAbort = () => {
          stream.close();
          finish(() => reject(new CancelledError(`Command cancelled on ${this.target}`)));
        };
        const timer =
          options.timeoutMs !== undefined
            ? setTimeout(() => {
                stream.close();
                finish(() =>
                  reject(new TimeoutError(`Command timed out after ${options.timeoutMs}ms on ${this.target}`))
                );
              }, options.timeoutMs)
            : undefined;
        options.signal?.addEventListener("abort", onAbort, { once: true });

        stream.on("data", (chunk: Buffer) => {
          stdout += chunk.toString();
        });
        stream.stderr.on("data", (chunk: Buffer) => {
          stderr += chunk.toString();
        });
        stream.on("exit", (code: number | null) => {
          exitCode = code ?? -1;
        });
        stream.on("close", () => finish(() => resolve({ stdout, stderr, exitCode })));
        stream.on("error", (streamErr: Error) => finish(() => reject(streamErr)));
      });
    });
  }

  async close(): Promise<void> {
    this.client.end();
  }
}

/** Default connector: one ssh2 client per environment. */
export const connectSsh: SshConnector = (target, options = {}) =>
  new Promise((resolve, reject) => {
    const { signal } = options;
    const cancelled = () => new CancelledError(`Connection to ${target.host} cancelled`);
    if (signal?.aborted) {
      reject(cancelled());
      return;
    }

    let config: ConnectConfig;
    try {
      config = buildConnectConfig(target);
    } catch (err) {
      reject(err);
      return;
    }

    const client = new Client();
    const onAbort = () => {
      client.end();
      reject(cancelled());
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    client.on("ready", () => {
      signal?.removeEventListener("abort", onAbort);
      console.log(`[ssh] Connected to ${target.username}@${target.host}:${target.port}`);
      resolve(new SshControlChannel(client, target));
    });
    client.on("error", (err) => {
      signal?.removeEventListener("abort", onAbort);
      console.error(`[ssh] Connection error for ${target.host}:`, err.message);
      reject(err);
    });
    client.connect(config);
  });

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
