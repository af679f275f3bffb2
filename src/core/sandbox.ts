/**
 * Execution contexts
 *
 * Implements:
 * - The contract the builder needs from a sandbox
 * - Direct execution on the host (no isolation, for development)
 * - Docker execution with network isolation
 */

import { spawn, type SpawnOptions } from "node:child_process";
import { existsSync } from "node:fs";
import { logger as rootLogger, type Logger } from "./logger";
import { EXIT_COMMAND_NOT_FOUND } from "./types";

// =============================================================================
// Contract
// =============================================================================

export interface Invocation {
  builder: string;
  args: string[];
  /** Must contain `out`, the path the procedure writes its result to */
  env: Record<string, string> & { out: string };
  /** Network egress permitted for this run */
  network: boolean;
  /** Scratch directory exclusive to this run */
  workDir: string;
  signal?: AbortSignal;
}

export interface InvocationResult {
  exitCode: number;
  stderr: string;
  /** `env.out` when the procedure produced it, otherwise null */
  producedPath: string | null;
}

/**
 * Runs one retrieval or extraction command. Resolves with the exit status
 * for any process that ran, and rejects only when the run was aborted.
 */
export interface ExecutionContext {
  readonly kind: string;
  run(invocation: Invocation): Promise<InvocationResult>;
}

// =============================================================================
// Direct Execution (no sandbox)
// =============================================================================

export class DirectContext implements ExecutionContext {
  readonly kind = "none";
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ sandbox: "none" });
  }

  async run(invocation: Invocation): Promise<InvocationResult> {
    if (!invocation.network) {
      this.log.debug("network cannot be restricted without a sandbox");
    }

    // Sanitized environment: only PATH leaks through from the host
    const env: Record<string, string> = {
      PATH: process.env.PATH ?? "/usr/local/bin:/usr/bin:/bin",
      HOME: "/homeless-shelter",
      ...invocation.env,
    };

    this.log.debug(`${invocation.builder} ${invocation.args.join(" ")}`);
    const { exitCode, stderr } = await runCommand(invocation.builder, invocation.args, {
      cwd: invocation.workDir,
      env,
      signal: invocation.signal,
    });

    return {
      exitCode,
      stderr,
      producedPath: existsSync(invocation.env.out) ? invocation.env.out : null,
    };
  }
}

// =============================================================================
// Docker Sandbox
// =============================================================================

export interface DockerContextConfig {
  image: string;
  /** Docker CLI binary */
  docker?: string;
}

export class DockerContext implements ExecutionContext {
  readonly kind = "docker";
  private readonly image: string;
  private readonly docker: string;
  private readonly log: Logger;

  constructor(config: DockerContextConfig, log: Logger = rootLogger) {
    this.image = config.image;
    this.docker = config.docker ?? "docker";
    this.log = log.child({ sandbox: "docker" });
  }

  dockerArgs(invocation: Invocation): string[] {
    const user =
      typeof process.getuid === "function" && typeof process.getgid === "function"
        ? ["--user", `${process.getuid()}:${process.getgid()}`]
        : [];

    return [
      "run",
      "--rm",
      // Network isolation unless the procedure needs egress
      ...(invocation.network ? [] : ["--network", "none"]),
      ...user,
      // Scratch directory at the same path, so $out means the same inside
      "-v", `${invocation.workDir}:${invocation.workDir}:rw`,
      "-e", "HOME=/homeless-shelter",
      ...Object.entries(invocation.env).flatMap(([k, v]) => ["-e", `${k}=${v}`]),
      "-w", invocation.workDir,
      this.image,
      invocation.builder,
      ...invocation.args,
    ];
  }

  async run(invocation: Invocation): Promise<InvocationResult> {
    const args = this.dockerArgs(invocation);
    this.log.debug(`${this.docker} ${args.join(" ")}`);

    const { exitCode, stderr } = await runCommand(this.docker, args, {
      signal: invocation.signal,
    });

    return {
      exitCode,
      stderr,
      producedPath: existsSync(invocation.env.out) ? invocation.env.out : null,
    };
  }
}

// =============================================================================
// Command Execution
// =============================================================================

interface RunOptions {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

function runCommand(
  command: string,
  args: string[],
  options: RunOptions = {}
): Promise<{ exitCode: number; stderr: string }> {
  return new Promise((resolve, reject) => {
    const spawnOpts: SpawnOptions = {
      cwd: options.cwd,
      env: options.env,
      signal: options.signal,
      stdio: ["ignore", "ignore", "pipe"],
    };

    const child = spawn(command, args, spawnOpts);

    let stderr = "";
    child.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    let settled = false;
    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      if (err.name === "AbortError") {
        reject(err);
      } else {
        resolve({ exitCode: EXIT_COMMAND_NOT_FOUND, stderr: `Failed to spawn ${command}: ${err.message}` });
      }
    });

    child.on("close", (code, signal) => {
      if (settled) return;
      settled = true;
      resolve({ exitCode: code ?? 128, stderr: signal ? `${stderr}killed by ${signal}` : stderr });
    });
  });
}
