/**
 * Configuration from the environment.
 *
 * Under `HOSTFETCH_SANDBOX=docker` the tool variables name executables
 * inside `HOSTFETCH_DOCKER_IMAGE`, which has no default: the image must
 * carry curl, jq, megadl and the archive tools.
 */

import { z } from "zod";
import { DEFAULT_STORE_DIR } from "./types";
import type { LogLevel } from "./logger";

const intFrom = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const ConfigSchema = z.object({
  HOSTFETCH_STORE: z.string().min(1).default(DEFAULT_STORE_DIR),
  HOSTFETCH_SANDBOX: z.enum(["none", "docker"]).default("none"),
  HOSTFETCH_DOCKER_IMAGE: z.string().min(1).optional(),
  HOSTFETCH_RETRIES: intFrom(0),
  HOSTFETCH_BACKOFF_MS: intFrom(1000),
  HOSTFETCH_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  HOSTFETCH_CURL: z.string().min(1).default("curl"),
  HOSTFETCH_JQ: z.string().min(1).default("jq"),
  HOSTFETCH_MEGADL: z.string().min(1).default("megadl"),
  HOSTFETCH_TAR: z.string().min(1).default("tar"),
  HOSTFETCH_UNZIP: z.string().min(1).default("unzip"),
  HOSTFETCH_UNAR: z.string().min(1).default("unar"),
}).superRefine((c, ctx) => {
  if (c.HOSTFETCH_SANDBOX === "docker" && c.HOSTFETCH_DOCKER_IMAGE === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["HOSTFETCH_DOCKER_IMAGE"],
      message: "required when HOSTFETCH_SANDBOX is docker",
    });
  }
});

export interface Config {
  storeDir: string;
  sandbox: "none" | "docker";
  /** Set whenever `sandbox` is docker */
  dockerImage?: string;
  retries: number;
  backoffMs: number;
  logLevel: LogLevel;
  tools: {
    curl: string;
    jq: string;
    megadl: string;
    tar: string;
    unzip: string;
    unar: string;
  };
}

/**
 * Read configuration from `env`. Empty variables count as unset.
 * Throws naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([k, v]) => k.startsWith("HOSTFETCH_") && v !== undefined && v !== "")
  );

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const c = parsed.data;
  return {
    storeDir: c.HOSTFETCH_STORE,
    sandbox: c.HOSTFETCH_SANDBOX,
    dockerImage: c.HOSTFETCH_DOCKER_IMAGE,
    retries: c.HOSTFETCH_RETRIES,
    backoffMs: c.HOSTFETCH_BACKOFF_MS,
    logLevel: c.HOSTFETCH_LOG_LEVEL,
    tools: {
      curl: c.HOSTFETCH_CURL,
      jq: c.HOSTFETCH_JQ,
      megadl: c.HOSTFETCH_MEGADL,
      tar: c.HOSTFETCH_TAR,
      unzip: c.HOSTFETCH_UNZIP,
      unar: c.HOSTFETCH_UNAR,
    },
  };
}
