import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { HarnessConfig } from "../types/index.js";
import { ConfigError } from "./errors.js";

const logLevelSchema = z.enum(["error", "warn", "info", "debug"]);

const listSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean),
  );

const envSchema = z
  .object({
    DOCKER_IMAGE: z.string().min(1).default("neuronx-tgi:latest"),
    DOCKER_SOCKET_PATH: z.string().min(1).default("/var/run/docker.sock"),
    LOG_LEVEL: logLevelSchema.default("info"),
    SERVICE_LOG_LEVEL: z.string().min(1).default("info,text_generation_router=debug"),
    CUSTOM_CACHE_REPO: z.string().min(1).default("optimum/neuron-testing-cache"),
    CONTAINER_NAME_PREFIX: z
      .string()
      .regex(/^[a-z0-9][a-z0-9_.-]*$/, "must be a lower-case container name fragment")
      .default("tgi-tests"),
    CONTAINER_PORT: z.coerce.number().int().min(1).max(65535).default(80),
    CONTAINER_DEVICES: listSchema.default("/dev/neuron0"),
    SHM_SIZE: z.string().default("1G"),
    HEALTH_CHECK_TIMEOUT_S: z.coerce.number().int().positive().default(60),
    STOP_TIMEOUT_S: z.coerce.number().int().positive().default(60),
    PORT_RANGE_MIN: z.coerce.number().int().min(1024).max(65535).default(8000),
    PORT_RANGE_MAX: z.coerce.number().int().min(1024).max(65535).default(10000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  })
  .refine((env) => env.PORT_RANGE_MIN <= env.PORT_RANGE_MAX, {
    message: "PORT_RANGE_MIN must not exceed PORT_RANGE_MAX",
    path: ["PORT_RANGE_MIN"],
  });

/** Parse a docker-style size ("512m", "1G", "1024k", "2gb") into bytes. */
export function parseByteSize(size: string): number {
  const match = size.trim().match(/^(\d+)(k|m|g)?b?$/i);
  if (!match) throw new ConfigError(`Invalid size format: ${size}`);

  const value = Number.parseInt(match[1] ?? "", 10);
  const unit = (match[2] ?? "").toLowerCase();

  switch (unit) {
    case "k":
      return value * 1024;
    case "m":
      return value * 1024 * 1024;
    case "g":
      return value * 1024 * 1024 * 1024;
    default:
      return value;
  }
}

/**
 * Hub token lookup: explicit variables first, then the token file written by `huggingface-cli login`.
 */
export function resolveHubToken(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const fromEnv = env.HF_TOKEN || env.HUGGING_FACE_HUB_TOKEN;
  if (fromEnv) return fromEnv;

  const hfHome = env.HF_HOME || join(env.XDG_CACHE_HOME || join(homedir(), ".cache"), "huggingface");
  const tokenPath = env.HF_TOKEN_PATH || join(hfHome, "token");
  try {
    const token = readFileSync(tokenPath, "utf-8").trim();
    return token || undefined;
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw new ConfigError(`Unable to read hub token from ${tokenPath}`, { cause: error });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarnessConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid harness configuration: ${issues.join("; ")}`);
  }
  const values = parsed.data;

  return {
    baseImage: values.DOCKER_IMAGE,
    dockerSocketPath: values.DOCKER_SOCKET_PATH,
    logLevel: values.LOG_LEVEL,
    serviceLogLevel: values.SERVICE_LOG_LEVEL,
    cacheRepo: values.CUSTOM_CACHE_REPO,
    containerNamePrefix: values.CONTAINER_NAME_PREFIX,
    containerPort: values.CONTAINER_PORT,
    devices: values.CONTAINER_DEVICES,
    shmSizeBytes: parseByteSize(values.SHM_SIZE),
    healthCheckTimeoutSeconds: values.HEALTH_CHECK_TIMEOUT_S,
    stopTimeoutSeconds: values.STOP_TIMEOUT_S,
    portRange: { min: values.PORT_RANGE_MIN, max: values.PORT_RANGE_MAX },
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    hubToken: resolveHubToken(env),
  };
}
