import { z } from "zod";
import type { LogLevel } from "../utils/logger.js";
import type { RuntimeContainer } from "../services/container-runtime.js";
import type { GenerationClient } from "../services/generation-client.js";

export const ServiceSpecSchema = z.object({
  serviceName: z
    .string()
    .min(1)
    .regex(/^[a-zA-Z0-9]+(?:[_.-][a-zA-Z0-9]+)*$/, "must be usable inside a container name"),
  modelReference: z.string().min(1),
  trustRemoteCode: z.boolean().default(false),
  extraEnv: z.record(z.string()).default({}),
});

export type ServiceSpecInput = z.input<typeof ServiceSpecSchema>;

export type ServiceSpec = Readonly<Omit<z.infer<typeof ServiceSpecSchema>, "extraEnv">> & {
  readonly extraEnv: Readonly<Record<string, string>>;
};

/** Validate and freeze a service description. */
export function defineService(input: ServiceSpecInput): ServiceSpec {
  const parsed = ServiceSpecSchema.parse(input);
  return Object.freeze({ ...parsed, extraEnv: Object.freeze({ ...parsed.extraEnv }) });
}

interface ImageRefBase {
  tag: string;
  /** Value handed to the server as `--model-id`. */
  containerModelId: string;
}

export interface BaseImageRef extends ImageRefBase {
  isDerived: false;
}

export interface DerivedImageRef extends ImageRefBase {
  isDerived: true;
  builtImageId: string;
}

export type ImageRef = BaseImageRef | DerivedImageRef;

export interface ContainerHandle {
  readonly name: string;
  readonly port: number;
  readonly container: RuntimeContainer;
}

export interface ServiceHandle {
  readonly serviceName: string;
  readonly container: ContainerHandle;
  readonly client: GenerationClient;
}

export type ProbeResult =
  | { status: "ready"; elapsedSeconds: number }
  | { status: "crashed"; elapsedSeconds: number; reason: string }
  | { status: "timed-out"; elapsedSeconds: number }
  | { status: "failed"; elapsedSeconds: number; error: Error };

export type TeardownStepResult = "ok" | "not-found" | "failed" | "skipped";

export interface TeardownReport {
  containerName: string;
  stop: TeardownStepResult;
  removeContainer: TeardownStepResult;
  removeImage: TeardownStepResult;
}

const TokenSchema = z
  .object({
    id: z.number().int(),
    text: z.string(),
    logprob: z.number().nullable().optional(),
    special: z.boolean().optional(),
  })
  .transform((token) => ({
    id: token.id,
    text: token.text,
    logprob: token.logprob ?? null,
    special: token.special ?? false,
  }));

export type GeneratedToken = z.output<typeof TokenSchema>;

export const GenerateResponseSchema = z
  .object({
    generated_text: z.string(),
    details: z
      .object({
        finish_reason: z.string(),
        generated_tokens: z.number().int().nonnegative(),
        seed: z.number().int().nullable().optional(),
        prefill: z.array(TokenSchema).default([]),
        tokens: z.array(TokenSchema).default([]),
      })
      .nullable()
      .optional(),
  })
  .transform((body) => ({
    generatedText: body.generated_text,
    details: body.details
      ? {
          finishReason: body.details.finish_reason,
          generatedTokens: body.details.generated_tokens,
          seed: body.details.seed ?? null,
          prefill: body.details.prefill,
          tokens: body.details.tokens,
        }
      : null,
  }));

export type GenerateResponse = z.output<typeof GenerateResponseSchema>;

export const ErrorBodySchema = z.object({
  error: z.string(),
  error_type: z.string().optional(),
});

export interface GenerateParameters {
  maxNewTokens?: number;
  decoderInputDetails?: boolean;
  doSample?: boolean;
  temperature?: number;
  topP?: number;
  seed?: number;
  stop?: string[];
}

export type LoadOutcome =
  | { ok: true; index: number; latencyMs: number; response: GenerateResponse }
  | { ok: false; index: number; latencyMs: number; error: Error };

export interface LoadResult {
  outcomes: LoadOutcome[];
  succeeded: number;
  failed: number;
}

export interface HarnessConfig {
  baseImage: string;
  dockerSocketPath: string;
  logLevel: LogLevel;
  /** `LOG_LEVEL` inside the container, not the harness level. */
  serviceLogLevel: string;
  cacheRepo: string;
  containerNamePrefix: string;
  containerPort: number;
  devices: string[];
  shmSizeBytes: number;
  healthCheckTimeoutSeconds: number;
  stopTimeoutSeconds: number;
  portRange: { min: number; max: number };
  requestTimeoutMs: number;
  hubToken?: string | undefined;
}
