import { performance } from "node:perf_hooks";
import { LoadOutcome, LoadResult } from "../types/index.js";
import { logger } from "../utils/logger.js";
import { GenerationClient } from "./generation-client.js";

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Fire `concurrency` identical generation requests at once and collect every
 * outcome in submission order. Failures are recorded per request, never retried
 * and never thrown.
 */
export async function generateLoad(
  client: GenerationClient,
  prompt: string,
  maxNewTokens: number,
  concurrency: number,
): Promise<LoadResult> {
  assertPositiveInteger("maxNewTokens", maxNewTokens);
  assertPositiveInteger("concurrency", concurrency);

  logger.debug("Generating load", { service: client.serviceName, concurrency, maxNewTokens });

  // every request is in flight before the first await
  const requests = Array.from({ length: concurrency }, async (_, index): Promise<LoadOutcome> => {
    const startedAt = performance.now();
    try {
      const response = await client.generate(prompt, { maxNewTokens, decoderInputDetails: true });
      return { ok: true, index, latencyMs: performance.now() - startedAt, response };
    } catch (error) {
      return {
        ok: false,
        index,
        latencyMs: performance.now() - startedAt,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  });

  // each request settles into its own outcome, so this never rejects
  const outcomes = await Promise.all(requests);

  const succeeded = outcomes.filter((outcome) => outcome.ok).length;
  const result: LoadResult = { outcomes, succeeded, failed: outcomes.length - succeeded };

  logger.info("Load round finished", {
    service: client.serviceName,
    requests: concurrency,
    succeeded: result.succeeded,
    failed: result.failed,
  });
  return result;
}

export class LoadHarness {
  constructor(private readonly defaults: { maxNewTokens: number; concurrency: number } = { maxNewTokens: 20, concurrency: 4 }) {}

  run(
    client: GenerationClient,
    prompt: string,
    maxNewTokens: number = this.defaults.maxNewTokens,
    concurrency: number = this.defaults.concurrency,
  ): Promise<LoadResult> {
    return generateLoad(client, prompt, maxNewTokens, concurrency);
  }
}

export interface LoadSummary {
  requests: number;
  succeeded: number;
  failed: number;
  latencyMs: { min: number; max: number; mean: number };
  errors: Array<{ index: number; name: string; message: string }>;
}

export function summarizeLoad(result: LoadResult): LoadSummary {
  const latencies = result.outcomes.map((outcome) => outcome.latencyMs);
  const total = latencies.reduce((sum, value) => sum + value, 0);

  return {
    requests: result.outcomes.length,
    succeeded: result.succeeded,
    failed: result.failed,
    latencyMs: {
      min: latencies.length > 0 ? Math.min(...latencies) : 0,
      max: latencies.length > 0 ? Math.max(...latencies) : 0,
      mean: latencies.length > 0 ? total / latencies.length : 0,
    },
    errors: result.outcomes.flatMap((outcome) =>
      outcome.ok ? [] : [{ index: outcome.index, name: outcome.error.name, message: outcome.error.message }],
    ),
  };
}
