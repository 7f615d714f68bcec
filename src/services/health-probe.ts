import { ContainerHandle, ProbeResult } from "../types/index.js";
import { ServiceUnavailableError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { Clock, Sleep, sleep as defaultSleep, systemClock } from "../utils/timing.js";
import { RuntimeContainer, isNotFound } from "./container-runtime.js";
import { GenerationClient } from "./generation-client.js";

/** Container states from which the service may still come up. */
const LIVE_STATUSES = new Set(["running", "created"]);

export const PROBE_PROMPT = "test";

export type LogSink = (text: string) => void;

export interface HealthProbeOptions {
  sleep?: Sleep;
  clock?: Clock;
  /** Receives container output; defaults to stdout. */
  logSink?: LogSink;
  pollIntervalMs?: number;
}

/**
 * Smallest step past the previous window's end. The engine treats both window
 * bounds as inclusive; epoch seconds as doubles resolve to about 0.25 µs.
 */
export const LOG_WINDOW_GAP_SECONDS = 1e-6;

/**
 * Forwards container output in non-overlapping windows. The watermark only moves
 * after a successful read, so a failed read is retried over the same window.
 */
export class ContainerLogForwarder {
  private since: number;

  constructor(
    private readonly container: RuntimeContainer,
    private readonly sink: LogSink,
    private readonly clock: Clock = systemClock,
  ) {
    this.since = clock() / 1000;
  }

  get watermark(): number {
    return this.since;
  }

  async drain(): Promise<void> {
    const until = this.clock() / 1000;
    if (until <= this.since) return;

    const output = await this.container.logs(this.since, until);
    this.since = until + LOG_WINDOW_GAP_SECONDS;
    if (output !== "") this.sink(output);
  }
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export class HealthProbe {
  private readonly sleep: Sleep;
  private readonly clock: Clock;
  private readonly logSink: LogSink;
  private readonly pollIntervalMs: number;

  constructor(options: HealthProbeOptions = {}) {
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? systemClock;
    this.logSink = options.logSink ?? ((text) => process.stdout.write(text));
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
  }

  /**
   * Poll until the service answers a one-token generation, the container dies or
   * `timeoutSeconds` run out. Container status is checked first on every round so
   * a dead container fails fast instead of waiting out the budget.
   */
  async awaitReady(handle: ContainerHandle, client: GenerationClient, timeoutSeconds: number): Promise<ProbeResult> {
    if (!Number.isInteger(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new RangeError(`timeoutSeconds must be a positive integer, got ${timeoutSeconds}`);
    }

    const startedAt = this.clock();
    const deadline = startedAt + timeoutSeconds * 1000;
    const elapsed = () => (this.clock() - startedAt) / 1000;
    const forwarder = new ContainerLogForwarder(handle.container, this.logSink, this.clock);

    for (let attempt = 0; attempt < timeoutSeconds; attempt++) {
      const remainingMs = deadline - this.clock();
      if (remainingMs <= 0) break;

      let status: string;
      try {
        status = await handle.container.status();
      } catch (error) {
        if (isNotFound(error)) {
          return {
            status: "crashed",
            elapsedSeconds: elapsed(),
            reason: `Container ${handle.name} disappeared after ${elapsed()} seconds`,
          };
        }
        return { status: "failed", elapsedSeconds: elapsed(), error: toError(error) };
      }

      await this.forwardLogs(forwarder, handle.name);

      if (!LIVE_STATUSES.has(status)) {
        return {
          status: "crashed",
          elapsedSeconds: elapsed(),
          reason: `Service crashed after ${elapsed()} seconds (container status: ${status})`,
        };
      }

      const budget = AbortSignal.timeout(remainingMs);
      try {
        await client.generate(PROBE_PROMPT, { maxNewTokens: 1 }, budget);
        logger.info(`Service started after ${elapsed()} seconds`, { container: handle.name });
        return { status: "ready", elapsedSeconds: elapsed() };
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          logger.debug("Service not accepting connections yet", { container: handle.name, code: error.code });
          await this.sleep(this.pollIntervalMs);
          continue;
        }
        if (isAbort(error)) {
          if (budget.aborted || deadline - this.clock() <= 0) break;
          // client-side request timeout: keep polling until the budget is spent
          logger.debug("Probe request timed out", { container: handle.name });
          await this.sleep(this.pollIntervalMs);
          continue;
        }
        return { status: "failed", elapsedSeconds: elapsed(), error: toError(error) };
      }
    }

    return { status: "timed-out", elapsedSeconds: elapsed() };
  }

  private async forwardLogs(forwarder: ContainerLogForwarder, name: string): Promise<void> {
    try {
      await forwarder.drain();
    } catch (error) {
      logger.warn("Unable to read container logs", { container: name, error: errorMessage(error) });
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
