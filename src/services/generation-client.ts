import {
  ErrorBodySchema,
  GenerateParameters,
  GenerateResponse,
  GenerateResponseSchema,
} from "../types/index.js";
import { GenerationRequestError, ServiceUnavailableError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

/** Socket-level failures that only mean "nobody is listening (yet)". */
const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ECONNABORTED",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CLOSED",
]);

export interface GenerationClientOptions {
  /** Upper bound for a single request, including reading the body. */
  requestTimeoutMs?: number;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("code" in error && typeof error.code === "string") return error.code;
  // dual-stack connects report an AggregateError of per-address failures
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      const code = errorCode(inner);
      if (code) return code;
    }
  }
  return undefined;
}

/**
 * The code of the socket failure behind a fetch error, if it is one of the
 * "server not listening / went away" kind.
 */
export function transientCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current !== undefined; depth++) {
    const code = errorCode(current);
    if (code && TRANSIENT_CODES.has(code)) return code;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

export class GenerationClient {
  readonly baseUrl: string;

  constructor(
    readonly serviceName: string,
    baseUrl: string,
    private readonly options: GenerationClientOptions = {},
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async generate(prompt: string, parameters: GenerateParameters = {}, signal?: AbortSignal): Promise<GenerateResponse> {
    const url = `${this.baseUrl}/generate`;
    const body = {
      inputs: prompt,
      parameters: {
        max_new_tokens: parameters.maxNewTokens ?? 20,
        decoder_input_details: parameters.decoderInputDetails ?? false,
        do_sample: parameters.doSample,
        temperature: parameters.temperature,
        top_p: parameters.topP,
        seed: parameters.seed,
        stop: parameters.stop,
      },
    };

    const signals: AbortSignal[] = [];
    if (signal) signals.push(signal);
    if (this.options.requestTimeoutMs !== undefined) signals.push(AbortSignal.timeout(this.options.requestTimeoutMs));
    const combined = signals.length > 0 ? AbortSignal.any(signals) : undefined;

    let status: number;
    let text: string;
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(body),
        signal: combined,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      if (isAbort(error)) throw error;

      const code = transientCode(error);
      if (code) throw new ServiceUnavailableError(url, code, { cause: error });
      throw error;
    }

    const payload = parseJson(text);

    if (status < 200 || status >= 300) {
      const errorBody = ErrorBodySchema.safeParse(payload);
      const message = errorBody.success ? errorBody.data.error : text.slice(0, 200) || `HTTP ${status}`;
      logger.debug("Generation request rejected", { service: this.serviceName, status, message });
      throw new GenerationRequestError(status, message, errorBody.success ? errorBody.data.error_type : undefined);
    }

    const parsed = GenerateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GenerationRequestError(status, `Unexpected generation response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    logger.debug("Response body is not JSON", { error: errorMessage(error) });
    return undefined;
  }
}
