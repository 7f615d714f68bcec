#!/usr/bin/env node
import { parseArgs } from "node:util";
import { z } from "zod";
import { summarizeLoad, generateLoad } from "./services/load-harness.js";
import { ServiceLauncher, createHarnessContext } from "./services/service-launcher.js";
import { errorMessage } from "./utils/errors.js";
import { logger } from "./utils/logger.js";

const DEFAULT_PROMPT = "It was a bright cold day in April, and the clocks were striking thirteen.";

const USAGE = `Usage: inference-harness --service <name> --model <id-or-path> [options]

Options:
  --trust-remote-code        pass --trust-remote-code to the server
  --prompt <text>            prompt for the load round
  --max-new-tokens <n>       tokens per request (default 20)
  --concurrency <n>          simultaneous requests (default 4)
  --timeout <seconds>        health-check budget (default HEALTH_CHECK_TIMEOUT_S)
  --device <path>            device to bind, repeatable (default CONTAINER_DEVICES)
  --env <KEY=VALUE>          extra container variable, repeatable
  --host <host>              host the service port is published on (default localhost)
  -h, --help                 show this message`;

const CliOptionsSchema = z.object({
  service: z.string().min(1, "--service is required"),
  model: z.string().min(1, "--model is required"),
  trustRemoteCode: z.boolean(),
  prompt: z.string().min(1),
  maxNewTokens: z.coerce.number().int().positive(),
  concurrency: z.coerce.number().int().positive(),
  timeout: z.coerce.number().int().positive().optional(),
  devices: z.array(z.string().min(1)).optional(),
  env: z.array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*=/, "--env expects KEY=VALUE")),
  host: z.string().min(1),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseCliArgs(argv: string[]): CliOptions | "help" {
  const { values } = parseArgs({
    args: argv,
    options: {
      service: { type: "string" },
      model: { type: "string" },
      "trust-remote-code": { type: "boolean", default: false },
      prompt: { type: "string", default: DEFAULT_PROMPT },
      "max-new-tokens": { type: "string", default: "20" },
      concurrency: { type: "string", default: "4" },
      timeout: { type: "string" },
      device: { type: "string", multiple: true },
      env: { type: "string", multiple: true },
      host: { type: "string", default: "localhost" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) return "help";

  return CliOptionsSchema.parse({
    service: values.service ?? "",
    model: values.model ?? "",
    trustRemoteCode: values["trust-remote-code"] ?? false,
    prompt: values.prompt,
    maxNewTokens: values["max-new-tokens"],
    concurrency: values.concurrency,
    timeout: values.timeout,
    devices: values.device,
    env: values.env ?? [],
    host: values.host,
  });
}

function toEnvRecord(pairs: string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const pair of pairs) {
    const separator = pair.indexOf("=");
    env[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return env;
}

async function main(): Promise<number> {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (parsed === "help") {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const launcher = new ServiceLauncher(createHarnessContext({ serviceHost: parsed.host }));

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, releasing services...`);
    try {
      await launcher.releaseAll();
    } finally {
      process.exit(130);
    }
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  const summary = await launcher.withService(
    {
      serviceName: parsed.service,
      modelReference: parsed.model,
      trustRemoteCode: parsed.trustRemoteCode,
      extraEnv: toEnvRecord(parsed.env),
    },
    async (handle) => summarizeLoad(await generateLoad(handle.client, parsed.prompt, parsed.maxNewTokens, parsed.concurrency)),
    { timeoutSeconds: parsed.timeout, devices: parsed.devices },
  );

  process.stdout.write(`${JSON.stringify(summary, null, 2)}\n`);
  return summary.failed === 0 ? 0 : 1;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      if (error instanceof z.ZodError) {
        process.stderr.write(`${error.issues.map((issue) => issue.message).join("\n")}\n\n${USAGE}\n`);
      } else {
        logger.error("Harness run failed", { error: errorMessage(error) });
      }
      process.exit(1);
    },
  );
}
