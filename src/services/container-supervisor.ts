import {
  ContainerHandle,
  ImageRef,
  ServiceSpec,
  TeardownReport,
  TeardownStepResult,
} from "../types/index.js";
import { errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { ContainerRuntime, RuntimeContainer, isNotFound } from "./container-runtime.js";

/** Tuning variables forwarded from the host when, and only when, they are set there. */
export const FORWARDED_TUNING_VARIABLES = [
  "HF_BATCH_SIZE",
  "HF_SEQUENCE_LENGTH",
  "HF_AUTO_CAST_TYPE",
  "HF_NUM_CORES",
] as const;

/** The hub token is exported under both names the server understands. */
export const TOKEN_VARIABLES = ["HUGGING_FACE_HUB_TOKEN", "HF_TOKEN"] as const;

export interface EnvironmentSettings {
  serviceLogLevel: string;
  cacheRepo: string;
  hubToken?: string | undefined;
}

export interface ContainerSupervisorOptions extends EnvironmentSettings {
  containerNamePrefix: string;
  containerPort: number;
  shmSizeBytes: number;
  stopTimeoutSeconds: number;
}

export function containerName(prefix: string, serviceName: string, port: number): string {
  return `${prefix}-${serviceName}-${port}`;
}

export function serviceCommand(containerModelId: string, trustRemoteCode: boolean): string[] {
  const args = ["--model-id", containerModelId, "--env"];
  if (trustRemoteCode) args.push("--trust-remote-code");
  return args;
}

export function composeEnvironment(
  spec: ServiceSpec,
  settings: EnvironmentSettings,
  hostEnv: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {
    LOG_LEVEL: settings.serviceLogLevel,
    CUSTOM_CACHE_REPO: settings.cacheRepo,
  };

  if (settings.hubToken) {
    for (const name of TOKEN_VARIABLES) env[name] = settings.hubToken;
  }

  for (const name of FORWARDED_TUNING_VARIABLES) {
    const value = hostEnv[name];
    if (value !== undefined) env[name] = value;
  }

  return { ...env, ...spec.extraEnv };
}

export class ContainerSupervisor {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: ContainerSupervisorOptions,
    private readonly hostEnv: NodeJS.ProcessEnv = process.env,
  ) {}

  nameFor(spec: ServiceSpec, port: number): string {
    return containerName(this.options.containerNamePrefix, spec.serviceName, port);
  }

  async start(image: ImageRef, spec: ServiceSpec, port: number, devices: string[]): Promise<ContainerHandle> {
    const name = this.nameFor(spec, port);

    await this.clearStaleContainer(name);

    logger.info("Starting container", { name, image: image.tag, port, devices });
    const container = await this.runtime.run({
      image: image.tag,
      name,
      command: serviceCommand(image.containerModelId, spec.trustRemoteCode),
      env: composeEnvironment(spec, this.options, this.hostEnv),
      ports: [{ containerPort: this.options.containerPort, hostPort: port }],
      devices,
      shmSizeBytes: this.options.shmSizeBytes,
    });

    return { name, port, container };
  }

  /**
   * Best-effort teardown: stop → wait → remove container → remove derived image.
   * Every step runs whatever happened before it. Never throws.
   */
  async stopAndRemove(handle: ContainerHandle, image: ImageRef): Promise<TeardownReport> {
    const { name, container } = handle;
    const timeout = this.options.stopTimeoutSeconds;

    let stop: TeardownStepResult = "ok";
    try {
      await container.stop(timeout);
      await container.wait(timeout);
    } catch (error) {
      stop = isNotFound(error) ? "not-found" : "failed";
      logger.warn("Ignoring exception while stopping container", { name, error: errorMessage(error) });
    }

    logger.info("Removing container", { name });
    let removeContainer: TeardownStepResult = "ok";
    try {
      await container.remove(true);
    } catch (error) {
      if (isNotFound(error)) {
        removeContainer = "not-found";
        logger.debug("Container already removed", { name });
      } else {
        removeContainer = "failed";
        logger.error("Error while removing container, skipping", { name, error: errorMessage(error) });
      }
    }

    const removeImage = await this.discardImage(image);

    return { containerName: name, stop, removeContainer, removeImage };
  }

  /** Remove a derived image; base images are never touched. Never throws. */
  async discardImage(image: ImageRef): Promise<TeardownStepResult> {
    if (!image.isDerived) return "skipped";

    logger.info("Cleaning image", { imageId: image.builtImageId, tag: image.tag });
    try {
      await this.runtime.removeImage(image.builtImageId, true);
      return "ok";
    } catch (error) {
      if (isNotFound(error)) return "not-found";
      logger.error("Error while removing image, skipping", {
        imageId: image.builtImageId,
        error: errorMessage(error),
      });
      return "failed";
    }
  }

  /** A same-named container can only be left over from an aborted run. */
  private async clearStaleContainer(name: string): Promise<void> {
    let stale: RuntimeContainer | null;
    try {
      stale = await this.runtime.get(name);
    } catch (error) {
      logger.warn("Unable to look up stale container", { name, error: errorMessage(error) });
      return;
    }
    if (!stale) return;

    logger.warn("Found stale container from a previous run", { name });
    const timeout = this.options.stopTimeoutSeconds;
    try {
      await stale.stop(timeout);
      await stale.wait(timeout);
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn("Failed to stop stale container", { name, error: errorMessage(error) });
      }
    }
    try {
      await stale.remove(true);
    } catch (error) {
      if (!isNotFound(error)) {
        logger.warn("Failed to remove stale container", { name, error: errorMessage(error) });
      }
    }
  }
}
