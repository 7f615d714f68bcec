import {
  ContainerHandle,
  HarnessConfig,
  ImageRef,
  ProbeResult,
  ServiceHandle,
  ServiceSpecInput,
  TeardownReport,
  defineService,
} from "../types/index.js";
import { loadConfig } from "../utils/config.js";
import { HealthCheckError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { ContainerRuntime, DockerodeRuntime } from "./container-runtime.js";
import { ContainerSupervisor } from "./container-supervisor.js";
import { GenerationClient } from "./generation-client.js";
import { HealthProbe, HealthProbeOptions } from "./health-probe.js";
import { ImageProvisioner } from "./image-provisioner.js";

/**
 * Everything a group of tests shares: one runtime client, one configuration.
 * Built once per suite and passed down; nothing here is global.
 */
export interface HarnessContext {
  readonly runtime: ContainerRuntime;
  readonly config: HarnessConfig;
  /** Host the published port is reached on. */
  readonly serviceHost: string;
  readonly hostEnv: NodeJS.ProcessEnv;
  readonly probe: HealthProbeOptions;
  /** Uniform in [0, 1), used for port selection. */
  readonly random: () => number;
}

export function createHarnessContext(overrides: Partial<HarnessContext> = {}): HarnessContext {
  const config = overrides.config ?? loadConfig();
  logger.setLevel(config.logLevel);

  return {
    runtime: overrides.runtime ?? new DockerodeRuntime({ socketPath: config.dockerSocketPath }),
    config,
    serviceHost: overrides.serviceHost ?? "localhost",
    hostEnv: overrides.hostEnv ?? process.env,
    probe: overrides.probe ?? {},
    random: overrides.random ?? Math.random,
  };
}

export interface LaunchOptions {
  timeoutSeconds?: number;
  devices?: string[];
  /** Fixed host port; a random one from the configured range otherwise. */
  port?: number;
}

/** A ready service and the one way to release it. */
export class LaunchedService {
  private releasing: Promise<TeardownReport> | undefined;

  constructor(
    readonly handle: ServiceHandle,
    private readonly image: ImageRef,
    private readonly supervisor: ContainerSupervisor,
    private readonly onRelease: (service: LaunchedService) => void,
  ) {}

  get released(): boolean {
    return this.releasing !== undefined;
  }

  /** Tear down exactly once; later calls get the first report. */
  release(): Promise<TeardownReport> {
    if (!this.releasing) {
      this.releasing = this.supervisor.stopAndRemove(this.handle.container, this.image).finally(() => this.onRelease(this));
    }
    return this.releasing;
  }
}

export function describeProbeFailure(serviceName: string, result: Exclude<ProbeResult, { status: "ready" }>): HealthCheckError {
  switch (result.status) {
    case "crashed":
      return new HealthCheckError(serviceName, "crashed", result.elapsedSeconds, result.reason);
    case "timed-out":
      return new HealthCheckError(
        serviceName,
        "timed-out",
        result.elapsedSeconds,
        `Service failed to start after ${result.elapsedSeconds} seconds.`,
      );
    case "failed":
      return new HealthCheckError(
        serviceName,
        "failed",
        result.elapsedSeconds,
        `Basic generation failed after ${result.elapsedSeconds} seconds with: ${result.error.message}`,
        { cause: result.error },
      );
  }
}

export class ServiceLauncher {
  private readonly provisioner: ImageProvisioner;
  private readonly supervisor: ContainerSupervisor;
  private readonly probe: HealthProbe;
  private readonly live = new Set<LaunchedService>();

  constructor(private readonly context: HarnessContext) {
    const { config, runtime } = context;
    this.provisioner = new ImageProvisioner(runtime, { baseImage: config.baseImage });
    this.supervisor = new ContainerSupervisor(
      runtime,
      {
        containerNamePrefix: config.containerNamePrefix,
        containerPort: config.containerPort,
        shmSizeBytes: config.shmSizeBytes,
        stopTimeoutSeconds: config.stopTimeoutSeconds,
        serviceLogLevel: config.serviceLogLevel,
        cacheRepo: config.cacheRepo,
        hubToken: config.hubToken,
      },
      context.hostEnv,
    );
    this.probe = new HealthProbe(context.probe);
  }

  get liveServices(): readonly LaunchedService[] {
    return Array.from(this.live);
  }

  randomPort(): number {
    const { min, max } = this.context.config.portRange;
    return min + Math.floor(this.context.random() * (max - min + 1));
  }

  /**
   * Provision, start and health-check a service. Whatever fails after the
   * container exists, the container (and a derived image) is torn down before
   * the error reaches the caller.
   */
  async launch(input: ServiceSpecInput, options: LaunchOptions = {}): Promise<LaunchedService> {
    const spec = defineService(input);
    const { config } = this.context;
    const port = options.port ?? this.randomPort();
    const name = this.supervisor.nameFor(spec, port);

    const image = await this.provisioner.provision(spec, name);

    let container: ContainerHandle;
    try {
      container = await this.supervisor.start(image, spec, port, options.devices ?? config.devices);
    } catch (error) {
      await this.supervisor.discardImage(image);
      throw error;
    }

    const client = new GenerationClient(spec.serviceName, `http://${this.context.serviceHost}:${port}`, {
      requestTimeoutMs: config.requestTimeoutMs,
    });
    const service = new LaunchedService({ serviceName: spec.serviceName, container, client }, image, this.supervisor, (released) =>
      this.live.delete(released),
    );
    this.live.add(service);

    let result: ProbeResult;
    try {
      result = await this.probe.awaitReady(container, client, options.timeoutSeconds ?? config.healthCheckTimeoutSeconds);
    } catch (error) {
      await service.release();
      throw error;
    }

    if (result.status !== "ready") {
      await service.release();
      throw describeProbeFailure(spec.serviceName, result);
    }
    return service;
  }

  /** Scoped acquisition: `fn` gets a ready handle, teardown runs on every exit path. */
  async withService<T>(
    input: ServiceSpecInput,
    fn: (handle: ServiceHandle) => Promise<T>,
    options: LaunchOptions = {},
  ): Promise<T> {
    const service = await this.launch(input, options);
    try {
      return await fn(service.handle);
    } finally {
      await service.release();
    }
  }

  /** Release every service still alive, e.g. from a suite's `afterAll` or a signal handler. */
  async releaseAll(): Promise<TeardownReport[]> {
    const services = Array.from(this.live);
    logger.info("Releasing live services", { count: services.length });
    return Promise.all(services.map((service) => service.release()));
  }
}
