export * from "./types/index.js";
export * from "./utils/errors.js";
export { loadConfig, parseByteSize, resolveHubToken } from "./utils/config.js";
export { Logger, logger } from "./utils/logger.js";
export type { LogLevel, LogMeta } from "./utils/logger.js";
export {
  DockerodeRuntime,
  demuxLogs,
  isNotFound,
} from "./services/container-runtime.js";
export type {
  BuildResult,
  ContainerRuntime,
  PortMapping,
  RunOptions,
  RuntimeContainer,
} from "./services/container-runtime.js";
export { ImageProvisioner, containerModelPath, isLocalModel, renderDockerfile } from "./services/image-provisioner.js";
export {
  ContainerSupervisor,
  FORWARDED_TUNING_VARIABLES,
  TOKEN_VARIABLES,
  composeEnvironment,
  containerName,
  serviceCommand,
} from "./services/container-supervisor.js";
export { ContainerLogForwarder, HealthProbe, PROBE_PROMPT } from "./services/health-probe.js";
export type { HealthProbeOptions, LogSink } from "./services/health-probe.js";
export { GenerationClient, transientCode } from "./services/generation-client.js";
export { LoadHarness, generateLoad, summarizeLoad } from "./services/load-harness.js";
export type { LoadSummary } from "./services/load-harness.js";
export {
  LaunchedService,
  ServiceLauncher,
  createHarnessContext,
  describeProbeFailure,
} from "./services/service-launcher.js";
export type { HarnessContext, LaunchOptions } from "./services/service-launcher.js";
