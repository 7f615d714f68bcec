import { readdir } from "node:fs/promises";
import Docker from "dockerode";
import { z } from "zod";
import { RuntimeNotFoundError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { withTimeout } from "../utils/timing.js";

/**
 * Narrow view of the container engine. Only the supervisor and the provisioner
 * issue mutating calls through it; the probe reads status and logs.
 */
export interface ContainerRuntime {
  /** Build `dockerfile` (relative to `contextDir`) and tag the result. */
  build(contextDir: string, dockerfile: string, tag: string): Promise<BuildResult>;
  /** Create and start a detached container. */
  run(options: RunOptions): Promise<RuntimeContainer>;
  /** Look a container up by name, `null` when it does not exist. */
  get(name: string): Promise<RuntimeContainer | null>;
  /** Throws {@link RuntimeNotFoundError} when the image is already gone. */
  removeImage(imageId: string, force: boolean): Promise<void>;
}

export interface RuntimeContainer {
  readonly id: string;
  readonly name: string;
  /** Engine status string: created, running, exited, dead... */
  status(): Promise<string>;
  /** Combined stdout/stderr written in `[since, until]` (both bounds inclusive), in epoch seconds. */
  logs(since: number, until: number): Promise<string>;
  stop(timeoutSeconds: number): Promise<void>;
  wait(timeoutSeconds: number): Promise<void>;
  remove(force: boolean): Promise<void>;
}

export interface BuildResult {
  imageId: string;
  logs: string[];
}

export interface PortMapping {
  containerPort: number;
  hostPort: number;
}

export interface RunOptions {
  image: string;
  name: string;
  command: string[];
  env: Record<string, string>;
  ports: PortMapping[];
  devices: string[];
  shmSizeBytes: number;
}

const BuildEventSchema = z
  .object({
    stream: z.string().optional(),
    error: z.string().optional(),
    errorDetail: z.object({ message: z.string().optional() }).optional(),
    aux: z.object({ ID: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

function hasStatusCode(error: unknown, code: number): boolean {
  return typeof error === "object" && error !== null && "statusCode" in error && error.statusCode === code;
}

export function isNotFound(error: unknown): boolean {
  return error instanceof RuntimeNotFoundError || hasStatusCode(error, 404);
}

/**
 * Split the multiplexed stream the engine returns for non-TTY containers.
 * Each frame is an 8-byte header (stream type, 3 padding bytes, big-endian length)
 * followed by the payload. Anything that does not look framed is returned as-is.
 */
export function demuxLogs(buffer: Buffer): string {
  const chunks: Buffer[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    if (buffer.length - offset < 8) return buffer.toString("utf-8");

    const streamType = buffer[offset];
    if (streamType !== 0 && streamType !== 1 && streamType !== 2) return buffer.toString("utf-8");

    const size = buffer.readUInt32BE(offset + 4);
    const start = offset + 8;
    const end = start + size;
    if (end > buffer.length) return buffer.toString("utf-8");

    chunks.push(buffer.subarray(start, end));
    offset = end;
  }

  return Buffer.concat(chunks).toString("utf-8");
}

class DockerContainer implements RuntimeContainer {
  constructor(
    private readonly container: Docker.Container,
    readonly name: string,
  ) {}

  get id(): string {
    return this.container.id;
  }

  async status(): Promise<string> {
    try {
      const info = await this.container.inspect();
      return info.State.Status;
    } catch (error) {
      throw translate(error, `container ${this.name}`);
    }
  }

  async logs(since: number, until: number): Promise<string> {
    try {
      const output = await this.container.logs({
        follow: false,
        stdout: true,
        stderr: true,
        since,
        until,
      });
      return demuxLogs(output);
    } catch (error) {
      throw translate(error, `container ${this.name}`);
    }
  }

  async stop(timeoutSeconds: number): Promise<void> {
    try {
      await this.container.stop({ t: timeoutSeconds });
    } catch (error) {
      // 304: already stopped
      if (hasStatusCode(error, 304)) return;
      throw translate(error, `container ${this.name}`);
    }
  }

  async wait(timeoutSeconds: number): Promise<void> {
    try {
      await withTimeout(this.container.wait(), timeoutSeconds * 1000, `wait for ${this.name}`);
    } catch (error) {
      throw translate(error, `container ${this.name}`);
    }
  }

  async remove(force: boolean): Promise<void> {
    try {
      await this.container.remove({ force });
    } catch (error) {
      throw translate(error, `container ${this.name}`);
    }
  }
}

function translate(error: unknown, resource: string): unknown {
  return hasStatusCode(error, 404) ? new RuntimeNotFoundError(resource, { cause: error }) : error;
}

export class DockerodeRuntime implements ContainerRuntime {
  readonly docker: Docker;

  constructor(docker?: Docker | Docker.DockerOptions) {
    this.docker = docker instanceof Docker ? docker : new Docker(docker ?? { socketPath: "/var/run/docker.sock" });
  }

  async build(contextDir: string, dockerfile: string, tag: string): Promise<BuildResult> {
    logger.debug("Building image", { contextDir, dockerfile, tag });

    const stream = await this.docker.buildImage(
      { context: contextDir, src: await readdir(contextDir) },
      { t: tag, dockerfile },
    );

    const events = await new Promise<unknown[]>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null, output: unknown[]) => {
        if (err) reject(err);
        else resolve(output);
      });
    });

    const logs: string[] = [];
    let imageId: string | undefined;
    for (const raw of events) {
      const parsed = BuildEventSchema.safeParse(raw);
      if (!parsed.success) continue;
      const event = parsed.data;

      if (event.error) {
        throw new Error(event.errorDetail?.message ?? event.error);
      }
      if (event.stream) logs.push(event.stream);
      if (event.aux?.ID) imageId = event.aux.ID;
    }

    if (!imageId) {
      const info = await this.docker.getImage(tag).inspect();
      imageId = info.Id;
    }

    return { imageId, logs };
  }

  async run(options: RunOptions): Promise<RuntimeContainer> {
    const exposedPorts: Record<string, object> = {};
    const portBindings: Record<string, Array<{ HostPort: string }>> = {};
    for (const { containerPort, hostPort } of options.ports) {
      const key = `${containerPort}/tcp`;
      exposedPorts[key] = {};
      portBindings[key] = [{ HostPort: String(hostPort) }];
    }

    const container = await this.docker.createContainer({
      Image: options.image,
      name: options.name,
      Cmd: options.command,
      Env: Object.entries(options.env).map(([key, value]) => `${key}=${value}`),
      ExposedPorts: exposedPorts,
      HostConfig: {
        AutoRemove: false,
        PortBindings: portBindings,
        Devices: options.devices.map((device) => ({
          PathOnHost: device,
          PathInContainer: device,
          CgroupPermissions: "rwm",
        })),
        ShmSize: options.shmSizeBytes,
      },
    });

    try {
      await container.start();
    } catch (error) {
      // created but never started: do not leave it behind to collide with the next run
      await container.remove({ force: true }).catch((removeError: unknown) =>
        logger.warn("Failed to remove container that did not start", {
          name: options.name,
          error: removeError,
        }),
      );
      throw error;
    }

    return new DockerContainer(container, options.name);
  }

  async get(name: string): Promise<RuntimeContainer | null> {
    const container = this.docker.getContainer(name);
    try {
      await container.inspect();
    } catch (error) {
      if (hasStatusCode(error, 404)) return null;
      throw error;
    }
    return new DockerContainer(container, name);
  }

  async removeImage(imageId: string, force: boolean): Promise<void> {
    try {
      await this.docker.getImage(imageId).remove({ force });
    } catch (error) {
      throw translate(error, `image ${imageId}`);
    }
  }
}
