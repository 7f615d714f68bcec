import { cp, mkdtemp, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, posix } from "node:path";
import { ImageRef, ServiceSpec } from "../types/index.js";
import { ProvisioningError, errorMessage } from "../utils/errors.js";
import { logger } from "../utils/logger.js";
import { ContainerRuntime } from "./container-runtime.js";

/** Where local models are layered inside derived images. */
export const MODEL_MOUNT_ROOT = "/data";

export interface ImageProvisionerOptions {
  baseImage: string;
}

/** Local references are existing directories; everything else is treated as a hub id. */
export async function isLocalModel(reference: string): Promise<boolean> {
  try {
    return (await stat(reference)).isDirectory();
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}

export function containerModelPath(reference: string): string {
  return posix.join(MODEL_MOUNT_ROOT, reference.replace(/\\/g, "/"));
}

export function renderDockerfile(baseImage: string, modelPath: string): string {
  return [`FROM ${baseImage}`, `COPY model ${modelPath}`, ""].join("\n");
}

export class ImageProvisioner {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: ImageProvisionerOptions,
  ) {}

  /**
   * Resolve the image a service runs from. Hub models use the base image directly;
   * local model directories get a single-use image with the model copied in,
   * tagged `<containerName>-img`.
   */
  async provision(spec: ServiceSpec, containerName: string): Promise<ImageRef> {
    const tag = `${containerName}-img`.toLowerCase();

    let local: boolean;
    try {
      local = await isLocalModel(spec.modelReference);
    } catch (error) {
      throw new ProvisioningError(tag, `Cannot inspect model reference ${spec.modelReference}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!local) {
      return {
        isDerived: false,
        tag: this.options.baseImage,
        containerModelId: spec.modelReference,
      };
    }

    const modelPath = containerModelPath(spec.modelReference);
    logger.info("Building derived image", {
      baseImage: this.options.baseImage,
      tag,
      model: spec.modelReference,
    });

    const contextDir = await mkdtemp(join(tmpdir(), "harness-build-"));
    try {
      await cp(spec.modelReference, join(contextDir, "model"), { recursive: true });
      await writeFile(join(contextDir, "Dockerfile"), renderDockerfile(this.options.baseImage, modelPath), "utf-8");

      const { imageId, logs } = await this.runtime.build(contextDir, "Dockerfile", tag);
      logger.info("Successfully built image", { tag, imageId });
      logger.debug("Build logs", { logs: logs.join("") });

      return { isDerived: true, tag, builtImageId: imageId, containerModelId: modelPath };
    } catch (error) {
      await this.discardTag(tag);
      throw new ProvisioningError(tag, `Failed to build image ${tag}: ${errorMessage(error)}`, { cause: error });
    } finally {
      await rm(contextDir, { recursive: true, force: true });
    }
  }

  private async discardTag(tag: string): Promise<void> {
    try {
      await this.runtime.removeImage(tag, true);
    } catch (error) {
      // usually nothing was tagged
      logger.debug("No image to discard after failed build", { tag, error: errorMessage(error) });
    }
  }
}
