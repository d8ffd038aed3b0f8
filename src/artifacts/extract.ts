import fs from "fs";
import path from "path";

import { artifactDir } from "../config.ts";
import type { ContainerEngine, ContainerSummary } from "../engine/types.ts";
import { FilesystemError, NotFoundError, formatError } from "../errors.ts";

/** Directory inside kernel images holding the boot artifacts */
export const BOOT_DIR = "/boot";

/** Trivial command proving an image starts */
export const SANITY_COMMAND = ["bash", "-c", "ls"];

/**
 * Drop a leading registry host (`localhost/`, `registry.example:5000/`).
 *
 * podman lists locally built images as `localhost/<tag>:latest`.
 */
function stripRegistryHost(image: string): string {
  const slash = image.indexOf("/");
  if (slash === -1) return image;
  const host = image.slice(0, slash);
  if (host === "localhost" || host.includes(".") || host.includes(":")) {
    return image.slice(slash + 1);
  }
  return image;
}

/**
 * Pick the newest container created from `tag`.
 *
 * `containers` must be ordered newest first. Untagged references resolve to
 * `:latest`, so both spellings match, with or without a registry host.
 */
export function findLatestContainer(
  containers: ContainerSummary[],
  tag: string,
): ContainerSummary | null {
  const withLatest = tag.includes(":") ? tag : `${tag}:latest`;
  return (
    containers.find((container) => {
      const image = stripRegistryHost(container.image);
      return image === tag || image === withLatest;
    }) ?? null
  );
}

export interface ArtifactExtractorOptions {
  /** store root; artifacts land in `<root>/kernels` */
  root: string;
  /** container engine */
  engine: ContainerEngine;
  /** log sink */
  log?: (msg: string) => void;
}

/** Copies kernel boot files out of built images into the artifact store */
export class ArtifactExtractor {
  readonly artifactDir: string;
  private readonly engine: ContainerEngine;
  private readonly log: (msg: string) => void;

  constructor(options: ArtifactExtractorOptions) {
    this.artifactDir = artifactDir(path.resolve(options.root));
    this.engine = options.engine;
    this.log = options.log ?? (() => {});
  }

  /**
   * Extract `/boot` of the image `tag` into the artifact store.
   *
   * Files already in the store are overwritten when the image carries a file
   * of the same name and are otherwise left alone.
   */
  async extract(tag: string): Promise<string> {
    // Leaves a stopped container behind; it is the copy source below.
    await this.engine.run(tag, SANITY_COMMAND);

    const containers = await this.engine.listContainers();
    const container = findLatestContainer(containers, tag);
    if (!container) {
      throw new NotFoundError(`no container found for image ${tag}`);
    }

    try {
      this.ensureArtifactDir();
      this.log(`Copying ${BOOT_DIR} from ${container.id} (${tag}) to ${this.artifactDir}`);
      await this.engine.copyFrom(container.id, `${BOOT_DIR}/.`, this.artifactDir);
    } finally {
      try {
        await this.engine.remove(container.id);
      } catch (err) {
        this.log(`warning: failed to remove container ${container.id}: ${formatError(err)}`);
      }
    }

    return this.artifactDir;
  }

  private ensureArtifactDir(): void {
    try {
      fs.mkdirSync(this.artifactDir, { recursive: true });
    } catch (err) {
      throw new FilesystemError(
        this.artifactDir,
        "cannot create artifact directory",
        { cause: err },
      );
    }
  }
}
