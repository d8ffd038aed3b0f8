import { imageTag, type DistroTarget } from "../config.ts";
import type { ContainerEngine } from "../engine/types.ts";
import { PatternError } from "../errors.ts";

/** Prefix shared by every kernel image package */
export const KERNEL_IMAGE_PREFIX = "linux-image-";

/** Name suffix of kernels built for general-purpose hardware */
export const GENERIC_KERNEL_SUFFIX = "-generic";

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 60_000;

/** Extra time the engine client gets after the in-container bound expires */
export const DISCOVERY_KILL_GRACE_MS = 10_000;

/**
 * Contract for turning guest package-index output into package names.
 *
 * `version` identifies the output format the parser was written against;
 * swap the parser when the guest tool changes its output.
 */
export interface PackageListParser {
  version: number;
  /** guest command printing the kernel image package index */
  command: string[];
  /** package names in output order; empty output means no packages */
  parse(output: string): string[];
}

/**
 * `apt-cache search --names-only linux-image`, format v1.
 *
 * One `<name> - <description>` entry per line.
 */
export const aptCacheSearchParser: PackageListParser = {
  version: 1,
  command: ["apt-cache", "search", "--names-only", "linux-image"],
  parse(output: string): string[] {
    const names: string[] = [];
    for (const raw of output.split("\n")) {
      const line = raw.trim();
      if (!line) continue;
      const name = line.split(/\s+/, 1)[0];
      if (name) names.push(name);
    }
    return names;
  },
};

/** Compile the package matcher for a release mask */
export function compileKernelPattern(releaseMask: string): RegExp {
  try {
    return new RegExp(`^${KERNEL_IMAGE_PREFIX}(?:${releaseMask})`);
  } catch (err) {
    throw new PatternError(releaseMask, err);
  }
}

/**
 * Wrap a guest command in coreutils `timeout`.
 *
 * Killing the engine client does not stop the container, so the bound has
 * to hold inside the guest as well.
 */
export function boundedCommand(command: string[], timeoutMs: number): string[] {
  const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
  return ["timeout", String(seconds), ...command];
}

/**
 * Filter package names by release mask.
 *
 * Order and duplicates are kept as given.
 */
export function filterKernelPackages(
  names: string[],
  releaseMask: string,
  genericOnly: boolean,
): string[] {
  const pattern = compileKernelPattern(releaseMask);
  return names.filter(
    (name) =>
      pattern.test(name) &&
      (!genericOnly || name.endsWith(GENERIC_KERNEL_SUFFIX)),
  );
}

export interface KernelPackageResolverOptions {
  /** container engine running the discovery command */
  engine: ContainerEngine;
  /** package index parser (default: apt-cache search v1) */
  parser?: PackageListParser;
  /** discovery wall-clock bound in `ms` */
  timeoutMs?: number;
  /** log sink */
  log?: (msg: string) => void;
}

/** Finds kernel packages available inside a target's base image */
export class KernelPackageResolver {
  private readonly engine: ContainerEngine;
  private readonly parser: PackageListParser;
  private readonly timeoutMs: number;
  private readonly log: (msg: string) => void;

  constructor(options: KernelPackageResolverOptions) {
    this.engine = options.engine;
    this.parser = options.parser ?? aptCacheSearchParser;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    this.log = options.log ?? (() => {});
  }

  async resolve(
    target: DistroTarget,
    releaseMask: string,
    genericOnly: boolean,
  ): Promise<string[]> {
    // Fail on a bad mask before starting a container.
    compileKernelPattern(releaseMask);

    const output = await this.engine.run(
      imageTag(target),
      boundedCommand(this.parser.command, this.timeoutMs),
      {
        remove: true,
        workdir: "/tmp",
        timeoutMs: this.timeoutMs + DISCOVERY_KILL_GRACE_MS,
      },
    );

    const packages = filterKernelPackages(
      this.parser.parse(output),
      releaseMask,
      genericOnly,
    );
    this.log(
      `Found ${packages.length} kernel package(s) matching '${releaseMask}' in ${imageTag(target)}`,
    );
    return packages;
  }
}
