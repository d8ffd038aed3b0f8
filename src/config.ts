/**
 * Kernel mask configuration and the on-disk layout derived from it.
 *
 * A mask file lists the kernels a project wants provisioned:
 *
 * ```json
 * {
 *   "kernels": [
 *     { "distro": "ubuntu", "release": "18.04", "releaseMask": "4\\.15.*" }
 *   ]
 * }
 * ```
 */

import os from "os";
import path from "path";

import { ConfigError } from "./errors.ts";

export const DISTRO_TYPES = ["ubuntu", "debian", "centos"] as const;

export type DistroType = (typeof DISTRO_TYPES)[number];

export interface DistroTarget {
  /** distribution family */
  distroType: DistroType;
  /** distribution release (e.g. "18.04") */
  release: string;
}

export interface KernelMask extends DistroTarget {
  /** regex fragment matched against the package version part */
  releaseMask: string;
  /** keep only `-generic` kernel variants */
  genericOnly: boolean;
}

export interface MaskConfig {
  kernels: KernelMask[];
}

/** Filename of the image definition inside a target directory */
export const DEFINITION_FILENAME = "Dockerfile";

/** Artifact store directory name below the store root */
export const ARTIFACT_DIRNAME = "kernels";

// Lowercase only: the release is both a path segment and part of the image tag.
const RELEASE_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

export function isDistroType(value: unknown): value is DistroType {
  return DISTRO_TYPES.some((distroType) => distroType === value);
}

/** Deterministic image tag for a target (e.g. `ubuntu-18.04`) */
export function imageTag(target: DistroTarget): string {
  return `${target.distroType}-${target.release}`.toLowerCase();
}

export function describeTarget(target: DistroTarget): string {
  return `${target.distroType}:${target.release}`;
}

/**
 * Reject masks that cannot be provisioned at all.
 *
 * The release ends up in a filesystem path and an image name, so it is
 * restricted to the characters both accept.
 */
export function assertValidMask(mask: KernelMask, index: number): void {
  if (!isDistroType(mask.distroType)) {
    throw new ConfigError(
      `kernels[${index}]: unknown distro '${String(mask.distroType)}' (expected one of ${DISTRO_TYPES.join(", ")})`,
    );
  }
  if (!mask.release) {
    throw new ConfigError(`kernels[${index}]: Please set distro release`);
  }
  if (!RELEASE_PATTERN.test(mask.release)) {
    throw new ConfigError(
      `kernels[${index}]: invalid distro release '${mask.release}' (allowed: lowercase letters, numbers, '.', '_', '-')`,
    );
  }
}

/** Directory holding the image definition for a target */
export function definitionDir(root: string, target: DistroTarget): string {
  return path.join(root, target.distroType, target.release);
}

export function definitionPath(root: string, target: DistroTarget): string {
  return path.join(definitionDir(root, target), DEFINITION_FILENAME);
}

export function artifactDir(root: string): string {
  return path.join(root, ARTIFACT_DIRNAME);
}

/**
 * Default store root for the command line.
 *
 * Library code never calls this; every component takes the root explicitly.
 */
export function defaultStoreRoot(
  env: NodeJS.ProcessEnv = process.env,
): string {
  const explicit = env.KERNFORGE_HOME?.trim();
  if (explicit) return explicit;
  const cacheBase = env.XDG_CACHE_HOME ?? path.join(os.homedir(), ".cache");
  return path.join(cacheBase, "kernforge");
}

type MaskEntry = {
  distro: DistroType;
  release: string;
  releaseMask: string;
  genericOnly?: boolean;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isOptionalBoolean = (value: unknown): boolean =>
  value === undefined || typeof value === "boolean";

function isMaskEntry(value: unknown): value is MaskEntry {
  if (!isRecord(value)) {
    return false;
  }
  if (!isDistroType(value.distro)) {
    return false;
  }
  if (typeof value.release !== "string") {
    return false;
  }
  if (typeof value.releaseMask !== "string") {
    return false;
  }
  return isOptionalBoolean(value.genericOnly);
}

/**
 * Validate the shape of a mask file.
 *
 * Empty releases pass here; the orchestrator rejects them before building.
 */
export function validateMaskConfig(
  config: unknown,
): config is { kernels: MaskEntry[] } {
  if (!isRecord(config)) {
    return false;
  }
  if (!Array.isArray(config.kernels)) {
    return false;
  }
  return config.kernels.every(isMaskEntry);
}

export function parseMaskConfig(content: string): MaskConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid mask configuration: ${message}`);
  }

  if (!validateMaskConfig(raw)) {
    throw new ConfigError("Invalid mask configuration");
  }

  // genericOnly defaults to true
  return {
    kernels: raw.kernels.map((entry) => ({
      distroType: entry.distro,
      release: entry.release,
      releaseMask: entry.releaseMask,
      genericOnly: entry.genericOnly ?? true,
    })),
  };
}

/** Starter mask file for `kernforge autogen --init-config` */
export function getDefaultMaskConfig(): MaskConfig {
  return {
    kernels: [
      {
        distroType: "ubuntu",
        release: "18.04",
        releaseMask: "4\\.15.*",
        genericOnly: true,
      },
    ],
  };
}

export function serializeMaskConfig(config: MaskConfig): string {
  return JSON.stringify(
    {
      kernels: config.kernels.map((mask) => ({
        distro: mask.distroType,
        release: mask.release,
        releaseMask: mask.releaseMask,
        genericOnly: mask.genericOnly,
      })),
    },
    null,
    2,
  );
}
