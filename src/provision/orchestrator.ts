import path from "path";

import {
  assertValidMask,
  describeTarget,
  imageTag,
  type KernelMask,
} from "../config.ts";
import { ArtifactExtractor } from "../artifacts/extract.ts";
import type { ContainerEngine } from "../engine/types.ts";
import { RollbackError, formatError } from "../errors.ts";
import { DistroImageBuilder } from "../image/base.ts";
import { ImageDefinitionStore } from "../image/definition.ts";
import { ImageMutator } from "../image/mutator.ts";
import {
  KernelPackageResolver,
  type PackageListParser,
} from "../kernel/packages.ts";

export type KernelStatus = "installed" | "present" | "failed";

export interface KernelOutcome {
  /** kernel image package */
  packageName: string;
  status: KernelStatus;
  error?: Error;
}

export interface TargetOutcome {
  mask: KernelMask;
  /** image tag of the target */
  tag: string;
  status: "ok" | "failed";
  /** step that failed when `status` is `failed` */
  stage?: "base" | "resolve" | "rollback";
  error?: Error;
  /** packages matched by the mask, in discovery order */
  packages: string[];
  kernels: KernelOutcome[];
}

export interface ExtractionOutcome {
  tag: string;
  status: "extracted" | "failed";
  error?: Error;
}

export interface ProvisionReport {
  targets: TargetOutcome[];
  extractions: ExtractionOutcome[];
  /** artifact store directory */
  artifactDir: string;
}

/**
 * Consolidates extracted kernels into a registry for test runners.
 *
 * Nothing generates the registry automatically yet; the default hook only
 * tells the operator to do it by hand.
 */
export interface KernelRegistryHook {
  generate(report: ProvisionReport): Promise<void>;
}

export function manualKernelRegistry(
  log: (msg: string) => void,
): KernelRegistryHook {
  return {
    async generate(report) {
      log("Kernel registry generation is not implemented");
      log(`Register the kernels in ${report.artifactDir} by hand`);
    },
  };
}

export interface ProvisioningOrchestratorOptions {
  /** store root for definitions and artifacts */
  root: string;
  /** container engine */
  engine: ContainerEngine;
  /** log sink */
  log?: (msg: string) => void;
  /** kernel discovery bound in `ms` */
  discoveryTimeoutMs?: number;
  /** guest package index parser */
  parser?: PackageListParser;
  /** registry step run after extraction (default: manual notice) */
  registry?: KernelRegistryHook;
}

/**
 * Whether the target's image holds kernels worth extracting.
 *
 * A failed rollback leaves the last good build under the tag, so it still
 * counts.
 */
function isExtractable(outcome: TargetOutcome): boolean {
  return outcome.status === "ok" || outcome.stage === "rollback";
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Drives base builds, kernel installs and extraction over a mask list */
export class ProvisioningOrchestrator {
  private readonly builder: DistroImageBuilder;
  private readonly resolver: KernelPackageResolver;
  private readonly mutator: ImageMutator;
  private readonly extractor: ArtifactExtractor;
  private readonly registry: KernelRegistryHook;
  private readonly log: (msg: string) => void;

  constructor(options: ProvisioningOrchestratorOptions) {
    const root = path.resolve(options.root);
    const log = options.log ?? (() => {});
    const store = new ImageDefinitionStore(root);

    this.log = log;
    this.builder = new DistroImageBuilder({ store, engine: options.engine, log });
    this.resolver = new KernelPackageResolver({
      engine: options.engine,
      parser: options.parser,
      timeoutMs: options.discoveryTimeoutMs,
      log,
    });
    this.mutator = new ImageMutator({ store, engine: options.engine, log });
    this.extractor = new ArtifactExtractor({ root, engine: options.engine, log });
    this.registry = options.registry ?? manualKernelRegistry(log);
  }

  /**
   * Provision every mask, then extract boot files from each image touched.
   *
   * Rejects only with a `ConfigError`, raised before any image is built.
   * Failures of individual targets, kernels and extractions are recorded in
   * the report and do not stop the run.
   */
  async run(masks: KernelMask[]): Promise<ProvisionReport> {
    masks.forEach((mask, index) => assertValidMask(mask, index));

    const targets: TargetOutcome[] = [];
    const touched: string[] = [];

    for (const mask of masks) {
      const outcome = await this.provisionTarget(mask);
      targets.push(outcome);
      if (isExtractable(outcome) && !touched.includes(outcome.tag)) {
        touched.push(outcome.tag);
      }
    }

    const extractions: ExtractionOutcome[] = [];
    for (const tag of touched) {
      try {
        await this.extractor.extract(tag);
        extractions.push({ tag, status: "extracted" });
      } catch (err) {
        this.log(`extract kernels ${tag}: ${formatError(err)}`);
        extractions.push({ tag, status: "failed", error: toError(err) });
      }
    }

    const report: ProvisionReport = {
      targets,
      extractions,
      artifactDir: this.extractor.artifactDir,
    };
    await this.registry.generate(report);
    return report;
  }

  private async provisionTarget(mask: KernelMask): Promise<TargetOutcome> {
    const name = describeTarget(mask);
    const outcome: TargetOutcome = {
      mask,
      tag: imageTag(mask),
      status: "ok",
      packages: [],
      kernels: [],
    };

    try {
      await this.builder.ensureBase(mask);
    } catch (err) {
      this.log(`base image ${name}: ${formatError(err)}`);
      return { ...outcome, status: "failed", stage: "base", error: toError(err) };
    }

    try {
      outcome.packages = await this.resolver.resolve(
        mask,
        mask.releaseMask,
        mask.genericOnly,
      );
    } catch (err) {
      this.log(`resolve kernels ${name}: ${formatError(err)}`);
      return { ...outcome, status: "failed", stage: "resolve", error: toError(err) };
    }

    for (const packageName of outcome.packages) {
      try {
        const installed = await this.mutator.addKernel(mask, packageName);
        outcome.kernels.push({
          packageName,
          status: installed ? "installed" : "present",
        });
      } catch (err) {
        this.log(`add kernel ${packageName} for ${name}: ${formatError(err)}`);
        outcome.kernels.push({
          packageName,
          status: "failed",
          error: toError(err),
        });
        // The definition no longer matches the image; stop appending to it.
        if (err instanceof RollbackError) {
          return { ...outcome, status: "failed", stage: "rollback", error: err };
        }
      }
    }

    return outcome;
  }
}
