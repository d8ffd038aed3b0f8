import { describeTarget, type DistroTarget } from "../config.ts";
import { getBaseImageTemplate } from "../distro/index.ts";
import type { ContainerEngine } from "../engine/types.ts";
import { ProcessError, RollbackError } from "../errors.ts";
import {
  installsPackage,
  parseInstructions,
  type ImageDefinitionStore,
} from "./definition.ts";

export interface ImageMutatorOptions {
  /** image definition store */
  store: ImageDefinitionStore;
  /** container engine used for rebuilds */
  engine: ContainerEngine;
  /** log sink */
  log?: (msg: string) => void;
}

/** Appends kernel installs to image definitions and rebuilds the image */
export class ImageMutator {
  private readonly store: ImageDefinitionStore;
  private readonly engine: ContainerEngine;
  private readonly log: (msg: string) => void;

  constructor(options: ImageMutatorOptions) {
    this.store = options.store;
    this.engine = options.engine;
    this.log = options.log ?? (() => {});
  }

  /**
   * Install a kernel package (plus headers) into the target image.
   *
   * Resolves to `false` when the definition already installs the package.
   * When the rebuild fails the definition is restored byte for byte, so it
   * keeps matching the last successfully built image.
   */
  async addKernel(target: DistroTarget, packageName: string): Promise<boolean> {
    const name = describeTarget(target);
    const template = getBaseImageTemplate(target.distroType);
    const previous = this.store.read(target);

    const installed = parseInstructions(previous.toString("utf8")).some(
      (instruction) => installsPackage(instruction, packageName),
    );
    if (installed) {
      this.log(`kernel ${packageName} for ${name} already exists`);
      return false;
    }

    this.log(`Start adding kernel ${packageName} for ${name}`);

    const instruction = template.kernelInstallInstruction(packageName);
    const separator =
      previous.length > 0 && previous[previous.length - 1] !== 0x0a ? "\n" : "";

    try {
      this.store.write(
        target,
        Buffer.concat([previous, Buffer.from(`${separator}${instruction}\n`)]),
      );
      await this.engine.build(this.store.tagFor(target), this.store.dirFor(target));
    } catch (err) {
      this.restore(target, previous, err);
      this.log(`Add kernel ${packageName} for ${name} error, see log`);
      if (err instanceof ProcessError) {
        this.log(err.output);
      }
      throw err;
    }

    this.log(`Add kernel ${packageName} for ${name} success`);
    return true;
  }

  private restore(target: DistroTarget, previous: Buffer, cause: unknown): void {
    try {
      this.store.write(target, previous);
    } catch (restoreErr) {
      throw new RollbackError(this.store.pathFor(target), cause, restoreErr);
    }
  }
}
