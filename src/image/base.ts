import { describeTarget, type DistroTarget } from "../config.ts";
import { generateBaseInstructions } from "../distro/index.ts";
import type { ContainerEngine } from "../engine/types.ts";
import { ProcessError } from "../errors.ts";
import { renderInstructions, type ImageDefinitionStore } from "./definition.ts";

export interface DistroImageBuilderOptions {
  /** image definition store */
  store: ImageDefinitionStore;
  /** container engine used for builds */
  engine: ContainerEngine;
  /** log sink */
  log?: (msg: string) => void;
}

/** Creates and caches base images, one per distribution target */
export class DistroImageBuilder {
  private readonly store: ImageDefinitionStore;
  private readonly engine: ContainerEngine;
  private readonly log: (msg: string) => void;

  constructor(options: DistroImageBuilderOptions) {
    this.store = options.store;
    this.engine = options.engine;
    this.log = options.log ?? (() => {});
  }

  /**
   * Make sure the base image for `target` exists and return its context dir.
   *
   * An existing definition counts as a built image. A definition written by
   * a failed build is left in place; base instructions are static per
   * target, so replaying it on a later build is safe.
   */
  async ensureBase(target: DistroTarget): Promise<string> {
    const name = describeTarget(target);
    const contextDir = this.store.dirFor(target);

    if (this.store.exists(target)) {
      this.log(`Base image for ${name} found`);
      return contextDir;
    }

    // Unsupported distros throw here, before anything touches the disk.
    const instructions = generateBaseInstructions(target);

    this.log(`Base image for ${name} not found, start generating`);
    this.store.write(target, `${renderInstructions(instructions)}\n`);

    try {
      await this.engine.build(this.store.tagFor(target), contextDir);
    } catch (err) {
      this.log(`Base image for ${name} generating error, see log`);
      if (err instanceof ProcessError) {
        this.log(err.output);
      }
      throw err;
    }

    this.log(`Base image for ${name} generating success`);
    return contextDir;
  }
}
