import fs from "fs";
import path from "path";

import {
  definitionDir,
  definitionPath,
  imageTag,
  type DistroTarget,
} from "../config.ts";
import { FilesystemError } from "../errors.ts";

const INSTALL_INSTRUCTION_PATTERN = /^RUN\s+apt-get\s+install\b/;

/** Split a definition into its instructions (comments included, blanks dropped) */
export function parseInstructions(content: string): string[] {
  return content
    .split("\n")
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}

export function renderInstructions(instructions: string[]): string {
  return instructions.map((line) => `${line}\n`).join("");
}

/** Whether an instruction is a package install naming `packageName` */
export function installsPackage(
  instruction: string,
  packageName: string,
): boolean {
  if (!INSTALL_INSTRUCTION_PATTERN.test(instruction)) {
    return false;
  }
  return instruction.split(/\s+/).includes(packageName);
}

/**
 * Per-target image definitions below a store root.
 *
 * Layout: `<root>/<distroType>/<release>/Dockerfile`. The directory doubles
 * as the build context.
 */
export class ImageDefinitionStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  dirFor(target: DistroTarget): string {
    return definitionDir(this.root, target);
  }

  pathFor(target: DistroTarget): string {
    return definitionPath(this.root, target);
  }

  tagFor(target: DistroTarget): string {
    return imageTag(target);
  }

  exists(target: DistroTarget): boolean {
    return fs.existsSync(this.pathFor(target));
  }

  /** Raw definition bytes */
  read(target: DistroTarget): Buffer {
    const filePath = this.pathFor(target);
    try {
      return fs.readFileSync(filePath);
    } catch (err) {
      throw new FilesystemError(filePath, "cannot read image definition", {
        cause: err,
      });
    }
  }

  readInstructions(target: DistroTarget): string[] {
    return parseInstructions(this.read(target).toString("utf8"));
  }

  write(target: DistroTarget, content: string | Buffer): void {
    const filePath = this.pathFor(target);
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content, { mode: 0o644 });
    } catch (err) {
      throw new FilesystemError(filePath, "cannot write image definition", {
        cause: err,
      });
    }
  }

  hasInstallFor(target: DistroTarget, packageName: string): boolean {
    return this.readInstructions(target).some((instruction) =>
      installsPackage(instruction, packageName),
    );
  }
}
