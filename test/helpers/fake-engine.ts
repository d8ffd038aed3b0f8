import fs from "node:fs";
import path from "node:path";

import type {
  ContainerEngine,
  ContainerSummary,
  RunOptions,
} from "../../src/engine/types.ts";
import { ProcessError } from "../../src/errors.ts";

export type EngineCall =
  | { op: "build"; tag: string; contextDir: string; definition: string }
  | { op: "run"; image: string; command: string[]; options: RunOptions }
  | { op: "ps" }
  | { op: "cp"; containerId: string; srcPath: string; destDir: string }
  | { op: "rm"; containerId: string };

/**
 * In-process stand-in for docker/podman.
 *
 * Builds snapshot the definition they were given, runs without `remove`
 * leave a container behind (newest first in the listing) and `cp` writes
 * the boot files registered for the container's image.
 */
export class FakeEngine implements ContainerEngine {
  readonly runtime = "fake";

  calls: EngineCall[] = [];
  images = new Set<string>();
  containers: ContainerSummary[] = [];

  /** apt-cache output per image tag */
  packageIndex = new Map<string, string>();
  /** `/boot` contents per image tag */
  bootFiles = new Map<string, Record<string, string>>();

  /** return output to make a build fail */
  failBuild: (tag: string, definitionPath: string) => string | null = () => null;
  /** run without `remove` does not leave a container */
  keepNoContainers = false;
  failCopy = false;
  failRemove = false;

  private nextId = 1;

  builds(): Extract<EngineCall, { op: "build" }>[] {
    return this.calls.filter(
      (call): call is Extract<EngineCall, { op: "build" }> => call.op === "build",
    );
  }

  runs(): Extract<EngineCall, { op: "run" }>[] {
    return this.calls.filter(
      (call): call is Extract<EngineCall, { op: "run" }> => call.op === "run",
    );
  }

  async build(tag: string, contextDir: string): Promise<string> {
    const definitionPath = path.join(contextDir, "Dockerfile");
    const definition = fs.readFileSync(definitionPath, "utf8");
    this.calls.push({ op: "build", tag, contextDir, definition });

    const failure = this.failBuild(tag, definitionPath);
    if (failure !== null) {
      throw new ProcessError("fake", ["build", "-t", tag, contextDir], "1", failure);
    }

    this.images.add(tag);
    return `Successfully tagged ${tag}:latest\n`;
  }

  async run(
    image: string,
    command: string[],
    options: RunOptions = {},
  ): Promise<string> {
    this.calls.push({ op: "run", image, command, options });

    if (!this.images.has(image)) {
      throw new ProcessError(
        "fake",
        ["run", image, ...command],
        "125",
        `Unable to find image '${image}:latest' locally\n`,
      );
    }

    if (!options.remove && !this.keepNoContainers) {
      this.containers.unshift({ id: `c${this.nextId++}`, image: `${image}:latest` });
    }

    if (command.includes("apt-cache")) {
      return this.packageIndex.get(image) ?? "";
    }
    return "bin\nboot\netc\n";
  }

  async listContainers(): Promise<ContainerSummary[]> {
    this.calls.push({ op: "ps" });
    return [...this.containers];
  }

  async copyFrom(
    containerId: string,
    srcPath: string,
    destDir: string,
  ): Promise<void> {
    this.calls.push({ op: "cp", containerId, srcPath, destDir });

    const container = this.containers.find((c) => c.id === containerId);
    if (!container) {
      throw new ProcessError(
        "fake",
        ["cp", `${containerId}:${srcPath}`, destDir],
        "1",
        `Error: No such container:path: ${containerId}:${srcPath}\n`,
      );
    }

    if (this.failCopy) {
      throw new ProcessError(
        "fake",
        ["cp", `${containerId}:${srcPath}`, destDir],
        "1",
        "Error: no space left on device\n",
      );
    }

    const image = container.image.replace(/:latest$/, "");
    for (const [name, content] of Object.entries(this.bootFiles.get(image) ?? {})) {
      fs.writeFileSync(path.join(destDir, name), content);
    }
  }

  async remove(containerId: string): Promise<void> {
    this.calls.push({ op: "rm", containerId });
    if (this.failRemove) {
      throw new ProcessError("fake", ["rm", "-f", containerId], "1", "device busy\n");
    }
    this.containers = this.containers.filter((c) => c.id !== containerId);
  }
}
