import { execFileSync, spawn } from "child_process";

import { ProcessError } from "../errors.ts";
import type {
  ContainerEngine,
  ContainerRuntime,
  ContainerSummary,
  RunOptions,
} from "./types.ts";

/** Detect available container runtime */
export function detectContainerRuntime(
  preferred?: ContainerRuntime,
): ContainerRuntime {
  if (preferred) {
    if (!hasContainerRuntime(preferred)) {
      throw new Error(`Preferred container runtime '${preferred}' not found`);
    }
    return preferred;
  }

  for (const runtime of ["docker", "podman"] as const) {
    if (hasContainerRuntime(runtime)) {
      return runtime;
    }
  }

  throw new Error(
    "No container runtime found. Please install Docker or Podman.",
  );
}

function hasContainerRuntime(runtime: ContainerRuntime): boolean {
  try {
    execFileSync(runtime, ["--version"], { stdio: "ignore" });
    return true;
  } catch {
    return false;
  }
}

export function isContainerRuntime(value: unknown): value is ContainerRuntime {
  return value === "docker" || value === "podman";
}

export interface EngineCommandOptions {
  /** kill the command after this many `ms` */
  timeoutMs?: number;
  /** receives `Running: ...` lines when set */
  echo?: (msg: string) => void;
}

/**
 * Run an engine command to completion and capture its output.
 *
 * stdout and stderr are collected into one string in arrival order.
 */
export function runEngineCommand(
  command: string,
  args: string[],
  options: EngineCommandOptions = {},
): Promise<string> {
  return new Promise((resolve, reject) => {
    options.echo?.(`Running: ${command} ${args.join(" ")}`);

    const chunks: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
    });

    const timer =
      options.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs)
        : null;

    const finish = (err: ProcessError | null) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      if (err) {
        reject(err);
      } else {
        resolve(Buffer.concat(chunks).toString("utf8"));
      }
    };

    child.stdout?.on("data", (data: Buffer) => {
      chunks.push(data);
    });

    child.stderr?.on("data", (data: Buffer) => {
      chunks.push(data);
    });

    child.on("close", (code, signal) => {
      if (code === 0 && !timedOut) {
        finish(null);
        return;
      }
      const status = timedOut
        ? `timeout after ${options.timeoutMs}ms`
        : String(code ?? signal ?? "?");
      finish(
        new ProcessError(
          command,
          args,
          status,
          Buffer.concat(chunks).toString("utf8"),
        ),
      );
    });

    child.on("error", (err) => {
      finish(
        new ProcessError(command, args, "spawn-error", err.message, {
          cause: err,
        }),
      );
    });
  });
}

/** Format string handed to `ps` so the listing parses reliably */
export const CONTAINER_LISTING_FORMAT = "{{.ID}}\t{{.Image}}";

/**
 * Parse `ps -a --format '{{.ID}}\t{{.Image}}'` output.
 *
 * Order is preserved; both engines list the newest container first.
 */
export function parseContainerListing(output: string): ContainerSummary[] {
  const containers: ContainerSummary[] = [];
  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (!line) continue;
    const [id, image] = line.split(/\s+/, 2);
    if (!id || !image) continue;
    containers.push({ id, image });
  }
  return containers;
}

export interface CliContainerEngineOptions {
  /** engine binary */
  runtime: ContainerRuntime;
  /** echo every engine command line (`KERNFORGE_DEBUG=engine`) */
  echo?: (msg: string) => void;
}

/** Container engine backed by the docker or podman command line */
export class CliContainerEngine implements ContainerEngine {
  readonly runtime: ContainerRuntime;
  private readonly echo?: (msg: string) => void;

  constructor(options: CliContainerEngineOptions) {
    this.runtime = options.runtime;
    this.echo = options.echo;
  }

  build(tag: string, contextDir: string): Promise<string> {
    return this.exec(["build", "-t", tag, contextDir]);
  }

  run(image: string, command: string[], options: RunOptions = {}): Promise<string> {
    const args = ["run"];
    if (options.remove) {
      args.push("--rm");
    }
    if (options.workdir) {
      args.push("-w", options.workdir);
    }
    args.push(image, ...command);
    return this.exec(args, options.timeoutMs);
  }

  async listContainers(): Promise<ContainerSummary[]> {
    const output = await this.exec([
      "ps",
      "-a",
      "--no-trunc",
      "--format",
      CONTAINER_LISTING_FORMAT,
    ]);
    return parseContainerListing(output);
  }

  async copyFrom(
    containerId: string,
    srcPath: string,
    destDir: string,
  ): Promise<void> {
    await this.exec(["cp", `${containerId}:${srcPath}`, destDir]);
  }

  async remove(containerId: string): Promise<void> {
    await this.exec(["rm", "-f", containerId]);
  }

  private exec(args: string[], timeoutMs?: number): Promise<string> {
    return runEngineCommand(this.runtime, args, {
      timeoutMs,
      echo: this.echo,
    });
  }
}
