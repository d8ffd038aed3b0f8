export type ContainerRuntime = "docker" | "podman";

export interface RunOptions {
  /** remove the container once the command exits (default: false) */
  remove?: boolean;
  /** working directory inside the container */
  workdir?: string;
  /** wall-clock bound in `ms` (unbounded when undefined) */
  timeoutMs?: number;
}

export interface ContainerSummary {
  /** container id */
  id: string;
  /** image reference the container was created from */
  image: string;
}

/**
 * Container engine operations used by the provisioning pipeline.
 *
 * Every method resolves once the underlying command has exited and rejects
 * with a `ProcessError` carrying the captured output when it fails.
 */
export interface ContainerEngine {
  /** engine name used in log lines */
  readonly runtime: string;

  /** build `contextDir` and tag the result; resolves to the build output */
  build(tag: string, contextDir: string): Promise<string>;

  /** run `command` in a new container from `image`; resolves to its output */
  run(image: string, command: string[], options?: RunOptions): Promise<string>;

  /** list all containers, most recently created first */
  listContainers(): Promise<ContainerSummary[]>;

  /** copy `srcPath` out of a container into `destDir` on the host */
  copyFrom(containerId: string, srcPath: string, destDir: string): Promise<void>;

  /** force-remove a container */
  remove(containerId: string): Promise<void>;
}
