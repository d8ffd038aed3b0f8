import fs from "fs";
import path from "path";

import { NotFoundError } from "../errors.ts";

const KERNEL_PREFIX = "vmlinuz-";
const INITRD_PREFIX = "initrd.img-";

export interface KernelArtifact {
  /** kernel release (e.g. `4.15.0-20-generic`) */
  version: string;
  /** kernel image path */
  kernel: string;
  /** initrd path when one was extracted */
  initrd?: string;
}

/** Kernels present in an artifact store, ordered by release */
export function listKernelArtifacts(dir: string): KernelArtifact[] {
  const entries = fs.existsSync(dir) ? fs.readdirSync(dir) : [];
  const names = new Set(entries);

  const kernels: KernelArtifact[] = [];
  for (const entry of entries) {
    if (!entry.startsWith(KERNEL_PREFIX)) continue;
    const version = entry.slice(KERNEL_PREFIX.length);
    if (!version) continue;

    const artifact: KernelArtifact = {
      version,
      kernel: path.join(dir, entry),
    };
    const initrd = `${INITRD_PREFIX}${version}`;
    if (names.has(initrd)) {
      artifact.initrd = path.join(dir, initrd);
    }
    kernels.push(artifact);
  }

  if (kernels.length === 0) {
    throw new NotFoundError(`No kernels found in ${dir}`);
  }

  return kernels.sort((a, b) =>
    a.version.localeCompare(b.version, "en", { numeric: true }),
  );
}

export function formatKernelInventory(kernels: KernelArtifact[]): string[] {
  return kernels.map((kernel) =>
    [kernel.version, kernel.kernel, kernel.initrd ?? "-"].join(" "),
  );
}
