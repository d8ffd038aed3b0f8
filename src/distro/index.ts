import type { DistroTarget, DistroType } from "../config.ts";
import { UnsupportedDistroError } from "../errors.ts";
import { ubuntuTemplate } from "./ubuntu.ts";

export const BASE_BEGIN_MARKER = "# BASE";
export const BASE_END_MARKER = "# END BASE";

/** Per-distribution knowledge needed to build kernel images */
export interface BaseImageTemplate {
  distroType: DistroType;

  /** instructions of the base image, without the BASE markers */
  baseInstructions(target: DistroTarget): string[];

  /** single instruction installing a kernel image and its headers */
  kernelInstallInstruction(imagePackage: string): string;
}

const TEMPLATES: Partial<Record<DistroType, BaseImageTemplate>> = {
  ubuntu: ubuntuTemplate,
};

export function getBaseImageTemplate(distroType: DistroType): BaseImageTemplate {
  const template = TEMPLATES[distroType];
  if (!template) {
    throw new UnsupportedDistroError(distroType);
  }
  return template;
}

/** Full base definition for a target, wrapped in BASE markers */
export function generateBaseInstructions(target: DistroTarget): string[] {
  const template = getBaseImageTemplate(target.distroType);
  return [
    BASE_BEGIN_MARKER,
    ...template.baseInstructions(target),
    BASE_END_MARKER,
  ];
}
