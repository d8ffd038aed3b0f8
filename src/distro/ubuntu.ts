import type { DistroTarget } from "../config.ts";
import type { BaseImageTemplate } from "./index.ts";

/** Packages every Ubuntu base image carries for out-of-tree module builds */
export const UBUNTU_BASE_PACKAGES = [
  ["build-essential", "libelf-dev"],
  ["wget", "git"],
] as const;

export const ubuntuTemplate: BaseImageTemplate = {
  distroType: "ubuntu",

  baseInstructions(target: DistroTarget): string[] {
    return [
      `FROM ubuntu:${target.release}`,
      "ENV DEBIAN_FRONTEND=noninteractive",
      "RUN apt-get update",
      ...UBUNTU_BASE_PACKAGES.map(
        (group) => `RUN apt-get install -y ${group.join(" ")}`,
      ),
    ];
  },

  kernelInstallInstruction(imagePackage: string): string {
    return `RUN apt-get install -y ${imagePackage} ${headersPackageFor(imagePackage)}`;
  },
};

/** `linux-image-4.15.0-20-generic` -> `linux-headers-4.15.0-20-generic` */
export function headersPackageFor(imagePackage: string): string {
  return imagePackage.replaceAll("image", "headers");
}
