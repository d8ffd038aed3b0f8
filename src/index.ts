export {
  DISTRO_TYPES,
  artifactDir,
  defaultStoreRoot,
  definitionPath,
  getDefaultMaskConfig,
  imageTag,
  parseMaskConfig,
  serializeMaskConfig,
  validateMaskConfig,
  type DistroTarget,
  type DistroType,
  type KernelMask,
  type MaskConfig,
} from "./config.ts";
export {
  ConfigError,
  FilesystemError,
  KernforgeError,
  NotFoundError,
  PatternError,
  ProcessError,
  RollbackError,
  UnsupportedDistroError,
  type KernforgeErrorCode,
} from "./errors.ts";
export {
  CliContainerEngine,
  detectContainerRuntime,
} from "./engine/runtime.ts";
export type {
  ContainerEngine,
  ContainerRuntime,
  ContainerSummary,
  RunOptions,
} from "./engine/types.ts";
export { getBaseImageTemplate, type BaseImageTemplate } from "./distro/index.ts";
export { ImageDefinitionStore } from "./image/definition.ts";
export { DistroImageBuilder } from "./image/base.ts";
export { ImageMutator } from "./image/mutator.ts";
export {
  KernelPackageResolver,
  aptCacheSearchParser,
  type PackageListParser,
} from "./kernel/packages.ts";
export { listKernelArtifacts, type KernelArtifact } from "./kernel/inventory.ts";
export { ArtifactExtractor } from "./artifacts/extract.ts";
export {
  ProvisioningOrchestrator,
  manualKernelRegistry,
  type ExtractionOutcome,
  type KernelOutcome,
  type KernelRegistryHook,
  type ProvisionReport,
  type TargetOutcome,
} from "./provision/orchestrator.ts";
