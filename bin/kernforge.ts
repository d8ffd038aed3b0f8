#!/usr/bin/env node
import fs from "fs";
import path from "path";

import {
  artifactDir,
  defaultStoreRoot,
  getDefaultMaskConfig,
  parseMaskConfig,
  serializeMaskConfig,
  type KernelMask,
} from "../src/config.ts";
import { parseDebugEnv } from "../src/debug.ts";
import {
  CliContainerEngine,
  detectContainerRuntime,
  isContainerRuntime,
} from "../src/engine/runtime.ts";
import type { ContainerRuntime } from "../src/engine/types.ts";
import { ConfigError, KernforgeError } from "../src/errors.ts";
import {
  formatKernelInventory,
  listKernelArtifacts,
} from "../src/kernel/inventory.ts";
import { DEFAULT_DISCOVERY_TIMEOUT_MS } from "../src/kernel/packages.ts";
import {
  ProvisioningOrchestrator,
  type ProvisionReport,
} from "../src/provision/orchestrator.ts";
import { resolveEnvNumber, resolveEnvString } from "../src/utils/env.ts";

const DEFAULT_CONFIG_FILE = ".kernforge.json";

function renderCliError(err: unknown) {
  if (err instanceof KernforgeError) {
    console.error(`Error (${err.code}): ${err.message}`);
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  console.error(message);
}

function usage() {
  console.log("Usage: kernforge <command> [options]");
  console.log("Commands:");
  console.log("  autogen      Build kernel images for the configured masks and extract boot files");
  console.log("  list         List kernels in the artifact store");
  console.log("  help         Show this help");
  console.log("\nRun kernforge <command> --help for command-specific flags.");
}

function autogenUsage() {
  console.log("Usage: kernforge autogen [options]");
  console.log();
  console.log("Build a container image per distro release, install every kernel");
  console.log("matching the configured masks and copy /boot into the artifact store.");
  console.log();
  console.log("Options:");
  console.log(`  --config FILE           Kernel mask file (default: ${DEFAULT_CONFIG_FILE})`);
  console.log("  --init-config           Print a starter mask file");
  console.log("  --root DIR              Store root (default: $KERNFORGE_HOME or ~/.cache/kernforge)");
  console.log("  --runtime RUNTIME       Container runtime: docker|podman (default: auto-detect)");
  console.log("  --all-variants          Do not restrict matches to -generic kernels");
  console.log("  --quiet                 Reduce output verbosity");
  console.log();
  console.log("Environment:");
  console.log("  KERNFORGE_DISCOVERY_TIMEOUT_MS  Kernel discovery timeout (default: 60000)");
  console.log("  KERNFORGE_DEBUG=engine          Print every container engine command");
}

function listUsage() {
  console.log("Usage: kernforge list [options]");
  console.log();
  console.log("Options:");
  console.log("  --root DIR              Store root (default: $KERNFORGE_HOME or ~/.cache/kernforge)");
}

type AutogenArgs = {
  configFile: string;
  initConfig: boolean;
  root?: string;
  runtime?: ContainerRuntime;
  allVariants: boolean;
  quiet: boolean;
};

function parseAutogenArgs(argv: string[]): AutogenArgs {
  const args: AutogenArgs = {
    configFile: DEFAULT_CONFIG_FILE,
    initConfig: false,
    allVariants: false,
    quiet: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--config": {
        const value = argv[++i];
        if (!value) {
          console.error("--config requires a file path");
          process.exit(1);
        }
        args.configFile = value;
        break;
      }
      case "--init-config":
        args.initConfig = true;
        break;
      case "--root": {
        const value = argv[++i];
        if (!value) {
          console.error("--root requires a directory path");
          process.exit(1);
        }
        args.root = value;
        break;
      }
      case "--runtime": {
        const value = argv[++i];
        if (!isContainerRuntime(value)) {
          console.error("--runtime must be docker or podman");
          process.exit(1);
        }
        args.runtime = value;
        break;
      }
      case "--all-variants":
        args.allVariants = true;
        break;
      case "--quiet":
      case "-q":
        args.quiet = true;
        break;
      case "--help":
      case "-h":
        autogenUsage();
        process.exit(0);
      default:
        console.error(`Unknown argument: ${arg}`);
        autogenUsage();
        process.exit(1);
    }
  }

  return args;
}

function resolveRuntime(preferred?: ContainerRuntime): ContainerRuntime {
  if (preferred) return detectContainerRuntime(preferred);
  const fromEnv = resolveEnvString("KERNFORGE_RUNTIME");
  if (fromEnv !== undefined) {
    if (!isContainerRuntime(fromEnv)) {
      throw new ConfigError("KERNFORGE_RUNTIME must be docker or podman");
    }
    return detectContainerRuntime(fromEnv);
  }
  return detectContainerRuntime();
}

function loadMasks(configFile: string, allVariants: boolean): KernelMask[] {
  const configPath = path.resolve(configFile);
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  const config = parseMaskConfig(fs.readFileSync(configPath, "utf8"));
  if (!allVariants) {
    return config.kernels;
  }
  return config.kernels.map((mask) => ({ ...mask, genericOnly: false }));
}

function printReport(report: ProvisionReport) {
  console.log();
  for (const target of report.targets) {
    if (target.status === "failed") {
      console.log(`✗ ${target.tag}: ${target.stage} failed`);
    } else {
      console.log(`✓ ${target.tag}: ${target.packages.length} kernel(s) matched`);
    }
    for (const kernel of target.kernels) {
      console.log(`    ${kernel.status.padEnd(9)} ${kernel.packageName}`);
    }
  }
  for (const extraction of report.extractions) {
    const mark = extraction.status === "extracted" ? "✓" : "✗";
    console.log(`${mark} extract ${extraction.tag}: ${extraction.status}`);
  }
  console.log(`Artifacts: ${report.artifactDir}`);
}

function hasFailures(report: ProvisionReport): boolean {
  return (
    report.targets.some(
      (target) =>
        target.status === "failed" ||
        target.kernels.some((kernel) => kernel.status === "failed"),
    ) || report.extractions.some((extraction) => extraction.status === "failed")
  );
}

async function runAutogen(argv: string[]) {
  const args = parseAutogenArgs(argv);

  if (args.initConfig) {
    console.log(serializeMaskConfig(getDefaultMaskConfig()));
    return;
  }

  const masks = loadMasks(args.configFile, args.allVariants);
  const log = args.quiet
    ? () => {}
    : (msg: string) => process.stderr.write(`${msg}\n`);
  const debug = parseDebugEnv();

  const engine = new CliContainerEngine({
    runtime: resolveRuntime(args.runtime),
    echo: debug.has("engine") ? log : undefined,
  });

  const orchestrator = new ProvisioningOrchestrator({
    root: args.root ?? defaultStoreRoot(),
    engine,
    log,
    discoveryTimeoutMs: resolveEnvNumber(
      "KERNFORGE_DISCOVERY_TIMEOUT_MS",
      DEFAULT_DISCOVERY_TIMEOUT_MS,
    ),
  });

  const report = await orchestrator.run(masks);
  if (!args.quiet) {
    printReport(report);
  }
  if (hasFailures(report)) {
    process.exit(1);
  }
}

function runList(argv: string[]) {
  let root: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--root": {
        const value = argv[++i];
        if (!value) {
          console.error("--root requires a directory path");
          process.exit(1);
        }
        root = value;
        break;
      }
      case "--help":
      case "-h":
        listUsage();
        process.exit(0);
      default:
        console.error(`Unknown argument: ${arg}`);
        listUsage();
        process.exit(1);
    }
  }

  const kernels = listKernelArtifacts(artifactDir(root ?? defaultStoreRoot()));
  for (const line of formatKernelInventory(kernels)) {
    console.log(line);
  }
}

async function main() {
  const [command, ...args] = process.argv.slice(2);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    usage();
    process.exit(command ? 0 : 1);
  }

  switch (command) {
    case "autogen":
      await runAutogen(args);
      return;
    case "list":
      runList(args);
      return;
    default:
      console.error(`Unknown command: ${command}`);
      usage();
      process.exit(1);
  }
}

main().catch((err) => {
  renderCliError(err);
  process.exit(1);
});
