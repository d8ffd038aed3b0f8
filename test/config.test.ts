import assert from "node:assert/strict";
import path from "node:path";
import test from "node:test";

import {
  assertValidMask,
  defaultStoreRoot,
  definitionPath,
  getDefaultMaskConfig,
  imageTag,
  parseMaskConfig,
  serializeMaskConfig,
  validateMaskConfig,
  type KernelMask,
} from "../src/config.ts";
import { ConfigError } from "../src/errors.ts";

function mask(overrides: Partial<KernelMask> = {}): KernelMask {
  return {
    distroType: "ubuntu",
    release: "18.04",
    releaseMask: "4\\.15.*",
    genericOnly: true,
    ...overrides,
  };
}

test("config: image tag and definition path derive from the target", () => {
  const target = { distroType: "ubuntu" as const, release: "18.04" };
  assert.equal(imageTag(target), "ubuntu-18.04");
  assert.equal(
    definitionPath("/store", target),
    path.join("/store", "ubuntu", "18.04", "Dockerfile"),
  );
});

test("config: parseMaskConfig defaults genericOnly to true", () => {
  const parsed = parseMaskConfig(
    JSON.stringify({
      kernels: [
        { distro: "ubuntu", release: "18.04", releaseMask: "4\\.15.*" },
        { distro: "ubuntu", release: "20.04", releaseMask: "5\\.4.*", genericOnly: false },
      ],
    }),
  );

  assert.deepEqual(parsed.kernels, [
    { distroType: "ubuntu", release: "18.04", releaseMask: "4\\.15.*", genericOnly: true },
    { distroType: "ubuntu", release: "20.04", releaseMask: "5\\.4.*", genericOnly: false },
  ]);
});

test("config: empty release passes the shape check", () => {
  assert.equal(
    validateMaskConfig({
      kernels: [{ distro: "ubuntu", release: "", releaseMask: ".*" }],
    }),
    true,
  );
});

test("config: rejects malformed mask files", () => {
  assert.equal(validateMaskConfig({ kernels: [{ distro: "arch", release: "1", releaseMask: ".*" }] }), false);
  assert.equal(validateMaskConfig({ kernels: [{ distro: "ubuntu", release: 18.04, releaseMask: ".*" }] }), false);
  assert.equal(validateMaskConfig({ kernels: {} }), false);
  assert.equal(validateMaskConfig([]), false);

  assert.throws(() => parseMaskConfig("{"), ConfigError);
  assert.throws(
    () => parseMaskConfig(JSON.stringify({ kernels: [{ distro: "ubuntu" }] })),
    /Invalid mask configuration/,
  );
});

test("config: default mask config round-trips through serialization", () => {
  const config = getDefaultMaskConfig();
  assert.deepEqual(parseMaskConfig(serializeMaskConfig(config)), config);
  assert.equal(config.kernels[0].releaseMask, "4\\.15.*");
});

test("config: assertValidMask requires a release", () => {
  assert.throws(
    () => assertValidMask(mask({ release: "" }), 2),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message === "kernels[2]: Please set distro release",
  );
});

test("config: assertValidMask rejects releases that escape the store", () => {
  assert.throws(() => assertValidMask(mask({ release: "../18.04" }), 0), ConfigError);
  assert.throws(() => assertValidMask(mask({ release: "18.04/x" }), 0), ConfigError);
  assert.doesNotThrow(() => assertValidMask(mask({ release: "bionic" }), 0));
});

test("config: assertValidMask rejects uppercase releases", () => {
  // "Bionic" and "bionic" would otherwise share the tag ubuntu-bionic.
  assert.throws(
    () => assertValidMask(mask({ release: "Bionic" }), 1),
    (err: unknown) =>
      err instanceof ConfigError &&
      err.message ===
        "kernels[1]: invalid distro release 'Bionic' (allowed: lowercase letters, numbers, '.', '_', '-')",
  );
});

test("config: defaultStoreRoot honours KERNFORGE_HOME then XDG_CACHE_HOME", () => {
  assert.equal(defaultStoreRoot({ KERNFORGE_HOME: "/srv/kf" }), "/srv/kf");
  assert.equal(
    defaultStoreRoot({ XDG_CACHE_HOME: "/tmp/cache" }),
    path.join("/tmp/cache", "kernforge"),
  );
});
