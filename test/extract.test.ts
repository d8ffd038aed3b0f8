import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";

import { ArtifactExtractor, findLatestContainer } from "../src/artifacts/extract.ts";
import { NotFoundError, ProcessError } from "../src/errors.ts";
import { FakeEngine } from "./helpers/fake-engine.ts";

function setup() {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "kernforge-extract-"));
  const engine = new FakeEngine();
  engine.images.add("ubuntu-18.04");
  engine.bootFiles.set("ubuntu-18.04", {
    "vmlinuz-4.15.0-20-generic": "kernel-20",
    "initrd.img-4.15.0-20-generic": "initrd-20",
  });
  const lines: string[] = [];
  const extractor = new ArtifactExtractor({
    root,
    engine,
    log: (msg) => lines.push(msg),
  });
  return { root, engine, extractor, lines };
}

test("extract: findLatestContainer takes the first container of the tag", () => {
  const containers = [
    { id: "c3", image: "ubuntu-16.04:latest" },
    { id: "c2", image: "ubuntu-18.04:latest" },
    { id: "c1", image: "ubuntu-18.04" },
  ];
  assert.equal(findLatestContainer(containers, "ubuntu-18.04")?.id, "c2");
  assert.equal(findLatestContainer(containers, "ubuntu-16.04")?.id, "c3");
  assert.equal(findLatestContainer(containers, "ubuntu-18.0"), null);
  assert.equal(findLatestContainer([], "ubuntu-18.04"), null);
});

test("extract: findLatestContainer accepts a registry host before the tag", () => {
  const containers = [
    { id: "c3", image: "library/ubuntu-18.04:latest" },
    { id: "c2", image: "localhost/ubuntu-18.04:latest" },
    { id: "c1", image: "registry.local:5000/ubuntu-16.04" },
  ];
  assert.equal(findLatestContainer(containers, "ubuntu-18.04")?.id, "c2");
  assert.equal(findLatestContainer(containers, "ubuntu-16.04")?.id, "c1");
});

test("extract: copies /boot of the sanity container into the store", async () => {
  const { root, engine, extractor } = setup();
  try {
    const dir = await extractor.extract("ubuntu-18.04");

    assert.equal(dir, path.join(root, "kernels"));
    assert.deepEqual(fs.readdirSync(dir).sort(), [
      "initrd.img-4.15.0-20-generic",
      "vmlinuz-4.15.0-20-generic",
    ]);
    assert.deepEqual(
      engine.calls.map((call) => call.op),
      ["run", "ps", "cp", "rm"],
    );
    assert.deepEqual(engine.runs()[0].command, ["bash", "-c", "ls"]);
    assert.deepEqual(engine.runs()[0].options, {});
    assert.deepEqual(engine.calls[2], {
      op: "cp",
      containerId: "c1",
      srcPath: "/boot/.",
      destDir: dir,
    });
    assert.deepEqual(engine.containers, []);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("extract: repeated extraction only adds or overwrites files", async () => {
  const { root, engine, extractor } = setup();
  try {
    const dir = path.join(root, "kernels");
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "vmlinuz-3.13.0-24-generic"), "kept");

    await extractor.extract("ubuntu-18.04");
    const afterFirst = fs.readdirSync(dir).sort();

    engine.bootFiles.set("ubuntu-18.04", {
      "vmlinuz-4.15.0-22-generic": "kernel-22",
      "initrd.img-4.15.0-20-generic": "initrd-20-rebuilt",
    });
    await extractor.extract("ubuntu-18.04");

    const afterSecond = fs.readdirSync(dir);
    for (const name of afterFirst) {
      assert.ok(afterSecond.includes(name), `${name} was removed`);
    }
    assert.equal(fs.readFileSync(path.join(dir, "vmlinuz-3.13.0-24-generic"), "utf8"), "kept");
    assert.equal(
      fs.readFileSync(path.join(dir, "initrd.img-4.15.0-20-generic"), "utf8"),
      "initrd-20-rebuilt",
    );
    assert.equal(afterSecond.length, 4);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("extract: image that does not run short-circuits before copying", async () => {
  const { root, engine, extractor } = setup();
  try {
    await assert.rejects(() => extractor.extract("ubuntu-20.04"), ProcessError);
    assert.deepEqual(
      engine.calls.map((call) => call.op),
      ["run"],
    );
    assert.equal(fs.existsSync(path.join(root, "kernels")), false);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("extract: no container for the tag raises NotFoundError", async () => {
  const { root, engine, extractor } = setup();
  try {
    engine.keepNoContainers = true;
    engine.containers = [{ id: "other", image: "ubuntu-16.04:latest" }];

    await assert.rejects(
      () => extractor.extract("ubuntu-18.04"),
      (err: unknown) =>
        err instanceof NotFoundError &&
        err.message === "no container found for image ubuntu-18.04",
    );
    assert.equal(engine.calls.some((call) => call.op === "cp"), false);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("extract: a failed container removal is only logged", async () => {
  const { root, engine, extractor, lines } = setup();
  try {
    engine.failRemove = true;
    await extractor.extract("ubuntu-18.04");
    assert.match(lines.at(-1) ?? "", /^warning: failed to remove container c1: /);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

test("extract: the sanity container is removed when the copy fails", async () => {
  const { root, engine, extractor } = setup();
  try {
    engine.failCopy = true;

    await assert.rejects(() => extractor.extract("ubuntu-18.04"), ProcessError);
    assert.deepEqual(
      engine.calls.map((call) => call.op),
      ["run", "ps", "cp", "rm"],
    );
    assert.deepEqual(engine.containers, []);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
});
