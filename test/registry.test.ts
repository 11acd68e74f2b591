import assert from "node:assert/strict";
import test from "node:test";

import { PersistenceError } from "../src/errors";
import { NetworkEntry } from "../src/network";
import { AccessRegistry } from "../src/registry";
import { MemoryAllowListStore, MemoryLogger } from "./helpers";

async function listed(registry: AccessRegistry): Promise<string[]> {
  return (await registry.listNetworks()).map((entry) => entry.toString());
}

test("registry adds a network once and persists the full list", async () => {
  const store = new MemoryAllowListStore();
  const registry = new AccessRegistry(store);

  assert.equal(await registry.addNetwork("10.0.0.0/24"), "added");
  assert.equal(await registry.addNetwork("192.168.1.7"), "added");
  assert.deepEqual(await listed(registry), ["10.0.0.0/24", "192.168.1.7/32"]);
  assert.deepEqual(store.saved, ["10.0.0.0/24", "192.168.1.7/32"]);
  assert.equal(store.saves, 2);
});

test("registry reports duplicates by canonical form without saving", async () => {
  const store = new MemoryAllowListStore();
  const registry = new AccessRegistry(store);

  assert.equal(await registry.addNetwork("10.0.0.0/24"), "added");
  assert.equal(await registry.addNetwork("10.0.0.99/24"), "already-present");
  assert.deepEqual(await listed(registry), ["10.0.0.0/24"]);
  assert.equal(store.saves, 1);
});

test("registry rejects malformed networks without touching state", async () => {
  const store = new MemoryAllowListStore();
  const registry = new AccessRegistry(store);

  assert.equal(await registry.addNetwork("10.0.0.0/40"), "invalid-format");
  assert.equal(await registry.removeNetwork("not-an-ip"), "invalid-format");
  assert.deepEqual(await listed(registry), []);
  assert.equal(store.saves, 0);
});

test("registry removes networks and reports unknown ones", async () => {
  const store = new MemoryAllowListStore();
  const registry = new AccessRegistry(store);
  await registry.addNetwork("10.0.0.0/24");
  await registry.addNetwork("172.16.0.0/12");

  assert.equal(await registry.removeNetwork("10.0.0.0/25"), "not-found");
  assert.equal(await registry.removeNetwork("10.0.0.1/24"), "removed");
  assert.deepEqual(await listed(registry), ["172.16.0.0/12"]);
  assert.deepEqual(store.saved, ["172.16.0.0/12"]);
  assert.equal(await registry.removeNetwork("10.0.0.0/24"), "not-found");
});

test("registry membership follows prefix containment", async () => {
  const registry = new AccessRegistry(new MemoryAllowListStore());
  await registry.addNetwork("10.0.0.0/24");
  await registry.addNetwork("2001:db8::/32");

  assert.equal(await registry.checkAllowed("10.0.0.5"), true);
  assert.equal(await registry.checkAllowed("::ffff:10.0.0.5"), true);
  assert.equal(await registry.checkAllowed("192.168.1.1"), false);
  assert.equal(await registry.checkAllowed("2001:db8::42"), true);
  assert.equal(await registry.checkAllowed("garbage"), false);

  await registry.removeNetwork("10.0.0.0/24");
  assert.equal(await registry.checkAllowed("10.0.0.5"), false);
});

test("registry membership does not depend on entry order", async () => {
  const forward = new AccessRegistry(new MemoryAllowListStore());
  const backward = new AccessRegistry(new MemoryAllowListStore());
  const networks = ["10.0.0.0/8", "10.1.0.0/16", "192.168.0.0/24"];
  for (const network of networks) {
    await forward.addNetwork(network);
  }
  for (const network of [...networks].reverse()) {
    await backward.addNetwork(network);
  }
  for (const ip of ["10.1.2.3", "10.200.0.1", "192.168.0.9", "192.168.1.9"]) {
    assert.equal(
      await forward.checkAllowed(ip),
      await backward.checkAllowed(ip),
      ip
    );
  }
});

test("registry serializes concurrent mutations", async () => {
  const store = new MemoryAllowListStore();
  const registry = new AccessRegistry(store);

  const adds = await Promise.all([
    registry.addNetwork("10.0.0.0/24"),
    registry.addNetwork("10.0.0.7/24"),
    registry.addNetwork("10.0.0.0/24"),
    registry.checkAllowed("10.0.0.1"),
    registry.addNetwork("10.0.1.0/24"),
  ]);
  assert.deepEqual(adds, [
    "added",
    "already-present",
    "already-present",
    true,
    "added",
  ]);

  const removes = await Promise.all([
    registry.removeNetwork("10.0.0.0/24"),
    registry.removeNetwork("10.0.0.0/24"),
    registry.addNetwork("10.0.2.0/24"),
  ]);
  assert.deepEqual(removes, ["removed", "not-found", "added"]);
  assert.deepEqual(await listed(registry), ["10.0.1.0/24", "10.0.2.0/24"]);
  assert.deepEqual(store.saved, ["10.0.1.0/24", "10.0.2.0/24"]);
});

test("registry keeps the mutation but throws when saving fails", async () => {
  const store = new MemoryAllowListStore();
  const registry = new AccessRegistry(store);
  store.failWith = new Error("disk full");

  await assert.rejects(registry.addNetwork("10.0.0.0/24"), (err) => {
    assert.ok(err instanceof PersistenceError);
    assert.equal(err.message, "cannot write memory: disk full");
    return true;
  });
  assert.deepEqual(await listed(registry), ["10.0.0.0/24"]);
  assert.deepEqual(store.saved, []);

  // the lock is released after a failure
  store.failWith = undefined;
  assert.equal(await registry.addNetwork("10.0.1.0/24"), "added");
  assert.deepEqual(store.saved, ["10.0.0.0/24", "10.0.1.0/24"]);
});

test("registry load reproduces the stored membership", async () => {
  const logger = new MemoryLogger();
  const store = new MemoryAllowListStore();
  const original = new AccessRegistry(store);
  await original.addNetwork("10.0.0.0/24");
  await original.addNetwork("2001:db8::/48");
  await original.addNetwork("192.168.1.1");

  store.saved = [...store.saved].reverse();
  const reloaded = await AccessRegistry.load(store, logger);
  assert.deepEqual(
    (await listed(reloaded)).sort(),
    (await listed(original)).sort()
  );
  assert.deepEqual(logger.lines, []);
});

test("registry load canonicalizes and drops duplicate entries", async () => {
  const store = new MemoryAllowListStore(["10.0.0.9/24", "10.0.0.0/24", "::1"]);
  const registry = await AccessRegistry.load(store, new MemoryLogger());
  assert.deepEqual(await listed(registry), ["10.0.0.0/24", "::1/128"]);
});

test("registry load discards a list holding an invalid entry", async () => {
  const logger = new MemoryLogger();
  const store = new MemoryAllowListStore(["10.0.0.0/24", "10.0.0.0/99"]);
  const registry = await AccessRegistry.load(store, logger);
  assert.deepEqual(await listed(registry), []);
  assert.deepEqual(logger.lines, [
    'Error loading allowed IPs: invalid network "10.0.0.0/99"',
  ]);
});

test("registry constructor deduplicates initial entries", async () => {
  const parsed = ["10.0.0.0/24", "10.0.0.1/24"].map((text) => {
    const entry = NetworkEntry.parse(text);
    assert.ok(entry);
    return entry;
  });
  const registry = new AccessRegistry(new MemoryAllowListStore(), parsed);
  assert.deepEqual(await listed(registry), ["10.0.0.0/24"]);
});
