import assert from "node:assert/strict";
import test from "node:test";
import { AssetRegistry } from "../asset-registry.js";
import { MemoryEventSink } from "../event-sink.js";
import { accountKey, assetIdKey, u128Value } from "../storage/codec.js";
import { StorageDoubleMap } from "../storage/maps.js";
import { MemoryKeyValueBackend } from "../storage/memory-backend.js";
import { MAX_U128 } from "../u128.js";

const utf8 = (value: string) => new TextEncoder().encode(value);

function createRegistry(maxAssetId?: bigint) {
  const backend = new MemoryKeyValueBackend();
  const sink = new MemoryEventSink();
  const registry = new AssetRegistry({ backend, sink, maxAssetId });
  return { backend, sink, registry };
}

function createAsset(registry: AssetRegistry, owner: string): bigint {
  const result = registry.create(owner);
  assert.ok(result.ok);
  return result.value;
}

test("create assigns sequential ids and records the caller as owner", () => {
  const { registry, sink } = createRegistry();
  assert.equal(createAsset(registry, "alice"), 0n);
  assert.equal(createAsset(registry, "bob"), 1n);

  assert.deepEqual(registry.asset(0n), { owner: "alice", supply: 0n });
  assert.deepEqual(registry.asset(1n), { owner: "bob", supply: 0n });
  assert.equal(registry.nonce(), 2n);
  assert.equal(registry.metadata(0n), undefined);
  assert.deepEqual(sink.events, [
    { registry: "assets", type: "Created", assetId: 0n, owner: "alice" },
    { registry: "assets", type: "Created", assetId: 1n, owner: "bob" },
  ]);
});

test("create at the id limit reissues the last id to the new owner", () => {
  const { registry } = createRegistry(1n);
  assert.equal(createAsset(registry, "alice"), 0n);
  assert.equal(createAsset(registry, "bob"), 1n);
  assert.equal(createAsset(registry, "carol"), 1n);
  assert.deepEqual(registry.asset(1n), { owner: "carol", supply: 0n });
  assert.equal(registry.nonce(), 1n);
});

test("set_metadata is reserved to the owner of an existing asset", () => {
  const { registry, sink } = createRegistry();
  const assetId = createAsset(registry, "alice");
  sink.clear();

  assert.deepEqual(registry.setMetadata("alice", 9n, utf8("Gold"), utf8("GLD")), {
    ok: false,
    error: "Unknown",
  });
  assert.deepEqual(registry.setMetadata("bob", assetId, utf8("Gold"), utf8("GLD")), {
    ok: false,
    error: "NoPermission",
  });
  assert.equal(registry.metadata(assetId), undefined);
  assert.equal(sink.events.length, 0);

  const first = registry.setMetadata("alice", assetId, utf8("Gold"), utf8("GLD"));
  assert.ok(first.ok);
  const second = registry.setMetadata("alice", assetId, utf8("Silver"), utf8("SLV"));
  assert.ok(second.ok);

  assert.deepEqual(registry.metadata(assetId), { name: utf8("Silver"), symbol: utf8("SLV") });
  assert.deepEqual(
    sink.events.map((event) => event.type),
    ["MetadataSet", "MetadataSet"],
  );
  assert.deepEqual(second.events, [
    {
      registry: "assets",
      type: "MetadataSet",
      assetId,
      name: utf8("Silver"),
      symbol: utf8("SLV"),
    },
  ]);
});

test("mint credits the recipient and grows supply", () => {
  const { registry } = createRegistry();
  const assetId = createAsset(registry, "alice");

  const result = registry.mint("alice", assetId, 100n, "bob");
  assert.ok(result.ok);
  assert.deepEqual(result.value, { assetId, totalSupply: 100n, minted: 100n });
  assert.deepEqual(result.events, [
    { registry: "assets", type: "Minted", assetId, owner: "bob", totalSupply: 100n },
  ]);
  assert.equal(registry.balanceOf(assetId, "bob"), 100n);
  assert.equal(registry.balanceOf(assetId, "alice"), 0n);
  assert.equal(registry.asset(assetId)?.supply, 100n);
});

test("mint requires the owner and an existing asset", () => {
  const { registry, sink } = createRegistry();
  const assetId = createAsset(registry, "alice");
  sink.clear();

  assert.deepEqual(registry.mint("bob", assetId, 5n, "bob"), { ok: false, error: "NoPermission" });
  assert.deepEqual(registry.mint("alice", 7n, 5n, "alice"), { ok: false, error: "Unknown" });
  assert.equal(registry.balanceOf(assetId, "bob"), 0n);
  assert.equal(registry.asset(assetId)?.supply, 0n);
  assert.equal(sink.events.length, 0);
});

test("mint credits only the supply growth that fits", () => {
  const { registry } = createRegistry();
  const assetId = createAsset(registry, "alice");

  const first = registry.mint("alice", assetId, MAX_U128 - 10n, "alice");
  assert.ok(first.ok);
  const second = registry.mint("alice", assetId, 25n, "bob");
  assert.ok(second.ok);
  assert.deepEqual(second.value, { assetId, totalSupply: MAX_U128, minted: 10n });
  assert.equal(registry.balanceOf(assetId, "bob"), 10n);

  const third = registry.mint("alice", assetId, 1n, "carol");
  assert.ok(third.ok);
  assert.equal(third.value.minted, 0n);
  assert.equal(registry.balanceOf(assetId, "carol"), 0n);
  assert.equal(registry.audit(assetId)?.consistent, true);
});

test("burn needs no ownership and clamps to the caller's balance", () => {
  const { registry } = createRegistry();
  const assetId = createAsset(registry, "alice");
  registry.mint("alice", assetId, 50n, "bob");

  const partial = registry.burn("bob", assetId, 20n);
  assert.ok(partial.ok);
  assert.deepEqual(partial.value, { assetId, totalSupply: 30n, burned: 20n });
  assert.deepEqual(partial.events, [
    { registry: "assets", type: "Burned", assetId, owner: "bob", totalSupply: 30n },
  ]);

  const over = registry.burn("bob", assetId, 1_000n);
  assert.ok(over.ok);
  assert.deepEqual(over.value, { assetId, totalSupply: 0n, burned: 30n });

  const nothing = registry.burn("carol", assetId, 5n);
  assert.ok(nothing.ok);
  assert.deepEqual(nothing.value, { assetId, totalSupply: 0n, burned: 0n });
  assert.deepEqual(registry.holders(assetId), [
    { account: "bob", balance: 0n },
    { account: "carol", balance: 0n },
  ]);
});

test("burn of an unknown asset is rejected", () => {
  const { registry } = createRegistry();
  assert.deepEqual(registry.burn("alice", 0n, 1n), { ok: false, error: "Unknown" });
});

test("burn saturates supply when it is already below the burned balance", () => {
  const { backend, registry } = createRegistry();
  const assetId = createAsset(registry, "alice");
  registry.mint("alice", assetId, 5n, "alice");

  // seed a holding the supply does not account for
  const accounts = new StorageDoubleMap(backend, "assets/account", assetIdKey, accountKey, u128Value, 0n);
  accounts.insert(assetId, "alice", 10n);

  const result = registry.burn("alice", assetId, 10n);
  assert.ok(result.ok);
  assert.deepEqual(result.value, { assetId, totalSupply: 0n, burned: 10n });
  assert.equal(registry.asset(assetId)?.supply, 0n);
});

test("transfer moves at most the sender's balance and reports both amounts", () => {
  const { registry } = createRegistry();
  const assetId = createAsset(registry, "alice");
  registry.mint("alice", assetId, 60n, "alice");

  const result = registry.transfer("alice", assetId, 100n, "bob");
  assert.ok(result.ok);
  assert.deepEqual(result.value, { assetId, transferred: 60n });
  assert.deepEqual(result.events, [
    {
      registry: "assets",
      type: "Transferred",
      assetId,
      from: "alice",
      to: "bob",
      amount: 60n,
      requested: 100n,
    },
  ]);
  assert.equal(registry.balanceOf(assetId, "alice"), 0n);
  assert.equal(registry.balanceOf(assetId, "bob"), 60n);
  assert.equal(registry.asset(assetId)?.supply, 60n);
});

test("transfer to self leaves the balance unchanged", () => {
  const { registry } = createRegistry();
  const assetId = createAsset(registry, "alice");
  registry.mint("alice", assetId, 8n, "alice");

  const result = registry.transfer("alice", assetId, 5n, "alice");
  assert.ok(result.ok);
  assert.equal(result.value.transferred, 5n);
  assert.equal(registry.balanceOf(assetId, "alice"), 8n);
});

test("transfer of an unknown asset is rejected without writes", () => {
  const { registry, sink } = createRegistry();
  assert.deepEqual(registry.transfer("alice", 3n, 1n, "bob"), { ok: false, error: "Unknown" });
  assert.deepEqual(registry.holders(3n), []);
  assert.equal(sink.events.length, 0);
});

test("negative amounts are refused before anything runs", () => {
  const { registry } = createRegistry();
  const assetId = createAsset(registry, "alice");
  assert.throws(() => registry.mint("alice", assetId, -1n, "alice"), RangeError);
  assert.throws(() => registry.transfer("alice", -1n, 1n, "bob"), RangeError);
});

test("sellable view moves holdings as the seller", () => {
  const { registry, sink } = createRegistry();
  const assetId = createAsset(registry, "alice");
  registry.mint("alice", assetId, 10n, "alice");
  sink.clear();

  const market = registry.sellable();
  assert.equal(market.amountOwned(assetId, "alice"), 10n);
  assert.equal(market.transfer(assetId, "alice", "bob", 4n), 4n);
  assert.equal(market.transfer(assetId, "alice", "bob", 40n), 6n);
  assert.equal(market.transfer(99n, "alice", "bob", 1n), 0n);
  assert.equal(market.amountOwned(assetId, "bob"), 10n);
  assert.equal(sink.events.length, 2);
});
