import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import fc from "fast-check";
import { MemoryEventSink, type EventSink } from "../event-sink.js";
import { createLedger, type Ledger } from "../ledger.js";
import { MemoryKeyValueBackend } from "../storage/memory-backend.js";
import { SqliteKeyValueBackend } from "../storage/sqlite-backend.js";
import type { LedgerEvent } from "../types.js";
import { MAX_U128 } from "../u128.js";

const ACCOUNTS = ["alice", "bob", "carol", "dave"] as const;

type Account = (typeof ACCOUNTS)[number];

type Step =
  | { kind: "create"; caller: Account }
  | { kind: "mint"; caller: Account; assetId: bigint; amount: bigint; to: Account }
  | { kind: "burn"; caller: Account; assetId: bigint; amount: bigint }
  | { kind: "transfer"; caller: Account; assetId: bigint; amount: bigint; to: Account }
  | { kind: "setMetadata"; caller: Account; assetId: bigint; name: Uint8Array }
  | { kind: "uniqueMint"; caller: Account; metadata: Uint8Array; supply: bigint }
  | { kind: "uniqueBurn"; caller: Account; assetId: bigint; amount: bigint }
  | { kind: "uniqueTransfer"; caller: Account; assetId: bigint; amount: bigint; to: Account };

const account = fc.constantFrom(...ACCOUNTS);
// small amounts interact with each other, full-range ones reach saturation
const amount = fc.oneof(fc.bigInt({ min: 0n, max: 200n }), fc.bigInt({ min: 0n, max: MAX_U128 }));
const assetId = fc.bigInt({ min: 0n, max: 6n });
const bytes = fc.uint8Array({ maxLength: 8 });

const step: fc.Arbitrary<Step> = fc.oneof(
  fc.record({ kind: fc.constant("create" as const), caller: account }),
  fc.record({ kind: fc.constant("mint" as const), caller: account, assetId, amount, to: account }),
  fc.record({ kind: fc.constant("burn" as const), caller: account, assetId, amount }),
  fc.record({ kind: fc.constant("transfer" as const), caller: account, assetId, amount, to: account }),
  fc.record({ kind: fc.constant("setMetadata" as const), caller: account, assetId, name: bytes }),
  fc.record({ kind: fc.constant("uniqueMint" as const), caller: account, metadata: bytes, supply: amount }),
  fc.record({ kind: fc.constant("uniqueBurn" as const), caller: account, assetId, amount }),
  fc.record({
    kind: fc.constant("uniqueTransfer" as const),
    caller: account,
    assetId,
    amount,
    to: account,
  }),
);

function assertConsistent(ledger: Ledger) {
  for (let id = 0n; id < ledger.assets.nonce(); id += 1n) {
    const audit = ledger.assets.audit(id);
    assert.ok(audit);
    assert.equal(audit.holdings, audit.supply, `asset ${id} supply drifted`);
  }
  for (let id = 0n; id < ledger.uniques.nonce(); id += 1n) {
    const audit = ledger.uniques.audit(id);
    assert.ok(audit);
    assert.equal(audit.holdings, audit.supply, `unique asset ${id} supply drifted`);
  }
}

class ToggleSink implements EventSink {
  readonly events: LedgerEvent[] = [];
  failing = false;

  deposit(event: LedgerEvent): void {
    if (this.failing) throw new Error("event log unavailable");
    this.events.push(event);
  }
}

function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "token-ledger-invariants-"));
  return {
    dir,
    dbPath: join(dir, "ledger.db"),
  };
}

test("scenario: create, mint, transfer and burn a fungible asset", () => {
  const ledger = createLedger({ backend: new MemoryKeyValueBackend(), sink: new MemoryEventSink() });
  const { assets } = ledger;

  const created = assets.create("alice");
  assert.ok(created.ok);
  assert.equal(created.value, 0n);

  assert.ok(assets.mint("alice", 0n, 100n, "alice").ok);
  assert.equal(assets.asset(0n)?.supply, 100n);
  assert.equal(assets.balanceOf(0n, "alice"), 100n);

  assert.ok(assets.transfer("alice", 0n, 40n, "bob").ok);
  assert.equal(assets.balanceOf(0n, "alice"), 60n);
  assert.equal(assets.balanceOf(0n, "bob"), 40n);

  assert.ok(assets.burn("alice", 0n, 30n).ok);
  assert.equal(assets.balanceOf(0n, "alice"), 30n);
  assert.equal(assets.asset(0n)?.supply, 70n);
  assertConsistent(ledger);
});

test("scenario: two creators mint unique assets with separate balances", () => {
  const ledger = createLedger({ backend: new MemoryKeyValueBackend(), sink: new MemoryEventSink() });
  const { uniques } = ledger;

  const first = uniques.mint("carol", new Uint8Array([1]), 10n);
  assert.ok(first.ok);
  assert.equal(first.value.assetId, 0n);
  assert.equal(uniques.balanceOf(0n, "carol"), 10n);
  assert.equal(uniques.asset(0n)?.supply, 10n);

  const second = uniques.mint("dave", new Uint8Array([2]), 5n);
  assert.ok(second.ok);
  assert.equal(second.value.assetId, 1n);

  const moved = uniques.transfer("dave", 1n, 2n, "carol");
  assert.ok(moved.ok);
  assert.equal(uniques.balanceOf(1n, "dave"), 3n);
  assert.equal(uniques.balanceOf(1n, "carol"), 2n);
  assert.equal(uniques.balanceOf(0n, "carol"), 10n);
  assertConsistent(ledger);
});

test("both registries share a backend without colliding", () => {
  const ledger = createLedger({ backend: new MemoryKeyValueBackend(), sink: new MemoryEventSink() });
  assert.ok(ledger.assets.create("alice").ok);
  assert.ok(ledger.assets.mint("alice", 0n, 7n, "alice").ok);
  assert.ok(ledger.uniques.mint("alice", new Uint8Array(), 3n).ok);

  assert.equal(ledger.assets.balanceOf(0n, "alice"), 7n);
  assert.equal(ledger.uniques.balanceOf(0n, "alice"), 3n);
});

test("random command sequences keep supply equal to the sum of balances", () => {
  fc.assert(
    fc.property(fc.array(step, { maxLength: 60 }), (steps) => {
      const ledger = createLedger({ backend: new MemoryKeyValueBackend(), sink: new MemoryEventSink() });
      const { assets, uniques } = ledger;
      let lastAssetId = -1n;
      let lastUniqueId = -1n;

      for (const current of steps) {
        switch (current.kind) {
          case "create": {
            const created = assets.create(current.caller);
            assert.ok(created.ok);
            assert.ok(created.value > lastAssetId);
            lastAssetId = created.value;
            break;
          }
          case "mint": {
            const before = assets.asset(current.assetId)?.supply ?? 0n;
            const result = assets.mint(current.caller, current.assetId, current.amount, current.to);
            if (result.ok) {
              assert.ok(result.value.minted <= current.amount);
              assert.equal(result.value.totalSupply, before + result.value.minted);
            }
            break;
          }
          case "burn": {
            const held = assets.balanceOf(current.assetId, current.caller);
            const result = assets.burn(current.caller, current.assetId, current.amount);
            if (result.ok) {
              assert.equal(result.value.burned, current.amount < held ? current.amount : held);
            }
            break;
          }
          case "transfer": {
            const { caller, to } = current;
            const held = assets.balanceOf(current.assetId, caller);
            const pair = held + (to === caller ? 0n : assets.balanceOf(current.assetId, to));
            const result = assets.transfer(caller, current.assetId, current.amount, to);
            if (result.ok) {
              assert.equal(result.value.transferred, current.amount < held ? current.amount : held);
              const after =
                assets.balanceOf(current.assetId, caller) +
                (to === caller ? 0n : assets.balanceOf(current.assetId, to));
              assert.equal(after, pair);
            }
            break;
          }
          case "setMetadata":
            assets.setMetadata(current.caller, current.assetId, current.name, current.name);
            break;
          case "uniqueMint": {
            const minted = uniques.mint(current.caller, current.metadata, current.supply);
            if (minted.ok) {
              assert.ok(minted.value.assetId > lastUniqueId);
              lastUniqueId = minted.value.assetId;
            } else {
              assert.equal(current.supply, 0n);
              assert.equal(minted.error, "NoSupply");
            }
            break;
          }
          case "uniqueBurn":
            uniques.burn(current.caller, current.assetId, current.amount);
            break;
          case "uniqueTransfer":
            uniques.transfer(current.caller, current.assetId, current.amount, current.to);
            break;
        }
        assertConsistent(ledger);
      }
    }),
    { numRuns: 100 },
  );
});

test("a sink failure rolls the whole command back", () => {
  const temp = createTempDbPath();
  const backend = new SqliteKeyValueBackend(temp.dbPath);
  const sink = new ToggleSink();
  try {
    const ledger = createLedger({ backend, sink });
    assert.ok(ledger.assets.create("alice").ok);
    assert.ok(ledger.assets.mint("alice", 0n, 10n, "alice").ok);

    sink.failing = true;
    assert.throws(() => ledger.assets.transfer("alice", 0n, 4n, "bob"), /event log unavailable/);
    assert.throws(() => ledger.uniques.mint("carol", new Uint8Array([1]), 5n), /event log unavailable/);
    assert.equal(ledger.assets.balanceOf(0n, "alice"), 10n);
    assert.equal(ledger.assets.balanceOf(0n, "bob"), 0n);
    assert.equal(ledger.uniques.nonce(), 0n);
    assert.equal(sink.events.length, 2);

    sink.failing = false;
    const retried = ledger.assets.transfer("alice", 0n, 4n, "bob");
    assert.ok(retried.ok);
    assert.equal(ledger.assets.balanceOf(0n, "alice"), 6n);
    assert.equal(ledger.assets.balanceOf(0n, "bob"), 4n);
  } finally {
    backend.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("namespaced ledgers share a backend without seeing each other", () => {
  const backend = new MemoryKeyValueBackend();
  const left = createLedger({ backend, sink: new MemoryEventSink(), namespace: "left" });
  const right = createLedger({ backend, sink: new MemoryEventSink(), namespace: "right" });

  assert.ok(left.assets.create("alice").ok);
  assert.ok(left.assets.mint("alice", 0n, 5n, "alice").ok);
  const created = right.assets.create("bob");
  assert.ok(created.ok);
  assert.equal(created.value, 0n);

  assert.deepEqual(right.assets.asset(0n), { owner: "bob", supply: 0n });
  assert.equal(right.assets.balanceOf(0n, "alice"), 0n);
  assert.equal(left.assets.balanceOf(0n, "alice"), 5n);
  assert.equal(left.uniques.nonce(), 0n);
});

test("a rejected command leaves the sqlite store and the sink untouched", () => {
  const temp = createTempDbPath();
  const backend = new SqliteKeyValueBackend(temp.dbPath);
  const sink = new MemoryEventSink();
  try {
    const ledger = createLedger({ backend, sink });
    assert.ok(ledger.assets.create("alice").ok);
    assert.ok(ledger.assets.mint("alice", 0n, 10n, "alice").ok);
    sink.clear();

    assert.deepEqual(ledger.assets.mint("mallory", 0n, 10n, "mallory"), {
      ok: false,
      error: "NoPermission",
    });
    assert.deepEqual(ledger.uniques.mint("alice", new Uint8Array(), 0n), {
      ok: false,
      error: "NoSupply",
    });
    assert.equal(sink.events.length, 0);
    assert.equal(ledger.assets.asset(0n)?.supply, 10n);
    assert.deepEqual(ledger.assets.holders(0n), [{ account: "alice", balance: 10n }]);
    assert.equal(ledger.uniques.nonce(), 0n);
  } finally {
    backend.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("state written through sqlite survives a reopen", () => {
  const temp = createTempDbPath();
  try {
    const firstBackend = new SqliteKeyValueBackend(temp.dbPath);
    const first = createLedger({ backend: firstBackend, sink: new MemoryEventSink() });
    first.assets.create("alice");
    first.assets.mint("alice", 0n, 12n, "bob");
    first.uniques.mint("carol", new Uint8Array([7]), 3n);
    firstBackend.close();

    const secondBackend = new SqliteKeyValueBackend(temp.dbPath);
    const second = createLedger({ backend: secondBackend, sink: new MemoryEventSink() });
    assert.equal(second.assets.nonce(), 1n);
    assert.equal(second.assets.balanceOf(0n, "bob"), 12n);
    assert.deepEqual(second.uniques.asset(0n), {
      creator: "carol",
      metadata: new Uint8Array([7]),
      supply: 3n,
    });
    const created = second.assets.create("dave");
    assert.ok(created.ok);
    assert.equal(created.value, 1n);
    secondBackend.close();
  } finally {
    rmSync(temp.dir, { recursive: true, force: true });
  }
});
