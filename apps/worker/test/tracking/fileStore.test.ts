import { access, readFile, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { FatalStoreError, StaleWriteError, StoreCorruptError, serializeWorkItem } from "@shortloop/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { JsonFileTrackingStore } from "../../src/tracking/fileStore";
import { makeItem, makeSegments, makeTempDir, removeTempDir, seedTrackingFile, silenceLogs } from "../helpers";

describe("JsonFileTrackingStore", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    silenceLogs();
    dir = await makeTempDir();
    path = join(dir, "tracking.json");
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it("loads an empty snapshot when the file does not exist yet", async () => {
    const snapshot = await new JsonFileTrackingStore({ path }).load();
    expect(snapshot.items.size).toBe(0);
    expect(snapshot.ledger).toEqual({ current: null, history: [] });
    expect(snapshot.corrupt).toEqual([]);
  });

  it("does not create the file when nothing was staged", async () => {
    const store = new JsonFileTrackingStore({ path });
    await store.load();
    await store.commit();
    await expect(access(path)).rejects.toThrow();
  });

  it("persists a new item with version 1 and reads it back unchanged", async () => {
    const store = new JsonFileTrackingStore({ path });
    await store.load();

    const item = makeItem({
      id: "abc",
      status: "Transformed",
      sourceArtifactRef: "/work/downloads/abc.mp4",
      segments: makeSegments(3),
      publishedRefs: { 1: "yt-1", 2: "yt-2" },
      version: 0,
    });
    const staged = await store.upsert(item);
    expect(staged.version).toBe(1);
    await store.commit();

    const snapshot = await new JsonFileTrackingStore({ path }).load();
    expect(snapshot.items.get("abc")).toEqual({ ...item, version: 1 });
  });

  it("rejects an upsert of a record another store has advanced", async () => {
    await seedTrackingFile(path, [makeItem({ id: "abc" })]);
    const first = new JsonFileTrackingStore({ path });
    const second = new JsonFileTrackingStore({ path });
    const loaded = (await first.load()).items.get("abc");
    await second.load();
    expect(loaded).toBeDefined();
    if (!loaded) return;

    await second.upsert({ ...loaded, priority: 10 });
    await second.commit();

    const error = await first.upsert({ ...loaded, priority: 20 }).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(StaleWriteError);
    if (error instanceof StaleWriteError) {
      expect(error.itemId).toBe("abc");
      expect(error.expectedVersion).toBe(1);
      expect(error.actualVersion).toBe(2);
    }
  });

  it("rejects the commit when the record changed after upsert, keeping the ledger consumption", async () => {
    await seedTrackingFile(path, [makeItem({ id: "abc" })]);
    const first = new JsonFileTrackingStore({ path });
    const second = new JsonFileTrackingStore({ path });
    const loaded = (await first.load()).items.get("abc");
    await second.load();
    if (!loaded) throw new Error("seeded item missing");

    await first.upsert({ ...loaded, priority: 20 });
    first.stageLedger({ current: { date: "2026-03-02", consumedUnits: 1600, dailyBudget: 10_000 }, history: [] });

    await second.upsert({ ...loaded, priority: 10 });
    await second.commit();

    await expect(first.commit()).rejects.toBeInstanceOf(StaleWriteError);

    const snapshot = await new JsonFileTrackingStore({ path }).load();
    expect(snapshot.items.get("abc")?.priority).toBe(10);
    expect(snapshot.items.get("abc")?.version).toBe(2);
    expect(snapshot.ledger.current).toEqual({ date: "2026-03-02", consumedUnits: 1600, dailyBudget: 10_000 });
  });

  it("keeps consumption recorded by an overlapping store", async () => {
    const first = new JsonFileTrackingStore({ path });
    const second = new JsonFileTrackingStore({ path });
    await first.load();
    await second.load();

    first.stageLedger({ current: { date: "2026-03-02", consumedUnits: 1600, dailyBudget: 10_000 }, history: [] });
    await first.commit();
    second.stageLedger({ current: { date: "2026-03-02", consumedUnits: 3200, dailyBudget: 10_000 }, history: [] });
    await second.commit();

    const snapshot = await new JsonFileTrackingStore({ path }).load();
    expect(snapshot.ledger.current?.consumedUnits).toBe(4800);
  });

  it("reports an unreadable record without dropping it or the others", async () => {
    const good = makeItem({ id: "good" });
    const badRecord = { id: "bad", status: "Uploaded" };
    await writeFile(
      path,
      JSON.stringify({ schemaVersion: 1, items: { good: serializeWorkItem(good), bad: badRecord }, quotaLedger: null }),
      "utf8",
    );

    const store = new JsonFileTrackingStore({ path });
    const snapshot = await store.load();
    expect([...snapshot.items.keys()]).toEqual(["good"]);
    expect(snapshot.corrupt.map((record) => record.id)).toEqual(["bad"]);

    await store.upsert({ ...good, priority: 5 });
    await store.commit();

    const onDisk: unknown = JSON.parse(await readFile(path, "utf8"));
    expect(onDisk).toMatchObject({ items: { bad: badRecord, good: { priority: 5, version: 2 } } });

    const error = await store.upsert(makeItem({ id: "bad" })).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(StoreCorruptError);
    if (error instanceof StoreCorruptError) {
      expect(error.itemId).toBe("bad");
    }
  });

  it("fails the whole load when the file is not JSON", async () => {
    await writeFile(path, "{ not json", "utf8");
    const error = await new JsonFileTrackingStore({ path }).load().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(StoreCorruptError);
    if (error instanceof StoreCorruptError) {
      expect(error.itemId).toBeUndefined();
    }
  });

  it("takes over a lock left behind by a crashed process", async () => {
    const lockPath = `${path}.lock`;
    await writeFile(lockPath, "99999\n", "utf8");
    const past = new Date(Date.now() - 5 * 60 * 1000);
    await utimes(lockPath, past, past);

    const store = new JsonFileTrackingStore({ path, staleLockMs: 1000 });
    await store.load();
    await store.upsert(makeItem({ id: "abc", version: 0 }));
    await store.commit();

    await expect(access(lockPath)).rejects.toThrow();
    expect((await new JsonFileTrackingStore({ path }).load()).items.has("abc")).toBe(true);
  });

  it("gives up when a live lock is held too long", async () => {
    await writeFile(`${path}.lock`, "99999\n", "utf8");

    const store = new JsonFileTrackingStore({ path, lockTimeoutMs: 120 });
    await store.load();
    await store.upsert(makeItem({ id: "abc", version: 0 }));

    await expect(store.commit()).rejects.toBeInstanceOf(FatalStoreError);
  });
});
