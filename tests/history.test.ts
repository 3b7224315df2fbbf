import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StorageError } from "../src/lib/errors.ts";
import { formatHistoryDate, HistoryStore } from "../src/lib/historyStore.ts";

let tempDir = "";

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pagewright-history-test-"));
});

afterEach(async () => {
  await fs.rm(tempDir, { recursive: true, force: true });
});

describe("HistoryStore", () => {
  it("creates an empty history file on open", async () => {
    const file = path.join(tempDir, "history", "hello.json");
    const history = await HistoryStore.open(file, "hello");

    expect(history.size).toBe(0);
    expect(history.latest()).toBeUndefined();
    expect(await fs.readFile(file, "utf8")).toBe("{}\n");
  });

  it("keeps keys strictly increasing within the same instant", async () => {
    const file = path.join(tempDir, "hello.json");
    const history = await HistoryStore.open(file, "hello");
    const now = new Date(1700000000000);

    const first = await history.append("alice", "v1", now);
    const second = await history.append("bob", "v2", now);

    expect(first).toBe("1700000000.000000");
    expect(second).toBe("1700000000.000001");
    expect(history.entryKeys()).toEqual([second, first]);
    expect(history.latest()).toMatchObject({ user: "bob", version: "v2" });
  });

  it("persists every entry", async () => {
    const file = path.join(tempDir, "hello.json");
    const history = await HistoryStore.open(file, "hello");
    await history.append("alice", "v1", new Date(1700000000000));
    await history.append("alice", "v2", new Date(1700000005000));

    const reopened = await HistoryStore.open(file, "hello");
    expect(reopened.size).toBe(2);
    expect(reopened.get("1700000005.000000")?.version).toBe("v2");

    const raw: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(Object.keys(raw ?? {})).toEqual(["1700000000.000000", "1700000005.000000"]);
  });

  it("rejects a corrupt history file", async () => {
    const file = path.join(tempDir, "broken.json");
    await fs.writeFile(file, "not json", "utf8");
    await expect(HistoryStore.open(file, "broken")).rejects.toBeInstanceOf(StorageError);
  });

  it("rejects entries with the wrong shape", async () => {
    const file = path.join(tempDir, "odd.json");
    await fs.writeFile(file, JSON.stringify({ "1.000000": { user: "alice" } }), "utf8");
    await expect(HistoryStore.open(file, "odd")).rejects.toThrow("Invalid history entry 1.000000");
  });
});

describe("formatHistoryDate", () => {
  it("uses the month day, year at time layout", () => {
    expect(formatHistoryDate(new Date(2026, 9, 18, 15, 4, 5))).toBe("Oct 18, 2026 at 03:04:05 PM");
  });
});
