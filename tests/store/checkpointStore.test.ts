import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSilentLogger } from "../../src/observability";
import { CheckpointStore } from "../../src/store";
import { makeTempDir } from "../helpers/fakeTransport";

describe("CheckpointStore", () => {
  let dir: string;
  let filePath: string;
  let clock: Date;

  beforeEach(() => {
    dir = makeTempDir("checkpoint");
    filePath = path.join(dir, ".state.json");
    clock = new Date("2025-01-01T00:00:00.000Z");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createStore(): CheckpointStore {
    return new CheckpointStore(filePath, createSilentLogger(), () => clock);
  }

  it("starts empty when no file exists", () => {
    const store = createStore();

    expect(store.load()).toBe(false);
    expect(store.isCompleted("/akn/fi/act/statute/2024/1/fin@")).toBe(false);
    expect(store.resumePageFor("act", "statute")).toBe(1);
  });

  it("tracks completed identifiers and the last one", () => {
    const store = createStore();

    store.markCompleted("/akn/fi/act/statute/2024/1/fin@");

    expect(store.isCompleted("/akn/fi/act/statute/2024/1/fin@")).toBe(true);
    expect(store.isCompleted("/akn/fi/act/statute/2024/2/fin@")).toBe(false);
    expect(store.snapshot().lastUri).toBe("/akn/fi/act/statute/2024/1/fin@");
  });

  it("persists every mutation and reloads it", () => {
    const store = createStore();
    store.startSession("act", "statute");
    store.setPage(4);
    store.markCompleted("/akn/fi/act/statute/2024/2/fin@");
    store.markCompleted("/akn/fi/act/statute/2024/1/fin@");

    const reloaded = createStore();

    expect(reloaded.load()).toBe(true);
    expect(reloaded.isCompleted("/akn/fi/act/statute/2024/1/fin@")).toBe(true);
    expect(reloaded.isCompleted("/akn/fi/act/statute/2024/2/fin@")).toBe(true);
    expect(reloaded.resumePageFor("act", "statute")).toBe(4);
  });

  it("writes the whole state with timestamps", () => {
    const store = createStore();
    store.startSession("act", "statute");
    clock = new Date("2025-01-01T00:05:00.000Z");
    store.markCompleted("/b");
    store.markCompleted("/a");

    const written = JSON.parse(fs.readFileSync(filePath, "utf-8"));

    expect(written).toEqual({
      activeCategory: "act",
      activeDocumentType: "statute",
      currentPage: 1,
      lastUri: "/a",
      completedUris: expect.arrayContaining(["/a", "/b"]),
      startedAt: "2025-01-01T00:00:00.000Z",
      updatedAt: "2025-01-01T00:05:00.000Z",
    });
  });

  it("resumes the stored page only for the same pair", () => {
    const store = createStore();
    store.startSession("act", "statute");
    store.setPage(7);

    expect(store.resumePageFor("act", "statute")).toBe(7);
    expect(store.resumePageFor("act", "statute-consolidated")).toBe(1);
    expect(store.resumePageFor("judgment", "statute")).toBe(1);
  });

  it("keeps the first session start time", () => {
    const store = createStore();
    store.startSession("act", "statute");
    clock = new Date("2025-01-02T00:00:00.000Z");
    store.startSession("judgment", "kko");

    const snapshot = store.snapshot();
    expect(snapshot.startedAt).toBe("2025-01-01T00:00:00.000Z");
    expect(snapshot.activeCategory).toBe("judgment");
    expect(snapshot.activeDocumentType).toBe("kko");
  });

  it("deletes the file on reset", () => {
    const store = createStore();
    store.markCompleted("/akn/fi/act/statute/2024/1/fin@");
    expect(fs.existsSync(filePath)).toBe(true);

    store.reset();

    expect(fs.existsSync(filePath)).toBe(false);
    expect(store.isCompleted("/akn/fi/act/statute/2024/1/fin@")).toBe(false);
    expect(createStore().load()).toBe(false);
  });

  it("falls back to an empty state on a corrupt file", () => {
    fs.writeFileSync(filePath, "{ not json");
    const store = createStore();

    expect(store.load()).toBe(false);
    expect(store.snapshot().completedUris.size).toBe(0);
    expect(store.snapshot().currentPage).toBe(1);
  });

  it("falls back to an empty state on a file with the wrong shape", () => {
    fs.writeFileSync(filePath, JSON.stringify({ completedUris: "nope" }));

    expect(createStore().load()).toBe(false);
  });

  it("accepts a file with null fields", () => {
    fs.writeFileSync(
      filePath,
      JSON.stringify({ activeCategory: null, activeDocumentType: null, currentPage: 2, completedUris: ["/x"] }),
    );
    const store = createStore();

    expect(store.load()).toBe(true);
    expect(store.isCompleted("/x")).toBe(true);
    expect(store.resumePageFor("act", "statute")).toBe(1);
  });

  it("returns a snapshot detached from the store", () => {
    const store = createStore();
    store.markCompleted("/x");

    const snapshot = store.snapshot();
    store.markCompleted("/y");

    expect(snapshot.completedUris.size).toBe(1);
  });
});
