import { readdir } from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StorageFailureError, ValidationError } from "../errors/app-error";
import { createTestStore, type TestStore } from "../testing/test-app";
import { UploadService, generateStorageName } from "./upload.service";

const UUID_NAME = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}/;

describe("generateStorageName", () => {
  it("is a v4 uuid plus the lower-cased extension", () => {
    const name = generateStorageName("Holiday.PNG");

    expect(name).toMatch(UUID_NAME);
    expect(name.endsWith(".png")).toBe(true);
    expect(name).toHaveLength(40);
  });

  it("ignores the client's base name", () => {
    const name = generateStorageName("../../etc/passwd");

    expect(name).toMatch(UUID_NAME);
    expect(name).toHaveLength(36);
  });

  it("does not repeat", () => {
    const names = new Set(Array.from({ length: 50 }, () => generateStorageName("a.mp3")));
    expect(names.size).toBe(50);
  });
});

describe("UploadService", () => {
  let store: TestStore;
  let service: UploadService;

  const file = (content: string, originalName = "talk.mp3") => ({
    originalName,
    buffer: Buffer.from(content),
    size: Buffer.byteLength(content),
  });

  beforeEach(async () => {
    store = await createTestStore();
    service = new UploadService(store.storage, store.contentService);
  });

  afterEach(async () => {
    await store.close();
  });

  it("persists the bytes and records the metadata", async () => {
    const item = await service.upload({
      title: "  Sunday Service ",
      category: "Sermons",
      file: file("audio-bytes"),
    });

    expect(item).toMatchObject({ id: 1, title: "Sunday Service", category: "Sermons" });
    expect(item.file_path).toMatch(UUID_NAME);
    expect(item.file_path.endsWith(".mp3")).toBe(true);
    expect((await store.storage.read(item.file_path)).toString()).toBe("audio-bytes");
    expect(await store.contentService.list()).toEqual([item]);
  });

  it("gives each upload its own storage name", async () => {
    const a = await service.upload({ title: "A", category: "Music", file: file("one", "same.mp3") });
    const b = await service.upload({ title: "B", category: "Music", file: file("two", "same.mp3") });

    expect(a.file_path).not.toBe(b.file_path);
    expect((await store.storage.read(a.file_path)).toString()).toBe("one");
    expect((await store.storage.read(b.file_path)).toString()).toBe("two");
  });

  it("requires title, category and file", async () => {
    await expect(
      service.upload({ title: " ", category: "Music", file: file("x") })
    ).rejects.toMatchObject({ message: "title is required", status: 400 });
    await expect(service.upload({ title: "A", file: file("x") })).rejects.toMatchObject({
      message: "category is required",
    });
    await expect(service.upload({ title: "A", category: "Music" })).rejects.toBeInstanceOf(
      ValidationError
    );

    expect(await store.contentService.list()).toEqual([]);
    expect(await readdir(store.storage.root)).toEqual([]);
  });

  it("removes the stored file when the record cannot be written", async () => {
    vi.spyOn(store.contentService, "create").mockRejectedValueOnce(new Error("db down"));

    await expect(
      service.upload({ title: "A", category: "Music", file: file("x") })
    ).rejects.toBeInstanceOf(StorageFailureError);
    expect(await readdir(store.storage.root)).toEqual([]);
  });

  it("writes no record when the file cannot be stored", async () => {
    vi.spyOn(store.storage, "save").mockRejectedValueOnce(new Error("disk full"));

    await expect(
      service.upload({ title: "A", category: "Music", file: file("x") })
    ).rejects.toMatchObject({ kind: "StorageFailure", status: 500 });
    expect(await store.contentService.list()).toEqual([]);
  });
});
