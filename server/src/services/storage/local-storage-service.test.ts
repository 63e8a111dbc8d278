import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { receiptImage } from "../../testing/context";
import { LocalStorageService } from "./local-storage-service";

describe("LocalStorageService", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "receipts-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("lays files out by date", async () => {
    const storage = new LocalStorageService({ directory });
    const key = await storage.saveFile("Corner Market", "2025-07-12", receiptImage());

    expect(key).toMatch(/^2025\/07\/12\/Corner-Market-[0-9a-f]{16}\.jpg$/);
    expect([...(await storage.readFile(key))]).toEqual([0xff, 0xd8, 0xff, 0xe0, 1, 2, 3]);
  });

  it("can keep every file in one directory", async () => {
    const storage = new LocalStorageService({ directory, dateSubdirectories: false });
    const key = await storage.saveFile("Corner Market", "2025-07-12", receiptImage("r.png", "image/png"));

    expect(key).toMatch(/^2025-07-12_Corner-Market-[0-9a-f]{16}\.png$/);
    expect(await readdir(directory)).toEqual([key]);
  });

  it("deletes files", async () => {
    const storage = new LocalStorageService({ directory, dateSubdirectories: false });
    const key = await storage.saveFile("receipt", "2025-07-12", receiptImage());

    await storage.deleteFile(key);
    expect(await readdir(directory)).toEqual([]);
    // Deleting again is a no-op
    await storage.deleteFile(key);
  });

  it("refuses keys outside the storage directory", async () => {
    const storage = new LocalStorageService({ directory });
    await expect(storage.readFile("../secret.txt")).rejects.toThrow(
      "Storage key escapes the storage directory: ../secret.txt"
    );
  });

  it("rejects unsupported file types", async () => {
    const storage = new LocalStorageService({ directory });
    await expect(
      storage.saveFile("receipt", "2025-07-12", receiptImage("r.gif", "image/gif"))
    ).rejects.toThrow("Unsupported MIME type: image/gif");
  });
});
