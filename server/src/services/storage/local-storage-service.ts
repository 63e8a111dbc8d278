import { z } from "zod";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type { StorageService } from "./storage-service";
import {
  createRandomFileName,
  getDateAsPaddedStringParts,
  mimeTypeToExtension,
  toSafeFileStem,
} from "./helpers";

export const localStorageOptionsSchema = z.object({
  dateSubdirectories: z.boolean().optional().default(true),
  directory: z.string().nonempty(),
});

export class LocalStorageService implements StorageService {
  #directory: string;
  #dateSubdirectories: boolean;

  constructor(options: z.input<typeof localStorageOptionsSchema>) {
    const parsed = localStorageOptionsSchema.parse(options);
    this.#directory = path.resolve(parsed.directory);
    this.#dateSubdirectories = parsed.dateSubdirectories;
  }

  #resolve(key: string): string {
    const filePath = path.resolve(this.#directory, key);
    if (!filePath.startsWith(this.#directory + path.sep)) {
      throw new Error(`Storage key escapes the storage directory: ${key}`);
    }
    return filePath;
  }

  async saveFile(name: string, date: string, file: File): Promise<string> {
    const { year, month, day } = getDateAsPaddedStringParts(date);

    const fileExtension = mimeTypeToExtension(file.type);
    const stem = toSafeFileStem(name);
    const fileName = createRandomFileName(
      this.#dateSubdirectories
        ? `${stem}.${fileExtension}`
        : `${year}-${month}-${day}_${stem}.${fileExtension}`
    );

    const key = this.#dateSubdirectories
      ? [year, month, day, fileName].join("/")
      : fileName;
    const filePath = this.#resolve(key);

    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, Buffer.from(await file.arrayBuffer()));

    return key;
  }

  async readFile(key: string): Promise<Buffer> {
    return readFile(this.#resolve(key));
  }

  async deleteFile(key: string): Promise<void> {
    await rm(this.#resolve(key), { force: true });
  }
}
