import env from "../../utils/env-vars";
import type { StorageService } from "./storage-service";
import { LocalStorageService } from "./local-storage-service";

export type { StorageService } from "./storage-service";

export function getStorageService(): StorageService {
  return new LocalStorageService({
    directory: env.RECEIPT_DIRECTORY,
    dateSubdirectories: env.DATE_SUBDIRECTORIES,
  });
}
