export interface StorageService {
  /** Stores the file and returns the key it can be read back with. */
  saveFile(name: string, date: string, file: File): Promise<string>;
  readFile(key: string): Promise<Buffer>;
  deleteFile(key: string): Promise<void>;
}
