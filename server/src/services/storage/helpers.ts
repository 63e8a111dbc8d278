import * as crypto from "node:crypto";

export const RECEIPT_IMAGE_TYPES = [
  "image/jpeg",
  "image/jpg",
  "image/png",
  "image/webp",
  "image/heic",
] as const;

export function mimeTypeToExtension(mimeType: string): string {
  // Just map types accepted for receipt photos
  switch (mimeType.toLowerCase()) {
    case "image/jpeg":
      return "jpg";
    case "image/jpg":
      return "jpg";
    case "image/png":
      return "png";
    case "image/webp":
      return "webp";
    case "image/heic":
      return "heic";
    default:
      throw new Error(`Unsupported MIME type: ${mimeType}`);
  }
}

export function getDateAsPaddedStringParts(date: string): {
  year: string;
  month: string;
  day: string;
} {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) {
    throw new Error(`Invalid date: ${date}`);
  }
  const [, year, month, day] = match;
  return { year, month, day };
}

// Keeps letters and digits of any script; everything else becomes "-"
export function toSafeFileStem(name: string): string {
  const stem = name
    .normalize("NFKC")
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40);
  return stem || "receipt";
}

export function createRandomFileName(fileName: string): string {
  const extensionSymbol = fileName.lastIndexOf(".");
  if (extensionSymbol === -1) {
    throw new Error("File name does not contain an extension");
  }

  const fileNameWithoutExtension = fileName.slice(0, extensionSymbol);
  const fileExtension = fileName.slice(extensionSymbol + 1);

  const fileNameRandomString = crypto.randomBytes(8).toString("hex");

  return `${fileNameWithoutExtension}-${fileNameRandomString}.${fileExtension}`;
}
