import type { Metadata, MetadataValue } from "../types.js";

export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".tif", ".tiff", ".png", ".heic"] as const;

/**
 * `DateTimeOriginal` -> `date_time_original`, `GPSLatitude` -> `gps_latitude`.
 */
export function toSnakeCase(tag: string): string {
  return tag
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}

function toMetadataValue(value: unknown): MetadataValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (value instanceof Date) {
    return value;
  }
  if (Array.isArray(value)) {
    const items = value.filter(
      (item): item is string | number => typeof item === "string" || typeof item === "number",
    );
    return items.length === value.length ? items : undefined;
  }
  // Binary blobs and nested structures have no filename form.
  return undefined;
}

/**
 * Map exifr output to metadata keys. Every named tag is kept under its snake_case
 * name; `date_time`, `width` and `height` are filled from the first tag present.
 */
export function mapExifTags(tags: Record<string, unknown>): Metadata {
  const metadata: Metadata = {};
  for (const [tag, raw] of Object.entries(tags)) {
    // exifr keys tags it cannot name by their numeric id
    if (!/^[A-Za-z]/.test(tag)) {
      continue;
    }
    const value = toMetadataValue(raw);
    if (value !== undefined) {
      metadata[toSnakeCase(tag)] = value;
    }
  }

  const first = (...keys: string[]): MetadataValue => {
    for (const key of keys) {
      const value = toMetadataValue(tags[key]);
      if (value !== undefined && value !== null) {
        return value;
      }
    }
    return undefined;
  };

  const aliases: Record<string, string[]> = {
    // exifr reports the TIFF DateTime tag as ModifyDate
    date_time: ["ModifyDate", "DateTimeOriginal", "CreateDate"],
    width: ["ImageWidth", "ExifImageWidth"],
    height: ["ImageHeight", "ExifImageHeight"],
  };
  for (const [key, candidates] of Object.entries(aliases)) {
    const value = first(...candidates);
    if (value !== undefined) {
      metadata[key] = value;
    }
  }
  return metadata;
}

/**
 * Read EXIF/TIFF metadata from a still image. Throws when the file cannot be parsed.
 */
export async function extractImageMetadata(filePath: string): Promise<Metadata> {
  // Dynamic import to avoid loading exifr until an image is seen
  const exifr = await import("exifr");
  const data: unknown = await exifr.parse(filePath);
  if (typeof data !== "object" || data === null) {
    return {};
  }
  return mapExifTags(Object.fromEntries(Object.entries(data)));
}
