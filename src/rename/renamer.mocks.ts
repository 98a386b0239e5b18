import path from "node:path";
import { type Mock, vi } from "vitest";
import type { SubsystemLogger } from "../logging/logger.js";
import type { Metadata } from "./types.js";
import { createMetadataProvider, type MetadataProvider } from "./metadata/provider.js";

export type MockLogger = { [K in keyof SubsystemLogger]: Mock };

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** All logged warning lines, first argument only. */
export function warnings(logger: MockLogger): string[] {
  return logger.warn.mock.calls.map((call) => String(call[0]));
}

/**
 * Provider answering from a table keyed by file basename. Routes the same
 * extensions as the real image and audio capabilities.
 */
export function createTableProvider(
  table: Record<string, Metadata>,
  opts: { failOn?: string[] } = {},
): MetadataProvider {
  const extract = async (filePath: string): Promise<Metadata> => {
    const name = path.basename(filePath);
    if (opts.failOn?.includes(name)) {
      throw new Error(`corrupt header in ${name}`);
    }
    return table[name] ?? {};
  };
  return createMetadataProvider([
    { id: "image", extensions: [".jpg", ".jpeg", ".tif", ".tiff", ".png", ".heic"], extract },
    { id: "audio", extensions: [".mp3", ".wav", ".flac", ".aiff", ".ogg", ".m4a", ".asf"], extract },
  ]);
}

/**
 * Big-endian TIFF holding a single IFD0 entry: DateTime (0x0132), which exifr
 * reports as `ModifyDate`. `dateTime` is in EXIF form, `YYYY:MM:DD HH:MM:SS`.
 */
export function buildMinimalTiff(dateTime: string): Buffer {
  const header = Buffer.from("MM\x00\x2a\x00\x00\x00\x08", "binary");
  const value = Buffer.from(`${dateTime}\0`, "ascii");

  const numEntries = Buffer.alloc(2);
  numEntries.writeUInt16BE(1, 0);

  const entry = Buffer.alloc(12);
  entry.writeUInt16BE(0x0132, 0);
  entry.writeUInt16BE(2, 2); // ASCII
  entry.writeUInt32BE(value.length, 4);
  // value follows the IFD: 8 + 2 + 12 + 4
  entry.writeUInt32BE(26, 8);

  const nextIfd = Buffer.alloc(4);
  return Buffer.concat([header, numEntries, entry, nextIfd, value]);
}
