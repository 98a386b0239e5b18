import path from "node:path";
import type { Metadata } from "../types.js";
import { InvalidArgumentError, UnsupportedFileTypeError } from "../errors.js";
import { AUDIO_EXTENSIONS, extractAudioMetadata } from "./audio-extract.js";
import { IMAGE_EXTENSIONS, extractImageMetadata } from "./image-extract.js";

/** A format-specific extractor and the extensions routed to it. */
export type MetadataCapability = {
  id: string;
  extensions: readonly string[];
  extract(filePath: string): Promise<Metadata>;
};

export type MetadataLookup =
  | { ok: true; capability: string; metadata: Metadata }
  | { ok: false; error: UnsupportedFileTypeError };

export type MetadataProvider = {
  lookup(filePath: string): Promise<MetadataLookup>;
};

export const imageCapability: MetadataCapability = {
  id: "image",
  extensions: IMAGE_EXTENSIONS,
  extract: extractImageMetadata,
};

export const audioCapability: MetadataCapability = {
  id: "audio",
  extensions: AUDIO_EXTENSIONS,
  extract: extractAudioMetadata,
};

export const DEFAULT_CAPABILITIES: readonly MetadataCapability[] = [
  imageCapability,
  audioCapability,
];

/**
 * Build a provider that routes files to capabilities by lower-cased extension.
 * Extractor errors are not caught here.
 */
export function createMetadataProvider(
  capabilities: readonly MetadataCapability[] = DEFAULT_CAPABILITIES,
): MetadataProvider {
  const byExtension = new Map<string, MetadataCapability>();
  for (const capability of capabilities) {
    for (const ext of capability.extensions) {
      const normalized = ext.toLowerCase();
      const existing = byExtension.get(normalized);
      if (existing) {
        throw new InvalidArgumentError(
          `Extension ${normalized} is claimed by both "${existing.id}" and "${capability.id}"`,
        );
      }
      byExtension.set(normalized, capability);
    }
  }

  return {
    async lookup(filePath) {
      const capability = byExtension.get(path.extname(filePath).toLowerCase());
      if (!capability) {
        return {
          ok: false,
          error: new UnsupportedFileTypeError(filePath, path.extname(filePath)),
        };
      }
      const metadata = await capability.extract(filePath);
      return { ok: true, capability: capability.id, metadata };
    },
  };
}
