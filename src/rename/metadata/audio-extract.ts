import { parseFile } from "music-metadata";
import type { Metadata } from "../types.js";

export const AUDIO_EXTENSIONS = [".mp3", ".wav", ".flac", ".aiff", ".ogg", ".m4a", ".asf"] as const;

type NumberPair = { no: number | null; of: number | null };

/** The parts of a music-metadata result that feed filenames. */
export type AudioTags = {
  common: {
    title?: string;
    artist?: string;
    album?: string;
    albumartist?: string;
    year?: number;
    date?: string;
    track: NumberPair;
    disk: NumberPair;
    genre?: readonly string[];
    composer?: readonly string[];
  };
  format: {
    duration?: number;
    bitrate?: number;
    sampleRate?: number;
    numberOfChannels?: number;
    codec?: string;
  };
};

export function mapAudioTags(tags: AudioTags): Metadata {
  const { common, format } = tags;
  return {
    title: common.title,
    artist: common.artist,
    album: common.album,
    album_artist: common.albumartist,
    year: common.year,
    date: common.date,
    track: common.track.no,
    track_total: common.track.of,
    disc: common.disk.no,
    genre: common.genre,
    composer: common.composer,
    // whole seconds, kbit/s
    length: format.duration === undefined ? undefined : Math.round(format.duration),
    bitrate: format.bitrate === undefined ? undefined : Math.round(format.bitrate / 1000),
    sample_rate: format.sampleRate,
    channels: format.numberOfChannels,
    codec: format.codec,
  };
}

export async function extractAudioMetadata(filePath: string): Promise<Metadata> {
  const tags = await parseFile(filePath, { duration: true, skipCovers: true });
  return mapAudioTags(tags);
}
