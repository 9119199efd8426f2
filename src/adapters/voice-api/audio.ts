import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";

export interface AudioFile {
  /** File name sent in the multipart part */
  name: string;
  mimeType: string;
  data: Uint8Array;
}

const AUDIO_MIME_TYPES: Record<string, string> = {
  ".wav": "audio/wav",
  ".opus": "audio/opus",
  ".mp3": "audio/mpeg",
  ".flac": "audio/flac",
};

export const audioMimeType = (fileName: string): string =>
  AUDIO_MIME_TYPES[extname(fileName).toLowerCase()] ?? "application/octet-stream";

export const isAudioFile = (fileName: string): boolean =>
  extname(fileName).toLowerCase() in AUDIO_MIME_TYPES;

export const loadAudioFile = async (path: string): Promise<AudioFile> => ({
  name: basename(path),
  mimeType: audioMimeType(path),
  data: await readFile(path),
});

export const toBlob = (audio: AudioFile): Blob => new Blob([audio.data], { type: audio.mimeType });
