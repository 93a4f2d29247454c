/**
 * Media manifest for APKG export.
 *
 * The legacy package layout stores media payloads as zip entries named "0",
 * "1", ... and a `media` entry mapping those names back to filenames:
 * {"0": "file1.jpg", "1": "file2.png", ...}
 * This layout is readable by every Anki version.
 */

export interface MediaManifestEntry {
  index: number;
  filename: string;
}

/**
 * Create media manifest entries from a filename->bytes map, numbered in
 * insertion order.
 */
export function createMediaManifestEntries(media: Map<string, Uint8Array>): MediaManifestEntry[] {
  const entries: MediaManifestEntry[] = [];
  let index = 0;

  for (const filename of media.keys()) {
    entries.push({ index, filename });
    index++;
  }

  return entries;
}

export function serializeMediaManifest(entries: MediaManifestEntry[]): string {
  const mediaJson: Record<string, string> = {};

  for (const entry of entries) {
    mediaJson[entry.index.toString()] = entry.filename;
  }

  return JSON.stringify(mediaJson);
}
