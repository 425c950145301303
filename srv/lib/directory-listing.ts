import type { ListBlobsResult } from "../adapters/interfaces/blob-client.interface";
import type {
  DirectoryEntry,
  ListingEntry,
} from "../adapters/interfaces/filesystem.interface";
import { normalizeBlobProperties } from "./metadata-normalizer";
import { joinPath } from "./path-prefixer";

/**
 * How `listContents` treats its `recursive` flag.
 * - `flat`: the flag is ignored, every listing is the one-level view.
 * - `deep`: `recursive = true` expands every nested blob and ancestor directory.
 */
export type RecursiveListingMode = "flat" | "deep";

export const RECURSIVE_LISTING_MODES: readonly RecursiveListingMode[] = ["flat", "deep"];

export interface ListingContext {
  /** Public (unprefixed) directory being listed, `""` for the root. */
  directory: string;
  /** Key prefix the listing was requested with. */
  listingPrefix: string;
  /** Expand nested blobs instead of collapsing them into first-level directories. */
  expand: boolean;
  /** Map a full blob key back to its public path. */
  toPublicPath: (key: string) => string;
}

/**
 * Turn a flat prefix listing into filesystem entries.
 *
 * Blobs directly under the directory become file records; deeper blobs
 * surface as synthetic directory entries, each emitted once in the order it
 * is first seen. Common prefixes reported by the store follow the blobs.
 */
export function buildListing(listing: ListBlobsResult, context: ListingContext): ListingEntry[] {
  const entries: ListingEntry[] = [];
  const seenDirs = new Set<string>();

  const pushDir = (path: string): void => {
    if (seenDirs.has(path)) return;
    seenDirs.add(path);
    const entry: DirectoryEntry = { type: "dir", path };
    entries.push(entry);
  };

  for (const blob of listing.blobs) {
    if (!blob.name.startsWith(context.listingPrefix)) continue;
    const remainder = blob.name.slice(context.listingPrefix.length);
    if (!remainder) continue;

    const segments = remainder.split("/");
    if (segments.length === 1) {
      entries.push(normalizeBlobProperties(context.toPublicPath(blob.name), blob.properties));
      continue;
    }

    if (!context.expand) {
      pushDir(joinPath(context.directory, segments[0]));
      continue;
    }

    let ancestor = context.directory;
    for (const segment of segments.slice(0, -1)) {
      ancestor = joinPath(ancestor, segment);
      pushDir(ancestor);
    }
    // Keys ending in "/" are folder placeholders, not files.
    if (segments[segments.length - 1]) {
      entries.push(normalizeBlobProperties(context.toPublicPath(blob.name), blob.properties));
    }
  }

  for (const prefix of listing.prefixes) {
    const name = prefix.name.replace(/\/+$/, "");
    if (!name) continue;
    pushDir(context.toPublicPath(name));
  }

  return entries;
}
