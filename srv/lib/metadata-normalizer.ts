import { isUtf8 } from "node:buffer";
import type { RawBlobProperties } from "../adapters/interfaces/blob-client.interface";
import type { FileMetadata } from "../adapters/interfaces/filesystem.interface";
import { dirname } from "./path-prefixer";

/**
 * Parse a last-modified value into unix epoch seconds.
 * Accepts SDK-parsed dates as well as raw header strings
 * (`"Tue, 02 Dec 2014 08:09:01 GMT"`).
 */
export function toUnixTimestamp(lastModified: Date | string): number {
  const millis =
    lastModified instanceof Date ? lastModified.getTime() : Date.parse(lastModified);
  if (Number.isNaN(millis)) {
    throw new Error(`Invalid last-modified value: ${String(lastModified)}`);
  }
  return Math.floor(millis / 1000);
}

/** Record returned for a freshly uploaded blob. */
export function normalizeUpload(
  path: string,
  lastModified: Date | string,
  contents?: string | Buffer,
): FileMetadata {
  const data: FileMetadata = {
    path,
    timestamp: toUnixTimestamp(lastModified),
    dirname: dirname(path),
    type: "file",
  };
  if (contents !== undefined) {
    data.contents = contents;
  }
  return data;
}

export function normalizeBlobProperties(path: string, properties: RawBlobProperties): FileMetadata {
  return {
    path,
    timestamp: toUnixTimestamp(properties.lastModified),
    dirname: dirname(path),
    mimetype: properties.contentType ?? null,
    size: properties.contentLength,
    type: "file",
  };
}

/** Drain a content stream into one Buffer. */
export async function streamToBuffer(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Drain a content stream, decoding it as UTF-8 when the bytes are valid
 * UTF-8. Other content is returned as the raw Buffer.
 */
export async function readContents(stream: NodeJS.ReadableStream): Promise<string | Buffer> {
  const bytes = await streamToBuffer(stream);
  return isUtf8(bytes) ? bytes.toString("utf8") : bytes;
}
