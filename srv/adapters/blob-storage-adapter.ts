import cds from "@sap/cds";
import type {
  BlobContent,
  CreateBlobOptions,
  IBlobClient,
  RawBlobProperties,
} from "./interfaces/blob-client.interface";
import type {
  DirectoryEntry,
  FileMetadata,
  FileWithContents,
  FileWithStream,
  IFilesystemAdapter,
  ListingEntry,
  MetadataProbe,
  Visibility,
  WriteOptions,
} from "./interfaces/filesystem.interface";
import { buildListing } from "../lib/directory-listing";
import type { RecursiveListingMode } from "../lib/directory-listing";
import {
  normalizeBlobProperties,
  normalizeUpload,
  readContents,
} from "../lib/metadata-normalizer";
import { PathPrefixer } from "../lib/path-prefixer";
import { getStatusCode, isNotFound } from "../lib/service-errors";

const LOG = cds.log("blob-storage");

export interface BlobStorageAdapterOptions {
  /** Root prefix prepended to every key in the container. */
  prefix?: string;
  recursiveListing?: RecursiveListingMode;
}

/** Copy only the option fields that were set. */
function toCreateBlobOptions(options: WriteOptions): CreateBlobOptions {
  const result: CreateBlobOptions = {};
  if (options.contentType !== undefined) result.contentType = options.contentType;
  if (options.cacheControl !== undefined) result.cacheControl = options.cacheControl;
  if (options.metadata !== undefined) result.metadata = options.metadata;
  if (options.contentLanguage !== undefined) result.contentLanguage = options.contentLanguage;
  if (options.contentEncoding !== undefined) result.contentEncoding = options.contentEncoding;
  return result;
}

/**
 * Filesystem operations over a flat blob container.
 *
 * Directories do not exist in the container: they are derived from key
 * prefixes when listing, and creating one writes nothing. Every path handed
 * to the client carries the configured root prefix; every path returned to
 * the caller has it stripped.
 *
 * Backing-store errors propagate unchanged. Multi-step operations
 * (`rename`, `deleteDir`) stop at the first failure without rolling back.
 */
export class BlobStorageAdapter implements IFilesystemAdapter {
  private readonly prefixer: PathPrefixer;
  private readonly recursiveListing: RecursiveListingMode;

  constructor(
    private readonly client: IBlobClient,
    private readonly container: string,
    options: BlobStorageAdapterOptions = {},
  ) {
    this.prefixer = new PathPrefixer(options.prefix);
    this.recursiveListing = options.recursiveListing || "flat";
  }

  getClient(): IBlobClient {
    return this.client;
  }

  getContainer(): string {
    return this.container;
  }

  async write(path: string, contents: string | Buffer, options: WriteOptions = {}): Promise<FileMetadata> {
    return this.upload(path, contents, options);
  }

  async writeStream(
    path: string,
    stream: NodeJS.ReadableStream,
    options: WriteOptions = {},
  ): Promise<FileMetadata> {
    return this.upload(path, stream, options);
  }

  async update(path: string, contents: string | Buffer, options: WriteOptions = {}): Promise<FileMetadata> {
    return this.upload(path, contents, options);
  }

  async updateStream(
    path: string,
    stream: NodeJS.ReadableStream,
    options: WriteOptions = {},
  ): Promise<FileMetadata> {
    return this.upload(path, stream, options);
  }

  /** Text blobs come back as a string; anything that is not valid UTF-8 as a Buffer. */
  async read(path: string): Promise<FileWithContents> {
    const key = this.prefixer.apply(path);
    const blob = await this.client.getBlob(this.container, key);
    const contents = await readContents(blob.contentStream);
    return { ...this.normalize(key, blob.properties), contents };
  }

  /** The returned stream is left open for the caller to consume. */
  async readStream(path: string): Promise<FileWithStream> {
    const key = this.prefixer.apply(path);
    const blob = await this.client.getBlob(this.container, key);
    return { ...this.normalize(key, blob.properties), stream: blob.contentStream };
  }

  async has(path: string): Promise<boolean> {
    const probe = await this.probeMetadata(path);
    if (probe.kind === "error") {
      throw probe.error;
    }
    return probe.kind === "found";
  }

  /**
   * Metadata lookup that reports a missing blob as a result instead of an
   * error. Any other failure is returned with its status code.
   */
  async probeMetadata(path: string): Promise<MetadataProbe> {
    try {
      return { kind: "found", metadata: await this.getMetadata(path) };
    } catch (err) {
      if (isNotFound(err)) {
        return { kind: "not-found" };
      }
      return { kind: "error", statusCode: getStatusCode(err), error: err };
    }
  }

  async delete(path: string): Promise<boolean> {
    await this.client.deleteBlob(this.container, this.prefixer.apply(path));
    return true;
  }

  async deleteDir(dirname: string): Promise<boolean> {
    const prefix = this.prefixer.applyDirectory(dirname);
    const listing = await this.client.listBlobs(this.container, { prefix });

    for (const blob of listing.blobs) {
      await this.client.deleteBlob(this.container, blob.name);
    }
    LOG.debug(`Deleted ${listing.blobs.length} blob(s) under "${prefix}"`);

    return true;
  }

  /** Containers have no directory objects; nothing is written and options are ignored. */
  async createDir(dirname: string, _options: WriteOptions = {}): Promise<DirectoryEntry> {
    return { path: dirname, type: "dir" };
  }

  async copy(path: string, newpath: string): Promise<boolean> {
    await this.client.copyBlob(
      this.container,
      this.prefixer.apply(newpath),
      this.container,
      this.prefixer.apply(path),
    );
    return true;
  }

  /** Copy, then delete the source. A failed delete leaves both blobs in place. */
  async rename(path: string, newpath: string): Promise<boolean> {
    await this.copy(path, newpath);
    return this.delete(path);
  }

  async listContents(directory = "", recursive = false): Promise<ListingEntry[]> {
    const listingPrefix = this.prefixer.applyDirectory(directory);
    const listing = await this.client.listBlobs(this.container, { prefix: listingPrefix });

    return buildListing(listing, {
      directory: this.prefixer.strip(listingPrefix).replace(/\/$/, ""),
      listingPrefix,
      expand: recursive && this.recursiveListing === "deep",
      toPublicPath: (key) => this.prefixer.strip(key),
    });
  }

  async getMetadata(path: string): Promise<FileMetadata> {
    const key = this.prefixer.apply(path);
    const result = await this.client.getBlobMetadata(this.container, key);
    return this.normalize(key, result.properties);
  }

  async getSize(path: string): Promise<FileMetadata> {
    return this.getMetadata(path);
  }

  async getMimetype(path: string): Promise<FileMetadata> {
    return this.getMetadata(path);
  }

  async getTimestamp(path: string): Promise<FileMetadata> {
    return this.getMetadata(path);
  }

  async getVisibility(path: string): Promise<never> {
    throw new Error(`Blob storage does not support visibility settings (${path})`);
  }

  async setVisibility(path: string, visibility: Visibility): Promise<never> {
    throw new Error(`Blob storage does not support visibility settings (${path}: ${visibility})`);
  }

  private normalize(key: string, properties: RawBlobProperties): FileMetadata {
    return normalizeBlobProperties(this.prefixer.strip(key), properties);
  }

  private async upload(path: string, contents: BlobContent, options: WriteOptions): Promise<FileMetadata> {
    const key = this.prefixer.apply(path);
    const result = await this.client.createOrReplaceBlob(
      this.container,
      key,
      contents,
      toCreateBlobOptions(options),
    );

    const written = typeof contents === "string" || Buffer.isBuffer(contents) ? contents : undefined;
    return normalizeUpload(this.prefixer.strip(key), result.lastModified, written);
  }
}
