/** Raw properties the backing store reports for a blob. */
export interface RawBlobProperties {
  /** Last-modified header value, either parsed by the SDK or as sent on the wire. */
  lastModified: Date | string;
  contentType?: string | null;
  contentLength?: number;
}

export type BlobContent = string | Buffer | NodeJS.ReadableStream;

export interface CreateBlobOptions {
  contentType?: string;
  cacheControl?: string;
  metadata?: Record<string, string>;
  contentLanguage?: string;
  contentEncoding?: string;
}

export interface CreateBlobResult {
  lastModified: Date | string;
}

export interface GetBlobResult {
  properties: RawBlobProperties;
  contentStream: NodeJS.ReadableStream;
}

export interface GetBlobMetadataResult {
  properties: RawBlobProperties;
  metadata: Record<string, string>;
}

export interface ListedBlob {
  name: string;
  properties: RawBlobProperties;
}

export interface ListBlobsOptions {
  prefix: string;
}

export interface ListBlobsResult {
  blobs: ListedBlob[];
  /** Virtual folder markers, e.g. `"photos/"`. */
  prefixes: Array<{ name: string }>;
}

/**
 * Blob-store capabilities the filesystem adapter relies on.
 * Implementations raise the store's native errors (404 for missing blobs).
 */
export interface IBlobClient {
  createOrReplaceBlob(
    container: string,
    key: string,
    content: BlobContent,
    options: CreateBlobOptions,
  ): Promise<CreateBlobResult>;
  getBlob(container: string, key: string): Promise<GetBlobResult>;
  getBlobMetadata(container: string, key: string): Promise<GetBlobMetadataResult>;
  deleteBlob(container: string, key: string): Promise<void>;
  copyBlob(
    container: string,
    destKey: string,
    sourceContainer: string,
    sourceKey: string,
  ): Promise<void>;
  listBlobs(container: string, options: ListBlobsOptions): Promise<ListBlobsResult>;
}
