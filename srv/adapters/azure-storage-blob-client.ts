import { Readable } from "node:stream";
import { ClientSecretCredential } from "@azure/identity";
import { BlobServiceClient } from "@azure/storage-blob";
import type { BlobHTTPHeaders, ContainerClient } from "@azure/storage-blob";
import type {
  BlobContent,
  CreateBlobOptions,
  CreateBlobResult,
  GetBlobMetadataResult,
  GetBlobResult,
  IBlobClient,
  ListBlobsOptions,
  ListBlobsResult,
  ListedBlob,
} from "./interfaces/blob-client.interface";
import type { StorageConfig } from "../lib/storage-config";

function requireLastModified(value: Date | undefined, key: string): Date {
  if (!value) {
    throw new Error(`Blob storage response for "${key}" has no last-modified value`);
  }
  return value;
}

function toHttpHeaders(options: CreateBlobOptions): BlobHTTPHeaders {
  const headers: BlobHTTPHeaders = {};
  if (options.contentType !== undefined) headers.blobContentType = options.contentType;
  if (options.cacheControl !== undefined) headers.blobCacheControl = options.cacheControl;
  if (options.contentLanguage !== undefined) headers.blobContentLanguage = options.contentLanguage;
  if (options.contentEncoding !== undefined) headers.blobContentEncoding = options.contentEncoding;
  return headers;
}

/**
 * Build a service client from configuration: connection string first,
 * then a service principal against the account URL.
 */
export function createBlobServiceClient(config: StorageConfig): BlobServiceClient {
  if (config.connectionString) {
    return BlobServiceClient.fromConnectionString(config.connectionString);
  }
  if (config.credential) {
    const { accountUrl, tenantId, clientId, clientSecret } = config.credential;
    return new BlobServiceClient(
      accountUrl,
      new ClientSecretCredential(tenantId, clientId, clientSecret),
    );
  }
  throw new Error(
    "Azure blob storage requires AZURE_STORAGE_CONNECTION_STRING or AZURE_STORAGE_ACCOUNT_URL",
  );
}

/**
 * Azure Blob Storage client backed by the @azure/storage-blob SDK.
 * SDK errors (`RestError`) are passed through untouched.
 */
export class AzureStorageBlobClient implements IBlobClient {
  constructor(private readonly serviceClient: BlobServiceClient) {}

  async createOrReplaceBlob(
    container: string,
    key: string,
    content: BlobContent,
    options: CreateBlobOptions,
  ): Promise<CreateBlobResult> {
    const blockBlob = this.containerClient(container).getBlockBlobClient(key);
    const uploadOptions = {
      blobHTTPHeaders: toHttpHeaders(options),
      metadata: options.metadata,
    };

    if (typeof content === "string" || Buffer.isBuffer(content)) {
      const body = typeof content === "string" ? Buffer.from(content, "utf8") : content;
      const response = await blockBlob.upload(body, body.length, uploadOptions);
      return { lastModified: requireLastModified(response.lastModified, key) };
    }

    const stream = content instanceof Readable ? content : new Readable().wrap(content);
    const response = await blockBlob.uploadStream(stream, undefined, undefined, uploadOptions);
    return { lastModified: requireLastModified(response.lastModified, key) };
  }

  async getBlob(container: string, key: string): Promise<GetBlobResult> {
    const response = await this.containerClient(container).getBlobClient(key).download();
    if (!response.readableStreamBody) {
      throw new Error(`Blob storage response for "${key}" has no content stream`);
    }
    return {
      properties: {
        lastModified: requireLastModified(response.lastModified, key),
        contentType: response.contentType,
        contentLength: response.contentLength,
      },
      contentStream: response.readableStreamBody,
    };
  }

  async getBlobMetadata(container: string, key: string): Promise<GetBlobMetadataResult> {
    const response = await this.containerClient(container).getBlobClient(key).getProperties();
    return {
      properties: {
        lastModified: requireLastModified(response.lastModified, key),
        contentType: response.contentType,
        contentLength: response.contentLength,
      },
      metadata: response.metadata || {},
    };
  }

  async deleteBlob(container: string, key: string): Promise<void> {
    await this.containerClient(container).getBlobClient(key).delete();
  }

  async copyBlob(
    container: string,
    destKey: string,
    sourceContainer: string,
    sourceKey: string,
  ): Promise<void> {
    const source = this.containerClient(sourceContainer).getBlobClient(sourceKey);
    const poller = await this.containerClient(container)
      .getBlobClient(destKey)
      .beginCopyFromURL(source.url);
    await poller.pollUntilDone();
  }

  /** Walks every page of a flat listing. */
  async listBlobs(container: string, options: ListBlobsOptions): Promise<ListBlobsResult> {
    const blobs: ListedBlob[] = [];
    for await (const item of this.containerClient(container).listBlobsFlat({
      prefix: options.prefix,
    })) {
      blobs.push({
        name: item.name,
        properties: {
          lastModified: item.properties.lastModified,
          contentType: item.properties.contentType,
          contentLength: item.properties.contentLength,
        },
      });
    }
    return { blobs, prefixes: [] };
  }

  private containerClient(container: string): ContainerClient {
    return this.serviceClient.getContainerClient(container);
  }
}
