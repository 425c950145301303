import { Readable } from "node:stream";
import { RestError } from "@azure/storage-blob";
import type {
  BlobContent,
  CreateBlobOptions,
  CreateBlobResult,
  GetBlobMetadataResult,
  GetBlobResult,
  IBlobClient,
  ListBlobsOptions,
  ListBlobsResult,
  RawBlobProperties,
} from "../interfaces/blob-client.interface";

type BlobOperation = keyof IBlobClient;

interface StoredBlob {
  content: Buffer;
  options: CreateBlobOptions;
  lastModified: Date;
}

async function toBuffer(content: BlobContent): Promise<Buffer> {
  if (typeof content === "string") return Buffer.from(content, "utf8");
  if (Buffer.isBuffer(content)) return content;
  const chunks: Buffer[] = [];
  for await (const chunk of content) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

function blobNotFound(container: string, key: string): RestError {
  return new RestError(`The specified blob does not exist: ${container}/${key}`, {
    code: "BlobNotFound",
    statusCode: 404,
  });
}

/**
 * In-memory blob store for development and tests.
 * Raises the same `RestError` shape as the Azure SDK.
 */
export class MockBlobClient implements IBlobClient {
  private containers = new Map<string, Map<string, StoredBlob>>();
  private failures = new Map<BlobOperation, number>();

  constructor(private now: () => Date = () => new Date()) {}

  /** Make every later call to `operation` fail with the given status. */
  simulateFailure(operation: BlobOperation, statusCode: number): void {
    this.failures.set(operation, statusCode);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Keys currently stored in a container, sorted. */
  keys(container: string): string[] {
    return [...(this.containers.get(container)?.keys() ?? [])].sort();
  }

  async createOrReplaceBlob(
    container: string,
    key: string,
    content: BlobContent,
    options: CreateBlobOptions,
  ): Promise<CreateBlobResult> {
    this.failIfSimulated("createOrReplaceBlob");
    const lastModified = this.now();
    this.bucket(container).set(key, {
      content: await toBuffer(content),
      options: { ...options },
      lastModified,
    });
    return { lastModified };
  }

  async getBlob(container: string, key: string): Promise<GetBlobResult> {
    this.failIfSimulated("getBlob");
    const blob = this.find(container, key);
    return {
      properties: this.propertiesOf(blob),
      contentStream: Readable.from([blob.content]),
    };
  }

  async getBlobMetadata(container: string, key: string): Promise<GetBlobMetadataResult> {
    this.failIfSimulated("getBlobMetadata");
    const blob = this.find(container, key);
    return {
      properties: this.propertiesOf(blob),
      metadata: { ...(blob.options.metadata ?? {}) },
    };
  }

  async deleteBlob(container: string, key: string): Promise<void> {
    this.failIfSimulated("deleteBlob");
    if (!this.bucket(container).delete(key)) {
      throw blobNotFound(container, key);
    }
  }

  async copyBlob(
    container: string,
    destKey: string,
    sourceContainer: string,
    sourceKey: string,
  ): Promise<void> {
    this.failIfSimulated("copyBlob");
    const source = this.find(sourceContainer, sourceKey);
    this.bucket(container).set(destKey, {
      content: Buffer.from(source.content),
      options: { ...source.options },
      lastModified: this.now(),
    });
  }

  async listBlobs(container: string, options: ListBlobsOptions): Promise<ListBlobsResult> {
    this.failIfSimulated("listBlobs");
    const bucket = this.bucket(container);
    const blobs = this.keys(container)
      .filter((key) => key.startsWith(options.prefix))
      .map((name) => {
        const blob = bucket.get(name);
        if (!blob) throw blobNotFound(container, name);
        return { name, properties: this.propertiesOf(blob) };
      });
    return { blobs, prefixes: [] };
  }

  private failIfSimulated(operation: BlobOperation): void {
    const statusCode = this.failures.get(operation);
    if (statusCode !== undefined) {
      throw new RestError(`Simulated ${operation} failure`, { statusCode });
    }
  }

  private bucket(container: string): Map<string, StoredBlob> {
    let bucket = this.containers.get(container);
    if (!bucket) {
      bucket = new Map();
      this.containers.set(container, bucket);
    }
    return bucket;
  }

  private find(container: string, key: string): StoredBlob {
    const blob = this.bucket(container).get(key);
    if (!blob) throw blobNotFound(container, key);
    return blob;
  }

  private propertiesOf(blob: StoredBlob): RawBlobProperties {
    return {
      lastModified: blob.lastModified,
      contentType: blob.options.contentType ?? null,
      contentLength: blob.content.length,
    };
  }
}
