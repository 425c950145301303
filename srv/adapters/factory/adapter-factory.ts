import cds from "@sap/cds";
import type { IBlobClient } from "../interfaces/blob-client.interface";
import type { IFilesystemAdapter } from "../interfaces/filesystem.interface";
import { BlobStorageAdapter } from "../blob-storage-adapter";
import {
  AzureStorageBlobClient,
  createBlobServiceClient,
} from "../azure-storage-blob-client";
import { MockBlobClient } from "../mock/mock-blob-client";
import { withCallLogging } from "../../lib/call-logger";
import {
  loadStorageConfig,
  AZURE_BLOB_PROVIDER,
  MOCK_BLOB_PROVIDER,
} from "../../lib/storage-config";
import type { StorageConfig } from "../../lib/storage-config";

const LOG = cds.log("adapter-factory");

const COMPONENT = "BlobStorageAdapter";

/** Registry of blob client constructors by provider key. */
const CLIENT_REGISTRY: Record<string, (config: StorageConfig) => IBlobClient> = {
  [AZURE_BLOB_PROVIDER]: (config) => new AzureStorageBlobClient(createBlobServiceClient(config)),
  [MOCK_BLOB_PROVIDER]: () => new MockBlobClient(),
};

let instance: IFilesystemAdapter | undefined;

/**
 * Wrap every prototype method of the adapter with call logging.
 */
function wrapWithLogging(adapter: BlobStorageAdapter, providerKey: string): IFilesystemAdapter {
  const call = <TArgs extends unknown[], TResult>(
    operation: string,
    fn: (...args: TArgs) => Promise<TResult>,
  ) => withCallLogging(COMPONENT, providerKey, fn, operation);

  return {
    write: call("write", adapter.write.bind(adapter)),
    writeStream: call("writeStream", adapter.writeStream.bind(adapter)),
    update: call("update", adapter.update.bind(adapter)),
    updateStream: call("updateStream", adapter.updateStream.bind(adapter)),
    read: call("read", adapter.read.bind(adapter)),
    readStream: call("readStream", adapter.readStream.bind(adapter)),
    has: call("has", adapter.has.bind(adapter)),
    probeMetadata: call("probeMetadata", adapter.probeMetadata.bind(adapter)),
    delete: call("delete", adapter.delete.bind(adapter)),
    deleteDir: call("deleteDir", adapter.deleteDir.bind(adapter)),
    createDir: call("createDir", adapter.createDir.bind(adapter)),
    copy: call("copy", adapter.copy.bind(adapter)),
    rename: call("rename", adapter.rename.bind(adapter)),
    listContents: call("listContents", adapter.listContents.bind(adapter)),
    getMetadata: call("getMetadata", adapter.getMetadata.bind(adapter)),
    getSize: call("getSize", adapter.getSize.bind(adapter)),
    getMimetype: call("getMimetype", adapter.getMimetype.bind(adapter)),
    getTimestamp: call("getTimestamp", adapter.getTimestamp.bind(adapter)),
    getVisibility: call("getVisibility", adapter.getVisibility.bind(adapter)),
    setVisibility: call("setVisibility", adapter.setVisibility.bind(adapter)),
  };
}

/**
 * Resolve the blob client for the configured provider.
 * A missing or unknown provider key falls back to the in-memory mock.
 */
function resolveClient(config: StorageConfig): { client: IBlobClient; providerKey: string } {
  if (!config.provider) {
    return resolveWithMockFallback(config, "no provider configured");
  }

  const factory = CLIENT_REGISTRY[config.provider];
  if (!factory) {
    return resolveWithMockFallback(
      config,
      `no blob client registered for provider key '${config.provider}'`,
    );
  }

  return { client: factory(config), providerKey: config.provider };
}

function resolveWithMockFallback(
  config: StorageConfig,
  reason: string,
): { client: IBlobClient; providerKey: string } {
  LOG.warn(`Falling back to in-memory blob storage: ${reason} → using '${MOCK_BLOB_PROVIDER}'`);
  return { client: CLIENT_REGISTRY[MOCK_BLOB_PROVIDER](config), providerKey: MOCK_BLOB_PROVIDER };
}

/**
 * Get or create the filesystem adapter for the configured blob store.
 * All adapter calls are logged.
 */
export function getBlobStorage(): IFilesystemAdapter {
  if (instance) return instance;

  const config = loadStorageConfig();
  const { client, providerKey } = resolveClient(config);
  const adapter = new BlobStorageAdapter(client, config.container, {
    prefix: config.prefix,
    recursiveListing: config.recursiveListing,
  });

  LOG.info(
    `Resolved blob storage: provider=${providerKey} container=${config.container}` +
      (config.prefix ? ` prefix=${config.prefix}` : ""),
  );
  instance = wrapWithLogging(adapter, providerKey);
  return instance;
}

export function setBlobStorage(adapter: IFilesystemAdapter): void {
  instance = adapter;
}

/**
 * Drop the cached adapter so the next call re-reads configuration.
 */
export function resetBlobStorage(): void {
  instance = undefined;
}
