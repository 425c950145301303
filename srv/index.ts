export { BlobStorageAdapter } from "./adapters/blob-storage-adapter";
export type { BlobStorageAdapterOptions } from "./adapters/blob-storage-adapter";
export {
  AzureStorageBlobClient,
  createBlobServiceClient,
} from "./adapters/azure-storage-blob-client";
export { MockBlobClient } from "./adapters/mock/mock-blob-client";
export {
  getBlobStorage,
  setBlobStorage,
  resetBlobStorage,
} from "./adapters/factory/adapter-factory";
export { buildListing } from "./lib/directory-listing";
export type { RecursiveListingMode } from "./lib/directory-listing";
export { loadStorageConfig } from "./lib/storage-config";
export type { StorageConfig } from "./lib/storage-config";
export type * from "./adapters/interfaces/blob-client.interface";
export type * from "./adapters/interfaces/filesystem.interface";
