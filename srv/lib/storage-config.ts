import { RECURSIVE_LISTING_MODES } from "./directory-listing";
import type { RecursiveListingMode } from "./directory-listing";

export const AZURE_BLOB_PROVIDER = "azure.blob";
export const MOCK_BLOB_PROVIDER = "mock.blob";

export interface AzureCredentialConfig {
  accountUrl: string;
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface StorageConfig {
  /** Provider key; `""` when none is configured. */
  provider: string;
  container: string;
  prefix: string;
  recursiveListing: RecursiveListingMode;
  connectionString?: string;
  credential?: AzureCredentialConfig;
}

function isRecursiveListingMode(value: string): value is RecursiveListingMode {
  return RECURSIVE_LISTING_MODES.some((mode) => mode === value);
}

/**
 * Read blob storage settings from the environment.
 * Throws when a value is present but unusable.
 */
export function loadStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const container = env.AZURE_STORAGE_CONTAINER || "";
  if (!container) {
    throw new Error("Missing env AZURE_STORAGE_CONTAINER");
  }

  const recursiveListing = (env.BLOB_STORAGE_RECURSIVE_LISTING || "flat").trim().toLowerCase();
  if (!isRecursiveListingMode(recursiveListing)) {
    throw new Error(
      `Invalid env BLOB_STORAGE_RECURSIVE_LISTING: "${recursiveListing}" (expected ${RECURSIVE_LISTING_MODES.join(" or ")})`,
    );
  }

  const config: StorageConfig = {
    provider: env.BLOB_STORAGE_PROVIDER || "",
    container,
    prefix: env.BLOB_STORAGE_PATH_PREFIX || "",
    recursiveListing,
  };

  if (env.AZURE_STORAGE_CONNECTION_STRING) {
    config.connectionString = env.AZURE_STORAGE_CONNECTION_STRING;
  } else if (env.AZURE_STORAGE_ACCOUNT_URL) {
    config.credential = {
      accountUrl: env.AZURE_STORAGE_ACCOUNT_URL,
      tenantId: env.AZURE_STORAGE_TENANT_ID || "",
      clientId: env.AZURE_STORAGE_CLIENT_ID || "",
      clientSecret: env.AZURE_STORAGE_CLIENT_SECRET || "",
    };
  }

  return config;
}
