export interface FileMetadata {
  path: string;
  /** Unix epoch seconds. */
  timestamp: number;
  /** Parent path, `""` at the root. */
  dirname: string;
  type: "file";
  mimetype?: string | null;
  size?: number;
  contents?: string | Buffer;
  stream?: NodeJS.ReadableStream;
}

export interface DirectoryEntry {
  type: "dir";
  path: string;
}

export type ListingEntry = FileMetadata | DirectoryEntry;

export type FileWithContents = FileMetadata & { contents: string | Buffer };
export type FileWithStream = FileMetadata & { stream: NodeJS.ReadableStream };

/** Options forwarded to the blob store on upload. */
export interface WriteOptions {
  contentType?: string;
  cacheControl?: string;
  metadata?: Record<string, string>;
  contentLanguage?: string;
  contentEncoding?: string;
}

export type MetadataProbe =
  | { kind: "found"; metadata: FileMetadata }
  | { kind: "not-found" }
  | { kind: "error"; statusCode?: number; error: unknown };

export type Visibility = "public" | "private";

export interface IFilesystemAdapter {
  write(path: string, contents: string | Buffer, options?: WriteOptions): Promise<FileMetadata>;
  writeStream(path: string, stream: NodeJS.ReadableStream, options?: WriteOptions): Promise<FileMetadata>;
  update(path: string, contents: string | Buffer, options?: WriteOptions): Promise<FileMetadata>;
  updateStream(path: string, stream: NodeJS.ReadableStream, options?: WriteOptions): Promise<FileMetadata>;
  read(path: string): Promise<FileWithContents>;
  readStream(path: string): Promise<FileWithStream>;
  has(path: string): Promise<boolean>;
  probeMetadata(path: string): Promise<MetadataProbe>;
  delete(path: string): Promise<boolean>;
  deleteDir(dirname: string): Promise<boolean>;
  createDir(dirname: string, options?: WriteOptions): Promise<DirectoryEntry>;
  copy(path: string, newpath: string): Promise<boolean>;
  rename(path: string, newpath: string): Promise<boolean>;
  listContents(directory?: string, recursive?: boolean): Promise<ListingEntry[]>;
  getMetadata(path: string): Promise<FileMetadata>;
  getSize(path: string): Promise<FileMetadata>;
  getMimetype(path: string): Promise<FileMetadata>;
  getTimestamp(path: string): Promise<FileMetadata>;
  getVisibility(path: string): Promise<never>;
  setVisibility(path: string, visibility: Visibility): Promise<never>;
}
