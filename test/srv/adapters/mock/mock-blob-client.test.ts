import { Readable } from "node:stream";
import { MockBlobClient } from "../../../../srv/adapters/mock/mock-blob-client";
import { readContents } from "../../../../srv/lib/metadata-normalizer";

const NOW = new Date("2024-05-01T10:00:00Z");

describe("MockBlobClient", () => {
  let client: MockBlobClient;

  beforeEach(() => {
    client = new MockBlobClient(() => NOW);
  });

  it("should store and return blob content with its properties", async () => {
    await expect(
      client.createOrReplaceBlob("files", "a.txt", "hello", { contentType: "text/plain" }),
    ).resolves.toEqual({ lastModified: NOW });

    const blob = await client.getBlob("files", "a.txt");

    expect(blob.properties).toEqual({
      lastModified: NOW,
      contentType: "text/plain",
      contentLength: 5,
    });
    await expect(readContents(blob.contentStream)).resolves.toBe("hello");
  });

  it("should drain uploaded streams", async () => {
    await client.createOrReplaceBlob("files", "s.txt", Readable.from(["a", "b"]), {});

    const blob = await client.getBlob("files", "s.txt");

    await expect(readContents(blob.contentStream)).resolves.toBe("ab");
    expect(blob.properties.contentType).toBeNull();
  });

  it("should return user metadata", async () => {
    await client.createOrReplaceBlob("files", "a.txt", "x", { metadata: { owner: "ops" } });

    await expect(client.getBlobMetadata("files", "a.txt")).resolves.toEqual({
      properties: { lastModified: NOW, contentType: null, contentLength: 1 },
      metadata: { owner: "ops" },
    });
  });

  it("should raise 404 for missing blobs", async () => {
    await expect(client.getBlobMetadata("files", "missing.txt")).rejects.toMatchObject({
      statusCode: 404,
      code: "BlobNotFound",
    });
    await expect(client.deleteBlob("files", "missing.txt")).rejects.toMatchObject({
      statusCode: 404,
    });
  });

  it("should keep containers separate", async () => {
    await client.createOrReplaceBlob("one", "a.txt", "x", {});

    expect(client.keys("one")).toEqual(["a.txt"]);
    expect(client.keys("two")).toEqual([]);
  });

  it("should copy between keys", async () => {
    await client.createOrReplaceBlob("files", "from.txt", "copy me", {});

    await client.copyBlob("files", "to.txt", "files", "from.txt");

    const blob = await client.getBlob("files", "to.txt");
    await expect(readContents(blob.contentStream)).resolves.toBe("copy me");
    expect(client.keys("files")).toEqual(["from.txt", "to.txt"]);
  });

  it("should list sorted keys by prefix without common prefixes", async () => {
    await client.createOrReplaceBlob("files", "docs/b.txt", "b", {});
    await client.createOrReplaceBlob("files", "docs/a.txt", "a", {});
    await client.createOrReplaceBlob("files", "readme.md", "r", {});

    const result = await client.listBlobs("files", { prefix: "docs/" });

    expect(result.blobs.map((blob) => blob.name)).toEqual(["docs/a.txt", "docs/b.txt"]);
    expect(result.prefixes).toEqual([]);
  });

  it("should fail simulated operations until cleared", async () => {
    client.simulateFailure("listBlobs", 500);

    await expect(client.listBlobs("files", { prefix: "" })).rejects.toMatchObject({
      statusCode: 500,
      message: "Simulated listBlobs failure",
    });

    client.clearFailures();
    await expect(client.listBlobs("files", { prefix: "" })).resolves.toEqual({
      blobs: [],
      prefixes: [],
    });
  });
});
