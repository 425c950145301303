import { Readable } from "node:stream";
import {
  normalizeBlobProperties,
  normalizeUpload,
  readContents,
  streamToBuffer,
  toUnixTimestamp,
} from "../../../srv/lib/metadata-normalizer";

describe("metadata-normalizer", () => {
  describe("toUnixTimestamp", () => {
    it("should convert dates to whole seconds", () => {
      expect(toUnixTimestamp(new Date("2014-12-02T08:09:01.900Z"))).toBe(1417507741);
    });

    it("should parse header strings", () => {
      expect(toUnixTimestamp("Tue, 02 Dec 2014 08:09:01 GMT")).toBe(1417507741);
    });

    it("should throw on values that are not dates", () => {
      expect(() => toUnixTimestamp("yesterday-ish")).toThrow(
        "Invalid last-modified value: yesterday-ish",
      );
    });
  });

  describe("normalizeUpload", () => {
    it("should include contents when given", () => {
      expect(normalizeUpload("bar/foo.txt", new Date(0), "content")).toStrictEqual({
        path: "bar/foo.txt",
        timestamp: 0,
        dirname: "bar",
        type: "file",
        contents: "content",
      });
    });

    it("should omit contents otherwise", () => {
      expect(normalizeUpload("foo.txt", new Date(0))).toStrictEqual({
        path: "foo.txt",
        timestamp: 0,
        dirname: "",
        type: "file",
      });
    });
  });

  describe("normalizeBlobProperties", () => {
    it("should map content type and length", () => {
      expect(
        normalizeBlobProperties("docs/a.md", {
          lastModified: new Date(5000),
          contentType: "text/markdown",
          contentLength: 12,
        }),
      ).toEqual({
        path: "docs/a.md",
        timestamp: 5,
        dirname: "docs",
        mimetype: "text/markdown",
        size: 12,
        type: "file",
      });
    });

    it("should report a missing content type as null", () => {
      expect(normalizeBlobProperties("a", { lastModified: new Date(0) }).mimetype).toBeNull();
    });
  });

  describe("streamToBuffer", () => {
    it("should concatenate string and buffer chunks", async () => {
      const stream = Readable.from([Buffer.from([0xff, 0x00]), "a"]);

      await expect(streamToBuffer(stream)).resolves.toEqual(Buffer.from([0xff, 0x00, 0x61]));
    });
  });

  describe("readContents", () => {
    it("should concatenate string and buffer chunks", async () => {
      const stream = Readable.from([Buffer.from("foo "), "bar"]);

      await expect(readContents(stream)).resolves.toBe("foo bar");
    });

    it("should keep multi-byte characters split across chunks", async () => {
      const bytes = Buffer.from("café", "utf8");
      const stream = Readable.from([bytes.subarray(0, 4), bytes.subarray(4)]);

      await expect(readContents(stream)).resolves.toBe("café");
    });

    it("should return bytes that are not valid UTF-8 as a Buffer", async () => {
      const bytes = Buffer.from([0xff, 0x00, 0x80]);

      const contents = await readContents(Readable.from([bytes]));

      expect(Buffer.isBuffer(contents)).toBe(true);
      expect(contents).toEqual(bytes);
    });
  });
});
