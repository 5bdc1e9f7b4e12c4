import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { InvalidSourceError } from "../src/errors.js";
import {
  deriveFileName,
  downloadFile,
  extensionForMimeType,
  getMimeType,
  isSupportedFile,
  isUrl,
  MAX_UPLOAD_BYTES,
  nameForType,
  readLocalFile,
  readSource,
  type Fetcher,
} from "../src/services/uploads.js";

let dir: string;

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "vstore-uploads-"));
  fs.writeFileSync(path.join(dir, "notes.txt"), "hello");
  fs.writeFileSync(path.join(dir, "empty.md"), "");
  fs.writeFileSync(path.join(dir, "tool.exe"), "binary");
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("file type helpers", () => {
  it("recognizes supported extensions case-insensitively", () => {
    expect(isSupportedFile("Report.PDF")).toBe(true);
    expect(isSupportedFile("archive.zip")).toBe(false);
    expect(isSupportedFile("README")).toBe(false);
  });

  it("maps extensions to MIME types", () => {
    expect(getMimeType("a.md")).toBe("text/markdown");
    expect(getMimeType("a.unknown")).toBe("application/octet-stream");
  });

  it("detects http and https URLs only", () => {
    expect(isUrl("https://docs.test/a.pdf")).toBe(true);
    expect(isUrl("HTTP://docs.test/a.pdf")).toBe(true);
    expect(isUrl("ftp://docs.test/a.pdf")).toBe(false);
    expect(isUrl("./a.pdf")).toBe(false);
  });
});

describe("readLocalFile", () => {
  it("reads a supported file", () => {
    const upload = readLocalFile(path.join(dir, "notes.txt"));

    expect(upload.fileName).toBe("notes.txt");
    expect(upload.mimeType).toBe("text/plain");
    expect(upload.content.toString("utf8")).toBe("hello");
  });

  it("rejects a missing file", () => {
    const missing = path.join(dir, "missing.txt");
    expect(() => readLocalFile(missing)).toThrow(
      `Cannot read source '${missing}': file not found`
    );
  });

  it("rejects a directory", () => {
    expect(() => readLocalFile(dir)).toThrow("not a regular file");
  });

  it("rejects unsupported types", () => {
    expect(() => readLocalFile(path.join(dir, "tool.exe"))).toThrow(
      /unsupported file type \.exe/
    );
  });

  it("rejects empty files", () => {
    expect(() => readLocalFile(path.join(dir, "empty.md"))).toThrow(
      "file is empty"
    );
  });
});

describe("deriveFileName", () => {
  it("uses the last URL path segment", () => {
    expect(deriveFileName("https://docs.test/a/b/report.pdf?x=1")).toBe(
      "report.pdf"
    );
    expect(deriveFileName("https://docs.test/files/my%20doc.md")).toBe(
      "my doc.md"
    );
  });

  it("prefers Content-Disposition", () => {
    expect(
      deriveFileName(
        "https://docs.test/download",
        'attachment; filename="q3 plan.docx"'
      )
    ).toBe("q3 plan.docx");
    expect(
      deriveFileName(
        "https://docs.test/download",
        "attachment; filename*=UTF-8''r%C3%A9sum%C3%A9.pdf"
      )
    ).toBe("résumé.pdf");
    expect(
      deriveFileName("https://docs.test/download", "attachment; filename=plain.txt")
    ).toBe("plain.txt");
  });

  it("returns an empty name for an invalid URL", () => {
    expect(deriveFileName("not a url")).toBe("");
  });
});

describe("nameForType", () => {
  it("keeps a name that has an extension", () => {
    expect(nameForType("notes.txt", "application/pdf")).toBe("notes.txt");
    expect(nameForType("archive.zip", "text/plain")).toBe("archive.zip");
  });

  it("takes the extension from the served type", () => {
    expect(extensionForMimeType("Application/PDF")).toBe(".pdf");
    expect(nameForType("download", "application/pdf")).toBe("download.pdf");
    expect(nameForType("report", "text/markdown")).toBe("report.md");
    expect(nameForType("", "text/plain")).toBe("download.txt");
  });

  it("leaves the name alone for unknown types", () => {
    expect(nameForType("blob", "application/octet-stream")).toBe("blob");
    expect(nameForType("blob", undefined)).toBe("blob");
  });
});

describe("downloadFile", () => {
  it("downloads into an upload using the response content type", async () => {
    const fetcher = vi.fn<Fetcher>(async () =>
      new Response("# Title", {
        headers: { "content-type": "text/markdown; charset=utf-8" },
      })
    );

    const upload = await downloadFile("https://docs.test/guide.md", fetcher);

    expect(upload.fileName).toBe("guide.md");
    expect(upload.mimeType).toBe("text/markdown");
    expect(upload.content.toString("utf8")).toBe("# Title");
    expect(fetcher).toHaveBeenCalledWith(
      "https://docs.test/guide.md",
      expect.objectContaining({ redirect: "follow" })
    );
  });

  it("names an extensionless download after its content type", async () => {
    const fetcher: Fetcher = async () =>
      new Response("%PDF-1.7", { headers: { "content-type": "application/pdf" } });

    const upload = await downloadFile("https://docs.test/download?id=42", fetcher);

    expect(upload.fileName).toBe("download.pdf");
    expect(upload.mimeType).toBe("application/pdf");
  });

  it("stops reading a body without Content-Length once it passes the cap", async () => {
    const chunk = new Uint8Array(1024 * 1024);
    let pulled = 0;
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulled += chunk.byteLength;
        controller.enqueue(chunk);
      },
    });
    const fetcher: Fetcher = async () =>
      new Response(body, { headers: { "content-type": "text/plain" } });

    await expect(
      downloadFile("https://docs.test/huge.txt", fetcher)
    ).rejects.toThrow(`file is larger than ${MAX_UPLOAD_BYTES} bytes`);
    expect(pulled).toBeLessThan(MAX_UPLOAD_BYTES + 4 * chunk.byteLength);
  });

  it("rejects a declared Content-Length over the cap", async () => {
    const fetcher: Fetcher = async () =>
      new Response("small", {
        headers: { "content-length": String(MAX_UPLOAD_BYTES + 1) },
      });

    await expect(
      downloadFile("https://docs.test/big.txt", fetcher)
    ).rejects.toThrow("file is larger than");
  });

  it("rejects HTTP errors", async () => {
    const fetcher: Fetcher = async () => new Response("missing", { status: 404 });

    await expect(
      downloadFile("https://docs.test/guide.md", fetcher)
    ).rejects.toThrow(
      "Cannot read source 'https://docs.test/guide.md': download failed (HTTP 404)"
    );
  });

  it("wraps network failures", async () => {
    const fetcher: Fetcher = async () => {
      throw new Error("connect ECONNREFUSED");
    };

    const error = await downloadFile("https://docs.test/guide.md", fetcher).catch(
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(InvalidSourceError);
    expect(error).toHaveProperty(
      "message",
      "Cannot read source 'https://docs.test/guide.md': connect ECONNREFUSED"
    );
  });

  it("rejects downloads of unsupported types", async () => {
    const fetcher: Fetcher = async () => new Response("data");

    await expect(
      downloadFile("https://docs.test/archive.zip", fetcher)
    ).rejects.toThrow(/unsupported file type \.zip/);
  });
});

describe("readSource", () => {
  it("routes URLs to the fetcher and paths to the filesystem", async () => {
    const fetcher = vi.fn<Fetcher>(async () => new Response("remote"));

    const remote = await readSource("https://docs.test/remote.txt", fetcher);
    const local = await readSource(path.join(dir, "notes.txt"), fetcher);

    expect(remote.content.toString("utf8")).toBe("remote");
    expect(local.content.toString("utf8")).toBe("hello");
    expect(fetcher).toHaveBeenCalledTimes(1);
  });
});
