import * as fs from "fs";
import * as path from "path";
import { errorMessage, InvalidSourceError } from "../errors.js";
import type { FileUpload } from "./backend.js";

/**
 * Hard cap on any single upload (50 MiB)
 */
export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

/**
 * How long a URL download may take before it is abandoned
 */
const DOWNLOAD_TIMEOUT_MS = 60 * 1000;

/**
 * File types the file_search tool can index, with their MIME types
 */
const MIME_TYPES: Record<string, string> = {
  ".c": "text/x-c",
  ".cpp": "text/x-c++",
  ".cs": "text/x-csharp",
  ".css": "text/css",
  ".doc": "application/msword",
  ".docx":
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".go": "text/x-golang",
  ".html": "text/html",
  ".java": "text/x-java",
  ".js": "text/javascript",
  ".json": "application/json",
  ".md": "text/markdown",
  ".pdf": "application/pdf",
  ".php": "text/x-php",
  ".pptx":
    "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".py": "text/x-python",
  ".rb": "text/x-ruby",
  ".sh": "application/x-sh",
  ".tex": "text/x-tex",
  ".ts": "application/typescript",
  ".txt": "text/plain",
};

export const SUPPORTED_EXTENSIONS = Object.keys(MIME_TYPES);

const EXTENSIONS_BY_MIME = new Map(
  Object.entries(MIME_TYPES).map(([ext, mime]) => [mime, ext])
);

/**
 * Check if a file name has an extension the file_search tool indexes
 */
export function isSupportedFile(fileName: string): boolean {
  const ext = path.extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.includes(ext);
}

/**
 * Get the MIME type for a file based on its extension
 */
export function getMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  return MIME_TYPES[ext] || "application/octet-stream";
}

/**
 * Supported extension for a MIME type, if any
 */
export function extensionForMimeType(
  mimeType: string | undefined
): string | undefined {
  return mimeType ? EXTENSIONS_BY_MIME.get(mimeType.toLowerCase()) : undefined;
}

/**
 * Give a downloaded file without an extension the one of its served type.
 * `download` stands in for a missing name.
 */
export function nameForType(
  fileName: string,
  mimeType: string | undefined
): string {
  if (path.extname(fileName)) return fileName;

  const ext = extensionForMimeType(mimeType);
  if (!ext) return fileName;

  return `${fileName || "download"}${ext}`;
}

export function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

function decodePercent(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Strip quotes, percent-encoding and any directory part from a name hint
 */
function cleanName(raw: string): string {
  const name = decodePercent(raw.trim().replace(/^"+|"+$/g, ""));
  const segments = name.split(/[\\/]/);
  return segments[segments.length - 1] ?? "";
}

/**
 * Derive a file name for a download.
 * Order: Content-Disposition `filename*=`, then `filename=`, then the URL path.
 */
export function deriveFileName(
  url: string,
  contentDisposition?: string | null
): string {
  if (contentDisposition) {
    const encoded = /filename\*\s*=\s*[^']*'[^']*'([^;\s]+)/i.exec(
      contentDisposition
    );
    if (encoded) return cleanName(encoded[1]);

    const quoted = /filename\s*=\s*"([^"]+)"/i.exec(contentDisposition);
    if (quoted) return cleanName(quoted[1]);

    const bare = /filename\s*=\s*([^";]+)/i.exec(contentDisposition);
    if (bare) return cleanName(bare[1]);
  }

  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return "";
  }
  return cleanName(path.posix.basename(pathname));
}

function checkFileName(source: string, fileName: string): void {
  if (!fileName) {
    throw new InvalidSourceError(source, "cannot determine a file name");
  }
  if (!isSupportedFile(fileName)) {
    const ext = path.extname(fileName) || "(none)";
    throw new InvalidSourceError(
      source,
      `unsupported file type ${ext}. Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`
    );
  }
}

function checkSize(source: string, size: number): void {
  if (size === 0) {
    throw new InvalidSourceError(source, "file is empty");
  }
  if (size > MAX_UPLOAD_BYTES) {
    throw tooLarge(source);
  }
}

/**
 * Read a local file into an upload
 */
export function readLocalFile(filePath: string): FileUpload {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new InvalidSourceError(filePath, "file not found");
  }

  const stat = fs.statSync(absolutePath);
  if (!stat.isFile()) {
    throw new InvalidSourceError(filePath, "not a regular file");
  }

  const fileName = path.basename(absolutePath);
  checkFileName(filePath, fileName);
  checkSize(filePath, stat.size);

  try {
    const content = fs.readFileSync(absolutePath);
    return { fileName, content, mimeType: getMimeType(fileName) };
  } catch (error) {
    throw new InvalidSourceError(filePath, errorMessage(error), {
      cause: error,
    });
  }
}

export type Fetcher = (
  input: string,
  init?: RequestInit
) => Promise<Response>;

function tooLarge(source: string): InvalidSourceError {
  return new InvalidSourceError(
    source,
    `file is larger than ${MAX_UPLOAD_BYTES} bytes`
  );
}

/**
 * Read a response body, giving up as soon as it passes MAX_UPLOAD_BYTES
 */
async function readCapped(
  url: string,
  response: Response,
  controller: AbortController
): Promise<Buffer> {
  if (!response.body) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;

    total += value.byteLength;
    if (total > MAX_UPLOAD_BYTES) {
      await reader.cancel();
      controller.abort();
      throw tooLarge(url);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}

async function fetchBody(
  url: string,
  fetcher: Fetcher
): Promise<{ response: Response; content: Buffer }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), DOWNLOAD_TIMEOUT_MS);

  try {
    const response = await fetcher(url, {
      redirect: "follow",
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new InvalidSourceError(
        url,
        `download failed (HTTP ${response.status})`
      );
    }

    const declared = Number(response.headers.get("content-length"));
    if (Number.isFinite(declared) && declared > MAX_UPLOAD_BYTES) {
      throw tooLarge(url);
    }

    const content = await readCapped(url, response, controller);
    return { response, content };
  } catch (error) {
    if (error instanceof InvalidSourceError) throw error;
    if (error instanceof Error && error.name === "AbortError") {
      throw new InvalidSourceError(
        url,
        `download timed out after ${DOWNLOAD_TIMEOUT_MS / 1000}s`,
        { cause: error }
      );
    }
    throw new InvalidSourceError(url, errorMessage(error), { cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Download a URL into an upload
 */
export async function downloadFile(
  url: string,
  fetcher: Fetcher = fetch
): Promise<FileUpload> {
  const { response, content } = await fetchBody(url, fetcher);

  const contentType = response.headers
    .get("content-type")
    ?.split(";")[0]
    ?.trim();

  const fileName = nameForType(
    deriveFileName(url, response.headers.get("content-disposition")),
    contentType
  );
  checkFileName(url, fileName);
  checkSize(url, content.length);

  return {
    fileName,
    content,
    mimeType: contentType || getMimeType(fileName),
  };
}

/**
 * Read a local path or an http(s) URL into an upload.
 * Any failure is an InvalidSourceError, raised before anything is sent remotely.
 */
export async function readSource(
  source: string,
  fetcher?: Fetcher
): Promise<FileUpload> {
  return isUrl(source) ? downloadFile(source, fetcher) : readLocalFile(source);
}
