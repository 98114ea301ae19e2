import { decodeStrict, isBlank, splitLines } from "../utils/buffer.js";
import { HttpRequestParseError } from "./errors.js";
import { HeaderMap } from "./headers.js";
import type { HttpRequest, RequestLine } from "./types.js";

export function parseRequestLine(text: string): RequestLine {
  const parts = text.trim().split(" ");
  if (parts.length !== 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: ${JSON.stringify(text)}`,
    );
  }

  const [method, path, version] = parts;
  if (!path.startsWith("/")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Request path must start with "/": ${JSON.stringify(path)}`,
    );
  }

  return Object.freeze({ method, path, version });
}

/**
 * Lines without a colon are skipped. A repeated name overwrites the
 * earlier value.
 */
export function parseHeaders(lines: Iterable<string>): HeaderMap {
  const headers = new HeaderMap();
  for (const line of lines) {
    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) continue;
    const key = line.substring(0, colonIdx).trim();
    const value = line.substring(colonIdx + 1).trim();
    headers.set(key, value);
  }
  return headers;
}

/**
 * Parse a request held entirely in one read buffer.
 *
 * The first line is the request line, the last line is the body and
 * everything in between is a header line. The blank separator line ends
 * up among the header lines, where it is dropped for lacking a colon.
 * Only single-line bodies survive this split; Content-Length is not
 * consulted.
 */
export function parseRequest(raw: Uint8Array): HttpRequest {
  const lines = splitLines(raw);
  if (lines.length < 2) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST",
      `Malformed request: expected at least 2 lines, got ${lines.length}`,
    );
  }

  const line = parseRequestLine(decodeHead(lines[0]));
  const headers = parseHeaders(lines.slice(1, -1).map(decodeHead));
  const last = lines[lines.length - 1];

  return {
    line,
    headers,
    body: isBlank(last) ? undefined : last.slice(),
  };
}

function decodeHead(bytes: Uint8Array): string {
  try {
    return decodeStrict(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      throw new HttpRequestParseError(
        "MALFORMED_REQUEST",
        "Request line or header is not valid UTF-8",
      );
    }
    throw err;
  }
}
