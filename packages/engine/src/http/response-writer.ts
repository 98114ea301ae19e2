import { gzipSync } from "node:zlib";
import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { type HeaderInit, HeaderMap } from "./headers.js";
import { type HttpResponse, type HttpStatus, STATUS_TEXT } from "./types.js";

export interface BuildResponseOptions {
  headers?: HeaderInit;
  body?: Uint8Array;
  /** The request's Accept-Encoding value, if any. */
  acceptEncoding?: string;
}

/**
 * Substring match, not full negotiation: q-values and "gzip;q=0" are not
 * interpreted.
 */
export function acceptsGzip(acceptEncoding: string | undefined): boolean {
  return acceptEncoding !== undefined && acceptEncoding.includes("gzip");
}

/**
 * Build a response with final framing headers. The body is compressed
 * before Content-Length is computed, so the length always describes the
 * bytes that go on the wire.
 */
export function buildResponse(
  status: HttpStatus,
  options: BuildResponseOptions = {},
): HttpResponse {
  const headers = new HeaderMap(options.headers);
  let body = options.body ?? new Uint8Array(0);

  if (acceptsGzip(options.acceptEncoding)) {
    body = new Uint8Array(gzipSync(body));
    headers.set("Content-Length", String(body.length));
    headers.set("Content-Encoding", "gzip");
  } else {
    headers.set("Content-Length", String(body.length));
  }

  return { status, statusText: STATUS_TEXT[status], headers, body };
}

function staticResponse(status: HttpStatus): Readonly<HttpResponse> {
  const response = buildResponse(status);
  response.headers.lock();
  return Object.freeze(response);
}

export const RESPONSE_OK = staticResponse(200);
export const RESPONSE_CREATED = staticResponse(201);
export const RESPONSE_NOT_FOUND = staticResponse(404);

/** Copy of `response` with one header added or replaced. */
export function withHeader(
  response: Readonly<HttpResponse>,
  name: string,
  value: string,
): HttpResponse {
  return {
    ...response,
    headers: response.headers.clone().set(name, value),
  };
}

export function serializeResponse(response: Readonly<HttpResponse>): Uint8Array {
  let head = `HTTP/1.1 ${response.status} ${response.statusText}\r\n`;
  for (const [key, value] of response.headers) {
    head += `${key}: ${value}\r\n`;
  }
  head += "\r\n";
  return concat([fromString(head), response.body]);
}

/**
 * Write a serialized response, waiting for the socket to accept it when
 * the socket supports drain-aware writes.
 */
export async function writeResponse(
  socket: ITcpSocket,
  response: Readonly<HttpResponse>,
): Promise<void> {
  const data = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(data);
    return;
  }
  socket.send(data);
}
