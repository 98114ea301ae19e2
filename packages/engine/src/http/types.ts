import type { HeaderMap } from "./headers.js";

export interface RequestLine {
  readonly method: string;
  /** Always starts with "/". */
  readonly path: string;
  /** Full protocol token, e.g. "HTTP/1.1". */
  readonly version: string;
}

export interface HttpRequest {
  line: RequestLine;
  headers: HeaderMap;
  /** Absent when the body is empty or whitespace-only. */
  body?: Uint8Array;
}

export const STATUS_TEXT = {
  200: "OK",
  201: "Created",
  404: "Not Found",
} as const;

export type HttpStatus = keyof typeof STATUS_TEXT;

export interface HttpResponse {
  status: HttpStatus;
  statusText: string;
  headers: HeaderMap;
  body: Uint8Array;
}
