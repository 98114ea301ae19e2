import { ResourceNotFoundError, RouteError } from "../http/errors.js";
import {
  buildResponse,
  RESPONSE_CREATED,
  RESPONSE_NOT_FOUND,
  RESPONSE_OK,
} from "../http/response-writer.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import { fromString } from "../utils/buffer.js";
import { type RouteKind, type RoutesByKind, routeRequest } from "./router.js";

export interface RouteContext {
  /** Serving directory for /files/. */
  directory?: string;
  fs: IFileSystem;
}

export type RouteHandler<K extends RouteKind> = (
  route: RoutesByKind[K],
  request: HttpRequest,
  context: RouteContext,
) => Promise<Readonly<HttpResponse>>;

type RouteHandlerTable = { [K in RouteKind]: RouteHandler<K> };

export const ROUTE_HANDLERS: RouteHandlerTable = {
  root: async () => RESPONSE_OK,

  echo: async (route, request) =>
    buildResponse(200, {
      headers: { "Content-Type": "text/plain" },
      body: fromString(route.text),
      acceptEncoding: request.headers.get("Accept-Encoding"),
    }),

  "user-agent": async (_route, request) => {
    const userAgent = request.headers.get("User-Agent");
    if (userAgent === undefined) {
      throw new RouteError(
        "MISSING_USER_AGENT",
        "User-Agent header is missing",
      );
    }
    return buildResponse(200, {
      headers: { "Content-Type": "text/plain" },
      body: fromString(userAgent),
    });
  },

  "file-get": async (route, request, { directory, fs }) => {
    if (directory === undefined || !isServableName(route.name)) {
      return RESPONSE_NOT_FOUND;
    }

    let content: Uint8Array;
    try {
      content = await fs.readFile(resolveFilePath(directory, route.name));
    } catch (err) {
      if (err instanceof ResourceNotFoundError) {
        return RESPONSE_NOT_FOUND;
      }
      throw err;
    }

    return buildResponse(200, {
      headers: { "Content-Type": "application/octet-stream" },
      body: content,
      acceptEncoding: request.headers.get("Accept-Encoding"),
    });
  },

  "file-post": async (route, request, { directory, fs }) => {
    if (directory === undefined) {
      throw new RouteError(
        "DIRECTORY_NOT_CONFIGURED",
        "No serving directory configured for file uploads",
      );
    }
    if (!isServableName(route.name)) {
      return RESPONSE_NOT_FOUND;
    }

    await fs.mkdir(directory);
    await fs.writeFile(
      resolveFilePath(directory, route.name),
      request.body ?? new Uint8Array(0),
    );
    return RESPONSE_CREATED;
  },

  "not-found": async () => RESPONSE_NOT_FOUND,
};

function runHandler<K extends RouteKind>(
  kind: K,
  route: RoutesByKind[K],
  request: HttpRequest,
  context: RouteContext,
): Promise<Readonly<HttpResponse>> {
  return ROUTE_HANDLERS[kind](route, request, context);
}

/** Route a request and run the matching handler. */
export function dispatchRequest(
  request: HttpRequest,
  context: RouteContext,
): Promise<Readonly<HttpResponse>> {
  const route = routeRequest(request);
  return runHandler(route.kind, route, request, context);
}

// Names come from a single path segment, so "/" cannot appear; only the
// dot segments could step outside the directory.
function isServableName(name: string): boolean {
  return name !== "" && name !== "." && name !== "..";
}

export function resolveFilePath(directory: string, name: string): string {
  return `${directory.replace(/\/+$/, "")}/${name}`;
}
