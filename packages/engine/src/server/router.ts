import type { HttpRequest } from "../http/types.js";

export type Route =
  | { kind: "root" }
  | { kind: "echo"; text: string }
  | { kind: "user-agent" }
  | { kind: "file-get"; name: string }
  | { kind: "file-post"; name: string }
  | { kind: "not-found" };

export type RouteKind = Route["kind"];

export type RoutesByKind = { [R in Route as R["kind"]]: R };

/**
 * Map a request to a route from its path segments. Segment counts must
 * match exactly, so "/echo/a/b" is not an echo of "a/b".
 */
export function routeRequest(request: HttpRequest): Route {
  const segments = request.line.path.split("/").slice(1);

  if (segments.length === 1 && segments[0] === "") {
    return { kind: "root" };
  }

  if (segments.length === 1 && segments[0] === "user-agent") {
    return { kind: "user-agent" };
  }

  if (segments.length === 2) {
    const [head, tail] = segments;
    if (head === "echo") {
      return { kind: "echo", text: tail };
    }
    if (head === "files" && request.line.method === "GET") {
      return { kind: "file-get", name: tail };
    }
    if (head === "files" && request.line.method === "POST") {
      return { kind: "file-post", name: tail };
    }
  }

  return { kind: "not-found" };
}
