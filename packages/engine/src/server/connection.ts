import { parseRequest } from "../http/request-parser.js";
import { withHeader, writeResponse } from "../http/response-writer.js";
import { SocketReader } from "../http/socket-reader.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import { describePeer, type ITcpSocket } from "../interfaces/socket.js";
import type { ConnectionObserver } from "./connection-observer.js";
import { dispatchRequest, type RouteContext } from "./route-handlers.js";

export type ConnectionState =
  | "AWAITING_REQUEST"
  | "DISPATCHING"
  | "RESPONDING"
  | "CLOSING";

export interface ConnectionOptions {
  context: RouteContext;
  observer: ConnectionObserver;
  /** Maximum bytes taken by one read; one read is treated as one request. */
  readBufferSize: number;
  onStateChange?: (state: ConnectionState) => void;
}

/**
 * Serve one client until it closes, asks to close, speaks something other
 * than HTTP/1.1, or a request fails. Requests are handled strictly one
 * after another. Parse and handler failures are reported to the observer
 * and end the connection without a response. Never rejects.
 */
export async function serveConnection(
  socket: ITcpSocket,
  options: ConnectionOptions,
): Promise<void> {
  const { context, observer, readBufferSize } = options;
  const peer = describePeer(socket);
  const reader = new SocketReader(socket, {
    highWaterMark: readBufferSize,
  });

  const enter = (next: ConnectionState): ConnectionState => {
    options.onStateChange?.(next);
    return next;
  };
  let state = enter("AWAITING_REQUEST");

  observer.onConnect(peer);

  try {
    while (state === "AWAITING_REQUEST") {
      const raw = await reader.read(readBufferSize);
      observer.onReceive(peer, raw);
      if (raw.length === 0) {
        state = enter("CLOSING");
        break;
      }

      state = enter("DISPATCHING");
      const request = parseRequest(raw);
      let response: Readonly<HttpResponse> = await dispatchRequest(
        request,
        context,
      );

      state = enter("RESPONDING");
      const closeRequested = request.headers.get("Connection") === "close";
      if (closeRequested) {
        response = withHeader(response, "Connection", "close");
      }
      await writeResponse(socket, response);

      state = enter(
        closeRequested || !keepsAlive(request) ? "CLOSING" : "AWAITING_REQUEST",
      );
    }
  } catch (err) {
    observer.onError(peer, err);
  } finally {
    if (state !== "CLOSING") {
      state = enter("CLOSING");
    }
    socket.close();
    observer.onDisconnect(peer);
  }
}

function keepsAlive(request: HttpRequest): boolean {
  return request.line.version === "HTTP/1.1";
}
