// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  HttpRequestParseErrorCode,
  RouteErrorCode,
} from "./http/errors.js";
export {
  HttpRequestParseError,
  ResourceNotFoundError,
  RouteError,
} from "./http/errors.js";
export type { HeaderInit } from "./http/headers.js";
export { HeaderMap } from "./http/headers.js";
export {
  parseHeaders,
  parseRequest,
  parseRequestLine,
} from "./http/request-parser.js";
export type { BuildResponseOptions } from "./http/response-writer.js";
export {
  acceptsGzip,
  buildResponse,
  RESPONSE_CREATED,
  RESPONSE_NOT_FOUND,
  RESPONSE_OK,
  serializeResponse,
  withHeader,
  writeResponse,
} from "./http/response-writer.js";
export type { SocketReaderOptions } from "./http/socket-reader.js";
export { SocketReader } from "./http/socket-reader.js";
export type {
  HttpRequest,
  HttpResponse,
  HttpStatus,
  RequestLine,
} from "./http/types.js";
export { STATUS_TEXT } from "./http/types.js";
// Interfaces
export type { IFileSystem } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
export { describePeer } from "./interfaces/socket.js";
// Logging
export type { LogEntry, Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  LogStore,
  prefixedLogger,
  storeLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { ConnectionOptions, ConnectionState } from "./server/connection.js";
export { serveConnection } from "./server/connection.js";
export type {
  ConnectionObserver,
  LoggingObserverOptions,
} from "./server/connection-observer.js";
export { loggingObserver } from "./server/connection-observer.js";
export type { RouteContext, RouteHandler } from "./server/route-handlers.js";
export {
  dispatchRequest,
  resolveFilePath,
  ROUTE_HANDLERS,
} from "./server/route-handlers.js";
export type { Route, RouteKind } from "./server/router.js";
export { routeRequest } from "./server/router.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export {
  InMemoryClient,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
