import type { Logger } from "../logging/logger.js";

/** Receives connection lifecycle events from the connection loop. */
export interface ConnectionObserver {
  onConnect(peer: string): void;
  onReceive(peer: string, data: Uint8Array): void;
  onDisconnect(peer: string): void;
  onError(peer: string, err: unknown): void;
}

export interface LoggingObserverOptions {
  /** Drop connect/receive/disconnect events; errors are always logged. */
  quiet?: boolean;
}

const PREVIEW_BYTES = 64;

function preview(data: Uint8Array): string {
  const text = Buffer.from(data.subarray(0, PREVIEW_BYTES)).toString("latin1");
  const suffix = data.length > PREVIEW_BYTES ? "..." : "";
  return JSON.stringify(text + suffix);
}

export function loggingObserver(
  logger: Logger,
  options: LoggingObserverOptions = {},
): ConnectionObserver {
  if (options.quiet) {
    return {
      onConnect() {},
      onReceive() {},
      onDisconnect() {},
      onError: (peer, err) => logger.error(`Connection error ${peer}:`, err),
    };
  }

  return {
    onConnect: (peer) => logger.info(`Connected ${peer}`),
    onReceive: (peer, data) =>
      logger.debug(`Received ${data.length} bytes from ${peer}: ${preview(data)}`),
    onDisconnect: (peer) => logger.info(`Disconnected ${peer}`),
    onError: (peer, err) => logger.error(`Connection error ${peer}:`, err),
  };
}
