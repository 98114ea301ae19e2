import type { ServerConfig } from "../config/server-config.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { type ConnectionState, serveConnection } from "./connection.js";
import {
  type ConnectionObserver,
  loggingObserver,
} from "./connection-observer.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Replaces the logger-backed connection observer. */
  observer?: ConnectionObserver;
}

export type WebServerEvents = {
  listening: [port: number];
  connection: [socket: ITcpSocket];
  "connection-state": [socket: ITcpSocket, state: ConnectionState];
  error: [err: Error];
  close: [];
};

export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private fileSystem: IFileSystem;
  private config: ServerConfig;
  private logger: Logger;
  private observer: ConnectionObserver;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.fileSystem = options.fileSystem;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();
    this.observer =
      options.observer ??
      loggingObserver(this.logger, { quiet: this.config.quiet });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.logger.info(`Listening on ${this.config.host}:${port}`);
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  /** Spawn a connection loop without waiting for it; there is no connection cap. */
  private handleConnection(socket: ITcpSocket): void {
    this.activeConnections.add(socket);
    this.emit("connection", socket);

    void serveConnection(socket, {
      context: { directory: this.config.directory, fs: this.fileSystem },
      observer: this.observer,
      readBufferSize: this.config.readBufferSize,
      onStateChange: (state) => this.emit("connection-state", socket, state),
    })
      .catch((err: unknown) => {
        this.logger.error("Connection loop failed:", err);
      })
      .finally(() => {
        this.activeConnections.delete(socket);
      });
  }
}
