export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: 'localhost' */
  host: string;
  /**
   * Directory served under /files/. When unset, file reads answer 404 and
   * file writes fail the connection.
   */
  directory?: string;
  /** Upper bound for a single socket read; one read is one request. Default: 1024 */
  readBufferSize: number;
  /** Suppress connection logging. Errors are still logged. Default: false */
  quiet: boolean;
}

export function defaultConfig(directory?: string): ServerConfig {
  return {
    port: 4221,
    host: "localhost",
    directory,
    readBufferSize: 1024,
    quiet: false,
  };
}
