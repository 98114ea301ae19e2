export interface CliArgs {
  directory?: string;
  port: number;
  host: string;
  quiet: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || value.startsWith("-")) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    port: 4221,
    host: "localhost",
    quiet: false,
    help: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg === "--directory" || arg === "-d") {
      result.directory = takeValue(args, i, arg);
      i++;
    } else if (arg === "--port" || arg === "-p") {
      const raw = takeValue(args, i, arg);
      const port = Number(raw);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new UsageError(`Invalid port number: ${raw}`);
      }
      result.port = port;
      i++;
    } else if (arg === "--host" || arg === "-H") {
      result.host = takeValue(args, i, arg);
      i++;
    } else if (arg === "--quiet" || arg === "-q") {
      result.quiet = true;
    } else if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return result;
}

export const HELP_TEXT = `
rawhttp - a small HTTP/1.1 server on raw sockets

Usage: rawhttp [options]

Options:
  --directory, -d <path>  Directory served and written under /files/
  --port, -p <port>       Port to listen on (default: 4221)
  --host, -H <host>       Host to bind (default: localhost)
  --quiet, -q             Only log warnings and errors
  --help, -h              Show this help
`;
