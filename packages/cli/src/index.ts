import * as path from "node:path";
import {
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  prefixedLogger,
  type ServerConfig,
} from "@rawhttp/engine";
import { type CliArgs, HELP_TEXT, parseArgs, UsageError } from "./args.js";

function readArgs(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const args = readArgs();
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const base = prefixedLogger("rawhttp", basicLogger());
  const logger = args.quiet ? filteredLogger("warn", base) : base;

  const config: ServerConfig = {
    ...defaultConfig(
      args.directory === undefined ? undefined : path.resolve(args.directory),
    ),
    port: args.port,
    host: args.host,
    quiet: args.quiet,
  };

  const server = createNodeServer({ config, logger });
  const port = await server.start();

  console.log(`\n  rawhttp listening on http://${config.host}:${port}`);
  if (config.directory) {
    console.log(`  Files:  ${config.directory}`);
  }
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
