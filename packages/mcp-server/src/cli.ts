#!/usr/bin/env -S npx tsx

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getErrorMessage } from "@shellgate/errors";
import { startShellgate } from "./app.js";
import { HELP_TEXT, parseArgs } from "./args.js";

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  if (args.help) {
    // stdout is free until the transport connects
    console.log(HELP_TEXT);
    process.exit(0);
  }

  const app = await startShellgate({
    transport: new StdioServerTransport(),
    ...(args.configPath ? { configPath: args.configPath } : {}),
    ...(args.envFilePath ? { envFilePath: args.envFilePath } : {}),
  });

  const shutdown = (signal: NodeJS.Signals) => {
    app.logger.info(`received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Shutdown failed:", getErrorMessage(err));
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error("Fatal:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
