import { errorMessage } from "../../errors.js";
import { serve } from "../../server/index.js";

import { parsePositiveInt } from "./sources.js";

import type { Command } from "commander";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start the HTTP API (runs it triggers execute in this process)")
    .option("-p, --port <port>", "Port to listen on", parsePositiveInt)
    .option("--host <host>", "Interface to bind")
    .action(async (options: { port?: number; host?: string }) => {
      try {
        await serve(options);
      } catch (error) {
        console.error(`Server failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
