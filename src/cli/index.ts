#!/usr/bin/env node

/**
 * OParl Ingestor CLI
 *
 * Registers municipal OParl endpoints and syncs them into the local store.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerRelationsCommand } from "./commands/relations.js";
import { registerServeCommand } from "./commands/serve.js";
import { registerSourcesCommand } from "./commands/sources.js";
import { registerSyncCommand } from "./commands/sync.js";
import { registerWorkerCommand } from "./commands/worker.js";

const program = new Command();

program
  .name("oparl-ingest")
  .description("Ingest OParl council information endpoints into a normalized store")
  .version("0.1.0");

// Register all commands
registerDbCommand(program);
registerSourcesCommand(program);
registerSyncCommand(program);
registerRelationsCommand(program);
registerWorkerCommand(program);
registerServeCommand(program);

await program.parseAsync(process.argv);
