#!/usr/bin/env node

import { Command } from "commander";
import { recordCommand } from "./cli/record.js";
import { queryCommand } from "./cli/query.js";
import { feedbackCommand } from "./cli/feedback.js";
import { statsCommand } from "./cli/stats.js";
import { syncAllCommand, syncBootstrapCommand, syncPullCommand, syncPushCommand } from "./cli/sync.js";
import {
  storeCreateCommand,
  storeDeleteCommand,
  storeInfoCommand,
  storeListCommand,
  storeLocalCommand,
} from "./cli/store.js";
import { startMcpServer } from "./mcp/server.js";
import { CATEGORIES } from "./types.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("loresync")
  .description("Local-first lore store with remote sync")
  .version(VERSION);

program
  .command("record")
  .description("Record a piece of lore in the local store")
  .requiredOption("-c, --content <content>", "What was learned")
  .requiredOption("-t, --category <category>", `One of: ${CATEGORIES.join(", ")}`)
  .option("-x, --context <context>", "Where it applies")
  .option("--confidence <n>", "Initial confidence between 0 and 1")
  .option("--sources <list>", "Comma-separated source references")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await recordCommand(options);
  });

program
  .command("query")
  .description("Search local lore")
  .argument("[text]", "Substring to match in content or context")
  .option("-k, --k <n>", "Maximum results", "5")
  .option("--min-confidence <n>", "Minimum confidence")
  .option("--categories <list>", "Comma-separated categories")
  .option("--json", "Output raw JSON")
  .option("-s, --store <id>", "Target store")
  .action(async (text: string | undefined, options) => {
    await queryCommand({ ...options, text });
  });

program
  .command("feedback")
  .description("Adjust confidence of lore by id")
  .option("--helpful <ids>", "Comma-separated ids that helped")
  .option("--not-relevant <ids>", "Comma-separated ids that were not relevant")
  .option("--incorrect <ids>", "Comma-separated ids that were wrong")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await feedbackCommand(options);
  });

program
  .command("stats")
  .description("Show local store statistics")
  .option("-d, --detailed", "Include confidence and category breakdown")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await statsCommand(options);
  });

const sync = program.command("sync").description("Synchronize with the remote service");

sync
  .command("bootstrap")
  .description("Replace the local store with the remote snapshot")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await syncBootstrapCommand(options);
  });

sync
  .command("push")
  .description("Send local changes and feedback")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await syncPushCommand(options);
  });

sync
  .command("pull")
  .description("Apply remote changes since the last cursor")
  .option("--since <cursor>", "Start after this cursor instead of the stored one")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await syncPullCommand(options);
  });

sync
  .command("all")
  .description("Push, then pull")
  .option("-s, --store <id>", "Target store")
  .action(async (options) => {
    await syncAllCommand(options);
  });

const store = program.command("store").description("Manage stores");

store
  .command("list")
  .description("List remote stores")
  .option("-p, --prefix <prefix>", "Only ids starting with this prefix")
  .action(async (options) => {
    await storeListCommand(options);
  });

store
  .command("create")
  .description("Create a remote store and its local copy")
  .argument("<id>", "Store id, e.g. org/team")
  .option("-d, --description <text>", "Description")
  .action(async (id: string, options) => {
    await storeCreateCommand(id, options);
  });

store
  .command("delete")
  .description("Delete a remote store")
  .argument("<id>", "Store id")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(async (id: string, options) => {
    await storeDeleteCommand(id, options);
  });

store
  .command("info")
  .description("Show remote statistics for a store")
  .argument("[id]", "Store id (defaults to the resolved store)")
  .action(async (id: string | undefined) => {
    await storeInfoCommand(id);
  });

store
  .command("local")
  .description("List stores present on this machine")
  .action(async () => {
    await storeLocalCommand();
  });

program
  .command("serve")
  .description("Start the MCP server (used by agents over stdio)")
  .option("-s, --store <id>", "Default store")
  .action(async (options) => {
    await startMcpServer(options);
  });

await program.parseAsync();
