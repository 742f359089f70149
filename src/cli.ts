#!/usr/bin/env node
// Must stay first: the logger singleton reads INVENTORY_LOG_FILE on import.
import "dotenv/config";
import { Command } from "commander";
import { collectCommand } from "./commands/collect";
import { regionsCommand } from "./commands/regions";
import { logger } from "./utils/logger";

const program = new Command();
program
  .name("instance-inventory")
  .version("1.0.0")
  .description("Collect and normalize EC2 instances across AWS regions");

program
  .option("-v, --verbose", "Enable verbose logging")
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts().verbose) {
      logger.setVerbose(true);
    }
  });

program.addCommand(collectCommand);
program.addCommand(regionsCommand);

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error("Unexpected failure", error instanceof Error ? error : { error: String(error) });
  process.exitCode = 1;
});
