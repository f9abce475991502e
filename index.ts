#!/usr/bin/env node
import { defaultCliDeps, runCli } from "./command/describe";
import { logger } from "./core/logger";

const main = async () => {
  process.exitCode = await runCli(process.argv.slice(2), defaultCliDeps());
};

main().catch((error: unknown) => {
  logger.error("Unexpected failure.", { data: error });
  process.exitCode = 1;
});
