import { runCli } from "./cli/index.ts";
import { loadConfig } from "./config/index.ts";
import { createOperationSet } from "./operations/index.ts";
import { createMemoryTaskStore } from "./storage/memory.ts";
import { createChildLogger, logger, setLogLevel } from "./lib/logger.ts";

const log = createChildLogger("main");

async function main() {
  const config = loadConfig();
  setLogLevel(config.log.level);

  const store = createMemoryTaskStore();
  const operations = createOperationSet({ store, limits: config.limits });

  log.info({ limits: config.limits }, "Starting todo session");

  await runCli({
    operations,
    input: process.stdin,
    output: process.stdout,
    color: config.cli.color,
  });

  log.info({ tasks: store.count() }, "Session ended");
}

main().catch((err) => {
  logger.fatal({ err }, "Todo app failed");
  process.exit(1);
});
