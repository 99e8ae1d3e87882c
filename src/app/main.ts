import "dotenv/config";
import { parseCliOverrides } from "../config/bot-config";
import { ConfigurationError, toError } from "../errors/app.errors";
import { ConsoleLogger } from "../utils/logger.util";
import { startBot } from "./runtime";
import type { BotRuntime } from "./runtime";

const logger = new ConsoleLogger();
let runtime: BotRuntime | undefined;
let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`[BOT] Received ${signal}, finishing current cycle...`);
  if (runtime) {
    runtime.engine.stop();
    await runtime.engine.whenIdle();
    runtime.reporter.printFinalStats(runtime.core.stats(Date.now()));
  }
  process.exit(0);
}

function onSignal(signal: NodeJS.Signals): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error("[BOT] Shutdown failed", toError(err));
    process.exit(1);
  });
}

async function main(): Promise<void> {
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    runtime = await startBot(parseCliOverrides(process.argv.slice(2)), logger);
  } catch (err) {
    const error = toError(err);
    logger.error(err instanceof ConfigurationError ? error.message : "[BOT] Start-up failed", error);
    process.exit(1);
  }
  await runtime.done;
}

main().catch((err: unknown) => {
  logger.error("[BOT] Fatal error", toError(err));
  process.exit(1);
});
