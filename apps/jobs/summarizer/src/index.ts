import { run } from "./cli";
import { logger } from "./logger";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((error) => {
  logger.error("job failed", {
    error: error instanceof Error ? (error.stack ?? error.message) : String(error),
  });
  process.exitCode = 1;
});
