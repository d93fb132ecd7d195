import "dotenv/config";

import { loadConfig } from "./config";
import { Server } from "./server";
import { initSentry } from "./observability/sentry";
import { logger } from "./observability/logging";

try {
  const config = loadConfig();
  initSentry(config.sentryDsn);
  new Server(config).start();
} catch (err) {
  logger.fatal({ err }, "start-up failed");
  process.exit(1);
}
