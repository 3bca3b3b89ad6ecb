#!/usr/bin/env node
import { getErrorMessage, logError } from "./core/logging.js";
import { startServer } from "./server/index.js";

startServer().catch((err: unknown) => {
  logError("Fatal error starting server:", getErrorMessage(err));
  process.exit(1);
});
