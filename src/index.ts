#!/usr/bin/env node

import "dotenv/config";
import { createConfigFromEnv } from "./config.js";
import { MailGateway } from "./gateway/operations.js";
import { logger } from "./logger.js";
import { MailboxConnector } from "./mail/index.js";
import { createServer } from "./server.js";
import { MemorySessionStore } from "./session/store.js";

// Log unexpected errors and keep serving.
process.on("uncaughtException", (err) => {
  logger.error("Uncaught exception", err, { pid: process.pid });
});
process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", reason, { pid: process.pid });
});

function main(): void {
  const config = createConfigFromEnv();

  const sessions = new MemorySessionStore({ ttlMs: config.sessionTtlMs });
  const connector = new MailboxConnector(config.mail);
  const gateway = new MailGateway(sessions, connector);
  const app = createServer(gateway, sessions);

  const server = app.listen(config.httpPort, () => {
    logger.info("Mail gateway listening", {
      port: config.httpPort,
      imap: `${config.mail.retrieval.host}:${config.mail.retrieval.port}`,
      smtp: `${config.mail.submission.host}:${config.mail.submission.port}`,
    });
  });

  const shutdown = () => {
    server.close(() => process.exit(0));
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  main();
} catch (error) {
  logger.error("Fatal error", error);
  process.exit(1);
}
