import type { Server } from "node:http";
import { createApp } from "./app";
import { readRetrievalConfig } from "./config/retrieval";
import { createRetrievalContext } from "./services/retrieval/context";
import { errorMessage } from "./services/retrieval/errors";
import { createLogger } from "./utils/log";

const log = createLogger("process");

let serverInstance: Server | null = null;
let stopJanitor: (() => void) | null = null;
let shuttingDown = false;

const requestShutdown = (signal: NodeJS.Signals) => {
  log.warn(`signal received: ${signal}`);
  if (shuttingDown) return;
  shuttingDown = true;

  stopJanitor?.();
  stopJanitor = null;

  const forceExitTimer = setTimeout(() => {
    log.error("forcing exit after graceful shutdown timeout");
    process.exit(1);
  }, 5000);
  forceExitTimer.unref();

  const exit = (code: number) => {
    clearTimeout(forceExitTimer);
    process.exit(code);
  };

  if (!serverInstance) {
    exit(0);
    return;
  }
  serverInstance.close((err) => {
    if (err) {
      log.error(`error while closing server: ${err.message}`);
      exit(1);
      return;
    }
    exit(0);
  });
};

process.on("unhandledRejection", (reason) => {
  log.error(`unhandledRejection: ${errorMessage(reason)}`);
});
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.on(sig, () => requestShutdown(sig));
}

const bootstrap = () => {
  const config = readRetrievalConfig();
  const ctx = createRetrievalContext(config);
  const app = createApp(ctx);

  serverInstance = app.listen(config.port, () => {
    log.info(`serving on port ${config.port} (store=${ctx.store.kind}, embeddings=${ctx.embeddings.primarySpace})`);
  });
  serverInstance.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      log.error(`port ${config.port} is already in use; set PORT to an open value`);
    } else {
      log.error(`unexpected listen error: ${err.message}`);
    }
    process.exit(1);
  });
  stopJanitor = ctx.startJanitor();
};

try {
  bootstrap();
} catch (error) {
  log.error(`bootstrap failed: ${errorMessage(error)}`);
  process.exit(1);
}
