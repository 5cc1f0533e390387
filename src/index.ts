import http from "node:http";
import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { createDependencies } from "./container.js";
import { errorMeta, logger, setLogLevel } from "./lib/logger.js";

const bootstrap = async (): Promise<void> => {
  try {
    setLogLevel(env.LOG_LEVEL);

    const app = createApp(createDependencies(env));
    const server = http.createServer(app);

    server.listen(env.PORT, () => {
      logger.info("server.listening", { port: env.PORT });
    });

    const shutdown = async (signal: NodeJS.Signals | string, exitCode = 0) => {
      logger.info("server.shutdown_initiated", { signal, exitCode });

      await new Promise<void>((resolve) => {
        server.close(() => {
          logger.info("server.http_closed");
          resolve();
        });
      });

      process.exit(exitCode);
    };

    process.once("SIGINT", (signal) => {
      void shutdown(signal, 0);
    });
    process.once("SIGTERM", (signal) => {
      void shutdown(signal, 0);
    });
    process.once("uncaughtException", (error) => {
      logger.error("server.uncaught_exception", errorMeta(error));
      shutdown("uncaughtException", 1).catch((shutdownError) => {
        logger.error("server.shutdown_failed", errorMeta(shutdownError));
        process.exit(1);
      });
    });
    process.once("unhandledRejection", (reason) => {
      logger.error("server.unhandled_rejection", errorMeta(reason));
      shutdown("unhandledRejection", 1).catch((shutdownError) => {
        logger.error("server.shutdown_failed", errorMeta(shutdownError));
        process.exit(1);
      });
    });
  } catch (error) {
    logger.error("server.bootstrap_failed", errorMeta(error));
    process.exit(1);
  }
};

void bootstrap();
