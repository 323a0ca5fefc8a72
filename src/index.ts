#!/usr/bin/env node
import { Application } from "./core/app";
import { loadConfig } from "./config";
import { RelayLogger } from "./domains/observability/logger";
import { BroadcastPlugin } from "./domains/broadcast/broadcast.plugin";
import { SerialPlugin } from "./domains/serial/serial.plugin";
import { ServerPlugin } from "./domains/server/server.plugin";

async function bootstrap() {
  let logger = new RelayLogger({ component: "Root" });

  try {
    const config = loadConfig();
    logger = new RelayLogger({ level: config.logLevel, format: config.logFormat, component: "Root" });

    logger.info("Configuration loaded", {
      address: `${config.address.hostname ?? ""}:${config.address.port}`,
      wsPath: config.wsPath,
      mockDevices: config.mockDevices,
      initialPort: config.initialPort ?? null,
    });

    const app = new Application(logger);

    // Register plugins; each one looks up the services of those before it
    await app.use(new BroadcastPlugin(logger));
    await app.use(new SerialPlugin({
      mockDevices: config.mockDevices,
      retryIntervalMs: config.retryIntervalMs,
      reconnectDelayMs: config.reconnectDelayMs,
      readDelayMs: config.readDelayMs,
      readBufferSize: config.readBufferSize,
      portScanIntervalMs: config.portScanIntervalMs,
      initialPort: config.initialPort,
      initialBaudRate: config.initialBaudRate,
    }, logger.child({ component: "Serial" })));
    await app.use(new ServerPlugin({
      address: config.address,
      wsPath: config.wsPath,
    }, logger.child({ component: "Server" })));

    await app.start();

    // Handle graceful shutdown
    let stopping = false;
    const shutdown = async (signal: string) => {
      if (stopping) return;
      stopping = true;
      logger.info(`Received ${signal}, shutting down`);
      await app.stop();
      process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.on(signal, () => {
        shutdown(signal).catch((e) => {
          logger.error("Shutdown failed", e);
          process.exit(1);
        });
      });
    }

  } catch (error) {
    logger.error("Failed to start application", error);
    process.exit(1);
  }
}

void bootstrap();
