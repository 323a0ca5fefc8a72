import type { Plugin } from "./plugin";
import type { ServiceMap } from "./services";
import type { Logger } from "../domains/observability/types";
import { rootLogger } from "../domains/observability/logger";

export class Application {
  private plugins: Map<string, Plugin> = new Map();
  private services: Partial<ServiceMap> = {};
  private logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "Core" });
  }

  registerService<K extends keyof ServiceMap>(name: K, service: ServiceMap[K]) {
    this.services[name] = service;
    return this;
  }

  getService<K extends keyof ServiceMap>(name: K): ServiceMap[K] {
    const service: ServiceMap[K] | undefined = this.services[name];
    if (!service) {
      throw new Error(`Service ${name} not found.`);
    }
    return service;
  }

  async use(plugin: Plugin) {
    if (this.plugins.has(plugin.name)) {
      throw new Error(`Plugin ${plugin.name} is already registered.`);
    }
    await plugin.setup(this);
    this.plugins.set(plugin.name, plugin);
    this.logger.info(`Plugin registered: ${plugin.name}`);
    return this;
  }

  async start() {
    this.logger.info("Application starting...");
    for (const plugin of this.plugins.values()) {
      if (plugin.start) {
        await plugin.start();
      }
    }
    this.logger.info("Application started successfully.");
  }

  // Reverse registration order: the server goes down before the serial link it feeds.
  async stop() {
    this.logger.info("Application stopping...");
    for (const plugin of [...this.plugins.values()].reverse()) {
      if (plugin.stop) {
        try {
          await plugin.stop();
        } catch (e) {
          this.logger.error(`Plugin ${plugin.name} failed to stop`, e);
        }
      }
    }
    this.logger.info("Application stopped.");
  }
}
