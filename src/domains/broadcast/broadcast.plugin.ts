import type { Plugin } from "../../core/plugin";
import type { Application } from "../../core/app";
import type { Logger } from "../observability/types";
import { Broadcaster } from "./broadcaster";
import { ClientRegistry } from "./client-registry";

export class BroadcastPlugin implements Plugin {
  readonly name = "broadcast";
  readonly clients: ClientRegistry;
  readonly broadcaster: Broadcaster;

  constructor(private logger: Logger) {
    this.clients = new ClientRegistry(logger.child({ component: "Clients" }));
    this.broadcaster = new Broadcaster(this.clients, logger.child({ component: "Broadcaster" }));
  }

  setup(app: Application) {
    app.registerService("clients", this.clients);
    app.registerService("broadcaster", this.broadcaster);
  }

  start() {
    this.broadcaster.start();
    this.logger.info("Broadcaster running");
  }

  async stop() {
    await this.broadcaster.stop();
  }
}
