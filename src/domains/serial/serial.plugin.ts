import type { Plugin } from "../../core/plugin";
import type { Application } from "../../core/app";
import type { Logger } from "../observability/types";
import { ConnectionManager } from "./connection-manager";
import { OutboundWriter } from "./outbound-writer";
import { CommandRouter } from "./command-router";
import { PortMonitor } from "./port-monitor";
import { MockSerialDriver } from "./drivers/mock-serial";
import { createSettings, UNCONFIGURED, type SerialDriver } from "./drivers/types";

export interface SerialPluginOptions {
  mockDevices: boolean;
  retryIntervalMs: number;
  reconnectDelayMs: number;
  readDelayMs: number;
  readBufferSize: number;
  portScanIntervalMs: number;
  initialPort?: string;
  initialBaudRate: number;
  // Overrides the driver picked from `mockDevices`
  driver?: SerialDriver;
}

export class SerialPlugin implements Plugin {
  readonly name = "serial";
  private connection?: ConnectionManager;
  private writer?: OutboundWriter;
  private monitor?: PortMonitor;

  constructor(private options: SerialPluginOptions, private logger: Logger) {}

  async setup(app: Application): Promise<void> {
    const broadcaster = app.getService("broadcaster");
    const clients = app.getService("clients");
    const driver = this.options.driver ?? (await this.createDriver());
    this.logger.info(`Using ${driver.type} driver`);

    const { initialPort, initialBaudRate } = this.options;
    this.connection = new ConnectionManager(driver, broadcaster, this.logger.child({ component: "Connection" }), {
      retryIntervalMs: this.options.retryIntervalMs,
      reconnectDelayMs: this.options.reconnectDelayMs,
      readDelayMs: this.options.readDelayMs,
      readBufferSize: this.options.readBufferSize,
      initialSettings: initialPort ? createSettings(initialPort, initialBaudRate) : UNCONFIGURED,
    });
    this.writer = new OutboundWriter(this.connection, broadcaster, this.logger.child({ component: "Writer" }));
    this.monitor = new PortMonitor(
      driver,
      this.connection,
      broadcaster,
      clients,
      this.logger.child({ component: "PortMonitor" }),
      { intervalMs: this.options.portScanIntervalMs }
    );
    const router = new CommandRouter(this.connection, this.writer, broadcaster, this.logger.child({ component: "Router" }));

    app.registerService("connection", this.connection);
    app.registerService("writer", this.writer);
    app.registerService("portMonitor", this.monitor);
    app.registerService("router", router);
  }

  async start(): Promise<void> {
    if (!this.connection || !this.writer || !this.monitor) return;

    this.writer.start();
    this.connection.start();
    await this.monitor.start();
  }

  async stop(): Promise<void> {
    await this.monitor?.stop();
    await this.writer?.stop();
    await this.connection?.stop();
  }

  private async createDriver(): Promise<SerialDriver> {
    if (this.options.mockDevices) {
      return new MockSerialDriver({
        ports: ["MOCK0", "MOCK1"],
        scenario: [
          { match: "PING", reply: "PONG\n", delay: 100 },
          { match: "HELLO", reply: "WORLD\n", delay: 500 },
        ],
        logger: this.logger.child({ component: "MockSerialDriver" }),
      });
    }
    // serialport loads a native binding; only pull it in when it is needed
    const { NativeSerialDriver } = await import("./drivers/serial");
    return new NativeSerialDriver(this.logger.child({ component: "SerialDriver" }));
  }
}
