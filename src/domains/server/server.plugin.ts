import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { randomUUID } from "node:crypto";
import type { Server as NetServer } from "node:net";
import type { Plugin } from "../../core/plugin";
import type { Application } from "../../core/app";
import type { ListenAddress } from "../../config";
import type { Logger } from "../observability/types";
import type { ClientHandle, ClientRegistry } from "../broadcast/client-registry";
import type { CommandRouter } from "../serial/command-router";
import type { ConnectionManager } from "../serial/connection-manager";

const WS_OPEN = 1;

export interface ServerPluginOptions {
  address: ListenAddress;
  wsPath: string;
}

// The part of Hono's WSContext the relay relies on
export interface SocketLike {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export function toClientHandle(id: string, ws: SocketLike): ClientHandle {
  return {
    id,
    send(text: string) {
      if (ws.readyState !== WS_OPEN) {
        throw new Error(`socket is not open (readyState ${ws.readyState})`);
      }
      ws.send(text);
    },
    close() {
      ws.close();
    },
  };
}

export class ServerPlugin implements Plugin {
  readonly name = "server";
  readonly app: Hono;
  private injectWebSocket: ReturnType<typeof createNodeWebSocket>["injectWebSocket"];
  private server?: NetServer;
  private clients?: ClientRegistry;
  private router?: CommandRouter;
  private connection?: ConnectionManager;

  constructor(private options: ServerPluginOptions, private logger: Logger) {
    this.app = new Hono();
    const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app: this.app });
    this.injectWebSocket = injectWebSocket;

    this.app.get("/", (c) =>
      c.json({
        status: "ok",
        service: "serial-relay",
        connection: this.connection?.snapshot() ?? null,
        clients: this.clients?.size ?? 0,
      })
    );

    // Origins are not checked: any page may attach to the relay
    this.app.get(
      options.wsPath,
      upgradeWebSocket((c) => {
        const id = randomUUID();
        const origin = c.req.header("origin") ?? "unknown";

        return {
          onOpen: (_event, ws) => {
            this.logger.info(`Client ${id} connected`, { origin });
            this.clients?.add(toClientHandle(id, ws));
          },
          onMessage: (event, _ws) => {
            if (typeof event.data !== "string") {
              this.logger.warn(`Ignoring binary frame from client ${id}`);
              return;
            }
            this.route(event.data, id);
          },
          onClose: () => {
            this.clients?.remove(id, "closed");
          },
          onError: () => {
            this.logger.warn(`Socket error on client ${id}`);
            this.clients?.remove(id, "read error");
          },
        };
      })
    );
  }

  setup(app: Application) {
    this.clients = app.getService("clients");
    this.router = app.getService("router");
    this.connection = app.getService("connection");
  }

  async start() {
    const { hostname, port } = this.options.address;

    await new Promise<void>((resolve, reject) => {
      const server = serve({ fetch: this.app.fetch, port, hostname }, (info) => {
        this.logger.info(`Listening on ${info.address}:${info.port}${this.options.wsPath}`);
        resolve();
      });
      this.injectWebSocket(server);
      const listener: NetServer = server;
      listener.once("error", reject);
      this.server = listener;
    });
  }

  async stop() {
    for (const client of this.clients?.snapshot() ?? []) {
      this.clients?.remove(client.id, "server stopping");
      client.close();
    }

    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.logger.info("Stopped");
  }

  private route(raw: string, clientId: string) {
    if (!this.router) return;
    this.router.handle(raw, clientId).catch((e) => {
      this.logger.error(`Failed to handle message from client ${clientId}`, e);
    });
  }
}
