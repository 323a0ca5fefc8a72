import type { Broadcaster } from "../domains/broadcast/broadcaster";
import type { ClientRegistry } from "../domains/broadcast/client-registry";
import type { ConnectionManager } from "../domains/serial/connection-manager";
import type { OutboundWriter } from "../domains/serial/outbound-writer";
import type { CommandRouter } from "../domains/serial/command-router";
import type { PortMonitor } from "../domains/serial/port-monitor";

/**
 * Services plugins expose to each other through {@link Application.getService}.
 */
export interface ServiceMap {
  clients: ClientRegistry;
  broadcaster: Broadcaster;
  connection: ConnectionManager;
  writer: OutboundWriter;
  router: CommandRouter;
  portMonitor: PortMonitor;
}
