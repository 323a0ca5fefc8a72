import mitt, { type Emitter } from 'mitt';
import type { Logger } from '../observability/types';

/**
 * A connected client as the relay sees it. `send` must not block: it either
 * hands the frame to the transport or throws.
 */
export interface ClientHandle {
  readonly id: string;
  send(text: string): void;
  close(): void;
}

type ClientRegistryEvents = {
  'client:joined': ClientHandle;
  'client:left': { id: string; reason: string };
};

export class ClientRegistry {
  private clients = new Map<string, ClientHandle>();
  public readonly events: Emitter<ClientRegistryEvents> = mitt<ClientRegistryEvents>();

  constructor(private logger?: Logger) {}

  add(client: ClientHandle) {
    this.clients.set(client.id, client);
    this.logger?.info(`Client ${client.id} joined (${this.clients.size} connected)`);
    this.events.emit('client:joined', client);
  }

  remove(id: string, reason: string): boolean {
    if (!this.clients.delete(id)) return false;
    this.logger?.info(`Client ${id} left: ${reason} (${this.clients.size} connected)`);
    this.events.emit('client:left', { id, reason });
    return true;
  }

  has(id: string): boolean {
    return this.clients.has(id);
  }

  snapshot(): ClientHandle[] {
    return Array.from(this.clients.values());
  }

  get size(): number {
    return this.clients.size;
  }
}
