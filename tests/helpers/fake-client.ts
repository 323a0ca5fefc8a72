import type { ClientHandle } from "../../src/domains/broadcast/client-registry";

export class FakeClient implements ClientHandle {
  readonly received: string[] = [];
  closed = false;
  failing = false;

  constructor(readonly id: string) {}

  send(text: string) {
    if (this.failing) {
      throw new Error("broken pipe");
    }
    this.received.push(text);
  }

  close() {
    this.closed = true;
  }
}
