import { describe, it, expect, vi, afterEach } from "vitest";
import { StatusMessages } from "../broadcast/messages";
import { createSettings } from "./drivers/types";
import { createRelayHarness, type RelayHarness } from "../../../tests/helpers/relay-harness";

describe("OutboundWriter", () => {
  let relay: RelayHarness;

  afterEach(async () => {
    await relay.dispose();
  });

  it("drops requests while no port is open", async () => {
    relay = createRelayHarness();

    relay.writer.submit({ payload: "PING\n" });

    await vi.waitFor(() => expect(relay.client.received).toEqual([StatusMessages.notConnected]));
    expect(relay.driver.connections).toEqual([]);
  });

  it("writes requests in submission order", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.connection.configure(createSettings("COM3", 9600));
    const commands = Array.from({ length: 20 }, (_, i) => `CMD${i}`);

    for (const command of commands) {
      relay.writer.submit({ payload: `${command}\n` });
    }

    await vi.waitFor(() =>
      expect(relay.driver.latest?.written).toEqual(commands.map((c) => `${c}\n`))
    );
  });

  it("reports each write with the payload minus its delimiter", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.connection.configure(createSettings("COM3", 9600));

    relay.writer.submit({ payload: "AT+RST\n" });

    await vi.waitFor(() =>
      expect(relay.client.received).toEqual([
        StatusMessages.settingsChanged("COM3", 9600),
        StatusMessages.connected("COM3", 9600),
        StatusMessages.written("AT+RST"),
      ])
    );
  });

  it("reports a failed write and keeps going", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.connection.configure(createSettings("COM3", 9600));
    relay.driver.latest?.failNextWrite(new Error("EIO"));

    relay.writer.submit({ payload: "first\n" });
    relay.writer.submit({ payload: "second\n" });

    await vi.waitFor(() =>
      expect(relay.client.received.slice(2)).toEqual([
        StatusMessages.writeFailed("EIO"),
        StatusMessages.written("second"),
      ])
    );
    expect(relay.driver.latest?.written).toEqual(["second\n"]);
    expect(relay.connection.isOpen()).toBe(true);
  });

  it("waits for a reconnect in progress before writing", async () => {
    relay = createRelayHarness({ ports: ["COM3", "COM4"], reconnectDelayMs: 30 });
    await relay.connection.configure(createSettings("COM3", 9600));

    const switching = relay.connection.configure(createSettings("COM4", 9600));
    relay.writer.submit({ payload: "hello\n" });
    await switching;

    await vi.waitFor(() => expect(relay.driver.latest?.written).toEqual(["hello\n"]));
    expect(relay.driver.latest?.settings.portIdentifier).toBe("COM4");
    expect(relay.driver.connections[0]?.written).toEqual([]);
  });

  it("refuses requests after stop", async () => {
    relay = createRelayHarness();
    await relay.writer.stop();

    expect(relay.writer.submit({ payload: "late\n" })).toBe(false);
  });
});
