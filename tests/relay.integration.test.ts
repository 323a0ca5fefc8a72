import { describe, it, expect, vi, afterEach } from "vitest";
import { StatusMessages } from "../src/domains/broadcast/messages";
import { FakeClient } from "./helpers/fake-client";
import { createRelayHarness, type RelayHarness } from "./helpers/relay-harness";

describe("relay", () => {
  let relay: RelayHarness;

  afterEach(async () => {
    await relay.dispose();
  });

  it("tells clients when the chosen port cannot be opened", async () => {
    relay = createRelayHarness({ ports: [] });

    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');

    await vi.waitFor(() =>
      expect(relay.client.received).toEqual([
        "Settings changed: port COM3, baud rate 9600",
        "Error: unable to open the serial port. Check the settings and reconnect to the port.",
      ])
    );
  });

  it("reassembles a line split across reads", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');
    const port = relay.driver.latest;

    port?.simulateIncoming("O");
    port?.simulateIncoming("K\n");

    await vi.waitFor(() => expect(relay.client.received).toContain("OK"));
    expect(relay.client.received.filter((m) => m === "OK")).toHaveLength(1);
    expect(relay.client.received).not.toContain("O");
  });

  it("does not write commands while no device is connected", async () => {
    relay = createRelayHarness();

    await relay.router.handle('{"command":"PING"}');

    await vi.waitFor(() => expect(relay.client.received).toEqual(["Error: port is not open. Message not sent."]));
    expect(relay.driver.openCalls).toEqual([]);
  });

  it("reopens the port after the device stops answering", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');
    relay.connection.start();

    relay.driver.latest?.failRead(new Error("device disconnected"));

    await vi.waitFor(() => expect(relay.driver.openCalls).toHaveLength(2));
    expect(relay.driver.openCalls).toEqual([
      { portIdentifier: "COM3", baudRate: 9600 },
      { portIdentifier: "COM3", baudRate: 9600 },
    ]);
    await vi.waitFor(() =>
      expect(relay.client.received.slice(2)).toEqual([
        StatusMessages.readFailed("device disconnected"),
        StatusMessages.connected("COM3", 9600),
      ])
    );
  });

  it("writes commands in the order clients sent them", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');

    await Promise.all(["A", "B", "C", "D"].map((c) => relay.router.handle(JSON.stringify({ command: c }))));

    await vi.waitFor(() => expect(relay.driver.latest?.written).toEqual(["A\n", "B\n", "C\n", "D\n"]));
  });

  it("relays device lines and statuses to every client in the same order", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    const second = new FakeClient("client-2");
    relay.clients.add(second);

    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');
    relay.driver.latest?.simulateIncoming("temp=21\nhum=40\n");
    await relay.router.handle('{"command":"READ"}');

    const expected = [
      StatusMessages.settingsChanged("COM3", 9600),
      StatusMessages.connected("COM3", 9600),
      "temp=21",
      "hum=40",
      StatusMessages.written("READ"),
    ];
    await vi.waitFor(() => expect(relay.client.received).toHaveLength(expected.length));
    expect(relay.client.received).toEqual(second.received);
    expect([...relay.client.received].sort()).toEqual([...expected].sort());
  });

  it("keeps relaying to healthy clients after one fails", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    const broken = new FakeClient("broken");
    broken.failing = true;
    relay.clients.add(broken);

    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');
    relay.driver.latest?.simulateIncoming("ready\n");

    await vi.waitFor(() => expect(relay.client.received).toContain("ready"));
    expect(broken.closed).toBe(true);
    expect(relay.clients.has("broken")).toBe(false);
    expect(relay.clients.size).toBe(1);
  });
});
