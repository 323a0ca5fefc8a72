import { describe, it, expect, vi, afterEach } from "vitest";
import { StatusMessages } from "../broadcast/messages";
import { createRelayHarness, type RelayHarness } from "../../../tests/helpers/relay-harness";

const MARKER = "-- marker --";

describe("CommandRouter", () => {
  let relay: RelayHarness;

  afterEach(async () => {
    await relay.dispose();
  });

  // Everything published before the marker has reached the client once the marker has
  async function flushBroadcasts() {
    relay.broadcaster.publish(MARKER);
    await vi.waitFor(() => expect(relay.client.received).toContain(MARKER));
    return relay.client.received.slice(0, relay.client.received.indexOf(MARKER));
  }

  it("drops frames that are not JSON without telling clients", async () => {
    relay = createRelayHarness();

    const result = await relay.router.handle("not json", "client-1");

    expect(result.kind).toBe("dropped");
    expect(await flushBroadcasts()).toEqual([]);
    expect(relay.logger.messages("warn")[0]).toMatch(/^Dropping malformed payload: /);
  });

  it("drops JSON values that are not objects", async () => {
    relay = createRelayHarness();

    expect(await relay.router.handle("[1,2,3]")).toEqual({
      kind: "dropped",
      reason: "payload is not a JSON object",
    });
    expect(await flushBroadcasts()).toEqual([]);
  });

  it("reports both type errors for a bad reconfigure payload", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });

    const result = await relay.router.handle('{"port":5,"baudRate":9600}');

    expect(result).toEqual({ kind: "rejected", errors: ["invalid-port-type", "invalid-baud-rate-type"] });
    expect(await flushBroadcasts()).toEqual([
      StatusMessages.invalidPortType,
      StatusMessages.invalidBaudRateType,
    ]);
    expect(relay.driver.openCalls).toEqual([]);
  });

  it("reports a baud rate that is not a number", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });

    await relay.router.handle('{"port":"COM3","baudRate":"fast"}');

    expect(await flushBroadcasts()).toEqual([StatusMessages.baudRateConversion]);
    expect(relay.connection.getState()).toBe("unconfigured");
  });

  it("reports a command that is not a string", async () => {
    relay = createRelayHarness();

    const result = await relay.router.handle('{"command":42}');

    expect(result).toEqual({ kind: "rejected", errors: ["invalid-command-type"] });
    expect(await flushBroadcasts()).toEqual([StatusMessages.invalidCommandType]);
  });

  it("ignores objects without known fields", async () => {
    relay = createRelayHarness();

    expect(await relay.router.handle('{"hello":1}')).toEqual({ kind: "ignored" });

    expect(await flushBroadcasts()).toEqual([]);
    const entry = relay.logger.entries.find((e) => e.level === "warn");
    expect(entry?.meta).toEqual({ clientId: undefined, fields: ["hello"] });
  });

  it("reconfigures when port and baud rate are both present", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });

    const result = await relay.router.handle('{"port":"COM3","baudRate":"9600","command":"ignored"}');

    expect(result).toEqual({ kind: "reconfigured", result: "changed" });
    expect(relay.connection.getSettings()).toEqual({ portIdentifier: "COM3", baudRate: 9600 });
    expect(await flushBroadcasts()).toEqual([
      StatusMessages.settingsChanged("COM3", 9600),
      StatusMessages.connected("COM3", 9600),
    ]);
    expect(relay.driver.latest?.written).toEqual([]);
  });

  it("queues commands with a trailing newline", async () => {
    relay = createRelayHarness({ ports: ["COM3"] });
    await relay.router.handle('{"port":"COM3","baudRate":"9600"}');

    expect(await relay.router.handle('{"command":"PING"}')).toEqual({ kind: "queued" });

    await vi.waitFor(() => expect(relay.driver.latest?.written).toEqual(["PING\n"]));
  });
});
