import { describe, it, expect } from "vitest";
import { Application } from "./app";
import type { Plugin } from "./plugin";
import { MemoryLogger } from "../../tests/helpers/memory-logger";

function recordingPlugin(name: string, log: string[], failOnStop = false): Plugin {
  return {
    name,
    setup: () => {
      log.push(`setup ${name}`);
    },
    start: () => {
      log.push(`start ${name}`);
    },
    stop: () => {
      log.push(`stop ${name}`);
      if (failOnStop) throw new Error(`${name} is stuck`);
    },
  };
}

describe("Application", () => {
  it("starts plugins in order and stops them in reverse", async () => {
    const log: string[] = [];
    const app = new Application(new MemoryLogger());

    await app.use(recordingPlugin("first", log));
    await app.use(recordingPlugin("second", log));
    await app.start();
    await app.stop();

    expect(log).toEqual([
      "setup first",
      "setup second",
      "start first",
      "start second",
      "stop second",
      "stop first",
    ]);
  });

  it("keeps stopping the rest when one plugin fails", async () => {
    const log: string[] = [];
    const logger = new MemoryLogger();
    const app = new Application(logger);
    await app.use(recordingPlugin("first", log));
    await app.use(recordingPlugin("second", log, true));

    await app.stop();

    expect(log.slice(2)).toEqual(["stop second", "stop first"]);
    expect(logger.messages("error")).toEqual(["Plugin second failed to stop"]);
  });

  it("rejects a plugin registered twice", async () => {
    const app = new Application(new MemoryLogger());
    await app.use(recordingPlugin("serial", []));

    await expect(app.use(recordingPlugin("serial", []))).rejects.toThrow("Plugin serial is already registered.");
  });

  it("throws for a service nobody registered", () => {
    const app = new Application(new MemoryLogger());

    expect(() => app.getService("router")).toThrow("Service router not found.");
  });
});
