/**
 * Engine Events: Emitter & Event Log Tests
 */

import { describe, it, expect } from "vitest";
import { pino, type Logger } from "pino";
import { EngineEventEmitter, EventLog } from "../../src/events/emitter.js";
import type { EngineEvent, SamplesDroppedEvent } from "../../src/events/types.js";

const excluded: EngineEvent = {
  type: "pattern-excluded",
  version: 1,
  id: "broken",
  tier: "INFO",
  reason: "Invalid regular expression",
};

const dropped: SamplesDroppedEvent = { type: "samples-dropped", count: 2, total: 5 };

function capture(): { lines: string[]; logger: Logger } {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
  return { lines, logger };
}

describe("EngineEventEmitter", () => {
  it("forwards events to sinks", () => {
    const emitter = new EngineEventEmitter({ toLog: false });
    const log = new EventLog();
    emitter.addSink(log);

    emitter.emit(excluded);
    emitter.emit(dropped);

    expect(log.recent()).toEqual([excluded, dropped]);
  });

  it("logs each event at its level", () => {
    const { lines, logger } = capture();
    const emitter = new EngineEventEmitter({}, logger);

    emitter.emit(excluded);

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 40,
      component: "events",
      msg: "pattern-excluded",
      id: "broken",
      tier: "INFO",
    });
  });

  it("does not log when toLog is off", () => {
    const { lines, logger } = capture();
    const emitter = new EngineEventEmitter({ toLog: false }, logger);

    emitter.emit(excluded);

    expect(lines).toEqual([]);
  });

  it("suppresses configured event types", () => {
    const emitter = new EngineEventEmitter({ toLog: false, suppress: ["samples-dropped"] });
    const log = new EventLog();
    emitter.addSink(log);

    emitter.emit(dropped);
    emitter.emit(excluded);

    expect(log.recent().map((e) => e.type)).toEqual(["pattern-excluded"]);
  });

  it("keeps delivering when a sink throws", () => {
    const emitter = new EngineEventEmitter({ toLog: false });
    const log = new EventLog();
    emitter.addSink({
      receive() {
        throw new Error("sink down");
      },
    });
    emitter.addSink(log);

    expect(() => emitter.emit(excluded)).not.toThrow();
    expect(log.count("pattern-excluded")).toBe(1);
  });

  it("removes a sink through the returned function", () => {
    const emitter = new EngineEventEmitter({ toLog: false });
    const log = new EventLog();
    const remove = emitter.addSink(log);

    remove();
    emitter.emit(excluded);

    expect(log.recent()).toEqual([]);
  });

  it("configure changes suppression", () => {
    const emitter = new EngineEventEmitter({ toLog: false });
    const log = new EventLog();
    emitter.addSink(log);

    emitter.configure({ suppress: ["pattern-excluded"] });
    emitter.emit(excluded);

    expect(log.count("pattern-excluded")).toBe(0);
  });
});

describe("EventLog", () => {
  it("keeps only the most recent events but counts all", () => {
    const log = new EventLog({ maxEvents: 2 });
    log.receive({ ...dropped, count: 1 });
    log.receive({ ...dropped, count: 2 });
    log.receive({ ...dropped, count: 3 });

    expect(log.recent().map((e) => (e.type === "samples-dropped" ? e.count : 0))).toEqual([2, 3]);
    expect(log.count("samples-dropped")).toBe(3);
  });

  it("filters by type", () => {
    const log = new EventLog();
    log.receive(excluded);
    log.receive(dropped);

    const drops = log.byType("samples-dropped");
    expect(drops).toHaveLength(1);
    expect(drops[0].total).toBe(5);
  });

  it("returns the last n events", () => {
    const log = new EventLog();
    log.receive(excluded);
    log.receive(dropped);

    expect(log.recent(1)).toEqual([dropped]);
  });

  it("clear resets events and counts", () => {
    const log = new EventLog();
    log.receive(excluded);
    log.clear();

    expect(log.recent()).toEqual([]);
    expect(log.count("pattern-excluded")).toBe(0);
  });
});
