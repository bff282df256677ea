import { describe, expect, it } from "vitest";
import { LogStateError } from "../errors";
import { formatSuccessMessage, RequestLog, toLogRecord, toUtcSeconds } from "../requestLog";

const FIXED_NOW = new Date("2026-10-19T12:30:05.678Z");

function sequentialIds(): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `pid-${next}`;
  };
}

describe("RequestLog", () => {
  it("creates an in-flight entry and finalizes it exactly once", () => {
    const log = new RequestLog({ createId: sequentialIds(), now: () => FIXED_NOW });
    const pid = log.create("ppid-1", { resultOffset: "0" }, "https://example.test/query?resultOffset=0");

    expect(pid).toBe("pid-1");
    expect(log.get(pid)).toMatchObject({
      state: "in_flight",
      ppid: "ppid-1",
      graleId: "ppid-1_pid-1",
      utcTimestamp: "2026-10-19T12:30:05Z",
    });

    const finalized = log.finalize(pid, { status: "Success", results: ["ok"], elapsedTime: 1500, size: 42 });
    expect(finalized.state).toBe("finalized");
    expect(finalized.status).toBe("Success");

    expect(() => log.finalize(pid, { status: "Success", results: [], elapsedTime: 1, size: 1 })).toThrow(LogStateError);
  });

  it("rejects finalizing an unknown pid", () => {
    const log = new RequestLog();
    expect(() => log.finalize("missing", { status: "Success", results: [], elapsedTime: 0, size: 0 })).toThrow(
      LogStateError,
    );
  });

  it("rejects a duplicate pid", () => {
    const log = new RequestLog({ createId: () => "same" });
    log.create("ppid", {}, "https://example.test/a");
    expect(() => log.create("ppid", {}, "https://example.test/b")).toThrow(LogStateError);
  });

  it("returns snapshots that callers cannot use to mutate the log", () => {
    const log = new RequestLog({ createId: sequentialIds() });
    const pid = log.create("ppid", { where: "1=1" }, "https://example.test/q");

    const [entry] = log.snapshot();
    entry.parameters.where = "changed";

    expect(log.get(pid)?.parameters.where).toBe("1=1");
  });

  it("filters snapshots by ppid and keeps in-flight entries visible", () => {
    const log = new RequestLog({ createId: sequentialIds() });
    const a = log.create("harvest-a", {}, "https://example.test/a");
    log.create("harvest-b", {}, "https://example.test/b");
    log.finalize(a, { status: "Success", results: [], elapsedTime: 10, size: 5 });

    expect(log.snapshot("harvest-a").map((entry) => entry.pid)).toEqual(["pid-1"]);
    expect(log.records("harvest-b")[0].status).toBe("In-flight");
    expect(log.size).toBe(2);
  });

  it("keeps every entry when many tasks create and finalize concurrently", async () => {
    const log = new RequestLog();
    await Promise.all(
      Array.from({ length: 200 }, async (_, index) => {
        const pid = log.create("ppid", { resultOffset: String(index) }, `https://example.test/${index}`);
        await new Promise((resolve) => setTimeout(resolve, index % 7));
        log.finalize(pid, { status: "Success", results: [], elapsedTime: index, size: index });
      }),
    );

    const entries = log.snapshot("ppid");
    expect(entries).toHaveLength(200);
    expect(entries.every((entry) => entry.state === "finalized")).toBe(true);
    expect(new Set(entries.map((entry) => entry.pid)).size).toBe(200);
  });
});

describe("log record formatting", () => {
  it("renders the external shape with unit suffixes", () => {
    const log = new RequestLog({ createId: () => "pid-9", now: () => FIXED_NOW });
    log.create("ppid", { resultOffset: "1000" }, "https://example.test/query");
    const entry = log.finalize("pid-9", {
      status: "Success",
      results: [formatSuccessMessage(2048, 1500)],
      elapsedTime: 1500,
      size: 2048,
    });

    expect(toLogRecord(entry)).toEqual({
      grale_uuid: "ppid_pid-9",
      ppid: "ppid",
      pid: "pid-9",
      utc_timestamp: "2026-10-19T12:30:05Z",
      request: "https://example.test/query",
      parameters: { resultOffset: "1000" },
      status: "Success",
      results: ["Size: 2048(B), Time :1.5(s)"],
      elapsed_time: "1500(ms)",
      size: "2048(B)",
    });
  });

  it("rounds the elapsed seconds in the success message", () => {
    expect(formatSuccessMessage(512, 703.1)).toBe("Size: 512(B), Time :0.7031(s)");
    expect(formatSuccessMessage(512, 0.0004)).toBe("Size: 512(B), Time :0(s)");
  });

  it("truncates timestamps to whole seconds", () => {
    expect(toUtcSeconds(new Date("2022-07-11T17:40:28.533Z"))).toBe("2022-07-11T17:40:28Z");
  });
});
