import { describe, expect, it } from "vitest";
import { createLogger } from "../../src/shared/logger";

function capture() {
  const lines: Record<string, unknown>[] = [];
  const sink = (line: string) => lines.push(JSON.parse(line) as Record<string, unknown>);
  return { lines, sink };
}

describe("logger", () => {
  it("writes one JSON line per entry with level and message", () => {
    const { lines, sink } = capture();
    const log = createLogger("debug", {}, sink);

    log.info({ client_id: 1 }, "Transaction rejected");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: "info", client_id: 1, message: "Transaction rejected" });
    expect(typeof lines[0]?.timestamp).toBe("string");
  });

  it("accepts a bare message", () => {
    const { lines, sink } = capture();
    createLogger("debug", {}, sink).warn("careful");

    expect(lines[0]).toMatchObject({ level: "warn", message: "careful" });
  });

  it("drops entries below the minimum level", () => {
    const { lines, sink } = capture();
    const log = createLogger("warn", {}, sink);

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    log.error("shown");
    log.fatal("shown");

    expect(lines.map((l) => l.level)).toEqual(["warn", "error", "fatal"]);
  });

  it("child loggers carry their bindings", () => {
    const { lines, sink } = capture();
    const log = createLogger("info", { environment: "test" }, sink).child({ run_id: "run_1" });

    log.info({ seen: 3 }, "Processing finished");

    expect(lines[0]).toMatchObject({
      environment: "test",
      run_id: "run_1",
      seen: 3,
      message: "Processing finished",
    });
  });

  it("serializes bigint fields as strings", () => {
    const { lines, sink } = capture();
    createLogger("info", {}, sink).info({ amount: 15000n }, "amount");

    expect(lines[0]?.amount).toBe("15000");
  });
});
