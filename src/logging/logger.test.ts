import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, MemoryLogger } from "./logger.js";
import { errorToLog, serializeForLog, truncateString } from "./serialize.js";
import { validationError } from "../domain/errors.js";

const STAMP = "\\[\\d{4}-\\d{2}-\\d{2} \\d{2}:\\d{2}:\\d{2}\\]";

describe("createLogger", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "inpost-log-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function logText(path: string, marker: string): Promise<string> {
    return vi.waitFor(async () => {
      const text = await readFile(path, "utf-8");
      expect(text).toContain(marker);
      return text;
    });
  }

  it("creates the directory and appends timestamped entries with their payload", async () => {
    const path = join(dir, "nested", "log.txt");
    const logger = createLogger({ filename: path });
    logger.info("create-shipment", "Shipment created", { id: "1001" });
    logger.info("generate-label", "Label generated", "tmp/1001_label.pdf");
    logger.error("workflow", "General error");

    const text = await logText(path, "General error");
    expect(text).toMatch(
      new RegExp(
        `^${STAMP} INFO create-shipment: Shipment created\\n\\{\\n  "id": "1001"\\n\\}\\n\\n` +
          `${STAMP} INFO generate-label: Label generated\\ntmp/1001_label\\.pdf\\n\\n` +
          `${STAMP} ERROR workflow: General error\\n\\n$`
      )
    );
  });

  it("drops debug entries unless the level asks for them", async () => {
    const quietPath = join(dir, "quiet.txt");
    const quiet = createLogger({ filename: quietPath });
    quiet.debug("confirm-shipment", "GET /shipments/1001");
    quiet.info("confirm-shipment", "Shipment status");
    expect(await logText(quietPath, "Shipment status")).not.toContain("GET /shipments/1001");

    const verbosePath = join(dir, "verbose.txt");
    const verbose = createLogger({ filename: verbosePath, level: "debug" });
    verbose.debug("confirm-shipment", "GET /shipments/1001");
    expect(await logText(verbosePath, "GET /shipments/1001")).toMatch(
      new RegExp(`^${STAMP} DEBUG confirm-shipment: GET /shipments/1001\\n\\n$`)
    );
  });
});

describe("MemoryLogger", () => {
  it("records structured entries", () => {
    const log = new MemoryLogger();
    log.info("create-shipment", "Shipment created", { id: "1001" });
    expect(log.entries).toEqual([
      { level: "info", step: "create-shipment", message: "Shipment created", data: { id: "1001" } },
    ]);
  });

  it("omits data when none is given", () => {
    const log = new MemoryLogger();
    log.error("workflow", "no payload");
    expect("data" in log.entries[0]).toBe(false);
  });

  it("drops entries below its level", () => {
    const log = new MemoryLogger();
    log.debug("prepare", "hidden");
    log.error("prepare", "shown");
    expect(log.messages()).toEqual(["shown"]);

    const verbose = new MemoryLogger("debug");
    verbose.debug("prepare", "visible");
    expect(verbose.messages()).toEqual(["visible"]);
  });

  it("serializes workflow errors through their details", () => {
    const log = new MemoryLogger();
    log.error("prepare", "Invalid shipment request", {
      error: validationError("parcels: Array must contain at least 1 element(s)", new Error("zod")),
    });
    expect(log.entries[0].data).toEqual({
      error: { code: "VALIDATION_ERROR", message: "parcels: Array must contain at least 1 element(s)" },
    });
  });
});

describe("serializeForLog", () => {
  it("marks circular values instead of throwing", () => {
    const loop: Record<string, unknown> = { name: "loop" };
    loop.self = loop;
    expect(serializeForLog(loop)).toMatch(/^\[Unserializable object: /);
  });

  it("passes primitives through", () => {
    expect(serializeForLog("tmp/1001_label.pdf")).toBe("tmp/1001_label.pdf");
    expect(serializeForLog(42)).toBe(42);
  });

  it("reduces plain errors to type and message", () => {
    expect(serializeForLog(new TypeError("bad"))).toEqual({ type: "TypeError", message: "bad" });
    expect(errorToLog("text")).toEqual({ type: "string", message: "text" });
  });
});

describe("truncateString", () => {
  it("cuts long strings and marks the cut", () => {
    expect(truncateString("abcdef", 3)).toBe("abc...");
    expect(truncateString("abc", 3)).toBe("abc");
  });
});
