import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("mirrors entries as JSON lines into the log file", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "nested", "dispatch.log");

    try {
      const logger = new StructuredLogger({ logFile, stdout: false, minLevel: "debug" });
      logger.debug("first_entry", { index: 1 });
      logger.error("second_entry");
      await logger.flush();

      const lines = (await readFile(logFile, "utf8")).trim().split("\n");
      expect(lines).to.have.length(2);
      const first: unknown = JSON.parse(lines[0]);
      const second: unknown = JSON.parse(lines[1]);
      expect(first).to.include({ level: "debug", message: "first_entry" });
      expect(first).to.have.deep.property("payload", { index: 1 });
      expect(second).to.include({ level: "error", message: "second_entry" });
      expect(second).to.not.have.property("payload");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("drops entries below the minimum level", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ stdout: false, minLevel: "warn", onEntry: (entry) => entries.push(entry) });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");

    expect(entries.map((entry) => entry.message)).to.deep.equal(["shown"]);
    expect(logger.isLevelEnabled("info")).to.equal(false);
    expect(logger.isLevelEnabled("error")).to.equal(true);
  });

  it("writes to stdout unless disabled", () => {
    const write = sinon.stub(process.stdout, "write").returns(true);
    const logger = new StructuredLogger({ minLevel: "info" });
    logger.info("to_stdout");
    new StructuredLogger({ minLevel: "info", stdout: false }).info("silent");
    write.restore();

    expect(write.callCount).to.equal(1);
    const line = String(write.firstCall.args[0]);
    expect(line.endsWith("\n")).to.equal(true);
    expect(JSON.parse(line)).to.include({ level: "info", message: "to_stdout" });
  });

  it("omits file mirroring when no log file is configured", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const entries: string[] = [];
      const logger = new StructuredLogger({
        logFile: null,
        stdout: false,
        onEntry: (entry) => entries.push(entry.message),
      });

      logger.warn("no_file");
      await logger.flush();

      expect(await readdir(directory)).to.deep.equal([]);
      expect(entries).to.deep.equal(["no_file"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
