import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { createDispatchContext, runWithDispatchContext } from "../src/infra/dispatchContext.js";
import { parseRedactionDirectives, StructuredLogger, type LogEntry } from "../src/logger.js";

describe("StructuredLogger", () => {
  beforeEach(() => {
    sinon.stub(process.stdout, "write").returns(true);
  });

  afterEach(() => {
    sinon.restore();
  });

  it("rotates the log file when the configured size is exceeded", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "host.log");

    try {
      const logger = new StructuredLogger({
        logFile,
        maxFileSizeBytes: 256,
        maxFileCount: 3,
      });

      for (let index = 0; index < 6; index += 1) {
        logger.info("rotation_test_entry", { index, payload: "x".repeat(120) });
      }

      await logger.flush();

      const files = await readdir(directory);
      expect(files).to.include("host.log");
      expect(files).to.include("host.log.1");
      expect(files).to.not.include("host.log.3");

      const archived = await readFile(path.join(directory, "host.log.1"), "utf8");
      expect(archived).to.contain("rotation_test_entry");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("redacts configured secrets and sensitive keys", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    const logFile = path.join(directory, "audit.log");

    try {
      const logger = new StructuredLogger({
        logFile,
        redactSecrets: ["test-secret"],
        redactionEnabled: true,
      });

      logger.info("handler_settings", {
        note: "calling the lookup API with test-secret",
        settings: { api_key: "placeholder-key", region: "eu" },
      });

      await logger.flush();

      const [line] = (await readFile(logFile, "utf8")).trim().split("\n");
      const entry: unknown = JSON.parse(line ?? "{}");
      expect(entry).to.deep.include({
        level: "info",
        message: "handler_settings",
        payload: {
          note: "calling the lookup API with [REDACTED]",
          settings: { api_key: "[REDACTED]", region: "eu" },
        },
      });
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("omits file mirroring when callers pass a null logFile override", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "logger-"));
    try {
      const entries: Array<{ message: string }> = [];
      const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => entries.push({ message: entry.message }) });

      logger.warn("null_logfile_sanitised", { detail: "capture" });
      await logger.flush();

      const files = await readdir(directory);
      expect(files.length, "the logger should not create files when mirroring is disabled").to.equal(0);
      expect(entries.map((entry) => entry.message)).to.deep.equal(["null_logfile_sanitised"]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("stamps entries emitted during a dispatch with its correlation fields", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ logFile: null, onEntry: (entry) => entries.push(entry) });
    const context = createDispatchContext("URL", "To website", () => 0);

    runWithDispatchContext(context, () => logger.debug("inside"));
    logger.debug("outside");

    expect(entries[0]).to.deep.include({
      message: "inside",
      dispatch_id: context.dispatchId,
      entity: "URL",
      transform: "To website",
    });
    expect(entries[1]).to.not.have.property("dispatch_id");
  });
});

describe("parseRedactionDirectives", () => {
  it("enables redaction with toggles or custom tokens", () => {
    expect(parseRedactionDirectives(undefined)).to.deep.equal({ enabled: false, tokens: [] });
    expect(parseRedactionDirectives("on")).to.deep.equal({ enabled: true, tokens: [] });
    expect(parseRedactionDirectives("test-secret, test-secret")).to.deep.equal({
      enabled: true,
      tokens: ["test-secret"],
    });
    expect(parseRedactionDirectives("off,test-secret")).to.deep.equal({ enabled: false, tokens: ["test-secret"] });
  });
});
