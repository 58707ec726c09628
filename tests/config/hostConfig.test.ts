import { describe, it } from "mocha";
import { expect } from "chai";
import path from "node:path";

import { resolveHostConfig } from "../../src/config/hostConfig.js";

describe("config/resolveHostConfig", () => {
  const cwd = path.resolve("/srv/entity-host");

  it("applies defaults when nothing is configured", () => {
    expect(resolveHostConfig({}, cwd)).to.deep.equal({
      pluginsDir: path.join(cwd, "plugins"),
      failureMode: "abort",
      allowModuleUnits: false,
      logFile: null,
      logMaxFileBytes: 5 * 1024 * 1024,
    });
  });

  it("reads every variable and resolves paths against the working directory", () => {
    const config = resolveHostConfig(
      {
        ENTITY_PLUGINS_DIR: "custom/units",
        ENTITY_LOAD_FAILURE_MODE: "Isolate",
        ENTITY_ALLOW_MODULE_UNITS: "true",
        ENTITY_LOG_FILE: "logs/host.log",
        ENTITY_LOG_MAX_BYTES: "2048",
      },
      cwd,
    );

    expect(config).to.deep.equal({
      pluginsDir: path.join(cwd, "custom", "units"),
      failureMode: "isolate",
      allowModuleUnits: true,
      logFile: path.join(cwd, "logs", "host.log"),
      logMaxFileBytes: 2048,
    });
  });

  it("ignores invalid values", () => {
    const config = resolveHostConfig(
      { ENTITY_LOAD_FAILURE_MODE: "retry", ENTITY_ALLOW_MODULE_UNITS: "perhaps", ENTITY_LOG_MAX_BYTES: "0" },
      cwd,
    );

    expect(config.failureMode).to.equal("abort");
    expect(config.allowModuleUnits).to.equal(false);
    expect(config.logMaxFileBytes).to.equal(5 * 1024 * 1024);
  });

  it("keeps absolute plugin directories as given", () => {
    const absolute = path.resolve("/opt/units");
    expect(resolveHostConfig({ ENTITY_PLUGINS_DIR: absolute }, cwd).pluginsDir).to.equal(absolute);
  });
});
