/**
 * Table-driven tests covering the environment readers. Each reader takes the
 * environment as an argument, so the cases pass plain objects and never touch
 * `process.env`.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readEnum,
  readInt,
  readOptionalBool,
  readOptionalEnum,
  readOptionalInt,
  readOptionalString,
  readString,
} from "../../src/config/env.js";

describe("config/env helpers", () => {
  it("interprets boolean flags case-insensitively", () => {
    expect(readBool("FLAG", false, { FLAG: "YES" })).to.equal(true);
    expect(readOptionalBool("FLAG", { FLAG: "off" })).to.equal(false);
    expect(readOptionalBool("FLAG", { FLAG: "  " })).to.equal(undefined);
  });

  it("falls back to defaults when booleans are ambiguous", () => {
    expect(readBool("FLAG", true, { FLAG: "maybe" })).to.equal(true);
    expect(readOptionalBool("FLAG", { FLAG: "maybe" })).to.equal(undefined);
    expect(readBool("FLAG", false, {})).to.equal(false);
  });

  it("parses integers and enforces bounds", () => {
    expect(readInt("COUNT", 3, undefined, { COUNT: " 42 " })).to.equal(42);
    expect(readOptionalInt("COUNT", { min: 1 }, { COUNT: "0" })).to.equal(undefined);
    expect(readOptionalInt("COUNT", { max: 10 }, { COUNT: "11" })).to.equal(undefined);
    expect(readInt("COUNT", 3, { min: 1 }, { COUNT: "-5" })).to.equal(3);
  });

  it("rejects non-integer numerals", () => {
    expect(readOptionalInt("COUNT", undefined, { COUNT: "1.5" })).to.equal(undefined);
    expect(readOptionalInt("COUNT", undefined, { COUNT: "12abc" })).to.equal(undefined);
    expect(readOptionalInt("COUNT", undefined, { COUNT: "99999999999999999999" })).to.equal(undefined);
  });

  it("trims strings and treats blanks as unset", () => {
    expect(readOptionalString("DIR", { DIR: "  plugins  " })).to.equal("plugins");
    expect(readOptionalString("DIR", { DIR: "" })).to.equal(undefined);
    expect(readString("DIR", "fallback", { DIR: "   " })).to.equal("fallback");
  });

  it("matches enums case-insensitively and returns the canonical spelling", () => {
    const modes = ["abort", "isolate"] as const;
    expect(readOptionalEnum("MODE", modes, { MODE: "ISOLATE" })).to.equal("isolate");
    expect(readOptionalEnum("MODE", modes, { MODE: "skip" })).to.equal(undefined);
    expect(readEnum("MODE", modes, "abort", {})).to.equal("abort");
  });
});
