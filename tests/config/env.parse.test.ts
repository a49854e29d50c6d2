/**
 * Table-driven tests for the environment readers. Each case passes an explicit
 * environment so nothing depends on the shell running the suite.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { readEnum, readInt, readOptionalInt, readOptionalString, readString } from "../../src/config/env.js";

describe("config/env", () => {
  it("parses integers within bounds", () => {
    const cases: Array<{ raw: string | undefined; expected: number | undefined }> = [
      { raw: "42", expected: 42 },
      { raw: " +7 ", expected: 7 },
      { raw: "0", expected: undefined },
      { raw: "1.5", expected: undefined },
      { raw: "12ms", expected: undefined },
      { raw: "", expected: undefined },
      { raw: undefined, expected: undefined },
    ];
    for (const { raw, expected } of cases) {
      expect(readOptionalInt("TIMEOUT", { min: 1 }, { TIMEOUT: raw }), String(raw)).to.equal(expected);
    }
    expect(readInt("TIMEOUT", 500, { min: 1, max: 100 }, { TIMEOUT: "101" })).to.equal(500);
  });

  it("treats blank strings as unset", () => {
    expect(readOptionalString("CRUX", { CRUX: "   " })).to.equal(undefined);
    expect(readString("CRUX", "~/bin/crux", { CRUX: "" })).to.equal("~/bin/crux");
    expect(readString("CRUX", "~/bin/crux", { CRUX: " /opt/crux " })).to.equal("/opt/crux");
  });

  it("matches enum values case-insensitively", () => {
    const domains = ["Bacteria", "Eukaryota"] as const;
    expect(readEnum("DOMAIN", domains, "Eukaryota", { DOMAIN: "bacteria" })).to.equal("Bacteria");
    expect(readEnum("DOMAIN", domains, "Eukaryota", { DOMAIN: "plants" })).to.equal("Eukaryota");
    expect(readEnum("DOMAIN", domains, "Eukaryota", {})).to.equal("Eukaryota");
  });
});
