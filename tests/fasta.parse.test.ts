import { describe, it } from "mocha";
import { expect } from "chai";

import { FastaFormatError, formatFasta, parseFasta } from "../src/fasta/fasta.js";

describe("fasta model", () => {
  it("joins wrapped sequence lines and upper-cases residues", () => {
    const records = parseFasta(">sp|P00001|TEST_A first protein\nmkr\nAGK\n\n>sp|P00002|TEST_B\r\nPEPTIDE*\r\n");

    expect(records).to.deep.equal([
      { header: "sp|P00001|TEST_A first protein", sequence: "MKRAGK" },
      { header: "sp|P00002|TEST_B", sequence: "PEPTIDE*" },
    ]);
  });

  it("rejects documents without records", () => {
    expect(() => parseFasta("\n\n")).to.throw(FastaFormatError, "document contains no FASTA records");
  });

  it("rejects sequence data before the first header", () => {
    expect(() => parseFasta("MKR\n>late\nAAA\n")).to.throw(FastaFormatError, "(line 1)");
  });

  it("rejects records without a sequence", () => {
    expect(() => parseFasta(">empty\n>next\nAAA\n")).to.throw(FastaFormatError, 'record "empty" has no sequence');
  });

  it("rejects residues outside the alphabet", () => {
    expect(() => parseFasta(">bad\nMK1R\n")).to.throw(FastaFormatError, "outside the residue alphabet");
  });

  it("wraps sequences at sixty residues", () => {
    const sequence = "A".repeat(61);
    expect(formatFasta([{ header: "long", sequence }])).to.equal(`>long\n${"A".repeat(60)}\nA\n`);
    expect(formatFasta([])).to.equal("");
  });
});
