import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import sinon from "sinon";

import { AcquisitionError } from "../src/errors.js";
import type { FastaAcquirer } from "../src/fasta/acquisition.js";
import { DatabaseAssembler, databaseFileName } from "../src/fasta/assembler.js";
import { makeDecoys } from "../src/fasta/decoys.js";
import { defaultFileSystemGateway } from "../src/gateways/fs.js";
import { formatFasta, type FastaRecord } from "../src/fasta/fasta.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const TRYPSIN = { after: "KR", before: "" };
const TARGETS: FastaRecord[] = [
  { header: "sp|P00001|ONE", sequence: "MKWVTFISLLLLFSSAYSRGVFRR" },
  { header: "sp|P00002|TWO", sequence: "DTHKSEIAHRFKDLGEEHFK" },
];

function staticAcquirer(records: FastaRecord[]): FastaAcquirer {
  return { acquire: async () => records };
}

describe("database assembler", () => {
  it("writes targets followed by their decoys", async () => {
    const workspace = await mkdtemp(path.join(tmpdir(), "assembler-"));
    try {
      const logger = new RecordingLogger();
      const assembler = new DatabaseAssembler({ acquirer: staticAcquirer(TARGETS), logger });

      const assembled = await assembler.assemble({
        datasetId: "PXD000001",
        source: { kind: "proteins", accessions: ["P00001", "P00002"] },
        destinationDir: workspace,
        cutRule: TRYPSIN,
      });

      expect(assembled).to.deep.equal({
        path: path.join(workspace, "PXD000001.fasta"),
        targetCount: 2,
        decoyCount: 2,
      });
      const written = await readFile(assembled.path, "utf8");
      expect(written).to.equal(formatFasta(TARGETS) + formatFasta(makeDecoys(TARGETS, TRYPSIN, 1)));
      expect(written.startsWith(">sp|P00001|ONE\n")).to.equal(true);
      expect(await readdir(workspace)).to.deep.equal(["PXD000001.fasta"]);
      expect(logger.messages()).to.deep.equal(["database_acquisition_started", "database_assembled"]);
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  });

  it("stages a single database file before moving it into place", async () => {
    const workspace = await mkdtemp(path.join(tmpdir(), "assembler-"));
    try {
      const fs = { ...defaultFileSystemGateway };
      const write = sinon.spy(fs, "writeFileUtf8");
      const move = sinon.spy(fs, "moveIntoPlace");
      const assembler = new DatabaseAssembler({ acquirer: staticAcquirer(TARGETS), logger: new RecordingLogger(), fs });

      const assembled = await assembler.assemble({
        datasetId: "PXD000001",
        source: { kind: "proteins", accessions: ["P00001", "P00002"] },
        destinationDir: workspace,
        cutRule: TRYPSIN,
      });

      expect(write.callCount).to.equal(1);
      const [staged] = write.firstCall.args;
      expect(path.basename(staged)).to.equal("PXD000001.fasta");
      expect(move.calledOnceWithExactly(staged, assembled.path)).to.equal(true);
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  });

  it("leaves nothing behind when acquisition fails", async () => {
    const workspace = await mkdtemp(path.join(tmpdir(), "assembler-"));
    try {
      const acquirer: FastaAcquirer = {
        acquire: async () => {
          throw new AcquisitionError("unreachable", { datasetId: "PXD000001" });
        },
      };
      const assembler = new DatabaseAssembler({ acquirer, logger: new RecordingLogger() });

      let caught: unknown;
      try {
        await assembler.assemble({
          datasetId: "PXD000001",
          source: { kind: "fasta", fileName: "db.fasta" },
          destinationDir: workspace,
          cutRule: TRYPSIN,
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(AcquisitionError);
      expect(await readdir(workspace)).to.deep.equal([]);
    } finally {
      await rm(workspace, { recursive: true, force: true });
    }
  });

  it("derives the database name from the dataset id", () => {
    expect(databaseFileName("PXD004898")).to.equal("PXD004898.fasta");
  });
});
