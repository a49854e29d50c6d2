import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { EstimationError } from "../src/errors.js";
import {
  ParameterEstimator,
  estimationResultPath,
  parseEstimationTable,
} from "../src/estimation/paramMedic.js";
import { ChildProcessTimeoutError } from "../src/gateways/childProcess.js";
import { FakeProcessRunner, outcome } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

const TABLE = [
  "file\tprecursor_prediction_ppm\tprecursor_sigma_ppm\tfragment_prediction_th\tfragment_sigma_th",
  "run1.mzML.gz\t6.52\t1.1\t0.0211\t0.004",
  "run2.mzML.gz\t9.99\t1.1\t0.0333\t0.004",
  "",
].join("\n");

async function expectEstimationError(promise: Promise<unknown>): Promise<EstimationError> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(EstimationError);
    if (error instanceof EstimationError) {
      return error;
    }
  }
  expect.fail("expected an EstimationError");
}

describe("parameter estimation", () => {
  it("reads the first data row of the table", () => {
    expect(parseEstimationTable(TABLE)).to.deep.equal({ precursorTolerancePpm: 6.52, fragmentBinWidthMz: 0.0211 });
  });

  it("rejects tables without data, columns or usable values", () => {
    expect(() => parseEstimationTable("precursor_prediction_ppm\tfragment_prediction_th\n")).to.throw(
      EstimationError,
      "no data row",
    );
    expect(() => parseEstimationTable("precursor_prediction_ppm\n5\n")).to.throw(
      EstimationError,
      'lacks the "fragment_prediction_th" column',
    );
    expect(() => parseEstimationTable("precursor_prediction_ppm\tfragment_prediction_th\nnan\t0.02\n")).to.throw(
      EstimationError,
      "unusable precursor_prediction_ppm",
    );
    expect(() => parseEstimationTable("precursor_prediction_ppm\tfragment_prediction_th\n5\t0\n")).to.throw(
      EstimationError,
      "unusable fragment_prediction_th",
    );
  });

  it("runs param-medic once over every file and parses its output", async () => {
    const workingDir = await mkdtemp(path.join(tmpdir(), "pm-"));
    try {
      const runner = new FakeProcessRunner(async (invocation) => {
        await writeFile(estimationResultPath(workingDir, "PXD000001"), TABLE);
        expect(invocation.cwd).to.equal(workingDir);
        return outcome(0);
      });
      const estimator = new ParameterEstimator({
        cruxBinary: "/opt/crux/bin/crux",
        runner,
        logger: new RecordingLogger(),
        timeoutMs: 1_000,
      });

      const tolerances = await estimator.estimate({
        datasetId: "PXD000001",
        spectraPaths: ["/data/run1.mzML.gz", "/data/run2.mzML.gz"],
        workingDir,
      });

      expect(tolerances).to.deep.equal({ precursorTolerancePpm: 6.52, fragmentBinWidthMz: 0.0211 });
      expect(runner.invocations).to.have.lengthOf(1);
      expect(runner.invocations[0].command).to.equal("/opt/crux/bin/crux");
      expect(runner.invocations[0].timeoutMs).to.equal(1_000);
      expect(runner.invocations[0].args).to.deep.equal([
        "param-medic",
        "--pm-charges", "0,2,3,4,5,6,7,8,9",
        "--fileroot", "PXD000001",
        "--output-dir", path.join(workingDir, "pm-out"),
        "--pm-top-n-frag-peaks", "60",
        "--pm-min-peak-pairs", "140",
        "--overwrite", "T",
        "/data/run1.mzML.gz",
        "/data/run2.mzML.gz",
      ]);
    } finally {
      await rm(workingDir, { recursive: true, force: true });
    }
  });

  it("turns a non-zero exit into an estimation failure", async () => {
    const workingDir = await mkdtemp(path.join(tmpdir(), "pm-"));
    try {
      const estimator = new ParameterEstimator({
        cruxBinary: "crux",
        runner: new FakeProcessRunner(() => outcome(3, "boom")),
        logger: new RecordingLogger(),
        timeoutMs: 1_000,
      });

      const error = await expectEstimationError(
        estimator.estimate({ datasetId: "PXD000001", spectraPaths: ["a.mzML.gz"], workingDir }),
      );
      expect(error.datasetId).to.equal("PXD000001");
      expect(error.details).to.deep.equal({ exitCode: 3, stderr: "boom" });
    } finally {
      await rm(workingDir, { recursive: true, force: true });
    }
  });

  it("turns a timeout into an estimation failure", async () => {
    const workingDir = await mkdtemp(path.join(tmpdir(), "pm-"));
    try {
      const estimator = new ParameterEstimator({
        cruxBinary: "crux",
        runner: new FakeProcessRunner(() => {
          throw new ChildProcessTimeoutError(50);
        }),
        logger: new RecordingLogger(),
        timeoutMs: 50,
      });

      const error = await expectEstimationError(
        estimator.estimate({ datasetId: "PXD000001", spectraPaths: ["a.mzML.gz"], workingDir }),
      );
      expect(error.message).to.contain("timed out");
      expect(error.cause).to.be.instanceOf(ChildProcessTimeoutError);
    } finally {
      await rm(workingDir, { recursive: true, force: true });
    }
  });

  it("fails when the tool exits cleanly without writing a table", async () => {
    const workingDir = await mkdtemp(path.join(tmpdir(), "pm-"));
    try {
      const estimator = new ParameterEstimator({
        cruxBinary: "crux",
        runner: new FakeProcessRunner(),
        logger: new RecordingLogger(),
        timeoutMs: 1_000,
      });

      const error = await expectEstimationError(
        estimator.estimate({ datasetId: "PXD000001", spectraPaths: ["a.mzML.gz"], workingDir }),
      );
      expect(error.message).to.contain("does not exist");
    } finally {
      await rm(workingDir, { recursive: true, force: true });
    }
  });

  it("parses an existing table without running anything", async () => {
    const workingDir = await mkdtemp(path.join(tmpdir(), "pm-"));
    try {
      const resultPath = estimationResultPath(workingDir, "PXD000001");
      await mkdir(path.dirname(resultPath), { recursive: true });
      await writeFile(resultPath, TABLE);
      const runner = new FakeProcessRunner();
      const estimator = new ParameterEstimator({
        cruxBinary: "crux",
        runner,
        logger: new RecordingLogger(),
        timeoutMs: 1_000,
      });

      expect(await estimator.parse(resultPath, "PXD000001")).to.deep.equal({
        precursorTolerancePpm: 6.52,
        fragmentBinWidthMz: 0.0211,
      });
      expect(runner.invocations).to.deep.equal([]);
    } finally {
      await rm(workingDir, { recursive: true, force: true });
    }
  });
});
