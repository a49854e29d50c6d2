import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import path from "node:path";

import { EXIT_CODES, parseCliArgs, runCli, type CliDependencies } from "../src/cli.js";
import { loadPipelineConfig } from "../src/config/pipeline.js";
import { DatasetCollection } from "../src/datasets/collection.js";
import { Dataset } from "../src/datasets/dataset.js";
import { DatasetHarness, TEST_REGISTRIES, definition } from "./helpers/datasetHarness.js";

class CapturedIo {
  readonly out: string[] = [];
  readonly err: string[] = [];
  readonly stdout = (line: string): void => {
    this.out.push(line);
  };
  readonly stderr = (line: string): void => {
    this.err.push(line);
  };
}

describe("cli argument parsing", () => {
  it("reads the command and its options", () => {
    expect(parseCliArgs(["search", "--partition", "validation", "--dataset", "PXD1", "--version", "1.6.1", "--json"])).to.deep.equal({
      command: "search",
      partition: "validation",
      datasetId: "PXD1",
      engine: "kojak",
      version: "1.6.1",
      json: true,
      helpRequested: false,
      errors: [],
    });
  });

  it("collects every problem", () => {
    expect(parseCliArgs([]).errors).to.deep.equal(["Missing command"]);
    expect(parseCliArgs(["prepare", "--partition", "holdout", "--bogus", "extra"]).errors).to.deep.equal([
      'Unknown partition "holdout"',
      "Unknown option --bogus",
      'Unexpected argument "extra"',
    ]);
    expect(parseCliArgs(["convert"]).errors).to.deep.equal(['Unknown command "convert"']);
    expect(parseCliArgs(["status", "--dataset"]).errors).to.deep.equal(["Missing value for --dataset"]);
  });
});

describe("cli", () => {
  let harness: DatasetHarness;
  let deps: CliDependencies;

  beforeEach(async () => {
    harness = await DatasetHarness.create();
    const collection = new DatasetCollection(harness.logger);
    collection.add("training", new Dataset(definition(), harness.services));
    deps = {
      loadConfig: () => loadPipelineConfig({ DATAPATH: harness.dataRoot }, harness.dataRoot),
      createLogger: () => harness.logger,
      createPipeline: async () => ({ registries: TEST_REGISTRIES, engines: harness.services.engines, collection }),
    };
  });

  afterEach(async () => {
    await harness.dispose();
  });

  it("prints the usage on --help", async () => {
    const io = new CapturedIo();
    expect(await runCli(["--help"], io, deps)).to.equal(EXIT_CODES.ok);
    expect(io.out[0].split("\n")[0]).to.equal("Usage: xlink-trainer <status|prepare|search> [options]");
  });

  it("exits with the usage status on bad arguments", async () => {
    const io = new CapturedIo();
    expect(await runCli(["prepare", "--partition", "holdout"], io, deps)).to.equal(EXIT_CODES.usage);
    expect(io.err).to.deep.equal(['Unknown partition "holdout"', "Use --help to display the supported options."]);
    expect(io.out).to.deep.equal([]);
  });

  it("reports datasets waiting for conversions as unsuccessful", async () => {
    const io = new CapturedIo();
    expect(await runCli(["prepare"], io, deps)).to.equal(EXIT_CODES.datasetFailures);
    expect(io.out).to.deep.equal([
      "PXD000001\ttraining\tawaiting_user_action\tawaiting_conversion\tmissing: run1.raw, run2.raw",
      "1 dataset(s), 1 unsuccessful",
    ]);
  });

  it("searches, then shows the result in the status", async () => {
    await runCli(["prepare"], new CapturedIo(), deps);
    await harness.convert("PXD000001", "training", "run1.mzML.gz", "run2.mzML.gz");
    const root = harness.workspace();

    const search = new CapturedIo();
    expect(await runCli(["search", "--partition", "training"], search, deps)).to.equal(EXIT_CODES.ok);
    expect(search.out).to.deep.equal([
      [
        "PXD000001",
        "training",
        "ok",
        "searched",
        path.join(root, "PXD000001.kojak-2.0.0-dev.xenith.tsv"),
        path.join(root, "PXD000001.kojak-2.0.0-dev.pin"),
      ].join("\t"),
      "1 dataset(s), 0 unsuccessful",
    ]);

    const status = new CapturedIo();
    expect(await runCli(["status"], status, deps)).to.equal(EXIT_CODES.ok);
    expect(status.out).to.deep.equal(["PXD000001\ttraining\tsearched\tpretol=6.5ppm\tfragbin=0.02\tkojak-2.0.0-dev"]);
  });

  it("prints reports as JSON on request", async () => {
    const io = new CapturedIo();
    await runCli(["prepare", "--json"], io, deps);

    const report: unknown = JSON.parse(io.out.join("\n"));
    expect(report).to.have.property("unsuccessful", 1);
    expect(report).to.have.nested.property("outcomes[0].missingRawFiles").that.deep.equals(["run1.raw", "run2.raw"]);
  });

  it("aborts on configuration errors", async () => {
    await runCli(["prepare"], new CapturedIo(), deps);
    await harness.convert("PXD000001", "training", "run1.mzML.gz", "run2.mzML.gz");

    const io = new CapturedIo();
    expect(await runCli(["search", "--version", "9.9.9"], io, deps)).to.equal(EXIT_CODES.usage);
    expect(io.err).to.deep.equal(['Configuration error: No usable kojak build for version "9.9.9".']);
    expect(harness.logger.messages().at(-1)).to.equal("run_aborted");
  });

  it("rejects an unknown dataset", async () => {
    const io = new CapturedIo();
    expect(await runCli(["status", "--dataset", "PXD999999"], io, deps)).to.equal(EXIT_CODES.usage);
    expect(io.err).to.deep.equal(['Configuration error: No dataset "PXD999999" in partition all.']);
  });
});
