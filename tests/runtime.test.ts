import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { loadPipelineConfig } from "../src/config/pipeline.js";
import { ConfigurationError } from "../src/errors.js";
import { createPipeline } from "../src/runtime.js";
import { TEST_REGISTRIES, definition } from "./helpers/datasetHarness.js";
import { FakeHttpGateway, FakeProcessRunner } from "./helpers/fakes.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("runtime", () => {
  it("wires the catalogue into a collection with the kojak engine", async () => {
    const dataRoot = await mkdtemp(path.join(tmpdir(), "runtime-"));
    try {
      const logger = new RecordingLogger();
      const pipeline = await createPipeline({
        config: loadPipelineConfig({ DATAPATH: dataRoot }, dataRoot),
        logger,
        runner: new FakeProcessRunner(),
        http: new FakeHttpGateway(),
        registries: TEST_REGISTRIES,
        catalog: [definition(), definition({ id: "PXD000002", partition: "test" })],
      });

      expect(pipeline.engines.names()).to.deep.equal(["kojak"]);
      expect(pipeline.engines.resolve("kojak").build.version).to.equal("2.0.0-dev");
      expect(pipeline.collection.partition("test").map((dataset) => dataset.root)).to.deep.equal([
        path.join(dataRoot, "test", "PXD000002"),
      ]);
      expect(logger.entries.at(-1)).to.deep.equal({
        level: "info",
        message: "pipeline_ready",
        payload: { datasets: 2, engines: ["kojak"] },
      });
    } finally {
      await rm(dataRoot, { recursive: true, force: true });
    }
  });

  it("rejects catalogues listing a dataset twice", async () => {
    try {
      await createPipeline({
        config: loadPipelineConfig({}, "/srv/xlink"),
        logger: new RecordingLogger(),
        runner: new FakeProcessRunner(),
        http: new FakeHttpGateway(),
        registries: TEST_REGISTRIES,
        catalog: [definition(), definition()],
      });
      expect.fail("expected a ConfigurationError");
    } catch (error) {
      expect(error).to.be.instanceOf(ConfigurationError);
    }
  });
});
