import type { PipelineConfig } from "./config/pipeline.js";
import { loadRegistries, type Registries } from "./config/registry.js";
import { loadCatalog, type DatasetDefinition } from "./datasets/catalog.js";
import { DatasetCollection } from "./datasets/collection.js";
import { Dataset } from "./datasets/dataset.js";
import { KojakAdapter } from "./engines/kojak.js";
import { EngineRegistry } from "./engines/registry.js";
import { ParameterEstimator } from "./estimation/paramMedic.js";
import { createFastaAcquirer } from "./fasta/acquisition.js";
import { DatabaseAssembler } from "./fasta/assembler.js";
import { createProcessRunner, type ProcessRunner } from "./gateways/childProcess.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "./gateways/fs.js";
import { FetchHttpGateway, type HttpGateway } from "./gateways/http.js";
import type { StructuredLogger } from "./logger.js";

export interface PipelineDependencies {
  readonly config: PipelineConfig;
  readonly logger: StructuredLogger;
  readonly runner?: ProcessRunner;
  readonly http?: HttpGateway;
  readonly fs?: FileSystemGateway;
  /** Skip reading the registry file. */
  readonly registries?: Registries;
  /** Skip reading the catalogue file. */
  readonly catalog?: readonly DatasetDefinition[];
}

export interface Pipeline {
  readonly registries: Registries;
  readonly engines: EngineRegistry;
  readonly collection: DatasetCollection;
}

/** Wires gateways, stages and the catalogue into a ready collection. */
export async function createPipeline(deps: PipelineDependencies): Promise<Pipeline> {
  const { config, logger } = deps;
  const fs = deps.fs ?? defaultFileSystemGateway;
  const runner = deps.runner ?? createProcessRunner();
  const http = deps.http ?? new FetchHttpGateway({ timeoutMs: config.fetchTimeoutMs });

  const registries = deps.registries ?? (await loadRegistries(config.registryFile));
  const catalog = deps.catalog ?? (await loadCatalog(config.catalogFile, registries));

  const engines = new EngineRegistry().register(
    new KojakAdapter({ registries, runner, logger, timeoutMs: config.processTimeoutMs, fs }),
    config.engines.kojak ?? [],
  );
  const services = {
    dataRoot: config.dataRoot,
    registries,
    engines,
    assembler: new DatabaseAssembler({
      acquirer: createFastaAcquirer({ http, proteomeDomain: config.proteomeDomain }),
      logger,
      fs,
    }),
    estimator: new ParameterEstimator({
      cruxBinary: config.cruxBinary,
      runner,
      logger,
      timeoutMs: config.processTimeoutMs,
      fs,
    }),
    logger,
    fs,
  };

  const collection = new DatasetCollection(logger);
  for (const definition of catalog) {
    collection.add(definition.partition, new Dataset(definition, services));
  }
  logger.info("pipeline_ready", { datasets: catalog.length, engines: engines.names() });
  return { registries, engines, collection };
}
