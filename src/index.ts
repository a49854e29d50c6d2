export * from "./errors.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { loadPipelineConfig, type EngineBuild, type PipelineConfig } from "./config/pipeline.js";
export {
  createRegistries,
  loadRegistries,
  EnzymeRegistry,
  ModificationRegistry,
  type CutRule,
  type Registries,
} from "./config/registry.js";
export { loadCatalog, parseCatalog, PARTITIONS, type DatasetDefinition, type Partition } from "./datasets/catalog.js";
export {
  Dataset,
  DATASET_STAGES,
  convertedFileName,
  type DatasetServices,
  type DatasetStage,
  type DatasetStatus,
} from "./datasets/dataset.js";
export { DatasetCollection, type BulkReport, type DatasetOutcome, type Selection } from "./datasets/collection.js";
export { parseFasta, formatFasta, type FastaRecord } from "./fasta/fasta.js";
export { makeDecoys, shuffleSequence, DECOY_PREFIX, DECOY_SEED } from "./fasta/decoys.js";
export { createFastaAcquirer, describeSource, type DatabaseSource, type FastaAcquirer } from "./fasta/acquisition.js";
export { DatabaseAssembler, type AssembledDatabase } from "./fasta/assembler.js";
export { ParameterEstimator, parseEstimationTable, type SearchTolerances } from "./estimation/paramMedic.js";
export { KojakAdapter } from "./engines/kojak.js";
export { EngineRegistry } from "./engines/registry.js";
export { toAnalysisTable, toScoringInput, SUPPORTED_KOJAK_VERSIONS } from "./engines/formats.js";
export type * from "./engines/types.js";
export { createPipeline, type Pipeline, type PipelineDependencies } from "./runtime.js";
