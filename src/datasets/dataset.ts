import path from "node:path";

import type { Registries } from "../config/registry.js";
import {
  AcquisitionError,
  ConfigurationError,
  EstimationError,
  describeError,
  type PipelineErrorCode,
} from "../errors.js";
import type { EngineRegistry } from "../engines/registry.js";
import type { SearchJobConfig, SearchResult } from "../engines/types.js";
import { estimationResultPath, type ParameterEstimator } from "../estimation/paramMedic.js";
import type { DatabaseSource } from "../fasta/acquisition.js";
import { databaseFileName, type DatabaseAssembler } from "../fasta/assembler.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { datasetWorkspacePath, resolveWithin } from "../paths.js";
import type { DatasetDefinition, Partition } from "./catalog.js";

/** Stages of a dataset, in the order `prepare` walks them. */
export const DATASET_STAGES = [
  "uninitialized",
  "awaiting_database",
  "awaiting_conversion",
  "awaiting_parameters",
  "ready",
  "searched",
] as const;
export type DatasetStage = (typeof DATASET_STAGES)[number];

export const CONVERTED_EXTENSION = ".mzML.gz";
const RAW_EXTENSION = /\.[^.\\/]+$/;

/** Converted spectra name of a raw file: its final extension becomes `.mzML.gz`. */
export function convertedFileName(rawFile: string): string {
  if (!RAW_EXTENSION.test(rawFile)) {
    throw new ConfigurationError(`Raw file "${rawFile}" has no extension.`, { details: { rawFile } });
  }
  return rawFile.replace(RAW_EXTENSION, CONVERTED_EXTENSION);
}

/** Collaborators shared by every dataset of a run. */
export interface DatasetServices {
  readonly dataRoot: string;
  readonly registries: Registries;
  readonly engines: EngineRegistry;
  readonly assembler: Pick<DatabaseAssembler, "assemble">;
  readonly estimator: Pick<ParameterEstimator, "estimate" | "parse">;
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
}

export interface SearchOptions {
  /** Engine build to use; the preferred installed build when omitted. */
  readonly version?: string;
}

export interface BlockedState {
  readonly stage: DatasetStage;
  readonly code: PipelineErrorCode;
  readonly reason: string;
  readonly details: Record<string, unknown>;
}

export interface AwaitingUserAction {
  readonly reason: string;
  readonly missingRawFiles: readonly string[];
}

/** Serialisable snapshot returned by {@link Dataset.status}. */
export interface DatasetStatus {
  readonly id: string;
  readonly partition: Partition;
  readonly stage: DatasetStage;
  readonly root: string;
  readonly databasePath: string;
  readonly precursorTolerance: number | null;
  readonly fragmentBinWidth: number | null;
  readonly blocked: BlockedState | null;
  readonly awaitingUserAction: AwaitingUserAction | null;
  readonly results: readonly SearchResult[];
}

/**
 * One public dataset moving through database assembly, conversion check,
 * parameter estimation and search. The stage is never stored: it is derived
 * from the artifacts present in the workspace, so an interrupted run resumes
 * where it stopped and a finished one does nothing.
 */
export class Dataset {
  readonly id: string;
  readonly partition: Partition;
  readonly rawFiles: readonly string[];
  readonly source: DatabaseSource;
  readonly modifications: readonly string[];
  readonly enzymes: readonly string[];

  readonly root: string;
  readonly databasePath: string;
  /** Same order and length as {@link rawFiles}. */
  readonly convertedPaths: readonly string[];
  readonly estimationPath: string;

  private precursorTolerance: number | null;
  private fragmentBinWidth: number | null;
  private blockedState: BlockedState | null = null;
  private awaitingAction: AwaitingUserAction | null = null;

  private readonly services: DatasetServices;
  private readonly fs: FileSystemGateway;
  private readonly rawByConverted: ReadonlyMap<string, string>;

  constructor(definition: DatasetDefinition, services: DatasetServices) {
    if (definition.rawFiles.length === 0) {
      throw new ConfigurationError(`Dataset ${definition.id} lists no raw files.`, { datasetId: definition.id });
    }
    if (definition.enzymes.length === 0) {
      throw new ConfigurationError(`Dataset ${definition.id} lists no enzymes.`, { datasetId: definition.id });
    }

    this.id = definition.id;
    this.partition = definition.partition;
    this.rawFiles = [...definition.rawFiles];
    this.source = definition.source;
    this.modifications = [...definition.modifications];
    this.enzymes = [...definition.enzymes];
    this.precursorTolerance = definition.precursorTolerance ?? null;
    this.fragmentBinWidth = definition.fragmentBinWidth ?? null;
    this.services = services;
    this.fs = services.fs ?? defaultFileSystemGateway;

    this.root = datasetWorkspacePath(services.dataRoot, this.partition, this.id);
    this.databasePath = path.join(this.root, databaseFileName(this.id));
    this.estimationPath = estimationResultPath(this.root, this.id);

    const rawByConverted = new Map<string, string>();
    for (const rawFile of this.rawFiles) {
      const converted = convertedFileName(rawFile);
      if (rawByConverted.has(converted)) {
        throw new ConfigurationError(`Raw files of ${this.id} collide on the converted name ${converted}.`, {
          datasetId: this.id,
          details: { converted },
        });
      }
      rawByConverted.set(converted, rawFile);
    }
    this.rawByConverted = rawByConverted;
    this.convertedPaths = [...rawByConverted.keys()].map((name) => resolveWithin(this.root, name));
  }

  get blocked(): BlockedState | null {
    return this.blockedState;
  }

  get awaitingUserAction(): AwaitingUserAction | null {
    return this.awaitingAction;
  }

  get tolerances(): { precursorTolerance: number; fragmentBinWidth: number } | null {
    if (this.precursorTolerance === null || this.fragmentBinWidth === null) {
      return null;
    }
    return { precursorTolerance: this.precursorTolerance, fragmentBinWidth: this.fragmentBinWidth };
  }

  /** Raw file name a converted spectra file was produced from. */
  rawFileFor(convertedPath: string): string {
    const rawFile = this.rawByConverted.get(path.basename(convertedPath));
    if (rawFile === undefined) {
      throw new ConfigurationError(`${convertedPath} is not a converted file of ${this.id}.`, {
        datasetId: this.id,
        details: { convertedPath },
      });
    }
    return rawFile;
  }

  /** Current stage, derived from the workspace and the known tolerances. */
  async probe(): Promise<DatasetStage> {
    if (!(await this.fs.exists(this.root))) {
      return "uninitialized";
    }
    if (!(await this.fs.exists(this.databasePath))) {
      return "awaiting_database";
    }
    if ((await this.missingRawFiles()).length > 0) {
      return "awaiting_conversion";
    }
    if (this.tolerances === null) {
      return "awaiting_parameters";
    }
    return (await this.existingResults()).length > 0 ? "searched" : "ready";
  }

  /**
   * Advances the dataset as far as it can go without searching and returns
   * the stage reached. Acquisition and estimation failures leave the dataset
   * blocked at their stage; missing conversions leave it awaiting the
   * operator. Any other failure propagates.
   */
  async prepare(): Promise<DatasetStage> {
    this.blockedState = null;
    this.awaitingAction = null;
    const { logger } = this.services;

    let previous: DatasetStage | null = null;
    for (;;) {
      const stage = await this.probe();
      if (stage === previous) {
        throw new Error(`Dataset ${this.id} did not leave stage ${stage}.`);
      }
      previous = stage;
      switch (stage) {
        case "uninitialized":
          await this.fs.ensureDirectory(this.root);
          logger.info("dataset_initialised", { dataset_id: this.id, stage, root: this.root });
          break;

        case "awaiting_database":
          try {
            await this.services.assembler.assemble({
              datasetId: this.id,
              source: this.source,
              destinationDir: this.root,
              cutRule: this.services.registries.enzymes.cutRule(this.enzymes[0]),
            });
          } catch (error) {
            if (error instanceof AcquisitionError) {
              return this.block(stage, error);
            }
            throw error;
          }
          break;

        case "awaiting_conversion": {
          const missingRawFiles = await this.missingRawFiles();
          this.awaitingAction = {
            reason: `${missingRawFiles.length} of ${this.rawFiles.length} raw file(s) have not been converted.`,
            missingRawFiles,
          };
          logger.warn("dataset_awaiting_conversion", { dataset_id: this.id, stage, missing: missingRawFiles });
          return stage;
        }

        case "awaiting_parameters":
          try {
            const tolerances = (await this.fs.exists(this.estimationPath))
              ? await this.services.estimator.parse(this.estimationPath, this.id)
              : await this.services.estimator.estimate({
                  datasetId: this.id,
                  spectraPaths: this.convertedPaths,
                  workingDir: this.root,
                });
            this.precursorTolerance = tolerances.precursorTolerancePpm;
            this.fragmentBinWidth = tolerances.fragmentBinWidthMz;
          } catch (error) {
            if (error instanceof EstimationError) {
              return this.block(stage, error);
            }
            throw error;
          }
          break;

        case "ready":
        case "searched":
          logger.info("dataset_prepared", { dataset_id: this.id, stage });
          return stage;
      }
    }
  }

  /**
   * Searches the dataset with `engine`. A result pair already on disk for the
   * selected build is returned as is. Failures propagate as tagged errors and
   * leave the dataset untouched.
   */
  async search(engine: string, options: SearchOptions = {}): Promise<SearchResult> {
    const { adapter, build } = this.services.engines.resolve(engine, options.version);
    const stage = await this.probe();
    const tolerances = this.tolerances;
    if (tolerances === null || (stage !== "ready" && stage !== "searched")) {
      throw new ConfigurationError(`Dataset ${this.id} cannot be searched at stage ${stage}.`, {
        datasetId: this.id,
        details: { stage, tolerancesKnown: tolerances !== null },
      });
    }

    const paths = adapter.resultPaths(this.id, build.version, this.root);
    if ((await this.fs.exists(paths.analysisPath)) && (await this.fs.exists(paths.scoringInputPath))) {
      this.services.logger.info("search_skipped", {
        dataset_id: this.id,
        stage: "searched",
        engine: adapter.engine,
        version: build.version,
      });
      return { engine: adapter.engine, version: build.version, ...paths };
    }

    const job: SearchJobConfig = {
      datasetId: this.id,
      engine: adapter.engine,
      version: build.version,
      binaryPath: build.binary,
      templatePath: build.template,
      databasePath: this.databasePath,
      precursorTolerance: tolerances.precursorTolerance,
      fragmentBinWidth: tolerances.fragmentBinWidth,
      modifications: this.modifications,
      enzymes: this.enzymes,
      spectraPaths: this.convertedPaths,
      workingDir: this.root,
    };
    const configText = await adapter.configure(job);
    const raw = await adapter.run({ ...job, configText });
    return adapter.normalise({ raw, outputDir: job.workingDir, expectedVersion: job.version });
  }

  async status(): Promise<DatasetStatus> {
    return {
      id: this.id,
      partition: this.partition,
      stage: await this.probe(),
      root: this.root,
      databasePath: this.databasePath,
      precursorTolerance: this.precursorTolerance,
      fragmentBinWidth: this.fragmentBinWidth,
      blocked: this.blockedState,
      awaitingUserAction: this.awaitingAction,
      results: await this.existingResults(),
    };
  }

  private block(stage: DatasetStage, error: AcquisitionError | EstimationError): DatasetStage {
    this.blockedState = { stage, code: error.code, reason: describeError(error), details: error.details };
    this.services.logger.error("dataset_blocked", { dataset_id: this.id, stage, error: error.toJSON() });
    return stage;
  }

  private async missingRawFiles(): Promise<string[]> {
    const missing: string[] = [];
    for (const convertedPath of this.convertedPaths) {
      if (!(await this.fs.exists(convertedPath))) {
        missing.push(this.rawFileFor(convertedPath));
      }
    }
    return missing;
  }

  private async existingResults(): Promise<SearchResult[]> {
    const results: SearchResult[] = [];
    for (const { adapter, build } of this.services.engines.installed()) {
      const paths = adapter.resultPaths(this.id, build.version, this.root);
      if ((await this.fs.exists(paths.analysisPath)) && (await this.fs.exists(paths.scoringInputPath))) {
        results.push({ engine: adapter.engine, version: build.version, ...paths });
      }
    }
    return results;
  }
}
