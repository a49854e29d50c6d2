import {
  ConfigurationError,
  SearchExecutionError,
  isDatasetLocalError,
  type PipelineError,
} from "../errors.js";
import type { SearchResult } from "../engines/types.js";
import type { StructuredLogger } from "../logger.js";
import { PARTITIONS, type Partition } from "./catalog.js";
import type { Dataset, DatasetStage, DatasetStatus, SearchOptions } from "./dataset.js";

export type OutcomeStatus = "ok" | "blocked" | "awaiting_user_action" | "failed";

/** Per-dataset line of a bulk report. */
export interface DatasetOutcome {
  readonly id: string;
  readonly partition: Partition;
  readonly status: OutcomeStatus;
  readonly stage: DatasetStage;
  readonly result?: SearchResult;
  readonly error?: ReturnType<PipelineError["toJSON"]>;
  readonly rawPaths?: readonly string[];
  readonly missingRawFiles?: readonly string[];
}

export interface BulkReport {
  readonly outcomes: readonly DatasetOutcome[];
  /** Datasets that ended blocked, awaiting the operator or failed. */
  readonly unsuccessful: number;
}

/** Which datasets a bulk operation covers. */
export interface Selection {
  readonly partition?: Partition | "all";
  readonly datasetId?: string;
}

function isPartition(value: string): value is Partition {
  return PARTITIONS.some((partition) => partition === value);
}

/**
 * Datasets grouped by partition, processed one at a time.
 *
 * Bulk operations keep going past datasets that are blocked (acquisition or
 * estimation failed), waiting for conversions, or whose search failed; those
 * end up in the report. Configuration problems and unsupported engine
 * versions abort the whole run since every later dataset would hit them too.
 */
export class DatasetCollection {
  private readonly partitions: Record<Partition, Dataset[]> = { training: [], validation: [], test: [] };
  private readonly logger: StructuredLogger;

  constructor(logger: StructuredLogger) {
    this.logger = logger;
  }

  /** Appends `dataset` to `partition`, which must be the dataset's own. */
  add(partition: string, dataset: Dataset): void {
    if (!isPartition(partition)) {
      throw new ConfigurationError(`Unknown partition "${partition}".`, {
        datasetId: dataset.id,
        details: { partition, known: [...PARTITIONS] },
      });
    }
    if (dataset.partition !== partition) {
      throw new ConfigurationError(`Dataset ${dataset.id} belongs to ${dataset.partition}, not ${partition}.`, {
        datasetId: dataset.id,
      });
    }
    if (this.all().some((existing) => existing.id === dataset.id)) {
      throw new ConfigurationError(`Dataset ${dataset.id} is already in the collection.`, { datasetId: dataset.id });
    }
    this.partitions[partition].push(dataset);
  }

  partition(name: Partition): readonly Dataset[] {
    return [...this.partitions[name]];
  }

  /** Every dataset, training first, then validation, then test. */
  all(): Dataset[] {
    return PARTITIONS.flatMap((name) => this.partitions[name]);
  }

  select(selection: Selection = {}): Dataset[] {
    const partition = selection.partition ?? "all";
    const candidates = partition === "all" ? this.all() : this.partition(partition);
    if (selection.datasetId === undefined) {
      return [...candidates];
    }
    const match = candidates.filter((dataset) => dataset.id === selection.datasetId);
    if (match.length === 0) {
      throw new ConfigurationError(`No dataset "${selection.datasetId}" in partition ${partition}.`, {
        details: { datasetId: selection.datasetId, partition },
      });
    }
    return match;
  }

  async prepareAll(selection: Selection = {}): Promise<BulkReport> {
    const outcomes: DatasetOutcome[] = [];
    for (const dataset of this.select(selection)) {
      const stage = await dataset.prepare();
      outcomes.push(preparationOutcome(dataset, stage));
    }
    return this.report("prepare", outcomes);
  }

  /** Prepares then searches every selected dataset that reaches `ready`. */
  async searchAll(engine: string, options: SearchOptions = {}, selection: Selection = {}): Promise<BulkReport> {
    const outcomes: DatasetOutcome[] = [];
    for (const dataset of this.select(selection)) {
      const stage = await dataset.prepare();
      if (stage !== "ready" && stage !== "searched") {
        outcomes.push(preparationOutcome(dataset, stage));
        continue;
      }
      try {
        const result = await dataset.search(engine, options);
        outcomes.push({ id: dataset.id, partition: dataset.partition, status: "ok", stage: "searched", result });
      } catch (error) {
        if (error instanceof SearchExecutionError || isDatasetLocalError(error)) {
          this.logger.error("search_failed", { dataset_id: dataset.id, stage: "search", error: error.toJSON() });
          outcomes.push({
            id: dataset.id,
            partition: dataset.partition,
            status: "failed",
            stage,
            error: error.toJSON(),
            ...(error instanceof SearchExecutionError ? { rawPaths: error.rawPaths } : {}),
          });
          continue;
        }
        throw error;
      }
    }
    return this.report("search", outcomes);
  }

  async statusAll(selection: Selection = {}): Promise<DatasetStatus[]> {
    const statuses: DatasetStatus[] = [];
    for (const dataset of this.select(selection)) {
      statuses.push(await dataset.status());
    }
    return statuses;
  }

  private report(operation: string, outcomes: DatasetOutcome[]): BulkReport {
    const unsuccessful = outcomes.filter((outcome) => outcome.status !== "ok").length;
    this.logger.info("collection_completed", { operation, datasets: outcomes.length, unsuccessful });
    return { outcomes, unsuccessful };
  }
}

function preparationOutcome(dataset: Dataset, stage: DatasetStage): DatasetOutcome {
  const base = { id: dataset.id, partition: dataset.partition, stage };
  const { blocked, awaitingUserAction } = dataset;
  if (blocked) {
    return {
      ...base,
      status: "blocked",
      error: { code: blocked.code, message: blocked.reason, dataset_id: dataset.id, details: blocked.details },
    };
  }
  if (awaitingUserAction) {
    return { ...base, status: "awaiting_user_action", missingRawFiles: awaitingUserAction.missingRawFiles };
  }
  return { ...base, status: "ok" };
}
