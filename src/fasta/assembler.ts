import path from "node:path";

import type { CutRule } from "../config/registry.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { sanitizeFilename } from "../paths.js";
import type { DatabaseSource, FastaAcquirer } from "./acquisition.js";
import { DECOY_SEED, makeDecoys } from "./decoys.js";
import { formatFasta } from "./fasta.js";

export interface AssembleRequest {
  readonly datasetId: string;
  readonly source: DatabaseSource;
  /** Directory receiving `<datasetId>.fasta`. */
  readonly destinationDir: string;
  /** Rule the decoy shuffle respects; the first enzyme of the dataset. */
  readonly cutRule: CutRule;
}

export interface AssembledDatabase {
  readonly path: string;
  readonly targetCount: number;
  readonly decoyCount: number;
}

export interface DatabaseAssemblerOptions {
  readonly acquirer: FastaAcquirer;
  readonly logger: StructuredLogger;
  readonly fs?: FileSystemGateway;
}

/** File name of the target-decoy database inside a dataset workspace. */
export function databaseFileName(datasetId: string): string {
  return `${sanitizeFilename(datasetId)}.fasta`;
}

/**
 * Builds the target-decoy database of a dataset: targets first, then one
 * shuffled decoy per target. Everything is written in a scratch directory and
 * moved into place at the end, so the destination either holds a complete
 * database or nothing.
 *
 * The assembler always builds. Reusing an existing database is the caller's
 * decision.
 */
export class DatabaseAssembler {
  private readonly acquirer: FastaAcquirer;
  private readonly logger: StructuredLogger;
  private readonly fs: FileSystemGateway;

  constructor(options: DatabaseAssemblerOptions) {
    this.acquirer = options.acquirer;
    this.logger = options.logger;
    this.fs = options.fs ?? defaultFileSystemGateway;
  }

  async assemble(request: AssembleRequest): Promise<AssembledDatabase> {
    const { datasetId, source, destinationDir, cutRule } = request;
    const destination = path.join(destinationDir, databaseFileName(datasetId));
    const scratch = await this.fs.createScratchDirectory(destinationDir, ".assemble-");

    try {
      this.logger.info("database_acquisition_started", { dataset_id: datasetId, stage: "database", source: source.kind });
      const targets = await this.acquirer.acquire({ datasetId, source });
      const decoys = makeDecoys(targets, cutRule, DECOY_SEED);
      const staged = path.join(scratch, databaseFileName(datasetId));
      await this.fs.writeFileUtf8(staged, formatFasta([...targets, ...decoys]));
      await this.fs.moveIntoPlace(staged, destination);

      this.logger.info("database_assembled", {
        dataset_id: datasetId,
        stage: "database",
        path: destination,
        targets: targets.length,
        decoys: decoys.length,
      });
      return { path: destination, targetCount: targets.length, decoyCount: decoys.length };
    } finally {
      await this.fs.remove(scratch);
    }
  }
}
