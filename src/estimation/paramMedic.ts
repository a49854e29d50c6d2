import path from "node:path";

import { EstimationError, describeError } from "../errors.js";
import { ChildProcessTimeoutError, type ProcessRunner } from "../gateways/childProcess.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { hasErrnoCode } from "../nodePrimitives.js";

/** Precursor charges param-medic pools; 0 stands for spectra of unknown charge. */
const CHARGES = [0, 2, 3, 4, 5, 6, 7, 8, 9] as const;

export const PRECURSOR_COLUMN = "precursor_prediction_ppm";
export const FRAGMENT_COLUMN = "fragment_prediction_th";

/** Sub-directory of the dataset workspace receiving param-medic output. */
export const ESTIMATION_DIRNAME = "pm-out";

export interface SearchTolerances {
  readonly precursorTolerancePpm: number;
  readonly fragmentBinWidthMz: number;
}

export interface EstimateRequest {
  readonly datasetId: string;
  /** Converted spectra of every run of the dataset, estimated together. */
  readonly spectraPaths: readonly string[];
  /** Dataset workspace; output goes to `<workingDir>/pm-out`. */
  readonly workingDir: string;
}

export interface ParameterEstimatorOptions {
  readonly cruxBinary: string;
  readonly runner: ProcessRunner;
  readonly logger: StructuredLogger;
  readonly timeoutMs: number;
  readonly fs?: FileSystemGateway;
}

/** Location of the param-medic table for a dataset. */
export function estimationResultPath(workingDir: string, datasetId: string): string {
  return path.join(workingDir, ESTIMATION_DIRNAME, `${datasetId}.param-medic.txt`);
}

/**
 * Runs `crux param-medic` over all of a dataset's runs at once (pooling
 * replicates gives the most stable estimate) and reads back the precursor
 * tolerance and fragment bin width.
 */
export class ParameterEstimator {
  private readonly cruxBinary: string;
  private readonly runner: ProcessRunner;
  private readonly logger: StructuredLogger;
  private readonly timeoutMs: number;
  private readonly fs: FileSystemGateway;

  constructor(options: ParameterEstimatorOptions) {
    this.cruxBinary = options.cruxBinary;
    this.runner = options.runner;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
    this.fs = options.fs ?? defaultFileSystemGateway;
  }

  /** Always invokes the estimator; skipping it when a table exists is up to the caller. */
  async estimate(request: EstimateRequest): Promise<SearchTolerances> {
    const { datasetId, spectraPaths, workingDir } = request;
    if (spectraPaths.length === 0) {
      throw new EstimationError(`No spectra given for ${datasetId}.`, { datasetId });
    }

    const outputDir = path.join(workingDir, ESTIMATION_DIRNAME);
    await this.fs.ensureDirectory(outputDir);
    const args = [
      "param-medic",
      "--pm-charges", CHARGES.join(","),
      "--fileroot", datasetId,
      "--output-dir", outputDir,
      "--pm-top-n-frag-peaks", "60",
      "--pm-min-peak-pairs", "140",
      "--overwrite", "T",
      ...spectraPaths,
    ];

    this.logger.info("parameter_estimation_started", { dataset_id: datasetId, stage: "parameters", files: spectraPaths.length });
    let exitCode: number | null;
    let stderrTail: string;
    try {
      ({ exitCode, stderrTail } = await this.runner.run({
        command: this.cruxBinary,
        args,
        cwd: workingDir,
        timeoutMs: this.timeoutMs,
      }));
    } catch (error) {
      const reason = error instanceof ChildProcessTimeoutError ? "timed out" : "could not be run";
      throw new EstimationError(`param-medic ${reason} for ${datasetId}: ${describeError(error)}`, {
        datasetId,
        cause: error,
      });
    }
    if (exitCode !== 0) {
      throw new EstimationError(`param-medic exited with status ${exitCode} for ${datasetId}.`, {
        datasetId,
        details: { exitCode, stderr: stderrTail },
      });
    }

    const tolerances = await this.parse(estimationResultPath(workingDir, datasetId), datasetId);
    this.logger.info("parameter_estimation_completed", { dataset_id: datasetId, stage: "parameters", ...tolerances });
    return tolerances;
  }

  /** Reads the first data row of a param-medic table. */
  async parse(resultPath: string, datasetId: string | null = null): Promise<SearchTolerances> {
    let text: string;
    try {
      text = await this.fs.readFileUtf8(resultPath);
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        throw new EstimationError(`param-medic output ${resultPath} does not exist.`, { datasetId, details: { resultPath } });
      }
      throw error;
    }
    return parseEstimationTable(text, { datasetId, resultPath });
  }
}

/**
 * Extracts the tolerances from a tab-separated param-medic table. Only the
 * first data row is consumed.
 */
export function parseEstimationTable(
  text: string,
  context: { datasetId?: string | null; resultPath?: string } = {},
): SearchTolerances {
  const datasetId = context.datasetId ?? null;
  const details = context.resultPath === undefined ? {} : { resultPath: context.resultPath };
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length < 2) {
    throw new EstimationError("param-medic output has no data row.", { datasetId, details });
  }

  const header = lines[0].split("\t").map((column) => column.trim());
  const row = lines[1].split("\t").map((cell) => cell.trim());

  const read = (column: string): number => {
    const index = header.indexOf(column);
    if (index === -1) {
      throw new EstimationError(`param-medic output lacks the "${column}" column.`, {
        datasetId,
        details: { ...details, columns: header },
      });
    }
    const value = Number(row[index]);
    if (row[index] === undefined || row[index] === "" || !Number.isFinite(value) || value <= 0) {
      throw new EstimationError(`param-medic reported an unusable ${column}: "${row[index] ?? ""}".`, {
        datasetId,
        details,
      });
    }
    return value;
  };

  return { precursorTolerancePpm: read(PRECURSOR_COLUMN), fragmentBinWidthMz: read(FRAGMENT_COLUMN) };
}
