import path from "node:path";

import type { CutRule, Registries } from "../config/registry.js";
import {
  ConfigurationError,
  SearchExecutionError,
  UnsupportedVersionError,
  describeError,
} from "../errors.js";
import { ChildProcessTimeoutError, type ProcessRunner } from "../gateways/childProcess.js";
import { defaultFileSystemGateway, type FileSystemGateway } from "../gateways/fs.js";
import type { StructuredLogger } from "../logger.js";
import { hasErrnoCode } from "../nodePrimitives.js";
import {
  RawFormatError,
  SUPPORTED_KOJAK_VERSIONS,
  isSupportedKojakVersion,
  readKojakVersion,
  toAnalysisTable,
  toScoringInput,
  type RawTableSet,
} from "./formats.js";
import type {
  ConfigureRequest,
  NormaliseRequest,
  RawOutputFiles,
  RawOutputTriple,
  ResultPaths,
  RunRequest,
  SearchEngineAdapter,
  SearchResult,
} from "./types.js";

export const KOJAK_ENGINE = "kojak";

/** Placeholders every Kojak template carries exactly once. */
export const TEMPLATE_PLACEHOLDERS = {
  database: "$database$",
  fragmentBin: "$fragbin$",
  precursorTolerance: "$pretol$",
} as const;

const CONVERTED_SUFFIX = /\.mzML\.gz$/i;

/** Raw files Kojak writes beside an input `<base>.mzML.gz`. */
export function rawOutputTriple(spectraPath: string): RawOutputTriple {
  const dir = path.dirname(spectraPath);
  const base = inputBaseName(spectraPath);
  return {
    spectraPath,
    primary: path.join(dir, `${base}.kojak.txt`),
    intra: path.join(dir, `${base}.perc.intra.txt`),
    inter: path.join(dir, `${base}.perc.inter.txt`),
  };
}

function inputBaseName(spectraPath: string): string {
  return path.basename(spectraPath).replace(CONVERTED_SUFFIX, "");
}

/** `enzyme = [KR]|[P] Name`; an empty side is left out. */
export function renderEnzymeBlock(name: string, rule: CutRule): string {
  const sides = [rule.after, rule.before].filter((side) => side.length > 0).map((side) => `[${side}]`);
  return `enzyme = ${sides.join("|")} ${name}`;
}

export interface KojakAdapterOptions {
  readonly registries: Registries;
  readonly runner: ProcessRunner;
  readonly logger: StructuredLogger;
  readonly timeoutMs: number;
  readonly fs?: FileSystemGateway;
}

/** Kojak cross-link search engine. */
export class KojakAdapter implements SearchEngineAdapter {
  readonly engine = KOJAK_ENGINE;
  readonly supportedVersions: readonly string[] = SUPPORTED_KOJAK_VERSIONS;

  private readonly registries: Registries;
  private readonly runner: ProcessRunner;
  private readonly logger: StructuredLogger;
  private readonly timeoutMs: number;
  private readonly fs: FileSystemGateway;

  constructor(options: KojakAdapterOptions) {
    this.registries = options.registries;
    this.runner = options.runner;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
    this.fs = options.fs ?? defaultFileSystemGateway;
  }

  /**
   * Renders the configuration text: the template with its placeholders
   * substituted, one modification block per requested name, then one enzyme
   * line per requested enzyme. Names render in caller order, repeats included.
   */
  async configure(request: ConfigureRequest): Promise<string> {
    const modBlocks = request.modifications.map((name) => this.registries.modifications.fragment(name, this.engine));
    const enzymeBlocks = request.enzymes.map((name) =>
      renderEnzymeBlock(name, this.registries.enzymes.cutRule(name)),
    );

    let template: string;
    try {
      template = await this.fs.readFileUtf8(request.templatePath);
    } catch (error) {
      if (hasErrnoCode(error, "ENOENT")) {
        throw new ConfigurationError(`Kojak template ${request.templatePath} does not exist.`, {
          details: { templatePath: request.templatePath },
        });
      }
      throw error;
    }

    const substitutions: ReadonlyArray<readonly [string, string]> = [
      [TEMPLATE_PLACEHOLDERS.database, request.databasePath],
      [TEMPLATE_PLACEHOLDERS.fragmentBin, String(request.fragmentBinWidth)],
      [TEMPLATE_PLACEHOLDERS.precursorTolerance, String(request.precursorTolerance)],
    ];
    let rendered = template;
    for (const [placeholder, value] of substitutions) {
      const occurrences = template.split(placeholder).length - 1;
      if (occurrences !== 1) {
        throw new ConfigurationError(
          `Kojak template ${request.templatePath} must contain ${placeholder} exactly once, found ${occurrences}.`,
          { details: { templatePath: request.templatePath, placeholder, occurrences } },
        );
      }
      // split/join rather than replace(): `$` sequences in paths stay literal.
      rendered = rendered.split(placeholder).join(value);
    }

    return `${rendered}\n${modBlocks.join("\n")}\n${enzymeBlocks.join("\n")}\n`;
  }

  /**
   * Writes the configuration beside the dataset, clears stale results and
   * runs Kojak once over every input. The raw triple of every input must exist
   * afterwards.
   */
  async run(request: RunRequest): Promise<RawOutputFiles> {
    const { datasetId, spectraPaths, workingDir } = request;
    const triples = spectraPaths.map(rawOutputTriple);
    const expected = triples.flatMap((triple) => [triple.primary, triple.intra, triple.inter]);
    const configPath = path.join(workingDir, `${datasetId}.kojak.conf`);

    await this.fs.ensureDirectory(workingDir);
    await this.fs.writeFileAtomic(configPath, request.configText);
    // A leftover triple from an earlier run would pass the existence check below.
    for (const file of expected) {
      await this.fs.remove(file);
    }

    this.logger.info("search_started", {
      dataset_id: datasetId,
      stage: "search",
      engine: this.engine,
      binary: request.binaryPath,
      files: spectraPaths.length,
    });

    let exitCode: number | null;
    let stderrTail: string;
    try {
      ({ exitCode, stderrTail } = await this.runner.run({
        command: request.binaryPath,
        args: [configPath, ...spectraPaths],
        cwd: workingDir,
        timeoutMs: this.timeoutMs,
      }));
    } catch (error) {
      const reason = error instanceof ChildProcessTimeoutError ? "timed out" : "could not be run";
      throw new SearchExecutionError(`Kojak ${reason} for ${datasetId}: ${describeError(error)}`, {
        datasetId,
        cause: error,
        rawPaths: await this.existing(expected),
        details: { expected },
      });
    }

    const present = await this.existing(expected);
    if (exitCode !== 0) {
      throw new SearchExecutionError(`Kojak exited with status ${exitCode} for ${datasetId}.`, {
        datasetId,
        rawPaths: present,
        details: { exitCode, stderr: stderrTail, expected },
      });
    }
    const missing = expected.filter((file) => !present.includes(file));
    if (missing.length > 0) {
      throw new SearchExecutionError(`Kojak left ${missing.length} result file(s) missing for ${datasetId}.`, {
        datasetId,
        rawPaths: present,
        details: { missing, expected },
      });
    }

    this.logger.info("search_completed", { dataset_id: datasetId, stage: "search", engine: this.engine });
    return { datasetId, configPath, triples };
  }

  /**
   * Converts the raw triples into the analysis table and the scoring input.
   * The version is taken from the banner of the first primary file. It must be
   * supported and match the build that ran before anything is written.
   */
  async normalise(request: NormaliseRequest): Promise<SearchResult> {
    const { raw, outputDir, expectedVersion } = request;
    const { datasetId } = raw;
    const rawPaths = raw.triples.flatMap((triple) => [triple.primary, triple.intra, triple.inter]);
    if (raw.triples.length === 0) {
      throw new SearchExecutionError(`No raw results to normalise for ${datasetId}.`, { datasetId });
    }

    const tables: RawTableSet[] = [];
    for (const triple of raw.triples) {
      tables.push({
        base: inputBaseName(triple.spectraPath),
        primary: await this.readRaw(triple.primary, datasetId, rawPaths),
        intra: await this.readRaw(triple.intra, datasetId, rawPaths),
        inter: await this.readRaw(triple.inter, datasetId, rawPaths),
      });
    }

    const version = readKojakVersion(tables[0].primary);
    if (version === null) {
      throw new SearchExecutionError(`${raw.triples[0].primary} does not start with a Kojak version line.`, {
        datasetId,
        rawPaths,
      });
    }
    if (!isSupportedKojakVersion(version)) {
      throw new UnsupportedVersionError(version, SUPPORTED_KOJAK_VERSIONS, { datasetId });
    }
    if (version !== expectedVersion) {
      throw new SearchExecutionError(
        `Kojak output of ${datasetId} reports version ${version}, expected ${expectedVersion}.`,
        { datasetId, rawPaths, details: { expected: expectedVersion, reported: version } },
      );
    }

    let analysis: string;
    let scoring: string;
    try {
      analysis = toAnalysisTable(version, tables);
      scoring = toScoringInput(tables);
    } catch (error) {
      if (error instanceof RawFormatError) {
        throw new SearchExecutionError(`Kojak output of ${datasetId} is malformed: ${error.message}`, {
          datasetId,
          cause: error,
          rawPaths,
        });
      }
      throw error;
    }

    const paths = this.resultPaths(datasetId, version, outputDir);
    await this.fs.ensureDirectory(outputDir);
    await this.fs.writeFileAtomic(paths.analysisPath, analysis);
    await this.fs.writeFileAtomic(paths.scoringInputPath, scoring);

    this.logger.info("search_normalised", {
      dataset_id: datasetId,
      stage: "normalise",
      engine: this.engine,
      version,
      analysis: paths.analysisPath,
      scoring: paths.scoringInputPath,
    });
    return { engine: this.engine, version, ...paths };
  }

  resultPaths(datasetId: string, version: string, outputDir: string): ResultPaths {
    const stem = path.join(outputDir, `${datasetId}.${this.engine}-${version}`);
    return { analysisPath: `${stem}.xenith.tsv`, scoringInputPath: `${stem}.pin` };
  }

  private async existing(files: readonly string[]): Promise<string[]> {
    const present: string[] = [];
    for (const file of files) {
      if (await this.fs.exists(file)) {
        present.push(file);
      }
    }
    return present;
  }

  private async readRaw(file: string, datasetId: string, rawPaths: readonly string[]): Promise<string> {
    try {
      return await this.fs.readFileUtf8(file);
    } catch (error) {
      throw new SearchExecutionError(`Cannot read Kojak output ${file}: ${describeError(error)}`, {
        datasetId,
        cause: error,
        rawPaths,
      });
    }
  }
}
