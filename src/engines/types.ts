/**
 * Contract shared by search-engine adapters. An adapter is chosen by an
 * explicit name lookup in the {@link EngineRegistry}, never by inspecting the
 * object it returns.
 */

/** Parameter bundle for one search invocation. Built fresh per call, never persisted. */
export interface SearchJobConfig {
  readonly datasetId: string;
  readonly engine: string;
  readonly version: string;
  readonly binaryPath: string;
  readonly templatePath: string;
  readonly databasePath: string;
  readonly precursorTolerance: number;
  readonly fragmentBinWidth: number;
  /** Rendered in this order; repeated names render repeated blocks. */
  readonly modifications: readonly string[];
  /** Rendered in this order after the modifications. */
  readonly enzymes: readonly string[];
  readonly spectraPaths: readonly string[];
  /** Receives the rendered configuration file; the engine runs from here. */
  readonly workingDir: string;
}

export type ConfigureRequest = Pick<
  SearchJobConfig,
  "databasePath" | "precursorTolerance" | "fragmentBinWidth" | "modifications" | "enzymes" | "templatePath"
>;

export type RunRequest = Pick<SearchJobConfig, "datasetId" | "spectraPaths" | "binaryPath" | "workingDir"> & {
  readonly configText: string;
};

/** Raw result files the engine writes for one input spectra file. */
export interface RawOutputTriple {
  readonly spectraPath: string;
  readonly primary: string;
  readonly intra: string;
  readonly inter: string;
}

export interface RawOutputFiles {
  readonly datasetId: string;
  readonly configPath: string;
  readonly triples: readonly RawOutputTriple[];
}

export interface NormaliseRequest {
  readonly raw: RawOutputFiles;
  readonly outputDir: string;
  /** Version of the build that ran; output reporting another version is rejected. */
  readonly expectedVersion: string;
}

export interface ResultPaths {
  /** Canonical downstream analysis table. */
  readonly analysisPath: string;
  /** Canonical scoring-tool input table. */
  readonly scoringInputPath: string;
}

export interface SearchResult extends ResultPaths {
  readonly engine: string;
  readonly version: string;
}

export interface SearchEngineAdapter {
  readonly engine: string;
  /** Versions whose output `normalise` can interpret. */
  readonly supportedVersions: readonly string[];
  configure(request: ConfigureRequest): Promise<string>;
  run(request: RunRequest): Promise<RawOutputFiles>;
  normalise(request: NormaliseRequest): Promise<SearchResult>;
  /** Where `normalise` writes the result pair of a dataset for `version`. */
  resultPaths(datasetId: string, version: string, outputDir: string): ResultPaths;
}
