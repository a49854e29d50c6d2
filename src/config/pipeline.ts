import { homedir } from "node:os";
import path from "node:path";
import process from "node:process";

import { readEnum, readInt, readOptionalString, readString } from "./env.js";

/** Taxonomic domains of the UniProt reference-proteome tree. */
export const PROTEOME_DOMAINS = ["Archaea", "Bacteria", "Eukaryota", "Viruses"] as const;
export type ProteomeDomain = (typeof PROTEOME_DOMAINS)[number];

/** Searches over a full proteome routinely run for hours. */
const DEFAULT_PROCESS_TIMEOUT_MS = 12 * 60 * 60 * 1_000;
/** Reference proteomes are tens of megabytes compressed. */
const DEFAULT_FETCH_TIMEOUT_MS = 10 * 60 * 1_000;

/** One installed build of a search engine. */
export interface EngineBuild {
  readonly version: string;
  readonly binary: string;
  readonly template: string;
}

export interface PipelineConfig {
  /** Root of every dataset workspace (`<dataRoot>/<partition>/<id>`). */
  readonly dataRoot: string;
  /** Installed builds per engine name, preferred build first. */
  readonly engines: Readonly<Record<string, readonly EngineBuild[]>>;
  /** The crux toolkit binary, used for parameter estimation. */
  readonly cruxBinary: string;
  readonly registryFile: string;
  readonly catalogFile: string;
  /** Applied to every external process (estimation and search). */
  readonly processTimeoutMs: number;
  /** Applied to every network fetch during database acquisition. */
  readonly fetchTimeoutMs: number;
  readonly proteomeDomain: ProteomeDomain;
  readonly logFile: string | null;
}

type Env = Readonly<Record<string, string | undefined>>;

/** Expands a leading `~` so binary paths copied from shell profiles work. */
export function expandHome(candidate: string): string {
  if (candidate === "~") {
    return homedir();
  }
  if (candidate.startsWith("~/")) {
    return path.join(homedir(), candidate.slice(2));
  }
  return candidate;
}

/**
 * Builds the frozen pipeline configuration from the environment. Relative
 * paths resolve against `cwd`.
 *
 * | Variable | Default |
 * |----------|---------|
 * | `DATAPATH` | `./data` |
 * | `KOJAK2` / `KOJAK1` | `~/bin/kojak/kojak_2.0.0-dev` / `~/bin/kojak/kojak_1.6.1` |
 * | `CRUX` | `~/bin/crux` |
 * | `XLINK_TEMPLATES_DIR` | `./templates` |
 * | `XLINK_REGISTRY_FILE` / `XLINK_CATALOG_FILE` | `./config/registry.json` / `./config/datasets.json` |
 * | `XLINK_PROCESS_TIMEOUT_MS` / `XLINK_FETCH_TIMEOUT_MS` | 12 h / 10 min |
 * | `XLINK_PROTEOME_DOMAIN` | `Eukaryota` |
 * | `XLINK_LOG_FILE` | unset (console only) |
 */
export function loadPipelineConfig(env: Env = process.env, cwd: string = process.cwd()): PipelineConfig {
  const resolve = (value: string) => path.resolve(cwd, expandHome(value));
  const templatesDir = resolve(readString("XLINK_TEMPLATES_DIR", "templates", env));
  const logFile = readOptionalString("XLINK_LOG_FILE", env);

  const kojak: EngineBuild[] = [
    {
      version: "2.0.0-dev",
      binary: resolve(readString("KOJAK2", "~/bin/kojak/kojak_2.0.0-dev", env)),
      template: path.join(templatesDir, "kojak_2.0.0-dev.conf"),
    },
    {
      version: "1.6.1",
      binary: resolve(readString("KOJAK1", "~/bin/kojak/kojak_1.6.1", env)),
      template: path.join(templatesDir, "kojak_1.6.1.conf"),
    },
  ];

  return Object.freeze({
    dataRoot: resolve(readString("DATAPATH", "data", env)),
    engines: Object.freeze({ kojak: Object.freeze(kojak) }),
    cruxBinary: resolve(readString("CRUX", "~/bin/crux", env)),
    registryFile: resolve(readString("XLINK_REGISTRY_FILE", "config/registry.json", env)),
    catalogFile: resolve(readString("XLINK_CATALOG_FILE", "config/datasets.json", env)),
    processTimeoutMs: readInt("XLINK_PROCESS_TIMEOUT_MS", DEFAULT_PROCESS_TIMEOUT_MS, { min: 1 }, env),
    fetchTimeoutMs: readInt("XLINK_FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS, { min: 1 }, env),
    proteomeDomain: readEnum("XLINK_PROTEOME_DOMAIN", PROTEOME_DOMAINS, "Eukaryota", env),
    logFile: logFile === undefined ? null : resolve(logFile),
  });
}
