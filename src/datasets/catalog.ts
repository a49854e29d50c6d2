import { readFile } from "node:fs/promises";
import { z } from "zod";

import type { Registries } from "../config/registry.js";
import { ConfigurationError } from "../errors.js";
import { SOURCE_KINDS, describeSource, type DatabaseSource } from "../fasta/acquisition.js";

export const PARTITIONS = ["training", "validation", "test"] as const;
export type Partition = (typeof PARTITIONS)[number];

const RAW_FILE = /^[^\\/]+\.[A-Za-z0-9]+$/;

const datasetRecordSchema = z
  .object({
    id: z.string().regex(/^[A-Za-z0-9_.-]+$/, "dataset ids are ProteomeXchange-style identifiers"),
    partition: z.enum(PARTITIONS),
    rawFiles: z.array(z.string().regex(RAW_FILE, "raw files are bare names with an extension")).min(1),
    fasta: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
    fastaType: z.enum(SOURCE_KINDS).default("fasta"),
    mods: z.array(z.string().min(1)).default(["BS3"]),
    enzymes: z.array(z.string().min(1)).min(1).default(["Trypsin"]),
    precursorTolerance: z.number().positive().optional(),
    fragmentBinWidth: z.number().positive().optional(),
  })
  .strict();

export const catalogSchema = z.array(datasetRecordSchema);

export type DatasetRecord = z.infer<typeof datasetRecordSchema>;

/** Validated catalogue entry, ready to become a {@link Dataset}. */
export interface DatasetDefinition {
  readonly id: string;
  readonly partition: Partition;
  readonly rawFiles: readonly string[];
  readonly source: DatabaseSource;
  readonly modifications: readonly string[];
  readonly enzymes: readonly string[];
  readonly precursorTolerance?: number;
  readonly fragmentBinWidth?: number;
}

/**
 * Validates catalogue records and checks every modification and enzyme name
 * against the registries. All problems are reported together.
 */
export function parseCatalog(raw: unknown, registries: Registries): DatasetDefinition[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("Dataset catalogue failed validation.", {
      details: {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      },
    });
  }

  const problems: string[] = [];
  const seen = new Set<string>();
  for (const record of parsed.data) {
    if (seen.has(record.id)) {
      problems.push(`${record.id}: listed more than once`);
    }
    seen.add(record.id);
    for (const mod of record.mods) {
      if (!registries.modifications.has(mod)) {
        problems.push(`${record.id}: unknown modification "${mod}"`);
      }
    }
    for (const enzyme of record.enzymes) {
      if (!registries.enzymes.has(enzyme)) {
        problems.push(`${record.id}: unknown enzyme "${enzyme}"`);
      }
    }
  }
  if (problems.length > 0) {
    throw new ConfigurationError(`Dataset catalogue disagrees with the registries (${problems.length} problem(s)).`, {
      details: { problems },
    });
  }

  return parsed.data.map((record) => toDefinition(record));
}

function toDefinition(record: DatasetRecord): DatasetDefinition {
  let source: DatabaseSource;
  try {
    source = describeSource(record.fastaType, record.fasta);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(error.message, { datasetId: record.id, cause: error });
    }
    throw error;
  }
  return {
    id: record.id,
    partition: record.partition,
    rawFiles: record.rawFiles,
    source,
    modifications: record.mods,
    enzymes: record.enzymes,
    ...(record.precursorTolerance !== undefined ? { precursorTolerance: record.precursorTolerance } : {}),
    ...(record.fragmentBinWidth !== undefined ? { fragmentBinWidth: record.fragmentBinWidth } : {}),
  };
}

/** Reads and validates the catalogue JSON file. */
export async function loadCatalog(filePath: string, registries: Registries): Promise<DatasetDefinition[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read dataset catalogue ${filePath}.`, { cause: error, details: { filePath } });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Dataset catalogue ${filePath} is not valid JSON.`, {
      cause: error,
      details: { filePath },
    });
  }
  return parseCatalog(raw, registries);
}
