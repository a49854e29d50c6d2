import { DECOY_PREFIX } from "../fasta/decoys.js";

/** Kojak builds whose raw output layout is known. */
export const SUPPORTED_KOJAK_VERSIONS = ["1.6.1", "2.0.0-dev"] as const;
export type KojakVersion = (typeof SUPPORTED_KOJAK_VERSIONS)[number];

const VERSION_LINE = /^Kojak version (\S+)/;

/** Placeholder written for absent values in the analysis table. */
const MISSING = "NA";

/** Raised when a raw table does not have the layout its version promises. */
export class RawFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RawFormatError";
  }
}

/** Contents of the raw result files written for one input, keyed by the input base name. */
export interface RawTableSet {
  readonly base: string;
  readonly primary: string;
  readonly intra: string;
  readonly inter: string;
}

export function isSupportedKojakVersion(version: string): version is KojakVersion {
  return SUPPORTED_KOJAK_VERSIONS.some((supported) => supported === version);
}

/** Version token of a primary result file, or `null` when the first line is not a version banner. */
export function readKojakVersion(primary: string): string | null {
  const firstLine = primary.split(/\r?\n/, 1)[0] ?? "";
  const match = VERSION_LINE.exec(firstLine);
  return match ? match[1] : null;
}

interface PrimaryLayout {
  readonly scan: string;
  readonly charge: string;
  readonly obsMass: string;
  readonly ppmError: string;
  readonly score: string;
  readonly deltaScore: string;
  readonly peptideA: string;
  readonly linkA: string;
  readonly proteinA: string;
  readonly peptideB: string;
  readonly linkB: string;
  readonly proteinB: string;
  /**
   * Columns holding the protein link sites. `null` means the sites are
   * embedded in the protein column as `name(site)`.
   */
  readonly proteinSiteA: string | null;
  readonly proteinSiteB: string | null;
}

const SHARED_COLUMNS = {
  scan: "Scan Number",
  charge: "Charge",
  obsMass: "Obs Mass",
  ppmError: "PPM Error",
  score: "Score",
  deltaScore: "dScore",
  peptideA: "Peptide #1",
  linkA: "Link #1",
  proteinA: "Protein #1",
  peptideB: "Peptide #2",
  linkB: "Link #2",
  proteinB: "Protein #2",
} as const;

const PRIMARY_LAYOUTS: Record<KojakVersion, PrimaryLayout> = {
  "1.6.1": { ...SHARED_COLUMNS, proteinSiteA: null, proteinSiteB: null },
  "2.0.0-dev": { ...SHARED_COLUMNS, proteinSiteA: "Protein #1 Site", proteinSiteB: "Protein #2 Site" },
};

export const ANALYSIS_COLUMNS = [
  "SpecId",
  "Label",
  "ScanNr",
  "Charge",
  "ObsMass",
  "PpmError",
  "Score",
  "DeltaScore",
  "PeptideA",
  "PeptideB",
  "LinkA",
  "LinkB",
  "ProteinA",
  "ProteinB",
  "ProteinLinkA",
  "ProteinLinkB",
  "Fraction",
] as const;

/**
 * Builds the analysis table from the primary result file of every input.
 * Rows without a first peptide (unmatched spectra) are dropped. A match is
 * labelled `-1` as soon as one of its peptides maps to decoy proteins only.
 */
export function toAnalysisTable(version: KojakVersion, tables: readonly RawTableSet[]): string {
  const layout = PRIMARY_LAYOUTS[version];
  const lines: string[] = [ANALYSIS_COLUMNS.join("\t")];

  for (const table of tables) {
    const rows = splitRows(table.primary);
    // Line 0 is the version banner, line 1 the header.
    if (rows.length < 2) {
      throw new RawFormatError(`Result table of ${table.base} has no header.`);
    }
    const cell = columnReader(rows[1], layout, table.base);

    for (const row of rows.slice(2)) {
      const peptideA = cell(row, layout.peptideA);
      if (isMissing(peptideA)) {
        continue;
      }
      const peptideB = cell(row, layout.peptideB);
      const proteinsA = splitProteins(cell(row, layout.proteinA), layout.proteinSiteA === null);
      const proteinsB = isMissing(peptideB)
        ? { names: [], sites: [] }
        : splitProteins(cell(row, layout.proteinB), layout.proteinSiteB === null);
      const sitesA = layout.proteinSiteA === null ? proteinsA.sites.join(";") : cell(row, layout.proteinSiteA);
      const sitesB = layout.proteinSiteB === null ? proteinsB.sites.join(";") : cell(row, layout.proteinSiteB);
      const decoy = isDecoyOnly(proteinsA.names) || (!isMissing(peptideB) && isDecoyOnly(proteinsB.names));

      const scan = cell(row, layout.scan);
      const charge = cell(row, layout.charge);
      lines.push(
        [
          `${table.base}_${scan}_${charge}`,
          decoy ? "-1" : "1",
          scan,
          charge,
          cell(row, layout.obsMass),
          cell(row, layout.ppmError),
          cell(row, layout.score),
          cell(row, layout.deltaScore),
          peptideA,
          orMissing(peptideB),
          orMissing(cell(row, layout.linkA)),
          orMissing(cell(row, layout.linkB)),
          orMissing(proteinsA.names.join(";")),
          orMissing(proteinsB.names.join(";")),
          orMissing(sitesA),
          orMissing(sitesB),
          table.base,
        ].join("\t"),
      );
    }
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Builds the scoring-tool input by concatenating the inter- then intra-protein
 * tables of every input under a single header. Spectrum ids are prefixed with
 * the input base name so they stay unique across runs.
 */
export function toScoringInput(tables: readonly RawTableSet[]): string {
  let header: string | null = null;
  const lines: string[] = [];

  for (const table of tables) {
    for (const [kind, text] of [["inter", table.inter], ["intra", table.intra]] as const) {
      const rows = splitRows(text).filter((row) => !VERSION_LINE.test(row));
      if (rows.length === 0) {
        throw new RawFormatError(`${kind} table of ${table.base} has no header.`);
      }
      if (header === null) {
        header = rows[0];
      } else if (rows[0] !== header) {
        throw new RawFormatError(`${kind} table of ${table.base} has a different header than the first table.`);
      }
      for (const row of rows.slice(1)) {
        lines.push(`${table.base}_${row}`);
      }
    }
  }

  if (header === null) {
    throw new RawFormatError("No result tables to merge.");
  }
  return `${[header, ...lines].join("\n")}\n`;
}

function splitRows(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

function columnReader(
  headerLine: string,
  layout: PrimaryLayout,
  base: string,
): (row: string, column: string) => string {
  const header = headerLine.split("\t").map((column) => column.trim());
  const indices = new Map(header.map((column, index) => [column, index]));
  for (const required of Object.values(layout)) {
    if (required !== null && !indices.has(required)) {
      throw new RawFormatError(`Result table of ${base} lacks the "${required}" column.`);
    }
  }
  return (row, column) => {
    const cells = row.split("\t");
    const value = cells[indices.get(column) ?? -1];
    if (value === undefined) {
      throw new RawFormatError(`Result table of ${base} has a truncated row: "${row}".`);
    }
    return value.trim();
  };
}

function splitProteins(value: string, sitesEmbedded: boolean): { names: string[]; sites: string[] } {
  const names: string[] = [];
  const sites: string[] = [];
  for (const entry of value.split(";").map((item) => item.trim())) {
    if (isMissing(entry)) {
      continue;
    }
    const embedded = sitesEmbedded ? /^(.*)\((\d+)\)$/.exec(entry) : null;
    if (embedded) {
      names.push(embedded[1]);
      sites.push(embedded[2]);
    } else {
      names.push(entry);
    }
  }
  return { names, sites };
}

function isDecoyOnly(proteins: readonly string[]): boolean {
  return proteins.length > 0 && proteins.every((protein) => protein.startsWith(DECOY_PREFIX));
}

function isMissing(value: string): boolean {
  return value === "" || value === "-";
}

function orMissing(value: string): string {
  return isMissing(value) ? MISSING : value;
}
