/** A single FASTA entry. `header` excludes the leading `>`. */
export interface FastaRecord {
  readonly header: string;
  readonly sequence: string;
}

/** Residue alphabet accepted in protein sequences (IUPAC letters plus a stop `*`). */
const RESIDUE_PATTERN = /^[A-Z]+\*?$/;

/** Width of sequence lines written by {@link formatFasta}. */
export const FASTA_LINE_WIDTH = 60;

/** Raised when text cannot be interpreted as a protein FASTA document. */
export class FastaFormatError extends Error {
  public readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `${message} (line ${line})`);
    this.name = "FastaFormatError";
    this.line = line;
  }
}

/**
 * Parses a protein FASTA document. Blank lines are ignored, sequence lines are
 * concatenated and upper-cased. Every record must carry a non-empty header and
 * a non-empty sequence drawn from {@link RESIDUE_PATTERN}.
 */
export function parseFasta(text: string): FastaRecord[] {
  const records: FastaRecord[] = [];
  let header: string | null = null;
  let headerLine = 0;
  let chunks: string[] = [];

  const closeRecord = () => {
    if (header === null) {
      return;
    }
    const sequence = chunks.join("");
    if (sequence.length === 0) {
      throw new FastaFormatError(`record "${header}" has no sequence`, headerLine);
    }
    if (!RESIDUE_PATTERN.test(sequence)) {
      throw new FastaFormatError(`record "${header}" contains characters outside the residue alphabet`, headerLine);
    }
    records.push({ header, sequence });
  };

  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (line.length === 0) {
      continue;
    }
    if (line.startsWith(">")) {
      closeRecord();
      header = line.slice(1).trim();
      headerLine = index + 1;
      chunks = [];
      if (header.length === 0) {
        throw new FastaFormatError("empty FASTA header", headerLine);
      }
      continue;
    }
    if (header === null) {
      throw new FastaFormatError("sequence data before the first header", index + 1);
    }
    chunks.push(line.replace(/\s+/g, "").toUpperCase());
  }
  closeRecord();

  if (records.length === 0) {
    throw new FastaFormatError("document contains no FASTA records");
  }
  return records;
}

/** Serialises records with sequences wrapped at {@link FASTA_LINE_WIDTH} residues. */
export function formatFasta(records: readonly FastaRecord[]): string {
  const lines: string[] = [];
  for (const record of records) {
    lines.push(`>${record.header}`);
    for (let offset = 0; offset < record.sequence.length; offset += FASTA_LINE_WIDTH) {
      lines.push(record.sequence.slice(offset, offset + FASTA_LINE_WIDTH));
    }
  }
  return lines.length === 0 ? "" : `${lines.join("\n")}\n`;
}
