import { gunzipSync } from "node:zlib";
import { z } from "zod";

import type { ProteomeDomain } from "../config/pipeline.js";
import { AcquisitionError, ConfigurationError, describeError } from "../errors.js";
import { HttpGatewayError, type HttpGateway } from "../gateways/http.js";
import { FastaFormatError, parseFasta, type FastaRecord } from "./fasta.js";

/** Source kinds accepted in the dataset catalogue. */
export const SOURCE_KINDS = ["fasta", "proteins", "proteome"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

/** Where the target proteins of a dataset come from. */
export type DatabaseSource =
  | { readonly kind: "fasta"; readonly fileName: string }
  | { readonly kind: "proteins"; readonly accessions: readonly string[] }
  | { readonly kind: "proteome"; readonly proteomeId: string };

export const PRIDE_FILES_ENDPOINT = "https://www.ebi.ac.uk/pride/ws/archive/v2/files/byProject";
export const UNIPROT_ENTRY_ENDPOINT = "https://rest.uniprot.org/uniprotkb";
export const UNIPROT_PROTEOMES_ENDPOINT =
  "https://ftp.uniprot.org/pub/databases/uniprot/current_release/knowledgebase/reference_proteomes";

/** Accessions and proteome ids end up in URLs, so only identifier characters pass. */
const IDENTIFIER_PATTERN = /^[A-Za-z0-9_.-]+$/;

const prideFileSchema = z
  .object({
    fileName: z.string().min(1),
    publicFileLocations: z
      .array(z.object({ name: z.string(), value: z.string() }).passthrough())
      .default([]),
  })
  .passthrough();

const prideListingSchema = z.array(prideFileSchema);

export interface AcquisitionRequest {
  readonly datasetId: string;
  readonly source: DatabaseSource;
}

/** Obtains the target proteins of a dataset as validated FASTA records. */
export interface FastaAcquirer {
  acquire(request: AcquisitionRequest): Promise<FastaRecord[]>;
}

export interface FastaAcquirerOptions {
  readonly http: HttpGateway;
  readonly proteomeDomain: ProteomeDomain;
}

/**
 * Default acquirer dispatching on the source kind:
 *
 * - `fasta`: the named file from the dataset's PRIDE archive listing.
 * - `proteins`: UniProtKB entries, one per accession, in the requested order.
 * - `proteome`: a gzipped UniProt reference proteome.
 */
export function createFastaAcquirer(options: FastaAcquirerOptions): FastaAcquirer {
  const { http, proteomeDomain } = options;

  async function fromRepository(datasetId: string, fileName: string): Promise<string> {
    const listingUrl = `${PRIDE_FILES_ENDPOINT}?accession=${encodeURIComponent(datasetId)}`;
    const listing = prideListingSchema.safeParse(await fetchOrFail(datasetId, () => http.getJson(listingUrl)));
    if (!listing.success) {
      throw new AcquisitionError(`Unexpected PRIDE file listing for ${datasetId}.`, {
        datasetId,
        details: { url: listingUrl, issues: listing.error.issues.map((issue) => issue.message) },
      });
    }

    const entry = listing.data.find((file) => file.fileName === fileName);
    if (!entry) {
      throw new AcquisitionError(`File "${fileName}" is not listed in the repository for ${datasetId}.`, {
        datasetId,
        details: { fileName, listed: listing.data.map((file) => file.fileName) },
      });
    }

    const location = entry.publicFileLocations.find((candidate) => /^(ftp|https?):\/\//.test(candidate.value));
    if (!location) {
      throw new AcquisitionError(`File "${fileName}" of ${datasetId} has no downloadable location.`, {
        datasetId,
        details: { fileName },
      });
    }
    // The archive serves its FTP tree over HTTPS as well.
    const url = location.value.replace(/^ftp:\/\//, "https://");
    return fetchOrFail(datasetId, () => http.getText(url));
  }

  async function fromAccessions(datasetId: string, accessions: readonly string[]): Promise<FastaRecord[]> {
    if (accessions.length === 0) {
      throw new AcquisitionError(`No protein accessions given for ${datasetId}.`, { datasetId });
    }
    // Repeated accessions are kept in the output but fetched once.
    const fetched = new Map<string, FastaRecord>();
    const records: FastaRecord[] = [];
    for (const accession of accessions) {
      let record = fetched.get(accession);
      if (!record) {
        assertIdentifier(datasetId, accession, "accession");
        const url = `${UNIPROT_ENTRY_ENDPOINT}/${accession}.fasta`;
        const parsed = parseOrFail(datasetId, await fetchOrFail(datasetId, () => http.getText(url)), url);
        if (parsed.length !== 1) {
          throw new AcquisitionError(`UniProt returned ${parsed.length} records for accession ${accession}.`, {
            datasetId,
            details: { accession },
          });
        }
        record = parsed[0];
        fetched.set(accession, record);
      }
      records.push(record);
    }
    return records;
  }

  async function fromProteome(datasetId: string, proteomeId: string): Promise<string> {
    assertIdentifier(datasetId, proteomeId, "proteome identifier");
    const upId = proteomeId.split("_", 1)[0];
    const url = `${UNIPROT_PROTEOMES_ENDPOINT}/${proteomeDomain}/${upId}/${proteomeId}.fasta.gz`;
    const compressed = await fetchOrFail(datasetId, () => http.getBuffer(url));
    try {
      return gunzipSync(compressed).toString("utf8");
    } catch (error) {
      throw new AcquisitionError(`Proteome ${proteomeId} could not be decompressed: ${describeError(error)}`, {
        datasetId,
        cause: error,
        details: { url },
      });
    }
  }

  return {
    async acquire({ datasetId, source }: AcquisitionRequest): Promise<FastaRecord[]> {
      switch (source.kind) {
        case "fasta":
          return parseOrFail(datasetId, await fromRepository(datasetId, source.fileName), source.fileName);
        case "proteins":
          return fromAccessions(datasetId, source.accessions);
        case "proteome":
          return parseOrFail(datasetId, await fromProteome(datasetId, source.proteomeId), source.proteomeId);
      }
    },
  };
}

/** Builds the source descriptor of a catalogue entry. */
export function describeSource(kind: SourceKind, descriptor: string | readonly string[]): DatabaseSource {
  switch (kind) {
    case "proteins":
      return { kind, accessions: typeof descriptor === "string" ? [descriptor] : [...descriptor] };
    case "fasta":
    case "proteome": {
      if (typeof descriptor !== "string") {
        throw new ConfigurationError(`A "${kind}" source takes a single name, got a list of ${descriptor.length}.`);
      }
      return kind === "fasta" ? { kind, fileName: descriptor } : { kind, proteomeId: descriptor };
    }
  }
}

async function fetchOrFail<T>(datasetId: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof HttpGatewayError) {
      throw new AcquisitionError(error.message, {
        datasetId,
        cause: error,
        details: { url: error.url, status: error.status },
      });
    }
    throw error;
  }
}

function parseOrFail(datasetId: string, text: string, origin: string): FastaRecord[] {
  try {
    return parseFasta(text);
  } catch (error) {
    if (error instanceof FastaFormatError) {
      throw new AcquisitionError(`Malformed FASTA from ${origin}: ${error.message}`, {
        datasetId,
        cause: error,
        details: { origin },
      });
    }
    throw error;
  }
}

function assertIdentifier(datasetId: string, value: string, label: string): void {
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new AcquisitionError(`Invalid ${label} "${value}".`, { datasetId, details: { [label]: value } });
  }
}
