import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { EngineBuild } from "../../src/config/pipeline.js";
import { createRegistries } from "../../src/config/registry.js";
import type { DatasetDefinition } from "../../src/datasets/catalog.js";
import type { DatasetServices } from "../../src/datasets/dataset.js";
import { KojakAdapter, rawOutputTriple } from "../../src/engines/kojak.js";
import { EngineRegistry } from "../../src/engines/registry.js";
import { AcquisitionError, EstimationError } from "../../src/errors.js";
import { estimationResultPath, type EstimateRequest, type SearchTolerances } from "../../src/estimation/paramMedic.js";
import type { AssembleRequest, AssembledDatabase } from "../../src/fasta/assembler.js";
import { FakeProcessRunner, outcome } from "./fakes.js";
import { INTER, INTRA, PRIMARY_V2 } from "./kojakFixtures.js";
import { RecordingLogger } from "./recordingLogger.js";

export const TEST_REGISTRIES = createRegistries({
  modifications: { BS3: { kojak: "cross_link = nK nK 138.0680742 BS3" } },
  enzymes: { Trypsin: ["KR", ""] },
});

export const ESTIMATED: SearchTolerances = { precursorTolerancePpm: 6.5, fragmentBinWidthMz: 0.02 };

export function definition(overrides: Partial<DatasetDefinition> = {}): DatasetDefinition {
  return {
    id: "PXD000001",
    partition: "training",
    rawFiles: ["run1.raw", "run2.raw"],
    source: { kind: "fasta", fileName: "db.fasta" },
    modifications: ["BS3"],
    enzymes: ["Trypsin"],
    ...overrides,
  };
}

/** Behaviour of the stand-in stages; each defaults to success. */
export interface HarnessOptions {
  readonly acquisitionFails?: boolean;
  readonly estimationFails?: boolean;
  readonly searchExitCode?: number;
  /** Version the fake engine prints in its output banner. */
  readonly reportedVersion?: string;
}

/**
 * Dataset services over a scratch data root. Database assembly and estimation
 * are stand-ins; the search goes through the real Kojak adapter with a
 * runner that writes the fixture tables.
 */
export class DatasetHarness {
  readonly logger = new RecordingLogger();
  readonly assembled: AssembleRequest[] = [];
  readonly estimated: EstimateRequest[] = [];
  readonly parsed: string[] = [];
  readonly runner: FakeProcessRunner;
  readonly services: DatasetServices;

  private constructor(readonly dataRoot: string, readonly templatePath: string, options: HarnessOptions) {
    const primary =
      options.reportedVersion === undefined ? PRIMARY_V2 : PRIMARY_V2.replace("2.0.0-dev", options.reportedVersion);
    this.runner = new FakeProcessRunner(async (invocation) => {
      if (options.searchExitCode !== undefined) {
        return outcome(options.searchExitCode, "search crashed");
      }
      for (const input of invocation.args.slice(1)) {
        const triple = rawOutputTriple(input);
        await writeFile(triple.primary, primary);
        await writeFile(triple.intra, INTRA);
        await writeFile(triple.inter, INTER);
      }
      return outcome(0);
    });

    const build: EngineBuild = { version: "2.0.0-dev", binary: "/opt/kojak/kojak_2.0.0-dev", template: templatePath };
    const engines = new EngineRegistry().register(
      new KojakAdapter({ registries: TEST_REGISTRIES, runner: this.runner, logger: this.logger, timeoutMs: 1_000 }),
      [build],
    );

    this.services = {
      dataRoot,
      registries: TEST_REGISTRIES,
      engines,
      logger: this.logger,
      assembler: {
        assemble: async (request: AssembleRequest): Promise<AssembledDatabase> => {
          this.assembled.push(request);
          if (options.acquisitionFails) {
            throw new AcquisitionError("PRIDE listing unavailable", { datasetId: request.datasetId });
          }
          const databasePath = path.join(request.destinationDir, `${request.datasetId}.fasta`);
          await writeFile(databasePath, ">sp|P1|A\nMKR\n>decoy_sp|P1|A\nMKR\n");
          return { path: databasePath, targetCount: 1, decoyCount: 1 };
        },
      },
      estimator: {
        estimate: async (request: EstimateRequest): Promise<SearchTolerances> => {
          this.estimated.push(request);
          if (options.estimationFails) {
            throw new EstimationError("param-medic exited with status 1", { datasetId: request.datasetId });
          }
          // Leaves the table behind the way param-medic does.
          const table = estimationResultPath(request.workingDir, request.datasetId);
          await mkdir(path.dirname(table), { recursive: true });
          await writeFile(table, "estimated");
          return ESTIMATED;
        },
        parse: async (filePath: string): Promise<SearchTolerances> => {
          this.parsed.push(filePath);
          return { precursorTolerancePpm: 9, fragmentBinWidthMz: 0.05 };
        },
      },
    };
  }

  static async create(options: HarnessOptions = {}): Promise<DatasetHarness> {
    const dataRoot = await mkdtemp(path.join(tmpdir(), "datasets-"));
    const templatePath = path.join(dataRoot, "kojak.conf");
    await writeFile(templatePath, "database = $database$\nppm_tolerance_pre = $pretol$\nfragment_bin_size = $fragbin$\n");
    return new DatasetHarness(dataRoot, templatePath, options);
  }

  /** Workspace of a dataset under the scratch root. */
  workspace(id = "PXD000001", partition = "training"): string {
    return path.join(this.dataRoot, partition, id);
  }

  /** Plays the operator converting raw files by hand. */
  async convert(id: string, partition: string, ...convertedNames: string[]): Promise<void> {
    for (const name of convertedNames) {
      await writeFile(path.join(this.workspace(id, partition), name), "converted");
    }
  }

  async dispose(): Promise<void> {
    await rm(this.dataRoot, { recursive: true, force: true });
  }
}
