import { readFile } from "node:fs/promises";
import { z } from "zod";

import { ConfigurationError } from "../errors.js";

/** Residue letters accepted in a cleavage rule. */
const RESIDUES = /^[A-Z]*$/;

const modificationsSchema = z.record(
  z.string().min(1),
  z.record(z.string().min(1), z.string().min(1)),
);

const enzymesSchema = z.record(
  z.string().min(1),
  z
    .tuple([z.string().regex(RESIDUES), z.string().regex(RESIDUES)])
    .refine(([after, before]) => after.length + before.length > 0, {
      message: "an enzyme must cut after or before at least one residue",
    }),
);

export const registryFileSchema = z
  .object({
    modifications: modificationsSchema,
    enzymes: enzymesSchema,
  })
  .strict();

export type RegistryFile = z.infer<typeof registryFileSchema>;

/** Cleavage sites of an enzyme: after any residue of `after`, before any of `before`. */
export interface CutRule {
  readonly after: string;
  readonly before: string;
}

/**
 * Modification name mapped to the engine-specific configuration block that
 * enables it (for Kojak: the `cross_link` and `mono_link` lines).
 */
export class ModificationRegistry {
  private readonly entries: ReadonlyMap<string, Readonly<Record<string, string>>>;

  constructor(entries: Record<string, Record<string, string>>) {
    this.entries = new Map(
      Object.entries(entries).map(([name, fragments]) => [name, Object.freeze({ ...fragments })]),
    );
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  /** Configuration block of `name` for `engine`. */
  fragment(name: string, engine: string): string {
    const fragments = this.entries.get(name);
    if (!fragments) {
      throw new ConfigurationError(`Unknown modification "${name}".`, {
        details: { modification: name, known: this.names() },
      });
    }
    const fragment = fragments[engine];
    if (fragment === undefined) {
      throw new ConfigurationError(`Modification "${name}" has no configuration block for engine "${engine}".`, {
        details: { modification: name, engine },
      });
    }
    return fragment;
  }
}

/** Enzyme name mapped to its cleavage rule. Suppression rules are not expressible. */
export class EnzymeRegistry {
  private readonly entries: ReadonlyMap<string, CutRule>;

  constructor(entries: Record<string, readonly [string, string]>) {
    this.entries = new Map(
      Object.entries(entries).map(([name, [after, before]]) => [name, Object.freeze({ after, before })]),
    );
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  cutRule(name: string): CutRule {
    const rule = this.entries.get(name);
    if (!rule) {
      throw new ConfigurationError(`Unknown enzyme "${name}".`, {
        details: { enzyme: name, known: this.names() },
      });
    }
    return rule;
  }
}

export interface Registries {
  readonly modifications: ModificationRegistry;
  readonly enzymes: EnzymeRegistry;
}

/** Validates a parsed registry document and freezes it into lookup tables. */
export function createRegistries(raw: unknown): Registries {
  const parsed = registryFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("Registry file failed validation.", {
      details: {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      },
    });
  }
  return Object.freeze({
    modifications: new ModificationRegistry(parsed.data.modifications),
    enzymes: new EnzymeRegistry(parsed.data.enzymes),
  });
}

/** Loads the registry JSON document once; callers pass the result around explicitly. */
export async function loadRegistries(filePath: string): Promise<Registries> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read registry file ${filePath}.`, { cause: error, details: { filePath } });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Registry file ${filePath} is not valid JSON.`, { cause: error, details: { filePath } });
  }
  return createRegistries(raw);
}
