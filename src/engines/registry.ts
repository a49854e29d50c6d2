import type { EngineBuild } from "../config/pipeline.js";
import { ConfigurationError } from "../errors.js";
import type { SearchEngineAdapter } from "./types.js";

/** An adapter paired with the build selected for a search. */
export interface ResolvedEngine {
  readonly adapter: SearchEngineAdapter;
  readonly build: EngineBuild;
}

/**
 * Explicit name-to-adapter table. Each engine also lists its installed
 * builds, preferred build first, so a search can omit the version.
 */
export class EngineRegistry {
  private readonly adapters = new Map<string, SearchEngineAdapter>();
  private readonly builds = new Map<string, readonly EngineBuild[]>();

  register(adapter: SearchEngineAdapter, builds: readonly EngineBuild[]): this {
    if (this.adapters.has(adapter.engine)) {
      throw new ConfigurationError(`Engine "${adapter.engine}" is registered twice.`);
    }
    this.adapters.set(adapter.engine, adapter);
    this.builds.set(adapter.engine, [...builds]);
    return this;
  }

  names(): string[] {
    return [...this.adapters.keys()];
  }

  /** Every registered build whose version its adapter supports. */
  installed(): ResolvedEngine[] {
    return [...this.adapters.values()].flatMap((adapter) =>
      (this.builds.get(adapter.engine) ?? [])
        .filter((build) => adapter.supportedVersions.includes(build.version))
        .map((build) => ({ adapter, build })),
    );
  }

  /** Adapter and build for `engine`; the preferred build when `version` is omitted. */
  resolve(engine: string, version?: string): ResolvedEngine {
    const adapter = this.adapters.get(engine);
    if (!adapter) {
      throw new ConfigurationError(`Unknown search engine "${engine}".`, {
        details: { engine, known: this.names() },
      });
    }
    const builds = this.builds.get(engine) ?? [];
    const build = version === undefined ? builds[0] : builds.find((candidate) => candidate.version === version);
    if (!build || !adapter.supportedVersions.includes(build.version)) {
      throw new ConfigurationError(`No usable ${engine} build for version "${version ?? "default"}".`, {
        details: {
          engine,
          version: version ?? null,
          installed: builds.map((candidate) => candidate.version),
          supported: [...adapter.supportedVersions],
        },
      });
    }
    return { adapter, build };
  }
}
