/**
 * Gateway responsible for launching the external tools of the pipeline
 * (param-medic, Kojak). The factory enforces argument validation, environment
 * allow-listing and timeout propagation; {@link createProcessRunner} layers a
 * run-to-completion contract on top so stages simply await an outcome.
 */
import { Buffer } from "node:buffer";
import { spawn as nodeSpawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import process from "node:process";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Environment variables forwarded to external tools unless a caller narrows them. */
export const DEFAULT_ALLOWED_ENV_KEYS = ["PATH", "HOME", "LANG", "LC_ALL", "TMPDIR", "OMP_NUM_THREADS"] as const;

/** Bytes of stdout/stderr retained in a {@link ProcessOutcome}. */
const OUTPUT_TAIL_BYTES = 16 * 1024;

export interface SpawnChildProcessOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  /** Ordered list of arguments forwarded as-is to {@link nodeSpawn}. */
  readonly args?: readonly string[];
  readonly cwd?: string;
  /** Environment variables allowed to leak into the child process from {@link inheritEnv}. */
  readonly allowedEnvKeys: readonly string[];
  /** Snapshot of environment variables to inherit (defaults to `process.env`). */
  readonly inheritEnv?: NodeJS.ProcessEnv;
  /** Timeout in milliseconds after which the child is killed. */
  readonly timeoutMs?: number;
}

export interface SpawnedChildProcess {
  readonly child: ChildProcess;
  /** Aborted with a {@link ChildProcessTimeoutError} when the timeout fires. */
  readonly signal: AbortSignal | undefined;
  /** Clears the timeout guard. */
  dispose(): void;
}

export class InvalidChildProcessCommandError extends Error {
  constructor(command: string) {
    super(`Child process command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidChildProcessCommandError";
  }
}

export class InvalidChildProcessArgumentError extends TypeError {
  constructor(value: unknown, index: number) {
    super(`Child process arguments must be strings without NUL bytes. Argument at index ${index} is invalid (${typeof value}).`);
    this.name = "InvalidChildProcessArgumentError";
  }
}

/** Raised when a child process exceeds its configured timeout. */
export class ChildProcessTimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Child process exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "ChildProcessTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export interface ChildProcessGateway {
  spawn(options: SpawnChildProcessOptions): SpawnedChildProcess;
}

/** Subset of the {@link nodeSpawn} signature the gateway relies on. */
export type SpawnImpl = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

interface ChildProcessGatewayDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: SpawnImpl;
}

/**
 * Factory returning the child process gateway. Tests inject `spawnImpl` to
 * observe the wiring without launching real commands.
 */
export function createChildProcessGateway({
  spawnImpl = nodeSpawn,
}: ChildProcessGatewayDeps = {}): ChildProcessGateway {
  return {
    spawn(options: SpawnChildProcessOptions): SpawnedChildProcess {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        throw new InvalidChildProcessCommandError(command);
      }

      const args = normaliseArgs(options.args);
      const env = buildWhitelistedEnv(options.allowedEnvKeys, options.inheritEnv ?? process.env);
      const abortManagement = prepareTimeout(options.timeoutMs);

      const spawnOptions: SpawnOptions = {
        env,
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
        windowsVerbatimArguments: false,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
        ...(abortManagement.signal !== undefined ? { signal: abortManagement.signal } : {}),
      };

      let child: ChildProcess;
      try {
        child = spawnImpl(command, args, spawnOptions);
      } catch (error) {
        abortManagement.dispose();
        throw error;
      }

      abortManagement.arm(child);

      // Node can emit both `error` and `close` for some failures, so cleanup is guarded.
      let disposed = false;
      const settle = () => {
        if (disposed) {
          return;
        }
        disposed = true;
        abortManagement.dispose();
      };

      child.once("error", settle);
      child.once("close", settle);

      return {
        child,
        signal: abortManagement.signal,
        dispose(): void {
          child.removeListener("error", settle);
          child.removeListener("close", settle);
          settle();
        },
      };
    },
  };
}

function normaliseArgs(args: SpawnChildProcessOptions["args"]): readonly string[] {
  if (args === undefined) {
    return [];
  }

  return args.map((value, index) => {
    if (typeof value !== "string" || value.includes("\u0000")) {
      throw new InvalidChildProcessArgumentError(value, index);
    }
    return value;
  });
}

/** Produces a new environment object containing only allow-listed keys. */
function buildWhitelistedEnv(allowedKeys: readonly string[], inheritEnv: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};

  for (const key of new Set(allowedKeys)) {
    const inheritedValue = inheritEnv[key];
    if (inheritedValue !== undefined) {
      env[key] = inheritedValue;
    }
  }

  return env;
}

interface AbortManagement {
  readonly signal: AbortSignal | undefined;
  arm(child: ChildProcess): void;
  dispose(): void;
}

function prepareTimeout(timeoutMs: number | undefined): AbortManagement {
  if (timeoutMs === undefined) {
    return {
      signal: undefined,
      arm(): void {},
      dispose(): void {},
    };
  }

  const limitMs = timeoutMs;
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | null = null;

  return {
    signal: controller.signal,
    arm(child: ChildProcess): void {
      timeoutHandle = setTimeout(() => {
        controller.abort(new ChildProcessTimeoutError(limitMs));
        if (!child.killed) {
          child.kill("SIGKILL");
        }
      }, limitMs);
      timeoutHandle.unref();
    },
    dispose(): void {
      if (timeoutHandle !== null) {
        clearTimeout(timeoutHandle);
        timeoutHandle = null;
      }
    },
  };
}

/** Invocation of an external tool awaited until it exits. */
export interface ProcessInvocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly timeoutMs?: number;
}

/** How an external tool ended. A non-zero `exitCode` is reported, not thrown. */
export interface ProcessOutcome {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly durationMs: number;
  /** Last bytes written on stdout. */
  readonly stdoutTail: string;
  /** Last bytes written on stderr. */
  readonly stderrTail: string;
}

/**
 * Contract the pipeline stages depend on. It rejects when the tool cannot be
 * started or times out ({@link ChildProcessTimeoutError}).
 */
export interface ProcessRunner {
  run(invocation: ProcessInvocation): Promise<ProcessOutcome>;
}

interface ProcessRunnerDeps {
  readonly gateway?: ChildProcessGateway;
  readonly allowedEnvKeys?: readonly string[];
  readonly inheritEnv?: NodeJS.ProcessEnv;
}

export function createProcessRunner({
  gateway = createChildProcessGateway(),
  allowedEnvKeys = DEFAULT_ALLOWED_ENV_KEYS,
  inheritEnv,
}: ProcessRunnerDeps = {}): ProcessRunner {
  return {
    run(invocation: ProcessInvocation): Promise<ProcessOutcome> {
      const startedAt = Date.now();
      const handle = gateway.spawn({
        command: invocation.command,
        args: invocation.args,
        allowedEnvKeys,
        ...(inheritEnv !== undefined ? { inheritEnv } : {}),
        ...(invocation.cwd !== undefined ? { cwd: invocation.cwd } : {}),
        ...(invocation.timeoutMs !== undefined ? { timeoutMs: invocation.timeoutMs } : {}),
      });

      const stdout = new OutputTail();
      const stderr = new OutputTail();
      handle.child.stdout?.on("data", (chunk: Buffer | string) => stdout.push(chunk));
      handle.child.stderr?.on("data", (chunk: Buffer | string) => stderr.push(chunk));

      return new Promise<ProcessOutcome>((resolve, reject) => {
        let settled = false;
        const abortReason = (): unknown => {
          const signal = handle.signal;
          return signal?.aborted ? signal.reason : undefined;
        };

        handle.child.once("error", (error: Error) => {
          if (settled) {
            return;
          }
          settled = true;
          handle.dispose();
          reject(abortReason() ?? error);
        });

        handle.child.once("close", (exitCode: number | null, signal: NodeJS.Signals | null) => {
          if (settled) {
            return;
          }
          settled = true;
          handle.dispose();
          const reason = abortReason();
          if (reason !== undefined) {
            reject(reason);
            return;
          }
          resolve({
            exitCode,
            signal,
            durationMs: Date.now() - startedAt,
            stdoutTail: stdout.toString(),
            stderrTail: stderr.toString(),
          });
        });
      });
    },
  };
}

/** Bounded buffer keeping the last {@link OUTPUT_TAIL_BYTES} of a stream. */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;

  push(chunk: Buffer | string): void {
    const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
    this.chunks.push(buffer);
    this.size += buffer.length;
    while (this.size > OUTPUT_TAIL_BYTES && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped?.length ?? 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    return joined.subarray(Math.max(0, joined.length - OUTPUT_TAIL_BYTES)).toString("utf8");
  }
}
