import { describe, it } from "mocha";
import { expect } from "chai";
import { Buffer } from "node:buffer";
import { ChildProcess, type SpawnOptions } from "node:child_process";
import process from "node:process";
import { PassThrough } from "node:stream";

import {
  ChildProcessTimeoutError,
  InvalidChildProcessArgumentError,
  InvalidChildProcessCommandError,
  createChildProcessGateway,
  createProcessRunner,
  type ChildProcessGateway,
} from "../../src/gateways/childProcess.js";

interface SpawnInvocation {
  readonly command: string;
  readonly args: readonly string[];
  readonly options: SpawnOptions;
  readonly child: ChildProcess;
}

/** Unspawned {@link ChildProcess} whose streams and lifecycle events the test drives. */
function fakeChild(): ChildProcess {
  const child = new ChildProcess();
  child.stdout = new PassThrough();
  child.stderr = new PassThrough();
  return child;
}

function recordingGateway(): { gateway: ChildProcessGateway; invocations: SpawnInvocation[] } {
  const invocations: SpawnInvocation[] = [];
  const gateway = createChildProcessGateway({
    spawnImpl(command, args, options) {
      const child = fakeChild();
      invocations.push({ command, args: [...args], options, child });
      return child;
    },
  });
  return { gateway, invocations };
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("gateways/childProcess", () => {
  it("spawns without a shell and forwards only allow-listed variables", () => {
    const { gateway, invocations } = recordingGateway();

    const handle = gateway.spawn({
      command: "/opt/kojak/kojak_2.0.0-dev",
      args: ["PXD1.kojak.conf", "run1.mzML.gz"],
      cwd: "/data/training/PXD1",
      allowedEnvKeys: ["PATH", "OMP_NUM_THREADS"],
      inheritEnv: { PATH: "/usr/bin", HOME: "/home/operator", API_TOKEN: "test-secret", OMP_NUM_THREADS: "4" },
    });
    handle.dispose();

    expect(invocations).to.have.lengthOf(1);
    const [invocation] = invocations;
    expect(invocation.command).to.equal("/opt/kojak/kojak_2.0.0-dev");
    expect(invocation.args).to.deep.equal(["PXD1.kojak.conf", "run1.mzML.gz"]);
    expect(invocation.options.shell).to.equal(false);
    expect(invocation.options.stdio).to.deep.equal(["ignore", "pipe", "pipe"]);
    expect(invocation.options.cwd).to.equal("/data/training/PXD1");
    expect(invocation.options.env).to.deep.equal({ PATH: "/usr/bin", OMP_NUM_THREADS: "4" });
    expect(invocation.options.signal).to.equal(undefined);
  });

  it("rejects blank commands and NUL bytes", () => {
    const { gateway, invocations } = recordingGateway();

    expect(() => gateway.spawn({ command: "  ", allowedEnvKeys: [] })).to.throw(InvalidChildProcessCommandError);
    expect(() => gateway.spawn({ command: "crux", args: ["a\u0000b"], allowedEnvKeys: [] })).to.throw(
      InvalidChildProcessArgumentError,
    );
    expect(invocations).to.deep.equal([]);
  });

  it("resolves with the exit status and output tails", async () => {
    const { gateway, invocations } = recordingGateway();
    const runner = createProcessRunner({ gateway, inheritEnv: {} });

    const pending = runner.run({ command: "crux", args: ["param-medic"], timeoutMs: 60_000 });
    const { child } = invocations[0];
    child.stdout?.emit("data", Buffer.from("estimating\n"));
    child.stderr?.emit("data", "warning: few peaks\n");
    await nextTurn();
    child.emit("close", 3, null);

    const outcome = await pending;
    expect(outcome.exitCode).to.equal(3);
    expect(outcome.signal).to.equal(null);
    expect(outcome.stdoutTail).to.equal("estimating\n");
    expect(outcome.stderrTail).to.equal("warning: few peaks\n");
    expect(invocations[0].options.signal).to.be.instanceOf(AbortSignal);
  });

  it("rejects when the tool cannot be started", async () => {
    const { gateway, invocations } = recordingGateway();
    const runner = createProcessRunner({ gateway });

    const pending = runner.run({ command: "missing-tool", args: [] });
    invocations[0].child.emit("error", Object.assign(new Error("spawn missing-tool ENOENT"), { code: "ENOENT" }));

    try {
      await pending;
      expect.fail("expected a rejection");
    } catch (error) {
      expect(error).to.be.instanceOf(Error);
      expect(error).to.have.property("code", "ENOENT");
    }
  });

  it("kills processes that exceed their timeout", async () => {
    const runner = createProcessRunner({ allowedEnvKeys: ["PATH"] });

    try {
      await runner.run({ command: process.execPath, args: ["-e", "setTimeout(() => {}, 5_000);"], timeoutMs: 50 });
      expect.fail("expected a timeout");
    } catch (error) {
      expect(error).to.be.instanceOf(ChildProcessTimeoutError);
      expect(error).to.have.property("timeoutMs", 50);
    }
  });
});
