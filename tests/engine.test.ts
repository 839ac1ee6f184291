import { describe, expect, it, vi } from "vitest";
import { CommandFailedError, LoadOutputError } from "../src/errors";
import { DockerCliEngine, DryRunEngine, parseLoadOutput } from "../src/images/engine";
import { silentLogger } from "../src/utils/logger";
import type { CommandRunner, ExecResult, RunOptions } from "../src/utils/shell";

interface RecordedCall {
  command: string;
  args: string[];
  opts?: RunOptions;
}

function fakeRunner(stdout = ""): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, opts) => {
    calls.push({ command, args, opts });
    const res: ExecResult = { code: 0, stdout, stderr: "" };
    return res;
  };
  return { runner, calls };
}

describe("parseLoadOutput", () => {
  it("collects every loaded image line", () => {
    const out = [
      "a1b2c3: Loading layer  5.12MB/5.12MB",
      "Loaded image: registry.example.com/ns/app:1.0",
      "Loaded image ID: sha256:0123abcd",
      "loaded image:   tools:2.1  "
    ].join("\n");

    expect(parseLoadOutput(out)).toEqual([
      "registry.example.com/ns/app:1.0",
      "sha256:0123abcd",
      "tools:2.1"
    ]);
  });

  it("fails when nothing was recognized", () => {
    expect(() => parseLoadOutput("Loading layer 1/1\n")).toThrow(LoadOutputError);
    expect(() => parseLoadOutput("")).toThrow(/Could not parse loaded image/);
  });
});

describe("DockerCliEngine", () => {
  it("captures load output and parses references", async () => {
    const { runner, calls } = fakeRunner("Loaded image: app:1.0\n");
    const engine = new DockerCliEngine({ logger: silentLogger(), runner });

    expect(await engine.load("/data/app.tar")).toEqual(["app:1.0"]);
    expect(calls).toEqual([
      { command: "docker", args: ["load", "-i", "/data/app.tar"], opts: { capture: true } }
    ]);
  });

  it("streams tag, push and rmi through the configured binary", async () => {
    const { runner, calls } = fakeRunner();
    const engine = new DockerCliEngine({ logger: silentLogger(), runner, bin: "podman" });

    await engine.tag("app:1.0", "swr.example.com/myorg/app:1.0");
    await engine.push("swr.example.com/myorg/app:1.0");
    await engine.remove("app:1.0");

    expect(calls).toEqual([
      { command: "podman", args: ["tag", "app:1.0", "swr.example.com/myorg/app:1.0"], opts: { capture: false } },
      { command: "podman", args: ["push", "swr.example.com/myorg/app:1.0"], opts: { capture: false } },
      { command: "podman", args: ["rmi", "app:1.0"], opts: { capture: false } }
    ]);
  });

  it("logs each command before running it", async () => {
    const { runner } = fakeRunner();
    const logger = silentLogger();
    const info = vi.spyOn(logger, "info");
    const engine = new DockerCliEngine({ logger, runner });

    await engine.push("swr.example.com/myorg/app:1.0");
    expect(info).toHaveBeenCalledWith("$ docker push swr.example.com/myorg/app:1.0");
  });

  it("propagates command failures", async () => {
    const failure = new CommandFailedError(
      "Command failed (exit 1): docker push x\n(see above)",
      1,
      ["docker", "push", "x"],
      "(see above)"
    );
    const runner: CommandRunner = async () => {
      throw failure;
    };
    const engine = new DockerCliEngine({ logger: silentLogger(), runner });

    await expect(engine.push("x")).rejects.toBe(failure);
  });
});

describe("DryRunEngine", () => {
  it("derives a synthetic reference from the tarball name", async () => {
    const engine = new DryRunEngine(silentLogger());
    expect(await engine.load("/data/mas-api-2.3.1.tar")).toEqual(["dry-run/mas-api-2.3.1:latest"]);
  });

  it("only logs would-be commands", async () => {
    const logger = silentLogger();
    const info = vi.spyOn(logger, "info");
    const engine = new DryRunEngine(logger);

    await engine.tag("a:1", "swr.example.com/myorg/a:1");
    await engine.push("swr.example.com/myorg/a:1");
    await engine.remove("a:1");

    expect(info.mock.calls).toEqual([
      ["$ docker tag a:1 swr.example.com/myorg/a:1 [dry-run]"],
      ["$ docker push swr.example.com/myorg/a:1 [dry-run]"],
      ["$ docker rmi a:1 [dry-run]"]
    ]);
  });
});
