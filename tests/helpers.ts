import os from "node:os";
import path from "node:path";
import fsp from "node:fs/promises";
import { LoadOutputError } from "../src/errors";
import type { ImageEngine } from "../src/images/engine";

export async function makeTempDir(): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), "sdh-"));
}

export async function touch(dir: string, ...names: string[]): Promise<void> {
  for (const name of names) {
    await fsp.writeFile(path.join(dir, name), "payload", "utf8");
  }
}

export async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fsp.readFile(file, "utf8"));
}

/**
 * Records every call as a docker-like command line. `images` maps tarball
 * basenames to the references their load yields (an unmapped tarball fails
 * like unrecognized load output); `failures` maps a
 * recorded command line to the error message it should throw.
 */
export class FakeEngine implements ImageEngine {
  readonly calls: string[] = [];

  constructor(
    private readonly images: Record<string, string[]>,
    private readonly failures: Record<string, string> = {}
  ) {}

  async load(tarball: string): Promise<string[]> {
    const name = path.basename(tarball);
    this.record(`load ${name}`);
    const refs = this.images[name];
    if (refs === undefined) {
      throw new LoadOutputError("");
    }
    return refs;
  }

  async tag(source: string, target: string): Promise<void> {
    this.record(`tag ${source} ${target}`);
  }

  async push(target: string): Promise<void> {
    this.record(`push ${target}`);
  }

  async remove(ref: string): Promise<void> {
    this.record(`rmi ${ref}`);
  }

  private record(call: string): void {
    this.calls.push(call);
    const failure = this.failures[call];
    if (failure !== undefined) {
      throw new Error(failure);
    }
  }
}
