import path from "node:path";
import fsp from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { Logger } from "../src/utils/logger";
import { makeTempDir } from "./helpers";

describe("Logger", () => {
  it("appends timestamped lines to the log file", async () => {
    const logFile = path.join(await makeTempDir(), "logs", "upload.log");
    const logger = new Logger({ enabled: false, verbose: false, logFile });

    logger.info("Loaded: app:1.0");
    logger.warn("careful");
    logger.verbose("hidden");

    const lines = (await fsp.readFile(logFile, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] Loaded: app:1\.0$/);
    expect(lines[1]).toMatch(/ \[WARNING\] careful$/);
  });

  it("writes verbose lines only when enabled", async () => {
    const logFile = path.join(await makeTempDir(), "upload.log");
    const logger = new Logger({ enabled: false, verbose: true, logFile });

    logger.verbose("config: /tmp/config.yaml");
    expect(await fsp.readFile(logFile, "utf8")).toMatch(/ \[DEBUG\] config: \/tmp\/config\.yaml\n$/);
  });
});
