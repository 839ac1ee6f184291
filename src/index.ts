#!/usr/bin/env node
import { Command } from "commander";
import { registerDockerCommand } from "./commands/docker";

const program = new Command();

program
  .name("sdh")
  .description("sd-helper: Huawei Cloud service-delivery toolbox")
  .version("0.1.0");

registerDockerCommand(program);

program.parseAsync(process.argv).catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  // eslint-disable-next-line no-console
  console.error(`[sdh] fatal: ${message}`);
  process.exitCode = 1;
});
