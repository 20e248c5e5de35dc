#!/usr/bin/env node
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { createFilamentClient, FilamentApiError } from "@filament/sdk";
import { labelRows, printTable, summarizeRecognition } from "./format";

const DEFAULT_BASE_URL = "http://localhost:8000";

function handleErr(err: unknown): never {
  if (err instanceof FilamentApiError) {
    console.error(`error: HTTP ${err.status} (${err.code}): ${err.message}`);
    process.exit(1);
  }
  if (err instanceof Error) {
    console.error(`error: ${err.message}`);
    process.exit(1);
  }
  console.error(`error: ${String(err)}`);
  process.exit(1);
}

const program = new Command();
program
  .name("filament")
  .description("Filament label recognition CLI")
  .option("--base-url <url>", "API base URL (or env FILAMENT_BASE_URL)", process.env.FILAMENT_BASE_URL || DEFAULT_BASE_URL)
  .option("--json", "Machine-friendly JSON output", false);

function client() {
  const opts = program.opts<{ baseUrl: string; json: boolean }>();
  return { api: createFilamentClient({ baseUrl: opts.baseUrl }), json: opts.json };
}

program
  .command("health")
  .description("Check the API is reachable")
  .action(async () => {
    try {
      const { api, json } = client();
      const data = await api.health();
      if (json) console.log(JSON.stringify(data, null, 2));
      else console.log(`${api.baseUrl} ${data.status}`);
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("info")
  .description("Show service name and version")
  .action(async () => {
    try {
      const { api, json } = client();
      const data = await api.info();
      if (json) console.log(JSON.stringify(data, null, 2));
      else console.log(`${data.service} ${data.version} (${data.status})`);
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("recognize")
  .description("Read filament details from one or more label photos")
  .argument("<images...>", "JPEG or PNG files")
  .action(async (images: string[]) => {
    try {
      const { api, json } = client();
      let failed = 0;
      for (const file of images) {
        const res = await api.recognize(readFileSync(file), path.basename(file));
        if (!res.success) failed++;

        if (json) {
          console.log(JSON.stringify({ file, ...res }, null, 2));
          continue;
        }
        console.log(summarizeRecognition(file, res));
        if (res.success) {
          printTable(labelRows(res.data));
          console.log("");
        }
      }
      if (failed > 0) process.exitCode = 1;
    } catch (err) {
      handleErr(err);
    }
  });

program.parseAsync(process.argv).catch(handleErr);
