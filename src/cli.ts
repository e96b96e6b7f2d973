#!/usr/bin/env node
import "dotenv/config";
import { inspect } from "util";
import { loadConfig } from "./config";
import { Crawler } from "./crawler";
import { getCourseCount, getDefaultSemester } from "./listing";
import { HttpTransport } from "./transport";
import type { PageEntry } from "./types";
import { formatProgress } from "./utils";

interface CliArgs {
  semester: string | null;
  start: number;
  pretty: boolean;
  help: boolean;
}

function parseArgs(argv: string[] = process.argv.slice(2)): CliArgs {
  const flagValue = (flag: string) => {
    const idx = argv.indexOf(flag);
    return idx !== -1 ? argv[idx + 1] : undefined;
  };
  const start = parseInt(flagValue("--start") ?? "0", 10);
  return {
    semester: flagValue("--semester") ?? null,
    start: Number.isFinite(start) && start > 0 ? start : 0,
    pretty: argv.includes("--pretty"),
    help: argv.includes("--help"),
  };
}

async function getWithRetries(crawler: Crawler, index: number, maxRetries: number): Promise<PageEntry> {
  for (let attempt = 1; ; attempt++) {
    try {
      const record = await crawler.getRecord(index);
      if (record === undefined) throw new RangeError(`No record at ${index}`);
      return record;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`\nError at ${index} (attempt ${attempt}/${maxRetries}): ${message}`);
      if (attempt >= maxRetries) throw err;
    }
  }
}

async function run(args: CliArgs) {
  const config = loadConfig();
  const transport = new HttpTransport(config);
  try {
    const semester = args.semester ?? (await getDefaultSemester(transport));
    const count = await getCourseCount(transport, semester);
    if (count === 0) {
      console.error("No such semester");
      process.exitCode = 1;
      return;
    }

    const crawler = new Crawler({
      semester,
      transport,
      cacheSize: config.cacheSize,
      pageSize: config.pageSize,
    });
    console.error(`Crawling ${semester} (${crawler.era} era): ${count} courses from ${args.start}`);

    for (let index = args.start; index < count; index++) {
      if (index % crawler.pageSize === 0) {
        process.stderr.write(`\r${formatProgress(index, count)}`);
      }
      const record = await getWithRetries(crawler, index, config.maxRetries);
      const output = { ...record, index };
      console.log(args.pretty ? inspect(output, { depth: null }) : JSON.stringify(output));
    }
    process.stderr.write(`\r${formatProgress(count, count)}\n`);
  } finally {
    transport.close();
  }
}

if (require.main === module) {
  const args = parseArgs();
  if (args.help) {
    console.log("Usage: course-listing-crawler [--semester <id>] [--start <index>] [--pretty]");
  } else {
    run(args).catch((err) => {
      console.error(err);
      process.exit(1);
    });
  }
}
