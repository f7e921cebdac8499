import { loadScraperConfig } from "../lib/source-config";
import { collectTarget } from "../lib/collector";
import { profiler } from "../lib/profiler";
import { exitWithError } from "../lib/errors";
import { numberFlag, parseArgs, stringFlag } from "./cli-args";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const scraperConfig = loadScraperConfig(stringFlag(args, "config"));
  const [target] = args.positional;

  if (!target) {
    console.error(`Usage: collect <target> [--max-pages n] [--out-dir dir]`);
    console.error(`Targets: ${Object.keys(scraperConfig.targets).sort().join(", ")}`);
    process.exit(1);
  }

  const result = await collectTarget(target, scraperConfig, {
    maxPages: numberFlag(args, "max-pages"),
    outputDir: stringFlag(args, "out-dir"),
  });

  profiler.printSummary();

  console.log(`=== Summary ===`);
  console.log(`Pages fetched: ${result.pagesFetched}`);
  console.log(`Pages failed: ${result.pagesFailed}`);
  console.log(`Detail pages failed: ${result.detailPagesFailed}`);
  console.log(`Records: ${result.records.length}`);
  console.log(`Batch files: ${result.files.length}`);
}

main().catch(exitWithError);
