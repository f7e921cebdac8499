import path from "path";
import { config } from "../lib/config";
import { loadDataDictionary } from "../lib/data-dictionary";
import { runPipeline } from "../lib/pipeline";
import { closeDb } from "../lib/db";
import { profiler } from "../lib/profiler";
import { exitWithError } from "../lib/errors";
import { booleanFlag, parseArgs, stringFlag } from "./cli-args";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const keyword = stringFlag(args, "keyword") ?? "fiverr";
  const pattern = stringFlag(args, "pattern") ?? path.join(config.dataDir, "raw", `${keyword}_page_*.json`);
  const outDir = stringFlag(args, "out-dir") ?? path.join(config.dataDir, "processed");

  const result = await runPipeline({
    keyword,
    pattern,
    outDir,
    dictionary: loadDataDictionary(stringFlag(args, "dictionary")),
    persist: booleanFlag(args, "persist"),
  });
  closeDb();

  profiler.printSummary();

  console.log(`=== Summary ===`);
  console.log(`Providers: ${result.summary.totalProviders}`);
  console.log(`Skipped batch files: ${result.skipped.length}`);
  console.log(`Duplicates merged: ${result.cleanStats.duplicatesMerged}`);
  console.log(`Average quality: ${result.quality.averageQuality}`);
  for (const [name, file] of Object.entries(result.outputs)) {
    console.log(`  ${name}: ${file}`);
  }
}

main().catch(exitWithError);
