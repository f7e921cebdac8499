import path from "path";
import { config } from "../lib/config";
import { aggregateBatches } from "../lib/aggregator";
import { exitWithError } from "../lib/errors";
import { parseArgs, stringFlag } from "./cli-args";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const keyword = stringFlag(args, "keyword") ?? "fiverr";
  const pattern = stringFlag(args, "pattern") ?? path.join(config.dataDir, "raw", `${keyword}_page_*.json`);
  const outDir = stringFlag(args, "out-dir") ?? path.join(config.dataDir, "processed");

  const result = aggregateBatches({ pattern, keyword, outDir });

  console.log(
    `Aggregated ${result.table.rows.length} record(s) into ${result.outputPath}` +
      (result.skipped.length > 0 ? ` (${result.skipped.length} file(s) skipped)` : "")
  );
}

main().catch(exitWithError);
