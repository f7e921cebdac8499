import { loadDataDictionary } from "../lib/data-dictionary";
import { analyzeCsv } from "../lib/pipeline";
import { exitWithError } from "../lib/errors";
import { parseArgs, stringFlag } from "./cli-args";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const input = stringFlag(args, "input");
  const output = stringFlag(args, "output");
  if (!input || !output) {
    console.error("Usage: analyze --input <scored or cleaned csv> --output <xlsx>");
    process.exit(1);
  }

  const dictionary = loadDataDictionary(stringFlag(args, "dictionary"));
  const analysis = await analyzeCsv(input, output, dictionary);

  console.log(`\n=== Categories ===`);
  for (const cluster of analysis.clusters) {
    console.log(`  ${cluster.label}: ${cluster.count} provider(s)`);
  }
  console.log(`=== Service Gaps ===`);
  for (const gap of analysis.gaps.filter((g) => g.isGap)) {
    console.log(`  ${gap.keyword}: ${(gap.coverage * 100).toFixed(1)}% coverage`);
  }
}

main().catch(exitWithError);
