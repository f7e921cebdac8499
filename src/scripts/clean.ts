import { loadDataDictionary } from "../lib/data-dictionary";
import { cleanTable } from "../lib/cleaner";
import { providersToTable, referencesToTable } from "../lib/provider-rows";
import { readCsv, writeCsv } from "../lib/table";
import { requireProviders } from "../lib/pipeline";
import { exitWithError } from "../lib/errors";
import { parseArgs, stringFlag } from "./cli-args";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const input = stringFlag(args, "input");
  const output = stringFlag(args, "output");
  if (!input || !output) {
    console.error("Usage: clean --input <csv> --output <csv> [--references-output <csv>]");
    process.exit(1);
  }

  const dictionary = loadDataDictionary(stringFlag(args, "dictionary"));
  const { providers, references, stats } = cleanTable(readCsv(input), dictionary);
  requireProviders(providers, input);
  writeCsv(output, providersToTable(providers));

  const referencesOutput = stringFlag(args, "references-output");
  if (referencesOutput) writeCsv(referencesOutput, referencesToTable(references));

  console.log(
    `Cleaned ${stats.inputRows} row(s) into ${stats.outputRows} provider(s) → ${output}` +
      (referencesOutput ? `, ${references.length} reference(s) → ${referencesOutput}` : "")
  );
}

main().catch(exitWithError);
