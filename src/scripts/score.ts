import { loadDataDictionary } from "../lib/data-dictionary";
import { generateQualityReport, scoreProviders } from "../lib/scoring";
import { providerFromRow, scoredToTable } from "../lib/provider-rows";
import { readCsv, writeCsv, writeJsonFile } from "../lib/table";
import { requireProviders } from "../lib/pipeline";
import { exitWithError } from "../lib/errors";
import { parseArgs, stringFlag } from "./cli-args";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const input = stringFlag(args, "input");
  const output = stringFlag(args, "output");
  if (!input || !output) {
    console.error("Usage: score --input <cleaned csv> --output <scored csv> [--report <json>]");
    process.exit(1);
  }

  const dictionary = loadDataDictionary(stringFlag(args, "dictionary"));
  const scored = scoreProviders(requireProviders(readCsv(input).rows, input).map(providerFromRow), dictionary);
  writeCsv(output, scoredToTable(scored));

  const report = generateQualityReport(scored);
  const reportPath = stringFlag(args, "report");
  if (reportPath) writeJsonFile(reportPath, report);

  console.log(`\n===== QUALITY REPORT =====`);
  console.log(`Total Providers: ${report.totalProviders}`);
  console.log(`Average Completeness: ${(report.averageCompleteness * 100).toFixed(1)}%`);
  console.log(`Average Validity: ${(report.averageValidity * 100).toFixed(1)}%`);
  console.log(`Average Quality: ${(report.averageQuality * 100).toFixed(1)}%`);
  console.log(`Common Issues:`);
  for (const [flag, count] of Object.entries(report.commonQualityIssues).slice(0, 5)) {
    console.log(`  - ${flag}: ${count} provider(s)`);
  }
  console.log(`Scored providers written to ${output}` + (reportPath ? `, report to ${reportPath}` : ""));
}

main().catch(exitWithError);
