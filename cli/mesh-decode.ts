#!/usr/bin/env -S tsx

import { resolveMeshConfig } from "../server/config/env";
import { readResultBuffers } from "../server/services/mesh/artifacts";
import { readExperimentDocument } from "../server/services/mesh/document";
import { sortFaults } from "../server/services/mesh/errors";
import { RESULT_TABLE_NAMES, type ResultTableName } from "../server/services/mesh/results";
import { toCsv } from "../server/services/mesh/table";

const USAGE = `Usage: mesh-decode --doc <experiment.json> --results <dir> [--table <${RESULT_TABLE_NAMES.join("|")}>]`;

const isTableName = (value: string): value is ResultTableName =>
  RESULT_TABLE_NAMES.some((name) => name === value);

function parseArgs(): { docPath?: string; resultsDir?: string; table: string; help: boolean } {
  const args = process.argv.slice(2);
  let docPath: string | undefined;
  let resultsDir: string | undefined;
  let table = "totals";
  let help = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--doc" && args[i + 1]) {
      docPath = args[i + 1];
      i += 1;
    } else if (token === "--results" && args[i + 1]) {
      resultsDir = args[i + 1];
      i += 1;
    } else if (token === "--table" && args[i + 1]) {
      table = args[i + 1];
      i += 1;
    } else if (token === "--help" || token === "-h") {
      help = true;
    }
  }

  return { docPath, resultsDir, table, help };
}

async function main() {
  const { docPath, resultsDir, table, help } = parseArgs();
  if (help) {
    console.error(USAGE);
    process.exit(0);
  }
  if (!docPath || !resultsDir || !isTableName(table)) {
    console.error(USAGE);
    process.exit(1);
  }

  const config = resolveMeshConfig();
  const experiment = await readExperimentDocument(docPath);
  const buffers = await readResultBuffers(experiment, resultsDir);
  const results = experiment.decode(buffers, { ignoreDeadlineErrors: config.ignoreDeadlineErrors });

  process.stdout.write(`${toCsv(results.tables()[table], { separator: config.csvSeparator, na: config.csvNa })}\n`);

  if (results.faults.size > 0) {
    console.error(`[mesh-decode] faults: ${sortFaults(results.faults).join(", ")}`);
    process.exit(2);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
