#!/usr/bin/env -S tsx

import { writePrograms } from "../server/services/mesh/artifacts";
import { readExperimentDocument } from "../server/services/mesh/document";

const USAGE = "Usage: mesh-compile --doc <experiment.json> [--out <dir>]";

function parseArgs(): { docPath?: string; outDir: string; help: boolean } {
  const args = process.argv.slice(2);
  let docPath: string | undefined;
  let outDir = "programs";
  let help = false;

  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (token === "--doc" && args[i + 1]) {
      docPath = args[i + 1];
      i += 1;
    } else if (token === "--out" && args[i + 1]) {
      outDir = args[i + 1];
      i += 1;
    } else if (token === "--help" || token === "-h") {
      help = true;
    }
  }

  return { docPath, outDir, help };
}

async function main() {
  const { docPath, outDir, help } = parseArgs();
  if (help) {
    console.error(USAGE);
    process.exit(0);
  }
  if (!docPath) {
    console.error(USAGE);
    process.exit(1);
  }

  const experiment = await readExperimentDocument(docPath);
  const programs = await writePrograms(experiment, outDir);
  process.stdout.write(`${JSON.stringify({ outDir, programs }, null, 2)}\n`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
