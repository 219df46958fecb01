import fs from "node:fs/promises";
import path from "node:path";
import type { Entity } from "./model";
import type { Experiment } from "./experiment";

export type ProgramSummary = {
  entity: string;
  file: string;
  bytes: number;
  instructions: number;
  resultBytes: number;
};

/** Compile every entity and write its packed program to `<outDir>/<entity>.bin`. */
export async function writePrograms(
  experiment: Experiment,
  outDir: string,
  random?: () => number,
): Promise<ProgramSummary[]> {
  const programs = experiment.compile(random);
  const resultSizes = experiment.resultSizes();
  await fs.mkdir(outDir, { recursive: true });
  const summary: ProgramSummary[] = [];
  for (const [entity, commands] of programs) {
    const file = path.join(outDir, `${entity.name}.bin`);
    await fs.writeFile(file, commands.pack());
    summary.push({
      entity: entity.name,
      file,
      bytes: commands.size,
      instructions: commands.instructions.length,
      resultBytes: resultSizes.get(entity) ?? 4,
    });
  }
  return summary;
}

/** Read `<dir>/<entity>.res` for every entity that has one. */
export async function readResultBuffers(experiment: Experiment, dir: string): Promise<Map<Entity, Uint8Array>> {
  const buffers = new Map<Entity, Uint8Array>();
  for (const entity of experiment.entities) {
    const file = path.join(dir, `${entity.name}.res`);
    try {
      buffers.set(entity, new Uint8Array(await fs.readFile(file)));
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") continue;
      throw err;
    }
  }
  return buffers;
}
