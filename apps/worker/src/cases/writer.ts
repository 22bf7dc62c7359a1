import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { CaseOutput } from "./schemas";

export function formatOutputs(outputs: CaseOutput[]): string {
  return outputs
    .map((o) =>
      JSON.stringify(
        o.error === undefined
          ? { problem_id: o.problem_id, root_causes: o.root_causes }
          : { problem_id: o.problem_id, root_causes: o.root_causes, error: o.error }
      )
    )
    .map((line) => `${line}\n`)
    .join("");
}

/**
 * Write one JSON line per case, creating the parent directory if needed.
 */
export async function writeOutputs(path: string, outputs: CaseOutput[]): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, formatOutputs(outputs), "utf8");
}
