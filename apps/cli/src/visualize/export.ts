import { writeFile } from "node:fs/promises";
import { canonicalEncode } from "@sudoprop/core";
import { AssignmentRecorder } from "@sudoprop/engine";

/** Write the assignment log as JSON for an external step-by-step viewer */
export async function exportLog(
  recorder: AssignmentRecorder,
  path: string,
): Promise<number> {
  const data = recorder.toJSON();
  await writeFile(path, canonicalEncode(data, 2) + "\n", "utf-8");
  return data.entries.length;
}
