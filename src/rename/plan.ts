import type { GenerateDeps } from "./generate.js";
import type { RenamePlan, Scheme } from "./types.js";
import { InvalidArgumentError } from "./errors.js";
import { resolveFilename } from "./generate.js";

/**
 * Build a rename plan for `paths`, one file at a time in input order.
 * Files that cannot be resolved are left out of the plan.
 */
export async function planRenames(
  paths: unknown,
  scheme: Scheme,
  deps: GenerateDeps,
): Promise<RenamePlan> {
  if (!Array.isArray(paths)) {
    throw new InvalidArgumentError("Expected a list of file paths");
  }

  const plan: RenamePlan = new Map();
  let skipped = 0;
  for (const filePath of paths) {
    const resolution = await resolveFilename(filePath, scheme, deps);
    if (resolution.ok && typeof filePath === "string") {
      plan.set(filePath, resolution.filename);
    } else {
      skipped++;
    }
  }

  deps.logger.info(`Planned ${plan.size} rename(s), skipped ${skipped} of ${paths.length} file(s)`);
  return plan;
}
