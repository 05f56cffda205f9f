import { generateResources, type GenerateReport, type GenerateResourcesOptions } from "@gdnative-utils/generator";
import { scanCrate, type Classes, type WalkOptions } from "@gdnative-utils/scanner";

export interface BuildResourcesOptions extends GenerateResourcesOptions {
  /** Crate source directory to scan. */
  readonly crateDir: string;
  readonly walk?: Omit<WalkOptions, "logger">;
}

export interface BuildResourcesResult {
  readonly classes: Classes;
  readonly report: GenerateReport;
}

/**
 * Scan a crate and generate its resources in one step.
 *
 * Nothing is written when the scan fails.
 */
export async function buildResources(options: BuildResourcesOptions): Promise<BuildResourcesResult> {
  const { crateDir, walk, ...generatorOptions } = options;
  const classes = await scanCrate(crateDir, { walk, logger: options.logger });
  const report = await generateResources(generatorOptions, classes);
  return { classes, report };
}
