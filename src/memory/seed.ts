/**
 * Memory seeder.
 *
 * Overwrites the agent's MEMORY.md with the seed template on every start,
 * so edits to the template ship with each deploy.
 */
import fs from "node:fs";
import { fileURLToPath } from "node:url";
import type { EntrypointPaths } from "../shared/types.js";
import type { Logger } from "../shared/logger.js";

/** Seed template shipped with the package (templates/MEMORY.md). */
export const DEFAULT_MEMORY_TEMPLATE = fileURLToPath(
  new URL("../../templates/MEMORY.md", import.meta.url),
);

export function readMemoryTemplate(templatePath: string | null = null): string {
  return fs.readFileSync(templatePath ?? DEFAULT_MEMORY_TEMPLATE, "utf-8");
}

/**
 * Write the seed content to MEMORY.md, replacing whatever was there.
 * Returns the content written. Read and write errors propagate.
 */
export function seedMemory(
  paths: Pick<EntrypointPaths, "memoryDir" | "memoryFile">,
  templatePath: string | null = null,
  logger?: Logger,
): string {
  const content = readMemoryTemplate(templatePath);
  fs.mkdirSync(paths.memoryDir, { recursive: true });
  fs.writeFileSync(paths.memoryFile, content);
  logger?.info("MEMORY.md seeded.");
  return content;
}

/** Append a section to MEMORY.md, creating the file if needed. */
export function appendToMemory(
  paths: Pick<EntrypointPaths, "memoryDir" | "memoryFile">,
  section: string,
): void {
  fs.mkdirSync(paths.memoryDir, { recursive: true });
  fs.appendFileSync(paths.memoryFile, section);
}
