import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { DescriptorSource } from "../agents/types.js";
import { logger } from "../config/logger.js";
import { MalformedDescriptorError } from "./descriptor.schema.js";

const DESCRIPTOR_EXTENSIONS: ReadonlySet<string> = new Set([".yaml", ".yml"]);

export type SourceProvider = () => readonly DescriptorSource[];

/**
 * Reads every descriptor file in `dir`. A file may hold a single mapping, a
 * list of mappings, or a mapping with a `handlers` list.
 */
export function readDescriptorSources(dir: string): readonly DescriptorSource[] {
  if (!fs.existsSync(dir)) {
    logger.warn({ dir }, "Handlers directory not found, no descriptors loaded");
    return [];
  }

  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && DESCRIPTOR_EXTENSIONS.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();

  const sources: DescriptorSource[] = [];
  for (const file of files) {
    const filePath = path.join(dir, file);
    sources.push(...parseDescriptorFile(filePath, fs.readFileSync(filePath, "utf-8")));
  }

  logger.debug({ dir, files: files.length, descriptors: sources.length }, "Descriptor files read");
  return sources;
}

export function parseDescriptorFile(sourceId: string, content: string): readonly DescriptorSource[] {
  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new MalformedDescriptorError(sourceId, `invalid YAML: ${message}`);
  }

  if (parsed === null || parsed === undefined) {
    throw new MalformedDescriptorError(sourceId, "file is empty");
  }

  const entries = unwrapEntries(parsed);
  if (entries === null) {
    return [{ id: sourceId, data: parsed }];
  }

  return entries.map((data, index) => ({ id: `${sourceId}#${String(index)}`, data }));
}

function unwrapEntries(parsed: unknown): readonly unknown[] | null {
  if (Array.isArray(parsed)) return parsed;

  if (typeof parsed === "object" && parsed !== null && "handlers" in parsed) {
    const handlers: unknown = parsed.handlers;
    if (Array.isArray(handlers)) return handlers;
  }

  return null;
}

export function createDirectorySourceProvider(dir: string): SourceProvider {
  return () => readDescriptorSources(dir);
}
