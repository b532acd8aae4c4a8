import {
  DEFAULT_CATEGORY,
  DEFAULT_PRIORITY,
  HANDLER_CATEGORIES,
  MAX_PRIORITY,
  MIN_PRIORITY,
  type DescriptorSource,
  type HandlerCategory,
  type HandlerDescriptor,
} from "../agents/types.js";
import { normalizeText } from "../routing/tokenizer.js";

const MAX_NAME_LENGTH = 64;
const NAME_REGEX = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function validateDescriptor(raw: unknown, sourceId: string): HandlerDescriptor {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new MalformedDescriptorError(sourceId, "descriptor must be a mapping");
  }

  const record = raw as Record<string, unknown>;

  const name = validateName(record["name"], sourceId);
  const triggerKeywords = validateKeywords(
    record["trigger_keywords"] ?? record["triggerKeywords"],
    sourceId,
  );
  const category = validateCategory(record["category"], sourceId);
  const priority = validatePriority(record["priority"], sourceId);
  const tags = validateTags(record["tags"], sourceId);
  const description = validateDescription(record["description"], sourceId);

  return { name, category, triggerKeywords, priority, tags, description };
}

/**
 * Validates a whole batch. Any malformed record or duplicate name rejects the
 * batch; nothing from a failed batch is returned.
 */
export function loadDescriptors(
  sources: readonly DescriptorSource[],
): readonly HandlerDescriptor[] {
  const seen = new Map<string, string>();
  const descriptors: HandlerDescriptor[] = [];

  for (const source of sources) {
    const descriptor = validateDescriptor(source.data, source.id);
    const firstSource = seen.get(descriptor.name);
    if (firstSource !== undefined) {
      throw new MalformedDescriptorError(
        source.id,
        `duplicate handler name "${descriptor.name}" (already defined in ${firstSource})`,
      );
    }
    seen.set(descriptor.name, source.id);
    descriptors.push(descriptor);
  }

  return descriptors;
}

function validateName(value: unknown, sourceId: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new MalformedDescriptorError(sourceId, "name must be a non-empty string");
  }

  const name = value.trim();
  if (name.length > MAX_NAME_LENGTH) {
    throw new MalformedDescriptorError(
      sourceId,
      `name must be at most ${String(MAX_NAME_LENGTH)} characters, got ${String(name.length)}`,
    );
  }
  if (!NAME_REGEX.test(name)) {
    throw new MalformedDescriptorError(
      sourceId,
      `name may contain only letters, digits, "_", "." and "-": "${name}"`,
    );
  }
  return name;
}

function validateKeywords(value: unknown, sourceId: string): readonly string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new MalformedDescriptorError(sourceId, "trigger_keywords must be a non-empty list");
  }

  const keywords: string[] = [];
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== "string") {
      throw new MalformedDescriptorError(
        sourceId,
        `trigger_keywords[${String(index)}] must be a string. Got: ${JSON.stringify(entry)}`,
      );
    }
    const keyword = normalizeText(entry);
    if (keyword.length === 0) {
      throw new MalformedDescriptorError(
        sourceId,
        `trigger_keywords[${String(index)}] has no letters or digits: "${entry}"`,
      );
    }
    if (!keywords.includes(keyword)) keywords.push(keyword);
  }
  return keywords;
}

function validateCategory(value: unknown, sourceId: string): HandlerCategory {
  if (value === undefined || value === null) return DEFAULT_CATEGORY;

  const category = HANDLER_CATEGORIES.find(
    (candidate) => typeof value === "string" && candidate === value.trim().toLowerCase(),
  );
  if (!category) {
    throw new MalformedDescriptorError(
      sourceId,
      `category must be one of: ${HANDLER_CATEGORIES.join(", ")}. Got: "${String(value)}"`,
    );
  }
  return category;
}

function validatePriority(value: unknown, sourceId: string): number {
  if (value === undefined || value === null) return DEFAULT_PRIORITY;

  const num = typeof value === "string" ? Number(value) : value;
  if (typeof num !== "number" || !Number.isInteger(num) || num < MIN_PRIORITY || num > MAX_PRIORITY) {
    throw new MalformedDescriptorError(
      sourceId,
      `priority must be an integer between ${String(MIN_PRIORITY)} and ${String(MAX_PRIORITY)}. Got: "${String(value)}"`,
    );
  }
  return num;
}

function validateTags(value: unknown, sourceId: string): ReadonlySet<string> {
  if (value === undefined || value === null) return new Set();

  if (!Array.isArray(value) || value.some((tag) => typeof tag !== "string")) {
    throw new MalformedDescriptorError(sourceId, "tags must be a list of strings");
  }
  return new Set(
    value
      .map((tag) => normalizeText(String(tag)))
      .filter((tag) => tag.length > 0),
  );
}

function validateDescription(value: unknown, sourceId: string): string {
  if (value === undefined || value === null) return "";
  if (typeof value !== "string") {
    throw new MalformedDescriptorError(sourceId, "description must be a string");
  }
  return value.trim();
}

export class MalformedDescriptorError extends Error {
  constructor(
    readonly source: string,
    readonly detail: string,
  ) {
    super(`Malformed descriptor in ${source}: ${detail}`);
    this.name = "MalformedDescriptorError";
  }
}
