export type HandlerCategory =
  | "security"
  | "performance"
  | "development"
  | "infrastructure"
  | "platform"
  | "data"
  | "hardware"
  | "specialized";

export const HANDLER_CATEGORIES: readonly HandlerCategory[] = [
  "security",
  "performance",
  "development",
  "infrastructure",
  "platform",
  "data",
  "hardware",
  "specialized",
];

export const DEFAULT_CATEGORY: HandlerCategory = "specialized";
export const DEFAULT_PRIORITY = 3;
export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 9;

export interface HandlerDescriptor {
  readonly name: string;
  readonly category: HandlerCategory;
  readonly triggerKeywords: readonly string[];
  /** Lower is more urgent. */
  readonly priority: number;
  readonly tags: ReadonlySet<string>;
  readonly description: string;
}

/** One parsed descriptor record and where it came from. */
export interface DescriptorSource {
  readonly id: string;
  readonly data: unknown;
}

export interface HandlerInvocation {
  readonly handlerName: string;
  readonly payload: TaskPayload;
  readonly attempt: number;
  readonly signal: AbortSignal;
}

export interface TaskPayload {
  readonly input: string;
  readonly normalizedInput: string;
  readonly matchedKeywords: readonly string[];
  readonly hinted: boolean;
}

export type HandlerFn = (invocation: HandlerInvocation) => Promise<unknown>;

export interface HandlerBinding {
  readonly fallback: HandlerFn;
  readonly fast?: HandlerFn;
}
