import type { HandlerBinding, HandlerFn } from "./types.js";

/**
 * Explicit name -> implementation table, populated at startup. Descriptors
 * without their own registration fall back to the default binding, if any.
 */
export class HandlerTable {
  private readonly bindings = new Map<string, HandlerBinding>();

  constructor(private readonly defaultBinding?: HandlerBinding) {}

  register(name: string, binding: HandlerBinding): this {
    if (this.bindings.has(name)) {
      throw new Error(`Handler "${name}" is already registered`);
    }
    this.bindings.set(name, binding);
    return this;
  }

  resolve(name: string): HandlerBinding | undefined {
    return this.bindings.get(name) ?? this.defaultBinding;
  }

  has(name: string): boolean {
    return this.bindings.has(name);
  }

  names(): readonly string[] {
    return [...this.bindings.keys()].sort();
  }

  hasFastPath(): boolean {
    if (this.defaultBinding?.fast) return true;
    return [...this.bindings.values()].some((binding) => binding.fast !== undefined);
  }
}

export interface AdvisoryResult {
  readonly handler: string;
  readonly mode: "advisory";
  readonly command: string;
  readonly matchedKeywords: readonly string[];
}

function toSubagentType(handlerName: string): string {
  const sanitized = handlerName.toLowerCase().replaceAll(/[^a-z0-9_-]/g, "");
  return sanitized.length > 0 ? sanitized : "unknown";
}

/** Produces the delegation command for a handler instead of running it. */
export const advisoryHandler: HandlerFn = (invocation) => {
  const result: AdvisoryResult = {
    handler: invocation.handlerName,
    mode: "advisory",
    command: `Task(subagent_type="${toSubagentType(invocation.handlerName)}", prompt=${JSON.stringify(invocation.payload.input)})`,
    matchedKeywords: invocation.payload.matchedKeywords,
  };
  return Promise.resolve(result);
};

export function createDefaultHandlerTable(): HandlerTable {
  return new HandlerTable({ fallback: advisoryHandler });
}
