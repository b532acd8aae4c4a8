import type { HandlerDescriptor } from "../agents/types.js";
import { logger } from "../config/logger.js";
import { DEFAULT_MATCH_CONFIG, type MatchConfig } from "../config/routerConfig.js";
import { RegistryNotLoadedError } from "../execution/shared/errors.js";
import { buildKeywordTrie, type KeywordTrie } from "../routing/keywordTrie.js";
import { MalformedDescriptorError, loadDescriptors } from "./descriptor.schema.js";
import type { SourceProvider } from "./descriptorLoader.js";

/** Descriptor table and trie built from the same batch, swapped together. */
export interface RegistrySnapshot {
  readonly version: number;
  readonly loadedAt: Date;
  readonly descriptors: ReadonlyMap<string, HandlerDescriptor>;
  readonly trie: KeywordTrie;
}

export interface ReloadFailure {
  readonly source: string;
  readonly message: string;
}

export type ReloadResult =
  | { readonly ok: true; readonly version: number; readonly handlerCount: number }
  | { readonly ok: false; readonly error: ReloadFailure };

const PROVIDER_SOURCE = "(descriptor provider)";

export function buildSnapshot(
  descriptors: readonly HandlerDescriptor[],
  version: number,
  options: MatchConfig = DEFAULT_MATCH_CONFIG,
): RegistrySnapshot {
  return {
    version,
    loadedAt: new Date(),
    descriptors: new Map(descriptors.map((descriptor) => [descriptor.name, descriptor])),
    trie: buildKeywordTrie(descriptors, options),
  };
}

export class HandlerRegistry {
  private snapshot: RegistrySnapshot | null = null;
  private lastFailure: ReloadFailure | null = null;

  constructor(
    private readonly provider: SourceProvider,
    private readonly matchConfig: MatchConfig = DEFAULT_MATCH_CONFIG,
  ) {}

  /**
   * Reads the sources again and swaps in a new snapshot only when the whole
   * batch validates. On failure the active snapshot stays in place.
   */
  reload(): ReloadResult {
    let snapshot: RegistrySnapshot;
    try {
      const descriptors = loadDescriptors(this.provider());
      snapshot = buildSnapshot(descriptors, (this.snapshot?.version ?? 0) + 1, this.matchConfig);
    } catch (error) {
      const failure = toReloadFailure(error);
      this.lastFailure = failure;
      logger.error(
        { source: failure.source, error: failure.message, activeVersion: this.snapshot?.version ?? null },
        "Handler registry reload failed, keeping previous registry",
      );
      return { ok: false, error: failure };
    }

    this.snapshot = snapshot;
    this.lastFailure = null;
    logger.info(
      { version: snapshot.version, handlers: snapshot.descriptors.size, keywords: snapshot.trie.stats.keywords },
      "Handler registry loaded",
    );
    return { ok: true, version: snapshot.version, handlerCount: snapshot.descriptors.size };
  }

  current(): RegistrySnapshot {
    if (!this.snapshot) {
      throw new RegistryNotLoadedError();
    }
    return this.snapshot;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  get(name: string): HandlerDescriptor | undefined {
    return this.snapshot?.descriptors.get(name);
  }

  getLastFailure(): ReloadFailure | null {
    return this.lastFailure;
  }
}

function toReloadFailure(error: unknown): ReloadFailure {
  if (error instanceof MalformedDescriptorError) {
    return { source: error.source, message: error.detail };
  }
  return {
    source: PROVIDER_SOURCE,
    message: error instanceof Error ? error.message : String(error),
  };
}
