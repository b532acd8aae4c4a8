import type { HandlerCategory, HandlerDescriptor } from "../agents/types.js";
import { DEFAULT_MATCH_CONFIG, type MatchConfig } from "../config/routerConfig.js";
import { InputTooLargeError } from "../execution/shared/errors.js";
import { normalizeText } from "./tokenizer.js";

const WORD_SEPARATOR = " ";

export interface TrieNode {
  readonly children: ReadonlyMap<string, TrieNode>;
  readonly terminal: TerminalPayload | null;
}

export interface TerminalPayload {
  readonly keyword: string;
  readonly wordCount: number;
  readonly handlers: readonly string[];
}

export interface ScoredCandidate {
  readonly name: string;
  readonly score: number;
  readonly priority: number;
  readonly category: HandlerCategory;
}

export interface MatchResult {
  readonly normalizedInput: string;
  readonly matchedKeywords: readonly string[];
  /** Descriptor tags found in the input, sorted. */
  readonly matchedTags: readonly string[];
  readonly candidateHandlers: readonly ScoredCandidate[];
  readonly categories: readonly HandlerCategory[];
  readonly suggestsParallel: boolean;
}

export interface TrieStats {
  readonly nodes: number;
  readonly keywords: number;
  readonly handlers: number;
}

interface MutableNode {
  readonly children: Map<string, MutableNode>;
  keyword: string | null;
  wordCount: number;
  handlers: string[];
}

function createNode(): MutableNode {
  return { children: new Map(), keyword: null, wordCount: 0, handlers: [] };
}

function freeze(node: MutableNode): TrieNode {
  const children = new Map<string, TrieNode>();
  for (const [char, child] of node.children) {
    children.set(char, freeze(child));
  }

  const terminal =
    node.keyword === null
      ? null
      : { keyword: node.keyword, wordCount: node.wordCount, handlers: [...node.handlers] };

  return { children, terminal };
}

/**
 * Builds a fresh trie over every trigger keyword. Multi-word keywords are
 * stored with single spaces between words, so a phrase walk continues across
 * token boundaries through the space edge.
 */
export function buildKeywordTrie(
  descriptors: readonly HandlerDescriptor[],
  options: MatchConfig = DEFAULT_MATCH_CONFIG,
): KeywordTrie {
  const root = createNode();
  let nodes = 1;
  let keywords = 0;

  for (const descriptor of descriptors) {
    for (const keyword of descriptor.triggerKeywords) {
      let node = root;
      for (const char of keyword) {
        let child = node.children.get(char);
        if (!child) {
          child = createNode();
          node.children.set(char, child);
          nodes++;
        }
        node = child;
      }

      if (node.keyword === null) {
        node.keyword = keyword;
        node.wordCount = keyword.split(WORD_SEPARATOR).length;
        keywords++;
      }
      if (!node.handlers.includes(descriptor.name)) {
        node.handlers.push(descriptor.name);
      }
    }
  }

  const tagCategories = new Map<string, Set<HandlerCategory>>();
  for (const descriptor of descriptors) {
    for (const tag of descriptor.tags) {
      const categories = tagCategories.get(tag) ?? new Set<HandlerCategory>();
      categories.add(descriptor.category);
      tagCategories.set(tag, categories);
    }
  }

  const table = new Map(descriptors.map((descriptor) => [descriptor.name, descriptor]));
  return new KeywordTrie(freeze(root), table, tagCategories, options, {
    nodes,
    keywords,
    handlers: table.size,
  });
}

export class KeywordTrie {
  constructor(
    private readonly root: TrieNode,
    private readonly descriptors: ReadonlyMap<string, HandlerDescriptor>,
    private readonly tagCategories: ReadonlyMap<string, ReadonlySet<HandlerCategory>>,
    private readonly options: MatchConfig,
    readonly stats: TrieStats,
  ) {}

  match(text: string): MatchResult {
    if (text.length > this.options.maxInputLength) {
      throw new InputTooLargeError(text.length, this.options.maxInputLength);
    }

    const normalizedInput = normalizeText(text);
    if (normalizedInput.length === 0) {
      return emptyMatch(normalizedInput);
    }

    const matched = this.collectTerminals(normalizedInput.split(WORD_SEPARATOR));
    if (matched.length === 0) {
      return emptyMatch(normalizedInput);
    }

    const matchedTags = this.collectTags(normalizedInput);
    const candidateHandlers = this.rank(matched, matchedTags);
    const categories = [...new Set(candidateHandlers.map((candidate) => candidate.category))].sort();

    return {
      normalizedInput,
      matchedKeywords: matched.map((terminal) => terminal.keyword),
      matchedTags,
      candidateHandlers,
      categories,
      suggestsParallel: this.suggestsParallel(candidateHandlers),
    };
  }

  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  /** Distinct terminals in order of first occurrence in the token stream. */
  private collectTerminals(tokens: readonly string[]): readonly TerminalPayload[] {
    const seen = new Set<string>();
    const matched: TerminalPayload[] = [];

    for (let start = 0; start < tokens.length; start++) {
      let node: TrieNode | undefined = this.root;

      for (let index = start; index < tokens.length && node; index++) {
        if (index > start) {
          node = node.children.get(WORD_SEPARATOR);
          if (!node) break;
        }

        node = walkToken(node, tokens[index] ?? "");
        const terminal = node?.terminal;
        if (terminal && !seen.has(terminal.keyword)) {
          seen.add(terminal.keyword);
          matched.push(terminal);
        }
      }
    }

    return matched;
  }

  /** Tags appearing in the input as whole tokens. */
  private collectTags(normalizedInput: string): readonly string[] {
    const padded = `${WORD_SEPARATOR}${normalizedInput}${WORD_SEPARATOR}`;
    return [...this.tagCategories.keys()]
      .filter((tag) => padded.includes(`${WORD_SEPARATOR}${tag}${WORD_SEPARATOR}`))
      .sort();
  }

  /**
   * Sums keyword weights per handler, then lifts every keyword-matched handler
   * by `tagWeight` for each matched tag carried by some handler of its category.
   * Tags alone never make a handler a candidate.
   */
  private rank(matched: readonly TerminalPayload[], matchedTags: readonly string[]): readonly ScoredCandidate[] {
    const scores = new Map<string, number>();

    for (const terminal of matched) {
      const weight = this.keywordWeight(terminal);
      for (const handler of terminal.handlers) {
        scores.set(handler, (scores.get(handler) ?? 0) + weight);
      }
    }

    const candidates: ScoredCandidate[] = [];
    for (const [name, score] of scores) {
      const descriptor = this.descriptors.get(name);
      if (!descriptor) continue;
      const tagHits = matchedTags.filter((tag) => this.tagCategories.get(tag)?.has(descriptor.category)).length;
      candidates.push({
        name,
        score: score + tagHits * this.options.tagWeight,
        priority: descriptor.priority,
        category: descriptor.category,
      });
    }

    return candidates.sort(compareCandidates);
  }

  private keywordWeight(terminal: TerminalPayload): number {
    const bonus = terminal.wordCount > 1 ? this.options.phraseBonus : 1;
    return terminal.wordCount * bonus;
  }

  private suggestsParallel(candidates: readonly ScoredCandidate[]): boolean {
    const top = candidates[0];
    if (!top) return false;

    const threshold = top.score * this.options.parallelRatio;
    const confident = candidates.filter((candidate) => candidate.score >= threshold);
    return new Set(confident.map((candidate) => candidate.category)).size >= 2;
  }
}

function walkToken(from: TrieNode, token: string): TrieNode | undefined {
  let node: TrieNode | undefined = from;
  for (const char of token) {
    node = node.children.get(char);
    if (!node) return undefined;
  }
  return node;
}

export function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.priority !== b.priority) return a.priority - b.priority;
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

function emptyMatch(normalizedInput: string): MatchResult {
  return {
    normalizedInput,
    matchedKeywords: [],
    matchedTags: [],
    candidateHandlers: [],
    categories: [],
    suggestsParallel: false,
  };
}
