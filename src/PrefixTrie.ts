import { InvalidArgumentError, MatcherStateError } from "./errors.js";

/**
 * Which characters may appear on a trie edge. The same rule is applied when building and when looking up, so any registered prefix is reachable.
 *  - `alphanumeric`: unicode letters and digits only, case sensitive
 *  - `any`: every character
 */
export type CharacterPolicy = "alphanumeric" | "any";

export const characterPolicies: readonly CharacterPolicy[] = ["alphanumeric", "any"];

const alphanumeric = /^[\p{L}\p{N}]$/u;

export const isAdmissible = (char: string, policy: CharacterPolicy) => policy == "any" || alphanumeric.test(char);

const describeValue = (value: unknown) => (value === null ? "null" : typeof value);

export interface LoadReport {
  /** number of distinct prefixes newly registered by this load */
  registered: number;
  /** prefixes refused because they were empty or had a character the policy doesn't admit */
  rejected: string[];
}

export interface PrefixTrieOptions {
  characters?: CharacterPolicy;
}

export class TrieNode {
  children = new Map<string, TrieNode>();
  isTerminal = false;
}

/**
 * Prefix matching datastructure for finding the longest registered prefix of an incoming string.
 * Built once with `load`, then only read, so any number of concurrent lookups can share one instance.
 **/
export class PrefixTrie {
  readonly strategy = "trie";
  readonly characters: CharacterPolicy;
  root = new TrieNode();
  size = 0;
  private loaded = false;

  constructor(options: PrefixTrieOptions = {}) {
    this.characters = options.characters ?? "alphanumeric";
  }

  load(prefixes: Iterable<string>): LoadReport {
    if (this.loaded) {
      throw new MatcherStateError("prefix trie has already been loaded, build a new one instead of loading twice");
    }
    this.loaded = true;

    const report: LoadReport = { registered: 0, rejected: [] };
    for (const prefix of prefixes) {
      if (this.insert(prefix)) {
        report.registered++;
      } else if (typeof prefix !== "string" || !this.contains(prefix)) {
        report.rejected.push(String(prefix));
      }
    }
    this.size += report.registered;

    return report;
  }

  /**
   * Walk the input from the root, remembering the last terminal node passed. Stops at the first character that has no edge or isn't admissible.
   * Returns null if no registered prefix starts the input.
   */
  findLongestMatch(input: string): string | null {
    if (typeof input !== "string") {
      throw new InvalidArgumentError(`expected a string to match, got ${describeValue(input)}`);
    }

    let node = this.root;
    let consumed = 0;
    let longest: number | null = null;
    for (const char of input) {
      if (!isAdmissible(char, this.characters)) break;
      const next = node.children.get(char);
      if (!next) break;

      node = next;
      consumed += char.length;
      if (node.isTerminal) longest = consumed;
    }

    return longest === null ? null : input.slice(0, longest);
  }

  /**
   * Has this exact prefix been registered?
   */
  contains(prefix: string) {
    const node = this.nodeFor(prefix);
    return !!node && node.isTerminal;
  }

  private insert(prefix: string) {
    if (typeof prefix !== "string" || prefix.length == 0) return false;
    // check the whole prefix first so a refused prefix leaves no edges behind
    for (const char of prefix) {
      if (!isAdmissible(char, this.characters)) return false;
    }

    let node = this.root;
    for (const char of prefix) {
      let child = node.children.get(char);
      if (!child) {
        child = new TrieNode();
        node.children.set(char, child);
      }
      node = child;
    }

    if (node.isTerminal) return false;
    node.isTerminal = true;
    return true;
  }

  private nodeFor(path: string) {
    let node: TrieNode | undefined = this.root;
    for (const char of path) {
      node = node.children.get(char);
      if (!node) return undefined;
    }
    return node;
  }
}
