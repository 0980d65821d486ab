// packages/solver-core/src/prefixIndex.ts
//
// Prefix tree over single characters, used by the grid search to abandon a
// path as soon as its letters stop being the prefix of any dictionary word.
//
// The search never asks "is this whole string a prefix?". It holds on to the
// node it reached and asks for one child at a time, so a path of m letters
// costs m lookups in total rather than m² re-walks from the root.
//
// Exports:
//   • PrefixNode  — one prefix position (children + terminal flag).
//   • PrefixIndex — the tree itself: insert, childFor, isTerminal, has, size.

export class PrefixNode {
  readonly children = new Map<string, PrefixNode>();
  terminal = false;
}

export class PrefixIndex {
  /** Node for the empty prefix. */
  readonly root = new PrefixNode();
  private words = 0;

  /**
   * insert adds a word, creating any missing nodes along the way.
   * Inserting a word twice leaves the tree unchanged.
   */
  insert(word: string): void {
    let node = this.root;
    for (const ch of word) {
      let child = node.children.get(ch);
      if (!child) {
        child = new PrefixNode();
        node.children.set(ch, child);
      }
      node = child;
    }
    if (!node.terminal) {
      node.terminal = true;
      this.words++;
    }
  }

  childFor(node: PrefixNode, ch: string): PrefixNode | undefined {
    return node.children.get(ch);
  }

  isTerminal(node: PrefixNode): boolean {
    return node.terminal;
  }

  /** has walks from the root; search code should use childFor instead. */
  has(word: string): boolean {
    let node: PrefixNode | undefined = this.root;
    for (const ch of word) {
      node = this.childFor(node, ch);
      if (!node) return false;
    }
    return node.terminal;
  }

  /** Number of distinct words inserted. */
  get size(): number {
    return this.words;
  }
}
