import type { Complex } from '../complex.js';

type Branch<V> = { arg: Complex; node: ArgumentTrie<V> };

/**
 * A map from argument tuples to values, one trie level per argument
 * position. Arguments are matched by numeric value, not by source text.
 */
export class ArgumentTrie<V> {
  private value: V | undefined;
  private children: Map<string, Branch<V>> | undefined;

  get(args: readonly Complex[]): V | undefined {
    let node: ArgumentTrie<V> | undefined = this;
    for (const arg of args) {
      node = node.children?.get(arg.key())?.node;
      if (node === undefined) return undefined;
    }
    return node.value;
  }

  set(args: readonly Complex[], value: V): void {
    let node: ArgumentTrie<V> = this;
    for (const arg of args) {
      const key = arg.key();
      node.children ??= new Map();
      let branch = node.children.get(key);
      if (branch === undefined) {
        branch = { arg, node: new ArgumentTrie<V>() };
        node.children.set(key, branch);
      }
      node = branch.node;
    }
    node.value = value;
  }

  /** Stored tuples in insertion order. */
  entries(): Array<{ args: Complex[]; value: V }> {
    const out: Array<{ args: Complex[]; value: V }> = [];
    const walk = (node: ArgumentTrie<V>, prefix: Complex[]): void => {
      if (node.value !== undefined) out.push({ args: prefix, value: node.value });
      for (const { arg, node: child } of node.children?.values() ?? []) walk(child, [...prefix, arg]);
    };
    walk(this, []);
    return out;
  }

  get size(): number {
    return this.entries().length;
  }

  clone(): ArgumentTrie<V> {
    const copy = new ArgumentTrie<V>();
    for (const { args, value } of this.entries()) copy.set(args, value);
    return copy;
  }
}
