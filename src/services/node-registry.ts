/**
 * Node Registry
 *
 * Static node definitions plus pool-wide parameter defaults.
 * Parameters resolve node override → pool default → empty string.
 */

import type { NodeConfig, NodeParams } from '../types';

export class NodeRegistry {
  private readonly nodes = new Map<string, NodeConfig>();
  private readonly defaults = new Map<string, string>();

  constructor(defaults: NodeParams = {}) {
    for (const [key, value] of Object.entries(defaults)) {
      this.defaults.set(key, value);
    }
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  get(name: string): NodeConfig | undefined {
    const node = this.nodes.get(name);
    return node ? { ...node, params: { ...node.params } } : undefined;
  }

  list(): NodeConfig[] {
    return Array.from(this.nodes.keys())
      .sort((a, b) => a.localeCompare(b))
      .flatMap((name) => this.get(name) ?? []);
  }

  /**
   * Register a node. Returns false, leaving the existing entry untouched, if the name is taken.
   */
  add(name: string, address: string, params: NodeParams): boolean {
    if (this.nodes.has(name)) {
      return false;
    }
    this.nodes.set(name, { name, address, params: { ...params } });
    return true;
  }

  delete(name: string): boolean {
    return this.nodes.delete(name);
  }

  setDefault(key: string, value: string): void {
    this.defaults.set(key, value);
  }

  /**
   * Resolve a parameter for a node. An empty value at either level counts as unset.
   * Unknown nodes resolve against the pool defaults only.
   */
  getParam(name: string, key: string): string {
    const params = this.nodes.get(name)?.params;
    const override = params && Object.hasOwn(params, key) ? params[key] : undefined;
    if (override !== undefined && override !== '') {
      return override;
    }

    const fallback = this.defaults.get(key);
    if (fallback !== undefined && fallback !== '') {
      return fallback;
    }

    return '';
  }
}
