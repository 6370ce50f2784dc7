/**
 * Frontier: per-domain breadth-first traversal state
 */

import type { FrontierEntry } from "../types/index";

export interface FrontierLimits {
  maxDepth: number;
  /** Product URLs after which the frontier stops accepting entries */
  maxDiscoveries: number;
}

export class Frontier {
  private readonly visited = new Set<string>();
  private readonly queue: FrontierEntry[] = [];
  private discovered = 0;

  constructor(private readonly limits: FrontierLimits) {}

  /**
   * Queues a normalized URL unless it was seen before, is too deep, or the
   * discovery limit is reached
   * @returns true when the entry was queued
   */
  enqueue(url: string, depth: number): boolean {
    if (depth < 0 || depth > this.limits.maxDepth) return false;
    if (this.atLimit || this.visited.has(url)) return false;
    this.visited.add(url);
    this.queue.push({ url, depth });
    return true;
  }

  /** Next entry in FIFO order, or undefined when nothing is pending */
  dequeue(): FrontierEntry | undefined {
    return this.queue.shift();
  }

  recordDiscovery(): void {
    this.discovered++;
  }

  has(url: string): boolean {
    return this.visited.has(url);
  }

  get discoveredCount(): number {
    return this.discovered;
  }

  get atLimit(): boolean {
    return this.discovered >= this.limits.maxDiscoveries;
  }

  get size(): number {
    return this.queue.length;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  get visitedCount(): number {
    return this.visited.size;
  }
}
