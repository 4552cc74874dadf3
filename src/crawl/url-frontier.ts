/**
 * BFS URL frontier with a shared visited set and depth tracking
 */

export interface FrontierEntry {
  url: string;
  depth: number;
}

/**
 * Every URL ever accepted into a frontier. Grows monotonically; membership is the
 * only deduplication mechanism, so acceptance goes through the atomic
 * {@link VisitedSet.markVisited} rather than a `has` check followed by an insert.
 */
export class VisitedSet {
  private urls = new Set<string>();

  /** Insert `url`. Returns false when it was already present. */
  markVisited(url: string): boolean {
    if (this.urls.has(url)) return false;
    this.urls.add(url);
    return true;
  }

  has(url: string): boolean {
    return this.urls.has(url);
  }

  get size(): number {
    return this.urls.size;
  }

  values(): string[] {
    return Array.from(this.urls);
  }
}

export interface FrontierOptions {
  maxDepth?: number;
  visited?: VisitedSet;
}

export class UrlFrontier {
  private queue: FrontierEntry[] = [];
  private visited: VisitedSet;
  private maxDepth: number;
  private dequeued = 0;

  constructor(options: FrontierOptions = {}) {
    this.maxDepth = options.maxDepth ?? 10;
    this.visited = options.visited ?? new VisitedSet();
  }

  /**
   * Enqueue an already-normalized URL. Entries deeper than `maxDepth` are refused
   * without being marked visited.
   */
  add(url: string, depth: number): boolean {
    if (depth > this.maxDepth) return false;
    if (!this.visited.markVisited(url)) return false;

    this.queue.push({ url, depth });
    return true;
  }

  /** Earliest entry, or null once the frontier is exhausted. */
  next(): FrontierEntry | null {
    const entry = this.queue.shift() ?? null;
    if (entry) this.dequeued++;
    return entry;
  }

  hasMore(): boolean {
    return this.queue.length > 0;
  }

  isVisited(url: string): boolean {
    return this.visited.has(url);
  }

  get processedCount(): number {
    return this.dequeued;
  }

  get visitedCount(): number {
    return this.visited.size;
  }

  get pendingCount(): number {
    return this.queue.length;
  }
}
