/**
 * Crawl Frontier
 * The CrawlTasks scheduled for one depth level
 */

import { CrawlTask } from './crawling.types';
import { extractDomain } from './url-normalizer';

export class CrawlFrontier {
  private tasks: CrawlTask[] = [];

  constructor(public readonly depth: number) {}

  /**
   * Add a task; its depth must match the level
   */
  add(task: CrawlTask): void {
    if (task.depth !== this.depth) {
      throw new Error(`Task depth ${task.depth} does not match frontier depth ${this.depth}`);
    }
    this.tasks.push(task);
  }

  isEmpty(): boolean {
    return this.tasks.length === 0;
  }

  size(): number {
    return this.tasks.length;
  }

  /**
   * Tasks in dispatch order: round-robin across hosts, discovery order within a host,
   * so a host with many links cannot occupy every worker at the start of a level.
   */
  drain(): CrawlTask[] {
    const byDomain = new Map<string, CrawlTask[]>();
    for (const task of this.tasks) {
      const domain = extractDomain(task.url);
      const bucket = byDomain.get(domain);
      if (bucket) {
        bucket.push(task);
      } else {
        byDomain.set(domain, [task]);
      }
    }

    const ordered: CrawlTask[] = [];
    const buckets = Array.from(byDomain.values());
    for (let round = 0; ordered.length < this.tasks.length; round++) {
      for (const bucket of buckets) {
        if (round < bucket.length) {
          ordered.push(bucket[round]);
        }
      }
    }

    this.tasks = [];
    return ordered;
  }
}
