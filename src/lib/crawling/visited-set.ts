/**
 * Visited Set
 * Job-scoped record of canonical URLs already enqueued or fetched
 */

export class VisitedSet {
  private visitedUrls: Set<string> = new Set();

  /**
   * Check if URL has already been visited
   */
  isVisited(url: string): boolean {
    return this.visitedUrls.has(url);
  }

  /**
   * Check-and-mark in one synchronous step. Returns true only for the
   * first caller; workers interleave at await points, never inside this call.
   */
  markVisited(url: string): boolean {
    if (this.visitedUrls.has(url)) {
      return false;
    }

    this.visitedUrls.add(url);
    return true;
  }

  get size(): number {
    return this.visitedUrls.size;
  }
}
