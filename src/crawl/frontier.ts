export interface FrontierEntry {
  url: string;
  depth: number;
  referrer: string;
}

export type OfferResult = 'accepted' | 'duplicate' | 'capped';

/**
 * Pending crawl work plus the set of every URL ever accepted. `offer` checks
 * and inserts in one synchronous step, so no two workers can enqueue the same
 * canonical URL. `capacity` bounds the number of URLs ever accepted.
 */
export class Frontier {
  private readonly seen = new Set<string>();
  private readonly queue: FrontierEntry[] = [];
  private accepted = 0;
  private refused = false;

  constructor(private readonly capacity: number) {}

  offer(entry: FrontierEntry): OfferResult {
    if (this.seen.has(entry.url)) {
      return 'duplicate';
    }
    if (this.accepted >= this.capacity) {
      this.refused = true;
      return 'capped';
    }

    this.seen.add(entry.url);
    this.queue.push(entry);
    this.accepted++;
    return 'accepted';
  }

  /**
   * Marks a URL as seen without scheduling it (the target of a redirect that
   * has just been fetched). Returns false when it was already known.
   */
  claim(url: string): boolean {
    if (this.seen.has(url)) {
      return false;
    }
    this.seen.add(url);
    return true;
  }

  take(): FrontierEntry | undefined {
    return this.queue.shift();
  }

  get pending(): number {
    return this.queue.length;
  }

  get enqueued(): number {
    return this.accepted;
  }

  get capReached(): boolean {
    return this.refused;
  }
}
