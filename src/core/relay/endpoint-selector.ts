/**
 * Webhook selection
 */

/** Returns a float in [0, 1), like Math.random */
export type RandomSource = () => number;

/**
 * Picks one endpoint per call, uniformly at random, so traffic spreads
 * across every configured webhook.
 */
export class EndpointSelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  select(pool: readonly string[]): string | undefined {
    if (pool.length === 0) return undefined;

    const index = Math.min(Math.floor(this.random() * pool.length), pool.length - 1);
    return pool[index];
  }
}
