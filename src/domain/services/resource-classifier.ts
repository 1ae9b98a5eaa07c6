/**
 * Resource Classifier
 *
 * Picks the one catalog entry responsible for an ARN. Match tokens overlap
 * (`loadbalancer` is a prefix of `loadbalancer/app`), so the longest token
 * found in the ARN wins.
 */

import type { CatalogEntry } from '../entities/catalog-entry.js';

export type ClassificationResult =
  | { readonly kind: 'matched'; readonly entry: CatalogEntry }
  /** Selected entry must not render this ARN */
  | { readonly kind: 'excluded'; readonly entry: CatalogEntry }
  | { readonly kind: 'unmatched' };

/** Path segments that mark a v2 load balancer ARN */
const V2_LOAD_BALANCER_SEGMENTS = ['loadbalancer/app/', 'loadbalancer/net/'] as const;

function isBetterMatch(candidate: CatalogEntry, current: CatalogEntry | undefined): boolean {
  if (!current) return true;
  if (candidate.idToken.length !== current.idToken.length) {
    return candidate.idToken.length > current.idToken.length;
  }
  return candidate.family < current.family;
}

export function classify(arn: string, catalog: readonly CatalogEntry[]): ClassificationResult {
  let best: CatalogEntry | undefined;

  for (const entry of catalog) {
    if (arn.includes(entry.idToken) && isBetterMatch(entry, best)) {
      best = entry;
    }
  }

  if (!best) {
    return { kind: 'unmatched' };
  }

  // A v2 load balancer whose own family is disabled falls through to the
  // classic entry, which would chart it under the wrong namespace.
  if (
    best.family === 'classic_elb' &&
    V2_LOAD_BALANCER_SEGMENTS.some(segment => arn.includes(segment))
  ) {
    return { kind: 'excluded', entry: best };
  }

  return { kind: 'matched', entry: best };
}
