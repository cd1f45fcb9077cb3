/**
 * Service account scope aliases, as accepted by `gcloud --scopes`.
 */

export const SCOPE_ALIASES = Object.freeze({
  "storage-ro": "https://www.googleapis.com/auth/devstorage.read_only",
  "storage-rw": "https://www.googleapis.com/auth/devstorage.read_write",
  "compute-ro": "https://www.googleapis.com/auth/compute.read_only",
  "compute-rw": "https://www.googleapis.com/auth/compute",
  monitoring: "https://www.googleapis.com/auth/monitoring",
  "monitoring-write": "https://www.googleapis.com/auth/monitoring.write",
  "logging-write": "https://www.googleapis.com/auth/logging.write",
} as const);

export type ScopeAlias = keyof typeof SCOPE_ALIASES;

export function isScopeAlias(s: string): s is ScopeAlias {
  return Object.prototype.hasOwnProperty.call(SCOPE_ALIASES, s);
}

/** Long-form scope URI for an alias; anything else is returned unchanged */
export function expandScopeAlias(s: string): string {
  return isScopeAlias(s) ? SCOPE_ALIASES[s] : s;
}

/** Alias for a long-form scope URI; unmatched URIs are returned unchanged */
export function shortenScope(s: string): string {
  for (const [alias, uri] of Object.entries(SCOPE_ALIASES)) {
    if (uri === s) return alias;
  }
  return s;
}
