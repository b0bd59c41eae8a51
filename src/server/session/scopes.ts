/**
 * Scope verification
 * Compares the scopes granted with a token against the scopes requested.
 */

import { REFRESH_SCOPE } from './sessionConfig.js';
import { logSessionEvent } from './logger.js';

export interface ScopeComparison {
  matches: boolean;
  /** Requested but not granted */
  missing: string[];
  /** Granted but not requested */
  unexpected: string[];
}

function scopeSet(scopes: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const scope of scopes) {
    const key = scope.toLowerCase();
    // offline_access drives the refresh flow; it is not an API permission
    if (key && key !== REFRESH_SCOPE) set.add(key);
  }
  return set;
}

export function compareScopes(requested: readonly string[], grantedScope: string): ScopeComparison {
  const expected = scopeSet(requested);
  const granted = scopeSet(grantedScope.split(' '));

  const missing = [...expected].filter(scope => !granted.has(scope));
  const unexpected = [...granted].filter(scope => !expected.has(scope));

  return {
    matches: missing.length === 0 && unexpected.length === 0,
    missing,
    unexpected,
  };
}

/**
 * Warn when the provider granted a different scope set than requested.
 * The session stays usable with whatever was granted.
 */
export function verifyScopes(requested: readonly string[], grantedScope: string): ScopeComparison {
  const comparison = compareScopes(requested, grantedScope);
  if (!comparison.matches) {
    console.warn(
      `[session] scopes [${requested.join(', ')}] requested, but scopes [${grantedScope}] returned with token`,
    );
    logSessionEvent('scope_mismatch', {
      missing: comparison.missing,
      unexpected: comparison.unexpected,
    });
  }
  return comparison;
}
