export const SCOPES = ['project', 'package', 'module', 'class', 'function'] as const;

export type Scope = (typeof SCOPES)[number];

export function isScope(value: unknown): value is Scope {
  return typeof value === 'string' && (SCOPES as readonly string[]).includes(value);
}

/** Lower rank = wider scope. Used for model selection and listing order only. */
export function scopeRank(scope: Scope): number {
  return SCOPES.indexOf(scope);
}

export function compareScopes(a: Scope, b: Scope): number {
  return scopeRank(a) - scopeRank(b);
}
