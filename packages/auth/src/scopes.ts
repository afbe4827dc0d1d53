/**
 * OAuth scopes requested for document access
 */

export const GOOGLE_DOCS_SCOPE = 'https://www.googleapis.com/auth/documents';
export const GOOGLE_DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive';

/** Requested together in a single consent grant */
export const DOCUMENT_SCOPES: readonly string[] = [GOOGLE_DOCS_SCOPE, GOOGLE_DRIVE_SCOPE];

/**
 * Split a space-delimited scope string from a token response
 */
export function parseScopes(scope: string | null | undefined): string[] | undefined {
  if (!scope) {
    return undefined;
  }
  const scopes = scope.split(/\s+/).filter(entry => entry.length > 0);
  return scopes.length > 0 ? scopes : undefined;
}

/**
 * Scopes from `required` that `granted` lacks
 */
export function missingScopes(granted: readonly string[], required: readonly string[] = DOCUMENT_SCOPES): string[] {
  const grantedSet = new Set(granted);
  return required.filter(scope => !grantedSet.has(scope));
}
