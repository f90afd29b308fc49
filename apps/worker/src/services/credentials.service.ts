/**
 * Stored credentials (source passwords, provider API keys) are kept in the
 * `*_encrypted` / `db_password` columns as-is. No cipher is applied yet, so
 * decryption returns its input; callers still go through this function so a
 * real scheme can be dropped in without touching them.
 */
export function decryptCredential(stored: string): string {
  return stored;
}
