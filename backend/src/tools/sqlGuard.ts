export const FORBIDDEN_SQL_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'ALTER',
  'CREATE',
  'TRUNCATE',
  'REPLACE',
  'GRANT',
  'REVOKE',
  'EXECUTE',
  'EXEC',
  'CALL',
  'MERGE',
  'UPSERT',
  'RENAME',
  'MODIFY',
  'VACUUM',
  'REINDEX',
  'CLUSTER',
  'COPY',
  'LOAD',
  'IMPORT',
  'EXPORT',
  'BACKUP',
  'RESTORE',
  'COMMIT',
  'ROLLBACK',
  'SAVEPOINT',
  'SET',
  'LOCK',
  'UNLOCK',
  'KILL',
  'SHUTDOWN',
  'PRAGMA',
  'ATTACH',
  'DETACH'
] as const;

export type SqlGuardRule = 'select_only' | 'forbidden_keyword' | 'multiple_statements' | 'comments';

export type SqlGuardResult = { ok: true } | { ok: false; rule: SqlGuardRule; message: string };

const KEYWORD_PATTERNS = FORBIDDEN_SQL_KEYWORDS.map((keyword) => ({
  keyword,
  pattern: new RegExp(`\\b${keyword}\\b`)
}));

/**
 * Lexical read-only check, applied in order: leading SELECT/WITH, no denylisted keyword
 * as a whole word (string literals included), at most one trailing semicolon, no
 * comment markers. It does not parse SQL.
 */
export function validateReadOnlySql(sql: string): SqlGuardResult {
  const normalized = sql.toUpperCase().trim();

  if (!normalized.startsWith('SELECT') && !normalized.startsWith('WITH')) {
    return {
      ok: false,
      rule: 'select_only',
      message: 'Only SELECT queries are allowed. Query must start with SELECT or WITH.'
    };
  }

  for (const { keyword, pattern } of KEYWORD_PATTERNS) {
    if (pattern.test(normalized)) {
      return {
        ok: false,
        rule: 'forbidden_keyword',
        message: `Forbidden SQL keyword detected: ${keyword}. Only SELECT queries are allowed.`
      };
    }
  }

  if (sql.trim().replace(/;+$/, '').includes(';')) {
    return {
      ok: false,
      rule: 'multiple_statements',
      message: 'Multiple SQL statements are not allowed. Please use a single SELECT query.'
    };
  }

  if (sql.includes('--') || sql.includes('/*')) {
    return { ok: false, rule: 'comments', message: 'SQL comments are not allowed.' };
  }

  return { ok: true };
}
