import { describe, expect, it } from 'vitest';
import { validateReadOnlySql } from '../tools/sqlGuard.js';

describe('validateReadOnlySql', () => {
  it('accepts SELECT and WITH queries regardless of case and padding', () => {
    expect(validateReadOnlySql('SELECT metric_name FROM data_points')).toEqual({ ok: true });
    expect(validateReadOnlySql('  with recent as (select 1 as x) select * from recent')).toEqual({ ok: true });
    expect(validateReadOnlySql('SELECT 1;')).toEqual({ ok: true });
  });

  it('does not confuse column names with forbidden keywords', () => {
    expect(validateReadOnlySql('SELECT created_at, updated_at FROM documents LIMIT 5 OFFSET 5')).toEqual({ ok: true });
  });

  it('rejects statements that do not start with SELECT or WITH', () => {
    const result = validateReadOnlySql('DELETE FROM data_points');

    expect(result).toEqual({
      ok: false,
      rule: 'select_only',
      message: 'Only SELECT queries are allowed. Query must start with SELECT or WITH.'
    });
  });

  it('rejects forbidden keywords before looking at statement separators', () => {
    const result = validateReadOnlySql('SELECT * FROM data_points; DROP TABLE data_points');

    expect(result).toEqual({
      ok: false,
      rule: 'forbidden_keyword',
      message: 'Forbidden SQL keyword detected: DROP. Only SELECT queries are allowed.'
    });
  });

  it('treats keywords inside string literals as forbidden too', () => {
    const result = validateReadOnlySql("SELECT * FROM documents WHERE title = 'set'");

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.rule).toBe('forbidden_keyword');
  });

  it('rejects attaching another database', () => {
    const result = validateReadOnlySql("SELECT 1 FROM data_points WHERE 1 = 0 UNION SELECT 1 FROM (SELECT 1) ATTACH");

    expect(result.ok === false && result.message).toBe(
      'Forbidden SQL keyword detected: ATTACH. Only SELECT queries are allowed.'
    );
  });

  it('rejects multiple statements', () => {
    expect(validateReadOnlySql('SELECT 1; SELECT 2')).toEqual({
      ok: false,
      rule: 'multiple_statements',
      message: 'Multiple SQL statements are not allowed. Please use a single SELECT query.'
    });
  });

  it('rejects comments', () => {
    expect(validateReadOnlySql('SELECT 1 -- trailing')).toEqual({
      ok: false,
      rule: 'comments',
      message: 'SQL comments are not allowed.'
    });
    expect(validateReadOnlySql('SELECT /* hidden */ 1').ok).toBe(false);
  });
});
