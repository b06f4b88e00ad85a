import type pg from 'pg';
import type { IssuedSecurityCode, SecurityCodeStore } from './issuer.js';

export class PgSecurityCodeStore implements SecurityCodeStore {
  constructor(private readonly pool: pg.Pool) {}

  async tryInsertCode(issueDate: string, code: string): Promise<IssuedSecurityCode | null> {
    const result = await this.pool.query<{ id: string }>(
      `INSERT INTO security_codes (issue_date, code)
       VALUES ($1::date, $2)
       ON CONFLICT ON CONSTRAINT uq_security_codes_issue_date_code DO NOTHING
       RETURNING id`,
      [issueDate, code]
    );
    const row = result.rows[0];
    return row ? { id: row.id, code, issueDate } : null;
  }

  async countCodesIssued(issueDate: string): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      'SELECT COUNT(*)::int AS count FROM security_codes WHERE issue_date = $1::date',
      [issueDate]
    );
    return result.rows[0]?.count ?? 0;
  }
}
