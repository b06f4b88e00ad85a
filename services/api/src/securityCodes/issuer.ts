import { randomInt } from 'node:crypto';
import type { Logger } from 'pino';
import {
  SECURITY_CODE_ALPHABET,
  SECURITY_CODE_LENGTH,
  securityCodeKeyspaceSize,
} from '@roomsafe/shared';
import { ExhaustedKeyspaceError } from '../errors/domain.js';

export interface IssuedSecurityCode {
  id: string;
  code: string;
  /** YYYY-MM-DD */
  issueDate: string;
}

export interface SecurityCodeStore {
  /**
   * Inserts the code for the date. Returns null when the code was already
   * issued that date (unique collision), never a duplicate row.
   */
  tryInsertCode(issueDate: string, code: string): Promise<IssuedSecurityCode | null>;
  countCodesIssued(issueDate: string): Promise<number>;
}

export interface SecurityCodeIssuerOptions {
  alphabet?: string;
  length?: number;
  maxAttempts?: number;
  /** Returns an integer in [0, max). Defaults to crypto.randomInt. */
  randomIndex?: (max: number) => number;
}

/**
 * Issues short codes unique per calendar date. Collisions are resolved by the
 * store's (issue_date, code) uniqueness, so concurrent issuers never hand out
 * the same code.
 */
export class SecurityCodeIssuer {
  private readonly alphabet: string;
  private readonly length: number;
  private readonly maxAttempts: number;
  private readonly randomIndex: (max: number) => number;

  constructor(
    private readonly store: SecurityCodeStore,
    private readonly logger: Logger,
    opts: SecurityCodeIssuerOptions = {}
  ) {
    this.alphabet = opts.alphabet ?? SECURITY_CODE_ALPHABET;
    this.length = opts.length ?? SECURITY_CODE_LENGTH;
    this.maxAttempts = opts.maxAttempts ?? 10;
    this.randomIndex = opts.randomIndex ?? ((max) => randomInt(max));
  }

  async issue(issueDate: string): Promise<IssuedSecurityCode> {
    const keyspace = securityCodeKeyspaceSize(this.alphabet, this.length);
    const issued = await this.store.countCodesIssued(issueDate);
    if (issued >= keyspace) {
      this.logger.error({ issueDate, issued, keyspace }, 'Security code keyspace exhausted');
      throw new ExhaustedKeyspaceError(issueDate, 0);
    }

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const code = this.generate();
      const inserted = await this.store.tryInsertCode(issueDate, code);
      if (inserted) {
        if (attempt > 1) {
          this.logger.debug({ issueDate, attempt }, 'Security code issued after collision');
        }
        return inserted;
      }
    }

    this.logger.error(
      { issueDate, attempts: this.maxAttempts, issued },
      'Could not find an unused security code'
    );
    throw new ExhaustedKeyspaceError(issueDate, this.maxAttempts);
  }

  private generate(): string {
    let code = '';
    for (let i = 0; i < this.length; i++) {
      code += this.alphabet.charAt(this.randomIndex(this.alphabet.length));
    }
    return code;
  }
}
