import { countsAsFailedAttempt, type PickupVerificationResult } from '@roomsafe/shared';
import type { OperationOptions } from '../checkin/service.js';
import type { PickupAttemptLimiter } from './rateLimiter.js';
import type { PickupService, VerifyPickupRequest } from './service.js';

export type GatedVerification =
  | { kind: 'RATE_LIMITED'; retryAfterMs: number }
  | { kind: 'VERIFIED'; result: PickupVerificationResult };

/**
 * Puts the attempt limiter in front of pickup verification. Authorized
 * results clear the counter; outcomes a supervisor can resolve leave it alone.
 */
export class PickupVerificationGate {
  constructor(
    private readonly limiter: PickupAttemptLimiter,
    private readonly pickups: PickupService
  ) {}

  async verify(
    request: VerifyPickupRequest,
    originId: string,
    opts: OperationOptions = {}
  ): Promise<GatedVerification> {
    const retryAfterMs = this.limiter.getRetryAfter(request.attendanceId, originId);
    if (retryAfterMs !== null) {
      return { kind: 'RATE_LIMITED', retryAfterMs };
    }

    const result = await this.pickups.verify(request, opts);
    if (result.isAuthorized) {
      this.limiter.resetAttempts(request.attendanceId, originId);
    } else if (countsAsFailedAttempt(result.outcome)) {
      this.limiter.recordFailedAttempt(request.attendanceId, originId);
    }

    return { kind: 'VERIFIED', result };
  }
}
