import { Injectable } from '@nestjs/common';

/**
 * Wall-clock source for every expiry decision in the auth core.
 * Swapped for a fake in tests.
 */
@Injectable()
export class ClockService {
  /** Current time in epoch milliseconds. */
  now(): number {
    return Date.now();
  }
}
