import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';

@Injectable()
export class RandomService {
  /**
   * Generates a numeric code where each digit is drawn independently from a CSPRNG.
   */
  numericCode(length: number): string {
    let code = '';
    for (let i = 0; i < length; i++) {
      code += crypto.randomInt(0, 10).toString();
    }
    return code;
  }

  uuid(): string {
    return crypto.randomUUID();
  }
}
