import { Injectable } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { createHash } from 'node:crypto';

@Injectable()
export class HashingService {
  async hash(data: string): Promise<string> {
    const salt = await bcrypt.genSalt();
    return bcrypt.hash(this.digest(data), salt);
  }

  async compare(data: string, encrypted: string): Promise<boolean> {
    return bcrypt.compare(this.digest(data), encrypted);
  }

  // bcrypt only reads the first 72 bytes; JWTs for one user share a long prefix
  private digest(data: string): string {
    return createHash('sha256').update(data).digest('base64');
  }
}
