import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcrypt';

/**
 * Credential hashing. Digests are opaque to the rest of the application.
 */
@Injectable()
export class PasswordService {
  private readonly rounds: number;

  constructor(configService: ConfigService) {
    this.rounds = configService.get<number>('auth.bcryptRounds', 10);
  }

  async hash(password: string): Promise<string> {
    return bcrypt.hash(password, this.rounds);
  }

  async verify(password: string, digest: string): Promise<boolean> {
    return bcrypt.compare(password, digest);
  }
}
