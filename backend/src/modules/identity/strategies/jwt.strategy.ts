import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { resolveJwtSecret } from '@/config/auth.config';
import { Principal } from '@/modules/authorization/principal';
import { AuthService, JwtPayload } from '../services/auth.service';

/**
 * Verifies the bearer token, then loads the live principal: a disabled or
 * deleted account is rejected even while its token is unexpired.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    configService: ConfigService,
    private readonly authService: AuthService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: resolveJwtSecret(configService),
    });
  }

  async validate(payload: JwtPayload): Promise<Principal> {
    return this.authService.validateJwt(payload);
  }
}
