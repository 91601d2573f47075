import { Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

/**
 * Requires a valid bearer token; attaches the live principal as `request.user`
 */
@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {}
