import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { AuthenticatedUser, extractToken, parseConnectionRole } from '../types/socket.types';

interface JwtPayload {
  sub: string; // user id
  email?: string;
  user_metadata?: {
    nickname?: string;
    role?: string; // teacher | student | viewer
  };
}

// Clients connect with the token issued at login:
/*
    const socket = io("http://localhost:3000", {
        auth: { token: "<access token>" }
    });
*/

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(configService: ConfigService) {
    super({
      jwtFromRequest: ExtractJwt.fromExtractors([extractToken]),
      ignoreExpiration: false,
      secretOrKey: configService.getOrThrow<string>('SUPABASE_JWT_SECRET'),
    });
  }

  // the returned object ends up on `client.user` (ws) or `request.user` (http)
  validate(payload: JwtPayload): AuthenticatedUser {
    return {
      userId: payload.sub,
      userName: payload.user_metadata?.nickname ?? payload.email ?? payload.sub,
      role: parseConnectionRole(payload.user_metadata?.role) ?? 'student',
    };
  }
}
