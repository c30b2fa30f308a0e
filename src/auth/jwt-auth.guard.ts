import { ExecutionContext, Injectable, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { WsException } from '@nestjs/websockets';
import { Socket } from 'socket.io';
import { AuthenticatedUser, isAuthenticatedUser } from '../types/socket.types';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  /**
   * Passport expects an HTTP request; for socket messages the socket itself
   * plays that role (the token is read from its handshake).
   */
  getRequest(context: ExecutionContext) {
    if (context.getType() === 'ws') {
      return context.switchToWs().getClient<Socket>();
    }
    return context.switchToHttp().getRequest<unknown>();
  }

  handleRequest<TUser = AuthenticatedUser>(
    err: unknown,
    user: unknown,
    info: unknown,
    context: ExecutionContext,
  ): TUser {
    const fail = (message: string) =>
      context.getType() === 'ws' ? new WsException(message) : new UnauthorizedException(message);

    if (err) {
      throw err instanceof Error ? err : fail('Authentication failed.');
    }
    if (!isAuthenticatedUser(user)) {
      const message = info instanceof Error ? info.message : 'Unauthenticated user.';
      throw fail(message);
    }
    return user as TUser;
  }
}
