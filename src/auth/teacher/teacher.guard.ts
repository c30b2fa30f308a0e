import { CanActivate, ExecutionContext, ForbiddenException, Injectable, Logger } from '@nestjs/common';
import { WsException } from '@nestjs/websockets';
import { getRequestUser } from '../../types/socket.types';

/** Lets only users with the teacher role through. Runs after JwtAuthGuard. */
@Injectable()
export class TeacherGuard implements CanActivate {
  private readonly logger = new Logger(TeacherGuard.name);

  canActivate(context: ExecutionContext): boolean {
    const isWs = context.getType() === 'ws';
    const request: unknown = isWs
      ? context.switchToWs().getClient<unknown>()
      : context.switchToHttp().getRequest<unknown>();
    const user = getRequestUser(request);

    if (!user) {
      this.logger.warn('Rejected request without an authenticated user');
      throw isWs ? new WsException('Not authenticated.') : new ForbiddenException('Not authenticated.');
    }
    if (user.role !== 'teacher') {
      this.logger.warn(`Rejected ${user.role} ${user.userId}: teacher role required`);
      throw isWs
        ? new WsException('Only teachers can do this.')
        : new ForbiddenException('Only teachers can do this.');
    }
    return true;
  }
}
