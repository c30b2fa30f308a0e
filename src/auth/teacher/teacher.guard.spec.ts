import { ForbiddenException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { WsException } from '@nestjs/websockets';
import { TeacherGuard } from './teacher.guard';

function httpContext(user: unknown): ExecutionContextHost {
  return new ExecutionContextHost([{ user }, {}]);
}

function wsContext(user: unknown): ExecutionContextHost {
  const context = new ExecutionContextHost([{ id: 'socket-1', user }, {}]);
  context.setType('ws');
  return context;
}

describe('TeacherGuard', () => {
  const guard = new TeacherGuard();
  const teacher = { userId: 'teacher-1', userName: 'Ms. Park', role: 'teacher' };
  const student = { userId: 'student-1', userName: 'Kim', role: 'student' };

  it('lets teachers through', () => {
    expect(guard.canActivate(httpContext(teacher))).toBe(true);
    expect(guard.canActivate(wsContext(teacher))).toBe(true);
  });

  it('refuses students over http and ws', () => {
    expect(() => guard.canActivate(httpContext(student))).toThrow(
      new ForbiddenException('Only teachers can do this.'),
    );
    expect(() => guard.canActivate(wsContext(student))).toThrow(WsException);
  });

  it('refuses requests without a user', () => {
    expect(() => guard.canActivate(httpContext(undefined))).toThrow('Not authenticated.');
  });
});
