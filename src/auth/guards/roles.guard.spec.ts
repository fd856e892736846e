import { Reflector } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { UserRole } from '../../users/domain/user.entity';
import { Roles } from '../decorators/roles.decorator';
import { RolesGuard } from './roles.guard';

class TargetController {
  @Roles(UserRole.ADMIN)
  adminOnly(): void {}

  open(): void {}
}

describe('RolesGuard', () => {
  const guard = new RolesGuard(new Reflector());
  const target = new TargetController();
  const context = (user: unknown, handler: () => void) =>
    new ExecutionContextHost([{ user }], TargetController, handler);

  it('lets anyone through routes without roles', () => {
    expect(guard.canActivate(context(undefined, target.open))).toBe(true);
  });

  it('admits users with a required role', () => {
    const admin = { userId: 'user-1', phoneNumber: '09120000001', role: UserRole.ADMIN };
    expect(guard.canActivate(context(admin, target.adminOnly))).toBe(true);
  });

  it('rejects other roles and anonymous requests', () => {
    const user = { userId: 'user-2', phoneNumber: '09120000002', role: UserRole.USER };
    expect(guard.canActivate(context(user, target.adminOnly))).toBe(false);
    expect(guard.canActivate(context(undefined, target.adminOnly))).toBe(false);
  });
});
