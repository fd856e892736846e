import { NotFoundException } from '@nestjs/common';
import { ValidationException } from '../../common/exceptions/domain.exceptions';
import { UserRole } from '../domain/user.entity';
import { UsersService } from './users.service';
import { InMemoryUserRepository } from '../../../test/fakes/in-memory-user.repository';

describe('UsersService', () => {
  let repository: InMemoryUserRepository;
  let service: UsersService;

  beforeEach(() => {
    repository = new InMemoryUserRepository();
    service = new UsersService(repository);
  });

  it('registers users as verified', async () => {
    const user = await service.register('09120000001');

    expect(user.isPhoneVerified).toBe(true);
    expect(user.role).toBe(UserRole.USER);
    await expect(service.findByPhoneNumber('09120000001')).resolves.toMatchObject({ id: user.id });
  });

  it('leaves an already verified user untouched', async () => {
    const user = repository.seed({ phoneNumber: '09120000001', isPhoneVerified: true });
    const update = jest.spyOn(repository, 'update');

    await service.markPhoneVerified(user);

    expect(update).not.toHaveBeenCalled();
  });

  it('updates the national id on the profile', async () => {
    const user = repository.seed({ phoneNumber: '09120000001' });

    const profile = await service.updateProfile(user.id ?? '', { nationalId: '1234567890' });

    expect(profile.nationalId).toBe('1234567890');
    expect(profile.phoneNumber).toBe('09120000001');
  });

  it('keeps the national id when none is given', async () => {
    const user = repository.seed({ phoneNumber: '09120000001', nationalId: '1234567890' });

    await expect(service.updateProfile(user.id ?? '', {})).resolves.toMatchObject({
      nationalId: '1234567890',
    });
  });

  it('rejects a malformed national id', async () => {
    const user = repository.seed({ phoneNumber: '09120000001' });

    await expect(service.updateProfile(user.id ?? '', { nationalId: '12345' })).rejects.toThrow(
      ValidationException,
    );
  });

  it('reports unknown users', async () => {
    await expect(service.getProfile('missing')).rejects.toThrow(NotFoundException);
  });
});
