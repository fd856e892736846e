import { UnauthorizedException } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import {
  MessageDeliveryException,
  UserAlreadyExistsException,
  UserNotFoundException,
  ValidationException,
} from '../common/exceptions/domain.exceptions';
import { OtpService } from '../otp/application/otp.service';
import { OtpPurpose } from '../otp/domain/otp-code.entity';
import { UsersService } from '../users/application/users.service';
import { UserRole } from '../users/domain/user.entity';
import { TokenService } from './application/token.service';
import { AuthService } from './auth.service';
import { InMemoryOtpCodeRepository } from '../../test/fakes/in-memory-otp-code.repository';
import { InMemoryUserRepository } from '../../test/fakes/in-memory-user.repository';
import { InMemoryRedisService } from '../../test/fakes/in-memory-redis.service';
import { FakeMessageSender } from '../../test/fakes/fake-message-sender';
import { FakeSecretHasher } from '../../test/fakes/fake-secret-hasher';
import { TestConfigService } from '../../test/fakes/test-config.service';

const PHONE = '09120000001';
const now = new Date('2026-10-18T10:00:00Z');

describe('AuthService', () => {
  let users: InMemoryUserRepository;
  let sender: FakeMessageSender;
  let redis: InMemoryRedisService;
  let tokenService: TokenService;
  let service: AuthService;

  function build(config: TestConfigService = new TestConfigService()): void {
    const usersService = new UsersService(users);
    const otpService = new OtpService(new InMemoryOtpCodeRepository(), new FakeSecretHasher(), config);
    tokenService = new TokenService(new JwtService({ secret: 'test-secret' }), redis, config);
    service = new AuthService(usersService, otpService, tokenService, config, sender);
  }

  const lastCode = () => sender.sent[sender.sent.length - 1].token;

  beforeEach(() => {
    users = new InMemoryUserRepository();
    sender = new FakeMessageSender();
    redis = new InMemoryRedisService();
    build();
  });

  describe('requestOtp', () => {
    it('sends a code to the normalized number', async () => {
      const result = await service.requestOtp(
        { phoneNumber: '0912 000-0001', purpose: OtpPurpose.REGISTER },
        now,
      );

      expect(result).toEqual({
        message: 'OTP code has been sent to your phone number',
        expiresInMinutes: 5,
      });
      expect(sender.sent).toHaveLength(1);
      expect(sender.sent[0]).toMatchObject({ phoneNumber: PHONE, template: 'otp-template' });
      expect(sender.sent[0].token).toMatch(/^\d{6}$/);
    });

    it('requires an account for login', async () => {
      await expect(
        service.requestOtp({ phoneNumber: PHONE, purpose: OtpPurpose.LOGIN }, now),
      ).rejects.toThrow(UserNotFoundException);
    });

    it('refuses to register an existing number', async () => {
      users.seed({ phoneNumber: PHONE });

      await expect(
        service.requestOtp({ phoneNumber: PHONE, purpose: OtpPurpose.REGISTER }, now),
      ).rejects.toThrow(UserAlreadyExistsException);
    });

    it('rejects numbers shorter than ten digits', async () => {
      await expect(
        service.requestOtp({ phoneNumber: '0912-123', purpose: OtpPurpose.REGISTER }, now),
      ).rejects.toThrow(ValidationException);
    });

    it('surfaces delivery failures', async () => {
      sender.rejecting.add(PHONE);

      await expect(
        service.requestOtp({ phoneNumber: PHONE, purpose: OtpPurpose.REGISTER }, now),
      ).rejects.toThrow(MessageDeliveryException);
    });
  });

  describe('verifyOtp', () => {
    it('registers a verified user and issues tokens', async () => {
      await service.requestOtp({ phoneNumber: PHONE, purpose: OtpPurpose.REGISTER }, now);

      const result = await service.verifyOtp(
        { phoneNumber: PHONE, code: lastCode(), purpose: OtpPurpose.REGISTER },
        now,
      );

      expect(result.created).toBe(true);
      expect(result.message).toBe('User registered successfully');
      expect(result.user).toMatchObject({ phoneNumber: PHONE, isPhoneVerified: true, role: UserRole.USER });
      await expect(tokenService.validate(result.accessToken, 'access')).resolves.toMatchObject({
        sub: result.user.id,
        type: 'access',
      });
      await expect(tokenService.validate(result.refreshToken, 'refresh')).resolves.toMatchObject({
        sub: result.user.id,
        type: 'refresh',
      });
    });

    it('logs in an existing user and grants the configured admin role', async () => {
      build(new TestConfigService({ adminPhoneNumbers: [PHONE] }));
      users.seed({ id: 'user-1', phoneNumber: PHONE, isPhoneVerified: false });
      await service.requestOtp({ phoneNumber: PHONE, purpose: OtpPurpose.LOGIN }, now);

      const result = await service.verifyOtp(
        { phoneNumber: PHONE, code: lastCode(), purpose: OtpPurpose.LOGIN },
        now,
      );

      expect(result.created).toBe(false);
      expect(result.message).toBe('Login successful');
      expect(result.user).toMatchObject({ id: 'user-1', isPhoneVerified: true, role: UserRole.ADMIN });
    });
  });

  describe('refresh and logout', () => {
    async function login() {
      users.seed({ id: 'user-1', phoneNumber: PHONE, isPhoneVerified: true });
      await service.requestOtp({ phoneNumber: PHONE, purpose: OtpPurpose.LOGIN }, now);
      return service.verifyOtp({ phoneNumber: PHONE, code: lastCode(), purpose: OtpPurpose.LOGIN }, now);
    }

    it('issues a new access token from a refresh token', async () => {
      const { refreshToken } = await login();

      const result = await service.refresh({ refreshToken });

      await expect(tokenService.validate(result.accessToken, 'access')).resolves.toMatchObject({
        sub: 'user-1',
      });
    });

    it('does not accept an access token as a refresh token', async () => {
      const { accessToken } = await login();

      await expect(service.refresh({ refreshToken: accessToken })).rejects.toThrow(
        UnauthorizedException,
      );
    });

    it('revokes the refresh token on logout', async () => {
      const { refreshToken } = await login();

      await service.logout('user-1', { refreshToken });

      expect(redis.store.size).toBe(1);
      await expect(service.refresh({ refreshToken })).rejects.toThrow(UnauthorizedException);
    });

    it('ignores refresh tokens belonging to someone else', async () => {
      const { refreshToken } = await login();

      await service.logout('user-2', { refreshToken });

      expect(redis.store.size).toBe(0);
      await expect(service.refresh({ refreshToken })).resolves.toBeDefined();
    });
  });
});
