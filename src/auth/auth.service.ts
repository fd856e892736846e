import { Inject, Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '../database/config.service';
import {
  MessageDeliveryException,
  UserAlreadyExistsException,
  UserNotFoundException,
} from '../common/exceptions/domain.exceptions';
import { normalizePhoneNumber } from '../common/utils/phone-number';
import { OtpService } from '../otp/application/otp.service';
import { OtpPurpose } from '../otp/domain/otp-code.entity';
import { MESSAGE_SENDER, MessageSender } from '../sms/domain/message-sender';
import { UsersService } from '../users/application/users.service';
import { User, UserRole } from '../users/domain/user.entity';
import { TokenService } from './application/token.service';
import { RequestOtpDto } from './dto/request-otp.dto';
import { VerifyOtpDto } from './dto/verify-otp.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import {
  AccessTokenResponseDto,
  AuthResponseDto,
  OtpRequestedResponseDto,
} from './dto/auth-response.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly usersService: UsersService,
    private readonly otpService: OtpService,
    private readonly tokenService: TokenService,
    private readonly configService: ConfigService,
    @Inject(MESSAGE_SENDER)
    private readonly messageSender: MessageSender,
  ) {}

  private roleFor(phoneNumber: string, current: UserRole = UserRole.USER): UserRole {
    return this.configService.adminPhoneNumbers.includes(phoneNumber) ? UserRole.ADMIN : current;
  }

  async requestOtp(dto: RequestOtpDto, now: Date = new Date()): Promise<OtpRequestedResponseDto> {
    const phoneNumber = normalizePhoneNumber(dto.phoneNumber);
    const existing = await this.usersService.findByPhoneNumber(phoneNumber);

    if (dto.purpose === OtpPurpose.LOGIN && !existing) {
      throw new UserNotFoundException();
    }
    if (dto.purpose === OtpPurpose.REGISTER && existing) {
      throw new UserAlreadyExistsException();
    }

    const issued = await this.otpService.requestCode(phoneNumber, dto.purpose, now);
    const result = await this.messageSender.send(
      phoneNumber,
      this.configService.smsOtpTemplate,
      issued.code,
    );

    if (!result.ok) {
      this.logger.error(`Failed to send OTP to ${phoneNumber}: ${result.reason}`);
      throw new MessageDeliveryException(result.reason);
    }

    return {
      message: 'OTP code has been sent to your phone number',
      expiresInMinutes: Math.floor((issued.expiresAt.getTime() - now.getTime()) / 60000),
    };
  }

  async verifyOtp(dto: VerifyOtpDto, now: Date = new Date()): Promise<AuthResponseDto> {
    const phoneNumber = normalizePhoneNumber(dto.phoneNumber);
    await this.otpService.verifyCode(phoneNumber, dto.code, dto.purpose, now);

    const existing = await this.usersService.findByPhoneNumber(phoneNumber);
    let user: User;
    let created = false;

    if (dto.purpose === OtpPurpose.REGISTER) {
      if (existing) {
        throw new UserAlreadyExistsException();
      }
      user = await this.usersService.register(phoneNumber, this.roleFor(phoneNumber));
      created = true;
    } else {
      if (!existing) {
        throw new UserNotFoundException();
      }
      user = await this.usersService.markPhoneVerified(
        existing,
        this.roleFor(phoneNumber, existing.role),
      );
    }

    const tokens = this.tokenService.issueTokenPair(user);

    return {
      message: created ? 'User registered successfully' : 'Login successful',
      created,
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      user: this.usersService.toResponse(user),
    };
  }

  async refresh(dto: RefreshTokenDto): Promise<AccessTokenResponseDto> {
    const payload = await this.tokenService.validate(dto.refreshToken, 'refresh');
    if (!payload) {
      throw new UnauthorizedException('Invalid refresh token');
    }

    const user = await this.usersService.findById(payload.sub);
    if (!user) {
      throw new UnauthorizedException('Invalid refresh token');
    }

    return {
      message: 'Token refreshed successfully',
      accessToken: this.tokenService.issueAccessToken(user),
    };
  }

  async logout(userId: string, dto: RefreshTokenDto): Promise<{ message: string }> {
    const payload = await this.tokenService.validate(dto.refreshToken, 'refresh');
    if (payload && payload.sub === userId) {
      await this.tokenService.revoke(payload);
    }
    return { message: 'Logged out successfully' };
  }
}
