import { Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'crypto';
import { ConfigService } from '../../database/config.service';
import { RedisService } from '../../redis/redis.service';
import { User, UserRole } from '../../users/domain/user.entity';

export type TokenType = 'access' | 'refresh';

export interface TokenPayload {
  sub: string;
  phoneNumber: string;
  role: UserRole;
  type: TokenType;
  jti?: string;
  exp?: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
}

const KEY_REVOKED_REFRESH = 'auth:revoked:';

function isTokenPayload(value: unknown): value is TokenPayload {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.sub === 'string' &&
    typeof candidate.phoneNumber === 'string' &&
    (candidate.type === 'access' || candidate.type === 'refresh') &&
    Object.values<unknown>(UserRole).includes(candidate.role)
  );
}

@Injectable()
export class TokenService {
  private readonly logger = new Logger(TokenService.name);

  constructor(
    private readonly jwtService: JwtService,
    private readonly redisService: RedisService,
    private readonly configService: ConfigService,
  ) {}

  private claims(user: User, type: TokenType): TokenPayload {
    return {
      sub: user.id ?? '',
      phoneNumber: user.phoneNumber,
      role: user.role,
      type,
    };
  }

  issueAccessToken(user: User): string {
    return this.jwtService.sign(this.claims(user, 'access'), {
      expiresIn: this.configService.jwtAccessExpiresIn,
    });
  }

  issueTokenPair(user: User): TokenPair {
    const refreshToken = this.jwtService.sign(
      { ...this.claims(user, 'refresh'), jti: randomUUID() },
      { expiresIn: this.configService.jwtRefreshExpiresIn },
    );
    return { accessToken: this.issueAccessToken(user), refreshToken };
  }

  /**
   * Returns the identity carried by a valid, unrevoked token of the expected
   * type, or null.
   */
  async validate(token: string, type: TokenType): Promise<TokenPayload | null> {
    let decoded: unknown;
    try {
      decoded = this.jwtService.verify<object>(token);
    } catch {
      return null;
    }

    if (!isTokenPayload(decoded) || decoded.type !== type) {
      return null;
    }
    if (type === 'refresh') {
      if (!decoded.jti || (await this.redisService.exists(KEY_REVOKED_REFRESH + decoded.jti))) {
        return null;
      }
    }
    return decoded;
  }

  async revoke(payload: TokenPayload, now: Date = new Date()): Promise<void> {
    if (!payload.jti) return;
    const remaining = payload.exp ? payload.exp - Math.floor(now.getTime() / 1000) : 0;
    if (remaining <= 0) return;

    await this.redisService.set(KEY_REVOKED_REFRESH + payload.jti, true, remaining);
    this.logger.log(`Revoked refresh token ${payload.jti} for user ${payload.sub}`);
  }
}
