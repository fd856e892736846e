import { Injectable, Inject, Logger, NotFoundException } from '@nestjs/common';
import { IUserRepository, USER_REPOSITORY } from '../domain/user.repository';
import { User, UserRole } from '../domain/user.entity';
import { UpdateProfileDto } from './dto/update-profile.dto';
import { UserResponseDto } from './dto/user-response.dto';
import { normalizeNationalId } from '../../common/utils/phone-number';

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(
    @Inject(USER_REPOSITORY)
    private readonly userRepository: IUserRepository,
  ) {}

  toResponse(user: User): UserResponseDto {
    return {
      id: user.id ?? '',
      phoneNumber: user.phoneNumber,
      nationalId: user.nationalId,
      isPhoneVerified: user.isPhoneVerified,
      role: user.role,
      createdAt: user.createdAt.toISOString(),
      updatedAt: user.updatedAt.toISOString(),
    };
  }

  async findById(id: string): Promise<User | null> {
    return this.userRepository.findById(id);
  }

  async findByIds(ids: string[]): Promise<User[]> {
    if (ids.length === 0) return [];
    return this.userRepository.findByIds(ids);
  }

  async findByPhoneNumber(phoneNumber: string): Promise<User | null> {
    return this.userRepository.findByPhoneNumber(phoneNumber);
  }

  async register(phoneNumber: string, role: UserRole = UserRole.USER): Promise<User> {
    const created = await this.userRepository.create(User.register(phoneNumber, role));
    this.logger.log(`Registered user ${created.id} (${phoneNumber}) as ${role}`);
    return created;
  }

  /**
   * Flag the phone as verified and apply a role upgrade if one is due.
   * Returns the stored user unchanged when there is nothing to update.
   */
  async markPhoneVerified(user: User, role: UserRole = user.role): Promise<User> {
    if (user.isPhoneVerified && user.role === role) {
      return user;
    }
    const updated = await this.userRepository.update(user.id ?? '', {
      isPhoneVerified: true,
      role,
    });
    return updated ?? user;
  }

  async getProfile(id: string): Promise<UserResponseDto> {
    const user = await this.userRepository.findById(id);
    if (!user) {
      throw new NotFoundException(`User with id ${id} not found`);
    }
    return this.toResponse(user);
  }

  async updateProfile(id: string, dto: UpdateProfileDto): Promise<UserResponseDto> {
    const existing = await this.userRepository.findById(id);
    if (!existing) {
      throw new NotFoundException(`User with id ${id} not found`);
    }

    const nationalId =
      dto.nationalId !== undefined ? normalizeNationalId(dto.nationalId) : existing.nationalId;

    const updated = await this.userRepository.update(id, { nationalId });
    return this.toResponse(updated ?? existing);
  }
}
