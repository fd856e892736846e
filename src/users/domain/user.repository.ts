import { User, UserRole } from './user.entity';

export interface UserUpdate {
  isPhoneVerified?: boolean;
  nationalId?: string | null;
  role?: UserRole;
}

export interface IUserRepository {
  findById(id: string): Promise<User | null>;
  findByIds(ids: string[]): Promise<User[]>;
  findByPhoneNumber(phoneNumber: string): Promise<User | null>;
  create(user: User): Promise<User>;
  update(id: string, data: UserUpdate): Promise<User | null>;
}

export const USER_REPOSITORY = 'USER_REPOSITORY';
