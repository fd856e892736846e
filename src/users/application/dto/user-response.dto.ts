import { UserRole } from '../../domain/user.entity';

export interface UserResponseDto {
  id: string;
  phoneNumber: string;
  nationalId: string | null;
  isPhoneVerified: boolean;
  role: UserRole;
  createdAt: string;
  updatedAt: string;
}
