export enum UserRole {
  ADMIN = 'admin',
  USER = 'user',
}

export interface IUser {
  id?: string;
  phoneNumber: string; // digits only, unique identity
  isPhoneVerified: boolean;
  nationalId: string | null;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;
}

export class User implements IUser {
  id?: string;
  phoneNumber: string;
  isPhoneVerified: boolean;
  nationalId: string | null;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<IUser>) {
    this.id = partial.id;
    this.phoneNumber = partial.phoneNumber || '';
    this.isPhoneVerified = partial.isPhoneVerified ?? false;
    this.nationalId = partial.nationalId ?? null;
    this.role = partial.role || UserRole.USER;
    this.createdAt = partial.createdAt || new Date();
    this.updatedAt = partial.updatedAt || new Date();
  }

  static register(phoneNumber: string, role: UserRole = UserRole.USER): User {
    return new User({
      phoneNumber,
      role,
      isPhoneVerified: true,
      createdAt: new Date(),
      updatedAt: new Date(),
    });
  }
}
