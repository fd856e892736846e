import { UserResponseDto } from '../../users/application/dto/user-response.dto';

export interface OtpRequestedResponseDto {
  message: string;
  expiresInMinutes: number;
}

export interface AuthResponseDto {
  message: string;
  created: boolean;
  accessToken: string;
  refreshToken: string;
  user: UserResponseDto;
}

export interface AccessTokenResponseDto {
  message: string;
  accessToken: string;
}
