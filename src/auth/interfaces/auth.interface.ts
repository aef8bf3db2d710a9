import type { PublicUser } from '../../user/user.service';

export interface AuthTokens {
  accessToken: string;
  refreshToken: string;
}

export interface AuthUser {
  id: number;
  email: string;
  refreshToken?: string;
}

export interface JwtPayload {
  sub: number;
  email: string;
}

export interface AuthLoginResponse {
  accessToken: string;
  user: PublicUser;
}

export interface AuthRefreshResponse {
  accessToken: string;
}

export interface AuthLogoutResponse {
  message: string;
}
