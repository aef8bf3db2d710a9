import { ConflictException, Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';

import { type PublicUser, UserService } from '../user/user.service';
import { LoginDto } from './dto/auth.dto';
import { HashingService } from './hashing.service';
import { AuthTokens, AuthUser, JwtPayload } from './interfaces/auth.interface';

@Injectable()
export class AuthService {
  constructor(
    private readonly usersService: UserService,
    private readonly hashingService: HashingService,
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
  ) {}

  /** Finds the account for a Google identity, creating it on first sign-in. */
  async signIn(loginDto: LoginDto): Promise<{ tokens: AuthTokens; user: PublicUser }> {
    const existing = await this.usersService.findByGoogleUserId(loginDto.googleUserId);
    const emailOwner = await this.usersService.findByEmail(loginDto.email);
    if (emailOwner && emailOwner.googleUserId !== loginDto.googleUserId) {
      throw new ConflictException('Email is already linked to another account');
    }

    const profile = {
      email: loginDto.email,
      fullName: loginDto.fullName,
      profilePicUrl: loginDto.profilePicUrl ?? null,
      lastLoginAt: new Date(),
    };

    let user: PublicUser;
    if (existing) {
      user = await this.usersService.updateAccount(existing.id, profile);
    } else {
      const created = await this.usersService.create({
        googleUserId: loginDto.googleUserId,
        email: loginDto.email,
        fullName: loginDto.fullName,
        profilePicUrl: loginDto.profilePicUrl,
      });
      user = await this.usersService.updateAccount(created.id, {
        lastLoginAt: profile.lastLoginAt,
      });
    }

    const tokens = await this.login(user);
    return { tokens, user };
  }

  async login(user: Pick<AuthUser, 'id' | 'email'>): Promise<AuthTokens> {
    const payload: JwtPayload = { sub: user.id, email: user.email };
    const accessToken = await this.jwtService.signAsync(payload, {
      secret: this.configService.getOrThrow<string>('JWT_ACCESS_SECRET'),
      expiresIn: '15m',
    });

    const refreshToken = await this.jwtService.signAsync(payload, {
      secret: this.configService.getOrThrow<string>('JWT_REFRESH_SECRET'),
      expiresIn: '7d',
    });

    await this.updateRefreshToken(user.id, refreshToken);

    return {
      accessToken,
      refreshToken,
    };
  }

  async updateRefreshToken(userId: number, refreshToken: string): Promise<void> {
    const hashedRefreshToken = await this.hashingService.hash(refreshToken);
    await this.usersService.updateAccount(userId, {
      refreshTokenHash: hashedRefreshToken,
    });
  }

  async logout(userId: number): Promise<void> {
    await this.usersService.updateAccount(userId, {
      refreshTokenHash: null,
    });
  }

  async refreshTokens(userId: number, refreshToken: string): Promise<AuthTokens> {
    const user = await this.usersService.findAccount(userId);
    if (!user || !user.refreshTokenHash) {
      throw new UnauthorizedException('User not found or session expired');
    }

    const refreshTokenMatches = await this.hashingService.compare(
      refreshToken,
      user.refreshTokenHash,
    );

    if (!refreshTokenMatches) {
      throw new UnauthorizedException('Session is no longer valid');
    }

    return this.login(user);
  }

  profile(userId: number): Promise<PublicUser> {
    return this.usersService.findOne(userId);
  }
}
