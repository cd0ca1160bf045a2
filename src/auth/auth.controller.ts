import { Controller, Post, Body, Get, UseGuards, Req, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiBearerAuth } from '@nestjs/swagger';
import { AuthService } from './auth.service';
import { RequestLoginDto } from './dto/request-login.dto';
import { CompleteLoginDto } from './dto/complete-login.dto';
import { RefreshTokenDto } from './dto/refresh-token.dto';
import { AuthenticatedRequest, AuthGuard } from './guards/auth.guard';
import { AuthErrorCode, AuthException } from '../common/exceptions/auth.exception';
import { TokenPair } from './types/auth.types';

/**
 * Phone login endpoints.
 *
 * Responses list their fields explicitly; entities and claims are never
 * returned whole.
 */
@Controller('auth')
@ApiTags('Authentication')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('send-otp')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Send a one-time code to a phone number' })
  @ApiResponse({ status: 200, description: 'Code sent' })
  @ApiResponse({ status: 400, description: 'Invalid phone number' })
  @ApiResponse({ status: 429, description: 'Too many codes requested' })
  @ApiResponse({ status: 502, description: 'Code could not be delivered' })
  async sendOtp(@Body() dto: RequestLoginDto) {
    const pending = await this.authService.requestLogin(dto.phone);
    return {
      message: 'OTP_SENT',
      status: pending.status,
      phone: pending.phone,
      expiresAt: pending.expiresAt.toISOString(),
    };
  }

  @Post('verify-otp')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Verify a one-time code and issue tokens' })
  @ApiResponse({ status: 200, description: 'Login succeeded' })
  @ApiResponse({ status: 400, description: 'Wrong code or no pending code' })
  @ApiResponse({ status: 401, description: 'Code expired' })
  @ApiResponse({ status: 429, description: 'Too many wrong attempts' })
  async verifyOtp(@Body() dto: CompleteLoginDto) {
    const result = await this.authService.completeLogin(dto.phone, dto.code);
    return {
      message: 'LOGIN_SUCCEEDED',
      userId: result.userId,
      ...toTokenResponse(result.tokens),
    };
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a refresh token for a new token pair' })
  @ApiResponse({ status: 200, description: 'Tokens rotated' })
  @ApiResponse({ status: 401, description: 'Invalid, expired or revoked refresh token' })
  async refresh(@Body() dto: RefreshTokenDto) {
    const tokens = await this.authService.refresh(dto.refreshToken);
    return {
      message: 'TOKEN_REFRESHED',
      ...toTokenResponse(tokens),
    };
  }

  @Post('logout')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Revoke a refresh token' })
  @ApiResponse({ status: 200, description: 'Logged out' })
  @ApiResponse({ status: 401, description: 'Invalid refresh token' })
  async logout(@Body() dto: RefreshTokenDto) {
    await this.authService.logout(dto.refreshToken);
    return { message: 'LOGGED_OUT' };
  }

  @Get('me')
  @UseGuards(AuthGuard)
  @ApiBearerAuth('bearer')
  @ApiOperation({ summary: 'Describe the caller identified by the access token' })
  @ApiResponse({ status: 200, description: 'Authenticated identity' })
  @ApiResponse({ status: 401, description: 'Missing or invalid access token' })
  me(@Req() req: AuthenticatedRequest) {
    if (!req.user) {
      throw new AuthException(AuthErrorCode.INVALID_TOKEN);
    }
    return {
      userId: req.user.userId,
      tokenId: req.user.tokenId,
      expiresAt: req.user.expiresAt.toISOString(),
    };
  }
}

function toTokenResponse(tokens: TokenPair) {
  return {
    accessToken: tokens.accessToken.token,
    accessTokenExpiresAt: tokens.accessToken.expiresAt.toISOString(),
    refreshToken: tokens.refreshToken.token,
    refreshTokenExpiresAt: tokens.refreshToken.expiresAt.toISOString(),
  };
}
