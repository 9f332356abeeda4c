import { Body, Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { Principal } from '../auth/principal';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { LoginDto, RefreshTokenDto, RegisterDto } from '../dto/auth.dto';
import { AuthGuard } from '../guards/auth.guard';
import { ApiKeyView, toApiKeyView } from '../services/api-key.service';
import { AuthResult, AuthService } from '../services/auth.service';
import { toUserView, UserView } from '../services/user.service';

export interface PrincipalSummary {
  kind: Principal['kind'];
  tenant: { id: string; name: string };
  user?: UserView;
  api_key?: ApiKeyView;
}

@Controller('auth')
@ApiTags('auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Register a tenant together with its owner user' })
  @ApiResponse({ status: 201, description: 'Tokens, owner user and tenant' })
  @ApiResponse({ status: 409, description: 'Email or tenant name already taken' })
  register(@Body() dto: RegisterDto): Promise<AuthResult> {
    return this.auth.register(dto);
  }

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange email and password for tokens' })
  @ApiResponse({ status: 401, description: 'Incorrect email or password' })
  login(@Body() dto: LoginDto): Promise<AuthResult> {
    return this.auth.login(dto.email, dto.password);
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Exchange a refresh token for a new token pair' })
  refresh(@Body() dto: RefreshTokenDto): Promise<AuthResult> {
    return this.auth.refresh(dto.refresh_token);
  }

  @Get('me')
  @UseGuards(AuthGuard)
  @ApiBearerAuth()
  @ApiSecurity('apiKey')
  @ApiOperation({ summary: 'Describe the authenticated principal' })
  me(@CurrentPrincipal() principal: Principal): PrincipalSummary {
    const tenant = { id: principal.tenant.id, name: principal.tenant.name };
    return principal.kind === 'user'
      ? { kind: principal.kind, tenant, user: toUserView(principal.user) }
      : { kind: principal.kind, tenant, api_key: toApiKeyView(principal.apiKey) };
  }
}
