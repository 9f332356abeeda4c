import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AuthorizationPolicyService } from '../auth/authorization-policy.service';
import { Principal } from '../auth/principal';
import { UserRole } from '../auth/roles';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { CreateApiKeyDto } from '../dto/api-key.dto';
import { AuthGuard, UserOnly } from '../guards/auth.guard';
import {
  ApiKeyService,
  ApiKeyView,
  CreatedApiKey,
  toApiKeyView,
} from '../services/api-key.service';

@Controller('api-keys')
@UseGuards(AuthGuard)
@UserOnly()
@ApiTags('api-keys')
@ApiBearerAuth()
export class ApiKeysController {
  constructor(
    private readonly apiKeys: ApiKeyService,
    private readonly policy: AuthorizationPolicyService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Create an API key; the secret is returned only once' })
  @ApiResponse({ status: 201, description: 'Key metadata plus the plaintext api_key' })
  createApiKey(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: CreateApiKeyDto,
  ): Promise<CreatedApiKey> {
    const { user } = this.policy.requireRole(principal, UserRole.ADMIN);
    return this.apiKeys.create(principal.tenant.id, user.id, dto);
  }

  @Get()
  @ApiOperation({ summary: 'List API keys of the tenant, newest first' })
  async listApiKeys(@CurrentPrincipal() principal: Principal): Promise<ApiKeyView[]> {
    this.policy.requireRole(principal, UserRole.ADMIN);
    const keys = await this.apiKeys.list(principal.tenant.id);
    return keys.map(toApiKeyView);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get API key metadata' })
  async getApiKey(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<ApiKeyView> {
    this.policy.requireRole(principal, UserRole.ADMIN);
    return toApiKeyView(await this.apiKeys.get(principal.tenant.id, id));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Revoke (delete) an API key' })
  async revokeApiKey(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    this.policy.requireRole(principal, UserRole.ADMIN);
    await this.apiKeys.revoke(principal.tenant.id, id);
  }
}
