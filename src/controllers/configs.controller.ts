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
  Put,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiOperation,
  ApiResponse,
  ApiSecurity,
  ApiTags,
} from '@nestjs/swagger';
import { AuthorizationPolicyService } from '../auth/authorization-policy.service';
import { actorIdOf, Principal } from '../auth/principal';
import { ApiKeyScope } from '../auth/roles';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { CreateConfigDto, UpdateConfigDto } from '../dto/config.dto';
import { AuthGuard } from '../guards/auth.guard';
import {
  ConfigEntryView,
  ConfigHistoryView,
  ConfigStoreService,
} from '../services/config-store.service';
import { NamespaceService } from '../services/namespace.service';

/**
 * Configuration entries of one namespace. The namespace is resolved against
 * the caller's tenant before the store is touched, so foreign namespaces
 * answer 404.
 */
@Controller('namespaces/:namespaceId/configs')
@UseGuards(AuthGuard)
@ApiTags('configs')
@ApiBearerAuth()
@ApiSecurity('apiKey')
export class ConfigsController {
  constructor(
    private readonly store: ConfigStoreService,
    private readonly namespaces: NamespaceService,
    private readonly policy: AuthorizationPolicyService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List configurations in creation order' })
  async listConfigs(
    @CurrentPrincipal() principal: Principal,
    @Param('namespaceId', ParseUUIDPipe) namespaceId: string,
  ): Promise<ConfigEntryView[]> {
    this.policy.requireScope(principal, ApiKeyScope.READ);
    const namespace = await this.namespaces.resolve(principal.tenant.id, namespaceId);
    return this.store.list(namespace);
  }

  @Post()
  @ApiOperation({ summary: 'Create a configuration at version 1' })
  @ApiResponse({ status: 409, description: 'Key already exists in this namespace' })
  async createConfig(
    @CurrentPrincipal() principal: Principal,
    @Param('namespaceId', ParseUUIDPipe) namespaceId: string,
    @Body() dto: CreateConfigDto,
  ): Promise<ConfigEntryView> {
    this.policy.requireScope(principal, ApiKeyScope.WRITE);
    const namespace = await this.namespaces.resolve(principal.tenant.id, namespaceId);
    return this.store.create(namespace, dto, actorIdOf(principal));
  }

  @Get(':key')
  @ApiOperation({ summary: 'Get a configuration with its decrypted value' })
  async getConfig(
    @CurrentPrincipal() principal: Principal,
    @Param('namespaceId', ParseUUIDPipe) namespaceId: string,
    @Param('key') key: string,
  ): Promise<ConfigEntryView> {
    this.policy.requireScope(principal, ApiKeyScope.READ);
    const namespace = await this.namespaces.resolve(principal.tenant.id, namespaceId);
    return this.store.get(namespace, key);
  }

  @Put(':key')
  @ApiOperation({ summary: 'Update a configuration; value changes bump the version' })
  @ApiResponse({ status: 409, description: 'Concurrent modification, retry' })
  async updateConfig(
    @CurrentPrincipal() principal: Principal,
    @Param('namespaceId', ParseUUIDPipe) namespaceId: string,
    @Param('key') key: string,
    @Body() dto: UpdateConfigDto,
  ): Promise<ConfigEntryView> {
    this.policy.requireScope(principal, ApiKeyScope.WRITE);
    const namespace = await this.namespaces.resolve(principal.tenant.id, namespaceId);
    // null means "not given", the same as an omitted field
    const value = dto.value === null ? undefined : dto.value;
    return this.store.update(namespace, key, { ...dto, value }, actorIdOf(principal));
  }

  @Delete(':key')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a configuration; its history is kept' })
  async deleteConfig(
    @CurrentPrincipal() principal: Principal,
    @Param('namespaceId', ParseUUIDPipe) namespaceId: string,
    @Param('key') key: string,
  ): Promise<void> {
    this.policy.requireScope(principal, ApiKeyScope.WRITE);
    const namespace = await this.namespaces.resolve(principal.tenant.id, namespaceId);
    await this.store.delete(namespace, key, actorIdOf(principal));
  }

  @Get(':key/history')
  @ApiOperation({ summary: 'Version history, newest first' })
  async getConfigHistory(
    @CurrentPrincipal() principal: Principal,
    @Param('namespaceId', ParseUUIDPipe) namespaceId: string,
    @Param('key') key: string,
  ): Promise<ConfigHistoryView[]> {
    this.policy.requireScope(principal, ApiKeyScope.READ);
    const namespace = await this.namespaces.resolve(principal.tenant.id, namespaceId);
    return this.store.getHistory(namespace, key);
  }
}
