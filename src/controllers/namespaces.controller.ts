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
import { ApiBearerAuth, ApiOperation, ApiSecurity, ApiTags } from '@nestjs/swagger';
import { AuthorizationPolicyService } from '../auth/authorization-policy.service';
import { Principal } from '../auth/principal';
import { ApiKeyScope } from '../auth/roles';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { CreateNamespaceDto, UpdateNamespaceDto } from '../dto/namespace.dto';
import { Namespace } from '../entities/namespace.entity';
import { AuthGuard } from '../guards/auth.guard';
import { NamespaceService } from '../services/namespace.service';

@Controller('namespaces')
@UseGuards(AuthGuard)
@ApiTags('namespaces')
@ApiBearerAuth()
@ApiSecurity('apiKey')
export class NamespacesController {
  constructor(
    private readonly namespaces: NamespaceService,
    private readonly policy: AuthorizationPolicyService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List namespaces of the tenant' })
  listNamespaces(@CurrentPrincipal() principal: Principal): Promise<Namespace[]> {
    this.policy.requireScope(principal, ApiKeyScope.READ);
    return this.namespaces.list(principal.tenant.id);
  }

  @Post()
  @ApiOperation({ summary: 'Create a namespace' })
  createNamespace(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: CreateNamespaceDto,
  ): Promise<Namespace> {
    this.policy.requireScope(principal, ApiKeyScope.WRITE);
    return this.namespaces.create(principal.tenant.id, dto);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a namespace' })
  getNamespace(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<Namespace> {
    this.policy.requireScope(principal, ApiKeyScope.READ);
    return this.namespaces.resolve(principal.tenant.id, id);
  }

  @Put(':id')
  @ApiOperation({ summary: 'Rename or describe a namespace' })
  updateNamespace(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateNamespaceDto,
  ): Promise<Namespace> {
    this.policy.requireScope(principal, ApiKeyScope.WRITE);
    return this.namespaces.update(principal.tenant.id, id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a namespace with all of its configurations' })
  async deleteNamespace(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    this.policy.requireScope(principal, ApiKeyScope.WRITE);
    await this.namespaces.delete(principal.tenant.id, id);
  }
}
