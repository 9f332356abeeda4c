import { Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AuthorizationPolicyService } from '../auth/authorization-policy.service';
import { Principal } from '../auth/principal';
import { UserRole } from '../auth/roles';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { UpdateTenantDto } from '../dto/tenant.dto';
import { Tenant } from '../entities/tenant.entity';
import { AuthGuard, UserOnly } from '../guards/auth.guard';
import { TenantService } from '../services/tenant.service';

@Controller('tenant')
@UseGuards(AuthGuard)
@UserOnly()
@ApiTags('tenant')
@ApiBearerAuth()
export class TenantController {
  constructor(
    private readonly tenants: TenantService,
    private readonly policy: AuthorizationPolicyService,
  ) {}

  @Get()
  @ApiOperation({ summary: "Get the caller's tenant" })
  getTenant(@CurrentPrincipal() principal: Principal): Promise<Tenant> {
    return this.tenants.get(principal.tenant.id);
  }

  @Put()
  @ApiOperation({ summary: 'Rename the tenant or replace its settings (owner only)' })
  updateTenant(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: UpdateTenantDto,
  ): Promise<Tenant> {
    this.policy.requireRole(principal, UserRole.OWNER);
    return this.tenants.update(principal.tenant.id, dto);
  }
}
