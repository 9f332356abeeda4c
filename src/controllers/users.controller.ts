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
import { ApiBearerAuth, ApiOperation, ApiTags } from '@nestjs/swagger';
import { AuthorizationPolicyService } from '../auth/authorization-policy.service';
import { Principal } from '../auth/principal';
import { UserRole } from '../auth/roles';
import { CurrentPrincipal } from '../common/decorators/current-principal.decorator';
import { CreateUserDto, UpdateUserDto } from '../dto/user.dto';
import { AuthGuard, UserOnly } from '../guards/auth.guard';
import { toUserView, UserService, UserView } from '../services/user.service';

@Controller('users')
@UseGuards(AuthGuard)
@UserOnly()
@ApiTags('users')
@ApiBearerAuth()
export class UsersController {
  constructor(
    private readonly users: UserService,
    private readonly policy: AuthorizationPolicyService,
  ) {}

  @Get()
  @ApiOperation({ summary: 'List users of the tenant' })
  async listUsers(@CurrentPrincipal() principal: Principal): Promise<UserView[]> {
    const rows = await this.users.list(principal.tenant.id);
    return rows.map(toUserView);
  }

  @Post()
  @ApiOperation({ summary: 'Add a user to the tenant (admin or owner)' })
  async createUser(
    @CurrentPrincipal() principal: Principal,
    @Body() dto: CreateUserDto,
  ): Promise<UserView> {
    const { user: actor } = this.policy.requireRole(principal, UserRole.ADMIN);
    return toUserView(await this.users.create(actor, dto));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a user of the tenant' })
  async getUser(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<UserView> {
    return toUserView(await this.users.get(principal.tenant.id, id));
  }

  @Put(':id')
  @ApiOperation({ summary: 'Update a user; role and activation changes need an owner' })
  async updateUser(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateUserDto,
  ): Promise<UserView> {
    const { user: actor } = this.policy.requireRole(principal, UserRole.MEMBER);
    return toUserView(await this.users.update(actor, id, dto));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Remove a user (owner only, never the last owner)' })
  async deleteUser(
    @CurrentPrincipal() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<void> {
    const { user: actor } = this.policy.requireRole(principal, UserRole.OWNER);
    await this.users.delete(actor, id);
  }
}
