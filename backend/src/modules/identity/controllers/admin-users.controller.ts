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
  Query,
  UseGuards,
} from '@nestjs/common';
import { ApiBearerAuth, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { UserRole } from '@event-hub/shared';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { Principal } from '@/modules/authorization/principal';
import { JwtAuthGuard } from '../guards/jwt-auth.guard';
import { UsersService } from '../services/users.service';
import { toUserResponse, UserResponseDto } from '../dto/auth.dto';
import {
  CreateUserDto,
  DeleteUserResponseDto,
  ListUsersQueryDto,
  UpdateUserDto,
} from '../dto/users.dto';

@ApiTags('admin')
@Controller('admin/users')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class AdminUsersController {
  constructor(private readonly usersService: UsersService) {}

  @Get()
  @RequirePermission('identity', 'list', 'any')
  @ApiOperation({ summary: 'List accounts' })
  async list(@Query() query: ListUsersQueryDto): Promise<UserResponseDto[]> {
    const users = await this.usersService.list({ role: query.role });
    return users.map(toUserResponse);
  }

  @Post()
  @RequirePermission('identity', 'create', 'any')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create an account with any role' })
  @ApiResponse({ status: 409, description: 'Email already registered' })
  async create(@Body() dto: CreateUserDto): Promise<UserResponseDto> {
    const user = await this.usersService.createIdentity({
      name: dto.name,
      email: dto.email,
      password: dto.password,
      role: dto.role ?? UserRole.USER,
      companyName: dto.companyName,
    });
    return toUserResponse(user);
  }

  @Put(':id')
  @RequirePermission('identity', 'update', 'any')
  @ApiOperation({ summary: 'Update name, email, role or status' })
  async update(
    @CurrentUser() actor: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateUserDto,
  ): Promise<UserResponseDto> {
    return toUserResponse(await this.usersService.update(actor, id, dto));
  }

  @Delete(':id')
  @RequirePermission('identity', 'delete', 'any')
  @ApiOperation({
    summary: 'Delete an account',
    description: 'Accounts referenced by orders are disabled instead of deleted',
  })
  @ApiResponse({ status: 200, type: DeleteUserResponseDto })
  async remove(
    @CurrentUser() actor: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<DeleteUserResponseDto> {
    return this.usersService.remove(actor, id);
  }
}
