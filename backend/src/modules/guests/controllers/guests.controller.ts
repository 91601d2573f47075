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
import { ApiBearerAuth, ApiOperation, ApiParam, ApiTags } from '@nestjs/swagger';
import { GuestSummary } from '@event-hub/shared';
import { CurrentUser } from '@/common/decorators/current-user.decorator';
import { RequirePermission } from '@/common/decorators/permission.decorator';
import { PermissionsGuard } from '@/modules/authorization/guards/permissions.guard';
import { Principal } from '@/modules/authorization/principal';
import { JwtAuthGuard } from '@/modules/identity/guards/jwt-auth.guard';
import { GuestsService } from '../services/guests.service';
import { Guest } from '../entities/guest.entity';
import { CreateGuestDto, UpdateGuestDto } from '../dto/guests.dto';

@ApiTags('user')
@Controller('user/guests')
@UseGuards(JwtAuthGuard, PermissionsGuard)
@ApiBearerAuth()
export class GuestsController {
  constructor(private readonly guestsService: GuestsService) {}

  @Get()
  @RequirePermission('guest', 'list')
  @ApiOperation({ summary: 'List guests' })
  async list(@CurrentUser() principal: Principal): Promise<Guest[]> {
    return this.guestsService.list(principal);
  }

  @Get('summary')
  @RequirePermission('guest', 'list')
  @ApiOperation({ summary: 'Guest counts per RSVP status' })
  async summary(@CurrentUser() principal: Principal): Promise<GuestSummary> {
    return this.guestsService.summary(principal);
  }

  @Post()
  @RequirePermission('guest', 'create')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a guest' })
  async create(@CurrentUser() principal: Principal, @Body() dto: CreateGuestDto): Promise<Guest> {
    return this.guestsService.create(principal, dto);
  }

  @Put(':id')
  @RequirePermission('guest', 'update')
  @ApiOperation({ summary: 'Update a guest or their RSVP' })
  @ApiParam({ name: 'id', description: 'Guest ID' })
  async update(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
    @Body() dto: UpdateGuestDto,
  ): Promise<Guest> {
    return this.guestsService.update(principal, id, dto);
  }

  @Delete(':id')
  @RequirePermission('guest', 'delete')
  @ApiOperation({ summary: 'Remove a guest' })
  @ApiParam({ name: 'id', description: 'Guest ID' })
  async remove(
    @CurrentUser() principal: Principal,
    @Param('id', ParseUUIDPipe) id: string,
  ): Promise<{ id: string; deleted: boolean }> {
    await this.guestsService.remove(principal, id);
    return { id, deleted: true };
  }
}
