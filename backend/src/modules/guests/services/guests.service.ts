import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { GuestSummary, RsvpStatus } from '@event-hub/shared';
import { AuthorizationService } from '@/modules/authorization/services/authorization.service';
import { Principal } from '@/modules/authorization/principal';
import { Guest } from '../entities/guest.entity';
import { CreateGuestDto, UpdateGuestDto } from '../dto/guests.dto';

/**
 * A user's guest list. Independent of orders.
 */
@Injectable()
export class GuestsService {
  constructor(
    @InjectRepository(Guest)
    private readonly guests: Repository<Guest>,
    private readonly authorization: AuthorizationService,
  ) {}

  async list(principal: Principal): Promise<Guest[]> {
    this.authorization.assertCan(principal, 'guest', 'list');
    return this.guests.find({ where: { userId: principal.id }, order: { createdAt: 'ASC' } });
  }

  async create(principal: Principal, dto: CreateGuestDto): Promise<Guest> {
    this.authorization.assertCan(principal, 'guest', 'create');

    return this.guests.save(
      this.guests.create({
        userId: principal.id,
        name: dto.name,
        contact: dto.contact || null,
        rsvpStatus: dto.rsvpStatus ?? RsvpStatus.PENDING,
      }),
    );
  }

  async update(principal: Principal, id: string, dto: UpdateGuestDto): Promise<Guest> {
    const guest = await this.loadOwn(principal, 'update', id);

    if (dto.name !== undefined) guest.name = dto.name;
    if (dto.contact !== undefined) guest.contact = dto.contact || null;
    if (dto.rsvpStatus !== undefined) guest.rsvpStatus = dto.rsvpStatus;

    return this.guests.save(guest);
  }

  async remove(principal: Principal, id: string): Promise<void> {
    const guest = await this.loadOwn(principal, 'delete', id);
    await this.guests.delete({ id: guest.id });
  }

  /**
   * Guest counts per RSVP status
   */
  async summary(principal: Principal): Promise<GuestSummary> {
    const guests = await this.list(principal);

    const summary: GuestSummary = {
      [RsvpStatus.PENDING]: 0,
      [RsvpStatus.CONFIRMED]: 0,
      [RsvpStatus.DECLINED]: 0,
      total: guests.length,
    };
    for (const guest of guests) {
      summary[guest.rsvpStatus] += 1;
    }
    return summary;
  }

  private async loadOwn(
    principal: Principal,
    action: 'update' | 'delete',
    id: string,
  ): Promise<Guest> {
    return this.authorization.resolve(
      principal,
      action,
      'guest',
      () => this.guests.findOne({ where: { id } }),
      (guest) => guest.userId,
    );
  }
}
