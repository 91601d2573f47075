import { IsOptional, IsString, MaxLength } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { OrderStatus } from '@event-hub/shared';
import { Trim } from '@/common/transforms/trim.transform';
import { OrderLine } from '../entities/order-line.entity';

export class CancelOrderDto {
  @ApiPropertyOptional()
  @IsOptional()
  @Trim()
  @IsString()
  @MaxLength(500)
  reason?: string;
}

/** An order as one vendor sees it: only that vendor's lines */
export class VendorRequestView {
  @ApiProperty()
  id!: string;

  @ApiProperty({ enum: OrderStatus })
  status!: OrderStatus;

  @ApiProperty({ type: [OrderLine] })
  lines!: OrderLine[];

  @ApiProperty({ description: "Sum of this vendor's lines" })
  subtotalCents!: number;

  @ApiProperty()
  createdAt!: Date;
}
