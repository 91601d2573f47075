import { IsInt, IsOptional, IsUUID, Max, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { AddToCartRequest, MAX_CART_QUANTITY, UpdateCartEntryRequest } from '@event-hub/shared';
import { CatalogItem } from '@/modules/catalog/entities/catalog-item.entity';

export class AddToCartDto implements AddToCartRequest {
  @ApiProperty()
  @IsUUID()
  itemId!: string;

  @ApiPropertyOptional({ default: 1, minimum: 1, maximum: MAX_CART_QUANTITY })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(MAX_CART_QUANTITY)
  quantity?: number;
}

export class UpdateCartEntryDto implements UpdateCartEntryRequest {
  @ApiProperty({ minimum: 1, maximum: MAX_CART_QUANTITY })
  @IsInt()
  @Min(1)
  @Max(MAX_CART_QUANTITY)
  quantity!: number;
}

export class CartEntryView {
  @ApiProperty()
  id!: string;

  @ApiProperty()
  itemId!: string;

  @ApiProperty()
  quantity!: number;

  @ApiProperty()
  item!: CatalogItem;

  /** Current unit price × quantity */
  @ApiProperty()
  amountCents!: number;

  /** False once the item is unapproved or its vendor deactivated */
  @ApiProperty()
  available!: boolean;
}

export class CartView {
  @ApiProperty({ type: [CartEntryView] })
  entries!: CartEntryView[];

  @ApiProperty({ description: 'Sum of entries at current prices' })
  totalCents!: number;
}
