import { Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { LedgerQueryDto } from '../dto/hold.dto';
import { PurchaseResponseDto } from '../dto/purchase.dto';
import { ReservationEngineService } from './reservation-engine.service';

@ApiTags('purchases')
@Controller('purchases')
export class PurchasesController {
  constructor(private readonly reservationEngine: ReservationEngineService) {}

  @Get()
  @ApiOperation({ summary: 'List purchases, optionally by customer and flight' })
  @ApiResponse({ status: 200, description: 'Purchases', type: [PurchaseResponseDto] })
  async listPurchases(@Query() query: LedgerQueryDto): Promise<PurchaseResponseDto[]> {
    return this.reservationEngine.listPurchases(query);
  }

  @Get(':purchaseId')
  @ApiOperation({ summary: 'Get a purchase' })
  @ApiResponse({ status: 200, description: 'Purchase', type: PurchaseResponseDto })
  @ApiResponse({ status: 404, description: 'Unknown purchase' })
  async getPurchase(@Param('purchaseId') purchaseId: string): Promise<PurchaseResponseDto> {
    return this.reservationEngine.getPurchase(purchaseId);
  }

  @Post(':purchaseId/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel a purchase and release its seats' })
  @ApiResponse({ status: 200, description: 'Purchase cancelled', type: PurchaseResponseDto })
  @ApiResponse({ status: 409, description: 'Purchase already cancelled' })
  async cancel(@Param('purchaseId') purchaseId: string): Promise<PurchaseResponseDto> {
    return this.reservationEngine.cancel(purchaseId);
  }
}
