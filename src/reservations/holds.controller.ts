import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CreateHoldDto, HoldResponseDto, LedgerQueryDto } from '../dto/hold.dto';
import { PurchaseResponseDto } from '../dto/purchase.dto';
import { ReservationEngineService } from './reservation-engine.service';

@ApiTags('holds')
@Controller('holds')
export class HoldsController {
  constructor(private readonly reservationEngine: ReservationEngineService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Hold seats on a flight, explicitly or by count' })
  @ApiResponse({ status: 201, description: 'Hold created', type: HoldResponseDto })
  @ApiResponse({ status: 409, description: 'Seat unavailable or not enough seats' })
  async createHold(@Body() createHoldDto: CreateHoldDto): Promise<HoldResponseDto> {
    return this.reservationEngine.reserve(createHoldDto);
  }

  @Get()
  @ApiOperation({ summary: 'List holds, optionally by customer and flight' })
  @ApiResponse({ status: 200, description: 'Holds', type: [HoldResponseDto] })
  async listHolds(@Query() query: LedgerQueryDto): Promise<HoldResponseDto[]> {
    return this.reservationEngine.listHolds(query);
  }

  @Get(':holdId')
  @ApiOperation({ summary: 'Get a hold' })
  @ApiResponse({ status: 200, description: 'Hold', type: HoldResponseDto })
  @ApiResponse({ status: 404, description: 'Unknown hold' })
  async getHold(@Param('holdId') holdId: string): Promise<HoldResponseDto> {
    return this.reservationEngine.getHold(holdId);
  }

  @Post(':holdId/purchase')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Convert an active hold into a purchase' })
  @ApiResponse({ status: 201, description: 'Purchase completed', type: PurchaseResponseDto })
  @ApiResponse({ status: 410, description: 'Hold expired' })
  async purchase(@Param('holdId') holdId: string): Promise<PurchaseResponseDto> {
    return this.reservationEngine.purchase(holdId);
  }
}
