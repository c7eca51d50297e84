import { Body, Controller, Get, Header, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CreateFlightDto, FlightResponseDto, SearchFlightsQueryDto } from '../dto/flight.dto';
import { FlightSeatMapDto } from '../dto/seat-map.dto';
import { ReservationEngineService } from './reservation-engine.service';

@ApiTags('flights')
@Controller('flights')
export class FlightsController {
  constructor(private readonly reservationEngine: ReservationEngineService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Add a flight to the catalog (admin)' })
  @ApiResponse({ status: 201, description: 'Flight added', type: FlightResponseDto })
  @ApiResponse({ status: 409, description: 'Flight id already taken' })
  async createFlight(@Body() createFlightDto: CreateFlightDto): Promise<FlightResponseDto> {
    return this.reservationEngine.addFlight(createFlightDto);
  }

  @Get()
  @ApiOperation({ summary: 'List every flight in the catalog (admin)' })
  @ApiResponse({ status: 200, description: 'Flights sorted by departure time', type: [FlightResponseDto] })
  async listFlights(): Promise<FlightResponseDto[]> {
    return this.reservationEngine.listFlights();
  }

  @Get('search')
  @ApiOperation({ summary: 'Search flights by city, time and date' })
  @ApiResponse({ status: 200, description: 'Matching flights sorted by departure time', type: [FlightResponseDto] })
  async searchFlights(@Query() query: SearchFlightsQueryDto): Promise<FlightResponseDto[]> {
    return this.reservationEngine.search(query);
  }

  @Get(':flightId/seats')
  @ApiOperation({ summary: 'Seat map of a flight' })
  @ApiResponse({ status: 200, description: 'Seat map', type: FlightSeatMapDto })
  @ApiResponse({ status: 404, description: 'Unknown flight' })
  async getSeats(@Param('flightId') flightId: string): Promise<FlightSeatMapDto> {
    return this.reservationEngine.viewSeats(flightId);
  }

  @Get(':flightId/seats/grid')
  @Header('Content-Type', 'text/plain; charset=utf-8')
  @ApiProduces('text/plain')
  @ApiOperation({ summary: 'Seat map of a flight as a text grid' })
  @ApiResponse({ status: 200, description: 'O=AVAILABLE, H=HOLD, X=PURCHASED' })
  async getSeatGrid(@Param('flightId') flightId: string): Promise<string> {
    return this.reservationEngine.viewSeatGrid(flightId);
  }
}
