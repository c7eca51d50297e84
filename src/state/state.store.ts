import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import { Flight, Hold, Purchase } from '../entities';
import { KeyedMutex } from '../utils/keyed-mutex.util';
import { seedFlights } from './seed';
import { deserializeState, serializeState, StateSnapshot, StoreState } from './state.serializer';

const SNAPSHOT_LOCK = 'snapshot';

/**
 * Owns every flight, hold and purchase. The whole state is reloaded from the
 * state file on startup and written back in full after each operation
 * (temp file, then rename over the original).
 */
@Injectable()
export class StateStore implements OnModuleInit, StoreState {
  private readonly logger = new Logger(StateStore.name);
  private readonly writes = new KeyedMutex();
  readonly stateFile: string;

  readonly flights = new Map<string, Flight>();
  readonly holds = new Map<string, Hold>();
  readonly purchases = new Map<string, Purchase>();

  constructor(private readonly configService: ConfigService) {
    this.stateFile = path.resolve(this.configService.get<string>('app.stateFile', 'airline_state.json'));
  }

  async onModuleInit() {
    await this.load();
  }

  async load(): Promise<void> {
    let contents: string;
    try {
      contents = await fs.readFile(this.stateFile, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.log(`No state file at ${this.stateFile}, seeding initial flights`);
        this.replace({
          flights: new Map(seedFlights().map((flight) => [flight.id, flight])),
          holds: new Map(),
          purchases: new Map(),
        });
        return;
      }
      throw error;
    }

    this.replace(deserializeState(JSON.parse(contents)));
    this.logger.log(
      `Loaded state from ${this.stateFile}: ${this.flights.size} flights, ${this.holds.size} holds, ${this.purchases.size} purchases`,
    );
  }

  replace(state: StoreState): void {
    this.flights.clear();
    this.holds.clear();
    this.purchases.clear();
    state.flights.forEach((flight, id) => this.flights.set(id, flight));
    state.holds.forEach((hold, id) => this.holds.set(id, hold));
    state.purchases.forEach((purchase, id) => this.purchases.set(id, purchase));
  }

  snapshot(): StateSnapshot {
    return serializeState(this);
  }

  /**
   * Captures the state now and writes it once earlier writes have finished.
   */
  async persist(): Promise<void> {
    const payload = JSON.stringify(this.snapshot(), null, 2);

    await this.writes.runExclusive(SNAPSHOT_LOCK, async () => {
      const tempFile = `${this.stateFile}.tmp`;
      try {
        await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
        await fs.writeFile(tempFile, payload, 'utf-8');
        await fs.rename(tempFile, this.stateFile);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        const errorStack = error instanceof Error ? error.stack : undefined;
        this.logger.error(`Failed to write state to ${this.stateFile}: ${errorMessage}`, errorStack);
        throw error;
      }
    });
  }
}

/** fs errors may come from another realm, so match on shape rather than `instanceof`. */
export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
