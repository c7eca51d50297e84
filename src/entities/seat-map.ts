export enum SeatStatus {
  AVAILABLE = 'AVAILABLE',
  HELD = 'HOLD',
  PURCHASED = 'PURCHASED',
}

export const SEAT_COLUMNS = ['A', 'B', 'C', 'D', 'E', 'F'] as const;

/**
 * Per-flight seat statuses. The set of seat keys is fixed when the map is built;
 * only the status of an existing seat can change.
 */
export class SeatMap {
  private readonly statuses: Map<string, SeatStatus>;

  constructor(entries: Iterable<readonly [string, SeatStatus]> = []) {
    this.statuses = new Map(entries);
  }

  static withRows(rows: number): SeatMap {
    const entries: Array<[string, SeatStatus]> = [];
    for (let row = 1; row <= rows; row++) {
      for (const column of SEAT_COLUMNS) {
        entries.push([`${row}${column}`, SeatStatus.AVAILABLE]);
      }
    }
    return new SeatMap(entries);
  }

  get size(): number {
    return this.statuses.size;
  }

  has(seat: string): boolean {
    return this.statuses.has(seat);
  }

  get(seat: string): SeatStatus | undefined {
    return this.statuses.get(seat);
  }

  set(seat: string, status: SeatStatus): void {
    if (!this.statuses.has(seat)) {
      throw new Error(`Seat ${seat} is not part of this seat map`);
    }
    this.statuses.set(seat, status);
  }

  seats(): string[] {
    return [...this.statuses.keys()];
  }

  entries(): Array<[string, SeatStatus]> {
    return [...this.statuses.entries()];
  }

  count(status: SeatStatus): number {
    let total = 0;
    for (const value of this.statuses.values()) {
      if (value === status) {
        total++;
      }
    }
    return total;
  }

  toRecord(): Record<string, SeatStatus> {
    return Object.fromEntries(this.statuses);
  }
}
