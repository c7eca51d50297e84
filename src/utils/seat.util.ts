import { SeatMap, SeatStatus } from '../entities';

export interface SeatPosition {
  row: number;
  column: string;
}

const SEAT_PATTERN = /^(\d+)([A-Z]+)$/;

/**
 * Trims and upper-cases a requested seat, e.g. ` 12c ` -> `12C`.
 * Returns null for blank input.
 */
export function normalizeSeat(raw: string): string | null {
  const seat = raw.trim().toUpperCase();
  return seat.length > 0 ? seat : null;
}

export function parseSeat(seat: string): SeatPosition | null {
  const match = SEAT_PATTERN.exec(seat);
  if (!match) {
    return null;
  }
  return { row: Number(match[1]), column: match[2] };
}

/**
 * Front-to-back, then left-to-right: `2A` < `2F` < `10A`.
 * Identifiers that do not parse sort after the ones that do.
 */
export function compareSeats(a: string, b: string): number {
  const left = parseSeat(a);
  const right = parseSeat(b);
  if (!left || !right) {
    if (left) return -1;
    if (right) return 1;
    return a.localeCompare(b);
  }
  if (left.row !== right.row) {
    return left.row - right.row;
  }
  return left.column.localeCompare(right.column);
}

export function availableSeatsInOrder(seatMap: SeatMap): string[] {
  return seatMap
    .entries()
    .filter(([, status]) => status === SeatStatus.AVAILABLE)
    .map(([seat]) => seat)
    .sort(compareSeats);
}

/** Highest row number present in the map, or `fallback` when none parses. */
export function inferRowCount(seatMap: SeatMap, fallback = 24): number {
  let maxRow = 0;
  for (const seat of seatMap.seats()) {
    const position = parseSeat(seat);
    if (position && position.row > maxRow) {
      maxRow = position.row;
    }
  }
  return maxRow > 0 ? maxRow : fallback;
}
