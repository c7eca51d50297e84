import { SEAT_COLUMNS, SeatMap, SeatStatus } from '../entities';
import { inferRowCount } from './seat.util';

const SYMBOLS: Record<SeatStatus, string> = {
  [SeatStatus.AVAILABLE]: 'O',
  [SeatStatus.HELD]: 'H',
  [SeatStatus.PURCHASED]: 'X',
};

/**
 * ASCII seat grid with an aisle between C and D. Seats missing from the map render as `?`.
 */
export function renderSeatGrid(seatMap: SeatMap): string {
  const rows = inferRowCount(seatMap);
  const lines: string[] = ['Row  A   B   C     D   E   F', '--------------------------------'];

  for (let row = 1; row <= rows; row++) {
    const [a, b, c, d, e, f] = SEAT_COLUMNS.map((column) => {
      const status = seatMap.get(`${row}${column}`);
      return status ? SYMBOLS[status] : '?';
    });
    lines.push(`${String(row).padStart(3)}  ${a}   ${b}   ${c}     ${d}   ${e}   ${f}`);
  }

  lines.push('');
  lines.push('Legend: O=AVAILABLE, H=HOLD, X=PURCHASED');
  return lines.join('\n');
}
