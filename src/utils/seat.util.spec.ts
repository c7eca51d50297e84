import { SeatMap, SeatStatus } from '../entities';
import { availableSeatsInOrder, compareSeats, inferRowCount, normalizeSeat, parseSeat } from './seat.util';

describe('seat utils', () => {
  describe('normalizeSeat', () => {
    it('should trim and upper-case', () => {
      expect(normalizeSeat(' 12c ')).toBe('12C');
    });

    it('should return null for blank input', () => {
      expect(normalizeSeat('   ')).toBeNull();
    });
  });

  describe('parseSeat', () => {
    it('should split row and column', () => {
      expect(parseSeat('14A')).toEqual({ row: 14, column: 'A' });
    });

    it('should return null for identifiers without a row', () => {
      expect(parseSeat('A14')).toBeNull();
    });
  });

  describe('compareSeats', () => {
    it('should order by row number, then column', () => {
      expect(['10A', '2F', '2A', 'XX', '1C'].sort(compareSeats)).toEqual(['1C', '2A', '2F', '10A', 'XX']);
    });
  });

  describe('availableSeatsInOrder', () => {
    it('should list only available seats, front to back', () => {
      const seatMap = new SeatMap([
        ['2A', SeatStatus.AVAILABLE],
        ['1B', SeatStatus.AVAILABLE],
        ['1A', SeatStatus.HELD],
        ['10A', SeatStatus.AVAILABLE],
        ['3A', SeatStatus.PURCHASED],
      ]);

      expect(availableSeatsInOrder(seatMap)).toEqual(['1B', '2A', '10A']);
    });
  });

  describe('inferRowCount', () => {
    it('should use the highest row present', () => {
      expect(inferRowCount(SeatMap.withRows(7))).toBe(7);
    });

    it('should fall back when no seat parses', () => {
      expect(inferRowCount(new SeatMap([['AISLE', SeatStatus.AVAILABLE]]))).toBe(24);
      expect(inferRowCount(new SeatMap(), 3)).toBe(3);
    });
  });
});
