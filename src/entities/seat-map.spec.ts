import { SeatMap, SeatStatus } from './seat-map';

describe('SeatMap', () => {
  it('should build six seats per row in row-major order', () => {
    const seatMap = SeatMap.withRows(2);

    expect(seatMap.size).toBe(12);
    expect(seatMap.seats()).toEqual(['1A', '1B', '1C', '1D', '1E', '1F', '2A', '2B', '2C', '2D', '2E', '2F']);
    expect(seatMap.count(SeatStatus.AVAILABLE)).toBe(12);
  });

  it('should change the status of an existing seat', () => {
    const seatMap = SeatMap.withRows(1);

    seatMap.set('1C', SeatStatus.HELD);

    expect(seatMap.get('1C')).toBe(SeatStatus.HELD);
    expect(seatMap.count(SeatStatus.HELD)).toBe(1);
    expect(seatMap.count(SeatStatus.AVAILABLE)).toBe(5);
  });

  it('should refuse to add a seat that is not in the map', () => {
    const seatMap = SeatMap.withRows(1);

    expect(() => seatMap.set('2A', SeatStatus.HELD)).toThrow('Seat 2A is not part of this seat map');
    expect(seatMap.has('2A')).toBe(false);
    expect(seatMap.size).toBe(6);
  });

  it('should keep insertion order in toRecord', () => {
    const seatMap = new SeatMap([
      ['3B', SeatStatus.PURCHASED],
      ['1A', SeatStatus.AVAILABLE],
    ]);

    expect(Object.keys(seatMap.toRecord())).toEqual(['3B', '1A']);
    expect(seatMap.toRecord()).toEqual({ '3B': 'PURCHASED', '1A': 'AVAILABLE' });
  });
});
