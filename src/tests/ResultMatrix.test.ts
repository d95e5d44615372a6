// src/tests/ResultMatrix.test.ts
import { ResultMatrix } from '../services/ResultMatrix';

describe('ResultMatrix', () => {
  let matrix: ResultMatrix;

  beforeEach(() => {
    matrix = new ResultMatrix(3, 21);
  });

  it('should start with empty cells for every month and cycle', () => {
    expect(matrix.monthsWithData()).toEqual([]);
    expect(matrix.get(1, 1)).toEqual({ billingMonth: 1, cycle: 1, fieldValues: [], hasData: false });
    expect(matrix.get(12, 21).hasData).toBe(false);
  });

  it('should store values and mark the cell populated', () => {
    const { cell, collision } = matrix.put(5, 15, [10, 'Missing', 3], 'a.txt');

    expect(collision).toBeUndefined();
    expect(cell).toEqual({ billingMonth: 5, cycle: 15, fieldValues: [10, 'Missing', 3], hasData: true, sourceFile: 'a.txt' });
    expect(matrix.get(5, 15)).toEqual(cell);
    expect(matrix.get(5, 14).hasData).toBe(false);
  });

  it('should be idempotent for the same write', () => {
    matrix.put(3, 9, [1, 2, 3], 'a.txt');
    const again = matrix.put(3, 9, [1, 2, 3], 'a.txt');

    expect(again.collision).toBeUndefined();
    expect(matrix.get(3, 9).fieldValues).toEqual([1, 2, 3]);
    expect(matrix.populatedCells()).toHaveLength(1);
  });

  it('should let the last write win and report the overwritten cell', () => {
    matrix.put(3, 9, [1, 2, 3], 'first.txt');
    const { collision } = matrix.put(3, 9, [4, 5, 6], 'second.txt');

    expect(collision?.sourceFile).toBe('first.txt');
    expect(collision?.fieldValues).toEqual([1, 2, 3]);
    expect(matrix.get(3, 9).fieldValues).toEqual([4, 5, 6]);
    expect(matrix.get(3, 9).sourceFile).toBe('second.txt');
  });

  it('should keep large cycle numbers apart from the next month', () => {
    matrix.put(3, 150, [1, 1, 1], 'big-cycle.txt');
    matrix.put(4, 50, [2, 2, 2], 'other.txt');

    expect(matrix.get(3, 150).fieldValues).toEqual([1, 1, 1]);
    expect(matrix.get(4, 50).fieldValues).toEqual([2, 2, 2]);
  });

  it('should list populated months in ascending order', () => {
    matrix.put(9, 4, [1, 1, 1], 'sep.txt');
    matrix.put(2, 20, [1, 1, 1], 'feb.txt');
    matrix.put(9, 1, [1, 1, 1], 'sep-1.txt');
    matrix.put(13, 2, [1, 1, 1], 'rollover.txt');

    expect(matrix.monthsWithData()).toEqual([2, 9, 13]);
    expect(matrix.populatedCells().map(cell => [cell.billingMonth, cell.cycle])).toEqual([[2, 20], [9, 1], [9, 4], [13, 2]]);
  });

  it('should reject non-integer coordinates and the wrong number of values', () => {
    expect(() => matrix.put(2.5, 1, [1, 1, 1])).toThrow(RangeError);
    expect(() => matrix.get(1, Number.NaN)).toThrow(RangeError);
    expect(() => matrix.put(1, 1, [1, 1])).toThrow('Expected 3 field values, got 2');
  });

  it('should clear everything on initialize', () => {
    matrix.put(6, 6, [1, 2, 3], 'a.txt');
    matrix.initialize();

    expect(matrix.monthsWithData()).toEqual([]);
    expect(matrix.get(6, 6).hasData).toBe(false);
  });
});
