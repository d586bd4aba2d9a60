import { connectivityError, dataError, isOk, ok, storedCount, valueOr } from '../outcome';

describe('outcome', () => {
  it('tells success from failure', () => {
    expect(isOk(ok([]))).toBe(true);
    expect(isOk(connectivityError('down'))).toBe(false);
  });

  it('substitutes a fallback for failures only', () => {
    expect(valueOr(ok(['Physics']), [])).toEqual(['Physics']);
    expect(valueOr<string[]>(dataError('bad row'), [])).toEqual([]);
  });

  it('counts nothing stored for a failed batch', () => {
    expect(storedCount(ok(3))).toBe(3);
    expect(storedCount(connectivityError('simulated write failure'))).toBe(0);
  });
});
