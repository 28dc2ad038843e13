import { describe, expect, it } from 'vitest';
import { addDays, parseStatementDate } from '../src/domain/services/StatementDate.js';

describe('parseStatementDate', () => {
  it.each([
    ['2024-01-15', '2024-01-15'],
    ['15/01/2024', '2024-01-15'],
    ['15/01/24', '2024-01-15'],
    ['5 Feb 2024', '2024-02-05'],
    ['05 Feb 2024', '2024-02-05'],
    ['29 February 2024', '2024-02-29'],
    ['  15   Jan 2024 ', '2024-01-15'],
  ])('reads %s', (input, expected) => {
    expect(parseStatementDate(input)).toBe(expected);
  });

  it.each(['2024-02-30', '31/02/2024', '01/13/2024', 'yesterday', ''])('rejects %s', (input) => {
    expect(parseStatementDate(input)).toBeNull();
  });
});

describe('addDays', () => {
  it('crosses month ends and leap days', () => {
    expect(addDays('2024-01-31', 1)).toBe('2024-02-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
  });
});
