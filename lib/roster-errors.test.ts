import { describe, it, expect } from 'vitest';
import { IntegrityError, isRosterError, NotFoundError, ParseError, toUserMessage, ValidationError } from './roster-errors';

describe('roster-errors', () => {
  it('carries a code and the subclass name', () => {
    const err = new NotFoundError('Record not found', 'c@x.com');
    expect(err.code).toBe('NOT_FOUND');
    expect(err.name).toBe('NotFoundError');
    expect(err.identity).toBe('c@x.com');
    expect(err).toBeInstanceOf(Error);
    expect(isRosterError(err)).toBe(true);
  });

  it('keeps operation details', () => {
    expect(new ValidationError('missing', ['Work Email']).fields).toEqual(['Work Email']);
    const integrity = new IntegrityError('mismatch', 3, 2);
    expect([integrity.code, integrity.expected, integrity.actual]).toEqual(['INTEGRITY', 3, 2]);
    expect(new ParseError('bad', 'r.csv').fileName).toBe('r.csv');
  });

  it('turns any thrown value into display text', () => {
    expect(toUserMessage(new ValidationError('Please fill in required fields: Work Email'))).toBe(
      'Please fill in required fields: Work Email',
    );
    expect(toUserMessage(new Error('boom'))).toBe('Unexpected error: boom');
    expect(toUserMessage('plain text')).toBe('plain text');
    expect(toUserMessage(42)).toBe('Unexpected error');
    expect(isRosterError(new Error('x'))).toBe(false);
  });
});
