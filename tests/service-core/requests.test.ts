import { describe, it, expect } from 'vitest';
import {
  assignCompanionSchema,
  changeStateSchema,
  configureStateUriSchema,
  createServiceSchema,
  journalQuerySchema,
  tokenIdSchema,
  validateRequest,
} from '@core/requests';

describe('validateRequest', () => {
  it('trims principals', () => {
    expect(validateRequest(createServiceSchema, { recipient: '  client-a ' })).toEqual({
      success: true,
      data: { recipient: 'client-a' },
    });
  });

  it('names the failing field', () => {
    expect(validateRequest(assignCompanionSchema, { companion: '   ' })).toEqual({
      success: false,
      error: 'companion: must be a non-empty principal',
    });
  });

  it('accepts a state by name or ordinal with an optional rating', () => {
    expect(validateRequest(changeStateSchema, { state: 'Rated', rating: 5 })).toEqual({
      success: true,
      data: { state: 'Rated', rating: 5 },
    });
    expect(validateRequest(changeStateSchema, { state: 2 })).toEqual({
      success: true,
      data: { state: 2 },
    });
  });

  it('leaves rating range checks to the registry', () => {
    expect(validateRequest(changeStateSchema, { state: 'Rated', rating: 11 }).success).toBe(true);
  });

  it('rejects a missing state', () => {
    const result = validateRequest(changeStateSchema, {});
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.startsWith('state:')).toBe(true);
  });

  it('requires a non-empty uri', () => {
    expect(validateRequest(configureStateUriSchema, { state: 'Paid', uri: '' })).toEqual({
      success: false,
      error: 'uri: must be a non-empty URI',
    });
  });
});

describe('tokenIdSchema', () => {
  it('coerces path parameters', () => {
    expect(tokenIdSchema.safeParse('12')).toEqual({ success: true, data: 12 });
  });

  it('rejects negative, fractional and non-numeric ids', () => {
    for (const raw of ['-1', '1.5', 'abc']) {
      expect(tokenIdSchema.safeParse(raw).success).toBe(false);
    }
  });

  it('rejects blanks, hex and exponent notation', () => {
    for (const raw of [' ', '', '0x10', '1e3', '+1', ' 7']) {
      expect(tokenIdSchema.safeParse(raw).success).toBe(false);
    }
  });
});

describe('journalQuerySchema', () => {
  it('coerces query strings', () => {
    expect(journalQuerySchema.parse({ limit: '10', tokenId: '3' })).toEqual({
      limit: 10,
      tokenId: 3,
    });
  });

  it('caps the limit', () => {
    expect(journalQuerySchema.safeParse({ limit: '501' }).success).toBe(false);
  });

  it('treats an empty value as absent', () => {
    expect(journalQuerySchema.parse({ limit: '', tokenId: '' })).toEqual({
      limit: undefined,
      tokenId: undefined,
    });
  });

  it('rejects a blank or hex token filter', () => {
    expect(journalQuerySchema.safeParse({ tokenId: ' ' }).success).toBe(false);
    expect(journalQuerySchema.safeParse({ tokenId: '0x1' }).success).toBe(false);
  });
});
