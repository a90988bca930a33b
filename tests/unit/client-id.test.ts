import { ClientId, parseClientIds, sortClientIds } from '../../src/services/clients/client-id.js';
import { InvalidIdentifierError } from '../../src/types/errors.js';

describe('ClientId', () => {
  test('accepts C. followed by 16 hex digits', () => {
    expect(ClientId.parse('C.1234567890abcdef').toString()).toBe('C.1234567890abcdef');
    expect(ClientId.parse('C.ABCDEF0123456789').toString()).toBe('C.ABCDEF0123456789');
  });

  test('strips the legacy URN prefix', () => {
    expect(ClientId.parse('aff4:/C.1234567890abcdef').toString()).toBe('C.1234567890abcdef');
  });

  test.each([
    '',
    'C.123',
    'C.1234567890abcdeg',
    'C.1234567890abcdef0',
    'c.1234567890abcdef',
    'aff4:/C.1234567890abcdef/fs'
  ])('rejects %p at construction', raw => {
    expect(() => ClientId.parse(raw)).toThrow(InvalidIdentifierError);
    expect(ClientId.isValid(raw)).toBe(false);
  });

  test('serializes to its string form', () => {
    expect(JSON.stringify({ id: ClientId.parse('C.000000000000000a') })).toBe('{"id":"C.000000000000000a"}');
  });

  test('equality and ordering follow the string value', () => {
    const a = ClientId.parse('C.0000000000000001');
    const b = ClientId.parse('C.0000000000000002');
    expect(a.equals(ClientId.parse('C.0000000000000001'))).toBe(true);
    expect(a.equals(b)).toBe(false);
    expect(sortClientIds([b, a]).map(String)).toEqual(['C.0000000000000001', 'C.0000000000000002']);
  });

  test('parseClientIds fails on the first bad id', () => {
    expect(() => parseClientIds(['C.0000000000000001', 'nope'])).toThrow('Invalid client id: nope');
  });
});
