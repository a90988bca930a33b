import { extractClientKeywords, normalizeKeyword, UNIVERSAL_KEYWORD } from '../../src/services/clients/keywords.js';
import { CLIENT_1, makeSnapshot } from '../utils/fixtures.js';

describe('extractClientKeywords', () => {
  const keywords = extractClientKeywords(makeSnapshot(CLIENT_1, 1000), [
    { name: 'Prod', owner: 'alice' }
  ]);

  test('always includes the universal keyword', () => {
    expect(keywords.has(UNIVERSAL_KEYWORD)).toBe(true);
  });

  test('indexes the client id with and without its prefix', () => {
    expect(keywords.has('c.1000000000000001')).toBe(true);
    expect(keywords.has('1000000000000001')).toBe(true);
  });

  test('indexes host names and their prefixes', () => {
    for (const keyword of ['host:web-01.example.com', 'host:web-01', 'host:web', 'host:web-01.example', 'web-01']) {
      expect(keywords.has(keyword)).toBe(true);
    }
  });

  test('indexes OS strings, users and agent info', () => {
    for (const keyword of ['linux', 'ubuntu', 'x86_64', 'user:alice', 'alice', 'smith', 'client:fleet-agent', 'client:3.2.0']) {
      expect(keywords.has(keyword)).toBe(true);
    }
  });

  test('indexes addresses and MAC forms', () => {
    for (const keyword of ['ip:10.0.0.5', 'ip:10.0.0', 'ip:10', 'mac:001122334455', 'mac:00:11:22:33:44:55']) {
      expect(keywords.has(keyword)).toBe(true);
    }
  });

  test('indexes labels by name', () => {
    expect(keywords.has('label:prod')).toBe(true);
  });

  test('every keyword is normalized', () => {
    for (const keyword of keywords) {
      expect(keyword).toBe(normalizeKeyword(keyword));
    }
  });

  test('free-text fields never produce label keywords', () => {
    const spoofed = extractClientKeywords(makeSnapshot(CLIENT_1, 1000, {
      users: [{ username: 'mallory', fullName: 'label:ops Mallory', homedir: '/home/mallory' }]
    }));
    expect([...spoofed].filter(keyword => keyword.startsWith('label:'))).toEqual([]);
    expect(spoofed.has('mallory')).toBe(true);
  });

  test('missing fields add nothing', () => {
    const bare = extractClientKeywords({
      clientId: CLIENT_1,
      timestamp: 1,
      users: [],
      interfaces: [],
      volumes: []
    });
    expect([...bare].sort()).toEqual(['.', '1000000000000001', 'c.1000000000000001']);
  });
});
