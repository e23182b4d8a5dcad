import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EdgeError } from 'edgli-protocol';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { isLoopbackIPv4, loadConfig, parseConfig } from './config.js';

const ENTRY = 'ab'.repeat(32);
const RELAY = 'cd'.repeat(32);
const BASE = { entryRelay: { url: 'ws://relay.example:9000', address: ENTRY } };

function configIssues(input: unknown): unknown {
  try {
    parseConfig(input);
  } catch (error) {
    if (error instanceof EdgeError && error.code === 'CONFIG_INVALID') return error.context?.issues;
    throw error;
  }
  throw new Error('expected CONFIG_INVALID');
}

describe('parseConfig', () => {
  it('should fill in defaults', () => {
    expect(parseConfig(BASE)).toEqual({
      entryRelay: { url: 'ws://relay.example:9000', address: ENTRY },
      relays: [],
      peers: [],
      session: {},
      maxSessions: 32,
      defaultHopCount: 2,
      preferLocalAddresses: false,
    });
  });

  it('should keep overrides', () => {
    const config = parseConfig({
      ...BASE,
      relays: [{ address: RELAY }],
      session: { retransmitTimeoutMs: 500 },
      defaultHopCount: 3,
      logLevel: 'warn',
    });
    expect(config.relays).toEqual([{ address: RELAY }]);
    expect(config.session).toEqual({ retransmitTimeoutMs: 500 });
    expect(config.defaultHopCount).toBe(3);
    expect(config.logLevel).toBe('warn');
  });

  it('should validate peer relays', () => {
    expect(parseConfig({ ...BASE, peers: [{ address: RELAY, relay: ENTRY }] }).peers).toEqual([
      { address: RELAY, relay: ENTRY },
    ]);
    expect(configIssues({ ...BASE, peers: [{ address: RELAY, relay: 'nope' }] })).toEqual([
      'peers.0.relay: must be 64 lowercase hex characters',
    ]);
  });

  it('should reject malformed relay addresses', () => {
    expect(configIssues({ entryRelay: { url: 'ws://relay.example', address: 'ABC' } })).toEqual([
      'entryRelay.address: must be 64 lowercase hex characters',
    ]);
  });

  it('should reject non-WebSocket entry URLs', () => {
    expect(configIssues({ entryRelay: { url: 'http://relay.example', address: ENTRY } })).toEqual([
      'entryRelay.url: must be a ws:// or wss:// URL',
    ]);
  });

  it('should reject hop counts outside 1..5', () => {
    expect(() => parseConfig({ ...BASE, defaultHopCount: 6 })).toThrow(EdgeError);
    expect(() => parseConfig({ ...BASE, defaultHopCount: 0 })).toThrow(EdgeError);
  });

  it('should refuse to announce a loopback host unless local addresses are preferred', () => {
    const host = { address: '127.0.0.1', port: 9091 };
    expect(configIssues({ ...BASE, host })).toEqual(['host.address: Cannot announce a loopback address']);
    expect(parseConfig({ ...BASE, host, preferLocalAddresses: true }).host).toEqual(host);
    expect(parseConfig({ ...BASE, host: { address: '10.0.0.5', port: 9091 } }).host?.address).toBe('10.0.0.5');
  });
});

describe('isLoopbackIPv4', () => {
  it('should match the whole 127/8 block only', () => {
    expect(isLoopbackIPv4('127.0.0.1')).toBe(true);
    expect(isLoopbackIPv4('127.1.2.3')).toBe(true);
    expect(isLoopbackIPv4('128.0.0.1')).toBe(false);
    expect(isLoopbackIPv4('::1')).toBe(false);
    expect(isLoopbackIPv4('localhost')).toBe(false);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'edgli-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read the file and apply environment overrides', async () => {
    const path = join(dir, 'edgli.json');
    await writeFile(path, JSON.stringify({ ...BASE, relays: [{ address: RELAY }], maxSessions: 4 }));

    const config = await loadConfig({
      env: {
        EDGLI_CONFIG_FILE_PATH: path,
        EDGLI_ENTRY_RELAY_URL: 'wss://other.example',
        EDGLI_IDENTITY_FILE_PATH: '/var/lib/edgli/identity.json',
        EDGLI_IDENTITY_FILE_PASSWORD: 'test-password',
        EDGLI_LOG_LEVEL: 'DEBUG',
        EDGLI_LOG_FORMAT: 'json',
      },
    });

    expect(config.entryRelay).toEqual({ url: 'wss://other.example', address: ENTRY });
    expect(config.relays).toEqual([{ address: RELAY }]);
    expect(config.maxSessions).toBe(4);
    expect(config.identityFile).toBe('/var/lib/edgli/identity.json');
    expect(config.identityPassword).toBe('test-password');
    expect(config.logLevel).toBe('debug');
    expect(config.logFormat).toBe('json');
  });

  it('should prefer an explicit path over the environment', async () => {
    const path = join(dir, 'explicit.json');
    await writeFile(path, JSON.stringify({ ...BASE, maxSessions: 7 }));

    const config = await loadConfig({ path, env: { EDGLI_CONFIG_FILE_PATH: join(dir, 'missing.json') } });
    expect(config.maxSessions).toBe(7);
  });

  it('should build a config from the environment alone', async () => {
    const config = await loadConfig({
      env: { EDGLI_ENTRY_RELAY_URL: 'ws://relay.example', EDGLI_ENTRY_RELAY_ADDRESS: ENTRY },
    });
    expect(config.entryRelay).toEqual({ url: 'ws://relay.example', address: ENTRY });
  });

  it('should reject missing and unreadable files', async () => {
    await expect(loadConfig({ path: join(dir, 'missing.json'), env: {} })).rejects.toMatchObject({
      code: 'CONFIG_INVALID',
    });

    const broken = join(dir, 'broken.json');
    await writeFile(broken, '{ not json');
    await expect(loadConfig({ path: broken, env: {} })).rejects.toMatchObject({ code: 'CONFIG_INVALID' });

    const list = join(dir, 'list.json');
    await writeFile(list, '[]');
    await expect(loadConfig({ path: list, env: {} })).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });

  it('should require an entry relay', async () => {
    await expect(loadConfig({ env: {} })).rejects.toMatchObject({ code: 'CONFIG_INVALID' });
  });
});
