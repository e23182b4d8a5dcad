import { readFile } from 'node:fs/promises';
import { isIPv4 } from 'node:net';
import { EdgeError, MAX_HOPS, MIN_HOPS, isRelayAddress } from 'edgli-protocol';
import { z } from 'zod';

const addressSchema = z.string().refine(isRelayAddress, 'must be 64 lowercase hex characters');

const relaySchema = z.object({ address: addressSchema });

/** A known edge node and the relay it is connected to. */
const peerSchema = z.object({ address: addressSchema, relay: addressSchema });

const entryRelaySchema = z.object({
  url: z
    .string()
    .url()
    .refine((url) => /^wss?:\/\//.test(url), 'must be a ws:// or wss:// URL'),
  address: addressSchema,
});

const sessionSchema = z
  .object({
    retransmitTimeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    setupAttempts: z.number().int().positive(),
    drainTimeoutMs: z.number().int().positive(),
    sendWindow: z.number().int().positive(),
    reorderWindow: z.number().int().positive(),
    maxMessageSize: z.number().int().positive(),
  })
  .partial();

const hostSchema = z.object({
  address: z.string().min(1),
  port: z.number().int().min(0).max(65535),
});

export const edgeClientConfigSchema = z
  .object({
    entryRelay: entryRelaySchema,
    relays: z.array(relaySchema).default([]),
    peers: z.array(peerSchema).default([]),
    identityFile: z.string().min(1).optional(),
    identityPassword: z.string().min(1).optional(),
    session: sessionSchema.default({}),
    maxSessions: z.number().int().positive().default(32),
    defaultHopCount: z.number().int().min(MIN_HOPS).max(MAX_HOPS).default(2),
    host: hostSchema.optional(),
    preferLocalAddresses: z.boolean().default(false),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    logFormat: z.enum(['text', 'json']).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.host && !config.preferLocalAddresses && isLoopbackIPv4(config.host.address)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['host', 'address'],
        message: 'Cannot announce a loopback address',
      });
    }
  });

export type EdgeClientConfig = z.infer<typeof edgeClientConfigSchema>;
export type EdgeClientConfigInput = z.input<typeof edgeClientConfigSchema>;

export interface LoadConfigOptions {
  /** JSON file to read; falls back to EDGLI_CONFIG_FILE_PATH */
  path?: string;
  env?: Record<string, string | undefined>;
}

export function isLoopbackIPv4(address: string): boolean {
  return isIPv4(address) && address.split('.')[0] === '127';
}

export function parseConfig(input: unknown): EdgeClientConfig {
  const result = edgeClientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new EdgeError('CONFIG_INVALID', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new EdgeError('CONFIG_INVALID', `Cannot read config file ${path}`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new EdgeError('CONFIG_INVALID', `Config file ${path} is not valid JSON`, { path });
  }
  if (!isRecord(parsed)) {
    throw new EdgeError('CONFIG_INVALID', `Config file ${path} must contain a JSON object`, { path });
  }
  return parsed;
}

/**
 * Reads the JSON config file (if any) and applies EDGLI_* environment overrides on top, then
 * validates the result.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<EdgeClientConfig> {
  const env = options.env ?? process.env;
  const path = options.path ?? env.EDGLI_CONFIG_FILE_PATH;
  const raw: Record<string, unknown> = path ? await readConfigFile(path) : {};

  if (env.EDGLI_ENTRY_RELAY_URL || env.EDGLI_ENTRY_RELAY_ADDRESS) {
    const entryRelay: Record<string, unknown> = isRecord(raw.entryRelay) ? { ...raw.entryRelay } : {};
    if (env.EDGLI_ENTRY_RELAY_URL) entryRelay.url = env.EDGLI_ENTRY_RELAY_URL;
    if (env.EDGLI_ENTRY_RELAY_ADDRESS) entryRelay.address = env.EDGLI_ENTRY_RELAY_ADDRESS;
    raw.entryRelay = entryRelay;
  }

  if (env.EDGLI_IDENTITY_FILE_PATH) raw.identityFile = env.EDGLI_IDENTITY_FILE_PATH;
  if (env.EDGLI_IDENTITY_FILE_PASSWORD) raw.identityPassword = env.EDGLI_IDENTITY_FILE_PASSWORD;
  if (env.EDGLI_LOG_LEVEL) raw.logLevel = env.EDGLI_LOG_LEVEL.trim().toLowerCase();
  if (env.EDGLI_LOG_FORMAT) raw.logFormat = env.EDGLI_LOG_FORMAT.trim().toLowerCase();

  return parseConfig(raw);
}
