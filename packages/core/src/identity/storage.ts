import { scryptSync } from 'node:crypto';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import nacl from 'tweetnacl';
import { bytesToHex, hexToBytes } from '../crypto/hex.js';
import { EdgeError } from '../errors/edge-error.js';
import { type RelayKeypair, keypairFromSecretKey } from './keypair.js';

export interface IdentityStorage {
  save(keypair: RelayKeypair): Promise<void>;
  load(): Promise<RelayKeypair | null>;
}

interface SealedSecret {
  salt: string;
  nonce: string;
  ciphertext: string;
}

interface StoredIdentity {
  version: 1;
  publicKey: string;
  secretKey?: string;
  sealed?: SealedSecret;
}

const SALT_BYTES = 16;

function isSealedSecret(value: unknown): value is SealedSecret {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.salt === 'string' &&
    typeof candidate.nonce === 'string' &&
    typeof candidate.ciphertext === 'string'
  );
}

function isStoredIdentity(value: unknown): value is StoredIdentity {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: Record<string, unknown> = { ...value };
  if (candidate.version !== 1 || typeof candidate.publicKey !== 'string') return false;
  if (candidate.secretKey !== undefined) return typeof candidate.secretKey === 'string';
  return isSealedSecret(candidate.sealed);
}

function deriveKey(password: string, salt: Uint8Array): Uint8Array {
  return new Uint8Array(scryptSync(password, salt, nacl.secretbox.keyLength));
}

export function encodeIdentity(keypair: RelayKeypair, password?: string): StoredIdentity {
  if (!password) {
    return { version: 1, publicKey: bytesToHex(keypair.publicKey), secretKey: bytesToHex(keypair.secretKey) };
  }
  const salt = nacl.randomBytes(SALT_BYTES);
  const nonce = nacl.randomBytes(nacl.secretbox.nonceLength);
  const ciphertext = nacl.secretbox(keypair.secretKey, nonce, deriveKey(password, salt));
  return {
    version: 1,
    publicKey: bytesToHex(keypair.publicKey),
    sealed: { salt: bytesToHex(salt), nonce: bytesToHex(nonce), ciphertext: bytesToHex(ciphertext) },
  };
}

function storedBytes(hex: string, field: string): Uint8Array {
  try {
    return hexToBytes(hex);
  } catch (error) {
    throw new EdgeError('IDENTITY_MISSING', `Identity file has an invalid ${field}`, { error });
  }
}

export function decodeIdentity(stored: unknown, password?: string): RelayKeypair {
  if (!isStoredIdentity(stored)) {
    throw new EdgeError('IDENTITY_MISSING', 'Identity file has an unknown format');
  }

  let secretKey: Uint8Array;
  if (stored.secretKey !== undefined) {
    secretKey = storedBytes(stored.secretKey, 'secret key');
  } else if (stored.sealed) {
    if (!password) {
      throw new EdgeError('IDENTITY_MISSING', 'Identity file is sealed and no password was given');
    }
    const opened = nacl.secretbox.open(
      storedBytes(stored.sealed.ciphertext, 'ciphertext'),
      storedBytes(stored.sealed.nonce, 'nonce'),
      deriveKey(password, storedBytes(stored.sealed.salt, 'salt')),
    );
    if (!opened) {
      throw new EdgeError('IDENTITY_MISSING', 'Identity file could not be decrypted');
    }
    secretKey = opened;
  } else {
    throw new EdgeError('IDENTITY_MISSING', 'Identity file has no secret key');
  }

  if (secretKey.length !== nacl.box.secretKeyLength) {
    throw new EdgeError('IDENTITY_MISSING', 'Identity file secret key has the wrong length', {
      length: secretKey.length,
    });
  }
  const keypair = keypairFromSecretKey(secretKey);
  if (bytesToHex(keypair.publicKey) !== stored.publicKey.toLowerCase()) {
    throw new EdgeError('IDENTITY_MISSING', 'Identity file public key does not match its secret key');
  }
  return keypair;
}

export class MemoryStorage implements IdentityStorage {
  private stored: StoredIdentity | null = null;

  async save(keypair: RelayKeypair): Promise<void> {
    this.stored = encodeIdentity(keypair);
  }

  async load(): Promise<RelayKeypair | null> {
    if (!this.stored) return null;
    return decodeIdentity(this.stored);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface FileStorageOptions {
  filePath?: string;
  /** Seals the secret key with XSalsa20-Poly1305 under a scrypt-derived key. */
  password?: string;
}

export class FileStorageAdapter implements IdentityStorage {
  private filePath: string;
  private password?: string;

  constructor(options: FileStorageOptions = {}) {
    this.filePath = options.filePath ?? this.defaultPath();
    this.password = options.password;
  }

  private defaultPath(): string {
    const home = typeof process !== 'undefined' ? process.env.HOME || process.env.USERPROFILE || '.' : '.';
    return `${home}/.edgli/identity.json`;
  }

  getFilePath(): string {
    return this.filePath;
  }

  async save(keypair: RelayKeypair): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(encodeIdentity(keypair, this.password), null, 2), {
      encoding: 'utf-8',
      mode: 0o600,
    });
  }

  async load(): Promise<RelayKeypair | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new EdgeError('IDENTITY_MISSING', `Identity file '${this.filePath}' cannot be read`, { error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new EdgeError('IDENTITY_MISSING', `Identity file '${this.filePath}' is not valid JSON`);
    }
    return decodeIdentity(parsed, this.password);
  }
}
