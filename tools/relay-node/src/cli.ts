import { FileStorageAdapter, IdentityManager, MemoryStorage, createLogger } from 'edgli-protocol';
import { parsePeerList } from './peers.js';
import { createRelayServer } from './server.js';

const log = createLogger('RelayNode');

async function main(): Promise<void> {
  const port = Number(process.env.PORT) || 9090;
  const identityFile = process.env.EDGLI_RELAY_IDENTITY_FILE_PATH;
  const storage = identityFile
    ? new FileStorageAdapter({ filePath: identityFile, password: process.env.EDGLI_RELAY_IDENTITY_FILE_PASSWORD })
    : new MemoryStorage();
  const keypair = await new IdentityManager(storage).init();

  const server = createRelayServer({
    port,
    host: process.env.HOST,
    keypair,
    peers: parsePeerList(process.env.EDGLI_RELAY_PEERS),
  });
  const bound = await server.listening;
  log.info(`relay node running on ws://localhost:${bound}`, { address: server.address });

  process.on('SIGINT', () => {
    void server.close().then(() => process.exit(0));
  });
}

void main().catch((error: unknown) => {
  log.error('failed to start relay node', { error });
  process.exit(1);
});
