import { EdgeError, type RelayAddress, isRelayAddress } from 'edgli-protocol';

export interface RelayPeer {
  address: RelayAddress;
  url: string;
}

/**
 * Parses `address@ws://host:port` entries separated by commas, as given in EDGLI_RELAY_PEERS.
 */
export function parsePeerList(value: string | undefined): RelayPeer[] {
  if (!value?.trim()) return [];

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map((entry) => {
      const separator = entry.indexOf('@');
      const address = entry.slice(0, separator).toLowerCase();
      const url = entry.slice(separator + 1);
      if (separator <= 0 || !isRelayAddress(address) || !/^wss?:\/\/\S+$/.test(url)) {
        throw new EdgeError('CONFIG_INVALID', `Invalid relay peer entry: ${entry}`, { entry });
      }
      return { address, url };
    });
}
