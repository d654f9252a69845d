import { networkInterfaces } from 'node:os';
import { logWarn } from './logger/index.js';

const COMPONENT = 'Network';
const LOOPBACK = '127.0.0.1';

/**
 * First non-internal IPv4 address of this host, or the loopback address when
 * the host has none.
 */
export function getLocalIpAddress(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address;
      }
    }
  }

  logWarn(COMPONENT, `No external IPv4 address found, defaulting to ${LOOPBACK}`);
  return LOOPBACK;
}
