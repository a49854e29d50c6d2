/**
 * Mocha bootstrap keeping the suite hermetic: opening a socket (which HTTP,
 * HTTPS and TLS clients all go through) or calling `fetch` throws an
 * `E-NETWORK-BLOCKED` error. Acquisition tests talk to an in-memory
 * {@link HttpGateway} instead. The originals are restored once Mocha is done.
 */
import { after } from "mocha";
import { Socket } from "node:net";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

export const NETWORK_BLOCKED_CODE = "E-NETWORK-BLOCKED";

function blocked(channel: string): never {
  throw Object.assign(new Error(`network access via ${channel} is disabled during tests`), {
    code: NETWORK_BLOCKED_CODE,
  });
}

function installNetworkGuards(): void {
  const originalSocketConnect = Socket.prototype.connect;
  Socket.prototype.connect = () => blocked("net.Socket#connect");
  restores.push(() => {
    Socket.prototype.connect = originalSocketConnect;
  });

  const originalFetch = globalThis.fetch;
  globalThis.fetch = async () => blocked("fetch");
  restores.push(() => {
    globalThis.fetch = originalFetch;
  });
}

installNetworkGuards();

after(() => {
  while (restores.length > 0) {
    restores.pop()?.();
  }
});
