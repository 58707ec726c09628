/**
 * Mocha bootstrap keeping the suite hermetic: outbound network primitives
 * (`net.Socket#connect`, `tls.TLSSocket#connect` and the WHATWG `fetch`) are
 * replaced by shims throwing `E-NETWORK-BLOCKED`, and restored once the run
 * finishes. Transform handlers exercised by the tests are in-process stubs, so
 * nothing legitimate needs a socket.
 */
import { after, before } from "mocha";
import { Socket } from "node:net";
import { TLSSocket } from "node:tls";

type RestoreHook = () => void;

const restores: RestoreHook[] = [];

/** Error raised by every blocked primitive. */
export class NetworkBlockedError extends Error {
  readonly code = "E-NETWORK-BLOCKED";

  constructor(primitive: string) {
    super(`network access via ${primitive} is disabled during tests`);
    this.name = "NetworkBlockedError";
  }
}

function installNetworkGuards(): void {
  const originalSocketConnect = Socket.prototype.connect;
  Socket.prototype.connect = function blockedSocketConnect(): never {
    throw new NetworkBlockedError("net.Socket#connect");
  };
  restores.push(() => {
    Socket.prototype.connect = originalSocketConnect;
  });

  const originalTlsConnect = TLSSocket.prototype.connect;
  TLSSocket.prototype.connect = function blockedTlsConnect(): never {
    throw new NetworkBlockedError("tls.TLSSocket#connect");
  };
  restores.push(() => {
    TLSSocket.prototype.connect = originalTlsConnect;
  });

  if (typeof globalThis.fetch === "function") {
    const originalFetch = globalThis.fetch;
    globalThis.fetch = async function blockedFetch(): Promise<never> {
      throw new NetworkBlockedError("fetch");
    };
    restores.push(() => {
      globalThis.fetch = originalFetch;
    });
  }
}

before(() => {
  installNetworkGuards();
});

after(() => {
  while (restores.length > 0) {
    const restore = restores.pop();
    restore?.();
  }
});
