/**
 * Binding servers to listen targets
 */

import type { AddressInfo, Server } from 'net';
import { ListenerError, type ListenTarget } from '@snowweb/core';
import { formatListenTarget, parseListenAddress, type ActivationEnv } from './address.js';

/**
 * Bind a server (HTTP, HTTPS or plain net) to a target.
 *
 * Resolves with the printable bound address, e.g. `tcp:[::1]:43127`.
 * Fails with a LISTENER_BIND error; there are no retries.
 */
export function bindListener(server: Server, target: ListenTarget): Promise<string> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(
        new ListenerError('LISTENER_BIND', `could not listen on ${formatListenTarget(target)}`, {
          context: { address: formatListenTarget(target) },
          cause: error,
        })
      );
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve(describeBoundAddress(server, target));
    };

    server.once('error', onError);
    server.once('listening', onListening);

    switch (target.kind) {
      case 'tcp':
        server.listen({
          port: target.port,
          host: target.host ?? defaultHost(target.network),
          ipv6Only: target.network === 'tcp6',
        });
        break;
      case 'unix':
        server.listen({ path: target.path });
        break;
      case 'fd':
      case 'systemd':
        server.listen({ fd: target.fd });
        break;
    }
  });
}

/**
 * Parse a listen address and bind the server to it.
 */
export async function listenOn(server: Server, input: string, env?: ActivationEnv): Promise<string> {
  return bindListener(server, parseListenAddress(input, env));
}

/**
 * Printable address a server is actually bound to.
 */
export function describeBoundAddress(server: Server, target: ListenTarget): string {
  const address: AddressInfo | string | null = server.address();
  if (typeof address === 'string') {
    return `unix:${address}`;
  }
  if (address === null) {
    return formatListenTarget(target);
  }
  const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
  return `tcp:${host}:${address.port}`;
}

function defaultHost(network: 'tcp' | 'tcp4' | 'tcp6'): string | undefined {
  switch (network) {
    case 'tcp4':
      return '0.0.0.0';
    case 'tcp6':
      return '::';
    case 'tcp':
      return undefined;
  }
}
