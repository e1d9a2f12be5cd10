/**
 * Listen address parsing
 *
 * Turns `<network>:<address>` strings into listen targets:
 *
 *   tcp:[::1]:8080      TCP (also tcp4, tcp6); an empty port picks one
 *   unix:/run/site.sock Unix domain socket
 *   fd:3                already-open descriptor
 *   systemd:            first descriptor passed by systemd
 *   systemd:https       descriptor named `https` (FileDescriptorName=)
 */

import { ListenerError, type ListenTarget, type TcpNetwork } from '@snowweb/core';

/** First descriptor passed through socket activation, see sd_listen_fds(3) */
export const SD_LISTEN_FDS_START = 3;

/** The subset of the environment read for socket activation */
export interface ActivationEnv {
  LISTEN_PID?: string;
  LISTEN_FDS?: string;
  LISTEN_FDNAMES?: string;
}

const TCP_NETWORKS: readonly TcpNetwork[] = ['tcp', 'tcp4', 'tcp6'];

/**
 * Split `network:address` at the first colon.
 */
export function splitNetworkAddress(input: string): { network: string; address: string } {
  const separator = input.indexOf(':');
  if (separator === -1) {
    throw new ListenerError('LISTENER_PARSE', `no separator between network and address in ${JSON.stringify(input)}`, {
      context: { address: input },
    });
  }
  return { network: input.slice(0, separator), address: input.slice(separator + 1) };
}

/**
 * Parse a listen address.
 */
export function parseListenAddress(
  input: string,
  env: ActivationEnv = process.env,
  pid: number = process.pid
): ListenTarget {
  const { network, address } = splitNetworkAddress(input);

  const tcpNetwork = TCP_NETWORKS.find((candidate) => candidate === network);
  if (tcpNetwork) {
    return parseTcpAddress(tcpNetwork, address, input);
  }

  switch (network) {
    case 'unix':
      if (address === '') {
        throw parseError(input, 'missing Unix socket path');
      }
      return { kind: 'unix', path: address };

    case 'fd':
      if (!/^\d+$/.test(address)) {
        throw parseError(input, `invalid file descriptor number ${JSON.stringify(address)}`);
      }
      return { kind: 'fd', fd: Number.parseInt(address, 10) };

    case 'systemd':
      return resolveSystemdSocket(address, env, pid);

    default:
      throw parseError(input, `unknown network ${JSON.stringify(network)}`);
  }
}

/**
 * Pick a descriptor handed over by systemd socket activation.
 */
export function resolveSystemdSocket(name: string, env: ActivationEnv, pid: number): ListenTarget {
  const listenPid = env.LISTEN_PID;
  if (listenPid !== undefined && listenPid !== '' && Number.parseInt(listenPid, 10) !== pid) {
    throw new ListenerError('LISTENER_NO_SOCKETS', 'no sockets were passed by systemd to the current process', {
      context: { listen_pid: listenPid },
    });
  }

  const count = Number.parseInt(env.LISTEN_FDS ?? '', 10);
  if (!Number.isInteger(count) || count <= 0) {
    throw new ListenerError('LISTENER_NO_SOCKETS', 'no sockets were passed by systemd to the current process');
  }

  if (name === '') {
    return { kind: 'systemd', fd: SD_LISTEN_FDS_START };
  }

  const names = (env.LISTEN_FDNAMES ?? '').split(':').slice(0, count);
  const index = names.indexOf(name);
  if (index === -1) {
    throw new ListenerError('LISTENER_NOT_FOUND', `systemd socket ${JSON.stringify(name)} not found`, {
      context: { name, available: names.join(',') },
    });
  }
  return { kind: 'systemd', fd: SD_LISTEN_FDS_START + index, name };
}

/**
 * Printable form of a target, in the same grammar it was parsed from.
 */
export function formatListenTarget(target: ListenTarget): string {
  switch (target.kind) {
    case 'tcp': {
      const host = target.host?.includes(':') ? `[${target.host}]` : target.host ?? '';
      return `${target.network}:${host}:${target.port}`;
    }
    case 'unix':
      return `unix:${target.path}`;
    case 'fd':
      return `fd:${target.fd}`;
    case 'systemd':
      return target.name ? `systemd:${target.name}` : 'systemd:';
  }
}

function parseTcpAddress(network: TcpNetwork, address: string, input: string): ListenTarget {
  const colon = address.lastIndexOf(':');
  if (colon === -1) {
    throw parseError(input, 'missing port in address');
  }

  let host = address.slice(0, colon);
  const portText = address.slice(colon + 1);

  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  } else if (host.includes(':') || host.includes('[') || host.includes(']')) {
    throw parseError(input, 'IPv6 hosts must be enclosed in brackets');
  }

  let port = 0;
  if (portText !== '') {
    if (!/^\d+$/.test(portText)) {
      throw parseError(input, `invalid port ${JSON.stringify(portText)}`);
    }
    port = Number.parseInt(portText, 10);
    if (port > 65535) {
      throw parseError(input, `port ${port} out of range`);
    }
  }

  return host === '' ? { kind: 'tcp', network, port } : { kind: 'tcp', network, host, port };
}

function parseError(input: string, message: string): ListenerError {
  return new ListenerError('LISTENER_PARSE', `parsing listen address ${JSON.stringify(input)}: ${message}`, {
    context: { address: input },
  });
}
