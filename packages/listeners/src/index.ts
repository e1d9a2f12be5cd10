/**
 * SnowWeb Listeners Package
 *
 * Resolves listen addresses (TCP, Unix sockets, inherited
 * descriptors, systemd socket activation) and binds servers to them.
 */

export {
  SD_LISTEN_FDS_START,
  splitNetworkAddress,
  parseListenAddress,
  resolveSystemdSocket,
  formatListenTarget,
  type ActivationEnv,
} from './address.js';

export { bindListener, listenOn, describeBoundAddress } from './bind.js';
