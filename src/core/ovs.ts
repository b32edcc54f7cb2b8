import { CommandRunner, checkCall, checkOutput } from '../runner/command-runner';
import { Logger } from '../logging/logger';
import { decodePortRecords } from './ovsdb';

export const OVS_VSCTL = ['ovs-vsctl', '--retry'] as const;

/** external-ids marker carried by every uplink port this snap added. */
export const EXTERNAL_PORT_MARKER = {
  key: 'microstack-function',
  value: 'ext-port'
} as const;

/**
 * Keeps the externally managed uplink of an OVS bridge in line with the
 * configured NIC. Every query goes to the live OVS database.
 */
export class BridgeReconciler {
  constructor(
    private runner: CommandRunner,
    private logger: Logger
  ) {}

  async listBridgeIfaces(bridge: string): Promise<string[]> {
    const output = await checkOutput(this.runner, [...OVS_VSCTL, 'list-ifaces', bridge]);
    return output
      .split('\n')
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  /**
   * Interfaces that are both tagged as external ports and attached to `bridge`.
   * `find` does the tag matching, so every returned row counts.
   */
  async getExternalPortsOnBridge(bridge: string): Promise<string[]> {
    const output = await checkOutput(this.runner, [
      ...OVS_VSCTL,
      '--format',
      'json',
      'find',
      'Port',
      `external_ids:${EXTERNAL_PORT_MARKER.key}=${EXTERNAL_PORT_MARKER.value}`
    ]);
    const externalNics = new Set(decodePortRecords(output).map(port => port.name));
    const bridgeIfaces = await this.listBridgeIfaces(bridge);
    return bridgeIfaces.filter(iface => externalNics.has(iface));
  }

  async addInterfaceToBridge(bridge: string, iface: string): Promise<void> {
    const ifaces = await this.listBridgeIfaces(bridge);
    if (ifaces.includes(iface)) {
      this.logger.debug(`Interface ${iface} already on ${bridge}`);
      return;
    }
    this.logger.info(`Adding ${iface} to ${bridge}`);
    await checkCall(this.runner, [
      ...OVS_VSCTL,
      'add-port',
      bridge,
      iface,
      '--',
      'set',
      'Port',
      iface,
      `external-ids:${EXTERNAL_PORT_MARKER.key}=${EXTERNAL_PORT_MARKER.value}`
    ]);
  }

  async delInterfaceFromBridge(bridge: string, iface: string): Promise<void> {
    const ifaces = await this.listBridgeIfaces(bridge);
    if (!ifaces.includes(iface)) {
      this.logger.debug(`Interface ${iface} not on ${bridge}`);
      return;
    }
    this.logger.info(`Removing ${iface} from ${bridge}`);
    await checkCall(this.runner, [...OVS_VSCTL, 'del-port', bridge, iface]);
  }

  /**
   * Leaves `nic` as the only external port on `bridge`. A NIC already attached
   * without the marker is neither re-tagged nor added again.
   */
  async ensureSingleNicOnBridge(bridge: string, nic: string): Promise<void> {
    const externalPorts = await this.getExternalPortsOnBridge(bridge);
    for (const port of externalPorts) {
      if (port !== nic) {
        await this.delInterfaceFromBridge(bridge, port);
      }
    }
    if (!externalPorts.includes(nic)) {
      await this.addInterfaceToBridge(bridge, nic);
    }
  }

  async delExternalNicsFromBridge(bridge: string): Promise<void> {
    const externalPorts = await this.getExternalPortsOnBridge(bridge);
    for (const port of externalPorts) {
      await this.delInterfaceFromBridge(bridge, port);
    }
  }
}
