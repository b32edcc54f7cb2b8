import { promises as fs } from 'fs';
import path from 'path';
import { CommandRunner, checkCall } from '../runner/command-runner';
import { Logger } from '../logging/logger';
import { CidrSchema } from '../types/schemas';
import { SettingsError } from './errors';
import { BridgeReconciler, OVS_VSCTL } from './ovs';
import { lookupBoolean, lookupString } from './settings-tree';
import type { SettingsTree } from './settings-tree';

export const INTEGRATION_BRIDGE = 'br-int';
export const DEFAULT_EXTERNAL_BRIDGE = 'br-ex';
export const DEFAULT_PHYSNET = 'physnet1';

export const OVN_PKI_DIR = 'etc/pki/ovn';
export const OVN_TLS_FILES = {
  key: 'ovn-central.key',
  cert: 'ovn-central.crt',
  cacert: 'ovn-central-ca.crt'
} as const;

const CHASSIS_KEYS = ['network.ovn-sb-connection', 'network.ip-address', 'node.fqdn'] as const;

/**
 * Registers this host as an OVN chassis and wires up the external bridge.
 */
export class OvnChassisConfigurator {
  constructor(
    private runner: CommandRunner,
    private bridges: BridgeReconciler,
    private logger: Logger
  ) {}

  /** Returns false, leaving OVS untouched, while chassis settings are missing. */
  async configureOvs(settings: SettingsTree): Promise<boolean> {
    const [remote, encapIp, systemId] = CHASSIS_KEYS.map(key => lookupString(settings, key));
    if (!remote || !encapIp || !systemId) {
      const missing = CHASSIS_KEYS.filter(key => !lookupString(settings, key));
      this.logger.warn(`Skipping OVN chassis registration, missing ${missing.join(', ')}`);
      return false;
    }

    this.logger.info('Configuring Open vSwitch for OVN');
    await checkCall(this.runner, [
      ...OVS_VSCTL,
      'set',
      'Open_vSwitch',
      '.',
      `external_ids:ovn-remote=${remote}`,
      'external_ids:ovn-encap-type=geneve',
      `external_ids:ovn-encap-ip=${encapIp}`,
      `external_ids:system-id=${systemId}`,
      'external_ids:ovn-match-northd-version=true'
    ]);
    await checkCall(this.runner, [
      ...OVS_VSCTL,
      '--may-exist',
      'add-br',
      INTEGRATION_BRIDGE,
      '--',
      'set',
      'bridge',
      INTEGRATION_BRIDGE,
      'datapath_type=system',
      'fail-mode=secure',
      'other-config:disable-in-band=true'
    ]);
    return true;
  }

  async configureExternalNetworking(settings: SettingsTree): Promise<void> {
    const bridge = lookupString(settings, 'network.external-bridge') ?? DEFAULT_EXTERNAL_BRIDGE;
    const physnet = lookupString(settings, 'network.physnet-name') ?? DEFAULT_PHYSNET;

    await checkCall(this.runner, [
      ...OVS_VSCTL,
      '--may-exist',
      'add-br',
      bridge,
      '--',
      'set',
      'bridge',
      bridge,
      'datapath_type=system',
      'protocols=OpenFlow13,OpenFlow15'
    ]);
    await checkCall(this.runner, [
      ...OVS_VSCTL,
      'set',
      'Open_vSwitch',
      '.',
      `external_ids:ovn-bridge-mappings=${physnet}:${bridge}`
    ]);

    if (lookupBoolean(settings, 'network.enable-gateway')) {
      await checkCall(this.runner, [
        ...OVS_VSCTL,
        'set',
        'Open_vSwitch',
        '.',
        'external_ids:ovn-cms-options=enable-chassis-as-gw'
      ]);
    } else {
      await checkCall(this.runner, [
        ...OVS_VSCTL,
        '--if-exists',
        'remove',
        'Open_vSwitch',
        '.',
        'external_ids',
        'ovn-cms-options'
      ]);
    }

    const nic = lookupString(settings, 'network.external-nic');
    if (nic) {
      await this.bridges.ensureSingleNicOnBridge(bridge, nic);
    } else {
      await this.bridges.delExternalNicsFromBridge(bridge);
    }

    const address = lookupString(settings, 'network.external-bridge-address');
    if (address) {
      if (!CidrSchema.safeParse(address).success) {
        throw new SettingsError(`network.external-bridge-address must be a CIDR, got ${address}`);
      }
      this.logger.info(`Assigning ${address} to ${bridge}`);
      await checkCall(this.runner, ['ip', 'address', 'replace', address, 'dev', bridge]);
      await checkCall(this.runner, ['ip', 'link', 'set', bridge, 'up']);
    }
  }

  /** Installs the OVN client certificates when all three are configured. */
  async configureOvnTls(settings: SettingsTree, commonDir: string): Promise<boolean> {
    const key = lookupString(settings, 'network.ovn_key');
    const cert = lookupString(settings, 'network.ovn_cert');
    const cacert = lookupString(settings, 'network.ovn_cacert');
    if (!key || !cert || !cacert) {
      this.logger.debug('OVN TLS material incomplete, skipping set-ssl');
      return false;
    }

    const pkiDir = path.join(commonDir, OVN_PKI_DIR);
    const files = {
      key: path.join(pkiDir, OVN_TLS_FILES.key),
      cert: path.join(pkiDir, OVN_TLS_FILES.cert),
      cacert: path.join(pkiDir, OVN_TLS_FILES.cacert)
    };
    await fs.mkdir(pkiDir, { recursive: true });
    await fs.writeFile(files.key, Buffer.from(key, 'base64'), { mode: 0o600 });
    await fs.writeFile(files.cert, Buffer.from(cert, 'base64'), { mode: 0o600 });
    await fs.writeFile(files.cacert, Buffer.from(cacert, 'base64'), { mode: 0o600 });

    await checkCall(this.runner, [...OVS_VSCTL, 'set-ssl', files.key, files.cert, files.cacert]);
    return true;
  }
}
