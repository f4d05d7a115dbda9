/**
 * Inventory builder
 *
 * Turns the VM, VIF, network and guest-metrics records of one XenAPI session into an
 * Ansible inventory grouped by network name.
 */

import { RemoteAPIError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import { NULL_REF, type OpaqueRef, type SessionRef, type VMRecord, type XenSessionClient } from '../xen/types.js';
import { GroupMap } from './groups.js';
import { META_KEY, type HostVars, type InventoryDocument } from './types.js';

/** Guest-metrics key holding the first IPv4 address of the first interface */
export const PRIMARY_IP_KEY = '0/ip';

/**
 * Control domains and templates never appear in the inventory
 */
export function isInventoryCandidate(record: VMRecord): boolean {
  return !record.is_control_domain && !record.is_a_template;
}

export class InventoryBuilder {
  private readonly client: XenSessionClient;
  private readonly logger?: Logger;

  constructor(client: XenSessionClient, logger?: Logger) {
    this.client = client;
    this.logger = logger;
  }

  /**
   * Build the whole inventory. A remote failure rejects the call; nothing partial is returned.
   */
  async build(session: SessionRef): Promise<InventoryDocument> {
    const groups = new GroupMap();
    const hostvars = new Map<string, HostVars>();

    const vms = await this.client.listAllVMs(session);
    let skipped = 0;

    for (const { record } of vms) {
      if (!isInventoryCandidate(record)) {
        skipped++;
        continue;
      }

      // A VM without interfaces belongs to no group and gets no hostvars
      if (record.VIFs.length === 0) {
        continue;
      }

      for (const vif of record.VIFs) {
        const group = await this.resolveNetworkName(session, vif);
        if (group === META_KEY) {
          this.logger?.warn(`Network name ${META_KEY} is reserved, not used as a group`, {
            vm: record.name_label,
          });
          continue;
        }
        groups.append(group, record.name_label);
      }

      hostvars.set(record.name_label, {
        ansible_host: await this.resolvePrimaryAddress(session, record.guest_metrics),
      });
    }

    this.logger?.debug('Inventory built', {
      vms: vms.length,
      skipped,
      hosts: hostvars.size,
      groups: groups.size,
    });

    return {
      _meta: { hostvars: Object.fromEntries(hostvars) },
      ...Object.fromEntries(groups.entries()),
    };
  }

  private async resolveNetworkName(session: SessionRef, vif: OpaqueRef): Promise<string> {
    const { network } = await this.client.getVIFRecord(session, vif);
    const record = await this.client.getNetworkRecord(session, network);
    return record.name_label;
  }

  /**
   * First reported IPv4 address, or null when the VM has no (valid) guest metrics
   */
  private async resolvePrimaryAddress(session: SessionRef, metrics: OpaqueRef): Promise<string | null> {
    if (!metrics || metrics === NULL_REF) {
      return null;
    }

    try {
      const record = await this.client.getGuestMetricsRecord(session, metrics);
      return record.networks[PRIMARY_IP_KEY] ?? null;
    } catch (error) {
      if (error instanceof RemoteAPIError && error.failureCode === 'HANDLE_INVALID') {
        this.logger?.debug('Guest metrics reference is invalid', { metrics });
        return null;
      }
      throw error;
    }
  }
}
