/**
 * Ansible dynamic inventory document types
 */

export const META_KEY = '_meta';

export interface HostVars {
  /** First IPv4 address reported by the guest agent, or null when unknown */
  ansible_host: string | null;
}

export interface InventoryMeta {
  hostvars: Record<string, HostVars>;
}

/**
 * Group name (network label) -> member VM name labels, plus the reserved `_meta` entry
 */
export interface InventoryDocument {
  _meta: InventoryMeta;
  [group: string]: string[] | InventoryMeta;
}

/**
 * Produces a complete, freshly fetched inventory
 */
export type InventorySource = () => Promise<InventoryDocument>;

export interface InventoryRequest {
  /** Skip the cache lookup and always fetch live */
  refresh: boolean;
}

export type InventoryOrigin = 'cache' | 'live';
