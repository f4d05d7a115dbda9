/**
 * XenAPI record types
 *
 * Only the fields the inventory reads are modelled; XenAPI returns many more.
 */

/** Opaque reference such as `OpaqueRef:1f2e...` */
export type OpaqueRef = string;

/** XenAPI's null reference, used e.g. for a VM without guest metrics */
export const NULL_REF: OpaqueRef = 'OpaqueRef:NULL';

export type SessionRef = OpaqueRef;

export interface VMRecord {
  uuid: string;
  name_label: string;
  power_state: string;
  is_control_domain: boolean;
  is_a_template: boolean;
  VIFs: OpaqueRef[];
  guest_metrics: OpaqueRef;
}

export interface VIFRecord {
  network: OpaqueRef;
}

export interface NetworkRecord {
  name_label: string;
}

export interface GuestMetricsRecord {
  /** Keys like `0/ip`, `0/ipv6/0` mapping to addresses */
  networks: Record<string, string>;
}

export interface VMEntry {
  ref: OpaqueRef;
  record: VMRecord;
}

export interface XenCredentials {
  username: string;
  password: string;
}

/**
 * Read-only view of the XenAPI needed to build an inventory.
 * Every method rejects with RemoteAPIError when the host reports a failure.
 */
export interface XenSessionClient {
  login(credentials: XenCredentials): Promise<SessionRef>;
  logout(session: SessionRef): Promise<void>;
  listAllVMs(session: SessionRef): Promise<VMEntry[]>;
  getVIFRecord(session: SessionRef, vif: OpaqueRef): Promise<VIFRecord>;
  getNetworkRecord(session: SessionRef, network: OpaqueRef): Promise<NetworkRecord>;
  getGuestMetricsRecord(session: SessionRef, metrics: OpaqueRef): Promise<GuestMetricsRecord>;
}
