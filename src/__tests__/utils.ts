/**
 * Test utilities and helper functions
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { RemoteAPIError } from '../errors/index.js';
import { Logger } from '../logger/index.js';
import type {
  GuestMetricsRecord,
  NetworkRecord,
  OpaqueRef,
  SessionRef,
  VIFRecord,
  VMEntry,
  VMRecord,
  XenCredentials,
  XenSessionClient,
} from '../xen/types.js';

/**
 * Create a mock VM record for testing
 */
export function createMockVM(overrides?: Partial<VMRecord>): VMRecord {
  return {
    uuid: '00000000-0000-0000-0000-000000000001',
    name_label: 'vm-01',
    power_state: 'Running',
    is_control_domain: false,
    is_a_template: false,
    VIFs: [],
    guest_metrics: 'OpaqueRef:NULL',
    ...overrides,
  };
}

/**
 * Logger that writes nothing
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: 'error', format: 'simple', silent: true });
}

export function createTestConfig(overrides?: { cachePath?: string; ttl?: number; host?: string; password?: string }): Config {
  return {
    cache: { path: overrides?.cachePath ?? '/tmp/xen-inventory-test.json', ttl: overrides?.ttl ?? 3600 },
    xen: { host: overrides?.host ?? 'xen.test', username: 'root', password: overrides?.password ?? 'test-secret' },
    logging: { level: 'error', format: 'simple', silent: true },
  };
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'xen-inventory-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

function handleInvalid(kind: string, ref: OpaqueRef): RemoteAPIError {
  return new RemoteAPIError(`${kind} handle invalid`, ['HANDLE_INVALID', kind, ref]);
}

/**
 * In-process stand-in for a XenServer host
 */
export class FakeXenHost implements XenSessionClient {
  readonly vms: VMEntry[] = [];
  readonly vifs = new Map<OpaqueRef, VIFRecord>();
  readonly networks = new Map<OpaqueRef, NetworkRecord>();
  readonly metrics = new Map<OpaqueRef, GuestMetricsRecord>();
  readonly calls: string[] = [];
  readonly openSessions = new Set<SessionRef>();

  password = 'test-secret';
  failOn?: { method: string; description: string[] };
  failLogout = false;

  private nextRef = 1;
  private networkRefs = new Map<string, OpaqueRef>();

  private ref(prefix: string): OpaqueRef {
    return `OpaqueRef:${prefix}-${this.nextRef++}`;
  }

  /**
   * Register a VM with one VIF per network name and optional guest metrics
   */
  addVM(record: Partial<VMRecord>, networks: string[] = [], addresses?: Record<string, string>): VMRecord {
    const vifRefs = networks.map((name) => {
      const vifRef = this.ref('vif');
      this.vifs.set(vifRef, { network: this.networkRef(name) });
      return vifRef;
    });

    let metricsRef: OpaqueRef = 'OpaqueRef:NULL';
    if (addresses) {
      metricsRef = this.ref('metrics');
      this.metrics.set(metricsRef, { networks: addresses });
    }

    const vm = createMockVM({ VIFs: vifRefs, guest_metrics: metricsRef, ...record });
    this.vms.push({ ref: this.ref('vm'), record: vm });
    return vm;
  }

  private networkRef(name: string): OpaqueRef {
    const existing = this.networkRefs.get(name);
    if (existing) return existing;
    const created = this.ref('network');
    this.networkRefs.set(name, created);
    this.networks.set(created, { name_label: name });
    return created;
  }

  countCalls(method: string): number {
    return this.calls.filter((call) => call === method).length;
  }

  private enter(method: string, session?: SessionRef): void {
    this.calls.push(method);
    if (session !== undefined && !this.openSessions.has(session)) {
      throw new RemoteAPIError('session invalid', ['SESSION_INVALID', session]);
    }
    if (this.failOn?.method === method) {
      throw new RemoteAPIError(`${method} failed`, this.failOn.description);
    }
  }

  async login(credentials: XenCredentials): Promise<SessionRef> {
    this.enter('session.login_with_password');
    if (credentials.password !== this.password) {
      throw new RemoteAPIError('authentication failed', ['SESSION_AUTHENTICATION_FAILED', credentials.username]);
    }
    const session = this.ref('session');
    this.openSessions.add(session);
    return session;
  }

  async logout(session: SessionRef): Promise<void> {
    this.enter('session.logout', session);
    this.openSessions.delete(session);
    if (this.failLogout) {
      throw new RemoteAPIError('logout failed', ['INTERNAL_ERROR']);
    }
  }

  async listAllVMs(session: SessionRef): Promise<VMEntry[]> {
    this.enter('VM.get_all', session);
    return this.vms.map((entry) => ({ ref: entry.ref, record: { ...entry.record } }));
  }

  async getVIFRecord(session: SessionRef, vif: OpaqueRef): Promise<VIFRecord> {
    this.enter('VIF.get_record', session);
    const record = this.vifs.get(vif);
    if (!record) throw handleInvalid('VIF', vif);
    return record;
  }

  async getNetworkRecord(session: SessionRef, network: OpaqueRef): Promise<NetworkRecord> {
    this.enter('network.get_record', session);
    const record = this.networks.get(network);
    if (!record) throw handleInvalid('network', network);
    return record;
  }

  async getGuestMetricsRecord(session: SessionRef, metrics: OpaqueRef): Promise<GuestMetricsRecord> {
    this.enter('VM_guest_metrics.get_record', session);
    const record = this.metrics.get(metrics);
    if (!record) throw handleInvalid('VM_guest_metrics', metrics);
    return record;
  }
}
