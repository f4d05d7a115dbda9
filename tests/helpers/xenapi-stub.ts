/**
 * In-process XenAPI endpoint answering XML-RPC calls with XenAPI envelopes
 */

import type { XmlRpcCaller } from '../../src/xen/client.js';

type Envelope =
  | { Status: 'Success'; Value: unknown }
  | { Status: 'Failure'; ErrorDescription: string[] };

interface StubVM {
  name_label: string;
  is_control_domain?: boolean;
  is_a_template?: boolean;
  networks?: string[];
  /** Guest metrics networks map; omitted means no guest metrics */
  addresses?: Record<string, string>;
  /** Reference the VM reports even though no such metrics object exists */
  danglingMetrics?: boolean;
}

export class XenApiStub {
  readonly calls: string[] = [];
  readonly sessions = new Set<string>();
  password = 'test-secret';

  private readonly objects = new Map<string, Record<string, unknown>>();
  private readonly vmRefs: string[] = [];
  private readonly networkRefs = new Map<string, string>();
  private counter = 0;

  private nextRef(kind: string): string {
    this.counter++;
    return `OpaqueRef:${kind}-${this.counter}`;
  }

  addVM(vm: StubVM): this {
    const vifs = (vm.networks ?? []).map((name) => {
      const ref = this.nextRef('vif');
      this.objects.set(ref, { uuid: ref, network: this.network(name), device: '0' });
      return ref;
    });

    let metrics = 'OpaqueRef:NULL';
    if (vm.addresses) {
      metrics = this.nextRef('metrics');
      this.objects.set(metrics, { uuid: metrics, networks: vm.addresses, os_version: {} });
    } else if (vm.danglingMetrics) {
      metrics = this.nextRef('metrics');
    }

    const ref = this.nextRef('vm');
    this.vmRefs.push(ref);
    this.objects.set(ref, {
      uuid: ref,
      name_label: vm.name_label,
      power_state: 'Running',
      is_control_domain: vm.is_control_domain ?? false,
      is_a_template: vm.is_a_template ?? false,
      VIFs: vifs,
      guest_metrics: metrics,
      memory_static_max: '1073741824',
    });
    return this;
  }

  private network(name: string): string {
    const existing = this.networkRefs.get(name);
    if (existing) return existing;
    const ref = this.nextRef('network');
    this.networkRefs.set(name, ref);
    this.objects.set(ref, { uuid: ref, name_label: name, bridge: `xenbr${this.networkRefs.size}` });
    return ref;
  }

  count(method: string): number {
    return this.calls.filter((call) => call === method).length;
  }

  /**
   * Caller to hand to XenApiClient
   */
  readonly caller: XmlRpcCaller = async (method, params) => {
    this.calls.push(method);
    return this.dispatch(method, params.map((param) => String(param)));
  };

  private dispatch(method: string, params: string[]): Envelope {
    const [session = '', ref = ''] = params;

    if (method === 'session.login_with_password') {
      if (params[1] !== this.password) {
        return failure('SESSION_AUTHENTICATION_FAILED', session, 'Authentication failure');
      }
      const created = this.nextRef('session');
      this.sessions.add(created);
      return ok(created);
    }

    if (!this.sessions.has(session)) {
      return failure('SESSION_INVALID', session);
    }

    switch (method) {
      case 'session.logout':
        this.sessions.delete(session);
        return ok('');
      case 'VM.get_all':
        return ok([...this.vmRefs]);
      case 'VM.get_record':
      case 'VIF.get_record':
      case 'network.get_record':
      case 'VM_guest_metrics.get_record': {
        const record = this.objects.get(ref);
        return record ? ok(record) : failure('HANDLE_INVALID', method.split('.')[0] ?? '', ref);
      }
      default:
        return failure('MESSAGE_METHOD_UNKNOWN', method);
    }
  }
}

function ok(value: unknown): Envelope {
  return { Status: 'Success', Value: value };
}

function failure(...description: string[]): Envelope {
  return { Status: 'Failure', ErrorDescription: description };
}
