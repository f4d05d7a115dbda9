/**
 * XenAPI client over XML-RPC
 */

import xmlrpc from 'xmlrpc';
import type { z, ZodTypeAny } from 'zod';
import { ErrorCode, RemoteAPIError, toError } from '../errors/index.js';
import {
  GuestMetricsRecordSchema,
  NetworkRecordSchema,
  SessionRefSchema,
  VIFRecordSchema,
  VMRecordSchema,
  VMRefListSchema,
  XenResponseSchema,
} from './schema.js';
import type {
  GuestMetricsRecord,
  NetworkRecord,
  OpaqueRef,
  SessionRef,
  VIFRecord,
  VMEntry,
  XenCredentials,
  XenSessionClient,
} from './types.js';

const API_VERSION = '1.0';
const ORIGINATOR = 'xen-inventory';

/**
 * Performs one XML-RPC method call and resolves with the raw reply
 */
export type XmlRpcCaller = (method: string, params: unknown[]) => Promise<unknown>;

/**
 * Normalise a host setting to a URL. A bare hostname gets http://, as XenAPI sessions do by default.
 */
export function toHostUrl(host: string): string {
  const trimmed = host.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * Create an XmlRpcCaller backed by the xmlrpc package
 */
export function createXmlRpcCaller(host: string): XmlRpcCaller {
  const url = toHostUrl(host);
  const client = url.toLowerCase().startsWith('https://')
    ? xmlrpc.createSecureClient(url)
    : xmlrpc.createClient(url);

  return (method, params) =>
    new Promise<unknown>((resolve, reject) => {
      client.methodCall(method, params, (error: unknown, value: unknown) => {
        if (error) {
          reject(toError(error));
          return;
        }
        resolve(value);
      });
    });
}

/**
 * XenSessionClient speaking the XenAPI wire protocol.
 * Replies are `{ Status, Value }` envelopes; failures carry an ErrorDescription array.
 */
export class XenApiClient implements XenSessionClient {
  private readonly call: XmlRpcCaller;
  private readonly host: string;

  constructor(host: string, caller?: XmlRpcCaller) {
    this.host = host;
    this.call = caller ?? createXmlRpcCaller(host);
  }

  async login(credentials: XenCredentials): Promise<SessionRef> {
    return this.invoke(
      'session.login_with_password',
      [credentials.username, credentials.password, API_VERSION, ORIGINATOR],
      SessionRefSchema
    );
  }

  async logout(session: SessionRef): Promise<void> {
    await this.request('session.logout', [session]);
  }

  async listAllVMs(session: SessionRef): Promise<VMEntry[]> {
    const refs = await this.invoke('VM.get_all', [session], VMRefListSchema);
    const entries: VMEntry[] = [];
    for (const ref of refs) {
      const record = await this.invoke('VM.get_record', [session, ref], VMRecordSchema);
      entries.push({ ref, record });
    }
    return entries;
  }

  async getVIFRecord(session: SessionRef, vif: OpaqueRef): Promise<VIFRecord> {
    return this.invoke('VIF.get_record', [session, vif], VIFRecordSchema);
  }

  async getNetworkRecord(session: SessionRef, network: OpaqueRef): Promise<NetworkRecord> {
    return this.invoke('network.get_record', [session, network], NetworkRecordSchema);
  }

  async getGuestMetricsRecord(session: SessionRef, metrics: OpaqueRef): Promise<GuestMetricsRecord> {
    return this.invoke('VM_guest_metrics.get_record', [session, metrics], GuestMetricsRecordSchema);
  }

  /**
   * Call a method and validate its Value against a schema
   */
  private async invoke<S extends ZodTypeAny>(method: string, params: unknown[], schema: S): Promise<z.output<S>> {
    const value = await this.request(method, params);
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new RemoteAPIError(
        `Unexpected reply to ${method}`,
        ['MALFORMED_RESPONSE', method],
        ErrorCode.MALFORMED_RESPONSE,
        { host: this.host, method, issues: parsed.error.issues.map((issue) => issue.message) }
      );
    }
    return parsed.data;
  }

  /**
   * Call a method and unwrap the XenAPI envelope
   */
  private async request(method: string, params: unknown[]): Promise<unknown> {
    let reply: unknown;
    try {
      reply = await this.call(method, params);
    } catch (error) {
      const cause = toError(error);
      throw new RemoteAPIError(
        `XenAPI call ${method} failed: ${cause.message}`,
        ['TRANSPORT_ERROR', cause.message],
        ErrorCode.REMOTE_API_FAILURE,
        { host: this.host, method },
        cause
      );
    }

    const envelope = XenResponseSchema.safeParse(reply);
    if (!envelope.success) {
      throw new RemoteAPIError(
        `Unexpected reply envelope from ${method}`,
        ['MALFORMED_RESPONSE', method],
        ErrorCode.MALFORMED_RESPONSE,
        { host: this.host, method }
      );
    }

    if (envelope.data.Status === 'Failure') {
      const description = envelope.data.ErrorDescription;
      throw new RemoteAPIError(
        `XenAPI call ${method} failed: ${description.join(', ') || 'no error description'}`,
        description,
        ErrorCode.REMOTE_API_FAILURE,
        { host: this.host, method }
      );
    }

    return envelope.data.Value;
  }
}
