import type { Logger } from 'homebridge';
import fetch, { RequestInit, Response } from 'node-fetch';
import {
  AuthenticationError,
  CloudAuthenticationError,
  CloudError,
  CloudRequestError,
  ProtocolError,
  RetryLaterError,
} from './errors';
import { MAGIC } from './magic';
import { Security } from './security';
import { Semaphore } from './semaphore';
import { isNull, redact, sleep } from './util';

export type FetchFunction = (url: string, init: RequestInit) => Promise<Response>;

type JsonObject = Record<string, unknown>;

export interface CloudAppliance {
  id: string;
  name: string;
  sn: string;
  type: string;
  modelNumber: string;
}

export interface CloudToken {
  token: string;
  key: string;
}

/**
 * What a LAN session needs from the cloud: tokens, the appliance list and
 * the relay
 */
export interface CloudClient {
  applianceTransparentSend(applianceId: string, data: Buffer): Promise<Buffer[]>;
  getToken(udpId: string): Promise<CloudToken>;
  listAppliances(force?: boolean): Promise<CloudAppliance[]>;
}

export interface MideaCloudOptions {
  account: string;
  password: string;
  appkey?: string;
  appid?: number;
  serverUrl?: string;
  signkey?: string;
  fetch?: FetchFunction;
  maxRetries?: number;
  /** Seconds */
  requestTimeout?: number;
  /** Multiplier applied to every wait. Zero disables waiting. */
  sleepInterval?: number;
}

/** Requests whose payload carries credentials */
const PROTECTED_REQUESTS = ['user/login/id/get', 'user/login'];

/** Responses that carry credentials */
const PROTECTED_RESPONSES = ['iot/secure/getToken', 'user/login/id/get', 'user/login'];

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, context: string): JsonObject {
  if (!isRecord(value)) {
    throw new ProtocolError(`Unexpected cloud response for ${context}`);
  }
  return value;
}

function asList(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function text(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

/**
 * Bytes as comma separated signed integers, as the relay expects
 */
export function encodeAsCsv(data: Buffer): string {
  return Array.from(data, (b) => (b >= 128 ? b - 256 : b)).join(',');
}

export function decodeFromCsv(data: string): Buffer {
  return Buffer.from(data.split(',').map((value) => {
    const n = parseInt(value, 10);
    return n < 0 ? n + 256 : n;
  }));
}

/** Local time as YYYYMMDDHHmmss */
export function stamp(now = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
    + `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
}

/**
 * MIDEA CLOUD
 *
 * Client for the vendor's mobile app API. Used for three things:
 *
 *  - looking up the token/key pair a v3 appliance needs for the handshake
 *  - listing the appliances registered to the account
 *  - relaying raw LAN packets when the appliance is not reachable locally
 *
 * Requests are form encoded POSTs, signed with the app key. One request is
 * in flight per client.
 */
export class MideaCloud implements CloudClient {
  readonly security: Security;
  maxRetries: number;
  requestTimeout: number;
  sleepInterval: number;

  private readonly account: string;
  private readonly password: string;
  private readonly appid: number;
  private readonly serverUrl: string;
  private readonly fetchFn: FetchFunction;
  private readonly lock = new Semaphore();
  private loginId = '';
  private session: JsonObject = {};
  private retries = 0;
  private appliances: CloudAppliance[] = [];

  constructor(
    private readonly log: Logger,
    options: MideaCloudOptions,
  ) {
    const app = MAGIC.SUPPORTED_APPS[MAGIC.DEFAULT_APP];
    this.account = options.account;
    this.password = options.password;
    this.appid = isNull(options.appid, app.appid);
    this.serverUrl = isNull(options.serverUrl, app.apiurl);
    this.security = new Security({ appkey: options.appkey || app.appkey, signkey: options.signkey });
    this.fetchFn = options.fetch ?? fetch;
    this.maxRetries = isNull(options.maxRetries, MAGIC.DEFAULT_RETRIES);
    this.requestTimeout = isNull(options.requestTimeout, MAGIC.CLOUD_TIMEOUT);
    this.sleepInterval = isNull(options.sleepInterval, 1);
  }

  private get sessionId(): string {
    return text(this.session.sessionId);
  }

  // ==========================================
  // PUBLIC API
  // ==========================================

  /**
   * Sends one API request and returns the `key` field of the reply, or the
   * whole reply when no key is given
   */
  apiRequest(endpoint: string, args: Record<string, string | number> = {}, authenticate = true, key: string | undefined = 'result'): Promise<unknown> {
    return this.lock.runExclusive(() => this.request(endpoint, args, authenticate, key));
  }

  /**
   * Logs in with the account credentials. Does nothing when a session exists.
   */
  authenticate(): Promise<void> {
    return this.lock.runExclusive(() => this.doAuthenticate());
  }

  /**
   * Appliances of the account's default home group. Cached unless `force`.
   */
  listAppliances(force = false): Promise<CloudAppliance[]> {
    return this.lock.runExclusive(() => this.doListAppliances(force));
  }

  /**
   * Token/key pair for a LAN module, empty strings when the cloud has none
   */
  getToken(udpId: string): Promise<CloudToken> {
    return this.lock.runExclusive(async () => {
      const result = asRecord(await this.request('iot/secure/getToken', { udpid: udpId }), 'getToken');
      for (const entry of asList(result.tokenlist)) {
        if (text(entry.udpId) === udpId) {
          return { token: text(entry.token), key: text(entry.key) };
        }
      }
      return { token: '', key: '' };
    });
  }

  /**
   * Relays a LAN packet through the cloud as if it had been sent locally
   */
  applianceTransparentSend(applianceId: string, data: Buffer): Promise<Buffer[]> {
    return this.lock.runExclusive(async () => {
      this.log.debug(`CLOUD   | Sending to id=${redact(applianceId, 4)} data=${data.toString('hex')}`);
      await this.doAuthenticate();
      const order = this.security.aesEncryptString(encodeAsCsv(data));
      const result = asRecord(
        await this.request('appliance/transparent/send', { order, funId: '0000', applianceId }),
        'transparent send',
      );
      const decrypted = this.security.aesDecryptString(text(result.reply));
      const reply = decodeFromCsv(decrypted);
      this.log.debug(`CLOUD   | Received from id=${redact(applianceId, 4)} data=${reply.toString('hex')}`);
      if (reply.length < MAGIC.TRANSPARENT_REPLY_HEADER) {
        throw new ProtocolError(`Invalid payload size, was ${reply.length} expected ${MAGIC.TRANSPARENT_REPLY_HEADER} bytes`);
      }
      return [reply.subarray(MAGIC.TRANSPARENT_REPLY_HEADER)];
    });
  }

  toString(): string {
    return `MideaCloud(${this.serverUrl})`;
  }

  // ==========================================
  // INTERNALS (caller holds the lock)
  // ==========================================

  private wait(seconds: number): Promise<void> {
    return sleep(seconds * this.sleepInterval);
  }

  private async request(
    endpoint: string,
    args: Record<string, string | number> = {},
    authenticate = true,
    key: string | undefined = 'result',
  ): Promise<unknown> {
    if (authenticate) {
      await this.doAuthenticate();
    }
    if (endpoint === 'user/login' && this.sessionId && this.loginId) {
      return this.session;
    }

    const data: Record<string, string | number> = {
      appId: this.appid,
      format: MAGIC.CLOUD_FORMAT,
      clientType: MAGIC.CLOUD_CLIENT_TYPE,
      language: MAGIC.CLOUD_LANGUAGE,
      src: MAGIC.CLOUD_SRC,
      stamp: stamp(),
      ...args,
    };
    if (this.sessionId) {
      data.sessionId = this.sessionId;
    }
    const url = this.serverUrl + endpoint;
    data.sign = this.security.sign(url, data);
    if (!PROTECTED_REQUESTS.includes(endpoint)) {
      this.log.debug(`CLOUD   | HTTP request ${endpoint}: ${JSON.stringify({ ...data, sessionId: redact(text(data.sessionId), 0) })}`);
    }

    const body = new URLSearchParams();
    for (const [name, value] of Object.entries(data)) {
      body.append(name, String(value));
    }

    let responseText: string;
    try {
      const response = await this.fetchFn(url, { method: 'POST', body, timeout: this.requestTimeout * 1000 });
      if (!response.ok) {
        throw new CloudRequestError(`HTTP status ${response.status} ${response.statusText}`);
      }
      responseText = await response.text();
    } catch (err) {
      return this.retryRequest(endpoint, args, authenticate, key, err instanceof Error ? err.message : String(err));
    }
    if (!PROTECTED_RESPONSES.includes(endpoint)) {
      this.log.debug(`CLOUD   | HTTP response text: ${responseText}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(responseText);
    } catch (err) {
      throw new ProtocolError(`Invalid JSON from ${endpoint}: ${err instanceof Error ? err.message : String(err)}`);
    }
    const payload = asRecord(parsed, endpoint);

    const errorCode = payload.errorCode === undefined ? '0' : text(payload.errorCode);
    if (errorCode !== '0') {
      const message = text(payload.msg);
      await this.handleApiError(parseInt(errorCode, 10), message);
      return this.retryRequest(endpoint, args, authenticate, key, `${message} (${errorCode})`);
    }

    this.retries = 0;
    return key ? payload[key] : payload;
  }

  private async retryRequest(
    endpoint: string,
    args: Record<string, string | number>,
    authenticate: boolean,
    key: string | undefined,
    cause: string,
  ): Promise<unknown> {
    await this.retryCheck(endpoint, cause);
    this.log.debug(`CLOUD   | Retrying API call ${endpoint}: ${this.retries + 1} of ${this.maxRetries}`);
    return this.request(endpoint, args, authenticate, key);
  }

  private async retryCheck(endpoint: string, cause: string): Promise<void> {
    this.retries += 1;
    if (this.retries >= this.maxRetries) {
      this.retries = 0;
      throw new CloudRequestError(`Too many retries while calling ${endpoint}, last error ${cause}`);
    }
    await this.wait(this.retries);
  }

  private async getLoginId(): Promise<void> {
    const result = asRecord(
      await this.request('user/login/id/get', { loginAccount: this.account }, false),
      'user/login/id/get',
    );
    this.loginId = text(result.loginId);
  }

  private async doAuthenticate(): Promise<void> {
    if (!this.loginId) {
      await this.getLoginId();
    }
    if (this.sessionId) {
      return;
    }
    const session = await this.request(
      'user/login',
      {
        loginAccount: this.account,
        password: this.security.encryptPassword(this.loginId, this.password),
      },
      false,
    );
    this.session = isRecord(session) ? session : {};
    if (!this.sessionId) {
      throw new AuthenticationError('Unable to retrieve session id from Midea API');
    }
    this.security.accessToken = text(this.session.accessToken);
  }

  private async doListAppliances(force: boolean): Promise<CloudAppliance[]> {
    if (!force && this.appliances.length > 0) {
      return this.appliances;
    }

    const groups = await this.request('homegroup/list/get');
    const groupList = isRecord(groups) ? asList(groups.list) : [];
    if (groupList.length === 0) {
      this.log.debug(`CLOUD   | Unable to get home groups from Midea API: ${JSON.stringify(groups)}`);
      throw new CloudRequestError('Unable to get home groups from Midea API');
    }
    const group = groupList.find((item) => text(item.isDefault) === '1');
    if (!group) {
      throw new CloudRequestError('Unable to get default home group from Midea API');
    }

    const result = await this.request('appliance/list/get', { homegroupId: text(group.id) });
    const items = isRecord(result) ? asList(result.list) : [];
    this.appliances = items.map((item) => ({
      id: text(item.id),
      name: text(item.name),
      sn: item.sn ? this.security.aesDecryptString(text(item.sn)) : 'Unknown',
      type: text(item.type),
      modelNumber: text(item.modelNumber),
    }));
    this.log.debug(`CLOUD   | Appliance list: ${this.appliances.map((a) => `${redact(a.id, 4)}/${redact(a.sn, 8)}`).join(', ')}`);
    return this.appliances;
  }

  /**
   * Cloud error dispatch. Returns when the request should be retried,
   * throws when the error is terminal.
   */
  private async handleApiError(code: number, message: string): Promise<void> {
    const errors = MAGIC.CLOUD_ERRORS;
    if (errors.SESSION_RESTART.includes(code)) {
      this.log.debug(`CLOUD   | Restarting session: '${code}' - '${message}'`);
      const retries = this.retries;
      await this.retryCheck('session-restart', `${message} (${code})`);
      this.session = {};
      await this.doAuthenticate();
      this.retries = retries;
    } else if (errors.FULL_RESTART.includes(code)) {
      this.log.debug(`CLOUD   | Full connection restart: '${code}' - '${message}'`);
      const retries = this.retries;
      await this.retryCheck('full-restart', `${message} (${code})`);
      this.session = {};
      await this.getLoginId();
      await this.doAuthenticate();
      await this.doListAppliances(true);
      this.retries = retries;
    } else if (errors.AUTHENTICATION.includes(code)) {
      this.log.warn(`CLOUD   | Authentication error: '${code}' - '${message}'`);
      throw new CloudAuthenticationError(code, message, this.account);
    } else if (errors.RETRY_LATER.includes(code)) {
      this.log.debug(`CLOUD   | Retry later: '${code}' - '${message}'`);
      throw new RetryLaterError(code, message);
    } else if (errors.IGNORE.includes(code)) {
      this.log.debug(`CLOUD   | Ignored error: '${code}' - '${message}'`);
    } else {
      throw new CloudError(code, message);
    }
  }
}
