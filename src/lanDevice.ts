import type { Logger } from 'homebridge';
import { Appliance, SettableValue, createAppliance, isSupported } from './appliance';
import type { CloudAppliance, CloudClient } from './cloud';
import { MideaCommand } from './command';
import { ConnectionFactory, DeviceConnection, UdpQuery, tcpConnectionFactory, udpQuery } from './connection';
import { AuthenticationError, MideaError, MideaNetworkError, ProtocolError, UnsupportedError } from './errors';
import { FrameDecoder } from './frameDecoder';
import { MAGIC } from './magic';
import { Security } from './security';
import { Semaphore } from './semaphore';
import { bytesToId, idToBytes, isNull, redact, sleep } from './util';

export interface LanDeviceOptions {
  applianceId?: string;
  address?: string;
  port?: number;
  token?: string;
  key?: string;
  applianceType?: string | number;
  serialNumber?: string;
  version?: number;
  security?: Security;
  maxRetries?: number;
  /** Seconds */
  socketTimeout?: number;
  /** Multiplier applied to every wait. Zero disables waiting. */
  sleepInterval?: number;
  connectionFactory?: ConnectionFactory;
}

/**
 * LAN DEVICE
 *
 * One session with one appliance. Owns the TCP connection, the v3 handshake
 * state and the appliance model. Requests either go straight to the appliance
 * or, when a cloud client is passed, through the cloud relay.
 *
 * Every public operation holds the device lock for its whole
 * request/response cycle, handshake included.
 */
export class LanDevice {
  readonly appliance: Appliance;
  address?: string;
  port: number;
  token: string;
  key: string;
  version: number;
  serialNumber: string;
  ssid = '';
  mac = '';
  subtype = 0;
  reserved = 0;
  flags = 0;
  extra = 0;
  udpVersion = 0;
  protocolVersion = '';
  firmwareVersion = '';
  randomkey = '';

  maxRetries: number;
  socketTimeout: number;
  sleepInterval: number;

  private readonly security: Security;
  private readonly decoder: FrameDecoder;
  private readonly connectionFactory: ConnectionFactory;
  private readonly lock = new Semaphore();
  private connection?: DeviceConnection;
  private gotTcpKey = false;
  private retries = 0;
  private noResponses = 0;
  private lastError = '';
  private onlineValue = true;

  constructor(
    private readonly log: Logger,
    options: LanDeviceOptions = {},
  ) {
    this.address = options.address;
    this.port = isNull(options.port, MAGIC.DEVICE_PORT);
    this.token = isNull(options.token, '');
    this.key = isNull(options.key, '');
    this.version = isNull(options.version, 3);
    this.serialNumber = isNull(options.serialNumber, '');
    this.security = options.security ?? new Security();
    this.decoder = new FrameDecoder(this.security);
    this.connectionFactory = options.connectionFactory ?? tcpConnectionFactory;
    this.maxRetries = isNull(options.maxRetries, MAGIC.DEFAULT_RETRIES);
    this.socketTimeout = isNull(options.socketTimeout, MAGIC.DEFAULT_SOCKET_TIMEOUT);
    this.sleepInterval = isNull(options.sleepInterval, 1);
    this.appliance = createAppliance(
      isNull(options.applianceId, ''),
      isNull(options.applianceType, MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER.toString(16)),
      log,
    );
  }

  /**
   * DISCOVERY REPLY
   *
   * ┌──────────────┬──────────────────────────────────────────────────────┐
   * │ 0-1          │ 5A5A (v2) or 8370 (v3, ZZ packet starts at 8)        │
   * │ 20-25        │ Appliance id, little endian                          │
   * │ 40..-16      │ AES-ECB encrypted reply                              │
   * └──────────────┴──────────────────────────────────────────────────────┘
   *
   * Decrypted reply, L = SSID length at 40:
   *
   * ┌──────────────┬──────────────────────────────────────────────────────┐
   * │ 0-3          │ IPv4 address, reversed                               │
   * │ 4-7          │ TCP port, little endian                              │
   * │ 8-39         │ Serial number, ASCII                                 │
   * │ 41..41+L     │ SSID                                                 │
   * │ 43+L..45+L   │ Reserved, flags, extra                               │
   * │ 46+L..49+L   │ UDP version, little endian                           │
   * │ 55+L         │ Appliance type                                       │
   * │ 57+L..58+L   │ Subtype, little endian                               │
   * │ 63+L..68+L   │ MAC address                                          │
   * │ 69+L..71+L   │ Protocol version                                     │
   * │ 72+L..74+L   │ Firmware version                                     │
   * │ 78+L..93+L   │ Random key                                           │
   * └──────────────┴──────────────────────────────────────────────────────┘
   */
  static fromDiscovery(log: Logger, data: Buffer, options: LanDeviceOptions = {}): LanDevice {
    let version: number;
    if (data.subarray(0, 2).equals(MAGIC.HEADER_ZZ)) {
      version = 2;
    } else if (data.subarray(0, 2).equals(MAGIC.HEADER_8370)) {
      version = 3;
    } else {
      throw new ProtocolError(`Unknown discovery reply header ${data.subarray(0, 2).toString('hex')}`);
    }
    let packet = data;
    if (packet.subarray(8, 10).equals(MAGIC.HEADER_ZZ)) {
      packet = packet.subarray(8, packet.length - 16);
    }
    if (packet.length < 56) {
      throw new ProtocolError(`Discovery reply too short: ${packet.length}`);
    }
    const applianceId = bytesToId(packet.subarray(20, 26));
    const security = options.security ?? new Security();
    const reply = security.aesDecrypt(packet.subarray(40, packet.length - 16));
    if (reply.length < 41) {
      throw new ProtocolError(`Discovery reply payload too short: ${reply.length}`);
    }

    const address = [reply[3], reply[2], reply[1], reply[0]].join('.');
    const port = reply.readUInt32LE(4);
    const serialNumber = reply.subarray(8, 40).toString('latin1');
    const ssidLength = reply[40];
    const ssid = reply.subarray(41, 41 + ssidLength).toString('latin1');
    const L = ssidLength;

    let type: string;
    let subtype = 0;
    if (reply.length >= 56 + L && reply[55 + L] !== 0) {
      type = `0x${reply[55 + L].toString(16).padStart(2, '0')}`;
      if (reply.length >= 59 + L) {
        subtype = reply.readUInt16LE(57 + L);
      }
    } else {
      const parts = ssid.split('_');
      type = parts.length > 1 ? parts[1].toLowerCase() : '';
    }

    const device = new LanDevice(log, {
      ...options,
      applianceId,
      address,
      port,
      serialNumber,
      version,
      applianceType: type,
      security,
    });
    device.ssid = ssid;
    device.subtype = subtype;
    device.mac = reply.length >= 69 + L
      ? reply.subarray(63 + L, 69 + L).toString('hex')
      : serialNumber.slice(16, 32);
    if (reply.length >= 46 + L) {
      device.reserved = reply[43 + L];
      device.flags = reply[44 + L];
      device.extra = reply[45 + L];
    }
    if (reply.length >= 50 + L) {
      device.udpVersion = reply.readUInt32LE(46 + L);
    }
    if (reply.length >= 72 + L) {
      device.protocolVersion = reply.subarray(69 + L, 72 + L).toString('hex');
      if (reply.length >= 75 + L) {
        device.firmwareVersion = `${reply[72 + L]}.${reply[73 + L]}.${reply[74 + L]}`;
      }
      if (reply.length >= 94 + L) {
        device.randomkey = reply.subarray(78 + L, 94 + L).toString('hex');
      }
    }
    return device;
  }

  get applianceId(): string {
    return this.appliance.id;
  }

  get type(): string {
    return this.appliance.type;
  }

  get name(): string {
    return this.appliance.name;
  }

  get online(): boolean {
    return this.onlineValue;
  }

  get isSupportedVersion(): boolean {
    return this.version >= 2;
  }

  // ==========================================
  // PUBLIC OPERATIONS
  // ==========================================

  /**
   * Queries status and updates the appliance model
   */
  refresh(cloud?: CloudClient): Promise<void> {
    return this.lock.runExclusive(() => this.doRefresh(cloud));
  }

  /**
   * Sends the appliance model's current state as a set command
   */
  apply(cloud?: CloudClient): Promise<void> {
    return this.lock.runExclusive(() => this.doApply(cloud));
  }

  /**
   * Checks support, validates the token on v3 LAN sessions, reads both
   * capability parts and the current status.
   */
  identify(cloud?: CloudClient, useCloud = false): Promise<void> {
    return this.lock.runExclusive(async () => {
      this.checkSupported(useCloud);
      const relay = useCloud ? cloud : undefined;
      if (this.version >= 3 && !useCloud) {
        await this.doValidToken(cloud);
      }
      for (const part of [0, 1] as const) {
        const responses = await this.status(this.appliance.capabilitiesCommand(part), relay);
        const last = responses[responses.length - 1];
        if (last !== undefined) {
          this.appliance.processCapabilities(last, part);
        }
      }
      await this.doRefresh(relay);
    });
  }

  /**
   * Writes named properties into the appliance model, then applies them
   */
  setState(values: Record<string, SettableValue | undefined>, cloud?: CloudClient): Promise<void> {
    return this.lock.runExclusive(async () => {
      for (const [name, value] of Object.entries(values)) {
        if (value === undefined) {
          continue;
        }
        if (!this.appliance.setProperty(name, value)) {
          this.log.warn(`LAN     | Unknown state attribute ${name} for ${this}`);
        }
      }
      await this.doApply(cloud);
    });
  }

  /**
   * Makes sure the session has a working token/key pair, fetching one from
   * the cloud when none was supplied.
   */
  validToken(cloud?: CloudClient): Promise<void> {
    return this.lock.runExclusive(() => this.doValidToken(cloud));
  }

  /**
   * True when the appliance answered identification
   */
  async isIdentified(cloud?: CloudClient, useCloud = false): Promise<boolean> {
    try {
      await this.identify(cloud, useCloud);
      return true;
    } catch (err) {
      if (err instanceof MideaError) {
        this.log.debug(`LAN     | Error identifying appliance ${this}: ${err.message}`);
        return false;
      }
      throw err;
    }
  }

  disconnect(): void {
    if (this.connection) {
      this.connection.close();
      this.connection = undefined;
    }
    this.gotTcpKey = false;
  }

  /**
   * ZZ LAN PACKET
   *
   * ┌──────────┬──────────────────────────────────────────────────────────┐
   * │ 0-1      │ 5A5A                                                     │
   * │ 2-3      │ 0111                                                     │
   * │ 4-5      │ Packet length, little endian                             │
   * │ 6-7      │ 2000                                                     │
   * │ 12-19    │ Timestamp: centisecond, s, min, h, day, month, yy, cc    │
   * │ 20-27    │ Appliance id, little endian                              │
   * │ 40..     │ Command, AES-ECB encrypted unless relayed                │
   * │ n-16     │ MD5 fingerprint                                          │
   * └──────────┴──────────────────────────────────────────────────────────┘
   */
  lanPacket(command: MideaCommand, encrypt = true, now = new Date()): Buffer {
    const header = Buffer.alloc(40);
    header.write('5a5a011100002000', 'hex');
    header[12] = Math.floor(now.getMilliseconds() / 10);
    header[13] = now.getSeconds();
    header[14] = now.getMinutes();
    header[15] = now.getHours();
    header[16] = now.getDate();
    header[17] = now.getMonth() + 1;
    header[18] = now.getFullYear() % 100;
    header[19] = Math.floor(now.getFullYear() / 100);
    idToBytes(this.applianceId || '0', 8, 'little').copy(header, 20);

    const raw = command.finalize();
    const body = encrypt ? this.security.aesEncrypt(raw) : raw;
    const packet = Buffer.concat([header, body]);
    packet.writeUInt16LE(packet.length + 16, 4);
    return Buffer.concat([packet, this.security.md5Fingerprint(packet)]);
  }

  toString(): string {
    return `sn=${redact(this.serialNumber, 8)} id=${redact(this.applianceId, 4)} address=${redact(this.address, 5)} version=${this.version}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.applianceId,
      address: this.address,
      port: this.port,
      sn: this.serialNumber,
      mac: this.mac,
      ssid: this.ssid,
      type: this.type,
      subtype: this.subtype,
      version: this.version,
      udpVersion: this.udpVersion,
      protocolVersion: this.protocolVersion,
      firmwareVersion: this.firmwareVersion,
      online: this.online,
      appliance: this.appliance.toJSON(),
    };
  }

  // ==========================================
  // SESSION INTERNALS (caller holds the lock)
  // ==========================================

  private wait(seconds: number): Promise<void> {
    return sleep(seconds * this.sleepInterval);
  }

  private checkSupported(useCloud: boolean): void {
    if (!this.isSupportedVersion && !useCloud) {
      throw new UnsupportedError(`Appliance ${redact(this.serialNumber, 8)} protocol is not supported.`);
    }
    if (!isSupported(this.type)) {
      throw new UnsupportedError(`Unsupported appliance: ${this}`);
    }
  }

  private async doRefresh(cloud?: CloudClient): Promise<void> {
    const responses = await this.status(this.appliance.refreshCommand(), cloud);
    const last = responses[responses.length - 1];
    if (last !== undefined) {
      this.noResponses = 0;
      this.onlineValue = true;
      this.appliance.processResponse(last);
    }
  }

  private async doApply(cloud?: CloudClient): Promise<void> {
    const data = this.lanPacket(this.appliance.applyCommand(), cloud === undefined);
    const responses = cloud
      ? await cloud.applianceTransparentSend(this.applianceId, data)
      : await this.applianceSend(data);
    const last = responses[responses.length - 1];
    if (last !== undefined) {
      this.onlineValue = true;
      this.appliance.processResponse(last);
    } else {
      this.onlineValue = false;
      if (!cloud) {
        this.disconnect();
      }
    }
  }

  private async status(command: MideaCommand, cloud?: CloudClient): Promise<Buffer[]> {
    const data = this.lanPacket(command, cloud === undefined);
    this.log.debug(`LAN     | Packet for ${this} data=${data.toString('hex')}`);
    const responses = cloud
      ? await cloud.applianceTransparentSend(this.applianceId, data)
      : await this.applianceSend(data);
    this.log.debug(`LAN     | Got response(s) from ${this}: ${responses.length}`);
    if (responses.length === 0) {
      this.noResponses += 1;
      if (this.noResponses > this.maxRetries) {
        this.log.debug(`LAN     | Appliance ${this} is offline, no response after ${this.noResponses} attempts`);
        this.onlineValue = false;
        if (!cloud) {
          this.disconnect();
        }
      }
    } else {
      this.noResponses = 0;
      this.onlineValue = true;
    }
    return responses;
  }

  private applianceSend(data: Buffer): Promise<Buffer[]> {
    if (this.version >= 3) {
      return this.send8370(data);
    }
    if (this.version === 2) {
      return this.sendV2(data);
    }
    return Promise.reject(new ProtocolError(`Unsupported protocol ${this.version} for ${this}`));
  }

  private async connect(): Promise<void> {
    if (this.connection?.isOpen) {
      return;
    }
    this.disconnect();
    this.decoder.reset();
    if (!this.address) {
      this.lastError = `Missing address for ${this}`;
      return;
    }
    const connection = this.connectionFactory(this.address, this.port, this.socketTimeout);
    try {
      this.log.debug(`LAN     | Connecting to ${this}`);
      await connection.open();
      this.connection = connection;
    } catch (err) {
      this.lastError = err instanceof Error ? err.message : String(err);
      this.log.debug(`LAN     | Connect error ${this}: ${this.lastError}`);
      connection.close();
    }
  }

  /**
   * One write, one read. Failures come back as an empty buffer with
   * `retries` incremented.
   */
  private async request(message: Buffer): Promise<Buffer> {
    await this.connect();
    const connection = this.connection;
    if (!connection || !connection.isOpen) {
      this.lastError = `Socket not open for ${this}`;
      this.retries += 1;
      return Buffer.alloc(0);
    }

    try {
      await connection.send(message);
    } catch (err) {
      this.lastError = `Error sending to ${this}: ${err instanceof Error ? err.message : String(err)}`;
      this.log.debug(`LAN     | ${this.lastError}`);
      this.disconnect();
      this.retries += 1;
      return Buffer.alloc(0);
    }

    let response: Buffer | undefined;
    try {
      response = await connection.receive(MAGIC.READ_SIZE);
    } catch (err) {
      this.lastError = `Error reading from ${this}: ${err instanceof Error ? err.message : String(err)}`;
      this.log.debug(`LAN     | ${this.lastError}`);
      this.disconnect();
      this.retries += 1;
      return Buffer.alloc(0);
    }
    if (response === undefined) {
      this.lastError = `Timeout reading from ${this}`;
      this.log.debug(`LAN     | ${this.lastError} retries=${this.retries}`);
      this.retries += 1;
      return Buffer.alloc(0);
    }
    if (response.length === 0) {
      this.lastError = `No results from ${this}`;
      this.log.debug(`LAN     | ${this.lastError}`);
      this.disconnect();
      this.retries += 1;
      return Buffer.alloc(0);
    }
    this.retries = 0;
    return response;
  }

  /**
   * Re-sends after an empty reply until `maxRetries` is reached.
   * Returns undefined when the reply was not empty.
   */
  private async retrySend(data: Buffer, response: Buffer): Promise<Buffer[] | undefined> {
    if (response.length > 0) {
      return undefined;
    }
    if (this.retries < this.maxRetries) {
      this.lastError = `Empty reply from ${this}`;
      this.retries += 1;
      const packets = await this.applianceSend(data);
      this.retries = 0;
      return packets;
    }
    const error = this.lastError;
    this.lastError = '';
    throw new MideaNetworkError(
      `Unable to send data after ${this.maxRetries} retries, last error ${error} for ${redact(this.serialNumber, 8)} (${redact(this.applianceId, 4)})`,
    );
  }

  // ==========================================
  // v3 (8370)
  // ==========================================

  private async authenticate(): Promise<void> {
    if (!this.token || !this.key) {
      throw new AuthenticationError(`Missing token/key pair for ${this}`);
    }
    if (!/^([0-9a-fA-F]{2})+$/.test(this.token)) {
      throw new AuthenticationError(`Invalid token ${redact(this.token, 4)} for ${this}`);
    }
    const request = this.security.encode8370(Buffer.from(this.token, 'hex'), MAGIC.MSGTYPE_HANDSHAKE_REQUEST);
    let response: Buffer = Buffer.alloc(0);
    for (let i = 0; i < this.maxRetries; i++) {
      response = await this.request(request);
      if (response.length > 0) {
        break;
      }
      if (i > 0) {
        this.log.debug(`LAN     | Handshake retry ${i + 1} of ${this.maxRetries} for ${this}`);
        await this.wait(i + 1);
      }
    }
    if (response.length === 0) {
      throw new AuthenticationError(`Failed to perform handshake for ${redact(this.serialNumber, 8)}`);
    }
    this.getTcpKey(response.subarray(8, 72));
    await this.wait(0.5);
  }

  private getTcpKey(response: Buffer): void {
    try {
      this.security.tcpKey(response, Buffer.from(this.key, 'hex'));
    } catch (err) {
      this.disconnect();
      throw new AuthenticationError(
        `Failed to get TCP key for ${this}, cause ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    this.gotTcpKey = true;
    this.decoder.reset();
    this.log.debug(`LAN     | Got TCP key for ${this}`);
  }

  private async send8370(data: Buffer): Promise<Buffer[]> {
    if (!this.connection?.isOpen || !this.gotTcpKey) {
      this.disconnect();
      for (let i = 0; i < this.maxRetries; i++) {
        try {
          await this.authenticate();
          break;
        } catch (err) {
          if (!(err instanceof MideaError) || i === this.maxRetries - 1) {
            throw err;
          }
          this.log.debug(`LAN     | Authentication attempt ${i + 1} failed for ${this}: ${err.message}`);
          this.disconnect();
          await this.wait((i + 1) * 2);
        }
      }
    }
    const message = this.security.encode8370(data, MAGIC.MSGTYPE_ENCRYPTED_REQUEST);
    await this.wait(this.retries);
    const response = await this.request(message);
    const retried = await this.retrySend(data, response);
    if (retried !== undefined) {
      return retried;
    }

    const packets: Buffer[] = [];
    for (const frame of this.decoder.feed(response)) {
      let payload = frame;
      if (payload.length > 56) {
        payload = this.security.aesDecrypt(payload.subarray(40, payload.length - 16));
      }
      if (payload.length > 10) {
        packets.push(payload.subarray(10));
      }
    }
    return packets;
  }

  // ==========================================
  // v2
  // ==========================================

  private async sendV2(data: Buffer): Promise<Buffer[]> {
    await this.wait(this.retries);
    const response = await this.request(data);
    const retried = await this.retrySend(data, response);
    if (retried !== undefined) {
      return retried;
    }

    const packets: Buffer[] = [];
    if (response.length > 5 && response.subarray(0, 2).equals(MAGIC.HEADER_ZZ)) {
      let i = 0;
      while (i + 6 <= response.length) {
        const size = response.readUInt16LE(i + 4);
        if (size === 0) {
          break;
        }
        const packet = response.subarray(i, i + size);
        const payload = this.security.aesDecrypt(packet.subarray(40, packet.length - 16));
        if (payload.length > 10) {
          packets.push(payload.subarray(10));
        }
        i += size;
      }
    } else if (response.length > 2 && response[0] === MAGIC.COMMAND_SYNC) {
      let i = 0;
      while (i + 1 < response.length) {
        const size = response[i + 1];
        const frame = response.subarray(i, i + size + 1);
        if (frame.length > 10) {
          packets.push(frame.subarray(10));
        }
        i += size + 1;
      }
    } else {
      throw new ProtocolError(`Unknown response format ${this} ${response.toString('hex')}`);
    }
    return packets;
  }

  // ==========================================
  // TOKENS
  // ==========================================

  private async doValidToken(cloud?: CloudClient): Promise<void> {
    if (!this.token || !this.key) {
      if (!cloud) {
        throw new MideaError(`Provide either token/key pair or cloud ${this}`);
      }
      if (!(await this.getValidToken(cloud))) {
        throw new AuthenticationError(`Unable to get valid token for ${redact(this.serialNumber, 8)}`);
      }
      return;
    }
    await this.authenticate();
  }

  private async getValidToken(cloud: CloudClient): Promise<boolean> {
    for (const endian of ['little', 'big'] as const) {
      const udpId = Security.udpId(idToBytes(this.applianceId, 6, endian));
      this.log.debug(`LAN     | Trying to get token for ${this} udpId=${redact(udpId, 4)}`);
      const { token, key } = await cloud.getToken(udpId);
      this.token = token;
      this.key = key;
      try {
        await this.authenticate();
        return true;
      } catch (err) {
        if (!(err instanceof MideaError)) {
          throw err;
        }
        this.log.debug(`LAN     | Unable to authenticate ${this} with ${endian} endian udpId: ${err.message}`);
        this.token = '';
        this.key = '';
        this.disconnect();
      }
    }
    return false;
  }
}

/**
 * True when a cloud appliance entry describes the same appliance as the
 * LAN device
 */
export function matchesLanCloud(device: LanDevice, details: CloudAppliance): boolean {
  return details.id === device.applianceId || (device.serialNumber !== '' && details.sn === device.serialNumber);
}

export interface ApplianceStateOptions {
  address?: string;
  token?: string;
  key?: string;
  cloud?: CloudClient;
  useCloud?: boolean;
  applianceId?: string;
  applianceType?: string | number;
  security?: Security;
  retries?: number;
  /** Seconds */
  timeout?: number;
  sleepInterval?: number;
  query?: UdpQuery;
  connectionFactory?: ConnectionFactory;
}

/**
 * Finds one appliance by address or cloud id and identifies it
 */
export async function applianceState(log: Logger, options: ApplianceStateOptions): Promise<LanDevice> {
  const common: LanDeviceOptions = {
    security: options.security,
    maxRetries: options.retries,
    socketTimeout: options.timeout,
    sleepInterval: options.sleepInterval,
    connectionFactory: options.connectionFactory,
  };
  const timeout = isNull(options.timeout, MAGIC.DEFAULT_SOCKET_TIMEOUT);
  let device: LanDevice;

  if (options.address) {
    const query = options.query ?? udpQuery;
    let reply: Buffer;
    try {
      reply = await query(options.address, MAGIC.DISCOVERY_PORT, MAGIC.DISCOVERY_MSG, timeout, MAGIC.DISCOVERY_READ_SIZE);
    } catch (err) {
      if (err instanceof MideaNetworkError) {
        throw err;
      }
      throw new MideaNetworkError(
        `Could not connect to appliance ${options.address}: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
    device = LanDevice.fromDiscovery(log, reply, { ...common, token: options.token, key: options.key });
  } else if (options.applianceId) {
    if (!options.useCloud || !options.cloud) {
      throw new MideaError(`Missing cloud credentials for appliance ${redact(options.applianceId, 4)}`);
    }
    device = new LanDevice(log, {
      ...common,
      applianceId: options.applianceId,
      applianceType: isNull(options.applianceType, 'a1'),
    });
  } else {
    throw new MideaError('Must provide either appliance id or network address');
  }

  await device.identify(options.cloud, isNull(options.useCloud, false));

  if (options.cloud) {
    const appliances = await options.cloud.listAppliances();
    const details = appliances.find((item) => matchesLanCloud(device, item));
    if (details) {
      device.appliance.name = details.name;
      device.serialNumber = details.sn;
    }
  }
  return device;
}
