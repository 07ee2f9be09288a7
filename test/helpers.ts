import * as crypto from 'crypto';
import { Logger } from 'homebridge/lib/logger';
import { vi } from 'vitest';
import type { DeviceConnection } from '../src/connection';
import { Security } from '../src/security';
import { idToBytes } from '../src/util';

/**
 * Real homebridge logger with every level silenced and recorded
 */
export function testLogger() {
  const log = new Logger('test');
  const info = vi.spyOn(log, 'info').mockImplementation(() => undefined);
  const warn = vi.spyOn(log, 'warn').mockImplementation(() => undefined);
  const error = vi.spyOn(log, 'error').mockImplementation(() => undefined);
  const debug = vi.spyOn(log, 'debug').mockImplementation(() => undefined);
  return { log, info, warn, error, debug };
}

/** Every message passed to a spied log level */
export function messages(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

export const TEST_KEY = Buffer.alloc(32, 0x11);

/**
 * Appliance side of the v3 handshake: 32 bytes of AES-256-CBC cipher text
 * of `plain` under `key`, then the SHA-256 of `plain`
 */
export function handshakeReply(plain: Buffer = Buffer.alloc(32, 0x5A), key: Buffer = TEST_KEY): Buffer {
  const cipher = crypto.createCipheriv('aes-256-cbc', key, Buffer.alloc(16));
  cipher.setAutoPadding(false);
  const payload = Buffer.concat([cipher.update(plain), cipher.final()]);
  return Buffer.concat([payload, crypto.createHash('sha256').update(plain).digest()]);
}

/** Session key the handshake above yields */
export function sessionKey(plain: Buffer = Buffer.alloc(32, 0x5A), key: Buffer = TEST_KEY): Buffer {
  return Buffer.from(plain.map((b, i) => b ^ key[i % key.length]));
}

/**
 * Appliance side of a TCP session. Each `receive` hands out the next
 * scripted reply; an exhausted script reads as a timeout.
 */
export class ScriptedConnection implements DeviceConnection {
  isOpen = false;
  opened = 0;
  readonly sent: Buffer[] = [];

  constructor(private readonly replies: Buffer[] = []) {}

  async open(): Promise<void> {
    this.opened += 1;
    this.isOpen = true;
  }

  async send(data: Buffer): Promise<void> {
    this.sent.push(data);
  }

  async receive(): Promise<Buffer | undefined> {
    return this.replies.shift();
  }

  close(): void {
    this.isOpen = false;
  }
}

/** Message body wrapped in a 10 byte AA header */
export function aaFrame(body: string, type = 0xA1): Buffer {
  const payload = Buffer.from(body, 'hex');
  return Buffer.concat([Buffer.from([0xAA, payload.length + 9, type, 0, 0, 0, 0, 0, 0, 0x03]), payload]);
}

/** ZZ packet carrying `frame` encrypted under the default LAN key */
export function zzPacket(frame: Buffer, security: Security = new Security()): Buffer {
  const header = Buffer.alloc(40);
  header.write('5a5a0111', 'hex');
  const body = security.aesEncrypt(frame);
  header.writeUInt16LE(40 + body.length + 16, 4);
  return Buffer.concat([header, body, Buffer.alloc(16)]);
}

/** Session security on the appliance side of the default handshake */
export function applianceSecurity(): Security {
  const security = new Security();
  security.tcpKey(handshakeReply(), TEST_KEY);
  return security;
}

/** 8370 handshake reply as read from the socket */
export function handshakeFrame(plain?: Buffer, key?: Buffer): Buffer {
  return Buffer.concat([Buffer.from('8370004020010000', 'hex'), handshakeReply(plain, key)]);
}

export interface DiscoveryFields {
  id: string;
  address: string;
  serialNumber: string;
  ssid: string;
  type?: number;
  version?: 2 | 3;
}

/**
 * Discovery reply as a LAN module sends it. Without `type` the reply stops
 * right after the SSID.
 */
export function discoveryReply(fields: DiscoveryFields): Buffer {
  const ssid = Buffer.from(fields.ssid, 'latin1');
  const L = ssid.length;
  const reply = Buffer.alloc(fields.type === undefined ? 41 + L : 94 + L);
  Buffer.from(fields.address.split('.').map(Number).reverse()).copy(reply, 0);
  reply.writeUInt32LE(6444, 4);
  reply.write(fields.serialNumber, 8, 'latin1');
  reply[40] = L;
  ssid.copy(reply, 41);
  if (fields.type !== undefined) {
    reply[44 + L] = 1;
    reply.writeUInt32LE(2, 46 + L);
    reply[55 + L] = fields.type;
    reply.writeUInt16LE(3, 57 + L);
    Buffer.from('a0b1c2d3e4f5', 'hex').copy(reply, 63 + L);
    Buffer.from('000102', 'hex').copy(reply, 69 + L);
    Buffer.from([3, 1, 4]).copy(reply, 72 + L);
    Buffer.alloc(16, 0xEE).copy(reply, 78 + L);
  }

  const header = Buffer.alloc(40);
  header.write('5a5a01117800', 'hex');
  idToBytes(fields.id, 6, 'little').copy(header, 20);
  const packet = Buffer.concat([header, new Security().aesEncrypt(reply), Buffer.alloc(16)]);
  if (fields.version === 3) {
    return Buffer.concat([Buffer.from('8370008e20010000', 'hex'), packet, Buffer.alloc(16)]);
  }
  return packet;
}
