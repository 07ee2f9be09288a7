import * as crypto from 'crypto';
import { AuthenticationError, MideaError, ProtocolError } from './errors';
import { MAGIC } from './magic';

const BLOCK_SIZE = 16;

export interface SecurityOptions {
  appkey?: string;
  signkey?: string;
  iotkey?: string;
  hmackey?: string;
  iv?: Buffer;
}

function sha256(...parts: Array<Buffer | string>): Buffer {
  const hash = crypto.createHash('sha256');
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
}

function md5(...parts: Array<Buffer | string>): Buffer {
  const hash = crypto.createHash('md5');
  for (const part of parts) {
    hash.update(part);
  }
  return hash.digest();
}

function xor(plain: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(plain.length);
  for (let i = 0; i < plain.length; i++) {
    out[i] = plain[i] ^ key[i % key.length];
  }
  return out;
}

function ecbCipherName(key: Buffer): string {
  return `aes-${key.length * 8}-ecb`;
}

function ecbEncrypt(raw: Buffer, key: Buffer): Buffer {
  const cipher = crypto.createCipheriv(ecbCipherName(key), key, null);
  return Buffer.concat([cipher.update(raw), cipher.final()]);
}

function ecbDecrypt(raw: Buffer, key: Buffer): Buffer {
  try {
    const decipher = crypto.createDecipheriv(ecbCipherName(key), key, null);
    return Buffer.concat([decipher.update(raw), decipher.final()]);
  } catch (err) {
    throw new ProtocolError(`Unable to decrypt payload: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * SECURITY
 *
 * Holds every key used to talk to an appliance or to the cloud:
 *
 *  - the static ECB key, MD5 of the app sign key, used for v2 LAN packets
 *    and discovery replies
 *  - the v3 TCP session key, negotiated by the 8370 handshake, and the two
 *    frame counters that go with it
 *  - the cloud access token and the data key derived from it, used for
 *    serial numbers and the transparent send relay
 *
 * One instance belongs to one LAN session or one cloud client.
 */
export class Security {
  private readonly appkey: string;
  private readonly signkey: Buffer;
  private readonly iotkey: string;
  private readonly hmackey: string;
  private readonly iv: Buffer;
  private readonly encKey: Buffer;
  private tcpKeyValue: Buffer = Buffer.alloc(0);
  private requestCountValue = 0;
  private responseCountValue = 0;
  private accessTokenValue?: string;
  private dataKeyValue?: string;

  constructor(options: SecurityOptions = {}) {
    const app = MAGIC.SUPPORTED_APPS[MAGIC.DEFAULT_APP];
    this.appkey = options.appkey ?? app.appkey;
    this.signkey = Buffer.from(options.signkey ?? app.signkey, 'utf8');
    this.iotkey = options.iotkey ?? '';
    this.hmackey = options.hmackey ?? '';
    this.iv = Buffer.from(options.iv ?? Buffer.alloc(BLOCK_SIZE));
    this.encKey = md5(this.signkey);
  }

  // ==========================================
  // AES
  // ==========================================

  /** AES-128-ECB with PKCS7 padding, keyed by MD5 of the sign key */
  aesEncrypt(raw: Buffer): Buffer {
    return ecbEncrypt(raw, this.encKey);
  }

  aesDecrypt(raw: Buffer): Buffer {
    return ecbDecrypt(raw, this.encKey);
  }

  /**
   * AES-CBC without padding. Callers supply whole blocks.
   */
  aesCbcEncrypt(raw: Buffer, key: Buffer): Buffer {
    const cipher = crypto.createCipheriv(`aes-${key.length * 8}-cbc`, key, this.iv);
    cipher.setAutoPadding(false);
    return Buffer.concat([cipher.update(raw), cipher.final()]);
  }

  aesCbcDecrypt(raw: Buffer, key: Buffer): Buffer {
    try {
      const decipher = crypto.createDecipheriv(`aes-${key.length * 8}-cbc`, key, this.iv);
      decipher.setAutoPadding(false);
      return Buffer.concat([decipher.update(raw), decipher.final()]);
    } catch (err) {
      throw new ProtocolError(`Unable to decrypt payload: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  md5Fingerprint(raw: Buffer): Buffer {
    return md5(raw, this.signkey);
  }

  // ==========================================
  // v3 (8370) SESSION
  // ==========================================

  get tcpKeyBytes(): Buffer {
    return this.tcpKeyValue;
  }

  get requestCount(): number {
    return this.requestCountValue;
  }

  get responseCount(): number {
    return this.responseCountValue;
  }

  /**
   * Derives the session key from the 64 byte handshake reply: 32 bytes of
   * CBC cipher text followed by the SHA-256 of the plain text.
   * The session key is the plain text XOR the local key.
   */
  tcpKey(response: Buffer, key: Buffer): Buffer {
    if (response.toString('latin1') === 'ERROR') {
      throw new AuthenticationError('Authentication failed - error packet');
    }
    if (response.length !== 64) {
      throw new AuthenticationError(`Packet length error: ${response.length} instead of 64`);
    }
    const payload = response.subarray(0, 32);
    const sign = response.subarray(32);
    const plain = this.aesCbcDecrypt(payload, key);
    if (!sha256(plain).equals(sign)) {
      throw new AuthenticationError('Packet signature mismatch');
    }
    this.tcpKeyValue = xor(plain, key);
    this.requestCountValue = 0;
    this.responseCountValue = 0;
    return this.tcpKeyValue;
  }

  /**
   * 8370 FRAME
   *
   * ┌────────┬────────────────────────────────────────────────────────────┐
   * │ 0-1    │ 0x83 0x70                                                  │
   * │ 2-3    │ Body size, big endian                                      │
   * │ 4      │ 0x20                                                       │
   * │ 5      │ Pad length << 4 | message type                             │
   * │ 6-7    │ Request counter, big endian (encrypted with the body)      │
   * │ 8..    │ Body, random padding                                       │
   * │ n-32   │ SHA-256 of header and plain body (encrypted types only)    │
   * └────────┴────────────────────────────────────────────────────────────┘
   */
  encode8370(data: Buffer, msgtype: number): Buffer {
    const encrypted = MAGIC.ENCRYPTED_MESSAGE_TYPES.includes(msgtype);
    let size = data.length;
    let pad = 0;
    let body = data;
    if (encrypted) {
      if ((size + 2) % BLOCK_SIZE !== 0) {
        pad = BLOCK_SIZE - ((size + 2) & 0b1111);
        body = Buffer.concat([body, crypto.randomBytes(pad)]);
      }
      size += pad + 32;
    }
    const header = Buffer.alloc(6);
    MAGIC.HEADER_8370.copy(header);
    header.writeUInt16BE(size, 2);
    header[4] = MAGIC.HEADER_8370_FLAG;
    header[5] = (pad << 4) | msgtype;

    if (this.requestCountValue >= MAGIC.COUNTER_LIMIT) {
      this.requestCountValue = 0;
    }
    const counter = Buffer.alloc(2);
    counter.writeUInt16BE(this.requestCountValue);
    body = Buffer.concat([counter, body]);
    this.requestCountValue += 1;

    if (encrypted) {
      if (this.tcpKeyValue.length === 0) {
        throw new ProtocolError('Missing TCP key for local network access');
      }
      const sign = sha256(header, body);
      body = Buffer.concat([this.aesCbcEncrypt(body, this.tcpKeyValue), sign]);
    }
    return Buffer.concat([header, body]);
  }

  /**
   * Decodes as many complete frames as the buffer holds.
   * Returns the frame bodies and whatever trailing bytes are still incomplete.
   */
  decode8370(data: Buffer): [Buffer[], Buffer] {
    if (data.length < 6) {
      return [[], data];
    }
    const header = data.subarray(0, 6);
    if (header[0] !== MAGIC.HEADER_8370[0] || header[1] !== MAGIC.HEADER_8370[1]) {
      throw new ProtocolError('Message was not a v3 (8370) message');
    }
    const size = header.readUInt16BE(2) + 8;
    if (data.length < size) {
      return [[], data];
    }
    let leftover: Buffer | undefined;
    let frame = data;
    if (data.length > size) {
      leftover = data.subarray(size);
      frame = data.subarray(0, size);
    }
    if (header[4] !== MAGIC.HEADER_8370_FLAG) {
      throw new ProtocolError('Byte 4 was not 0x20');
    }
    const pad = header[5] >> 4;
    const msgtype = header[5] & 0xF;
    let body = frame.subarray(6);

    if (MAGIC.ENCRYPTED_MESSAGE_TYPES.includes(msgtype)) {
      if (this.tcpKeyValue.length === 0) {
        throw new ProtocolError('Missing TCP key for local network access');
      }
      if (body.length < 32 + BLOCK_SIZE || (body.length - 32) % BLOCK_SIZE !== 0) {
        throw new ProtocolError(`Encrypted body of ${body.length} bytes is not whole blocks plus signature`);
      }
      const sign = body.subarray(body.length - 32);
      body = this.aesCbcDecrypt(body.subarray(0, body.length - 32), this.tcpKeyValue);
      if (!sha256(header, body).equals(sign)) {
        throw new ProtocolError('Signature does not match payload');
      }
      if (pad) {
        body = body.subarray(0, body.length - pad);
      }
    }
    if (body.length < 2) {
      throw new ProtocolError('Frame too short for response counter');
    }
    this.responseCountValue = body.readUInt16BE(0);
    body = body.subarray(2);

    if (leftover && leftover.length > 0) {
      const [packets, incomplete] = this.decode8370(leftover);
      return [[Buffer.from(body), ...packets], incomplete];
    }
    return [[Buffer.from(body)], Buffer.alloc(0)];
  }

  // ==========================================
  // CLOUD
  // ==========================================

  /**
   * Cloud request signature: SHA-256 of the URL path, the unescaped query
   * sorted by key, and the app key
   */
  sign(url: string, payload: Record<string, string | number>): string {
    const path = new URL(url).pathname;
    const query = Object.keys(payload)
      .sort()
      .map((key) => `${key}=${payload[key]}`)
      .join('&');
    return sha256(path + query + this.appkey).toString('hex');
  }

  encryptPassword(loginId: string, password: string): string {
    const passwordHash = sha256(password).toString('hex');
    return sha256(loginId + passwordHash + this.appkey).toString('hex');
  }

  encryptIamPassword(loginId: string, password: string): string {
    const first = md5(password).toString('hex');
    const second = md5(first).toString('hex');
    return sha256(loginId + second + this.appkey).toString('hex');
  }

  signProxied(query: Record<string, string> | undefined, data: string, random: string): string {
    let msg = this.iotkey;
    if (data) {
      msg += data;
    }
    if (query) {
      for (const key of Object.keys(query).sort()) {
        msg += key + query[key];
      }
    }
    msg += random;
    return crypto.createHmac('sha256', this.hmackey).update(msg).digest('hex');
  }

  get accessToken(): string | undefined {
    return this.accessTokenValue;
  }

  /** Setting the token derives the data key */
  set accessToken(token: string | undefined) {
    this.accessTokenValue = token;
    this.dataKeyValue = token === undefined ? undefined : this.aesDecryptString(token, this.md5AppKey);
  }

  get md5AppKey(): string {
    return md5(this.appkey).toString('hex').slice(0, 16);
  }

  get dataKey(): string | undefined {
    return this.dataKeyValue;
  }

  aesDecryptString(data: string, key?: string): string {
    const useKey = key || this.dataKeyValue;
    if (!useKey) {
      throw new MideaError('Missing data key');
    }
    return ecbDecrypt(Buffer.from(data, 'hex'), Buffer.from(useKey, 'utf8')).toString('utf8');
  }

  aesEncryptString(data: string, key?: string): string {
    const useKey = key || this.dataKeyValue;
    if (!useKey) {
      throw new MideaError('Missing data key');
    }
    return ecbEncrypt(Buffer.from(data, 'utf8'), Buffer.from(useKey, 'utf8')).toString('hex');
  }

  /**
   * Cloud side identifier of a LAN module: SHA-256 of the id bytes with the
   * two halves folded together
   */
  static udpId(idBytes: Buffer): string {
    const digest = sha256(idBytes);
    const out = Buffer.alloc(16);
    for (let i = 0; i < 16; i++) {
      out[i] = digest[i] ^ digest[i + 16];
    }
    return out.toString('hex');
  }
}
