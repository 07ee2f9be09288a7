import { describe, expect, it } from 'vitest';
import { AuthenticationError, MideaError, ProtocolError } from '../src/errors';
import { Security } from '../src/security';
import { idToBytes } from '../src/util';
import { TEST_KEY, handshakeReply, sessionKey } from './helpers';

function connected(): Security {
  const security = new Security();
  security.tcpKey(handshakeReply(), TEST_KEY);
  return security;
}

describe('Security AES', () => {
  it('pads ECB payloads to whole blocks', () => {
    const security = new Security();
    const cipher = security.aesEncrypt(Buffer.alloc(16, 1));
    expect(cipher.length).toBe(32);
    expect(security.aesDecrypt(cipher)).toEqual(Buffer.alloc(16, 1));
  });

  it('reports undecryptable payloads as protocol errors', () => {
    expect(() => new Security().aesDecrypt(Buffer.alloc(15))).toThrow(ProtocolError);
  });

  it('depends on the sign key', () => {
    const plain = Buffer.from('dehumidifier');
    const a = new Security({ signkey: 'test-sign-a' }).aesEncrypt(plain);
    const b = new Security({ signkey: 'test-sign-b' }).aesEncrypt(plain);
    expect(a.equals(b)).toBe(false);
  });
});

describe('Security handshake', () => {
  it('derives the session key', () => {
    const security = new Security();
    expect(security.tcpKey(handshakeReply(), TEST_KEY)).toEqual(sessionKey());
    expect(security.tcpKeyBytes).toEqual(sessionKey());
    expect(security.requestCount).toBe(0);
  });

  it('rejects the error packet', () => {
    expect(() => new Security().tcpKey(Buffer.from('ERROR', 'latin1'), TEST_KEY))
      .toThrow('Authentication failed - error packet');
  });

  it('rejects replies of the wrong length', () => {
    expect(() => new Security().tcpKey(Buffer.alloc(63), TEST_KEY))
      .toThrow('Packet length error: 63 instead of 64');
  });

  it('rejects a bad signature', () => {
    const reply = handshakeReply();
    reply[40] ^= 0xFF;
    expect(() => new Security().tcpKey(reply, TEST_KEY)).toThrow(AuthenticationError);
  });
});

describe('Security 8370 frames', () => {
  it('encodes a handshake request in the clear', () => {
    const security = new Security();
    expect(security.encode8370(Buffer.from('0102', 'hex'), 0x0).toString('hex')).toBe('83700002200000000102');
    expect(security.requestCount).toBe(1);
    expect(security.encode8370(Buffer.from('0102', 'hex'), 0x0).toString('hex')).toBe('83700002200000010102');
  });

  it('decodes a clear frame', () => {
    const [frames, leftover] = new Security().decode8370(Buffer.from('83700002200100070102', 'hex'));
    expect(frames.map((f) => f.toString('hex'))).toEqual(['0102']);
    expect(leftover.length).toBe(0);
  });

  it('round trips encrypted frames between two ends', () => {
    const sender = connected();
    const receiver = connected();
    const frame = sender.encode8370(Buffer.from('0011223344', 'hex'), 0x6);
    expect(frame.length).toBe(54);
    expect(frame[5]).toBe((9 << 4) | 0x6);
    const [frames, leftover] = receiver.decode8370(frame);
    expect(frames.map((f) => f.toString('hex'))).toEqual(['0011223344']);
    expect(leftover.length).toBe(0);
    expect(receiver.responseCount).toBe(0);
  });

  it('splits several frames and keeps the incomplete tail', () => {
    const sender = connected();
    const receiver = connected();
    const first = sender.encode8370(Buffer.from('aa', 'hex'), 0x6);
    const second = sender.encode8370(Buffer.from('bbcc', 'hex'), 0x6);
    const [frames, leftover] = receiver.decode8370(Buffer.concat([first, second, second.subarray(0, 10)]));
    expect(frames.map((f) => f.toString('hex'))).toEqual(['aa', 'bbcc']);
    expect(leftover).toEqual(second.subarray(0, 10));
    expect(receiver.responseCount).toBe(1);
  });

  it('waits for the rest of a short frame', () => {
    const data = Buffer.from('8370000220', 'hex');
    const [frames, leftover] = new Security().decode8370(data);
    expect(frames).toEqual([]);
    expect(leftover).toEqual(data);
  });

  it('rejects frames without the 8370 header', () => {
    expect(() => new Security().decode8370(Buffer.from('5a5a00022000', 'hex'))).toThrow(ProtocolError);
  });

  it('rejects a tampered frame', () => {
    const frame = connected().encode8370(Buffer.from('0011223344', 'hex'), 0x6);
    frame[frame.length - 1] ^= 0x01;
    expect(() => connected().decode8370(frame)).toThrow('Signature does not match payload');
  });

  it('round trips every body length', () => {
    for (const msgtype of [0x0, 0x3, 0x6]) {
      for (let length = 0; length <= 48; length++) {
        const body = Buffer.alloc(length, length);
        const [frames, leftover] = connected().decode8370(connected().encode8370(body, msgtype));
        expect(frames).toEqual([body]);
        expect(leftover.length).toBe(0);
      }
    }
  });

  it('declares the signature of block aligned bodies', () => {
    const frame = connected().encode8370(Buffer.alloc(14, 7), 0x6);
    expect(frame.length).toBe(54);
    expect(frame.readUInt16BE(2)).toBe(46);
    expect(frame[5]).toBe(0x6);
  });

  it('decodes batched frames like separate reads', () => {
    const sender = connected();
    const frames = [Buffer.alloc(14, 1), Buffer.alloc(3, 2), Buffer.alloc(30, 3)].map((body) => sender.encode8370(body, 0x6));
    const receiver = connected();
    const oneByOne = frames.flatMap((frame) => receiver.decode8370(frame)[0]);
    const [batched, leftover] = connected().decode8370(Buffer.concat(frames));
    expect(batched).toEqual(oneByOne);
    expect(leftover.length).toBe(0);
  });

  it('rejects encrypted bodies that are not whole blocks', () => {
    const misaligned = Buffer.concat([Buffer.from('8370002320', 'hex'), Buffer.from([0x06]), Buffer.alloc(37)]);
    expect(() => connected().decode8370(misaligned)).toThrow(ProtocolError);
    const short = Buffer.concat([Buffer.from('8370001220', 'hex'), Buffer.from([0x06]), Buffer.alloc(20)]);
    expect(() => connected().decode8370(short)).toThrow(ProtocolError);
    expect(() => new Security().aesCbcDecrypt(Buffer.alloc(15), Buffer.alloc(32))).toThrow(ProtocolError);
  });

  it('needs a session key for encrypted frames', () => {
    expect(() => new Security().encode8370(Buffer.from('00', 'hex'), 0x6))
      .toThrow('Missing TCP key for local network access');
  });
});

describe('Security cloud helpers', () => {
  const security = new Security({ appkey: 'test-key', iotkey: 'test-iot', hmackey: 'test-hmac' });

  it('signs requests over path, sorted query and app key', () => {
    expect(security.sign('https://cloud.example.com/v1/user/login', { b: 2, a: 'x' }))
      .toBe('38f3d8e9b57eee681708746ba46df89cf20cb6b394eb6c819467fec5732fdc6a');
  });

  it('hashes the password with the login id', () => {
    expect(security.encryptPassword('login-1', 'test-secret'))
      .toBe('56ff22fdb4d4264a7a8d45d62101e4398c64382679fb43026b9a47f8abfea3d4');
    expect(security.encryptIamPassword('login-1', 'test-secret'))
      .toBe('5d0221745e7da6e62e5e6413f9219344c34c9c611a224c985e93c46965a102b7');
  });

  it('signs proxied requests with the HMAC key', () => {
    expect(security.signProxied({ b: '2', a: '1' }, '{"x":1}', 'rnd'))
      .toBe('71d8a0677d1b03cf893a8961ba77ebb639f3ad711272a45855300e68dd1d00e2');
  });

  it('derives the data key from the access token', () => {
    const cloud = new Security({ appkey: 'test-key' });
    expect(cloud.md5AppKey).toBe('53136271c432a1af');
    const token = cloud.aesEncryptString('test-data-key-16', cloud.md5AppKey);
    cloud.accessToken = token;
    expect(cloud.dataKey).toBe('test-data-key-16');
    expect(cloud.aesDecryptString(cloud.aesEncryptString('1,2,-3'))).toBe('1,2,-3');
  });

  it('needs a data key for string encryption', () => {
    expect(() => new Security().aesEncryptString('x')).toThrow(MideaError);
  });

  it('folds the SHA-256 of the appliance id into the UDP id', () => {
    expect(Security.udpId(idToBytes('123456', 6, 'little'))).toBe('b97733000d2f5cc33d9b0234806de9db');
  });
});
