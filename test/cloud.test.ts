import { Response } from 'node-fetch';
import { describe, expect, it } from 'vitest';
import { FetchFunction, MideaCloud, decodeFromCsv, encodeAsCsv, stamp } from '../src/cloud';
import {
  CloudAuthenticationError,
  CloudError,
  CloudRequestError,
  MideaError,
  ProtocolError,
  RetryLaterError,
} from '../src/errors';
import { connectToCloud } from '../src/lib';
import { Security } from '../src/security';
import { messages, testLogger } from './helpers';

const SERVER = 'https://cloud.example.com/v1/';
const DATA_KEY = 'test-data-key-16';

/** Security the fake server encrypts with */
const server = new Security({ appkey: 'test-key' });
const ACCESS_TOKEN = server.aesEncryptString(DATA_KEY, server.md5AppKey);
const dataKey = new Security({ appkey: 'test-key' });
dataKey.accessToken = ACCESS_TOKEN;

interface Call {
  endpoint: string;
  params: URLSearchParams;
}

/**
 * API server stand-in. Each endpoint answers from its queue; strings are
 * sent as they are, numbers as an HTTP status, anything else as JSON.
 */
function fakeServer(routes: Record<string, unknown[]>) {
  const calls: Call[] = [];
  const fetch: FetchFunction = async (url, init) => {
    const endpoint = url.slice(SERVER.length);
    calls.push({ endpoint, params: new URLSearchParams(String(init.body)) });
    const next = routes[endpoint]?.shift();
    if (next === undefined) {
      return new Response('', { status: 404, statusText: 'Not Found' });
    }
    if (typeof next === 'number') {
      return new Response('', { status: next, statusText: 'Server Error' });
    }
    return new Response(typeof next === 'string' ? next : JSON.stringify(next));
  };
  return { calls, fetch, endpoints: () => calls.map((call) => call.endpoint) };
}

function ok(result: unknown) {
  return { errorCode: '0', msg: 'ok', result };
}

function failure(code: number, msg: string) {
  return { errorCode: String(code), msg };
}

const LOGIN_ID = ok({ loginId: 'login-1' });
const LOGIN = ok({ sessionId: 'session-1', accessToken: ACCESS_TOKEN });

function cloud(routes: Record<string, unknown[]>, maxRetries = 3) {
  const logger = testLogger();
  const fake = fakeServer(routes);
  const client = new MideaCloud(logger.log, {
    account: 'user@example.com',
    password: 'test-secret',
    appkey: 'test-key',
    serverUrl: SERVER,
    fetch: fake.fetch,
    maxRetries,
    sleepInterval: 0,
  });
  return { client, ...fake, ...logger };
}

describe('relay encoding', () => {
  it('writes bytes as signed integers', () => {
    expect(encodeAsCsv(Buffer.from([0, 127, 128, 255]))).toBe('0,127,-128,-1');
    expect(decodeFromCsv('0,127,-128,-1')).toEqual(Buffer.from([0, 127, 128, 255]));
  });

  it('stamps requests with the local time', () => {
    expect(stamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('20240102030405');
  });
});

describe('MideaCloud authentication', () => {
  it('logs in with the hashed password and keeps the data key', async () => {
    const { client, calls, debug } = cloud({ 'user/login/id/get': [LOGIN_ID], 'user/login': [LOGIN] });
    await client.authenticate();
    expect(calls.map((call) => call.endpoint)).toEqual(['user/login/id/get', 'user/login']);
    expect(calls[0].params.get('loginAccount')).toBe('user@example.com');
    expect(calls[0].params.get('appId')).toBe('1017');
    expect(calls[1].params.get('password')).toBe('56ff22fdb4d4264a7a8d45d62101e4398c64382679fb43026b9a47f8abfea3d4');
    expect(calls[1].params.get('sign')).toMatch(/^[0-9a-f]{64}$/);
    expect(client.security.dataKey).toBe(DATA_KEY);
    expect(messages(debug).filter((message) => message.startsWith('CLOUD   | HTTP request user/login'))).toEqual([]);
  });

  it('reuses the session', async () => {
    const { client, endpoints } = cloud({ 'user/login/id/get': [LOGIN_ID], 'user/login': [LOGIN] });
    await client.authenticate();
    await client.authenticate();
    expect(endpoints().length).toBe(2);
  });

  it('sends the session id once logged in', async () => {
    const { client, calls } = cloud({
      'user/login/id/get': [LOGIN_ID],
      'user/login': [LOGIN],
      'custom/endpoint': [ok({ value: 1 })],
    });
    expect(await client.apiRequest('custom/endpoint', { extra: 'x' })).toEqual({ value: 1 });
    expect(calls[2].params.get('sessionId')).toBe('session-1');
    expect(calls[2].params.get('extra')).toBe('x');
  });

  it('raises authentication errors with the account', async () => {
    const { client, warn } = cloud({ 'user/login/id/get': [failure(3101, 'bad account')] });
    const error: unknown = await client.authenticate().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(CloudAuthenticationError);
    expect(error).toMatchObject({ errorCode: 3101, account: 'user@example.com' });
    expect(messages(warn)).toEqual(["CLOUD   | Authentication error: '3101' - 'bad account'"]);
  });

  it('fails without a session id', async () => {
    const { client } = cloud({ 'user/login/id/get': [LOGIN_ID], 'user/login': [ok({})] });
    await expect(client.authenticate()).rejects.toThrow('Unable to retrieve session id from Midea API');
  });
});

describe('MideaCloud errors', () => {
  it('asks to retry later', async () => {
    const { client } = cloud({ 'user/login/id/get': [failure(7610, 'busy')] });
    await expect(client.authenticate()).rejects.toThrow(RetryLaterError);
  });

  it('raises unknown error codes', async () => {
    const { client } = cloud({ 'user/login/id/get': [failure(1234, 'boom')] });
    await expect(client.authenticate()).rejects.toThrow(new CloudError(1234, 'boom').message);
  });

  it('retries after an ignored error code', async () => {
    const { client, endpoints } = cloud({
      'user/login/id/get': [failure(9999, 'hiccup'), LOGIN_ID],
      'user/login': [LOGIN],
    });
    await client.authenticate();
    expect(endpoints()).toEqual(['user/login/id/get', 'user/login/id/get', 'user/login']);
  });

  it('gives up on HTTP failures after the retries', async () => {
    const { client, endpoints } = cloud({ 'user/login/id/get': [500, 500, 500] }, 2);
    await expect(client.authenticate()).rejects.toThrow(
      new CloudRequestError('Too many retries while calling user/login/id/get, last error HTTP status 500 Server Error').message,
    );
    expect(endpoints().length).toBe(2);
  });

  it('rejects replies that are not JSON', async () => {
    const { client } = cloud({ 'user/login/id/get': ['<html>'] });
    await expect(client.authenticate()).rejects.toThrow(ProtocolError);
  });

  it('logs in again when the session expired', async () => {
    const { client, endpoints } = cloud({
      'user/login/id/get': [LOGIN_ID],
      'user/login': [LOGIN, LOGIN],
      'homegroup/list/get': [failure(3106, 'session expired'), ok({ list: [{ id: '7', isDefault: '1' }] })],
      'appliance/list/get': [ok({ list: [] })],
    });
    expect(await client.listAppliances()).toEqual([]);
    expect(endpoints()).toEqual([
      'user/login/id/get',
      'user/login',
      'homegroup/list/get',
      'user/login',
      'homegroup/list/get',
      'appliance/list/get',
    ]);
  });
});

describe('MideaCloud appliances', () => {
  const routes = () => ({
    'user/login/id/get': [LOGIN_ID],
    'user/login': [LOGIN],
    'homegroup/list/get': [
      ok({ list: [{ id: '3', isDefault: '0' }, { id: '7', isDefault: '1' }] }),
      ok({ list: [{ id: '7', isDefault: '1' }] }),
    ],
    'appliance/list/get': [
      ok({ list: [{ id: '123456', name: 'Basement', sn: dataKey.aesEncryptString('SN-1'), type: '0xA1', modelNumber: '12' }] }),
      ok({ list: [{ id: '123456', name: 'Cellar', type: '0xA1' }] }),
    ],
  });

  it('lists the default home group', async () => {
    const { client, calls } = cloud(routes());
    expect(await client.listAppliances()).toEqual([
      { id: '123456', name: 'Basement', sn: 'SN-1', type: '0xA1', modelNumber: '12' },
    ]);
    expect(calls[3].params.get('homegroupId')).toBe('7');
  });

  it('caches the list unless forced', async () => {
    const { client, endpoints } = cloud(routes());
    await client.listAppliances();
    await client.listAppliances();
    expect(endpoints().length).toBe(4);
    expect(await client.listAppliances(true)).toEqual([
      { id: '123456', name: 'Cellar', sn: 'Unknown', type: '0xA1', modelNumber: '' },
    ]);
  });

  it('needs a default home group', async () => {
    const { client } = cloud({
      'user/login/id/get': [LOGIN_ID],
      'user/login': [LOGIN],
      'homegroup/list/get': [ok({ list: [{ id: '3', isDefault: '0' }] })],
    });
    await expect(client.listAppliances()).rejects.toThrow('Unable to get default home group from Midea API');
  });

  it('picks the token of the requested module', async () => {
    const { client } = cloud({
      'user/login/id/get': [LOGIN_ID],
      'user/login': [LOGIN],
      'iot/secure/getToken': [
        ok({ tokenlist: [{ udpId: 'other', token: 'aa', key: 'bb' }, { udpId: 'udp-1', token: 'cc', key: 'dd' }] }),
        ok({ tokenlist: [] }),
      ],
    });
    expect(await client.getToken('udp-1')).toEqual({ token: 'cc', key: 'dd' });
    expect(await client.getToken('udp-2')).toEqual({ token: '', key: '' });
  });
});

describe('MideaCloud relay', () => {
  it('sends the encrypted order and strips the reply header', async () => {
    const reply = Buffer.concat([Buffer.alloc(50, 0xFF), Buffer.from('c80101', 'hex')]);
    const { client, calls } = cloud({
      'user/login/id/get': [LOGIN_ID],
      'user/login': [LOGIN],
      'appliance/transparent/send': [ok({ reply: dataKey.aesEncryptString(encodeAsCsv(reply)) })],
    });
    const packets = await client.applianceTransparentSend('123456', Buffer.from('5a5a80', 'hex'));
    expect(packets.map((packet) => packet.toString('hex'))).toEqual(['c80101']);
    const params = calls[2].params;
    expect(params.get('applianceId')).toBe('123456');
    expect(params.get('funId')).toBe('0000');
    expect(dataKey.aesDecryptString(params.get('order') ?? '')).toBe('90,90,-128');
  });

  it('rejects replies shorter than the header', async () => {
    const { client } = cloud({
      'user/login/id/get': [LOGIN_ID],
      'user/login': [LOGIN],
      'appliance/transparent/send': [ok({ reply: dataKey.aesEncryptString('1,2,3') })],
    });
    await expect(client.applianceTransparentSend('123456', Buffer.from('00', 'hex')))
      .rejects.toThrow('Invalid payload size, was 3 expected 50 bytes');
  });
});

describe('connectToCloud', () => {
  it('rejects unknown apps', async () => {
    const { log } = testLogger();
    await expect(connectToCloud(log, { account: 'a', password: 'test-secret', appName: 'Other App' }))
      .rejects.toThrow(MideaError);
  });

  it('logs in to the chosen app', async () => {
    const { log } = testLogger();
    const fake = fakeServer({ 'user/login/id/get': [LOGIN_ID], 'user/login': [LOGIN] });
    const client = await connectToCloud(log, {
      account: 'user@example.com',
      password: 'test-secret',
      appName: 'Midea Air',
      appkey: 'test-key',
      serverUrl: SERVER,
      fetch: fake.fetch,
    });
    expect(fake.calls[0].params.get('appId')).toBe('1117');
    expect(client.security.dataKey).toBe(DATA_KEY);
  });
});
