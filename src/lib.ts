/**
 * Library surface. Everything a program needs to find, query and control
 * appliances without Homebridge.
 */
import type { Logger } from 'homebridge';
import { FetchFunction, MideaCloud } from './cloud';
import { MideaError } from './errors';
import { MAGIC } from './magic';

export * from './appliance';
export * from './cloud';
export * from './command';
export * from './connection';
export * from './crc';
export * from './discovery';
export * from './errors';
export * from './frameDecoder';
export * from './lanDevice';
export * from './magic';
export * from './response';
export * from './security';
export * from './util';

export interface ConnectToCloudOptions {
  account: string;
  password: string;
  /** One of MAGIC.SUPPORTED_APPS, the default app when omitted */
  appName?: string;
  appkey?: string;
  appid?: number;
  serverUrl?: string;
  signkey?: string;
  fetch?: FetchFunction;
}

/**
 * Creates a cloud client for one of the known apps and logs in
 */
export async function connectToCloud(log: Logger, options: ConnectToCloudOptions): Promise<MideaCloud> {
  const appName = options.appName ?? MAGIC.DEFAULT_APP;
  const app = MAGIC.SUPPORTED_APPS[appName];
  if (!app) {
    throw new MideaError(`Unknown application ${appName}`);
  }
  const cloud = new MideaCloud(log, {
    account: options.account,
    password: options.password,
    appkey: options.appkey ?? app.appkey,
    appid: options.appid ?? app.appid,
    serverUrl: options.serverUrl ?? app.apiurl,
    signkey: options.signkey ?? app.signkey,
    fetch: options.fetch,
  });
  await cloud.authenticate();
  return cloud;
}
