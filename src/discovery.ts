import * as dgram from 'dgram';
import type { Logger } from 'homebridge';
import { isSupported } from './appliance';
import type { CloudAppliance, CloudClient } from './cloud';
import { ConnectionFactory } from './connection';
import { MideaError } from './errors';
import { LanDevice, matchesLanCloud } from './lanDevice';
import { MAGIC } from './magic';
import { isNull } from './util';

export interface DiscoveryReply {
  data: Buffer;
  address: string;
}

/**
 * Broadcast side of discovery. `collect` listens for the given time and
 * returns every reply received since the previous call.
 */
export interface DiscoveryTransport {
  send(message: Buffer, address: string, port: number): Promise<void>;
  collect(timeoutSeconds: number): Promise<DiscoveryReply[]>;
  close(): void;
}

/**
 * UDP socket with broadcast enabled, bound on first use
 */
export class UdpDiscoveryTransport implements DiscoveryTransport {
  private socket?: dgram.Socket;
  private replies: DiscoveryReply[] = [];
  private failure?: Error;

  private bind(): Promise<dgram.Socket> {
    const existing = this.socket;
    if (existing) {
      return Promise.resolve(existing);
    }
    return new Promise<dgram.Socket>((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      socket.once('error', reject);
      socket.on('message', (data: Buffer, info: dgram.RemoteInfo) => {
        this.replies.push({ data: data.subarray(0, MAGIC.DISCOVERY_READ_SIZE), address: info.address });
      });
      socket.bind(() => {
        socket.off('error', reject);
        socket.on('error', (err) => {
          this.failure = err;
        });
        socket.setBroadcast(true);
        this.socket = socket;
        resolve(socket);
      });
    });
  }

  async send(message: Buffer, address: string, port: number): Promise<void> {
    const socket = await this.bind();
    await new Promise<void>((resolve, reject) => {
      socket.send(message, port, address, (err) => (err ? reject(err) : resolve()));
    });
  }

  async collect(timeoutSeconds: number): Promise<DiscoveryReply[]> {
    await new Promise<void>((resolve) => setTimeout(resolve, timeoutSeconds * 1000));
    if (this.failure) {
      const failure = this.failure;
      this.failure = undefined;
      throw failure;
    }
    const replies = this.replies;
    this.replies = [];
    return replies;
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = undefined;
    }
  }
}

export interface FindAppliancesOptions {
  cloud?: CloudClient;
  /** Broadcast addresses, 255.255.255.255 when empty */
  addresses?: string[];
  /** Broadcast rounds */
  count?: number;
  /** Seconds each round listens */
  timeout?: number;
  transport?: DiscoveryTransport;
  /** LAN session settings for discovered devices */
  retries?: number;
  sleepInterval?: number;
  connectionFactory?: ConnectionFactory;
}

/**
 * Broadcasts the discovery datagram and identifies every supported
 * appliance that answers. With a cloud, registered appliances that never
 * answered are added as cloud-only devices.
 */
export async function findAppliances(log: Logger, options: FindAppliancesOptions = {}): Promise<LanDevice[]> {
  const { cloud } = options;
  const addresses = options.addresses && options.addresses.length > 0 ? options.addresses : [MAGIC.BROADCAST_ADDRESS];
  const count = isNull(options.count, MAGIC.DEFAULT_RETRIES);
  const timeout = isNull(options.timeout, MAGIC.DEFAULT_DISCOVERY_TIMEOUT);
  const transport = options.transport ?? new UdpDiscoveryTransport();

  const cloudAppliances: CloudAppliance[] = cloud ? await cloud.listAppliances() : [];
  const expected = cloudAppliances.filter((a) => isSupported(a.type));
  const found = new Map<string, LanDevice>();
  const seen = new Set<string>();

  log.debug(`DISC    | Starting LAN discovery via ${addresses.join(', ')}`);
  try {
    for (let round = 0; round < count; round++) {
      log.debug(`DISC    | Broadcast attempt ${round + 1} of max ${count}`);
      for (const address of addresses) {
        for (const port of [MAGIC.DISCOVERY_PORT, MAGIC.DISCOVERY_PORT_LEGACY]) {
          try {
            await transport.send(MAGIC.DISCOVERY_MSG, address, port);
          } catch (err) {
            log.debug(`DISC    | Unable to send broadcast to ${address}:${port} cause ${err instanceof Error ? err.message : String(err)}`);
          }
        }
      }

      for (const reply of await transport.collect(timeout)) {
        const device = parseReply(log, reply, options);
        if (!device || seen.has(device.applianceId)) {
          continue;
        }
        seen.add(device.applianceId);
        if (!isSupported(device.type)) {
          log.debug(`DISC    | Not supported appliance ${device}`);
          continue;
        }
        if (!(await device.isIdentified(cloud))) {
          continue;
        }
        const details = cloudAppliances.find((item) => matchesLanCloud(device, item));
        if (details) {
          device.appliance.name = details.name;
        } else if (cloud) {
          log.warn(`DISC    | Found an appliance that is not registered to the account: ${device}`);
        }
        log.info(`DISC    | Found appliance ${device}`);
        found.set(device.applianceId, device);
      }

      if (expected.length > 0 && expected.every((a) => found.has(a.id))) {
        break;
      }
    }
  } finally {
    transport.close();
  }

  const appliances = Array.from(found.values()).sort((a, b) => a.applianceId.localeCompare(b.applianceId));
  log.debug(`DISC    | Found ${appliances.length} of ${expected.length} appliance(s)`);
  if (appliances.length < expected.length) {
    log.warn(`DISC    | Some appliance(s) were not discovered on local network(s): ${appliances.length} discovered out of ${expected.length}`);
    for (const known of expected) {
      if (appliances.some((device) => matchesLanCloud(device, known))) {
        continue;
      }
      const device = new LanDevice(log, {
        applianceId: known.id,
        applianceType: known.type,
        serialNumber: known.sn,
        maxRetries: options.retries,
        sleepInterval: options.sleepInterval,
        connectionFactory: options.connectionFactory,
      });
      device.appliance.name = known.name;
      log.warn(`DISC    | Unable to discover registered appliance ${device}`);
      appliances.push(device);
    }
  }
  return appliances;
}

function parseReply(log: Logger, reply: DiscoveryReply, options: FindAppliancesOptions): LanDevice | undefined {
  const header = reply.data.subarray(0, 2);
  if (!header.equals(MAGIC.HEADER_ZZ) && !header.equals(MAGIC.HEADER_8370)) {
    log.debug(`DISC    | Ignored reply from ${reply.address} payload=${reply.data.toString('hex')}`);
    return undefined;
  }
  try {
    return LanDevice.fromDiscovery(log, reply.data, {
      maxRetries: options.retries,
      sleepInterval: options.sleepInterval,
      connectionFactory: options.connectionFactory,
    });
  } catch (err) {
    if (err instanceof MideaError) {
      log.debug(`DISC    | Unable to parse reply from ${reply.address}: ${err.message}`);
      return undefined;
    }
    throw err;
  }
}
