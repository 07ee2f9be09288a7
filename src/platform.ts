/**
 * MIDEA LAN HOMEBRIDGE PLATFORM
 *
 * Central coordinator of the plugin. Implements Homebridge's
 * DynamicPlatformPlugin interface and exposes every Midea dehumidifier and
 * air conditioner it can reach as a HomeKit accessory.
 *
 * RESPONSIBILITIES:
 * 1. Appliance lookup: configured appliances, or LAN discovery
 * 2. Cloud login, when an account is configured, for v3 tokens and relaying
 * 3. Accessory lifecycle: restore cached accessories, register new ones,
 *    drop the ones whose appliance is gone
 * 4. Polling: refresh every appliance each pollInterval seconds
 *
 * ARCHITECTURE OVERVIEW:
 * Platform (this class) → LanDevice (session) → DeviceConnection / MideaCloud
 *     ↓                        ↓
 * Accessories             Appliance model
 * (HomeKit)               (status, capabilities)
 */

import { API, Characteristic, DynamicPlatformPlugin, Logger, PlatformAccessory, PlatformConfig, Service } from 'homebridge';
import { AirConditionerAppliance, DehumidifierAppliance, SettableValue } from './appliance';
import { MideaCloud } from './cloud';
import { findAppliances } from './discovery';
import { MideaError } from './errors';
import { LanDevice, applianceState } from './lanDevice';
import { connectToCloud } from './lib';
import { MideaAirConditionerAccessory } from './platformAirConditionerAccessory';
import { MideaDehumidifierAccessory } from './platformDehumidifierAccessory';
import { DEFAULT_POLL_INTERVAL, PLATFORM_NAME, PLUGIN_NAME } from './settings';

/**
 * Context stored with each HomeKit accessory, used to match cached
 * accessories to appliances after a restart
 */
export interface AccessoryContext {
  applianceId?: string;
  type?: string;
  address?: string;
}

export interface ApplianceConfig {
  id?: string;
  address?: string;
  token?: string;
  key?: string;
  type?: string;
  name?: string;
}

export interface MideaPlatformConfig {
  account?: string;
  password?: string;
  appName?: string;
  pollInterval: number;
  discoveryRetries?: number;
  appliances: ApplianceConfig[];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Reads the platform section of config.json, ignoring fields of the wrong type
 */
export function parseConfig(config: Record<string, unknown>): MideaPlatformConfig {
  const appliances: ApplianceConfig[] = [];
  if (Array.isArray(config.appliances)) {
    const entries: unknown[] = config.appliances;
    for (const entry of entries) {
      if (typeof entry !== 'object' || entry === null) {
        continue;
      }
      const item: Record<string, unknown> = { ...entry };
      appliances.push({
        id: optionalString(item.id) ?? (typeof item.id === 'number' ? String(item.id) : undefined),
        address: optionalString(item.address),
        token: optionalString(item.token),
        key: optionalString(item.key),
        type: optionalString(item.type),
        name: optionalString(item.name),
      });
    }
  }
  const pollInterval = optionalNumber(config.pollInterval);
  return {
    account: optionalString(config.account),
    password: optionalString(config.password),
    appName: optionalString(config.appName),
    pollInterval: pollInterval !== undefined && pollInterval > 0 ? pollInterval : DEFAULT_POLL_INTERVAL,
    discoveryRetries: optionalNumber(config.discoveryRetries),
    appliances,
  };
}

interface ManagedAppliance {
  device: LanDevice;
  useCloud: boolean;
  handler: MideaDehumidifierAccessory | MideaAirConditionerAccessory;
}

/**
 * MAIN PLATFORM CLASS
 */
export class MideaPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service = this.api.hap.Service;
  public readonly Characteristic: typeof Characteristic = this.api.hap.Characteristic;

  // Cached accessories that persist across Homebridge restarts
  accessories: Array<PlatformAccessory<AccessoryContext>>;

  appliances: Array<ManagedAppliance>;

  cloud?: MideaCloud;

  readonly settings: MideaPlatformConfig;

  private pollTimer?: NodeJS.Timeout;

  constructor (
    public readonly log: Logger,
    public readonly config: PlatformConfig,
    public readonly api: API,
  ) {
    this.accessories = new Array<PlatformAccessory<AccessoryContext>>();
    this.appliances = new Array<ManagedAppliance>();
    this.settings = parseConfig(config);

    this.log.debug('PLAT    | Starting to set up Midea LAN platform.');

    this.api.on('didFinishLaunching', () => {
      this.log.debug('PLAT    | Executed didFinishLaunching callback');

      // Remove cached accessories that are missing their appliance id
      for (const accessory of [...this.accessories]) {
        if (accessory.context === undefined || accessory.context.applianceId === undefined) {
          this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
          this.accessories = this.accessories.filter((a) => a !== accessory);
          this.log.debug(`PLAT    | Unregistering accessory ${accessory.displayName}`);
        }
      }

      this.discoverDevices().catch((err: unknown) => {
        this.log.error(`PLAT    | Appliance discovery failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    });

    this.api.on('shutdown', () => {
      this.stopPolling();
      for (const { device } of this.appliances) {
        device.disconnect();
      }
    });
  }

  /**
   * APPLIANCE LOOKUP
   *
   * Configured appliances are queried one by one, by address or, for
   * cloud-only appliances, by id. Without configured appliances the LAN is
   * searched with broadcasts.
   */
  async discoverDevices(): Promise<void> {
    const { settings } = this;
    if (settings.account && settings.password) {
      try {
        this.cloud = await connectToCloud(this.log, {
          account: settings.account,
          password: settings.password,
          appName: settings.appName,
        });
      } catch (err) {
        if (!(err instanceof MideaError)) {
          throw err;
        }
        this.log.error(`PLAT    | Unable to log in to the cloud: ${err.message}`);
      }
    }

    if (settings.appliances.length > 0) {
      this.log.debug('PLAT    | Defined appliances in config, not doing automated discovery');
      for (const entry of settings.appliances) {
        const useCloud = entry.address === undefined;
        try {
          const device = await applianceState(this.log, {
            address: entry.address,
            applianceId: entry.id,
            applianceType: entry.type,
            token: entry.token,
            key: entry.key,
            cloud: this.cloud,
            useCloud,
          });
          if (entry.name) {
            device.appliance.name = entry.name;
          }
          this.addAppliance(device, useCloud);
        } catch (err) {
          if (!(err instanceof MideaError)) {
            throw err;
          }
          this.log.error(`PLAT    | Unable to reach appliance ${entry.name ?? entry.address ?? entry.id ?? ''}: ${err.message}`);
        }
      }
    } else {
      const devices = await findAppliances(this.log, { cloud: this.cloud, count: settings.discoveryRetries });
      for (const device of devices) {
        this.addAppliance(device, device.address === undefined);
      }
    }

    this.removeStaleAccessories();
    this.startPolling();
  }

  /**
   * Creates or restores the HomeKit accessory of one appliance
   */
  addAppliance(device: LanDevice, useCloud: boolean): void {
    if (this.appliances.some(({ device: known }) => known.applianceId === device.applianceId)) {
      this.log.error(`PLAT    | Appliance ${device} already added, this shouldn't happen.`);
      return;
    }
    const uuid = this.api.hap.uuid.generate(`${PLUGIN_NAME}-${device.applianceId}`);
    const existing = this.accessories.find((accessory) => accessory.UUID === uuid);
    const accessory = existing ?? new this.api.platformAccessory<AccessoryContext>(device.name, uuid);
    accessory.context.applianceId = device.applianceId;
    accessory.context.type = device.type;
    accessory.context.address = device.address;

    const appliance = device.appliance;
    let handler: MideaDehumidifierAccessory | MideaAirConditionerAccessory;
    if (appliance instanceof DehumidifierAppliance) {
      handler = new MideaDehumidifierAccessory(this, accessory, device, appliance);
    } else if (appliance instanceof AirConditionerAppliance) {
      handler = new MideaAirConditionerAccessory(this, accessory, device, appliance);
    } else {
      this.log.warn(`PLAT    | Skipping unsupported appliance ${device}`);
      return;
    }

    if (existing) {
      this.log.info(`PLAT    | Restoring accessory from cache: ${accessory.displayName}`);
      this.api.updatePlatformAccessories([accessory]);
    } else {
      this.log.info(`PLAT    | Adding new accessory: ${device.name}`);
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      this.accessories.push(accessory);
    }
    this.appliances.push({ device, useCloud, handler });
  }

  /**
   * Writes properties to an appliance and reports failures to HomeKit
   */
  async send(device: LanDevice, values: Record<string, SettableValue>): Promise<void> {
    const managed = this.appliances.find((a) => a.device === device);
    const relay = managed?.useCloud ? this.cloud : undefined;
    this.log.debug(`PLAT    | Setting ${JSON.stringify(values)} on ${device}`);
    try {
      await device.setState(values, relay);
    } catch (err) {
      if (!(err instanceof MideaError)) {
        throw err;
      }
      this.log.error(`PLAT    | Unable to update ${device.name}: ${err.message}`);
      throw new this.api.hap.HapStatusError(this.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
    managed?.handler.updateAll();
  }

  /**
   * Refreshes every appliance once. Failures are logged per appliance.
   */
  async pollAll(): Promise<void> {
    for (const { device, useCloud, handler } of this.appliances) {
      try {
        await device.refresh(useCloud ? this.cloud : undefined);
        handler.updateAll();
      } catch (err) {
        if (!(err instanceof MideaError)) {
          throw err;
        }
        this.log.warn(`PLAT    | Unable to refresh ${device.name}: ${err.message}`);
      }
    }
  }

  startPolling(): void {
    this.stopPolling();
    this.pollTimer = setInterval(() => {
      this.pollAll().catch((err: unknown) => {
        this.log.error(`PLAT    | Polling failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }, this.settings.pollInterval * 1000);
  }

  stopPolling(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = undefined;
    }
  }

  // ===============================================
  // HOMEBRIDGE PLATFORM INTERFACE IMPLEMENTATION
  // ===============================================

  /**
   * Called by Homebridge at startup for each cached accessory
   */
  configureAccessory(accessory: PlatformAccessory<AccessoryContext>) {
    this.accessories.push(accessory);
  }

  /**
   * Unregisters cached accessories whose appliance was not found this time
   */
  private removeStaleAccessories(): void {
    const stale = this.accessories.filter((accessory) =>
      !this.appliances.some(({ device }) => device.applianceId === accessory.context.applianceId));
    if (stale.length > 0) {
      this.log.info(`PLAT    | Removing ${stale.length} accessory(ies) with no appliance`);
      this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
      this.accessories = this.accessories.filter((accessory) => !stale.includes(accessory));
    }
  }
}
