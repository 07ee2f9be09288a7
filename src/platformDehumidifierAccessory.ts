import { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import { DehumidifierAppliance } from './appliance';
import { LanDevice } from './lanDevice';
import { MAGIC } from './magic';
import type { AccessoryContext, MideaPlatform } from './platform';

export type DehumidifierActivity = 'inactive' | 'idle' | 'dehumidifying';

/**
 * What the dehumidifier is doing right now. A full tank stops the
 * compressor, and in target mode it idles once the room is dry enough.
 */
export function dehumidifierActivity(appliance: DehumidifierAppliance): DehumidifierActivity {
  if (!appliance.running) {
    return 'inactive';
  }
  if (appliance.tankFull) {
    return 'idle';
  }
  if (appliance.mode === MAGIC.DEHUMIDIFIER_MODE.TARGET && appliance.currentHumidity <= appliance.targetHumidity) {
    return 'idle';
  }
  return 'dehumidifying';
}

/** Tank level in percent, 100 once the tank reports full */
export function waterLevel(appliance: DehumidifierAppliance): number {
  if (appliance.tankFull) {
    return 100;
  }
  return Math.min(100, Math.max(0, appliance.tankLevel));
}

/** Fan speed as a HomeKit percentage */
export function rotationSpeed(appliance: DehumidifierAppliance): number {
  return Math.min(100, Math.max(0, appliance.fanSpeed));
}

/**
 * DEHUMIDIFIER ACCESSORY
 *
 * Exposes one dehumidifier as a HumidifierDehumidifier service. Reads come
 * from the last polled status; writes go to the appliance straight away.
 */
export class MideaDehumidifierAccessory {
  private service: Service;

  constructor(
    private readonly platform: MideaPlatform,
    private readonly accessory: PlatformAccessory<AccessoryContext>,
    private readonly device: LanDevice,
    private readonly appliance: DehumidifierAppliance,
  ) {
    const { Characteristic } = this.platform;

    this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?.setCharacteristic(Characteristic.Manufacturer, 'Midea')
      .setCharacteristic(Characteristic.Model, this.appliance.model)
      .setCharacteristic(Characteristic.SerialNumber, this.device.serialNumber || this.device.applianceId);

    this.service = this.accessory.getService(this.platform.Service.HumidifierDehumidifier) ||
                    this.accessory.addService(this.platform.Service.HumidifierDehumidifier);
    this.service.setCharacteristic(Characteristic.Name, this.device.name);

    this.service.getCharacteristic(Characteristic.Active)
      .onGet(this.handleActiveGet.bind(this))
      .onSet(this.handleActiveSet.bind(this));

    this.service.getCharacteristic(Characteristic.CurrentHumidifierDehumidifierState)
      .setProps({
        validValues: [
          Characteristic.CurrentHumidifierDehumidifierState.INACTIVE,
          Characteristic.CurrentHumidifierDehumidifierState.IDLE,
          Characteristic.CurrentHumidifierDehumidifierState.DEHUMIDIFYING,
        ],
      })
      .onGet(this.handleCurrentStateGet.bind(this));

    this.service.getCharacteristic(Characteristic.TargetHumidifierDehumidifierState)
      .setProps({
        validValues: [Characteristic.TargetHumidifierDehumidifierState.DEHUMIDIFIER],
      })
      .onGet(() => Characteristic.TargetHumidifierDehumidifierState.DEHUMIDIFIER)
      .onSet(() => undefined);

    this.service.getCharacteristic(Characteristic.CurrentRelativeHumidity)
      .onGet(() => this.status().currentHumidity);

    this.service.getCharacteristic(Characteristic.RelativeHumidityDehumidifierThreshold)
      .setProps({ minValue: 0, maxValue: 100, minStep: 1 })
      .onGet(() => this.status().targetHumidity)
      .onSet(async (value: CharacteristicValue) => {
        await this.platform.send(this.device, { target_humidity: Number(value) });
      });

    this.service.getCharacteristic(Characteristic.RotationSpeed)
      .setProps({ minValue: 0, maxValue: 100, minStep: 1 })
      .onGet(() => rotationSpeed(this.status()))
      .onSet(async (value: CharacteristicValue) => {
        await this.platform.send(this.device, { fan_speed: Number(value) });
      });

    this.service.getCharacteristic(Characteristic.WaterLevel)
      .onGet(() => waterLevel(this.status()));

    this.service.getCharacteristic(Characteristic.SwingMode)
      .onGet(() => this.status().verticalSwing
        ? Characteristic.SwingMode.SWING_ENABLED
        : Characteristic.SwingMode.SWING_DISABLED)
      .onSet(async (value: CharacteristicValue) => {
        await this.platform.send(this.device, { vertical_swing: value === Characteristic.SwingMode.SWING_ENABLED });
      });
  }

  /**
   * Last known state, or RESOURCE_BUSY while the appliance has not answered yet
   */
  private status(): DehumidifierAppliance {
    if (!this.device.online || !this.appliance.active) {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.RESOURCE_BUSY);
    }
    return this.appliance;
  }

  handleActiveGet() {
    return this.status().running
      ? this.platform.Characteristic.Active.ACTIVE
      : this.platform.Characteristic.Active.INACTIVE;
  }

  async handleActiveSet(value: CharacteristicValue) {
    await this.platform.send(this.device, { running: value === this.platform.Characteristic.Active.ACTIVE });
  }

  handleCurrentStateGet() {
    const state = this.platform.Characteristic.CurrentHumidifierDehumidifierState;
    switch (dehumidifierActivity(this.status())) {
      case 'dehumidifying':
        return state.DEHUMIDIFYING;
      case 'idle':
        return state.IDLE;
      default:
        return state.INACTIVE;
    }
  }

  /**
   * Pushes the freshly polled state to HomeKit
   */
  updateAll() {
    if (!this.device.online || !this.appliance.active) {
      return;
    }
    const { Characteristic } = this.platform;
    this.service.updateCharacteristic(Characteristic.Active, this.handleActiveGet());
    this.service.updateCharacteristic(Characteristic.CurrentHumidifierDehumidifierState, this.handleCurrentStateGet());
    this.service.updateCharacteristic(Characteristic.CurrentRelativeHumidity, this.appliance.currentHumidity);
    this.service.updateCharacteristic(Characteristic.RelativeHumidityDehumidifierThreshold, this.appliance.targetHumidity);
    this.service.updateCharacteristic(Characteristic.RotationSpeed, rotationSpeed(this.appliance));
    this.service.updateCharacteristic(Characteristic.WaterLevel, waterLevel(this.appliance));
  }
}
