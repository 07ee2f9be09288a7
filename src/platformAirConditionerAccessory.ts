import { CharacteristicValue, PlatformAccessory, Service } from 'homebridge';
import { AirConditionerAppliance } from './appliance';
import { LanDevice } from './lanDevice';
import { MAGIC } from './magic';
import type { AccessoryContext, MideaPlatform } from './platform';

export type HeaterCoolerActivity = 'inactive' | 'idle' | 'heating' | 'cooling';

export type HeaterCoolerTarget = 'auto' | 'heat' | 'cool';

/** Fan only mode belongs to the fan, not the heater/cooler */
export function heaterCoolerActive(appliance: AirConditionerAppliance): boolean {
  return appliance.running && appliance.mode !== MAGIC.AC_MODE.FAN_ONLY;
}

/**
 * What the unit is doing, judged from the indoor temperature against the
 * target. Without an indoor reading a running unit is idle.
 */
export function heaterCoolerActivity(appliance: AirConditionerAppliance): HeaterCoolerActivity {
  if (!appliance.running) {
    return 'inactive';
  }
  const indoor = appliance.indoorTemperature;
  const target = appliance.targetTemperature;
  switch (appliance.mode) {
    case MAGIC.AC_MODE.AUTO:
    case MAGIC.AC_MODE.COOL:
    case MAGIC.AC_MODE.DRY:
    case MAGIC.AC_MODE.CUSTOM_DRY:
      return indoor !== undefined && indoor >= target ? 'cooling' : 'idle';
    case MAGIC.AC_MODE.HEAT:
      return indoor !== undefined && indoor < target ? 'heating' : 'idle';
    default:
      return 'inactive';
  }
}

export function heaterCoolerTarget(mode: number): HeaterCoolerTarget {
  switch (mode) {
    case MAGIC.AC_MODE.COOL:
    case MAGIC.AC_MODE.FAN_ONLY:
      return 'cool';
    case MAGIC.AC_MODE.HEAT:
      return 'heat';
    default:
      return 'auto';
  }
}

export function modeForTarget(target: HeaterCoolerTarget): number {
  switch (target) {
    case 'cool':
      return MAGIC.AC_MODE.COOL;
    case 'heat':
      return MAGIC.AC_MODE.HEAT;
    default:
      return MAGIC.AC_MODE.AUTO;
  }
}

/** Target temperature kept inside the range HomeKit was told about */
export function thresholdTemperature(appliance: AirConditionerAppliance): number {
  return Math.min(MAGIC.AC_MAX_TEMPERATURE, Math.max(MAGIC.AC_MIN_TEMPERATURE, appliance.targetTemperature));
}

/**
 * AIR CONDITIONER ACCESSORY
 *
 * Exposes one air conditioner as a HeaterCooler service. Cooling and
 * heating thresholds share the single target temperature of the unit.
 */
export class MideaAirConditionerAccessory {
  private service: Service;

  constructor(
    private readonly platform: MideaPlatform,
    private readonly accessory: PlatformAccessory<AccessoryContext>,
    private readonly device: LanDevice,
    private readonly appliance: AirConditionerAppliance,
  ) {
    const { Characteristic } = this.platform;

    this.accessory.getService(this.platform.Service.AccessoryInformation)
      ?.setCharacteristic(Characteristic.Manufacturer, 'Midea')
      .setCharacteristic(Characteristic.Model, this.appliance.model)
      .setCharacteristic(Characteristic.SerialNumber, this.device.serialNumber || this.device.applianceId);

    this.service = this.accessory.getService(this.platform.Service.HeaterCooler) ||
                    this.accessory.addService(this.platform.Service.HeaterCooler);
    this.service.setCharacteristic(Characteristic.Name, this.device.name);

    this.service.getCharacteristic(Characteristic.Active)
      .onGet(this.handleActiveGet.bind(this))
      .onSet(this.handleActiveSet.bind(this));

    this.service.getCharacteristic(Characteristic.CurrentHeaterCoolerState)
      .onGet(this.handleCurrentHeaterCoolerStateGet.bind(this));

    this.service.getCharacteristic(Characteristic.TargetHeaterCoolerState)
      .onGet(this.handleTargetHeaterCoolerStateGet.bind(this))
      .onSet(this.handleTargetHeaterCoolerStateSet.bind(this));

    this.service.getCharacteristic(Characteristic.CurrentTemperature)
      .onGet(this.handleCurrentTemperatureGet.bind(this));

    for (const threshold of [Characteristic.CoolingThresholdTemperature, Characteristic.HeatingThresholdTemperature]) {
      this.service.getCharacteristic(threshold)
        .setProps({
          minValue: MAGIC.AC_MIN_TEMPERATURE,
          maxValue: MAGIC.AC_MAX_TEMPERATURE,
          minStep: 0.5,
        })
        .onGet(() => thresholdTemperature(this.status()))
        .onSet(async (value: CharacteristicValue) => {
          await this.platform.send(this.device, { target_temperature: Number(value) });
        });
    }

    this.service.getCharacteristic(Characteristic.RotationSpeed)
      .setProps({ minValue: 0, maxValue: 100, minStep: 1 })
      .onGet(() => Math.min(100, this.status().fanSpeed))
      .onSet(async (value: CharacteristicValue) => {
        await this.platform.send(this.device, { fan_speed: Number(value) });
      });

    this.service.getCharacteristic(Characteristic.SwingMode)
      .onGet(() => this.status().verticalSwing
        ? Characteristic.SwingMode.SWING_ENABLED
        : Characteristic.SwingMode.SWING_DISABLED)
      .onSet(async (value: CharacteristicValue) => {
        await this.platform.send(this.device, { vertical_swing: value === Characteristic.SwingMode.SWING_ENABLED });
      });

    this.service.getCharacteristic(Characteristic.TemperatureDisplayUnits)
      .onGet(() => this.status().fahrenheit
        ? Characteristic.TemperatureDisplayUnits.FAHRENHEIT
        : Characteristic.TemperatureDisplayUnits.CELSIUS)
      .onSet(async (value: CharacteristicValue) => {
        await this.platform.send(this.device, {
          fahrenheit: value === Characteristic.TemperatureDisplayUnits.FAHRENHEIT,
        });
      });
  }

  private status(): AirConditionerAppliance {
    if (!this.device.online || !this.appliance.active) {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.RESOURCE_BUSY);
    }
    return this.appliance;
  }

  handleActiveGet() {
    return heaterCoolerActive(this.status())
      ? this.platform.Characteristic.Active.ACTIVE
      : this.platform.Characteristic.Active.INACTIVE;
  }

  async handleActiveSet(value: CharacteristicValue) {
    const running = value === this.platform.Characteristic.Active.ACTIVE;
    if (running && this.appliance.mode === MAGIC.AC_MODE.FAN_ONLY) {
      await this.platform.send(this.device, { running, mode: MAGIC.AC_MODE.AUTO });
    } else {
      await this.platform.send(this.device, { running });
    }
  }

  handleCurrentHeaterCoolerStateGet() {
    const state = this.platform.Characteristic.CurrentHeaterCoolerState;
    switch (heaterCoolerActivity(this.status())) {
      case 'cooling':
        return state.COOLING;
      case 'heating':
        return state.HEATING;
      case 'idle':
        return state.IDLE;
      default:
        return state.INACTIVE;
    }
  }

  handleTargetHeaterCoolerStateGet() {
    const state = this.platform.Characteristic.TargetHeaterCoolerState;
    switch (heaterCoolerTarget(this.status().mode)) {
      case 'cool':
        return state.COOL;
      case 'heat':
        return state.HEAT;
      default:
        return state.AUTO;
    }
  }

  async handleTargetHeaterCoolerStateSet(value: CharacteristicValue) {
    const state = this.platform.Characteristic.TargetHeaterCoolerState;
    let target: HeaterCoolerTarget = 'auto';
    if (value === state.COOL) {
      target = 'cool';
    } else if (value === state.HEAT) {
      target = 'heat';
    }
    await this.platform.send(this.device, { mode: modeForTarget(target) });
  }

  handleCurrentTemperatureGet() {
    const indoor = this.status().indoorTemperature;
    if (indoor === undefined) {
      throw new this.platform.api.hap.HapStatusError(this.platform.api.hap.HAPStatus.RESOURCE_BUSY);
    }
    return indoor;
  }

  updateAll() {
    if (!this.device.online || !this.appliance.active) {
      return;
    }
    const { Characteristic } = this.platform;
    this.service.updateCharacteristic(Characteristic.Active, this.handleActiveGet());
    this.service.updateCharacteristic(Characteristic.CurrentHeaterCoolerState, this.handleCurrentHeaterCoolerStateGet());
    this.service.updateCharacteristic(Characteristic.TargetHeaterCoolerState, this.handleTargetHeaterCoolerStateGet());
    if (this.appliance.indoorTemperature !== undefined) {
      this.service.updateCharacteristic(Characteristic.CurrentTemperature, this.appliance.indoorTemperature);
    }
    this.service.updateCharacteristic(Characteristic.CoolingThresholdTemperature, thresholdTemperature(this.appliance));
    this.service.updateCharacteristic(Characteristic.HeatingThresholdTemperature, thresholdTemperature(this.appliance));
  }
}
