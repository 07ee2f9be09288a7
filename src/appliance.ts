import type { Logger } from 'homebridge';
import {
  AirConditionerSetCommand,
  AirConditionerStatusCommand,
  DehumidifierSetCommand,
  DehumidifierStatusCommand,
  DeviceCapabilitiesCommand,
  DeviceCapabilitiesCommandMore,
  MideaCommand,
  SequenceCounter,
} from './command';
import { MideaError, UnsupportedError } from './errors';
import { MAGIC } from './magic';
import {
  AIRCONDITIONER_CAPABILITIES,
  AIRCONDITIONER_TEMPERATURES,
  AirConditionerResponse,
  Capabilities,
  CapabilityInterceptor,
  DEHUMIDIFIER_CAPABILITIES,
  DehumidifierResponse,
  Timer,
  decodeCapabilities,
} from './response';
import { asBool, asNumber } from './util';

export type ApplianceKind = 'unknown' | 'dehumidifier' | 'airconditioner';

export type SettableValue = string | number | boolean;

/**
 * One writable field of an appliance, by its wire (snake_case) name
 */
export interface SettableProperty<A> {
  name: string;
  kind: 'boolean' | 'number';
  description: string;
  set: (appliance: A, value: SettableValue) => void;
}

// ==========================================
// APPLIANCE TYPE TAGS
// ==========================================

/**
 * Canonical unsigned byte of an appliance type tag.
 *
 * Accepts 161, -95, "161", "-95", "a1", "A1" and "0xa1" for the same type.
 * Strings of one or two characters are read as hex, longer plain digit
 * strings as decimal. Returns undefined for anything else.
 */
export function normalizeType(type: string | number): number | undefined {
  if (typeof type === 'number') {
    return Number.isInteger(type) ? type & 0xFF : undefined;
  }
  const value = type.trim().toLowerCase();
  if (/^0x[0-9a-f]{1,2}$/.test(value)) {
    return parseInt(value.slice(2), 16);
  }
  if (/^-\d+$/.test(value)) {
    return parseInt(value, 10) & 0xFF;
  }
  if (/^[0-9a-f]{1,2}$/.test(value)) {
    return parseInt(value, 16);
  }
  if (/^\d+$/.test(value)) {
    return parseInt(value, 10) & 0xFF;
  }
  return undefined;
}

export function sameTypes(type1: string | number, type2: string | number): boolean {
  const t1 = normalizeType(type1);
  return t1 !== undefined && t1 === normalizeType(type2);
}

export function isDehumidifier(type: string | number): boolean {
  return normalizeType(type) === MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER;
}

export function isAirConditioner(type: string | number): boolean {
  return normalizeType(type) === MAGIC.APPLIANCE_TYPE_AIRCON;
}

export function isSupported(type: string | number): boolean {
  return isDehumidifier(type) || isAirConditioner(type);
}

function numberProperty<A>(name: string, description: string, set: (appliance: A, value: number) => void): SettableProperty<A> {
  return { name, kind: 'number', description, set: (appliance, value) => set(appliance, asNumber(value)) };
}

function booleanProperty<A>(name: string, description: string, set: (appliance: A, value: boolean) => void): SettableProperty<A> {
  return { name, kind: 'boolean', description, set: (appliance, value) => set(appliance, asBool(value)) };
}

/**
 * State shared by every appliance family: identity, reachability and the
 * B5 capability map. Subclasses own the payload codec.
 */
export abstract class BaseAppliance {
  abstract readonly kind: ApplianceKind;
  readonly id: string;
  readonly type: string;
  online = false;
  active = false;
  supports: Capabilities = {};

  /** Message sequence for every command this appliance builds */
  readonly sequence = new SequenceCounter();

  private nameValue?: string;

  constructor(
    id: string | number,
    type: string | number,
    protected readonly log: Logger,
  ) {
    this.id = String(id);
    this.type = String(type);
  }

  get name(): string {
    return this.nameValue ?? this.id;
  }

  set name(name: string) {
    this.nameValue = name;
  }

  get model(): string {
    return this.type;
  }

  /**
   * B5 capability query. Part 0 starts a new capability map, part 1 extends it.
   */
  capabilitiesCommand(part: 0 | 1): MideaCommand {
    const typeByte = normalizeType(this.type) ?? MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER;
    return part === 0 ? new DeviceCapabilitiesCommand(typeByte) : new DeviceCapabilitiesCommandMore(typeByte);
  }

  /**
   * Marks the appliance offline on an empty reply. Returns true when there
   * is a payload to decode.
   */
  protected accept(data: Buffer): boolean {
    if (data.length === 0) {
      this.online = false;
      return false;
    }
    this.online = true;
    this.active = true;
    return true;
  }

  protected mergeCapabilities(
    data: Buffer,
    part: number,
    names: Record<number, string>,
    interceptor?: CapabilityInterceptor,
  ): void {
    if (data.length === 0) {
      return;
    }
    const supports: Capabilities = part === 0 ? {} : { ...this.supports };
    if (decodeCapabilities(this.log, data, names, supports, interceptor)) {
      this.supports = supports;
    }
  }

  abstract refreshCommand(): MideaCommand;

  abstract applyCommand(): MideaCommand;

  abstract processResponse(data: Buffer): void;

  abstract processCapabilities(data: Buffer, part?: number): void;

  /**
   * Sets a writable property by its wire name. Returns false when the
   * appliance has no such property.
   */
  abstract setProperty(name: string, value: SettableValue): boolean;

  abstract toJSON(): Record<string, unknown>;
}

// ==========================================
// UNKNOWN
// ==========================================

/**
 * Placeholder for appliance types this library does not speak. Keeps the
 * identity so discovery can still list it.
 */
export class UnknownAppliance extends BaseAppliance {
  readonly kind = 'unknown';

  refreshCommand(): MideaCommand {
    throw new UnsupportedError(`Appliance type ${this.type} is not supported`);
  }

  applyCommand(): MideaCommand {
    throw new UnsupportedError(`Appliance type ${this.type} is not supported`);
  }

  processResponse(_data: Buffer): void {
    this.log.debug(`APPL    | Ignored processResponse ${this}`);
  }

  processCapabilities(_data: Buffer, _part = 0): void {
    this.log.debug(`APPL    | Ignored processCapabilities ${this}`);
  }

  setProperty(_name: string, _value: SettableValue): boolean {
    return false;
  }

  toJSON(): Record<string, unknown> {
    return { id: this.id, type: this.type, name: this.name, online: this.online };
  }

  toString(): string {
    return `[UnknownAppliance]{id=${this.id} type=${this.type}}`;
  }
}

// ==========================================
// DEHUMIDIFIER
// ==========================================

export class DehumidifierAppliance extends BaseAppliance {
  readonly kind = 'dehumidifier';

  static readonly settableProperties: ReadonlyArray<SettableProperty<DehumidifierAppliance>> = [
    booleanProperty('running', 'turn on/off', (a, v) => { a.running = v; }),
    numberProperty('target_humidity', 'target humidity (0-100)', (a, v) => { a.targetHumidity = v; }),
    numberProperty('mode', 'operating mode (0-15)', (a, v) => { a.mode = v; }),
    numberProperty('fan_speed', 'fan speed (0-127)', (a, v) => { a.fanSpeed = v; }),
    booleanProperty('ion_mode', 'ionizer', (a, v) => { a.ionMode = v; }),
    booleanProperty('pump', 'water pump', (a, v) => { a.pump = v; }),
    booleanProperty('pump_switch_flag', 'water pump switch flag', (a, v) => { a.pumpSwitchFlag = v; }),
    booleanProperty('sleep_mode', 'sleep mode', (a, v) => { a.sleepMode = v; }),
    booleanProperty('beep_prompt', 'beep on command', (a, v) => { a.beepPrompt = v; }),
    booleanProperty('vertical_swing', 'vertical swing', (a, v) => { a.verticalSwing = v; }),
    numberProperty('tank_warning_level', 'tank warning level', (a, v) => { a.tankWarningLevel = v; }),
  ];

  static readonly readOnlyProperties: ReadonlyArray<string> = [
    'current_humidity',
    'current_temperature',
    'tank_full',
    'tank_level',
    'error_code',
    'defrosting',
    'filter_indicator',
    'horizontal_swing',
    'pm25',
    'dust_time',
    'light_class',
  ];

  running = false;
  ionMode = false;
  pump = false;
  pumpSwitchFlag = false;
  sleepMode = false;
  beepPrompt = false;
  verticalSwing = false;
  horizontalSwing = false;
  currentHumidity = 45;
  currentTemperature = 0;
  tankFull = false;
  tankLevel = 0;
  tankWarningLevel?: number;
  errorCode = 0;
  defrosting = false;
  filterIndicator = false;
  pm25 = 0;
  dustTime = 0;
  lightClass?: number;
  onTimer?: Timer;
  offTimer?: Timer;

  private modeValue = 0;
  private targetHumidityValue = 50;
  private fanSpeedValue = 40;

  get model(): string {
    return 'Dehumidifier';
  }

  get mode(): number {
    return this.modeValue;
  }

  /** 0-15, anything else is rejected */
  set mode(value: number | string) {
    const mode = Math.trunc(asNumber(value));
    if (mode < 0 || mode > 15) {
      throw new MideaError(`Tried to set mode to invalid value: ${mode}`);
    }
    this.modeValue = mode;
  }

  get targetHumidity(): number {
    return this.targetHumidityValue;
  }

  /** Clamped to 0-100 and truncated */
  set targetHumidity(value: number | string) {
    const humidity = asNumber(value);
    if (humidity < 0) {
      this.log.debug(`APPL    | Tried to set target humidity to less than 0%: ${humidity}`);
      this.targetHumidityValue = 0;
    } else if (humidity > 100) {
      this.log.debug(`APPL    | Tried to set target humidity to greater than 100%: ${humidity}`);
      this.targetHumidityValue = 100;
    } else {
      this.targetHumidityValue = Math.trunc(humidity);
    }
  }

  get fanSpeed(): number {
    return this.fanSpeedValue;
  }

  /** Clamped to 0-127 */
  set fanSpeed(value: number | string) {
    const speed = Math.trunc(asNumber(value));
    if (speed < 0) {
      this.log.warn(`APPL    | Tried to set fan speed to less than 0: ${speed}`);
      this.fanSpeedValue = 0;
    } else if (speed > 127) {
      this.log.warn(`APPL    | Tried to set fan speed to greater than 127: ${speed}`);
      this.fanSpeedValue = 127;
    } else {
      this.fanSpeedValue = speed;
    }
  }

  refreshCommand(): DehumidifierStatusCommand {
    return new DehumidifierStatusCommand(this.sequence);
  }

  applyCommand(): DehumidifierSetCommand {
    const cmd = new DehumidifierSetCommand(this.sequence);
    cmd.running = this.running;
    cmd.targetHumidity = this.targetHumidity;
    cmd.mode = this.mode;
    cmd.fanSpeed = this.fanSpeed;
    cmd.ionMode = this.ionMode;
    cmd.pumpSwitch = this.pump;
    cmd.pumpSwitchFlag = this.pumpSwitchFlag;
    cmd.sleepSwitch = this.sleepMode;
    cmd.beepPrompt = this.beepPrompt;
    cmd.verticalSwing = this.verticalSwing;
    if (this.tankWarningLevel !== undefined) {
      cmd.tankWarningLevel = this.tankWarningLevel;
    }
    return cmd;
  }

  processResponse(data: Buffer): void {
    this.log.debug(`APPL    | Processing response for dehumidifier id=${this.id} data=${data.toString('hex')}`);
    if (!this.accept(data)) {
      return;
    }
    const response = new DehumidifierResponse(data);
    this.log.debug(`APPL    | Decoded response ${response}`);

    this.running = response.runStatus;
    this.ionMode = response.ionMode;
    this.mode = response.mode;
    this.targetHumidity = response.targetHumidity;
    this.fanSpeed = response.fanSpeed;

    if (response.currentHumidity > 100) {
      this.log.warn(`APPL    | Current humidity measurement greater than 100%, was ${response.currentHumidity}`);
      this.currentHumidity = 100;
    } else {
      this.currentHumidity = response.currentHumidity;
    }
    this.currentTemperature = response.currentTemperature;
    this.tankFull = response.tankFull;
    this.tankLevel = response.tankLevel;
    this.tankWarningLevel = response.tankWarningLevel;
    this.defrosting = response.defrosting;
    this.filterIndicator = response.filterIndicator;
    this.pump = response.pumpSwitch;
    this.pumpSwitchFlag = response.pumpSwitchFlag;
    this.sleepMode = response.sleepSwitch;
    this.pm25 = response.pm25;
    this.dustTime = response.dustTime;
    this.onTimer = response.onTimer;
    this.offTimer = response.offTimer;
    if (response.errorCode !== undefined) {
      this.errorCode = response.errorCode;
    }
    if (response.lightClass !== undefined) {
      this.lightClass = response.lightClass;
    }
    if (response.verticalSwing !== undefined) {
      this.verticalSwing = response.verticalSwing;
    }
    if (response.horizontalSwing !== undefined) {
      this.horizontalSwing = response.horizontalSwing;
    }
  }

  processCapabilities(data: Buffer, part = 0): void {
    this.mergeCapabilities(data, part, DEHUMIDIFIER_CAPABILITIES);
  }

  setProperty(name: string, value: SettableValue): boolean {
    const property = DehumidifierAppliance.settableProperties.find((p) => p.name === name);
    if (!property) {
      return false;
    }
    property.set(this, value);
    return true;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      type: this.type,
      name: this.name,
      online: this.online,
      running: this.running,
      mode: this.mode,
      targetHumidity: this.targetHumidity,
      currentHumidity: this.currentHumidity,
      currentTemperature: this.currentTemperature,
      fanSpeed: this.fanSpeed,
      ionMode: this.ionMode,
      pump: this.pump,
      sleepMode: this.sleepMode,
      tankFull: this.tankFull,
      tankLevel: this.tankLevel,
      tankWarningLevel: this.tankWarningLevel,
      defrosting: this.defrosting,
      filterIndicator: this.filterIndicator,
      verticalSwing: this.verticalSwing,
      horizontalSwing: this.horizontalSwing,
      errorCode: this.errorCode,
      supports: this.supports,
    };
  }

  toString(): string {
    return `[Dehumidifier]{id=${this.id}, type=${this.type}, mode=${this.mode}, running=${this.running}, `
      + `target_humidity=${this.targetHumidity}, fan_speed=${this.fanSpeed}, tank_full=${this.tankFull}, `
      + `current_humidity=${this.currentHumidity}, current_temperature=${this.currentTemperature}, `
      + `error_code=${this.errorCode}, prompt=${this.beepPrompt}, supports=${JSON.stringify(this.supports)}}`;
  }
}

// ==========================================
// AIR CONDITIONER
// ==========================================

export class AirConditionerAppliance extends BaseAppliance {
  readonly kind = 'airconditioner';

  static readonly settableProperties: ReadonlyArray<SettableProperty<AirConditionerAppliance>> = [
    booleanProperty('running', 'turn on/off', (a, v) => { a.running = v; }),
    numberProperty('target_temperature', 'target temperature (16-31)', (a, v) => { a.targetTemperature = v; }),
    numberProperty('mode', 'operating mode (0-15)', (a, v) => { a.mode = v; }),
    numberProperty('fan_speed', 'fan speed (0-127)', (a, v) => { a.fanSpeed = v; }),
    booleanProperty('eco_mode', 'eco mode', (a, v) => { a.ecoMode = v; }),
    booleanProperty('turbo', 'turbo mode', (a, v) => { a.turbo = v; }),
    booleanProperty('turbo_fan', 'turbo fan', (a, v) => { a.turboFan = v; }),
    booleanProperty('purifier', 'air purifier', (a, v) => { a.purifier = v; }),
    booleanProperty('dryer', 'dryer', (a, v) => { a.dryer = v; }),
    booleanProperty('comfort_sleep', 'comfort sleep', (a, v) => { a.comfortSleep = v; }),
    booleanProperty('fahrenheit', 'show fahrenheit', (a, v) => { a.fahrenheit = v; }),
    booleanProperty('show_screen', 'display on', (a, v) => { a.showScreen = v; }),
    booleanProperty('vertical_swing', 'vertical swing', (a, v) => { a.verticalSwing = v; }),
    booleanProperty('horizontal_swing', 'horizontal swing', (a, v) => { a.horizontalSwing = v; }),
    booleanProperty('beep_prompt', 'beep on command', (a, v) => { a.beepPrompt = v; }),
  ];

  static readonly readOnlyProperties: ReadonlyArray<string> = [
    'indoor_temperature',
    'outdoor_temperature',
    'current_humidity',
    'error_code',
  ];

  running = false;
  ecoMode = false;
  turbo = false;
  turboFan = false;
  purifier = false;
  dryer = false;
  comfortSleep = false;
  fahrenheit = false;
  showScreen = true;
  verticalSwing = false;
  horizontalSwing = false;
  beepPrompt = false;
  indoorTemperature?: number;
  outdoorTemperature?: number;
  currentHumidity?: number;
  errorCode = 0;

  private modeValue = 0;
  private fanSpeedValue = 40;
  private targetTemperatureValue = 0;

  get model(): string {
    return 'Air conditioner';
  }

  get mode(): number {
    return this.modeValue;
  }

  /** 0-15, only the low three bits reach the set command */
  set mode(value: number | string) {
    const mode = Math.trunc(asNumber(value));
    if (mode < 0 || mode > 15) {
      throw new MideaError(`Tried to set mode to invalid value: ${mode}`);
    }
    this.modeValue = mode;
  }

  get fanSpeed(): number {
    return this.fanSpeedValue;
  }

  set fanSpeed(value: number | string) {
    this.fanSpeedValue = Math.min(127, Math.max(0, Math.trunc(asNumber(value))));
  }

  get targetTemperature(): number {
    return this.targetTemperatureValue;
  }

  set targetTemperature(value: number | string) {
    const temperature = asNumber(value);
    if (temperature < MAGIC.AC_MIN_TEMPERATURE || temperature > MAGIC.AC_MAX_TEMPERATURE) {
      throw new MideaError(`Tried to set target temperature ${temperature} out of allowed range`);
    }
    this.targetTemperatureValue = temperature;
  }

  refreshCommand(): AirConditionerStatusCommand {
    return new AirConditionerStatusCommand(this.sequence);
  }

  applyCommand(): AirConditionerSetCommand {
    const cmd = new AirConditionerSetCommand(this.sequence);
    cmd.running = this.running;
    cmd.mode = this.mode;
    cmd.fanSpeed = this.fanSpeed;
    cmd.turbo = this.turbo;
    cmd.turboFan = this.turboFan;
    cmd.ecoMode = this.ecoMode;
    cmd.purifier = this.purifier;
    cmd.dryer = this.dryer;
    cmd.fahrenheit = this.fahrenheit;
    cmd.comfortSleep = this.comfortSleep;
    cmd.screen = this.showScreen;
    cmd.verticalSwing = this.verticalSwing;
    cmd.horizontalSwing = this.horizontalSwing;
    cmd.beepPrompt = this.beepPrompt;
    cmd.temperature = this.targetTemperature;
    return cmd;
  }

  processResponse(data: Buffer): void {
    this.log.debug(`APPL    | Processing response for air conditioner id=${this.id} data=${data.toString('hex')}`);
    if (!this.accept(data)) {
      return;
    }
    const response = new AirConditionerResponse(data);
    this.log.debug(`APPL    | Decoded response ${response}`);

    this.running = response.runStatus;
    this.modeValue = response.mode;
    // reported as-is, a device may sit outside the settable range
    this.targetTemperatureValue = response.targetTemperature;
    this.fanSpeedValue = response.fanSpeed;
    this.turbo = response.turbo;
    this.turboFan = response.turboFan;
    this.ecoMode = response.eco;
    this.purifier = response.purifier;
    this.dryer = response.dryer;
    this.fahrenheit = response.fahrenheit;
    this.comfortSleep = response.comfortSleep;
    this.verticalSwing = response.verticalSwing !== 0;
    this.horizontalSwing = response.horizontalSwing !== 0;
    this.indoorTemperature = response.indoorTemperature;
    this.outdoorTemperature = response.outdoorTemperature;
    if (response.humidity !== undefined) {
      this.currentHumidity = response.humidity;
    }
    this.errorCode = response.errorCode;
  }

  processCapabilities(data: Buffer, part = 0): void {
    this.mergeCapabilities(data, part, AIRCONDITIONER_CAPABILITIES, AIRCONDITIONER_TEMPERATURES);
  }

  setProperty(name: string, value: SettableValue): boolean {
    const property = AirConditionerAppliance.settableProperties.find((p) => p.name === name);
    if (!property) {
      return false;
    }
    property.set(this, value);
    return true;
  }

  toJSON(): Record<string, unknown> {
    return {
      id: this.id,
      type: this.type,
      name: this.name,
      online: this.online,
      running: this.running,
      mode: this.mode,
      targetTemperature: this.targetTemperature,
      indoorTemperature: this.indoorTemperature,
      outdoorTemperature: this.outdoorTemperature,
      currentHumidity: this.currentHumidity,
      fanSpeed: this.fanSpeed,
      ecoMode: this.ecoMode,
      turbo: this.turbo,
      turboFan: this.turboFan,
      purifier: this.purifier,
      dryer: this.dryer,
      comfortSleep: this.comfortSleep,
      fahrenheit: this.fahrenheit,
      showScreen: this.showScreen,
      verticalSwing: this.verticalSwing,
      horizontalSwing: this.horizontalSwing,
      errorCode: this.errorCode,
      supports: this.supports,
    };
  }

  toString(): string {
    return `[AirConditioner]{id=${this.id}, type=${this.type}, mode=${this.mode}, running=${this.running}, `
      + `turbo=${this.turbo}, fan_speed=${this.fanSpeed}, turbo_fan=${this.turboFan}, purifier=${this.purifier}, `
      + `dryer=${this.dryer}, sleep=${this.comfortSleep}, prompt=${this.beepPrompt}, supports=${JSON.stringify(this.supports)}}`;
  }
}

export type Appliance = UnknownAppliance | DehumidifierAppliance | AirConditionerAppliance;

/**
 * Picks the appliance family for a type tag
 */
export function createAppliance(id: string | number, type: string | number, log: Logger): Appliance {
  if (isDehumidifier(type)) {
    return new DehumidifierAppliance(id, type, log);
  }
  if (isAirConditioner(type)) {
    return new AirConditionerAppliance(id, type, log);
  }
  log.warn(`APPL    | Creating unsupported appliance ${id} ${type}`);
  return new UnknownAppliance(id, type, log);
}
