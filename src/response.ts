import type { Logger } from 'homebridge';
import { MAGIC } from './magic';
import { hexByte } from './util';

export interface Timer {
  set: boolean;
  hour: number;
  minutes: number;
}

export type Capabilities = Record<string, number>;

/**
 * Timer bytes: bit 8 enabled, bits 7-3 hour, bits 2-1 plus a nibble of the
 * shared minutes byte. 0x7F means no timer.
 */
function decodeTimer(value: number, minutesNibble: number): Timer {
  return {
    set: (value & 0b10000000) !== 0,
    hour: (value & 0b01111100) >> 2,
    minutes: (value & 0b00000011) | minutesNibble,
  };
}

/**
 * Temperature bytes hold (celsius * 2) + 50, a separate nibble carries tenths
 * moving away from zero
 */
function withTenths(whole: number, tenths: number): number {
  const digit = 0.1 * tenths;
  return whole >= 0 ? whole + digit : whole - digit;
}

export abstract class MideaResponse {
  constructor(protected readonly data: Buffer) {}

  /** Byte at `index`, zero when the payload is shorter */
  protected byte(index: number): number {
    return index < this.data.length ? this.data[index] : 0;
  }

  /** Byte at `index`, undefined when the payload is shorter */
  protected optional(index: number): number | undefined {
    return index < this.data.length ? this.data[index] : undefined;
  }

  abstract toJSON(): Record<string, unknown>;

  toString(): string {
    return JSON.stringify(this.toJSON());
  }
}

/**
 * DEHUMIDIFIER STATUS RESPONSE (payload after the 10 byte frame header)
 *
 * ┌─────────┬────────────────────────────────────────────────────────────┐
 * │ Byte 1  │ 0x80 fault, 0x20 quick check, 0x10 timing, 0x04 i-mode,    │
 * │         │ 0x01 running                                               │
 * │ Byte 2  │ Mode (low nibble)                                          │
 * │ Byte 3  │ Fan speed                                                  │
 * │ Byte 4-6│ On/off timers                                              │
 * │ Byte 7  │ Target humidity, byte 8 low nibble in 1/16ths              │
 * │ Byte 9  │ 0x80 filter, 0x40 ion, 0x20 sleep, 0x10 pump flag,         │
 * │         │ 0x08 pump, 0x07 display class                              │
 * │ Byte 10 │ 0x80 defrosting, 0x7F tank level                           │
 * │ Byte 11 │ Dust time / 2                                              │
 * │ 13-14   │ PM2.5, little endian                                       │
 * │ Byte 15 │ Tank warning level                                         │
 * │ Byte 16 │ Current humidity                                           │
 * │ 17-18   │ Temperature                                                │
 * │ Byte 19 │ 0xC0 light class, 0x20 vertical swing, 0x10 horizontal     │
 * │ Byte 20 │ Light value                                                │
 * │ Byte 21 │ Error code                                                 │
 * └─────────┴────────────────────────────────────────────────────────────┘
 */
export class DehumidifierResponse extends MideaResponse {
  readonly fault: boolean;
  readonly runStatus: boolean;
  readonly iMode: boolean;
  readonly timingMode: boolean;
  readonly quickCheck: boolean;
  readonly mode: number;
  readonly fanSpeed: number;
  readonly onTimer: Timer;
  readonly offTimer: Timer;
  readonly targetHumidity: number;
  readonly filterIndicator: boolean;
  readonly ionMode: boolean;
  readonly sleepSwitch: boolean;
  readonly pumpSwitchFlag: boolean;
  readonly pumpSwitch: boolean;
  readonly displayClass: number;
  readonly defrosting: boolean;
  readonly tankLevel: number;
  readonly tankFull: boolean;
  readonly dustTime: number;
  readonly pm25: number;
  readonly tankWarningLevel: number;
  readonly currentHumidity: number;
  readonly currentTemperature: number;
  readonly lightClass?: number;
  readonly verticalSwing?: boolean;
  readonly horizontalSwing?: boolean;
  readonly lightValue?: number;
  readonly errorCode?: number;

  constructor(data: Buffer) {
    super(data);
    const d1 = this.byte(1);
    this.fault = (d1 & 0b10000000) !== 0;
    this.runStatus = (d1 & 0b00000001) !== 0;
    this.iMode = (d1 & 0b00000100) !== 0;
    this.timingMode = (d1 & 0b00010000) !== 0;
    this.quickCheck = (d1 & 0b00100000) !== 0;
    this.mode = this.byte(2) & 0b00001111;
    this.fanSpeed = this.byte(3) & 0b01111111;

    this.onTimer = decodeTimer(this.byte(4), (this.byte(6) & 0b11110000) >> 4);
    this.offTimer = decodeTimer(this.byte(5), this.byte(6) & 0b00001111);

    this.targetHumidity = Math.min(this.byte(7), 100) + (this.byte(8) & 0b00001111) * 0.0625;

    const d9 = this.byte(9);
    this.filterIndicator = (d9 & 0b10000000) !== 0;
    this.ionMode = (d9 & 0b01000000) !== 0;
    this.sleepSwitch = (d9 & 0b00100000) !== 0;
    this.pumpSwitchFlag = (d9 & 0b00010000) !== 0;
    this.pumpSwitch = (d9 & 0b00001000) !== 0;
    this.displayClass = d9 & 0b00000111;

    this.defrosting = (this.byte(10) & 0b10000000) !== 0;
    this.tankLevel = this.byte(10) & 0b01111111;
    this.tankFull = this.tankLevel >= 100;

    this.dustTime = this.byte(11) * 2;
    this.pm25 = this.byte(13) + this.byte(14) * 256;
    this.tankWarningLevel = this.byte(15);
    this.currentHumidity = this.byte(16);

    let temperature = (this.byte(17) - 50) / 2;
    if (temperature < -19) {
      temperature = -20;
    }
    if (temperature > 50) {
      temperature = 50;
    }
    this.currentTemperature = withTenths(temperature, this.byte(18) & 0b00001111);

    const d19 = this.optional(19);
    if (d19 !== undefined) {
      this.lightClass = (d19 & 0b11000000) >> 6;
      this.verticalSwing = (d19 & 0b00100000) !== 0;
      this.horizontalSwing = (d19 & 0b00010000) !== 0;
    }
    this.lightValue = this.optional(20);
    this.errorCode = this.optional(21);
  }

  toJSON(): Record<string, unknown> {
    return {
      fault: this.fault,
      runStatus: this.runStatus,
      iMode: this.iMode,
      timingMode: this.timingMode,
      quickCheck: this.quickCheck,
      mode: this.mode,
      fanSpeed: this.fanSpeed,
      onTimer: this.onTimer,
      offTimer: this.offTimer,
      targetHumidity: this.targetHumidity,
      filterIndicator: this.filterIndicator,
      ionMode: this.ionMode,
      sleepSwitch: this.sleepSwitch,
      pumpSwitchFlag: this.pumpSwitchFlag,
      pumpSwitch: this.pumpSwitch,
      displayClass: this.displayClass,
      defrosting: this.defrosting,
      tankLevel: this.tankLevel,
      tankFull: this.tankFull,
      dustTime: this.dustTime,
      pm25: this.pm25,
      tankWarningLevel: this.tankWarningLevel,
      currentHumidity: this.currentHumidity,
      currentTemperature: this.currentTemperature,
      lightClass: this.lightClass,
      verticalSwing: this.verticalSwing,
      horizontalSwing: this.horizontalSwing,
      lightValue: this.lightValue,
      errorCode: this.errorCode,
    };
  }
}

/**
 * AIR CONDITIONER STATUS RESPONSE
 *
 * ┌─────────┬────────────────────────────────────────────────────────────┐
 * │ Byte 2  │ Bits 8-6 mode, bit 5 +0.5°C, bits 4-1 target - 16           │
 * │ Byte 3  │ Fan speed                                                  │
 * │ Byte 7  │ 0x0C vertical swing, 0x03 horizontal swing                 │
 * │ Byte 8  │ 0x80 feel own, 0x20 turbo fan, 0x10 low frequency fan,     │
 * │         │ 0x08 power saving, 0x03 comfort sleep value                │
 * │ Byte 9  │ 0x40 comfort sleep, 0x20 purifier, 0x10 eco, 0x18 PTC,     │
 * │         │ 0x04 dryer, 0x02 natural wind                              │
 * │ Byte 10 │ 0x20 prevent freezing, 0x04 fahrenheit, 0x02 turbo         │
 * │ 11 / 12 │ Indoor / outdoor temperature, 0x00 and 0xFF mean absent    │
 * │ Byte 14 │ PMV (low nibble)                                           │
 * │ Byte 15 │ Tenths: outdoor high nibble, indoor low nibble             │
 * │ Byte 16 │ Error code                                                 │
 * │ Byte 19 │ Humidity (longer payloads only)                            │
 * └─────────┴────────────────────────────────────────────────────────────┘
 */
export class AirConditionerResponse extends MideaResponse {
  readonly runStatus: boolean;
  readonly iMode: boolean;
  readonly timingMode: boolean;
  readonly quickCheck: boolean;
  readonly applianceError: boolean;
  readonly mode: number;
  readonly targetTemperature: number;
  readonly fanSpeed: number;
  readonly onTimer: Timer;
  readonly offTimer: Timer;
  readonly verticalSwing: number;
  readonly horizontalSwing: number;
  readonly comfortSleepValue: number;
  readonly powerSaving: boolean;
  readonly lowFrequencyFan: boolean;
  readonly turboFan: boolean;
  readonly feelOwn: boolean;
  readonly comfortSleep: boolean;
  readonly naturalWind: boolean;
  readonly eco: boolean;
  readonly purifier: boolean;
  readonly dryer: boolean;
  readonly ptc: number;
  readonly auxHeat: boolean;
  readonly turbo: boolean;
  readonly fahrenheit: boolean;
  readonly preventFreezing: boolean;
  readonly pmv: number;
  readonly indoorTemperature?: number;
  readonly outdoorTemperature?: number;
  readonly humidity?: number;
  readonly errorCode: number;

  constructor(data: Buffer) {
    super(data);
    const d1 = this.byte(1);
    this.runStatus = (d1 & 0b00000001) !== 0;
    this.iMode = (d1 & 0b00000100) !== 0;
    this.timingMode = (d1 & 0b00010000) !== 0;
    this.quickCheck = (d1 & 0b00100000) !== 0;
    this.applianceError = (d1 & 0b10000000) !== 0;

    const d2 = this.byte(2);
    this.mode = (d2 & 0b11100000) >> 5;
    this.targetTemperature = (d2 & 0b00001111) + MAGIC.AC_MIN_TEMPERATURE + ((d2 & 0b00010000) !== 0 ? 0.5 : 0);
    this.fanSpeed = this.byte(3) & 0b01111111;

    this.onTimer = decodeTimer(this.byte(4), (this.byte(6) & 0b11110000) >> 4);
    this.offTimer = decodeTimer(this.byte(5), this.byte(6) & 0b00001111);

    this.verticalSwing = (this.byte(7) & 0b00001100) >> 2;
    this.horizontalSwing = this.byte(7) & 0b00000011;

    const d8 = this.byte(8);
    this.comfortSleepValue = d8 & 0b00000011;
    this.powerSaving = (d8 & 0b00001000) !== 0;
    this.lowFrequencyFan = (d8 & 0b00010000) !== 0;
    this.turboFan = (d8 & 0b00100000) !== 0;
    this.feelOwn = (d8 & 0b10000000) !== 0;

    const d9 = this.byte(9);
    this.comfortSleep = (d9 & 0b01000000) !== 0;
    this.naturalWind = (d9 & 0b00000010) !== 0;
    this.eco = (d9 & 0b00010000) !== 0;
    this.purifier = (d9 & 0b00100000) !== 0;
    this.dryer = (d9 & 0b00000100) !== 0;
    this.ptc = (d9 & 0b00011000) >> 3;
    this.auxHeat = (d9 & 0b00001000) !== 0;

    const d10 = this.byte(10);
    this.turbo = (d10 & 0b00000010) !== 0;
    this.fahrenheit = (d10 & 0b00000100) !== 0;
    this.preventFreezing = (d10 & 0b00100000) !== 0;

    this.pmv = (this.byte(14) & 0b00001111) * 0.5 - 3.5;

    const tenths = this.byte(15);
    const indoor = this.byte(11);
    if (indoor !== 0 && indoor !== 0xFF) {
      this.indoorTemperature = withTenths((indoor - 50) / 2, tenths & 0b00001111);
    }
    const outdoor = this.byte(12);
    if (outdoor !== 0 && outdoor !== 0xFF) {
      this.outdoorTemperature = withTenths((outdoor - 50) / 2, (tenths & 0b11110000) >> 4);
    }

    if (data.length > 20) {
      this.humidity = data[19];
    }
    this.errorCode = this.byte(16);
  }

  toJSON(): Record<string, unknown> {
    return {
      runStatus: this.runStatus,
      iMode: this.iMode,
      timingMode: this.timingMode,
      quickCheck: this.quickCheck,
      applianceError: this.applianceError,
      mode: this.mode,
      targetTemperature: this.targetTemperature,
      fanSpeed: this.fanSpeed,
      onTimer: this.onTimer,
      offTimer: this.offTimer,
      verticalSwing: this.verticalSwing,
      horizontalSwing: this.horizontalSwing,
      comfortSleepValue: this.comfortSleepValue,
      powerSaving: this.powerSaving,
      lowFrequencyFan: this.lowFrequencyFan,
      turboFan: this.turboFan,
      feelOwn: this.feelOwn,
      comfortSleep: this.comfortSleep,
      naturalWind: this.naturalWind,
      eco: this.eco,
      purifier: this.purifier,
      dryer: this.dryer,
      ptc: this.ptc,
      auxHeat: this.auxHeat,
      turbo: this.turbo,
      fahrenheit: this.fahrenheit,
      preventFreezing: this.preventFreezing,
      pmv: this.pmv,
      indoorTemperature: this.indoorTemperature,
      outdoorTemperature: this.outdoorTemperature,
      humidity: this.humidity,
      errorCode: this.errorCode,
    };
  }
}

// ==========================================
// B5 CAPABILITIES
// ==========================================

export const DEHUMIDIFIER_CAPABILITIES: Record<number, string> = {
  0x20: 'dry_clothes',
  0x1F: 'auto',
  0x10: 'fan_speed',
  0x1E: 'ion',
  0x17: 'filter',
  0x1D: 'pump',
  0x2D: 'water_level',
  0x14: 'mode',
  0x24: 'light',
};

export const AIRCONDITIONER_CAPABILITIES: Record<number, string> = {
  0x14: 'mode',
  0x2A: 'strong_fan',
  0x1F: 'humidity',
  0x10: 'fan_speed',
  0x12: 'eco',
  0x17: 'filter_reminder',
  0x21: 'filter_check',
  0x22: 'fahrenheit',
  0x13: 'heat_8',
  0x16: 'electricity',
  0x19: 'ptc',
  0x32: 'fan_straight',
  0x33: 'fan_avoid',
  0x15: 'fan_swing',
  0x18: 'no_fan_sense',
  0x24: 'screen_display',
  0x1E: 'anion',
  0x39: 'self_clean',
  0x43: 'fa_no_fan_sense',
  0x30: 'energy_save_on_absence',
  0x42: 'prevent_direct_fan',
};

/**
 * Handles an entry wider than the usual four bytes. Returns the number of
 * extra bytes consumed, or undefined to fall back to the generic entry.
 */
export type CapabilityInterceptor = (data: Buffer, index: number, supports: Capabilities) => number | undefined;

/** AC property 0x25 lists seven per-mode temperature limits */
export const AIRCONDITIONER_TEMPERATURES: CapabilityInterceptor = (data, index, supports) => {
  if (data[index] !== 0x25 || data[index + 1] !== 0x02) {
    return undefined;
  }
  for (let j = 0; j < 7 && index + 3 + j < data.length; j++) {
    supports[`temperature${j}`] = data[index + 3 + j];
  }
  return 6;
};

/**
 * Decodes a B5 capability reply into `supports`, entries of
 * (id, 0x02, length, value). Unknown entries are skipped with a warning.
 * Returns false when the payload is not a B5 reply.
 */
export function decodeCapabilities(
  log: Logger,
  data: Buffer,
  names: Record<number, string>,
  supports: Capabilities,
  interceptor?: CapabilityInterceptor,
): boolean {
  if (data[0] !== MAGIC.B5_RESPONSE) {
    log.debug('Not a B5 response');
    return false;
  }
  const count = data.length > 1 ? data[1] : 0;
  let i = 2;
  for (let n = 0; n < count && i + 1 < data.length; n++) {
    const extra = interceptor ? interceptor(data, i, supports) : undefined;
    if (extra !== undefined) {
      i += 4 + extra;
      continue;
    }
    const name = names[data[i]];
    if (data[i + 1] === 0x02 && name !== undefined && i + 3 < data.length) {
      supports[name] = data[i + 3];
    } else {
      log.warn(`unknown property=${hexByte(data[i])}${hexByte(data[i + 1])}`);
    }
    i += 4;
  }
  return true;
}
