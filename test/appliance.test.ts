import { describe, expect, it } from 'vitest';
import {
  AirConditionerAppliance,
  DehumidifierAppliance,
  UnknownAppliance,
  createAppliance,
  isAirConditioner,
  isDehumidifier,
  isSupported,
  normalizeType,
  sameTypes,
} from '../src/appliance';
import { MideaError, UnsupportedError } from '../src/errors';
import { messages, testLogger } from './helpers';

const hex = (value: string) => Buffer.from(value, 'hex');

describe('appliance types', () => {
  it('normalizes every spelling of a type', () => {
    for (const type of [161, -95, '161', '-95', 'a1', 'A1', '0xa1', ' a1 ']) {
      expect(normalizeType(type)).toBe(0xA1);
    }
    expect(normalizeType('ac')).toBe(0xAC);
    expect(normalizeType('10')).toBe(0x10);
  });

  it('rejects what is not a type', () => {
    expect(normalizeType('dehumidifier')).toBeUndefined();
    expect(normalizeType(1.5)).toBeUndefined();
    expect(normalizeType('')).toBeUndefined();
  });

  it('compares types', () => {
    expect(sameTypes('a1', 161)).toBe(true);
    expect(sameTypes('0xac', -84)).toBe(true);
    expect(sameTypes('ac', 'a1')).toBe(false);
    expect(sameTypes('zz', 'zz')).toBe(false);
  });

  it('knows the supported families', () => {
    expect(isDehumidifier('a1')).toBe(true);
    expect(isAirConditioner(172)).toBe(true);
    expect(isSupported('0xac')).toBe(true);
    expect(isSupported('b6')).toBe(false);
  });
});

describe('createAppliance', () => {
  it('picks the family class', () => {
    const { log } = testLogger();
    expect(createAppliance('1', 'a1', log)).toBeInstanceOf(DehumidifierAppliance);
    expect(createAppliance('2', 0xAC, log)).toBeInstanceOf(AirConditionerAppliance);
  });

  it('falls back to an unknown appliance with a warning', () => {
    const { log, warn } = testLogger();
    const appliance = createAppliance('3', 'b6', log);
    expect(appliance).toBeInstanceOf(UnknownAppliance);
    expect(messages(warn)).toEqual(['APPL    | Creating unsupported appliance 3 b6']);
    expect(() => appliance.refreshCommand()).toThrow(UnsupportedError);
    expect(() => appliance.applyCommand()).toThrow(UnsupportedError);
    expect(appliance.setProperty('running', true)).toBe(false);
  });

  it('uses the id as name until one is given', () => {
    const { log } = testLogger();
    const appliance = createAppliance('4', 'a1', log);
    expect(appliance.name).toBe('4');
    appliance.name = 'Basement';
    expect(appliance.name).toBe('Basement');
  });
});

describe('DehumidifierAppliance', () => {
  const create = () => {
    const logger = testLogger();
    return { ...logger, appliance: new DehumidifierAppliance('12345', 'a1', logger.log) };
  };

  it('builds the default set command', () => {
    const { appliance } = create();
    expect(appliance.applyCommand().finalize().toString('hex'))
      .toBe('aa20a100000000000302480000280000003200000000000000000000000001395e');
  });

  it('numbers commands with its own sequence', () => {
    const { appliance } = create();
    appliance.refreshCommand().finalize();
    expect(appliance.applyCommand().finalize().toString('hex'))
      .toBe('aa20a100000000000302480000280000003200000000000000000000000002dbbb');
  });

  it('writes settable properties into the set command', () => {
    const { appliance } = create();
    expect(appliance.setProperty('running', 'on')).toBe(true);
    appliance.setProperty('target_humidity', '55');
    appliance.setProperty('mode', 3);
    appliance.setProperty('fan_speed', 60);
    appliance.setProperty('ion_mode', true);
    appliance.setProperty('pump', 'yes');
    appliance.setProperty('sleep_mode', 1);
    appliance.setProperty('vertical_swing', 'true');
    appliance.setProperty('beep_prompt', true);
    expect(appliance.applyCommand().finalize().toString('hex'))
      .toBe('aa20a1000000000003024841033c0000003700682000000000000000000001f5bd');
  });

  it('clamps target humidity and fan speed', () => {
    const { appliance, warn } = create();
    appliance.targetHumidity = 120;
    expect(appliance.targetHumidity).toBe(100);
    appliance.targetHumidity = -5;
    expect(appliance.targetHumidity).toBe(0);
    appliance.targetHumidity = 42.7;
    expect(appliance.targetHumidity).toBe(42);
    appliance.fanSpeed = 200;
    expect(appliance.fanSpeed).toBe(127);
    expect(messages(warn)).toEqual(['APPL    | Tried to set fan speed to greater than 127: 200']);
  });

  it('rejects invalid values', () => {
    const { appliance } = create();
    expect(() => appliance.setProperty('mode', 16)).toThrow(MideaError);
    expect(() => appliance.setProperty('running', 'maybe')).toThrow('Invalid boolean value: maybe');
    expect(() => appliance.setProperty('fan_speed', 'fast')).toThrow('Invalid numeric value: fast');
    expect(appliance.setProperty('target_temperature', 20)).toBe(false);
  });

  it('takes state from a status response', () => {
    const { appliance } = create();
    appliance.processResponse(hex('c80101287f7f003c00000000000000003f5000000000024238'));
    expect(appliance.online).toBe(true);
    expect(appliance.active).toBe(true);
    expect(appliance.running).toBe(true);
    expect(appliance.mode).toBe(1);
    expect(appliance.fanSpeed).toBe(40);
    expect(appliance.targetHumidity).toBe(60);
    expect(appliance.currentHumidity).toBe(63);
    expect(appliance.currentTemperature).toBe(15);
    expect(appliance.tankFull).toBe(false);
    expect(appliance.errorCode).toBe(0);
  });

  it('caps current humidity at 100', () => {
    const { appliance, warn } = create();
    appliance.processResponse(hex('c80101287f7f003c0000000000000000705000000000024238'));
    expect(appliance.currentHumidity).toBe(100);
    expect(messages(warn)).toEqual(['APPL    | Current humidity measurement greater than 100%, was 112']);
  });

  it('goes offline on an empty response', () => {
    const { appliance } = create();
    appliance.processResponse(hex('c80101287f7f003c00000000000000003f5000000000024238'));
    appliance.processResponse(Buffer.alloc(0));
    expect(appliance.online).toBe(false);
    expect(appliance.running).toBe(true);
  });

  it('merges the second capability part', () => {
    const { appliance } = create();
    appliance.processCapabilities(hex('b50510020103170201021d020101200201012d020104c40f'), 0);
    appliance.processCapabilities(hex('b50114020103'), 1);
    expect(appliance.supports).toEqual({ fan_speed: 3, filter: 2, pump: 1, dry_clothes: 1, water_level: 4, mode: 3 });
    appliance.processCapabilities(hex('b50114020103'), 0);
    expect(appliance.supports).toEqual({ mode: 3 });
  });

  it('ignores an empty capability reply', () => {
    const { appliance } = create();
    appliance.processCapabilities(hex('b50114020103'), 0);
    appliance.processCapabilities(Buffer.alloc(0), 1);
    expect(appliance.supports).toEqual({ mode: 3 });
  });

  it('builds capability queries for its type', () => {
    const { appliance } = create();
    expect(appliance.capabilitiesCommand(0).finalize().toString('hex')).toBe('aa0ea100000000000303b501004d48');
  });
});

describe('AirConditionerAppliance', () => {
  const create = () => {
    const logger = testLogger();
    return { ...logger, appliance: new AirConditionerAppliance('67890', 'ac', logger.log) };
  };

  it('builds the default set command', () => {
    const { appliance } = create();
    expect(appliance.applyCommand().finalize().toString('hex'))
      .toBe('aa23ac00000000000002400000280000000000001000000000000000000001000000b600');
  });

  it('writes settable properties into the set command', () => {
    const { appliance } = create();
    appliance.setProperty('running', true);
    appliance.setProperty('beep_prompt', true);
    appliance.setProperty('mode', 2);
    appliance.setProperty('fan_speed', '60');
    appliance.setProperty('vertical_swing', true);
    appliance.setProperty('eco_mode', 'on');
    appliance.setProperty('target_temperature', 20.5);
    expect(appliance.applyCommand().finalize().toString('hex'))
      .toBe('aa23ac000000000000024041543c0000003c008010000000000000000000010000009bb6');
  });

  it('rejects targets outside 16-31 and modes above 15', () => {
    const { appliance } = create();
    expect(() => appliance.setProperty('target_temperature', 40)).toThrow(MideaError);
    expect(() => appliance.setProperty('target_temperature', 15)).toThrow(MideaError);
    expect(() => appliance.setProperty('mode', 16)).toThrow('Tried to set mode to invalid value: 16');
    expect(() => appliance.setProperty('mode', -1)).toThrow(MideaError);
    appliance.setProperty('mode', 15);
    expect(appliance.mode).toBe(15);
    expect(appliance.setProperty('target_humidity', 50)).toBe(false);
  });

  it('clamps the fan speed', () => {
    const { appliance } = create();
    appliance.fanSpeed = 300;
    expect(appliance.fanSpeed).toBe(127);
    appliance.fanSpeed = -1;
    expect(appliance.fanSpeed).toBe(0);
  });

  it('takes state from a status response', () => {
    const { appliance } = create();
    appliance.processResponse(hex('c00158667f7f000c2010065a200007350000002d0000'));
    expect(appliance.online).toBe(true);
    expect(appliance.running).toBe(true);
    expect(appliance.mode).toBe(2);
    expect(appliance.targetTemperature).toBe(24.5);
    expect(appliance.fanSpeed).toBe(102);
    expect(appliance.verticalSwing).toBe(true);
    expect(appliance.horizontalSwing).toBe(false);
    expect(appliance.ecoMode).toBe(true);
    expect(appliance.turbo).toBe(true);
    expect(appliance.fahrenheit).toBe(true);
    expect(appliance.indoorTemperature).toBe(20.5);
    expect(appliance.currentHumidity).toBe(45);
  });

  it('builds capability queries for its type', () => {
    const { appliance } = create();
    expect(appliance.capabilitiesCommand(1).finalize().toString('hex')).toBe('aa0fac00000000000303b501011375');
  });

  it('serializes its state', () => {
    const { appliance } = create();
    appliance.processResponse(hex('c00158667f7f000c2010065a200007350000002d0000'));
    expect(appliance.toJSON()).toMatchObject({
      id: '67890',
      type: 'ac',
      online: true,
      running: true,
      mode: 2,
      targetTemperature: 24.5,
      indoorTemperature: 20.5,
      fanSpeed: 102,
    });
  });
});
