import { describe, expect, it } from 'vitest';
import {
  AirConditionerSetCommand,
  AirConditionerStatusCommand,
  DehumidifierSetCommand,
  DehumidifierStatusCommand,
  DeviceCapabilitiesCommand,
  DeviceCapabilitiesCommandMore,
  SequenceCounter,
} from '../src/command';
import { MAGIC } from '../src/magic';

describe('SequenceCounter', () => {
  it('rolls over after 255', () => {
    const sequence = new SequenceCounter(254);
    expect(sequence.next()).toBe(255);
    expect(sequence.next()).toBe(0);
    expect(sequence.next()).toBe(1);
  });

  it('can be reset', () => {
    const sequence = new SequenceCounter();
    sequence.next();
    sequence.reset(0x10);
    expect(sequence.current).toBe(0x10);
    expect(sequence.next()).toBe(0x11);
  });
});

describe('capability commands', () => {
  it('builds the first part', () => {
    expect(new DeviceCapabilitiesCommand().finalize().toString('hex')).toBe('aa0ea100000000000303b501004d48');
  });

  it('builds the continuation part', () => {
    expect(new DeviceCapabilitiesCommandMore().finalize().toString('hex')).toBe('aa0fa100000000000303b501011380');
  });

  it('carries the appliance type', () => {
    expect(new DeviceCapabilitiesCommandMore(MAGIC.APPLIANCE_TYPE_AIRCON).finalize().toString('hex'))
      .toBe('aa0fac00000000000303b501011375');
  });
});

describe('status commands', () => {
  it('builds the dehumidifier query', () => {
    expect(new DehumidifierStatusCommand().finalize().toString('hex'))
      .toBe('aa20a100000000000003418100ff03ff000000000000000000000000000001294f');
  });

  it('uses the next sequence on every finalize', () => {
    const cmd = new DehumidifierStatusCommand();
    cmd.finalize();
    expect(cmd.finalize().toString('hex'))
      .toBe('aa20a100000000000003418100ff03ff000000000000000000000000000002cbac');
  });

  it('builds the air conditioner query with the indoor temperature request', () => {
    expect(new AirConditionerStatusCommand().finalize().toString('hex'))
      .toBe('aa20ac00000000000003418100ff03ff00020000000000000000000000000171fa');
  });

  it('shares a counter between commands', () => {
    const sequence = new SequenceCounter();
    new DehumidifierStatusCommand(sequence).finalize();
    expect(new DehumidifierStatusCommand(sequence).finalize()[30]).toBe(2);
    sequence.reset(0x10);
    expect(new AirConditionerStatusCommand(sequence).finalize().toString('hex'))
      .toBe('aa20ac00000000000003418100ff03ff000200000000000000000000000011ec6f');
  });
});

describe('DehumidifierSetCommand', () => {
  it('builds the default frame', () => {
    const cmd = new DehumidifierSetCommand();
    cmd.fanSpeed = 40;
    cmd.mode = 0;
    cmd.targetHumidity = 50;
    expect(cmd.finalize().toString('hex'))
      .toBe('aa20a100000000000302480000280000003200000000000000000000000001395e');
  });

  it('packs every field', () => {
    const cmd = new DehumidifierSetCommand();
    cmd.running = true;
    cmd.beepPrompt = true;
    cmd.mode = 3;
    cmd.fanSpeed = 60;
    cmd.targetHumidity = 55;
    cmd.ionMode = true;
    cmd.pumpSwitch = true;
    cmd.sleepSwitch = true;
    cmd.verticalSwing = true;
    expect(cmd.finalize().toString('hex'))
      .toBe('aa20a1000000000003024841033c0000003700682000000000000000000001f5bd');
  });

  it('reads back what was written', () => {
    const cmd = new DehumidifierSetCommand();
    cmd.pumpSwitchFlag = true;
    cmd.tankWarningLevel = 50;
    cmd.mode = 0x13;
    expect(cmd.pumpSwitchFlag).toBe(true);
    expect(cmd.pumpSwitch).toBe(false);
    expect(cmd.tankWarningLevel).toBe(50);
    expect(cmd.mode).toBe(3);
    cmd.pumpSwitchFlag = false;
    expect(cmd.pumpSwitchFlag).toBe(false);
  });
});

describe('AirConditionerSetCommand', () => {
  it('builds a cooling frame', () => {
    const cmd = new AirConditionerSetCommand();
    cmd.running = true;
    cmd.beepPrompt = true;
    cmd.mode = 2;
    cmd.fanSpeed = 60;
    cmd.verticalSwing = true;
    cmd.ecoMode = true;
    cmd.screen = true;
    cmd.temperature = 20.5;
    expect(cmd.finalize().toString('hex'))
      .toBe('aa23ac000000000000024041543c0000003c008010000000000000000000010000009bb6');
  });

  it('sets the comfort value with comfort sleep', () => {
    const cmd = new AirConditionerSetCommand();
    cmd.fanSpeed = 40;
    cmd.screen = true;
    cmd.comfortSleep = true;
    expect(cmd.finalize().toString('hex'))
      .toBe('aa23ac00000000000002400000280000000003009000000000000000000001000000e44f');
  });

  it('encodes half degrees', () => {
    const cmd = new AirConditionerSetCommand();
    cmd.mode = 4;
    cmd.temperature = 24.5;
    expect(cmd.temperature).toBe(24.5);
    expect(cmd.mode).toBe(4);
    cmd.temperature = 31;
    expect(cmd.temperature).toBe(31);
  });

  it('clears the temperature outside the supported range', () => {
    const cmd = new AirConditionerSetCommand();
    cmd.temperature = 22;
    cmd.temperature = 40;
    expect(cmd.temperature).toBe(16);
  });

  it('keeps both swing directions', () => {
    const cmd = new AirConditionerSetCommand();
    cmd.verticalSwing = true;
    cmd.horizontalSwing = true;
    expect(cmd.verticalSwing).toBe(true);
    expect(cmd.horizontalSwing).toBe(true);
    cmd.verticalSwing = false;
    expect(cmd.verticalSwing).toBe(false);
    expect(cmd.horizontalSwing).toBe(true);
    cmd.horizontalSwing = false;
    expect(cmd.finalize()[17]).toBe(0);
  });
});
