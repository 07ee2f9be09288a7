import { crc8, frameChecksum } from './crc';
import { MAGIC } from './magic';

/**
 * Single byte message sequence with roll-over.
 * Each appliance owns one so sessions never share numbering.
 */
export class SequenceCounter {
  private value: number;

  constructor(start = 0) {
    this.value = start & 0xFF;
  }

  next(): number {
    this.value = (this.value + 1) & 0b11111111;
    return this.value;
  }

  reset(value = 0): void {
    this.value = value & 0xFF;
  }

  get current(): number {
    return this.value;
  }
}

/**
 * COMMAND FRAME LAYOUT
 *
 * ┌────────┬──────────────────────────────────────────────────────────────┐
 * │ 0      │ 0xAA sync header                                             │
 * │ 1      │ Length (total bytes - 1)                                     │
 * │ 2      │ Appliance type (0xA1 dehumidifier, 0xAC air conditioner)     │
 * │ 3-7    │ Frame check, reserved, message id, frame protocol            │
 * │ 8      │ Appliance protocol version                                   │
 * │ 9      │ Message type: 0x03 query, 0x02 set                           │
 * │ 10     │ Opcode: 0x41 status, 0x48/0x40 write, 0xB5 capabilities      │
 * │ 11..   │ Payload, bit packed per appliance family                     │
 * │ n-3    │ Sequence (sequence commands only, at a fixed index)          │
 * │ n-2    │ CRC8 over bytes 10..n-3                                      │
 * │ n-1    │ Checksum over bytes 1..n-2                                   │
 * └────────┴──────────────────────────────────────────────────────────────┘
 */
export class MideaCommand {
  constructor(protected readonly data: Buffer) {}

  /**
   * Writes the trailing CRC8 and checksum and returns a copy of the frame
   */
  finalize(): Buffer {
    this.data[this.data.length - 2] = crc8(this.data.subarray(10, this.data.length - 2));
    this.data[this.data.length - 1] = frameChecksum(this.data.subarray(1, this.data.length - 1));
    return Buffer.from(this.data);
  }

  get length(): number {
    return this.data.length;
  }

  toString(): string {
    return this.data.toString('hex');
  }
}

/**
 * Command carrying a sequence byte. Every finalize consumes the next value
 * of the counter it was built with.
 */
export class MideaSequenceCommand extends MideaCommand {
  constructor(
    data: Buffer,
    protected readonly sequence: SequenceCounter = new SequenceCounter(),
    private readonly sequenceIndex = 30,
  ) {
    super(data);
  }

  finalize(): Buffer {
    this.data[this.sequenceIndex] = this.sequence.next();
    return super.finalize();
  }
}

/**
 * B5 capability query, first part
 */
export class DeviceCapabilitiesCommand extends MideaCommand {
  constructor(applianceType: number = MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER) {
    super(Buffer.from([
      0xAA, 0x0E, applianceType, 0x00, 0x00, 0x00, 0x00, 0x00, 0x03, 0x03,
      0xB5, 0x01, 0x00,
      0x00, 0x00,
    ]));
  }
}

/**
 * B5 capability query, continuation part
 */
export class DeviceCapabilitiesCommandMore extends MideaCommand {
  constructor(applianceType: number = MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER) {
    super(Buffer.from([
      0xAA, 0x0F, applianceType, 0x00, 0x00, 0x00, 0x00, 0x00, 0x03, 0x03,
      0xB5, 0x01, 0x01,
      0x00, 0x00,
    ]));
  }
}

/**
 * Status query shared by both families, only the type byte and the
 * room temperature request byte (17) differ.
 */
function statusFrame(applianceType: number, byte17: number): Buffer {
  const data = Buffer.alloc(33);
  Buffer.from([
    0xAA, 0x20, applianceType, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x03,
    // opcode, then the fixed query mask
    0x41, 0x81, 0x00, 0xFF, 0x03, 0xFF, 0x00, byte17,
  ]).copy(data);
  return data;
}

export class DehumidifierStatusCommand extends MideaSequenceCommand {
  constructor(sequence?: SequenceCounter) {
    super(statusFrame(MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER, 0x00), sequence);
  }
}

export class AirConditionerStatusCommand extends MideaSequenceCommand {
  constructor(sequence?: SequenceCounter) {
    // 0x02 asks for indoor temperature
    super(statusFrame(MAGIC.APPLIANCE_TYPE_AIRCON, 0x02), sequence);
  }
}

/**
 * Helpers for single bit fields
 */
function getBit(data: Buffer, index: number, mask: number): boolean {
  return (data[index] & mask) !== 0;
}

function setBit(data: Buffer, index: number, mask: number, on: boolean): void {
  data[index] &= ~mask;
  if (on) {
    data[index] |= mask;
  }
}

/**
 * DEHUMIDIFIER SET COMMAND (opcode 0x48)
 *
 * ┌─────────┬────────────────────────────────────────────────────────────┐
 * │ Byte 11 │ 0x01 running, 0x40 beep prompt                             │
 * │ Byte 12 │ Mode (low nibble)                                          │
 * │ Byte 13 │ Fan speed (7 bits)                                         │
 * │ Byte 17 │ Target humidity (7 bits)                                   │
 * │ Byte 19 │ 0x40 ion, 0x20 sleep, 0x10 pump flag, 0x08 pump            │
 * │ Byte 20 │ 0x20 vertical swing                                        │
 * │ Byte 23 │ Tank warning level                                         │
 * └─────────┴────────────────────────────────────────────────────────────┘
 */
export class DehumidifierSetCommand extends MideaSequenceCommand {
  constructor(sequence?: SequenceCounter) {
    const data = Buffer.alloc(33);
    Buffer.from([
      0xAA, 0x20, MAGIC.APPLIANCE_TYPE_DEHUMIDIFIER, 0x00, 0x00, 0x00, 0x00, 0x00, 0x03, 0x02,
      0x48, 0x00, 0x01, 0x32,
    ]).copy(data);
    super(data, sequence);
  }

  get running(): boolean {
    return getBit(this.data, 11, 0b00000001);
  }

  set running(state: boolean) {
    setBit(this.data, 11, 0b00000001, state);
  }

  get beepPrompt(): boolean {
    return getBit(this.data, 11, 0b01000000);
  }

  set beepPrompt(state: boolean) {
    setBit(this.data, 11, 0b01000000, state);
  }

  get mode(): number {
    return this.data[12] & 0b00001111;
  }

  set mode(mode: number) {
    this.data[12] &= ~0b00001111;
    this.data[12] |= mode & 0b00001111;
  }

  get fanSpeed(): number {
    return this.data[13] & 0b01111111;
  }

  set fanSpeed(speed: number) {
    this.data[13] &= ~0b01111111;
    this.data[13] |= speed & 0b01111111;
  }

  get targetHumidity(): number {
    return this.data[17] & 0b01111111;
  }

  set targetHumidity(humidity: number) {
    this.data[17] &= ~0b01111111;
    this.data[17] |= humidity & 0b01111111;
  }

  get ionMode(): boolean {
    return getBit(this.data, 19, 0b01000000);
  }

  set ionMode(on: boolean) {
    setBit(this.data, 19, 0b01000000, on);
  }

  get sleepSwitch(): boolean {
    return getBit(this.data, 19, 0b00100000);
  }

  set sleepSwitch(on: boolean) {
    setBit(this.data, 19, 0b00100000, on);
  }

  get pumpSwitchFlag(): boolean {
    return getBit(this.data, 19, 0b00010000);
  }

  set pumpSwitchFlag(on: boolean) {
    setBit(this.data, 19, 0b00010000, on);
  }

  get pumpSwitch(): boolean {
    return getBit(this.data, 19, 0b00001000);
  }

  set pumpSwitch(on: boolean) {
    setBit(this.data, 19, 0b00001000, on);
  }

  get verticalSwing(): boolean {
    return getBit(this.data, 20, 0b00100000);
  }

  set verticalSwing(on: boolean) {
    setBit(this.data, 20, 0b00100000, on);
  }

  get tankWarningLevel(): number {
    return this.data[23];
  }

  set tankWarningLevel(level: number) {
    this.data[23] = level & 0xFF;
  }
}

/**
 * AIR CONDITIONER SET COMMAND (opcode 0x40)
 *
 * ┌─────────┬────────────────────────────────────────────────────────────┐
 * │ Byte 11 │ 0x01 running, 0x40 beep prompt                             │
 * │ Byte 12 │ Bits 8-6 mode, bit 5 +0.5°C, bits 4-1 temperature - 16      │
 * │ Byte 13 │ Fan speed (7 bits)                                         │
 * │ Byte 17 │ Swing: 0x30 marker | 0x0C vertical | 0x03 horizontal       │
 * │ Byte 18 │ 0x20 turbo fan, 0x03 comfort value                         │
 * │ Byte 19 │ 0x80 eco, 0x20 purifier, 0x04 dryer                        │
 * │ Byte 20 │ 0x80 comfort sleep, 0x10 screen, 0x04 °F, 0x02 turbo        │
 * └─────────┴────────────────────────────────────────────────────────────┘
 */
export class AirConditionerSetCommand extends MideaSequenceCommand {
  constructor(sequence?: SequenceCounter) {
    const data = Buffer.alloc(36);
    Buffer.from([
      0xAA, 0x23, MAGIC.APPLIANCE_TYPE_AIRCON, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x02,
      0x40,
    ]).copy(data);
    super(data, sequence);
  }

  get running(): boolean {
    return getBit(this.data, 11, 0b00000001);
  }

  set running(state: boolean) {
    setBit(this.data, 11, 0b00000001, state);
  }

  get beepPrompt(): boolean {
    return getBit(this.data, 11, 0b01000000);
  }

  set beepPrompt(state: boolean) {
    setBit(this.data, 11, 0b01000000, state);
  }

  get mode(): number {
    return (this.data[12] & 0b11100000) >> 5;
  }

  set mode(mode: number) {
    this.data[12] &= ~0b11100000;
    this.data[12] |= (mode & 0b111) << 5;
  }

  get temperature(): number {
    return (this.data[12] & 0b00001111) + MAGIC.AC_MIN_TEMPERATURE + (getBit(this.data, 12, 0b00010000) ? 0.5 : 0);
  }

  /**
   * Whole degrees go in the low nibble as an offset from 16, a half degree
   * sets bit 5. Values outside 16-31 clear the field.
   */
  set temperature(temperature: number) {
    this.data[12] &= ~0b00011111;
    if (temperature < MAGIC.AC_MIN_TEMPERATURE || temperature > MAGIC.AC_MAX_TEMPERATURE) {
      return;
    }
    const whole = Math.trunc(temperature);
    this.data[12] |= (whole - MAGIC.AC_MIN_TEMPERATURE) & 0b00001111;
    if (temperature - whole === 0.5) {
      this.data[12] |= 0b00010000;
    }
  }

  get fanSpeed(): number {
    return this.data[13] & 0b01111111;
  }

  set fanSpeed(speed: number) {
    this.data[13] &= ~0b01111111;
    this.data[13] |= speed & 0b01111111;
  }

  get verticalSwing(): boolean {
    return getBit(this.data, 17, 0b00001100);
  }

  set verticalSwing(on: boolean) {
    this.writeSwing(on, this.horizontalSwing);
  }

  get horizontalSwing(): boolean {
    return getBit(this.data, 17, 0b00000011);
  }

  set horizontalSwing(on: boolean) {
    this.writeSwing(this.verticalSwing, on);
  }

  private writeSwing(vertical: boolean, horizontal: boolean): void {
    const bits = (vertical ? 0b00001100 : 0) | (horizontal ? 0b00000011 : 0);
    this.data[17] = bits ? 0b00110000 | bits : 0;
  }

  get turboFan(): boolean {
    return getBit(this.data, 18, 0b00100000);
  }

  set turboFan(on: boolean) {
    setBit(this.data, 18, 0b00100000, on);
  }

  get dryer(): boolean {
    return getBit(this.data, 19, 0b00000100);
  }

  set dryer(on: boolean) {
    setBit(this.data, 19, 0b00000100, on);
  }

  get purifier(): boolean {
    return getBit(this.data, 19, 0b00100000);
  }

  set purifier(on: boolean) {
    setBit(this.data, 19, 0b00100000, on);
  }

  get ecoMode(): boolean {
    return getBit(this.data, 19, 0b10000000);
  }

  set ecoMode(on: boolean) {
    setBit(this.data, 19, 0b10000000, on);
  }

  /** Also writes the comfort value into byte 18 */
  get comfortSleep(): boolean {
    return getBit(this.data, 20, 0b10000000);
  }

  set comfortSleep(on: boolean) {
    setBit(this.data, 20, 0b10000000, on);
    setBit(this.data, 18, 0b00000011, on);
  }

  get screen(): boolean {
    return getBit(this.data, 20, 0b00010000);
  }

  set screen(on: boolean) {
    setBit(this.data, 20, 0b00010000, on);
  }

  get fahrenheit(): boolean {
    return getBit(this.data, 20, 0b00000100);
  }

  set fahrenheit(on: boolean) {
    setBit(this.data, 20, 0b00000100, on);
  }

  get turbo(): boolean {
    return getBit(this.data, 20, 0b00000010);
  }

  set turbo(on: boolean) {
    setBit(this.data, 20, 0b00000010, on);
  }
}
