#!/usr/bin/env node
/**
 * MIDEA LAN COMMAND LINE
 *
 *   midea-lan discover [--account A --password P] [--address 192.0.2.255 ...] [--credentials]
 *   midea-lan status   (--ip ADDRESS | --id ID --cloud) [--token T --key K | --account A --password P]
 *   midea-lan set      (--ip ADDRESS | --id ID --cloud) [credentials] --<property> <value> ...
 *   midea-lan dump     --payload HEX (--dehumidifier | --airconditioner)
 *
 * Exit codes: 0 ok, 7 bad --ip/--id combination, 8 no credentials,
 * 9 appliance unreachable or library error, 10 read-only property,
 * 11 options not applicable, 21 dump without appliance family.
 */
import { Logger } from 'homebridge/lib/logger';
import { AirConditionerAppliance, DehumidifierAppliance, SettableValue } from './appliance';
import type { MideaCloud } from './cloud';
import { findAppliances } from './discovery';
import { MideaError } from './errors';
import { LanDevice, applianceState } from './lanDevice';
import { ConnectToCloudOptions, connectToCloud } from './lib';
import { AirConditionerResponse, DehumidifierResponse } from './response';

type OptionValue = string | true;

export interface ParsedArgs {
  command?: string;
  options: Map<string, OptionValue>;
  addresses: string[];
}

/** Options that never take a value */
const FLAGS = ['cloud', 'credentials', 'verbose', 'dehumidifier', 'airconditioner'];

/** Options understood by every appliance command */
const COMMON_OPTIONS = [
  'account', 'password', 'app', 'appkey', 'appid', 'signkey', 'apiurl',
  'ip', 'id', 'token', 'key', 'cloud', 'credentials', 'verbose',
];

export interface CliDependencies {
  log?: Logger;
  out?: (line: string) => void;
  connectToCloud?: (log: Logger, options: ConnectToCloudOptions) => Promise<MideaCloud>;
  applianceState?: typeof applianceState;
  findAppliances?: typeof findAppliances;
}

interface Context {
  args: ParsedArgs;
  log: Logger;
  out: (line: string) => void;
  connectToCloud: (log: Logger, options: ConnectToCloudOptions) => Promise<MideaCloud>;
  applianceState: typeof applianceState;
  findAppliances: typeof findAppliances;
}

/**
 * Splits argv (without node and script) into the subcommand and its
 * options. Option names use underscores, `--fan-speed` is `fan_speed`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const options = new Map<string, OptionValue>();
  const addresses: string[] = [];
  let command: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      if (command === undefined) {
        command = arg;
      }
      continue;
    }
    const name = arg.slice(2).replace(/-/g, '_');
    const next = argv[i + 1];
    const value: OptionValue = !FLAGS.includes(name) && next !== undefined && !next.startsWith('--') ? argv[++i] : true;
    if (name === 'address') {
      if (value !== true) {
        addresses.push(value);
      }
    } else {
      options.set(name, value);
    }
  }
  return { command, options, addresses };
}

function option(args: ParsedArgs, name: string): string | undefined {
  const value = args.options.get(name);
  return typeof value === 'string' ? value : undefined;
}

function flag(args: ParsedArgs, name: string): boolean {
  return args.options.get(name) !== undefined;
}

function cloudOptions(args: ParsedArgs): ConnectToCloudOptions {
  const appid = option(args, 'appid');
  return {
    account: option(args, 'account') ?? '',
    password: option(args, 'password') ?? '',
    appName: option(args, 'app'),
    appkey: option(args, 'appkey'),
    appid: appid === undefined ? undefined : parseInt(appid, 10),
    serverUrl: option(args, 'apiurl'),
    signkey: option(args, 'signkey'),
  };
}

/**
 * Prints one appliance in the fixed `key = value` layout
 */
export function output(device: LanDevice, showCredentials: boolean, out: (line: string) => void): void {
  const appliance = device.appliance;
  out(`id ${device.serialNumber}/${device.applianceId}`);
  out(`  id      = ${device.applianceId}`);
  out(`  addr    = ${device.address || 'Unknown'}`);
  out(`  s/n     = ${device.serialNumber}`);
  out(`  model   = ${appliance.model}`);
  out(`  ssid    = ${device.ssid}`);
  out(`  online  = ${device.online}`);
  out(`  name    = ${device.name}`);
  if (appliance instanceof DehumidifierAppliance) {
    out(`  running = ${appliance.running}`);
    out(`  humid%  = ${appliance.currentHumidity}`);
    out(`  target% = ${appliance.targetHumidity}`);
    out(`  temp    = ${appliance.currentTemperature}`);
    out(`  fan     = ${appliance.fanSpeed}`);
    out(`  tank    = ${appliance.tankFull}`);
    out(`  mode    = ${appliance.mode}`);
    out(`  ion     = ${appliance.ionMode}`);
    out(`  filter  = ${appliance.filterIndicator}`);
    out(`  pump    = ${appliance.pump}`);
    out(`  defrost = ${appliance.defrosting}`);
    out(`  sleep   = ${appliance.sleepMode}`);
    out(`  error   = ${appliance.errorCode}`);
  } else if (appliance instanceof AirConditionerAppliance) {
    out(`  running = ${appliance.running}`);
    out(`  target  = ${appliance.targetTemperature}`);
    out(`  indoor  = ${appliance.indoorTemperature}`);
    out(`  outdoor = ${appliance.outdoorTemperature}`);
    out(`  fan     = ${appliance.fanSpeed}`);
    out(`  mode    = ${appliance.mode}`);
    out(`  purify  = ${appliance.purifier}`);
    out(`  eco     = ${appliance.ecoMode}`);
    out(`  sleep   = ${appliance.comfortSleep}`);
    out(`  F       = ${appliance.fahrenheit}`);
    out(`  error   = ${appliance.errorCode}`);
  }
  out(`  supports= ${JSON.stringify(appliance.supports)}`);
  out(`  version = ${device.version}`);
  if (showCredentials) {
    out(`  token   = ${device.token}`);
    out(`  key     = ${device.key}`);
  }
}

function checkIpId(ctx: Context): boolean {
  const ip = option(ctx.args, 'ip');
  const id = option(ctx.args, 'id');
  if (ip && id) {
    ctx.log.error('CLI     | Both ip address and id provided. Please provide only one');
    return false;
  }
  if (!ip && !id) {
    ctx.log.error('CLI     | Missing ip address or appliance id');
    return false;
  }
  return true;
}

/**
 * Looks up the appliance named by --ip or --id. Returns an exit code
 * when the arguments do not allow it.
 */
async function resolveAppliance(ctx: Context): Promise<{ device: LanDevice; cloud?: MideaCloud } | number> {
  if (!checkIpId(ctx)) {
    return 7;
  }
  const { args } = ctx;
  const address = option(args, 'ip');
  const applianceId = option(args, 'id');
  const token = option(args, 'token');
  if (token) {
    const device = await ctx.applianceState(ctx.log, { address, applianceId, token, key: option(args, 'key') });
    return { device };
  }
  if (option(args, 'account') && option(args, 'password')) {
    const cloud = await ctx.connectToCloud(ctx.log, cloudOptions(args));
    const device = await ctx.applianceState(ctx.log, { address, applianceId, cloud, useCloud: flag(args, 'cloud') });
    return { device, cloud };
  }
  ctx.log.error('CLI     | Missing token/key or cloud credentials');
  return 8;
}

async function runDiscover(ctx: Context): Promise<number> {
  const { args } = ctx;
  const cloud = option(args, 'account') && option(args, 'password')
    ? await ctx.connectToCloud(ctx.log, cloudOptions(args))
    : undefined;
  const appliances = await ctx.findAppliances(ctx.log, { cloud, addresses: args.addresses });
  for (const device of appliances) {
    output(device, flag(args, 'credentials'), ctx.out);
  }
  return 0;
}

async function runStatus(ctx: Context): Promise<number> {
  const resolved = await resolveAppliance(ctx);
  if (typeof resolved === 'number') {
    return resolved;
  }
  output(resolved.device, flag(ctx.args, 'credentials'), ctx.out);
  return 0;
}

async function runSet(ctx: Context): Promise<number> {
  const resolved = await resolveAppliance(ctx);
  if (typeof resolved === 'number') {
    return resolved;
  }
  const { device, cloud } = resolved;
  const appliance = device.appliance;
  let settable: ReadonlyArray<string> = [];
  let readOnly: ReadonlyArray<string> = [];
  if (appliance instanceof DehumidifierAppliance) {
    settable = DehumidifierAppliance.settableProperties.map((p) => p.name);
    readOnly = DehumidifierAppliance.readOnlyProperties;
  } else if (appliance instanceof AirConditionerAppliance) {
    settable = AirConditionerAppliance.settableProperties.map((p) => p.name);
    readOnly = AirConditionerAppliance.readOnlyProperties;
  }

  const values: Record<string, SettableValue> = {};
  const unused: string[] = [];
  for (const [name, value] of ctx.args.options) {
    if (COMMON_OPTIONS.includes(name)) {
      continue;
    }
    if (readOnly.includes(name)) {
      ctx.log.warn(`CLI     | Read-only attribute '${name}'`);
      return 10;
    }
    if (settable.includes(name)) {
      ctx.log.debug(`CLI     | Setting attribute '${name}' to ${value}`);
      values[name] = value;
    } else {
      unused.push(name);
    }
  }
  if (unused.length > 0) {
    ctx.log.error(`CLI     | Not applicable options: ${unused.join(', ')}`);
    return 11;
  }
  await device.setState(values, cloud && flag(ctx.args, 'cloud') ? cloud : undefined);
  output(device, flag(ctx.args, 'credentials'), ctx.out);
  return 0;
}

function runDump(ctx: Context): number {
  const payload = option(ctx.args, 'payload');
  if (payload === undefined || !/^([0-9a-fA-F]{2})*$/.test(payload)) {
    ctx.log.error('CLI     | Missing or invalid --payload');
    return 9;
  }
  const data = Buffer.from(payload, 'hex');
  let response: DehumidifierResponse | AirConditionerResponse;
  if (flag(ctx.args, 'dehumidifier')) {
    response = new DehumidifierResponse(data);
  } else if (flag(ctx.args, 'airconditioner')) {
    response = new AirConditionerResponse(data);
  } else {
    return 21;
  }
  data.forEach((b, i) => {
    ctx.out(`${i.toString().padStart(2)} ${b.toString().padStart(3)} ${b.toString(16).padStart(2)}`);
  });
  ctx.out(JSON.stringify(response.toJSON(), null, 2));
  return 0;
}

/**
 * Runs one CLI invocation and resolves with its exit code
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const args = parseArgs(argv);
  if (flag(args, 'verbose')) {
    Logger.setDebugEnabled(true);
  }
  const ctx: Context = {
    args,
    log: deps.log ?? new Logger('midea-lan'),
    out: deps.out ?? ((line) => process.stdout.write(`${line}\n`)),
    connectToCloud: deps.connectToCloud ?? connectToCloud,
    applianceState: deps.applianceState ?? applianceState,
    findAppliances: deps.findAppliances ?? findAppliances,
  };

  try {
    switch (args.command) {
      case 'discover':
        return await runDiscover(ctx);
      case 'status':
        return await runStatus(ctx);
      case 'set':
        return await runSet(ctx);
      case 'dump':
        return runDump(ctx);
      default:
        ctx.log.error(`CLI     | Unknown command ${args.command ?? ''}. Use discover, status, set or dump`);
        return 1;
    }
  } catch (err) {
    if (err instanceof MideaError) {
      ctx.log.error(`CLI     | ${err.name}: ${err.message}`);
      return 9;
    }
    throw err;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      process.stderr.write(`${err instanceof Error ? err.stack : String(err)}\n`);
      process.exitCode = 1;
    },
  );
}
