/**
 * Platform identifier users put in the "platform" field of their Homebridge config.json
 */
export const PLATFORM_NAME = 'MideaLan';

/**
 * npm package name, must match package.json
 */
export const PLUGIN_NAME = 'homebridge-midea-lan';

/**
 * Default seconds between status polls of each appliance
 */
export const DEFAULT_POLL_INTERVAL = 30;
