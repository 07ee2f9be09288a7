/**
 * HOMEBRIDGE PLUGIN ENTRY POINT
 *
 * Registers the MideaLan platform with Homebridge. Homebridge then creates
 * one MideaPlatform per matching entry in config.json.
 *
 * DUAL EXPORT PATTERN:
 * The registration function is exported both as the ES default export and
 * as module.exports, so every Homebridge version finds it.
 */

import { API } from 'homebridge';
import { PLATFORM_NAME } from './settings';
import { MideaPlatform } from './platform';

export default (api: API) => {
  api.registerPlatform(PLATFORM_NAME, MideaPlatform);
};

module.exports = (api: API) => {
  api.registerPlatform(PLATFORM_NAME, MideaPlatform);
};

/**
 * EXAMPLE CONFIG.JSON ENTRY:
 *
 * {
 *   "platforms": [
 *     {
 *       "platform": "MideaLan",
 *       "account": "user@example.com",
 *       "password": "test-secret",
 *       "pollInterval": 30,
 *       "appliances": [
 *         { "address": "192.0.2.10", "name": "Basement" }
 *       ]
 *     }
 *   ]
 * }
 */
