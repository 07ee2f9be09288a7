/**
 * PROTOCOL CONSTANTS
 *
 * Wire-level values shared by the frame codec, the command builders, the LAN
 * session and the cloud client. Everything here is fixed by the appliances or
 * by the vendor cloud; nothing is user configurable.
 */

export interface CloudApp {
  appkey: string;
  appid: number;
  apiurl: string;
  signkey: string;
}

export class MAGIC {

  // ==========================================
  // FRAME HEADERS
  // ==========================================

  static HEADER_ZZ = Buffer.from([0x5A, 0x5A]);

  static HEADER_8370 = Buffer.from([0x83, 0x70]);

  static HEADER_8370_FLAG = 0x20;

  static COMMAND_SYNC = 0xAA;

  static B5_RESPONSE = 0xB5;

  // ==========================================
  // v3 MESSAGE TYPES (low nibble of 8370 byte 5)
  // ==========================================

  static MSGTYPE_HANDSHAKE_REQUEST = 0x0;

  static MSGTYPE_HANDSHAKE_RESPONSE = 0x1;

  static MSGTYPE_ENCRYPTED_RESPONSE = 0x3;

  static MSGTYPE_ENCRYPTED_REQUEST = 0x6;

  static MSGTYPE_TRANSPARENT = 0xF;

  static ENCRYPTED_MESSAGE_TYPES = [0x3, 0x6];

  /** Request/response counters wrap back to zero at this value */
  static COUNTER_LIMIT = 0xFFF;

  // ==========================================
  // APPLIANCE TYPES
  // ==========================================

  static APPLIANCE_TYPE_DEHUMIDIFIER = 0xA1;

  static APPLIANCE_TYPE_AIRCON = 0xAC;

  static AC_MIN_TEMPERATURE = 16;

  static AC_MAX_TEMPERATURE = 31;

  /** Operating modes in AC status and set payloads */
  static AC_MODE = {
    AUTO: 1,
    COOL: 2,
    DRY: 3,
    HEAT: 4,
    FAN_ONLY: 5,
    CUSTOM_DRY: 6,
  };

  /** Operating modes in dehumidifier status and set payloads */
  static DEHUMIDIFIER_MODE = {
    TARGET: 1,
    CONTINUOUS: 2,
    SMART: 3,
    DRYER: 4,
  };

  /** Dehumidifier fan presets */
  static DEHUMIDIFIER_FAN = {
    LOW: 40,
    MEDIUM: 60,
    HIGH: 80,
  };

  // ==========================================
  // NETWORK
  // ==========================================

  static DISCOVERY_PORT = 6445;

  static DISCOVERY_PORT_LEGACY = 20086;

  static DEVICE_PORT = 6444;

  static BROADCAST_ADDRESS = '255.255.255.255';

  static DEFAULT_RETRIES = 3;

  /** Seconds */
  static DEFAULT_SOCKET_TIMEOUT = 2;

  /** Seconds a discovery broadcast round listens for replies */
  static DEFAULT_DISCOVERY_TIMEOUT = 3;

  static READ_SIZE = 1024;

  static DISCOVERY_READ_SIZE = 512;

  /**
   * Broadcast datagram understood by every LAN module. A ZZ header with
   * message type 0x11, zero padding, and a fixed 32 byte signature at 40.
   */
  static DISCOVERY_MSG = Buffer.concat([
    Buffer.from([0x5A, 0x5A, 0x01, 0x11, 0x48, 0x00, 0x92]),
    Buffer.alloc(33),
    Buffer.from('7F75BD6B3E4F8B762E849C6E578D6590036E9D4342A50F1F569EB8EC918E92E5', 'hex'),
  ]);

  // ==========================================
  // CLOUD
  // ==========================================

  static CLOUD_CLIENT_TYPE = 1;

  static CLOUD_FORMAT = 2;

  static CLOUD_LANGUAGE = 'en_US';

  static CLOUD_SRC = 17;

  /** Seconds */
  static CLOUD_TIMEOUT = 9;

  /** Cloud relay prefixes every transparent reply with this many bytes */
  static TRANSPARENT_REPLY_HEADER = 50;

  static DEFAULT_APP = 'NetHome Plus';

  static SUPPORTED_APPS: Record<string, CloudApp> = {
    'NetHome Plus': {
      appkey: '3742e9e5842d4ad59c2db887e12449f9',
      appid: 1017,
      apiurl: 'https://mapp.appsmb.com/v1/',
      signkey: 'xhdiwjnchekd4d512chdjx5d8e4c394D2D7S',
    },
    'Midea Air': {
      appkey: 'ff0cf6f5f0c3471de36341cab3f7a9af',
      appid: 1117,
      apiurl: 'https://mapp.appsmb.com/v1/',
      signkey: 'xhdiwjnchekd4d512chdjx5d8e4c394D2D7S',
    },
  };

  static CLOUD_ERRORS = {
    SESSION_RESTART: [3004, 3106],
    AUTHENTICATION: [3101, 3102, 3301],
    FULL_RESTART: [3144],
    IGNORE: [3176, 9999],
    RETRY_LATER: [7610],
  };
}
