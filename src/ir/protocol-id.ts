/**
 * Protocol identifiers
 *
 * 番号は出力レコードにそのまま載るので、一度割り当てた値は変更しないこと。
 */

// eslint-disable-next-line no-unused-vars
export enum ProtocolId {
  UNKNOWN = 0,
  SIRCS = 1,
  NEC = 2,
  SAMSUNG = 3,
  MATSUSHITA = 4,
  KASEIKYO = 5,
  RECS80 = 6,
  RC5 = 7,
  DENON = 8,
  RC6 = 9,
  SAMSUNG32 = 10,
  APPLE = 11,
  RECS80EXT = 12,
  NUBERT = 13,
  BANG_OLUFSEN = 14,
  GRUNDIG = 15,
  NOKIA = 16,
  SIEMENS = 17,
  FDC = 18,
  RCCAR = 19,
  JVC = 20,
  RC6A = 21,
  NIKON = 22,
  RUWIDO = 23,
  IR60 = 24,
  KATHREIN = 25,
  NETBOX = 26,
  NEC16 = 27,
  NEC42 = 28,
  LEGO = 29,
  THOMSON = 30,
  BOSE = 31,
  A1TVBOX = 32,
  ORTEK = 33,
  TELEFUNKEN = 34,
  ROOMBA = 35,
  RCMM32 = 36,
  RCMM24 = 37,
  RCMM12 = 38,
  SPEAKER = 39,
  LGAIR = 40,
  SAMSUNG48 = 41,
  MERLIN = 42,
  PENTAX = 43,
  FAN = 44,
  S100 = 45,
  ACP24 = 46,
  TECHNICS = 47,
  PANASONIC = 48,
  MITSU_HEAVY = 49,
  VINCENT = 50,
  SAMSUNGAH = 51,
  IRMP16 = 52,
  GREE = 53,
  RCII = 54,
  METZ = 55,
  ONKYO = 56
}

export type ProtocolName = keyof typeof ProtocolId;

export const PROTOCOL_COUNT = 57;

// Display names, indexed by id
const PROTOCOL_NAMES: readonly string[] = [
  'UNKNOWN', 'SIRCS', 'NEC', 'SAMSUNG', 'MATSUSH', 'KASEIKYO', 'RECS80', 'RC5',
  'DENON', 'RC6', 'SAMSG32', 'APPLE', 'RECS80EX', 'NUBERT', 'BANG OLU', 'GRUNDIG',
  'NOKIA', 'SIEMENS', 'FDC', 'RCCAR', 'JVC', 'RC6A', 'NIKON', 'RUWIDO',
  'IR60', 'KATHREIN', 'NETBOX', 'NEC16', 'NEC42', 'LEGO', 'THOMSON', 'BOSE',
  'A1TVBOX', 'ORTEK', 'TELEFUNKEN', 'ROOMBA', 'RCMM32', 'RCMM24', 'RCMM12', 'SPEAKER',
  'LG AIR', 'SAMSG48', 'MERLIN', 'PENTAX', 'FAN', 'S100', 'ACP24', 'TECHNICS',
  'PANASONIC', 'MITSU_HEAVY', 'VINCENT', 'SAMSUNGAH', 'IRMP16', 'GREE', 'RCII', 'METZ',
  'ONKYO'
];

export function getProtocolName(protocol: number): string {
  return PROTOCOL_NAMES[protocol] ?? 'unknown';
}

export function isProtocolName(name: string): name is ProtocolName {
  return Object.prototype.hasOwnProperty.call(ProtocolId, name) && Number.isNaN(Number(name));
}

export function isProtocolId(value: number): value is ProtocolId {
  return Number.isInteger(value) && value >= 0 && value < PROTOCOL_COUNT;
}

// Left out of the default configuration
export const DEFAULT_DISABLED_PROTOCOLS: readonly ProtocolId[] = [
  ProtocolId.FAN,
  ProtocolId.ORTEK,
  ProtocolId.ROOMBA,
  ProtocolId.RUWIDO,
  ProtocolId.MERLIN,
  ProtocolId.PENTAX,
  ProtocolId.S100,
  ProtocolId.ACP24,
  ProtocolId.PANASONIC,
  ProtocolId.GREE,
  ProtocolId.RCII,
  ProtocolId.ONKYO
];
