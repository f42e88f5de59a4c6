/**
 * Zoned Clock
 */

export type { Instant, CivilDateTime, Disambiguation } from './types.js'
export {
  resolveZone,
  parseCivil,
  formatCivil,
  isValidCivil,
  isLeapYear,
  daysInMonth,
  civilOf,
  civilDateOf,
  resolve,
  startOfCivilDay,
  endOfCivilDay,
  convertZone,
  isDst,
  isSameInstant,
  compareInstants,
} from './clock.js'
