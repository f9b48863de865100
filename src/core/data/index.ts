/**
 * Conversions between AINs and plain data
 */

export {
  fromRecord,
  fromTuple,
  toRecord,
  toTuple,
  stringifyAIN,
  parseAIN,
} from './serialization';

export type { FitOptions } from './fit';
export { fitAIN } from './fit';
