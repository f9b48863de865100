export type { Operand } from './arithmetic';
export {
  negate,
  add,
  subtract,
  rsubtract,
  multiply,
  divide,
  rdivide,
  power,
  reciprocalMoment,
} from './arithmetic';
export { log, log2, log10, exp, sin, cos, tan, rpow, powAIN } from './transcendental';
