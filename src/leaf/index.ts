export { divide, squareRoot } from './numeric.js';
export { parseInteger, parseDecimal, formatDecimal, MAX_PRECISION } from './parsing.js';
