export { parseDate, toDeadline } from './date-parser.js';
