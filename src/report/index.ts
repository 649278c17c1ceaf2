export { renderReport, formatRow } from './text.js';
