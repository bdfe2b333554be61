export { parsePriority } from './priority-parser.js';
export { parseExportFormat } from './format-parser.js';
