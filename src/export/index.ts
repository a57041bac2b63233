/**
 * Export module barrel exports
 */
export { exportToCsv, nodesToCsv, edgesToCsv } from './csv-export.js';
export { filterText, normalizeNodeText } from './text-encoding.js';
export { renderTree } from './render.js';
