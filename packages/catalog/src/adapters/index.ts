/**
 * Adapters module - turns raw file contents into plain data
 */

export { parseYamlDocument, parseCsvRows, DocumentParseError } from './documents.js';
export { parseProperties, formatProperties } from './properties.js';
