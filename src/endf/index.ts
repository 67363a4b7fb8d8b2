export {
  ENDF_FIELD_WIDTH,
  NORMALIZED_NUMERAL_CAPACITY,
  decimalPrefixToNumber,
  normalizeEndfNumeral,
  parseEndfFloat,
} from './parseFloat.js';
export { BoundedCharBuffer } from './boundedBuffer.js';
export {
  DATA_COLUMNS,
  FIELDS_PER_LINE,
  formatEndfFloat,
  formatEndfInt,
  parseControlColumns,
  parseEndfInt,
  splitDataFields,
} from './fields.js';
export type { ControlColumns } from './fields.js';
export {
  EndfLineReader,
  readContRecord,
  readHeadRecord,
  readIntgRecord,
  readListRecord,
  readTab1Record,
  readTab2Record,
  readTextRecord,
} from './records.js';
export type {
  ContRecord,
  ControlOnlyRecord,
  HeadRecord,
  ListRecord,
  Tab1Record,
  Tab2Record,
} from './records.js';
export { INTERPOLATION_LAWS, Tabulated1D } from './tabulated.js';
export type { InterpolationResult, Tabulated2D } from './tabulated.js';
export { EndfMaterial, parseMf1Mt451, parseMf3, readMaterial, readMaterials } from './material.js';
export type { DirectoryEntry, Mf1Mt451, Mf3CrossSection } from './material.js';
