export const ENDF_INFO = 'endf_info' as const;
export const ENDF_PARSE_FLOAT = 'endf_parse_float' as const;
export const ENDF_PARSE_FLOATS = 'endf_parse_floats' as const;
export const ENDF_FORMAT_FLOAT = 'endf_format_float' as const;
export const ENDF_PARSE_INT = 'endf_parse_int' as const;
export const ENDF_LIST_SECTIONS = 'endf_list_sections' as const;
export const ENDF_GET_HEADER = 'endf_get_header' as const;
export const ENDF_GET_CROSS_SECTION = 'endf_get_cross_section' as const;

export type EndfToolName =
  | typeof ENDF_INFO
  | typeof ENDF_PARSE_FLOAT
  | typeof ENDF_PARSE_FLOATS
  | typeof ENDF_FORMAT_FLOAT
  | typeof ENDF_PARSE_INT
  | typeof ENDF_LIST_SECTIONS
  | typeof ENDF_GET_HEADER
  | typeof ENDF_GET_CROSS_SECTION;

export const MAX_BATCH_FIELDS = 10000;
