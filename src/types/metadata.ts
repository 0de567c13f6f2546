/**
 * Bibliographic metadata read from a TeX source
 * Every field is optional; a missing field means the matching flag is omitted
 */
export interface TexMetadata {
  documentClass?: string;
  languages?: string[];
  author?: string;
  cover?: string;
  date?: string;
  publisher?: string;
  isbn?: string;
}

export type MetadataField = keyof TexMetadata;
