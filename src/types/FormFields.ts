/**
 * Text fields of a multipart upload, keyed by field name. Files are carried separately.
 */
export type FormFields = Readonly<Record<string, string | undefined>>;
