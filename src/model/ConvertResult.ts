export type ConvertResult = ConvertResultFile | ConvertResultArchive;

export interface ConvertResultFile {
  contentType: string;
  data: Buffer;
  filename: string;
  type: "file";
}

export interface ConvertResultArchive {
  contentType: string;
  data: Buffer;
  filename: string;

  /**
   * Number of files packed, before any same-name entries replaced each other.
   */
  fileCount: number;
  type: "archive";
}
