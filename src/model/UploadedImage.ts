export interface UploadedImage {
  data: Buffer;

  /**
   * As sent by the client; may be missing or empty.
   */
  filename: string | undefined;
}
