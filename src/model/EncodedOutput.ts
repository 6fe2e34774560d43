export interface EncodedOutput {
  data: Buffer;
  filename: string;
}
