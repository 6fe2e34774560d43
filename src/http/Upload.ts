import { UploadedImage } from "imagesmith/model/UploadedImage";
import { FormFields } from "imagesmith/types/FormFields";

export type MultipartBody = Record<string, string | File | (string | File)[]>;

/**
 * Splits a parsed multipart body into the uploaded `file` parts and the remaining text fields. Repeated text fields
 * keep their first value.
 */
export async function readUpload(body: MultipartBody): Promise<{ files: UploadedImage[]; fields: FormFields }> {
  const fields: Record<string, string> = {};
  const fileParts: File[] = [];

  for (const [name, value] of Object.entries(body)) {
    const values = Array.isArray(value) ? value : [value];
    for (const entry of values) {
      if (typeof entry === "string") {
        fields[name] ??= entry;
      } else if (name === "file") {
        fileParts.push(entry);
      }
    }
  }

  const files = await Promise.all(
    fileParts.map(async (x): Promise<UploadedImage> => ({
      filename: x.name === "" ? undefined : x.name,
      data: Buffer.from(await x.arrayBuffer())
    }))
  );
  return { files, fields };
}
