import { extname } from "node:path";
import { ApiError } from "./http";
import { getBlobStore } from "./storage";
import { newId } from "./time";
import type { Attachment } from "./types";

const MB = 1024 * 1024;

export const IMAGE_TYPES = ["image/jpeg", "image/jpg", "image/png", "image/webp"];
export const ATTACHMENT_TYPES = [
  "image/jpeg",
  "image/png",
  "image/gif",
  "image/webp",
  "application/pdf",
  "application/msword",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document"
];

export type UploadRule = { folder: string; types: string[]; maxBytes: number };

export const PRODUCT_IMAGE: UploadRule = { folder: "products", types: IMAGE_TYPES, maxBytes: 5 * MB };
export const MESSAGE_ATTACHMENT: UploadRule = { folder: "attachments", types: ATTACHMENT_TYPES, maxBytes: 10 * MB };

export async function readUpload(request: Request): Promise<File> {
  let form: FormData;
  try {
    form = await request.formData();
  } catch {
    throw new ApiError(400, "multipart_required");
  }
  const file = form.get("file");
  if (!file || typeof file === "string") throw new ApiError(400, "file_required");
  return file;
}

export async function storeUpload(file: File, rule: UploadRule): Promise<Attachment> {
  if (!rule.types.includes(file.type)) throw new ApiError(400, "unsupported_file_type");
  if (file.size > rule.maxBytes) throw new ApiError(413, "file_too_large");

  const objectName = `${rule.folder}/${newId()}${extname(file.name).toLowerCase()}`;
  const url = await getBlobStore().put(objectName, Buffer.from(await file.arrayBuffer()), file.type);
  return {
    type: file.type.startsWith("image/") ? "image" : "file",
    url,
    name: file.name,
    size: file.size
  };
}
