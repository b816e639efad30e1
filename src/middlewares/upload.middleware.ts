// src/middlewares/upload.middleware.ts
import multer from "multer";

/**
 * Single-file multipart parser. Files are held in memory and handed to the
 * storage service, which writes them under a generated name.
 */
export function uploadSingle(fieldName: string, limitBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limitBytes, files: 1 },
  }).single(fieldName);
}

// multipart bodies without a file part (PATCH /content/:id from a form)
export function fieldsOnly() {
  return multer({ storage: multer.memoryStorage() }).none();
}
