import { z } from "zod";

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

// File validation for uploaded images
export const imageFileSchema = (maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES) =>
  z
    .custom<File>(value => value instanceof Blob && "name" in value, { message: "Expected an uploaded file" })
    .refine(file => file.type.startsWith("image/"), {
      message: "File must be an image (JPEG, PNG, etc.)",
    })
    .refine(file => file.size > 0, { message: "File is empty" })
    .refine(file => file.size <= maxBytes, {
      message: `File is too large (max ${Math.floor(maxBytes / (1024 * 1024))}MB)`,
    });

export interface FileValidationResult {
  isValid: boolean;
  errors: string[];
}

export function validateFile(file: File, maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES): FileValidationResult {
  const validation = imageFileSchema(maxBytes).safeParse(file);

  if (!validation.success) {
    return {
      isValid: false,
      errors: validation.error.issues.map(issue => issue.message),
    };
  }

  return { isValid: true, errors: [] };
}
