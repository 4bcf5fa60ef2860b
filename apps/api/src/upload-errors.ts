/**
 * Standardized error codes for document uploads.
 *
 * Route handlers catch errors with these messages and map them to HTTP 400
 * with the error code and a human-readable description.
 */
export const UploadErrorCode = {
  /** Multipart form is missing the file field entirely. */
  NO_FILE: "NO_FILE",
  /** Uploaded file has zero bytes. */
  EMPTY_FILE: "EMPTY_FILE",
  /** Declared MIME type is not in the allow-list. */
  INVALID_FILE_TYPE: "INVALID_FILE_TYPE",
  INVALID_FILE_EXTENSION: "INVALID_FILE_EXTENSION",
  /** Magic bytes in the file header do not match the declared MIME type. */
  MIME_MISMATCH: "MIME_MISMATCH",
  FILE_TOO_LARGE: "FILE_TOO_LARGE",
  /** The multipart `documentType` field is missing or not one of the nine catalog types. */
  INVALID_DOCUMENT_TYPE: "INVALID_DOCUMENT_TYPE",
  /** Storage key resolves outside the allowed base directory or contains symlinks. */
  INVALID_STORAGE_KEY: "INVALID_STORAGE_KEY",
  /** The OCR provider failed to return text for the file. */
  OCR_FAILED: "OCR_FAILED",
} as const;

export type UploadErrorCodeValue = (typeof UploadErrorCode)[keyof typeof UploadErrorCode];

export const UPLOAD_ERROR_DESCRIPTIONS: Record<UploadErrorCodeValue, string> = {
  NO_FILE: "No file was included in the upload request.",
  EMPTY_FILE: "The uploaded file is empty (zero bytes).",
  INVALID_FILE_TYPE: "Only PDF, JPEG, PNG and plain-text files are allowed.",
  INVALID_FILE_EXTENSION: "The file extension is not allowed.",
  MIME_MISMATCH: "The file content does not match its declared type.",
  FILE_TOO_LARGE: "The file exceeds the maximum allowed size.",
  INVALID_DOCUMENT_TYPE: "documentType must be one of the supported document types.",
  INVALID_STORAGE_KEY: "Invalid file path.",
  OCR_FAILED: "Text could not be read from the document. Please try again later.",
};

export function isUploadError(message: string): message is UploadErrorCodeValue {
  return message in UPLOAD_ERROR_DESCRIPTIONS;
}
