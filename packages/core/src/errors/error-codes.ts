/**
 * quipkeep Error Codes
 *
 * Error codes are structured as QK_[CATEGORY][NUMBER]:
 * - D: Snapshot data errors (D100-D199)
 * - S: Storage errors (S200-S299)
 * - I: Import errors (I300-I399)
 * - O: Operation errors (O400-O499)
 * - X: Internal errors (X900-X999)
 *
 * Messages here are developer-facing defaults. The presentation layer
 * localizes by `code` or by the error `kind`, never by message text.
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Snapshot data errors (D100-D199)
  QK_D100: {
    code: 'QK_D100',
    message: 'Snapshot data is corrupted',
    suggestion: 'Export the data again from the source device and retry the import.',
  },
  QK_D101: {
    code: 'QK_D101',
    message: 'Snapshot is not valid UTF-8 JSON',
    suggestion: 'Make sure the file was produced by the export feature and was not edited.',
  },
  QK_D102: {
    code: 'QK_D102',
    message: 'Snapshot field is missing or has the wrong type',
    suggestion: 'Export the data again from the source device and retry the import.',
  },
  QK_D103: {
    code: 'QK_D103',
    message: 'Snapshot contains duplicate record identifiers',
    suggestion: 'The file was modified after export. Export it again from the source device.',
  },
  QK_D104: {
    code: 'QK_D104',
    message: 'Content record is invalid',
    suggestion: 'Skip the invalid record or fix it at the source.',
  },
  QK_D110: {
    code: 'QK_D110',
    message: 'Snapshot schema version is not supported',
    suggestion: 'Update the app to the latest version before importing this file.',
  },
  QK_D120: {
    code: 'QK_D120',
    message: 'Snapshot could not be serialized',
    suggestion: 'Retry the export. If it keeps failing, export without anonymization.',
  },

  // Storage errors (S200-S299)
  QK_S200: {
    code: 'QK_S200',
    message: 'Local store operation failed',
    suggestion: 'Retry the operation.',
  },
  QK_S201: {
    code: 'QK_S201',
    message: 'Insufficient storage for the export file',
    suggestion: 'Free some storage space and retry the export.',
  },

  // Import errors (I300-I399)
  QK_I300: {
    code: 'QK_I300',
    message: 'Import aborted: error budget exceeded',
    suggestion: 'Review the failed records, raise the error budget or fix the source file.',
  },
  QK_I301: {
    code: 'QK_I301',
    message: 'Import preview is unknown or has expired',
    suggestion: 'Select the file again to build a fresh preview.',
  },

  // Operation errors (O400-O499)
  QK_O400: {
    code: 'QK_O400',
    message: 'Operation was cancelled',
    suggestion: 'Start the operation again when ready.',
  },

  // Internal errors (X900-X999)
  QK_X900: {
    code: 'QK_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred. Please report this issue.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory = 'data' | 'storage' | 'import' | 'operation' | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(3);
  switch (letter) {
    case 'D':
      return 'data';
    case 'S':
      return 'storage';
    case 'I':
      return 'import';
    case 'O':
      return 'operation';
    default:
      return 'internal';
  }
}

/**
 * Get error info by code
 */
export function getErrorInfo(code: ErrorCode): (typeof ERROR_CODES)[ErrorCode] {
  return ERROR_CODES[code];
}
