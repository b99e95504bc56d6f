/**
 * Tidemark Error Codes
 *
 * Error codes are structured as TIDEMARK_[CATEGORY][NUMBER]:
 * - V: Validation errors (V100-V199)
 * - Q: Queue errors (Q200-Q299)
 * - S: Storage errors (S300-S399)
 * - R: Conflict resolution errors (R400-R499)
 * - C: Connection/Remote errors (C500-C599)
 * - M: Migration errors (M700-M799)
 * - X: Internal errors (X900-X999)
 */

/**
 * Error code definitions with messages and suggestions
 */
export const ERROR_CODES = {
  // Validation errors (V100-V199)
  TIDEMARK_V100: {
    code: 'TIDEMARK_V100',
    message: 'Validation failed',
    suggestion: 'Check the validation issues for the offending fields.',
  },
  TIDEMARK_V101: {
    code: 'TIDEMARK_V101',
    message: 'Invalid collection name',
    suggestion: 'Collection names must match [A-Za-z_][A-Za-z0-9_]*.',
  },
  TIDEMARK_V102: {
    code: 'TIDEMARK_V102',
    message: 'Invalid entity id',
    suggestion: 'Entity ids must be non-empty strings.',
  },

  // Queue errors (Q200-Q299)
  TIDEMARK_Q200: {
    code: 'TIDEMARK_Q200',
    message: 'Queue item not found',
    suggestion: 'The item may already have been acknowledged or discarded.',
  },
  TIDEMARK_Q201: {
    code: 'TIDEMARK_Q201',
    message: 'Queue item is not dead-lettered',
    suggestion: 'Only dead-lettered items can be retried or discarded explicitly.',
  },
  TIDEMARK_Q202: {
    code: 'TIDEMARK_Q202',
    message: 'Queue item is dead-lettered',
    suggestion: 'Dead-lettered items are never acknowledged or retried automatically.',
  },

  // Storage errors (S300-S399)
  TIDEMARK_S300: {
    code: 'TIDEMARK_S300',
    message: 'Storage operation failed',
    suggestion: 'Check file permissions and available disk space, then retry.',
  },
  TIDEMARK_S301: {
    code: 'TIDEMARK_S301',
    message: 'Storage backend not open',
    suggestion: 'Call open() on the backend (or Engine.open) before using it.',
  },
  TIDEMARK_S302: {
    code: 'TIDEMARK_S302',
    message: 'Store is not ready',
    suggestion: 'Run the migration manager successfully before reading or writing.',
  },
  TIDEMARK_S303: {
    code: 'TIDEMARK_S303',
    message: 'Unknown collection',
    suggestion: 'Declare the collection in the engine config or create it in a migration.',
  },
  TIDEMARK_S304: {
    code: 'TIDEMARK_S304',
    message: 'Stored data is corrupt',
    suggestion: 'A persisted row could not be decoded.',
  },
  TIDEMARK_S305: {
    code: 'TIDEMARK_S305',
    message: 'Entity not found',
    suggestion: 'Check the collection and id.',
  },

  // Conflict resolution errors (R400-R499)
  TIDEMARK_R400: {
    code: 'TIDEMARK_R400',
    message: 'Conflict resolution failed',
    suggestion: 'The entity is marked conflicted; resolve it with resolveConflict().',
  },
  TIDEMARK_R401: {
    code: 'TIDEMARK_R401',
    message: 'Entity is not conflicted',
    suggestion: 'Only conflicted entities can be resolved explicitly.',
  },

  // Connection/Remote errors (C500-C599)
  TIDEMARK_C500: {
    code: 'TIDEMARK_C500',
    message: 'Remote request failed',
    suggestion: 'The request will be retried with backoff.',
  },
  TIDEMARK_C501: {
    code: 'TIDEMARK_C501',
    message: 'Remote rejected the change',
    suggestion: 'The change was dead-lettered; inspect deadLetters().',
  },
  TIDEMARK_C502: {
    code: 'TIDEMARK_C502',
    message: 'Remote unreachable',
    suggestion: 'Sync will run again when connectivity is restored.',
  },
  TIDEMARK_C503: {
    code: 'TIDEMARK_C503',
    message: 'Remote rejected credentials',
    suggestion: 'Refresh the credentials handed to the remote collaborator.',
  },
  TIDEMARK_C504: {
    code: 'TIDEMARK_C504',
    message: 'Sync run failed',
    suggestion: 'Sync will run again on the next trigger.',
  },
  TIDEMARK_C505: {
    code: 'TIDEMARK_C505',
    message: 'Sync is not configured',
    suggestion: 'Pass a remote in the engine config to enable sync.',
  },

  // Migration errors (M700-M799)
  TIDEMARK_M700: {
    code: 'TIDEMARK_M700',
    message: 'Migration failed',
    suggestion: 'The store stays at its previous version; fix the migration and restart.',
  },
  TIDEMARK_M701: {
    code: 'TIDEMARK_M701',
    message: 'Stored schema is newer than this build',
    suggestion: 'Upgrade the application; downgrading over newer data is refused.',
  },
  TIDEMARK_M702: {
    code: 'TIDEMARK_M702',
    message: 'Invalid migration set',
    suggestion: 'Migration versions must be unique positive integers without gaps.',
  },

  // Internal errors (X900-X999)
  TIDEMARK_X900: {
    code: 'TIDEMARK_X900',
    message: 'Internal error',
    suggestion: 'An unexpected error occurred.',
  },
  TIDEMARK_X901: {
    code: 'TIDEMARK_X901',
    message: 'Component closed',
    suggestion: 'The component was closed or destroyed.',
  },
} as const;

/**
 * Error code type
 */
export type ErrorCode = keyof typeof ERROR_CODES;

/**
 * Error category type
 */
export type ErrorCategory =
  | 'validation'
  | 'queue'
  | 'storage'
  | 'conflict'
  | 'connection'
  | 'migration'
  | 'internal';

/**
 * Get the category of an error code
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  const letter = code.charAt(9);
  switch (letter) {
    case 'V':
      return 'validation';
    case 'Q':
      return 'queue';
    case 'S':
      return 'storage';
    case 'R':
      return 'conflict';
    case 'C':
      return 'connection';
    case 'M':
      return 'migration';
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
