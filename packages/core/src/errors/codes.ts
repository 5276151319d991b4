/**
 * Error Code Infrastructure
 * Stable error codes and severities shared by every recordgen error.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Construction Errors (E001–E019)
  INVALID_FIELD_NAME = 'E010',
  CONSTRUCTION_MISMATCH = 'E011',
  CONSTRUCTION_FAILED = 'E012',

  // Instantiation Errors (E020–E099)
  TYPE_ARGUMENT_MISMATCH = 'E020',
  UNBOUND_TYPE_PARAMETER = 'E021',

  // Generation Errors (E100–E199)
  EXTRA_KEY_COLLISION = 'E100',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}
