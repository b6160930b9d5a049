import type { IcanErrorCode } from '@ican/contracts';

/**
 * Base error class for the ICAN toolkit
 */
export class IcanError extends Error {
  readonly code: IcanErrorCode | 'CHECKSUM_INPUT_ERROR' | 'REGISTRY_ERROR' | 'CONFIGURATION_ERROR';
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: IcanError['code'], context?: Record<string, unknown>) {
    super(message);
    this.name = 'IcanError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Thrown when a registry entry carries a malformed structure pattern
 */
export class InvalidStructureError extends IcanError {
  readonly structure: string;

  constructor(structure: string, reason: string, context?: Record<string, unknown>) {
    super(`Invalid structure '${structure}': ${reason}`, 'INVALID_STRUCTURE', { ...context, structure });
    this.name = 'InvalidStructureError';
    this.structure = structure;
  }
}

/**
 * Thrown for malformed registry data (bad code, length, variant or data file)
 */
export class RegistryError extends IcanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'REGISTRY_ERROR', context);
    this.name = 'RegistryError';
  }
}

/**
 * Thrown for invalid engine configuration
 */
export class ConfigurationError extends IcanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Thrown when a formatting helper is called with invalid arguments
 */
export class FormatArgumentError extends IcanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_FORMAT_ARGUMENTS', context);
    this.name = 'FormatArgumentError';
  }
}

/**
 * Thrown when the checksum engine receives something other than digits
 */
export class ChecksumInputError extends IcanError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CHECKSUM_INPUT_ERROR', context);
    this.name = 'ChecksumInputError';
  }
}
