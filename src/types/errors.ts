/**
 * Error types thrown by the pH sensor toolkit
 *
 * Everything a caller can fix by passing different data derives from
 * ValidationError. Storage problems with the host file system do not.
 */

export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ValidationError';
  }
}

/**
 * A millivolt, temperature or coefficient input that is not a finite number
 */
export class InvalidInputError extends ValidationError {
  /** The rejected input, as received */
  readonly value: unknown;

  constructor(message: string, value?: unknown) {
    super(message);
    this.name = 'InvalidInputError';
    this.value = value;
  }
}

/**
 * Buffer voltage outside its window, or two points that describe no usable line
 */
export class CalibrationValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'CalibrationValidationError';
  }
}

/**
 * Persisted calibration data that is not a calibration file
 */
export class CalibrationFileError extends ValidationError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CalibrationFileError';
  }
}

/**
 * The calibration directory is missing and may not be created
 */
export class CalibrationStorageError extends Error {
  readonly directory: string;

  constructor(directory: string) {
    super(
      "The directory " + directory + " does not exist. " +
      "Enable makedirs to create the folder automatically."
    );
    this.name = 'CalibrationStorageError';
    this.directory = directory;
  }
}
