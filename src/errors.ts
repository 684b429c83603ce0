export enum ErrorKind {
  NOT_FOUND = 'NotFound',
  STORAGE_UNAVAILABLE = 'StorageUnavailable',
  APPOINTMENT_NOT_FOUND = 'AppointmentNotFound',
  APPOINTMENT_SERVICE_UNAVAILABLE = 'AppointmentServiceUnavailable',
  APPOINTMENT_NOT_COMPLETED = 'AppointmentNotCompleted',
  PATIENT_MISMATCH = 'PatientMismatch',
  DOCTOR_MISMATCH = 'DoctorMismatch',
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  [ErrorKind.NOT_FOUND]: 404,
  [ErrorKind.STORAGE_UNAVAILABLE]: 500,
  [ErrorKind.APPOINTMENT_NOT_FOUND]: 404,
  [ErrorKind.APPOINTMENT_SERVICE_UNAVAILABLE]: 503,
  [ErrorKind.APPOINTMENT_NOT_COMPLETED]: 400,
  [ErrorKind.PATIENT_MISMATCH]: 400,
  [ErrorKind.DOCTOR_MISMATCH]: 400,
};

export const statusForKind = (kind: ErrorKind): number => STATUS_BY_KIND[kind];

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  kind?: ErrorKind;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500, kind?: ErrorKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.kind = kind;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }

  static fromKind(kind: ErrorKind, message: string, cause?: unknown): AppError {
    return new AppError(message, statusForKind(kind), kind, cause === undefined ? undefined : { cause });
  }
}
