import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ErrorKind } from '../errors';

export const COMPLETED_STATUS = 'COMPLETED';

// Only the fields the business rules read are required; the rest pass through for logging
const appointmentSchema = z
  .object({
    status: z.string(),
    patient_id: z.number().int(),
    doctor_id: z.number().int(),
  })
  .passthrough();

export type Appointment = z.infer<typeof appointmentSchema>;

export type VerificationErrorKind =
  | ErrorKind.APPOINTMENT_NOT_FOUND
  | ErrorKind.APPOINTMENT_SERVICE_UNAVAILABLE
  | ErrorKind.APPOINTMENT_NOT_COMPLETED
  | ErrorKind.PATIENT_MISMATCH
  | ErrorKind.DOCTOR_MISMATCH;

export type VerificationResult =
  | { ok: true; appointment: Appointment }
  | { ok: false; kind: VerificationErrorKind; message: string };

export interface AppointmentVerifier {
  verify(appointmentId: number, patientId: number, doctorId: number): Promise<VerificationResult>;
}

export interface AppointmentServiceOptions {
  baseUrl: string;
  timeoutMs: number;
}

type FetchResult =
  | { ok: true; appointment: Appointment }
  | { ok: false; kind: ErrorKind.APPOINTMENT_NOT_FOUND | ErrorKind.APPOINTMENT_SERVICE_UNAVAILABLE; message: string };

const fail = (kind: VerificationErrorKind, message: string): VerificationResult => ({ ok: false, kind, message });

/**
 * Business rules an appointment must satisfy before a prescription can be issued.
 * Evaluated in order; the first failure wins.
 */
export function checkAppointment(
  appointment: Appointment,
  patientId: number,
  doctorId: number
): VerificationResult {
  if (appointment.status !== COMPLETED_STATUS) {
    return fail(
      ErrorKind.APPOINTMENT_NOT_COMPLETED,
      `Appointment must be ${COMPLETED_STATUS} to issue a prescription (current status: ${appointment.status})`
    );
  }

  if (appointment.patient_id !== patientId) {
    return fail(
      ErrorKind.PATIENT_MISMATCH,
      `Patient ID does not match appointment (appointment patient_id: ${appointment.patient_id}, requested: ${patientId})`
    );
  }

  if (appointment.doctor_id !== doctorId) {
    return fail(
      ErrorKind.DOCTOR_MISMATCH,
      `Doctor ID does not match appointment (appointment doctor_id: ${appointment.doctor_id}, requested: ${doctorId})`
    );
  }

  return { ok: true, appointment };
}

/**
 * HTTP client for the appointment service
 */
export class AppointmentService implements AppointmentVerifier {
  private readonly http: AxiosInstance;

  constructor(options: AppointmentServiceOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
    });
  }

  async verify(appointmentId: number, patientId: number, doctorId: number): Promise<VerificationResult> {
    const fetched = await this.fetchAppointment(appointmentId);

    if (!fetched.ok) {
      return fetched;
    }

    return checkAppointment(fetched.appointment, patientId, doctorId);
  }

  private async fetchAppointment(appointmentId: number): Promise<FetchResult> {
    let data: unknown;

    try {
      const response = await this.http.get<unknown>(`/appointments/${appointmentId}`);
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        return { ok: false, kind: ErrorKind.APPOINTMENT_NOT_FOUND, message: `Appointment ${appointmentId} not found` };
      }

      const reason = axios.isAxiosError(error)
        ? error.response
          ? `status ${error.response.status}`
          : error.code ?? error.message
        : String(error);

      return {
        ok: false,
        kind: ErrorKind.APPOINTMENT_SERVICE_UNAVAILABLE,
        message: `Appointment service unavailable (${reason})`,
      };
    }

    const parsed = appointmentSchema.safeParse(data);
    if (!parsed.success) {
      return {
        ok: false,
        kind: ErrorKind.APPOINTMENT_SERVICE_UNAVAILABLE,
        message: 'Appointment service returned an unexpected response',
      };
    }

    return { ok: true, appointment: parsed.data };
  }
}
