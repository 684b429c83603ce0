import { Request, Response } from 'express';
import { validationResult } from 'express-validator';
import { AppError } from '../errors';
import { PrescriptionCandidate, toPrescriptionResponse } from '../models/Prescription';
import { AppointmentVerifier } from '../services/appointmentService';
import { NotificationEmitter } from '../services/notificationService';
import { MAX_PAGE_SIZE, PrescriptionStore } from '../services/prescriptionStore';
import '../types/express';

export const PRESCRIPTION_CREATED_EVENT = 'prescription_created';

export interface PrescriptionControllerDeps {
  store: PrescriptionStore;
  verifier: AppointmentVerifier;
  notifier: NotificationEmitter;
}

// Values have already passed express-validator, this only narrows the type
const toInt = (value: unknown): number | undefined => {
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
};

const toText = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

const readCandidate = (body: Record<string, unknown>): PrescriptionCandidate => ({
  appointmentId: toInt(body.appointment_id) ?? 0,
  patientId: toInt(body.patient_id) ?? 0,
  doctorId: toInt(body.doctor_id) ?? 0,
  medication: toText(body.medication),
  dosage: toText(body.dosage),
  days: toInt(body.days) ?? 0,
});

/**
 * Prescription controller - creation against a verified appointment, and reads
 */
export const createPrescriptionController = ({ store, verifier, notifier }: PrescriptionControllerDeps) => {
  const createPrescription = async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: errors.array() });
    }

    const candidate = readCandidate(req.body);
    const log = req.log.child({ appointmentId: candidate.appointmentId });

    const verification = await verifier.verify(candidate.appointmentId, candidate.patientId, candidate.doctorId);

    if (!verification.ok) {
      log.warn({ kind: verification.kind, reason: verification.message }, 'appointment_verification_failed');
      throw AppError.fromKind(verification.kind, verification.message);
    }

    log.debug({ appointmentStatus: verification.appointment.status }, 'appointment_verified');

    const prescription = await store.insert(candidate);

    log.info({ prescriptionId: prescription.id, patientId: prescription.patientId }, 'prescription_created');

    // Not awaited: the prescription is stored, delivery must not affect the response
    notifier
      .notify(
        PRESCRIPTION_CREATED_EVENT,
        {
          prescription_id: prescription.id,
          appointment_id: prescription.appointmentId,
          patient_id: prescription.patientId,
          doctor_id: prescription.doctorId,
          medication: prescription.medication,
        },
        log
      )
      .catch((error: unknown) => {
        log.warn({ err: error }, 'notification_failed');
      });

    res.status(201).json(toPrescriptionResponse(prescription));
  };

  const listPrescriptions = async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: errors.array() });
    }

    const { items, total } = await store.list(
      {
        patientId: toInt(req.query.patient_id),
        appointmentId: toInt(req.query.appointment_id),
      },
      {
        skip: toInt(req.query.skip) ?? 0,
        limit: toInt(req.query.limit) ?? MAX_PAGE_SIZE,
      }
    );

    req.log.info({ total, returned: items.length }, 'prescriptions_retrieved');

    res.json(items.map(toPrescriptionResponse));
  };

  const getPrescription = async (req: Request, res: Response) => {
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      return res.status(400).json({ errors: errors.array() });
    }

    const prescription = await store.get(toInt(req.params.id) ?? 0);

    res.json(toPrescriptionResponse(prescription));
  };

  return { createPrescription, listPrescriptions, getPrescription };
};
